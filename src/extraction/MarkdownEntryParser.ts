import { ARXIV_ID_PATTERN, deriveIdentifier, withoutGlobalFlag } from "./identifiers";
import { IEntryParser, ReferenceRecord } from "./types";

/** `[title](https://arxiv.org/...)`; group 1 is the link text, group 2 the URL. */
export const ARXIV_LINK_PATTERN =
  /\[([^\]\n]+)\]\((https?:\/\/(?:www\.|export\.)?arxiv\.org\/[^\s)]+)\)/;

/** A line made only of ---, *** or ___ (three or more). */
const SECTION_DELIMITER = /^[ \t]*(?:-{3,}|\*{3,}|_{3,})[ \t]*$/m;

const DEFAULT_SNIPPET_LENGTH = 2000;

export interface MarkdownEntryParserOptions {
  /** Must capture the link text in group 1 and the URL in group 2. */
  linkPattern?: RegExp;
  identifierPattern?: RegExp;
  snippetLength?: number;
}

/**
 * Splits a markdown document on horizontal rules and yields one record per
 * section whose first matching link points at the repository of record.
 * Sections without such a link yield nothing.
 */
export class MarkdownEntryParser implements IEntryParser {
  private readonly linkPattern: RegExp;
  private readonly identifierPattern: RegExp;
  private readonly snippetLength: number;

  constructor(options: MarkdownEntryParserOptions = {}) {
    this.linkPattern = withoutGlobalFlag(options.linkPattern ?? ARXIV_LINK_PATTERN);
    this.identifierPattern = options.identifierPattern ?? ARXIV_ID_PATTERN;
    this.snippetLength = options.snippetLength ?? DEFAULT_SNIPPET_LENGTH;
  }

  *parse(text: string): Generator<ReferenceRecord> {
    const sections = text.replace(/\r\n/g, "\n").split(SECTION_DELIMITER);
    for (const section of sections) {
      const record = this.parseSection(section);
      if (record) {
        yield record;
      }
    }
  }

  private parseSection(section: string): ReferenceRecord | null {
    const match = section.match(this.linkPattern);
    if (!match) return null;

    const title = (match[1] ?? "").replace(/\s+/g, " ").trim();
    const externalUrl = (match[2] ?? "").trim();
    if (!title || !externalUrl) return null;

    return {
      title,
      externalUrl,
      identifier: deriveIdentifier(externalUrl, this.identifierPattern),
      rawSnippet: section.trim().slice(0, this.snippetLength),
    };
  }
}
