import { IFileSystem } from "../abstractions/IFileSystem";
import { ILogger } from "../logging";
import { IEntryParser, ReferenceRecord } from "./types";

/**
 * Reads source documents through the file system and hands their text to
 * the parser. A missing document contributes zero records.
 */
export class EntryExtractor {
  constructor(
    private readonly fs: IFileSystem,
    private readonly parser: IEntryParser,
    private readonly logger: ILogger
  ) {}

  async extractFromFile(path: string): Promise<ReferenceRecord[]> {
    if (!(await this.fs.exists(path))) {
      this.logger.debug(`extract: source not found, skipping — ${path}`);
      return [];
    }

    const text = await this.fs.readFile(path);
    const records = Array.from(this.parser.parse(text));
    this.logger.debug(`extract: ${records.length} record(s) from ${path}`);
    return records;
  }
}
