/**
 * One paper reference found in a markdown section.
 */
export interface ReferenceRecord {
  readonly title: string;
  readonly externalUrl: string;
  /** Stable key derived from the URL, used for deduplication across runs. */
  readonly identifier: string;
  /** The section text the link was found in, cut to a bounded prefix. */
  readonly rawSnippet: string;
}

export interface IEntryParser {
  parse(text: string): Iterable<ReferenceRecord>;
}
