export interface LineSource {
  /** Normalized, non-empty lines of one document, in reading order. */
  readLines(path: string): AsyncIterable<string>;
}
