const DOT_LEADER_RE = /.{2,}\.{3,}\s*\d+\s*$/;
const TOC_TITLE_RE = /\btable of contents\b|\bcontents\b/i;

export const MIN_DOT_LEADER_LINES = 3;

/**
 * True for a table-of-contents page: a contents title anywhere on the page, or
 * at least three "text ....... 12" leader lines.
 */
export function isTocPage(lines: readonly string[]): boolean {
  if (lines.some((line) => TOC_TITLE_RE.test(line))) {
    return true;
  }
  const dots = lines.filter((line) => DOT_LEADER_RE.test(line)).length;
  return dots >= MIN_DOT_LEADER_LINES;
}
