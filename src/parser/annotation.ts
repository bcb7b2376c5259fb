import { capitalize, normalizeDashes, normalizeLine, tidy } from '../core/text-pipeline/normalizer.js';

export interface Annotated {
  text: string;
  classification: string;
  entity: string;
  found: boolean;
}

export interface SpanAnnotated extends Annotated {
  /** Index of the last line consumed from the input. */
  lastIndex: number;
}

type ParenMatch = {
  start: number;
  end: number;
  classification: string;
  entity: string;
};

const PAREN_GROUP_RE = /\(([^)]*?)\)/g;
const KEYWORD_RE = /\b(major|other)\b/gi;

function lastParenGroup(text: string): ParenMatch | null {
  let last: RegExpMatchArray | null = null;
  for (const m of text.matchAll(PAREN_GROUP_RE)) {
    last = m;
  }
  if (!last || last.index === undefined) return null;

  const inside = normalizeDashes(last[1] ?? '').trim();
  const hyphen = inside.indexOf('-');
  const left = hyphen === -1 ? inside : inside.slice(0, hyphen);
  const right = hyphen === -1 ? '' : inside.slice(hyphen + 1);

  return {
    start: last.index,
    end: last.index + last[0].length,
    classification: tidy(left),
    entity: tidy(right)
  };
}

function keywordAnnotation(text: string): Annotated | null {
  let last: RegExpMatchArray | null = null;
  for (const m of text.matchAll(KEYWORD_RE)) {
    last = m;
  }
  if (!last || last.index === undefined) return null;

  const dash = text.indexOf('-', last.index);
  if (dash === -1) return null;

  const entity = tidy(text.slice(dash + 1));
  if (!entity) return null;

  return {
    text: tidy(text.slice(0, last.index)),
    classification: capitalize(last[1] ?? ''),
    entity,
    found: true
  };
}

function none(text: string): Annotated {
  return { text, classification: '', entity: '', found: false };
}

/**
 * Splits a `(classification - entity)` annotation out of `text`. The rightmost
 * parenthesized group wins; failing that, a trailing `Major - ...` / `Other - ...`
 * phrase is used. Text without an annotation comes back as given.
 */
export function extractAnnotation(text: string): Annotated {
  const group = lastParenGroup(text);
  if (group && (group.classification || group.entity)) {
    const rest = (text.slice(0, group.start) + ' ' + text.slice(group.end)).trim();
    return {
      text: tidy(rest),
      classification: group.classification,
      entity: group.entity,
      found: true
    };
  }

  return keywordAnnotation(text) ?? none(text);
}

/**
 * Like {@link extractAnnotation}, but an annotation opened on `firstLine` and
 * closed on a later line is read across `lines[index + 1 ..]`. Only the text
 * of the first line is kept; the continuation lines are reported as consumed
 * through `lastIndex` whether or not an annotation was found.
 */
export function extractAnnotationAcrossLines(
  lines: readonly string[],
  index: number,
  firstLine: string
): SpanAnnotated {
  const open = firstLine.indexOf('(');
  if (open === -1 || firstLine.includes(')')) {
    return { ...extractAnnotation(firstLine), lastIndex: index };
  }

  const head = firstLine.slice(open);
  const buffer = [head];
  let j = index + 1;
  while (j < lines.length) {
    const next = lines[j];
    buffer.push(next);
    if (next.includes(')')) break;
    j++;
  }
  const lastIndex = Math.max(index, Math.min(j, lines.length - 1));

  const combined = normalizeLine(buffer.join(' '));
  const group = lastParenGroup(combined);
  if (!group || (!group.classification && !group.entity)) {
    return { ...none(firstLine), lastIndex };
  }

  // The span can only begin inside the first line's tail; otherwise it lies wholly in later lines.
  const headLength = normalizeLine(head).length;
  const kept = group.start < headLength ? firstLine.slice(0, open + group.start) : firstLine;

  return {
    text: tidy(kept),
    classification: group.classification,
    entity: group.entity,
    found: true,
    lastIndex
  };
}
