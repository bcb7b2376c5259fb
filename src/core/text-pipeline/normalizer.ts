import type { PDFTextContent } from '../../types/pdf.js';
import type { NormalizedGlyphItem } from './types.js';

const ZERO_WIDTH = ['\u200B', '\u200C', '\u200D', '\u2060', '\uFEFF', '\u200E', '\u200F'];
const DASH_RE = /[\u2010\u2011\u2012\u2013\u2014\u2015\u2212-]/g;
const TIDY_EDGE_RE = /^[ \-.()[\]:;]+|[ \-.()[\]:;]+$/g;

export function stripZeroWidth(s: string): string {
  let out = s;
  for (const ch of ZERO_WIDTH) {
    out = out.split(ch).join('');
  }
  return out;
}

export function normalizeDashes(s: string): string {
  return s.replace(DASH_RE, '-');
}

/**
 * Canonical form of one extracted line. Returns '' when nothing printable is left;
 * callers drop those.
 */
export function normalizeLine(raw: string): string {
  let s = raw.normalize('NFKC');
  s = stripZeroWidth(s);
  s = s.split('\u00A0').join(' ').split('\r').join('\n');
  s = s.replace(/[ \t]+/g, ' ');
  s = normalizeDashes(s);
  return s.trim();
}

/**
 * Field cleanup used when assembling AFI text, classification and entity.
 */
export function tidy(s: string): string {
  return s.replace(/\s{2,}/g, ' ').replace(TIDY_EDGE_RE, '').trim();
}

export function capitalize(word: string): string {
  if (!word) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function normalizeGlyphItems(items: PDFTextContent[]): NormalizedGlyphItem[] {
  const out: NormalizedGlyphItem[] = [];

  for (const it of items || []) {
    const raw = stripZeroWidth(it.text ?? '');
    const text = raw.replace(/\s+/g, ' ');
    if (!text.trim()) continue;

    const rotation = typeof it.rotation === 'number' && Number.isFinite(it.rotation) ? it.rotation : 0;

    out.push({
      source: it,
      text,
      x: it.x,
      y: it.y,
      width: it.width,
      height: it.height,
      fontSize: it.fontSize,
      rotation,
      baselineY: it.y
    });
  }

  return out;
}
