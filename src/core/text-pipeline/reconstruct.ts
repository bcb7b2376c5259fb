import type { PDFTextContent } from '../../types/pdf.js';
import type { LineReconstructionOptions, NormalizedGlyphItem, ReconstructedLine } from './types.js';
import { normalizeGlyphItems } from './normalizer.js';

const DEFAULT_OPTIONS: LineReconstructionOptions = {
  lineTolerance: 0.5,
  wordGapRatio: 0.15
};

/**
 * Groups positioned text items into visual lines, top of page first.
 * PDF-space Y grows upwards, so lines are ordered by descending baseline.
 */
export function reconstructLines(
  items: PDFTextContent[],
  options: Partial<LineReconstructionOptions> = {}
): ReconstructedLine[] {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const glyphs = normalizeGlyphItems(items).sort((a, b) => b.baselineY - a.baselineY || a.x - b.x);

  const lines: ReconstructedLine[] = [];
  for (const g of glyphs) {
    const current = lines[lines.length - 1];
    const tolerance = Math.max(1, Math.max(g.height, g.fontSize) * opts.lineTolerance);
    if (current && Math.abs(current.baselineY - g.baselineY) <= tolerance) {
      current.glyphs.push(g);
      continue;
    }
    lines.push({ text: '', baselineY: g.baselineY, glyphs: [g] });
  }

  for (const line of lines) {
    line.glyphs.sort((a, b) => a.x - b.x);
    line.text = joinGlyphs(line.glyphs, opts.wordGapRatio);
  }

  return lines;
}

function joinGlyphs(glyphs: NormalizedGlyphItem[], wordGapRatio: number): string {
  const parts: string[] = [];

  for (let i = 0; i < glyphs.length; i++) {
    const g = glyphs[i];
    if (i === 0) {
      parts.push(g.text);
      continue;
    }

    const prev = glyphs[i - 1];
    const gapPx = g.x - (prev.x + prev.width);
    const avgFontSize = Math.max(1, (prev.fontSize + g.fontSize) / 2);
    const alreadySpaced = /\s$/.test(prev.text) || /^\s/.test(g.text);
    if (!alreadySpaced && gapPx > avgFontSize * wordGapRatio) parts.push(' ');
    parts.push(g.text);
  }

  return parts.join('');
}
