import type { PDFTextContent } from '../../types/pdf.js';

export type NormalizedGlyphItem = {
  source: PDFTextContent;
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
  fontSize: number;
  rotation: number;
  baselineY: number;
};

export type LineReconstructionOptions = {
  lineTolerance: number;
  wordGapRatio: number;
};

export type ReconstructedLine = {
  text: string;
  baselineY: number;
  glyphs: NormalizedGlyphItem[];
};
