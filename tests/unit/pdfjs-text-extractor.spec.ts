import { describe, it, expect } from 'vitest';
import { PDFJSTextExtractor, type PDFJSTextSource } from '../../src/core/pdfjs-text-extractor.js';

type MockTextItem = {
  str: string;
  dir: string;
  transform: number[];
  fontName: string;
  width: number;
  height: number;
  hasEOL: boolean;
};

const item = (str: string, transform: number[], extra: Partial<MockTextItem> = {}): MockTextItem => ({
  str,
  dir: 'ltr',
  transform,
  fontName: 'F1',
  width: 50,
  height: 12,
  hasEOL: false,
  ...extra
});

// Minimal mock page that matches the extractor contract
const makePage = (items: MockTextItem[]): PDFJSTextSource => ({
  getTextContent: async () => {
    const content = { items, styles: {}, lang: null };
    return content;
  }
});

describe('PDFJSTextExtractor', () => {
  it('extracts rotation and position from the transform matrix', async () => {
    const extractor = new PDFJSTextExtractor();
    // 90deg rotation: matrix [0 1 -1 0 10 20]
    const result = await extractor.extractText(makePage([item('Rotated', [0, 1, -1, 0, 10, 20])]));

    expect(result).toHaveLength(1);
    const [text] = result;
    expect(text.rotation).toBeCloseTo(90, 5);
    // y is kept in PDF space (origin bottom-left)
    expect(text.x).toBe(10);
    expect(text.y).toBe(20);
    expect(text.width).toBe(50);
    expect(text.height).toBe(12);
  });

  it('uses the vertical scale as font size', async () => {
    const extractor = new PDFJSTextExtractor();
    const [text] = await extractor.extractText(makePage([item('Body', [11, 0, 0, 11, 72, 600], { height: 0 })]));

    expect(text.fontSize).toBe(11);
    expect(text.height).toBe(11);
  });

  it('skips blank items', async () => {
    const extractor = new PDFJSTextExtractor();
    const result = await extractor.extractText(
      makePage([item('  ', [10, 0, 0, 10, 0, 0]), item('Kept', [10, 0, 0, 10, 40, 0], { hasEOL: true })])
    );

    expect(result.map((t) => [t.text, t.hasEOL])).toEqual([['Kept', true]]);
  });
});
