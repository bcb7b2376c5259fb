import type { PDFTextContent } from '../types/pdf.js';

type UnpdfModule = typeof import('unpdf');
export type PDFJSDocument = Awaited<ReturnType<UnpdfModule['getDocumentProxy']>>;
export type PDFJSPage = Awaited<ReturnType<PDFJSDocument['getPage']>>;
type PDFJSTextContent = Awaited<ReturnType<PDFJSPage['getTextContent']>>;
type PDFJSTextItem = Extract<PDFJSTextContent['items'][number], { str: string }>;

/** The part of a page the extractor reads. */
export type PDFJSTextSource = Pick<PDFJSPage, 'getTextContent'>;

export class PDFJSTextExtractor {
  async extractText(page: PDFJSTextSource): Promise<PDFTextContent[]> {
    const textContents: PDFTextContent[] = [];

    const textContent = await page.getTextContent();
    for (const item of textContent.items) {
      if (!('str' in item)) continue;
      const textItem = this.parseTextItem(item);
      if (textItem) textContents.push(textItem);
    }

    return textContents;
  }

  private parseTextItem(item: PDFJSTextItem): PDFTextContent | null {
    if (!item.str || item.str.trim().length === 0) {
      return null;
    }

    // [a, b, c, d, e, f]: e/f are the x/y translation in PDF space (origin bottom-left).
    const transform: number[] = Array.isArray(item.transform) ? item.transform : [1, 0, 0, 1, 0, 0];
    const [a, b, c, d, e, f] = transform;
    const rotation = (Math.atan2(b, a) * 180) / Math.PI;

    const scaleY = Math.hypot(c, d) || 1;
    const height = typeof item.height === 'number' && item.height > 0 ? item.height : scaleY;
    // Item height is the glyph box; the vertical scale is the em size.
    const fontSize = scaleY > 2 ? scaleY : height || 12;
    const width = typeof item.width === 'number' ? item.width : item.str.length * fontSize * 0.6;

    return {
      text: item.str,
      x: e,
      y: f,
      width,
      height,
      fontSize,
      rotation,
      hasEOL: item.hasEOL
    };
  }
}
