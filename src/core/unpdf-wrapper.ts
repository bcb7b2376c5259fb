import type { PDFPageText } from '../types/pdf.js';
import { PDFJSTextExtractor, type PDFJSDocument } from './pdfjs-text-extractor.js';

type UnpdfModule = typeof import('unpdf');

let cachedUnpdf: Promise<UnpdfModule> | null = null;

export class UnPDFWrapper {
  private document: PDFJSDocument | null = null;
  private textExtractor: PDFJSTextExtractor;

  constructor() {
    this.textExtractor = new PDFJSTextExtractor();
  }

  private async getUnpdf(): Promise<UnpdfModule> {
    if (!cachedUnpdf) {
      cachedUnpdf = import('unpdf');
    }
    return await cachedUnpdf;
  }

  async loadDocument(data: ArrayBuffer | Uint8Array): Promise<void> {
    const unpdf = await this.getUnpdf();
    const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
    this.document = await unpdf.getDocumentProxy(bytes);
  }

  async getPageCount(): Promise<number> {
    if (!this.document) {
      throw new Error('Document not loaded');
    }
    return this.document.numPages;
  }

  /**
   * @param pageIndex zero-based
   */
  async getPageText(pageIndex: number): Promise<PDFPageText> {
    if (!this.document) {
      throw new Error('Document not loaded');
    }

    const page = await this.document.getPage(pageIndex + 1);
    const items = await this.textExtractor.extractText(page);
    return { pageNumber: pageIndex + 1, items };
  }

  async dispose(): Promise<void> {
    const doc = this.document;
    this.document = null;
    if (doc) {
      await doc.destroy();
    }
  }
}
