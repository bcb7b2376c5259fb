import { basename, extname } from 'path';
import type { PdfLineOptions } from '../types/config.js';
import { UnsupportedDocumentError } from '../errors.js';
import type { LineSource } from './line-source.js';
import { PdfLineSource } from './pdf-line-source.js';
import { DocxLineSource } from './docx-line-source.js';

export type { LineSource } from './line-source.js';
export { PdfLineSource } from './pdf-line-source.js';
export { DocxLineSource } from './docx-line-source.js';
export { isTocPage } from './toc-detector.js';

export function lineSourceFor(path: string, pdfOptions?: PdfLineOptions): LineSource {
  switch (extname(path).toLowerCase()) {
    case '.pdf':
      return new PdfLineSource(pdfOptions);
    case '.docx':
      return new DocxLineSource();
    default:
      throw new UnsupportedDocumentError(basename(path));
  }
}
