import { readFile } from 'fs/promises';
import type { PdfLineOptions } from '../types/config.js';
import type { LineSource } from './line-source.js';
import { UnPDFWrapper } from '../core/unpdf-wrapper.js';
import { reconstructLines } from '../core/text-pipeline/reconstruct.js';
import { normalizeLine } from '../core/text-pipeline/normalizer.js';
import { isTocPage } from './toc-detector.js';

export class PdfLineSource implements LineSource {
  private options: Required<PdfLineOptions>;

  constructor(options: PdfLineOptions = {}) {
    this.options = {
      lineTolerance: 0.5,
      wordGapRatio: 0.15,
      skipTocPages: true,
      ...options
    };
  }

  async *readLines(path: string): AsyncIterable<string> {
    const data = await readFile(path);
    const wrapper = new UnPDFWrapper();

    try {
      await wrapper.loadDocument(new Uint8Array(data));
      const pageCount = await wrapper.getPageCount();

      for (let i = 0; i < pageCount; i++) {
        const lines = await this.pageLines(wrapper, i);
        if (this.options.skipTocPages && isTocPage(lines)) continue;
        yield* lines;
      }
    } finally {
      await wrapper.dispose();
    }
  }

  private async pageLines(wrapper: UnPDFWrapper, pageIndex: number): Promise<string[]> {
    const page = await wrapper.getPageText(pageIndex);
    return reconstructLines(page.items, {
      lineTolerance: this.options.lineTolerance,
      wordGapRatio: this.options.wordGapRatio
    })
      .flatMap((line) => line.text.split(/\r?\n/))
      .map(normalizeLine)
      .filter((line) => line.length > 0);
  }
}
