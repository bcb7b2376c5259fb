import { readFile } from 'fs/promises';
import mammoth from 'mammoth';
import type { LineSource } from './line-source.js';
import { normalizeLine } from '../core/text-pipeline/normalizer.js';

/**
 * Paragraph text of a .docx document. Table cells come through in document
 * order, one line per cell paragraph.
 */
export class DocxLineSource implements LineSource {
  async *readLines(path: string): AsyncIterable<string> {
    const buffer = await readFile(path);
    const result = await mammoth.extractRawText({ buffer });

    for (const raw of result.value.split(/\r?\n/)) {
      const line = normalizeLine(raw);
      if (line) yield line;
    }
  }
}
