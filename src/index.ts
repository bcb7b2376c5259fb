import type { AfiExtractorConfig, BatchProgressCallback } from './types/index.js';
import type { BatchSummary, DocumentResult } from './types/records.js';
import { ConfigPresets, resolveConfig } from './types/config.js';
import { AfiBatchRunner, extractDocument, type SinkFactory, type SourceFactory } from './runner/batch-runner.js';

export class AfiExtractor {
  private config: AfiExtractorConfig;
  private factories: { sink?: SinkFactory; source?: SourceFactory };

  constructor(config: Partial<AfiExtractorConfig> = {}, factories: { sink?: SinkFactory; source?: SourceFactory } = {}) {
    this.config = resolveConfig(config);
    this.factories = factories;
  }

  // Chainable configuration methods
  setInputDir(dir: string): this {
    this.config.inputDir = dir;
    return this;
  }

  setWorkbook(path: string, sheetName: string = this.config.sheetName): this {
    this.config.workbookPath = path;
    this.config.sheetName = sheetName;
    return this;
  }

  continueOnError(enabled: boolean = true): this {
    this.config.continueOnError = enabled;
    return this;
  }

  applyPreset(preset: keyof typeof ConfigPresets): this {
    this.config = resolveConfig({ ...this.config, ...ConfigPresets[preset] });
    return this;
  }

  getConfig(): AfiExtractorConfig {
    return { ...this.config, pdf: { ...this.config.pdf } };
  }

  /**
   * Extracts every eligible document in the input directory and appends the
   * rows to the workbook.
   */
  async run(progressCallback?: BatchProgressCallback): Promise<BatchSummary> {
    const runner = new AfiBatchRunner(this.getConfig(), this.factories);
    return await runner.run(progressCallback);
  }

  /**
   * Extracts a single document without touching the workbook.
   */
  async extract(path: string): Promise<DocumentResult> {
    const source = this.factories.source?.(path, this.config);
    return await extractDocument(path, { source, pdf: this.config.pdf, quiet: this.config.quiet });
  }
}

export * from './types/index.js';
export { DocumentReadError, UnsupportedDocumentError } from './errors.js';
export { normalizeLine, normalizeDashes, tidy } from './core/text-pipeline/normalizer.js';
export { extractAnnotation, extractAnnotationAcrossLines } from './parser/annotation.js';
export type { Annotated, SpanAnnotated } from './parser/annotation.js';
export { classifyLine } from './parser/line-classifier.js';
export type { LineRole, TaggedLine } from './parser/line-classifier.js';
export { parseLines, createParserContext, step, flushBlock } from './parser/section-machine.js';
export type { ParserContext, SectionState } from './parser/section-machine.js';
export { RecommendationAccumulator, associate, resolveNumbers, finalizeRecord } from './parser/associator.js';
export { AfiBatchRunner, discoverDocuments, extractDocument } from './runner/batch-runner.js';
export type { SinkFactory, SourceFactory } from './runner/batch-runner.js';
export { lineSourceFor, PdfLineSource, DocxLineSource, isTocPage } from './sources/index.js';
export type { LineSource } from './sources/index.js';
export { WorkbookSink, HEADERS, DEFAULT_COLUMNS, detectColumns } from './sink/workbook-sink.js';
export type { RecordSink, ColumnMap } from './sink/workbook-sink.js';

export default AfiExtractor;
