import { readdir } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import type { AfiExtractorConfig, BatchProgressCallback, PdfLineOptions } from '../types/config.js';
import type { BatchSummary, DocumentResult, OutputRecord } from '../types/records.js';
import { DocumentReadError } from '../errors.js';
import { parseLines } from '../parser/section-machine.js';
import { lineSourceFor, type LineSource } from '../sources/index.js';
import { WorkbookSink, type RecordSink } from '../sink/workbook-sink.js';

const LOCK_FILE_PREFIX = '~$';

/**
 * Eligible documents in `dir`, ordered by case-insensitive file name. Office
 * lock files (`~$name.docx`) are skipped.
 */
export async function discoverDocuments(dir: string, extensions: readonly string[]): Promise<string[]> {
  const wanted = new Set(extensions.map((e) => e.toLowerCase()));
  const entries = await readdir(dir, { withFileTypes: true });

  return entries
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .filter((name) => wanted.has(extname(name).toLowerCase()))
    .filter((name) => !name.startsWith(LOCK_FILE_PREFIX))
    .sort((a, b) => {
      const la = a.toLowerCase();
      const lb = b.toLowerCase();
      return la < lb ? -1 : la > lb ? 1 : 0;
    })
    .map((name) => join(dir, name));
}

async function collectLines(source: LineSource, path: string): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of source.readLines(path)) {
    lines.push(line);
  }
  return lines;
}

/**
 * Reads and parses one document. Read failures come back as a `read-failed`
 * result instead of being thrown.
 */
export async function extractDocument(
  path: string,
  options: { source?: LineSource; pdf?: PdfLineOptions; quiet?: boolean } = {}
): Promise<DocumentResult> {
  const file = basename(path);
  let lines: string[];
  try {
    lines = await collectLines(options.source ?? lineSourceFor(path, options.pdf), path);
  } catch (error) {
    const failure = new DocumentReadError(file, error);
    return { status: 'read-failed', file, reason: failure.message, error: failure };
  }

  const records = parseLines(lines, file, (label, numbers) => {
    if (!options.quiet) {
      console.warn(
        `AfiBatchRunner: ${file} / "${label}": item number(s) ${numbers.join(', ')} used more than once; rows kept as-is.`
      );
    }
  });
  return { status: 'ok', file, records };
}

export type SinkFactory = (config: AfiExtractorConfig) => Promise<RecordSink>;
export type SourceFactory = (path: string, config: AfiExtractorConfig) => LineSource;

export class AfiBatchRunner {
  private config: AfiExtractorConfig;
  private openSink: SinkFactory;
  private sourceFor: SourceFactory;

  constructor(
    config: AfiExtractorConfig,
    factories: { sink?: SinkFactory; source?: SourceFactory } = {}
  ) {
    this.config = config;
    this.openSink = factories.sink ?? ((c) => WorkbookSink.open(this.workbookPath(c), c.sheetName));
    this.sourceFor = factories.source ?? ((path, c) => lineSourceFor(path, c.pdf));
  }

  private workbookPath(config: AfiExtractorConfig = this.config): string {
    return resolve(config.inputDir, config.workbookPath);
  }

  async run(progressCallback?: BatchProgressCallback): Promise<BatchSummary> {
    const files = await discoverDocuments(this.config.inputDir, this.config.extensions);
    progressCallback?.({
      stage: 'discovery',
      total: files.length,
      message: `Found ${files.length} files (${this.config.extensions.join('/')}).`
    });

    const sink = await this.openSink(this.config);
    const summary: BatchSummary = {
      files: files.map((f) => basename(f)),
      rowsWritten: 0,
      failures: [],
      workbookPath: this.workbookPath()
    };

    for (let i = 0; i < files.length; i++) {
      const path = files[i];
      progressCallback?.({
        stage: 'document',
        current: i + 1,
        total: files.length,
        file: basename(path),
        message: `[${i + 1}/${files.length}] ${basename(path)}`
      });

      const result = await this.extractOne(path);
      if (result.status === 'read-failed') {
        if (!this.config.continueOnError) {
          throw result.error;
        }
        console.error(`AfiBatchRunner: ${result.reason}`);
        summary.failures.push({ file: result.file, reason: result.reason });
        continue;
      }

      this.write(sink, result.records);
      summary.rowsWritten += result.records.length;
    }

    progressCallback?.({ stage: 'saving', message: `Saving ${summary.workbookPath}` });
    await sink.save();
    progressCallback?.({ stage: 'complete', message: `Done → ${summary.workbookPath}` });

    return summary;
  }

  private async extractOne(path: string): Promise<DocumentResult> {
    let source: LineSource;
    try {
      source = this.sourceFor(path, this.config);
    } catch (error) {
      const failure = new DocumentReadError(basename(path), error);
      return { status: 'read-failed', file: basename(path), reason: failure.message, error: failure };
    }
    return await extractDocument(path, { source, quiet: this.config.quiet });
  }

  private write(sink: RecordSink, records: OutputRecord[]): void {
    for (const record of records) {
      sink.append(record);
    }
  }
}
