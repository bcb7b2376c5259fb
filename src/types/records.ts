import type { DocumentReadError } from '../errors.js';

export interface AfiItem {
  number: number | null;
  text: string;
  classification: string;
  entity: string;
}

export type ResolvedAfiItem = AfiItem & { number: number };

export interface ProcessBlock {
  label: string;
  items: AfiItem[];
  recommendations: Record<string, string>;
}

export interface OutputRecord {
  afiText: string;
  classification: string;
  entity: string;
  recommendationText: string;
  processLabel: string;
  sourceFileName: string;
}

export type DocumentResult =
  | { status: 'ok'; file: string; records: OutputRecord[] }
  | { status: 'read-failed'; file: string; reason: string; error: DocumentReadError };

export interface BatchSummary {
  files: string[];
  rowsWritten: number;
  failures: Array<{ file: string; reason: string }>;
  workbookPath: string;
}
