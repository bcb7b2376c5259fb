import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import * as XLSX from 'xlsx';
import type { OutputRecord } from '../types/records.js';

export const HEADERS = ['AFI', 'Classification', 'Recommendation', 'Entity', 'EE/FA', 'Source File'] as const;

const COLUMN_KEYS = ['afi', 'classification', 'recommendation', 'entity', 'process', 'file'] as const;

export type ColumnKey = (typeof COLUMN_KEYS)[number];

/** 1-based column positions. */
export type ColumnMap = Record<ColumnKey, number>;

export const DEFAULT_COLUMNS: ColumnMap = {
  afi: 1,
  classification: 2,
  recommendation: 3,
  entity: 4,
  process: 5,
  file: 7
};

const HEADER_NAMES: Record<ColumnKey, string> = {
  afi: 'afi',
  classification: 'classification',
  recommendation: 'recommendation',
  entity: 'entity',
  process: 'ee/fa',
  file: 'source file'
};

export interface RecordSink {
  append(record: OutputRecord): void;
  save(): Promise<void>;
}

function cellText(sheet: XLSX.WorkSheet, r: number, c: number): string {
  const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r, c })];
  if (!cell || cell.v === undefined || cell.v === null) return '';
  return String(cell.v);
}

/**
 * Resolves column positions from the header row, falling back to
 * {@link DEFAULT_COLUMNS} per missing header.
 */
export function detectColumns(sheet: XLSX.WorkSheet): ColumnMap {
  const ref = sheet['!ref'];
  const names = new Map<string, number>();
  if (ref) {
    const range = XLSX.utils.decode_range(ref);
    for (let c = 0; c <= range.e.c; c++) {
      const name = cellText(sheet, 0, c).trim().toLowerCase();
      if (name) names.set(name, c + 1);
    }
  }

  const columns = { ...DEFAULT_COLUMNS };
  for (const key of COLUMN_KEYS) {
    columns[key] = names.get(HEADER_NAMES[key]) ?? DEFAULT_COLUMNS[key];
  }
  return columns;
}

/** 1-based row index of the last populated row, 0 for an empty sheet. */
export function lastRow(sheet: XLSX.WorkSheet): number {
  const ref = sheet['!ref'];
  if (!ref) return 0;
  return XLSX.utils.decode_range(ref).e.r + 1;
}

export class WorkbookSink implements RecordSink {
  private workbook: XLSX.WorkBook;
  private sheet: XLSX.WorkSheet;
  private columns: ColumnMap;
  private row: number;

  private constructor(private readonly path: string, workbook: XLSX.WorkBook, sheet: XLSX.WorkSheet) {
    this.workbook = workbook;
    this.sheet = sheet;
    this.columns = detectColumns(sheet);
    this.row = Math.max(lastRow(sheet) + 1, 2);
  }

  /**
   * Opens the workbook at `path`, or starts a new one with a header row.
   * An existing workbook without `sheetName` is written on its first sheet.
   */
  static async open(path: string, sheetName: string): Promise<WorkbookSink> {
    if (!existsSync(path)) {
      const workbook = XLSX.utils.book_new();
      const sheet = XLSX.utils.aoa_to_sheet([[...HEADERS]]);
      XLSX.utils.book_append_sheet(workbook, sheet, sheetName);
      return new WorkbookSink(path, workbook, sheet);
    }

    const workbook = XLSX.read(await readFile(path), { type: 'buffer' });
    const name = workbook.SheetNames.includes(sheetName) ? sheetName : workbook.SheetNames[0];
    let sheet = name === undefined ? undefined : workbook.Sheets[name];
    if (!sheet) {
      sheet = XLSX.utils.aoa_to_sheet([[...HEADERS]]);
      XLSX.utils.book_append_sheet(workbook, sheet, sheetName);
    } else if (lastRow(sheet) < 1) {
      XLSX.utils.sheet_add_aoa(sheet, [[...HEADERS]], { origin: 'A1' });
    }
    return new WorkbookSink(path, workbook, sheet);
  }

  append(record: OutputRecord): void {
    const values: Array<[ColumnKey, string]> = [
      ['afi', record.afiText],
      ['classification', record.classification],
      ['recommendation', record.recommendationText],
      ['entity', record.entity],
      ['process', record.processLabel],
      ['file', record.sourceFileName]
    ];

    const cells: Array<string | undefined> = [];
    for (const [key, value] of values) {
      cells[this.columns[key] - 1] = value;
    }

    XLSX.utils.sheet_add_aoa(this.sheet, [cells], { origin: { r: this.row - 1, c: 0 } });
    this.row += 1;
  }

  async save(): Promise<void> {
    const out: Buffer = XLSX.write(this.workbook, { type: 'buffer', bookType: 'xlsx' });
    await writeFile(this.path, out);
  }
}
