export type DocumentExtension = '.pdf' | '.docx';

export interface AfiExtractorConfig {
  // Discovery
  inputDir: string;
  extensions: DocumentExtension[];

  // Output workbook
  workbookPath: string;
  sheetName: string;

  // Batch behavior
  continueOnError: boolean;
  quiet: boolean;

  // PDF line reconstruction
  pdf?: PdfLineOptions;
}

export interface PdfLineOptions {
  /** Baseline distance, as a fraction of glyph height, under which items share a line. */
  lineTolerance?: number;
  /** Horizontal gap, as a fraction of font size, above which a space is inserted. */
  wordGapRatio?: number;
  skipTocPages?: boolean;
}

export interface BatchProgress {
  stage: 'discovery' | 'document' | 'saving' | 'complete';
  current?: number;
  total?: number;
  file?: string;
  message?: string;
}

export type BatchProgressCallback = (progress: BatchProgress) => void;

export const WORKBOOK_FILE_NAME = 'All_AFIs.xlsx';

export const DEFAULT_CONFIG: AfiExtractorConfig = {
  inputDir: '.',
  extensions: ['.docx', '.pdf'],
  workbookPath: WORKBOOK_FILE_NAME,
  sheetName: 'Sheet1',
  continueOnError: true,
  quiet: false,
  pdf: {
    lineTolerance: 0.5,
    wordGapRatio: 0.15,
    skipTocPages: true
  }
};

export const ConfigPresets = {
  /**
   * Stop at the first unreadable document; nothing is saved.
   */
  strict: {
    continueOnError: false
  } satisfies Partial<AfiExtractorConfig>,

  /**
   * Keep going past unreadable documents and suppress recovered-condition warnings.
   */
  lenient: {
    continueOnError: true,
    quiet: true
  } satisfies Partial<AfiExtractorConfig>
};

export function resolveConfig(overrides: Partial<AfiExtractorConfig> = {}): AfiExtractorConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
    pdf: { ...DEFAULT_CONFIG.pdf, ...overrides.pdf }
  };
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<AfiExtractorConfig> {
  const config: Partial<AfiExtractorConfig> = {};
  if (env.AFI_INPUT_DIR) config.inputDir = env.AFI_INPUT_DIR;
  if (env.AFI_WORKBOOK) config.workbookPath = env.AFI_WORKBOOK;
  if (env.AFI_SHEET) config.sheetName = env.AFI_SHEET;
  if (env.AFI_FAIL_FAST === '1' || env.AFI_FAIL_FAST === 'true') config.continueOnError = false;
  return config;
}
