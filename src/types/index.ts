export type * from './config.js';
export type * from './pdf.js';
export type * from './records.js';
export { DEFAULT_CONFIG, ConfigPresets, WORKBOOK_FILE_NAME, configFromEnv, resolveConfig } from './config.js';
