#!/usr/bin/env node
/**
 * afi-extract
 *
 * Reads every .docx/.pdf in the working directory (or AFI_INPUT_DIR) and
 * appends one workbook row per Area for Improvement.
 *
 * Exits 0 when every document was read, 1 when any could not be read (the
 * rows of the readable ones are still saved) or the run aborted.
 */

import 'dotenv/config';
import { AfiExtractor } from './index.js';
import { configFromEnv } from './types/config.js';

async function main(): Promise<number> {
  const extractor = new AfiExtractor({ inputDir: process.cwd(), ...configFromEnv() });

  const summary = await extractor.run((progress) => {
    if (progress.stage === 'saving') return;
    if (progress.message) console.log(progress.message);
  });

  if (summary.failures.length > 0) {
    console.error(`${summary.failures.length} of ${summary.files.length} file(s) could not be read.`);
    return 1;
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('afi-extract failed:', error);
    process.exitCode = 1;
  });
