/**
 * src/config/env.ts
 * What: Environment configuration loader/validator for the crawler and the ingestor.
 * How: Loads .env via dotenv, validates with zod, and returns a plain PipelineConfig value. Nothing reads
 *      process.env after this point: each component receives the config (or the slice it needs) at
 *      construction, so several pipelines can run side by side against different roots (tests do).
 *      Relative paths are resolved against process.cwd().
 */

import 'dotenv/config';
import { z } from 'zod';
import path from 'path';
import { SetupError } from '../errors.js';
import { DEFAULT_BOOK_FORMATS, toFormatSet } from '../services/classifier.js';

const intWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().int().positive().default(def),
  );

const formatList = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.split(',') : [...DEFAULT_BOOK_FORMATS]));

const requiredPath = (name: string) => z.string().trim().min(1, `${name} is required`);

const schema = z.object({
  SOURCE_ROOT: requiredPath('SOURCE_ROOT'),
  BACKUP_ROOT: requiredPath('BACKUP_ROOT'),
  STAGING_DIR: requiredPath('STAGING_DIR'),
  LEDGER_FILE: requiredPath('LEDGER_FILE'),
  CATALOG_LIBRARY: requiredPath('CATALOG_LIBRARY'),
  CALIBREDB_BIN: z.string().trim().min(1).default('calibredb'),
  CALIBREDB_ARGS: z
    .string()
    .optional()
    .transform((v) => (v ? v.split(/\s+/).filter((a) => a.length > 0) : [])),
  TRANSFER_MODE: z.enum(['backup', 'link']).default('backup'),
  BOOK_FORMATS: formatList,
  INGEST_FORMATS: formatList,
  INGEST_BATCH_SIZE: intWithDefault(10),
  INGEST_BATCH_PAUSE_MS: intWithDefault(5_000),
  INGEST_INTERVAL_MS: intWithDefault(60_000),
  CATALOG_TIMEOUT_MS: intWithDefault(300_000),
});

export type TransferMode = 'backup' | 'link';

export interface PipelineConfig {
  sourceRoot: string;
  backupRoot: string;
  stagingDir: string;
  ledgerFile: string;
  catalogLibrary: string;
  calibredbBin: string;
  calibredbArgs: string[];
  transferMode: TransferMode;
  bookFormats: ReadonlySet<string>;
  // Formats the ingestor hands to the catalog; anything else found in staging is discarded.
  ingestFormats: ReadonlySet<string>;
  batchSize: number;
  batchPauseMs: number;
  intervalMs: number;
  catalogTimeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new SetupError(`Invalid environment configuration: ${issues}`);
  }
  const c = parsed.data;
  const abs = (p: string) => path.resolve(process.cwd(), p);

  return {
    sourceRoot: abs(c.SOURCE_ROOT),
    backupRoot: abs(c.BACKUP_ROOT),
    stagingDir: abs(c.STAGING_DIR),
    ledgerFile: abs(c.LEDGER_FILE),
    catalogLibrary: abs(c.CATALOG_LIBRARY),
    calibredbBin: c.CALIBREDB_BIN,
    calibredbArgs: c.CALIBREDB_ARGS,
    transferMode: c.TRANSFER_MODE,
    bookFormats: toFormatSet(c.BOOK_FORMATS),
    ingestFormats: toFormatSet(c.INGEST_FORMATS),
    batchSize: c.INGEST_BATCH_SIZE,
    batchPauseMs: c.INGEST_BATCH_PAUSE_MS,
    intervalMs: c.INGEST_INTERVAL_MS,
    catalogTimeoutMs: c.CATALOG_TIMEOUT_MS,
  };
}
