// src/services/ingestor.ts
// What: Continuous consumer of the staging directory that feeds the catalog in small batches.
// How: Each cycle lists staging (regular files, sorted by name), fetches the catalog's format list once,
//      then per file: drop formats the catalog should not get, drop names the catalog already has,
//      otherwise add with duplicates permitted and delete the staged link. A failed add keeps the file
//      for the next cycle. A file the catalog took but that could not be unlinked is remembered and
//      only cleaned up later, never added twice. After every batchSize handled files the cycle pauses
//      for batchPauseMs, unless nothing is left to handle.
//      run() repeats cycles every intervalMs until its AbortSignal fires.

import { constants } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import baseLogger, { type Logger } from '../logging.js';
import { ClassificationRejected, SetupError, errnoCode, errorMessage } from '../errors.js';
import { isSupportedBook } from './classifier.js';
import { hasFormat, type Catalog } from './catalog.js';

export interface IngestCycleSummary {
  scanned: number;
  added: number;
  skippedDuplicate: number;
  rejected: number;
  failed: number;
  // Added to the catalog, but the staged file could not be deleted.
  cleanupFailed: number;
  pauses: number;
}

type StagedOutcome = 'added' | 'duplicate' | 'rejected' | 'failed' | 'cleanup-failed' | 'vanished';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface IngestorOptions {
  stagingDir: string;
  ingestFormats: ReadonlySet<string>;
  batchSize: number;
  batchPauseMs: number;
  intervalMs: number;
  sleep?: Sleep;
}

const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    // An abort just ends the wait; run() checks the signal itself.
    if (!(signal?.aborted ?? false)) throw err;
  }
};

function emptySummary(): IngestCycleSummary {
  return { scanned: 0, added: 0, skippedDuplicate: 0, rejected: 0, failed: 0, cleanupFailed: 0, pauses: 0 };
}

export class Ingestor {
  private readonly catalog: Catalog;
  private readonly opts: IngestorOptions;
  private readonly sleep: Sleep;
  private readonly log: Logger;
  // Staged names already in the catalog whose unlink failed.
  private readonly pendingCleanup = new Set<string>();

  constructor(catalog: Catalog, opts: IngestorOptions, logger: Logger = baseLogger) {
    this.catalog = catalog;
    this.opts = opts;
    this.sleep = opts.sleep ?? defaultSleep;
    this.log = logger.child({ component: 'ingestor' });
  }

  /**
   * Create the staging directory if needed and make sure the catalog is usable.
   */
  async verifySetup(): Promise<void> {
    const dir = this.opts.stagingDir;
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.access(dir, constants.W_OK);
    } catch (err) {
      throw new SetupError(`Staging directory ${dir} is not usable: ${errorMessage(err)}`, { path: dir, cause: err });
    }
    await this.catalog.verifyLibrary();
  }

  async listStaged(): Promise<string[]> {
    const entries = await fs.readdir(this.opts.stagingDir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile())
      .map((e) => e.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  async runCycle(signal?: AbortSignal): Promise<IngestCycleSummary> {
    const summary = emptySummary();
    const names = await this.listStaged();
    if (names.length === 0) return summary;

    this.log.info({ count: names.length, batchSize: this.opts.batchSize }, 'Processing staged books in batches');
    const formats = await this.catalog.listFormats();

    let inBatch = 0;
    for (const [index, filename] of names.entries()) {
      if (signal?.aborted) break;
      summary.scanned += 1;

      const outcome = await this.handle(filename, formats);
      if (outcome === 'rejected') {
        summary.rejected += 1;
        continue;
      }
      if (outcome === 'vanished') continue;
      if (outcome === 'added') summary.added += 1;
      else if (outcome === 'duplicate') summary.skippedDuplicate += 1;
      else if (outcome === 'cleanup-failed') {
        summary.added += 1;
        summary.cleanupFailed += 1;
      } else summary.failed += 1;

      inBatch += 1;
      if (inBatch >= this.opts.batchSize && index < names.length - 1) {
        this.log.info({ handled: inBatch, pauseMs: this.opts.batchPauseMs }, 'Batch complete, pausing');
        await this.sleep(this.opts.batchPauseMs, signal);
        summary.pauses += 1;
        inBatch = 0;
      }
    }

    this.log.info({ summary }, 'Batch processing complete');
    return summary;
  }

  /**
   * Loop forever (until aborted). A failing cycle is logged and retried after the interval.
   */
  async run(signal?: AbortSignal): Promise<void> {
    this.log.info({ stagingDir: this.opts.stagingDir, intervalMs: this.opts.intervalMs }, 'Ingest loop started');
    while (!signal?.aborted) {
      try {
        await this.runCycle(signal);
      } catch (err) {
        this.log.error({ err }, 'Ingest cycle failed');
      }
      if (signal?.aborted) break;
      await this.sleep(this.opts.intervalMs, signal);
    }
    this.log.info('Ingest loop stopped');
  }

  private async handle(filename: string, formats: readonly string[]): Promise<StagedOutcome> {
    const staged = path.join(this.opts.stagingDir, filename);
    try {
      if (!isSupportedBook(filename, this.opts.ingestFormats)) {
        this.log.warn({ err: new ClassificationRejected(staged) }, 'Removing unsupported format from staging');
        await this.remove(staged);
        return 'rejected';
      }

      // Gone since listing (operator or a concurrent consumer).
      if (!(await this.isRegularFile(staged))) {
        this.pendingCleanup.delete(filename);
        return 'vanished';
      }

      if (this.pendingCleanup.has(filename) || hasFormat(filename, formats)) {
        this.log.info({ filename }, 'Skipping duplicate already in catalog');
        await this.remove(staged);
        this.pendingCleanup.delete(filename);
        return 'duplicate';
      }

      this.log.info({ filename }, 'Adding to catalog');
      await this.catalog.add(staged);
    } catch (err) {
      this.log.error({ err, filename }, 'Failed to ingest; keeping staged file for the next cycle');
      return 'failed';
    }

    try {
      await this.remove(staged);
      return 'added';
    } catch (err) {
      this.pendingCleanup.add(filename);
      this.log.error({ err, filename }, 'Added to catalog but could not delete the staged file');
      return 'cleanup-failed';
    }
  }

  private async isRegularFile(p: string): Promise<boolean> {
    try {
      return (await fs.lstat(p)).isFile();
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return false;
      throw err;
    }
  }

  private async remove(p: string): Promise<void> {
    try {
      await fs.unlink(p);
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') throw err;
    }
  }
}
