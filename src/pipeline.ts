// src/pipeline.ts
// What: Entry points a supervisor (systemd timer/service, cron, the CLI) calls.
// How: Wires config → ledger/transfer/crawler or catalog/ingestor, performs the setup checks that are
//      allowed to fail a run (SetupError), and leaves everything per-file to the components.
//      runCrawlOnce holds the crawl lock for the whole pass.

import { randomBytes } from 'crypto';
import { constants } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type { PipelineConfig } from './config/env.js';
import baseLogger, { type Logger } from './logging.js';
import { SetupError, errorMessage } from './errors.js';
import { CalibreCatalog, type Catalog } from './services/catalog.js';
import { Crawler, type CrawlSummary } from './services/crawler.js';
import { Ingestor, type IngestCycleSummary, type Sleep } from './services/ingestor.js';
import { DedupTracker, type LedgerStats } from './services/ledger.js';
import { acquireCrawlLock } from './services/lock.js';
import { Transfer } from './services/transfer.js';

export interface PipelineDeps {
  logger?: Logger;
  // Defaults to CalibreCatalog built from the config.
  catalog?: Catalog;
  sleep?: Sleep;
  now?: () => Date;
}

export interface CrawlReport {
  correlationId: string;
  summary: CrawlSummary;
  stats: LedgerStats;
}

// Helper to create correlation IDs for crawl passes
export function newCorrelationId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, '');
  const rand = randomBytes(4).toString('hex');
  return `${ts}-${rand}`;
}

export function lockPathFor(config: PipelineConfig): string {
  return path.join(path.dirname(config.ledgerFile), 'crawl.lock');
}

async function ensureDir(dir: string, label: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.access(dir, constants.W_OK);
  } catch (err) {
    throw new SetupError(`${label} ${dir} is not writable: ${errorMessage(err)}`, { path: dir, cause: err });
  }
}

async function assertDirectory(dir: string, label: string): Promise<void> {
  try {
    const st = await fs.stat(dir);
    if (st.isDirectory()) return;
  } catch (err) {
    throw new SetupError(`${label} does not exist: ${dir}`, { path: dir, cause: err });
  }
  throw new SetupError(`${label} is not a directory: ${dir}`, { path: dir });
}

export function createCatalog(config: PipelineConfig, logger: Logger = baseLogger): Catalog {
  return new CalibreCatalog(
    {
      libraryPath: config.catalogLibrary,
      calibredbBin: config.calibredbBin,
      calibredbArgs: config.calibredbArgs,
      timeoutMs: config.catalogTimeoutMs,
    },
    logger,
  );
}

export function createIngestor(config: PipelineConfig, deps: PipelineDeps = {}): Ingestor {
  const logger = deps.logger ?? baseLogger;
  return new Ingestor(
    deps.catalog ?? createCatalog(config, logger),
    {
      stagingDir: config.stagingDir,
      ingestFormats: config.ingestFormats,
      batchSize: config.batchSize,
      batchPauseMs: config.batchPauseMs,
      intervalMs: config.intervalMs,
      sleep: deps.sleep,
    },
    logger,
  );
}

/**
 * One crawl pass: discover, back up, stage and record every new book under the source root.
 * Aborting the signal ends the pass after the current file and releases the lock.
 */
export async function runCrawlOnce(
  config: PipelineConfig,
  signal?: AbortSignal,
  deps: PipelineDeps = {},
): Promise<CrawlReport> {
  const correlationId = newCorrelationId();
  const logger = (deps.logger ?? baseLogger).child({ correlationId });

  await assertDirectory(config.sourceRoot, 'Books directory');
  await ensureDir(config.stagingDir, 'Staging directory');
  if (config.transferMode === 'backup') {
    await ensureDir(config.backupRoot, 'Backup directory');
  }

  const lock = await acquireCrawlLock(lockPathFor(config));
  try {
    const tracker = new DedupTracker(config.ledgerFile, logger);
    await tracker.open();

    const transfer = new Transfer(
      {
        sourceRoot: config.sourceRoot,
        backupRoot: config.backupRoot,
        stagingDir: config.stagingDir,
        mode: config.transferMode,
      },
      logger,
    );
    const crawler = new Crawler(
      tracker,
      transfer,
      {
        bookFormats: config.bookFormats,
        excludeDirs: [config.backupRoot, config.stagingDir],
        now: deps.now,
      },
      logger,
    );

    const summary = await crawler.crawl(config.sourceRoot, signal);
    const stats = tracker.stats();
    logger.info({ stats }, 'Processing statistics');
    if (stats.duplicateNameEntries > 0) {
      logger.info('Duplicate entries indicate content that was moved/renamed after it was processed');
    }
    return { correlationId, summary, stats };
  } finally {
    await lock.release();
  }
}

/**
 * Single ingest cycle, for `ingest --once` and for tests.
 */
export async function runIngestOnce(config: PipelineConfig, deps: PipelineDeps = {}): Promise<IngestCycleSummary> {
  const ingestor = createIngestor(config, deps);
  await ingestor.verifySetup();
  return ingestor.runCycle();
}

/**
 * Continuous ingest loop; returns once the signal aborts.
 */
export async function runIngestLoop(
  config: PipelineConfig,
  signal?: AbortSignal,
  deps: PipelineDeps = {},
): Promise<void> {
  const ingestor = createIngestor(config, deps);
  await ingestor.verifySetup();
  await ingestor.run(signal);
}

export async function showStats(config: PipelineConfig, deps: PipelineDeps = {}): Promise<LedgerStats> {
  const tracker = new DedupTracker(config.ledgerFile, deps.logger ?? baseLogger);
  await tracker.open();
  return tracker.stats();
}

export type { CrawlSummary, IngestCycleSummary, LedgerStats };
