// src/services/crawler.ts
// What: Filesystem crawler that discovers new books, stages them and records their content hash.
// How: Recursively walks the source root (sorted, sequential). Each regular file goes through
//      classify → hash → ledger lookup → transfer → ledger append. Per-file failures are logged and
//      counted; only a missing source root aborts the pass. The backup root and staging directory are
//      skipped when they live inside the source tree, as are Calibre's own folders.

import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import baseLogger, { type Logger } from '../logging.js';
import { PipelineError, SetupError, errnoCode, errorMessage } from '../errors.js';
import {
  CATALOG_BOOK_MARKER,
  extensionOf,
  isCatalogArtifact,
  isCatalogInternalDir,
  isSupportedBook,
} from './classifier.js';
import { hashFile } from './hashing.js';
import type { DedupTracker } from './ledger.js';
import type { Transfer } from './transfer.js';

export interface CandidateFile {
  path: string;
  filename: string;
  extension: string;
  contentHash?: string;
}

export interface CrawlSummary {
  found: number;
  processed: number;
  skippedDuplicate: number;
  skippedInvalid: number;
  skippedUnreadable: number;
  failed: number;
  durationMs: number;
}

export interface CrawlerOptions {
  bookFormats: ReadonlySet<string>;
  // Directories never descended into (backup root, staging directory).
  excludeDirs?: readonly string[];
  now?: () => Date;
}

export class Crawler {
  private readonly tracker: DedupTracker;
  private readonly transfer: Transfer;
  private readonly formats: ReadonlySet<string>;
  private readonly excluded: Set<string>;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(tracker: DedupTracker, transfer: Transfer, opts: CrawlerOptions, logger: Logger = baseLogger) {
    this.tracker = tracker;
    this.transfer = transfer;
    this.formats = opts.bookFormats;
    this.excluded = new Set((opts.excludeDirs ?? []).map((d) => path.resolve(d)));
    this.now = opts.now ?? (() => new Date());
    this.log = logger.child({ component: 'crawler' });
  }

  /**
   * One pass over sourceRoot. An aborted signal stops the pass between files; the summary covers
   * what was handled so far.
   */
  async crawl(sourceRoot: string, signal?: AbortSignal): Promise<CrawlSummary> {
    const start = Date.now();
    const root = path.resolve(sourceRoot);
    try {
      const st = await fs.stat(root);
      if (!st.isDirectory()) throw new Error('not a directory');
    } catch (err) {
      throw new SetupError(`Books directory does not exist: ${root} (${errorMessage(err)})`, { path: root, cause: err });
    }

    this.log.info({ sourceRoot: root }, 'Crawling books directory');
    const summary: CrawlSummary = {
      found: 0,
      processed: 0,
      skippedDuplicate: 0,
      skippedInvalid: 0,
      skippedUnreadable: 0,
      failed: 0,
      durationMs: 0,
    };

    for await (const filePath of this.walk(root)) {
      if (signal?.aborted) {
        this.log.warn('Crawl interrupted');
        break;
      }
      const filename = path.basename(filePath);
      if (isCatalogArtifact(filename)) continue;
      summary.found += 1;
      await this.handle({ path: filePath, filename, extension: extensionOf(filename) }, summary);
    }

    summary.durationMs = Date.now() - start;
    this.log.info({ summary }, 'Crawl summary');
    return summary;
  }

  private async handle(file: CandidateFile, summary: CrawlSummary): Promise<void> {
    if (!isSupportedBook(file.filename, this.formats)) {
      this.log.warn({ file: file.path }, 'Skipping unsupported format');
      summary.skippedInvalid += 1;
      return;
    }

    let contentHash: string;
    try {
      contentHash = await hashFile(file.path);
    } catch (err) {
      this.log.warn({ err, file: file.path }, 'Could not calculate hash; leaving file in place');
      summary.skippedUnreadable += 1;
      return;
    }

    file.contentHash = contentHash;

    if (this.tracker.isProcessed(contentHash)) {
      this.log.debug({ file: file.path }, 'Already processed');
      summary.skippedDuplicate += 1;
      return;
    }

    try {
      await this.transfer.transfer(file.path);
      await this.tracker.recordProcessed(contentHash, file.filename, file.path, this.now());
      summary.processed += 1;
    } catch (err) {
      const code = err instanceof PipelineError ? err.code : undefined;
      this.log.error({ err, code, file: file.path }, 'Failed to process');
      summary.failed += 1;
    }
  }

  /**
   * Yields regular files under dir in name order. Unreadable directories are logged and skipped.
   */
  private async *walk(dir: string): AsyncGenerator<string> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        this.log.warn({ err, dir }, 'Cannot read directory');
      }
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    // A folder holding metadata.opf belongs to a Calibre library.
    if (entries.some((e) => e.isFile() && e.name === CATALOG_BOOK_MARKER)) {
      this.log.debug({ dir }, 'Skipping catalog book folder');
      return;
    }

    for (const e of entries) {
      const full = path.join(dir, e.name);
      if (e.isDirectory()) {
        if (this.excluded.has(full) || isCatalogInternalDir(e.name)) continue;
        yield* this.walk(full);
      } else if (e.isFile()) {
        yield full;
      }
    }
  }
}
