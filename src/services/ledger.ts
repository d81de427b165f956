// src/services/ledger.ts
// What: Dedup tracker backed by an append-only, line-oriented ledger file.
// How: Each processed content hash is appended as `hash:filename:timestamp:path`. On open the whole file
//      is read once to build an in-memory hash set; lookups hit the set, writes append to the file and
//      then to the set. Lines are never rewritten or removed: deleting one makes that content new again.

import fs from 'fs/promises';
import path from 'path';
import baseLogger, { type Logger } from '../logging.js';
import { HashUnavailable, SetupError, errorMessage } from '../errors.js';

export interface TrackedRecord {
  contentHash: string;
  originalFilename: string;
  processedAt: string; // YYYY-MM-DD HH:MM:SS, local time
  originalPath: string;
}

export interface LedgerStats {
  totalRecords: number;
  uniqueHashes: number;
  // Same content discovered again under another name/path; diagnostic only.
  duplicateNameEntries: number;
}

const LINE_RE = /^([0-9a-f]{64}):(.*?):(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}):(.*)$/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

// A record must stay on one line.
function oneLine(value: string): string {
  return value.replace(/[\r\n]/g, '_');
}

export function formatLedgerLine(r: TrackedRecord): string {
  return `${r.contentHash}:${oneLine(r.originalFilename)}:${r.processedAt}:${oneLine(r.originalPath)}\n`;
}

export function parseLedgerLine(line: string): TrackedRecord | null {
  const m = LINE_RE.exec(line);
  if (!m) return null;
  return { contentHash: m[1], originalFilename: m[2], processedAt: m[3], originalPath: m[4] };
}

export class DedupTracker {
  private readonly ledgerFile: string;
  private readonly log: Logger;
  private readonly hashes = new Set<string>();
  private entries: TrackedRecord[] = [];
  private opened = false;

  constructor(ledgerFile: string, logger: Logger = baseLogger) {
    this.ledgerFile = ledgerFile;
    this.log = logger.child({ component: 'ledger' });
  }

  get file(): string {
    return this.ledgerFile;
  }

  /**
   * Create the ledger (and its directory) when missing, then load every record.
   * Safe to call more than once; later calls re-read the file.
   */
  async open(): Promise<void> {
    const dir = path.dirname(this.ledgerFile);
    try {
      await fs.mkdir(dir, { recursive: true });
      // 'a' creates the file without truncating an existing one
      const handle = await fs.open(this.ledgerFile, 'a');
      await handle.close();
    } catch (err) {
      throw new SetupError(`Cannot create ledger ${this.ledgerFile}: ${errorMessage(err)}`, {
        path: this.ledgerFile,
        cause: err,
      });
    }

    const text = await fs.readFile(this.ledgerFile, 'utf8');
    const entries: TrackedRecord[] = [];
    let malformed = 0;
    for (const line of text.split('\n')) {
      if (line.trim() === '') continue;
      const rec = parseLedgerLine(line);
      if (rec) {
        entries.push(rec);
      } else {
        malformed += 1;
      }
    }
    if (malformed > 0) {
      this.log.warn({ ledger: this.ledgerFile, malformed }, 'Ignoring malformed ledger lines');
    }

    this.entries = entries;
    this.hashes.clear();
    for (const e of entries) this.hashes.add(e.contentHash);
    this.opened = true;
    this.log.debug({ ledger: this.ledgerFile, records: entries.length }, 'Ledger loaded');
  }

  isProcessed(contentHash: string): boolean {
    this.assertOpen();
    return this.hashes.has(contentHash);
  }

  async recordProcessed(
    contentHash: string,
    filename: string,
    originalPath: string,
    timestamp: Date = new Date(),
  ): Promise<TrackedRecord> {
    this.assertOpen();
    if (!contentHash) {
      throw new HashUnavailable(originalPath, `Refusing to record ${filename} without a content hash`);
    }
    const record: TrackedRecord = {
      contentHash,
      originalFilename: filename,
      processedAt: formatTimestamp(timestamp),
      originalPath,
    };
    await fs.appendFile(this.ledgerFile, formatLedgerLine(record), 'utf8');
    this.entries.push(record);
    this.hashes.add(contentHash);
    this.log.info({ filename, hash: contentHash.slice(0, 8) }, 'Marked as processed');
    return record;
  }

  records(): readonly TrackedRecord[] {
    this.assertOpen();
    return this.entries;
  }

  stats(): LedgerStats {
    this.assertOpen();
    const totalRecords = this.entries.length;
    const uniqueHashes = this.hashes.size;
    return { totalRecords, uniqueHashes, duplicateNameEntries: totalRecords - uniqueHashes };
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new Error(`Ledger ${this.ledgerFile} used before open()`);
    }
  }
}
