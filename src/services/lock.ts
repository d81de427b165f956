// src/services/lock.ts
// What: Exclusive lock file serializing crawl passes (the ledger has a single writer).
// How: Creates the lock with O_EXCL ('wx') and writes the holder's pid and start time into it.
//      A lock whose pid no longer runs is stale: it is removed and acquisition retried once.

import fs from 'fs/promises';
import path from 'path';
import baseLogger from '../logging.js';
import { SetupError, errnoCode, errorMessage } from '../errors.js';

const log = baseLogger.child({ component: 'lock' });

export interface CrawlLock {
  path: string;
  release(): Promise<void>;
}

export function isPidAlive(pid: number): boolean {
  try {
    // Signal 0 checks for existence without killing
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(err) !== 'ESRCH';
  }
}

/** Pid written at the start of a lock file, or undefined when the content is not one. */
export function parseLockHolder(content: string): number | undefined {
  const match = /^(\d+)(\s|$)/.exec(content.trim());
  if (!match) return undefined;
  const pid = Number(match[1]);
  return Number.isSafeInteger(pid) && pid > 0 ? pid : undefined;
}

async function readHolder(lockPath: string): Promise<string | undefined> {
  try {
    return (await fs.readFile(lockPath, 'utf8')).trim();
  } catch (err) {
    // Released between our create attempt and this read.
    if (errnoCode(err) === 'ENOENT') return undefined;
    throw err;
  }
}

export async function acquireCrawlLock(lockPath: string, retryStale = true): Promise<CrawlLock> {
  try {
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, `${process.pid} ${new Date().toISOString()}\n`, { flag: 'wx' });
  } catch (err) {
    if (errnoCode(err) !== 'EEXIST') {
      throw new SetupError(`Cannot create lock ${lockPath}: ${errorMessage(err)}`, { path: lockPath, cause: err });
    }
    const holder = await readHolder(lockPath).catch((readErr: unknown) => {
      throw new SetupError(`Cannot read lock ${lockPath}: ${errorMessage(readErr)}`, { path: lockPath, cause: readErr });
    });
    const pid = holder === undefined ? undefined : parseLockHolder(holder);
    if (retryStale && (holder === undefined || (pid !== undefined && !isPidAlive(pid)))) {
      if (pid !== undefined) log.warn({ lockPath, pid }, 'Removing stale crawl lock');
      await fs.rm(lockPath, { force: true });
      return acquireCrawlLock(lockPath, false);
    }
    throw new SetupError(`Another crawl holds ${lockPath} (${holder || 'unknown'})`, { path: lockPath });
  }

  let released = false;
  return {
    path: lockPath,
    async release() {
      if (released) return;
      released = true;
      await fs.rm(lockPath, { force: true });
    },
  };
}
