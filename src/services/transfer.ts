// src/services/transfer.ts
// What: Moves an original into the backup tree and exposes it to the ingestor through a hardlink.
// How: backup mode renames source → backupRoot/<relative path>, then links the backup copy into the flat
//      staging directory under its original filename. The staged entry and the backup share one inode,
//      so the ingestor deleting its entry never touches the backup. link mode skips the move and links
//      the source itself. If linking fails after the move, the file is renamed back to the source.
//      Source root, backup root and staging must share one filesystem: rename and link fail with EXDEV.

import fs from 'fs/promises';
import path from 'path';
import baseLogger, { type Logger } from '../logging.js';
import type { TransferMode } from '../config/env.js';
import { BackupWriteError, LinkConflict, errnoCode, errorMessage } from '../errors.js';

export interface StagedFile {
  path: string; // entry in the staging directory
  backupPath: string; // the inode's other name: backup copy, or the source in link mode
  filename: string;
}

export interface TransferOptions {
  sourceRoot: string;
  backupRoot: string;
  stagingDir: string;
  mode: TransferMode;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return false;
    throw err;
  }
}

export class Transfer {
  private readonly opts: TransferOptions;
  private readonly log: Logger;

  constructor(opts: TransferOptions, logger: Logger = baseLogger) {
    this.opts = opts;
    this.log = logger.child({ component: 'transfer' });
  }

  /** Backup location for a source path, mirroring its position under the source root. */
  backupPathFor(sourcePath: string): string {
    const relative = path.relative(this.opts.sourceRoot, sourcePath);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new BackupWriteError(sourcePath, `${sourcePath} is not inside ${this.opts.sourceRoot}`);
    }
    return path.join(this.opts.backupRoot, relative);
  }

  async transfer(sourcePath: string): Promise<StagedFile> {
    const filename = path.basename(sourcePath);
    const stagedPath = path.join(this.opts.stagingDir, filename);

    // Checked up front so a conflict leaves the original at the source.
    if (await exists(stagedPath)) {
      throw new LinkConflict(sourcePath, stagedPath);
    }

    if (this.opts.mode === 'link') {
      await this.link(sourcePath, stagedPath, sourcePath);
      this.log.info({ filename }, 'Created hardlink');
      return { path: stagedPath, backupPath: sourcePath, filename };
    }

    const backupPath = this.backupPathFor(sourcePath);
    await this.moveToBackup(sourcePath, backupPath);

    try {
      await this.link(backupPath, stagedPath, sourcePath);
    } catch (err) {
      await this.restore(backupPath, sourcePath);
      throw err;
    }
    this.log.info({ filename, backupPath }, 'Created hardlink from backup');
    return { path: stagedPath, backupPath, filename };
  }

  private async moveToBackup(sourcePath: string, backupPath: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(backupPath), { recursive: true });
    } catch (err) {
      throw new BackupWriteError(sourcePath, `Cannot create backup directory for ${sourcePath}: ${errorMessage(err)}`, err);
    }
    // Backups are append-only; rename() would silently replace an older original.
    if (await exists(backupPath)) {
      throw new BackupWriteError(sourcePath, `Backup already holds ${backupPath}`);
    }
    try {
      await fs.rename(sourcePath, backupPath);
    } catch (err) {
      if (errnoCode(err) === 'EXDEV') {
        throw new BackupWriteError(
          sourcePath,
          `Backup root ${this.opts.backupRoot} is on a different filesystem than ${sourcePath}; ` +
            'backup mode needs both on one filesystem (or use TRANSFER_MODE=link)',
          err,
        );
      }
      throw new BackupWriteError(sourcePath, `Failed to move ${sourcePath} to backup: ${errorMessage(err)}`, err);
    }
    this.log.debug({ sourcePath, backupPath }, 'Moved to backup');
  }

  private async link(target: string, stagedPath: string, sourcePath: string): Promise<void> {
    try {
      await fs.link(target, stagedPath);
    } catch (err) {
      if (errnoCode(err) === 'EEXIST') {
        throw new LinkConflict(sourcePath, stagedPath);
      }
      throw new BackupWriteError(sourcePath, `Failed to create hardlink for ${sourcePath}: ${errorMessage(err)}`, err);
    }
  }

  private async restore(backupPath: string, sourcePath: string): Promise<void> {
    try {
      await fs.rename(backupPath, sourcePath);
      this.log.warn({ sourcePath }, 'Link failed; original moved back from backup');
    } catch (err) {
      // The original is still intact in the backup tree, just no longer at the source.
      this.log.error({ err, backupPath, sourcePath }, 'Could not move original back from backup');
    }
  }
}
