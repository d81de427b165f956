/**
 * src/services/catalog.ts
 * What: Seam around the external book catalog, plus the Calibre implementation.
 * How: The ingestor only needs two capabilities: the list of format files already in the library and
 *      "add this file, duplicates allowed". CalibreCatalog spawns `calibredb` for both, enforces a timeout
 *      and a max stdout size, validates the `--for-machine` JSON with zod, and throws typed errors that
 *      carry a stderr excerpt. Tests substitute an in-memory Catalog.
 */

import { spawn } from 'child_process';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import baseLogger, { type Logger } from '../logging.js';
import { CatalogAddFailure, CatalogListFailure, SetupError, errorMessage } from '../errors.js';

export interface Catalog {
  /** Paths of every format file the library holds. */
  listFormats(): Promise<string[]>;
  /** Adds one file with duplicates permitted. Rejects with CatalogAddFailure. */
  add(filePath: string): Promise<void>;
  /** Throws SetupError when the library cannot be used. */
  verifyLibrary(): Promise<void>;
}

/**
 * Duplicate-by-name check used before adding: any listed format file with exactly this name.
 */
export function hasFormat(filename: string, formats: readonly string[]): boolean {
  return formats.some((f) => path.basename(f) === filename);
}

const listSchema = z.array(
  z
    .object({
      id: z.number(),
      formats: z.array(z.string()).optional().default([]),
    })
    .passthrough(),
);

export interface CalibreCatalogOptions {
  libraryPath: string;
  calibredbBin: string;
  // Leading arguments when calibredb is reached through a wrapper (e.g. `docker exec calibre calibredb`).
  calibredbArgs?: string[];
  timeoutMs?: number; // default 300_000
  maxBytes?: number; // default 64MB, list output of large libraries
}

interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export class CalibreCatalog implements Catalog {
  private readonly opts: Required<CalibreCatalogOptions>;
  private readonly log: Logger;

  constructor(opts: CalibreCatalogOptions, logger: Logger = baseLogger) {
    this.opts = {
      ...opts,
      calibredbArgs: opts.calibredbArgs ?? [],
      timeoutMs: opts.timeoutMs ?? 300_000,
      maxBytes: opts.maxBytes ?? 64 * 1024 * 1024,
    };
    this.log = logger.child({ component: 'catalog' });
  }

  async verifyLibrary(): Promise<void> {
    const lib = this.opts.libraryPath;
    try {
      const st = await fs.stat(lib);
      if (!st.isDirectory()) throw new Error('not a directory');
    } catch (err) {
      throw new SetupError(`Calibre library directory ${lib} does not exist`, { path: lib, cause: err });
    }
    try {
      await fs.access(path.join(lib, 'metadata.db'));
    } catch (err) {
      throw new SetupError(`Calibre metadata.db not found in ${lib}`, { path: lib, cause: err });
    }
  }

  async listFormats(): Promise<string[]> {
    let result: CommandResult;
    try {
      result = await this.run([
        'list',
        `--library-path=${this.opts.libraryPath}`,
        '--fields=formats',
        '--for-machine',
      ]);
    } catch (err) {
      throw new CatalogListFailure(`calibredb list failed: ${errorMessage(err)}`, undefined, err);
    }
    if (result.code !== 0) {
      throw new CatalogListFailure(`calibredb list exited with code ${result.code}`, result.stderr.slice(0, 2000));
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch (err) {
      throw new CatalogListFailure(`calibredb list returned invalid JSON: ${errorMessage(err)}`, undefined, err);
    }
    const parsed = listSchema.safeParse(json);
    if (!parsed.success) {
      throw new CatalogListFailure(`Unexpected calibredb list output: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data.flatMap((entry) => entry.formats);
  }

  async add(filePath: string): Promise<void> {
    let result: CommandResult;
    try {
      result = await this.run(['add', filePath, `--library-path=${this.opts.libraryPath}`, '--duplicates']);
    } catch (err) {
      throw new CatalogAddFailure(filePath, `calibredb add failed: ${errorMessage(err)}`, undefined, err);
    }
    if (result.code !== 0) {
      throw new CatalogAddFailure(
        filePath,
        `calibredb add exited with code ${result.code}`,
        result.stderr.slice(0, 2000),
      );
    }
    this.log.debug({ filePath }, 'calibredb add succeeded');
  }

  private run(args: string[]): Promise<CommandResult> {
    const { calibredbBin, calibredbArgs, timeoutMs, maxBytes } = this.opts;
    return new Promise((resolve, reject) => {
      const proc = spawn(calibredbBin, [...calibredbArgs, ...args], { stdio: ['ignore', 'pipe', 'pipe'] });

      let settled = false;
      let stdoutBytes = 0;
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(err);
      };

      const timer = setTimeout(() => {
        proc.kill('SIGKILL');
        fail(new Error(`${calibredbBin} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      proc.stdout.on('data', (chunk: Buffer) => {
        stdoutBytes += chunk.length;
        if (stdoutBytes > maxBytes) {
          proc.kill('SIGKILL');
          fail(new Error(`${calibredbBin} output exceeded ${maxBytes} bytes`));
          return;
        }
        stdoutChunks.push(chunk);
      });

      proc.stderr.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk);
      });

      proc.on('error', (err) => {
        fail(new Error(`Failed to spawn ${calibredbBin}: ${err.message}`));
      });

      proc.on('close', (code) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({
          code,
          stdout: Buffer.concat(stdoutChunks).toString('utf8'),
          stderr: Buffer.concat(stderrChunks).toString('utf8'),
        });
      });
    });
  }
}
