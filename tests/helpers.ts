import { createHash } from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { PipelineConfig } from '../src/config/env.js';
import { CatalogAddFailure } from '../src/errors.js';
import type { Catalog } from '../src/services/catalog.js';
import { DEFAULT_BOOK_FORMATS, toFormatSet } from '../src/services/classifier.js';

export interface Tree {
  root: string;
  source: string;
  backup: string;
  staging: string;
  ledger: string;
  library: string;
}

export async function makeTree(): Promise<Tree> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'book-intake-'));
  const tree: Tree = {
    root,
    source: path.join(root, 'books'),
    backup: path.join(root, 'backup'),
    staging: path.join(root, 'upload'),
    ledger: path.join(root, 'state', 'processed_files.txt'),
    library: path.join(root, 'library'),
  };
  await fs.mkdir(tree.source, { recursive: true });
  await fs.mkdir(tree.staging, { recursive: true });
  await fs.mkdir(tree.library, { recursive: true });
  await fs.writeFile(path.join(tree.library, 'metadata.db'), '');
  return tree;
}

export function sha256Hex(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export async function removeTree(tree: Tree): Promise<void> {
  await fs.rm(tree.root, { recursive: true, force: true });
}

export function testConfig(tree: Tree, overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    sourceRoot: tree.source,
    backupRoot: tree.backup,
    stagingDir: tree.staging,
    ledgerFile: tree.ledger,
    catalogLibrary: tree.library,
    calibredbBin: 'calibredb',
    calibredbArgs: [],
    transferMode: 'backup',
    bookFormats: toFormatSet(DEFAULT_BOOK_FORMATS),
    ingestFormats: toFormatSet(DEFAULT_BOOK_FORMATS),
    batchSize: 10,
    batchPauseMs: 5_000,
    intervalMs: 60_000,
    catalogTimeoutMs: 1_000,
    ...overrides,
  };
}

export async function writeAt(file: string, content: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content);
}

export async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

export async function listDir(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort();
}

/**
 * In-memory catalog. Added files show up in later listFormats() calls under a library-style path.
 */
export class FakeCatalog implements Catalog {
  formats: string[];
  added: string[] = [];
  failOn = new Set<string>();
  listCalls = 0;

  constructor(formats: string[] = []) {
    this.formats = [...formats];
  }

  async listFormats(): Promise<string[]> {
    this.listCalls += 1;
    return [...this.formats];
  }

  async add(filePath: string): Promise<void> {
    const name = path.basename(filePath);
    if (this.failOn.has(name)) {
      throw new CatalogAddFailure(filePath, `calibredb add exited with code 1`, 'add failed');
    }
    this.added.push(filePath);
    this.formats.push(`/library/Unknown/${name}`);
  }

  async verifyLibrary(): Promise<void> {}
}
