import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { toFormatSet, DEFAULT_BOOK_FORMATS } from '../src/services/classifier.js';
import { Ingestor, type IngestorOptions } from '../src/services/ingestor.js';
import { FakeCatalog, exists, listDir, makeTree, removeTree, writeAt, type Tree } from './helpers.js';

let tree: Tree;

beforeEach(async () => {
  tree = await makeTree();
});

afterEach(async () => {
  await removeTree(tree);
});

function newIngestor(catalog: FakeCatalog, overrides: Partial<IngestorOptions> = {}): Ingestor {
  return new Ingestor(catalog, {
    stagingDir: tree.staging,
    ingestFormats: toFormatSet(DEFAULT_BOOK_FORMATS),
    batchSize: 10,
    batchPauseMs: 5_000,
    intervalMs: 60_000,
    sleep: async () => {},
    ...overrides,
  });
}

async function stage(name: string, content = name): Promise<void> {
  await writeAt(path.join(tree.staging, name), content);
}

describe('Ingestor.runCycle', () => {
  it('does not query the catalog when staging is empty', async () => {
    const catalog = new FakeCatalog();
    const summary = await newIngestor(catalog).runCycle();
    expect(summary).toEqual({
      scanned: 0,
      added: 0,
      skippedDuplicate: 0,
      rejected: 0,
      failed: 0,
      cleanupFailed: 0,
      pauses: 0,
    });
    expect(catalog.listCalls).toBe(0);
  });

  it('deletes a staged file the catalog already lists, without adding it', async () => {
    await stage('x.epub');
    const catalog = new FakeCatalog(['/library/Some Author/Some Title (3)/x.epub']);

    const summary = await newIngestor(catalog).runCycle();

    expect(summary).toMatchObject({ scanned: 1, added: 0, skippedDuplicate: 1 });
    expect(catalog.added).toEqual([]);
    expect(await listDir(tree.staging)).toEqual([]);
  });

  it('adds a new file, removes the staged link and keeps the backup', async () => {
    const backupPath = path.join(tree.backup, 'papers', 'y.pdf');
    await writeAt(backupPath, 'pdf bytes');
    await fs.link(backupPath, path.join(tree.staging, 'y.pdf'));
    const catalog = new FakeCatalog();

    const summary = await newIngestor(catalog).runCycle();

    expect(summary).toMatchObject({ scanned: 1, added: 1, failed: 0 });
    expect(catalog.added).toEqual([path.join(tree.staging, 'y.pdf')]);
    expect(await listDir(tree.staging)).toEqual([]);
    expect(await fs.readFile(backupPath, 'utf8')).toBe('pdf bytes');
  });

  it('keeps files whose add failed and retries them next cycle', async () => {
    await stage('bad.epub');
    await stage('good.epub');
    const catalog = new FakeCatalog();
    catalog.failOn.add('bad.epub');
    const ingestor = newIngestor(catalog);

    const first = await ingestor.runCycle();
    expect(first).toMatchObject({ scanned: 2, added: 1, failed: 1 });
    expect(await listDir(tree.staging)).toEqual(['bad.epub']);

    catalog.failOn.clear();
    const second = await ingestor.runCycle();
    expect(second).toMatchObject({ scanned: 1, added: 1, failed: 0 });
    expect(await listDir(tree.staging)).toEqual([]);
  });

  it('removes formats the ingestor does not accept', async () => {
    await stage('a.epub');
    await stage('b.pdf');
    const catalog = new FakeCatalog();

    const summary = await newIngestor(catalog, { ingestFormats: toFormatSet(['pdf']) }).runCycle();

    expect(summary).toMatchObject({ scanned: 2, added: 1, rejected: 1 });
    expect(catalog.added).toEqual([path.join(tree.staging, 'b.pdf')]);
    expect(await listDir(tree.staging)).toEqual([]);
  });

  it('handles staged files in name order and ignores subdirectories', async () => {
    await stage('c.epub');
    await stage('a.epub');
    await stage('b.epub');
    await fs.mkdir(path.join(tree.staging, 'partial'));
    const catalog = new FakeCatalog();

    await newIngestor(catalog).runCycle();

    expect(catalog.added.map((p) => path.basename(p))).toEqual(['a.epub', 'b.epub', 'c.epub']);
    expect(await exists(path.join(tree.staging, 'partial'))).toBe(true);
  });

  it('pauses after every batch of ten', async () => {
    for (let i = 1; i <= 25; i++) {
      await stage(`book-${String(i).padStart(2, '0')}.epub`);
    }
    const catalog = new FakeCatalog();
    const addsAtPause: number[] = [];
    const pauseLengths: number[] = [];
    const ingestor = newIngestor(catalog, {
      sleep: async (ms) => {
        addsAtPause.push(catalog.added.length);
        pauseLengths.push(ms);
      },
    });

    const summary = await ingestor.runCycle();

    expect(summary).toMatchObject({ scanned: 25, added: 25, pauses: 2 });
    expect(addsAtPause).toEqual([10, 20]);
    expect(pauseLengths).toEqual([5_000, 5_000]);
    expect(await listDir(tree.staging)).toEqual([]);
  });

  it('does not pause after the last file of a cycle', async () => {
    for (let i = 1; i <= 10; i++) {
      await stage(`book-${String(i).padStart(2, '0')}.epub`);
    }
    const catalog = new FakeCatalog();
    let sleeps = 0;
    const ingestor = newIngestor(catalog, {
      sleep: async () => {
        sleeps += 1;
      },
    });

    const summary = await ingestor.runCycle();

    expect(summary).toMatchObject({ scanned: 10, added: 10, pauses: 0 });
    expect(sleeps).toBe(0);
  });

  it('pauses once when an eleventh file follows a full batch', async () => {
    for (let i = 1; i <= 11; i++) {
      await stage(`book-${String(i).padStart(2, '0')}.epub`);
    }
    const catalog = new FakeCatalog();
    const addsAtPause: number[] = [];
    const ingestor = newIngestor(catalog, {
      sleep: async () => {
        addsAtPause.push(catalog.added.length);
      },
    });

    const summary = await ingestor.runCycle();

    expect(summary).toMatchObject({ scanned: 11, added: 11, pauses: 1 });
    expect(addsAtPause).toEqual([10]);
  });

  it('reports a staged file it could not delete after adding, and never adds it again', async () => {
    await stage('z.epub');
    const catalog = new FakeCatalog();
    const addedPaths: string[] = [];
    // The catalog stores the book under a new name; the staged entry becomes undeletable (a directory).
    catalog.add = async (filePath: string) => {
      addedPaths.push(filePath);
      await fs.rm(filePath);
      await fs.mkdir(filePath);
    };
    const ingestor = newIngestor(catalog);

    const first = await ingestor.runCycle();
    expect(first).toMatchObject({ scanned: 1, added: 1, failed: 0, cleanupFailed: 1 });

    await fs.rmdir(path.join(tree.staging, 'z.epub'));
    await stage('z.epub');

    const second = await ingestor.runCycle();
    expect(second).toMatchObject({ scanned: 1, added: 0, skippedDuplicate: 1, cleanupFailed: 0 });
    expect(addedPaths).toEqual([path.join(tree.staging, 'z.epub')]);
    expect(await listDir(tree.staging)).toEqual([]);
  });
});

describe('Ingestor.run', () => {
  it('sleeps the interval between cycles and stops when aborted', async () => {
    await stage('one.epub');
    const catalog = new FakeCatalog();
    const controller = new AbortController();
    const sleeps: number[] = [];
    const ingestor = newIngestor(catalog, {
      sleep: async (ms) => {
        sleeps.push(ms);
        if (sleeps.length === 2) controller.abort();
      },
    });

    await ingestor.run(controller.signal);

    expect(sleeps).toEqual([60_000, 60_000]);
    expect(catalog.added.map((p) => path.basename(p))).toEqual(['one.epub']);
    expect(catalog.listCalls).toBe(1);
  });

  it('keeps looping after a failed cycle', async () => {
    await stage('one.epub');
    const catalog = new FakeCatalog();
    let listAttempts = 0;
    catalog.listFormats = async () => {
      listAttempts += 1;
      if (listAttempts === 1) throw new Error('calibredb list exited with code 1');
      return [];
    };
    const controller = new AbortController();
    const ingestor = newIngestor(catalog, {
      sleep: async () => {
        if (listAttempts === 2) controller.abort();
      },
    });

    await ingestor.run(controller.signal);

    expect(listAttempts).toBe(2);
    expect(catalog.added.map((p) => path.basename(p))).toEqual(['one.epub']);
  });
});

describe('Ingestor.verifySetup', () => {
  it('creates a missing staging directory', async () => {
    const stagingDir = path.join(tree.root, 'fresh-upload');
    await newIngestor(new FakeCatalog(), { stagingDir }).verifySetup();
    expect(await exists(stagingDir)).toBe(true);
  });
});
