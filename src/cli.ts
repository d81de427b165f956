#!/usr/bin/env node
// src/cli.ts
// What: Command line entrypoint for supervisors and operators.
// How: commander subcommands over the pipeline entry points. Configuration comes from the environment
//      (and .env). Exit code 0 on success, 1 on a setup error or anything else that escapes.

import { Command } from 'commander';
import { loadConfig } from './config/env.js';
import logger from './logging.js';
import { PipelineError } from './errors.js';
import { runCrawlOnce, runIngestLoop, runIngestOnce, showStats } from './pipeline.js';

const program = new Command();

// The returned signal aborts on SIGINT/SIGTERM.
function abortOnSignals(what: string): AbortSignal {
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, `Stopping ${what}`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return controller.signal;
}

program
  .name('book-intake')
  .description('Discover new books, back them up, stage them and feed them to the Calibre library');

program
  .command('crawl')
  .alias('sync-now')
  .description('Crawl the books directory once and stage every new file')
  .action(async () => {
    const report = await runCrawlOnce(loadConfig(), abortOnSignals('crawl'));
    logger.info({ correlationId: report.correlationId, ...report.summary }, 'Crawl finished');
  });

program
  .command('ingest')
  .description('Feed staged files to the catalog in batches, forever')
  .option('--once', 'run a single cycle and exit')
  .action(async (opts: { once?: boolean }) => {
    const config = loadConfig();
    if (opts.once) {
      const summary = await runIngestOnce(config);
      logger.info({ summary }, 'Ingest cycle finished');
      return;
    }
    await runIngestLoop(config, abortOnSignals('ingest loop'));
  });

program
  .command('stats')
  .description('Show ledger statistics')
  .action(async () => {
    const stats = await showStats(loadConfig());
    logger.info(stats, 'Processing statistics');
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const code = err instanceof PipelineError ? err.code : undefined;
  logger.fatal({ err, code }, 'book-intake failed');
  process.exitCode = 1;
});
