#!/usr/bin/env node

/**
 * Command line entry point: one run, the HTTP trigger, or a metrics backfill
 */

import { Command } from 'commander';
import * as fs from 'node:fs';
import { createBackfillDependencies, createPipelineRunner, runBackfill } from './orchestrator';
import { initializeRuntime } from './runtime';
import { startServer } from './server';
import { describeError } from './utils/errors';

const SUMMARY_FILE = 'run-summary.json';

interface CommonOptions {
  config?: string;
  db?: string;
}

function fail(error: unknown): never {
  console.error(JSON.stringify({ level: 'ERROR', message: 'Fatal error', error: describeError(error) }));
  process.exit(1);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('channel-snapshot')
    .description('Daily snapshot of channel video metadata, counters and analytics')
    .version('1.0.0')
    .option('-c, --config <path>', 'pipeline.yaml to use instead of config/pipeline.yaml')
    .option('--db <path>', 'SQLite file, overrides SNAPSHOT_DB_PATH');

  program
    .command('run')
    .description('Run one snapshot and exit non-zero if the core tables were not written')
    .option('--run-id <id>', 'correlation id for every log line of this run')
    .option('--summary', `write the run summary to ${SUMMARY_FILE}`)
    .action(async (options: { runId?: string; summary?: boolean }) => {
      const common = program.opts<CommonOptions>();
      const runtime = await initializeRuntime({ pipelinePath: common.config, dbPath: common.db });
      try {
        const summary = await createPipelineRunner(runtime.context)(options.runId);
        if (options.summary) {
          fs.writeFileSync(SUMMARY_FILE, JSON.stringify(summary, null, 2));
        }
        process.exitCode = summary.status === 'DONE' ? 0 : 1;
      } finally {
        runtime.store.close();
      }
    });

  program
    .command('serve')
    .description('Start the HTTP trigger')
    .option('-p, --port <port>', 'port to listen on, overrides PORT')
    .action(async (options: { port?: string }) => {
      const common = program.opts<CommonOptions>();
      const runtime = await initializeRuntime({ pipelinePath: common.config, dbPath: common.db });
      const port = options.port ? Number.parseInt(options.port, 10) : runtime.appConfig.port;

      const server = startServer(
        { runPipeline: createPipelineRunner(runtime.context), logger: runtime.logger },
        port
      );

      const shutdown = () => {
        runtime.logger.info('Shutting down');
        server
          .close()
          .then(() => runtime.store.close())
          .then(() => process.exit(0), fail);
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    });

  program
    .command('backfill')
    .description('Rebuild the analytics tables for a range of days')
    .requiredOption('--start <date>', 'first day, YYYY-MM-DD')
    .requiredOption('--end <date>', 'last day, YYYY-MM-DD')
    .action(async (options: { start: string; end: string }) => {
      const common = program.opts<CommonOptions>();
      const runtime = await initializeRuntime({ pipelinePath: common.config, dbPath: common.db });
      try {
        const runId = `backfill-${options.start}-${options.end}`;
        const summary = await runBackfill(
          createBackfillDependencies(runtime.context, runId),
          options.start,
          options.end,
          runId
        );
        process.exitCode = summary.failed_days > 0 ? 1 : 0;
      } finally {
        runtime.store.close();
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram().parseAsync(process.argv).catch(fail);
}
