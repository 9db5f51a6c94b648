#!/usr/bin/env tsx

/**
 * Run one collector job
 * Usage:
 *   npm run job -- <job> [options]
 *   npm run job -- cap --dry-run --no-proxy
 */

import { JOBS, getJob } from '../src/jobs/index.js';
import { runJob, createJobContext, requiredKeys, type RunnerDeps } from '../src/services/job-runner.js';
import { GoogleSheetsClient } from '../src/providers/google-sheets.js';
import { TelegramNotifier } from '../src/providers/telegram.js';
import { loadConfig, requireConfig, requireValue, type AppConfig } from '../src/utils/config.js';
import { parseArgs } from '../src/utils/cli-args.js';
import { logger } from '../src/utils/logger.js';
import { describeError } from '../src/core/errors.js';
import { installGlobalErrorHandlers, resolveExitCode } from '../src/utils/error-handlers.js';
import type { Job } from '../src/types/job.js';

installGlobalErrorHandlers();

const log = logger.createContext('run-job');

function printUsage(): void {
  console.log('Usage:');
  console.log('  npm run job -- <job> [options]');
  console.log('');
  console.log('Jobs:');
  for (const job of JOBS) {
    console.log(`  ${job.name.padEnd(12)} ${job.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --date YYYY-MM-DD   Date key to collect for (default: today)');
  console.log('  --log-level LEVEL   quiet, normal, verbose or debug');
  console.log('  --no-proxy          Launch the browser without PROXY_HTTP');
  console.log('  --headed            Show the browser window');
  console.log('  --dry-run           Collect and print without writing or sending');
}

function createDeps(job: Job, config: AppConfig, dryRun: boolean): RunnerDeps {
  if (dryRun) return {};
  if (job.kind === 'sheet') {
    return {
      sheets: new GoogleSheetsClient(requireValue(config, 'sheetId'), requireValue(config, 'serviceAccount'))
    };
  }
  return {
    notifier: new TelegramNotifier(requireValue(config, 'telegramKey'), requireValue(config, 'chatId'))
  };
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  logger.setLevel(options.logLevel ?? config.logLevel);

  const job = command === undefined ? undefined : getJob(command);
  if (!job) {
    if (command !== undefined) {
      console.error(`Unknown job: ${command}`);
    }
    printUsage();
    return 1;
  }

  requireConfig(config, requiredKeys(job, options));

  const ctx = createJobContext(config, options);
  const result = await runJob(job, ctx, createDeps(job, config, ctx.dryRun));

  switch (result.status) {
    case 'written':
      logger.success(job.name, `${result.dateKey} written to ${result.range}`);
      break;
    case 'skipped':
      log.normal(`Nothing to do for ${result.dateKey}`);
      break;
    case 'sent':
      logger.success(job.name, 'report sent');
      break;
    case 'dry-run':
      console.log(result.preview);
      break;
  }
  return 0;
}

main()
  .then(code => process.exit(resolveExitCode(code)))
  .catch(error => {
    logger.failure('run-job', describeError(error));
    process.exit(1);
  });
