/**
 * Sync Command
 *
 * Starts an ingestion job and waits for it:
 *   kbrag sync
 *   kbrag sync --data-source DS123 --poll-interval 5
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadCommandContext, parsePositiveInt, printJSON, startSpinner } from '../shared.js';
import { syncKnowledgeBase, type IngestionJobState } from '../../ingestion/sync.js';

interface SyncCommandOptions {
  dataSource?: string;
  /** Seconds between status checks */
  pollInterval: string;
  /** Minutes to wait before giving up */
  timeout: string;
}

function describeJob(job: IngestionJobState): string {
  const stats = job.statistics;
  if (!stats) return job.status;
  return `${job.status} (scanned ${stats.scanned}, indexed ${stats.indexed}, failed ${stats.failed})`;
}

export function createSyncCommand(getContext: () => CommandContext): Command {
  return new Command('sync')
    .description('Start a knowledge base ingestion job and wait for it to finish')
    .option('--data-source <id>', 'Data source to ingest (default: the first one)')
    .option('--poll-interval <seconds>', 'Seconds between status checks', '10')
    .option('--timeout <minutes>', 'Minutes to wait before giving up', '30')
    .action(async (cmdOptions: SyncCommandOptions) => {
      const ctx = getContext();
      const { config, context } = loadCommandContext(ctx);

      const pollIntervalMs = parsePositiveInt(cmdOptions.pollInterval, '--poll-interval', 3600) * 1000;
      const timeoutMs = parsePositiveInt(cmdOptions.timeout, '--timeout', 24 * 60) * 60_000;

      const spinner = startSpinner(ctx, `Starting ingestion for ${context.knowledgeBaseId}...`);
      let job: IngestionJobState;
      try {
        job = await syncKnowledgeBase(context, {
          dataSourceId: cmdOptions.dataSource,
          pollIntervalMs,
          timeoutMs,
          requestTimeoutMs: config.request.timeout_ms,
          onStatus: (state) => {
            ctx.debug(`Job ${state.jobId}: ${state.status}`);
            if (spinner) spinner.text = `Ingestion ${describeJob(state)}`;
          },
        });
      } catch (error) {
        spinner?.fail();
        throw error;
      }

      if (ctx.options.json) {
        printJSON(job);
        return;
      }

      if (job.status === 'COMPLETE') {
        spinner?.succeed(`Ingestion ${describeJob(job)}`);
      } else {
        spinner?.warn(chalk.yellow(`Ingestion ${describeJob(job)}`));
      }
    });
}
