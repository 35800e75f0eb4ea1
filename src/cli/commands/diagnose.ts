/**
 * Diagnose Command
 *
 * Read-only probes of the resources behind the knowledge base:
 *   kbrag diagnose retrieval <query>   - raw Retrieve response
 *   kbrag diagnose objects             - documents in the source bucket
 *   kbrag diagnose rows                - sample of the vector table
 *   kbrag diagnose search <term>       - vector table rows containing a term
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadCommandContext, parsePositiveInt, printJSON, withSpinner } from '../shared.js';
import {
  dumpRetrieval,
  listObjects,
  sampleRows,
  searchChunks,
  type ChunkRow,
} from '../../diagnostics/index.js';
import { formatTable } from '../../utils/table.js';

const MAX_ROWS = 1000;

function printRows(ctx: CommandContext, rows: ChunkRow[], empty: string): void {
  if (ctx.options.json) {
    printJSON(rows);
    return;
  }
  if (rows.length === 0) {
    ctx.log(chalk.yellow(empty));
    return;
  }
  ctx.log(
    formatTable(
      [
        { header: 'ID', key: 'id', maxWidth: 36 },
        { header: 'Length', key: 'length', align: 'right' },
        { header: 'Preview', key: 'preview', maxWidth: 80 },
      ],
      rows.map((row) => ({ id: row.id, length: row.length, preview: row.preview }))
    )
  );
}

export function createDiagnoseCommand(getContext: () => CommandContext): Command {
  const diagnoseCmd = new Command('diagnose').description(
    'Inspect the knowledge base, its bucket and its vector store'
  );

  diagnoseCmd
    .command('retrieval <query>')
    .description('Print the raw Retrieve response for a query')
    .option('-k, --top-k <number>', 'Number of results', '5')
    .action(async (query: string, cmdOptions: { topK: string }) => {
      const ctx = getContext();
      const { config, context } = loadCommandContext(ctx);
      const topK = parsePositiveInt(cmdOptions.topK, '--top-k', 100);

      const response = await withSpinner(ctx, 'Retrieving...', () =>
        dumpRetrieval(context, query, topK, { timeoutMs: config.request.timeout_ms })
      );
      if (!ctx.options.json) ctx.log(chalk.bold(`Retrieve response for "${query.trim()}":`));
      printJSON(response);
    });

  diagnoseCmd
    .command('objects')
    .description('List documents in the source bucket')
    .option('--prefix <prefix>', 'Only keys under this prefix')
    .option('-n, --limit <number>', 'Stop after this many objects')
    .action(async (cmdOptions: { prefix?: string; limit?: string }) => {
      const ctx = getContext();
      const { config, context } = loadCommandContext(ctx);
      const limit =
        cmdOptions.limit === undefined ? undefined : parsePositiveInt(cmdOptions.limit, '--limit', 100000);

      const objects = await withSpinner(
        ctx,
        'Listing objects...',
        () =>
          listObjects(context, { prefix: cmdOptions.prefix, limit, timeoutMs: config.request.timeout_ms }),
        (found) => `${found.length} objects`
      );

      if (ctx.options.json) {
        printJSON(objects.map((o) => ({ ...o, lastModified: o.lastModified?.toISOString() ?? null })));
        return;
      }
      if (objects.length === 0) {
        ctx.log(chalk.yellow('The bucket is empty. Upload documents, then run: kbrag sync'));
        return;
      }
      ctx.log(
        formatTable(
          [
            { header: 'Key', key: 'key', maxWidth: 80 },
            { header: 'Size', key: 'size', align: 'right' },
            { header: 'Modified', key: 'modified' },
          ],
          objects.map((o) => ({ key: o.key, size: o.size, modified: o.lastModified?.toISOString() }))
        )
      );
    });

  diagnoseCmd
    .command('rows')
    .description('Show a sample of the vector table')
    .option('-n, --limit <number>', 'Number of rows', '10')
    .option('--table <name>', 'Table name (default: vector_store.table)')
    .action(async (cmdOptions: { limit: string; table?: string }) => {
      const ctx = getContext();
      const { config, context } = loadCommandContext(ctx);

      const rows = await withSpinner(ctx, 'Querying vector store...', () =>
        sampleRows(context, {
          table: cmdOptions.table ?? config.vector_store.table,
          limit: parsePositiveInt(cmdOptions.limit, '--limit', MAX_ROWS),
          timeoutMs: config.request.timeout_ms,
        })
      );
      printRows(ctx, rows, 'The vector table is empty. Has an ingestion job completed?');
    });

  diagnoseCmd
    .command('search <term>')
    .description('Find vector table rows whose chunk text contains a term')
    .option('-n, --limit <number>', 'Maximum rows', '50')
    .option('--table <name>', 'Table name (default: vector_store.table)')
    .action(async (term: string, cmdOptions: { limit: string; table?: string }) => {
      const ctx = getContext();
      const { config, context } = loadCommandContext(ctx);

      const rows = await withSpinner(ctx, 'Searching vector store...', () =>
        searchChunks(context, term, {
          table: cmdOptions.table ?? config.vector_store.table,
          limit: parsePositiveInt(cmdOptions.limit, '--limit', MAX_ROWS),
          timeoutMs: config.request.timeout_ms,
        })
      );
      printRows(ctx, rows, `No chunks contain "${term.trim()}"`);
    });

  return diagnoseCmd;
}
