/**
 * Retrieve Command
 *
 * Runs retrieval and normalization only, without calling a model.
 * Useful to see what context a question would get.
 *
 *   kbrag retrieve "refund policy"
 *   kbrag retrieve "refund policy" -k 10 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadCommandContext, parsePositiveInt, printJSON, withSpinner, MAX_TOP_K } from '../shared.js';
import { createRetriever } from '../../search/retriever.js';
import { normalize } from '../../search/normalizer.js';
import { formatPassages, formatPassagesJSON } from '../../search/formatter.js';
import { CLIError } from '../../errors/index.js';

interface RetrieveCommandOptions {
  topK?: string;
  /** Characters of each passage to show */
  preview: string;
}

export function createRetrieveCommand(getContext: () => CommandContext): Command {
  return new Command('retrieve')
    .argument('<query>', 'Text to search the knowledge base for')
    .description('Retrieve and normalize passages without generating an answer')
    .option('-k, --top-k <number>', 'Number of results to request (default: retrieval.top_k)')
    .option('--preview <chars>', 'Preview length per passage', '200')
    .action(async (query: string, cmdOptions: RetrieveCommandOptions) => {
      const ctx = getContext();

      const trimmed = query.trim();
      if (!trimmed) {
        throw new CLIError('Query cannot be empty', 'Provide a query, e.g.: kbrag retrieve "refund policy"');
      }

      const { config, context } = loadCommandContext(ctx);
      const topK =
        cmdOptions.topK === undefined
          ? config.retrieval.top_k
          : parsePositiveInt(cmdOptions.topK, '--top-k', MAX_TOP_K);
      const previewLength = parsePositiveInt(cmdOptions.preview, '--preview', 10000);

      const retriever = createRetriever(context.region, ctx);
      const raw = await withSpinner(
        ctx,
        'Retrieving...',
        () => retriever.retrieve(context, trimmed, topK, { timeoutMs: config.request.timeout_ms }),
        (results) => `${results.length} raw results`
      );
      const passages = normalize(raw);

      if (ctx.options.json) {
        printJSON({ query: trimmed, topK, rawCount: raw.length, passages: formatPassagesJSON(passages) });
        return;
      }

      if (passages.length === 0) {
        ctx.log(chalk.yellow(`No passages found for: "${trimmed}"`));
        ctx.log(chalk.dim('Run: kbrag diagnose objects  to check the knowledge base has documents'));
        return;
      }

      ctx.log(formatPassages(passages, { previewLength }));
      if (passages.length < raw.length) {
        ctx.debug(`${raw.length - passages.length} results dropped as duplicates or without text`);
      }
    });
}
