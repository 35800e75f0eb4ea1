/**
 * Ask Command
 *
 * Answers a question from the knowledge base:
 * retrieve → normalize → assemble → generate → extract.
 *
 *   kbrag ask "How are refunds handled?"
 *   kbrag ask "What is the SLA?" --top-k 5 --show-context
 *   kbrag ask "What is the SLA?" --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadCommandContext, parsePositiveInt, printJSON, withSpinner, MAX_TOP_K } from '../shared.js';
import { createRAGPipelineFromConfig } from '../../agent/pipeline.js';
import { formatCitations, labeledCitations, type LabeledPassage } from '../../agent/citations.js';
import type { PipelineResult, StepTimings } from '../../agent/types.js';
import { formatPassages, formatPassagesJSON } from '../../search/formatter.js';
import type { FormattedPassageJSON } from '../../search/types.js';
import { CLIError } from '../../errors/index.js';

const STEP_ORDER: ReadonlyArray<keyof StepTimings> = [
  'guard',
  'retrieve',
  'normalize',
  'assemble',
  'generate',
  'extract',
  'total',
];

interface AskCommandOptions {
  /** Number of passages to retrieve; config default when absent */
  topK?: string;
  /** Print the retrieved passages after the answer */
  showContext?: boolean;
}

/**
 * JSON output format for ask command.
 */
export interface AskOutputJSON {
  question: string;
  answer: string;
  refused: boolean;
  citations: Array<{ label: number; source: string | null; score: number | null }>;
  passages: FormattedPassageJSON[];
  metadata: {
    knowledgeBaseId: string;
    modelId: string;
    latencyMs: number;
    attempts: { retrieve: number; generate: number };
    timings: StepTimings;
  };
}

/**
 * Labels refer to the passages the model was shown, which can be fewer
 * than were retrieved once the prompt budget drops some.
 */
function citationsOf({ result, trace }: PipelineResult): LabeledPassage[] {
  return labeledCitations(result.answerText, trace.request?.contextPassages ?? []);
}

function toJSON(
  question: string,
  outcome: PipelineResult,
  ids: { knowledgeBaseId: string; modelId: string }
): AskOutputJSON {
  const { result, trace, refused } = outcome;
  return {
    question,
    answer: result.answerText,
    refused,
    citations: citationsOf(outcome).map(({ label, passage }) => ({
      label,
      source: passage.sourceLocator ?? null,
      score: passage.score ?? null,
    })),
    passages: formatPassagesJSON(trace.passages),
    metadata: {
      ...ids,
      latencyMs: result.rawLatencyMs,
      attempts: trace.attempts,
      timings: { ...trace.timings },
    },
  };
}

function printTimings(ctx: CommandContext, outcome: PipelineResult): void {
  ctx.log('');
  ctx.log(chalk.dim('─'.repeat(50)));
  for (const step of STEP_ORDER) {
    const ms = outcome.trace.timings[step];
    if (ms !== undefined) ctx.log(chalk.dim(`${step}: ${ms.toFixed(0)}ms`));
  }
  const { retrieve, generate } = outcome.trace.attempts;
  ctx.log(chalk.dim(`attempts: retrieve ${retrieve}, generate ${generate}`));
}

/**
 * Create the ask command.
 */
export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question to answer from the knowledge base')
    .description('Answer a question using knowledge base retrieval and a foundation model')
    .option('-k, --top-k <number>', 'Number of passages to retrieve (default: retrieval.top_k)')
    .option('--show-context', 'Print the retrieved passages after the answer')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const trimmed = question.trim();
      if (!trimmed) {
        throw new CLIError(
          'Question cannot be empty',
          'Provide a question, e.g.: kbrag ask "How are refunds handled?"'
        );
      }

      const topK =
        cmdOptions.topK === undefined ? undefined : parsePositiveInt(cmdOptions.topK, '--top-k', MAX_TOP_K);

      const { config, context } = loadCommandContext(ctx);
      ctx.debug(`Model: ${context.modelId}`);

      const pipeline = createRAGPipelineFromConfig(config, context, ctx);
      const outcome = await withSpinner(ctx, 'Thinking...', () => pipeline.ask(trimmed, { topK }));
      const { result, trace, refused } = outcome;

      if (ctx.options.json) {
        printJSON(
          toJSON(trimmed, outcome, { knowledgeBaseId: context.knowledgeBaseId, modelId: context.modelId })
        );
        return;
      }

      if (refused) {
        ctx.log(chalk.yellow(result.answerText));
        ctx.debug(`Guard category: ${trace.guard?.category ?? 'none'}`);
        return;
      }

      ctx.log(result.answerText);

      const cited = citationsOf(outcome);
      if (cited.length > 0) {
        ctx.log('');
        ctx.log(chalk.bold('Sources:'));
        ctx.log(formatCitations(cited));
      } else if (trace.passages.length === 0) {
        ctx.log('');
        ctx.log(chalk.dim('No passages were retrieved for this question.'));
      }

      if (cmdOptions.showContext && trace.passages.length > 0) {
        ctx.log('');
        ctx.log(chalk.bold('Context:'));
        ctx.log(formatPassages(trace.passages));
      }

      if (ctx.options.verbose) {
        printTimings(ctx, outcome);
      }
    });
}
