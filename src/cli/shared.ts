/**
 * Helpers shared by the commands that talk to AWS.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import type { CommandContext } from './types.js';
import type { Config } from '../config/schema.js';
import { loadConfig } from '../config/loader.js';
import { getEnvRegion } from '../config/env.js';
import { resolveConnectionContext, type ConnectionContext } from '../config/context.js';
import { CLIError } from '../errors/index.js';

export const MAX_TOP_K = 100;

/**
 * Parse a positive integer option such as --top-k or --limit.
 */
export function parsePositiveInt(raw: string, flag: string, max: number): number {
  const value = Number(raw);

  if (!Number.isInteger(value) || value < 1) {
    throw new CLIError(`Invalid ${flag} value: "${raw}"`, `Must be a positive integer (1-${max})`);
  }
  if (value > max) {
    throw new CLIError(`${flag} value too large: ${value}`, `Maximum allowed is ${max}`);
  }
  return value;
}

/**
 * Load config and resolve the connection context, applying the global
 * --region, --kb-id and --model overrides.
 */
export function loadCommandContext(ctx: CommandContext): { config: Config; context: ConnectionContext } {
  const config = loadConfig();
  const context = resolveConnectionContext(config, {
    region: ctx.options.region,
    knowledgeBaseId: ctx.options.kbId,
    modelId: ctx.options.model,
  });
  ctx.debug(`Region: ${context.region}`);
  ctx.debug(`Knowledge base: ${context.knowledgeBaseId}`);
  return { config, context };
}

/**
 * Region for commands that need no knowledge base (the model catalog).
 * Precedence matches resolveConnectionContext.
 */
export function resolveRegion(ctx: CommandContext): string {
  return ctx.options.region ?? getEnvRegion() ?? loadConfig().region;
}

/**
 * Spinner for text mode; undefined under --json so stdout stays parseable.
 */
export function startSpinner(ctx: CommandContext, text: string): Ora | undefined {
  if (ctx.options.json) return undefined;
  return ora({ text, color: 'cyan' }).start();
}

/**
 * Run `task` behind a spinner, failing the spinner when it throws.
 */
export async function withSpinner<T>(
  ctx: CommandContext,
  text: string,
  task: () => Promise<T>,
  done?: (value: T) => string
): Promise<T> {
  const spinner = startSpinner(ctx, text);
  try {
    const value = await task();
    if (spinner) {
      if (done) spinner.succeed(chalk.dim(done(value)));
      else spinner.stop();
    }
    return value;
  } catch (error) {
    spinner?.fail();
    throw error;
  }
}

/** Print a value as pretty JSON on stdout */
export function printJSON(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
