/**
 * Error handler for CLI error formatting and display
 *
 * This module provides:
 * - Colored error output for terminal
 * - JSON output for programmatic use
 * - Verbose mode for debugging with stack traces
 *
 * Pipeline errors (retrieval, generation, provider mismatches) are shown
 * with their classified category and a hint rather than a stack trace.
 */

import chalk from 'chalk';
import { CLIError } from './types.js';
import { RAGError } from './rag.js';
import { classify, hintFor, type SourceComponent } from './classifier.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  category?: string;
  retryable?: boolean;
  stack?: string;
}

/** Exit code used for every pipeline (RAGError) failure */
export const RAG_ERROR_EXIT_CODE = 6;

function sourceComponentOf(error: RAGError): SourceComponent {
  switch (error.code) {
    case 'RETRIEVAL_FAILED':
      return 'retrieval';
    case 'SYNC_FAILED':
      return 'sync';
    case 'CATALOG_FAILED':
      return 'catalog';
    case 'DIAGNOSTICS_FAILED':
      return 'diagnostics';
    case 'GENERATION_FAILED':
    case 'UNSUPPORTED_PROVIDER':
    case 'MALFORMED_RESPONSE':
      return 'generation';
  }
}

function formatLines(
  error: Error,
  hint: string | undefined,
  verbose: boolean,
  prefix?: string
): string {
  const lines: string[] = [];
  lines.push(chalk.red('Error: ') + (prefix ? `${chalk.bold(prefix)} ` : '') + error.message);

  if (hint) {
    lines.push(chalk.dim('Hint: ') + hint);
  }

  if (verbose && error.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(error.stack));
  }

  return lines.join('\n');
}

/**
 * Format an error for display.
 *
 * Kept separate from `handleError` so it can be tested without exiting.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;

  if (error instanceof CLIError) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: error.code,
        hint: error.hint,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }
    return formatLines(error, error.hint, verbose);
  }

  if (error instanceof RAGError) {
    const classified = classify(error, sourceComponentOf(error));
    const hint = hintFor(classified);

    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: RAG_ERROR_EXIT_CODE,
        hint,
        category: classified.category,
        retryable: classified.retryable,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }
    return formatLines(error, hint, verbose, `[${classified.category}]`);
  }

  if (error instanceof Error) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: 1,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }
    return formatLines(error, verbose ? undefined : 'Run with --verbose for more details', verbose);
  }

  // Unknown error types (string, number, etc.)
  if (json) {
    return JSON.stringify({ error: String(error), code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Get the exit code for an error.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  if (error instanceof RAGError) {
    return RAG_ERROR_EXIT_CODE;
  }
  return 1;
}

/**
 * Format an error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  console.error(formatted);

  process.exit(code);
}

/**
 * Create a handler suitable for `uncaughtException` / `unhandledRejection`.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
