#!/usr/bin/env node
/**
 * kbrag CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions } from './types.js';
import { createContext } from './context.js';
import { createAskCommand } from './commands/ask.js';
import { createRetrieveCommand } from './commands/retrieve.js';
import { createDiagnoseCommand } from './commands/diagnose.js';
import { createSyncCommand } from './commands/sync.js';
import { createModelsCommand } from './commands/models.js';
import { createConfigCommand } from './commands/config.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import { resetClients } from '../providers/clients.js';

// Set by the npm script environment; falls back for direct execution
const VERSION = process.env.npm_package_version ?? '0.0.0';

const program = new Command();

program
  .name('kbrag')
  .description('Question answering over a Bedrock knowledge base')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .option('--region <region>', 'AWS region (overrides AWS_REGION and config)')
  .option('--kb-id <id>', 'Knowledge base id (overrides KB_ID and config)')
  .option('--model <id>', 'Model id (overrides MODEL_ID and config)')

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('kbrag ask "How are refunds handled?"')}   Answer from the knowledge base
  ${chalk.cyan('kbrag retrieve "refund policy"')}         Show retrieved passages only
  ${chalk.cyan('kbrag diagnose objects')}                 List documents in the bucket
  ${chalk.cyan('kbrag sync')}                             Re-ingest the bucket
  ${chalk.cyan('kbrag models --supported')}               Models usable for answers
  ${chalk.cyan('kbrag config set knowledge_base_id KB123')}
`);

/**
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
    region: opts.region,
    kbId: opts.kbId,
    model: opts.model,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createAskCommand(getContext));
program.addCommand(createRetrieveCommand(getContext));
program.addCommand(createDiagnoseCommand(getContext));
program.addCommand(createSyncCommand(getContext));
program.addCommand(createModelsCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: kbrag --help  to see available commands');
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    resetClients();
    handleError(error, getErrorOptions());
  }
  resetClients();
}

void main();
