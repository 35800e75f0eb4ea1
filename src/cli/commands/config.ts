/**
 * Config Command
 *
 * Manages ~/.kbrag/config.toml via CLI:
 *   kbrag config get <key>          - Get a specific value
 *   kbrag config set <key> <value>  - Set a value
 *   kbrag config list               - Show all configuration
 *   kbrag config path               - Show config file location
 *   kbrag config reset --force      - Restore defaults
 *
 * Keys shadowed by an environment variable (KB_ID, MODEL_ID, ...) are
 * flagged, since the file value is not the one commands will use.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  getConfigValue,
  setConfigValue,
  listConfig,
  resetConfig,
} from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { envOverrideFor, type EnvOverride } from '../../config/env.js';
import type { CommandContext } from '../types.js';
import { printJSON } from '../shared.js';

interface ConfigEntryJSON {
  key: string;
  value: unknown;
  overriddenBy?: string;
  effectiveValue?: string;
}

function toEntryJSON(key: string, value: unknown): ConfigEntryJSON {
  const override = envOverrideFor(key);
  return override
    ? { key, value, overriddenBy: override.variable, effectiveValue: override.value }
    : { key, value };
}

function overrideNote(override: EnvOverride | undefined): string {
  return override ? chalk.dim(`  (overridden by ${override.variable}=${override.value})`) : '';
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., kbrag config get retrieval.top_k)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key);

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('kbrag config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          printJSON(toEntryJSON(key, value));
        } else {
          ctx.log(formatValue(value) + overrideNote(envOverrideFor(key)));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., kbrag config set model_id meta.llama3-8b-instruct-v1:0)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value);
        const override = envOverrideFor(key);

        if (ctx.options.json) {
          printJSON({ success: true, ...toEntryJSON(key, getConfigValue(key)) });
          return;
        }

        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        if (override) {
          ctx.warn(`${override.variable} is set and takes precedence over this value`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig();

        if (ctx.options.json) {
          printJSON(entries.map(([key, value]) => toEntryJSON(key, value)));
          return;
        }

        // Top-level keys first, then one TOML-style header per section
        let section = '';
        for (const [key, value] of entries) {
          const dot = key.indexOf('.');
          const group = dot >= 0 ? key.slice(0, dot) : '';
          if (group !== section) {
            ctx.log('');
            ctx.log(chalk.bold(`[${group}]`));
            section = group;
          }
          const name = dot >= 0 ? key.slice(dot + 1) : key;
          ctx.log(
            `${chalk.cyan(name)} = ${chalk.yellow(formatValue(value))}${overrideNote(envOverrideFor(key))}`
          );
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        printJSON({ path: configPath });
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force) {
        ctx.warn('This will overwrite ~/.kbrag/config.toml with the defaults.');
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        resetConfig();

        if (ctx.options.json) {
          printJSON({ success: true, path: getConfigPath() });
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value === '' ? '""' : value;
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);

  if (ctx.options.json) {
    printJSON({ error: message });
  } else {
    ctx.error(message);
  }

  process.exitCode = 1;
}
