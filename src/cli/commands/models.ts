/**
 * Models Command
 *
 * Lists on-demand text models in the region and whether answers can be
 * generated with them.
 *
 *   kbrag models
 *   kbrag models --supported --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { printJSON, resolveRegion, withSpinner } from '../shared.js';
import { listTextModels } from '../../providers/models.js';
import { formatTable } from '../../utils/table.js';

export function createModelsCommand(getContext: () => CommandContext): Command {
  return new Command('models')
    .description('List foundation models that can answer questions')
    .option('--supported', 'Only models with a request adapter')
    .action(async (cmdOptions: { supported?: boolean }) => {
      const ctx = getContext();
      const region = resolveRegion(ctx);

      const all = await withSpinner(ctx, `Listing models in ${region}...`, () => listTextModels(region));
      const models = cmdOptions.supported ? all.filter((m) => m.supported) : all;

      if (ctx.options.json) {
        printJSON(models);
        return;
      }

      if (models.length === 0) {
        ctx.log(chalk.yellow(`No on-demand text models found in ${region}`));
        return;
      }

      ctx.log(
        formatTable(
          [
            { header: 'Model ID', key: 'modelId' },
            { header: 'Name', key: 'modelName', maxWidth: 40 },
            { header: 'Provider', key: 'providerName' },
            { header: 'Supported', key: 'supported', align: 'center' },
          ],
          models.map((m) => ({
            modelId: m.modelId,
            modelName: m.modelName,
            providerName: m.providerName,
            supported: m.supported ? chalk.green('yes') : chalk.dim('no'),
          }))
        )
      );
      ctx.log('');
      ctx.log(chalk.dim(`Set one with: kbrag config set model_id <model-id>`));
    });
}
