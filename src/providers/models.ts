/**
 * Model Catalog
 *
 * Lists the foundation models in a region that produce text and can be
 * invoked on demand, flagged with whether the provider registry can build
 * requests for them.
 */

import {
  ListFoundationModelsCommand,
  type FoundationModelSummary,
} from '@aws-sdk/client-bedrock';

import { CatalogError } from '../errors/index.js';
import { withDeadline, type RequestOptions } from '../utils/deadline.js';
import { getBedrockClient, type FoundationModelSender } from './clients.js';
import { defaultProviderRegistry, providerIdOf, type ProviderRegistry } from './registry.js';

export interface TextModel {
  modelId: string;
  modelName: string;
  providerName: string;
  /** Vendor segment used by the registry */
  providerId: string;
  /** True when a registry adapter exists for this model */
  supported: boolean;
  /** Lifecycle status (ACTIVE / LEGACY) */
  status?: string;
}

export interface ListTextModelsOptions extends RequestOptions {
  /** Injected client; defaults to the shared client for the region */
  client?: FoundationModelSender;
  registry?: ProviderRegistry;
}

function isOnDemandText(summary: FoundationModelSummary): boolean {
  return (
    (summary.outputModalities ?? []).includes('TEXT') &&
    (summary.inferenceTypesSupported ?? []).includes('ON_DEMAND')
  );
}

/**
 * List on-demand text models, sorted by provider then model id.
 */
export async function listTextModels(
  region: string,
  options: ListTextModelsOptions = {}
): Promise<TextModel[]> {
  const client = options.client ?? getBedrockClient(region);
  const registry = options.registry ?? defaultProviderRegistry;

  const command = new ListFoundationModelsCommand({
    byOutputModality: 'TEXT',
    byInferenceType: 'ON_DEMAND',
  });

  let summaries: FoundationModelSummary[];
  try {
    const response = await withDeadline(options, (abortSignal) => client.send(command, { abortSignal }));
    summaries = response.modelSummaries ?? [];
  } catch (error) {
    throw new CatalogError(region, error);
  }

  const models: TextModel[] = [];
  for (const summary of summaries) {
    if (!summary.modelId || !isOnDemandText(summary)) continue;
    const model: TextModel = {
      modelId: summary.modelId,
      modelName: summary.modelName ?? summary.modelId,
      providerName: summary.providerName ?? providerIdOf(summary.modelId),
      providerId: providerIdOf(summary.modelId),
      supported: registry.supports(summary.modelId),
    };
    if (summary.modelLifecycle?.status) model.status = summary.modelLifecycle.status;
    models.push(model);
  }

  return models.sort(
    (a, b) =>
      a.providerName.localeCompare(b.providerName, 'en') || a.modelId.localeCompare(b.modelId, 'en')
  );
}
