/**
 * AWS SDK Client Factory
 *
 * One client per (service, region), created on first use and reused.
 * The SDK's built-in retry is pinned to a single attempt: retries are
 * decided by the caller-level policy in agent/retry.ts.
 *
 * Components never depend on the concrete client classes. They accept the
 * narrow `*Sender` interfaces below, which the SDK clients satisfy and
 * tests replace with `{ send: vi.fn() }`.
 */

import {
  BedrockAgentRuntimeClient,
  type RetrieveCommand,
  type RetrieveCommandOutput,
} from '@aws-sdk/client-bedrock-agent-runtime';
import {
  BedrockRuntimeClient,
  type InvokeModelCommand,
  type InvokeModelCommandOutput,
} from '@aws-sdk/client-bedrock-runtime';
import {
  BedrockAgentClient,
  type ListDataSourcesCommand,
  type ListDataSourcesCommandOutput,
  type StartIngestionJobCommand,
  type StartIngestionJobCommandOutput,
  type GetIngestionJobCommand,
  type GetIngestionJobCommandOutput,
} from '@aws-sdk/client-bedrock-agent';
import {
  BedrockClient,
  type ListFoundationModelsCommand,
  type ListFoundationModelsCommandOutput,
} from '@aws-sdk/client-bedrock';
import {
  S3Client,
  type ListObjectsV2Command,
  type ListObjectsV2CommandOutput,
} from '@aws-sdk/client-s3';
import {
  RDSDataClient,
  type ExecuteStatementCommand,
  type ExecuteStatementCommandOutput,
} from '@aws-sdk/client-rds-data';

/** Per-call options accepted by every SDK `send()` */
export interface SendOptions {
  abortSignal?: AbortSignal;
}

export interface RetrieveSender {
  send(command: RetrieveCommand, options?: SendOptions): Promise<RetrieveCommandOutput>;
}

export interface InvokeModelSender {
  send(command: InvokeModelCommand, options?: SendOptions): Promise<InvokeModelCommandOutput>;
}

export interface IngestionSender {
  send(command: ListDataSourcesCommand, options?: SendOptions): Promise<ListDataSourcesCommandOutput>;
  send(command: StartIngestionJobCommand, options?: SendOptions): Promise<StartIngestionJobCommandOutput>;
  send(command: GetIngestionJobCommand, options?: SendOptions): Promise<GetIngestionJobCommandOutput>;
}

export interface FoundationModelSender {
  send(
    command: ListFoundationModelsCommand,
    options?: SendOptions
  ): Promise<ListFoundationModelsCommandOutput>;
}

export interface ListObjectsSender {
  send(command: ListObjectsV2Command, options?: SendOptions): Promise<ListObjectsV2CommandOutput>;
}

export interface StatementSender {
  send(
    command: ExecuteStatementCommand,
    options?: SendOptions
  ): Promise<ExecuteStatementCommandOutput>;
}

const SINGLE_ATTEMPT = { maxAttempts: 1 } as const;

const agentRuntimeClients = new Map<string, BedrockAgentRuntimeClient>();
const runtimeClients = new Map<string, BedrockRuntimeClient>();
const agentClients = new Map<string, BedrockAgentClient>();
const controlClients = new Map<string, BedrockClient>();
const s3Clients = new Map<string, S3Client>();
const rdsDataClients = new Map<string, RDSDataClient>();

function cached<T>(cache: Map<string, T>, region: string, create: () => T): T {
  let client = cache.get(region);
  if (!client) {
    client = create();
    cache.set(region, client);
  }
  return client;
}

/** Knowledge-base `Retrieve` client */
export function getAgentRuntimeClient(region: string): BedrockAgentRuntimeClient {
  return cached(agentRuntimeClients, region, () =>
    new BedrockAgentRuntimeClient({ region, ...SINGLE_ATTEMPT })
  );
}

/** `InvokeModel` client */
export function getRuntimeClient(region: string): BedrockRuntimeClient {
  return cached(runtimeClients, region, () => new BedrockRuntimeClient({ region, ...SINGLE_ATTEMPT }));
}

/** Data source and ingestion job client */
export function getAgentClient(region: string): BedrockAgentClient {
  return cached(agentClients, region, () => new BedrockAgentClient({ region, ...SINGLE_ATTEMPT }));
}

/** Foundation model catalog client */
export function getBedrockClient(region: string): BedrockClient {
  return cached(controlClients, region, () => new BedrockClient({ region, ...SINGLE_ATTEMPT }));
}

export function getS3Client(region: string): S3Client {
  return cached(s3Clients, region, () => new S3Client({ region, ...SINGLE_ATTEMPT }));
}

export function getRdsDataClient(region: string): RDSDataClient {
  return cached(rdsDataClients, region, () => new RDSDataClient({ region, ...SINGLE_ATTEMPT }));
}

/**
 * Destroy every cached client and forget it.
 *
 * Called by the CLI once the command has finished.
 */
export function resetClients(): void {
  const caches: Map<string, { destroy(): void }>[] = [
    agentRuntimeClients,
    runtimeClients,
    agentClients,
    controlClients,
    s3Clients,
    rdsDataClients,
  ];
  for (const cache of caches) {
    for (const client of cache.values()) {
      client.destroy();
    }
    cache.clear();
  }
}
