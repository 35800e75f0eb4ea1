/**
 * Knowledge Base Sync
 *
 * Starts an ingestion job for one of the knowledge base's data sources and
 * polls it until it reaches a terminal status. Ingestion chunks and embeds
 * the object store's documents into the vector store; until it completes,
 * new uploads are invisible to retrieval.
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  GetIngestionJobCommand,
  ListDataSourcesCommand,
  StartIngestionJobCommand,
  type DataSourceSummary,
  type IngestionJob,
} from '@aws-sdk/client-bedrock-agent';

import type { ConnectionContext } from '../config/context.js';
import { SyncError } from '../errors/index.js';
import { withDeadline } from '../utils/deadline.js';
import { getAgentClient, type IngestionSender } from '../providers/clients.js';

export const DEFAULT_POLL_INTERVAL_MS = 10_000;
export const DEFAULT_SYNC_TIMEOUT_MS = 30 * 60_000;

const TERMINAL_STATUSES = new Set(['COMPLETE', 'FAILED', 'STOPPED']);

export interface IngestionStatistics {
  scanned: number;
  indexed: number;
  modified: number;
  deleted: number;
  failed: number;
}

export interface IngestionJobState {
  jobId: string;
  dataSourceId: string;
  status: string;
  statistics?: IngestionStatistics;
  failureReasons: string[];
}

export interface SyncOptions {
  /** Data source to ingest; the knowledge base's first one when omitted */
  dataSourceId?: string;
  pollIntervalMs?: number;
  /** Give up waiting after this long */
  timeoutMs?: number;
  /** Deadline for each individual API call */
  requestTimeoutMs?: number;
  signal?: AbortSignal;
  /** Called with every observed job state, including the first */
  onStatus?: (job: IngestionJobState) => void;
  client?: IngestionSender;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toState(job: IngestionJob | undefined, fallbackDataSourceId: string): IngestionJobState {
  const state: IngestionJobState = {
    jobId: job?.ingestionJobId ?? '',
    dataSourceId: job?.dataSourceId ?? fallbackDataSourceId,
    status: job?.status ?? 'UNKNOWN',
    failureReasons: job?.failureReasons ?? [],
  };
  const stats = job?.statistics;
  if (stats) {
    state.statistics = {
      scanned: stats.numberOfDocumentsScanned ?? 0,
      indexed: stats.numberOfNewDocumentsIndexed ?? 0,
      modified: stats.numberOfModifiedDocumentsIndexed ?? 0,
      deleted: stats.numberOfDocumentsDeleted ?? 0,
      failed: stats.numberOfDocumentsFailed ?? 0,
    };
  }
  return state;
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

/**
 * Resolve the data source to ingest: the given id, or the first listed.
 */
export async function resolveDataSourceId(
  context: ConnectionContext,
  client: IngestionSender,
  options: Pick<SyncOptions, 'dataSourceId' | 'requestTimeoutMs' | 'signal'> = {}
): Promise<string> {
  if (options.dataSourceId) return options.dataSourceId;

  const command = new ListDataSourcesCommand({ knowledgeBaseId: context.knowledgeBaseId });
  let summaries: DataSourceSummary[];
  try {
    const response = await withDeadline(
      { timeoutMs: options.requestTimeoutMs, signal: options.signal },
      (abortSignal) => client.send(command, { abortSignal })
    );
    summaries = response.dataSourceSummaries ?? [];
  } catch (error) {
    throw new SyncError(context.knowledgeBaseId, `ListDataSources failed: ${messageOf(error)}`, error);
  }

  const first = summaries.find((summary) => summary.dataSourceId);
  if (!first?.dataSourceId) {
    throw new SyncError(context.knowledgeBaseId, 'knowledge base has no data sources');
  }
  return first.dataSourceId;
}

/**
 * Start an ingestion job and wait for it to finish.
 *
 * Resolves with the final job on COMPLETE or STOPPED. A FAILED job, an API
 * failure or running past `timeoutMs` rejects with SyncError.
 */
export async function syncKnowledgeBase(
  context: ConnectionContext,
  options: SyncOptions = {}
): Promise<IngestionJobState> {
  const {
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    timeoutMs = DEFAULT_SYNC_TIMEOUT_MS,
    requestTimeoutMs,
    signal,
    onStatus,
    sleep = defaultSleep,
    now = Date.now,
  } = options;
  const client: IngestionSender = options.client ?? getAgentClient(context.region);
  const kbId = context.knowledgeBaseId;
  const requestOptions = { timeoutMs: requestTimeoutMs, signal };

  const dataSourceId = await resolveDataSourceId(context, client, options);
  const startedAt = now();

  let job: IngestionJobState;
  try {
    const response = await withDeadline(requestOptions, (abortSignal) =>
      client.send(new StartIngestionJobCommand({ knowledgeBaseId: kbId, dataSourceId }), { abortSignal })
    );
    job = toState(response.ingestionJob, dataSourceId);
  } catch (error) {
    throw new SyncError(kbId, `StartIngestionJob failed: ${messageOf(error)}`, error);
  }
  onStatus?.(job);

  while (!TERMINAL_STATUSES.has(job.status)) {
    if (now() - startedAt >= timeoutMs) {
      throw new SyncError(
        kbId,
        `ingestion job ${job.jobId} still ${job.status} after ${timeoutMs}ms`
      );
    }
    await sleep(pollIntervalMs, signal);

    const command = new GetIngestionJobCommand({
      knowledgeBaseId: kbId,
      dataSourceId,
      ingestionJobId: job.jobId,
    });
    try {
      const response = await withDeadline(requestOptions, (abortSignal) =>
        client.send(command, { abortSignal })
      );
      job = toState(response.ingestionJob, dataSourceId);
    } catch (error) {
      throw new SyncError(kbId, `GetIngestionJob failed: ${messageOf(error)}`, error);
    }
    onStatus?.(job);
  }

  if (job.status === 'FAILED') {
    const reasons = job.failureReasons.length > 0 ? `: ${job.failureReasons.join('; ')}` : '';
    throw new SyncError(kbId, `ingestion job ${job.jobId} failed${reasons}`);
  }
  return job;
}
