/**
 * Vector Store Inspection
 *
 * Reads the knowledge base's backing table through the RDS Data API:
 * a sample of stored chunks, or the chunks containing a term. Used to
 * check whether content made it into the store when retrieval comes back
 * empty.
 */

import {
  ExecuteStatementCommand,
  type Field,
  type SqlParameter,
} from '@aws-sdk/client-rds-data';
import { z } from 'zod';

import type { ConnectionContext } from '../config/context.js';
import { ConfigError, DiagnosticsError, ValidationError } from '../errors/index.js';
import { withDeadline, type RequestOptions } from '../utils/deadline.js';
import { getRdsDataClient, type StatementSender } from '../providers/clients.js';

export const DEFAULT_TABLE = 'bedrock_integration.bedrock_kb';
export const DEFAULT_PREVIEW_CHARS = 1000;

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export type FieldValue = string | number | boolean | null;

export interface ChunkRow {
  id: FieldValue;
  preview: string;
  length: number;
}

export interface InspectOptions extends RequestOptions {
  client?: StatementSender;
  /** Schema-qualified table name */
  table?: string;
  limit?: number;
  /** Characters of each chunk to return */
  previewChars?: number;
}

const InspectSchema = z.object({
  table: z.string().regex(TABLE_NAME, 'table must be a plain or schema-qualified identifier'),
  limit: z.number().int('limit must be an integer').min(1, 'limit must be at least 1').max(1000),
  previewChars: z.number().int().min(1).max(100000),
});

type InspectSettings = z.infer<typeof InspectSchema>;

/**
 * Decode a Data API field into a plain value. Blobs become base64.
 */
export function decodeField(field: Field | undefined): FieldValue {
  if (!field || field.isNull) return null;
  if (field.stringValue !== undefined) return field.stringValue;
  if (field.longValue !== undefined) return field.longValue;
  if (field.doubleValue !== undefined) return field.doubleValue;
  if (field.booleanValue !== undefined) return field.booleanValue;
  if (field.blobValue !== undefined) return Buffer.from(field.blobValue).toString('base64');
  return null;
}

function settingsFrom(options: InspectOptions, defaultLimit: number): InspectSettings {
  const parsed = InspectSchema.safeParse({
    table: options.table ?? DEFAULT_TABLE,
    limit: options.limit ?? defaultLimit,
    previewChars: options.previewChars ?? DEFAULT_PREVIEW_CHARS,
  });
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid vector store query',
      parsed.error.issues.map((issue) => issue.message)
    );
  }
  return parsed.data;
}

function toChunkRow(record: Field[]): ChunkRow {
  const preview = decodeField(record[1]);
  const length = decodeField(record[2]);
  return {
    id: decodeField(record[0]),
    preview: typeof preview === 'string' ? preview : '',
    length: typeof length === 'number' ? length : 0,
  };
}

async function runStatement(
  context: ConnectionContext,
  sql: string,
  parameters: SqlParameter[],
  options: InspectOptions
): Promise<ChunkRow[]> {
  const store = context.vectorStoreLocator;
  if (!store || !context.credentialLocator) {
    throw new ConfigError(
      'Vector store is not configured',
      'Set RDS_RESOURCE_ARN and RDS_SECRET_ARN, or vector_store.resource_arn and vector_store.secret_arn in config.toml'
    );
  }

  const client = options.client ?? getRdsDataClient(context.region);
  const command = new ExecuteStatementCommand({
    resourceArn: store.resourceArn,
    secretArn: context.credentialLocator,
    database: store.database,
    sql,
    parameters,
  });

  try {
    const response = await withDeadline(options, (abortSignal) => client.send(command, { abortSignal }));
    return (response.records ?? []).map(toChunkRow);
  } catch (error) {
    throw new DiagnosticsError('ExecuteStatement', error);
  }
}

/**
 * First rows of the vector table with a preview and the full chunk length.
 */
export async function sampleRows(
  context: ConnectionContext,
  options: InspectOptions = {}
): Promise<ChunkRow[]> {
  const { table, limit, previewChars } = settingsFrom(options, 10);
  const sql = `SELECT id, left(chunks, ${previewChars}) AS preview, length(chunks) AS len FROM ${table} LIMIT :limit`;
  return runStatement(context, sql, [{ name: 'limit', value: { longValue: limit } }], options);
}

/** Escape LIKE wildcards so the term matches literally */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Rows whose chunk text contains `term`, case-insensitively.
 */
export async function searchChunks(
  context: ConnectionContext,
  term: string,
  options: InspectOptions = {}
): Promise<ChunkRow[]> {
  if (!term.trim()) {
    throw new ValidationError('Invalid vector store query', ['search term must not be empty']);
  }
  const { table, limit, previewChars } = settingsFrom(options, 50);
  const sql =
    `SELECT id, left(chunks, ${previewChars}) AS preview, length(chunks) AS len FROM ${table} ` +
    'WHERE chunks ILIKE :pattern LIMIT :limit';
  return runStatement(
    context,
    sql,
    [
      { name: 'pattern', value: { stringValue: `%${escapeLike(term.trim())}%` } },
      { name: 'limit', value: { longValue: limit } },
    ],
    options
  );
}
