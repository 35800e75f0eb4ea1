/**
 * Object Store Listing
 *
 * Lists the source documents the knowledge base ingests from, so an empty
 * retrieval can be traced back to an empty or misnamed bucket.
 */

import { ListObjectsV2Command, type ListObjectsV2CommandOutput } from '@aws-sdk/client-s3';

import type { ConnectionContext } from '../config/context.js';
import { ConfigError, DiagnosticsError } from '../errors/index.js';
import { withDeadline, type RequestOptions } from '../utils/deadline.js';
import { getS3Client, type ListObjectsSender } from '../providers/clients.js';

const S3_ARN_PREFIX = 'arn:aws:s3:::';

export interface StoredObject {
  key: string;
  size: number;
  lastModified?: Date;
}

export interface ListObjectsOptions extends RequestOptions {
  client?: ListObjectsSender;
  /** Only keys under this prefix */
  prefix?: string;
  /** Stop after this many objects */
  limit?: number;
}

/**
 * Bucket name from either a plain name or an `arn:aws:s3:::bucket[/path]` ARN.
 */
export function bucketNameOf(locator: string): string {
  const trimmed = locator.trim();
  if (!trimmed.startsWith(S3_ARN_PREFIX)) return trimmed;
  return trimmed.slice(S3_ARN_PREFIX.length).split('/')[0] ?? '';
}

/**
 * List every object in the configured bucket, following continuation tokens.
 */
export async function listObjects(
  context: ConnectionContext,
  options: ListObjectsOptions = {}
): Promise<StoredObject[]> {
  const bucket = context.objectStoreLocator ? bucketNameOf(context.objectStoreLocator) : '';
  if (!bucket) {
    throw new ConfigError(
      'No object store bucket configured',
      'Set UPLOAD_BUCKET_NAME or run: kbrag config set object_store.bucket <name>'
    );
  }

  const client = options.client ?? getS3Client(context.region);
  const objects: StoredObject[] = [];
  let token: string | undefined;

  do {
    const command = new ListObjectsV2Command({
      Bucket: bucket,
      Prefix: options.prefix,
      ContinuationToken: token,
    });

    let page: ListObjectsV2CommandOutput;
    try {
      page = await withDeadline(options, (abortSignal) => client.send(command, { abortSignal }));
    } catch (error) {
      throw new DiagnosticsError('ListObjectsV2', error);
    }

    for (const entry of page.Contents ?? []) {
      if (!entry.Key) continue;
      const object: StoredObject = { key: entry.Key, size: entry.Size ?? 0 };
      if (entry.LastModified) object.lastModified = entry.LastModified;
      objects.push(object);
      if (options.limit !== undefined && objects.length >= options.limit) return objects;
    }

    token = page.IsTruncated ? page.NextContinuationToken : undefined;
  } while (token);

  return objects;
}
