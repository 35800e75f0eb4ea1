/**
 * Diagnostics
 *
 * Read-only probes of the resources behind the knowledge base.
 */

export { dumpRetrieval, type DumpRetrievalOptions } from './retrieval.js';
export { listObjects, bucketNameOf, type StoredObject, type ListObjectsOptions } from './objects.js';
export {
  sampleRows,
  searchChunks,
  decodeField,
  escapeLike,
  DEFAULT_TABLE,
  DEFAULT_PREVIEW_CHARS,
  type ChunkRow,
  type FieldValue,
  type InspectOptions,
} from './vector-store.js';
