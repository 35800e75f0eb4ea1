export {
  syncKnowledgeBase,
  resolveDataSourceId,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_SYNC_TIMEOUT_MS,
  type IngestionJobState,
  type IngestionStatistics,
  type SyncOptions,
} from './sync.js';
