/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Table formatting for CLI output
export { formatTable, type Column, type Alignment, type Row } from './table.js';

// Logging interface for library code
export { consoleLogger, silentLogger, type Logger } from './logger.js';

// Request deadlines
export {
  createDeadline,
  withDeadline,
  RequestTimeoutError,
  type Deadline,
  type RequestOptions,
} from './deadline.js';
