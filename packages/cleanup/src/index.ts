/**
 * Cleanup module - store deletion on top of the attempt scheduler
 *
 * Features:
 * - Per-component retried deletes with a give-up cap
 * - One outcome line per store
 * - Directory-backed store
 */

export {
  DEFAULT_MAX_ATTEMPTS,
  reportComponentFailure,
  reportDeleteOutcome,
  reportDeletionFailure,
  type DeleteOutcome,
} from './reporting.js';

export {
  StoreDeleter,
  TRANSIENT_FS_CODES,
  type ComponentFailure,
  type DeletableStore,
  type DeleteSummary,
  type StoreDeleterOptions,
} from './store-deleter.js';

export { DirectoryStore } from './directory-store.js';
