import { CompactionOutcome, CompactionStats } from './CompactionTypes';

/**
 * Counts deletions and rebuilds a map once enough have piled up.
 *
 * Only the storage engine calls into a tracker, from inside its
 * processing step, so none of these methods need to be re-entrant.
 */
export interface ICompactionTracker {
  recordDeletion(): void;

  shouldCompact(): boolean;

  compact<K, V>(storage: Map<K, V>): CompactionOutcome<K, V>;

  pendingDeletions(): number;

  getThreshold(): number;

  getStats(): CompactionStats;
}
