export type {
  CompactionConfig,
  CompactionResult,
  CompactionStats,
  CompactionOutcome,
  CompactionListener,
} from './CompactionTypes';
export { DEFAULT_COMPACTION_CONFIG } from './CompactionTypes';

export type { ICompactionTracker } from './ICompactionTracker';

export { CompactionTracker } from './CompactionTracker';
