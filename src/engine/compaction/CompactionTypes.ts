import { DEFAULT_COMPACTION_THRESHOLD } from '../../common/Config';

export interface CompactionConfig {
  /** Deletions that trigger a rebuild of the map. */
  readonly threshold: number;
}

export const DEFAULT_COMPACTION_CONFIG: CompactionConfig = {
  threshold: DEFAULT_COMPACTION_THRESHOLD,
};

export interface CompactionResult {
  readonly entriesRetained: number;
  readonly deletionsReclaimed: number;
  readonly durationMs: number;
}

export interface CompactionOutcome<K, V> {
  readonly storage: Map<K, V>;
  readonly result: CompactionResult;
}

export type CompactionListener = (result: CompactionResult) => void;

export interface CompactionStats {
  readonly totalCompactions: number;
  readonly totalDeletionsReclaimed: number;
  readonly lastCompactionTime: number | null;
}
