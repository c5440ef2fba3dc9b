import { ICompactionTracker } from './ICompactionTracker';
import {
  CompactionConfig,
  CompactionOutcome,
  CompactionResult,
  CompactionStats,
  DEFAULT_COMPACTION_CONFIG,
} from './CompactionTypes';

/**
 * Rebuilds the engine's map after `threshold` deletions.
 *
 * The live entries are copied into a fresh `Map` and the old backing store
 * is left for the collector. Keys, values and insertion order carry over
 * unchanged.
 */
export class CompactionTracker implements ICompactionTracker {
  private readonly config: CompactionConfig;

  private deletions: number = 0;

  private totalCompactions: number = 0;
  private totalDeletionsReclaimed: number = 0;
  private lastCompactionTime: number | null = null;

  constructor(config?: Partial<CompactionConfig>) {
    this.config = { ...DEFAULT_COMPACTION_CONFIG, ...config };

    if (!Number.isInteger(this.config.threshold) || this.config.threshold < 1) {
      throw new Error('CompactionTracker: threshold must be a positive integer');
    }
  }

  public recordDeletion(): void {
    this.deletions++;
  }

  public shouldCompact(): boolean {
    return this.deletions >= this.config.threshold;
  }

  public compact<K, V>(storage: Map<K, V>): CompactionOutcome<K, V> {
    const startTime = Date.now();
    const rebuilt = new Map<K, V>(storage);

    const result: CompactionResult = {
      entriesRetained: rebuilt.size,
      deletionsReclaimed: this.deletions,
      durationMs: Date.now() - startTime,
    };

    this.deletions = 0;
    this.updateStats(result);

    return { storage: rebuilt, result };
  }

  public pendingDeletions(): number {
    return this.deletions;
  }

  public getThreshold(): number {
    return this.config.threshold;
  }

  public getStats(): CompactionStats {
    return {
      totalCompactions: this.totalCompactions,
      totalDeletionsReclaimed: this.totalDeletionsReclaimed,
      lastCompactionTime: this.lastCompactionTime,
    };
  }

  private updateStats(result: CompactionResult): void {
    this.totalCompactions++;
    this.totalDeletionsReclaimed += result.deletionsReclaimed;
    this.lastCompactionTime = Date.now();
  }
}
