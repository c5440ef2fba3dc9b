import { GetResult } from '../common/Types';
import { CompactionStats } from '../engine/compaction';

export interface StorageStats {
  readonly entries: number;
  readonly deletionsSinceCompaction: number;
  readonly compactionThreshold: number;
  readonly compaction: CompactionStats;
}

/**
 * Message-passing front of the storage engine. Implementations never hand
 * out the underlying map; every call becomes a command on the engine's
 * inbox.
 */
export interface IStorageEngine {
  start(): void;
  stop(): Promise<void>;
  isRunning(): boolean;

  /**
   * Resolves once the engine has taken and applied the write.
   */
  set(key: string, value: Buffer): Promise<void>;
  get(key: string): Promise<GetResult>;

  /**
   * Resolves once the engine has taken and applied the delete. Counts
   * towards compaction whether or not the key existed.
   */
  delete(key: string): Promise<void>;
  stats(): Promise<StorageStats>;
}
