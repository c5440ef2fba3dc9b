/**
 * StorageEngine - sole owner of the key-value map
 *
 * Connection handlers never see the map. They send commands on a single
 * unbuffered inbox and the engine's loop takes them one at a time, in the
 * order the senders arrived. A command is fully applied before the loop
 * asks for the next one.
 */

import { RendezvousChannel } from '../common/RendezvousChannel';
import { ReplyChannel } from '../common/ReplyChannel';
import { ChannelClosedError, StorageEngineStoppedError } from '../common/Errors';
import { DEFAULT_COMPACTION_THRESHOLD } from '../common/Config';
import { GetResult } from '../common/Types';
import { IStorageEngine, StorageStats } from '../interfaces/Storage';
import { CommandType, StorageCommand } from './StorageCommand';
import {
  CompactionTracker,
  ICompactionTracker,
  CompactionListener,
  CompactionResult,
} from './compaction';

export type CommandListener = (command: StorageCommand) => void;

export interface StorageEngineConfig {
  readonly compactionThreshold: number;
}

export interface StorageEngineDependencies {
  compactionTracker?: ICompactionTracker;
  onCompaction?: CompactionListener | undefined;
  /** Called after each command has been applied, inside the processing step. */
  onCommandApplied?: CommandListener | undefined;
}

export class StorageEngine implements IStorageEngine {
  private readonly inbox: RendezvousChannel<StorageCommand>;
  private readonly compaction: ICompactionTracker;
  private readonly onCompaction: CompactionListener | undefined;
  private readonly onCommandApplied: CommandListener | undefined;

  private storage: Map<string, Buffer> = new Map();
  private loop: Promise<void> | null = null;
  private running: boolean = false;

  constructor(
    config: StorageEngineConfig = { compactionThreshold: DEFAULT_COMPACTION_THRESHOLD },
    dependencies?: StorageEngineDependencies
  ) {
    this.inbox = new RendezvousChannel<StorageCommand>(() => new StorageEngineStoppedError());
    this.onCompaction = dependencies?.onCompaction;
    this.onCommandApplied = dependencies?.onCommandApplied;
    this.compaction = dependencies?.compactionTracker ??
      new CompactionTracker({ threshold: config.compactionThreshold });
  }

  public start(): void {
    if (this.running) {
      throw new Error('StorageEngine: Already started');
    }
    if (this.inbox.isClosed()) {
      throw new StorageEngineStoppedError();
    }

    this.storage = new Map();
    this.running = true;
    this.loop = this.run().catch((err) => {
      console.error('StorageEngine: Processing loop failed:', err);
      this.running = false;
      this.inbox.close();
    });

    console.log(`StorageEngine: Started (compaction threshold=${this.compaction.getThreshold()})`);
  }

  /**
   * Closes the inbox. Senders still waiting for the loop, and any that
   * arrive later, are rejected with StorageEngineStoppedError.
   */
  public async stop(): Promise<void> {
    if (this.inbox.isClosed()) {
      return;
    }

    this.inbox.close();

    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
  }

  public isRunning(): boolean {
    return this.running;
  }

  public async set(key: string, value: Buffer): Promise<void> {
    await this.inbox.send({ type: CommandType.SET, key, value });
  }

  public async get(key: string): Promise<GetResult> {
    const reply = new ReplyChannel<GetResult>();
    await this.inbox.send({ type: CommandType.GET, key, reply });
    return reply.receive();
  }

  public async delete(key: string): Promise<void> {
    await this.inbox.send({ type: CommandType.DELETE, key });
  }

  public async stats(): Promise<StorageStats> {
    const reply = new ReplyChannel<StorageStats>();
    await this.inbox.send({ type: CommandType.STATS, reply });
    return reply.receive();
  }

  private async run(): Promise<void> {
    for (;;) {
      let command: StorageCommand;
      try {
        command = await this.inbox.receive();
      } catch (err) {
        if (err instanceof ChannelClosedError) {
          break;
        }
        throw err;
      }

      this.apply(command);
    }

    this.storage = new Map();
    this.running = false;
    console.log('StorageEngine: Stopped');
  }

  private apply(command: StorageCommand): void {
    switch (command.type) {
      case CommandType.SET:
        this.storage.set(command.key, command.value);
        break;

      case CommandType.GET: {
        const value = this.storage.get(command.key);
        command.reply.send(
          value === undefined ? { found: false, value: null } : { found: true, value }
        );
        break;
      }

      case CommandType.DELETE:
        this.storage.delete(command.key);
        this.compaction.recordDeletion();
        if (this.compaction.shouldCompact()) {
          const { storage, result } = this.compaction.compact(this.storage);
          this.storage = storage;
          this.handleCompactionComplete(result);
        }
        break;

      case CommandType.STATS:
        command.reply.send({
          entries: this.storage.size,
          deletionsSinceCompaction: this.compaction.pendingDeletions(),
          compactionThreshold: this.compaction.getThreshold(),
          compaction: this.compaction.getStats(),
        });
        break;
    }

    this.onCommandApplied?.(command);
  }

  private handleCompactionComplete(result: CompactionResult): void {
    console.log(
      `StorageEngine: Compacted map (${result.entriesRetained} entries retained, ` +
      `${result.deletionsReclaimed} deletions reclaimed, ${result.durationMs}ms)`
    );
    this.onCompaction?.(result);
  }
}
