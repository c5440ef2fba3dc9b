import { StorageEngine } from '../src/engine/StorageEngine';
import { CommandType, StorageCommand } from '../src/engine/StorageCommand';
import { CompactionTracker, CompactionResult } from '../src/engine/compaction';
import { StorageEngineStoppedError } from '../src/common/Errors';

const bytes = (text: string): Buffer => Buffer.from(text, 'utf8');

function describeCommand(command: StorageCommand): string {
  switch (command.type) {
    case CommandType.SET:
      return `set ${command.key}=${command.value.toString('utf8')}`;
    case CommandType.GET:
      return `get ${command.key}`;
    case CommandType.DELETE:
      return `delete ${command.key}`;
    case CommandType.STATS:
      return 'stats';
  }
}

describe('StorageEngine', () => {
  let engine: StorageEngine;
  let applied: string[];

  beforeEach(() => {
    applied = [];
    engine = new StorageEngine(
      { compactionThreshold: 1024 },
      { onCommandApplied: (command) => applied.push(describeCommand(command)) }
    );
    engine.start();
  });

  afterEach(async () => {
    await engine.stop();
  });

  it('returns a value that was set', async () => {
    await engine.set('a', bytes('1'));

    await expect(engine.get('a')).resolves.toEqual({ found: true, value: bytes('1') });
  });

  it('reports missing keys as not found', async () => {
    await expect(engine.get('missing')).resolves.toEqual({ found: false, value: null });
  });

  it('keeps the last write to a key', async () => {
    await engine.set('k', bytes('v1'));
    await engine.set('k', bytes('v2'));

    await expect(engine.get('k')).resolves.toEqual({ found: true, value: bytes('v2') });
  });

  it('removes deleted keys and counts every delete', async () => {
    await engine.set('a', bytes('1'));
    await engine.delete('a');
    await engine.delete('never-set');

    await expect(engine.get('a')).resolves.toEqual({ found: false, value: null });

    const stats = await engine.stats();
    expect(stats.entries).toBe(0);
    expect(stats.deletionsSinceCompaction).toBe(2);
  });

  it('stores values with spaces and empty keys verbatim', async () => {
    await engine.set('', bytes('hello  world '));

    await expect(engine.get('')).resolves.toEqual({ found: true, value: bytes('hello  world ') });
  });

  it('has applied a write by the time set resolves', async () => {
    await engine.set('k', bytes('v'));

    expect(applied).toEqual(['set k=v']);
  });

  it('has applied a delete by the time delete resolves', async () => {
    await engine.set('k', bytes('v'));
    await engine.delete('k');

    expect(applied).toEqual(['set k=v', 'delete k']);
  });

  it('applies concurrent senders one at a time, in arrival order', async () => {
    await Promise.all(
      ['a', 'b', 'c'].map(async (key) => {
        await engine.set(key, bytes(key.toUpperCase()));
        expect(applied).toContain(`set ${key}=${key.toUpperCase()}`);
      })
    );

    expect(applied).toEqual(['set a=A', 'set b=B', 'set c=C']);
  });

  it('serves a get issued right after a set on the same caller', async () => {
    const results = await Promise.all([engine.set('x', bytes('1')), engine.get('x')]);

    expect(results[1]).toEqual({ found: true, value: bytes('1') });
  });

  it('reports stats without exposing the map', async () => {
    await engine.set('a', bytes('1'));
    await engine.set('b', bytes('2'));

    await expect(engine.stats()).resolves.toEqual({
      entries: 2,
      deletionsSinceCompaction: 0,
      compactionThreshold: 1024,
      compaction: {
        totalCompactions: 0,
        totalDeletionsReclaimed: 0,
        lastCompactionTime: null,
      },
    });
  });

  describe('compaction', () => {
    let small: StorageEngine;
    let compactions: CompactionResult[];

    beforeEach(() => {
      compactions = [];
      small = new StorageEngine(
        { compactionThreshold: 4 },
        { onCompaction: (result) => compactions.push(result) }
      );
      small.start();
    });

    afterEach(async () => {
      await small.stop();
    });

    it('rebuilds the map once the deletion threshold is reached', async () => {
      for (const key of ['keep', 'a', 'b', 'c', 'd']) {
        await small.set(key, bytes(`value-${key}`));
      }

      await small.delete('a');
      await small.delete('b');
      await small.delete('c');

      let stats = await small.stats();
      expect(stats.deletionsSinceCompaction).toBe(3);
      expect(stats.compaction.totalCompactions).toBe(0);

      await small.delete('not-there');

      expect(compactions).toHaveLength(1);
      expect(compactions[0]?.entriesRetained).toBe(2);
      expect(compactions[0]?.deletionsReclaimed).toBe(4);

      stats = await small.stats();
      expect(stats.entries).toBe(2);
      expect(stats.deletionsSinceCompaction).toBe(0);
      expect(stats.compaction.totalCompactions).toBe(1);
      expect(stats.compaction.totalDeletionsReclaimed).toBe(4);
      expect(stats.compaction.lastCompactionTime).not.toBeNull();
    });

    it('keeps surviving entries and behaves the same afterwards', async () => {
      await small.set('keep', bytes('intact'));
      for (let i = 0; i < 4; i++) {
        await small.set(`tmp${i}`, bytes('x'));
        await small.delete(`tmp${i}`);
      }

      expect(compactions).toHaveLength(1);
      await expect(small.get('keep')).resolves.toEqual({ found: true, value: bytes('intact') });

      await small.set('after', bytes('compaction'));
      await small.delete('keep');

      await expect(small.get('after')).resolves.toEqual({ found: true, value: bytes('compaction') });
      await expect(small.get('keep')).resolves.toEqual({ found: false, value: null });
      expect((await small.stats()).deletionsSinceCompaction).toBe(1);
    });
  });

  it('compacts after 1024 deletions by default', async () => {
    const defaults = new StorageEngine();
    defaults.start();

    await defaults.set('survivor', bytes('still here'));
    for (let i = 0; i < 1023; i++) {
      await defaults.delete(`gone-${i}`);
    }
    expect((await defaults.stats()).compaction.totalCompactions).toBe(0);

    await defaults.delete('gone-last');

    const stats = await defaults.stats();
    expect(stats.compaction.totalCompactions).toBe(1);
    expect(stats.deletionsSinceCompaction).toBe(0);
    await expect(defaults.get('survivor')).resolves.toEqual({ found: true, value: bytes('still here') });

    await defaults.stop();
  });

  it('uses an injected compaction tracker', async () => {
    const tracker = new CompactionTracker({ threshold: 2 });
    const results: CompactionResult[] = [];
    const custom = new StorageEngine(
      { compactionThreshold: 1024 },
      { compactionTracker: tracker, onCompaction: (result) => results.push(result) }
    );
    custom.start();

    await custom.delete('a');
    await custom.delete('b');

    expect(results).toHaveLength(1);
    expect(tracker.getStats().totalCompactions).toBe(1);
    expect((await custom.stats()).compactionThreshold).toBe(2);

    await custom.stop();
  });

  describe('stop', () => {
    it('rejects commands sent after stopping', async () => {
      await engine.stop();

      expect(engine.isRunning()).toBe(false);
      await expect(engine.set('a', bytes('1'))).rejects.toBeInstanceOf(StorageEngineStoppedError);
      await expect(engine.get('a')).rejects.toBeInstanceOf(StorageEngineStoppedError);
      await expect(engine.delete('a')).rejects.toBeInstanceOf(StorageEngineStoppedError);
    });

    it('rejects senders still waiting for the loop', async () => {
      const idle = new StorageEngine();
      const waiting = expect(idle.set('a', bytes('1'))).rejects.toBeInstanceOf(StorageEngineStoppedError);

      await idle.stop();

      await waiting;
    });

    it('cannot be restarted', async () => {
      await engine.stop();

      expect(() => engine.start()).toThrow(StorageEngineStoppedError);
    });

    it('refuses a second start', () => {
      expect(() => engine.start()).toThrow('StorageEngine: Already started');
    });
  });
});
