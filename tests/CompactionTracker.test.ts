import { CompactionTracker } from '../src/engine/compaction';

describe('CompactionTracker', () => {
  it('asks for compaction once the threshold is reached', () => {
    const tracker = new CompactionTracker({ threshold: 3 });

    tracker.recordDeletion();
    tracker.recordDeletion();
    expect(tracker.shouldCompact()).toBe(false);

    tracker.recordDeletion();
    expect(tracker.shouldCompact()).toBe(true);
    expect(tracker.pendingDeletions()).toBe(3);
  });

  it('copies live entries into a new map and resets the counter', () => {
    const tracker = new CompactionTracker({ threshold: 2 });
    const storage = new Map([['a', '1'], ['b', '2']]);
    tracker.recordDeletion();
    tracker.recordDeletion();

    const { storage: rebuilt, result } = tracker.compact(storage);

    expect(rebuilt).not.toBe(storage);
    expect([...rebuilt.entries()]).toEqual([['a', '1'], ['b', '2']]);
    expect(result.entriesRetained).toBe(2);
    expect(result.deletionsReclaimed).toBe(2);
    expect(tracker.pendingDeletions()).toBe(0);
    expect(tracker.shouldCompact()).toBe(false);
    expect(tracker.getStats().totalCompactions).toBe(1);
    expect(tracker.getStats().totalDeletionsReclaimed).toBe(2);
  });

  it('defaults to 1024 deletions', () => {
    expect(new CompactionTracker().getThreshold()).toBe(1024);
  });

  it('rejects a threshold below one', () => {
    expect(() => new CompactionTracker({ threshold: 0 })).toThrow(
      'CompactionTracker: threshold must be a positive integer'
    );
  });
});
