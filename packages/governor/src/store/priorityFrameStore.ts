import { priorityRank, type FramePriority } from '../priority.js';

export interface FrameStoreEntry<THandle> {
  handle: THandle;
  priority: FramePriority;
  timestampMs: number;
  seq: number;
}

function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new Error('priorityFrameStore.capacity must be a positive integer.');
  }
}

// Negative when `a` should be evicted before `b`.
function compareForEviction<T>(a: FrameStoreEntry<T>, b: FrameStoreEntry<T>): number {
  const byPriority = priorityRank(a.priority) - priorityRank(b.priority);
  if (byPriority !== 0) {
    return byPriority;
  }

  if (a.timestampMs !== b.timestampMs) {
    return a.timestampMs - b.timestampMs;
  }

  return a.seq - b.seq;
}

/**
 * Bounded store of pending frames. Holds handles only; the capture source
 * keeps ownership of the pixel data and is told about every handle that
 * leaves through eviction or `clear`.
 */
export class PriorityFrameStore<THandle> {
  private readonly entries: FrameStoreEntry<THandle>[] = [];

  private maxEntries: number;

  private nextSeq = 0;

  constructor(capacity = 5) {
    assertCapacity(capacity);
    this.maxEntries = capacity;
  }

  public get capacity(): number {
    return this.maxEntries;
  }

  public size(): number {
    return this.entries.length;
  }

  /**
   * Inserts the frame and returns the handle evicted to stay within capacity,
   * which may be the frame just added.
   */
  public add(handle: THandle, priority: FramePriority, timestampMs: number): THandle | null {
    this.entries.push({
      handle,
      priority,
      timestampMs,
      seq: this.nextSeq,
    });
    this.nextSeq += 1;

    if (this.entries.length <= this.maxEntries) {
      return null;
    }

    return this.evictOne();
  }

  public takeNext(): THandle | null {
    if (this.entries.length === 0) {
      return null;
    }

    let bestIndex = 0;
    for (let i = 1; i < this.entries.length; i += 1) {
      if (compareForEviction(this.entries[i], this.entries[bestIndex]) > 0) {
        bestIndex = i;
      }
    }

    const [taken] = this.entries.splice(bestIndex, 1);
    return taken.handle;
  }

  public setCapacity(capacity: number): THandle[] {
    assertCapacity(capacity);
    this.maxEntries = capacity;

    const evicted: THandle[] = [];
    while (this.entries.length > this.maxEntries) {
      const handle = this.evictOne();
      if (handle !== null) {
        evicted.push(handle);
      }
    }

    return evicted;
  }

  public clear(): THandle[] {
    const removed = this.entries.map((entry) => entry.handle);
    this.entries.length = 0;
    return removed;
  }

  private evictOne(): THandle | null {
    if (this.entries.length === 0) {
      return null;
    }

    let victimIndex = 0;
    for (let i = 1; i < this.entries.length; i += 1) {
      if (compareForEviction(this.entries[i], this.entries[victimIndex]) < 0) {
        victimIndex = i;
      }
    }

    const [victim] = this.entries.splice(victimIndex, 1);
    return victim.handle;
  }
}
