import { describe, expect, it } from 'vitest';

import type { FramePriority } from '../src/priority.js';
import { PriorityFrameStore } from '../src/store/priorityFrameStore.js';

describe('PriorityFrameStore', () => {
  it('returns null from takeNext when empty', () => {
    const store = new PriorityFrameStore<string>();
    expect(store.takeNext()).toBeNull();
    expect(store.size()).toBe(0);
    expect(store.capacity).toBe(5);
  });

  it('never grows past capacity for any insertion sequence', () => {
    const store = new PriorityFrameStore<number>(3);
    const priorities: FramePriority[] = ['low', 'normal', 'high'];

    for (let i = 0; i < 50; i += 1) {
      store.add(i, priorities[(i * 7) % 3], i % 4);
      expect(store.size()).toBeLessThanOrEqual(3);
    }

    expect(store.size()).toBe(3);
  });

  it('evicts the low-priority frame and never hands it out', () => {
    const store = new PriorityFrameStore<string>(5);
    const evicted: Array<string | null> = [];

    for (let i = 1; i <= 6; i += 1) {
      evicted.push(store.add(`frame-${i}`, i === 3 ? 'low' : 'normal', i * 10));
    }

    expect(evicted).toEqual([null, null, null, null, null, 'frame-3']);

    const taken: string[] = [];
    let next = store.takeNext();
    while (next !== null) {
      taken.push(next);
      next = store.takeNext();
    }

    expect(taken).toEqual(['frame-6', 'frame-5', 'frame-4', 'frame-2', 'frame-1']);
  });

  it('evicts the oldest frame among equal priorities', () => {
    const store = new PriorityFrameStore<string>(2);
    store.add('b', 'normal', 20);
    store.add('a', 'normal', 10);

    expect(store.add('c', 'normal', 30)).toBe('a');
  });

  it('may evict the incoming frame when it is the least valuable', () => {
    const store = new PriorityFrameStore<string>(2);
    store.add('h1', 'high', 10);
    store.add('h2', 'high', 20);

    expect(store.add('late-low', 'low', 30)).toBe('late-low');
    expect(store.size()).toBe(2);
  });

  it('serves highest priority first, then the most recent', () => {
    const store = new PriorityFrameStore<string>(5);
    store.add('normal-old', 'normal', 1);
    store.add('high-old', 'high', 2);
    store.add('low-new', 'low', 9);
    store.add('high-new', 'high', 5);
    store.add('normal-new', 'normal', 7);

    expect(store.takeNext()).toBe('high-new');
    expect(store.takeNext()).toBe('high-old');
    expect(store.takeNext()).toBe('normal-new');
    expect(store.takeNext()).toBe('normal-old');
    expect(store.takeNext()).toBe('low-new');
    expect(store.takeNext()).toBeNull();
  });

  it('breaks equal priority and timestamp ties by insertion order', () => {
    const store = new PriorityFrameStore<string>(2);
    store.add('first', 'normal', 5);
    store.add('second', 'normal', 5);

    expect(store.takeNext()).toBe('second');

    store.add('third', 'normal', 5);
    expect(store.add('fourth', 'normal', 5)).toBe('first');
  });

  it('returns the removed handles from clear', () => {
    const store = new PriorityFrameStore<string>(3);
    store.add('a', 'normal', 1);
    store.add('b', 'high', 2);

    expect(store.clear()).toEqual(['a', 'b']);
    expect(store.size()).toBe(0);
  });

  it('evicts down to a reduced capacity', () => {
    const store = new PriorityFrameStore<string>(4);
    store.add('a', 'high', 1);
    store.add('b', 'low', 2);
    store.add('c', 'normal', 3);
    store.add('d', 'low', 4);

    expect(store.setCapacity(2)).toEqual(['b', 'd']);
    expect(store.capacity).toBe(2);
    expect(store.size()).toBe(2);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new PriorityFrameStore<string>(0)).toThrow(
      'priorityFrameStore.capacity must be a positive integer.',
    );
    expect(() => new PriorityFrameStore<string>(2).setCapacity(-1)).toThrow(
      'priorityFrameStore.capacity must be a positive integer.',
    );
  });
});
