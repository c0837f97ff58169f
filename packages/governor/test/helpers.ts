import { vi } from 'vitest';

import type { Clock } from '../src/platform/clock.js';
import type { MemoryProbe } from '../src/platform/memoryProbe.js';

export class FakeClock implements Clock {
  constructor(public current = 1_000) {}

  public now(): number {
    return this.current;
  }

  public advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}

export class FakeMemoryProbe implements MemoryProbe {
  constructor(public bytes = 50 * 1024 * 1024) {}

  public residentMemoryBytes(): number {
    return this.bytes;
  }
}

export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
}
