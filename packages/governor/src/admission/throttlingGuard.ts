export const THROTTLE_WINDOW_SIZE = 10;
export const THROTTLE_LATENCY_FACTOR = 1.5;

export type ThrottleReason = 'memory' | 'latency';

export interface ThrottleState {
  throttling: boolean;
  reason: ThrottleReason | null;
  memoryBytes: number;
  recentAverageMs: number;
}

export interface ThrottlingGuardDeps {
  readMemoryBytes: () => number;
  /** Mean of the newest `n` completed-analysis durations, 0 when none. */
  recentAverageMs: (n: number) => number;
  maxMemoryBytes: () => number;
  targetBudgetMs: () => number;
}

/**
 * Short-window emergency brake: memory over the ceiling, or the last 10
 * durations averaging over 1.5x budget.
 */
export class ThrottlingGuard {
  constructor(private readonly deps: ThrottlingGuardDeps) {}

  public evaluate(): ThrottleState {
    const memoryBytes = this.deps.readMemoryBytes();
    const recentAverageMs = this.deps.recentAverageMs(THROTTLE_WINDOW_SIZE);

    let reason: ThrottleReason | null = null;
    if (memoryBytes > this.deps.maxMemoryBytes()) {
      reason = 'memory';
    } else if (recentAverageMs > this.deps.targetBudgetMs() * THROTTLE_LATENCY_FACTOR) {
      reason = 'latency';
    }

    return {
      throttling: reason !== null,
      reason,
      memoryBytes,
      recentAverageMs,
    };
  }

  public isThrottling(): boolean {
    return this.evaluate().throttling;
  }
}
