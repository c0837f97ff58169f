import type { QualityLevel } from '../quality/qualityLevels.js';

export type AdmissionRejection = 'interval' | 'concurrency' | 'throttled';

export type AdmissionDecision =
  | { admitted: true }
  | { admitted: false; reason: AdmissionRejection };

export interface AdmissionControllerDeps {
  currentLevel: () => QualityLevel;
  /** Only consulted when the first two checks pass. */
  isThrottling: () => boolean;
}

export class AdmissionController {
  private lastAdmittedMs: number | null = null;

  private inFlight = 0;

  constructor(private readonly deps: AdmissionControllerDeps) {}

  public get inFlightCount(): number {
    return this.inFlight;
  }

  public get lastAdmittedAtMs(): number | null {
    return this.lastAdmittedMs;
  }

  public evaluate(nowMs: number): AdmissionDecision {
    const level = this.deps.currentLevel();

    if (this.lastAdmittedMs !== null && nowMs - this.lastAdmittedMs < level.minAnalysisIntervalMs) {
      return { admitted: false, reason: 'interval' };
    }

    if (this.inFlight >= level.maxConcurrentAnalyzers) {
      return { admitted: false, reason: 'concurrency' };
    }

    if (this.deps.isThrottling()) {
      return { admitted: false, reason: 'throttled' };
    }

    return { admitted: true };
  }

  public shouldAdmit(nowMs: number): boolean {
    return this.evaluate(nowMs).admitted;
  }

  public beginAdmission(nowMs: number): void {
    this.lastAdmittedMs = nowMs;
    this.inFlight += 1;
  }

  /** Frees one in-flight slot; unmatched calls stop at zero. */
  public release(): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
  }

  public reset(): void {
    this.lastAdmittedMs = null;
    this.inFlight = 0;
  }
}
