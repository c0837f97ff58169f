import { RollingWindow } from '../metrics/rollingWindow.js';
import type { QualityStateMachine } from '../quality/qualityStateMachine.js';

export const ADAPTIVE_WINDOW_SIZE = 30;
export const DEGRADE_FACTOR = 1.2;
export const RECOVER_FACTOR = 0.6;

export type AdaptiveAction = 'increase' | 'decrease' | 'hold' | 'collecting' | 'disabled';

export interface AdaptiveControllerOptions {
  quality: QualityStateMachine;
  targetBudgetMs: () => number;
  enabled: () => boolean;
}

/**
 * Slow quality trim. A decision is taken only once a full window of samples
 * has been gathered at the current level; any transition starts a new window,
 * so one window can move quality by at most one step.
 */
export class AdaptiveController {
  private readonly window = new RollingWindow(ADAPTIVE_WINDOW_SIZE);

  constructor(private readonly options: AdaptiveControllerOptions) {}

  public get sampleCount(): number {
    return this.window.size;
  }

  public record(durationMs: number, inFlightCount: number): AdaptiveAction {
    if (!this.options.enabled()) {
      return 'disabled';
    }

    this.window.push(durationMs);
    if (!this.window.isFull) {
      return 'collecting';
    }

    const { quality } = this.options;
    const budget = this.options.targetBudgetMs();
    const avg = this.window.average();

    if (avg > budget * DEGRADE_FACTOR) {
      return this.applied(quality.decrease(), 'decrease');
    }

    if (avg < budget * RECOVER_FACTOR && inFlightCount < quality.config.maxConcurrentAnalyzers / 2) {
      return this.applied(quality.increase(), 'increase');
    }

    return 'hold';
  }

  public reset(): void {
    this.window.clear();
  }

  private applied(moved: boolean, action: 'increase' | 'decrease'): AdaptiveAction {
    if (!moved) {
      return 'hold';
    }

    this.window.clear();
    return action;
  }
}
