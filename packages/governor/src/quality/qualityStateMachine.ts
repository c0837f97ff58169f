import {
  QUALITY_LEVEL_ORDER,
  QUALITY_LEVELS,
  qualityRank,
  type QualityLevel,
  type QualityLevelName,
} from './qualityLevels.js';

export type QualityTransitionCause = 'increase' | 'decrease' | 'manual';

export interface QualityTransition {
  from: QualityLevelName;
  to: QualityLevelName;
  cause: QualityTransitionCause;
}

export interface QualityStateMachineOptions {
  initialLevel?: QualityLevelName;
  onTransition?: (transition: QualityTransition) => void;
}

/**
 * Ordered low < medium < high < ultra. Adaptive moves are one step at a time;
 * only `set` may jump.
 */
export class QualityStateMachine {
  private current: QualityLevelName;

  private readonly onTransition?: (transition: QualityTransition) => void;

  constructor(options: QualityStateMachineOptions = {}) {
    this.current = options.initialLevel ?? 'high';
    this.onTransition = options.onTransition;
  }

  public get level(): QualityLevelName {
    return this.current;
  }

  public get config(): QualityLevel {
    return QUALITY_LEVELS[this.current];
  }

  public increase(): boolean {
    return this.step(1, 'increase');
  }

  public decrease(): boolean {
    return this.step(-1, 'decrease');
  }

  public set(level: QualityLevelName): boolean {
    if (level === this.current) {
      return false;
    }

    const from = this.current;
    this.current = level;
    this.onTransition?.({ from, to: level, cause: 'manual' });
    return true;
  }

  private step(delta: 1 | -1, cause: QualityTransitionCause): boolean {
    const next = QUALITY_LEVEL_ORDER[qualityRank(this.current) + delta];
    if (next === undefined) {
      return false;
    }

    const from = this.current;
    this.current = next;
    this.onTransition?.({ from, to: next, cause });
    return true;
  }
}
