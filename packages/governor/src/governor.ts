import { AdaptiveController, type AdaptiveAction } from './admission/adaptiveController.js';
import {
  AdmissionController,
  type AdmissionDecision,
} from './admission/admissionController.js';
import { ThrottlingGuard, type ThrottleState } from './admission/throttlingGuard.js';
import {
  parseGovernorConfig,
  parseSettingsPatch,
  type GovernorConfig,
  type GovernorConfigInput,
  type GovernorSettingsPatch,
} from './config.js';
import {
  MetricsAggregator,
  normalizeDuration,
  type GovernorSnapshot,
} from './metrics/metricsAggregator.js';
import { monotonicClock, type Clock } from './platform/clock.js';
import { processMemoryProbe, SafeMemoryReader, type MemoryProbe } from './platform/memoryProbe.js';
import type { FramePriority } from './priority.js';
import type { QualityLevel, QualityLevelName } from './quality/qualityLevels.js';
import { QualityStateMachine, type QualityTransition } from './quality/qualityStateMachine.js';
import { PriorityFrameStore } from './store/priorityFrameStore.js';

export interface FrameGovernorDeps {
  clock?: Clock;
  memoryProbe?: MemoryProbe;
}

function formatMs(value: number): string {
  return `${value.toFixed(1)}ms`;
}

/**
 * Frame admission and adaptive-quality governor for one capture pipeline.
 *
 * Bookkeeping methods are synchronous and bounded (only `trackAnalysis`
 * awaits, and only the caller's analysis), so on the event loop each call
 * runs to completion before any other caller sees its state. Store, counters
 * and metric windows live in separate objects and are never mutated together
 * except by `reset`.
 */
export class FrameGovernor<THandle = unknown> {
  private settings: GovernorConfig;

  private readonly clock: Clock;

  private readonly memory: SafeMemoryReader;

  private readonly quality: QualityStateMachine;

  private readonly store: PriorityFrameStore<THandle>;

  private readonly metrics = new MetricsAggregator();

  private readonly throttle: ThrottlingGuard;

  private readonly admission: AdmissionController;

  private readonly adaptive: AdaptiveController;

  constructor(config: GovernorConfigInput = {}, deps: FrameGovernorDeps = {}) {
    this.settings = parseGovernorConfig(config);
    this.clock = deps.clock ?? monotonicClock;
    this.memory = new SafeMemoryReader(deps.memoryProbe ?? processMemoryProbe);

    this.quality = new QualityStateMachine({
      initialLevel: this.settings.initialQualityLevel,
      onTransition: (transition) => this.logTransition(transition),
    });
    this.store = new PriorityFrameStore<THandle>(this.settings.capacity);

    this.throttle = new ThrottlingGuard({
      readMemoryBytes: () => this.memory.read(),
      recentAverageMs: (n) => this.metrics.recentAverage(n),
      maxMemoryBytes: () => this.settings.maxMemoryBytes,
      targetBudgetMs: () => this.settings.targetBudgetMs,
    });

    this.admission = new AdmissionController({
      currentLevel: () => this.quality.config,
      isThrottling: () => this.settings.resourceThrottling && this.throttle.isThrottling(),
    });

    this.adaptive = new AdaptiveController({
      quality: this.quality,
      targetBudgetMs: () => this.settings.targetBudgetMs,
      enabled: () => this.settings.adaptiveQuality,
    });
  }

  public get config(): Readonly<GovernorConfig> {
    return this.settings;
  }

  public get qualityLevel(): QualityLevelName {
    return this.quality.level;
  }

  public get qualityConfig(): QualityLevel {
    return this.quality.config;
  }

  public get inFlightCount(): number {
    return this.admission.inFlightCount;
  }

  public get queueDepth(): number {
    return this.store.size();
  }

  public now(): number {
    return this.clock.now();
  }

  /**
   * Applies a partial settings update. Shrinking the capacity evicts frames;
   * the evicted handles are returned so the capture source can release them.
   */
  public configure(patch: GovernorSettingsPatch): THandle[] {
    const parsed = parseSettingsPatch(patch);
    this.settings = { ...this.settings, ...parsed };

    let evicted: THandle[] = [];
    if (parsed.capacity !== undefined && parsed.capacity !== this.store.capacity) {
      evicted = this.store.setCapacity(parsed.capacity);
      for (let i = 0; i < evicted.length; i += 1) {
        this.discardAdmitted();
      }
    }

    console.log(
      `[governor] configured: targetFrameRate=${this.settings.targetFrameRate} ` +
        `budget=${formatMs(this.settings.targetBudgetMs)} ` +
        `maxMemory=${Math.round(this.settings.maxMemoryBytes / (1024 * 1024))}MB ` +
        `capacity=${this.settings.capacity}`,
    );

    return evicted;
  }

  public setQualityLevel(level: QualityLevelName): void {
    if (this.quality.set(level)) {
      this.adaptive.reset();
    }
  }

  public evaluateAdmission(nowMs: number = this.clock.now()): AdmissionDecision {
    return this.admission.evaluate(nowMs);
  }

  public shouldAdmit(nowMs: number = this.clock.now()): boolean {
    return this.admission.shouldAdmit(nowMs);
  }

  public beginAdmission(nowMs: number = this.clock.now()): void {
    this.admission.beginAdmission(nowMs);
  }

  /** `shouldAdmit` followed by `beginAdmission` when it passes. */
  public tryAdmit(nowMs: number = this.clock.now()): AdmissionDecision {
    const decision = this.admission.evaluate(nowMs);
    if (decision.admitted) {
      this.admission.beginAdmission(nowMs);
    }

    return decision;
  }

  public endAnalysis(durationMs: number): AdaptiveAction {
    this.admission.release();

    const sample = normalizeDuration(durationMs);
    const windowAverage = this.metrics.recordAnalysis(sample);
    if (windowAverage !== null && this.settings.performanceLogging) {
      console.log(`[governor] avg processing time (last 30 frames): ${formatMs(windowAverage)}`);
    }

    return this.adaptive.record(sample, this.admission.inFlightCount);
  }

  /**
   * Counts a frame the caller decided not to analyze. Admission rejections
   * are not counted automatically.
   */
  public recordDroppedFrame(): void {
    this.metrics.recordDroppedFrame();
  }

  /**
   * Queues an admitted frame. When the store overflows, the evicted frame is
   * counted as dropped, its in-flight slot is released, and its handle is
   * returned for the capture source to release.
   */
  public addFrame(
    handle: THandle,
    timestampMs: number = this.clock.now(),
    priority: FramePriority = 'normal',
  ): THandle | null {
    const evicted = this.store.add(handle, priority, timestampMs);
    if (evicted !== null) {
      this.discardAdmitted();
    }

    return evicted;
  }

  public takeNextFrame(): THandle | null {
    return this.store.takeNext();
  }

  /**
   * Runs one analysis and reports its duration, whether it resolves or
   * rejects. The admission slot must already be held.
   */
  public async trackAnalysis<T>(analysis: () => Promise<T>): Promise<T> {
    const startedAt = this.clock.now();
    try {
      return await analysis();
    } finally {
      this.endAnalysis(this.clock.now() - startedAt);
    }
  }

  public throttleState(): ThrottleState {
    return this.throttle.evaluate();
  }

  public snapshot(): GovernorSnapshot {
    const throttle = this.throttle.evaluate();

    return this.metrics.snapshot({
      targetFrameRate: this.settings.targetFrameRate,
      memoryBytes: throttle.memoryBytes,
      qualityLevel: this.quality.level,
      isThrottling: this.settings.resourceThrottling && throttle.throttling,
      inFlightCount: this.admission.inFlightCount,
      queueDepth: this.store.size(),
    });
  }

  /**
   * Clears counters, windows and queued frames; the quality level is kept.
   * Returns the handles that were still queued.
   */
  public reset(): THandle[] {
    const cleared = this.store.clear();
    this.metrics.reset();
    this.adaptive.reset();
    this.admission.reset();
    console.log('[governor] performance metrics reset');
    return cleared;
  }

  private discardAdmitted(): void {
    this.admission.release();
    this.metrics.recordDroppedFrame();
  }

  private logTransition(transition: QualityTransition): void {
    if (transition.cause === 'manual') {
      console.log(`[governor] quality level set to: ${transition.to}`);
      return;
    }

    const verb = transition.cause === 'increase' ? 'increased' : 'decreased';
    console.log(`[governor] quality ${verb} to: ${transition.to} (from ${transition.from})`);
  }
}
