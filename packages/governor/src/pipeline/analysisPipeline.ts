import type { AdmissionDecision } from '../admission/admissionController.js';
import type { FrameGovernor } from '../governor.js';
import type { FramePriority } from '../priority.js';
import type { QualityLevel } from '../quality/qualityLevels.js';

export interface FrameAnalyzer<TFrame, TResult> {
  name: string;
  analyze(frame: TFrame, level: QualityLevel): Promise<TResult>;
}

export interface AnalyzerOutcome<TResult> {
  analyzer: string;
  result: TResult;
}

export interface AnalysisReport<TFrame, TResult> {
  frame: TFrame;
  level: QualityLevel;
  durationMs: number;
  outcomes: AnalyzerOutcome<TResult>[];
}

export interface AnalysisPipelineOptions<TFrame, TResult> {
  analyzers: FrameAnalyzer<TFrame, TResult>[];
  onResult?: (report: AnalysisReport<TFrame, TResult>) => void;
  onError?: (analyzer: string, error: unknown, frame: TFrame) => void;
  /** Called once for every offered frame the pipeline is done with. */
  onRelease?: (frame: TFrame) => void;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Boundary between the capture source and the analyzer pool. Offers are
 * synchronous; analyses run as promises, never more at once than the
 * current quality level allows.
 */
export class AnalysisPipeline<TFrame, TResult> {
  private readonly analyzers: FrameAnalyzer<TFrame, TResult>[];

  private readonly onResult?: (report: AnalysisReport<TFrame, TResult>) => void;

  private readonly onError?: (analyzer: string, error: unknown, frame: TFrame) => void;

  private readonly onRelease?: (frame: TFrame) => void;

  private readonly running = new Set<Promise<void>>();

  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly governor: FrameGovernor<TFrame>,
    options: AnalysisPipelineOptions<TFrame, TResult>,
  ) {
    if (options.analyzers.length === 0) {
      throw new Error('analysisPipeline.analyzers must contain at least one analyzer.');
    }

    this.analyzers = [...options.analyzers];
    this.onResult = options.onResult;
    this.onError = options.onError;
    this.onRelease = options.onRelease;
  }

  public get activeAnalyses(): number {
    return this.running.size;
  }

  /**
   * Rejected frames count as dropped and are released immediately.
   */
  public offer(
    frame: TFrame,
    priority: FramePriority = 'normal',
    timestampMs: number = this.governor.now(),
  ): AdmissionDecision {
    const decision = this.governor.tryAdmit(timestampMs);
    if (!decision.admitted) {
      this.governor.recordDroppedFrame();
      this.onRelease?.(frame);
      return decision;
    }

    const evicted = this.governor.addFrame(frame, timestampMs, priority);
    if (evicted !== null) {
      this.onRelease?.(evicted);
    }

    this.drain();
    return decision;
  }

  /** Resolves once nothing is running and no frame is queued. */
  public idle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.running.size === 0 && this.governor.queueDepth === 0;
  }

  private drain(): void {
    while (this.running.size < this.governor.qualityConfig.maxConcurrentAnalyzers) {
      const frame = this.governor.takeNextFrame();
      if (frame === null) {
        break;
      }

      const task: Promise<void> = this.analyze(frame)
        .catch((error: unknown) => {
          console.error(`[governor] analysis handler failed: ${describeError(error)}`);
        })
        .finally(() => {
          this.running.delete(task);
          this.drain();
          this.notifyIdle();
        });
      this.running.add(task);
    }
  }

  private async analyze(frame: TFrame): Promise<void> {
    const level = this.governor.qualityConfig;
    const startedAt = this.governor.now();

    const settled = await Promise.allSettled(
      this.analyzers.map((analyzer) => Promise.resolve().then(() => analyzer.analyze(frame, level))),
    );

    const durationMs = this.governor.now() - startedAt;
    this.governor.endAnalysis(durationMs);

    try {
      const outcomes: AnalyzerOutcome<TResult>[] = [];
      settled.forEach((result, index) => {
        const analyzer = this.analyzers[index].name;
        if (result.status === 'fulfilled') {
          outcomes.push({ analyzer, result: result.value });
          return;
        }

        if (this.onError) {
          this.onError(analyzer, result.reason, frame);
        } else {
          console.error(`[governor] analyzer ${analyzer} failed: ${describeError(result.reason)}`);
        }
      });

      this.onResult?.({ frame, level, durationMs, outcomes });
    } finally {
      this.onRelease?.(frame);
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle()) {
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
