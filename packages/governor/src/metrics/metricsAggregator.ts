import type { QualityLevelName } from '../quality/qualityLevels.js';
import { RollingWindow } from './rollingWindow.js';

export const SNAPSHOT_WINDOW_SIZE = 100;
export const LOG_WINDOW_SIZE = 30;

export interface GovernorSnapshot {
  avgProcessingTimeMs: number;
  estimatedFrameRate: number;
  droppedFramePercentage: number;
  currentMemoryUsage: number;
  currentQualityLevel: QualityLevelName;
  isThrottling: boolean;
  inFlightCount: number;
  queueDepth: number;
  totalFrames: number;
  droppedFrames: number;
  completedAnalyses: number;
}

export interface SnapshotInputs {
  targetFrameRate: number;
  memoryBytes: number;
  qualityLevel: QualityLevelName;
  isThrottling: boolean;
  inFlightCount: number;
  queueDepth: number;
}

/** Non-finite or negative durations count as 0. */
export function normalizeDuration(durationMs: number): number {
  return Number.isFinite(durationMs) && durationMs > 0 ? durationMs : 0;
}

export class MetricsAggregator {
  private readonly snapshotWindow = new RollingWindow(SNAPSHOT_WINDOW_SIZE);

  private readonly logWindow = new RollingWindow(LOG_WINDOW_SIZE);

  private completed = 0;

  private dropped = 0;

  /**
   * Returns the average of the last 30 durations when this completion is a
   * multiple of 30, otherwise null.
   */
  public recordAnalysis(durationMs: number): number | null {
    const sample = normalizeDuration(durationMs);
    this.snapshotWindow.push(sample);
    this.logWindow.push(sample);
    this.completed += 1;

    if (this.completed % LOG_WINDOW_SIZE !== 0) {
      return null;
    }

    return this.logWindow.average();
  }

  public recordDroppedFrame(): void {
    this.dropped += 1;
  }

  public get totalFrames(): number {
    return this.completed + this.dropped;
  }

  public get droppedFrames(): number {
    return this.dropped;
  }

  public get completedAnalyses(): number {
    return this.completed;
  }

  public recentAverage(lastN: number): number {
    return this.snapshotWindow.average(lastN);
  }

  public recentSampleCount(): number {
    return this.snapshotWindow.size;
  }

  public snapshot(inputs: SnapshotInputs): GovernorSnapshot {
    const avgProcessingTimeMs = this.snapshotWindow.average();
    const rawFrameRate = avgProcessingTimeMs > 0 ? 1_000 / avgProcessingTimeMs : 0;
    const total = this.totalFrames;

    return {
      avgProcessingTimeMs,
      estimatedFrameRate: Math.min(rawFrameRate, inputs.targetFrameRate),
      droppedFramePercentage: total > 0 ? (this.dropped * 100) / total : 0,
      currentMemoryUsage: inputs.memoryBytes,
      currentQualityLevel: inputs.qualityLevel,
      isThrottling: inputs.isThrottling,
      inFlightCount: inputs.inFlightCount,
      queueDepth: inputs.queueDepth,
      totalFrames: total,
      droppedFrames: this.dropped,
      completedAnalyses: this.completed,
    };
  }

  public reset(): void {
    this.snapshotWindow.clear();
    this.logWindow.clear();
    this.completed = 0;
    this.dropped = 0;
  }
}
