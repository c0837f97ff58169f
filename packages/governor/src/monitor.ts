import type { MonitorConfig } from './config.js';
import type { GovernorSnapshot } from './metrics/metricsAggregator.js';

export interface MonitoredGovernor {
  snapshot(): GovernorSnapshot;
  readonly config: { readonly maxMemoryBytes: number };
}

export interface MonitorWarning {
  kind: 'dropped-frames' | 'memory' | 'throttling';
  message: string;
}

export interface GovernorMonitorOptions extends Partial<Omit<MonitorConfig, 'enabled'>> {
  onSnapshot?: (snapshot: GovernorSnapshot, warnings: MonitorWarning[]) => void;
}

const BYTES_PER_MB = 1024 * 1024;

/**
 * Periodic health check that runs off the capture path: pulls a snapshot on
 * a timer and warns about drop rate, memory headroom and throttling.
 */
export class GovernorMonitor {
  private readonly intervalMs: number;

  private readonly droppedFrameWarningPct: number;

  private readonly memoryWarningRatio: number;

  private readonly onSnapshot?: (snapshot: GovernorSnapshot, warnings: MonitorWarning[]) => void;

  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly governor: MonitoredGovernor,
    options: GovernorMonitorOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? 5_000;
    this.droppedFrameWarningPct = options.droppedFrameWarningPct ?? 10;
    this.memoryWarningRatio = options.memoryWarningRatio ?? 0.8;
    this.onSnapshot = options.onSnapshot;
  }

  public get running(): boolean {
    return this.timer !== null;
  }

  public start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.checkOnce();
    }, this.intervalMs);

    this.timer.unref?.();
  }

  public stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
  }

  public checkOnce(): MonitorWarning[] {
    const snapshot = this.governor.snapshot();
    const warnings: MonitorWarning[] = [];

    if (snapshot.droppedFramePercentage > this.droppedFrameWarningPct) {
      warnings.push({
        kind: 'dropped-frames',
        message: `high dropped frame rate: ${snapshot.droppedFramePercentage.toFixed(1)}%`,
      });
    }

    const memoryLimit = this.governor.config.maxMemoryBytes * this.memoryWarningRatio;
    if (snapshot.currentMemoryUsage > memoryLimit) {
      warnings.push({
        kind: 'memory',
        message: `memory usage approaching limit: ${Math.round(snapshot.currentMemoryUsage / BYTES_PER_MB)}MB`,
      });
    }

    if (snapshot.isThrottling) {
      warnings.push({
        kind: 'throttling',
        message: `throttling admissions (avg ${snapshot.avgProcessingTimeMs.toFixed(1)}ms, quality ${snapshot.currentQualityLevel})`,
      });
    }

    for (const warning of warnings) {
      console.warn(`[governor] ${warning.message}`);
    }

    this.onSnapshot?.(snapshot, warnings);
    return warnings;
  }
}
