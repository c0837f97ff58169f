import { describe, expect, it } from 'vitest';

import { MetricsAggregator, type SnapshotInputs } from '../src/metrics/metricsAggregator.js';
import { RollingWindow } from '../src/metrics/rollingWindow.js';

const INPUTS: SnapshotInputs = {
  targetFrameRate: 30,
  memoryBytes: 1_024,
  qualityLevel: 'high',
  isThrottling: false,
  inFlightCount: 0,
  queueDepth: 0,
};

describe('RollingWindow', () => {
  it('averages to 0 when empty', () => {
    const window = new RollingWindow(4);
    expect(window.average()).toBe(0);
    expect(window.average(2)).toBe(0);
  });

  it('drops the oldest samples first and stays bounded', () => {
    const window = new RollingWindow(3);
    for (const value of [1, 2, 3, 4, 5]) {
      window.push(value);
      expect(window.size).toBeLessThanOrEqual(3);
    }

    expect(window.values()).toEqual([3, 4, 5]);
    expect(window.isFull).toBe(true);
    expect(window.average()).toBe(4);
  });

  it('averages only the newest samples when asked', () => {
    const window = new RollingWindow(5);
    for (const value of [10, 20, 30, 40]) {
      window.push(value);
    }

    expect(window.average(2)).toBe(35);
    expect(window.average(10)).toBe(25);
  });

  it('empties on clear', () => {
    const window = new RollingWindow(2);
    window.push(7);
    window.clear();

    expect(window.size).toBe(0);
    expect(window.values()).toEqual([]);
  });
});

describe('MetricsAggregator', () => {
  it('reports zeros without dividing by zero when nothing was recorded', () => {
    const snapshot = new MetricsAggregator().snapshot(INPUTS);

    expect(snapshot.avgProcessingTimeMs).toBe(0);
    expect(snapshot.estimatedFrameRate).toBe(0);
    expect(snapshot.droppedFramePercentage).toBe(0);
    expect(snapshot.totalFrames).toBe(0);
  });

  it('computes the dropped percentage over completed plus dropped frames', () => {
    const metrics = new MetricsAggregator();
    for (let i = 0; i < 85; i += 1) {
      metrics.recordAnalysis(20);
    }
    for (let i = 0; i < 15; i += 1) {
      metrics.recordDroppedFrame();
    }

    const snapshot = metrics.snapshot(INPUTS);
    expect(snapshot.totalFrames).toBe(100);
    expect(snapshot.droppedFrames).toBe(15);
    expect(snapshot.droppedFramePercentage).toBe(15);
  });

  it('caps the estimated frame rate at the target', () => {
    const metrics = new MetricsAggregator();
    metrics.recordAnalysis(10);

    expect(metrics.snapshot(INPUTS).estimatedFrameRate).toBe(30);
  });

  it('derives the frame rate from the average duration when slower than target', () => {
    const metrics = new MetricsAggregator();
    metrics.recordAnalysis(40);
    metrics.recordAnalysis(60);

    const snapshot = metrics.snapshot(INPUTS);
    expect(snapshot.avgProcessingTimeMs).toBe(50);
    expect(snapshot.estimatedFrameRate).toBe(20);
  });

  it('averages only the newest 100 durations', () => {
    const metrics = new MetricsAggregator();
    for (let i = 0; i < 100; i += 1) {
      metrics.recordAnalysis(100);
    }
    for (let i = 0; i < 100; i += 1) {
      metrics.recordAnalysis(10);
    }

    expect(metrics.snapshot(INPUTS).avgProcessingTimeMs).toBe(10);
    expect(metrics.recentSampleCount()).toBe(100);
  });

  it('hands back the 30-frame average on every 30th completion', () => {
    const metrics = new MetricsAggregator();
    const reports: Array<number | null> = [];

    for (let i = 1; i <= 60; i += 1) {
      reports.push(metrics.recordAnalysis(i <= 30 ? 10 : 40));
    }

    expect(reports.filter((report) => report !== null)).toEqual([10, 40]);
    expect(reports[29]).toBe(10);
    expect(reports[59]).toBe(40);
  });

  it('clears counters and windows on reset', () => {
    const metrics = new MetricsAggregator();
    metrics.recordAnalysis(25);
    metrics.recordDroppedFrame();
    metrics.reset();

    const snapshot = metrics.snapshot(INPUTS);
    expect(snapshot.avgProcessingTimeMs).toBe(0);
    expect(snapshot.totalFrames).toBe(0);
    expect(snapshot.droppedFrames).toBe(0);
    expect(snapshot.completedAnalyses).toBe(0);
  });
});
