import { parseArgs } from 'node:util';

import { loadGovernorConfig } from './config.js';
import { FrameGovernor } from './governor.js';
import { GovernorMonitor } from './monitor.js';
import { AnalysisPipeline, type FrameAnalyzer } from './pipeline/analysisPipeline.js';
import type { FramePriority } from './priority.js';
import { isQualityLevelName, QUALITY_LEVELS, type QualityLevel } from './quality/qualityLevels.js';

interface SyntheticFrame {
  id: number;
  capturedAtMs: number;
}

const REFERENCE_PIXELS =
  QUALITY_LEVELS.high.targetResolution.width * QUALITY_LEVELS.high.targetResolution.height;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function parsePositive(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`[bench] --${name} must be a positive number (got "${raw}")`);
  }

  return value;
}

/** Cost scales with the level's analysis resolution. */
function syntheticAnalyzer(name: string, baseCostMs: number): FrameAnalyzer<SyntheticFrame, number> {
  return {
    name,
    async analyze(_frame: SyntheticFrame, level: QualityLevel): Promise<number> {
      const pixels = level.targetResolution.width * level.targetResolution.height;
      const costMs = baseCostMs * (pixels / REFERENCE_PIXELS);
      await sleep(costMs);
      return costMs;
    },
  };
}

function priorityFor(frameId: number): FramePriority {
  if (frameId % 10 === 0) {
    return 'high';
  }

  return frameId % 3 === 0 ? 'low' : 'normal';
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      'duration-ms': { type: 'string' },
      'capture-fps': { type: 'string' },
      'cost-ms': { type: 'string' },
      level: { type: 'string' },
    },
  });

  const durationMs = parsePositive('duration-ms', values['duration-ms'], 15_000);
  const captureFps = parsePositive('capture-fps', values['capture-fps'], 60);
  const baseCostMs = parsePositive('cost-ms', values['cost-ms'], 45);

  const config = loadGovernorConfig();
  const governor = new FrameGovernor<SyntheticFrame>(config);

  if (values.level !== undefined) {
    if (!isQualityLevelName(values.level)) {
      throw new Error(`[bench] --level must be one of low, medium, high, ultra (got "${values.level}")`);
    }

    governor.setQualityLevel(values.level);
  }

  const monitor = new GovernorMonitor(governor, config.monitor);
  if (config.monitor.enabled) {
    monitor.start();
  }

  let released = 0;
  const pipeline = new AnalysisPipeline<SyntheticFrame, number>(governor, {
    analyzers: [
      syntheticAnalyzer('exposure', baseCostMs * 0.5),
      syntheticAnalyzer('focus', baseCostMs * 0.8),
      syntheticAnalyzer('composition', baseCostMs),
    ],
    onRelease: () => {
      released += 1;
    },
  });

  console.log(
    `[bench] capturing at ${captureFps}fps for ${durationMs}ms (analyzer cost ${baseCostMs}ms at high)`,
  );

  let nextFrameId = 0;
  const captureTimer = setInterval(() => {
    const capturedAtMs = governor.now();
    const frame: SyntheticFrame = { id: nextFrameId, capturedAtMs };
    pipeline.offer(frame, priorityFor(frame.id), capturedAtMs);
    nextFrameId += 1;
  }, 1_000 / captureFps);

  let shutdownInFlight: Promise<void> | null = null;

  const shutdown = (reason: string): Promise<void> => {
    if (shutdownInFlight) {
      return shutdownInFlight;
    }

    shutdownInFlight = (async () => {
      console.log(`[bench] stopping (${reason})...`);
      clearInterval(captureTimer);
      await pipeline.idle();
      monitor.stop();

      const snapshot = governor.snapshot();
      console.log(`[bench] frames offered=${nextFrameId} released=${released}`);
      console.log(JSON.stringify(snapshot, null, 2));
    })();

    return shutdownInFlight;
  };

  const handleSignal = (signal: NodeJS.Signals): void => {
    if (shutdownInFlight) {
      console.error(`[bench] received ${signal} during shutdown; forcing exit`);
      process.exit(130);
    }

    shutdown(signal)
      .then(() => {
        process.exit(0);
      })
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[bench] shutdown failed: ${message}`);
        process.exit(1);
      });
  };

  process.on('SIGINT', handleSignal);
  process.on('SIGTERM', handleSignal);

  await sleep(durationMs);
  await shutdown('duration elapsed');
  process.off('SIGINT', handleSignal);
  process.off('SIGTERM', handleSignal);
}

main().catch((error: unknown) => {
  if (error instanceof Error) {
    console.error(`[bench] fatal error: ${error.message}`);
  } else {
    console.error(`[bench] fatal error: ${String(error)}`);
  }

  process.exitCode = 1;
});
