export const QUALITY_LEVEL_ORDER = ['low', 'medium', 'high', 'ultra'] as const;

export type QualityLevelName = (typeof QUALITY_LEVEL_ORDER)[number];

export interface Resolution {
  width: number;
  height: number;
}

export interface QualityLevel {
  readonly level: QualityLevelName;
  readonly targetResolution: Readonly<Resolution>;
  readonly maxConcurrentAnalyzers: number;
  readonly minAnalysisIntervalMs: number;
}

function defineLevel(
  level: QualityLevelName,
  width: number,
  height: number,
  maxConcurrentAnalyzers: number,
  analysisFps: number,
): QualityLevel {
  return Object.freeze({
    level,
    targetResolution: Object.freeze({ width, height }),
    maxConcurrentAnalyzers,
    minAnalysisIntervalMs: 1_000 / analysisFps,
  });
}

export const QUALITY_LEVELS: Readonly<Record<QualityLevelName, QualityLevel>> = Object.freeze({
  low: defineLevel('low', 320, 240, 2, 10),
  medium: defineLevel('medium', 640, 480, 3, 15),
  high: defineLevel('high', 1280, 720, 4, 20),
  ultra: defineLevel('ultra', 1920, 1080, 6, 30),
});

export function qualityRank(level: QualityLevelName): number {
  return QUALITY_LEVEL_ORDER.indexOf(level);
}

export function isQualityLevelName(value: unknown): value is QualityLevelName {
  return QUALITY_LEVEL_ORDER.some((level) => level === value);
}
