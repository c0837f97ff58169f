import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { cosmiconfigSync } from 'cosmiconfig';
import { z, type ZodError } from 'zod';

import { ConfigurationInvalidError } from './errors.js';
import { QUALITY_LEVEL_ORDER } from './quality/qualityLevels.js';

const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

export const DEFAULT_MAX_MEMORY_BYTES = 200 * 1024 * 1024;

const PositiveNumberSchema = z.number().finite().positive('must be a positive number');
const PositiveIntegerSchema = z.number().int().positive('must be a positive integer');

export const QualityLevelNameSchema = z.enum(QUALITY_LEVEL_ORDER);

const MonitorConfigSchema = z.object({
  enabled: z.boolean().default(true),
  intervalMs: PositiveIntegerSchema.default(5_000),
  droppedFrameWarningPct: z.number().min(0).max(100).default(10),
  memoryWarningRatio: z.number().gt(0).max(1).default(0.8),
});

export const GovernorConfigSchema = z.object({
  targetFrameRate: PositiveNumberSchema.default(30),
  targetBudgetMs: PositiveNumberSchema.default(33),
  maxMemoryBytes: PositiveIntegerSchema.default(DEFAULT_MAX_MEMORY_BYTES),
  capacity: PositiveIntegerSchema.default(5),
  initialQualityLevel: QualityLevelNameSchema.default('high'),
  adaptiveQuality: z.boolean().default(true),
  resourceThrottling: z.boolean().default(true),
  performanceLogging: z.boolean().default(true),
  monitor: MonitorConfigSchema.default({
    enabled: true,
    intervalMs: 5_000,
    droppedFrameWarningPct: 10,
    memoryWarningRatio: 0.8,
  }),
});

export type GovernorConfig = z.infer<typeof GovernorConfigSchema>;
export type GovernorConfigInput = z.input<typeof GovernorConfigSchema>;
export type MonitorConfig = GovernorConfig['monitor'];

/**
 * Runtime-tunable subset accepted by `FrameGovernor.configure`.
 */
export const GovernorSettingsPatchSchema = z
  .object({
    targetFrameRate: PositiveNumberSchema,
    targetBudgetMs: PositiveNumberSchema,
    maxMemoryBytes: PositiveIntegerSchema,
    capacity: PositiveIntegerSchema,
    adaptiveQuality: z.boolean(),
    resourceThrottling: z.boolean(),
    performanceLogging: z.boolean(),
  })
  .partial()
  .strict();

export type GovernorSettingsPatch = z.infer<typeof GovernorSettingsPatchSchema>;

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseGovernorConfig(input: unknown, source = '(inline)'): GovernorConfig {
  const parsed = GovernorConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigurationInvalidError(source, formatIssues(parsed.error));
  }

  return parsed.data;
}

function dropUndefined(input: unknown): unknown {
  if (!input || typeof input !== 'object' || Array.isArray(input)) {
    return input;
  }

  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

export function parseSettingsPatch(input: unknown): GovernorSettingsPatch {
  const parsed = GovernorSettingsPatchSchema.safeParse(dropUndefined(input));
  if (!parsed.success) {
    throw new ConfigurationInvalidError('configure()', formatIssues(parsed.error));
  }

  return parsed.data;
}

export interface LoadGovernorConfigOptions {
  searchFrom?: string;
}

export function loadGovernorConfig(options: LoadGovernorConfigOptions = {}): GovernorConfig {
  const searchFrom = options.searchFrom ?? packageRoot;
  const explorer = cosmiconfigSync('governor', {
    searchPlaces: ['governor.config.local.json', 'governor.config.json'],
    stopDir: searchFrom,
  });

  const result = explorer.search(searchFrom);

  if (!result || result.isEmpty) {
    return parseGovernorConfig({}, '(defaults)');
  }

  return parseGovernorConfig(result.config, result.filepath);
}
