import fs from 'fs-extra';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { CounterConfig, LineSpec } from './types';

export const DEFAULT_LINE: LineSpec = {
  name: 'center',
  ratio: 0.5,
  rule: { increasing_y: 'down', decreasing_y: 'up' }
};

export const DEFAULT_COUNTER_CONFIG: CounterConfig = {
  lines: [DEFAULT_LINE],
  tolerancePx: 15,
  trackTimeoutSeconds: 2.0,
  roiMarginRatio: 0.05,
  roiPolygon: null,
  eventDedupWindowSeconds: 1.0,
  eventDedupDistancePx: 50,
  // car / bus / truck として学習したモデルのクラスID
  eligibleClassIds: [0, 5, 7],
  minConfidence: 0.3,
  mode: 'auto',
  autoModeFrames: 30
};

const directionSchema = z.enum(['increasing_y', 'decreasing_y']);

const fallbackRuleSchema = z.discriminatedUnion('strategy', [
  z.object({ strategy: z.literal('fixed'), direction: directionSchema }),
  z.object({
    strategy: z.literal('horizontal_split'),
    splitRatio: z.number(),
    left: directionSchema,
    right: directionSchema
  })
]);

// 範囲チェックは LineRegistry が行う（ここでクランプしない）
export const lineSpecSchema = z.object({
  name: z.string().min(1).optional(),
  ratio: z.number(),
  tolerance: z.number().optional(),
  rule: z.object({ increasing_y: z.string().min(1), decreasing_y: z.string().min(1) }),
  fallback: fallbackRuleSchema.optional()
});

const pointSchema = z.object({ x: z.number(), y: z.number() });

export const counterConfigSchema = z
  .object({
    lines: z.array(lineSpecSchema),
    tolerancePx: z.number(),
    trackTimeoutSeconds: z.number(),
    roiMarginRatio: z.number(),
    roiPolygon: z.array(pointSchema).nullable(),
    eventDedupWindowSeconds: z.number(),
    eventDedupDistancePx: z.number(),
    eligibleClassIds: z.array(z.number().int()).nullable(),
    minConfidence: z.number(),
    mode: z.enum(['tracked', 'untracked', 'auto']),
    autoModeFrames: z.number()
  })
  .partial()
  .strict();

export type CounterConfigInput = z.infer<typeof counterConfigSchema>;

// 配列・オブジェクトはコピーして返す（セッション間やデフォルト値と共有しない）
export function mergeCounterConfig(...layers: CounterConfigInput[]): CounterConfig {
  const merged: CounterConfig = { ...DEFAULT_COUNTER_CONFIG };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  const config: CounterConfig = {
    ...merged,
    lines: merged.lines.map(copyLineSpec),
    roiPolygon: merged.roiPolygon === null ? null : merged.roiPolygon.map(point => ({ ...point })),
    eligibleClassIds: merged.eligibleClassIds === null ? null : [...merged.eligibleClassIds]
  };
  validateCounterConfig(config);
  return config;
}

function copyLineSpec(spec: LineSpec): LineSpec {
  return {
    ...spec,
    rule: { ...spec.rule },
    ...(spec.fallback !== undefined ? { fallback: { ...spec.fallback } } : {})
  };
}

export function validateCounterConfig(config: CounterConfig): void {
  if (!Number.isInteger(config.tolerancePx) || config.tolerancePx < 0) {
    throw new ConfigurationError(`tolerancePx must be a non-negative integer, got ${config.tolerancePx}`);
  }
  if (!Number.isFinite(config.trackTimeoutSeconds) || config.trackTimeoutSeconds <= 0) {
    throw new ConfigurationError(`trackTimeoutSeconds must be positive, got ${config.trackTimeoutSeconds}`);
  }
  if (!Number.isFinite(config.roiMarginRatio) || config.roiMarginRatio < 0 || config.roiMarginRatio >= 0.5) {
    throw new ConfigurationError(`roiMarginRatio must be in [0, 0.5), got ${config.roiMarginRatio}`);
  }
  if (!Number.isFinite(config.eventDedupWindowSeconds) || config.eventDedupWindowSeconds < 0) {
    throw new ConfigurationError(`eventDedupWindowSeconds must be non-negative, got ${config.eventDedupWindowSeconds}`);
  }
  if (!Number.isFinite(config.eventDedupDistancePx) || config.eventDedupDistancePx < 0) {
    throw new ConfigurationError(`eventDedupDistancePx must be non-negative, got ${config.eventDedupDistancePx}`);
  }
  if (!Number.isFinite(config.minConfidence) || config.minConfidence < 0 || config.minConfidence > 1) {
    throw new ConfigurationError(`minConfidence must be between 0 and 1, got ${config.minConfidence}`);
  }
  if (!Number.isInteger(config.autoModeFrames) || config.autoModeFrames < 1) {
    throw new ConfigurationError(`autoModeFrames must be a positive integer, got ${config.autoModeFrames}`);
  }
  if (config.roiPolygon !== null) {
    if (config.roiPolygon.length < 3) {
      throw new ConfigurationError('roiPolygon needs at least 3 points');
    }
    const outside = config.roiPolygon.find(p => p.x < 0 || p.x > 1 || p.y < 0 || p.y > 1);
    if (outside) {
      throw new ConfigurationError(`roiPolygon points must be ratios in [0, 1], got (${outside.x}, ${outside.y})`);
    }
  }
}

export async function loadConfigFile(configPath: string): Promise<CounterConfigInput> {
  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    throw new ConfigurationError(
      `Could not read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = counterConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid config file ${configPath}: ${issues.join('; ')}`);
  }
  return parsed.data;
}
