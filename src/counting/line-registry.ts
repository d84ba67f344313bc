import { ConfigurationError } from '../errors';
import type { CountingLine, FallbackRule, LineSpec } from '../types';

export const DEFAULT_FALLBACK_RULE: FallbackRule = {
  strategy: 'horizontal_split',
  splitRatio: 0.5,
  left: 'increasing_y',
  right: 'decreasing_y'
};

export type ConfigureOutcome = 'pending' | 'resolved' | 'unchanged' | 'reconfigured';

/**
 * 水平カウントラインの一覧。
 *
 * ラインの y 座標はフレームの高さから決まる。設定時に高さが分からない場合は
 * 定義だけ保持し、最初のフレームで {@link LineRegistry.resolve} が確定させる。
 */
export class LineRegistry {
  private specs: LineSpec[] | null = null;
  private defaultTolerance = 0;
  private frameHeight: number | null = null;
  private resolved: CountingLine[] | null = null;

  get isConfigured(): boolean {
    return this.specs !== null;
  }

  get isResolved(): boolean {
    return this.resolved !== null;
  }

  get lines(): readonly CountingLine[] {
    return this.resolved ?? [];
  }

  configure(frameHeight: number | null, specs: LineSpec[], defaultTolerance: number): ConfigureOutcome {
    validateLineSpecs(specs, defaultTolerance);
    if (frameHeight !== null) {
      validateFrameHeight(frameHeight);
    }

    const previous = this.resolved;
    this.specs = specs.map(spec => ({ ...spec }));
    this.defaultTolerance = defaultTolerance;

    // 高さ未指定の再設定では、既に確定した高さを使い続ける
    const height = frameHeight ?? this.frameHeight;
    if (height === null) {
      this.resolved = null;
      return 'pending';
    }

    this.frameHeight = height;
    this.resolved = buildLines(this.specs, height, defaultTolerance);

    if (previous === null) {
      return 'resolved';
    }
    return sameLines(previous, this.resolved) ? 'unchanged' : 'reconfigured';
  }

  /** 保留中のラインを最初のフレームの高さで確定する。確定済みなら何もしない */
  resolve(frameHeight: number): boolean {
    if (this.resolved !== null || this.specs === null) {
      return false;
    }
    validateFrameHeight(frameHeight);
    this.frameHeight = frameHeight;
    this.resolved = buildLines(this.specs, frameHeight, this.defaultTolerance);
    return true;
  }
}

function validateFrameHeight(frameHeight: number): void {
  if (!Number.isFinite(frameHeight) || frameHeight <= 0) {
    throw new ConfigurationError(`Frame height must be a positive number, got ${frameHeight}`);
  }
}

export function validateLineSpecs(specs: LineSpec[], defaultTolerance: number): void {
  if (specs.length === 0) {
    throw new ConfigurationError('At least one counting line is required');
  }

  const names = new Set<string>();
  specs.forEach((spec, index) => {
    const name = lineName(spec, index);
    if (names.has(name)) {
      throw new ConfigurationError(`Duplicate counting line name: ${name}`);
    }
    names.add(name);

    if (!Number.isFinite(spec.ratio) || spec.ratio < 0 || spec.ratio > 1) {
      throw new ConfigurationError(`Line "${name}" ratio must be between 0 and 1, got ${spec.ratio}`);
    }

    const tolerance = spec.tolerance ?? defaultTolerance;
    if (!Number.isInteger(tolerance) || tolerance < 0) {
      throw new ConfigurationError(`Line "${name}" tolerance must be a non-negative integer, got ${tolerance}`);
    }

    if (spec.fallback?.strategy === 'horizontal_split') {
      const { splitRatio } = spec.fallback;
      if (!Number.isFinite(splitRatio) || splitRatio < 0 || splitRatio > 1) {
        throw new ConfigurationError(`Line "${name}" fallback splitRatio must be between 0 and 1, got ${splitRatio}`);
      }
    }
  });
}

function lineName(spec: LineSpec, index: number): string {
  return spec.name ?? `line-${index + 1}`;
}

function buildLines(specs: LineSpec[], frameHeight: number, defaultTolerance: number): CountingLine[] {
  return specs.map((spec, index) => ({
    name: lineName(spec, index),
    ratio: spec.ratio,
    positionY: Math.round(frameHeight * spec.ratio),
    tolerance: spec.tolerance ?? defaultTolerance,
    rule: { ...spec.rule },
    fallback: spec.fallback ?? DEFAULT_FALLBACK_RULE
  }));
}

function sameLines(a: readonly CountingLine[], b: readonly CountingLine[]): boolean {
  return a.length === b.length && a.every((line, i) => JSON.stringify(line) === JSON.stringify(b[i]));
}
