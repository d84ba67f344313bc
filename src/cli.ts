import { Command } from 'commander';
import { loadConfigFile, mergeCounterConfig } from './config';
import type { CounterConfigInput } from './config';
import { validateLineSpecs } from './counting/line-registry';
import { ConfigurationError } from './errors';
import type { CountingMode, FrameDimensions, LineSpec, ProcessingOptions } from './types';

export interface CliOptions {
  output?: string;
  config?: string;
  line?: string[];
  tolerance?: string;
  trackTimeout?: string;
  roiMargin?: string;
  dedupWindow?: string;
  dedupDistance?: string;
  classes?: string;
  minConfidence?: string;
  mode?: string;
  autoModeFrames?: string;
  fps?: string;
  frameSize?: string;
  video?: string;
  bucket: string;
  dryRun: boolean;
  debug: boolean;
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('traffic-count')
    .description('Count vehicles crossing virtual lines in recorded object detections')
    .version('1.0.0');

  program
    .argument('<detections...>', 'Detection log files (.json / .jsonl) or glob patterns')
    .option('-o, --output <path>', 'Output report path (a directory when several logs are given)')
    .option('-c, --config <path>', 'JSON config file with counter settings')
    .option('-l, --line <ratio...>', 'Counting line position(s) as a ratio of frame height (default: 0.5)')
    .option('-t, --tolerance <pixels>', 'Tolerance band around each line in pixels (default: 15)')
    .option('--track-timeout <seconds>', 'Forget tracks unseen for this long (default: 2)')
    .option('--roi-margin <ratio>', 'Ignore detections within this edge margin (default: 0.05)')
    .option('--dedup-window <seconds>', 'Untracked mode: suppress repeats within this time (default: 1)')
    .option('--dedup-distance <pixels>', 'Untracked mode: suppress repeats within this horizontal distance (default: 50)')
    .option('--classes <ids>', 'Comma separated class ids counted as vehicles, or "all" (default: 0,5,7)')
    .option('--min-confidence <value>', 'Minimum detection confidence (0-1, default: 0.3)')
    .option('-m, --mode <mode>', 'Counting mode: tracked, untracked or auto (default: auto)')
    .option('--auto-mode-frames <count>', 'Auto mode: id-less frames before falling back to untracked (default: 30)')
    .option('--fps <value>', 'Frame rate used when frames carry no timestamp (default: 30)')
    .option('--frame-size <WxH>', 'Frame size when the log does not record it, e.g. 1280x720')
    .option('--video <path>', 'Source video to read frame size and frame rate from')
    .option('--bucket <seconds>', 'Timeline bucket size in seconds (default: 60)', '60')
    .option('--dry-run', 'Print counts without writing a report', false)
    .option('--debug', 'Log every counted vehicle and line placement', false);

  return program;
}

export async function resolveProcessingOptions(inputs: string[], options: CliOptions): Promise<ProcessingOptions> {
  const fileConfig: CounterConfigInput = options.config ? await loadConfigFile(options.config) : {};
  const cliConfig: CounterConfigInput = {
    lines: options.line ? parseLines(options.line) : undefined,
    tolerancePx: parseOptionalNumber(options.tolerance, 'Tolerance'),
    trackTimeoutSeconds: parseOptionalNumber(options.trackTimeout, 'Track timeout'),
    roiMarginRatio: parseOptionalNumber(options.roiMargin, 'ROI margin'),
    eventDedupWindowSeconds: parseOptionalNumber(options.dedupWindow, 'Dedup window'),
    eventDedupDistancePx: parseOptionalNumber(options.dedupDistance, 'Dedup distance'),
    eligibleClassIds: options.classes !== undefined ? parseClassIds(options.classes) : undefined,
    minConfidence: parseOptionalNumber(options.minConfidence, 'Minimum confidence'),
    mode: options.mode !== undefined ? parseMode(options.mode) : undefined,
    autoModeFrames: parseOptionalNumber(options.autoModeFrames, 'Auto mode frames')
  };

  const config = mergeCounterConfig(fileConfig, cliConfig);
  validateLineSpecs(config.lines, config.tolerancePx);

  const fps = parseOptionalNumber(options.fps, 'FPS') ?? null;
  if (fps !== null && fps <= 0) {
    throw new ConfigurationError('FPS must be a positive number');
  }

  const bucketSeconds = parseFloat(options.bucket);
  if (isNaN(bucketSeconds) || bucketSeconds <= 0) {
    throw new ConfigurationError('Bucket seconds must be a positive number');
  }

  return {
    inputPatterns: inputs,
    outputPath: options.output ?? null,
    videoPath: options.video ?? null,
    fps,
    frameSize: options.frameSize !== undefined ? parseFrameSize(options.frameSize) : null,
    bucketSeconds,
    config,
    dryRun: options.dryRun,
    debug: options.debug
  };
}

function parseOptionalNumber(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || isNaN(parsed)) {
    throw new ConfigurationError(`${label} must be a number, got "${value}"`);
  }
  return parsed;
}

function parseLines(ratios: string[]): LineSpec[] {
  return ratios.map((value, index) => ({
    name: `line-${index + 1}`,
    ratio: parseOptionalNumber(value, 'Line ratio') ?? NaN,
    rule: { increasing_y: 'down', decreasing_y: 'up' }
  }));
}

export function parseClassIds(value: string): number[] | null {
  if (value.trim().toLowerCase() === 'all') return null;
  return value.split(',').map(part => {
    const id = Number(part.trim());
    if (part.trim() === '' || !Number.isInteger(id)) {
      throw new ConfigurationError(`Class ids must be integers, got "${part}"`);
    }
    return id;
  });
}

function parseMode(value: string): CountingMode {
  if (value === 'tracked' || value === 'untracked' || value === 'auto') {
    return value;
  }
  throw new ConfigurationError(`Mode must be tracked, untracked or auto, got "${value}"`);
}

export function parseFrameSize(value: string): FrameDimensions {
  const match = /^(\d+)x(\d+)$/i.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Frame size must look like 1280x720, got "${value}"`);
  }
  const width = parseInt(match[1], 10);
  const height = parseInt(match[2], 10);
  if (width === 0 || height === 0) {
    throw new ConfigurationError('Frame size must be positive');
  }
  return { width, height };
}
