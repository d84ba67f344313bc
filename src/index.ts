#!/usr/bin/env node

import path from 'path';
import { createCLI, resolveProcessingOptions } from './cli';
import type { CliOptions } from './cli';
import { CountingSession } from './counting/session';
import { DetectionLogSource, frameTimestamp } from './source/detection-log';
import type { CountEvent, FrameDimensions, ProcessingOptions } from './types';
import type { CountReport, DetectionLogHeader, FrameRecord } from './types/detection';
import { generateOutputPath, resolveInputFiles, writeJsonFile } from './utils/file';
import { createConsoleLogger } from './utils/logger';
import { analyzeTimeline, buildCountTimeline, formatTimestamp } from './utils/timeline';
import { VideoProbe } from './video/probe';
import type { VideoInfo } from './video/probe';

const DEFAULT_FPS = 30;
const PROGRESS_INTERVAL = 50;

async function main(): Promise<void> {
  const program = createCLI();

  program.action(async (inputs: string[], options: CliOptions) => {
    try {
      console.log('🚗 Traffic Line Counter を開始します...');
      const processingOptions = await resolveProcessingOptions(inputs, options);
      await processAll(processingOptions);
    } catch (error) {
      console.error('❌ エラーが発生しました:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

  await program.parseAsync();
}

async function processAll(options: ProcessingOptions): Promise<void> {
  const files = await resolveInputFiles(options.inputPatterns);
  if (files.length === 0) {
    throw new Error(`No detection logs (.json / .jsonl) found for: ${options.inputPatterns.join(', ')}`);
  }

  let videoInfo: VideoInfo | null = null;
  if (options.videoPath) {
    console.log(`🎞️  動画情報を取得中: ${options.videoPath}`);
    videoInfo = await new VideoProbe().getVideoInfo(options.videoPath);
    console.log(`   - フレームサイズ: ${videoInfo.dimensions.width}x${videoInfo.dimensions.height}`);
    console.log(`   - フレームレート: ${videoInfo.fps.toFixed(2)} fps`);
  }

  // Ctrl+C ではフレームの区切りで停止し、それまでの結果を保存する
  const stop = { requested: false };
  const onSigint = () => {
    console.log('\n⏹️  停止要求を受け付けました。現在のフレームで終了します...');
    stop.requested = true;
  };
  process.once('SIGINT', onSigint);

  try {
    for (const file of files) {
      if (stop.requested) break;
      const outputPath = resolveOutputPath(file, options.outputPath, files.length);
      await processDetectionLog(file, outputPath, options, videoInfo, stop);
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

function resolveOutputPath(inputFile: string, output: string | null, fileCount: number): string {
  if (output === null) return generateOutputPath(inputFile);
  if (fileCount === 1) return output;
  return path.join(output, path.basename(generateOutputPath(inputFile)));
}

async function processDetectionLog(
  inputFile: string,
  outputPath: string,
  options: ProcessingOptions,
  videoInfo: VideoInfo | null,
  stop: { requested: boolean }
): Promise<void> {
  console.log(`\n📂 検出ログ: ${inputFile}`);

  const source = await DetectionLogSource.open(inputFile);
  const logger = createConsoleLogger(options.debug);
  const session = new CountingSession(options.config, { logger });

  const fps = source.header.fps ?? options.fps ?? videoInfo?.fps ?? DEFAULT_FPS;
  const fallbackSize = headerFrameSize(source.header) ?? options.frameSize ?? videoInfo?.dimensions ?? null;
  session.configure(fallbackSize?.height ?? null);

  const events: CountEvent[] = [];
  let lastTimestamp = 0;
  let interrupted = false;

  try {
    console.log('🔍 カウント処理中...');
    for (;;) {
      if (stop.requested) {
        interrupted = true;
        break;
      }

      const result = await source.next();
      if (result.status === 'end') {
        console.log(`✅ ${result.framesRead} フレームを処理しました`);
        break;
      }

      const dimensions = frameDimensions(result.frame, fallbackSize);
      if (dimensions === null) {
        throw new Error(
          `Frame ${result.index} has no frame size; pass --frame-size or --video, or record width/height in the log`
        );
      }

      lastTimestamp = frameTimestamp(result.frame, result.index, fps);
      const frameResult = session.process(result.frame.detections, dimensions, lastTimestamp);
      events.push(...frameResult.events);

      for (const event of frameResult.events) {
        const who = event.trackId !== null ? `ID:${event.trackId}` : '(ID なし)';
        logger.info(`   🚙 ${formatTimestamp(event.timestamp)} ${who} → ${event.counter} [${event.line}]`);
      }

      if ((result.index + 1) % PROGRESS_INTERVAL === 0) {
        console.log(`   処理済み: ${result.index + 1} フレーム (合計 ${frameResult.total} 台)`);
      }
    }
  } finally {
    source.close();
  }

  const counts = session.getCounts();
  const statistics = session.getStatistics();
  const timeline = buildCountTimeline(events, Object.keys(counts.counters), options.bucketSeconds);
  const timelineAnalysis = analyzeTimeline(timeline);

  console.log(`📊 カウント結果 (${session.resolvedMode ?? '未確定'} モード):`);
  for (const [name, value] of Object.entries(counts.counters)) {
    console.log(`   - ${name}: ${value}`);
  }
  console.log(`   - 合計: ${counts.total}`);
  if (statistics.detectionsRejected > 0) {
    console.log(`   ⚠️  不正な検出をスキップ: ${statistics.detectionsRejected} 件`);
  }
  if (timelineAnalysis.peakBucket) {
    const peak = timelineAnalysis.peakBucket;
    console.log(`   - ピーク: ${formatTimestamp(peak.startSeconds)} から ${peak.total} 台`);
    console.log(`   - 平均: ${timelineAnalysis.averagePerBucket.toFixed(1)} 台 / ${options.bucketSeconds} 秒`);
  }

  if (options.dryRun) {
    console.log('🔍 ドライランモードのため、レポートは保存しません。');
    return;
  }

  const report: CountReport = {
    version: '1.0.0',
    inputFile: path.resolve(inputFile),
    createdAt: new Date().toISOString(),
    configuration: session.config,
    statistics: {
      totalFrames: statistics.framesProcessed,
      durationSeconds: lastTimestamp,
      detectionsSeen: statistics.detectionsSeen,
      detectionsRejected: statistics.detectionsRejected,
      duplicatesSuppressed: statistics.duplicatesSuppressed,
      tracksEvicted: statistics.tracksEvicted,
      countEvents: events.length,
      interrupted
    },
    counts,
    timeline,
    events
  };

  await writeJsonFile(outputPath, report);
  console.log(`✅ レポートを保存しました: ${outputPath}`);
}

function headerFrameSize(header: DetectionLogHeader): FrameDimensions | null {
  if (header.frameWidth === undefined || header.frameHeight === undefined) return null;
  return { width: header.frameWidth, height: header.frameHeight };
}

function frameDimensions(frame: FrameRecord, fallback: FrameDimensions | null): FrameDimensions | null {
  if (frame.width !== undefined && frame.height !== undefined) {
    return { width: frame.width, height: frame.height };
  }
  return fallback;
}

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
