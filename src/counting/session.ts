import { mergeCounterConfig } from '../config';
import type { CounterConfigInput } from '../config';
import { detectionCenter, detectionLabel, parseDetection } from '../detection/validation';
import { NotConfiguredError } from '../errors';
import type {
  CountEvent,
  CountSnapshot,
  CounterConfig,
  CountingLine,
  Detection,
  DetectionHint,
  FrameDimensions,
  FrameResult,
  LineHint,
  LineSpec,
  Point,
  ResolvedMode,
  SessionStatistics,
  TrackState
} from '../types';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { Counters } from './counters';
import { detectCrossing, fallbackDirection, isWithinBand } from './crossing';
import { CrossingEventLedger } from './event-ledger';
import { LineRegistry } from './line-registry';
import { RoiFilter } from './roi';
import { TrackStore } from './track-store';

export interface SessionOptions {
  logger?: Logger;
  /** 秒単位。process() にタイムスタンプを渡さなかったときに使う */
  clock?: () => number;
}

interface EligibleDetection {
  detection: Detection;
  center: Point;
  hint: DetectionHint;
}

/**
 * カウントセッション。カウンター、トラック状態、ID なし検出の
 * イベント履歴、カウントラインを保持する（セッション間で共有しない）。
 *
 * トラック ID はそのまま信用する。`trackTimeoutSeconds` 以上見えなかった ID が
 * 再び現れた場合は未カウントの新しいトラックとして扱う。ID を使い回す検出器では
 * 同じ車両が二重にカウントされることがある。
 */
export class CountingSession {
  readonly config: CounterConfig;

  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly registry = new LineRegistry();
  private readonly tracks = new TrackStore();
  private readonly counters = new Counters();
  private readonly ledger: CrossingEventLedger;
  private readonly roi: RoiFilter;
  private readonly eligibleClasses: ReadonlySet<number> | null;

  private mode: ResolvedMode | null;
  private idlessFrames = 0;
  private busy = false;
  private stats: SessionStatistics = {
    framesProcessed: 0,
    detectionsSeen: 0,
    detectionsRejected: 0,
    duplicatesSuppressed: 0,
    tracksEvicted: 0
  };

  constructor(config: CounterConfigInput = {}, options: SessionOptions = {}) {
    this.config = mergeCounterConfig(config);
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.ledger = new CrossingEventLedger({
      windowSeconds: this.config.eventDedupWindowSeconds,
      distancePx: this.config.eventDedupDistancePx
    });
    this.roi = new RoiFilter({
      marginRatio: this.config.roiMarginRatio,
      polygon: this.config.roiPolygon
    });
    this.eligibleClasses = this.config.eligibleClassIds === null ? null : new Set(this.config.eligibleClassIds);
    this.mode = this.config.mode === 'auto' ? null : this.config.mode;
  }

  get resolvedMode(): ResolvedMode | null {
    return this.mode;
  }

  get lines(): readonly CountingLine[] {
    return this.registry.lines;
  }

  get activeTrackCount(): number {
    return this.tracks.size;
  }

  getTrack(trackId: number): Readonly<TrackState> | undefined {
    return this.tracks.get(trackId);
  }

  configure(frameHeight: number | null, lineSpecs: LineSpec[] = this.config.lines): void {
    this.exclusive(() => {
      const outcome = this.registry.configure(frameHeight, lineSpecs, this.config.tolerancePx);
      switch (outcome) {
        case 'pending':
          this.logger.debug('Counting lines will be placed from the first frame height');
          break;
        case 'resolved':
          this.onLinesResolved();
          break;
        case 'reconfigured':
          // 古いライン位置で記録した座標は比較に使えない
          this.tracks.clear();
          this.ledger.clear();
          this.onLinesResolved();
          this.logger.debug('Counting lines moved; track history cleared');
          break;
        case 'unchanged':
          break;
      }
    });
  }

  process(detections: readonly unknown[], frame: FrameDimensions, timestamp: number = this.clock()): FrameResult {
    return this.exclusive(() => this.processFrame(detections, frame, timestamp));
  }

  reset(): void {
    this.exclusive(() => {
      this.counters.reset();
      this.tracks.clear();
      this.ledger.clear();
      this.logger.debug('Counter reset');
    });
  }

  getCounts(): CountSnapshot {
    return this.counters.snapshot();
  }

  getStatistics(): SessionStatistics {
    return { ...this.stats };
  }

  private exclusive<T>(work: () => T): T {
    if (this.busy) {
      throw new Error('CountingSession calls must not overlap');
    }
    this.busy = true;
    try {
      return work();
    } finally {
      this.busy = false;
    }
  }

  private onLinesResolved(): void {
    for (const line of this.registry.lines) {
      this.counters.register([line.rule.increasing_y, line.rule.decreasing_y]);
      this.logger.debug(`Counting line "${line.name}" set at y=${line.positionY} (±${line.tolerance}px)`);
    }
  }

  private processFrame(detections: readonly unknown[], frame: FrameDimensions, now: number): FrameResult {
    if (!this.registry.isConfigured) {
      throw new NotConfiguredError();
    }
    if (!this.registry.isResolved) {
      if (!Number.isFinite(frame.height) || frame.height <= 0) {
        throw new NotConfiguredError(`Cannot place counting lines: frame height is ${frame.height}`);
      }
      this.registry.resolve(frame.height);
      this.onLinesResolved();
    }

    this.collectGarbage(now);
    this.stats.framesProcessed++;

    const hints: DetectionHint[] = [];
    const eligible: EligibleDetection[] = [];

    for (const [index, raw] of detections.entries()) {
      this.stats.detectionsSeen++;
      const parsed = parseDetection(raw);
      if (!parsed.ok) {
        this.stats.detectionsRejected++;
        this.logger.warn(`Skipping malformed detection #${index}: ${parsed.reason}`);
        continue;
      }

      const detection = parsed.detection;
      const center = detectionCenter(detection);
      const hint: DetectionHint = {
        kind: 'detection',
        box: detection.box,
        center,
        label: detectionLabel(detection),
        trackId: detection.trackId,
        eligible: this.isEligible(detection, center, frame),
        counted: false
      };
      hints.push(hint);
      if (hint.eligible) {
        eligible.push({ detection, center, hint });
      }
    }

    if (this.mode === null && eligible.length > 0) {
      this.resolveAutoMode(eligible);
    }

    const events = this.mode === 'tracked'
      ? this.countTracked(eligible, now)
      : this.mode === 'untracked'
        ? this.countUntracked(eligible, frame, now)
        : [];

    const lineHints = this.registry.lines.map((line): LineHint => ({
      kind: 'line',
      name: line.name,
      y: line.positionY,
      tolerance: line.tolerance
    }));

    return {
      ...this.counters.snapshot(),
      annotations: [...lineHints, ...hints],
      events,
      mode: this.mode
    };
  }

  // ID 付きの検出が 1 件でもあれば tracked。ID なしのフレームが続いたときだけ untracked に確定する
  private resolveAutoMode(eligible: EligibleDetection[]): void {
    if (eligible.some(e => e.detection.trackId !== null)) {
      this.mode = 'tracked';
    } else if (++this.idlessFrames >= this.config.autoModeFrames) {
      this.mode = 'untracked';
    } else {
      return;
    }
    this.logger.debug(`Counting mode resolved to ${this.mode}`);
  }

  private isEligible(detection: Detection, center: Point, frame: FrameDimensions): boolean {
    if (this.eligibleClasses !== null && !this.eligibleClasses.has(detection.classId)) return false;
    if (detection.confidence < this.config.minConfidence) return false;
    return this.roi.isEligible(center, frame);
  }

  private collectGarbage(now: number): void {
    const evicted = this.tracks.evictStale(now, this.config.trackTimeoutSeconds);
    if (evicted.length > 0) {
      this.stats.tracksEvicted += evicted.length;
      this.logger.debug(`Evicted stale tracks: ${evicted.join(', ')}`);
    }
    this.ledger.prune(now);
  }

  private countTracked(eligible: EligibleDetection[], now: number): CountEvent[] {
    const events: CountEvent[] = [];
    const seenThisFrame = new Set<number>();

    for (const { detection, center, hint } of eligible) {
      const trackId = detection.trackId;
      if (trackId === null) continue;

      if (seenThisFrame.has(trackId)) {
        this.logger.warn(`Track ID:${trackId} appears more than once in one frame; extra sighting ignored`);
        hint.counted = this.tracks.get(trackId)?.counted ?? false;
        continue;
      }
      seenThisFrame.add(trackId);

      const previous = this.tracks.upsert(trackId, center, now);
      const track = this.tracks.get(trackId);

      if (previous !== null && track && !track.counted) {
        for (const line of this.registry.lines) {
          const direction = detectCrossing(previous.y, center.y, line);
          if (direction === null) continue;

          const counter = line.rule[direction];
          this.counters.increment(counter);
          this.tracks.markCounted(trackId, { line: line.name, counter, direction });
          events.push({
            timestamp: now,
            line: line.name,
            counter,
            direction,
            trackId,
            position: center,
            mode: 'tracked'
          });
          this.logger.debug(`Vehicle ID:${trackId} counted going ${counter} at "${line.name}". Total: ${this.counters.total}`);
          break;
        }
      }

      hint.counted = this.tracks.get(trackId)?.counted ?? false;
    }

    return events;
  }

  // 追跡モードより精度は低く、重複カウントや取りこぼしが起こりうる
  private countUntracked(eligible: EligibleDetection[], frame: FrameDimensions, now: number): CountEvent[] {
    const events: CountEvent[] = [];

    for (const { center, hint } of eligible) {
      const line = this.registry.lines.find(l => isWithinBand(center.y, l));
      if (!line) continue;

      hint.counted = true;
      if (this.ledger.hasRecent(line.name, center.x, now)) {
        this.stats.duplicatesSuppressed++;
        continue;
      }

      const direction = fallbackDirection(line.fallback, center.x, frame.width);
      const counter = line.rule[direction];
      this.counters.increment(counter);
      this.ledger.record({ timestamp: now, position: center, line: line.name, counter });
      events.push({
        timestamp: now,
        line: line.name,
        counter,
        direction,
        trackId: null,
        position: center,
        mode: 'untracked'
      });
      this.logger.debug(`Untracked vehicle counted going ${counter} at "${line.name}". Total: ${this.counters.total}`);
    }

    return events;
  }
}
