export interface Point {
  x: number;
  y: number;
}

export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface FrameDimensions {
  width: number;
  height: number;
}

// trackId は検出器が同一性を保てなかった場合 null
export interface Detection {
  box: BoundingBox;
  confidence: number;
  classId: number;
  trackId: number | null;
}

export type Direction = 'increasing_y' | 'decreasing_y';

export type CrossingRule = Record<Direction, string>;

export type FallbackRule =
  | { strategy: 'fixed'; direction: Direction }
  | { strategy: 'horizontal_split'; splitRatio: number; left: Direction; right: Direction };

export interface LineSpec {
  name?: string;
  ratio: number;
  tolerance?: number;
  rule: CrossingRule;
  fallback?: FallbackRule;
}

export interface CountingLine {
  name: string;
  ratio: number;
  positionY: number;
  tolerance: number;
  rule: CrossingRule;
  fallback: FallbackRule;
}

export type CountingMode = 'tracked' | 'untracked' | 'auto';

export type ResolvedMode = Exclude<CountingMode, 'auto'>;

export interface CounterConfig {
  lines: LineSpec[];
  tolerancePx: number;
  trackTimeoutSeconds: number;
  roiMarginRatio: number;
  /** フレーム幅・高さに対する比率で指定した頂点。指定時は端マージンより優先 */
  roiPolygon: Point[] | null;
  eventDedupWindowSeconds: number;
  eventDedupDistancePx: number;
  /** null なら全クラスを対象にする */
  eligibleClassIds: number[] | null;
  minConfidence: number;
  mode: CountingMode;
  /** auto モードで、ID なしの検出が続いたフレーム数がこれに達したら untracked に確定する */
  autoModeFrames: number;
}

export interface CountedBy {
  line: string;
  counter: string;
  direction: Direction;
}

export interface TrackState {
  trackId: number;
  lastCenter: Point;
  counted: boolean;
  countedBy: CountedBy | null;
  firstSeen: number;
  lastSeen: number;
}

export interface CrossingEvent {
  timestamp: number;
  position: Point;
  line: string;
  counter: string;
}

export interface CountEvent {
  timestamp: number;
  line: string;
  counter: string;
  direction: Direction;
  trackId: number | null;
  position: Point;
  mode: ResolvedMode;
}

export interface CountSnapshot {
  counters: Record<string, number>;
  total: number;
}

export interface LineHint {
  kind: 'line';
  name: string;
  y: number;
  tolerance: number;
}

export interface DetectionHint {
  kind: 'detection';
  box: BoundingBox;
  center: Point;
  label: string;
  trackId: number | null;
  eligible: boolean;
  counted: boolean;
}

export type DrawHint = LineHint | DetectionHint;

export interface FrameResult extends CountSnapshot {
  annotations: DrawHint[];
  events: CountEvent[];
  mode: ResolvedMode | null;
}

export interface SessionStatistics {
  framesProcessed: number;
  detectionsSeen: number;
  detectionsRejected: number;
  duplicatesSuppressed: number;
  tracksEvicted: number;
}

export interface ProcessingOptions {
  inputPatterns: string[];
  outputPath: string | null;
  videoPath: string | null;
  fps: number | null;
  frameSize: FrameDimensions | null;
  bucketSeconds: number;
  config: CounterConfig;
  dryRun: boolean;
  debug: boolean;
}
