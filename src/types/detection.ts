import { z } from 'zod';
import type { CounterConfig, CountEvent, CountSnapshot } from './index';

// 個々の検出は CountingSession 側で検証する（不正な検出はスキップ）
export const frameRecordSchema = z.object({
  frameNumber: z.number().int().nonnegative().optional(),
  timestamp: z.number().nonnegative().optional(),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  detections: z.array(z.unknown())
});

export type FrameRecord = z.infer<typeof frameRecordSchema>;

export const detectionLogSchema = z.object({
  version: z.string().optional(),
  source: z.string().optional(),
  fps: z.number().positive().optional(),
  frameWidth: z.number().int().positive().optional(),
  frameHeight: z.number().int().positive().optional(),
  frames: z.array(frameRecordSchema)
});

export type DetectionLog = z.infer<typeof detectionLogSchema>;

export type DetectionLogHeader = Omit<DetectionLog, 'frames'>;

export interface TimelineBucket {
  startSeconds: number;
  endSeconds: number;
  counters: Record<string, number>;
  total: number;
}

export interface CountReport {
  version: string;
  inputFile: string;
  createdAt: string;
  configuration: CounterConfig;
  statistics: {
    totalFrames: number;
    durationSeconds: number;
    detectionsSeen: number;
    detectionsRejected: number;
    duplicatesSuppressed: number;
    tracksEvicted: number;
    countEvents: number;
    interrupted: boolean;
  };
  counts: CountSnapshot;
  timeline: TimelineBucket[];
  events: CountEvent[];
}
