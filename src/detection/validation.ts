import { z } from 'zod';
import type { Detection, Point } from '../types';

const coordinate = z.number().finite();

export const rawDetectionSchema = z.object({
  box: z
    .tuple([coordinate, coordinate, coordinate, coordinate])
    .refine(([x1, y1, x2, y2]) => x2 >= x1 && y2 >= y1, {
      message: 'box must be [x1, y1, x2, y2] with x2 >= x1 and y2 >= y1'
    }),
  confidence: z.number().min(0).max(1),
  classId: z.number().int(),
  trackId: z.number().int().nullable().optional()
});

export type RawDetection = z.input<typeof rawDetectionSchema>;

export type DetectionParseResult =
  | { ok: true; detection: Detection }
  | { ok: false; reason: string };

export function parseDetection(raw: unknown): DetectionParseResult {
  const parsed = rawDetectionSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, reason };
  }

  const [x1, y1, x2, y2] = parsed.data.box;
  const trackId = parsed.data.trackId;
  return {
    ok: true,
    detection: {
      box: { x1, y1, x2, y2 },
      confidence: parsed.data.confidence,
      classId: parsed.data.classId,
      // -1 は検出器がIDを維持できなかったことを示す
      trackId: trackId === undefined || trackId === null || trackId < 0 ? null : trackId
    }
  };
}

export function detectionCenter(detection: Detection): Point {
  const { x1, y1, x2, y2 } = detection.box;
  return {
    x: Math.floor((x1 + x2) / 2),
    y: Math.floor((y1 + y2) / 2)
  };
}

export function detectionLabel(detection: Detection): string {
  const confidence = detection.confidence.toFixed(2);
  return detection.trackId !== null ? `ID:${detection.trackId} ${confidence}` : `Vehicle ${confidence}`;
}
