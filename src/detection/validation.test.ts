import { describe, expect, it } from 'vitest';

import { detectionCenter, detectionLabel, parseDetection } from './validation';

describe('parseDetection', () => {
  it('accepts a well-formed detection', () => {
    expect(parseDetection({ box: [10, 20, 30, 41], confidence: 0.5, classId: 7, trackId: 3 })).toEqual({
      ok: true,
      detection: { box: { x1: 10, y1: 20, x2: 30, y2: 41 }, confidence: 0.5, classId: 7, trackId: 3 }
    });
  });

  it.each([
    ['missing', undefined],
    ['null', null],
    ['-1', -1]
  ])('normalises a %s track id to null', (_label, trackId) => {
    const result = parseDetection({ box: [0, 0, 1, 1], confidence: 1, classId: 0, trackId });
    expect(result.ok && result.detection.trackId).toBeNull();
  });

  it('rejects a detection without a box', () => {
    expect(parseDetection({ confidence: 0.9, classId: 0 })).toEqual({ ok: false, reason: 'box: Required' });
  });

  it('rejects an inverted box', () => {
    const result = parseDetection({ box: [30, 20, 10, 40], confidence: 0.9, classId: 0 });
    expect(result).toEqual({ ok: false, reason: 'box: box must be [x1, y1, x2, y2] with x2 >= x1 and y2 >= y1' });
  });

  it('rejects confidence outside [0, 1] and fractional class ids', () => {
    expect(parseDetection({ box: [0, 0, 1, 1], confidence: 1.5, classId: 0 }).ok).toBe(false);
    expect(parseDetection({ box: [0, 0, 1, 1], confidence: 0.5, classId: 1.5 }).ok).toBe(false);
    expect(parseDetection('car').ok).toBe(false);
  });
});

describe('detectionCenter', () => {
  it('floors the box midpoint', () => {
    const detection = { box: { x1: 10, y1: 20, x2: 31, y2: 41 }, confidence: 1, classId: 0, trackId: null };
    expect(detectionCenter(detection)).toEqual({ x: 20, y: 30 });
  });
});

describe('detectionLabel', () => {
  it('shows the track id when there is one', () => {
    const box = { x1: 0, y1: 0, x2: 1, y2: 1 };
    expect(detectionLabel({ box, confidence: 0.876, classId: 0, trackId: 12 })).toBe('ID:12 0.88');
    expect(detectionLabel({ box, confidence: 0.3, classId: 0, trackId: null })).toBe('Vehicle 0.30');
  });
});
