import { describe, expect, it } from 'vitest';

import { RoiFilter, isPointInPolygon } from './roi';

const frame = { width: 640, height: 480 };

describe('RoiFilter', () => {
  it('excludes centers inside the edge margin', () => {
    const roi = new RoiFilter({ marginRatio: 0.05, polygon: null });

    expect(roi.isEligible({ x: 320, y: 240 }, frame)).toBe(true);
    expect(roi.isEligible({ x: 31, y: 240 }, frame)).toBe(false);
    expect(roi.isEligible({ x: 32, y: 240 }, frame)).toBe(true);
    expect(roi.isEligible({ x: 609, y: 240 }, frame)).toBe(false);
    expect(roi.isEligible({ x: 320, y: 23 }, frame)).toBe(false);
    expect(roi.isEligible({ x: 320, y: 457 }, frame)).toBe(false);
  });

  it('keeps centers that sit exactly on the margin boundary', () => {
    const roi = new RoiFilter({ marginRatio: 0.05, polygon: null });

    expect(roi.isEligible({ x: 32, y: 24 }, frame)).toBe(true);
    expect(roi.isEligible({ x: 608, y: 456 }, frame)).toBe(true);
    expect(roi.isEligible({ x: 608.5, y: 240 }, frame)).toBe(false);
    expect(roi.isEligible({ x: 320, y: 23.5 }, frame)).toBe(false);
  });

  it('accepts everything with a zero margin', () => {
    const roi = new RoiFilter({ marginRatio: 0, polygon: null });
    expect(roi.isEligible({ x: 0, y: 0 }, frame)).toBe(true);
  });

  it('uses the polygon in frame ratios when one is configured', () => {
    const lowerHalf = [
      { x: 0, y: 0.5 },
      { x: 1, y: 0.5 },
      { x: 1, y: 1 },
      { x: 0, y: 1 }
    ];
    const roi = new RoiFilter({ marginRatio: 0.05, polygon: lowerHalf });

    expect(roi.isEligible({ x: 320, y: 400 }, frame)).toBe(true);
    expect(roi.isEligible({ x: 320, y: 100 }, frame)).toBe(false);
  });
});

describe('isPointInPolygon', () => {
  it('handles a concave polygon', () => {
    const ell = [
      { x: 0, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 1 },
      { x: 1, y: 1 },
      { x: 1, y: 2 },
      { x: 0, y: 2 }
    ];
    expect(isPointInPolygon({ x: 0.5, y: 1.5 }, ell)).toBe(true);
    expect(isPointInPolygon({ x: 1.5, y: 1.5 }, ell)).toBe(false);
  });
});
