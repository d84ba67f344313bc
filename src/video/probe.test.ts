import { describe, expect, it } from 'vitest';

import { parseFrameRate } from './probe';

describe('parseFrameRate', () => {
  it('parses ffprobe rational frame rates', () => {
    expect(parseFrameRate('30/1')).toBe(30);
    expect(parseFrameRate('30000/1001')).toBeCloseTo(29.97, 2);
    expect(parseFrameRate('25')).toBe(25);
  });

  it('returns null for missing or unusable rates', () => {
    expect(parseFrameRate(undefined)).toBeNull();
    expect(parseFrameRate('0/0')).toBeNull();
    expect(parseFrameRate('abc')).toBeNull();
  });
});
