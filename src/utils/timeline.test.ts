import { describe, expect, it } from 'vitest';

import type { CountEvent } from '../types';
import { analyzeTimeline, buildCountTimeline, formatTimestamp } from './timeline';

function event(timestamp: number, counter: string): CountEvent {
  return {
    timestamp,
    line: 'line-1',
    counter,
    direction: counter === 'down' ? 'increasing_y' : 'decreasing_y',
    trackId: null,
    position: { x: 0, y: 0 },
    mode: 'untracked'
  };
}

describe('buildCountTimeline', () => {
  it('groups events into fixed buckets and skips empty ones', () => {
    const timeline = buildCountTimeline(
      [event(130, 'down'), event(5, 'down'), event(59.9, 'up'), event(60, 'down')],
      ['down', 'up'],
      60
    );

    expect(timeline).toEqual([
      { startSeconds: 0, endSeconds: 60, counters: { down: 1, up: 1 }, total: 2 },
      { startSeconds: 60, endSeconds: 120, counters: { down: 1, up: 0 }, total: 1 },
      { startSeconds: 120, endSeconds: 180, counters: { down: 1, up: 0 }, total: 1 }
    ]);
  });

  it('returns nothing without events', () => {
    expect(buildCountTimeline([], ['down'])).toEqual([]);
  });
});

describe('analyzeTimeline', () => {
  it('finds the busiest bucket and the average', () => {
    const timeline = buildCountTimeline([event(1, 'down'), event(2, 'up'), event(70, 'up')], ['down', 'up'], 60);
    const analysis = analyzeTimeline(timeline);

    expect(analysis.activeBuckets).toBe(2);
    expect(analysis.averagePerBucket).toBe(1.5);
    expect(analysis.peakBucket?.startSeconds).toBe(0);
  });
});

describe('formatTimestamp', () => {
  it('formats minutes and seconds', () => {
    expect(formatTimestamp(0)).toBe('0:00');
    expect(formatTimestamp(125.7)).toBe('2:05');
  });
});
