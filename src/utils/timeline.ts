import type { CountEvent } from '../types';
import type { TimelineBucket } from '../types/detection';

export function buildCountTimeline(
  events: CountEvent[],
  counterNames: string[],
  bucketSeconds: number = 60
): TimelineBucket[] {
  if (events.length === 0) return [];

  // 時間順にソート
  const sortedEvents = [...events].sort((a, b) => a.timestamp - b.timestamp);
  const buckets = new Map<number, TimelineBucket>();

  for (const event of sortedEvents) {
    const index = Math.floor(event.timestamp / bucketSeconds);
    let bucket = buckets.get(index);
    if (!bucket) {
      bucket = {
        startSeconds: index * bucketSeconds,
        endSeconds: (index + 1) * bucketSeconds,
        counters: Object.fromEntries(counterNames.map(name => [name, 0])),
        total: 0
      };
      buckets.set(index, bucket);
    }
    bucket.counters[event.counter] = (bucket.counters[event.counter] ?? 0) + 1;
    bucket.total++;
  }

  return [...buckets.values()];
}

export function analyzeTimeline(timeline: TimelineBucket[]): {
  activeBuckets: number;
  averagePerBucket: number;
  peakBucket: TimelineBucket | null;
} {
  if (timeline.length === 0) {
    return { activeBuckets: 0, averagePerBucket: 0, peakBucket: null };
  }

  const peakBucket = timeline.reduce((best, current) => current.total > best.total ? current : best);
  const totalCount = timeline.reduce((sum, bucket) => sum + bucket.total, 0);

  return {
    activeBuckets: timeline.length,
    averagePerBucket: totalCount / timeline.length,
    peakBucket
  };
}

export function formatTimestamp(seconds: number): string {
  return `${Math.floor(seconds / 60)}:${String(Math.floor(seconds % 60)).padStart(2, '0')}`;
}
