import type { CountedBy, Point, TrackState } from '../types';

export class TrackStore {
  private tracks = new Map<number, TrackState>();

  get size(): number {
    return this.tracks.size;
  }

  get(trackId: number): Readonly<TrackState> | undefined {
    return this.tracks.get(trackId);
  }

  /**
   * 位置を更新し、同じ ID の直前の位置を返す（初出なら null）
   */
  upsert(trackId: number, position: Point, time: number): Point | null {
    const existing = this.tracks.get(trackId);
    if (!existing) {
      this.tracks.set(trackId, {
        trackId,
        lastCenter: { ...position },
        counted: false,
        countedBy: null,
        firstSeen: time,
        lastSeen: time
      });
      return null;
    }

    const previous = existing.lastCenter;
    existing.lastCenter = { ...position };
    existing.lastSeen = time;
    return previous;
  }

  markCounted(trackId: number, countedBy: CountedBy): void {
    const track = this.tracks.get(trackId);
    if (!track || track.counted) return;
    track.counted = true;
    track.countedBy = countedBy;
  }

  evictStale(now: number, timeoutSeconds: number): number[] {
    const evicted: number[] = [];
    for (const [trackId, track] of this.tracks) {
      if (now - track.lastSeen > timeoutSeconds) {
        evicted.push(trackId);
      }
    }
    for (const trackId of evicted) {
      this.tracks.delete(trackId);
    }
    return evicted;
  }

  clear(): void {
    this.tracks.clear();
  }
}
