import type { CrossingEvent } from '../types';

export interface EventWindow {
  windowSeconds: number;
  distancePx: number;
}

/**
 * ID なしモードのカウント履歴。ライン付近に留まる同じ物体の重複カウント抑制にだけ使う
 */
export class CrossingEventLedger {
  private events: CrossingEvent[] = [];

  constructor(private readonly window: EventWindow) {}

  get size(): number {
    return this.events.length;
  }

  hasRecent(line: string, x: number, now: number): boolean {
    return this.events.some(event =>
      event.line === line &&
      Math.abs(event.position.x - x) <= this.window.distancePx &&
      now - event.timestamp <= this.window.windowSeconds
    );
  }

  record(event: CrossingEvent): void {
    this.events.push(event);
  }

  prune(now: number): number {
    const before = this.events.length;
    this.events = this.events.filter(event => now - event.timestamp <= this.window.windowSeconds);
    return before - this.events.length;
  }

  clear(): void {
    this.events = [];
  }
}
