import type { CountSnapshot } from '../types';

export class Counters {
  private values = new Map<string, number>();

  register(names: Iterable<string>): void {
    for (const name of names) {
      if (!this.values.has(name)) {
        this.values.set(name, 0);
      }
    }
  }

  increment(name: string): number {
    const next = (this.values.get(name) ?? 0) + 1;
    this.values.set(name, next);
    return next;
  }

  get(name: string): number {
    return this.values.get(name) ?? 0;
  }

  // total は常に各カウンタの合計から求める
  get total(): number {
    let sum = 0;
    for (const value of this.values.values()) {
      sum += value;
    }
    return sum;
  }

  reset(): void {
    for (const name of this.values.keys()) {
      this.values.set(name, 0);
    }
  }

  snapshot(): CountSnapshot {
    return {
      counters: Object.fromEntries(this.values),
      total: this.total
    };
  }
}
