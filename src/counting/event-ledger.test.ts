import { describe, expect, it } from 'vitest';

import { CrossingEventLedger } from './event-ledger';

describe('CrossingEventLedger', () => {
  const ledger = () => new CrossingEventLedger({ windowSeconds: 1, distancePx: 30 });

  it('matches events on the same line within the spatial and temporal window', () => {
    const events = ledger();
    events.record({ timestamp: 10, position: { x: 100, y: 240 }, line: 'a', counter: 'down' });

    expect(events.hasRecent('a', 130, 11)).toBe(true);
    expect(events.hasRecent('a', 131, 10.5)).toBe(false);
    expect(events.hasRecent('a', 100, 11.01)).toBe(false);
    expect(events.hasRecent('b', 100, 10.5)).toBe(false);
  });

  it('prunes events older than the window', () => {
    const events = ledger();
    events.record({ timestamp: 0, position: { x: 0, y: 0 }, line: 'a', counter: 'down' });
    events.record({ timestamp: 0.8, position: { x: 0, y: 0 }, line: 'a', counter: 'down' });

    expect(events.prune(1.5)).toBe(1);
    expect(events.size).toBe(1);
  });
});
