import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../errors';
import type { LineSpec } from '../types';
import { DEFAULT_FALLBACK_RULE, LineRegistry } from './line-registry';

const rule = { increasing_y: 'down', decreasing_y: 'up' };

describe('LineRegistry', () => {
  it('places lines at round(frameHeight * ratio)', () => {
    const registry = new LineRegistry();
    const outcome = registry.configure(
      481,
      [{ ratio: 0.5, rule }, { name: 'exit', ratio: 0.75, tolerance: 8, rule }],
      15
    );

    expect(outcome).toBe('resolved');
    expect(registry.lines).toEqual([
      { name: 'line-1', ratio: 0.5, positionY: 241, tolerance: 15, rule, fallback: DEFAULT_FALLBACK_RULE },
      { name: 'exit', ratio: 0.75, positionY: 361, tolerance: 8, rule, fallback: DEFAULT_FALLBACK_RULE }
    ]);
  });

  it('defers placement until a frame height is known', () => {
    const registry = new LineRegistry();

    expect(registry.configure(null, [{ ratio: 0.25, rule }], 15)).toBe('pending');
    expect(registry.isConfigured).toBe(true);
    expect(registry.isResolved).toBe(false);
    expect(registry.lines).toEqual([]);

    expect(registry.resolve(720)).toBe(true);
    expect(registry.lines[0].positionY).toBe(180);
    expect(registry.resolve(1080)).toBe(false);
    expect(registry.lines[0].positionY).toBe(180);
  });

  it('reports identical configuration as unchanged and moved lines as reconfigured', () => {
    const registry = new LineRegistry();
    registry.configure(480, [{ ratio: 0.5, rule }], 15);

    expect(registry.configure(480, [{ ratio: 0.5, rule }], 15)).toBe('unchanged');
    expect(registry.configure(null, [{ ratio: 0.5, rule }], 15)).toBe('unchanged');
    expect(registry.configure(480, [{ ratio: 0.6, rule }], 15)).toBe('reconfigured');
    expect(registry.lines[0].positionY).toBe(288);
    expect(registry.configure(480, [{ ratio: 0.6, rule }], 20)).toBe('reconfigured');
  });

  it.each<[string, LineSpec[]]>([
    ['no lines', []],
    ['ratio above 1', [{ ratio: 1.2, rule }]],
    ['negative ratio', [{ ratio: -0.1, rule }]],
    ['NaN ratio', [{ ratio: NaN, rule }]],
    ['negative tolerance', [{ ratio: 0.5, tolerance: -1, rule }]],
    ['fractional tolerance', [{ ratio: 0.5, tolerance: 2.5, rule }]],
    ['duplicate names', [{ name: 'a', ratio: 0.3, rule }, { name: 'a', ratio: 0.6, rule }]],
    [
      'split ratio out of range',
      [{ ratio: 0.5, rule, fallback: { strategy: 'horizontal_split', splitRatio: 2, left: 'increasing_y', right: 'decreasing_y' } }]
    ]
  ])('rejects %s without clamping', (_label, specs) => {
    const registry = new LineRegistry();
    expect(() => registry.configure(480, specs, 15)).toThrow(ConfigurationError);
    expect(registry.isConfigured).toBe(false);
  });

  it('rejects a non-positive frame height', () => {
    const registry = new LineRegistry();
    expect(() => registry.configure(0, [{ ratio: 0.5, rule }], 15)).toThrow(ConfigurationError);
  });

  it('accepts the frame edges as line ratios', () => {
    const registry = new LineRegistry();
    registry.configure(480, [{ name: 'top', ratio: 0, rule }, { name: 'bottom', ratio: 1, rule }], 15);
    expect(registry.lines.map(line => line.positionY)).toEqual([0, 480]);
  });
});
