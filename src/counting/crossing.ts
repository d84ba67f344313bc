import type { CountingLine, Direction, FallbackRule } from '../types';

/**
 * 1 回の更新で許容帯の片側の外から反対側の外へ移動したときだけ通過とみなす
 */
export function detectCrossing(
  previousY: number | null,
  currentY: number,
  line: Pick<CountingLine, 'positionY' | 'tolerance'>
): Direction | null {
  if (previousY === null) return null;

  const upper = line.positionY - line.tolerance;
  const lower = line.positionY + line.tolerance;

  if (previousY < upper && currentY > lower) return 'increasing_y';
  if (previousY > lower && currentY < upper) return 'decreasing_y';
  return null;
}

export function isWithinBand(y: number, line: Pick<CountingLine, 'positionY' | 'tolerance'>): boolean {
  return Math.abs(y - line.positionY) <= line.tolerance;
}

// 追跡IDなしモードでの方向決定（動きが分からないため位置で決める）
export function fallbackDirection(rule: FallbackRule, x: number, frameWidth: number): Direction {
  if (rule.strategy === 'fixed') {
    return rule.direction;
  }
  return x < frameWidth * rule.splitRatio ? rule.left : rule.right;
}
