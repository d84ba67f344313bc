import type { FrameDimensions, Point } from '../types';

// レイキャスティング法
export const isPointInPolygon = (point: Point, polygon: readonly Point[]): boolean => {
  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const xi = polygon[i].x, yi = polygon[i].y;
    const xj = polygon[j].x, yj = polygon[j].y;

    const intersect = ((yi > point.y) !== (yj > point.y)) &&
      (point.x < (xj - xi) * (point.y - yi) / (yj - yi) + xi);
    if (intersect) inside = !inside;
  }
  return inside;
};

export interface RoiOptions {
  marginRatio: number;
  polygon: readonly Point[] | null;
}

export class RoiFilter {
  constructor(private readonly options: RoiOptions) {}

  isEligible(point: Point, frame: FrameDimensions): boolean {
    if (this.options.polygon !== null) {
      const normalized = { x: point.x / frame.width, y: point.y / frame.height };
      return isPointInPolygon(normalized, this.options.polygon);
    }

    // マージン境界ちょうどの点は対象に含める（除外は境界より外側のみ）
    const marginX = frame.width * this.options.marginRatio;
    const marginY = frame.height * this.options.marginRatio;
    return point.x >= marginX &&
      point.x <= frame.width - marginX &&
      point.y >= marginY &&
      point.y <= frame.height - marginY;
  }
}
