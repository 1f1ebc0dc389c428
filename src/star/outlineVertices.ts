import type { Point } from '../types';
import { pointOnCircle } from '../utils';

/**
 * Silhouette of an outlined star: `count` vertices evenly spaced around
 * (outerRadius, outerRadius), alternating outer tip (even index) and inner
 * notch (odd index).
 */
export function makeOutlineVertices(
  count: number,
  startDegrees: number,
  outerRadius: number,
  innerRadius: number
): Point[] {
  const center = { x: outerRadius, y: outerRadius };
  const degreesBetweenPoints = 360 / count;
  const vertices: Point[] = [];

  for (let i = 0; i < count; i++) {
    const radius = i % 2 === 0 ? outerRadius : innerRadius;
    vertices.push(pointOnCircle(center, radius, startDegrees + i * degreesBetweenPoints));
  }

  return vertices;
}
