import type { Point } from '../types';
import type { IntersectionOptions, SegmentCrossing } from './types';
import { DEFAULT_INTERSECTION_OPTIONS } from './types';

/**
 * Solve the two line equations through (p1, p2) and (p3, p4).
 *
 * Works on direction vectors rather than slope/intercept so vertical lines,
 * whose slope is infinite, need no special case. Returns null for parallel
 * or degenerate (zero-length) segments.
 */
export function intersectLines(
  p1: Point,
  p2: Point,
  p3: Point,
  p4: Point,
  parallelTolerance: number = DEFAULT_INTERSECTION_OPTIONS.parallelTolerance
): SegmentCrossing | null {
  const dx1 = p2.x - p1.x;
  const dy1 = p2.y - p1.y;
  const dx2 = p4.x - p3.x;
  const dy2 = p4.y - p3.y;

  const cross = dx1 * dy2 - dy1 * dx2;
  const scale = Math.hypot(dx1, dy1) * Math.hypot(dx2, dy2);
  if (scale === 0 || Math.abs(cross) <= parallelTolerance * scale) return null;

  const t = ((p3.x - p1.x) * dy2 - (p3.y - p1.y) * dx2) / cross;
  const u = ((p3.x - p1.x) * dy1 - (p3.y - p1.y) * dx1) / cross;

  return {
    point: {
      x: p1.x + t * dx1,
      y: p1.y + t * dy1,
    },
    t,
    u,
  };
}

/**
 * Crossing strictly inside both segments. Touching at an endpoint does not count.
 */
export function intersectSegments(
  p1: Point,
  p2: Point,
  p3: Point,
  p4: Point,
  options: IntersectionOptions = DEFAULT_INTERSECTION_OPTIONS
): SegmentCrossing | null {
  const crossing = intersectLines(p1, p2, p3, p4, options.parallelTolerance);
  if (!crossing) return null;

  const eps = options.endpointTolerance;
  const { t, u } = crossing;
  if (t > eps && t < 1 - eps && u > eps && u < 1 - eps) {
    return crossing;
  }

  return null;
}
