import type { Point } from '../types';

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

/**
 * Normalize an angle in degrees to the range [0, 360)
 */
export function normalizeDegrees(degrees: number): number {
  const normalized = degrees % 360;
  // -0 and tiny negatives that round up to 360 both land on 0
  if (normalized < 0) {
    const wrapped = normalized + 360;
    return wrapped >= 360 ? 0 : wrapped;
  }
  return normalized === 0 ? 0 : normalized;
}

/**
 * Polar angle of `point` around `center` in degrees, [0, 360).
 * Uses the y-down convention of the star generators: 90° is straight up.
 */
export function pointAngleDegrees(point: Point, center: Point): number {
  const angle = Math.atan2(center.y - point.y, point.x - center.x);
  return normalizeDegrees(toDegrees(angle));
}

/**
 * Smallest absolute difference between two angles in degrees, [0, 180].
 */
export function angleDistanceDegrees(a: number, b: number): number {
  const diff = normalizeDegrees(a - b);
  return diff > 180 ? 360 - diff : diff;
}
