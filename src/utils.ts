import type { Point } from './types';
import { toRadians } from './utils/angleHelpers';

// Distance between two points
export function distance(p1: Point, p2: Point): number {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function translate(point: Point, offset: Point): Point {
  return { x: point.x + offset.x, y: point.y + offset.y };
}

/**
 * Point on a circle around `center`, `degrees` counter-clockwise from +x.
 * Y grows downwards, so the sine term is subtracted.
 */
export function pointOnCircle(center: Point, radius: number, degrees: number): Point {
  const theta = toRadians(degrees);
  return {
    x: center.x + radius * Math.cos(theta),
    y: center.y - radius * Math.sin(theta),
  };
}
