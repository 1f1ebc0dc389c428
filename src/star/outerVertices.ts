import type { Point } from '../types';
import { InvalidArgumentError } from '../errors';
import { pointOnCircle } from '../utils';

export const MIN_STAR_POINTS = 5;
export const MIN_STAR_DENSITY = 2;

export function assertStarCounts(numPoints: number, density: number): void {
  if (!Number.isInteger(numPoints) || numPoints < MIN_STAR_POINTS) {
    throw new InvalidArgumentError(`number of points must be an integer of at least ${MIN_STAR_POINTS}, got ${numPoints}`);
  }
  if (!Number.isInteger(density) || density < MIN_STAR_DENSITY) {
    throw new InvalidArgumentError(`density must be an integer of at least ${MIN_STAR_DENSITY}, got ${density}`);
  }
}

/**
 * Vertices of the {numPoints/density} star on a circle of radius `radius`
 * centred at (radius, radius).
 *
 * Consecutive vertices are `density` steps of 360/numPoints apart, so
 * joining them in order draws the crossing star lines rather than a polygon.
 */
export function makeOuterVertices(
  numPoints: number,
  density: number,
  startDegrees: number,
  radius: number
): Point[] {
  assertStarCounts(numPoints, density);

  const center = { x: radius, y: radius };
  const degreesBetweenPoints = 360 / numPoints;
  const vertices: Point[] = [];

  for (let i = 0; i < numPoints; i++) {
    vertices.push(pointOnCircle(center, radius, startDegrees + density * i * degreesBetweenPoints));
  }

  return vertices;
}
