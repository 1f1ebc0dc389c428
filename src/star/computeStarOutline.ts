import type { PathCommand, Point, PointSequence, StarGeometry, StarSpec } from '../types';
import type { IntersectionOptions } from '../intersection/types';
import { InvalidArgumentError } from '../errors';
import { distance, translate } from '../utils';
import { assertStarCounts, makeOuterVertices } from './outerVertices';
import { findFirstIntersection } from './firstIntersection';
import { makeOutlineVertices } from './outlineVertices';
import { assemblePath } from '../path/pathAssembler';

function validateStarSpec(spec: StarSpec): void {
  const { width, height } = spec.bounds;
  if (width !== height) {
    throw new InvalidArgumentError(`bounds must be square, got ${width}x${height}`);
  }
  if (!(width > 0)) {
    throw new InvalidArgumentError(`bounds must have a positive size, got ${width}`);
  }
  assertStarCounts(spec.numPoints, spec.density);
}

/**
 * Star vertices in box-local coordinates plus the radii they were built from.
 * Validates everything before computing anything.
 */
export function computeStarGeometry(
  spec: StarSpec,
  options: Partial<IntersectionOptions> = {}
): StarGeometry {
  validateStarSpec(spec);

  const r = spec.bounds.width / 2;
  const center: Point = { x: r, y: r };
  // Add 90 so the first point is at the top
  const startDegrees = 90 + spec.rotationDegrees;

  const outerVertices = makeOuterVertices(spec.numPoints, spec.density, startDegrees, r);

  if (!spec.outlined) {
    return { center, outerRadius: r, innerRadius: null, vertices: outerVertices };
  }

  const { point } = findFirstIntersection(outerVertices, options);
  const innerRadius = distance(center, point);

  return {
    center,
    outerRadius: r,
    innerRadius,
    vertices: makeOutlineVertices(spec.numPoints * 2, startDegrees, r, innerRadius),
  };
}

/**
 * The star's closed point sequence, positioned inside `spec.bounds`.
 *
 * Plain stars yield `numPoints` tips in line-drawing order; outlined stars
 * yield `2 * numPoints` points alternating tip and notch.
 */
export function computeStarOutline(
  spec: StarSpec,
  options: Partial<IntersectionOptions> = {}
): PointSequence {
  const { vertices } = computeStarGeometry(spec, options);
  const origin = { x: spec.bounds.x, y: spec.bounds.y };
  return vertices.map(vertex => translate(vertex, origin));
}

export function buildStarPath(
  spec: StarSpec,
  options: Partial<IntersectionOptions> = {}
): PathCommand[] {
  const { vertices } = computeStarGeometry(spec, options);
  return assemblePath(vertices, { x: spec.bounds.x, y: spec.bounds.y });
}
