import type { Point, Segment } from '../types';
import type { FirstIntersection, IntersectionOptions } from '../intersection/types';
import { DEFAULT_INTERSECTION_OPTIONS } from '../intersection/types';
import { SpatialIndex, computeBbox } from '../intersection/SpatialIndex';
import { intersectSegments } from '../intersection/segmentIntersection';
import { GeometryError } from '../errors';

/** Segment i joins vertex i to vertex i + 1, wrapping back to vertex 0. */
export function ringSegments(vertices: readonly Point[]): Segment[] {
  return vertices.map((start, index) => ({
    index,
    start,
    end: vertices[(index + 1) % vertices.length],
  }));
}

/**
 * Find where the first star line (vertex 0 to vertex 1) first crosses a
 * later line, by ascending segment index.
 *
 * The second and last segments share an endpoint with the first and are
 * never searched. Throws GeometryError when nothing crosses, which means
 * the point count and density do not form a star.
 */
export function findFirstIntersection(
  vertices: readonly Point[],
  options: Partial<IntersectionOptions> = {}
): FirstIntersection {
  const opts: IntersectionOptions = { ...DEFAULT_INTERSECTION_OPTIONS, ...options };
  const segments = ringSegments(vertices);

  if (segments.length < 4) {
    throw new GeometryError('Not a valid star polygon: too few vertices to cross');
  }

  const [first] = segments;

  const index = new SpatialIndex();
  index.load(segments.slice(2, segments.length - 1));
  const candidates = index.search(computeBbox(first.start, first.end));

  for (const candidate of candidates) {
    const crossing = intersectSegments(first.start, first.end, candidate.start, candidate.end, opts);
    if (crossing) {
      return { point: crossing.point, segment: candidate };
    }
  }

  throw new GeometryError('Not a valid star polygon: no line crosses the first one. Are the number of points and density valid?');
}
