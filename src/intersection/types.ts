import type { Point, Segment } from '../types';

export interface SegmentBBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface SegmentCrossing {
  point: Point;
  /** Position along the first segment, 0 at its start and 1 at its end */
  t: number;
  /** Position along the second segment */
  u: number;
}

export interface IntersectionOptions {
  /** Cross product below this fraction of the segment lengths' product counts as parallel */
  parallelTolerance: number;
  /** Crossings this close (in segment parameter) to an endpoint are not interior */
  endpointTolerance: number;
}

export const DEFAULT_INTERSECTION_OPTIONS: IntersectionOptions = {
  parallelTolerance: 1e-10,
  endpointTolerance: 1e-9,
};

export interface FirstIntersection {
  point: Point;
  /** The later segment that segment 0 crosses first */
  segment: Segment;
}
