export interface Point {
  x: number;
  y: number;
}

/** Ordered points; insertion order is the path traversal order. */
export type PointSequence = readonly Point[];

/** Axis-aligned box; (x, y) is the top-left corner in y-down coordinates. */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface StarSpec {
  numPoints: number;
  /** Skip count when connecting vertices; a pentagram has density 2 */
  density: number;
  /** Trace the silhouette through the inner vertices instead of the crossing lines */
  outlined: boolean;
  rotationDegrees: number;
  /** Must be square */
  bounds: BoundingBox;
}

export interface Segment {
  index: number;
  start: Point;
  end: Point;
}

export interface StarGeometry {
  /** Circle centre in box-local coordinates, always (r, r) */
  center: Point;
  outerRadius: number;
  /** Null unless the star was outlined */
  innerRadius: number | null;
  /** Box-local vertices */
  vertices: PointSequence;
}

export type PathCommandType = 'moveTo' | 'lineTo';

export interface PathCommand {
  type: PathCommandType;
  point: Point;
}
