export type StarGeometryErrorKind = 'invalid-argument' | 'geometry';

export class StarGeometryError extends Error {
  readonly kind: StarGeometryErrorKind;

  constructor(kind: StarGeometryErrorKind, message: string) {
    super(message);
    this.name = 'StarGeometryError';
    this.kind = kind;
  }
}

/** Rejected input: non-square bounds, too few points, or too low a density. */
export class InvalidArgumentError extends StarGeometryError {
  constructor(message: string) {
    super('invalid-argument', message);
    this.name = 'InvalidArgumentError';
  }
}

/** The {numPoints/density} pair never crosses itself, so it has no inner radius. */
export class GeometryError extends StarGeometryError {
  constructor(message: string) {
    super('geometry', message);
    this.name = 'GeometryError';
  }
}

export function isStarGeometryError(value: unknown): value is StarGeometryError {
  return value instanceof StarGeometryError;
}
