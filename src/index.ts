export * from './star';
export * from './path';
export * from './intersection';
export * from './errors';
export * from './presets';
export { useStarStore } from './store';
export type { StarSnapshot } from './store';
export { distance, translate, pointOnCircle } from './utils';
export { toRadians, toDegrees, normalizeDegrees, pointAngleDegrees, angleDistanceDegrees } from './utils/angleHelpers';
export type { Point, PointSequence, BoundingBox, StarSpec, Segment, StarGeometry, PathCommand, PathCommandType } from './types';
