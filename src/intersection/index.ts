export { SpatialIndex, computeBbox, bboxesIntersect } from './SpatialIndex';
export { intersectLines, intersectSegments } from './segmentIntersection';
export { DEFAULT_INTERSECTION_OPTIONS } from './types';
export type { SegmentBBox, SegmentCrossing, IntersectionOptions, FirstIntersection } from './types';
