export { makeOuterVertices, assertStarCounts, MIN_STAR_POINTS, MIN_STAR_DENSITY } from './outerVertices';
export { findFirstIntersection, ringSegments } from './firstIntersection';
export { makeOutlineVertices } from './outlineVertices';
export { computeStarGeometry, computeStarOutline, buildStarPath } from './computeStarOutline';
