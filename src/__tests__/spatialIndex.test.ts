import { describe, it, expect, beforeEach } from 'vitest';
import type { Segment } from '../types';
import { SpatialIndex, computeBbox, bboxesIntersect } from '../intersection/SpatialIndex';
import { intersectLines, intersectSegments } from '../intersection/segmentIntersection';

const createSegment = (index: number, x1: number, y1: number, x2: number, y2: number): Segment => ({
  index,
  start: { x: x1, y: y1 },
  end: { x: x2, y: y2 },
});

describe('SpatialIndex', () => {
  let spatialIndex: SpatialIndex;

  beforeEach(() => {
    spatialIndex = new SpatialIndex();
  });

  describe('computeBbox', () => {
    it('should compute bounding box correctly', () => {
      expect(computeBbox({ x: 0, y: 0 }, { x: 10, y: 5 })).toEqual({ minX: 0, minY: 0, maxX: 10, maxY: 5 });
    });

    it('should handle reversed coordinates', () => {
      expect(computeBbox({ x: 10, y: 5 }, { x: 0, y: 0 })).toEqual({ minX: 0, minY: 0, maxX: 10, maxY: 5 });
    });
  });

  describe('bboxesIntersect', () => {
    it('should detect intersecting bboxes', () => {
      const a = { minX: 0, minY: 0, maxX: 10, maxY: 10 };
      const b = { minX: 5, minY: 5, maxX: 15, maxY: 15 };
      expect(bboxesIntersect(a, b)).toBe(true);
    });

    it('should detect non-intersecting bboxes', () => {
      const a = { minX: 0, minY: 0, maxX: 10, maxY: 10 };
      const b = { minX: 20, minY: 20, maxX: 30, maxY: 30 };
      expect(bboxesIntersect(a, b)).toBe(false);
    });
  });

  describe('search', () => {
    it('should return overlapping segments in index order', () => {
      spatialIndex.load([
        createSegment(4, 0, 10, 10, 0),
        createSegment(2, 0, 0, 10, 10),
        createSegment(3, 50, 50, 60, 60),
      ]);

      const results = spatialIndex.search(computeBbox({ x: 2, y: 2 }, { x: 8, y: 8 }));
      expect(results.map(segment => segment.index)).toEqual([2, 4]);
    });

    it('should find a horizontal segment with a flat box', () => {
      spatialIndex.insert(createSegment(0, 0, 5, 10, 5));
      expect(spatialIndex.search(computeBbox({ x: 5, y: 0 }, { x: 5, y: 10 }))).toHaveLength(1);
    });

    it('should forget removed segments', () => {
      const segment = createSegment(1, 0, 0, 10, 10);
      spatialIndex.insert(segment);
      spatialIndex.remove(segment);

      expect(spatialIndex.size).toBe(0);
      expect(spatialIndex.search(computeBbox({ x: 0, y: 0 }, { x: 10, y: 10 }))).toHaveLength(0);
    });

    it('should replace previous contents on load', () => {
      spatialIndex.insert(createSegment(0, 0, 0, 10, 10));
      spatialIndex.load([createSegment(7, 100, 100, 110, 110)]);

      expect(spatialIndex.size).toBe(1);
      expect(spatialIndex.search(computeBbox({ x: 0, y: 0 }, { x: 10, y: 10 }))).toHaveLength(0);
    });
  });
});

describe('intersectLines', () => {
  it('should solve crossing diagonals', () => {
    const crossing = intersectLines({ x: 0, y: 0 }, { x: 10, y: 10 }, { x: 0, y: 10 }, { x: 10, y: 0 });
    expect(crossing).toEqual({ point: { x: 5, y: 5 }, t: 0.5, u: 0.5 });
  });

  it('should solve against a vertical line', () => {
    const crossing = intersectLines({ x: 4, y: -10 }, { x: 4, y: 10 }, { x: 0, y: 0 }, { x: 8, y: 4 });
    expect(crossing).not.toBeNull();
    expect(crossing!.point).toEqual({ x: 4, y: 2 });
  });

  it('should extend past the segment ends', () => {
    const crossing = intersectLines({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 3, y: -1 }, { x: 3, y: 1 });
    expect(crossing!.t).toBe(3);
  });

  it('should return null for parallel lines', () => {
    expect(intersectLines({ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 0, y: 5 }, { x: 20, y: 5 })).toBeNull();
  });

  it('should return null for a zero-length segment', () => {
    expect(intersectLines({ x: 3, y: 3 }, { x: 3, y: 3 }, { x: 0, y: 5 }, { x: 20, y: 5 })).toBeNull();
  });
});

describe('intersectSegments', () => {
  it('should accept an interior crossing', () => {
    const crossing = intersectSegments({ x: 0, y: 0 }, { x: 10, y: 10 }, { x: 0, y: 10 }, { x: 10, y: 0 });
    expect(crossing?.point).toEqual({ x: 5, y: 5 });
  });

  it('should reject a crossing at an endpoint', () => {
    expect(intersectSegments({ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 })).toBeNull();
  });

  it('should reject a crossing beyond either segment', () => {
    expect(intersectSegments({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 3, y: -1 }, { x: 3, y: 1 })).toBeNull();
  });
});
