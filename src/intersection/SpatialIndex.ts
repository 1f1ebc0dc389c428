import RBush from 'rbush';
import type { Point, Segment } from '../types';
import type { SegmentBBox } from './types';

interface RbushItem extends SegmentBBox {
  segment: Segment;
}

export class SpatialIndex {
  private tree: RBush<RbushItem>;
  private itemsByIndex: Map<number, RbushItem> = new Map();

  constructor(maxEntries: number = 16) {
    this.tree = new RBush<RbushItem>(maxEntries);
  }

  private toItem(segment: Segment): RbushItem {
    return {
      ...computeBbox(segment.start, segment.end),
      segment,
    };
  }

  insert(segment: Segment): void {
    const item = this.toItem(segment);
    this.itemsByIndex.set(segment.index, item);
    this.tree.insert(item);
  }

  remove(segment: Segment): void {
    const existing = this.itemsByIndex.get(segment.index);
    if (existing) {
      this.tree.remove(existing);
      this.itemsByIndex.delete(segment.index);
    }
  }

  load(segments: readonly Segment[]): void {
    this.clear();
    const items = segments.map(segment => {
      const item = this.toItem(segment);
      this.itemsByIndex.set(segment.index, item);
      return item;
    });
    this.tree.load(items);
  }

  /** Segments whose boxes touch `bbox`, in ascending segment index. */
  search(bbox: SegmentBBox): Segment[] {
    return this.tree
      .search(bbox)
      .map(item => item.segment)
      .sort((a, b) => a.index - b.index);
  }

  clear(): void {
    this.tree.clear();
    this.itemsByIndex.clear();
  }

  get size(): number {
    return this.itemsByIndex.size;
  }
}

export function computeBbox(p1: Point, p2: Point): SegmentBBox {
  return {
    minX: Math.min(p1.x, p2.x),
    minY: Math.min(p1.y, p2.y),
    maxX: Math.max(p1.x, p2.x),
    maxY: Math.max(p1.y, p2.y),
  };
}

export function bboxesIntersect(a: SegmentBBox, b: SegmentBBox): boolean {
  return !(a.maxX < b.minX || a.minX > b.maxX || a.maxY < b.minY || a.minY > b.maxY);
}
