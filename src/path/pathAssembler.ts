import type { PathCommand, Point, PointSequence } from '../types';
import { translate } from '../utils';

/** Anything that draws straight path segments: CanvasRenderingContext2D, Path2D, ... */
export interface PathSink {
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
}

/**
 * Move to the first point, line to every following point, then line back
 * to the first. Every point is shifted by `offset`.
 */
export function assemblePath(points: PointSequence, offset: Point = { x: 0, y: 0 }): PathCommand[] {
  if (points.length === 0) return [];

  const commands = points.map((point, i): PathCommand => ({
    type: i === 0 ? 'moveTo' : 'lineTo',
    point: translate(point, offset),
  }));
  commands.push({ type: 'lineTo', point: translate(points[0], offset) });

  return commands;
}

export function replayPath(commands: readonly PathCommand[], sink: PathSink): void {
  for (const { type, point } of commands) {
    if (type === 'moveTo') {
      sink.moveTo(point.x, point.y);
    } else {
      sink.lineTo(point.x, point.y);
    }
  }
}
