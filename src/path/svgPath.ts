import type { PathCommand } from '../types';

export const DEFAULT_SVG_PRECISION = 3;

function formatNumber(value: number, precision: number): string {
  const fixed = value.toFixed(precision);
  // "12.500" -> "12.5", "3.000" -> "3", "-0.000" -> "0"
  const trimmed = fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
  return trimmed === '-0' ? '0' : trimmed;
}

/** SVG `d` attribute for the commands, e.g. `M50 0 L79.389 90.451`. */
export function toSvgPathData(
  commands: readonly PathCommand[],
  precision: number = DEFAULT_SVG_PRECISION
): string {
  return commands
    .map(({ type, point }) => {
      const letter = type === 'moveTo' ? 'M' : 'L';
      return `${letter}${formatNumber(point.x, precision)} ${formatNumber(point.y, precision)}`;
    })
    .join(' ');
}
