import type { BoundingBox, StarSpec } from './types';

export type StarPresetName =
  | 'pentagram'
  | 'heptagram'
  | 'greatHeptagram'
  | 'octagram'
  | 'enneagram'
  | 'greatEnneagram'
  | 'decagram'
  | 'dodecagram';

export interface StarSettings {
  numPoints: number;
  density: number;
  outlined: boolean;
}

export const STAR_PRESETS: Record<StarPresetName, StarSettings> = {
  pentagram: { numPoints: 5, density: 2, outlined: true },
  heptagram: { numPoints: 7, density: 2, outlined: false },
  greatHeptagram: { numPoints: 7, density: 3, outlined: false },
  octagram: { numPoints: 8, density: 3, outlined: false },
  enneagram: { numPoints: 9, density: 2, outlined: false },
  greatEnneagram: { numPoints: 9, density: 4, outlined: false },
  decagram: { numPoints: 10, density: 3, outlined: false },
  dodecagram: { numPoints: 12, density: 5, outlined: false },
};

export const DEFAULT_BOUNDS: BoundingBox = { x: 0, y: 0, width: 100, height: 100 };

export function getDefaultStar(): StarSettings {
  return { ...STAR_PRESETS.pentagram };
}

export function mergeStarSettings(
  base: StarSettings,
  overrides: Partial<StarSettings>
): StarSettings {
  return { ...base, ...overrides };
}

export function makeStarSpec(
  settings: StarSettings,
  bounds: BoundingBox = DEFAULT_BOUNDS,
  rotationDegrees: number = 0
): StarSpec {
  return {
    numPoints: settings.numPoints,
    density: settings.density,
    outlined: settings.outlined,
    rotationDegrees,
    bounds: { ...bounds },
  };
}
