import { create } from 'zustand';
import type { BoundingBox, PointSequence, StarGeometry } from './types';
import type { StarPresetName, StarSettings } from './presets';
import { DEFAULT_BOUNDS, STAR_PRESETS, getDefaultStar, makeStarSpec, mergeStarSettings } from './presets';
import { computeStarGeometry } from './star/computeStarOutline';
import { isStarGeometryError } from './errors';
import type { StarGeometryError } from './errors';
import { normalizeDegrees } from './utils/angleHelpers';
import { translate } from './utils';

export interface StarSnapshot {
  settings: StarSettings;
  bounds: BoundingBox;
  rotationDegrees: number;
}

interface ComputedStar {
  geometry: StarGeometry | null;
  outline: PointSequence;
  error: StarGeometryError | null;
}

interface StarState extends StarSnapshot, ComputedStar {
  setNumPoints: (numPoints: number) => void;
  setDensity: (density: number) => void;
  setOutlined: (outlined: boolean) => void;
  setRotation: (rotationDegrees: number) => void;
  setBounds: (bounds: BoundingBox) => void;
  applyPreset: (name: StarPresetName) => void;

  // Undo/Redo
  history: StarSnapshot[];
  historyIndex: number;
  undo: () => void;
  redo: () => void;
}

function computeSnapshot(snapshot: StarSnapshot): ComputedStar {
  try {
    const spec = makeStarSpec(snapshot.settings, snapshot.bounds, snapshot.rotationDegrees);
    const geometry = computeStarGeometry(spec);
    const origin = { x: spec.bounds.x, y: spec.bounds.y };
    return {
      geometry,
      outline: geometry.vertices.map(vertex => translate(vertex, origin)),
      error: null,
    };
  } catch (err) {
    if (!isStarGeometryError(err)) throw err;
    console.warn(`Star geometry failed (${err.kind}): ${err.message}`);
    return { geometry: null, outline: [], error: err };
  }
}

const initialSnapshot: StarSnapshot = {
  settings: getDefaultStar(),
  bounds: { ...DEFAULT_BOUNDS },
  rotationDegrees: 0,
};

export const useStarStore = create<StarState>((set) => {
  // Records `next` as the newest history entry, dropping any redo tail
  const commit = (state: StarState, next: StarSnapshot): Partial<StarState> => {
    const newHistory = state.history.slice(0, state.historyIndex + 1);
    newHistory.push(next);
    return {
      ...next,
      ...computeSnapshot(next),
      history: newHistory,
      historyIndex: newHistory.length - 1,
    };
  };

  const snapshotOf = (state: StarState): StarSnapshot => ({
    settings: state.settings,
    bounds: state.bounds,
    rotationDegrees: state.rotationDegrees,
  });

  return {
    ...initialSnapshot,
    ...computeSnapshot(initialSnapshot),
    history: [initialSnapshot],
    historyIndex: 0,

    setNumPoints: (numPoints) =>
      set((state) =>
        commit(state, { ...snapshotOf(state), settings: mergeStarSettings(state.settings, { numPoints }) })
      ),

    setDensity: (density) =>
      set((state) =>
        commit(state, { ...snapshotOf(state), settings: mergeStarSettings(state.settings, { density }) })
      ),

    setOutlined: (outlined) =>
      set((state) =>
        commit(state, { ...snapshotOf(state), settings: mergeStarSettings(state.settings, { outlined }) })
      ),

    setRotation: (rotationDegrees) =>
      set((state) =>
        commit(state, { ...snapshotOf(state), rotationDegrees: normalizeDegrees(rotationDegrees) })
      ),

    setBounds: (bounds) =>
      set((state) => commit(state, { ...snapshotOf(state), bounds: { ...bounds } })),

    applyPreset: (name) =>
      set((state) => commit(state, { ...snapshotOf(state), settings: { ...STAR_PRESETS[name] } })),

    undo: () =>
      set((state) => {
        if (state.historyIndex > 0) {
          const previous = state.history[state.historyIndex - 1];
          return {
            ...previous,
            ...computeSnapshot(previous),
            historyIndex: state.historyIndex - 1,
          };
        }
        return state;
      }),

    redo: () =>
      set((state) => {
        if (state.historyIndex < state.history.length - 1) {
          const next = state.history[state.historyIndex + 1];
          return {
            ...next,
            ...computeSnapshot(next),
            historyIndex: state.historyIndex + 1,
          };
        }
        return state;
      }),
  };
});
