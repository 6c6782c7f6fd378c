import type { ElevationGrid } from '../types/index.js';
import type { HeightMapConfig } from '../config/world-config.js';
import type { NoiseField } from '../layer1-noise/noise-field.js';
import { createElevationGrid } from '../grid.js';
import { createLogger } from '../../logging/logger.js';

const log = createLogger('worldgen:heightmap');

/** Raw ranges narrower than this are treated as a constant field. */
const DEGENERATE_RANGE = 1e-12;

export interface HeightMapResult {
  grid: ElevationGrid;
  rawMin: number;
  rawMax: number;
  /** True when the flat-elevation fallback replaced the sampled field. */
  degenerate: boolean;
}

/**
 * Sample the field once per cell, min-max normalize to [0, 1] and sharpen
 * with a power curve.
 */
export function buildHeightMap(
  field: NoiseField,
  width: number,
  height: number,
  config: HeightMapConfig,
): HeightMapResult {
  const raw = new Array<number>(width * height);
  let rawMin = Infinity;
  let rawMax = -Infinity;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const value = field.sample(x, y);
      raw[y * width + x] = value;
      if (value < rawMin) rawMin = value;
      if (value > rawMax) rawMax = value;
    }
  }

  const range = rawMax - rawMin;
  const degenerate = !Number.isFinite(range) || range < DEGENERATE_RANGE;
  if (degenerate) {
    log.warn(
      { seed: field.seed, rawMin, rawMax, flatElevation: config.flatElevation },
      'Noise field is constant; using flat elevation',
    );
  }

  const cells = raw.map((value) => {
    const normalized = degenerate ? config.flatElevation : (value - rawMin) / range;
    return Math.min(1, Math.max(0, Math.pow(normalized, config.contrast)));
  });

  return { grid: createElevationGrid(width, height, cells), rawMin, rawMax, degenerate };
}
