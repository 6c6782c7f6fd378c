import type { BiomeGrid, BiomeLabel, ElevationGrid } from '../types/index.js';
import type { BiomeThresholds } from '../config/world-config.js';
import { createBiomeGrid } from '../grid.js';

/**
 * Label for one elevation: the last band whose inclusive lower bound the
 * value reaches, or the base label below every band. Assumes the bands were
 * validated as ascending.
 */
export function classifyElevation(elevation: number, thresholds: BiomeThresholds): BiomeLabel {
  const { bands } = thresholds;
  for (let i = bands.length - 1; i >= 0; i--) {
    if (elevation >= bands[i].min) return bands[i].biome;
  }
  return thresholds.base;
}

export function classifyBiomes(grid: ElevationGrid, thresholds: BiomeThresholds): BiomeGrid {
  const cells = grid.cells.map((elevation) => classifyElevation(elevation, thresholds));
  return createBiomeGrid(grid.width, grid.height, cells);
}

/** Lowest elevation that classifies as something other than water. */
export function landThreshold(thresholds: BiomeThresholds, isWater: (label: BiomeLabel) => boolean): number {
  for (const band of thresholds.bands) {
    if (!isWater(band.biome)) return band.min;
  }
  return Infinity;
}
