import type { ElevationGrid } from '../types/index.js';
import type { IslandMaskConfig } from '../config/world-config.js';
import { createElevationGrid } from '../grid.js';

export function smoothstep(edge0: number, edge1: number, value: number): number {
  const t = Math.min(1, Math.max(0, (value - edge0) / (edge1 - edge0)));
  return t * t * (3 - 2 * t);
}

/**
 * Distance from the grid centre scaled per axis, so 1 lies on the ellipse
 * inscribed in the grid.
 */
export function normalizedCenterDistance(x: number, y: number, width: number, height: number): number {
  const cx = (width - 1) / 2;
  const cy = (height - 1) / 2;
  const dx = cx === 0 ? 0 : (x - cx) / (width / 2);
  const dy = cy === 0 ? 0 : (y - cy) / (height / 2);
  return Math.sqrt(dx * dx + dy * dy);
}

/** Multiplier in [0, 1]: 1 inside `innerRadius`, 0 from `outerRadius` outwards. */
export function islandFalloff(distance: number, config: IslandMaskConfig): number {
  return 1 - smoothstep(config.innerRadius, config.outerRadius, distance);
}

/**
 * Lift the island core by `landBias` and fade everything towards deep water
 * as the distance from the centre grows. Returns a new grid.
 */
export function applyIslandMask(grid: ElevationGrid, config: IslandMaskConfig): ElevationGrid {
  const { width, height } = grid;
  const cells = new Array<number>(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const idx = y * width + x;
      const falloff = islandFalloff(normalizedCenterDistance(x, y, width, height), config);
      const lifted = config.landBias + (1 - config.landBias) * grid.cells[idx];
      cells[idx] = Math.min(1, Math.max(0, falloff * lifted));
    }
  }

  return createElevationGrid(width, height, cells);
}
