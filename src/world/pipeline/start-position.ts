import type { ElevationGrid, GridPoint } from '../types/index.js';

/**
 * First cell at or above `minElevation`, scanning square rings outward from
 * the grid centre.
 */
export function findStartPosition(grid: ElevationGrid, minElevation: number): GridPoint | undefined {
  const { width, height, cells } = grid;
  const cx = Math.floor(width / 2);
  const cy = Math.floor(height / 2);
  const maxRadius = Math.max(cx, cy, width - 1 - cx, height - 1 - cy);

  for (let radius = 0; radius <= maxRadius; radius++) {
    for (let dy = -radius; dy <= radius; dy++) {
      for (let dx = -radius; dx <= radius; dx++) {
        if (Math.max(Math.abs(dx), Math.abs(dy)) !== radius) continue;
        const x = cx + dx;
        const y = cy + dy;
        if (x < 0 || y < 0 || x >= width || y >= height) continue;
        if (cells[y * width + x] >= minElevation) return { x, y };
      }
    }
  }

  return undefined;
}
