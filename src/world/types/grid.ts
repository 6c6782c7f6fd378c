import type { BiomeLabel } from './biome.js';

export interface GridPoint {
  x: number;
  y: number;
}

/** Row-major, frozen after generation. Every value is finite and in [0, 1]. */
export interface ElevationGrid {
  readonly width: number;
  readonly height: number;
  readonly cells: readonly number[];
}

/** Same dimensions as the elevation grid it was classified from. */
export interface BiomeGrid {
  readonly width: number;
  readonly height: number;
  readonly cells: readonly BiomeLabel[];
}
