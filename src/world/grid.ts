import type { BiomeGrid, ElevationGrid, GridPoint } from './types/index.js';
import type { BiomeLabel } from './types/biome.js';
import { OutOfBoundsError } from './errors.js';

interface Dimensions {
  readonly width: number;
  readonly height: number;
}

export function isInBounds(grid: Dimensions, x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < grid.width && y < grid.height;
}

/** Row-major index of a cell; throws OutOfBoundsError for anything outside the grid. */
export function cellIndex(grid: Dimensions, x: number, y: number): number {
  if (!isInBounds(grid, x, y)) {
    throw new OutOfBoundsError(x, y, grid.width, grid.height);
  }
  return y * grid.width + x;
}

export function createElevationGrid(width: number, height: number, cells: number[]): ElevationGrid {
  if (cells.length !== width * height) {
    throw new RangeError(`Expected ${width * height} cells, got ${cells.length}`);
  }
  return Object.freeze({ width, height, cells: Object.freeze([...cells]) });
}

export function createBiomeGrid(width: number, height: number, cells: BiomeLabel[]): BiomeGrid {
  if (cells.length !== width * height) {
    throw new RangeError(`Expected ${width * height} cells, got ${cells.length}`);
  }
  return Object.freeze({ width, height, cells: Object.freeze([...cells]) });
}

export function manhattanDistance(a: GridPoint, b: GridPoint): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}
