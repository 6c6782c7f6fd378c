import { describe, it, expect } from 'vitest';
import { buildHeightMap } from './height-map.js';
import { createNoiseField } from '../layer1-noise/noise-field.js';
import { defaultHeightMapConfig, defaultNoiseConfig } from '../config/world-config.js';
import type { NoiseField } from '../layer1-noise/noise-field.js';

const rampField: NoiseField = {
  seed: 'ramp',
  sample: (x) => x - 1,
};

const constantField: NoiseField = {
  seed: 'constant',
  sample: () => 0.3,
};

describe('buildHeightMap', () => {
  it('min-max normalizes the raw field before the contrast curve', () => {
    const result = buildHeightMap(rampField, 3, 1, { contrast: 2, flatElevation: 0.5 });
    expect(result.rawMin).toBe(-1);
    expect(result.rawMax).toBe(1);
    expect(result.degenerate).toBe(false);
    expect(result.grid.cells).toEqual([0, 0.25, 1]);
  });

  it('keeps the grid dimensions', () => {
    const result = buildHeightMap(rampField, 3, 2, defaultHeightMapConfig);
    expect(result.grid.width).toBe(3);
    expect(result.grid.height).toBe(2);
    expect(result.grid.cells).toHaveLength(6);
  });

  it('falls back to a flat elevation when the field is constant', () => {
    const result = buildHeightMap(constantField, 4, 4, { contrast: 1, flatElevation: 0.5 });
    expect(result.degenerate).toBe(true);
    expect(new Set(result.grid.cells)).toEqual(new Set([0.5]));
  });

  it('treats a zero-amplitude noise field as degenerate', () => {
    const field = createNoiseField('silent', 10, 10, { ...defaultNoiseConfig, amplitude: 0 });
    const result = buildHeightMap(field, 10, 10, { contrast: 2, flatElevation: 0.5 });
    expect(result.degenerate).toBe(true);
    expect(result.grid.cells.every((v) => v === 0.25)).toBe(true);
  });

  it('spans the full [0, 1] range for real noise', () => {
    const field = createNoiseField('span', 40, 20, defaultNoiseConfig);
    const { grid } = buildHeightMap(field, 40, 20, defaultHeightMapConfig);
    expect(Math.min(...grid.cells)).toBe(0);
    expect(Math.max(...grid.cells)).toBe(1);
  });

  it('returns a frozen grid', () => {
    const { grid } = buildHeightMap(rampField, 3, 1, defaultHeightMapConfig);
    expect(Object.isFrozen(grid)).toBe(true);
    expect(Object.isFrozen(grid.cells)).toBe(true);
  });
});
