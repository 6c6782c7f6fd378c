import Alea from 'alea';
import { createNoise2D } from 'simplex-noise';
import { ConfigurationError } from '../errors.js';
import { noiseConfigIssues, type NoiseConfig } from '../config/world-config.js';

export interface NoiseField {
  readonly seed: string;
  /** Fractal noise at a grid cell, in [-1, 1]. */
  sample(x: number, y: number): number;
}

/**
 * Build a seeded multi-octave simplex field over a `width` x `height` grid.
 * The grid spans `config.scale` noise units on each axis.
 */
export function createNoiseField(
  seed: string,
  width: number,
  height: number,
  config: NoiseConfig,
): NoiseField {
  const issues = noiseConfigIssues(config);
  if (!Number.isInteger(width) || width <= 0) issues.push(`width must be a positive integer (got ${width})`);
  if (!Number.isInteger(height) || height <= 0) issues.push(`height must be a positive integer (got ${height})`);
  if (issues.length > 0) throw new ConfigurationError(issues);

  const prng = Alea(seed);
  const noise2D = createNoise2D(prng);

  return {
    seed,
    sample(x: number, y: number): number {
      const nx = (x / width) * config.scale;
      const ny = (y / height) * config.scale;

      let value = 0;
      let freq = 1;
      let amp = config.amplitude;
      let maxAmp = 0;

      for (let o = 0; o < config.octaves; o++) {
        value += noise2D(nx * freq, ny * freq) * amp;
        maxAmp += amp;
        freq *= config.lacunarity;
        amp *= config.persistence;
      }

      // zero total amplitude: the field is flat
      if (maxAmp === 0) return 0;
      return value / maxAmp;
    },
  };
}
