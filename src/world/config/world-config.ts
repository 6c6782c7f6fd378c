import { BIOMES, isBiomeLabel, isWaterBiome, type BiomeLabel } from '../types/biome.js';
import { LOCATION_PRIORITY, type LocationType, type TerrainPreference } from '../types/location.js';
import { ConfigurationError } from '../errors.js';

export interface NoiseConfig {
  octaves: number;
  /** Noise units spanned by the grid along each axis. */
  scale: number;
  amplitude: number;
  persistence: number;
  lacunarity: number;
}

export interface HeightMapConfig {
  /** Exponent of the power curve applied after normalization. */
  contrast: number;
  /** Substituted for every cell when the raw field is constant. */
  flatElevation: number;
}

export interface IslandMaskConfig {
  /** Normalized distance below which elevation is untouched. */
  innerRadius: number;
  /** Normalized distance at and beyond which elevation is forced to 0. */
  outerRadius: number;
  /** Minimum share of full height kept inside the island core. */
  landBias: number;
}

export interface BiomeBand {
  biome: BiomeLabel;
  /** Inclusive lower bound. */
  min: number;
}

export interface BiomeThresholds {
  /** Label for elevations below the first band. */
  base: BiomeLabel;
  bands: BiomeBand[];
}

export type ScarcityPolicy = 'relax-spacing' | 'under-provision';

export interface CountRange {
  min: number;
  max: number;
}

export interface PlacementConfig {
  counts: Record<LocationType, CountRange>;
  preferences: Record<LocationType, TerrainPreference>;
  /** Manhattan distance. */
  minSpacing: number;
  minTotal: number;
  maxAttemptsPerLocation: number;
  scarcityPolicy: ScarcityPolicy;
  /** Floor for `relax-spacing`. */
  minRelaxedSpacing: number;
}

export interface DiscoveryConfig {
  discoveryRadius: number;
  interactionRadius: number;
}

export interface WorldConfig {
  noise: NoiseConfig;
  heightMap: HeightMapConfig;
  mask: IslandMaskConfig;
  biomes: BiomeThresholds;
  placement: PlacementConfig;
  discovery: DiscoveryConfig;
}

export type WorldConfigOverrides = {
  [K in keyof WorldConfig]?: Partial<WorldConfig[K]>;
};

export const defaultNoiseConfig: NoiseConfig = {
  octaves: 6,
  scale: 2.5,
  amplitude: 1.0,
  persistence: 0.5,
  lacunarity: 2.0,
};

export const defaultHeightMapConfig: HeightMapConfig = {
  contrast: 1.5,
  flatElevation: 0.5,
};

export const defaultIslandMaskConfig: IslandMaskConfig = {
  innerRadius: 0.4,
  outerRadius: 0.95,
  landBias: 0.4,
};

export const defaultBiomeThresholds: BiomeThresholds = {
  base: 'deep_water',
  bands: [
    { biome: 'water', min: 0.2 },
    { biome: 'beach', min: 0.3 },
    { biome: 'grass', min: 0.4 },
    { biome: 'cliff', min: 0.75 },
  ],
};

export const defaultPlacementConfig: PlacementConfig = {
  counts: {
    village: { min: 1, max: 2 },
    ruins: { min: 1, max: 2 },
    viewpoint: { min: 0, max: 1 },
    beach: { min: 1, max: 2 },
    grove: { min: 1, max: 2 },
  },
  preferences: {
    village: { biomes: ['grass'], maxElevation: 0.65 },
    ruins: { biomes: ['grass', 'cliff'], minElevation: 0.55 },
    viewpoint: { biomes: ['grass', 'cliff'], minElevation: 0.65 },
    beach: { biomes: ['beach'] },
    grove: { biomes: ['grass'] },
  },
  minSpacing: 10,
  minTotal: 5,
  maxAttemptsPerLocation: 500,
  scarcityPolicy: 'relax-spacing',
  minRelaxedSpacing: 2,
};

export const defaultDiscoveryConfig: DiscoveryConfig = {
  discoveryRadius: 3,
  interactionRadius: 1,
};

export const defaultWorldConfig: WorldConfig = {
  noise: defaultNoiseConfig,
  heightMap: defaultHeightMapConfig,
  mask: defaultIslandMaskConfig,
  biomes: defaultBiomeThresholds,
  placement: defaultPlacementConfig,
  discovery: defaultDiscoveryConfig,
};

/**
 * Merge overrides over the defaults one section deep. Nested records such as
 * `placement.counts` are replaced as a whole when given. The result shares no
 * objects with the defaults or the overrides.
 */
export function resolveWorldConfig(overrides: WorldConfigOverrides = {}): WorldConfig {
  return structuredClone({
    noise: { ...defaultNoiseConfig, ...overrides.noise },
    heightMap: { ...defaultHeightMapConfig, ...overrides.heightMap },
    mask: { ...defaultIslandMaskConfig, ...overrides.mask },
    biomes: { ...defaultBiomeThresholds, ...overrides.biomes },
    placement: { ...defaultPlacementConfig, ...overrides.placement },
    discovery: { ...defaultDiscoveryConfig, ...overrides.discovery },
  });
}

const isNonNegativeInteger = (value: number) => Number.isInteger(value) && value >= 0;
const isUnitInterval = (value: number) => Number.isFinite(value) && value >= 0 && value <= 1;

export function noiseConfigIssues(config: NoiseConfig): string[] {
  const issues: string[] = [];
  if (!Number.isInteger(config.octaves) || config.octaves <= 0) {
    issues.push(`noise.octaves must be a positive integer (got ${config.octaves})`);
  }
  if (!Number.isFinite(config.scale) || config.scale <= 0) {
    issues.push(`noise.scale must be positive (got ${config.scale})`);
  }
  if (!Number.isFinite(config.amplitude) || config.amplitude < 0) {
    issues.push(`noise.amplitude must not be negative (got ${config.amplitude})`);
  }
  if (!Number.isFinite(config.persistence) || config.persistence < 0) {
    issues.push(`noise.persistence must not be negative (got ${config.persistence})`);
  }
  if (!Number.isFinite(config.lacunarity) || config.lacunarity <= 0) {
    issues.push(`noise.lacunarity must be positive (got ${config.lacunarity})`);
  }
  return issues;
}

export function biomeThresholdIssues(thresholds: BiomeThresholds): string[] {
  const issues: string[] = [];
  if (thresholds.bands.length === 0) {
    issues.push('biomes.bands must not be empty');
    return issues;
  }
  let previousMin = -Infinity;
  let previousRank = -Infinity;
  if (isBiomeLabel(thresholds.base)) {
    previousRank = BIOMES[thresholds.base].rank;
  } else {
    issues.push(`biomes.base names an unknown biome "${thresholds.base}"`);
  }
  for (const band of thresholds.bands) {
    if (!isUnitInterval(band.min)) {
      issues.push(`biomes band "${band.biome}" min must be in [0, 1] (got ${band.min})`);
    } else if (band.min <= previousMin) {
      issues.push(`biomes band "${band.biome}" min must be above the previous band`);
    }
    previousMin = band.min;
    if (!isBiomeLabel(band.biome)) {
      issues.push(`biomes band names an unknown biome "${band.biome}"`);
      continue;
    }
    const rank = BIOMES[band.biome].rank;
    if (rank <= previousRank) {
      issues.push(`biomes band "${band.biome}" must be drier than the band below it`);
    }
    previousRank = rank;
  }
  return issues;
}

function preferenceIssues(type: LocationType, preference: TerrainPreference): string[] {
  const issues: string[] = [];
  if (preference.biomes.length === 0) {
    issues.push(`placement.preferences.${type} must allow at least one biome`);
  }
  const unknown = preference.biomes.filter((biome) => !isBiomeLabel(biome));
  if (unknown.length > 0) {
    issues.push(`placement.preferences.${type} names unknown biomes (${unknown.join(', ')})`);
  }
  const water = preference.biomes.filter((biome) => isBiomeLabel(biome) && isWaterBiome(biome));
  if (water.length > 0) {
    issues.push(`placement.preferences.${type} must not allow water biomes (${water.join(', ')})`);
  }
  const low = preference.minElevation ?? 0;
  const high = preference.maxElevation ?? 1;
  if (!isUnitInterval(low) || !isUnitInterval(high) || low > high) {
    issues.push(
      `placement.preferences.${type} elevation band must satisfy 0 <= minElevation <= maxElevation <= 1 (got ${low}, ${high})`,
    );
  }
  return issues;
}

function placementIssues(config: PlacementConfig): string[] {
  const issues: string[] = [];
  if (!Number.isInteger(config.minSpacing) || config.minSpacing <= 0) {
    issues.push(`placement.minSpacing must be a positive integer (got ${config.minSpacing})`);
  }
  if (!Number.isInteger(config.minRelaxedSpacing) || config.minRelaxedSpacing <= 0) {
    issues.push(`placement.minRelaxedSpacing must be a positive integer (got ${config.minRelaxedSpacing})`);
  } else if (config.minRelaxedSpacing > config.minSpacing) {
    issues.push('placement.minRelaxedSpacing must not exceed placement.minSpacing');
  }
  if (!isNonNegativeInteger(config.minTotal)) {
    issues.push(`placement.minTotal must be a non-negative integer (got ${config.minTotal})`);
  }
  if (!Number.isInteger(config.maxAttemptsPerLocation) || config.maxAttemptsPerLocation <= 0) {
    issues.push(`placement.maxAttemptsPerLocation must be a positive integer (got ${config.maxAttemptsPerLocation})`);
  }
  let maxTotal: number | undefined = 0;
  for (const type of LOCATION_PRIORITY) {
    const range: CountRange | undefined = config.counts[type];
    if (range === undefined) {
      issues.push(`placement.counts.${type} is missing`);
      maxTotal = undefined;
    } else if (!isNonNegativeInteger(range.min) || !isNonNegativeInteger(range.max) || range.min > range.max) {
      issues.push(`placement.counts.${type} must be integers with 0 <= min <= max`);
      maxTotal = undefined;
    } else if (maxTotal !== undefined) {
      maxTotal += range.max;
    }
    const preference: TerrainPreference | undefined = config.preferences[type];
    if (preference === undefined) {
      issues.push(`placement.preferences.${type} is missing`);
    } else {
      issues.push(...preferenceIssues(type, preference));
    }
  }
  if (maxTotal !== undefined && isNonNegativeInteger(config.minTotal) && maxTotal < config.minTotal) {
    issues.push(`placement.minTotal (${config.minTotal}) exceeds the sum of placement.counts maxima (${maxTotal})`);
  }
  return issues;
}

/** Throws a single ConfigurationError listing every problem found. */
export function validateWorldConfig(config: WorldConfig, width: number, height: number): void {
  const issues: string[] = [];

  if (!Number.isInteger(width) || width <= 0) {
    issues.push(`width must be a positive integer (got ${width})`);
  }
  if (!Number.isInteger(height) || height <= 0) {
    issues.push(`height must be a positive integer (got ${height})`);
  }

  issues.push(...noiseConfigIssues(config.noise));

  if (!Number.isFinite(config.heightMap.contrast) || config.heightMap.contrast <= 0) {
    issues.push(`heightMap.contrast must be positive (got ${config.heightMap.contrast})`);
  }
  if (!isUnitInterval(config.heightMap.flatElevation)) {
    issues.push(`heightMap.flatElevation must be in [0, 1] (got ${config.heightMap.flatElevation})`);
  }

  const { innerRadius, outerRadius, landBias } = config.mask;
  if (!Number.isFinite(innerRadius) || innerRadius < 0 || !Number.isFinite(outerRadius) || innerRadius >= outerRadius) {
    issues.push(`mask radii must satisfy 0 <= innerRadius < outerRadius (got ${innerRadius}, ${outerRadius})`);
  }
  if (!isUnitInterval(landBias)) {
    issues.push(`mask.landBias must be in [0, 1] (got ${landBias})`);
  }

  issues.push(...biomeThresholdIssues(config.biomes));
  issues.push(...placementIssues(config.placement));

  const { discoveryRadius, interactionRadius } = config.discovery;
  if (!isNonNegativeInteger(discoveryRadius)) {
    issues.push(`discovery.discoveryRadius must be a non-negative integer (got ${discoveryRadius})`);
  }
  if (!isNonNegativeInteger(interactionRadius)) {
    issues.push(`discovery.interactionRadius must be a non-negative integer (got ${interactionRadius})`);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
}
