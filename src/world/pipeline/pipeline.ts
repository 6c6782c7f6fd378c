import Alea from 'alea';
import type {
  BiomeGrid,
  BiomeLabel,
  ElevationGrid,
  GridPoint,
  Location,
} from '../types/index.js';
import { isWaterBiome } from '../types/index.js';
import {
  resolveWorldConfig,
  validateWorldConfig,
  type WorldConfig,
  type WorldConfigOverrides,
} from '../config/world-config.js';
import { ConfigurationError } from '../errors.js';
import { cellIndex } from '../grid.js';
import { createNoiseField } from '../layer1-noise/noise-field.js';
import { buildHeightMap } from '../layer2-terrain/height-map.js';
import { applyIslandMask } from '../layer2-terrain/island-mask.js';
import { classifyBiomes, landThreshold } from '../layer3-biomes/biome-classifier.js';
import { placeLocations, type PlacementReport } from '../layer4-locations/location-placer.js';
import type { LocationCatalog } from '../layer4-locations/location-catalog.js';
import { createDiscoveryTracker, type DiscoveryTracker } from '../layer5-discovery/discovery-tracker.js';
import { findStartPosition } from './start-position.js';
import { createLogger } from '../../logging/logger.js';

const log = createLogger('worldgen:pipeline');

export interface GenerationReport {
  heightMap: {
    rawMin: number;
    rawMax: number;
    degenerate: boolean;
  };
  placement: PlacementReport;
}

export interface World extends DiscoveryTracker {
  readonly seed: number;
  readonly width: number;
  readonly height: number;
  readonly config: WorldConfig;
  readonly elevation: ElevationGrid;
  readonly biomes: BiomeGrid;
  readonly locations: readonly Location[];
  readonly report: GenerationReport;
  /** Throws OutOfBoundsError outside the grid. */
  elevationAt(x: number, y: number): number;
  /** Throws OutOfBoundsError outside the grid. */
  biomeAt(x: number, y: number): BiomeLabel;
  /** Land cell nearest the centre, or undefined when the island is all water. */
  findStartPosition(): GridPoint | undefined;
}

export interface GenerateOptions {
  catalog?: LocationCatalog;
}

/**
 * Run every generation stage for one island. Same seed, size and config give
 * identical grids and locations.
 */
export function generateWorld(
  seed: number,
  width: number,
  height: number,
  overrides: WorldConfigOverrides = {},
  options: GenerateOptions = {},
): World {
  if (!Number.isSafeInteger(seed)) {
    throw new ConfigurationError([`seed must be an integer (got ${seed})`]);
  }
  const config = resolveWorldConfig(overrides);
  validateWorldConfig(config, width, height);

  log.info(`[Layer 1] Building noise field (${width}x${height}, seed: ${seed}, ${config.noise.octaves} octaves)...`);
  const field = createNoiseField(`${seed}-elevation`, width, height, config.noise);

  log.info('[Layer 2] Building height map and island mask...');
  const heightMap = buildHeightMap(field, width, height, config.heightMap);
  const elevation = applyIslandMask(heightMap.grid, config.mask);

  log.info('[Layer 3] Classifying biomes...');
  const biomes = classifyBiomes(elevation, config.biomes);

  log.info('[Layer 4] Placing locations...');
  const placement = placeLocations({
    elevation,
    biomes,
    config: config.placement,
    random: Alea(`${seed}-locations`),
    catalog: options.catalog,
  });
  const { locations } = placement;
  log.info(`[Layer 4] Placed ${locations.length} locations`);

  const tracker = createDiscoveryTracker(locations, config.discovery);
  const walkableFrom = landThreshold(config.biomes, isWaterBiome);

  return {
    ...tracker,
    seed,
    width,
    height,
    config,
    elevation,
    biomes,
    locations,
    report: {
      heightMap: { rawMin: heightMap.rawMin, rawMax: heightMap.rawMax, degenerate: heightMap.degenerate },
      placement: placement.report,
    },
    elevationAt: (x, y) => elevation.cells[cellIndex(elevation, x, y)],
    biomeAt: (x, y) => biomes.cells[cellIndex(biomes, x, y)],
    findStartPosition: () => findStartPosition(elevation, walkableFrom),
  };
}
