export type { BiomeLabel, BiomeInfo } from './biome.js';
export { BIOMES, biomeRank, isBiomeLabel, isWaterBiome } from './biome.js';

export type {
  GridPoint,
  ElevationGrid,
  BiomeGrid,
} from './grid.js';

export type {
  LocationType,
  TerrainPreference,
  Location,
  InteractionResult,
} from './location.js';
export { LOCATION_PRIORITY } from './location.js';
