export { generateWorld } from './world/pipeline/pipeline.js';
export type { World, GenerationReport, GenerateOptions } from './world/pipeline/pipeline.js';
export { toWorldSnapshot, restoreWorld, SNAPSHOT_VERSION } from './world/pipeline/snapshot.js';
export type { WorldSnapshot } from './world/pipeline/snapshot.js';

export {
  defaultWorldConfig,
  resolveWorldConfig,
  validateWorldConfig,
} from './world/config/world-config.js';
export type {
  WorldConfig,
  WorldConfigOverrides,
  NoiseConfig,
  HeightMapConfig,
  IslandMaskConfig,
  BiomeThresholds,
  PlacementConfig,
  DiscoveryConfig,
  ScarcityPolicy,
} from './world/config/world-config.js';

export { ConfigurationError, OutOfBoundsError } from './world/errors.js';

export { createNoiseField } from './world/layer1-noise/noise-field.js';
export type { NoiseField } from './world/layer1-noise/noise-field.js';
export { buildHeightMap } from './world/layer2-terrain/height-map.js';
export { applyIslandMask } from './world/layer2-terrain/island-mask.js';
export { classifyBiomes, classifyElevation } from './world/layer3-biomes/biome-classifier.js';
export { placeLocations } from './world/layer4-locations/location-placer.js';
export type { PlacementReport, ScarcityEvent, RandomSource } from './world/layer4-locations/location-placer.js';
export { createDiscoveryTracker } from './world/layer5-discovery/discovery-tracker.js';
export type { DiscoveryTracker } from './world/layer5-discovery/discovery-tracker.js';

export * from './world/types/index.js';
