import type { WorldConfig } from '../config/world-config.js';
import { generateWorld, type GenerateOptions, type World } from './pipeline.js';

export const SNAPSHOT_VERSION = 1;

/**
 * Everything needed to rebuild a world: the grids and locations are
 * regenerated from seed, size and config, then discovery flags reapplied.
 */
export interface WorldSnapshot {
  version: number;
  seed: number;
  width: number;
  height: number;
  config: WorldConfig;
  /** Placement indices of discovered locations. */
  discovered: number[];
}

export function toWorldSnapshot(world: World): WorldSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    seed: world.seed,
    width: world.width,
    height: world.height,
    config: world.config,
    discovered: world.discoveredIndices(),
  };
}

export function restoreWorld(snapshot: WorldSnapshot, options: GenerateOptions = {}): World {
  if (snapshot.version !== SNAPSHOT_VERSION) {
    throw new Error(`Unsupported world snapshot version ${snapshot.version}`);
  }
  const world = generateWorld(snapshot.seed, snapshot.width, snapshot.height, snapshot.config, options);
  world.restoreDiscoveries(snapshot.discovered);
  return world;
}
