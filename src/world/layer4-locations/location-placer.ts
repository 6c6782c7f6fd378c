import type {
  BiomeGrid,
  BiomeLabel,
  ElevationGrid,
  GridPoint,
  Location,
  LocationType,
  TerrainPreference,
} from '../types/index.js';
import { LOCATION_PRIORITY } from '../types/index.js';
import type { PlacementConfig, ScarcityPolicy } from '../config/world-config.js';
import { manhattanDistance } from '../grid.js';
import { loadCatalog, type LocationCatalog } from './location-catalog.js';
import { createLogger } from '../../logging/logger.js';

const log = createLogger('worldgen:locations');

/** Uniform in [0, 1). */
export type RandomSource = () => number;

export interface PlacementInput {
  elevation: ElevationGrid;
  biomes: BiomeGrid;
  config: PlacementConfig;
  random: RandomSource;
  catalog?: LocationCatalog;
}

export interface TypePlacementCount {
  requested: number;
  placed: number;
}

export interface ScarcityEvent {
  type: LocationType;
  requested: number;
  placed: number;
  policy: ScarcityPolicy;
}

export interface PlacementReport {
  counts: Record<LocationType, TypePlacementCount>;
  scarcity: ScarcityEvent[];
  /** Smallest spacing any accepted placement was checked against. */
  effectiveMinSpacing: number;
  /** Cells matching at least one type's terrain preference. */
  validCellCount: number;
  /** Too few valid cells for `minTotal` locations at full spacing. */
  provablyTooSmall: boolean;
}

export interface PlacementResult {
  locations: Location[];
  report: PlacementReport;
}

export function randomInt(random: RandomSource, min: number, max: number): number {
  return Math.min(max, min + Math.floor(random() * (max - min + 1)));
}

export function matchesPreference(preference: TerrainPreference, biome: BiomeLabel, elevation: number): boolean {
  if (!preference.biomes.includes(biome)) return false;
  if (preference.minElevation !== undefined && elevation < preference.minElevation) return false;
  if (preference.maxElevation !== undefined && elevation > preference.maxElevation) return false;
  return true;
}

/** True when `candidate` is at least `minSpacing` (Manhattan) from every placed point. */
export function isWellSpaced(candidate: GridPoint, placed: readonly GridPoint[], minSpacing: number): boolean {
  return placed.every((other) => manhattanDistance(candidate, other) >= minSpacing);
}

function emptyCounts(): Record<LocationType, TypePlacementCount> {
  return {
    village: { requested: 0, placed: 0 },
    ruins: { requested: 0, placed: 0 },
    viewpoint: { requested: 0, placed: 0 },
    beach: { requested: 0, placed: 0 },
    grove: { requested: 0, placed: 0 },
  };
}

/**
 * Place points of interest type by type in priority order.
 *
 * Each instance samples uniform cells until one matches the type's terrain
 * and keeps the spacing, up to `maxAttemptsPerLocation`. Exhausting the cap
 * triggers the scarcity policy. A top-up pass then adds instances, one type at
 * a time, until `minTotal` is met or nothing more fits.
 *
 * Random draws happen in a fixed order (count per type, then x and y per
 * attempt, then name and description per accepted cell), so the same source
 * and inputs reproduce the same list.
 */
export function placeLocations(input: PlacementInput): PlacementResult {
  const { elevation, biomes, config, random } = input;
  const catalog = input.catalog ?? loadCatalog();
  const { width, height } = elevation;

  const placed: Location[] = [];
  const usedNames = new Map<LocationType, Set<string>>();
  const counts = emptyCounts();
  const exhausted = new Set<LocationType>();
  let effectiveMinSpacing = config.minSpacing;

  const matches = (type: LocationType, idx: number) =>
    matchesPreference(config.preferences[type], biomes.cells[idx], elevation.cells[idx]);

  const validByType = new Map<LocationType, number>();
  let validCellCount = 0;
  for (let idx = 0; idx < elevation.cells.length; idx++) {
    let anyType = false;
    for (const type of LOCATION_PRIORITY) {
      if (matches(type, idx)) {
        validByType.set(type, (validByType.get(type) ?? 0) + 1);
        anyType = true;
      }
    }
    if (anyType) validCellCount++;
  }
  const provablyTooSmall = validCellCount < config.minSpacing * config.minTotal;

  const pick = (list: string[]) => list[randomInt(random, 0, list.length - 1)];

  const sampleCell = (type: LocationType, spacing: number): GridPoint | undefined => {
    for (let attempt = 0; attempt < config.maxAttemptsPerLocation; attempt++) {
      const x = randomInt(random, 0, width - 1);
      const y = randomInt(random, 0, height - 1);
      if (!matches(type, y * width + x)) continue;
      if (!isWellSpaced({ x, y }, placed, spacing)) continue;
      return { x, y };
    }
    return undefined;
  };

  const placeOne = (type: LocationType): boolean => {
    if ((validByType.get(type) ?? 0) === 0) return false;

    let spacing = config.minSpacing;
    for (;;) {
      const cell = sampleCell(type, spacing);
      if (cell) {
        const used = usedNames.get(type) ?? new Set<string>();
        const fresh = catalog[type].names.filter((name) => !used.has(name));
        const name = pick(fresh.length > 0 ? fresh : catalog[type].names);
        const description = pick(catalog[type].descriptions);
        used.add(name);
        usedNames.set(type, used);

        placed.push({ index: placed.length, x: cell.x, y: cell.y, type, name, description, discovered: false });
        counts[type].placed++;
        effectiveMinSpacing = Math.min(effectiveMinSpacing, spacing);
        return true;
      }
      if (config.scarcityPolicy !== 'relax-spacing' || spacing <= config.minRelaxedSpacing) {
        return false;
      }
      spacing = Math.max(config.minRelaxedSpacing, Math.floor(spacing / 2));
      log.debug({ type, spacing }, 'Relaxing location spacing');
    }
  };

  for (const type of LOCATION_PRIORITY) {
    const range = config.counts[type];
    counts[type].requested = randomInt(random, range.min, range.max);
    for (let i = 0; i < counts[type].requested; i++) {
      if (!placeOne(type)) {
        exhausted.add(type);
        break;
      }
    }
  }

  let progressed = true;
  while (placed.length < config.minTotal && progressed) {
    progressed = false;
    for (const type of LOCATION_PRIORITY) {
      if (placed.length >= config.minTotal) break;
      if (exhausted.has(type) || counts[type].requested >= config.counts[type].max) continue;
      counts[type].requested++;
      if (placeOne(type)) {
        progressed = true;
      } else {
        exhausted.add(type);
      }
    }
  }

  const scarcity: ScarcityEvent[] = [];
  for (const type of LOCATION_PRIORITY) {
    const { requested, placed: placedCount } = counts[type];
    if (placedCount < requested) {
      scarcity.push({ type, requested, placed: placedCount, policy: config.scarcityPolicy });
    }
  }

  if (scarcity.length > 0 || placed.length < config.minTotal) {
    log.warn(
      { scarcity, total: placed.length, minTotal: config.minTotal, validCellCount, provablyTooSmall },
      'Location placement under-provisioned',
    );
  }

  return {
    locations: placed,
    report: { counts, scarcity, effectiveMinSpacing, validCellCount, provablyTooSmall },
  };
}
