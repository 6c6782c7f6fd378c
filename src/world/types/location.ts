import type { BiomeLabel } from './biome.js';

export type LocationType =
  | 'village'
  | 'ruins'
  | 'viewpoint'
  | 'beach'
  | 'grove';

/** Order in which location types claim terrain during placement. */
export const LOCATION_PRIORITY: readonly LocationType[] = [
  'village',
  'ruins',
  'viewpoint',
  'beach',
  'grove',
];

export interface TerrainPreference {
  biomes: BiomeLabel[];
  minElevation?: number;
  maxElevation?: number;
}

export interface Location {
  /** Position in placement order; stable identity for save data. */
  readonly index: number;
  readonly x: number;
  readonly y: number;
  readonly type: LocationType;
  readonly name: string;
  readonly description: string;
  /** Only ever goes from false to true. */
  discovered: boolean;
}

export interface InteractionResult {
  success: boolean;
  message: string;
  /** Lore text of the target location. */
  detail?: string;
  location?: Location;
}
