export type BiomeLabel =
  | 'deep_water'
  | 'water'
  | 'beach'
  | 'grass'
  | 'cliff';

export interface BiomeInfo {
  label: BiomeLabel;
  /** Ascending from wettest to driest/highest. */
  rank: number;
  isWater: boolean;
}

export const BIOMES: Record<BiomeLabel, BiomeInfo> = {
  deep_water: { label: 'deep_water', rank: 0, isWater: true },
  water:      { label: 'water',      rank: 1, isWater: true },
  beach:      { label: 'beach',      rank: 2, isWater: false },
  grass:      { label: 'grass',      rank: 3, isWater: false },
  cliff:      { label: 'cliff',      rank: 4, isWater: false },
};

export function isBiomeLabel(value: string): value is BiomeLabel {
  return Object.hasOwn(BIOMES, value);
}

export function biomeRank(label: BiomeLabel): number {
  return BIOMES[label].rank;
}

export function isWaterBiome(label: BiomeLabel): boolean {
  return BIOMES[label].isWater;
}
