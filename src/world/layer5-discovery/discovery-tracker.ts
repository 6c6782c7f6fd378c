import type { GridPoint, InteractionResult, Location } from '../types/index.js';
import type { DiscoveryConfig } from '../config/world-config.js';
import { manhattanDistance } from '../grid.js';

export const NOTHING_HERE = 'Nothing interesting to interact with here.';

export interface DiscoveryTracker {
  /** Locations within `radius` (Manhattan) of `position`, in placement order. */
  locationsNear(position: GridPoint, radius: number): Location[];
  /** Discover everything within the discovery radius; returns only the newly discovered. */
  checkDiscovery(position: GridPoint): Location[];
  tryInteract(position: GridPoint): InteractionResult;
  discoveredLocations(): Location[];
  discoveredIndices(): number[];
  /** Re-apply saved discovery flags by placement index. */
  restoreDiscoveries(indices: readonly number[]): void;
}

/**
 * Nearest location within `radius`. Ties go to undiscovered locations, then
 * to the earliest placed.
 */
export function pickInteractionTarget(
  locations: readonly Location[],
  position: GridPoint,
  radius: number,
): Location | undefined {
  let best: Location | undefined;
  let bestDistance = Infinity;

  for (const loc of locations) {
    const distance = manhattanDistance(position, loc);
    if (distance > radius) continue;
    const closer = distance < bestDistance;
    const tiedButFresher = distance === bestDistance && best !== undefined && best.discovered && !loc.discovered;
    if (closer || tiedButFresher) {
      best = loc;
      bestDistance = distance;
    }
  }

  return best;
}

function interactionWith(location: Location, message: string): InteractionResult {
  return { success: true, message, detail: location.description, location };
}

/**
 * Holds references to the world's locations, never copies; the
 * `discovered` flags it flips are the ones the rest of the game reads.
 */
export function createDiscoveryTracker(
  locations: readonly Location[],
  config: DiscoveryConfig,
): DiscoveryTracker {
  const locationsNear = (position: GridPoint, radius: number): Location[] => {
    if (radius < 0) return [];
    return locations.filter((loc) => manhattanDistance(position, loc) <= radius);
  };

  return {
    locationsNear,

    checkDiscovery(position) {
      const found: Location[] = [];
      for (const loc of locationsNear(position, config.discoveryRadius)) {
        if (!loc.discovered) {
          loc.discovered = true;
          found.push(loc);
        }
      }
      return found;
    },

    tryInteract(position) {
      const target = pickInteractionTarget(locations, position, config.interactionRadius);
      if (!target) {
        return { success: false, message: NOTHING_HERE };
      }
      if (!target.discovered) {
        target.discovered = true;
        return interactionWith(target, `Discovered ${target.name}!`);
      }
      return interactionWith(target, `Examining ${target.name}...`);
    },

    discoveredLocations() {
      return locations.filter((loc) => loc.discovered);
    },

    discoveredIndices() {
      return locations.filter((loc) => loc.discovered).map((loc) => loc.index);
    },

    restoreDiscoveries(indices) {
      const byIndex = new Map(locations.map((loc) => [loc.index, loc]));
      const targets = indices.map((index) => {
        const loc = byIndex.get(index);
        if (!loc) throw new RangeError(`No location with placement index ${index}`);
        return loc;
      });
      for (const loc of targets) loc.discovered = true;
    },
  };
}
