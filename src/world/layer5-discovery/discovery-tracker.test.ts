import { describe, it, expect, beforeEach } from 'vitest';
import { createDiscoveryTracker, NOTHING_HERE, pickInteractionTarget } from './discovery-tracker.js';
import type { Location, LocationType } from '../types/index.js';

function makeLocation(index: number, x: number, y: number, type: LocationType = 'village'): Location {
  return {
    index,
    x,
    y,
    type,
    name: `Place ${index}`,
    description: `Lore of place ${index}.`,
    discovered: false,
  };
}

const config = { discoveryRadius: 3, interactionRadius: 1 };

describe('createDiscoveryTracker', () => {
  let locations: Location[];

  beforeEach(() => {
    locations = [
      makeLocation(0, 10, 10),
      makeLocation(1, 20, 20, 'ruins'),
      makeLocation(2, 40, 40, 'viewpoint'),
    ];
  });

  describe('locationsNear', () => {
    it('uses an inclusive Manhattan radius', () => {
      const tracker = createDiscoveryTracker(locations, config);
      expect(tracker.locationsNear({ x: 15, y: 15 }, 9)).toEqual([]);
      expect(tracker.locationsNear({ x: 15, y: 15 }, 10).map((l) => l.index)).toEqual([0, 1]);
      expect(tracker.locationsNear({ x: 12, y: 12 }, 5).map((l) => l.index)).toEqual([0]);
    });

    it('includes an exact match at radius zero and nothing for a negative radius', () => {
      const tracker = createDiscoveryTracker(locations, config);
      expect(tracker.locationsNear({ x: 10, y: 10 }, 0).map((l) => l.index)).toEqual([0]);
      expect(tracker.locationsNear({ x: 10, y: 10 }, -1)).toEqual([]);
    });

    it('does not change discovery state', () => {
      const tracker = createDiscoveryTracker(locations, config);
      tracker.locationsNear({ x: 10, y: 10 }, 50);
      expect(locations.every((l) => !l.discovered)).toBe(true);
    });
  });

  describe('checkDiscovery', () => {
    it('discovers a location when the observer stands on it', () => {
      const tracker = createDiscoveryTracker(locations, { ...config, discoveryRadius: 0 });
      const found = tracker.checkDiscovery({ x: 20, y: 20 });
      expect(found).toEqual([locations[1]]);
      expect(locations[1].discovered).toBe(true);
    });

    it('returns only newly discovered locations', () => {
      const tracker = createDiscoveryTracker(locations, config);
      expect(tracker.checkDiscovery({ x: 11, y: 11 })).toHaveLength(1);
      expect(tracker.checkDiscovery({ x: 11, y: 11 })).toEqual([]);
    });

    it('ignores locations outside the Manhattan radius', () => {
      const tracker = createDiscoveryTracker(locations, config);
      // Manhattan distance 4 from (10, 10)
      expect(tracker.checkDiscovery({ x: 12, y: 12 })).toEqual([]);
      expect(locations[0].discovered).toBe(false);
    });

    it('never undiscovers a location', () => {
      const tracker = createDiscoveryTracker(locations, config);
      tracker.checkDiscovery({ x: 10, y: 10 });
      for (const position of [{ x: 0, y: 0 }, { x: 40, y: 40 }, { x: 10, y: 11 }, { x: 99, y: 99 }]) {
        tracker.checkDiscovery(position);
        expect(locations[0].discovered).toBe(true);
      }
    });

    it('mutates the shared location objects', () => {
      const tracker = createDiscoveryTracker(locations, config);
      const [found] = tracker.checkDiscovery({ x: 40, y: 41 });
      expect(found).toBe(locations[2]);
    });
  });

  describe('tryInteract', () => {
    it('reports nothing when no location is in range', () => {
      const tracker = createDiscoveryTracker(locations, config);
      expect(tracker.tryInteract({ x: 0, y: 0 })).toEqual({ success: false, message: NOTHING_HERE });
    });

    it('discovers an undiscovered target', () => {
      const tracker = createDiscoveryTracker(locations, config);
      const result = tracker.tryInteract({ x: 10, y: 10 });
      expect(result).toEqual({
        success: true,
        message: 'Discovered Place 0!',
        detail: 'Lore of place 0.',
        location: locations[0],
      });
      expect(locations[0].discovered).toBe(true);
    });

    it('examines a discovered target', () => {
      locations[0].discovered = true;
      const tracker = createDiscoveryTracker(locations, config);
      const result = tracker.tryInteract({ x: 10, y: 11 });
      expect(result.success).toBe(true);
      expect(result.message).toBe('Examining Place 0...');
      expect(result.detail).toBe('Lore of place 0.');
    });

    it('does not reach past the interaction radius', () => {
      const tracker = createDiscoveryTracker(locations, config);
      expect(tracker.tryInteract({ x: 12, y: 10 }).success).toBe(false);
    });

    it('prefers the undiscovered location when two are equally close', () => {
      const pair = [makeLocation(0, 4, 5), makeLocation(1, 6, 5)];
      pair[0].discovered = true;
      const tracker = createDiscoveryTracker(pair, config);
      const result = tracker.tryInteract({ x: 5, y: 5 });
      expect(result.location).toBe(pair[1]);
      expect(result.message).toBe('Discovered Place 1!');
    });

    it('prefers the earliest placed location when ties remain', () => {
      const pair = [makeLocation(0, 4, 5), makeLocation(1, 6, 5)];
      const tracker = createDiscoveryTracker(pair, config);
      expect(tracker.tryInteract({ x: 5, y: 5 }).location).toBe(pair[0]);
    });

    it('prefers the nearest location over an undiscovered one further away', () => {
      const pair = [makeLocation(0, 5, 5), makeLocation(1, 6, 5)];
      pair[0].discovered = true;
      const tracker = createDiscoveryTracker(pair, config);
      expect(tracker.tryInteract({ x: 5, y: 5 }).location).toBe(pair[0]);
    });
  });

  describe('persistence helpers', () => {
    it('lists discovered locations and their indices', () => {
      const tracker = createDiscoveryTracker(locations, config);
      tracker.checkDiscovery({ x: 21, y: 21 });
      expect(tracker.discoveredLocations()).toEqual([locations[1]]);
      expect(tracker.discoveredIndices()).toEqual([1]);
    });

    it('restores discovery flags by placement index', () => {
      const tracker = createDiscoveryTracker(locations, config);
      tracker.restoreDiscoveries([0, 2]);
      expect(locations.map((l) => l.discovered)).toEqual([true, false, true]);
    });

    it('rejects unknown indices without applying any flag', () => {
      const tracker = createDiscoveryTracker(locations, config);
      expect(() => tracker.restoreDiscoveries([0, 7])).toThrow(RangeError);
      expect(locations[0].discovered).toBe(false);
    });
  });
});

describe('pickInteractionTarget', () => {
  it('returns undefined when nothing is within the radius', () => {
    expect(pickInteractionTarget([makeLocation(0, 3, 3)], { x: 0, y: 0 }, 1)).toBeUndefined();
  });
});
