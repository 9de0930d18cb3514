import { describe, it, expect, beforeEach } from 'vitest';
import { MapGeometry } from '../../shared/map/MapGeometry.js';
import { vec3 } from '../../shared/util/MathUtils.js';
import { SimulationError } from '../../shared/util/SimulationError.js';
import { arenaDocument, arenaMap } from '../helpers.js';

function expectMapInvalid(input: unknown): void {
  let caught: unknown = null;
  try {
    MapGeometry.fromDocument(input);
  } catch (error) {
    caught = error;
  }
  expect(SimulationError.isSimulationError(caught)).toBe(true);
  if (SimulationError.isSimulationError(caught)) {
    expect(caught.code).toBe('MAP_INVALID');
  }
}

describe('MapGeometry', () => {
  let map: MapGeometry;

  beforeEach(() => {
    map = arenaMap();
  });

  describe('construction', () => {
    it('reads the document sections', () => {
      expect(map.name).toBe('Arena');
      expect(map.width).toBe(40);
      expect(map.height).toBe(20);
      expect(map.areas.map((a) => a.name)).toEqual(['Floor', 'Ledge']);
      expect(map.walls[0].heightZ).toBe(10);
      expect(map.objects[0].heightZ).toBe(1);
      expect(map.bombSites.map((s) => s.name)).toEqual(['A', 'B']);
    });

    it('snaps spawns to the floor', () => {
      expect(map.spawns.attackers[0]).toEqual(vec3(3, 12, 0));
      expect(map.spawns.defenders).toHaveLength(5);
    });

    it('rejects a document without bomb sites', () => {
      expectMapInvalid({ ...arenaDocument(), 'bomb-sites': {} });
    });

    it('rejects a boundary outside the map', () => {
      expectMapInvalid({ ...arenaDocument(), walls: { Stray: { x: 38, y: 0, w: 5, h: 2 } } });
    });

    it('rejects a spawn inside a wall', () => {
      expectMapInvalid({
        ...arenaDocument(),
        spawns: { attackers: [[20.5, 15, 0]], defenders: [[36, 12, 0]] },
      });
    });

    it('rejects adjacency to an unknown area', () => {
      expectMapInvalid({ ...arenaDocument(), adjacency: { Floor: ['Basement'] } });
    });

    it('rejects something that is not a map at all', () => {
      expectMapInvalid('not a map');
    });
  });

  describe('elevation', () => {
    it('returns the floor height of the highest containing area', () => {
      expect(map.elevationAt(5, 5)).toBe(0);
      expect(map.elevationAt(35, 4)).toBe(2);
    });

    it('interpolates along a ramp', () => {
      expect(map.elevationAt(27, 4)).toBeCloseTo(1);
      expect(map.elevationAt(24, 4)).toBeCloseTo(0);
    });

    it('lets players stand on a crate resting on the floor', () => {
      expect(map.elevationAt(9, 3)).toBe(1);
    });

    it('reports the highest surface', () => {
      expect(map.maxElevation()).toBe(2);
    });

    it('stays within the floor and the highest surface everywhere', () => {
      const max = map.maxElevation();
      const outOfBounds: string[] = [];
      for (let i = 0; i <= 80; i++) {
        for (let j = 0; j <= 40; j++) {
          const z = map.elevationAt(i * 0.5, j * 0.5);
          if (z < 0 || z > max) outOfBounds.push(`${i * 0.5},${j * 0.5}`);
        }
      }
      expect(outOfBounds).toEqual([]);
    });

    it('climbs the ramp without a jump', () => {
      const ramp = map.ramps.find((r) => r.name === 'Ledge Ramp');
      expect(ramp?.heightZ).toBe(2);

      let largestStep = 0;
      let previous = map.elevationAt(23, 4);
      for (let i = 1; i <= 800; i++) {
        const z = map.elevationAt(23 + i * 0.01, 4);
        largestStep = Math.max(largestStep, Math.abs(z - previous));
        previous = z;
      }

      expect(largestStep).toBeLessThan(0.01);
      expect(previous).toBe(2);
    });
  });

  describe('placement', () => {
    it('accepts open floor', () => {
      expect(map.isValidPosition(35, 10, 0)).toBe(true);
    });

    it('treats the side of an elevated area as solid', () => {
      expect(map.isValidPosition(35, 8.2, 0)).toBe(false);
      expect(map.isValidPosition(35, 7, 2)).toBe(true);
    });

    it('rejects walls and the map edge', () => {
      expect(map.isValidPosition(20.5, 15, 0)).toBe(false);
      expect(map.isValidPosition(0.2, 5, 0)).toBe(false);
    });

    it('does not let a player step up a ledge without a ramp', () => {
      expect(map.canMove(vec3(35, 9, 0), vec3(35, 7, 0))).toBe(false);
      expect(map.canMove(vec3(5, 5, 0), vec3(6, 5, 0))).toBe(true);
    });
  });

  describe('lookups', () => {
    it('finds bomb sites by footprint', () => {
      expect(map.bombSiteAt(34, 3)).toBe('A');
      expect(map.bombSiteAt(14, 14)).toBe('B');
      expect(map.bombSiteAt(5, 5)).toBeNull();
    });

    it('finds the area under a point at a given height', () => {
      expect(map.areaAt(35, 4, 2)?.name).toBe('Ledge');
      expect(map.areaAt(35, 12, 0)?.name).toBe('Floor');
    });

    it('lists neighbouring areas', () => {
      expect(map.neighboursOf('Floor')).toEqual(['Ledge']);
      expect(map.neighboursOf('Nowhere')).toEqual([]);
    });
  });

  describe('raycasting', () => {
    it('hits the nearest solid', () => {
      const hit = map.raycast(vec3(10, 15, 1), vec3(1, 0, 0), 50);
      expect(hit?.boundary.name).toBe('Divider');
      expect(hit?.t).toBeCloseTo(10);
    });

    it('misses when the solid is out of range', () => {
      expect(map.raycast(vec3(10, 15, 1), vec3(1, 0, 0), 5)).toBeNull();
    });

    it('blocks sight through the divider', () => {
      expect(map.lineOfSight(vec3(3, 12, 0.9), vec3(36, 12, 0.9))).toBe(false);
      expect(map.lineOfSight(vec3(3, 5, 0.9), vec3(20, 5, 0.9))).toBe(true);
    });

    it('blocks sight through smoke', () => {
      const smoke = { center: vec3(10, 5, 1), radius: 2 };
      expect(map.lineOfSight(vec3(3, 5, 0.9), vec3(18, 5, 0.9), [smoke])).toBe(false);
    });

    it('sees over a low crate', () => {
      expect(map.lineOfSight(vec3(5, 3, 1.5), vec3(15, 3, 1.5))).toBe(true);
      expect(map.lineOfSight(vec3(5, 3, 0.5), vec3(15, 3, 0.5))).toBe(false);
    });
  });

  describe('castBullet', () => {
    const body = (id: string, x: number) => ({ id, position: vec3(x, 15, 0), radius: 0.5, height: 1.8 });

    it('hits a body in front of the wall', () => {
      const hit = map.castBullet(vec3(10, 15, 1), vec3(1, 0, 0), 50, [body('d1', 15)]);

      expect(hit.targetId).toBe('d1');
      expect(hit.boundary).toBeNull();
      expect(hit.distance).toBeCloseTo(4.51, 2);
    });

    it('stops at the wall before a body behind it', () => {
      const hit = map.castBullet(vec3(10, 15, 1), vec3(1, 0, 0), 50, [body('d1', 25)]);

      expect(hit.targetId).toBeNull();
      expect(hit.boundary?.name).toBe('Divider');
      expect(hit.distance).toBeCloseTo(10);
    });

    it('reports the end of range on a miss', () => {
      const hit = map.castBullet(vec3(5, 15, 1), vec3(0, -1, 0), 5, []);

      expect(hit.targetId).toBeNull();
      expect(hit.boundary).toBeNull();
      expect(hit.point).toEqual(vec3(5, 10, 1));
    });
  });
});
