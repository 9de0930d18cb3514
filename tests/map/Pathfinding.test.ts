import { describe, it, expect, beforeEach } from 'vitest';
import { Pathfinder } from '../../shared/map/Pathfinding.js';
import { vec3 } from '../../shared/util/MathUtils.js';
import { arenaMap } from '../helpers.js';

describe('Pathfinder', () => {
  let pathfinder: Pathfinder;

  beforeEach(() => {
    pathfinder = new Pathfinder(arenaMap());
  });

  describe('findPath', () => {
    it('starts at the exact start and ends on the goal cell centre', () => {
      const start = vec3(3, 5, 0);
      const path = pathfinder.findPath(start, vec3(6, 5, 0));
      expect(path[0]).toEqual(start);
      expect(path[path.length - 1]).toEqual(vec3(6.5, 5.5, 0));
    });

    it('climbs onto the ledge by way of the ramp', () => {
      const path = pathfinder.findPath(vec3(3, 12, 0), vec3(35, 4, 2));
      expect(path.length).toBeGreaterThan(0);
      expect(path[path.length - 1]).toEqual(vec3(35.5, 4.5, 2));
      expect(path.some((p) => p.z > 0 && p.z < 2)).toBe(true);
    });

    it('relaxes a goal inside a wall to the nearest walkable cell', () => {
      const path = pathfinder.findPath(vec3(3, 12, 0), vec3(20.5, 15.5, 0));
      expect(path[path.length - 1]).toEqual(vec3(19.5, 15.5, 0));
    });

    it('returns nothing from an invalid start', () => {
      expect(pathfinder.findPath(vec3(20.5, 15, 0), vec3(3, 12, 0))).toEqual([]);
    });
  });

  describe('smoothPath', () => {
    it('collapses a straight run on open floor to its ends', () => {
      const start = vec3(2.5, 17.5, 0);
      const path = pathfinder.findPath(start, vec3(12.5, 17.5, 0));
      expect(path.length).toBeGreaterThan(2);
      expect(pathfinder.smoothPath(path)).toEqual([start, vec3(12.5, 17.5, 0)]);
    });

    it('keeps the stepping points on a slope', () => {
      const path = pathfinder.findPath(vec3(22.5, 4.5, 0), vec3(31.5, 4.5, 2));
      const smoothed = pathfinder.smoothPath(path);
      expect(smoothed.length).toBeGreaterThan(2);
      expect(smoothed[smoothed.length - 1]).toEqual(vec3(31.5, 4.5, 2));
    });
  });

  describe('areaRoute', () => {
    it('follows the adjacency graph', () => {
      expect(pathfinder.areaRoute('Floor', 'Ledge')).toEqual(['Floor', 'Ledge']);
      expect(pathfinder.areaRoute('Ledge', 'Ledge')).toEqual(['Ledge']);
    });

    it('returns nothing for an unknown area', () => {
      expect(pathfinder.areaRoute('Floor', 'Basement')).toEqual([]);
    });
  });
});
