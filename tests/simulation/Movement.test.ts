import { describe, it, expect, beforeEach } from 'vitest';
import type { MapGeometry } from '../../shared/map/MapGeometry.js';
import { updateMovement, type MovementResult } from '../../shared/simulation/Movement.js';
import type { Player } from '../../shared/simulation/Player.js';
import { Side } from '../../shared/types/GameTypes.js';
import { vec3 } from '../../shared/util/MathUtils.js';
import { SeededRandom } from '../../shared/util/RandomUtils.js';
import { arenaMap, makePlayer } from '../helpers.js';

const DT = 0.1;

/** Step until the player lands, or give up after `limit` ticks. */
function stepUntilLanded(player: Player, map: MapGeometry, tuning?: { safeFallHeight: number; damagePerUnit: number }): MovementResult | null {
  for (let i = 0; i < 50; i++) {
    const result = updateMovement(player, DT, map, tuning);
    if (result.landed) return result;
  }
  return null;
}

describe('updateMovement', () => {
  let map: MapGeometry;

  beforeEach(() => {
    map = arenaMap();
  });

  describe('horizontal motion', () => {
    it('reaches run speed in one tick from rest', () => {
      const player = makePlayer('a1', Side.ATTACKERS, vec3(5, 5, 0));
      player.setMovementInput({ x: 1, y: 0 }, false, false, false);

      updateMovement(player, DT, map);

      expect(player.velocity.x).toBeCloseTo(5.5);
      expect(player.position.x).toBeCloseTo(5.55);
      expect(player.position.z).toBe(0);
    });

    it('caps walking at walk speed', () => {
      const player = makePlayer('a1', Side.ATTACKERS, vec3(5, 5, 0));
      player.setMovementInput({ x: 0, y: 1 }, true, false, false);

      updateMovement(player, DT, map);

      expect(player.velocity.y).toBeCloseTo(3.5);
    });

    it('slows down by friction without intent', () => {
      const player = makePlayer('a1', Side.ATTACKERS, vec3(5, 5, 0));
      player.setMovementInput({ x: 1, y: 0 }, false, false, false);
      updateMovement(player, DT, map);

      player.stopMoving();
      updateMovement(player, DT, map);

      expect(player.velocity.x).toBeCloseTo(4.7);
    });

    it('stops at zero instead of reversing', () => {
      const player = makePlayer('a1', Side.ATTACKERS, vec3(5, 5, 0));
      player.velocity = vec3(0.3, 0, 0);

      updateMovement(player, DT, map);

      expect(player.velocity.x).toBeCloseTo(0);
    });

    it('does nothing for a dead player', () => {
      const player = makePlayer('a1', Side.ATTACKERS, vec3(5, 5, 0));
      player.setMovementInput({ x: 1, y: 0 }, false, false, false);
      player.kill();

      updateMovement(player, DT, map);

      expect(player.position).toEqual(vec3(5, 5, 0));
    });
  });

  describe('collision', () => {
    it('holds a player walking into the side of the ledge', () => {
      const player = makePlayer('d1', Side.DEFENDERS, vec3(35, 10, 0));
      let blocked = false;

      for (let i = 0; i < 10; i++) {
        player.setMovementInput({ x: 0, y: -1 }, false, false, false);
        blocked = updateMovement(player, DT, map).blocked || blocked;
      }

      expect(blocked).toBe(true);
      expect(player.position.y).toBeGreaterThanOrEqual(8.5);
      expect(player.position.z).toBe(0);
      expect(map.isValidPosition(player.position.x, player.position.y, player.position.z)).toBe(true);
    });

    it('slides along a wall on the free axis', () => {
      const player = makePlayer('a1', Side.ATTACKERS, vec3(19.4, 14, 0));
      player.setMovementInput({ x: 1, y: 1 }, false, false, false);

      const result = updateMovement(player, DT, map);

      expect(result.blocked).toBe(true);
      expect(player.position.x).toBe(19.4);
      expect(player.position.y).toBeGreaterThan(14);
      expect(player.velocity.x).toBe(0);
    });
  });

  describe('elevation', () => {
    it('follows the ramp surface up onto the ledge', () => {
      const player = makePlayer('a1', Side.ATTACKERS, vec3(22, 4, 0));

      for (let i = 0; i < 20; i++) {
        player.setMovementInput({ x: 1, y: 0 }, false, false, false);
        updateMovement(player, DT, map);
        expect(player.position.z).toBeCloseTo(map.elevationAt(player.position.x, player.position.y));
      }

      expect(player.position.x).toBeGreaterThan(30);
      expect(player.position.z).toBeCloseTo(2);
      expect(player.grounded).toBe(true);
    });

    it('leaves the ground on a jump', () => {
      const player = makePlayer('a1', Side.ATTACKERS, vec3(5, 5, 0));
      player.setMovementInput({ x: 0, y: 0 }, false, false, true);

      updateMovement(player, DT, map);

      expect(player.position.z).toBeCloseTo(0.5);
      expect(player.velocity.z).toBeCloseTo(5);
      expect(player.grounded).toBe(false);
    });

    it('lands a jump back on level ground without damage', () => {
      const player = makePlayer('a1', Side.ATTACKERS, vec3(5, 5, 0));
      player.setMovementInput({ x: 0, y: 0 }, false, false, true);

      const landing = stepUntilLanded(player, map);

      expect(landing?.fallDamage).toBe(0);
      expect(player.position.z).toBe(0);
      expect(player.health).toBe(100);
    });

    it('takes fall damage stepping off the ledge', () => {
      const player = makePlayer('d1', Side.DEFENDERS, vec3(35, 7, 2));
      player.setMovementInput({ x: 0, y: 1 }, false, false, false);

      const landing = stepUntilLanded(player, map);

      expect(landing?.fallDistance).toBeCloseTo(2);
      expect(landing?.fallDamage).toBe(12);
      expect(player.health).toBe(88);
      expect(player.position.z).toBe(0);
    });

    it('uses the fall tuning it is given', () => {
      const player = makePlayer('d1', Side.DEFENDERS, vec3(35, 7, 2));
      player.setMovementInput({ x: 0, y: 1 }, false, false, false);

      const landing = stepUntilLanded(player, map, { safeFallHeight: 0.5, damagePerUnit: 10 });

      expect(landing?.fallDamage).toBe(15);
      expect(player.health).toBe(85);
    });
  });

  describe('containment', () => {
    it('never leaves valid space under random intents', () => {
      const starts = [vec3(3, 12, 0), vec3(36, 12, 0), vec3(26, 4, map.elevationAt(26, 4)), vec3(35, 4, 2), vec3(19, 15, 0)];
      let failures = 0;

      for (let seed = 1; seed <= 20; seed++) {
        const rng = new SeededRandom(seed);
        const player = makePlayer('a1', Side.ATTACKERS, starts[seed % starts.length]);
        for (let tick = 0; tick < 300; tick++) {
          const angle = rng.next() * Math.PI * 2;
          player.setMovementInput(
            { x: Math.cos(angle), y: Math.sin(angle) },
            rng.next() < 0.2,
            rng.next() < 0.2,
            rng.next() < 0.1,
          );
          updateMovement(player, DT, map);
          const { x, y, z } = player.position;
          if (!map.isValidPosition(x, y, z, player.radius, player.height)) failures += 1;
        }
      }

      expect(failures).toBe(0);
    });
  });
});
