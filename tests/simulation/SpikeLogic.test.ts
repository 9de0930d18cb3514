import { describe, it, expect, beforeEach } from 'vitest';
import type { MapGeometry } from '../../shared/map/MapGeometry.js';
import type { Player } from '../../shared/simulation/Player.js';
import { SpikeLogic } from '../../shared/simulation/SpikeLogic.js';
import { Side, SpikeState } from '../../shared/types/GameTypes.js';
import { vec3 } from '../../shared/util/MathUtils.js';
import { arenaMap, makePlayer } from '../helpers.js';

/* Half-second ticks keep the progress sums exact */
const DT = 0.5;

describe('SpikeLogic', () => {
  let map: MapGeometry;
  let carrier: Player;
  let spike: SpikeLogic;

  beforeEach(() => {
    map = arenaMap();
    carrier = makePlayer('a1', Side.ATTACKERS, vec3(35, 4, 2));
    carrier.hasSpike = true;
    spike = new SpikeLogic(map, carrier.id);
  });

  function plant(ticks: number = 8): void {
    for (let i = 0; i < ticks; i++) spike.tickPlant(carrier, true, DT, i * DT);
  }

  describe('plant', () => {
    it('plants after four seconds inside a site', () => {
      for (let i = 0; i < 7; i++) {
        expect(spike.tickPlant(carrier, true, DT, i * DT)).toBe('progress');
      }
      expect(spike.state).toBe(SpikeState.PLANTING);

      expect(spike.tickPlant(carrier, true, DT, 4)).toBe('planted');
      expect(spike.state).toBe(SpikeState.PLANTED);
      expect(spike.plantSite).toBe('A');
      expect(spike.position).toEqual(vec3(35, 4, 2));
      expect(spike.timeRemaining).toBe(45);
      expect(spike.carrierId).toBeNull();
      expect(carrier.hasSpike).toBe(false);
      expect(carrier.plants).toBe(1);
    });

    it('resets progress when the carrier lets go', () => {
      plant(4);
      expect(carrier.plantProgress).toBe(2);

      expect(spike.tickPlant(carrier, false, DT, 2)).toBe('reset');
      expect(carrier.plantProgress).toBe(0);
      expect(spike.state).toBe(SpikeState.CARRIED);
    });

    it('resets once when the carrier steps off the site and starts over on return', () => {
      const results: string[] = [];
      let peak = 0;
      const step = (time: number): void => {
        results.push(spike.tickPlant(carrier, true, DT, time));
        peak = Math.max(peak, carrier.plantProgress);
      };

      for (let i = 0; i < 4; i++) step(i * DT);
      carrier.position = vec3(31, 4, 2);
      step(2);
      step(2.5);
      expect(carrier.plantProgress).toBe(0);

      carrier.position = vec3(35, 4, 2);
      for (let i = 0; i < 8; i++) step(3 + i * DT);

      expect(results.filter((r) => r === 'reset')).toHaveLength(1);
      expect(results.slice(4, 6)).toEqual(['reset', 'none']);
      expect(results[results.length - 1]).toBe('planted');
      expect(peak).toBeLessThanOrEqual(4);
      expect(spike.plantedAt).toBe(6.5);
    });

    it('does nothing outside a site', () => {
      carrier.position = vec3(5, 5, 0);
      expect(spike.tickPlant(carrier, true, DT, 0)).toBe('none');
      expect(spike.state).toBe(SpikeState.CARRIED);
    });

    it('ignores anyone but the carrier', () => {
      const other = makePlayer('a2', Side.ATTACKERS, vec3(35, 4, 2));
      expect(spike.tickPlant(other, true, DT, 0)).toBe('none');
    });
  });

  describe('defuse', () => {
    let defender: Player;

    beforeEach(() => {
      plant();
      defender = makePlayer('d1', Side.DEFENDERS, vec3(36, 5, 2));
    });

    it('defuses after seven seconds in range', () => {
      for (let i = 0; i < 13; i++) {
        expect(spike.tickDefuse(defender, true, DT)).toBe('progress');
      }
      expect(spike.state).toBe(SpikeState.DEFUSING);
      expect(spike.tickDefuse(defender, true, DT)).toBe('defused');
      expect(spike.state).toBe(SpikeState.DEFUSED);
      expect(spike.timeRemaining).toBeNull();
      expect(defender.defuses).toBe(1);
    });

    it('drops back to zero when interrupted early', () => {
      for (let i = 0; i < 6; i++) spike.tickDefuse(defender, true, DT);
      expect(spike.tickDefuse(defender, false, DT)).toBe('reset');
      expect(spike.defuseProgress).toBe(0);
      expect(spike.state).toBe(SpikeState.PLANTED);
    });

    it('resets progress when the defuser leaves range', () => {
      for (let i = 0; i < 8; i++) spike.tickDefuse(defender, true, DT);
      expect(spike.defuseProgress).toBe(4);

      defender.position = vec3(31, 5, 2);
      expect(spike.tickDefuse(defender, true, DT)).toBe('reset');
      expect(spike.defuseProgress).toBe(0);
      expect(defender.defuseProgress).toBe(0);
      expect(spike.defuserId).toBeNull();

      const other = makePlayer('d2', Side.DEFENDERS, vec3(34, 4, 2));
      for (let i = 0; i < 13; i++) {
        expect(spike.tickDefuse(other, true, DT)).toBe('progress');
      }
      expect(spike.tickDefuse(other, true, DT)).toBe('defused');
    });

    it('lets only one defender work at a time', () => {
      const other = makePlayer('d2', Side.DEFENDERS, vec3(34, 4, 2));
      spike.tickDefuse(defender, true, DT);
      expect(spike.tickDefuse(other, true, DT)).toBe('none');
      expect(spike.defuserId).toBe('d1');
    });

    it('needs the defender within range', () => {
      const far = makePlayer('d2', Side.DEFENDERS, vec3(35, 12, 0));
      expect(spike.tickDefuse(far, true, DT)).toBe('none');
    });
  });

  describe('timer', () => {
    it('detonates 45 seconds after the plant', () => {
      plant();
      for (let i = 0; i < 89; i++) {
        expect(spike.tickTimer(DT)).toBe(false);
      }
      expect(spike.tickTimer(DT)).toBe(true);
      expect(spike.state).toBe(SpikeState.DETONATED);
    });

    it('does not run before the plant', () => {
      expect(spike.tickTimer(DT)).toBe(false);
      expect(spike.timeRemaining).toBeNull();
    });
  });

  describe('drop and pickup', () => {
    it('drops where the carrier died and lets an attacker pick it up', () => {
      spike.drop(carrier, vec3(10, 10, 0));
      expect(spike.state).toBe(SpikeState.DROPPED);
      expect(carrier.hasSpike).toBe(false);

      const defender = makePlayer('d1', Side.DEFENDERS, vec3(10, 10.5, 0));
      expect(spike.tryPickup(defender)).toBe(false);

      const far = makePlayer('a2', Side.ATTACKERS, vec3(10, 12, 0));
      expect(spike.tryPickup(far)).toBe(false);

      const near = makePlayer('a3', Side.ATTACKERS, vec3(11, 10, 0));
      expect(spike.tryPickup(near)).toBe(true);
      expect(spike.carrierId).toBe('a3');
      expect(near.hasSpike).toBe(true);
      expect(spike.state).toBe(SpikeState.CARRIED);
    });
  });
});
