import { describe, it, expect, beforeEach } from 'vitest';
import { ABILITIES } from '../../shared/constants/AbilityData.js';
import type { MapGeometry } from '../../shared/map/MapGeometry.js';
import {
  activate,
  createInstance,
  remainingDuration,
  smokeSpheres,
  updateAbility,
  validateDefinition,
  type EffectContext,
} from '../../shared/simulation/Abilities.js';
import type { Player } from '../../shared/simulation/Player.js';
import type { AbilityInstance } from '../../shared/types/AbilityTypes.js';
import { Side } from '../../shared/types/GameTypes.js';
import { ShieldType } from '../../shared/types/WeaponTypes.js';
import { vec3 } from '../../shared/util/MathUtils.js';
import { SimulationError } from '../../shared/util/SimulationError.js';
import { arenaMap, makePlayer } from '../helpers.js';

const DT = 0.1;

function context(map: MapGeometry, players: readonly Player[], time: number): EffectContext {
  return { time, dt: DT, map, players, smokes: [] };
}

function instanceOf(name: string, ownerId: string): AbilityInstance {
  const definition = ABILITIES[name];
  if (definition === undefined) throw new Error(`No ability ${name}`);
  return createInstance(definition, ownerId, `${ownerId}-${name}`);
}

describe('Abilities', () => {
  let map: MapGeometry;

  beforeEach(() => {
    map = arenaMap();
  });

  describe('validateDefinition', () => {
    it('accepts the standard roster', () => {
      for (const definition of Object.values(ABILITIES)) {
        expect(validateDefinition(definition)).toBe(definition);
      }
    });

    it('rejects a zero duration', () => {
      let caught: unknown = null;
      try {
        validateDefinition({ ...ABILITIES['smoke'], duration: 0 });
      } catch (error) {
        caught = error;
      }
      expect(caught instanceof SimulationError && caught.code === 'ABILITY_INVALID').toBe(true);
    });

    it('rejects a projectile with no speed', () => {
      expect(() => validateDefinition({ ...ABILITIES['flash'], projectileSpeed: 0 })).toThrow(/projectileSpeed/);
    });
  });

  describe('activation', () => {
    it('spends a charge and refuses a second activation while live', () => {
      const flash = instanceOf('flash', 'a1');
      expect(flash.chargesRemaining).toBe(2);

      expect(activate(flash, 0, vec3(5, 5, 0.9), vec3(1, 0, 0))).toBe(true);
      expect(flash.chargesRemaining).toBe(1);
      expect(activate(flash, 0.1, vec3(5, 5, 0.9), vec3(1, 0, 0))).toBe(false);
      expect(remainingDuration(flash, 0.5)).toBeCloseTo(1);
    });

    it('refuses without charges', () => {
      const definition = ABILITIES['smoke'];
      const smoke = createInstance(definition, 'a1', 'a1-smoke', 0);
      expect(activate(smoke, 0, vec3(10, 5, 0), vec3(1, 0, 0))).toBe(false);
    });
  });

  describe('flash', () => {
    it('flies at its speed and pops after the activation delay', () => {
      const owner = makePlayer('a1', Side.ATTACKERS, vec3(3, 18, 0));
      const victim = makePlayer('d1', Side.DEFENDERS, vec3(18, 5, 0));
      const turned = makePlayer('d2', Side.DEFENDERS, vec3(16, 8, 0));
      turned.facing = { x: 1, y: 0 };
      const players = [owner, victim, turned];
      const flash = instanceOf('flash', 'a1');
      activate(flash, 0, vec3(10, 5, 0.9), vec3(1, 0, 0));

      updateAbility(flash, context(map, players, 0.1));
      expect(flash.position.x).toBeCloseTo(11.5);
      expect(victim.hasStatus('flashed')).toBe(false);

      const { report } = updateAbility(flash, context(map, players, 0.2));
      expect(flash.position.x).toBeCloseTo(13);
      expect(report.newlyAffected).toEqual(['d1']);
      expect(victim.statuses.get('flashed')).toBeCloseTo(1.3);
      expect(turned.hasStatus('flashed')).toBe(false);
    });

    it('blinds allies facing it too', () => {
      const owner = makePlayer('a1', Side.ATTACKERS, vec3(5, 5, 0));
      const flash = instanceOf('flash', 'a1');
      activate(flash, 0, vec3(10, 5, 0.9), vec3(1, 0, 0));

      updateAbility(flash, context(map, [owner], 0.1));
      updateAbility(flash, context(map, [owner], 0.2));

      expect(owner.hasStatus('flashed')).toBe(true);
    });

    it('bounces off a wall and reverses', () => {
      const owner = makePlayer('a1', Side.ATTACKERS, vec3(3, 3, 0));
      const flash = instanceOf('flash', 'a1');
      activate(flash, 0, vec3(15, 15, 0.9), vec3(1, 0, 0));

      for (let k = 1; k <= 4; k++) {
        updateAbility(flash, context(map, [owner], k * DT));
      }

      expect(flash.behavior).toBe('projectile');
      if (flash.behavior === 'projectile') {
        expect(flash.velocity.x).toBe(-15);
        expect(flash.bouncesRemaining).toBe(0);
        expect(flash.position.x).toBeCloseTo(19.999, 3);
        expect(flash.position.x).toBeLessThan(20);
      }
    });

    it('expires at the end of its duration and clears the status', () => {
      const owner = makePlayer('a1', Side.ATTACKERS, vec3(3, 18, 0));
      const victim = makePlayer('d1', Side.DEFENDERS, vec3(18, 5, 0));
      const players = [owner, victim];
      const flash = instanceOf('flash', 'a1');
      activate(flash, 0, vec3(10, 5, 0.9), vec3(1, 0, 0));
      updateAbility(flash, context(map, players, 0.1));
      updateAbility(flash, context(map, players, 0.2));
      expect(victim.hasStatus('flashed')).toBe(true);

      const { outcome } = updateAbility(flash, context(map, players, 1.5));

      expect(outcome).toBe('expired');
      expect(flash.active).toBe(false);
      expect(victim.hasStatus('flashed')).toBe(false);
    });
  });

  describe('smoke', () => {
    it('blocks sight once it is live', () => {
      const owner = makePlayer('a1', Side.ATTACKERS, vec3(3, 18, 0));
      const smoke = instanceOf('smoke', 'a1');
      activate(smoke, 0, vec3(10, 5, 1), vec3(1, 0, 0));
      expect(smokeSpheres([smoke])).toEqual([]);

      updateAbility(smoke, context(map, [owner], 0.1));

      const spheres = smokeSpheres([smoke]);
      expect(spheres).toEqual([{ center: vec3(10, 5, 1), radius: 5 }]);
      expect(map.lineOfSight(vec3(3, 5, 0.9), vec3(18, 5, 0.9), spheres)).toBe(false);
    });
  });

  describe('molly', () => {
    it('burns everyone inside, armor soaking half', () => {
      const owner = makePlayer('a1', Side.ATTACKERS, vec3(3, 18, 0));
      const ally = makePlayer('a2', Side.ATTACKERS, vec3(11, 5, 0));
      const bare = makePlayer('d1', Side.DEFENDERS, vec3(10, 6, 0));
      const shielded = makePlayer('d2', Side.DEFENDERS, vec3(9, 5, 0), { shield: ShieldType.LIGHT });
      const molly = instanceOf('molly', 'a1');
      activate(molly, 0, vec3(10, 5, 0), vec3(1, 0, 0));

      const { report } = updateAbility(molly, context(map, [owner, ally, bare, shielded], 0.1));

      expect(bare.health).toBeCloseTo(97.5);
      expect(shielded.health).toBeCloseTo(98.75);
      expect(shielded.armor).toBeCloseTo(23.75);
      expect(ally.health).toBeCloseTo(97.5);
      expect(owner.health).toBe(100);
      expect(report.damaged.map((d) => d.playerId)).toEqual(['a2', 'd1', 'd2']);
      expect(bare.hasStatus('burning')).toBe(true);
      expect(owner.damageDealt).toBeCloseTo(3.75);
    });
  });

  describe('heal', () => {
    it('heals allies in range only', () => {
      const owner = makePlayer('a1', Side.ATTACKERS, vec3(5, 5, 0));
      const enemy = makePlayer('d1', Side.DEFENDERS, vec3(6, 5, 0));
      owner.health = 50;
      enemy.health = 50;
      const heal = instanceOf('heal', 'a1');
      activate(heal, 0, owner.position, vec3(1, 0, 0));

      const { report } = updateAbility(heal, context(map, [owner, enemy], 0.1));

      expect(owner.health).toBeCloseTo(51.2);
      expect(enemy.health).toBe(50);
      expect(report.healed).toHaveLength(1);
    });
  });

  describe('trap', () => {
    it('slows enemies in radius until it expires', () => {
      const owner = makePlayer('d1', Side.DEFENDERS, vec3(12, 5, 0));
      const inside = makePlayer('a1', Side.ATTACKERS, vec3(6, 5, 0));
      const outside = makePlayer('a2', Side.ATTACKERS, vec3(10, 5, 0));
      const trap = instanceOf('trap', 'd1');
      activate(trap, 0, vec3(5, 5, 0), vec3(1, 0, 0));

      const { report } = updateAbility(trap, context(map, [owner, inside, outside], 0.1));

      expect(report.newlyAffected).toEqual(['a1']);
      expect(inside.statuses.get('slowed')).toBeCloseTo(9.9);
      expect(outside.hasStatus('slowed')).toBe(false);
      expect(owner.hasStatus('slowed')).toBe(false);

      expect(updateAbility(trap, context(map, [owner, inside, outside], 10)).outcome).toBe('expired');
      expect(inside.hasStatus('slowed')).toBe(false);
    });
  });

  it('drops an instance whose owner is gone', () => {
    const smoke = instanceOf('smoke', 'ghost');
    activate(smoke, 0, vec3(10, 5, 1), vec3(1, 0, 0));
    const other = makePlayer('a1', Side.ATTACKERS, vec3(3, 3, 0));

    expect(updateAbility(smoke, context(map, [other], 0.1)).outcome).toBe('expired');
  });
});
