import { describe, it, expect } from 'vitest';
import { DUEL_TUNING } from '../../shared/constants/GameConstants.js';
import { CombatSystem, dropsOnDeath } from '../../shared/simulation/Combat.js';
import type { Player } from '../../shared/simulation/Player.js';
import { Side } from '../../shared/types/GameTypes.js';
import { ShieldType, WeaponId } from '../../shared/types/WeaponTypes.js';
import { vec3 } from '../../shared/util/MathUtils.js';
import { SeededRandom } from '../../shared/util/RandomUtils.js';
import { makePlayer } from '../helpers.js';

/** A rifler with heavy shield and a pistol player, `gap` units apart on the x axis. */
function pair(gap: number = 10): { a: Player; b: Player } {
  const a = makePlayer('a1', Side.ATTACKERS, vec3(0, 5, 0), {
    aim: 80,
    weapon: WeaponId.VANDAL,
    shield: ShieldType.HEAVY,
  });
  const b = makePlayer('d1', Side.DEFENDERS, vec3(gap, 5, 0), { aim: 50 });
  return { a, b };
}

function spotEachOther(a: Player, b: Player): void {
  a.visibleEnemies.add(b.id);
  b.visibleEnemies.add(a.id);
}

describe('CombatSystem', () => {
  const combat = new CombatSystem();

  describe('computeAdvantage', () => {
    it('multiplies aim, weapon tier and armor', () => {
      const { a, b } = pair();
      spotEachOther(a, b);
      expect(combat.computeAdvantage(a, b)).toBeCloseTo(0.88);
      expect(combat.computeAdvantage(b, a)).toBeCloseTo(0.4);
    });

    it('rewards shooting an opponent who has not spotted you', () => {
      const { a, b } = pair();
      a.visibleEnemies.add(b.id);
      expect(combat.computeAdvantage(a, b)).toBeCloseTo(1.32);
    });

    it('punishes a flashed shooter', () => {
      const { a, b } = pair();
      spotEachOther(a, b);
      a.addStatus('flashed', 1);
      expect(combat.computeAdvantage(a, b)).toBeCloseTo(0.176);
    });

    it('punishes a moving shooter by movement accuracy', () => {
      const { a, b } = pair();
      spotEachOther(a, b);
      a.velocity = vec3(3, 0, 0);
      expect(combat.computeAdvantage(a, b)).toBeCloseTo(0.44);
    });

    it('applies the range bands', () => {
      const close = pair(3);
      spotEachOther(close.a, close.b);
      expect(combat.computeAdvantage(close.a, close.b)).toBeCloseTo(0.792);

      const far = pair(35);
      spotEachOther(far.a, far.b);
      expect(combat.computeAdvantage(far.a, far.b)).toBeCloseTo(0.704);
    });

    it('rewards height', () => {
      const { a, b } = pair();
      spotEachOther(a, b);
      a.position = vec3(0, 5, 2);
      expect(combat.computeAdvantage(a, b)).toBeCloseTo(1.056);
    });

    it('never drops below the floor', () => {
      const { a, b } = pair();
      spotEachOther(a, b);
      const weak = makePlayer('d2', Side.DEFENDERS, vec3(10, 5, 0), { aim: 5 });
      a.visibleEnemies.add(weak.id);
      weak.visibleEnemies.add(a.id);
      expect(combat.computeAdvantage(weak, a)).toBe(DUEL_TUNING.minAdvantage);
    });
  });

  describe('resolveDuel', () => {
    it('computes the win probability from both advantages', () => {
      const { a, b } = pair();
      spotEachOther(a, b);
      expect(combat.winProbability(a, b)).toBeCloseTo(0.6875);
    });

    it('wins at the computed rate over many duels', () => {
      const { a, b } = pair();
      spotEachOther(a, b);
      const rng = new SeededRandom(99);
      let wins = 0;
      const duels = 100_000;
      for (let i = 0; i < duels; i++) {
        if (combat.resolveDuel(a, b, rng).winner === a) wins++;
      }
      expect(Math.abs(wins / duels - 0.6875)).toBeLessThan(0.02);
    });

    it('is reproducible for the same seed', () => {
      const { a, b } = pair();
      spotEachOther(a, b);
      const first = combat.resolveDuel(a, b, new SeededRandom(5));
      const second = combat.resolveDuel(a, b, new SeededRandom(5));
      expect(second.winner.id).toBe(first.winner.id);
      expect(second.headshot).toBe(first.headshot);
    });

    it('always picks the only shooter with any advantage', () => {
      const certain = new CombatSystem({ ...DUEL_TUNING, minAdvantage: 0 });
      const { a } = pair();
      const blind = makePlayer('d2', Side.DEFENDERS, vec3(10, 5, 0), { aim: 0 });
      spotEachOther(a, blind);
      expect(certain.resolveDuel(a, blind, new SeededRandom(1)).winner).toBe(a);
    });
  });

  describe('selectEngagements', () => {
    it('pairs each player with at most one enemy', () => {
      const a1 = makePlayer('a1', Side.ATTACKERS, vec3(0, 0, 0));
      const a2 = makePlayer('a2', Side.ATTACKERS, vec3(0, 4, 0));
      const d1 = makePlayer('d1', Side.DEFENDERS, vec3(10, 0, 0));
      const d2 = makePlayer('d2', Side.DEFENDERS, vec3(10, 4, 0));
      for (const attacker of [a1, a2]) {
        for (const defender of [d1, d2]) spotEachOther(attacker, defender);
      }

      const engagements = combat.selectEngagements([a1, a2, d1, d2]);

      expect(engagements.map((e) => [e.initiator.id, e.target.id])).toEqual([
        ['a1', 'd1'],
        ['a2', 'd2'],
      ]);
    });

    it('prefers the shoot target over the nearest enemy', () => {
      const a1 = makePlayer('a1', Side.ATTACKERS, vec3(0, 0, 0));
      const d1 = makePlayer('d1', Side.DEFENDERS, vec3(5, 0, 0));
      const d2 = makePlayer('d2', Side.DEFENDERS, vec3(20, 0, 0));
      spotEachOther(a1, d1);
      spotEachOther(a1, d2);

      const engagements = combat.selectEngagements([a1, d1, d2], new Map([['a1', 'd2']]));

      expect(engagements.map((e) => [e.initiator.id, e.target.id])).toEqual([['a1', 'd2']]);
    });

    it('skips dead players and players who see nobody', () => {
      const a1 = makePlayer('a1', Side.ATTACKERS, vec3(0, 0, 0));
      const d1 = makePlayer('d1', Side.DEFENDERS, vec3(5, 0, 0));
      spotEachOther(a1, d1);
      d1.kill();

      expect(combat.selectEngagements([a1, d1])).toEqual([]);
    });
  });
});

describe('dropsOnDeath', () => {
  it('drops the weapon and shield at the victim and strips the shield', () => {
    const victim = makePlayer('d1', Side.DEFENDERS, vec3(12, 6, 0), {
      weapon: WeaponId.PHANTOM,
      shield: ShieldType.LIGHT,
    });

    const drops = dropsOnDeath(victim, 3, new SeededRandom(4));

    expect(drops).toHaveLength(2);
    expect(drops[0]).toMatchObject({ kind: 'weapon', weapon: WeaponId.PHANTOM, droppedAt: 3, droppedBy: 'd1' });
    expect(drops[1]).toMatchObject({ kind: 'shield', shield: ShieldType.LIGHT, position: vec3(12, 6, 0) });
    expect(victim.shield).toBeNull();
    expect(victim.armor).toBe(0);
  });

  it('leaves between 5 and 25 rounds in the dropped weapon', () => {
    const rng = new SeededRandom(8);
    for (let i = 0; i < 50; i++) {
      const victim = makePlayer(`d${i}`, Side.DEFENDERS, vec3(1, 1, 0));
      const [weapon] = dropsOnDeath(victim, 0, rng);
      expect(weapon.kind).toBe('weapon');
      if (weapon.kind === 'weapon') {
        expect(weapon.ammo).toBeGreaterThanOrEqual(5);
        expect(weapon.ammo).toBeLessThanOrEqual(25);
      }
    }
  });
});
