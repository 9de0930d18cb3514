/**
 * @file Combat.ts
 * @description Duel resolution between two players who have made contact.
 *
 * Combat Flow:
 * 1. Detection fills each player's visibleEnemies for the tick.
 * 2. selectEngagements() pairs every living player with at most one enemy:
 *    the `shoot` intent target when it is visible, else the nearest visible one.
 * 3. resolveDuel() computes both advantages and draws once:
 *    P(A wins) = advA / (advA + advB).
 * 4. The Round kills the loser and turns its gear into dropped items
 *    (dropsOnDeath) at the victim's position.
 *
 * Duels are instantaneous: one draw per engagement, no shot-by-shot
 * simulation. All random values come from the Round's SeededRandom.
 */

import { DUEL_TUNING, type DuelTuning } from '../constants/GameConstants.js';
import { DROPPED_AMMO, WEAPONS } from '../constants/WeaponData.js';
import { ShieldType, type DroppedItem } from '../types/WeaponTypes.js';
import type { Player } from './Player.js';
import { distance } from '../util/MathUtils.js';
import type { SeededRandom } from '../util/RandomUtils.js';
import { createLogger } from '../util/Logger.js';

const log = createLogger('combat');

// ============================================================================
// --- Result Interfaces ---
// ============================================================================

/** Outcome of one duel. */
export interface DuelResult {
  winner: Player;
  loser: Player;
  /** Probability the first-named player (A) had of winning */
  probability: number;
  /** Whether the killing shot was a headshot */
  headshot: boolean;
}

/** Two players about to duel. */
export interface Engagement {
  initiator: Player;
  target: Player;
}

// ============================================================================
// --- CombatSystem Class ---
// ============================================================================

/**
 * Computes duel advantages and resolves duels.
 * Holds only its tuning; all round state is passed in.
 *
 * @example
 * ```ts
 * const combat = new CombatSystem();
 * for (const { initiator, target } of combat.selectEngagements(players, shootTargets)) {
 *   const { winner, loser } = combat.resolveDuel(initiator, target, rng);
 * }
 * ```
 */
export class CombatSystem {
  constructor(private readonly tuning: DuelTuning = DUEL_TUNING) {}

  // --------------------------------------------------------------------------
  // Advantage
  // --------------------------------------------------------------------------

  /**
   * Duel advantage of `player` against `opponent`.
   *
   * aim/100 x weapon tier x armor x statuses x movement accuracy (when moving)
   * x surprise (opponent has not spotted the player) x height x range band.
   * Never below `minAdvantage`.
   */
  computeAdvantage(player: Player, opponent: Player): number {
    const t = this.tuning;
    let advantage = player.aim / 100;

    advantage *= t.weaponTier[WEAPONS[player.weapon].tier];

    if (player.shield === ShieldType.HEAVY) {
      advantage *= t.heavyArmor;
    } else if (player.shield === ShieldType.LIGHT) {
      advantage *= t.lightArmor;
    }

    if (player.hasStatus('flashed')) advantage *= t.flashed;
    if (player.hasStatus('slowed')) advantage *= t.slowed;

    if (player.speed > t.movingSpeedThreshold) {
      advantage *= player.movementAccuracy / 100;
    }

    if (!opponent.visibleEnemies.has(player.id)) {
      advantage *= t.surprise;
    }

    if (player.position.z - opponent.position.z > t.heightThreshold) {
      advantage *= t.heightAdvantage;
    }

    const range = distance(player.position, opponent.position);
    if (range < t.pointBlankRange) {
      advantage *= t.pointBlank;
    } else if (range > t.longRangeThreshold) {
      advantage *= t.longRange;
    }

    if (Number.isNaN(advantage)) {
      log.warn({ playerId: player.id }, 'Duel advantage was NaN, clamping to floor');
      return t.minAdvantage;
    }
    if (advantage < t.minAdvantage) {
      return t.minAdvantage;
    }
    return advantage;
  }

  /** P(a beats b) = advA / (advA + advB). */
  winProbability(a: Player, b: Player): number {
    const advA = this.computeAdvantage(a, b);
    const advB = this.computeAdvantage(b, a);
    return advA / (advA + advB);
  }

  // --------------------------------------------------------------------------
  // Duel Resolution
  // --------------------------------------------------------------------------

  /**
   * Resolve a duel with a single uniform draw, then roll the headshot.
   * Does not kill anyone; the Round owns death handling.
   */
  resolveDuel(a: Player, b: Player, rng: SeededRandom): DuelResult {
    const probability = this.winProbability(a, b);
    const aWins = rng.next() < probability;
    const headshot = rng.next() < this.tuning.headshotChance;
    return {
      winner: aWins ? a : b,
      loser: aWins ? b : a,
      probability,
      headshot,
    };
  }

  /**
   * Pair living players with enemies they can see. Each player takes part in
   * at most one engagement per tick; the initiator may have been spotted or not.
   *
   * @param players - All players, in roster order
   * @param shootTargets - Optional `shoot` intent target per player id
   */
  selectEngagements(players: readonly Player[], shootTargets: ReadonlyMap<string, string> = new Map()): Engagement[] {
    const byId = new Map(players.map((p) => [p.id, p]));
    const engaged = new Set<string>();
    const engagements: Engagement[] = [];

    for (const player of players) {
      if (!player.alive || engaged.has(player.id)) continue;

      const candidates = [...player.visibleEnemies]
        .map((id) => byId.get(id))
        .filter((p): p is Player => p !== undefined && p.alive && !engaged.has(p.id));
      if (candidates.length === 0) continue;

      const preferred = shootTargets.get(player.id);
      let target = candidates.find((p) => p.id === preferred);
      if (target === undefined) {
        target = nearest(player, candidates);
      }

      engaged.add(player.id);
      engaged.add(target.id);
      engagements.push({ initiator: player, target });
    }
    return engagements;
  }
}

// ============================================================================
// --- Death Helpers ---
// ============================================================================

/**
 * Turn a dead player's weapon and shield into floor items at their position.
 * Clears the shield and armor from the victim; the spike is handled by the Round.
 */
export function dropsOnDeath(victim: Player, time: number, rng: SeededRandom): DroppedItem[] {
  const drops: DroppedItem[] = [
    {
      kind: 'weapon',
      weapon: victim.weapon,
      ammo: rng.nextInt(DROPPED_AMMO.min, DROPPED_AMMO.max),
      position: victim.position,
      droppedAt: time,
      droppedBy: victim.id,
    },
  ];

  if (victim.shield !== null) {
    drops.push({
      kind: 'shield',
      shield: victim.shield,
      position: victim.position,
      droppedAt: time,
      droppedBy: victim.id,
    });
    victim.shield = null;
    victim.armor = 0;
  }
  return drops;
}

function nearest(player: Player, candidates: readonly Player[]): Player {
  let best = candidates[0];
  let bestDistance = distance(player.position, best.position);
  for (const candidate of candidates.slice(1)) {
    const d = distance(player.position, candidate.position);
    if (d < bestDistance) {
      best = candidate;
      bestDistance = d;
    }
  }
  return best;
}
