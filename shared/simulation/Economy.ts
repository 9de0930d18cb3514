/**
 * @file Economy.ts
 * @description Credit flow for one round: the simulated buy at the start of
 * ACTIVE, explicit buy intents, and the per-player carryover at round end.
 *
 * Handles:
 *   - Buy ladder (full buy / half buy / eco / save) from current credits
 *   - Round win reward and the loss-streak catch-up bonus
 *   - Spike plant and defuse bonuses ($300 each, to the player who did it)
 *   - Kill rewards ($200 per kill)
 *
 * The cap on carried credits is applied by the Match when it adds the
 * carryover delta, not here.
 */

import {
  BUY_LADDER,
  KILL_REWARD,
  LOSS_BASE_REWARD,
  LOSS_STREAK_CAP,
  LOSS_STREAK_STEP,
  ROUND_WIN_REWARD,
  SPIKE_DEFUSE_BONUS,
  SPIKE_PLANT_BONUS,
} from '../constants/EconomyConstants.js';
import { SHIELDS, WEAPONS, isPrimary } from '../constants/WeaponData.js';
import type { Side, PlayerCarryover } from '../types/GameTypes.js';
import type { Loadout } from '../types/IntentTypes.js';
import { ShieldType, WeaponId } from '../types/WeaponTypes.js';
import type { Player } from './Player.js';
import type { SeededRandom } from '../util/RandomUtils.js';

// ============================================================================
// --- Interfaces ---
// ============================================================================

/** One item bought, for the purchase event log. */
export interface Purchase {
  item: WeaponId | ShieldType;
  cost: number;
}

// ============================================================================
// --- EconomyManager Class ---
// ============================================================================

/**
 * Stateless credit calculations. All state lives on the players.
 *
 * @example
 * ```ts
 * const econ = new EconomyManager();
 * for (const purchase of econ.simulateBuy(player, rng)) log(purchase);
 * const carry = econ.carryoverFor(player, winner, econ.lossBonus(2));
 * ```
 */
export class EconomyManager {
  // --------------------------------------------------------------------------
  // Round Rewards
  // --------------------------------------------------------------------------

  /**
   * Loss reward after `previousLosses` consecutive losses before this one:
   * 1900, 2400, 2900, 3400, then capped at 3900.
   */
  lossBonus(previousLosses: number): number {
    const counted = Math.min(Math.max(0, previousLosses), LOSS_STREAK_CAP);
    return LOSS_BASE_REWARD + LOSS_STREAK_STEP * counted;
  }

  /**
   * What one player takes into the next round.
   *
   * @param lossBonus - Credits this player's team gets if it lost
   */
  carryoverFor(player: Player, winner: Side | null, lossBonus: number): PlayerCarryover {
    const won = winner !== null && winner === player.side;

    let creditsDelta = won ? ROUND_WIN_REWARD : lossBonus;
    if (player.plants > 0) creditsDelta += SPIKE_PLANT_BONUS;
    if (player.defuses > 0) creditsDelta += SPIKE_DEFUSE_BONUS;
    creditsDelta += KILL_REWARD * player.kills;

    return {
      side: player.side,
      alive: player.alive,
      creditsDelta,
      weapon: player.alive ? player.weapon : null,
      shield: player.alive ? player.shield : null,
      armor: player.alive ? player.armor : 0,
      ultPointsDelta: player.kills + player.plants + player.defuses,
      kills: player.kills,
      deaths: player.deaths,
      plants: player.plants,
      defuses: player.defuses,
    };
  }

  // --------------------------------------------------------------------------
  // Purchases
  // --------------------------------------------------------------------------

  /**
   * Simulate one player's buy from their credits, walking the ladder top down.
   * A player already holding a primary only tops up the shield.
   *
   * Items are paid at catalog price; an item the remaining credits do not
   * cover is skipped.
   */
  simulateBuy(player: Player, rng: SeededRandom): Purchase[] {
    if (isPrimary(player.weapon)) {
      return this.topUpShield(player);
    }

    const credits = player.credits;
    let weapon: WeaponId | null = null;
    let shield: ShieldType | null = null;

    if (credits >= BUY_LADDER.fullBuy) {
      weapon = rng.next() < 0.5 ? WeaponId.VANDAL : WeaponId.PHANTOM;
      shield = ShieldType.HEAVY;
    } else if (credits >= BUY_LADDER.halfBuy) {
      weapon = rng.next() < BUY_LADDER.halfBuySpectreChance ? WeaponId.SPECTRE : WeaponId.BULLDOG;
      shield = ShieldType.LIGHT;
    } else if (credits >= BUY_LADDER.ecoBuy) {
      weapon = rng.next() < BUY_LADDER.ecoSheriffChance ? WeaponId.SHERIFF : WeaponId.GHOST;
      shield = credits >= BUY_LADDER.ecoShieldThreshold ? ShieldType.LIGHT : null;
    }

    return this.applyLoadout(player, { weapon: weapon ?? undefined, shield: shield ?? undefined });
  }

  /**
   * Buy the requested items in order (weapon, then shield), skipping any the
   * player cannot afford or already has.
   */
  applyLoadout(player: Player, loadout: Loadout): Purchase[] {
    const purchases: Purchase[] = [];

    if (loadout.weapon !== undefined && loadout.weapon !== player.weapon) {
      const cost = WEAPONS[loadout.weapon].cost;
      if (player.credits >= cost) {
        player.credits -= cost;
        player.weapon = loadout.weapon;
        purchases.push({ item: loadout.weapon, cost });
      }
    }

    if (loadout.shield !== undefined && !this.hasFullShield(player, loadout.shield)) {
      const cost = SHIELDS[loadout.shield].cost;
      if (player.credits >= cost) {
        player.credits -= cost;
        player.equipShield(loadout.shield);
        purchases.push({ item: loadout.shield, cost });
      }
    }
    return purchases;
  }

  /** Best shield the player can afford, when theirs is missing or worn. */
  private topUpShield(player: Player): Purchase[] {
    if (player.credits >= SHIELDS[ShieldType.HEAVY].cost && !this.hasFullShield(player, ShieldType.HEAVY)) {
      return this.applyLoadout(player, { shield: ShieldType.HEAVY });
    }
    if (player.shield === null || player.armor < SHIELDS[player.shield].armor) {
      return this.applyLoadout(player, { shield: ShieldType.LIGHT });
    }
    return [];
  }

  /** Whether the player already wears `shield` (or better) at full armor. */
  private hasFullShield(player: Player, shield: ShieldType): boolean {
    if (player.shield === null) return false;
    return player.armor >= SHIELDS[shield].armor;
  }
}
