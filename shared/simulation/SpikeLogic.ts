/**
 * @file SpikeLogic.ts
 * @description Spike carry, plant, defuse and detonation.
 *
 * Handles the objective mechanics:
 *   - Plant: the carrier stands inside a bomb site with a plant intent for
 *     TIMING.plantSeconds. Leaving the site or doing anything else resets
 *     progress to zero.
 *   - Defuse: a defender within SPIKE.defuseRange of the planted spike holds
 *     a defuse intent for TIMING.defuseSeconds. Leaving range or letting go
 *     resets progress to zero.
 *   - Detonation: the spike timer (TIMING.spikeSeconds) starts at plant.
 *   - Dropped: the carrier died; any living attacker walking over it picks
 *     it back up.
 *
 * The Round owns one SpikeLogic per round and calls it every ACTIVE tick.
 */

import { SPIKE, TIMING } from '../constants/GameConstants.js';
import type { MapGeometry } from '../map/MapGeometry.js';
import { Side, SpikeState } from '../types/GameTypes.js';
import type { Player } from './Player.js';
import { distance2D, type Vec3 } from '../util/MathUtils.js';

// ============================================================================
// --- Types ---
// ============================================================================

/** What one plant/defuse step did. */
export type SpikeActionResult = 'none' | 'progress' | 'reset' | 'planted' | 'defused';

// ============================================================================
// --- SpikeLogic Class ---
// ============================================================================

/**
 * Spike sub-state machine for one round.
 *
 * @example
 * ```ts
 * const spike = new SpikeLogic(map, carrier.id);
 * if (spike.tickPlant(carrier, intent.kind === 'plant', dt) === 'planted') { ... }
 * if (spike.tickTimer(dt)) endRound(Side.ATTACKERS, EndCondition.SPIKE_DETONATION);
 * ```
 */
export class SpikeLogic {
  state: SpikeState = SpikeState.CARRIED;

  /** Who holds the spike; null once dropped or planted */
  carrierId: string | null;

  /** Ground position when dropped or planted */
  position: Vec3 | null = null;

  plantSite: string | null = null;
  plantedAt: number | null = null;

  /** Seconds until detonation; null before the plant */
  timeRemaining: number | null = null;

  /** Player currently defusing */
  defuserId: string | null = null;

  /** Defuse progress shared by whichever defender works on it */
  defuseProgress: number = 0;

  constructor(
    private readonly map: MapGeometry,
    carrierId: string | null,
  ) {
    this.carrierId = carrierId;
  }

  get planted(): boolean {
    return this.state === SpikeState.PLANTED || this.state === SpikeState.DEFUSING;
  }

  get resolved(): boolean {
    return this.state === SpikeState.DEFUSED || this.state === SpikeState.DETONATED;
  }

  // --------------------------------------------------------------------------
  // Zone Checks
  // --------------------------------------------------------------------------

  /** Bomb site name at a position, or null. */
  siteAt(position: Vec3): string | null {
    return this.map.bombSiteAt(position.x, position.y);
  }

  /** Horizontal distance check against the planted spike. */
  isInDefuseRange(position: Vec3): boolean {
    return this.position !== null && distance2D(position, this.position) <= SPIKE.defuseRange;
  }

  // --------------------------------------------------------------------------
  // Plant
  // --------------------------------------------------------------------------

  /**
   * Advance the carrier's plant by dt.
   *
   * @param wantsPlant - Whether the carrier's intent this tick is `plant`
   */
  tickPlant(player: Player, wantsPlant: boolean, dt: number, time: number): SpikeActionResult {
    if (this.carrierId !== player.id || this.planted || this.resolved) {
      return 'none';
    }

    const site = this.siteAt(player.position);
    if (!player.alive || !wantsPlant || site === null) {
      if (this.state === SpikeState.PLANTING || player.plantProgress > 0) {
        player.plantProgress = 0;
        this.state = SpikeState.CARRIED;
        return 'reset';
      }
      return 'none';
    }

    this.state = SpikeState.PLANTING;
    player.plantProgress += dt;
    if (player.plantProgress < TIMING.plantSeconds) {
      return 'progress';
    }

    player.plantProgress = 0;
    player.plants += 1;
    player.hasSpike = false;
    this.carrierId = null;
    this.state = SpikeState.PLANTED;
    this.position = player.position;
    this.plantSite = site;
    this.plantedAt = time;
    this.timeRemaining = TIMING.spikeSeconds;
    return 'planted';
  }

  // --------------------------------------------------------------------------
  // Defuse
  // --------------------------------------------------------------------------

  /**
   * Advance a defender's defuse by dt. Only one defender works at a time.
   *
   * @param wantsDefuse - Whether the player's intent this tick is `defuse`
   */
  tickDefuse(player: Player, wantsDefuse: boolean, dt: number): SpikeActionResult {
    if (!this.planted || player.side !== Side.DEFENDERS) {
      return 'none';
    }
    if (this.defuserId !== null && this.defuserId !== player.id) {
      return 'none';
    }

    const eligible = player.alive && wantsDefuse && this.isInDefuseRange(player.position);
    if (!eligible) {
      if (this.defuserId === player.id) {
        this.interruptDefuse(player);
        return 'reset';
      }
      return 'none';
    }

    this.defuserId = player.id;
    this.state = SpikeState.DEFUSING;
    this.defuseProgress += dt;
    player.defuseProgress = this.defuseProgress;
    if (this.defuseProgress < TIMING.defuseSeconds) {
      return 'progress';
    }

    player.defuses += 1;
    player.defuseProgress = 0;
    this.defuserId = null;
    this.timeRemaining = null;
    this.state = SpikeState.DEFUSED;
    return 'defused';
  }

  /** Stop the current defuse and reset its progress. */
  interruptDefuse(player: Player): void {
    this.defuseProgress = 0;
    player.defuseProgress = 0;
    this.defuserId = null;
    if (this.state === SpikeState.DEFUSING) {
      this.state = SpikeState.PLANTED;
    }
  }

  // --------------------------------------------------------------------------
  // Timer, drop and pickup
  // --------------------------------------------------------------------------

  /**
   * Count the spike timer down.
   *
   * @returns true on the tick the spike detonates
   */
  tickTimer(dt: number): boolean {
    if (!this.planted || this.timeRemaining === null) {
      return false;
    }
    this.timeRemaining = Math.max(0, this.timeRemaining - dt);
    if (this.timeRemaining > 0) {
      return false;
    }
    this.state = SpikeState.DETONATED;
    this.defuserId = null;
    return true;
  }

  /** The carrier died or let go: leave the spike at `position`. */
  drop(player: Player, position: Vec3): void {
    if (this.carrierId !== player.id) return;
    player.hasSpike = false;
    player.plantProgress = 0;
    this.carrierId = null;
    this.position = position;
    this.state = SpikeState.DROPPED;
  }

  /**
   * Let a living attacker pick up a dropped spike within reach.
   *
   * @returns true when the player now carries it
   */
  tryPickup(player: Player): boolean {
    if (this.state !== SpikeState.DROPPED || this.position === null) return false;
    if (!player.alive || player.side !== Side.ATTACKERS) return false;
    if (distance2D(player.position, this.position) > SPIKE.pickupRadius) return false;

    player.hasSpike = true;
    this.carrierId = player.id;
    this.position = null;
    this.state = SpikeState.CARRIED;
    return true;
  }
}
