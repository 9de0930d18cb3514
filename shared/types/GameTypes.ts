// ============================================================================
// GameTypes.ts
// Round and match flow types: phases, sides, end conditions, the spike
// sub-state, the round event log, summaries and carryover.
// ============================================================================

import type { Vec3 } from '../util/MathUtils.js';
import type { ShieldType, WeaponId } from './WeaponTypes.js';

/**
 * RoundPhase is the round state machine. Transitions are one way:
 *   BUY -> ACTIVE -> END
 */
export enum RoundPhase {
  /**
   * BUY: players are frozen at spawn. When the buy timer runs out every
   * player's purchase is simulated once and the round goes live.
   */
  BUY = 'buy',

  /** ACTIVE: movement, combat, abilities and the spike. */
  ACTIVE = 'active',

  /** END: terminal. A winner and end condition are set. */
  END = 'end',
}

/**
 * Side a team plays for the current half. Sides swap at halftime.
 */
export enum Side {
  /** Carry the spike, plant it, protect it until detonation. */
  ATTACKERS = 'attackers',

  /** Stop the plant, or defuse the planted spike. */
  DEFENDERS = 'defenders',
}

/** How a round ended. */
export enum EndCondition {
  ELIMINATION = 'elimination',
  SPIKE_DETONATION = 'spike_detonation',
  SPIKE_DEFUSED = 'spike_defused',
  TIME_EXPIRED = 'time_expired',
}

/**
 * Spike sub-state during ACTIVE.
 *
 *   CARRIED <-> PLANTING -> PLANTED <-> DEFUSING -> DEFUSED
 *      ^  \                   \
 *      |   DROPPED             DETONATED
 *      +---'
 */
export enum SpikeState {
  CARRIED = 'carried',
  DROPPED = 'dropped',
  PLANTING = 'planting',
  PLANTED = 'planted',
  DEFUSING = 'defusing',
  DEFUSED = 'defused',
  DETONATED = 'detonated',
}

/** Returns the opposite side. */
export function opposingSide(side: Side): Side {
  return side === Side.ATTACKERS ? Side.DEFENDERS : Side.ATTACKERS;
}

// ----------------------------------------------------------------------------
// Events
// ----------------------------------------------------------------------------

/** What killed a player. */
export type DeathCause = 'duel' | 'ability' | 'fall';

/**
 * Discrete round events, in the order they happened.
 * `time` is seconds since the round was constructed.
 */
export type RoundEvent =
  | { type: 'phase_change'; time: number; from: RoundPhase; to: RoundPhase }
  | { type: 'purchase'; time: number; playerId: string; item: WeaponId | ShieldType; cost: number }
  | {
      type: 'death';
      time: number;
      victimId: string;
      killerId: string | null;
      weapon: WeaponId | null;
      cause: DeathCause;
      headshot: boolean;
      position: Vec3;
    }
  | { type: 'damage'; time: number; attackerId: string | null; victimId: string; amount: number; source: string }
  | { type: 'plant'; time: number; playerId: string; site: string; position: Vec3 }
  | { type: 'defuse'; time: number; playerId: string }
  | { type: 'detonation'; time: number }
  | { type: 'spike_drop'; time: number; playerId: string; position: Vec3 }
  | { type: 'spike_pickup'; time: number; playerId: string }
  | { type: 'ability_use'; time: number; playerId: string; ability: string; position: Vec3 }
  | { type: 'pickup'; time: number; playerId: string; item: WeaponId | ShieldType }
  | { type: 'communication'; time: number; playerId: string; message: string };

export type RoundEventType = RoundEvent['type'];

// ----------------------------------------------------------------------------
// Summaries
// ----------------------------------------------------------------------------

/**
 * Snapshot of a round, available at any tick.
 */
export interface RoundSummary {
  roundNumber: number;
  phase: RoundPhase;
  /** Seconds since construction */
  time: number;
  /** Seconds left in the current phase timer (buy or round) */
  timeRemaining: number;
  spikeState: SpikeState;
  /** Seconds until detonation, or null when not planted */
  spikeTimeRemaining: number | null;
  plantSite: string | null;
  aliveAttackers: number;
  aliveDefenders: number;
  winner: Side | null;
  endCondition: EndCondition | null;
  killCount: number;
}

/**
 * What one player takes into the next round. Computed once at round end.
 */
export interface PlayerCarryover {
  side: Side;
  alive: boolean;
  /** Credits to add (before the cap is applied by the Match) */
  creditsDelta: number;
  /** Weapon retained; null when the player died */
  weapon: WeaponId | null;
  /** Shield retained; null when the player died */
  shield: ShieldType | null;
  /** Armor retained with the shield */
  armor: number;
  /** Ult points earned this round */
  ultPointsDelta: number;
  kills: number;
  deaths: number;
  plants: number;
  defuses: number;
}

export type Carryover = Record<string, PlayerCarryover>;

/** Loss bonus per side, overriding the Round's defaults. */
export interface LossBonusOverride {
  attackers?: number;
  defenders?: number;
}
