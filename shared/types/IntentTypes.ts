// ============================================================================
// IntentTypes.ts
// What a player wants to do this tick, and the contract for whatever
// produces it (scripted agent, external policy, or nothing at all).
// ============================================================================

import type { Vec2, Vec3 } from '../util/MathUtils.js';
import type { RoundSummary } from './GameTypes.js';
import type { ShieldType, WeaponId } from './WeaponTypes.js';
import type { MapGeometry } from '../map/MapGeometry.js';
import type { Player } from '../simulation/Player.js';
import type { Blackboard } from '../simulation/Blackboard.js';

/** Items requested by a buy intent. Unaffordable items are skipped. */
export interface Loadout {
  weapon?: WeaponId;
  shield?: ShieldType;
}

/**
 * One player's intent for one tick. Missing intent is treated as idle.
 */
export type Intent =
  | { kind: 'idle' }
  | {
      kind: 'move';
      /** Horizontal direction; normalised by the engine, zero means stand still */
      direction: Vec2;
      walking?: boolean;
      crouching?: boolean;
      jump?: boolean;
      /** Where to look; defaults to the movement direction */
      facing?: Vec2;
    }
  | { kind: 'shoot'; targetId: string }
  | { kind: 'plant' }
  | { kind: 'defuse' }
  | { kind: 'buy'; loadout: Loadout }
  | { kind: 'use_ability'; ability: string; target: Vec3 }
  | { kind: 'communicate'; message: string };

export type IntentKind = Intent['kind'];

export const IDLE: Intent = { kind: 'idle' };

/**
 * Read-only view of the round handed to intent producers.
 */
export interface RoundView {
  readonly time: number;
  readonly map: MapGeometry;
  readonly summary: RoundSummary;
  /** The acting player's team knowledge */
  readonly blackboard: Blackboard;
  /** Spike position when it is on the ground or planted */
  readonly spikePosition: Vec3 | null;
  /** Every player in the round */
  readonly players: ReadonlyMap<string, Player>;
}

/**
 * Anything that produces intents. Called once per living player per tick.
 */
export interface IntentProvider {
  decide(player: Player, view: RoundView): Intent;
}
