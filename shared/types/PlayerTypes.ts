// ============================================================================
// PlayerTypes.ts
// Roster types: how a player is described before a round builds its runtime
// Player entity.
// ============================================================================

import type { Side } from './GameTypes.js';
import type { ShieldType, WeaponId } from './WeaponTypes.js';

/**
 * PlayerRole is the player's job in the team composition.
 * It picks the default ability kit when none is given.
 */
export enum PlayerRole {
  /** Entry fragger. Flash and molly. */
  DUELIST = 'duelist',

  /** Map control. Smoke and molly. */
  CONTROLLER = 'controller',

  /** Information. Flash and recon. */
  INITIATOR = 'initiator',

  /** Site anchor. Trap and heal. */
  SENTINEL = 'sentinel',
}

/**
 * Static description of one roster entry.
 * Combat ratings are on a 0-100 scale.
 */
export interface PlayerConfig {
  id: string;
  name: string;
  side: Side;
  role: PlayerRole;
  /** Agent (character) name. Cosmetic. */
  agent: string;
  /** Aim rating 0-100 */
  aim: number;
  /** Accuracy retained while moving, 0-100 */
  movementAccuracy: number;
  credits?: number;
  weapon?: WeaponId;
  shield?: ShieldType | null;
  /** Armor left on a carried-over shield. Defaults to the shield's full armor. */
  armor?: number;
  /** Ability names from the roster. Defaults to the role's kit. */
  abilities?: readonly string[];
  ultPoints?: number;
}
