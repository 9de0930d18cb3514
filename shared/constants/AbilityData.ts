// ============================================================================
// AbilityData.ts
// The standard ability roster and the default kit for each role.
// ============================================================================

import { AbilityKind, AbilityTarget } from '../types/AbilityTypes.js';
import type { AbilityDefinition } from '../types/AbilityTypes.js';
import { PlayerRole } from '../types/PlayerTypes.js';

/** Fields most abilities leave at zero. */
const BASE = {
  castTime: 0,
  cooldown: 0,
  damagePerSecond: 0,
  healingPerSecond: 0,
  blocksVision: false,
  revealsEnemies: false,
  soundRange: 35,
  bounces: 0,
  activationDelay: 0,
  projectileSpeed: 0,
} as const;

// ----------------------------------------------------------------------------
// ABILITY ROSTER
// ----------------------------------------------------------------------------

/**
 * Standard roster keyed by ability name.
 */
export const ABILITIES: Readonly<Record<string, AbilityDefinition>> = {
  /**
   * Flash - thrown, bounces once, pops after 0.2 s.
   * Blinds anyone facing it for the rest of its 1.5 s duration.
   */
  flash: {
    ...BASE,
    name: 'flash',
    kind: AbilityKind.FLASH,
    targeting: AbilityTarget.PROJECTILE,
    creditCost: 200,
    maxCharges: 2,
    duration: 1.5,
    effectRadius: 10,
    maxRange: 30,
    statusEffects: ['flashed'],
    bounces: 1,
    activationDelay: 0.2,
    projectileSpeed: 15,
  },

  /** Smoke - placed sphere that blocks sight for 15 s. */
  smoke: {
    ...BASE,
    name: 'smoke',
    kind: AbilityKind.SMOKE,
    targeting: AbilityTarget.POINT,
    creditCost: 100,
    maxCharges: 1,
    duration: 15,
    effectRadius: 5,
    maxRange: 50,
    statusEffects: ['smoked'],
    blocksVision: true,
  },

  /** Molly - fire pool, 25 damage per second for 7 s. */
  molly: {
    ...BASE,
    name: 'molly',
    kind: AbilityKind.MOLLY,
    targeting: AbilityTarget.POINT,
    creditCost: 200,
    maxCharges: 1,
    duration: 7,
    effectRadius: 4,
    maxRange: 25,
    damagePerSecond: 25,
    statusEffects: ['burning'],
  },

  /** Recon - reveals enemies within 20 units for 3 s. */
  recon: {
    ...BASE,
    name: 'recon',
    kind: AbilityKind.RECON,
    targeting: AbilityTarget.POINT,
    creditCost: 300,
    maxCharges: 1,
    duration: 3,
    effectRadius: 20,
    maxRange: 40,
    statusEffects: ['revealed'],
    revealsEnemies: true,
  },

  /** Trap - slows enemies inside it for up to 10 s. */
  trap: {
    ...BASE,
    name: 'trap',
    kind: AbilityKind.TRAP,
    targeting: AbilityTarget.AREA,
    creditCost: 200,
    maxCharges: 1,
    duration: 10,
    effectRadius: 3,
    maxRange: 10,
    statusEffects: ['slowed'],
    soundRange: 0,
  },

  /** Heal - 12 health per second to allies within 5 units for 5 s. */
  heal: {
    ...BASE,
    name: 'heal',
    kind: AbilityKind.HEAL,
    targeting: AbilityTarget.SELF,
    creditCost: 200,
    maxCharges: 1,
    duration: 5,
    effectRadius: 5,
    maxRange: 0,
    healingPerSecond: 12,
    statusEffects: [],
  },
};

// ----------------------------------------------------------------------------
// ROLE KITS
// ----------------------------------------------------------------------------

/** Abilities a player gets when the roster entry names none. */
export const ROLE_KITS: Readonly<Record<PlayerRole, readonly string[]>> = {
  [PlayerRole.DUELIST]: ['flash', 'molly'],
  [PlayerRole.CONTROLLER]: ['smoke', 'molly'],
  [PlayerRole.INITIATOR]: ['flash', 'recon'],
  [PlayerRole.SENTINEL]: ['trap', 'heal'],
};
