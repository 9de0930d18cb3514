// ============================================================================
// WeaponData.ts
// Concrete stat tables for the weapon catalog and shields.
// These tables are the single source of truth for item prices and stats.
// Used by the buy simulation, the duel model and dropped-item pickup.
// ============================================================================

import { ShieldType, WeaponId } from '../types/WeaponTypes.js';
import type { ShieldStats, WeaponStats } from '../types/WeaponTypes.js';

// ----------------------------------------------------------------------------
// WEAPON DEFINITIONS
// ----------------------------------------------------------------------------

/**
 * Weapon stats lookup table, keyed by WeaponId.
 *
 * - fireRate is in rounds per second
 * - armorPenetration is the share of damage that skips the shield
 */
export const WEAPONS: Record<WeaponId, WeaponStats> = {
  /** Free sidearm every player spawns with */
  [WeaponId.CLASSIC]: {
    id: WeaponId.CLASSIC,
    tier: 'sidearm',
    cost: 0,
    damage: 26,
    fireRate: 6.75,
    magazine: 12,
    rangeMultipliers: { close: 1.0, medium: 0.8, long: 0.6 },
    armorPenetration: 0.5,
  },

  [WeaponId.GHOST]: {
    id: WeaponId.GHOST,
    tier: 'sidearm',
    cost: 500,
    damage: 30,
    fireRate: 6.75,
    magazine: 15,
    rangeMultipliers: { close: 1.0, medium: 0.9, long: 0.75 },
    armorPenetration: 0.7,
  },

  /** Eco-round hand cannon */
  [WeaponId.SHERIFF]: {
    id: WeaponId.SHERIFF,
    tier: 'sidearm',
    cost: 800,
    damage: 55,
    fireRate: 4.0,
    magazine: 6,
    rangeMultipliers: { close: 1.0, medium: 0.9, long: 0.8 },
    armorPenetration: 0.75,
  },

  [WeaponId.SPECTRE]: {
    id: WeaponId.SPECTRE,
    tier: 'smg',
    cost: 1600,
    damage: 26,
    fireRate: 13.33,
    magazine: 30,
    rangeMultipliers: { close: 1.2, medium: 0.8, long: 0.6 },
    armorPenetration: 0.6,
  },

  [WeaponId.BULLDOG]: {
    id: WeaponId.BULLDOG,
    tier: 'rifle',
    cost: 2050,
    damage: 35,
    fireRate: 9.15,
    magazine: 24,
    rangeMultipliers: { close: 1.0, medium: 0.95, long: 0.85 },
    armorPenetration: 0.75,
  },

  [WeaponId.PHANTOM]: {
    id: WeaponId.PHANTOM,
    tier: 'rifle',
    cost: 2900,
    damage: 40,
    fireRate: 9.75,
    magazine: 25,
    rangeMultipliers: { close: 1.0, medium: 1.0, long: 1.0 },
    armorPenetration: 0.8,
  },

  [WeaponId.VANDAL]: {
    id: WeaponId.VANDAL,
    tier: 'rifle',
    cost: 2900,
    damage: 40,
    fireRate: 9.25,
    magazine: 25,
    rangeMultipliers: { close: 1.0, medium: 1.0, long: 1.0 },
    armorPenetration: 0.8,
  },

  /** Bolt-action sniper, one body shot on most targets */
  [WeaponId.OPERATOR]: {
    id: WeaponId.OPERATOR,
    tier: 'sniper',
    cost: 4700,
    damage: 150,
    fireRate: 0.75,
    magazine: 5,
    rangeMultipliers: { close: 1.0, medium: 1.0, long: 1.0 },
    armorPenetration: 0.9,
  },
};

// ----------------------------------------------------------------------------
// SHIELD DEFINITIONS
// ----------------------------------------------------------------------------

export const SHIELDS: Record<ShieldType, ShieldStats> = {
  [ShieldType.LIGHT]: { type: ShieldType.LIGHT, cost: 400, armor: 25 },
  [ShieldType.HEAVY]: { type: ShieldType.HEAVY, cost: 1000, armor: 50 },
};

/** Distance within which a player picks up a dropped item. */
export const PICKUP_RADIUS = 1.5;

/** Ammo left in a dropped weapon is drawn uniformly from this range. */
export const DROPPED_AMMO = { min: 5, max: 25 } as const;

// ----------------------------------------------------------------------------
// Helpers
// ----------------------------------------------------------------------------

const WEAPON_IDS: ReadonlySet<string> = new Set(Object.values(WeaponId));

/** Type guard for catalog names coming from untyped input. */
export function isWeaponId(value: string): value is WeaponId {
  return WEAPON_IDS.has(value);
}

/** Whether a weapon is a primary (anything above the sidearm tier). */
export function isPrimary(weapon: WeaponId): boolean {
  return WEAPONS[weapon].tier !== 'sidearm';
}
