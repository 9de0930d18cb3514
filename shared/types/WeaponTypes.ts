// ============================================================================
// WeaponTypes.ts
// Types for purchasable equipment: the weapon catalog, shields, and items
// lying on the ground after a death or swap.
// ============================================================================

import type { Vec3 } from '../util/MathUtils.js';

/**
 * WeaponId enumerates every weapon in the catalog.
 * A player holds at most one weapon; the Classic is the free fallback.
 */
export enum WeaponId {
  CLASSIC = 'Classic',
  GHOST = 'Ghost',
  SHERIFF = 'Sheriff',
  SPECTRE = 'Spectre',
  BULLDOG = 'Bulldog',
  PHANTOM = 'Phantom',
  VANDAL = 'Vandal',
  OPERATOR = 'Operator',
}

/**
 * Weapon tier. The duel model only looks at this, through the tier
 * multipliers in DUEL_TUNING.
 */
export type WeaponTier = 'sidearm' | 'smg' | 'rifle' | 'sniper';

/**
 * ShieldType defines the two purchasable shield tiers.
 */
export enum ShieldType {
  /** 25 armor */
  LIGHT = 'light',

  /** 50 armor */
  HEAVY = 'heavy',
}

/** Distance buckets used for damage falloff. */
export type RangeBand = 'close' | 'medium' | 'long';

/**
 * Statistical profile of one weapon.
 */
export interface WeaponStats {
  id: WeaponId;
  tier: WeaponTier;
  /** Purchase price in credits */
  cost: number;
  /** Body damage per bullet before falloff and armor */
  damage: number;
  /** Rounds per second */
  fireRate: number;
  /** Magazine capacity */
  magazine: number;
  /** Damage multiplier per range band */
  rangeMultipliers: Record<RangeBand, number>;
  /** Fraction (0-1) of damage that ignores armor */
  armorPenetration: number;
}

/** Price and armor of a shield tier. */
export interface ShieldStats {
  type: ShieldType;
  cost: number;
  armor: number;
}

// ----------------------------------------------------------------------------
// Dropped items
// ----------------------------------------------------------------------------

/**
 * An item on the floor. Owned by the Round until picked up or the round ends.
 */
export type DroppedItem =
  | { kind: 'weapon'; weapon: WeaponId; ammo: number; position: Vec3; droppedAt: number; droppedBy: string }
  | { kind: 'shield'; shield: ShieldType; position: Vec3; droppedAt: number; droppedBy: string };
