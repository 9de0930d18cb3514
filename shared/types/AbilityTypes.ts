// ============================================================================
// AbilityTypes.ts
// Ability templates (definitions), their live occurrences (instances) and the
// status effects they put on players.
// ============================================================================

import type { Vec3 } from '../util/MathUtils.js';

/**
 * AbilityKind decides what an ability does to the players it reaches.
 */
export enum AbilityKind {
  /** Blinds enemies facing the pop. */
  FLASH = 'flash',

  /** Sphere that blocks sight. */
  SMOKE = 'smoke',

  /** Fire pool that burns anyone standing in it. */
  MOLLY = 'molly',

  /** Reveals enemies in range. */
  RECON = 'recon',

  /** Slows enemies that walk into it. */
  TRAP = 'trap',

  /** Heals the owner's team over time. */
  HEAL = 'heal',
}

/**
 * How an ability is aimed.
 * PROJECTILE abilities travel and bounce; every other kind is placed at once.
 */
export enum AbilityTarget {
  POINT = 'point',
  PROJECTILE = 'projectile',
  SELF = 'self',
  AREA = 'area',
  INSTANT = 'instant',
}

/** Status effects a player can carry, each with its own remaining duration. */
export type StatusEffect = 'flashed' | 'smoked' | 'burning' | 'revealed' | 'slowed';

/**
 * Immutable ability template.
 */
export interface AbilityDefinition {
  name: string;
  kind: AbilityKind;
  targeting: AbilityTarget;
  /** Credit price of one charge */
  creditCost: number;
  maxCharges: number;
  /** Seconds to cast */
  castTime: number;
  /** Seconds the effect lasts once activated */
  duration: number;
  /** Seconds between uses */
  cooldown: number;
  effectRadius: number;
  maxRange: number;
  /** Damage per second to players inside the radius */
  damagePerSecond: number;
  /** Healing per second to allies inside the radius */
  healingPerSecond: number;
  statusEffects: readonly StatusEffect[];
  blocksVision: boolean;
  revealsEnemies: boolean;
  soundRange: number;
  /** Wall bounces a projectile takes before it stops */
  bounces: number;
  /** Seconds after activation before the effect starts */
  activationDelay: number;
  /** Initial projectile speed */
  projectileSpeed: number;
}

// ----------------------------------------------------------------------------
// Instances
// ----------------------------------------------------------------------------

/** Fields every live instance carries. */
interface AbilityInstanceBase {
  readonly id: string;
  readonly definition: AbilityDefinition;
  readonly ownerId: string;
  chargesRemaining: number;
  active: boolean;
  position: Vec3;
  /** Ids of players the effect has touched */
  readonly affected: Set<string>;
  startTime: number;
  endTime: number;
  /** Set once the activation delay has passed and effects apply */
  effectStarted: boolean;
}

/** A thrown ability moving through the map. */
export interface ProjectileInstance extends AbilityInstanceBase {
  readonly behavior: 'projectile';
  velocity: Vec3;
  bouncesRemaining: number;
  /** Positions the projectile has passed through, in order */
  readonly trajectory: Vec3[];
  /** Set once the projectile has stopped moving */
  landed: boolean;
}

/** An ability placed directly at its target point. */
export interface AreaInstance extends AbilityInstanceBase {
  readonly behavior: 'area';
}

/**
 * Live ability occurrence. Dispatch on `behavior`.
 */
export type AbilityInstance = ProjectileInstance | AreaInstance;
