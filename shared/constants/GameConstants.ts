// ============================================================================
// GameConstants.ts
// Round timing, player physics, sensing and duel tuning constants.
// All values are grouped by domain. Time values are in seconds, distances in
// map units (1 unit ~ 1 metre).
// ============================================================================

// ----------------------------------------------------------------------------
// MATCH CONSTANTS
// ----------------------------------------------------------------------------

/**
 * Match structure constants.
 * Regulation is 24 rounds, first to 13. At 12-12 the match goes to overtime,
 * which is won by a two-round lead.
 */
export const MATCH = {
  /** Round wins needed to take the match in regulation */
  roundsToWin: 13,

  /** Rounds played in regulation */
  regulationRounds: 24,

  /** Sides swap after this many rounds */
  halftimeAfterRound: 12,

  /** Lead required to win in overtime */
  overtimeWinMargin: 2,

  /** Players per team */
  teamSize: 5,
} as const;

// ----------------------------------------------------------------------------
// TIMING CONSTANTS
// ----------------------------------------------------------------------------

/**
 * Phase timing constants.
 *
 * Round flow: Buy -> Active -> End
 *
 * During Active, the spike plant/defuse sub-timers may run.
 */
export const TIMING = {
  /** Buy phase duration */
  buyPhaseSeconds: 30,

  /** Buy phase on the pistol round of each half */
  pistolBuyPhaseSeconds: 45,

  /** Active phase duration before the round times out */
  roundSeconds: 100,

  /** Countdown from plant to detonation */
  spikeSeconds: 45,

  /** Time an attacker must hold plant inside a site */
  plantSeconds: 4,

  /** Time a defender must hold defuse near the spike */
  defuseSeconds: 7,

  /** Default fixed tick length */
  tickSeconds: 0.1,
} as const;

// ----------------------------------------------------------------------------
// SPIKE CONSTANTS
// ----------------------------------------------------------------------------

export const SPIKE = {
  /** Distance within which a defender can defuse */
  defuseRange: 3,

  /** Distance within which an attacker picks a dropped spike up */
  pickupRadius: 1.5,
} as const;

// ----------------------------------------------------------------------------
// PHYSICS CONSTANTS
// ----------------------------------------------------------------------------

/**
 * Player movement physics.
 *
 * Speeds are horizontal maxima. Acceleration toward the intended velocity is
 * proportional to the velocity error (`accelerationRate` per second).
 */
export const PHYSICS = {
  /** Running speed */
  runSpeed: 5.5,

  /** Walking speed (quiet) */
  walkSpeed: 3.5,

  /** Crouched speed (quiet) */
  crouchSpeed: 2.0,

  /** Deceleration with no movement intent */
  friction: 8.0,

  /** Proportional gain toward the target velocity */
  accelerationRate: 60.0,

  /** Initial vertical velocity of a jump */
  jumpSpeed: 7.0,

  /** Downward acceleration while airborne */
  gravity: 20.0,

  /** Max-speed multiplier while jumping or falling */
  airborneSpeedFactor: 0.85,

  /** Max-speed multiplier while slowed */
  slowedSpeedFactor: 0.5,

  /** Body radius */
  radius: 0.5,

  /** Standing body height */
  standingHeight: 1.0,

  /** Crouched body height */
  crouchHeight: 0.5,

  /** |z - terrain| below this counts as ground contact */
  groundTolerance: 0.1,
} as const;

/**
 * Fall damage tuning. Empirical values, kept overridable.
 * Damage = floor((fallDistance - safeFallHeight) * damagePerUnit).
 */
export const FALL_DAMAGE = {
  safeFallHeight: 1.5,
  damagePerUnit: 25,
};

// ----------------------------------------------------------------------------
// SENSING CONSTANTS
// ----------------------------------------------------------------------------

export const SENSING = {
  /** Full horizontal field of view in degrees */
  fieldOfViewDegrees: 110,

  /** Maximum sight distance */
  visionRange: 50,

  /** Running footsteps are audible within this distance */
  footstepRange: 20,

  /** Gunfire is audible within this distance */
  gunfireRange: 50,

  /** Eye height as a fraction of body height */
  eyeHeightFactor: 0.9,
} as const;

// ----------------------------------------------------------------------------
// DUEL TUNING
// ----------------------------------------------------------------------------

/**
 * Multipliers that make up a duel advantage score.
 *
 * advantage = aim/100 * weaponTier * armor * statuses * movement * surprise
 *             * height * range, floored at minAdvantage.
 *
 * Values are empirically tuned; callers may pass an override to the Round.
 */
export interface DuelTuning {
  weaponTier: { sidearm: number; smg: number; rifle: number; sniper: number };
  heavyArmor: number;
  lightArmor: number;
  flashed: number;
  slowed: number;
  surprise: number;
  heightAdvantage: number;
  heightThreshold: number;
  pointBlank: number;
  pointBlankRange: number;
  longRange: number;
  longRangeThreshold: number;
  minAdvantage: number;
  headshotChance: number;
  /** Horizontal speed above which a shooter counts as moving */
  movingSpeedThreshold: number;
}

export const DUEL_TUNING: DuelTuning = {
  weaponTier: { sidearm: 0.8, smg: 0.9, rifle: 1.0, sniper: 1.15 },
  heavyArmor: 1.1,
  lightArmor: 1.05,
  flashed: 0.2,
  slowed: 0.8,
  surprise: 1.5,
  heightAdvantage: 1.2,
  heightThreshold: 0.5,
  pointBlank: 0.9,
  pointBlankRange: 5,
  longRange: 0.8,
  longRangeThreshold: 30,
  minAdvantage: 0.1,
  headshotChance: 0.3,
  movingSpeedThreshold: 0.5,
};

// ----------------------------------------------------------------------------
// PLAYER CONSTANTS
// ----------------------------------------------------------------------------

export const PLAYER = {
  maxHealth: 100,
  maxArmor: 50,
  maxUltPoints: 7,
  /** Fraction of incoming damage armor soaks while it lasts */
  armorAbsorption: 0.5,
} as const;
