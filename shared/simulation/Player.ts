/**
 * @file Player.ts
 * @description Runtime player entity owned by a Round.
 *
 * Combines the static roster entry (ratings, role, side) with mutable round
 * state: combat stats, 3D kinematics, movement-mode flags, status effects,
 * ability charges and per-round counters.
 *
 * Physics integration lives in Movement.ts; this class only holds the state
 * and the small state transitions that belong to the player itself (jump
 * start, damage, healing, status bookkeeping).
 */

import { PHYSICS, PLAYER } from '../constants/GameConstants.js';
import { ABILITIES, ROLE_KITS } from '../constants/AbilityData.js';
import { STARTING_CREDITS } from '../constants/EconomyConstants.js';
import { SHIELDS } from '../constants/WeaponData.js';
import type { StatusEffect } from '../types/AbilityTypes.js';
import { Side } from '../types/GameTypes.js';
import type { PlayerConfig, PlayerRole } from '../types/PlayerTypes.js';
import { WeaponId, type ShieldType } from '../types/WeaponTypes.js';
import { horizontalLength, normalize2D, type Vec2, type Vec3 } from '../util/MathUtils.js';
import { SimulationError } from '../util/SimulationError.js';

// ============================================================================
// --- Player Class ---
// ============================================================================

/**
 * A player for the lifetime of one round.
 *
 * @example
 * ```ts
 * const player = new Player(config, map.spawns.attackers[0]);
 * player.setMovementInput({ x: 1, y: 0 }, false, false, true);
 * updateMovement(player, 0.1, map);
 * ```
 */
export class Player {
  // --------------------------------------------------------------------------
  // Identity
  // --------------------------------------------------------------------------

  public readonly id: string;
  public readonly name: string;
  public readonly side: Side;
  public readonly role: PlayerRole;
  public readonly agent: string;

  /** Aim rating 0-100 */
  public readonly aim: number;

  /** Accuracy retained while moving, 0-100 */
  public readonly movementAccuracy: number;

  // --------------------------------------------------------------------------
  // Combat stats
  // --------------------------------------------------------------------------

  public health: number = PLAYER.maxHealth;
  public armor: number;
  public credits: number;
  public weapon: WeaponId;
  public shield: ShieldType | null;
  public alive: boolean = true;
  public ultPoints: number;

  /** Whether this player currently carries the spike */
  public hasSpike: boolean = false;

  // --------------------------------------------------------------------------
  // Kinematics
  // --------------------------------------------------------------------------

  public position: Vec3;
  public velocity: Vec3 = { x: 0, y: 0, z: 0 };
  public acceleration: Vec3 = { x: 0, y: 0, z: 0 };

  /** Unit horizontal view direction */
  public facing: Vec2;

  /** Requested horizontal movement direction (unit or zero) */
  public moveDirection: Vec2 = { x: 0, y: 0 };

  public walking: boolean = false;
  /** Effective crouch state (requested or forced by low clearance) */
  public crouching: boolean = false;
  /** Crouch as requested by the last movement intent */
  public wantsCrouch: boolean = false;
  public jumping: boolean = false;
  public falling: boolean = false;
  public grounded: boolean = true;

  /** Elevation of the last surface stood on, used for fall damage */
  public lastGroundZ: number;

  public readonly radius: number = PHYSICS.radius;
  public height: number = PHYSICS.standingHeight;

  // --------------------------------------------------------------------------
  // Effects and abilities
  // --------------------------------------------------------------------------

  /** Active status effects and their remaining seconds */
  public readonly statuses: Map<StatusEffect, number> = new Map();

  /** Remaining charges per ability name */
  public readonly abilityCharges: Map<string, number> = new Map();

  // --------------------------------------------------------------------------
  // Per-round counters and progress
  // --------------------------------------------------------------------------

  public kills: number = 0;
  public deaths: number = 0;
  public plants: number = 0;
  public defuses: number = 0;
  public damageDealt: number = 0;
  public damageReceived: number = 0;
  public plantProgress: number = 0;
  public defuseProgress: number = 0;

  /** Enemy ids in sight this tick */
  public readonly visibleEnemies: Set<string> = new Set();

  /** Enemy ids heard this tick with intensity 0-1 */
  public readonly heardEnemies: Map<string, number> = new Map();

  constructor(config: PlayerConfig, spawn: Vec3) {
    this.id = config.id;
    this.name = config.name;
    this.side = config.side;
    this.role = config.role;
    this.agent = config.agent;
    this.aim = config.aim;
    this.movementAccuracy = config.movementAccuracy;

    this.credits = config.credits ?? STARTING_CREDITS;
    this.weapon = config.weapon ?? WeaponId.CLASSIC;
    this.shield = config.shield ?? null;
    this.armor = this.shield === null ? 0 : Math.min(config.armor ?? SHIELDS[this.shield].armor, SHIELDS[this.shield].armor);
    this.ultPoints = Math.min(config.ultPoints ?? 0, PLAYER.maxUltPoints);

    this.position = { ...spawn };
    this.lastGroundZ = spawn.z;
    /* Attackers spawn facing +x, defenders -x, toward the map centre */
    this.facing = config.side === Side.ATTACKERS ? { x: 1, y: 0 } : { x: -1, y: 0 };

    for (const name of config.abilities ?? ROLE_KITS[config.role]) {
      const definition = ABILITIES[name];
      if (definition === undefined) {
        throw SimulationError.rosterInvalid(`Player ${config.id} has unknown ability "${name}"`, {
          playerId: config.id,
          ability: name,
        });
      }
      this.abilityCharges.set(name, definition.maxCharges);
    }
  }

  // --------------------------------------------------------------------------
  // Movement state
  // --------------------------------------------------------------------------

  /** Horizontal speed */
  get speed(): number {
    return horizontalLength(this.velocity);
  }

  get airborne(): boolean {
    return this.jumping || this.falling;
  }

  /**
   * Max horizontal speed for the current mode.
   * Crouch and walk replace the run speed; slowed and airborne scale it.
   */
  currentMaxSpeed(): number {
    let speed: number = PHYSICS.runSpeed;
    if (this.crouching) {
      speed = PHYSICS.crouchSpeed;
    } else if (this.walking) {
      speed = PHYSICS.walkSpeed;
    }
    if (this.statuses.has('slowed')) {
      speed *= PHYSICS.slowedSpeedFactor;
    }
    if (this.airborne) {
      speed *= PHYSICS.airborneSpeedFactor;
    }
    return speed;
  }

  /**
   * Record the movement intent for the next physics step.
   * A jump only starts from the ground.
   */
  setMovementInput(direction: Vec2, walking: boolean, crouching: boolean, jump: boolean): void {
    this.moveDirection = normalize2D(direction) ?? { x: 0, y: 0 };
    this.walking = walking;
    this.wantsCrouch = crouching;

    if (jump && this.grounded && !this.jumping && !this.falling) {
      this.startJump();
    }
  }

  /** Leave the ground with the jump impulse. */
  startJump(): void {
    this.jumping = true;
    this.grounded = false;
    this.lastGroundZ = this.position.z;
    this.velocity = { ...this.velocity, z: PHYSICS.jumpSpeed };
  }

  /** Clear movement intent (idle). */
  stopMoving(): void {
    this.moveDirection = { x: 0, y: 0 };
    this.walking = false;
    this.wantsCrouch = false;
  }

  // --------------------------------------------------------------------------
  // Health
  // --------------------------------------------------------------------------

  /**
   * Apply incoming damage. Armor soaks half of it while armor lasts.
   * Does not handle death; the Round does that so it can drop items.
   *
   * @returns Health actually lost
   */
  applyDamage(raw: number): number {
    if (!this.alive || raw <= 0) return 0;

    const absorbed = Math.min(this.armor, raw * PLAYER.armorAbsorption);
    this.armor -= absorbed;
    if (this.armor <= 0) {
      this.armor = 0;
    }

    const healthLoss = Math.min(this.health, raw - absorbed);
    this.health -= healthLoss;
    this.damageReceived += healthLoss + absorbed;
    return healthLoss;
  }

  /** Damage that skips armor (falls). @returns Health actually lost */
  applyDirectDamage(amount: number): number {
    if (!this.alive || amount <= 0) return 0;
    const loss = Math.min(this.health, amount);
    this.health -= loss;
    this.damageReceived += loss;
    return loss;
  }

  /** Restore health up to the maximum. @returns Health actually gained */
  heal(amount: number): number {
    if (!this.alive || amount <= 0) return 0;
    const gain = Math.min(PLAYER.maxHealth - this.health, amount);
    this.health += gain;
    return gain;
  }

  /** Mark dead. Idempotent. */
  kill(): void {
    if (!this.alive) return;
    this.alive = false;
    this.health = 0;
    this.deaths += 1;
    this.plantProgress = 0;
    this.defuseProgress = 0;
    this.velocity = { x: 0, y: 0, z: 0 };
    this.moveDirection = { x: 0, y: 0 };
  }

  // --------------------------------------------------------------------------
  // Status effects
  // --------------------------------------------------------------------------

  hasStatus(effect: StatusEffect): boolean {
    return this.statuses.has(effect);
  }

  /** Add or refresh a status, keeping the longer of the two durations. */
  addStatus(effect: StatusEffect, duration: number): void {
    const current = this.statuses.get(effect) ?? 0;
    this.statuses.set(effect, Math.max(current, duration));
  }

  removeStatus(effect: StatusEffect): void {
    this.statuses.delete(effect);
  }

  /** Count every status down by dt and drop the expired ones. */
  decayStatuses(dt: number): void {
    for (const [effect, remaining] of this.statuses) {
      const next = remaining - dt;
      if (next <= 0) {
        this.statuses.delete(effect);
      } else {
        this.statuses.set(effect, next);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Equipment
  // --------------------------------------------------------------------------

  /** Equip a shield at full armor. */
  equipShield(shield: ShieldType): void {
    this.shield = shield;
    this.armor = SHIELDS[shield].armor;
  }

  /** Remaining charges of an ability (0 when the player lacks it). */
  chargesOf(ability: string): number {
    return this.abilityCharges.get(ability) ?? 0;
  }
}
