/**
 * @file Movement.ts
 * @description Per-tick physics integration and collision resolution for a player.
 *
 * Step order (each stage depends on the one before it):
 *   1. Target horizontal velocity from intent and the current max speed
 *   2. Friction when there is no intent
 *   3. Gravity while airborne
 *   4. Integrate velocity and position (ceiling clamps upward motion)
 *   5. Snap to terrain when grounded, only via a ramp/stairs or on level ground
 *   6. Horizontal collision: full move, then x-only, then y-only, else hold
 *   7. Ground contact, landing and fall damage, forced crouch
 *
 * Operates directly on Player fields, the way the tick loop in Round.ts
 * expects; nothing here draws randomness.
 */

import { FALL_DAMAGE, PHYSICS } from '../constants/GameConstants.js';
import type { MapGeometry } from '../map/MapGeometry.js';
import type { Player } from './Player.js';
import { vec3, type Vec3 } from '../util/MathUtils.js';
import { createLogger } from '../util/Logger.js';

const log = createLogger('movement');

// ============================================================================
// --- Constants ---
// ============================================================================

/** Elevations closer than this are treated as level */
const LEVEL_EPSILON = 1e-6;

// ============================================================================
// --- Types ---
// ============================================================================

/** Fall damage tuning, overridable per Round. */
export interface FallDamageTuning {
  safeFallHeight: number;
  damagePerUnit: number;
}

/** What happened during one movement step. */
export interface MovementResult {
  /** True on the tick the player touched down after being airborne */
  landed: boolean;
  /** Height fallen on landing (0 when not landing) */
  fallDistance: number;
  /** Health lost to the landing */
  fallDamage: number;
  /** True when collision changed the requested horizontal displacement */
  blocked: boolean;
}

// ============================================================================
// --- Public API ---
// ============================================================================

/**
 * Advance one player's movement by dt seconds.
 *
 * The player's resolved position always satisfies `map.isValidPosition` for
 * its current body height, provided it did at the start of the step.
 *
 * @example
 * ```ts
 * player.setMovementInput({ x: 0, y: 1 }, false, false, false);
 * const result = updateMovement(player, 0.1, map);
 * if (result.fallDamage > 0 && player.health <= 0) handleDeath(player);
 * ```
 */
export function updateMovement(
  player: Player,
  dt: number,
  map: MapGeometry,
  fallTuning: FallDamageTuning = FALL_DAMAGE,
): MovementResult {
  const result: MovementResult = { landed: false, fallDistance: 0, fallDamage: 0, blocked: false };
  if (!player.alive || dt <= 0) {
    return result;
  }

  const start = player.position;
  updateCrouch(player, map);

  // --------------------------------------------------------------------------
  // 1-3. Accelerations
  // --------------------------------------------------------------------------

  const maxSpeed = player.currentMaxSpeed();
  let vx = player.velocity.x;
  let vy = player.velocity.y;
  let vz = player.velocity.z;
  let ax = 0;
  let ay = 0;

  const hasIntent = player.moveDirection.x !== 0 || player.moveDirection.y !== 0;
  if (hasIntent) {
    /* Proportional approach toward the target velocity, capped at one full step */
    const gain = Math.min(1, PHYSICS.accelerationRate * dt);
    ax = ((player.moveDirection.x * maxSpeed - vx) * gain) / dt;
    ay = ((player.moveDirection.y * maxSpeed - vy) * gain) / dt;
  } else {
    const speed = Math.hypot(vx, vy);
    if (speed > 0) {
      /* Friction never reverses direction */
      const decel = Math.min(PHYSICS.friction, speed / dt);
      ax = (-vx / speed) * decel;
      ay = (-vy / speed) * decel;
    }
  }

  let az = 0;
  if (player.grounded && !player.jumping) {
    vz = 0;
  } else {
    az = -PHYSICS.gravity;
  }
  player.acceleration = vec3(ax, ay, az);

  // --------------------------------------------------------------------------
  // 4. Integrate
  // --------------------------------------------------------------------------

  vx += ax * dt;
  vy += ay * dt;
  vz += az * dt;

  const horizontal = Math.hypot(vx, vy);
  if (horizontal > maxSpeed) {
    const factor = maxSpeed / horizontal;
    vx *= factor;
    vy *= factor;
  }

  const nx = start.x + vx * dt;
  const ny = start.y + vy * dt;
  let nz = start.z + vz * dt;

  /* Head bump: rising into a ceiling stops at the underside */
  if (vz > 0) {
    const ceiling = start.z + map.overheadClearance(start.x, start.y, start.z);
    if (nz + player.height > ceiling) {
      nz = Math.max(start.z, ceiling - player.height);
      vz = 0;
    }
  }

  // --------------------------------------------------------------------------
  // 5. Terrain snap / landing clamp
  // --------------------------------------------------------------------------

  const desiredFloor = map.elevationAt(nx, ny);
  if (!player.jumping && !player.falling) {
    nz = snapToTerrain(player, map, start, nx, ny, desiredFloor);
  } else if (nz < desiredFloor && start.z >= desiredFloor - PHYSICS.groundTolerance) {
    /* Touching down on a surface we were above */
    nz = desiredFloor;
  }
  if (nz < 0) {
    nz = 0;
  }

  // --------------------------------------------------------------------------
  // 6. Horizontal collision
  // --------------------------------------------------------------------------

  const resolved = resolveCollisions(player, map, start, nx, ny, nz);
  player.position = resolved;

  if (resolved.x !== nx) {
    vx = 0;
    result.blocked = true;
  }
  if (resolved.y !== ny) {
    vy = 0;
    result.blocked = true;
  }
  if (resolved.z !== nz && vz < 0) {
    vz = 0;
  }
  player.velocity = vec3(vx, vy, vz);

  // --------------------------------------------------------------------------
  // 7. Contact, landing, crouch
  // --------------------------------------------------------------------------

  const wasGrounded = player.grounded;
  player.grounded = checkGroundContact(player, map);

  if (!wasGrounded && player.grounded) {
    result.landed = true;
    handleLanding(player, map, fallTuning, result);
  }

  if (player.grounded) {
    player.jumping = false;
    player.falling = false;
    player.lastGroundZ = player.position.z;
  } else if (player.velocity.z <= 0) {
    player.jumping = false;
    player.falling = true;
  }

  updateCrouch(player, map);
  return result;
}

// ============================================================================
// --- Stages ---
// ============================================================================

/**
 * Grounded z for the new horizontal point.
 * Follows the terrain on ramps/stairs and level ground; anywhere else the
 * player keeps its height (walking off a ledge starts a fall, walking into a
 * step is blocked by collision).
 */
function snapToTerrain(
  player: Player,
  map: MapGeometry,
  start: Vec3,
  nx: number,
  ny: number,
  desiredFloor: number,
): number {
  const onSlope = map.slopeAt(start.x, start.y) !== null || map.slopeAt(nx, ny) !== null;
  const level = Math.abs(desiredFloor - start.z) < LEVEL_EPSILON;
  if ((onSlope || level) && map.canMove(start, vec3(nx, ny, desiredFloor), player.radius, player.height)) {
    return desiredFloor;
  }
  return start.z;
}

/**
 * Try the full displacement, then each axis alone (wall slide), then only
 * the vertical component. Falls back to the start position.
 */
function resolveCollisions(player: Player, map: MapGeometry, start: Vec3, nx: number, ny: number, nz: number): Vec3 {
  const { radius, height } = player;
  const candidates: Vec3[] = [
    vec3(nx, ny, nz),
    vec3(nx, start.y, nz),
    vec3(start.x, ny, nz),
    vec3(start.x, start.y, nz),
  ];
  for (const candidate of candidates) {
    if (map.isValidPosition(candidate.x, candidate.y, candidate.z, radius, height)) {
      return candidate;
    }
  }
  if (!map.isValidPosition(start.x, start.y, start.z, radius, height)) {
    log.warn({ playerId: player.id, position: start }, 'Player began the step in invalid space, holding position');
  }
  return start;
}

/**
 * On the floor when at z <= 0 or within tolerance of the surface below,
 * and not still rising from a jump.
 */
function checkGroundContact(player: Player, map: MapGeometry): boolean {
  if (player.velocity.z > 0) {
    return false;
  }
  const { x, y, z } = player.position;
  if (z <= 0) {
    return true;
  }
  return Math.abs(z - map.elevationAt(x, y)) < PHYSICS.groundTolerance;
}

/** Settle onto the surface and apply fall damage beyond the safe height. */
function handleLanding(player: Player, map: MapGeometry, tuning: FallDamageTuning, result: MovementResult): void {
  const { x, y } = player.position;
  const surface = Math.max(0, map.elevationAt(x, y));
  if (map.isValidPosition(x, y, surface, player.radius, player.height)) {
    player.position = vec3(x, y, surface);
  }

  const fallDistance = player.lastGroundZ - player.position.z;
  result.fallDistance = Math.max(0, fallDistance);
  if (fallDistance > tuning.safeFallHeight) {
    const damage = Math.floor((fallDistance - tuning.safeFallHeight) * tuning.damagePerUnit);
    result.fallDamage = player.applyDirectDamage(damage);
  }

  player.velocity = vec3(player.velocity.x, player.velocity.y, 0);
}

/**
 * Crouch is whatever the intent asked for, forced on when the clearance
 * overhead sits between the crouched and standing heights or the body
 * would not fit standing.
 */
function updateCrouch(player: Player, map: MapGeometry): void {
  const { x, y, z } = player.position;
  const clearance = map.overheadClearance(x, y, z);
  const forced = clearance > PHYSICS.crouchHeight && clearance < PHYSICS.standingHeight;
  /* Standing back up also needs room for the whole body circle */
  const blocked = !map.isValidPosition(x, y, z, player.radius, PHYSICS.standingHeight);
  player.crouching = player.wantsCrouch || forced || blocked;
  player.height = player.crouching ? PHYSICS.crouchHeight : PHYSICS.standingHeight;
}
