/**
 * @file Abilities.ts
 * @description Ability instance lifecycle: creation, activation, per-tick
 * update (projectile flight and bounce, area ticking), effect application and
 * expiry.
 *
 * Instances are a tagged variant on `behavior`:
 *   - 'projectile': thrown from the owner's eye, flies in a straight line,
 *     bounces off walls/objects while bounces remain, pops after the
 *     definition's activation delay.
 *   - 'area': placed at its target point and takes effect immediately.
 *
 * Effect application never kills anyone directly. It reports damage and
 * healing so the Round can run death handling and log events.
 */

import type { MapGeometry } from '../map/MapGeometry.js';
import type { SmokeSphere } from '../types/MapTypes.js';
import {
  AbilityKind,
  AbilityTarget,
  type AbilityDefinition,
  type AbilityInstance,
  type ProjectileInstance,
  type StatusEffect,
} from '../types/AbilityTypes.js';
import { SENSING } from '../constants/GameConstants.js';
import type { Player } from './Player.js';
import {
  add,
  degreesToRadians,
  distance,
  normalize,
  normalize2D,
  scale,
  subtract,
  vec3,
  type Vec3,
} from '../util/MathUtils.js';
import { SimulationError } from '../util/SimulationError.js';
import { createLogger } from '../util/Logger.js';

const log = createLogger('abilities');

// ============================================================================
// --- Constants ---
// ============================================================================

/** cos(60 deg): a flash blinds only players looking within 60 deg of it */
export const FLASH_VIEW_COS = Math.cos(degreesToRadians(60));

/** Seconds smoked/burning outlive the last tick a player spent inside */
const AREA_STATUS_LINGER = 0.5;

/** Distance a bouncing projectile is pushed back off the surface it hit */
const BOUNCE_NUDGE = 1e-3;

/** Tolerance for deciding which face of a box was hit */
const FACE_EPSILON = 1e-6;

// ============================================================================
// --- Types ---
// ============================================================================

/** Per-tick inputs to `updateAbility` and `applyEffect`. */
export interface EffectContext {
  time: number;
  dt: number;
  map: MapGeometry;
  players: readonly Player[];
  /** Sight blockers from other live smokes */
  smokes: readonly SmokeSphere[];
}

/** Health changes caused by one tick of an instance. */
export interface EffectReport {
  damaged: Array<{ playerId: string; amount: number }>;
  healed: Array<{ playerId: string; amount: number }>;
  /** Players touched for the first time this tick */
  newlyAffected: string[];
}

export type UpdateOutcome = 'active' | 'expired';

// ============================================================================
// --- Definitions ---
// ============================================================================

/**
 * Reject out-of-range templates before any Round is built.
 *
 * @throws SimulationError ABILITY_INVALID
 */
export function validateDefinition(definition: AbilityDefinition): AbilityDefinition {
  const problems: string[] = [];
  if (!(definition.duration > 0)) problems.push('duration must be > 0');
  if (!(definition.effectRadius > 0)) problems.push('effectRadius must be > 0');
  if (!Number.isInteger(definition.maxCharges) || definition.maxCharges < 1) {
    problems.push('maxCharges must be a positive integer');
  }
  if (definition.targeting === AbilityTarget.PROJECTILE && !(definition.projectileSpeed > 0)) {
    problems.push('projectileSpeed must be > 0 for projectiles');
  }
  if (definition.bounces < 0 || definition.activationDelay < 0 || definition.castTime < 0) {
    problems.push('bounces, activationDelay and castTime must be >= 0');
  }

  if (problems.length > 0) {
    throw SimulationError.abilityInvalid(`Ability "${definition.name}" is invalid: ${problems.join('; ')}`, {
      ability: definition.name,
      problems,
    });
  }
  return definition;
}

// ============================================================================
// --- Lifecycle ---
// ============================================================================

/**
 * Build an inactive instance from a definition.
 * Projectile targeting yields a projectile instance; everything else is an area.
 */
export function createInstance(
  definition: AbilityDefinition,
  ownerId: string,
  id: string,
  charges: number = definition.maxCharges,
): AbilityInstance {
  validateDefinition(definition);
  const base = {
    id,
    definition,
    ownerId,
    chargesRemaining: charges,
    active: false,
    position: vec3(0, 0, 0),
    affected: new Set<string>(),
    startTime: 0,
    endTime: 0,
    effectStarted: false,
  };

  if (definition.targeting === AbilityTarget.PROJECTILE) {
    return {
      ...base,
      behavior: 'projectile',
      velocity: vec3(0, 0, 0),
      bouncesRemaining: definition.bounces,
      trajectory: [],
      landed: false,
    };
  }
  return { ...base, behavior: 'area' };
}

/**
 * Spend a charge and start the instance.
 *
 * For projectiles `origin` is the launch point and `direction` the throw
 * direction; for areas `origin` is where the effect sits.
 *
 * @returns false when no charge is left or the instance is already live
 */
export function activate(instance: AbilityInstance, time: number, origin: Vec3, direction: Vec3): boolean {
  if (instance.chargesRemaining <= 0 || instance.active) {
    return false;
  }

  const { definition } = instance;
  instance.chargesRemaining -= 1;
  instance.active = true;
  instance.startTime = time + definition.castTime;
  instance.endTime = instance.startTime + definition.duration;
  instance.position = origin;
  instance.effectStarted = false;
  instance.affected.clear();

  if (instance.behavior === 'projectile') {
    const unit = normalize(direction);
    instance.velocity = scale(unit.x === 0 && unit.y === 0 && unit.z === 0 ? vec3(1, 0, 0) : unit, definition.projectileSpeed);
    instance.bouncesRemaining = definition.bounces;
    instance.trajectory.length = 0;
    instance.trajectory.push(origin);
    instance.landed = false;
  }
  return true;
}

/** Seconds until the instance expires; 0 once expired or never started. */
export function remainingDuration(instance: AbilityInstance, time: number): number {
  if (!instance.active) return 0;
  return Math.max(0, instance.endTime - time);
}

/**
 * Advance one tick.
 *
 * Expires (and clears its statuses from affected players) once `time` reaches
 * the end time. Otherwise moves projectiles and, once the activation delay has
 * passed, applies effects.
 */
export function updateAbility(instance: AbilityInstance, ctx: EffectContext): { outcome: UpdateOutcome; report: EffectReport } {
  const report: EffectReport = { damaged: [], healed: [], newlyAffected: [] };

  if (!instance.active || ctx.time >= instance.endTime) {
    expire(instance, ctx.players);
    return { outcome: 'expired', report };
  }

  if (!ctx.players.some((p) => p.id === instance.ownerId)) {
    log.warn({ instance: instance.id, owner: instance.ownerId }, 'Dropping ability instance with no owner');
    expire(instance, ctx.players);
    return { outcome: 'expired', report };
  }

  if (ctx.time < instance.startTime) {
    return { outcome: 'active', report };
  }

  if (instance.behavior === 'projectile') {
    advanceProjectile(instance, ctx.dt, ctx.map);
  }

  const delay = instance.behavior === 'projectile' ? instance.definition.activationDelay : 0;
  if (ctx.time >= instance.startTime + delay) {
    instance.effectStarted = true;
    return { outcome: 'active', report: applyEffect(instance, ctx) };
  }
  return { outcome: 'active', report };
}

/**
 * Apply the ability's effect to every living player in radius.
 */
export function applyEffect(instance: AbilityInstance, ctx: EffectContext): EffectReport {
  const report: EffectReport = { damaged: [], healed: [], newlyAffected: [] };
  const { definition } = instance;
  const owner = ctx.players.find((p) => p.id === instance.ownerId);
  if (owner === undefined) {
    return report;
  }
  const remaining = remainingDuration(instance, ctx.time);

  for (const player of ctx.players) {
    if (!player.alive) continue;
    if (distance(player.position, instance.position) > definition.effectRadius) continue;

    const ally = player.side === owner.side;
    let touched = false;

    switch (definition.kind) {
      case AbilityKind.FLASH:
        if (isFacingFlash(player, instance.position, ctx)) {
          addStatuses(player, definition.statusEffects, remaining);
          touched = true;
        }
        break;

      case AbilityKind.SMOKE:
        addStatuses(player, definition.statusEffects, Math.min(remaining, AREA_STATUS_LINGER));
        touched = true;
        break;

      case AbilityKind.MOLLY: {
        addStatuses(player, definition.statusEffects, Math.min(remaining, AREA_STATUS_LINGER));
        const amount = player.applyDamage(definition.damagePerSecond * ctx.dt);
        if (amount > 0) {
          report.damaged.push({ playerId: player.id, amount });
          if (!ally) owner.damageDealt += amount;
        }
        touched = true;
        break;
      }

      case AbilityKind.HEAL:
        if (ally) {
          const amount = player.heal(definition.healingPerSecond * ctx.dt);
          if (amount > 0) report.healed.push({ playerId: player.id, amount });
          touched = true;
        }
        break;

      case AbilityKind.RECON:
      case AbilityKind.TRAP:
        if (!ally) {
          addStatuses(player, definition.statusEffects, remaining);
          touched = true;
        }
        break;
    }

    if (touched && !instance.affected.has(player.id)) {
      instance.affected.add(player.id);
      report.newlyAffected.push(player.id);
    }
  }
  return report;
}

/** Deactivate and strip the instance's statuses from everyone it touched. */
export function expire(instance: AbilityInstance, players: readonly Player[]): void {
  instance.active = false;
  for (const player of players) {
    if (!instance.affected.has(player.id)) continue;
    for (const effect of instance.definition.statusEffects) {
      player.removeStatus(effect);
    }
  }
}

/** Sight-blocking spheres of live smokes. */
export function smokeSpheres(instances: readonly AbilityInstance[]): SmokeSphere[] {
  return instances
    .filter((i) => i.active && i.effectStarted && i.definition.blocksVision)
    .map((i) => ({ center: i.position, radius: i.definition.effectRadius }));
}

// ============================================================================
// --- Helpers ---
// ============================================================================

function addStatuses(player: Player, effects: readonly StatusEffect[], duration: number): void {
  if (duration <= 0) return;
  for (const effect of effects) {
    player.addStatus(effect, duration);
  }
}

/**
 * A flash blinds only when the player looks toward it (within 60 deg of the
 * facing direction) and nothing solid or smoky sits in between.
 */
function isFacingFlash(player: Player, flashPosition: Vec3, ctx: EffectContext): boolean {
  const eye = vec3(player.position.x, player.position.y, player.position.z + player.height * SENSING.eyeHeightFactor);
  const toFlash = normalize2D({ x: flashPosition.x - eye.x, y: flashPosition.y - eye.y });
  if (toFlash !== null) {
    const facing = normalize2D(player.facing) ?? { x: 1, y: 0 };
    const dotProduct = facing.x * toFlash.x + facing.y * toFlash.y;
    if (dotProduct < FLASH_VIEW_COS) {
      return false;
    }
  }
  return ctx.map.lineOfSight(eye, flashPosition, ctx.smokes);
}

/**
 * Move a projectile for dt, reflecting off the first surface hit while
 * bounces remain and stopping at it otherwise. Travel is capped at maxRange.
 */
function advanceProjectile(instance: ProjectileInstance, dt: number, map: MapGeometry): void {
  if (instance.landed) return;

  const step = scale(instance.velocity, dt);
  const hit = map.raycast(instance.position, step, 1);

  if (hit === null) {
    instance.position = add(instance.position, step);
  } else {
    const back = scale(normalize(step), BOUNCE_NUDGE);
    instance.position = subtract(hit.point, back);
    if (instance.bouncesRemaining > 0) {
      instance.bouncesRemaining -= 1;
      instance.velocity = reflect(instance.velocity, hit.point, hit.boundary);
    } else {
      instance.landed = true;
      instance.velocity = vec3(0, 0, 0);
    }
  }

  if (instance.position.z < 0) {
    instance.position = vec3(instance.position.x, instance.position.y, 0);
  }
  instance.trajectory.push(instance.position);

  const origin = instance.trajectory[0];
  if (origin !== undefined && distance(origin, instance.position) >= instance.definition.maxRange) {
    instance.landed = true;
    instance.velocity = vec3(0, 0, 0);
  }
}

/** Flip the velocity component normal to the face of `box` that contains `point`. */
function reflect(
  velocity: Vec3,
  point: Vec3,
  box: { x: number; y: number; z: number; width: number; height: number; heightZ: number },
): Vec3 {
  const onX = Math.abs(point.x - box.x) < FACE_EPSILON || Math.abs(point.x - (box.x + box.width)) < FACE_EPSILON;
  const onY = Math.abs(point.y - box.y) < FACE_EPSILON || Math.abs(point.y - (box.y + box.height)) < FACE_EPSILON;
  const onZ =
    box.heightZ > 0 &&
    (Math.abs(point.z - box.z) < FACE_EPSILON || Math.abs(point.z - (box.z + box.heightZ)) < FACE_EPSILON);

  return vec3(onX ? -velocity.x : velocity.x, onY ? -velocity.y : velocity.y, onZ ? -velocity.z : velocity.z);
}
