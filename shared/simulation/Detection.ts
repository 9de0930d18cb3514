/**
 * @file Detection.ts
 * @description Vision and hearing for the round simulation.
 *
 * Vision pipeline (per observer, per enemy):
 * 1. Range: target within SENSING.visionRange of the observer's eye.
 * 2. Field of view: target within half of the 110 deg cone around facing.
 * 3. Line of sight: no wall/object crossing and no smoke sphere in the way.
 *
 * Hearing: running footsteps within SENSING.footstepRange, with intensity
 * falling off linearly to 0 at the edge. Walking and crouching are silent.
 *
 * Deterministic: nothing here draws randomness.
 */

import type { MapGeometry } from '../map/MapGeometry.js';
import type { SmokeSphere } from '../types/MapTypes.js';
import { DUEL_TUNING, SENSING } from '../constants/GameConstants.js';
import type { Player } from './Player.js';
import { degreesToRadians, distance, normalize2D, vec3, type Vec3 } from '../util/MathUtils.js';

// ============================================================================
// --- Types ---
// ============================================================================

/** One observer seeing one enemy this tick. */
export interface Sighting {
  observerId: string;
  targetId: string;
  position: Vec3;
}

/** One listener hearing one enemy's footsteps this tick. */
export interface Noise {
  listenerId: string;
  sourceId: string;
  position: Vec3;
  /** 1 at the source, 0 at the edge of the range */
  intensity: number;
}

// ============================================================================
// --- DetectionSystem Class ---
// ============================================================================

/**
 * Line-of-sight, field-of-view and hearing checks against one map.
 * Created once per round, reused every tick.
 *
 * @example
 * ```ts
 * const detection = new DetectionSystem(map);
 * const sightings = detection.computeVision(players, smokes);
 * ```
 */
export class DetectionSystem {
  /** cos of half the field of view */
  private readonly fovCos: number;

  constructor(private readonly map: MapGeometry) {
    this.fovCos = Math.cos(degreesToRadians(SENSING.fieldOfViewDegrees / 2));
  }

  // --------------------------------------------------------------------------
  // Vision
  // --------------------------------------------------------------------------

  /** Eye point of a player (a fraction of body height above the feet). */
  eyePosition(player: Player): Vec3 {
    return vec3(player.position.x, player.position.y, player.position.z + player.height * SENSING.eyeHeightFactor);
  }

  /**
   * Whether `target` lies inside the observer's horizontal view cone.
   * A target directly above or below counts as in view.
   */
  isInFieldOfView(observer: Player, target: Vec3): boolean {
    const toTarget = normalize2D({ x: target.x - observer.position.x, y: target.y - observer.position.y });
    if (toTarget === null) return true;
    const facing = normalize2D(observer.facing) ?? { x: 1, y: 0 };
    return facing.x * toTarget.x + facing.y * toTarget.y >= this.fovCos;
  }

  /** Range, cone and sight-line test for one observer/target pair. */
  canSee(observer: Player, target: Player, smokes: readonly SmokeSphere[]): boolean {
    if (!observer.alive || !target.alive || observer.id === target.id) {
      return false;
    }
    const eye = this.eyePosition(observer);
    const targetEye = this.eyePosition(target);
    if (distance(eye, targetEye) > SENSING.visionRange) {
      return false;
    }
    if (!this.isInFieldOfView(observer, targetEye)) {
      return false;
    }
    return this.map.lineOfSight(eye, targetEye, smokes);
  }

  /**
   * Recompute every living player's visible enemies.
   * Clears and refills `player.visibleEnemies`.
   */
  computeVision(players: readonly Player[], smokes: readonly SmokeSphere[]): Sighting[] {
    const sightings: Sighting[] = [];
    for (const observer of players) {
      observer.visibleEnemies.clear();
      if (!observer.alive) continue;

      for (const target of players) {
        if (target.side === observer.side) continue;
        if (this.canSee(observer, target, smokes)) {
          observer.visibleEnemies.add(target.id);
          sightings.push({ observerId: observer.id, targetId: target.id, position: target.position });
        }
      }
    }
    return sightings;
  }

  // --------------------------------------------------------------------------
  // Hearing
  // --------------------------------------------------------------------------

  /** Whether a player's footsteps make noise this tick. */
  isAudible(player: Player): boolean {
    return (
      player.alive &&
      !player.walking &&
      !player.crouching &&
      player.speed > DUEL_TUNING.movingSpeedThreshold
    );
  }

  /**
   * Recompute every living player's heard enemies.
   * Clears and refills `player.heardEnemies`.
   */
  computeHearing(players: readonly Player[]): Noise[] {
    const noises: Noise[] = [];
    for (const listener of players) {
      listener.heardEnemies.clear();
      if (!listener.alive) continue;

      for (const source of players) {
        if (source.side === listener.side || !this.isAudible(source)) continue;
        const d = distance(listener.position, source.position);
        if (d > SENSING.footstepRange) continue;

        const intensity = 1 - d / SENSING.footstepRange;
        listener.heardEnemies.set(source.id, intensity);
        noises.push({ listenerId: listener.id, sourceId: source.id, position: source.position, intensity });
      }
    }
    return noises;
  }

  /** Living players within `range` of a sound at `position`, excluding `sourceId`. */
  listenersOf(position: Vec3, range: number, players: readonly Player[], sourceId: string): Player[] {
    return players.filter((p) => p.alive && p.id !== sourceId && distance(p.position, position) <= range);
  }
}
