// ============================================================================
// MapTypes.ts
// Types describing static map geometry: axis-aligned boundaries (areas, walls,
// objects, stairs, ramps, bomb sites), spawn lists and area adjacency.
// ============================================================================

import type { Vec3 } from '../util/MathUtils.js';

/**
 * BoundaryKind tags every axis-aligned box in the map.
 * The kind decides which queries a boundary takes part in.
 */
export enum BoundaryKind {
  /** Walkable floor region. Players must stand inside one at or above its base z. */
  AREA = 'area',

  /** Tall solid volume. Blocks movement, bullets and sight. */
  WALL = 'wall',

  /**
   * Solid prop (crate, ledge, overhang). Blocks movement where its vertical extent
   * overlaps the player's body; its top can be stood on when it rests on the floor.
   */
  OBJECT = 'object',

  /** Stepped elevation change. */
  STAIRS = 'stairs',

  /** Continuous elevation change. */
  RAMP = 'ramp',

  /** Region in which the spike can be planted. Only its footprint matters. */
  BOMB_SITE = 'bomb-site',
}

/**
 * Direction a ramp or staircase rises toward.
 *   north = +y, south = -y, east = +x, west = -x
 */
export type SlopeDirection = 'north' | 'south' | 'east' | 'west';

/**
 * A named axis-aligned box.
 * The footprint spans [x, x + width] by [y, y + height]; the volume spans
 * [z, z + heightZ] vertically.
 */
export interface Boundary {
  readonly name: string;
  readonly kind: BoundaryKind;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  /** Base elevation. For areas this is the floor height. */
  readonly z: number;
  /** Vertical extent. 0 means the boundary is tested on its footprint only. */
  readonly heightZ: number;
}

/** Ramp: elevation interpolates linearly from zStart to zEnd along `direction`. */
export interface RampBoundary extends Boundary {
  readonly kind: BoundaryKind.RAMP;
  readonly zStart: number;
  readonly zEnd: number;
  readonly direction: SlopeDirection;
}

/** Stairs: `steps` flat treads, each step_height = heightZ / steps above the last. */
export interface StairsBoundary extends Boundary {
  readonly kind: BoundaryKind.STAIRS;
  readonly steps: number;
  readonly direction: SlopeDirection;
}

/** Any boundary with a sloped surface. */
export type SlopeBoundary = RampBoundary | StairsBoundary;

/**
 * Result of a raycast against wall/object volumes.
 * `t` is the distance along the (not necessarily unit) direction vector.
 */
export interface RaycastHit {
  readonly t: number;
  readonly point: Vec3;
  readonly boundary: Boundary;
}

/** A smoke volume that occludes sight. */
export interface SmokeSphere {
  readonly center: Vec3;
  readonly radius: number;
}

/** Spawn points per side, as listed in the map document. */
export interface SpawnLists {
  readonly attackers: readonly Vec3[];
  readonly defenders: readonly Vec3[];
}
