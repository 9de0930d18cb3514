/**
 * @file MapGeometry.ts
 * @description Read-only store of a map's axis-aligned boundaries and the
 * spatial queries the simulation runs against them every tick.
 *
 * Queries:
 *   - areaAt / bombSiteAt / slopeAt    point-in-boundary lookups
 *   - elevationAt                       floor height under a point
 *   - isValidPosition / canMove         player placement and movement checks
 *   - raycast / lineOfSight / castBullet  slab intersection against solids
 *
 * One instance is built per map (usually by MapLoader) and shared by every
 * round of a match. Nothing mutates it after construction.
 */

import {
  BoundaryKind,
  type Boundary,
  type RampBoundary,
  type RaycastHit,
  type SlopeBoundary,
  type SmokeSphere,
  type SpawnLists,
  type StairsBoundary,
} from '../types/MapTypes.js';
import { mapDocumentSchema, type MapDocument } from './MapSchema.js';
import { SimulationError } from '../util/SimulationError.js';
import { add, scale, segmentPointDistance, subtract, vec3, type Vec3 } from '../util/MathUtils.js';

// ============================================================================
// --- Constants ---
// ============================================================================

/** Tolerance for floating-point elevation comparisons */
const EPSILON = 1e-6;

/** Below this magnitude a ray direction component is treated as parallel to the slab */
const PARALLEL_EPSILON = 1e-10;

/** Number of interpolated samples checked along a movement segment */
const MOVE_SAMPLES = 10;

/** Default player collision radius */
export const DEFAULT_RADIUS = 0.5;

/** Default standing player height */
export const DEFAULT_HEIGHT = 1.0;

// ============================================================================
// --- Types ---
// ============================================================================

/**
 * Anything a bullet can hit besides map geometry.
 * Bodies are modelled as a sphere centred at half height.
 */
export interface BulletTarget {
  readonly id: string;
  readonly position: Vec3;
  readonly radius: number;
  readonly height: number;
}

/** Outcome of a bullet cast. At most one of `boundary` and `targetId` is set. */
export interface BulletHit {
  readonly point: Vec3;
  readonly distance: number;
  readonly boundary: Boundary | null;
  readonly targetId: string | null;
}

// ============================================================================
// --- Helpers ---
// ============================================================================

/** Inclusive footprint test: points on the edge count as inside. */
function footprintContains(b: Boundary, x: number, y: number): boolean {
  return x >= b.x && x <= b.x + b.width && y >= b.y && y <= b.y + b.height;
}

/** Half-open footprint test used for ramp and stairs surfaces. */
function footprintContainsHalfOpen(b: Boundary, x: number, y: number): boolean {
  return x >= b.x && x < b.x + b.width && y >= b.y && y < b.y + b.height;
}

/** True when a circle of `radius` overlaps the boundary footprint. */
function circleOverlapsFootprint(b: Boundary, x: number, y: number, radius: number): boolean {
  const closestX = Math.max(b.x, Math.min(x, b.x + b.width));
  const closestY = Math.max(b.y, Math.min(y, b.y + b.height));
  const dx = x - closestX;
  const dy = y - closestY;
  return dx * dx + dy * dy < radius * radius;
}

/**
 * Relative position (0 at the low edge, 1 at the high edge) along a slope.
 */
function slopeProgress(slope: SlopeBoundary, x: number, y: number): number {
  switch (slope.direction) {
    case 'north':
      return (y - slope.y) / slope.height;
    case 'south':
      return 1 - (y - slope.y) / slope.height;
    case 'east':
      return (x - slope.x) / slope.width;
    case 'west':
      return 1 - (x - slope.x) / slope.width;
  }
}

/** Surface height of a ramp or staircase at a point inside its footprint. */
export function slopeElevation(slope: SlopeBoundary, x: number, y: number): number {
  const progress = Math.max(0, Math.min(1, slopeProgress(slope, x, y)));
  if (slope.kind === BoundaryKind.RAMP) {
    return slope.zStart + progress * (slope.zEnd - slope.zStart);
  }
  const stepHeight = slope.heightZ / slope.steps;
  const step = Math.min(slope.steps - 1, Math.floor(progress * slope.steps));
  return slope.z + step * stepHeight;
}

/**
 * Ray/sphere intersection.
 *
 * @returns Nearest non-negative t along `direction`, or null on a miss
 */
export function intersectRaySphere(origin: Vec3, direction: Vec3, center: Vec3, radius: number): number | null {
  const oc = subtract(origin, center);
  const a = direction.x * direction.x + direction.y * direction.y + direction.z * direction.z;
  if (a < PARALLEL_EPSILON) {
    return null;
  }
  const b = 2 * (direction.x * oc.x + direction.y * oc.y + direction.z * oc.z);
  const c = oc.x * oc.x + oc.y * oc.y + oc.z * oc.z - radius * radius;
  const disc = b * b - 4 * a * c;
  if (disc < PARALLEL_EPSILON) {
    return null;
  }
  const sqrtDisc = Math.sqrt(disc);
  const t1 = (-b - sqrtDisc) / (2 * a);
  const t2 = (-b + sqrtDisc) / (2 * a);
  if (t1 >= 1e-4) return t1;
  if (t2 >= 1e-4) return t2;
  return null;
}

// ============================================================================
// --- MapGeometry Class ---
// ============================================================================

/**
 * Immutable geometry store for one map.
 *
 * @example
 * ```ts
 * const map = MapGeometry.fromDocument(json);
 * const z = map.elevationAt(33, 6);
 * if (map.isValidPosition(33, 6, z)) { ... }
 * ```
 */
export class MapGeometry {
  /** Display name from the document metadata */
  readonly name: string;

  /** Map extent along x */
  readonly width: number;

  /** Map extent along y */
  readonly height: number;

  readonly areas: readonly Boundary[];
  readonly walls: readonly Boundary[];
  readonly objects: readonly Boundary[];
  readonly ramps: readonly RampBoundary[];
  readonly stairs: readonly StairsBoundary[];
  readonly bombSites: readonly Boundary[];

  /** Spawn points per side, with z snapped to the floor */
  readonly spawns: SpawnLists;

  /** Area name -> neighbouring area names */
  readonly adjacency: ReadonlyMap<string, readonly string[]>;

  /** Walls and objects: everything that blocks bullets and sight */
  private readonly solids: readonly Boundary[];

  /** Areas sorted by floor height, highest first */
  private readonly areasByElevation: readonly Boundary[];

  /** Ramps then stairs, in document order */
  private readonly slopes: readonly SlopeBoundary[];

  /**
   * Build the store from a parsed document.
   *
   * @throws SimulationError (MAP_INVALID) when a boundary leaves the map, adjacency
   *         names an unknown area, or a spawn point is not a valid standing position
   */
  constructor(doc: MapDocument) {
    this.name = doc.metadata.name;
    [this.width, this.height] = doc.metadata['map-size'];

    this.areas = Object.entries(doc['map-areas']).map(([name, a]) => ({
      name, kind: BoundaryKind.AREA, x: a.x, y: a.y, width: a.w, height: a.h, z: a.elevation, heightZ: 0,
    }));
    this.walls = Object.entries(doc.walls).map(([name, w]) => ({
      name, kind: BoundaryKind.WALL, x: w.x, y: w.y, width: w.w, height: w.h, z: w.z, heightZ: w.height_z,
    }));
    this.objects = Object.entries(doc.objects).map(([name, o]) => ({
      name, kind: BoundaryKind.OBJECT, x: o.x, y: o.y, width: o.w, height: o.h, z: o.z, heightZ: o.height_z,
    }));
    this.ramps = Object.entries(doc.ramps).map(([name, r]): RampBoundary => ({
      name,
      kind: BoundaryKind.RAMP,
      x: r.x, y: r.y, width: r.w, height: r.h,
      z: Math.min(r.z_start, r.z_end),
      heightZ: Math.abs(r.z_end - r.z_start),
      zStart: r.z_start,
      zEnd: r.z_end,
      direction: r.direction,
    }));
    this.stairs = Object.entries(doc.stairs).map(([name, s]): StairsBoundary => ({
      name,
      kind: BoundaryKind.STAIRS,
      x: s.x, y: s.y, width: s.w, height: s.h,
      z: s.z,
      heightZ: s.height_z,
      /* A staircase needs at least two treads */
      steps: Math.max(2, s.steps),
      direction: s.direction,
    }));
    this.bombSites = Object.entries(doc['bomb-sites']).map(([name, b]) => ({
      name, kind: BoundaryKind.BOMB_SITE, x: b.x, y: b.y, width: b.w, height: b.h, z: 0, heightZ: 0,
    }));

    this.solids = [...this.walls, ...this.objects];
    this.areasByElevation = [...this.areas].sort((a, b) => b.z - a.z);
    this.slopes = [...this.ramps, ...this.stairs];

    this.assertWithinBounds();

    const areaNames = new Set(this.areas.map((a) => a.name));
    const adjacency = new Map<string, readonly string[]>();
    for (const [area, neighbours] of Object.entries(doc.adjacency)) {
      for (const name of [area, ...neighbours]) {
        if (!areaNames.has(name)) {
          throw SimulationError.mapInvalid(`Adjacency references unknown area "${name}"`, { area: name });
        }
      }
      adjacency.set(area, neighbours);
    }
    this.adjacency = adjacency;

    this.spawns = {
      attackers: doc.spawns.attackers.map(([x, y]) => this.snapSpawn(x, y, 'attackers')),
      defenders: doc.spawns.defenders.map(([x, y]) => this.snapSpawn(x, y, 'defenders')),
    };
  }

  /**
   * Validate an untrusted document and build the store.
   *
   * @throws SimulationError (MAP_INVALID) listing the schema issues
   */
  static fromDocument(input: unknown): MapGeometry {
    const parsed = mapDocumentSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw SimulationError.mapInvalid(`Malformed map document: ${issues.join('; ')}`, { issues });
    }
    return new MapGeometry(parsed.data);
  }

  // --------------------------------------------------------------------------
  // Construction checks
  // --------------------------------------------------------------------------

  private assertWithinBounds(): void {
    const all: Boundary[] = [
      ...this.areas, ...this.walls, ...this.objects, ...this.slopes, ...this.bombSites,
    ];
    for (const b of all) {
      if (b.x < 0 || b.y < 0 || b.x + b.width > this.width || b.y + b.height > this.height) {
        throw SimulationError.mapInvalid(`Boundary "${b.name}" extends outside the map`, {
          boundary: b.name,
          kind: b.kind,
        });
      }
    }
  }

  private snapSpawn(x: number, y: number, side: string): Vec3 {
    const z = this.elevationAt(x, y);
    if (!this.isValidPosition(x, y, z)) {
      throw SimulationError.mapInvalid(`Spawn point (${x}, ${y}) for ${side} is not a valid position`, {
        side, x, y,
      });
    }
    return vec3(x, y, z);
  }

  // --------------------------------------------------------------------------
  // Lookups
  // --------------------------------------------------------------------------

  /**
   * Name of the highest area whose footprint contains (x, y) and whose floor
   * is at or below z. Null outside every area.
   */
  areaAt(x: number, y: number, z: number = 0): Boundary | null {
    for (const area of this.areasByElevation) {
      if (footprintContains(area, x, y) && z >= area.z - EPSILON) {
        return area;
      }
    }
    return null;
  }

  /** Name of the bomb site containing (x, y), or null. */
  bombSiteAt(x: number, y: number): string | null {
    for (const site of this.bombSites) {
      if (footprintContains(site, x, y)) {
        return site.name;
      }
    }
    return null;
  }

  /** The ramp or staircase whose surface covers (x, y), or null. */
  slopeAt(x: number, y: number): SlopeBoundary | null {
    for (const slope of this.slopes) {
      if (footprintContainsHalfOpen(slope, x, y)) {
        return slope;
      }
    }
    return null;
  }

  /** The area map used by `Pathfinder.areaRoute`. */
  neighboursOf(area: string): readonly string[] {
    return this.adjacency.get(area) ?? [];
  }

  // --------------------------------------------------------------------------
  // Elevation
  // --------------------------------------------------------------------------

  /**
   * Floor height under a point.
   *
   * Precedence: ramp/stairs surface, then the top of an object resting on the
   * floor, then the highest containing area's floor, then 0.
   */
  elevationAt(x: number, y: number): number {
    const slope = this.slopeAt(x, y);
    if (slope !== null) {
      return slopeElevation(slope, x, y);
    }

    let floor = 0;
    for (const area of this.areasByElevation) {
      if (footprintContains(area, x, y)) {
        floor = area.z;
        break;
      }
    }

    /* Overhead objects (base above the floor) do not form a surface */
    let surface = floor;
    for (const obj of this.objects) {
      if (footprintContainsHalfOpen(obj, x, y) && obj.z <= floor + EPSILON) {
        surface = Math.max(surface, obj.z + obj.heightZ);
      }
    }
    return surface;
  }

  /** Highest standing surface anywhere on the map. */
  maxElevation(): number {
    let max = 0;
    for (const area of this.areas) max = Math.max(max, area.z);
    for (const slope of this.slopes) max = Math.max(max, slope.z + slope.heightZ);
    for (const obj of this.objects) max = Math.max(max, obj.z + obj.heightZ);
    return max;
  }

  /**
   * Distance from z up to the underside of the lowest wall/object above the point.
   * Infinity when nothing is overhead.
   */
  overheadClearance(x: number, y: number, z: number): number {
    let clearance = Infinity;
    for (const solid of this.solids) {
      if (footprintContainsHalfOpen(solid, x, y) && solid.z > z + EPSILON) {
        clearance = Math.min(clearance, solid.z - z);
      }
    }
    return clearance;
  }

  // --------------------------------------------------------------------------
  // Placement and movement
  // --------------------------------------------------------------------------

  /**
   * Whether a player body (circle of `radius`, `height` tall, feet at z) may
   * occupy the given point.
   */
  isValidPosition(
    x: number,
    y: number,
    z: number = 0,
    radius: number = DEFAULT_RADIUS,
    height: number = DEFAULT_HEIGHT,
  ): boolean {
    /* Map bounds, including the body radius */
    if (x - radius < 0 || x + radius > this.width || y - radius < 0 || y + radius > this.height) {
      return false;
    }

    /* An elevated area is a solid block below its floor, except where a slope climbs it */
    for (const area of this.areas) {
      if (area.z > z + EPSILON && circleOverlapsFootprint(area, x, y, radius)) {
        if (!this.slopes.some((slope) => circleOverlapsFootprint(slope, x, y, radius))) {
          return false;
        }
      }
    }

    if (this.areaAt(x, y, z) === null) {
      return false;
    }

    for (const solid of this.solids) {
      if (!circleOverlapsFootprint(solid, x, y, radius)) {
        continue;
      }
      if (solid.heightZ === 0) {
        return false;
      }
      const top = solid.z + solid.heightZ;
      const overlapsVertically = z < top - EPSILON && z + height > solid.z + EPSILON;
      if (overlapsVertically) {
        return false;
      }
    }

    return true;
  }

  /**
   * Whether a player may travel the straight segment from start to end.
   *
   * Stepping onto a higher floor is only allowed via a ramp or stairs; every one of
   * MOVE_SAMPLES + 1 points along the segment must be a valid position.
   */
  canMove(start: Vec3, end: Vec3, radius: number = DEFAULT_RADIUS, height: number = DEFAULT_HEIGHT): boolean {
    const onSlope = this.slopeAt(start.x, start.y) !== null || this.slopeAt(end.x, end.y) !== null;

    if (!onSlope && (this.areaAt(start.x, start.y, start.z) === null || this.areaAt(end.x, end.y, end.z) === null)) {
      return false;
    }

    const startFloor = this.elevationAt(start.x, start.y);
    const endFloor = this.elevationAt(end.x, end.y);
    if (endFloor > startFloor + EPSILON && !onSlope) {
      return false;
    }

    for (let i = 0; i <= MOVE_SAMPLES; i++) {
      const t = i / MOVE_SAMPLES;
      const x = start.x + t * (end.x - start.x);
      const y = start.y + t * (end.y - start.y);
      const z = start.z + t * (end.z - start.z);
      if (!this.isValidPosition(x, y, z, radius, height)) {
        return false;
      }
    }
    return true;
  }

  // --------------------------------------------------------------------------
  // Raycasting
  // --------------------------------------------------------------------------

  /**
   * Slab-method raycast against every wall and object volume.
   *
   * `direction` need not be unit length; t is measured in multiples of it, so a
   * segment test can pass (p2 - p1) with maxRange 1.
   *
   * @returns Nearest hit with t in [0, maxRange], or null
   */
  raycast(origin: Vec3, direction: Vec3, maxRange: number = 50): RaycastHit | null {
    let nearest: RaycastHit | null = null;
    let nearestT = maxRange;

    for (const solid of this.solids) {
      const t = this.slabIntersect(origin, direction, solid, maxRange);
      if (t !== null && t >= 0 && t <= nearestT && (nearest === null || t < nearest.t)) {
        nearestT = t;
        nearest = { t, point: add(origin, scale(direction, t)), boundary: solid };
      }
    }
    return nearest;
  }

  /**
   * Entry t of a ray into one box, or null when it misses within [0, maxRange].
   * Boxes with no vertical extent are treated as infinitely tall.
   */
  private slabIntersect(origin: Vec3, direction: Vec3, box: Boundary, maxRange: number): number | null {
    const axes: Array<[number, number, number, number]> = [
      [origin.x, direction.x, box.x, box.x + box.width],
      [origin.y, direction.y, box.y, box.y + box.height],
    ];
    if (box.heightZ > 0) {
      axes.push([origin.z, direction.z, box.z, box.z + box.heightZ]);
    }

    let tmin = 0;
    let tmax = maxRange;
    for (const [o, d, min, max] of axes) {
      if (Math.abs(d) < PARALLEL_EPSILON) {
        /* Parallel: only a hit if the origin lies within the slab */
        if (o < min || o > max) {
          return null;
        }
        continue;
      }
      let t1 = (min - o) / d;
      let t2 = (max - o) / d;
      if (t1 > t2) {
        [t1, t2] = [t2, t1];
      }
      tmin = Math.max(tmin, t1);
      tmax = Math.min(tmax, t2);
      if (tmin > tmax) {
        return null;
      }
    }
    return tmin;
  }

  /**
   * Clear sight between two eye points: no wall/object crossing and no smoke
   * sphere closer to the segment than its radius.
   */
  lineOfSight(p1: Vec3, p2: Vec3, smokes: readonly SmokeSphere[] = []): boolean {
    const hit = this.raycast(p1, subtract(p2, p1), 1);
    if (hit !== null) {
      return false;
    }
    for (const smoke of smokes) {
      if (segmentPointDistance(p1, p2, smoke.center) < smoke.radius) {
        return false;
      }
    }
    return true;
  }

  /**
   * Trace a bullet against map solids and player bodies.
   * The nearest of the two wins; a miss reports the point at maxRange.
   */
  castBullet(origin: Vec3, direction: Vec3, maxRange: number, targets: readonly BulletTarget[]): BulletHit {
    const env = this.raycast(origin, direction, maxRange);
    let nearest = env !== null ? env.t : maxRange;
    let targetId: string | null = null;

    for (const target of targets) {
      const center = vec3(target.position.x, target.position.y, target.position.z + target.height * 0.5);
      const t = intersectRaySphere(origin, direction, center, target.radius);
      if (t !== null && t < nearest) {
        nearest = t;
        targetId = target.id;
      }
    }

    return {
      point: add(origin, scale(direction, nearest)),
      distance: nearest,
      boundary: targetId === null && env !== null ? env.boundary : null,
      targetId,
    };
  }
}
