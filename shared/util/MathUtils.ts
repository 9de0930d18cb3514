// ============================================================================
// MathUtils.ts
// Vector math and geometric helpers for the round simulation.
//
// The engine works in a right-handed 3D space where:
//   - x and y span the horizontal map plane (map-size is [width, height])
//   - z is the vertical axis (elevation, jump height, gravity)
//
// Distances are in map units (roughly metres). Angles are in radians unless noted.
// ============================================================================

// ----------------------------------------------------------------------------
// VECTOR TYPES
// ----------------------------------------------------------------------------

/**
 * A 3D vector used for positions, velocities and directions.
 * Treated as immutable: every helper below returns a new object.
 */
export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** A horizontal direction or point on the map plane. */
export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

/** The origin, also used as "no velocity". */
export const ZERO: Vec3 = { x: 0, y: 0, z: 0 };

/**
 * Shorthand constructor.
 *
 * @example
 * const spawn = vec3(4, 20, 0);
 */
export function vec3(x: number, y: number, z: number = 0): Vec3 {
  return { x, y, z };
}

// ----------------------------------------------------------------------------
// ARITHMETIC
// ----------------------------------------------------------------------------

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

/** a - b. Use subtract(target, origin) for the direction from origin to target. */
export function subtract(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(v: Vec3, factor: number): Vec3 {
  return { x: v.x * factor, y: v.y * factor, z: v.z * factor };
}

export function dot(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function length(v: Vec3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

/** Length of the horizontal (x, y) component only. */
export function horizontalLength(v: Vec3 | Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

/**
 * Normalizes a vector to unit length.
 * Zero-length input yields the zero vector rather than NaN components.
 */
export function normalize(v: Vec3): Vec3 {
  const len = length(v);
  if (len === 0) {
    return ZERO;
  }
  return { x: v.x / len, y: v.y / len, z: v.z / len };
}

/** Normalizes the horizontal part of a direction; null when it has no length. */
export function normalize2D(v: Vec2): Vec2 | null {
  const len = horizontalLength(v);
  if (len === 0) {
    return null;
  }
  return { x: v.x / len, y: v.y / len };
}

// ----------------------------------------------------------------------------
// DISTANCES
// ----------------------------------------------------------------------------

/** Straight-line 3D distance. */
export function distance(a: Vec3, b: Vec3): number {
  return length(subtract(b, a));
}

/** Distance on the map plane, ignoring elevation. */
export function distance2D(a: Vec2, b: Vec2): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Shortest distance from point p to the segment a-b.
 * Used for smoke occlusion: a sight line is blocked when it passes
 * closer to the smoke centre than the smoke radius.
 *
 * @returns Distance in map units (equals |p - a| when a and b coincide)
 */
export function segmentPointDistance(a: Vec3, b: Vec3, p: Vec3): number {
  const ab = subtract(b, a);
  const lenSq = dot(ab, ab);
  if (lenSq === 0) {
    return distance(a, p);
  }
  /* Projection of p onto the segment, clamped to [0, 1] */
  const t = clamp(dot(subtract(p, a), ab) / lenSq, 0, 1);
  return distance(add(a, scale(ab, t)), p);
}

// ----------------------------------------------------------------------------
// SCALARS
// ----------------------------------------------------------------------------

/** Clamps value into [min, max]. */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}
