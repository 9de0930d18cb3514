// ============================================================================
// RandomUtils.ts
// Seeded random number generation for the round simulation.
//
// Every random decision in a round (spike carrier, buy choices, duel outcomes,
// headshots, dropped ammo) is drawn from ONE generator owned by
// the Round. Given the same seed, map and per-tick intents, two runs produce
// identical event logs and summaries.
//
// Mulberry32 is a 32-bit PRNG with a 2^32 period built from bitwise mixing and
// integer multiplication.
// ============================================================================

/**
 * Creates a Mulberry32 generator from a seed.
 *
 * @param seed - Integer seed; non-integers are truncated to 32 bits
 * @returns A function producing uniformly distributed floats in [0, 1)
 *
 * @example
 * const rng = mulberry32(7);
 * rng(); // same first value for every generator seeded with 7
 */
export function mulberry32(seed: number): () => number {
  let state = seed | 0;

  return function (): number {
    state = (state + 0x6D2B79F5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seeded generator with the helpers the engine needs.
 *
 * The call ORDER is part of the determinism contract: drawing for a duel before
 * drawing for a headshot gives a different sequence than the reverse.
 *
 * @example
 * const rng = new SeededRandom(1234);
 * const carrier = rng.pick(attackerIds);
 * const attackerWins = rng.next() < pA;
 */
export class SeededRandom {
  /** Underlying Mulberry32 stream */
  private readonly rng: () => number;

  /** The seed this stream was created from, reported in round summaries */
  readonly seed: number;

  constructor(seed: number) {
    this.seed = seed;
    this.rng = mulberry32(seed);
  }

  /** Next float in [0, 1). */
  next(): number {
    return this.rng();
  }

  /**
   * Integer in [min, max], both ends inclusive.
   *
   * @example
   * rng.nextInt(5, 25); // ammo left in a dropped magazine
   */
  nextInt(min: number, max: number): number {
    return Math.floor(this.rng() * (max - min + 1)) + min;
  }

  /**
   * Uniformly picks one element.
   *
   * @throws Error when the array is empty
   */
  pick<T>(array: readonly T[]): T {
    if (array.length === 0) {
      throw new Error('Cannot pick from an empty array');
    }
    return array[Math.floor(this.rng() * array.length)];
  }
}
