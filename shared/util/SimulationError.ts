/**
 * Error codes for configuration failures that must surface before a Round
 * exists. Anything that goes wrong inside `update` is clamped and logged
 * instead, so a round always reaches its end phase.
 */
export type SimulationErrorCode =
  | 'MAP_INVALID'
  | 'MAP_NOT_FOUND'
  | 'ABILITY_INVALID'
  | 'ROSTER_INVALID'
  | 'WEAPON_UNKNOWN'
  | 'REQUEST_INVALID';

/**
 * Unified error type for engine construction failures.
 *
 * @example
 * ```ts
 * throw SimulationError.mapInvalid('Bomb site "A" has zero width', { site: 'A' });
 * ```
 */
export class SimulationError extends Error {
  readonly name = 'SimulationError';

  constructor(
    public readonly code: SimulationErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SimulationError);
    }
  }

  static mapInvalid(message: string, details?: Record<string, unknown>): SimulationError {
    return new SimulationError('MAP_INVALID', message, details);
  }

  static abilityInvalid(message: string, details?: Record<string, unknown>): SimulationError {
    return new SimulationError('ABILITY_INVALID', message, details);
  }

  static rosterInvalid(message: string, details?: Record<string, unknown>): SimulationError {
    return new SimulationError('ROSTER_INVALID', message, details);
  }

  static isSimulationError(error: unknown): error is SimulationError {
    return error instanceof SimulationError;
  }

  /** Plain object for API responses and log lines. */
  toJSON(): { name: string; code: SimulationErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}
