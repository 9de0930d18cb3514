/**
 * @file handlers.ts
 * @description HTTP route handlers as plain functions from a request body to
 * a status and JSON body. Express only forwards to these.
 *
 * Error mapping:
 *   - zod validation failure      → 400 { error: 'REQUEST_INVALID', issues }
 *   - SimulationError (bad roster) → 400 { error: code, message, details }
 *   - anything else               → 500, logged at error
 */

import type { ZodError } from 'zod';
import type { MapGeometry } from '../../../shared/map/MapGeometry.js';
import { SimulationError } from '../../../shared/util/SimulationError.js';
import { createLogger } from '../../../shared/util/Logger.js';
import { buildMatch, buildRound } from '../game/RoundFactory.js';
import { simulateMatchSchema, simulateRoundSchema } from './schemas.js';

const log = createLogger('server');

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface ApiContext {
  map: MapGeometry;
  /** Epoch milliseconds the server started */
  startedAt: number;
  /** Rounds currently streaming over sockets */
  activeRounds: () => number;
}

// ============================================================================
// --- Routes ---
// ============================================================================

/** GET /api/health */
export function handleHealth(ctx: ApiContext): ApiResponse {
  return {
    status: 200,
    body: {
      status: 'ok',
      map: ctx.map.name,
      activeRounds: ctx.activeRounds(),
      uptime: (Date.now() - ctx.startedAt) / 1000,
      timestamp: Date.now(),
    },
  };
}

/** POST /api/rounds/simulate */
export function handleSimulateRound(body: unknown, ctx: ApiContext): ApiResponse {
  const parsed = simulateRoundSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);

  return guarded('rounds/simulate', () => {
    const round = buildRound(parsed.data, ctx.map);
    const summary = round.simulate(parsed.data.maxTicks);
    return {
      status: 200,
      body: {
        summary,
        ticks: round.ticks,
        carryover: round.carryover(),
        events: parsed.data.includeEvents ? round.events : undefined,
      },
    };
  });
}

/** POST /api/matches/simulate */
export function handleSimulateMatch(body: unknown, ctx: ApiContext): ApiResponse {
  const parsed = simulateMatchSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);

  return guarded('matches/simulate', () => {
    const result = buildMatch(parsed.data, ctx.map).run();
    return { status: 200, body: result };
  });
}

// ============================================================================
// --- Error Mapping ---
// ============================================================================

function invalid(error: ZodError): ApiResponse {
  return {
    status: 400,
    body: {
      error: 'REQUEST_INVALID',
      issues: error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    },
  };
}

function guarded(route: string, run: () => ApiResponse): ApiResponse {
  try {
    return run();
  } catch (error) {
    if (SimulationError.isSimulationError(error)) {
      return { status: 400, body: { error: error.code, message: error.message, details: error.details } };
    }
    log.error({ route, err: error }, 'Unhandled failure');
    return { status: 500, body: { error: 'INTERNAL', message: 'Simulation failed' } };
  }
}
