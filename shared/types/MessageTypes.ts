// ============================================================================
// MessageTypes.ts
// Socket messages between a round viewer (client) and the server.
// A client asks to watch a round; the server streams it tick by tick.
// ============================================================================

import type { Vec3 } from '../util/MathUtils.js';
import type { Carryover, RoundEvent, RoundSummary, Side } from './GameTypes.js';
import type { ShieldType, WeaponId } from './WeaponTypes.js';

// ============================================================================
// Event Names
// ============================================================================

/** Client → server event names. */
export const C2S = {
  /** Start streaming a new round. Payload is a round request body. */
  WATCH_ROUND: 'round:watch',
  /** Stop the round this socket is watching */
  STOP_ROUND: 'round:stop',
} as const;

/** Server → client event names. */
export const S2C = {
  ROUND_STARTED: 'round:started',
  ROUND_TICK: 'round:tick',
  ROUND_END: 'round:end',
  ERROR: 'round:error',
} as const;

// ============================================================================
// Payloads
// ============================================================================

/** Per-player state sent with every tick. */
export interface PlayerSnapshot {
  id: string;
  side: Side;
  alive: boolean;
  health: number;
  armor: number;
  weapon: WeaponId;
  shield: ShieldType | null;
  position: Vec3;
  hasSpike: boolean;
}

export interface S2C_RoundStarted {
  roomId: string;
  roundNumber: number;
  map: string;
  tickRateMs: number;
}

/**
 * S2C_RoundTick is sent once per simulated tick.
 * `events` holds only what happened since the previous tick.
 */
export interface S2C_RoundTick {
  roomId: string;
  tick: number;
  summary: RoundSummary;
  events: RoundEvent[];
  players: PlayerSnapshot[];
}

export interface S2C_RoundEnd {
  roomId: string;
  summary: RoundSummary;
  carryover: Carryover;
  totalEvents: number;
}

export interface S2C_Error {
  code: string;
  message: string;
  details?: unknown;
}

// ============================================================================
// Typed socket.io maps
// ============================================================================

export interface ClientToServerEvents {
  'round:watch': (request: unknown) => void;
  'round:stop': () => void;
}

export interface ServerToClientEvents {
  'round:started': (message: S2C_RoundStarted) => void;
  'round:tick': (message: S2C_RoundTick) => void;
  'round:end': (message: S2C_RoundEnd) => void;
  'round:error': (message: S2C_Error) => void;
}
