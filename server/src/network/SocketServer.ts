/**
 * @file SocketServer.ts
 * @description Socket.io connection handler for round streaming.
 *
 * Routes incoming messages:
 *   - round:watch → validate the request, build a Round, start a RoundRoom
 *   - round:stop  → destroy the socket's room
 *
 * One room per socket; watching a new round replaces the old one. A dropped
 * connection destroys its room.
 */

import type { Server, Socket } from 'socket.io';
import type { MapGeometry } from '../../../shared/map/MapGeometry.js';
import {
  C2S,
  S2C,
  type ClientToServerEvents,
  type ServerToClientEvents,
} from '../../../shared/types/MessageTypes.js';
import { SimulationError } from '../../../shared/util/SimulationError.js';
import { createLogger } from '../../../shared/util/Logger.js';
import { simulateRoundSchema } from '../api/schemas.js';
import { buildRound } from '../game/RoundFactory.js';
import { RoundRoom, type RoomSink } from '../game/RoundRoom.js';

const log = createLogger('socket');

export type RoundServer = Server<ClientToServerEvents, ServerToClientEvents>;
type RoundSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

export interface SocketContext {
  map: MapGeometry;
  tickRateMs: number;
}

/** Map of socket ID → the room it is watching */
const activeRooms = new Map<string, RoundRoom>();

let roomCounter = 0;

/**
 * Set up Socket.io event handlers. Called once at server startup.
 */
export function setupSocketHandlers(io: RoundServer, ctx: SocketContext): void {
  io.on('connection', (socket: RoundSocket) => {
    log.info({ socket: socket.id }, 'Client connected');

    socket.on(C2S.WATCH_ROUND, (request: unknown) => {
      const parsed = simulateRoundSchema.safeParse(request);
      if (!parsed.success) {
        socket.emit(S2C.ERROR, {
          code: 'REQUEST_INVALID',
          message: 'Invalid round request',
          details: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
        });
        return;
      }

      let room: RoundRoom;
      try {
        const roomId = `room_${++roomCounter}`;
        room = new RoundRoom(roomId, buildRound(parsed.data, ctx.map), sinkFor(socket), ctx.tickRateMs);
      } catch (error) {
        if (SimulationError.isSimulationError(error)) {
          socket.emit(S2C.ERROR, { code: error.code, message: error.message, details: error.details });
          return;
        }
        log.error({ socket: socket.id, err: error }, 'Failed to build round');
        socket.emit(S2C.ERROR, { code: 'INTERNAL', message: 'Failed to build round' });
        return;
      }

      activeRooms.get(socket.id)?.destroy();
      activeRooms.set(socket.id, room);
      room.onDestroy = () => {
        if (activeRooms.get(socket.id) === room) activeRooms.delete(socket.id);
      };
      room.start();
    });

    socket.on(C2S.STOP_ROUND, () => {
      activeRooms.get(socket.id)?.destroy();
    });

    socket.on('disconnect', () => {
      log.info({ socket: socket.id }, 'Client disconnected');
      activeRooms.get(socket.id)?.destroy();
    });
  });

  log.info('WebSocket handlers registered');
}

function sinkFor(socket: RoundSocket): RoomSink {
  return {
    started: (message) => socket.emit(S2C.ROUND_STARTED, message),
    tick: (message) => socket.emit(S2C.ROUND_TICK, message),
    end: (message) => socket.emit(S2C.ROUND_END, message),
    error: (message) => socket.emit(S2C.ERROR, message),
  };
}

/**
 * Get the count of rounds currently streaming.
 * Used by the health check.
 */
export function getActiveRoomCount(): number {
  return activeRooms.size;
}
