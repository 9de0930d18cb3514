/**
 * @file index.ts
 * @description Main entry point for the round simulation server.
 *
 * Starts an Express HTTP server with Socket.io for streaming rounds.
 *
 * Architecture:
 *   index.ts (this file)
 *     ├── app.ts (express routes → api/handlers.ts)
 *     └── SocketServer (network/SocketServer.ts)
 *           └── RoundRoom[] (game/RoundRoom.ts)
 *                 └── Round (shared/simulation/Round.ts)
 */

import { createServer } from 'http';
import { Server as SocketServer } from 'socket.io';
import { loadMapFile } from '../../shared/map/MapLoader.js';
import type { ClientToServerEvents, ServerToClientEvents } from '../../shared/types/MessageTypes.js';
import { createLogger } from '../../shared/util/Logger.js';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { getActiveRoomCount, setupSocketHandlers } from './network/SocketServer.js';

const log = createLogger('server');

// ============================================================================
// --- Server Configuration ---
// ============================================================================

/* Fails fast on a bad environment or map */
const config = loadConfig();
const map = loadMapFile(config.MAP_PATH);

// ============================================================================
// --- Express + HTTP Server ---
// ============================================================================

const app = createApp({ map, startedAt: Date.now(), activeRounds: getActiveRoomCount });

/** HTTP server wrapping Express (required for Socket.io) */
const httpServer = createServer(app);

// ============================================================================
// --- Socket.io Server ---
// ============================================================================

const io = new SocketServer<ClientToServerEvents, ServerToClientEvents>(httpServer, {
  cors: {
    origin: '*',
    methods: ['GET', 'POST'],
  },
  maxHttpBufferSize: 1e6, // 1MB
});

setupSocketHandlers(io, { map, tickRateMs: config.TICK_RATE_MS });

// ============================================================================
// --- Start Server ---
// ============================================================================

httpServer.listen(config.PORT, config.HOST, () => {
  log.info({ host: config.HOST, port: config.PORT, map: map.name }, 'Round simulation server listening');
});
