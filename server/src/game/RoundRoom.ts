/**
 * @file RoundRoom.ts
 * @description Streams one Round to a watching client in wall-clock time.
 *
 * Each RoundRoom owns:
 *   - The Round being played
 *   - A tick timer (setInterval at the configured tick rate)
 *   - The sink that delivers messages to the watcher
 *
 * Lifecycle:
 *   1. Created by SocketServer when a client sends `round:watch`
 *   2. start() announces the round and begins ticking
 *   3. Every tick advances the Round by its fixed dt and sends a summary,
 *      the events since the last tick and a snapshot of every player
 *   4. When the Round ends the room sends `round:end` and destroys itself
 */

import type { Round } from '../../../shared/simulation/Round.js';
import type {
  PlayerSnapshot,
  S2C_Error,
  S2C_RoundEnd,
  S2C_RoundStarted,
  S2C_RoundTick,
} from '../../../shared/types/MessageTypes.js';
import { createLogger } from '../../../shared/util/Logger.js';

const log = createLogger('room');

/** Where a room's messages go. SocketServer binds these to a socket. */
export interface RoomSink {
  started(message: S2C_RoundStarted): void;
  tick(message: S2C_RoundTick): void;
  end(message: S2C_RoundEnd): void;
  error(message: S2C_Error): void;
}

export class RoundRoom {
  /** Events already sent to the watcher */
  private sentEvents: number = 0;

  private tickHandle: ReturnType<typeof setInterval> | null = null;

  /** Whether the room has been destroyed (round ended or watcher left) */
  private destroyed: boolean = false;

  /** Called once when the room is destroyed */
  onDestroy: (() => void) | null = null;

  constructor(
    readonly roomId: string,
    private readonly round: Round,
    private readonly sink: RoomSink,
    private readonly tickRateMs: number,
  ) {}

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  start(): void {
    this.sink.started({
      roomId: this.roomId,
      roundNumber: this.round.roundNumber,
      map: this.round.map.name,
      tickRateMs: this.tickRateMs,
    });
    this.tickHandle = setInterval(() => this.step(), this.tickRateMs);
    log.info({ room: this.roomId, round: this.round.roundNumber }, 'Round stream started');
  }

  /** Stop streaming and release the timer. Safe to call more than once. */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    if (this.tickHandle !== null) {
      clearInterval(this.tickHandle);
      this.tickHandle = null;
    }
    log.info({ room: this.roomId, ticks: this.round.ticks }, 'Room destroyed');
    this.onDestroy?.();
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  // --------------------------------------------------------------------------
  // Tick
  // --------------------------------------------------------------------------

  /** Advance the round one tick and send the result. */
  step(): void {
    if (this.destroyed) return;

    try {
      this.round.update();
    } catch (error) {
      log.error({ room: this.roomId, err: error }, 'Round update failed');
      this.sink.error({ code: 'INTERNAL', message: 'Round update failed' });
      this.destroy();
      return;
    }

    const events = this.round.events.slice(this.sentEvents);
    this.sentEvents = this.round.events.length;
    const summary = this.round.summary();

    this.sink.tick({
      roomId: this.roomId,
      tick: this.round.ticks,
      summary,
      events,
      players: this.snapshots(),
    });

    if (this.round.ended) {
      this.sink.end({
        roomId: this.roomId,
        summary,
        carryover: this.round.carryover(),
        totalEvents: this.round.events.length,
      });
      this.destroy();
    }
  }

  private snapshots(): PlayerSnapshot[] {
    return [...this.round.players.values()].map((p) => ({
      id: p.id,
      side: p.side,
      alive: p.alive,
      health: p.health,
      armor: p.armor,
      weapon: p.weapon,
      shield: p.shield,
      position: { ...p.position },
      hasSpike: p.hasSpike,
    }));
  }
}
