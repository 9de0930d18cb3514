/**
 * Shared fixtures for the engine tests.
 *
 * The arena is a 40x20 floor split by a wall at x 20-21 (y 10-20), so the two
 * spawn groups cannot see each other. A ramp on the east side climbs onto a
 * 2-unit ledge that holds site A; site B sits on the floor near the attackers.
 */

import { readFileSync } from 'fs';
import { MapGeometry } from '../shared/map/MapGeometry.js';
import { Player } from '../shared/simulation/Player.js';
import type { Side } from '../shared/types/GameTypes.js';
import { PlayerRole, type PlayerConfig } from '../shared/types/PlayerTypes.js';
import type { Vec3 } from '../shared/util/MathUtils.js';

const ARENA_URL = new URL('./fixtures/arena.json', import.meta.url);

/** Fresh copy of the arena document. */
export function arenaDocument(): Record<string, unknown> {
  const doc: Record<string, unknown> = JSON.parse(readFileSync(ARENA_URL, 'utf8'));
  return doc;
}

export function arenaMap(): MapGeometry {
  return MapGeometry.fromDocument(arenaDocument());
}

/** The arena without its dividing wall: both spawns in plain sight. */
export function openArenaMap(): MapGeometry {
  return MapGeometry.fromDocument({ ...arenaDocument(), walls: {} });
}

export function makeConfig(id: string, side: Side, overrides: Partial<PlayerConfig> = {}): PlayerConfig {
  return {
    id,
    name: id,
    side,
    role: PlayerRole.DUELIST,
    agent: 'Recruit',
    aim: 50,
    movementAccuracy: 50,
    ...overrides,
  };
}

export function makePlayer(id: string, side: Side, position: Vec3, overrides: Partial<PlayerConfig> = {}): Player {
  return new Player(makeConfig(id, side, overrides), position);
}

/** `count` players per side with ids a1..aN and d1..dN. */
export function makeRoster(side: Side, prefix: string, count: number, overrides: Partial<PlayerConfig> = {}): PlayerConfig[] {
  return Array.from({ length: count }, (_, i) => makeConfig(`${prefix}${i + 1}`, side, overrides));
}
