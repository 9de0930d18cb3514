/**
 * @file RoundFactory.ts
 * @description Turns validated request payloads into engine objects. Shared
 * by the HTTP handlers and the socket server so both build rounds the same way.
 */

import { IdleAgent } from '../../../shared/agents/IdleAgent.js';
import { WaypointAgent } from '../../../shared/agents/WaypointAgent.js';
import type { MapGeometry } from '../../../shared/map/MapGeometry.js';
import { Match, type RosterEntry, type TeamConfig } from '../../../shared/simulation/Match.js';
import { Round } from '../../../shared/simulation/Round.js';
import { Side } from '../../../shared/types/GameTypes.js';
import type { IntentProvider } from '../../../shared/types/IntentTypes.js';
import type { PlayerConfig } from '../../../shared/types/PlayerTypes.js';
import type { AgentKind, RosterEntryInput, SimulateMatchInput, SimulateRoundInput } from '../api/schemas.js';

export function providerFor(kind: AgentKind, map: MapGeometry): IntentProvider {
  return kind === 'idle' ? new IdleAgent() : new WaypointAgent(map);
}

/** Roster entry with its display name defaulted to the id. */
export function toRosterEntry(entry: RosterEntryInput): RosterEntry {
  return { ...entry, name: entry.name ?? entry.id };
}

export function toPlayerConfig(entry: RosterEntryInput, side: Side): PlayerConfig {
  return { ...toRosterEntry(entry), side };
}

/** @throws SimulationError when the roster fails engine validation */
export function buildRound(input: SimulateRoundInput, map: MapGeometry): Round {
  return new Round({
    roundNumber: input.roundNumber,
    map,
    players: [
      ...input.attackers.map((p) => toPlayerConfig(p, Side.ATTACKERS)),
      ...input.defenders.map((p) => toPlayerConfig(p, Side.DEFENDERS)),
    ],
    seed: input.seed,
    defaultProvider: providerFor(input.agent, map),
  });
}

/** @throws SimulationError when either roster fails engine validation */
export function buildMatch(input: SimulateMatchInput, map: MapGeometry): Match {
  const team = (t: SimulateMatchInput['teamA']): TeamConfig => ({
    id: t.id,
    name: t.name ?? t.id,
    players: t.players.map(toRosterEntry),
  });
  return new Match({
    map,
    teamA: team(input.teamA),
    teamB: team(input.teamB),
    seed: input.seed,
    defaultProvider: providerFor(input.agent, map),
    maxRounds: input.maxRounds,
  });
}
