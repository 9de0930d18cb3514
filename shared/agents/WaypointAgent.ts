/**
 * @file WaypointAgent.ts
 * @description Scripted intent producer that walks A* routes to objectives.
 *
 * Decision priority per player, once per tick:
 *   1. Enemy in sight → shoot the nearest one
 *   2. Standing on the objective → plant or defuse
 *   3. Otherwise → follow the route to the objective
 *
 * Objectives:
 *   - Attackers: the carrier takes the spike to the team's target site; the
 *     rest stack on that site. A dropped spike pulls every attacker to it.
 *     After the plant they hold around the spike.
 *   - Defenders: split across the bomb sites by roster order, and retake the
 *     spike once it is planted.
 *
 * One agent can serve any number of players and rounds; route state is kept
 * per player and cleared when a new round starts.
 */

import { SPIKE } from '../constants/GameConstants.js';
import type { MapGeometry } from '../map/MapGeometry.js';
import { Pathfinder } from '../map/Pathfinding.js';
import type { Player } from '../simulation/Player.js';
import { RoundPhase, Side, SpikeState } from '../types/GameTypes.js';
import { IDLE, type Intent, type IntentProvider, type RoundView } from '../types/IntentTypes.js';
import type { Boundary } from '../types/MapTypes.js';
import { distance, distance2D, normalize2D, vec3, type Vec3 } from '../util/MathUtils.js';

// ============================================================================
// --- Agent State Machine ---
// ============================================================================

export enum AgentPhase {
  /** Following a route to the current objective */
  MOVING = 'MOVING',
  /** At the objective with nothing to do */
  HOLDING = 'HOLDING',
  /** Enemy in sight */
  ENGAGING = 'ENGAGING',
  PLANTING = 'PLANTING',
  DEFUSING = 'DEFUSING',
}

interface AgentState {
  roundNumber: number;
  phase: AgentPhase;
  goal: Vec3 | null;
  /** Remaining smoothed waypoints, next one first */
  path: Vec3[];
  /** Closest distance to the goal reached so far */
  bestDistance: number;
  /** Round time of the last step closer to the goal */
  lastProgressAt: number;
}

/** Where to go and what to do on arrival. */
interface Objective {
  position: Vec3;
  action: 'plant' | 'defuse' | null;
}

// ============================================================================
// --- Tuning Constants ---
// ============================================================================

/** A waypoint counts as reached within this horizontal distance */
const WAYPOINT_REACHED = 0.75;

/** Close enough to a hold objective to stop */
const HOLD_RADIUS = 2;

/** A goal moved further than this triggers a new route */
const GOAL_CHANGED = 1;

/** Seconds without getting closer before the route is recomputed */
const REPATH_AFTER = 2;

// ============================================================================
// --- WaypointAgent Class ---
// ============================================================================

/**
 * @example
 * ```ts
 * const agent = new WaypointAgent(map);
 * const round = new Round({ roundNumber: 1, map, players, defaultProvider: agent });
 * round.simulate();
 * ```
 */
export class WaypointAgent implements IntentProvider {
  private readonly pathfinder: Pathfinder;
  private readonly states: Map<string, AgentState> = new Map();

  constructor(private readonly map: MapGeometry) {
    this.pathfinder = new Pathfinder(map);
  }

  /** Current phase of a player, for inspection. */
  phaseOf(playerId: string): AgentPhase | null {
    return this.states.get(playerId)?.phase ?? null;
  }

  decide(player: Player, view: RoundView): Intent {
    if (view.summary.phase !== RoundPhase.ACTIVE || !player.alive) {
      return IDLE;
    }
    const state = this.stateFor(player, view.summary.roundNumber);

    const enemy = this.nearestVisibleEnemy(player, view);
    if (enemy !== null) {
      state.phase = AgentPhase.ENGAGING;
      return { kind: 'shoot', targetId: enemy.id };
    }

    /* Nothing to walk to */
    if (this.map.bombSites.length === 0) {
      return IDLE;
    }

    const objective = this.objectiveFor(player, view);
    if (objective.action === 'plant' && this.map.bombSiteAt(player.position.x, player.position.y) !== null) {
      state.phase = AgentPhase.PLANTING;
      return { kind: 'plant' };
    }
    if (objective.action === 'defuse' && distance2D(player.position, objective.position) <= SPIKE.defuseRange) {
      state.phase = AgentPhase.DEFUSING;
      return { kind: 'defuse' };
    }

    return this.follow(player, state, objective.position, view.time);
  }

  // --------------------------------------------------------------------------
  // Objectives
  // --------------------------------------------------------------------------

  private objectiveFor(player: Player, view: RoundView): Objective {
    const spikeState = view.summary.spikeState;
    const planted = spikeState === SpikeState.PLANTED || spikeState === SpikeState.DEFUSING;

    if (player.side === Side.ATTACKERS) {
      if (player.hasSpike) {
        return { position: this.siteCenter(this.targetSite(view)), action: 'plant' };
      }
      if (view.spikePosition !== null && (spikeState === SpikeState.DROPPED || planted)) {
        return { position: view.spikePosition, action: null };
      }
      return { position: this.siteCenter(this.targetSite(view)), action: null };
    }

    if (planted && view.spikePosition !== null) {
      return { position: view.spikePosition, action: 'defuse' };
    }
    const sites = this.map.bombSites;
    const index = this.rosterIndex(player, view);
    return { position: this.siteCenter(sites[index % sites.length]), action: null };
  }

  /** The called site, else the first one on the map. */
  private targetSite(view: RoundView): Boundary {
    const called = view.blackboard.currentStrategy?.targetSite ?? null;
    return this.map.bombSites.find((s) => s.name === called) ?? this.map.bombSites[0];
  }

  private siteCenter(site: Boundary): Vec3 {
    const x = site.x + site.width / 2;
    const y = site.y + site.height / 2;
    return vec3(x, y, this.map.elevationAt(x, y));
  }

  private rosterIndex(player: Player, view: RoundView): number {
    let index = 0;
    for (const other of view.players.values()) {
      if (other.id === player.id) return index;
      if (other.side === player.side) index++;
    }
    return index;
  }

  private nearestVisibleEnemy(player: Player, view: RoundView): Player | null {
    let nearest: Player | null = null;
    let nearestDist = Infinity;
    for (const id of player.visibleEnemies) {
      const enemy = view.players.get(id);
      if (enemy === undefined || !enemy.alive) continue;
      const d = distance(player.position, enemy.position);
      if (d < nearestDist) {
        nearestDist = d;
        nearest = enemy;
      }
    }
    return nearest;
  }

  // --------------------------------------------------------------------------
  // Route Following
  // --------------------------------------------------------------------------

  private follow(player: Player, state: AgentState, goal: Vec3, time: number): Intent {
    if (state.goal === null || distance2D(state.goal, goal) > GOAL_CHANGED) {
      this.planRoute(player, state, goal, time);
    }

    const toGoal = distance2D(player.position, goal);
    if (toGoal < state.bestDistance - 0.1) {
      state.bestDistance = toGoal;
      state.lastProgressAt = time;
    } else if (time - state.lastProgressAt > REPATH_AFTER) {
      this.planRoute(player, state, goal, time);
    }

    while (state.path.length > 0 && distance2D(player.position, state.path[0]) < WAYPOINT_REACHED) {
      state.path.shift();
    }

    const next = state.path[0];
    if (next === undefined) {
      state.phase = AgentPhase.HOLDING;
      if (toGoal <= HOLD_RADIUS) return IDLE;
      /* Last waypoint reached but not the goal itself: close the gap directly */
      const direct = normalize2D({ x: goal.x - player.position.x, y: goal.y - player.position.y });
      return direct === null ? IDLE : { kind: 'move', direction: direct };
    }

    const direction = normalize2D({ x: next.x - player.position.x, y: next.y - player.position.y });
    if (direction === null) return IDLE;
    state.phase = AgentPhase.MOVING;
    return { kind: 'move', direction };
  }

  private planRoute(player: Player, state: AgentState, goal: Vec3, time: number): void {
    const raw = this.pathfinder.findPath(player.position, goal, { radius: player.radius, height: player.height });
    state.goal = goal;
    state.path = raw.length > 0 ? this.pathfinder.smoothPath(raw).slice(1) : [];
    state.bestDistance = distance2D(player.position, goal);
    state.lastProgressAt = time;
  }

  private stateFor(player: Player, roundNumber: number): AgentState {
    const existing = this.states.get(player.id);
    if (existing !== undefined && existing.roundNumber === roundNumber) {
      return existing;
    }
    const fresh: AgentState = {
      roundNumber,
      phase: AgentPhase.MOVING,
      goal: null,
      path: [],
      bestDistance: Infinity,
      lastProgressAt: 0,
    };
    this.states.set(player.id, fresh);
    return fresh;
  }
}
