/**
 * @file Match.ts
 * @description Plays rounds until one team wins the match.
 *
 * Match flow:
 *   - First to 13 round wins; regulation is 24 rounds.
 *   - Team A attacks rounds 1-12, team B attacks rounds 13-24 (side swap
 *     after round 12 resets credits and loadouts to the pistol round).
 *   - At 12-12 the match goes to overtime: win by two, every player is set
 *     to 5000 credits at the start of each overtime round.
 *
 * Between rounds the Match applies each player's carryover: credits (capped
 * at 9000), the surviving loadout, ult points. Health, statuses, ability
 * charges and per-round counters come back fresh because every Round builds
 * new Player entities from the roster state kept here.
 */

import { MAX_CREDITS, OVERTIME_CREDITS, STARTING_CREDITS } from '../constants/EconomyConstants.js';
import { MATCH, PLAYER, type DuelTuning } from '../constants/GameConstants.js';
import type { MapGeometry } from '../map/MapGeometry.js';
import { EndCondition, Side, type RoundSummary } from '../types/GameTypes.js';
import type { IntentProvider } from '../types/IntentTypes.js';
import type { PlayerConfig } from '../types/PlayerTypes.js';
import { WeaponId, type ShieldType } from '../types/WeaponTypes.js';
import { Blackboard } from './Blackboard.js';
import { EconomyManager } from './Economy.js';
import type { FallDamageTuning } from './Movement.js';
import { Round, validateRoster, type RoundBlackboards } from './Round.js';
import { SimulationError } from '../util/SimulationError.js';
import { createLogger } from '../util/Logger.js';

const log = createLogger('match');

// ============================================================================
// --- Types ---
// ============================================================================

/** A roster entry before a side is assigned. */
export type RosterEntry = Omit<PlayerConfig, 'side'>;

export interface TeamConfig {
  id: string;
  name: string;
  players: readonly RosterEntry[];
}

export interface MatchOptions {
  map: MapGeometry;
  /** Attacks first */
  teamA: TeamConfig;
  teamB: TeamConfig;
  /** Base seed; round n runs with seed + n */
  seed?: number;
  providers?: ReadonlyMap<string, IntentProvider>;
  defaultProvider?: IntentProvider;
  duelTuning?: DuelTuning;
  fallTuning?: FallDamageTuning;
  dt?: number;
  /** Hard stop for endless overtime; the match ends undecided past it */
  maxRounds?: number;
}

/** One finished round as the Match saw it. */
export interface MatchRoundResult {
  roundNumber: number;
  attackingTeamId: string;
  winnerTeamId: string;
  winnerSide: Side;
  endCondition: EndCondition | null;
  plantSite: string | null;
  scoreA: number;
  scoreB: number;
  summary: RoundSummary;
}

export interface PlayerMatchStats {
  kills: number;
  deaths: number;
  plants: number;
  defuses: number;
}

export interface MatchResult {
  /** Null only when `maxRounds` cut the match short */
  winnerTeamId: string | null;
  scoreA: number;
  scoreB: number;
  overtime: boolean;
  rounds: MatchRoundResult[];
  stats: Record<string, PlayerMatchStats>;
}

/** What the Match remembers about a player between rounds. */
interface RosterState {
  entry: RosterEntry;
  teamId: string;
  credits: number;
  weapon: WeaponId;
  shield: ShieldType | null;
  armor: number;
  ultPoints: number;
}

type TeamKey = 'A' | 'B';

const DEFAULT_MAX_ROUNDS = 60;

// ============================================================================
// --- Match Class ---
// ============================================================================

/**
 * @example
 * ```ts
 * const match = new Match({ map, teamA, teamB, seed: 7, defaultProvider: new WaypointAgent() });
 * const result = match.run();
 * console.log(result.scoreA, result.scoreB);
 * ```
 */
export class Match {
  readonly map: MapGeometry;
  readonly teamA: TeamConfig;
  readonly teamB: TeamConfig;

  scoreA: number = 0;
  scoreB: number = 0;
  roundNumber: number = 0;
  overtime: boolean = false;

  /** Team knowledge, kept for the whole match */
  readonly blackboards: Record<TeamKey, Blackboard>;

  readonly rounds: MatchRoundResult[] = [];

  /** Consecutive losses per team before the coming round */
  private readonly lossStreak: Record<TeamKey, number> = { A: 0, B: 0 };
  private readonly roster: Map<string, RosterState> = new Map();
  private readonly stats: Record<string, PlayerMatchStats> = {};
  private readonly economy = new EconomyManager();
  private readonly seed: number;
  private readonly maxRounds: number;

  /** @throws SimulationError ROSTER_INVALID */
  constructor(private readonly options: MatchOptions) {
    this.map = options.map;
    this.teamA = options.teamA;
    this.teamB = options.teamB;
    this.seed = options.seed ?? 0;
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;

    if (options.teamA.id === options.teamB.id) {
      throw SimulationError.rosterInvalid(`Both teams use id "${options.teamA.id}"`, { teamId: options.teamA.id });
    }
    validateRoster(this.configsFor(Side.ATTACKERS, Side.DEFENDERS, true));

    for (const team of [options.teamA, options.teamB]) {
      for (const entry of team.players) {
        this.roster.set(entry.id, {
          entry,
          teamId: team.id,
          credits: entry.credits ?? STARTING_CREDITS,
          weapon: entry.weapon ?? WeaponId.CLASSIC,
          shield: entry.shield ?? null,
          armor: 0,
          ultPoints: entry.ultPoints ?? 0,
        });
        this.stats[entry.id] = { kills: 0, deaths: 0, plants: 0, defuses: 0 };
      }
    }

    const sites = options.map.bombSites.map((s) => s.name);
    this.blackboards = {
      A: new Blackboard(options.teamA.id, Side.ATTACKERS, sites),
      B: new Blackboard(options.teamB.id, Side.DEFENDERS, sites),
    };
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  get finished(): boolean {
    const lead = Math.abs(this.scoreA - this.scoreB);
    if (this.overtime) {
      return lead >= MATCH.overtimeWinMargin;
    }
    return this.scoreA >= MATCH.roundsToWin || this.scoreB >= MATCH.roundsToWin;
  }

  /** Team attacking in a given round. */
  attackingTeam(roundNumber: number): TeamKey {
    if (roundNumber <= MATCH.halftimeAfterRound) return 'A';
    if (roundNumber <= MATCH.regulationRounds) return 'B';
    /* Overtime: teams alternate every round, A first */
    return (roundNumber - MATCH.regulationRounds) % 2 === 1 ? 'A' : 'B';
  }

  /** Play every remaining round. */
  run(): MatchResult {
    while (!this.finished && this.roundNumber < this.maxRounds) {
      this.playRound();
    }
    if (!this.finished) {
      log.warn({ rounds: this.roundNumber, scoreA: this.scoreA, scoreB: this.scoreB }, 'Match stopped at the round limit');
    }
    return this.result();
  }

  /** Play the next round and apply its carryover. */
  playRound(): MatchRoundResult {
    const roundNumber = this.roundNumber + 1;
    const attacking = this.attackingTeam(roundNumber);
    const defending: TeamKey = attacking === 'A' ? 'B' : 'A';

    if (roundNumber > MATCH.regulationRounds) {
      for (const state of this.roster.values()) state.credits = OVERTIME_CREDITS;
    }
    this.syncBoardSides(attacking);

    const blackboards: RoundBlackboards = {
      attackers: this.blackboards[attacking],
      defenders: this.blackboards[defending],
    };
    const round = new Round({
      roundNumber,
      map: this.map,
      players: this.configsFor(
        attacking === 'A' ? Side.ATTACKERS : Side.DEFENDERS,
        attacking === 'A' ? Side.DEFENDERS : Side.ATTACKERS,
        false,
      ),
      seed: (this.seed + roundNumber) >>> 0,
      lossBonus: {
        attackers: this.economy.lossBonus(this.lossStreak[attacking]),
        defenders: this.economy.lossBonus(this.lossStreak[defending]),
      },
      providers: this.options.providers,
      defaultProvider: this.options.defaultProvider,
      blackboards,
      duelTuning: this.options.duelTuning,
      fallTuning: this.options.fallTuning,
      dt: this.options.dt,
    });

    const summary = round.simulate();
    const winnerSide = summary.winner ?? Side.DEFENDERS;
    const winnerKey = winnerSide === Side.ATTACKERS ? attacking : defending;
    const loserKey: TeamKey = winnerKey === 'A' ? 'B' : 'A';

    if (winnerKey === 'A') this.scoreA += 1;
    else this.scoreB += 1;
    this.lossStreak[winnerKey] = 0;
    this.lossStreak[loserKey] += 1;

    this.applyCarryover(round);

    for (const key of ['A', 'B'] as const) {
      this.blackboards[key].recordRoundResult(roundNumber, key === winnerKey, summary.endCondition, summary.plantSite);
    }

    this.roundNumber = roundNumber;
    if (roundNumber === MATCH.halftimeAfterRound) {
      this.startSecondHalf();
    }
    if (
      !this.overtime &&
      this.scoreA === MATCH.roundsToWin - 1 &&
      this.scoreB === MATCH.roundsToWin - 1
    ) {
      this.overtime = true;
      log.info({ round: roundNumber }, 'Match tied, going to overtime');
    }

    const result: MatchRoundResult = {
      roundNumber,
      attackingTeamId: this.team(attacking).id,
      winnerTeamId: this.team(winnerKey).id,
      winnerSide,
      endCondition: summary.endCondition,
      plantSite: summary.plantSite,
      scoreA: this.scoreA,
      scoreB: this.scoreB,
      summary,
    };
    this.rounds.push(result);
    log.info(
      { round: roundNumber, winner: result.winnerTeamId, condition: summary.endCondition, score: `${this.scoreA}-${this.scoreB}` },
      'Round result',
    );
    return result;
  }

  result(): MatchResult {
    let winnerTeamId: string | null = null;
    if (this.finished) {
      winnerTeamId = this.scoreA > this.scoreB ? this.teamA.id : this.teamB.id;
    }
    return {
      winnerTeamId,
      scoreA: this.scoreA,
      scoreB: this.scoreB,
      overtime: this.overtime,
      rounds: [...this.rounds],
      stats: structuredClone(this.stats),
    };
  }

  /** Credits a player will enter the next round with. */
  creditsOf(playerId: string): number {
    return this.rosterState(playerId).credits;
  }

  // --------------------------------------------------------------------------
  // Between rounds
  // --------------------------------------------------------------------------

  private applyCarryover(round: Round): void {
    for (const [id, carry] of Object.entries(round.carryover())) {
      const state = this.rosterState(id);
      state.credits = Math.min(MAX_CREDITS, round.player(id).credits + carry.creditsDelta);
      state.weapon = carry.weapon ?? WeaponId.CLASSIC;
      state.shield = carry.shield;
      state.armor = carry.armor;
      state.ultPoints = Math.min(PLAYER.maxUltPoints, state.ultPoints + carry.ultPointsDelta);

      const stats = this.stats[id];
      stats.kills += carry.kills;
      stats.deaths += carry.deaths;
      stats.plants += carry.plants;
      stats.defuses += carry.defuses;
    }
  }

  /** Pistol round again: fresh credits and sidearms, loss streaks cleared. */
  private startSecondHalf(): void {
    for (const state of this.roster.values()) {
      state.credits = STARTING_CREDITS;
      state.weapon = WeaponId.CLASSIC;
      state.shield = null;
      state.armor = 0;
    }
    this.lossStreak.A = 0;
    this.lossStreak.B = 0;
    this.blackboards.A.prepareForNewHalf();
    this.blackboards.B.prepareForNewHalf();
    log.info({ scoreA: this.scoreA, scoreB: this.scoreB }, 'Halftime, sides swapped');
  }

  /** Overtime alternates sides without a halftime reset. */
  private syncBoardSides(attacking: TeamKey): void {
    const defending: TeamKey = attacking === 'A' ? 'B' : 'A';
    this.blackboards[attacking].side = Side.ATTACKERS;
    this.blackboards[defending].side = Side.DEFENDERS;
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  /**
   * Round roster with sides assigned. `fromEntries` builds straight from the
   * team configs (used before roster state exists).
   */
  private configsFor(sideA: Side, sideB: Side, fromEntries: boolean): PlayerConfig[] {
    const configs: PlayerConfig[] = [];
    for (const [team, side] of [
      [this.options.teamA, sideA],
      [this.options.teamB, sideB],
    ] as const) {
      for (const entry of team.players) {
        if (fromEntries) {
          configs.push({ ...entry, side });
          continue;
        }
        const state = this.rosterState(entry.id);
        configs.push({
          ...entry,
          side,
          credits: state.credits,
          weapon: state.weapon,
          shield: state.shield,
          armor: state.shield === null ? undefined : state.armor,
          ultPoints: state.ultPoints,
        });
      }
    }
    return configs;
  }

  private rosterState(playerId: string): RosterState {
    const state = this.roster.get(playerId);
    if (state === undefined) {
      throw SimulationError.rosterInvalid(`Unknown player "${playerId}"`, { playerId });
    }
    return state;
  }

  private team(key: TeamKey): TeamConfig {
    return key === 'A' ? this.teamA : this.teamB;
  }
}
