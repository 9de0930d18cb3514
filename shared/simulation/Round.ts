/**
 * @file Round.ts
 * @description The round simulation engine: one round from buy phase to end.
 *
 * Phase machine (one way):  BUY -> ACTIVE -> END
 *
 * BUY: players are frozen at spawn. Intent producers may send `buy` intents;
 * when the buy timer runs out every player who bought nothing gets the
 * simulated ladder buy, then the round goes ACTIVE.
 *
 * ACTIVE tick pipeline (each stage sees the results of the one before):
 *   1. Timers (round clock, spike countdown and detonation)
 *   2. Actions (plant/defuse progress, ability casts, callouts)
 *   3. Vision and sound
 *   4. Blackboard updates (sightings, reveals, noises, area control)
 *   5. Combat (instant duels, death handling, elimination check)
 *   6. Movement (physics, collision, fall damage)
 *   7. Pickups (spike, dropped weapons and shields)
 *   8. Ability updates (projectiles, effects, expiry)
 *   9. Status decay
 *  10. End check (round timer)
 *  11. Blackboard decay
 *
 * Architecture:
 *   Match
 *     └── Round (this file)
 *           ├── Movement, Detection, Combat, Abilities, SpikeLogic, Economy
 *           ├── two Blackboards (owned by the Match, passed by reference)
 *           ├── one SeededRandom: every random draw in the round
 *           └── produces RoundEvent[], summary() and carryover()
 *
 * Single-threaded and step driven; cancel a round by dropping it.
 */

import { ABILITIES } from '../constants/AbilityData.js';
import { FALL_DAMAGE, MATCH, SENSING, TIMING, type DuelTuning } from '../constants/GameConstants.js';
import { PICKUP_RADIUS, SHIELDS, WEAPONS, isWeaponId } from '../constants/WeaponData.js';
import type { MapGeometry } from '../map/MapGeometry.js';
import type { SmokeSphere } from '../types/MapTypes.js';
import { AbilityTarget, type AbilityInstance } from '../types/AbilityTypes.js';
import {
  EndCondition,
  RoundPhase,
  Side,
  SpikeState,
  opposingSide,
  type Carryover,
  type DeathCause,
  type LossBonusOverride,
  type RoundEvent,
  type RoundSummary,
} from '../types/GameTypes.js';
import { IDLE, type Intent, type IntentProvider, type RoundView } from '../types/IntentTypes.js';
import type { PlayerConfig } from '../types/PlayerTypes.js';
import type { DroppedItem, ShieldType, WeaponId } from '../types/WeaponTypes.js';
import { activate, createInstance, smokeSpheres, updateAbility, type EffectReport } from './Abilities.js';
import { Blackboard } from './Blackboard.js';
import { CombatSystem, dropsOnDeath } from './Combat.js';
import { DetectionSystem } from './Detection.js';
import { EconomyManager } from './Economy.js';
import { updateMovement, type FallDamageTuning } from './Movement.js';
import { Player } from './Player.js';
import { SpikeLogic } from './SpikeLogic.js';
import { add, distance, distance2D, normalize2D, scale, subtract, vec3, type Vec3 } from '../util/MathUtils.js';
import { SeededRandom } from '../util/RandomUtils.js';
import { SimulationError } from '../util/SimulationError.js';
import { createLogger } from '../util/Logger.js';

const log = createLogger('round');

// ============================================================================
// --- Types ---
// ============================================================================

/** Team knowledge for both sides of one round. */
export interface RoundBlackboards {
  attackers: Blackboard;
  defenders: Blackboard;
}

/**
 * Everything a Round needs. Only the map, the roster and the round number
 * are required.
 */
export interface RoundOptions {
  roundNumber: number;
  map: MapGeometry;
  /** Roster entries; each entry's `side` decides the attacker/defender split */
  players: readonly PlayerConfig[];
  /** Seed for the round's generator. Defaults to the round number. */
  seed?: number;
  /** Loss bonus per side, replacing the first-loss default */
  lossBonus?: LossBonusOverride;
  /** Intent producer per player id. Players without one idle. */
  providers?: ReadonlyMap<string, IntentProvider>;
  /** Producer for every player without an entry in `providers` */
  defaultProvider?: IntentProvider;
  /** Team knowledge kept by the Match; fresh boards are made when absent */
  blackboards?: RoundBlackboards;
  duelTuning?: DuelTuning;
  fallTuning?: FallDamageTuning;
  /** Fixed tick length for simulate(), seconds */
  dt?: number;
}

// ============================================================================
// --- Round Class ---
// ============================================================================

/**
 * One round of a match.
 *
 * @example
 * ```ts
 * const round = new Round({ roundNumber: 1, map, players: roster, seed: 42 });
 * const summary = round.simulate();
 * const carry = round.carryover();
 * ```
 */
export class Round {
  readonly roundNumber: number;
  readonly map: MapGeometry;
  readonly dt: number;

  /** All players by id, in roster order */
  readonly players: ReadonlyMap<string, Player>;
  readonly attackerIds: readonly string[];
  readonly defenderIds: readonly string[];

  readonly blackboards: RoundBlackboards;
  readonly spike: SpikeLogic;

  phase: RoundPhase = RoundPhase.BUY;

  /** Seconds since construction */
  time: number = 0;
  ticks: number = 0;

  /** Seconds left in the buy phase */
  buyTimeRemaining: number;

  /** Seconds left on the round clock (starts when ACTIVE begins) */
  roundTimeRemaining: number = TIMING.roundSeconds;

  winner: Side | null = null;
  endCondition: EndCondition | null = null;

  /** Items on the floor */
  readonly droppedItems: DroppedItem[] = [];

  /** Live ability instances */
  readonly abilities: AbilityInstance[] = [];

  private readonly eventLog: RoundEvent[] = [];
  private readonly rng: SeededRandom;
  private readonly providers: ReadonlyMap<string, IntentProvider>;
  private readonly defaultProvider: IntentProvider | null;
  private readonly lossBonusOverride: LossBonusOverride;
  private readonly fallTuning: FallDamageTuning;

  private readonly detection: DetectionSystem;
  private readonly combat: CombatSystem;
  private readonly economy = new EconomyManager();

  /** Players who bought through an intent during BUY */
  private readonly explicitBuyers: Set<string> = new Set();

  /** Earliest time each player may cast each ability again */
  private readonly abilityReadyAt: Map<string, number> = new Map();
  private abilityCounter: number = 0;
  private cachedCarryover: Carryover | null = null;

  /**
   * @throws SimulationError ROSTER_INVALID for a bad roster, WEAPON_UNKNOWN
   * for a weapon outside the catalog
   */
  constructor(options: RoundOptions) {
    validateRoster(options.players);

    this.roundNumber = options.roundNumber;
    this.map = options.map;
    this.dt = options.dt ?? TIMING.tickSeconds;
    if (!(this.dt > 0)) {
      throw SimulationError.rosterInvalid(`Tick length must be > 0, got ${this.dt}`, { dt: this.dt });
    }

    this.rng = new SeededRandom(options.seed ?? options.roundNumber);
    this.providers = options.providers ?? new Map();
    this.defaultProvider = options.defaultProvider ?? null;
    this.lossBonusOverride = options.lossBonus ?? {};
    this.fallTuning = options.fallTuning ?? FALL_DAMAGE;
    this.detection = new DetectionSystem(options.map);
    this.combat = new CombatSystem(options.duelTuning);

    const siteNames = options.map.bombSites.map((s) => s.name);
    this.blackboards = options.blackboards ?? {
      attackers: new Blackboard('attackers', Side.ATTACKERS, siteNames),
      defenders: new Blackboard('defenders', Side.DEFENDERS, siteNames),
    };

    // --- Spawns ---
    const players = new Map<string, Player>();
    const attackers: string[] = [];
    const defenders: string[] = [];
    for (const config of options.players) {
      const ids = config.side === Side.ATTACKERS ? attackers : defenders;
      const spawns = config.side === Side.ATTACKERS ? options.map.spawns.attackers : options.map.spawns.defenders;
      if (spawns.length === 0) {
        throw SimulationError.mapInvalid(`Map "${options.map.name}" has no ${config.side} spawns`);
      }
      players.set(config.id, new Player(config, spawns[ids.length % spawns.length]));
      ids.push(config.id);
    }
    this.players = players;
    this.attackerIds = attackers;
    this.defenderIds = defenders;

    // --- Spike carrier ---
    const carrierId = this.rng.pick(attackers);
    this.spike = new SpikeLogic(options.map, carrierId);
    this.player(carrierId).hasSpike = true;

    this.buyTimeRemaining =
      this.roundNumber === 1 || this.roundNumber === MATCH.halftimeAfterRound + 1
        ? TIMING.pistolBuyPhaseSeconds
        : TIMING.buyPhaseSeconds;

    for (const [side, ids] of [
      [Side.ATTACKERS, attackers],
      [Side.DEFENDERS, defenders],
    ] as const) {
      const board = this.boardFor(side);
      for (const id of ids) board.aliveTeammates.add(id);
    }
    this.blackboards.attackers.updateSpike({ status: 'carried', carrierId }, 0);

    log.info(
      { round: this.roundNumber, seed: this.rng.seed, carrier: carrierId, buySeconds: this.buyTimeRemaining },
      'Round created',
    );
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  /** Ordered event log. */
  get events(): readonly RoundEvent[] {
    return this.eventLog;
  }

  get ended(): boolean {
    return this.phase === RoundPhase.END;
  }

  /** Sight-blocking spheres of the live smokes. */
  smokes(): SmokeSphere[] {
    return smokeSpheres(this.abilities);
  }

  /** Snapshot of the round. */
  summary(): RoundSummary {
    return {
      roundNumber: this.roundNumber,
      phase: this.phase,
      time: this.time,
      timeRemaining: this.phase === RoundPhase.BUY ? this.buyTimeRemaining : Math.max(0, this.roundTimeRemaining),
      spikeState: this.spike.state,
      spikeTimeRemaining: this.spike.timeRemaining,
      plantSite: this.spike.plantSite,
      aliveAttackers: this.aliveCount(Side.ATTACKERS),
      aliveDefenders: this.aliveCount(Side.DEFENDERS),
      winner: this.winner,
      endCondition: this.endCondition,
      killCount: this.eventLog.filter((e) => e.type === 'death').length,
    };
  }

  /**
   * Advance the round by dt seconds. A no-op once the round has ended.
   */
  update(dt: number = this.dt): void {
    if (this.phase === RoundPhase.END || !(dt > 0)) {
      return;
    }
    this.time += dt;
    this.ticks += 1;

    if (this.phase === RoundPhase.BUY) {
      this.updateBuyPhase(dt);
      return;
    }
    this.updateActivePhase(dt);
  }

  /**
   * Run fixed ticks until the round ends or `maxTicks` have run.
   * The default budget covers the longest possible round.
   */
  simulate(maxTicks?: number): RoundSummary {
    const longest = TIMING.pistolBuyPhaseSeconds + TIMING.roundSeconds + TIMING.spikeSeconds;
    const budget = maxTicks ?? Math.ceil(longest / this.dt) + 10;

    for (let i = 0; i < budget && this.phase !== RoundPhase.END; i++) {
      this.update(this.dt);
    }
    if (this.phase !== RoundPhase.END) {
      log.warn({ round: this.roundNumber, ticks: this.ticks }, 'Tick budget ran out before the round ended');
    }
    return this.summary();
  }

  /**
   * What every player takes into the next round. Computed once, at END;
   * before that the round has no winner and every team gets its loss bonus.
   */
  carryover(): Carryover {
    if (this.cachedCarryover !== null) {
      return this.cachedCarryover;
    }
    const result: Carryover = {};
    for (const player of this.players.values()) {
      result[player.id] = this.economy.carryoverFor(player, this.winner, this.lossBonusFor(player.side));
    }
    if (this.phase === RoundPhase.END) {
      this.cachedCarryover = result;
    }
    return result;
  }

  /** Runtime player by id. */
  player(id: string): Player {
    const player = this.players.get(id);
    if (player === undefined) {
      throw SimulationError.rosterInvalid(`Unknown player "${id}"`, { playerId: id });
    }
    return player;
  }

  /** Loss bonus this side receives if it loses. */
  lossBonusFor(side: Side): number {
    return this.lossBonusOverride[side] ?? this.economy.lossBonus(0);
  }

  // --------------------------------------------------------------------------
  // Buy phase
  // --------------------------------------------------------------------------

  private updateBuyPhase(dt: number): void {
    this.buyTimeRemaining = Math.max(0, this.buyTimeRemaining - dt);

    const view = this.viewsBuilder();
    for (const player of this.players.values()) {
      const intent = this.intentFor(player, view);
      if (intent.kind === 'buy') {
        const purchases = this.economy.applyLoadout(player, intent.loadout);
        for (const p of purchases) this.logPurchase(player, p.item, p.cost);
        if (purchases.length > 0) this.explicitBuyers.add(player.id);
      }
    }

    if (this.buyTimeRemaining > 0) {
      return;
    }

    for (const player of this.players.values()) {
      if (this.explicitBuyers.has(player.id)) continue;
      for (const p of this.economy.simulateBuy(player, this.rng)) {
        this.logPurchase(player, p.item, p.cost);
      }
    }

    for (const side of [Side.ATTACKERS, Side.DEFENDERS]) {
      const board = this.boardFor(side);
      board.updateEconomy(this.teamOf(side).map((p) => p.credits));
      const suggestion = board.suggestStrategy();
      const caller = this.teamOf(side)[0];
      board.setStrategy(suggestion.plan, caller.id, this.time, suggestion.targetSite);
    }

    this.setPhase(RoundPhase.ACTIVE);
    this.roundTimeRemaining = TIMING.roundSeconds;
  }

  // --------------------------------------------------------------------------
  // Active phase
  // --------------------------------------------------------------------------

  private updateActivePhase(dt: number): void {
    const view = this.viewsBuilder();
    const intents = new Map<string, Intent>();
    for (const player of this.players.values()) {
      if (player.alive) intents.set(player.id, this.intentFor(player, view));
    }

    // --- 1. Timers ---
    this.roundTimeRemaining -= dt;
    if (this.spike.tickTimer(dt)) {
      this.pushEvent({ type: 'detonation', time: this.time });
      this.endRound(Side.ATTACKERS, EndCondition.SPIKE_DETONATION);
      return;
    }

    // --- 2. Actions ---
    this.processSpikeActions(intents, dt);
    if (this.ended) return;
    this.processAbilityIntents(intents);
    this.processCommunications(intents);

    // --- 3-4. Vision, sound, team knowledge ---
    const smokes = this.smokes();
    const alive = this.alivePlayers();
    const everyone = [...this.players.values()];
    const sightings = this.detection.computeVision(everyone, smokes);
    const noises = this.detection.computeHearing(everyone);

    for (const s of sightings) {
      const observer = this.player(s.observerId);
      const area = this.map.areaAt(s.position.x, s.position.y, s.position.z)?.name ?? null;
      this.boardFor(observer.side).updateEnemy(s.targetId, s.position, area, s.observerId, this.time);
    }
    for (const target of alive) {
      if (!target.hasStatus('revealed')) continue;
      const area = this.map.areaAt(target.position.x, target.position.y, target.position.z)?.name ?? null;
      this.boardFor(opposingSide(target.side)).updateEnemy(target.id, target.position, area, 'recon', this.time);
    }
    for (const n of noises) {
      const listener = this.player(n.listenerId);
      this.boardFor(listener.side).recordNoise({
        kind: 'footstep',
        sourceId: n.sourceId,
        position: n.position,
        intensity: n.intensity,
        time: this.time,
        heardBy: n.listenerId,
      });
    }
    for (const player of alive) {
      if (player.visibleEnemies.size > 0) continue;
      const area = this.map.areaAt(player.position.x, player.position.y, player.position.z);
      if (area !== null) this.boardFor(player.side).markAreaCleared(area.name);
    }

    // --- 5. Combat ---
    this.processCombat(intents);
    if (this.ended) return;

    // --- 6. Movement ---
    this.processMovement(intents, dt);
    if (this.ended) return;

    // --- 7. Pickups ---
    this.processPickups();

    // --- 8. Abilities ---
    this.processAbilityUpdates(dt);
    if (this.ended) return;

    // --- 9. Status decay ---
    for (const player of this.alivePlayers()) {
      player.decayStatuses(dt);
    }

    // --- 10. End check ---
    if (this.roundTimeRemaining <= 0 && !this.spike.planted) {
      this.endRound(Side.DEFENDERS, EndCondition.TIME_EXPIRED);
      return;
    }

    // --- 11. Knowledge decay ---
    this.blackboards.attackers.decayKnowledge(dt, this.time);
    this.blackboards.defenders.decayKnowledge(dt, this.time);
  }

  // ------ Spike ------

  private processSpikeActions(intents: ReadonlyMap<string, Intent>, dt: number): void {
    const carrierId = this.spike.carrierId;
    if (carrierId !== null) {
      const carrier = this.player(carrierId);
      const result = this.spike.tickPlant(carrier, intents.get(carrierId)?.kind === 'plant', dt, this.time);
      if (result === 'planted') {
        this.onPlanted(carrier);
      }
    }

    if (!this.spike.planted) return;
    for (const id of this.defenderIds) {
      const defender = this.player(id);
      const result = this.spike.tickDefuse(defender, intents.get(id)?.kind === 'defuse', dt);
      if (result === 'defused') {
        this.pushEvent({ type: 'defuse', time: this.time, playerId: id });
        for (const board of [this.blackboards.attackers, this.blackboards.defenders]) {
          board.updateSpike({ status: 'defused', carrierId: null }, this.time);
        }
        this.endRound(Side.DEFENDERS, EndCondition.SPIKE_DEFUSED);
        return;
      }
    }
  }

  private onPlanted(planter: Player): void {
    const site = this.spike.plantSite ?? '';
    const position = planter.position;
    this.pushEvent({ type: 'plant', time: this.time, playerId: planter.id, site, position });
    log.debug({ round: this.roundNumber, planter: planter.id, site }, 'Spike planted');

    for (const board of [this.blackboards.attackers, this.blackboards.defenders]) {
      board.updateSpike(
        { status: 'planted', position, carrierId: null, plantSite: site, plantTime: this.time },
        this.time,
      );
    }
    const defender = this.teamOf(Side.DEFENDERS)[0];
    if (defender !== undefined) this.blackboards.defenders.setStrategy('retake', defender.id, this.time, site);
    this.blackboards.attackers.setStrategy('post_plant', planter.id, this.time, site);
  }

  // ------ Abilities ------

  private processAbilityIntents(intents: ReadonlyMap<string, Intent>): void {
    for (const [id, intent] of intents) {
      if (intent.kind !== 'use_ability') continue;
      this.castAbility(this.player(id), intent.ability, intent.target);
    }
  }

  /**
   * Spend one charge of `abilityName` toward `target`.
   * Ignored when the player lacks a charge or the ability is cooling down.
   */
  private castAbility(player: Player, abilityName: string, target: Vec3): void {
    const definition = ABILITIES[abilityName];
    if (definition === undefined || player.chargesOf(abilityName) <= 0) return;

    const readyKey = `${player.id}:${abilityName}`;
    if (this.time < (this.abilityReadyAt.get(readyKey) ?? 0)) return;

    const eye = vec3(player.position.x, player.position.y, player.position.z + player.height * SENSING.eyeHeightFactor);
    const instance = createInstance(definition, player.id, `${player.id}-${abilityName}-${++this.abilityCounter}`, 1);

    let origin: Vec3;
    let direction: Vec3 = subtract(target, eye);
    switch (definition.targeting) {
      case AbilityTarget.SELF:
        origin = player.position;
        break;
      case AbilityTarget.PROJECTILE:
        origin = eye;
        break;
      default: {
        /* Placed abilities land at the target, pulled in to max range */
        const reach = distance(player.position, target);
        origin =
          reach > definition.maxRange && reach > 0
            ? add(player.position, scale(subtract(target, player.position), definition.maxRange / reach))
            : target;
        direction = subtract(origin, eye);
      }
    }

    if (!activate(instance, this.time, origin, direction)) return;

    player.abilityCharges.set(abilityName, player.chargesOf(abilityName) - 1);
    this.abilityReadyAt.set(readyKey, this.time + definition.cooldown);
    this.abilities.push(instance);
    this.pushEvent({ type: 'ability_use', time: this.time, playerId: player.id, ability: abilityName, position: origin });

    if (definition.soundRange > 0) {
      this.broadcastNoise('ability', player.id, origin, definition.soundRange);
    }
  }

  private processAbilityUpdates(dt: number): void {
    const smokes = this.smokes();
    const players = [...this.players.values()];

    for (let i = this.abilities.length - 1; i >= 0; i--) {
      const instance = this.abilities[i];
      const { outcome, report } = updateAbility(instance, { time: this.time, dt, map: this.map, players, smokes });
      this.applyEffectReport(instance, report);
      if (this.ended) return;
      if (outcome === 'expired') {
        this.abilities.splice(i, 1);
      }
    }
  }

  private applyEffectReport(instance: AbilityInstance, report: EffectReport): void {
    const owner = this.players.get(instance.ownerId);
    for (const { playerId, amount } of report.damaged) {
      this.pushEvent({
        type: 'damage',
        time: this.time,
        attackerId: instance.ownerId,
        victimId: playerId,
        amount,
        source: instance.definition.name,
      });
      const victim = this.player(playerId);
      if (victim.alive && victim.health <= 0) {
        const killer = owner !== undefined && owner.side !== victim.side ? owner : null;
        this.handleDeath(victim, killer, 'ability', false);
        if (this.ended) return;
      }
    }
  }

  // ------ Communications ------

  private processCommunications(intents: ReadonlyMap<string, Intent>): void {
    for (const [id, intent] of intents) {
      if (intent.kind !== 'communicate') continue;
      const player = this.player(id);
      this.pushEvent({ type: 'communication', time: this.time, playerId: id, message: intent.message });
      this.boardFor(player.side).addWarning(intent.message, this.time, player.position);
    }
  }

  // ------ Combat ------

  private processCombat(intents: ReadonlyMap<string, Intent>): void {
    const shootTargets = new Map<string, string>();
    for (const [id, intent] of intents) {
      if (intent.kind === 'shoot') shootTargets.set(id, intent.targetId);
    }

    const players = [...this.players.values()];
    for (const { initiator, target } of this.combat.selectEngagements(players, shootTargets)) {
      if (!initiator.alive || !target.alive) continue;

      const { winner, loser, headshot } = this.combat.resolveDuel(initiator, target, this.rng);
      this.broadcastNoise('gunfire', winner.id, winner.position, SENSING.gunfireRange);

      const amount = loser.health;
      winner.damageDealt += amount;
      loser.damageReceived += amount;
      this.pushEvent({
        type: 'damage',
        time: this.time,
        attackerId: winner.id,
        victimId: loser.id,
        amount,
        source: winner.weapon,
      });
      this.handleDeath(loser, winner, 'duel', headshot);
      if (this.ended) return;
    }
  }

  /**
   * Kill a player: counters, drops, spike, blackboards, event, then the
   * elimination check.
   */
  private handleDeath(victim: Player, killer: Player | null, cause: DeathCause, headshot: boolean): void {
    if (!victim.alive) return;
    const position = victim.position;
    victim.kill();
    if (killer !== null) {
      killer.kills += 1;
    }

    this.droppedItems.push(...dropsOnDeath(victim, this.time, this.rng));

    if (this.spike.carrierId === victim.id) {
      this.spike.drop(victim, position);
      this.pushEvent({ type: 'spike_drop', time: this.time, playerId: victim.id, position });
      this.blackboards.attackers.updateSpike({ status: 'dropped', position, carrierId: null }, this.time);
    }
    if (this.spike.defuserId === victim.id) {
      this.spike.interruptDefuse(victim);
    }

    this.boardFor(victim.side).aliveTeammates.delete(victim.id);
    this.boardFor(opposingSide(victim.side)).forgetEnemy(victim.id);

    this.pushEvent({
      type: 'death',
      time: this.time,
      victimId: victim.id,
      killerId: killer?.id ?? null,
      weapon: killer?.weapon ?? null,
      cause,
      headshot,
      position,
    });
    log.debug({ round: this.roundNumber, victim: victim.id, killer: killer?.id ?? null, cause }, 'Player died');

    this.checkElimination();
  }

  /**
   * Defenders wiped: attackers win outright, planted or not.
   * Attackers wiped: defenders win only while the spike is not planted;
   * after a plant they still have to defuse.
   */
  private checkElimination(): void {
    if (this.ended) return;
    if (this.aliveCount(Side.DEFENDERS) === 0) {
      this.endRound(Side.ATTACKERS, EndCondition.ELIMINATION);
    } else if (this.aliveCount(Side.ATTACKERS) === 0 && !this.spike.planted) {
      this.endRound(Side.DEFENDERS, EndCondition.ELIMINATION);
    }
  }

  // ------ Movement ------

  private processMovement(intents: ReadonlyMap<string, Intent>, dt: number): void {
    for (const player of this.alivePlayers()) {
      const intent = intents.get(player.id) ?? IDLE;
      const busy = this.spike.state === SpikeState.PLANTING && this.spike.carrierId === player.id;
      const defusing = this.spike.defuserId === player.id;

      if (intent.kind === 'move' && !busy && !defusing) {
        player.setMovementInput(intent.direction, intent.walking ?? false, intent.crouching ?? false, intent.jump ?? false);
        const facing = normalize2D(intent.facing ?? intent.direction);
        if (facing !== null) player.facing = facing;
      } else {
        player.stopMoving();
        if (intent.kind === 'shoot') this.faceToward(player, intent.targetId);
      }

      const result = updateMovement(player, dt, this.map, this.fallTuning);
      if (result.fallDamage > 0) {
        this.pushEvent({
          type: 'damage',
          time: this.time,
          attackerId: null,
          victimId: player.id,
          amount: result.fallDamage,
          source: 'fall',
        });
        if (player.health <= 0) {
          this.handleDeath(player, null, 'fall', false);
          if (this.ended) return;
        }
      }
    }
  }

  private faceToward(player: Player, targetId: string): void {
    const target = this.players.get(targetId);
    if (target === undefined) return;
    const facing = normalize2D({ x: target.position.x - player.position.x, y: target.position.y - player.position.y });
    if (facing !== null) player.facing = facing;
  }

  // ------ Pickups ------

  /**
   * Attackers walking over a dropped spike pick it up. Anyone walking over a
   * better weapon (higher catalog cost) swaps, dropping theirs; a shield is
   * taken when it would give more armor than the player has.
   */
  private processPickups(): void {
    for (const player of this.alivePlayers()) {
      if (this.spike.tryPickup(player)) {
        this.pushEvent({ type: 'spike_pickup', time: this.time, playerId: player.id });
        this.blackboards.attackers.updateSpike({ status: 'carried', carrierId: player.id, position: null }, this.time);
      }

      for (let i = 0; i < this.droppedItems.length; i++) {
        const item = this.droppedItems[i];
        if (distance2D(player.position, item.position) > PICKUP_RADIUS) continue;

        if (item.kind === 'weapon') {
          if (WEAPONS[item.weapon].cost <= WEAPONS[player.weapon].cost) continue;
          const old = player.weapon;
          player.weapon = item.weapon;
          this.droppedItems.splice(i, 1, {
            kind: 'weapon',
            weapon: old,
            ammo: WEAPONS[old].magazine,
            position: player.position,
            droppedAt: this.time,
            droppedBy: player.id,
          });
          this.pushEvent({ type: 'pickup', time: this.time, playerId: player.id, item: item.weapon });
        } else {
          if (SHIELDS[item.shield].armor <= player.armor) continue;
          const old = player.shield;
          player.equipShield(item.shield);
          if (old !== null) {
            this.droppedItems.splice(i, 1, {
              kind: 'shield',
              shield: old,
              position: player.position,
              droppedAt: this.time,
              droppedBy: player.id,
            });
          } else {
            this.droppedItems.splice(i, 1);
            i -= 1;
          }
          this.pushEvent({ type: 'pickup', time: this.time, playerId: player.id, item: item.shield });
        }
      }
    }
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  /** Players on a side, in roster order. */
  teamOf(side: Side): Player[] {
    const ids = side === Side.ATTACKERS ? this.attackerIds : this.defenderIds;
    return ids.map((id) => this.player(id));
  }

  aliveCount(side: Side): number {
    return this.teamOf(side).filter((p) => p.alive).length;
  }

  private alivePlayers(): Player[] {
    return [...this.players.values()].filter((p) => p.alive);
  }

  private boardFor(side: Side): Blackboard {
    return side === Side.ATTACKERS ? this.blackboards.attackers : this.blackboards.defenders;
  }

  /** Builds one view per team for this tick. */
  private viewsBuilder(): (player: Player) => RoundView {
    const summary = this.summary();
    const spikePosition = this.spike.position;
    const views = new Map<Side, RoundView>();
    return (player) => {
      let view = views.get(player.side);
      if (view === undefined) {
        view = {
          time: this.time,
          map: this.map,
          summary,
          blackboard: this.boardFor(player.side),
          spikePosition,
          players: this.players,
        };
        views.set(player.side, view);
      }
      return view;
    };
  }

  private intentFor(player: Player, view: (player: Player) => RoundView): Intent {
    const provider = this.providers.get(player.id) ?? this.defaultProvider;
    if (provider === null) return IDLE;
    return provider.decide(player, view(player));
  }

  /** Let every living player within `range` hear a sound. */
  private broadcastNoise(kind: 'gunfire' | 'ability', sourceId: string, position: Vec3, range: number): void {
    for (const listener of this.detection.listenersOf(position, range, this.alivePlayers(), sourceId)) {
      const d = distance(listener.position, position);
      this.boardFor(listener.side).recordNoise({
        kind,
        sourceId,
        position,
        intensity: 1 - d / range,
        time: this.time,
        heardBy: listener.id,
      });
    }
  }

  private logPurchase(player: Player, item: WeaponId | ShieldType, cost: number): void {
    this.pushEvent({ type: 'purchase', time: this.time, playerId: player.id, item, cost });
  }

  private setPhase(to: RoundPhase): void {
    const from = this.phase;
    this.phase = to;
    this.pushEvent({ type: 'phase_change', time: this.time, from, to });
  }

  private endRound(winner: Side, condition: EndCondition): void {
    if (this.phase === RoundPhase.END) return;
    this.winner = winner;
    this.endCondition = condition;
    this.setPhase(RoundPhase.END);
    log.info(
      { round: this.roundNumber, winner, condition, time: Number(this.time.toFixed(2)), ticks: this.ticks },
      'Round ended',
    );
  }

  private pushEvent(event: RoundEvent): void {
    this.eventLog.push(event);
  }
}

// ============================================================================
// --- Validation ---
// ============================================================================

/**
 * Reject rosters the engine cannot run.
 *
 * @throws SimulationError ROSTER_INVALID or WEAPON_UNKNOWN
 */
export function validateRoster(players: readonly PlayerConfig[]): void {
  const seen = new Set<string>();
  let attackers = 0;
  let defenders = 0;

  for (const config of players) {
    if (config.id === '' || seen.has(config.id)) {
      throw SimulationError.rosterInvalid(`Duplicate or empty player id "${config.id}"`, { playerId: config.id });
    }
    seen.add(config.id);

    if (config.side === Side.ATTACKERS) attackers += 1;
    else if (config.side === Side.DEFENDERS) defenders += 1;
    else throw SimulationError.rosterInvalid(`Player ${config.id} has no valid side`, { playerId: config.id });

    for (const [field, value] of [
      ['aim', config.aim],
      ['movementAccuracy', config.movementAccuracy],
    ] as const) {
      if (!(value >= 0 && value <= 100)) {
        throw SimulationError.rosterInvalid(`Player ${config.id} ${field} must be within 0-100, got ${value}`, {
          playerId: config.id,
          field,
          value,
        });
      }
    }

    if (config.weapon !== undefined && !isWeaponId(config.weapon)) {
      throw new SimulationError('WEAPON_UNKNOWN', `Player ${config.id} holds unknown weapon "${config.weapon}"`, {
        playerId: config.id,
        weapon: config.weapon,
      });
    }
  }

  for (const [side, count] of [
    [Side.ATTACKERS, attackers],
    [Side.DEFENDERS, defenders],
  ] as const) {
    if (count < 1 || count > MATCH.teamSize) {
      throw SimulationError.rosterInvalid(`${side} must field 1 to ${MATCH.teamSize} players, got ${count}`, {
        side,
        count,
      });
    }
  }
}
