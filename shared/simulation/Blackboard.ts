/**
 * @file Blackboard.ts
 * @description Shared team knowledge: what one team believes about enemies,
 * the spike, the map and its own plan.
 *
 * One Blackboard per team. The Match keeps the same two instances for the
 * whole match and hands them to each Round; the Round writes sightings,
 * noises and spike news into them every tick and decays them at the end of
 * the tick. All timestamps are simulation seconds, never wall-clock time.
 *
 * Knowledge decay: enemy confidence x0.9 per 5 s, floored at 0.1. An entry
 * that drops below 0.2 is forgotten and the area it was last seen in is
 * marked dangerous again.
 */

import { BUY_LADDER } from '../constants/EconomyConstants.js';
import { Side, opposingSide, type EndCondition } from '../types/GameTypes.js';
import { clamp, type Vec3 } from '../util/MathUtils.js';

// ============================================================================
// --- Constants ---
// ============================================================================

export const KNOWLEDGE = {
  /** Confidence multiplier applied per decayInterval seconds */
  decayFactor: 0.9,
  decayInterval: 5,
  confidenceFloor: 0.1,
  /** Entries below this are forgotten */
  forgetBelow: 0.2,
  warningSeconds: 10,
  /** Noise events older than this are pruned */
  noiseMemorySeconds: 5,
  minTeamConfidence: 0.1,
  maxTeamConfidence: 2.0,
  /** Team confidence change per round won or lost */
  roundConfidenceStep: 0.1,
  neutralSiteRate: 0.5,
} as const;

// ============================================================================
// --- Types ---
// ============================================================================

/** Last known whereabouts of one enemy. */
export interface EnemyInfo {
  playerId: string;
  position: Vec3;
  /** Area name the enemy was seen in, when known */
  area: string | null;
  lastSeen: number;
  /** Teammate who spotted them, or 'recon' for ability reveals */
  spottedBy: string;
  /** 1 for a fresh sighting, decays toward 0.1 */
  confidence: number;
}

export type SpikeKnowledge = 'unknown' | 'carried' | 'dropped' | 'planted' | 'defused';

export interface SpikeInfo {
  status: SpikeKnowledge;
  position: Vec3 | null;
  carrierId: string | null;
  plantSite: string | null;
  plantTime: number | null;
  lastUpdated: number;
}

export type NoiseKind = 'footstep' | 'gunfire' | 'ability';

export interface NoiseEvent {
  kind: NoiseKind;
  /** Player who made it, when known */
  sourceId: string | null;
  position: Vec3;
  intensity: number;
  time: number;
  heardBy: string;
}

export interface StrategyCall {
  name: string;
  issuedBy: string;
  issuedAt: number;
  targetSite: string | null;
}

export interface Warning {
  message: string;
  position: Vec3 | null;
  createdAt: number;
  expiresAt: number;
}

export interface RoundMemory {
  won: boolean;
  endCondition: EndCondition | null;
  site: string | null;
  strategy: string | null;
  aliveAtEnd: number;
  teamConfidence: number;
}

export interface EconomyInfo {
  teamCredits: number;
  averageCredits: number;
}

export type BuySuggestion = 'eco' | 'force' | 'full';

/** What the blackboard recommends for the next round. */
export interface StrategySuggestion {
  buy: BuySuggestion;
  plan: string;
  targetSite: string | null;
  confidence: number;
}

// ============================================================================
// --- Blackboard Class ---
// ============================================================================

/**
 * A team's collective memory, within a round and across rounds.
 *
 * @example
 * ```ts
 * const board = new Blackboard('team-a', Side.ATTACKERS, ['A', 'B']);
 * board.updateEnemy('d1', position, 'mid', 'a3', time);
 * board.decayKnowledge(0.1, time);
 * const { buy, plan } = board.suggestStrategy();
 * ```
 */
export class Blackboard {
  side: Side;
  half: number = 1;

  // --------------------------------------------------------------------------
  // Round knowledge (cleared every round)
  // --------------------------------------------------------------------------

  readonly enemies: Map<string, EnemyInfo> = new Map();
  spike: SpikeInfo = emptySpikeInfo();
  currentStrategy: StrategyCall | null = null;
  readonly dangerousAreas: Set<string> = new Set();
  readonly clearedAreas: Set<string> = new Set();
  noises: NoiseEvent[] = [];
  warnings: Warning[] = [];
  readonly aliveTeammates: Set<string> = new Set();
  economy: EconomyInfo = { teamCredits: 0, averageCredits: 0 };

  // --------------------------------------------------------------------------
  // Match knowledge (kept across rounds)
  // --------------------------------------------------------------------------

  readonly previousStrategies: StrategyCall[] = [];
  readonly roundMemory: Map<number, RoundMemory> = new Map();
  readonly siteSuccessRate: Map<string, number> = new Map();
  teamConfidence: number = 1.0;
  roundsWon: number = 0;
  roundsLost: number = 0;
  /** Positive for a win streak, negative for a loss streak */
  streak: number = 0;

  constructor(
    readonly teamId: string,
    side: Side,
    private readonly siteNames: readonly string[],
  ) {
    this.side = side;
    this.resetSiteRates();
  }

  get attacking(): boolean {
    return this.side === Side.ATTACKERS;
  }

  // --------------------------------------------------------------------------
  // Enemy knowledge
  // --------------------------------------------------------------------------

  /** Record a fresh sighting at full confidence. */
  updateEnemy(playerId: string, position: Vec3, area: string | null, spottedBy: string, time: number): void {
    this.enemies.set(playerId, { playerId, position, area, lastSeen: time, spottedBy, confidence: 1.0 });
    if (area !== null) {
      this.markAreaDangerous(area);
    }
  }

  /** Forget an enemy, e.g. once they are dead. */
  forgetEnemy(playerId: string): void {
    this.enemies.delete(playerId);
  }

  // --------------------------------------------------------------------------
  // Spike, noise, warnings
  // --------------------------------------------------------------------------

  updateSpike(update: Partial<Omit<SpikeInfo, 'lastUpdated'>>, time: number): void {
    this.spike = { ...this.spike, ...update, lastUpdated: time };
  }

  recordNoise(noise: NoiseEvent): void {
    this.noises.push(noise);
  }

  addWarning(message: string, time: number, position: Vec3 | null = null, expiresIn: number = KNOWLEDGE.warningSeconds): void {
    this.warnings.push({ message, position, createdAt: time, expiresAt: time + expiresIn });
    this.pruneWarnings(time);
  }

  activeWarnings(time: number): Warning[] {
    return this.warnings.filter((w) => w.expiresAt > time);
  }

  // --------------------------------------------------------------------------
  // Strategy and area control
  // --------------------------------------------------------------------------

  /** Make a new call; the previous one is archived. */
  setStrategy(name: string, issuedBy: string, time: number, targetSite: string | null = null): void {
    if (this.currentStrategy !== null) {
      this.previousStrategies.push(this.currentStrategy);
    }
    this.currentStrategy = { name, issuedBy, issuedAt: time, targetSite };
  }

  markAreaDangerous(area: string): void {
    this.dangerousAreas.add(area);
    this.clearedAreas.delete(area);
  }

  markAreaCleared(area: string): void {
    this.clearedAreas.add(area);
    this.dangerousAreas.delete(area);
  }

  updateTeamConfidence(delta: number): void {
    this.teamConfidence = clamp(this.teamConfidence + delta, KNOWLEDGE.minTeamConfidence, KNOWLEDGE.maxTeamConfidence);
  }

  /** Refresh credit totals from the team's current balances. */
  updateEconomy(credits: readonly number[]): void {
    const teamCredits = credits.reduce((sum, c) => sum + c, 0);
    this.economy = {
      teamCredits,
      averageCredits: credits.length > 0 ? teamCredits / credits.length : 0,
    };
  }

  // --------------------------------------------------------------------------
  // Decay
  // --------------------------------------------------------------------------

  /**
   * Age the team's knowledge by dt seconds.
   * Forgotten enemies leave their last area marked dangerous.
   */
  decayKnowledge(dt: number, time: number): void {
    const factor = Math.pow(KNOWLEDGE.decayFactor, dt / KNOWLEDGE.decayInterval);

    for (const [id, info] of this.enemies) {
      info.confidence = Math.max(KNOWLEDGE.confidenceFloor, info.confidence * factor);
      if (info.confidence < KNOWLEDGE.forgetBelow) {
        this.enemies.delete(id);
        if (info.area !== null) {
          this.markAreaDangerous(info.area);
        }
      }
    }

    this.noises = this.noises.filter((n) => time - n.time <= KNOWLEDGE.noiseMemorySeconds);
    this.pruneWarnings(time);
  }

  // --------------------------------------------------------------------------
  // Round history
  // --------------------------------------------------------------------------

  /**
   * Remember how a round went, adjust confidence and site rates, then clear
   * the round's knowledge.
   */
  recordRoundResult(roundNumber: number, won: boolean, endCondition: EndCondition | null, site: string | null): void {
    if (won) {
      this.roundsWon += 1;
      this.streak = Math.max(1, this.streak + 1);
      this.updateTeamConfidence(KNOWLEDGE.roundConfidenceStep);
    } else {
      this.roundsLost += 1;
      this.streak = Math.min(-1, this.streak - 1);
      this.updateTeamConfidence(-KNOWLEDGE.roundConfidenceStep);
    }

    if (site !== null && this.attacking) {
      const current = this.siteSuccessRate.get(site) ?? KNOWLEDGE.neutralSiteRate;
      this.siteSuccessRate.set(site, won ? current * 0.8 + 0.2 : current * 0.8);
    }

    this.roundMemory.set(roundNumber, {
      won,
      endCondition,
      site,
      strategy: this.currentStrategy?.name ?? null,
      aliveAtEnd: this.aliveTeammates.size,
      teamConfidence: this.teamConfidence,
    });

    this.clearRoundData();
  }

  /** Drop everything that only holds for one round. */
  clearRoundData(): void {
    this.enemies.clear();
    this.spike = emptySpikeInfo();
    this.currentStrategy = null;
    this.dangerousAreas.clear();
    this.clearedAreas.clear();
    this.noises = [];
    this.warnings = [];
    this.aliveTeammates.clear();
  }

  /** Swap sides at halftime and pull confidence halfway back to neutral. */
  prepareForNewHalf(): void {
    this.side = opposingSide(this.side);
    this.half += 1;
    this.teamConfidence = (this.teamConfidence + 1.0) / 2;
    this.resetSiteRates();
    this.clearRoundData();
  }

  /**
   * Buy and plan recommendation for the next round.
   *
   * Buy follows the team's average credits. The plan follows team confidence
   * and the site success history; no randomness is involved.
   */
  suggestStrategy(): StrategySuggestion {
    const avg = this.economy.averageCredits;
    const buy: BuySuggestion = avg >= BUY_LADDER.fullBuy ? 'full' : avg >= BUY_LADDER.halfBuy ? 'force' : 'eco';
    const best = this.bestSite();

    if (this.attacking) {
      if (this.teamConfidence > 1.5) return { buy, plan: 'rush', targetSite: best, confidence: 0.8 };
      if (this.teamConfidence < 0.5) return { buy, plan: 'default', targetSite: null, confidence: 0.7 };
      const bestRate = best === null ? 0 : (this.siteSuccessRate.get(best) ?? 0);
      if (bestRate >= KNOWLEDGE.neutralSiteRate) {
        return { buy, plan: 'execute', targetSite: best, confidence: 0.6 };
      }
      return { buy, plan: 'default', targetSite: null, confidence: 0.5 };
    }

    if (this.teamConfidence > 1.5) return { buy, plan: 'aggressive_defense', targetSite: best, confidence: 0.7 };
    if (this.teamConfidence < 0.5) return { buy, plan: 'stack_site', targetSite: best, confidence: 0.6 };
    return { buy, plan: 'standard_defense', targetSite: null, confidence: 0.8 };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  /** Site with the highest success rate; ties go to the first listed. */
  bestSite(): string | null {
    let best: string | null = null;
    let bestRate = -Infinity;
    for (const [site, rate] of this.siteSuccessRate) {
      if (rate > bestRate) {
        best = site;
        bestRate = rate;
      }
    }
    return best;
  }

  private resetSiteRates(): void {
    this.siteSuccessRate.clear();
    for (const site of this.siteNames) {
      this.siteSuccessRate.set(site, KNOWLEDGE.neutralSiteRate);
    }
  }

  private pruneWarnings(time: number): void {
    this.warnings = this.warnings.filter((w) => w.expiresAt > time);
  }
}

function emptySpikeInfo(): SpikeInfo {
  return { status: 'unknown', position: null, carrierId: null, plantSite: null, plantTime: null, lastUpdated: 0 };
}
