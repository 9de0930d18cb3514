import { describe, it, expect, beforeEach } from 'vitest';
import { Blackboard } from '../../shared/simulation/Blackboard.js';
import { EndCondition, Side } from '../../shared/types/GameTypes.js';
import { vec3 } from '../../shared/util/MathUtils.js';

describe('Blackboard', () => {
  let board: Blackboard;

  beforeEach(() => {
    board = new Blackboard('red', Side.ATTACKERS, ['A', 'B']);
  });

  describe('enemy knowledge', () => {
    it('records a sighting at full confidence and marks the area dangerous', () => {
      board.updateEnemy('d1', vec3(30, 4, 2), 'Ledge', 'a1', 3);

      expect(board.enemies.get('d1')).toMatchObject({ confidence: 1, lastSeen: 3, spottedBy: 'a1' });
      expect(board.dangerousAreas.has('Ledge')).toBe(true);
    });

    it('decays confidence by 0.9 every five seconds', () => {
      board.updateEnemy('d1', vec3(30, 4, 2), 'Ledge', 'a1', 0);
      board.decayKnowledge(5, 5);
      expect(board.enemies.get('d1')?.confidence).toBeCloseTo(0.9);
    });

    it('forgets an enemy once confidence drops below 0.2', () => {
      board.updateEnemy('d1', vec3(30, 4, 2), 'Ledge', 'a1', 0);
      board.markAreaCleared('Ledge');

      board.decayKnowledge(80, 80);

      expect(board.enemies.has('d1')).toBe(false);
      expect(board.dangerousAreas.has('Ledge')).toBe(true);
      expect(board.clearedAreas.has('Ledge')).toBe(false);
    });

    it('prunes old noise', () => {
      board.recordNoise({ kind: 'footstep', sourceId: 'd1', position: vec3(1, 1, 0), intensity: 0.5, time: 0, heardBy: 'a1' });
      board.decayKnowledge(0.1, 6);
      expect(board.noises).toEqual([]);
    });
  });

  describe('warnings', () => {
    it('expire after ten seconds', () => {
      board.addWarning('two on ledge', 0);
      expect(board.activeWarnings(5)).toHaveLength(1);
      expect(board.activeWarnings(10)).toHaveLength(0);
    });
  });

  describe('round history', () => {
    it('adjusts streak, confidence and site rate on a win', () => {
      board.recordRoundResult(1, true, EndCondition.SPIKE_DETONATION, 'A');

      expect(board.roundsWon).toBe(1);
      expect(board.streak).toBe(1);
      expect(board.teamConfidence).toBeCloseTo(1.1);
      expect(board.siteSuccessRate.get('A')).toBeCloseTo(0.6);
      expect(board.roundMemory.get(1)).toMatchObject({ won: true, site: 'A' });
    });

    it('turns a win streak into a loss streak', () => {
      board.recordRoundResult(1, true, null, null);
      board.recordRoundResult(2, true, null, null);
      board.recordRoundResult(3, false, EndCondition.ELIMINATION, null);
      expect(board.streak).toBe(-1);
    });

    it('clears round knowledge after recording', () => {
      board.updateEnemy('d1', vec3(30, 4, 2), 'Ledge', 'a1', 0);
      board.setStrategy('default', 'a1', 0);

      board.recordRoundResult(1, false, EndCondition.TIME_EXPIRED, null);

      expect(board.enemies.size).toBe(0);
      expect(board.currentStrategy).toBeNull();
    });

    it('keeps confidence within bounds', () => {
      for (let i = 0; i < 30; i++) board.recordRoundResult(i + 1, false, null, null);
      expect(board.teamConfidence).toBeCloseTo(0.1);
    });
  });

  describe('strategy', () => {
    it('archives the previous call', () => {
      board.setStrategy('default', 'a1', 0);
      board.setStrategy('rush', 'a2', 1, 'B');

      expect(board.currentStrategy).toEqual({ name: 'rush', issuedBy: 'a2', issuedAt: 1, targetSite: 'B' });
      expect(board.previousStrategies.map((s) => s.name)).toEqual(['default']);
    });

    it('suggests an execute on the best site after a site win', () => {
      board.recordRoundResult(1, true, EndCondition.SPIKE_DETONATION, 'B');
      board.updateEconomy([4000, 4000, 4000, 4000, 4000]);

      expect(board.suggestStrategy()).toEqual({ buy: 'full', plan: 'execute', targetSite: 'B', confidence: 0.6 });
    });

    it('suggests an eco with nothing to spend', () => {
      board.updateEconomy([800, 800]);
      expect(board.suggestStrategy().buy).toBe('eco');
    });

    it('defends standard at neutral confidence', () => {
      const defenders = new Blackboard('blue', Side.DEFENDERS, ['A', 'B']);
      expect(defenders.suggestStrategy().plan).toBe('standard_defense');
    });
  });

  describe('halftime', () => {
    it('swaps side and pulls confidence toward neutral', () => {
      board.recordRoundResult(1, true, null, 'A');
      board.prepareForNewHalf();

      expect(board.side).toBe(Side.DEFENDERS);
      expect(board.half).toBe(2);
      expect(board.teamConfidence).toBeCloseTo(1.05);
      expect(board.siteSuccessRate.get('A')).toBe(0.5);
      expect(board.roundsWon).toBe(1);
    });
  });
});
