import { describe, it, expect } from 'vitest';
import {
  handleHealth,
  handleSimulateMatch,
  handleSimulateRound,
  type ApiContext,
} from '../../server/src/api/handlers.js';
import { EndCondition, Side } from '../../shared/types/GameTypes.js';
import { arenaMap } from '../helpers.js';

function context(): ApiContext {
  return { map: arenaMap(), startedAt: Date.now(), activeRounds: () => 2 };
}

describe('API handlers', () => {
  describe('health', () => {
    it('reports the map and streaming rounds', () => {
      const res = handleHealth(context());
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ status: 'ok', map: 'Arena', activeRounds: 2 });
    });
  });

  describe('simulate round', () => {
    it('rejects a body without attackers', () => {
      const res = handleSimulateRound({ defenders: [{ id: 'd1' }] }, context());

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'REQUEST_INVALID', issues: [{ path: 'attackers' }] });
    });

    it('maps an engine roster error to 400', () => {
      const res = handleSimulateRound({ attackers: [{ id: 'p1' }], defenders: [{ id: 'p1' }] }, context());

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'ROSTER_INVALID' });
    });

    it('runs an idle round to the clock', () => {
      const res = handleSimulateRound(
        { attackers: [{ id: 'a1' }], defenders: [{ id: 'd1' }], agent: 'idle', seed: 5, includeEvents: false },
        context(),
      );

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        summary: { winner: Side.DEFENDERS, endCondition: EndCondition.TIME_EXPIRED, killCount: 0 },
        carryover: { a1: { creditsDelta: 1900 }, d1: { creditsDelta: 3000 } },
        events: undefined,
      });
    });
  });

  describe('simulate match', () => {
    it('plays up to the round limit', () => {
      const res = handleSimulateMatch(
        {
          teamA: { id: 'red', players: [{ id: 'r1' }] },
          teamB: { id: 'blue', players: [{ id: 'b1' }] },
          agent: 'idle',
          maxRounds: 2,
        },
        context(),
      );

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ scoreA: 0, scoreB: 2, winnerTeamId: null, overtime: false });
    });

    it('rejects a team with too many players', () => {
      const players = ['1', '2', '3', '4', '5', '6'].map((n) => ({ id: `r${n}` }));
      const res = handleSimulateMatch(
        { teamA: { id: 'red', players }, teamB: { id: 'blue', players: [{ id: 'b1' }] } },
        context(),
      );

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'REQUEST_INVALID', issues: [{ path: 'teamA.players' }] });
    });
  });
});
