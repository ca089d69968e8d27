import { getCell } from '../../src/shared/engine/board';
import { applyMove } from '../../src/shared/engine/moveApplication';
import {
  enumerateLegalMoves,
  getLegalBuildSites,
  getLegalDestinations,
  getLegalMoves,
  getSelectableWorkers,
  hasAnyLegalMove,
} from '../../src/shared/engine/moveGeneration';
import { isRulesViolation, EngineErrorCode } from '../../src/shared/engine/errors';
import { cornerOpening, dome, level, makeState } from '../helpers/santoriniFixtures';

describe('move generation', () => {
  describe('corner opening', () => {
    const state = cornerOpening();

    it('yields 35 full turns: 11 for the corner worker and 24 for its neighbour', () => {
      const moves = getLegalMoves(state);

      expect(moves).toHaveLength(35);
      expect(moves.filter((m) => m.worker === 0)).toHaveLength(11);
      expect(moves.filter((m) => m.worker === 1)).toHaveLength(24);
    });

    it('enumerates worker 0 first, in neighbour order', () => {
      const first = enumerateLegalMoves(state).next();

      expect(first.done).toBe(false);
      expect(first.value).toEqual({
        player: 1,
        worker: 0,
        from: { x: 0, y: 0 },
        to: { x: 1, y: 1 },
        build: { x: 2, y: 1 },
      });
    });

    it('lists destinations that skip occupied cells', () => {
      expect(getLegalDestinations(state, 1, 0)).toEqual([
        { x: 1, y: 1 },
        { x: 0, y: 1 },
      ]);
    });

    it('counts the vacated cell as a build site', () => {
      const sites = getLegalBuildSites(state, 1, 0, { x: 0, y: 1 });

      expect(sites).toEqual([
        { x: 1, y: 1 },
        { x: 1, y: 2 },
        { x: 0, y: 2 },
        { x: 0, y: 0 },
      ]);
    });

    it('is lazy: stopping early does not compute the rest', () => {
      const iterator = enumerateLegalMoves(state);
      iterator.next();
      expect(iterator.return(undefined).done).toBe(true);
    });

    it('generates moves for the opponent on request', () => {
      expect(getLegalMoves(state, 2)).toHaveLength(35);
    });
  });

  it('never climbs more than one level or onto a dome', () => {
    const state = makeState(
      [
        { x: 0, y: 0 },
        { x: 4, y: 0 },
      ],
      [
        { x: 4, y: 4 },
        { x: 3, y: 4 },
      ],
      [
        [{ x: 1, y: 0 }, level(2)],
        [{ x: 1, y: 1 }, dome],
        [{ x: 0, y: 1 }, level(1)],
      ]
    );

    expect(getLegalDestinations(state, 1, 0)).toEqual([{ x: 0, y: 1 }]);
  });

  it('yields a winning climb once, without a build', () => {
    const state = makeState(
      [
        { x: 0, y: 0 },
        { x: 4, y: 0 },
      ],
      [
        { x: 4, y: 4 },
        { x: 3, y: 4 },
      ],
      [
        [{ x: 0, y: 0 }, level(2)],
        [{ x: 1, y: 1 }, level(3)],
      ]
    );

    const wins = getLegalMoves(state).filter((m) => m.build === null);
    expect(wins).toEqual([{ player: 1, worker: 0, from: { x: 0, y: 0 }, to: { x: 1, y: 1 }, build: null }]);
  });

  it('reports a player with no destinations', () => {
    const state = makeState(
      [
        { x: 2, y: 2 },
        { x: 2, y: 0 },
      ],
      [
        { x: 0, y: 0 },
        { x: 4, y: 4 },
      ],
      [
        [{ x: 1, y: 0 }, dome],
        [{ x: 0, y: 1 }, dome],
        [{ x: 1, y: 1 }, level(2)],
        [{ x: 3, y: 4 }, dome],
        [{ x: 4, y: 3 }, dome],
        [{ x: 3, y: 3 }, level(2)],
      ]
    );

    expect(hasAnyLegalMove(state, 2)).toBe(false);
    expect(getLegalMoves(state, 2)).toEqual([]);
    expect(getSelectableWorkers(state, 1)).toEqual([0, 1]);
  });
});

describe('applyMove', () => {
  it('applies a full turn and hands the move to the opponent', () => {
    const state = cornerOpening();
    const [move] = getLegalMoves(state);
    if (!move) throw new Error('expected a move');

    const next = applyMove(state, move);

    expect(next.currentPlayer).toBe(2);
    expect(next.phase).toEqual({ phase: 'selecting_worker' });
    expect(next.workers[1][0]).toEqual({ x: 1, y: 1 });
    expect(getCell(next.board, { x: 2, y: 1 })).toEqual({ height: 1, capped: false });
    expect(next.moveHistory).toEqual([move]);
  });

  it('does not modify the input state', () => {
    const state = cornerOpening();
    const snapshot = JSON.stringify(state);

    for (const move of getLegalMoves(state)) {
      applyMove(state, move);
    }

    expect(JSON.stringify(state)).toBe(snapshot);
  });

  it('throws a RulesViolation for an illegal move', () => {
    const state = cornerOpening();
    let caught: unknown;
    try {
      applyMove(state, { player: 1, worker: 0, from: { x: 0, y: 0 }, to: { x: 2, y: 2 }, build: { x: 2, y: 3 } });
    } catch (error) {
      caught = error;
    }

    expect(isRulesViolation(caught) && caught.code).toBe(EngineErrorCode.RULES_INVALID_DESTINATION);
  });
});
