/**
 * TurnStateMachine unit tests
 *
 * Every (phase, action) pairing either goes through its validator or is
 * rejected with FSM_OUT_OF_PHASE; rejected actions never touch the state.
 */

import { getCell } from '../../../src/shared/engine/board';
import { EngineErrorCode } from '../../../src/shared/engine/errors';
import { isTerminalPhase, transition } from '../../../src/shared/engine/fsm';
import { createInitialGameState } from '../../../src/shared/engine/initialState';
import type { ActionResult, GameAction, GameState } from '../../../src/shared/engine/types';
import { cornerOpening, dome, level, makeState } from '../../helpers/santoriniFixtures';

function expectOk(result: ActionResult): GameState {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.state;
}

function expectRejected(state: GameState, action: GameAction, code: EngineErrorCode): void {
  const before = JSON.stringify(state);
  const result = transition(state, action);

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.code).toBe(code);
  }
  expect(JSON.stringify(state)).toBe(before);
}

function play(state: GameState, actions: GameAction[]): GameState {
  return actions.reduce((current, action) => expectOk(transition(current, action)), state);
}

const selectW0: GameAction = { type: 'SELECT_WORKER', worker: { player: 1, index: 0 } };

describe('TurnStateMachine', () => {
  describe('placement', () => {
    it('alternates placements and starts player 1 once four workers are down', () => {
      const state = play(createInitialGameState(), [
        { type: 'PLACE_WORKER', position: { x: 1, y: 1 } },
        { type: 'PLACE_WORKER', position: { x: 3, y: 3 } },
        { type: 'PLACE_WORKER', position: { x: 1, y: 3 } },
        { type: 'PLACE_WORKER', position: { x: 3, y: 1 } },
      ]);

      expect(state.workers[1]).toEqual([
        { x: 1, y: 1 },
        { x: 1, y: 3 },
      ]);
      expect(state.workers[2]).toEqual([
        { x: 3, y: 3 },
        { x: 3, y: 1 },
      ]);
      expect(state.currentPlayer).toBe(1);
      expect(state.phase).toEqual({ phase: 'selecting_worker' });
    });

    it('passes the placement to the other player', () => {
      const state = play(createInitialGameState(), [{ type: 'PLACE_WORKER', position: { x: 0, y: 0 } }]);
      expect(state.currentPlayer).toBe(2);
      expect(state.phase).toEqual({ phase: 'placement' });
    });

    it('rejects occupied and off-board cells', () => {
      const state = play(createInitialGameState(), [{ type: 'PLACE_WORKER', position: { x: 0, y: 0 } }]);

      expectRejected(state, { type: 'PLACE_WORKER', position: { x: 0, y: 0 } }, EngineErrorCode.RULES_INVALID_PLACEMENT);
      expectRejected(state, { type: 'PLACE_WORKER', position: { x: 5, y: 0 } }, EngineErrorCode.RULES_INVALID_PLACEMENT);
    });

    it('rejects turn actions during setup', () => {
      expectRejected(createInitialGameState(), selectW0, EngineErrorCode.FSM_OUT_OF_PHASE);
    });
  });

  describe('worker selection', () => {
    const state = cornerOpening();

    it("rejects the opponent's worker", () => {
      expectRejected(
        state,
        { type: 'SELECT_WORKER', worker: { player: 2, index: 0 } },
        EngineErrorCode.RULES_INVALID_SELECTION
      );
    });

    it('rejects a worker with nowhere to go', () => {
      const boxed = makeState(
        [
          { x: 0, y: 0 },
          { x: 4, y: 0 },
        ],
        [
          { x: 4, y: 4 },
          { x: 3, y: 4 },
        ],
        [
          [{ x: 1, y: 0 }, dome],
          [{ x: 1, y: 1 }, dome],
          [{ x: 0, y: 1 }, dome],
        ]
      );
      expectRejected(boxed, selectW0, EngineErrorCode.RULES_INVALID_SELECTION);
    });

    it('rejects moves and builds before a worker is chosen', () => {
      expectRejected(state, { type: 'MOVE_WORKER', to: { x: 1, y: 1 } }, EngineErrorCode.FSM_OUT_OF_PHASE);
      expectRejected(state, { type: 'BUILD', at: { x: 1, y: 1 } }, EngineErrorCode.FSM_OUT_OF_PHASE);
    });

    it('enters destination choice for the selected worker', () => {
      expect(play(state, [selectW0]).phase).toEqual({ phase: 'choosing_destination', worker: 0 });
    });
  });

  describe('movement', () => {
    it('rejects non-adjacent, occupied, domed and too-high destinations', () => {
      const state = play(
        makeState(
          [
            { x: 1, y: 1 },
            { x: 2, y: 1 },
          ],
          [
            { x: 4, y: 4 },
            { x: 3, y: 4 },
          ],
          [
            [{ x: 0, y: 0 }, dome],
            [{ x: 1, y: 0 }, level(2)],
          ]
        ),
        [selectW0]
      );
      const code = EngineErrorCode.RULES_INVALID_DESTINATION;

      expectRejected(state, { type: 'MOVE_WORKER', to: { x: 3, y: 3 } }, code);
      expectRejected(state, { type: 'MOVE_WORKER', to: { x: 2, y: 1 } }, code);
      expectRejected(state, { type: 'MOVE_WORKER', to: { x: 0, y: 0 } }, code);
      expectRejected(state, { type: 'MOVE_WORKER', to: { x: 1, y: 0 } }, code);
      expectRejected(state, { type: 'MOVE_WORKER', to: { x: 1, y: 1 } }, code);
      expectRejected(state, { type: 'MOVE_WORKER', to: { x: -1, y: 1 } }, code);
    });

    it('allows stepping down any number of levels', () => {
      const state = makeState(
        [
          { x: 0, y: 0 },
          { x: 4, y: 0 },
        ],
        [
          { x: 4, y: 4 },
          { x: 3, y: 4 },
        ],
        [[{ x: 0, y: 0 }, level(3)]]
      );
      const moved = play(state, [selectW0, { type: 'MOVE_WORKER', to: { x: 1, y: 1 } }]);
      expect(moved.phase).toEqual({ phase: 'choosing_build_site', worker: 0, from: { x: 0, y: 0 } });
    });

    it('wins immediately when climbing onto level 3', () => {
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
      const won = play(state, [selectW0, { type: 'MOVE_WORKER', to: { x: 1, y: 1 } }]);

      expect(won.phase).toEqual({ phase: 'won', winner: 1, reason: 'reached_level_three' });
      expect(isTerminalPhase(won.phase)).toBe(true);
      expect(won.moveHistory).toEqual([
        { player: 1, worker: 0, from: { x: 0, y: 0 }, to: { x: 1, y: 1 }, build: null },
      ]);
      expectRejected(won, { type: 'BUILD', at: { x: 0, y: 0 } }, EngineErrorCode.STATE_GAME_ALREADY_OVER);
    });
  });

  describe('building', () => {
    const afterMove = play(cornerOpening(), [selectW0, { type: 'MOVE_WORKER', to: { x: 1, y: 1 } }]);

    it('rejects distant, occupied and out-of-phase builds', () => {
      expectRejected(afterMove, { type: 'BUILD', at: { x: 3, y: 3 } }, EngineErrorCode.RULES_INVALID_BUILD);
      expectRejected(afterMove, { type: 'BUILD', at: { x: 1, y: 0 } }, EngineErrorCode.RULES_INVALID_BUILD);
      expectRejected(afterMove, { type: 'BUILD', at: { x: 1, y: 1 } }, EngineErrorCode.RULES_INVALID_BUILD);
      expectRejected(afterMove, { type: 'MOVE_WORKER', to: { x: 2, y: 2 } }, EngineErrorCode.FSM_OUT_OF_PHASE);
    });

    it('rejects building on a dome', () => {
      const state = play(
        makeState(
          [
            { x: 0, y: 0 },
            { x: 1, y: 0 },
          ],
          [
            { x: 4, y: 4 },
            { x: 3, y: 4 },
          ],
          [[{ x: 2, y: 2 }, dome]]
        ),
        [selectW0, { type: 'MOVE_WORKER', to: { x: 1, y: 1 } }]
      );
      expectRejected(state, { type: 'BUILD', at: { x: 2, y: 2 } }, EngineErrorCode.RULES_INVALID_BUILD);
    });

    it('builds on the vacated cell and passes the turn', () => {
      const next = expectOk(transition(afterMove, { type: 'BUILD', at: { x: 0, y: 0 } }));

      expect(getCell(next.board, { x: 0, y: 0 })).toEqual({ height: 1, capped: false });
      expect(next.currentPlayer).toBe(2);
      expect(next.phase).toEqual({ phase: 'selecting_worker' });
      expect(next.moveHistory).toEqual([
        { player: 1, worker: 0, from: { x: 0, y: 0 }, to: { x: 1, y: 1 }, build: { x: 0, y: 0 } },
      ]);
    });
  });

  describe('resignation', () => {
    it('ends the game in favour of the opponent from any live phase', () => {
      const resigned = expectOk(transition(cornerOpening(), { type: 'RESIGN', player: 1 }));
      expect(resigned.phase).toEqual({ phase: 'won', winner: 2, reason: 'resignation' });

      const duringSetup = expectOk(transition(createInitialGameState(), { type: 'RESIGN', player: 2 }));
      expect(duringSetup.phase).toEqual({ phase: 'won', winner: 1, reason: 'resignation' });
    });

    it('is rejected once the game is over', () => {
      const resigned = expectOk(transition(cornerOpening(), { type: 'RESIGN', player: 1 }));
      expectRejected(resigned, { type: 'RESIGN', player: 2 }, EngineErrorCode.STATE_GAME_ALREADY_OVER);
    });
  });

  it('attaches phase and action context to rejections', () => {
    const result = transition(cornerOpening(), { type: 'BUILD', at: { x: 2, y: 2 } });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.domain).toBe('TurnStateMachine');
      expect(result.error.context).toEqual({
        phase: 'selecting_worker',
        currentPlayer: 1,
        action: { type: 'BUILD', at: { x: 2, y: 2 } },
      });
    }
  });
});
