/**
 * Tests for the static position evaluator: weight profiles, the proximity
 * and effective-height terms, and terminal scores.
 */

import { createEmptyBoard } from '../../src/shared/engine/board';
import { transition } from '../../src/shared/engine/fsm';
import {
  DEFAULT_HEURISTIC_WEIGHTS,
  HEURISTIC_PROFILE_IDS,
  MAX_SCORE,
  MIN_SCORE,
  effectiveHeight,
  evaluateState,
  evaluateStateBreakdown,
  getHeuristicWeights,
  isHeuristicProfileId,
} from '../../src/shared/engine/heuristicEvaluation';
import type { GameState } from '../../src/shared/engine/types';
import {
  boardWith,
  boxedInPlayerTwo,
  cornerOpening,
  dome,
  level,
  makeState,
} from '../helpers/santoriniFixtures';

// ============================================================================
// Fixtures
// ============================================================================

/**
 * Workers on the four corners, player 1 on the top row. (0,0) is level 1
 * with a level-2 neighbour at (1,0); everything else is flat.
 *
 * Player 1 effective height: (1 + 2/3) + 0; player 2: 0 + 0.
 * Every own/enemy pair is 4 apart, so proximity is -16 for both sides.
 */
function raisedCornerState(): GameState {
  return makeState(
    [
      { x: 0, y: 0 },
      { x: 4, y: 0 },
    ],
    [
      { x: 0, y: 4 },
      { x: 4, y: 4 },
    ],
    [
      [{ x: 0, y: 0 }, level(1)],
      [{ x: 1, y: 0 }, level(2)],
    ]
  );
}

describe('heuristic weight profiles', () => {
  it('exposes balanced, aggressive and climber profiles', () => {
    expect(HEURISTIC_PROFILE_IDS).toEqual(['balanced', 'aggressive', 'climber']);
    expect(getHeuristicWeights('balanced')).toEqual({ proximity: 1, height: 2 });
    expect(getHeuristicWeights('aggressive')).toEqual({ proximity: 2, height: 1.5 });
    expect(getHeuristicWeights('climber')).toEqual({ proximity: 0.5, height: 4 });
  });

  it('defaults to the balanced profile', () => {
    expect(DEFAULT_HEURISTIC_WEIGHTS).toBe(getHeuristicWeights('balanced'));
  });

  it('recognises profile ids', () => {
    expect(isHeuristicProfileId('climber')).toBe(true);
    expect(isHeuristicProfileId('defensive')).toBe(false);
    expect(isHeuristicProfileId('')).toBe(false);
  });
});

describe('effectiveHeight', () => {
  it('adds the mean height of the on-board neighbours', () => {
    const board = boardWith([
      [{ x: 2, y: 2 }, level(1)],
      [{ x: 3, y: 2 }, level(2)],
      [{ x: 1, y: 2 }, level(2)],
    ]);
    // 1 + (2 + 2) / 8
    expect(effectiveHeight(board, { x: 2, y: 2 })).toBe(1.5);
  });

  it('averages over three neighbours in a corner', () => {
    const board = boardWith([[{ x: 1, y: 0 }, level(3)]]);
    expect(effectiveHeight(board, { x: 0, y: 0 })).toBe(1);
  });

  it('counts domes as zero', () => {
    const board = boardWith([
      [{ x: 1, y: 0 }, dome],
      [{ x: 0, y: 1 }, dome],
      [{ x: 1, y: 1 }, dome],
    ]);
    expect(effectiveHeight(board, { x: 0, y: 0 })).toBe(0);
    expect(effectiveHeight(board, { x: 1, y: 1 })).toBe(0);
  });

  it('is zero on a flat board', () => {
    expect(effectiveHeight(createEmptyBoard(), { x: 2, y: 2 })).toBe(0);
  });
});

describe('evaluateState', () => {
  it('scores the symmetric opening on proximity alone', () => {
    const state = cornerOpening();
    expect(evaluateState(state, 1)).toBe(-16);
    expect(evaluateState(state, 2)).toBe(-16);
  });

  it('combines proximity and height with the given weights', () => {
    const state = raisedCornerState();
    const heightAdvantage = 1 + 2 / 3;

    expect(evaluateState(state, 1)).toBeCloseTo(-16 + 2 * heightAdvantage, 10);
    expect(evaluateState(state, 1, getHeuristicWeights('aggressive'))).toBeCloseTo(-29.5, 10);
    expect(evaluateState(state, 1, getHeuristicWeights('climber'))).toBeCloseTo(
      -8 + 4 * heightAdvantage,
      10
    );
    expect(evaluateState(state, 2)).toBeCloseTo(-16 - 2 * heightAdvantage, 10);
  });

  it('reports the individual terms', () => {
    const breakdown = evaluateStateBreakdown(raisedCornerState(), 1);

    expect(breakdown.proximity).toBe(-16);
    expect(breakdown.height).toBeCloseTo(5 / 3, 10);
    expect(breakdown.total).toBeCloseTo(-16 + 10 / 3, 10);
    expect(breakdown.terminal).toBeNull();
  });

  it('grows as a worker closes in on the opponent', () => {
    const far = cornerOpening();
    const near = makeState(
      [
        { x: 2, y: 2 },
        { x: 1, y: 0 },
      ],
      [
        { x: 4, y: 4 },
        { x: 3, y: 4 },
      ]
    );
    // (2,2) is 2 from both enemy workers, (1,0) is 4 from both.
    expect(evaluateState(near, 1)).toBe(-12);
    expect(evaluateState(near, 1)).toBeGreaterThan(evaluateState(far, 1));
  });

  it('returns the extreme scores for finished games', () => {
    const resigned = transition(cornerOpening(), { type: 'RESIGN', player: 1 });
    if (!resigned.ok) throw resigned.error;

    expect(evaluateState(resigned.state, 2)).toBe(MAX_SCORE);
    expect(evaluateState(resigned.state, 1)).toBe(MIN_SCORE);
    expect(evaluateStateBreakdown(resigned.state, 1)).toEqual({
      proximity: 0,
      height: 0,
      total: Number.NEGATIVE_INFINITY,
      terminal: 'loss',
    });
  });

  it('scores a stuck player as lost', () => {
    const stuck = boxedInPlayerTwo();

    expect(stuck.phase).toEqual({ phase: 'no_legal_move', player: 2 });
    expect(evaluateState(stuck, 1)).toBe(Number.POSITIVE_INFINITY);
    expect(evaluateState(stuck, 2)).toBe(Number.NEGATIVE_INFINITY);
  });
});
