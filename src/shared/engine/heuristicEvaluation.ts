import { PlayerId, Position, otherPlayer } from '../types/game';
import { getCell } from './board';
import { chebyshevDistance, getNeighbors } from './core';
import { BoardState, GameState } from './types';

/**
 * Heuristic weight profile for the static evaluator.
 *
 * The score of a non-terminal state is
 *   `proximity * weights.proximity + height * weights.height`
 * and only its ordering matters to the search; the absolute values carry no
 * meaning outside a single evaluation.
 */
export interface HeuristicWeights {
  /** Multiplier for the (non-positive) summed worker-to-opponent distance. */
  proximity: number;
  /** Multiplier for the effective-height advantage over the opponent. */
  height: number;
}

/** Score of a state the perspective player has already won. */
export const MAX_SCORE = Number.POSITIVE_INFINITY;

/** Score of a state the perspective player has already lost. */
export const MIN_SCORE = Number.NEGATIVE_INFINITY;

/**
 * Balanced profile. These constants are fixed so search results stay
 * reproducible across runs.
 */
export const HEURISTIC_WEIGHTS_BALANCED: HeuristicWeights = {
  proximity: 1,
  height: 2,
};

/**
 * Aggressive persona – keeps workers close to the opponent to contest
 * their build sites, at some cost to climbing.
 */
export const HEURISTIC_WEIGHTS_AGGRESSIVE: HeuristicWeights = {
  proximity: HEURISTIC_WEIGHTS_BALANCED.proximity * 2,
  height: HEURISTIC_WEIGHTS_BALANCED.height * 0.75,
};

/**
 * Climber persona – heavily favours tall, well-supported positions.
 */
export const HEURISTIC_WEIGHTS_CLIMBER: HeuristicWeights = {
  proximity: HEURISTIC_WEIGHTS_BALANCED.proximity * 0.5,
  height: HEURISTIC_WEIGHTS_BALANCED.height * 2,
};

export const DEFAULT_HEURISTIC_WEIGHTS: HeuristicWeights = HEURISTIC_WEIGHTS_BALANCED;

export const HEURISTIC_PROFILE_IDS = ['balanced', 'aggressive', 'climber'] as const;

export type HeuristicProfileId = (typeof HEURISTIC_PROFILE_IDS)[number];

export const HEURISTIC_WEIGHT_PROFILES: Readonly<Record<HeuristicProfileId, HeuristicWeights>> = {
  balanced: HEURISTIC_WEIGHTS_BALANCED,
  aggressive: HEURISTIC_WEIGHTS_AGGRESSIVE,
  climber: HEURISTIC_WEIGHTS_CLIMBER,
};

export function isHeuristicProfileId(value: string): value is HeuristicProfileId {
  return HEURISTIC_PROFILE_IDS.some((id) => id === value);
}

export function getHeuristicWeights(profileId: HeuristicProfileId): HeuristicWeights {
  return HEURISTIC_WEIGHT_PROFILES[profileId];
}

/**
 * Per-term view of an evaluation, used for logging and diagnostics.
 * `terminal` is set when the score comes from a finished game rather than
 * from the weighted terms (which are then reported as 0).
 */
export interface EvaluationBreakdown {
  proximity: number;
  height: number;
  total: number;
  terminal: 'win' | 'loss' | null;
}

/**
 * Score `state` from `perspective`'s point of view. Higher is better for
 * `perspective`; a won game is MAX_SCORE and a lost one MIN_SCORE.
 */
export function evaluateState(
  state: GameState,
  perspective: PlayerId,
  weights: HeuristicWeights = DEFAULT_HEURISTIC_WEIGHTS
): number {
  return evaluateStateBreakdown(state, perspective, weights).total;
}

export function evaluateStateBreakdown(
  state: GameState,
  perspective: PlayerId,
  weights: HeuristicWeights = DEFAULT_HEURISTIC_WEIGHTS
): EvaluationBreakdown {
  const terminal = terminalResult(state, perspective);
  if (terminal) {
    return {
      proximity: 0,
      height: 0,
      total: terminal === 'win' ? MAX_SCORE : MIN_SCORE,
      terminal,
    };
  }

  const opponent = otherPlayer(perspective);
  const proximity = proximityTerm(state, perspective, opponent);
  const height = heightTerm(state, perspective, opponent);

  return {
    proximity,
    height,
    total: proximity * weights.proximity + height * weights.height,
    terminal: null,
  };
}

function terminalResult(state: GameState, perspective: PlayerId): 'win' | 'loss' | null {
  const phase = state.phase;
  if (phase.phase === 'won') {
    return phase.winner === perspective ? 'win' : 'loss';
  }
  if (phase.phase === 'no_legal_move') {
    return phase.player === perspective ? 'loss' : 'win';
  }
  return null;
}

/**
 * Negated sum of Chebyshev distances over every (own worker, enemy worker)
 * pair. Zero would mean every pair shares a cell, so in practice it is
 * always negative.
 */
function proximityTerm(state: GameState, player: PlayerId, opponent: PlayerId): number {
  let total = 0;
  for (const own of state.workers[player]) {
    for (const enemy of state.workers[opponent]) {
      total += chebyshevDistance(own, enemy);
    }
  }
  return -total;
}

function heightTerm(state: GameState, player: PlayerId, opponent: PlayerId): number {
  const sum = (positions: ReadonlyArray<Position>): number =>
    positions.reduce((acc, pos) => acc + effectiveHeight(state.board, pos), 0);
  return sum(state.workers[player]) - sum(state.workers[opponent]);
}

/**
 * A worker's cell height plus the mean height of its on-board neighbours.
 * Domed neighbours count as 0 since they can never be climbed.
 */
export function effectiveHeight(board: BoardState, pos: Position): number {
  const neighbors = getNeighbors(pos, board.size);
  const neighborTotal = neighbors.reduce((acc, n) => acc + climbableHeight(board, n), 0);
  const mean = neighbors.length > 0 ? neighborTotal / neighbors.length : 0;
  return climbableHeight(board, pos) + mean;
}

function climbableHeight(board: BoardState, pos: Position): number {
  const cell = getCell(board, pos);
  return cell.capped ? 0 : cell.height;
}
