import type { CancellationToken } from '../utils/cancellation';
import { PlayerId } from '../types/game';
import { EngineErrorCode, InvalidState, RulesViolation } from './errors';
import { DEFAULT_HEURISTIC_WEIGHTS, HeuristicWeights, evaluateState } from './heuristicEvaluation';
import { isTerminalPhase } from './fsm/TurnStateMachine';
import { applyMove } from './moveApplication';
import { enumerateLegalMoves } from './moveGeneration';
import { GameState, Move } from './types';

export interface SearchOptions {
  weights?: HeuristicWeights;
  /** Checked before every sibling is expanded; cancellation throws. */
  cancellationToken?: CancellationToken;
}

export type SearchResult =
  | {
      readonly kind: 'move';
      readonly move: Move;
      readonly score: number;
      /** States reached below the root, for logging. */
      readonly nodesVisited: number;
    }
  | { readonly kind: 'no_legal_move' };

interface SearchContext {
  rootPlayer: PlayerId;
  weights: HeuristicWeights;
  token: CancellationToken | undefined;
  nodesVisited: number;
}

/**
 * Depth-bounded minimax over full turns.
 *
 * The active player's layers maximise and the opponent's minimise, always
 * scoring from the root player's perspective. Depth counts whole turns, so
 * depth 1 looks only at the states right after each candidate move.
 *
 * Ties keep the first move in generator order. Children are produced with
 * `applyMove`, which never modifies its input, so `state` is unchanged
 * whether the search completes, throws or is cancelled.
 */
export function chooseMove(state: GameState, depth: number, options: SearchOptions = {}): SearchResult {
  if (!Number.isInteger(depth) || depth < 1) {
    throw new InvalidState(
      EngineErrorCode.INTERNAL_ASSERTION_FAILED,
      `Search depth must be a positive integer, got ${depth}`,
      { depth },
      'HeuristicSearch'
    );
  }
  assertSearchRoot(state, 'HeuristicSearch');

  const ctx: SearchContext = {
    rootPlayer: state.currentPlayer,
    weights: options.weights ?? DEFAULT_HEURISTIC_WEIGHTS,
    token: options.cancellationToken,
    nodesVisited: 0,
  };

  let best: { move: Move; score: number } | null = null;
  for (const move of enumerateLegalMoves(state)) {
    ctx.token?.throwIfCanceled('heuristic search');
    const score = minimax(applyMove(state, move), depth - 1, ctx);
    if (best === null || score > best.score) {
      best = { move, score };
    }
  }

  if (best === null) {
    return { kind: 'no_legal_move' };
  }
  return { kind: 'move', move: best.move, score: best.score, nodesVisited: ctx.nodesVisited };
}

/**
 * Searches compare complete turns, so they only start from worker selection
 * in a live game.
 *
 * @throws RulesViolation STATE_GAME_ALREADY_OVER for a finished game, and
 * FSM_OUT_OF_PHASE during setup or in the middle of a turn
 */
export function assertSearchRoot(state: GameState, domain: string): void {
  if (isTerminalPhase(state.phase)) {
    throw new RulesViolation(
      EngineErrorCode.STATE_GAME_ALREADY_OVER,
      'Cannot search for a move in a finished game',
      { phase: state.phase.phase },
      domain
    );
  }
  if (state.phase.phase !== 'selecting_worker') {
    throw new RulesViolation(
      EngineErrorCode.FSM_OUT_OF_PHASE,
      `Cannot search for a move during ${state.phase.phase}`,
      { phase: state.phase.phase, currentPlayer: state.currentPlayer },
      domain
    );
  }
}

function minimax(state: GameState, depth: number, ctx: SearchContext): number {
  ctx.nodesVisited++;

  if (depth === 0 || isTerminalPhase(state.phase)) {
    return evaluateState(state, ctx.rootPlayer, ctx.weights);
  }

  const maximizing = state.currentPlayer === ctx.rootPlayer;
  let best = maximizing ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;

  for (const move of enumerateLegalMoves(state)) {
    ctx.token?.throwIfCanceled('heuristic search');
    const score = minimax(applyMove(state, move), depth - 1, ctx);
    best = maximizing ? Math.max(best, score) : Math.min(best, score);
  }

  return best;
}
