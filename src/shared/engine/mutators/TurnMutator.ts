import { PlayerId, otherPlayer } from '../../types/game';
import { hasAnyLegalMove } from '../moveGeneration';
import { GameState, Move, SelectWorkerAction } from '../types';

/**
 * Hands the turn to `player`. A player who cannot move either worker loses
 * on the spot instead of entering worker selection.
 */
export function beginTurn(state: GameState, player: PlayerId): GameState {
  const next: GameState = { ...state, currentPlayer: player, phase: { phase: 'selecting_worker' } };
  if (!hasAnyLegalMove(next, player)) {
    return { ...next, phase: { phase: 'no_legal_move', player } };
  }
  return next;
}

export function mutateSelection(state: GameState, action: SelectWorkerAction): GameState {
  return {
    ...state,
    phase: { phase: 'choosing_destination', worker: action.worker.index },
  };
}

/**
 * Records the completed turn and passes play to the opponent.
 */
export function mutateTurnEnd(state: GameState, move: Move): GameState {
  return beginTurn(
    { ...state, moveHistory: [...state.moveHistory, move] },
    otherPlayer(state.currentPlayer)
  );
}

export function mutateResign(state: GameState, player: PlayerId): GameState {
  return {
    ...state,
    phase: { phase: 'won', winner: otherPlayer(player), reason: 'resignation' },
  };
}
