import { otherPlayer } from '../types/game';
import { GameOutcome, GameState } from './types';

/**
 * Reads the outcome off a state's phase. Win detection itself happens in the
 * mutators (climbing to level 3, resignation) and when a turn begins (no
 * legal move); this is the single place hosts and the evaluator ask
 * "is it over, and who won".
 */
export function getGameOutcome(state: GameState): GameOutcome {
  const phase = state.phase;
  switch (phase.phase) {
    case 'won':
      return {
        isOver: true,
        winner: phase.winner,
        loser: otherPlayer(phase.winner),
        reason: phase.reason,
      };
    case 'no_legal_move':
      return {
        isOver: true,
        winner: otherPlayer(phase.player),
        loser: phase.player,
        reason: 'no_legal_move',
      };
    default:
      return { isOver: false };
  }
}

export function isGameOver(state: GameState): boolean {
  return getGameOutcome(state).isOver;
}
