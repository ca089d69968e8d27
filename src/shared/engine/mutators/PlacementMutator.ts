import { PLAYER_IDS, WORKERS_PER_PLAYER, otherPlayer } from '../../types/game';
import { totalWorkers } from '../board';
import { GameState, PlaceWorkerAction } from '../types';
import { beginTurn } from './TurnMutator';

/**
 * Places the active player's next worker. Players alternate one worker at a
 * time; once all four are down, player 1 takes the first turn.
 */
export function mutatePlacement(state: GameState, action: PlaceWorkerAction): GameState {
  const player = state.currentPlayer;
  const placed = [...state.workers[player], { ...action.position }];
  const workers = player === 1 ? { 1: placed, 2: state.workers[2] } : { 1: state.workers[1], 2: placed };

  const next: GameState = { ...state, workers };

  if (totalWorkers(workers) < WORKERS_PER_PLAYER * PLAYER_IDS.length) {
    return { ...next, currentPlayer: otherPlayer(player) };
  }

  return beginTurn(next, 1);
}
