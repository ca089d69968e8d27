import { MAX_TOWER_HEIGHT } from '../../types/game';
import { heightAt } from '../board';
import { ChoosingDestinationPhase, GameState, MoveWorkerAction } from '../types';
import { getWorkerPosition, withWorkerMoved } from '../validators/utils';

/**
 * Moves the selected worker. Stepping onto a level-3 tower ends the game at
 * once: the build step is skipped and the move is recorded without a build.
 */
export function mutateMovement(
  state: GameState,
  phase: ChoosingDestinationPhase,
  action: MoveWorkerAction
): GameState {
  const player = state.currentPlayer;
  const from = getWorkerPosition(state.workers, player, phase.worker);
  const to = { ...action.to };
  const workers = withWorkerMoved(state.workers, player, phase.worker, to);

  if (heightAt(state.board, to) === MAX_TOWER_HEIGHT) {
    return {
      ...state,
      workers,
      phase: { phase: 'won', winner: player, reason: 'reached_level_three' },
      moveHistory: [
        ...state.moveHistory,
        { player, worker: phase.worker, from, to, build: null },
      ],
    };
  }

  return {
    ...state,
    workers,
    phase: { phase: 'choosing_build_site', worker: phase.worker, from },
  };
}
