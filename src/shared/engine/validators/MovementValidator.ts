import { ChoosingDestinationPhase, GameState, MoveWorkerAction, ValidationResult } from '../types';
import { checkDestination, getWorkerPosition } from './utils';

/**
 * Validates the destination for the worker chosen in the selection step.
 * Adjacency, occupancy, domes and the one-level climb limit are checked in
 * `checkDestination`.
 */
export function validateMovement(
  state: GameState,
  phase: ChoosingDestinationPhase,
  action: MoveWorkerAction
): ValidationResult {
  const from = getWorkerPosition(state.workers, state.currentPlayer, phase.worker);
  return checkDestination(state.board, state.workers, from, action.to);
}
