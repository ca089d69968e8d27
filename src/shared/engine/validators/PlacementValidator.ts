import { WORKERS_PER_PLAYER, positionToString } from '../../types/game';
import { isOccupied } from '../board';
import { isValidPosition } from '../core';
import { EngineErrorCode } from '../errors';
import { GameState, PlaceWorkerAction, ValidationResult } from '../types';

/**
 * Setup placement only checks bounds and that the cell is free; movement and
 * build rules do not apply until every worker is on the board.
 */
export function validatePlacement(state: GameState, action: PlaceWorkerAction): ValidationResult {
  const code = EngineErrorCode.RULES_INVALID_PLACEMENT;

  if (state.workers[state.currentPlayer].length >= WORKERS_PER_PLAYER) {
    return { valid: false, reason: 'All of this player\'s workers are already placed', code };
  }

  if (!isValidPosition(action.position, state.board.size)) {
    return { valid: false, reason: 'Placement is off the board', code };
  }

  if (isOccupied(state.workers, action.position)) {
    return {
      valid: false,
      reason: `A worker already stands on ${positionToString(action.position)}`,
      code,
    };
  }

  return { valid: true };
}
