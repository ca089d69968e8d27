import { EngineErrorCode } from '../errors';
import { hasLegalDestination } from '../moveGeneration';
import { GameState, SelectWorkerAction, ValidationResult } from '../types';

export function validateSelection(state: GameState, action: SelectWorkerAction): ValidationResult {
  const code = EngineErrorCode.RULES_INVALID_SELECTION;
  const { player, index } = action.worker;

  if (player !== state.currentPlayer) {
    return { valid: false, reason: `Worker belongs to player ${player}, not the active player`, code };
  }

  if (!state.workers[player][index]) {
    return { valid: false, reason: `Player ${player} has no worker ${index}`, code };
  }

  if (!hasLegalDestination(state, player, index)) {
    return { valid: false, reason: 'Selected worker has no legal destination', code };
  }

  return { valid: true };
}
