import { BuildAction, ChoosingBuildSitePhase, GameState, ValidationResult } from '../types';
import { checkBuildSite, getWorkerPosition } from './utils';

/**
 * The worker that just moved builds next to its new cell. The cell it left
 * is free again by now, so building there is legal.
 */
export function validateBuild(
  state: GameState,
  phase: ChoosingBuildSitePhase,
  action: BuildAction
): ValidationResult {
  const builder = getWorkerPosition(state.workers, state.currentPlayer, phase.worker);
  return checkBuildSite(state.board, state.workers, builder, action.at);
}
