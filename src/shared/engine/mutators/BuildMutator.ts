import { buildAt } from '../board';
import { BuildAction, ChoosingBuildSitePhase, GameState } from '../types';
import { getWorkerPosition } from '../validators/utils';
import { mutateTurnEnd } from './TurnMutator';

export function mutateBuild(
  state: GameState,
  phase: ChoosingBuildSitePhase,
  action: BuildAction
): GameState {
  const player = state.currentPlayer;
  const at = { ...action.at };
  const built: GameState = { ...state, board: buildAt(state.board, at) };

  return mutateTurnEnd(built, {
    player,
    worker: phase.worker,
    from: phase.from,
    to: getWorkerPosition(state.workers, player, phase.worker),
    build: at,
  });
}
