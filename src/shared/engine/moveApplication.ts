import { EngineErrorCode, RulesViolation } from './errors';
import { transition } from './fsm/TurnStateMachine';
import { GameAction, GameState, Move } from './types';

/**
 * Expands a full-turn Move into the sub-actions the rules engine processes.
 */
export function moveToActions(move: Move): GameAction[] {
  const actions: GameAction[] = [
    { type: 'SELECT_WORKER', worker: { player: move.player, index: move.worker } },
    { type: 'MOVE_WORKER', to: move.to },
  ];
  if (move.build) {
    actions.push({ type: 'BUILD', at: move.build });
  }
  return actions;
}

/**
 * Applies a complete turn through the state machine and returns the
 * resulting state. The input state is not modified, which is what lets the
 * search explore sibling branches from the same parent.
 *
 * Throws RulesViolation if any step is rejected; moves from the generator
 * never are.
 */
export function applyMove(state: GameState, move: Move): GameState {
  if (move.player !== state.currentPlayer) {
    throw new RulesViolation(
      EngineErrorCode.RULES_INVALID_SELECTION,
      `Move is for player ${move.player} but player ${state.currentPlayer} is to move`,
      { move },
      'MoveApplication'
    );
  }

  let current = state;
  for (const action of moveToActions(move)) {
    const result = transition(current, action);
    if (!result.ok) {
      throw result.error;
    }
    current = result.state;
  }
  return current;
}
