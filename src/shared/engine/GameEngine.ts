import { Position } from '../types/game';
import { isOccupied } from './board';
import { allPositions } from './core';
import { transition } from './fsm/TurnStateMachine';
import { createInitialGameState } from './initialState';
import {
  getLegalBuildSites,
  getLegalDestinations,
  getSelectableWorkers,
} from './moveGeneration';
import { ActionResult, GameAction, GameOutcome, GameSnapshot, GameState } from './types';
import { getWorkerPosition } from './validators/utils';
import { getGameOutcome } from './victoryLogic';

/**
 * Applies one action to a state. Alias of the FSM transition, exported under
 * the name hosts and tools use.
 */
export function applyAction(state: GameState, action: GameAction): ActionResult {
  return transition(state, action);
}

/**
 * Host-facing wrapper around the current game state.
 *
 * Rejected actions leave the held state untouched; hosts render from
 * `getSnapshot()` and never reach into engine internals.
 */
export class GameEngine {
  private state: GameState;

  constructor(initialState: GameState = createInitialGameState()) {
    this.state = initialState;
  }

  public getGameState(): GameState {
    return this.state;
  }

  public processAction(action: GameAction): ActionResult {
    const result = transition(this.state, action);
    if (result.ok) {
      this.state = result.state;
    }
    return result;
  }

  public getOutcome(): GameOutcome {
    return getGameOutcome(this.state);
  }

  public getSnapshot(): GameSnapshot {
    const state = this.state;
    return {
      board: state.board,
      workers: state.workers,
      currentPlayer: state.currentPlayer,
      phase: state.phase,
      outcome: getGameOutcome(state),
      legalTargets: getLegalTargets(state),
      turnNumber: state.moveHistory.length + 1,
    };
  }

  /**
   * Every action the active player may submit in the current phase, RESIGN
   * excepted. Empty once the game is over.
   */
  public getValidActions(): GameAction[] {
    return getValidActions(this.state);
  }
}

export function getValidActions(state: GameState): GameAction[] {
  const phase = state.phase;
  const player = state.currentPlayer;

  switch (phase.phase) {
    case 'placement':
      return getLegalTargets(state).map((position): GameAction => ({ type: 'PLACE_WORKER', position }));
    case 'selecting_worker':
      return getSelectableWorkers(state, player).map((index): GameAction => ({
        type: 'SELECT_WORKER',
        worker: { player, index },
      }));
    case 'choosing_destination':
      return getLegalDestinations(state, player, phase.worker).map((to): GameAction => ({
        type: 'MOVE_WORKER',
        to,
      }));
    case 'choosing_build_site':
      return getLegalTargets(state).map((at): GameAction => ({ type: 'BUILD', at }));
    case 'won':
    case 'no_legal_move':
      return [];
  }
}

/**
 * Cells the active player may pick in the current phase: empty cells during
 * setup, selectable workers, legal destinations or legal build sites.
 */
export function getLegalTargets(state: GameState): Position[] {
  const phase = state.phase;
  const player = state.currentPlayer;

  switch (phase.phase) {
    case 'placement':
      return allPositions(state.board.size).filter((pos) => !isOccupied(state.workers, pos));
    case 'selecting_worker':
      return getSelectableWorkers(state, player).map((index) =>
        getWorkerPosition(state.workers, player, index)
      );
    case 'choosing_destination':
      return getLegalDestinations(state, player, phase.worker);
    case 'choosing_build_site': {
      const at = getWorkerPosition(state.workers, player, phase.worker);
      return getLegalBuildSites(state, player, phase.worker, at);
    }
    case 'won':
    case 'no_legal_move':
      return [];
  }
}
