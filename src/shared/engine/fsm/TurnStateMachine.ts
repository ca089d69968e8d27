/**
 * TurnStateMachine - Finite State Machine for Santorini turn phases
 *
 * Every (phase, action) pairing is handled explicitly: either it is a legal
 * transition guarded by a validator, or it is rejected with FSM_OUT_OF_PHASE.
 * Terminal phases reject everything with STATE_GAME_ALREADY_OVER.
 *
 *   placement ──PLACE_WORKER×4──▶ selecting_worker
 *   selecting_worker ──SELECT_WORKER──▶ choosing_destination
 *   choosing_destination ──MOVE_WORKER──▶ choosing_build_site | won
 *   choosing_build_site ──BUILD──▶ selecting_worker (opponent) | no_legal_move
 *   any non-terminal ──RESIGN──▶ won (opponent)
 *
 * The transition is pure: a rejected action returns an error and the input
 * state object is left exactly as it was.
 *
 * @module TurnStateMachine
 */

import { EngineErrorCode, RulesViolation } from '../errors';
import { mutateBuild } from '../mutators/BuildMutator';
import { mutateMovement } from '../mutators/MovementMutator';
import { mutatePlacement } from '../mutators/PlacementMutator';
import { mutateResign, mutateSelection } from '../mutators/TurnMutator';
import type {
  ActionResult,
  BuildAction,
  ChoosingBuildSitePhase,
  ChoosingDestinationPhase,
  GameAction,
  GameState,
  MoveWorkerAction,
  PlaceWorkerAction,
  SelectWorkerAction,
  TerminalTurnState,
  TurnState,
  ValidationResult,
} from '../types';
import { validateBuild } from '../validators/BuildValidator';
import { validateMovement } from '../validators/MovementValidator';
import { validatePlacement } from '../validators/PlacementValidator';
import { validateSelection } from '../validators/SelectionValidator';

const DOMAIN = 'TurnStateMachine';

/** Which action type each live phase accepts (RESIGN is accepted everywhere). */
export const PHASE_ACTIONS = {
  placement: 'PLACE_WORKER',
  selecting_worker: 'SELECT_WORKER',
  choosing_destination: 'MOVE_WORKER',
  choosing_build_site: 'BUILD',
} as const;

export function isTerminalPhase(phase: TurnState): phase is TerminalTurnState {
  return phase.phase === 'won' || phase.phase === 'no_legal_move';
}

/**
 * Pure transition function - the heart of the FSM.
 */
export function transition(state: GameState, action: GameAction): ActionResult {
  const phase = state.phase;

  if (isTerminalPhase(phase)) {
    return reject(EngineErrorCode.STATE_GAME_ALREADY_OVER, 'The game is already over', state, action);
  }

  if (action.type === 'RESIGN') {
    return { ok: true, state: mutateResign(state, action.player) };
  }

  switch (phase.phase) {
    case 'placement':
      if (action.type !== 'PLACE_WORKER') break;
      return handlePlacement(state, action);

    case 'selecting_worker':
      if (action.type !== 'SELECT_WORKER') break;
      return handleSelection(state, action);

    case 'choosing_destination':
      if (action.type !== 'MOVE_WORKER') break;
      return handleMove(state, phase, action);

    case 'choosing_build_site':
      if (action.type !== 'BUILD') break;
      return handleBuild(state, phase, action);

    default:
      return assertNever(phase);
  }

  return reject(
    EngineErrorCode.FSM_OUT_OF_PHASE,
    `${action.type} is not allowed during ${phase.phase} (expected ${PHASE_ACTIONS[phase.phase]})`,
    state,
    action
  );
}

function handlePlacement(state: GameState, action: PlaceWorkerAction): ActionResult {
  return guarded(validatePlacement(state, action), state, action, () =>
    mutatePlacement(state, action)
  );
}

function handleSelection(state: GameState, action: SelectWorkerAction): ActionResult {
  return guarded(validateSelection(state, action), state, action, () =>
    mutateSelection(state, action)
  );
}

function handleMove(
  state: GameState,
  phase: ChoosingDestinationPhase,
  action: MoveWorkerAction
): ActionResult {
  return guarded(validateMovement(state, phase, action), state, action, () =>
    mutateMovement(state, phase, action)
  );
}

function handleBuild(
  state: GameState,
  phase: ChoosingBuildSitePhase,
  action: BuildAction
): ActionResult {
  return guarded(validateBuild(state, phase, action), state, action, () =>
    mutateBuild(state, phase, action)
  );
}

function guarded(
  validation: ValidationResult,
  state: GameState,
  action: GameAction,
  apply: () => GameState
): ActionResult {
  if (!validation.valid) {
    return reject(validation.code, validation.reason, state, action);
  }
  return { ok: true, state: apply() };
}

function reject(
  code: EngineErrorCode,
  message: string,
  state: GameState,
  action: GameAction
): ActionResult {
  return {
    ok: false,
    error: new RulesViolation(
      code,
      message,
      { phase: state.phase.phase, currentPlayer: state.currentPlayer, action },
      DOMAIN
    ),
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled turn phase: ${JSON.stringify(value)}`);
}
