/**
 * FSM Module - Finite State Machine for Santorini turn phases
 */

export { transition, isTerminalPhase, PHASE_ACTIONS } from './TurnStateMachine';

export type {
  TurnState,
  TurnPhaseName,
  TerminalTurnState,
  PlacementPhase,
  SelectingWorkerPhase,
  ChoosingDestinationPhase,
  ChoosingBuildSitePhase,
  WonPhase,
  NoLegalMovePhase,
  VictoryReason,
} from '../types';
