// =============================================================================
// SANTORINI RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (terminal session, AI agents, arena script) import from this file
// only. Rules functions are pure: state in, state out.
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  Position,
  PlayerId,
  WorkerIndex,
  WorkerRef,
  Cell,
  TowerHeight,
  BoardState,
  WorkerPositions,
} from '../types/game';

export {
  BOARD_SIZE,
  WORKERS_PER_PLAYER,
  MAX_TOWER_HEIGHT,
  PLAYER_IDS,
  WORKER_INDICES,
  otherPlayer,
  isPlayerId,
  isWorkerIndex,
  positionToString,
  positionsEqual,
} from '../types/game';

export type {
  GameState,
  TurnState,
  TurnPhaseName,
  TerminalTurnState,
  VictoryReason,
  Move,
  GameAction,
  ActionType,
  PlaceWorkerAction,
  SelectWorkerAction,
  MoveWorkerAction,
  BuildAction,
  ResignAction,
  ValidationResult,
  ActionResult,
  GameOutcome,
  GameSnapshot,
} from './types';

// =============================================================================
// BOARD GEOMETRY
// =============================================================================

export {
  MOORE_DIRECTIONS,
  isValidPosition,
  getNeighbors,
  chebyshevDistance,
  isAdjacent,
  allPositions,
} from './core';

export {
  createEmptyBoard,
  getCell,
  heightAt,
  isCapped,
  getWorkerAt,
  isOccupied,
  buildAt,
  withCell,
  assertBoardInvariants,
  assertWorkerInvariants,
} from './board';

// =============================================================================
// STATE CONSTRUCTION & TRANSITIONS
// =============================================================================

export { createInitialGameState, createScenarioState } from './initialState';
export type { ScenarioOptions } from './initialState';

export { transition, isTerminalPhase, PHASE_ACTIONS } from './fsm';

export { GameEngine, applyAction, getValidActions, getLegalTargets } from './GameEngine';

export { getGameOutcome, isGameOver } from './victoryLogic';

// =============================================================================
// MOVE GENERATION
// =============================================================================

export {
  enumerateLegalMoves,
  getLegalMoves,
  getLegalDestinations,
  getLegalBuildSites,
  hasAnyLegalMove,
  getSelectableWorkers,
} from './moveGeneration';

export { applyMove, moveToActions } from './moveApplication';

// =============================================================================
// AI
// =============================================================================

export {
  evaluateState,
  evaluateStateBreakdown,
  effectiveHeight,
  getHeuristicWeights,
  isHeuristicProfileId,
  DEFAULT_HEURISTIC_WEIGHTS,
  HEURISTIC_WEIGHT_PROFILES,
  HEURISTIC_PROFILE_IDS,
  MAX_SCORE,
  MIN_SCORE,
} from './heuristicEvaluation';
export type {
  HeuristicWeights,
  HeuristicProfileId,
  EvaluationBreakdown,
} from './heuristicEvaluation';

export { chooseMove } from './heuristicSearch';
export type { SearchOptions, SearchResult } from './heuristicSearch';

export {
  MonteCarloTree,
  chooseMoveMcts,
  createTreePolicy,
  selectChild,
  simulatePlayout,
  findImmediateWin,
  DEFAULT_MCTS_BUDGET,
  DEFAULT_EXPLORATION,
  TREE_POLICY_IDS,
} from './mctsSearch';
export type {
  MctsNode,
  MctsResult,
  MctsSearchOptions,
  MonteCarloTreeOptions,
  NodeStats,
  TreePolicy,
  TreePolicyId,
} from './mctsSearch';

export { chooseRandomMove, chooseRandomPlacement } from './localAIMoveSelection';
export type { PlacementOptions } from './localAIMoveSelection';

// =============================================================================
// NOTATION
// =============================================================================

export { formatPosition, parsePosition, formatMove, parseMove, formatMoveList } from './notation';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineErrorCode,
  EngineError,
  RulesViolation,
  InvalidState,
  BoardConstraintViolation,
  isEngineError,
  isRulesViolation,
  isInvalidState,
  isBoardConstraintViolation,
  wrapEngineError,
} from './errors';
