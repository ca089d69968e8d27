import type {
  BoardState,
  PlayerId,
  Position,
  WorkerIndex,
  WorkerPositions,
  WorkerRef,
} from '../types/game';
import type { EngineErrorCode, RulesViolation } from './errors';

// Re-export types used in the engine interface
export type { BoardState, PlayerId, Position, WorkerIndex, WorkerPositions, WorkerRef };

// ═══════════════════════════════════════════════════════════════════════════
// TURN PHASES - Discriminated union with phase-specific context
// ═══════════════════════════════════════════════════════════════════════════

export type VictoryReason = 'reached_level_three' | 'resignation';

/** Setup: players alternate placing one worker each until four are down. */
export interface PlacementPhase {
  readonly phase: 'placement';
}

export interface SelectingWorkerPhase {
  readonly phase: 'selecting_worker';
}

export interface ChoosingDestinationPhase {
  readonly phase: 'choosing_destination';
  readonly worker: WorkerIndex;
}

export interface ChoosingBuildSitePhase {
  readonly phase: 'choosing_build_site';
  readonly worker: WorkerIndex;
  /** Where the worker stood before this turn's move. */
  readonly from: Position;
}

export interface WonPhase {
  readonly phase: 'won';
  readonly winner: PlayerId;
  readonly reason: VictoryReason;
}

/** `player` had to move but neither worker could; the opponent wins. */
export interface NoLegalMovePhase {
  readonly phase: 'no_legal_move';
  readonly player: PlayerId;
}

export type TurnState =
  | PlacementPhase
  | SelectingWorkerPhase
  | ChoosingDestinationPhase
  | ChoosingBuildSitePhase
  | WonPhase
  | NoLegalMovePhase;

export type TurnPhaseName = TurnState['phase'];

export type TerminalTurnState = WonPhase | NoLegalMovePhase;

// ═══════════════════════════════════════════════════════════════════════════
// GAME STATE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The single source of truth for a game. Every field is readonly and every
 * transition produces a new value, so search branches can share structure
 * without sharing mutation.
 */
export interface GameState {
  readonly board: BoardState;
  readonly workers: WorkerPositions;
  readonly currentPlayer: PlayerId;
  readonly phase: TurnState;
  readonly moveHistory: ReadonlyArray<Move>;
}

/**
 * One complete turn: worker selection, destination and build site. `build`
 * is null when the move wins by climbing onto a level-3 tower.
 */
export interface Move {
  readonly player: PlayerId;
  readonly worker: WorkerIndex;
  readonly from: Position;
  readonly to: Position;
  readonly build: Position | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Action Types
 * Every player interaction is one of these; a full turn is SELECT_WORKER,
 * MOVE_WORKER and (unless the move wins) BUILD.
 */
export type ActionType = 'PLACE_WORKER' | 'SELECT_WORKER' | 'MOVE_WORKER' | 'BUILD' | 'RESIGN';

export interface PlaceWorkerAction {
  readonly type: 'PLACE_WORKER';
  readonly position: Position;
}

export interface SelectWorkerAction {
  readonly type: 'SELECT_WORKER';
  readonly worker: WorkerRef;
}

export interface MoveWorkerAction {
  readonly type: 'MOVE_WORKER';
  readonly to: Position;
}

export interface BuildAction {
  readonly type: 'BUILD';
  readonly at: Position;
}

export interface ResignAction {
  readonly type: 'RESIGN';
  readonly player: PlayerId;
}

export type GameAction =
  | PlaceWorkerAction
  | SelectWorkerAction
  | MoveWorkerAction
  | BuildAction
  | ResignAction;

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

export type ValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: string; readonly code: EngineErrorCode };

export type ActionResult =
  | { readonly ok: true; readonly state: GameState }
  | { readonly ok: false; readonly error: RulesViolation };

export type GameOutcome =
  | { readonly isOver: false }
  | {
      readonly isOver: true;
      readonly winner: PlayerId;
      readonly loser: PlayerId;
      readonly reason: VictoryReason | 'no_legal_move';
    };

/**
 * Read-only view handed to presentation code. `legalTargets` lists what the
 * active player may pick in the current phase so a renderer can highlight it.
 */
export interface GameSnapshot {
  readonly board: BoardState;
  readonly workers: WorkerPositions;
  readonly currentPlayer: PlayerId;
  readonly phase: TurnState;
  readonly outcome: GameOutcome;
  readonly legalTargets: ReadonlyArray<Position>;
  readonly turnNumber: number;
}
