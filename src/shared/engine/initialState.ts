import { BOARD_SIZE, PlayerId, Position } from '../types/game';
import { assertBoardInvariants, assertWorkerInvariants, createEmptyBoard } from './board';
import { beginTurn } from './mutators/TurnMutator';
import { BoardState, GameState } from './types';

/**
 * Creates a pristine GameState at the start of setup: empty board, no
 * workers, player 1 to place first.
 */
export function createInitialGameState(boardSize: number = BOARD_SIZE): GameState {
  return {
    board: createEmptyBoard(boardSize),
    workers: { 1: [], 2: [] },
    currentPlayer: 1,
    phase: { phase: 'placement' },
    moveHistory: [],
  };
}

export interface ScenarioOptions {
  board?: BoardState;
  workers: Readonly<Record<PlayerId, readonly [Position, Position]>>;
  currentPlayer?: PlayerId;
}

/**
 * Builds a mid-game state with every worker already placed, skipping setup.
 * Used by tests, tools and puzzles. The state goes through the same turn-start
 * check as regular play, so a player with no legal move is reported as such.
 */
export function createScenarioState(options: ScenarioOptions): GameState {
  const board = options.board ?? createEmptyBoard();
  const workers = {
    1: options.workers[1].map((pos) => ({ ...pos })),
    2: options.workers[2].map((pos) => ({ ...pos })),
  };
  assertBoardInvariants(board);
  assertWorkerInvariants(workers, board.size);

  const base: GameState = {
    board,
    workers,
    currentPlayer: options.currentPlayer ?? 1,
    phase: { phase: 'selecting_worker' },
    moveHistory: [],
  };
  return beginTurn(base, base.currentPlayer);
}
