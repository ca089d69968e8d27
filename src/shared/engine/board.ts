import {
  BOARD_SIZE,
  BoardState,
  Cell,
  MAX_TOWER_HEIGHT,
  PLAYER_IDS,
  PlayerId,
  Position,
  WorkerPositions,
  WorkerRef,
  isTowerHeight,
  isWorkerIndex,
  positionToString,
  positionsEqual,
} from '../types/game';
import { cellIndex, isValidPosition } from './core';
import {
  BoardConstraintViolation,
  EngineErrorCode,
  InvalidState,
} from './errors';

/**
 * Board model: pure queries over tower heights, domes and worker occupancy,
 * plus the single restricted mutator (`buildAt`) used by the build mutator.
 *
 * Occupancy is derived from the worker table instead of being duplicated on
 * each cell, so there is exactly one place a worker position lives.
 */

const EMPTY_CELL: Cell = { height: 0, capped: false };

export function createEmptyBoard(size: number = BOARD_SIZE): BoardState {
  return {
    size,
    cells: Array.from({ length: size * size }, () => EMPTY_CELL),
  };
}

export function getCell(board: BoardState, pos: Position): Cell {
  const cell = isValidPosition(pos, board.size) ? board.cells[cellIndex(pos, board.size)] : undefined;
  if (!cell) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_POSITION,
      `Position ${positionToString(pos)} is off the board`,
      { position: pos, size: board.size }
    );
  }
  return cell;
}

export function heightAt(board: BoardState, pos: Position): number {
  return getCell(board, pos).height;
}

export function isCapped(board: BoardState, pos: Position): boolean {
  return getCell(board, pos).capped;
}

export function getWorkerAt(workers: WorkerPositions, pos: Position): WorkerRef | null {
  for (const player of PLAYER_IDS) {
    const positions = workers[player];
    for (let i = 0; i < positions.length; i++) {
      const workerPos = positions[i];
      if (workerPos && positionsEqual(workerPos, pos) && isWorkerIndex(i)) {
        return { player, index: i };
      }
    }
  }
  return null;
}

export function isOccupied(workers: WorkerPositions, pos: Position): boolean {
  return getWorkerAt(workers, pos) !== null;
}

/**
 * Raise the tower at `pos` by one level, or place a dome on a level-3 tower.
 * Returns a new BoardState; the input board is never modified.
 */
export function buildAt(board: BoardState, pos: Position): BoardState {
  const cell = getCell(board, pos);
  if (cell.capped) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_CELL_CAPPED,
      `Cannot build on the dome at ${positionToString(pos)}`,
      { position: pos }
    );
  }

  const next: Cell =
    cell.height < MAX_TOWER_HEIGHT
      ? { height: nextHeight(cell.height), capped: false }
      : { height: cell.height, capped: true };

  const cells = board.cells.slice();
  cells[cellIndex(pos, board.size)] = next;
  return { ...board, cells };
}

function nextHeight(height: number): Cell['height'] {
  const raised = height + 1;
  if (!isTowerHeight(raised)) {
    throw new InvalidState(
      EngineErrorCode.STATE_INVARIANT_BROKEN,
      `Tower height ${raised} is out of range`,
      { height }
    );
  }
  return raised;
}

/**
 * Returns a copy of `board` with the given cell replaced. Used to set up
 * fixtures and scenarios; game play only ever goes through `buildAt`.
 */
export function withCell(board: BoardState, pos: Position, cell: Cell): BoardState {
  getCell(board, pos);
  if (cell.capped && cell.height !== MAX_TOWER_HEIGHT) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_CELL_CAPPED,
      'A dome can only sit on a level-3 tower',
      { position: pos, cell }
    );
  }
  const cells = board.cells.slice();
  cells[cellIndex(pos, board.size)] = cell;
  return { ...board, cells };
}

/**
 * Throws InvalidState when a cell holds an impossible height or a dome on a
 * tower below level 3.
 */
export function assertBoardInvariants(board: BoardState): void {
  if (board.cells.length !== board.size * board.size) {
    throw new InvalidState(EngineErrorCode.STATE_INVARIANT_BROKEN, 'Board has the wrong number of cells', {
      size: board.size,
      cells: board.cells.length,
    });
  }
  board.cells.forEach((cell, index) => {
    if (!isTowerHeight(cell.height) || (cell.capped && cell.height !== MAX_TOWER_HEIGHT)) {
      throw new InvalidState(EngineErrorCode.STATE_INVARIANT_BROKEN, 'Cell violates height/dome invariant', {
        index,
        cell,
      });
    }
  });
}

/**
 * Throws InvalidState when two workers share a cell or a worker is off-board.
 */
export function assertWorkerInvariants(workers: WorkerPositions, boardSize: number = BOARD_SIZE): void {
  const seen = new Set<string>();
  for (const player of PLAYER_IDS) {
    const positions = workers[player];
    if (positions.length > 2) {
      throw new InvalidState(EngineErrorCode.STATE_INVARIANT_BROKEN, 'Player owns more than two workers', {
        player,
        count: positions.length,
      });
    }
    for (const pos of positions) {
      const key = positionToString(pos);
      if (!isValidPosition(pos, boardSize) || seen.has(key)) {
        throw new InvalidState(EngineErrorCode.STATE_INVARIANT_BROKEN, 'Worker off-board or sharing a cell', {
          player,
          position: pos,
        });
      }
      seen.add(key);
    }
  }
}

export function totalWorkers(workers: WorkerPositions): number {
  return PLAYER_IDS.reduce((sum, player: PlayerId) => sum + workers[player].length, 0);
}
