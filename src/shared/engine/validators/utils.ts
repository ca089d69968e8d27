import {
  BoardState,
  PlayerId,
  Position,
  WorkerIndex,
  WorkerPositions,
  positionToString,
} from '../../types/game';
import { getCell, isOccupied } from '../board';
import { chebyshevDistance, isValidPosition } from '../core';
import { EngineErrorCode, InvalidState } from '../errors';
import { GameState, ValidationResult } from '../types';

/**
 * Movement and build legality checks shared by the validators (which report
 * a reason) and the move generator (which only needs a yes/no).
 */

const VALID: ValidationResult = { valid: true };

export function getWorkerPosition(
  workers: WorkerPositions,
  player: PlayerId,
  index: WorkerIndex
): Position {
  const pos = workers[player][index];
  if (!pos) {
    throw new InvalidState(
      EngineErrorCode.STATE_WORKER_NOT_FOUND,
      `Player ${player} has no worker ${index}`,
      { player, index }
    );
  }
  return pos;
}

/**
 * Returns the worker table with one worker relocated.
 */
export function withWorkerMoved(
  workers: WorkerPositions,
  player: PlayerId,
  index: WorkerIndex,
  to: Position
): WorkerPositions {
  const moved = workers[player].map((pos, i) => (i === index ? to : pos));
  return player === 1 ? { 1: moved, 2: workers[2] } : { 1: workers[1], 2: moved };
}

/**
 * Can a worker standing on `from` step onto `to`?
 *
 * The destination must be on the board, adjacent, free of workers and domes,
 * and at most one level higher than `from`. Stepping down any number of
 * levels is allowed.
 */
export function checkDestination(
  board: BoardState,
  workers: WorkerPositions,
  from: Position,
  to: Position
): ValidationResult {
  const code = EngineErrorCode.RULES_INVALID_DESTINATION;

  if (!isValidPosition(to, board.size)) {
    return { valid: false, reason: 'Destination is off the board', code };
  }
  if (chebyshevDistance(from, to) !== 1) {
    return { valid: false, reason: 'Destination is not adjacent to the worker', code };
  }
  if (isOccupied(workers, to)) {
    return { valid: false, reason: `Destination ${positionToString(to)} is occupied`, code };
  }

  const target = getCell(board, to);
  if (target.capped) {
    return { valid: false, reason: 'Destination is domed', code };
  }
  if (target.height - getCell(board, from).height > 1) {
    return { valid: false, reason: 'Cannot climb more than one level', code };
  }

  return VALID;
}

/**
 * Can a worker standing on `builder` build on `at`? `workers` must already
 * reflect this turn's move so the vacated cell counts as free.
 */
export function checkBuildSite(
  board: BoardState,
  workers: WorkerPositions,
  builder: Position,
  at: Position
): ValidationResult {
  const code = EngineErrorCode.RULES_INVALID_BUILD;

  if (!isValidPosition(at, board.size)) {
    return { valid: false, reason: 'Build site is off the board', code };
  }
  if (chebyshevDistance(builder, at) !== 1) {
    return { valid: false, reason: 'Build site is not adjacent to the worker', code };
  }
  if (isOccupied(workers, at)) {
    return { valid: false, reason: `Build site ${positionToString(at)} is occupied`, code };
  }
  if (getCell(board, at).capped) {
    return { valid: false, reason: 'Build site is already domed', code };
  }

  return VALID;
}

export function isLegalDestination(
  state: GameState,
  from: Position,
  to: Position
): boolean {
  return checkDestination(state.board, state.workers, from, to).valid;
}

export function isLegalBuildSite(
  board: BoardState,
  workers: WorkerPositions,
  builder: Position,
  at: Position
): boolean {
  return checkBuildSite(board, workers, builder, at).valid;
}
