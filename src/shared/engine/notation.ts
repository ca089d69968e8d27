import { BOARD_SIZE, Position } from '../types/game';
import { getWorkerAt } from './board';
import { isValidPosition } from './core';
import { GameState, Move } from './types';

/**
 * Shared move-notation helpers.
 *
 * Columns are letters from `a` (x = 0) and rows are numbers from `1`
 * (y = 0), so the top-left cell is `a1`. A full turn is written
 * `from-to^build`, e.g. `a1-b2^c3`; a winning climb has no build and is
 * written `a1-b2!`.
 */

const FILE_BASE = 'a'.charCodeAt(0);

const MOVE_PATTERN = /^([a-z]\d+)-([a-z]\d+)(?:\^([a-z]\d+)|(!))$/;

export function formatPosition(pos: Position): string {
  return `${String.fromCharCode(FILE_BASE + pos.x)}${pos.y + 1}`;
}

/**
 * Parse `"c4"`-style coordinates. Returns null for malformed or off-board
 * input.
 */
export function parsePosition(text: string, boardSize: number = BOARD_SIZE): Position | null {
  const match = /^([a-z])(\d+)$/.exec(text.trim().toLowerCase());
  if (!match || !match[1] || !match[2]) {
    return null;
  }
  const pos = { x: match[1].charCodeAt(0) - FILE_BASE, y: Number(match[2]) - 1 };
  return isValidPosition(pos, boardSize) ? pos : null;
}

export function formatMove(move: Move): string {
  const head = `${formatPosition(move.from)}-${formatPosition(move.to)}`;
  return move.build ? `${head}^${formatPosition(move.build)}` : `${head}!`;
}

/**
 * Parse full-turn notation against `state`, resolving which worker stands
 * on the origin cell. Returns null when the text is malformed or no worker
 * of the active player is there. Legality is left to the rules engine.
 */
export function parseMove(text: string, state: GameState): Move | null {
  const match = MOVE_PATTERN.exec(text.trim().toLowerCase());
  if (!match || !match[1] || !match[2]) {
    return null;
  }

  const size = state.board.size;
  const from = parsePosition(match[1], size);
  const to = parsePosition(match[2], size);
  if (!from || !to) {
    return null;
  }

  let build: Position | null = null;
  if (match[3]) {
    build = parsePosition(match[3], size);
    if (!build) {
      return null;
    }
  }

  const worker = getWorkerAt(state.workers, from);
  if (!worker || worker.player !== state.currentPlayer) {
    return null;
  }

  return { player: worker.player, worker: worker.index, from, to, build };
}

/**
 * Render a move list as numbered notation lines for logs and tools.
 */
export function formatMoveList(moves: ReadonlyArray<Move>): string[] {
  return moves.map((m, idx) => `${idx + 1}. P${m.player}: ${formatMove(m)}`);
}
