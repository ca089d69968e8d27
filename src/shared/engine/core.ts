import { BOARD_SIZE, Position } from '../types/game';

/**
 * Board geometry helpers shared by validators, move generation and the
 * evaluation function. Adjacency is computed from coordinate deltas rather
 * than stored, so these functions are pure and allocation-light.
 */

/**
 * A simple direction vector in board-local coordinates.
 */
export interface Direction {
  x: number;
  y: number;
}

/**
 * Canonical 8-direction Moore neighbourhood. The order here is the order in
 * which neighbours, destinations and build sites are enumerated.
 */
export const MOORE_DIRECTIONS: readonly Direction[] = [
  { x: 1, y: 0 }, // E
  { x: 1, y: 1 }, // SE
  { x: 0, y: 1 }, // S
  { x: -1, y: 1 }, // SW
  { x: -1, y: 0 }, // W
  { x: -1, y: -1 }, // NW
  { x: 0, y: -1 }, // N
  { x: 1, y: -1 }, // NE
];

export function isValidPosition(pos: Position, boardSize: number = BOARD_SIZE): boolean {
  return (
    Number.isInteger(pos.x) &&
    Number.isInteger(pos.y) &&
    pos.x >= 0 &&
    pos.x < boardSize &&
    pos.y >= 0 &&
    pos.y < boardSize
  );
}

/**
 * The up-to-eight cells adjacent to `pos`, clipped to the board.
 */
export function getNeighbors(pos: Position, boardSize: number = BOARD_SIZE): Position[] {
  const neighbors: Position[] = [];
  for (const dir of MOORE_DIRECTIONS) {
    const next = { x: pos.x + dir.x, y: pos.y + dir.y };
    if (isValidPosition(next, boardSize)) {
      neighbors.push(next);
    }
  }
  return neighbors;
}

/**
 * L∞ distance; two distinct cells are adjacent exactly when this is 1.
 */
export function chebyshevDistance(a: Position, b: Position): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function isAdjacent(a: Position, b: Position): boolean {
  return chebyshevDistance(a, b) === 1;
}

/**
 * Row-major index into BoardState.cells. Callers must bounds-check first.
 */
export function cellIndex(pos: Position, boardSize: number = BOARD_SIZE): number {
  return pos.y * boardSize + pos.x;
}

/**
 * All positions on the board in row-major order.
 */
export function allPositions(boardSize: number = BOARD_SIZE): Position[] {
  const positions: Position[] = [];
  for (let y = 0; y < boardSize; y++) {
    for (let x = 0; x < boardSize; x++) {
      positions.push({ x, y });
    }
  }
  return positions;
}
