/**
 * Core value types shared by the Santorini rules engine, the search AI and
 * every host (terminal session, arena script, tests).
 *
 * Coordinates are column/row: `x` is the column (0 = left, rendered as `a`)
 * and `y` is the row (0 = top, rendered as `1`).
 */

export const BOARD_SIZE = 5;

/** Number of workers each player places during setup. */
export const WORKERS_PER_PLAYER = 2;

/** Tallest tower level a worker can stand on; building on it places a dome. */
export const MAX_TOWER_HEIGHT = 3;

export type PlayerId = 1 | 2;

export const PLAYER_IDS: readonly PlayerId[] = [1, 2];

export type WorkerIndex = 0 | 1;

export const WORKER_INDICES: readonly WorkerIndex[] = [0, 1];

export interface Position {
  x: number;
  y: number;
}

/** Identifies a worker through its owner and slot rather than a back-reference. */
export interface WorkerRef {
  player: PlayerId;
  index: WorkerIndex;
}

export type TowerHeight = 0 | 1 | 2 | 3;

export interface Cell {
  readonly height: TowerHeight;
  /** Dome present. Only valid at height 3; a capped cell never changes again. */
  readonly capped: boolean;
}

export interface BoardState {
  readonly size: number;
  /** Row-major: index = y * size + x. */
  readonly cells: ReadonlyArray<Cell>;
}

/**
 * Worker positions per player. During setup a player may own fewer than
 * two entries; afterwards each list always holds exactly two positions.
 */
export type WorkerPositions = Readonly<Record<PlayerId, ReadonlyArray<Position>>>;

export function otherPlayer(player: PlayerId): PlayerId {
  return player === 1 ? 2 : 1;
}

export function isPlayerId(value: number): value is PlayerId {
  return value === 1 || value === 2;
}

export function isWorkerIndex(value: number): value is WorkerIndex {
  return value === 0 || value === 1;
}

export function isTowerHeight(value: number): value is TowerHeight {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

export const positionToString = (pos: Position): string => `${pos.x},${pos.y}`;

export const positionsEqual = (a: Position, b: Position): boolean =>
  a.x === b.x && a.y === b.y;
