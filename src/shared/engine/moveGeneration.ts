import {
  MAX_TOWER_HEIGHT,
  PlayerId,
  Position,
  WORKER_INDICES,
  WorkerIndex,
} from '../types/game';
import { getCell } from './board';
import { getNeighbors } from './core';
import { GameState, Move } from './types';
import {
  getWorkerPosition,
  isLegalBuildSite,
  isLegalDestination,
  withWorkerMoved,
} from './validators/utils';

/**
 * Move generation: enumerates complete legal turns (worker, destination,
 * build site) for a player. Results are recomputed from the given state on
 * every call; nothing is cached between queries.
 *
 * Order: worker 0 before worker 1, then destinations and build sites in
 * MOORE_DIRECTIONS order. Callers must not attach meaning to the order
 * beyond search tie-breaking being stable for a given state.
 */

export function getLegalDestinations(
  state: GameState,
  player: PlayerId,
  worker: WorkerIndex
): Position[] {
  const from = state.workers[player][worker];
  if (!from) {
    return [];
  }
  return getNeighbors(from, state.board.size).filter((to) => isLegalDestination(state, from, to));
}

/**
 * Build sites available after `worker` moves from `from` to `to`.
 */
export function getLegalBuildSites(
  state: GameState,
  player: PlayerId,
  worker: WorkerIndex,
  to: Position
): Position[] {
  const workersAfterMove = withWorkerMoved(state.workers, player, worker, to);
  return getNeighbors(to, state.board.size).filter((at) =>
    isLegalBuildSite(state.board, workersAfterMove, to, at)
  );
}

/**
 * Lazily yields every legal full turn for `player`. A move onto a level-3
 * tower wins immediately and is yielded once with `build: null`.
 */
export function* enumerateLegalMoves(
  state: GameState,
  player: PlayerId = state.currentPlayer
): Generator<Move> {
  for (const worker of WORKER_INDICES) {
    if (!state.workers[player][worker]) {
      continue;
    }
    const from = getWorkerPosition(state.workers, player, worker);

    for (const to of getLegalDestinations(state, player, worker)) {
      if (getCell(state.board, to).height === MAX_TOWER_HEIGHT) {
        yield { player, worker, from, to, build: null };
        continue;
      }
      for (const build of getLegalBuildSites(state, player, worker, to)) {
        yield { player, worker, from, to, build };
      }
    }
  }
}

export function getLegalMoves(state: GameState, player: PlayerId = state.currentPlayer): Move[] {
  return Array.from(enumerateLegalMoves(state, player));
}

export function hasLegalDestination(state: GameState, player: PlayerId, worker: WorkerIndex): boolean {
  return getLegalDestinations(state, player, worker).length > 0;
}

/**
 * True when either worker can step somewhere. After any legal step the cell
 * just vacated is a legal build site, so a destination always implies a
 * complete move.
 */
export function hasAnyLegalMove(state: GameState, player: PlayerId): boolean {
  return WORKER_INDICES.some((worker) => hasLegalDestination(state, player, worker));
}

/**
 * Workers of `player` that have at least one legal destination.
 */
export function getSelectableWorkers(state: GameState, player: PlayerId): WorkerIndex[] {
  return WORKER_INDICES.filter((worker) => hasLegalDestination(state, player, worker));
}
