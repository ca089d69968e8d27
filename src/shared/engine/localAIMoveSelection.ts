import { Position } from '../types/game';
import { isOccupied } from './board';
import { allPositions } from './core';
import { getLegalMoves } from './moveGeneration';
import { GameState, Move } from './types';
import { LocalAIRng, pickRandom } from '../utils/rng';

/**
 * Local move-selection policies that need no search: the random agent's
 * move choice and the setup placement used by every AI agent.
 *
 * These helpers are side-effect free apart from drawing from `rng`, so a
 * seeded RNG makes whole games reproducible.
 */

export interface PlacementOptions {
  /**
   * Restrict placement to cells at least one step from every edge. The
   * heuristic AI places this way; the random AI uses the whole board.
   */
  interiorOnly?: boolean;
}

/**
 * Uniform choice among all legal moves for the active player, or null when
 * there are none.
 */
export function chooseRandomMove(state: GameState, rng: LocalAIRng): Move | null {
  return pickRandom(getLegalMoves(state), rng) ?? null;
}

/**
 * Picks a free cell for the next worker during setup. Returns null outside
 * the placement phase or when no candidate cell is free.
 */
export function chooseRandomPlacement(
  state: GameState,
  rng: LocalAIRng,
  options: PlacementOptions = {}
): Position | null {
  if (state.phase.phase !== 'placement') {
    return null;
  }

  const size = state.board.size;
  const candidates = allPositions(size).filter(
    (pos) => !isOccupied(state.workers, pos) && (!options.interiorOnly || isInterior(pos, size))
  );
  return pickRandom(candidates, rng) ?? null;
}

function isInterior(pos: Position, size: number): boolean {
  return pos.x > 0 && pos.y > 0 && pos.x < size - 1 && pos.y < size - 1;
}
