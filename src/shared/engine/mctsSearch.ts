import type { CancellationToken } from '../utils/cancellation';
import { LocalAIRng, pickRandom } from '../utils/rng';
import { PLAYER_IDS, PlayerId, otherPlayer, positionsEqual } from '../types/game';
import { EngineErrorCode, InvalidState } from './errors';
import { isTerminalPhase } from './fsm/TurnStateMachine';
import { assertSearchRoot } from './heuristicSearch';
import { applyMove } from './moveApplication';
import { enumerateLegalMoves, getLegalMoves } from './moveGeneration';
import { GameState, Move } from './types';
import { getGameOutcome } from './victoryLogic';

/**
 * Monte-Carlo tree search over full turns.
 *
 * Every node is scored by one random playout when it is created, and a
 * node's children are all created (and played out) the first time the node
 * is stepped through. A node's `score` is the running mean of the playout
 * results below it, in [-1, 1], from the side of the player whose turn led
 * to it. Parents see their children's scores negated.
 */

/** Selection steps per decision when the caller does not set one. */
export const DEFAULT_MCTS_BUDGET = 100;

/** Exploration constant for both tree policies. */
export const DEFAULT_EXPLORATION = Math.SQRT2;

export const TREE_POLICY_IDS = ['uct', 'puct'] as const;
export type TreePolicyId = (typeof TREE_POLICY_IDS)[number];

export interface NodeStats {
  readonly iterations: number;
  readonly score: number;
}

export interface MctsNode {
  readonly state: GameState;
  /** The turn that led here; null for the root of a fresh tree. */
  readonly move: Move | null;
  /** Player who played `move`; `score` is from this player's side. */
  readonly mover: PlayerId;
  children: MctsNode[] | null;
  iterations: number;
  score: number;
}

export interface TreePolicy {
  readonly id: TreePolicyId;
  /** Selection weight of `child` under a parent visited `parentIterations` times. */
  weight(parentIterations: number, child: NodeStats): number;
}

/** Maps a score in [-1, 1] onto [0, 1]. */
function rescale(score: number): number {
  return (1 + score) / 2;
}

/**
 * UCT adds `c * sqrt(ln N / n)` to the child's rescaled score; PUCT adds
 * `c * sqrt(N) / n`, which keeps exploring rarely visited children longer.
 */
export function createTreePolicy(
  id: TreePolicyId,
  exploration: number = DEFAULT_EXPLORATION
): TreePolicy {
  switch (id) {
    case 'uct':
      return {
        id,
        weight: (parentIterations, child) =>
          rescale(child.score) +
          exploration * Math.sqrt(Math.log(parentIterations) / child.iterations),
      };
    case 'puct':
      return {
        id,
        weight: (parentIterations, child) =>
          rescale(child.score) + (exploration * Math.sqrt(parentIterations)) / child.iterations,
      };
  }
}

/**
 * The child with the highest policy weight; the first one wins ties.
 */
export function selectChild<T extends NodeStats>(
  policy: TreePolicy,
  parentIterations: number,
  children: ReadonlyArray<T>
): T | undefined {
  let best: T | undefined;
  let bestWeight = Number.NEGATIVE_INFINITY;
  for (const child of children) {
    const weight = policy.weight(parentIterations, child);
    if (best === undefined || weight > bestWeight) {
      best = child;
      bestWeight = weight;
    }
  }
  return best;
}

/**
 * A turn that wins on the spot by climbing onto level 3, if the active
 * player has one.
 */
export function findImmediateWin(state: GameState): Move | undefined {
  for (const move of enumerateLegalMoves(state)) {
    if (move.build === null) {
      return move;
    }
  }
  return undefined;
}

/**
 * Plays `state` out to the end. Each turn takes a winning climb when one
 * exists and a uniformly random legal turn otherwise. Every turn either
 * builds or wins, and the board holds a bounded number of blocks, so a
 * playout always ends.
 *
 * @returns 1 when `mover` wins, -1 when the opponent does
 */
export function simulatePlayout(state: GameState, mover: PlayerId, rng: LocalAIRng): number {
  let current = state;
  for (;;) {
    const outcome = getGameOutcome(current);
    if (outcome.isOver) {
      return outcome.winner === mover ? 1 : -1;
    }

    const moves = getLegalMoves(current);
    const move = moves.find((candidate) => candidate.build === null) ?? pickRandom(moves, rng);
    if (!move) {
      // A player who cannot move loses, as at the start of a turn.
      return current.currentPlayer === mover ? -1 : 1;
    }
    current = applyMove(current, move);
  }
}

export type MctsResult =
  | {
      readonly kind: 'move';
      readonly move: Move;
      /** Mean playout result for the root player after this move. */
      readonly score: number;
      /** Iterations credited to the chosen child. */
      readonly visits: number;
      /** Iterations credited to the root. */
      readonly iterations: number;
    }
  | { readonly kind: 'no_legal_move' };

export interface MonteCarloTreeOptions {
  rng: LocalAIRng;
  policy?: TreePolicy;
}

interface Backup {
  /** Nodes created below the stepped node. */
  count: number;
  /** Sum of their playout results, from the stepped node's side. */
  delta: number;
}

/**
 * A search tree that can be kept between turns: `advanceTo` re-roots it on
 * the current position when that position was already explored.
 */
export class MonteCarloTree {
  private rootNode: MctsNode;
  private readonly rng: LocalAIRng;
  private readonly policy: TreePolicy;

  constructor(state: GameState, options: MonteCarloTreeOptions) {
    assertSearchRoot(state, 'MctsSearch');
    this.rng = options.rng;
    this.policy = options.policy ?? createTreePolicy('uct');
    this.rootNode = this.createRoot(state);
  }

  get root(): Readonly<MctsNode> {
    return this.rootNode;
  }

  /**
   * Runs `budget` selection steps from the root and picks the child with the
   * best mean score, first in generator order on ties. A winning climb is
   * returned at once without searching.
   */
  public search(budget: number, cancellationToken?: CancellationToken): MctsResult {
    if (!Number.isInteger(budget) || budget < 1) {
      throw new InvalidState(
        EngineErrorCode.INTERNAL_ASSERTION_FAILED,
        `MCTS budget must be a positive integer, got ${budget}`,
        { budget },
        'MctsSearch'
      );
    }
    assertSearchRoot(this.rootNode.state, 'MctsSearch');

    const win = findImmediateWin(this.rootNode.state);
    if (win) {
      return { kind: 'move', move: win, score: 1, visits: 0, iterations: this.rootNode.iterations };
    }

    for (let i = 0; i < budget; i++) {
      cancellationToken?.throwIfCanceled('mcts search');
      this.step(this.rootNode);
    }

    let best: MctsNode | undefined;
    for (const child of this.rootNode.children ?? []) {
      if (best === undefined || child.score > best.score) {
        best = child;
      }
    }
    if (!best || !best.move) {
      return { kind: 'no_legal_move' };
    }
    return {
      kind: 'move',
      move: best.move,
      score: best.score,
      visits: best.iterations,
      iterations: this.rootNode.iterations,
    };
  }

  /**
   * Moves the root to `state`. Looks at the current root, its children and
   * its grandchildren (one full exchange of turns); when none matches, the
   * tree starts over from `state`.
   *
   * @returns whether an explored subtree was kept
   */
  public advanceTo(state: GameState): boolean {
    const candidates: MctsNode[] = [this.rootNode];
    for (const child of this.rootNode.children ?? []) {
      candidates.push(child, ...(child.children ?? []));
    }

    const match = candidates.find((node) => samePosition(node.state, state));
    this.rootNode = match ?? this.createRoot(state);
    return match !== undefined;
  }

  private createRoot(state: GameState): MctsNode {
    return this.createNode(state, null, otherPlayer(state.currentPlayer));
  }

  private createNode(state: GameState, move: Move | null, mover: PlayerId): MctsNode {
    return {
      state,
      move,
      mover,
      children: null,
      iterations: 1,
      score: simulatePlayout(state, mover, this.rng),
    };
  }

  private expand(node: MctsNode): Backup {
    const children: MctsNode[] = [];
    let delta = 0;
    if (!isTerminalPhase(node.state.phase)) {
      const player = node.state.currentPlayer;
      for (const move of enumerateLegalMoves(node.state)) {
        const child = this.createNode(applyMove(node.state, move), move, player);
        delta -= child.score;
        children.push(child);
      }
    }

    const total = node.score * node.iterations + delta;
    node.iterations += children.length;
    node.score = total / node.iterations;
    node.children = children;
    return { count: children.length, delta };
  }

  private step(node: MctsNode): Backup {
    if (node.children === null) {
      return this.expand(node);
    }
    const child = selectChild(this.policy, node.iterations, node.children);
    if (!child) {
      return { count: 0, delta: 0 };
    }

    const { count, delta } = this.step(child);
    const total = node.score * node.iterations - delta;
    node.iterations += count;
    node.score = total / node.iterations;
    return { count, delta: -delta };
  }
}

export interface MctsSearchOptions extends MonteCarloTreeOptions {
  budget?: number;
  cancellationToken?: CancellationToken;
}

/**
 * One-shot search from `state` with a fresh tree.
 */
export function chooseMoveMcts(state: GameState, options: MctsSearchOptions): MctsResult {
  return new MonteCarloTree(state, options).search(
    options.budget ?? DEFAULT_MCTS_BUDGET,
    options.cancellationToken
  );
}

function samePosition(a: GameState, b: GameState): boolean {
  if (a.currentPlayer !== b.currentPlayer || a.phase.phase !== b.phase.phase) {
    return false;
  }
  if (a.board.size !== b.board.size) {
    return false;
  }
  const sameCells = a.board.cells.every((cell, i) => {
    const other = b.board.cells[i];
    return other !== undefined && other.height === cell.height && other.capped === cell.capped;
  });
  return (
    sameCells &&
    PLAYER_IDS.every((player) => {
      const mine = a.workers[player];
      const theirs = b.workers[player];
      return (
        mine.length === theirs.length &&
        mine.every((pos, i) => {
          const other = theirs[i];
          return other !== undefined && positionsEqual(pos, other);
        })
      );
    })
  );
}
