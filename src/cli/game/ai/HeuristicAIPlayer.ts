import {
  DEFAULT_HEURISTIC_WEIGHTS,
  GameState,
  HeuristicWeights,
  Move,
  PlayerId,
  Position,
  chooseMove,
  chooseRandomPlacement,
} from '../../../shared/engine';
import { LocalAIRng } from '../../../shared/utils/rng';
import { logger } from '../../utils/logger';
import { AIConfig, AIPlayer } from './AIPlayer';

export interface HeuristicAIConfig extends AIConfig {
  depth: number;
  weights?: HeuristicWeights;
  rng: LocalAIRng;
}

/**
 * Minimax player over the static evaluator. Places its workers in the
 * interior of the board, where they have the most room to move.
 */
export class HeuristicAIPlayer extends AIPlayer {
  public readonly name: string;
  private readonly depth: number;
  private readonly weights: HeuristicWeights;
  private readonly rng: LocalAIRng;

  constructor(player: PlayerId, config: HeuristicAIConfig) {
    super(player, config);
    this.depth = config.depth;
    this.weights = config.weights ?? DEFAULT_HEURISTIC_WEIGHTS;
    this.rng = config.rng;
    this.name = `heuristic-d${config.depth}`;
  }

  protected async selectMove(state: GameState): Promise<Move | null> {
    const startedAt = Date.now();
    const result = chooseMove(state, this.depth, {
      weights: this.weights,
      cancellationToken: this.config.cancellationToken,
    });

    if (result.kind === 'no_legal_move') {
      return null;
    }

    logger.debug('Heuristic search finished', {
      player: this.player,
      depth: this.depth,
      score: result.score,
      nodesVisited: result.nodesVisited,
      durationMs: Date.now() - startedAt,
    });
    return result.move;
  }

  protected selectPlacement(state: GameState): Position | null {
    return (
      chooseRandomPlacement(state, this.rng, { interiorOnly: true }) ??
      chooseRandomPlacement(state, this.rng)
    );
  }
}
