import {
  DEFAULT_EXPLORATION,
  GameState,
  MonteCarloTree,
  Move,
  PlayerId,
  Position,
  TreePolicy,
  TreePolicyId,
  chooseRandomPlacement,
  createTreePolicy,
} from '../../../shared/engine';
import { LocalAIRng } from '../../../shared/utils/rng';
import { logger } from '../../utils/logger';
import { AIConfig, AIPlayer } from './AIPlayer';

export interface MctsAIConfig extends AIConfig {
  /** Selection steps per move. */
  budget: number;
  policy: TreePolicyId;
  exploration?: number;
  rng: LocalAIRng;
}

/**
 * Monte-Carlo tree search player. The tree is kept between turns and
 * re-rooted on the new position when the opponent's reply was already
 * explored.
 */
export class MctsAIPlayer extends AIPlayer {
  public readonly name: string;
  private readonly budget: number;
  private readonly policy: TreePolicy;
  private readonly rng: LocalAIRng;
  private tree: MonteCarloTree | null = null;

  constructor(player: PlayerId, config: MctsAIConfig) {
    super(player, config);
    this.budget = config.budget;
    this.policy = createTreePolicy(config.policy, config.exploration ?? DEFAULT_EXPLORATION);
    this.rng = config.rng;
    this.name = `mcts-${config.policy}`;
  }

  protected async selectMove(state: GameState): Promise<Move | null> {
    const startedAt = Date.now();
    let reused = false;
    if (this.tree) {
      reused = this.tree.advanceTo(state);
    } else {
      this.tree = new MonteCarloTree(state, { rng: this.rng, policy: this.policy });
    }

    const result = this.tree.search(this.budget, this.config.cancellationToken);
    if (result.kind === 'no_legal_move') {
      return null;
    }

    logger.debug('MCTS search finished', {
      player: this.player,
      policy: this.policy.id,
      reusedTree: reused,
      score: result.score,
      visits: result.visits,
      iterations: result.iterations,
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
