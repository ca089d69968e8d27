import {
  GameState,
  Move,
  PlayerId,
  Position,
  chooseRandomMove,
  chooseRandomPlacement,
} from '../../../shared/engine';
import { LocalAIRng } from '../../../shared/utils/rng';
import { AIConfig, AIPlayer } from './AIPlayer';

export interface RandomAIConfig extends AIConfig {
  rng: LocalAIRng;
}

/**
 * Picks uniformly among legal moves. Useful as a baseline in the arena.
 */
export class RandomAIPlayer extends AIPlayer {
  public readonly name = 'random';
  private readonly rng: LocalAIRng;

  constructor(player: PlayerId, config: RandomAIConfig) {
    super(player, config);
    this.rng = config.rng;
  }

  protected async selectMove(state: GameState): Promise<Move | null> {
    return chooseRandomMove(state, this.rng);
  }

  protected selectPlacement(state: GameState): Position | null {
    return chooseRandomPlacement(state, this.rng);
  }
}
