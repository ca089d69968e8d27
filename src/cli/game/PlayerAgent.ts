import { GameAction, GameState, PlayerId, RulesViolation } from '../../shared/engine';

/**
 * Anything that can play one side of a game: a human at the terminal or an
 * AI. The session asks the agent of the active player for one action at a
 * time and reports back when the engine rejects it.
 */
export interface PlayerAgent {
  readonly player: PlayerId;
  /** Short label for logs and the arena table. */
  readonly name: string;

  nextAction(state: GameState): Promise<GameAction>;

  /**
   * Called when the engine rejected the last action. The state is
   * unchanged, so the next `nextAction` call sees the same position.
   */
  notifyRejected(error: RulesViolation): void;

  /** Releases terminal handles and the like. Optional. */
  close?(): void;
}
