/**
 * AI Player Base Class
 * Turns a whole-turn decision (a Move) into the sub-actions the engine
 * processes one at a time, and handles setup placement.
 */

import {
  GameAction,
  GameState,
  Move,
  PlayerId,
  Position,
  RulesViolation,
  formatMove,
  getValidActions,
  moveToActions,
} from '../../../shared/engine';
import type { CancellationToken } from '../../../shared/utils/cancellation';
import { logger } from '../../utils/logger';
import { PlayerAgent } from '../PlayerAgent';

export interface AIConfig {
  /** Milliseconds to wait before each decision (for UX). */
  thinkTime?: number;
  /** Checked by implementations that search. */
  cancellationToken?: CancellationToken;
}

/**
 * Base AI Player class
 * All AI implementations should extend this class
 */
export abstract class AIPlayer implements PlayerAgent {
  public readonly player: PlayerId;
  public abstract readonly name: string;
  protected config: AIConfig;

  /** Remaining sub-actions of the move chosen at the start of this turn. */
  private plan: GameAction[] = [];

  constructor(player: PlayerId, config: AIConfig = {}) {
    this.player = player;
    this.config = {
      thinkTime: 0,
      ...config,
    };
  }

  /**
   * Choose a full turn for the current state, or null when there is none.
   */
  protected abstract selectMove(state: GameState): Promise<Move | null>;

  /**
   * Choose a cell for the next worker during setup.
   */
  protected abstract selectPlacement(state: GameState): Position | null;

  public async nextAction(state: GameState): Promise<GameAction> {
    const phase = state.phase.phase;

    if (phase === 'placement') {
      await this.simulateThinking();
      const position = this.selectPlacement(state);
      if (!position) {
        return this.firstValidAction(state);
      }
      return { type: 'PLACE_WORKER', position };
    }

    if (phase === 'selecting_worker') {
      await this.simulateThinking();
      const move = await this.selectMove(state);
      if (!move) {
        logger.warn('AI found no move; resigning', { player: this.player, ai: this.name });
        return { type: 'RESIGN', player: this.player };
      }
      logger.debug('AI chose move', { player: this.player, ai: this.name, move: formatMove(move) });
      this.plan = moveToActions(move);
    }

    return this.plan.shift() ?? this.firstValidAction(state);
  }

  public notifyRejected(error: RulesViolation): void {
    logger.warn('AI action rejected', {
      player: this.player,
      ai: this.name,
      code: error.code,
      reason: error.message,
    });
    this.plan = [];
  }

  /**
   * Fallback when the plan was lost mid-turn (after a rejection): any
   * action the engine accepts in this phase.
   */
  private firstValidAction(state: GameState): GameAction {
    return getValidActions(state)[0] ?? { type: 'RESIGN', player: this.player };
  }

  /**
   * Simulate thinking time for better UX
   * Returns a promise that resolves after the configured think time
   */
  protected async simulateThinking(): Promise<void> {
    const thinkTime = this.config.thinkTime ?? 0;
    if (thinkTime > 0) {
      await new Promise<void>((resolve) => {
        setTimeout(resolve, thinkTime);
      });
    }
  }
}

/**
 * AI Player Types
 */
export enum AIType {
  RANDOM = 'random',
  HEURISTIC = 'heuristic',
  MCTS = 'mcts',
}
