import type winston from 'winston';
import {
  EngineErrorCode,
  GameEngine,
  GameSnapshot,
  InvalidState,
  Move,
  PlayerId,
  VictoryReason,
  formatMove,
} from '../../shared/engine';
import type { CancellationToken } from '../../shared/utils/cancellation';
import { logger as defaultLogger } from '../utils/logger';
import { PlayerAgent } from './PlayerAgent';

export interface GameSessionOptions {
  /** Stop after this many completed turns. */
  maxTurns?: number;
  /** Abort when one agent's actions are rejected this many times in a row. */
  maxConsecutiveRejections?: number;
  /** Called with a fresh snapshot after every accepted action. */
  onStateChange?: (snapshot: GameSnapshot) => void;
  cancellationToken?: CancellationToken;
  logger?: winston.Logger;
}

export type SessionResult =
  | {
      readonly status: 'finished';
      readonly winner: PlayerId;
      readonly loser: PlayerId;
      readonly reason: VictoryReason | 'no_legal_move';
      readonly turns: number;
      readonly moves: ReadonlyArray<Move>;
    }
  | {
      readonly status: 'turn_limit';
      readonly turns: number;
      readonly moves: ReadonlyArray<Move>;
    };

const DEFAULT_MAX_TURNS = 200;
const DEFAULT_MAX_CONSECUTIVE_REJECTIONS = 100;

/**
 * Drives one game between two agents: asks the active agent for an action,
 * submits it to the engine, and reports rejections back to the agent until
 * the game ends.
 */
export class GameSession {
  private readonly engine: GameEngine;
  private readonly agents: Readonly<Record<PlayerId, PlayerAgent>>;
  private readonly options: GameSessionOptions;
  private readonly log: winston.Logger;

  constructor(
    agents: Readonly<Record<PlayerId, PlayerAgent>>,
    options: GameSessionOptions = {},
    engine: GameEngine = new GameEngine()
  ) {
    this.agents = agents;
    this.options = options;
    this.engine = engine;
    this.log = options.logger ?? defaultLogger;
  }

  public getSnapshot(): GameSnapshot {
    return this.engine.getSnapshot();
  }

  public async run(): Promise<SessionResult> {
    const maxTurns = this.options.maxTurns ?? DEFAULT_MAX_TURNS;
    const maxRejections = this.options.maxConsecutiveRejections ?? DEFAULT_MAX_CONSECUTIVE_REJECTIONS;
    let rejections = 0;

    this.log.info('Game started', {
      player1: this.agents[1].name,
      player2: this.agents[2].name,
    });
    this.options.onStateChange?.(this.engine.getSnapshot());

    for (;;) {
      const state = this.engine.getGameState();
      const outcome = this.engine.getOutcome();

      if (outcome.isOver) {
        this.log.info('Game over', {
          winner: outcome.winner,
          reason: outcome.reason,
          turns: state.moveHistory.length,
        });
        return {
          status: 'finished',
          winner: outcome.winner,
          loser: outcome.loser,
          reason: outcome.reason,
          turns: state.moveHistory.length,
          moves: state.moveHistory,
        };
      }

      if (state.moveHistory.length >= maxTurns) {
        this.log.warn('Turn limit reached', { maxTurns });
        return { status: 'turn_limit', turns: state.moveHistory.length, moves: state.moveHistory };
      }

      this.options.cancellationToken?.throwIfCanceled('game session');

      const agent = this.agents[state.currentPlayer];
      const action = await agent.nextAction(state);
      const result = this.engine.processAction(action);

      if (!result.ok) {
        rejections++;
        this.log.warn('Action rejected', {
          player: state.currentPlayer,
          agent: agent.name,
          code: result.error.code,
          reason: result.error.message,
        });
        agent.notifyRejected(result.error);
        if (rejections >= maxRejections) {
          throw new InvalidState(
            EngineErrorCode.INTERNAL_ASSERTION_FAILED,
            `Agent ${agent.name} had ${rejections} actions rejected in a row`,
            { player: state.currentPlayer, lastCode: result.error.code },
            'GameSession'
          );
        }
        continue;
      }

      rejections = 0;
      const recorded = result.state.moveHistory.length > state.moveHistory.length;
      const lastMove = result.state.moveHistory[result.state.moveHistory.length - 1];
      if (recorded && lastMove) {
        this.log.debug('Turn complete', { player: lastMove.player, move: formatMove(lastMove) });
      }
      this.options.onStateChange?.(this.engine.getSnapshot());
    }
  }

  public close(): void {
    this.agents[1].close?.();
    this.agents[2].close?.();
  }
}
