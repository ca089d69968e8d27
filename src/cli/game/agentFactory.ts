import { PlayerId, getHeuristicWeights } from '../../shared/engine';
import type { CancellationToken } from '../../shared/utils/cancellation';
import { LocalAIRng } from '../../shared/utils/rng';
import type { AppConfig } from '../config';
import { HumanPlayer } from './HumanPlayer';
import { PlayerAgent } from './PlayerAgent';
import { TerminalInput } from './TerminalInput';
import { AIType } from './ai/AIPlayer';
import { HeuristicAIPlayer } from './ai/HeuristicAIPlayer';
import { MctsAIPlayer } from './ai/MctsAIPlayer';
import { RandomAIPlayer } from './ai/RandomAIPlayer';

export type AgentKind = 'human' | AIType;

export interface AgentFactoryContext {
  config: AppConfig;
  rng: LocalAIRng;
  /** Overrides the configured search depth for heuristic agents. */
  depth?: number;
  /** Overrides the configured MCTS budget. */
  budget?: number;
  /** Line reader shared by every human agent; required when one is created. */
  input?: TerminalInput;
  output?: NodeJS.WritableStream;
  cancellationToken?: CancellationToken;
}

export function createPlayerAgent(
  kind: AgentKind,
  player: PlayerId,
  ctx: AgentFactoryContext
): PlayerAgent {
  switch (kind) {
    case 'human':
      if (!ctx.input) {
        throw new Error('A human player needs terminal input');
      }
      return new HumanPlayer(player, {
        input: ctx.input,
        output: ctx.output ?? process.stdout,
      });
    case AIType.HEURISTIC:
      return new HeuristicAIPlayer(player, {
        depth: ctx.depth ?? ctx.config.ai.searchDepth,
        weights: getHeuristicWeights(ctx.config.ai.heuristicProfile),
        rng: ctx.rng,
        thinkTime: ctx.config.ai.thinkTimeMs,
        cancellationToken: ctx.cancellationToken,
      });
    case AIType.MCTS:
      return new MctsAIPlayer(player, {
        budget: ctx.budget ?? ctx.config.ai.mctsBudget,
        policy: ctx.config.ai.mctsPolicy,
        rng: ctx.rng,
        thinkTime: ctx.config.ai.thinkTimeMs,
        cancellationToken: ctx.cancellationToken,
      });
    case AIType.RANDOM:
      return new RandomAIPlayer(player, {
        rng: ctx.rng,
        thinkTime: ctx.config.ai.thinkTimeMs,
      });
  }
}
