/**
 * In-process PlayerAgent doubles for session and arena tests.
 */

import type { PlayerAgent } from '../../src/cli/game/PlayerAgent';
import type { GameAction, GameState, PlayerId } from '../../src/shared/engine';
import type { RulesViolation } from '../../src/shared/engine/errors';

/**
 * Replays a fixed list of actions, then resigns.
 */
export class ScriptedAgent implements PlayerAgent {
  public readonly name: string;
  public readonly rejections: RulesViolation[] = [];
  public closed = false;
  private readonly script: GameAction[];

  constructor(
    public readonly player: PlayerId,
    script: ReadonlyArray<GameAction> = [],
    name = `scripted-${player}`
  ) {
    this.script = [...script];
    this.name = name;
  }

  async nextAction(_state: GameState): Promise<GameAction> {
    return this.script.shift() ?? { type: 'RESIGN', player: this.player };
  }

  notifyRejected(error: RulesViolation): void {
    this.rejections.push(error);
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Submits the same (illegal) action forever.
 */
export class StubbornAgent extends ScriptedAgent {
  constructor(
    player: PlayerId,
    private readonly action: GameAction
  ) {
    super(player, [], 'stubborn');
  }

  async nextAction(_state: GameState): Promise<GameAction> {
    return this.action;
  }
}
