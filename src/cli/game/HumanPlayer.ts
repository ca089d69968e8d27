import {
  GameAction,
  GameState,
  PlayerId,
  RulesViolation,
  formatMove,
  getLegalMoves,
  getWorkerAt,
  moveToActions,
  parseMove,
  parsePosition,
} from '../../shared/engine';
import { PlayerAgent } from './PlayerAgent';
import { TerminalInput } from './TerminalInput';

export interface HumanPlayerOptions {
  /** Shared with every other human player in the game; owned by the caller. */
  input: TerminalInput;
  output: NodeJS.WritableStream;
}

const HELP_TEXT = [
  'Enter a full turn as from-to^build (e.g. b2-c3^d4), or a winning climb as from-to!',
  'You can also enter one cell at a time: the worker, then the destination, then the build site.',
  'Commands: moves (list legal turns), help, resign',
].join('\n');

/**
 * Terminal player. Reads commands in algebraic notation and re-prompts on
 * anything it cannot parse; legality is left to the engine, whose
 * rejections are printed back.
 */
export class HumanPlayer implements PlayerAgent {
  public readonly player: PlayerId;
  public readonly name = 'human';

  private readonly input: TerminalInput;
  private readonly output: NodeJS.WritableStream;
  private plan: GameAction[] = [];

  constructor(player: PlayerId, options: HumanPlayerOptions) {
    this.player = player;
    this.output = options.output;
    this.input = options.input;
  }

  public async nextAction(state: GameState): Promise<GameAction> {
    if (state.phase.phase === 'selecting_worker') {
      this.plan = [];
    }
    const planned = this.plan.shift();
    if (planned) {
      return planned;
    }

    for (;;) {
      const line = await this.prompt(this.promptFor(state));
      if (line === null) {
        // Input ended: treat as resignation so the session can finish.
        return { type: 'RESIGN', player: this.player };
      }

      const action = this.interpret(line.trim(), state);
      if (action) {
        return action;
      }
    }
  }

  public notifyRejected(error: RulesViolation): void {
    this.plan = [];
    this.write(`Not allowed: ${error.message}`);
  }

  private interpret(line: string, state: GameState): GameAction | null {
    const command = line.toLowerCase();
    if (command === '') {
      return null;
    }
    if (command === 'resign') {
      return { type: 'RESIGN', player: this.player };
    }
    if (command === 'help') {
      this.write(HELP_TEXT);
      return null;
    }
    if (command === 'moves') {
      const moves = state.phase.phase === 'selecting_worker' ? getLegalMoves(state) : [];
      this.write(moves.length > 0 ? moves.map(formatMove).join(' ') : 'No full turns to list in this phase.');
      return null;
    }

    const phase = state.phase.phase;

    if (phase === 'selecting_worker' && command.includes('-')) {
      const move = parseMove(command, state);
      if (!move) {
        this.write(`Could not read "${line}" as a turn by one of your workers. Type help for the format.`);
        return null;
      }
      const [first, ...rest] = moveToActions(move);
      this.plan = rest;
      return first ?? null;
    }

    const pos = parsePosition(command, state.board.size);
    if (!pos) {
      this.write(`"${line}" is not a cell on the board. Type help for the format.`);
      return null;
    }

    switch (phase) {
      case 'placement':
        return { type: 'PLACE_WORKER', position: pos };
      case 'selecting_worker': {
        const worker = getWorkerAt(state.workers, pos);
        if (!worker) {
          this.write(`There is no worker on ${command}.`);
          return null;
        }
        return { type: 'SELECT_WORKER', worker };
      }
      case 'choosing_destination':
        return { type: 'MOVE_WORKER', to: pos };
      case 'choosing_build_site':
        return { type: 'BUILD', at: pos };
      default:
        return null;
    }
  }

  private promptFor(state: GameState): string {
    const prefix = `Player ${this.player}`;
    switch (state.phase.phase) {
      case 'placement':
        return `${prefix}, place a worker: `;
      case 'selecting_worker':
        return `${prefix}, your turn: `;
      case 'choosing_destination':
        return `${prefix}, move to: `;
      case 'choosing_build_site':
        return `${prefix}, build on: `;
      default:
        return `${prefix}> `;
    }
  }

  /**
   * Resolves with the next input line, or null once input has ended.
   */
  private async prompt(query: string): Promise<string | null> {
    this.output.write(query);
    return this.input.nextLine();
  }

  private write(message: string): void {
    this.output.write(`${message}\n`);
  }
}
