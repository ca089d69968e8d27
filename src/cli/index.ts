#!/usr/bin/env node
/**
 * Terminal entry point: plays one game between two agents and prints the
 * board after every step.
 */

import { CliArgs, CliArgumentError, USAGE, parseCliArgs } from './args';
import { AppConfig, ConfigurationError, loadConfig, loadDotenv } from './config';
import { createPlayerAgent } from './game/agentFactory';
import { describeStatus, renderBoard, renderLegend } from './game/boardRenderer';
import { GameSession, SessionResult } from './game/GameSession';
import { TerminalInput } from './game/TerminalInput';
import { logger } from './utils/logger';
import { createCancellationSource, isOperationCanceledError } from '../shared/utils/cancellation';
import { SeededRNG, generateGameSeed } from '../shared/utils/rng';
import { GameSnapshot } from '../shared/engine';

function printSnapshot(snapshot: GameSnapshot): void {
  process.stdout.write(`\n${renderBoard(snapshot)}\n${describeStatus(snapshot)}\n`);
}

function describeResult(result: SessionResult): string {
  if (result.status === 'turn_limit') {
    return `No winner after ${result.turns} turns.`;
  }
  return `Game over after ${result.turns} turns.`;
}

export async function main(argv: ReadonlyArray<string>, config: AppConfig): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliArgumentError) {
      process.stderr.write(`${error.message}\n${USAGE}\n`);
      return 2;
    }
    throw error;
  }

  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const seed = args.seed ?? config.rngSeed ?? generateGameSeed();
  const rng = new SeededRNG(seed).asFunction();
  const cancellation = createCancellationSource();

  const terminal =
    args.p1 === 'human' || args.p2 === 'human' ? new TerminalInput(process.stdin) : undefined;

  const ctx = {
    config,
    rng,
    depth: args.depth,
    budget: args.budget,
    input: terminal,
    cancellationToken: cancellation.token,
  };
  const session = new GameSession(
    {
      1: createPlayerAgent(args.p1, 1, ctx),
      2: createPlayerAgent(args.p2, 2, ctx),
    },
    {
      maxTurns: args.maxTurns,
      onStateChange: printSnapshot,
      cancellationToken: cancellation.token,
    }
  );

  const onSigint = (): void => cancellation.cancel('interrupted');
  process.once('SIGINT', onSigint);

  logger.info('Starting game', { p1: args.p1, p2: args.p2, seed });
  process.stdout.write(`${renderLegend()}\n`);

  try {
    const result = await session.run();
    process.stdout.write(`${describeResult(result)}\n`);
    return 0;
  } catch (error) {
    if (isOperationCanceledError(error)) {
      process.stdout.write('Game interrupted.\n');
      return 130;
    }
    throw error;
  } finally {
    process.removeListener('SIGINT', onSigint);
    session.close();
    terminal?.close();
  }
}

if (require.main === module) {
  loadDotenv();
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      process.stderr.write(`${error.message}\n`);
      process.exit(1);
    }
    throw error;
  }

  main(process.argv.slice(2), config)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Fatal error', { error });
      process.exitCode = 1;
    });
}
