#!/usr/bin/env ts-node
/**
 * AI arena: round-robin Elo ladder between the built-in AI players.
 *
 * Usage:
 *   ts-node scripts/run-ai-arena.ts [--games N] [--seed N] [--maxTurns N] [--mctsBudget N]
 *
 * Every contestant starts at 1500. K starts at 100 and decays by 0.75 per
 * round until it drops below 10, so later rounds only fine-tune the table.
 */

import { z } from 'zod';

import { loadConfig, loadDotenv } from '../src/cli/config';
import { HeuristicAIPlayer } from '../src/cli/game/ai/HeuristicAIPlayer';
import { MctsAIPlayer } from '../src/cli/game/ai/MctsAIPlayer';
import { RandomAIPlayer } from '../src/cli/game/ai/RandomAIPlayer';
import { Contestant, runArena } from '../src/cli/services/arena';
import { createLogger } from '../src/cli/utils/logger';
import { getHeuristicWeights } from '../src/shared/engine';
import { SeededRNG, generateGameSeed } from '../src/shared/utils/rng';

const ArenaArgsSchema = z.object({
  games: z.coerce.number().int().min(1).default(2),
  seed: z.coerce.number().int().min(0).optional(),
  maxTurns: z.coerce.number().int().min(1).default(200),
  mctsBudget: z.coerce.number().int().min(1).default(50),
});

function parseArgs(argv: string[]): z.infer<typeof ArenaArgsSchema> {
  const args: Record<string, string> = {};
  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];
    if (!raw || !raw.startsWith('--')) {
      continue;
    }
    const eqIndex = raw.indexOf('=');
    if (eqIndex !== -1) {
      args[raw.slice(2, eqIndex)] = raw.slice(eqIndex + 1);
    } else {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        args[raw.slice(2)] = next;
        i += 1;
      }
    }
  }
  return ArenaArgsSchema.parse(args);
}

async function run(): Promise<void> {
  loadDotenv();
  const config = loadConfig();
  const args = parseArgs(process.argv);
  const seed = args.seed ?? config.rngSeed ?? generateGameSeed();
  const rng = new SeededRNG(seed).asFunction();

  // Per-game logs are noise here; only warnings and the round summaries.
  const logger = createLogger({ ...config, logging: { ...config.logging, level: 'warn' } });
  const weights = getHeuristicWeights(config.ai.heuristicProfile);

  const contestants: Contestant[] = [
    { name: 'Random', create: (player, r) => new RandomAIPlayer(player, { rng: r }) },
    {
      name: 'Heuristic d1',
      create: (player, r) => new HeuristicAIPlayer(player, { depth: 1, weights, rng: r }),
    },
    {
      name: 'Heuristic d2',
      create: (player, r) => new HeuristicAIPlayer(player, { depth: 2, weights, rng: r }),
    },
    {
      name: 'MCTS UCT',
      create: (player, r) =>
        new MctsAIPlayer(player, { budget: args.mctsBudget, policy: 'uct', rng: r }),
    },
    {
      name: 'MCTS PUCT',
      create: (player, r) =>
        new MctsAIPlayer(player, { budget: args.mctsBudget, policy: 'puct', rng: r }),
    },
  ];

  console.log(`AI arena starting (seed ${seed}, ${args.games} games per pairing per round)`);

  const result = await runArena(contestants, {
    gamesPerPairing: args.games,
    maxTurns: args.maxTurns,
    rng,
    logger,
    onRound: (round, kFactor, ratings) => {
      console.log('');
      console.log(`Round ${round} (K = ${kFactor.toFixed(2)})`);
      contestants.forEach((c, i) => {
        console.log(`  ${c.name}: ${(ratings[i] ?? 0).toFixed(1)}`);
      });
    },
  });

  console.log('');
  console.log(`Final ratings after ${result.gamesPlayed} games:`);
  contestants
    .map((c, i) => ({ name: c.name, rating: result.ratings[i] ?? 0, wins: result.wins[i] ?? 0 }))
    .sort((a, b) => b.rating - a.rating)
    .forEach((row) => {
      console.log(`  ${row.name.padEnd(14)} ${row.rating.toFixed(1).padStart(7)}  (${row.wins} wins)`);
    });
}

run().catch((error: unknown) => {
  console.error('AI arena failed:', error);
  process.exitCode = 1;
});
