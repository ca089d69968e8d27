import { z } from 'zod';
import { MAX_AI_SEARCH_DEPTH, MAX_MCTS_BUDGET } from './config/env';
import { AIType } from './game/ai/AIPlayer';

const AgentKindSchema = z.enum(['human', AIType.HEURISTIC, AIType.MCTS, AIType.RANDOM]);

const CliArgsSchema = z.object({
  p1: AgentKindSchema.default('human'),
  p2: AgentKindSchema.default(AIType.HEURISTIC),
  depth: z.coerce.number().int().min(1).max(MAX_AI_SEARCH_DEPTH).optional(),
  budget: z.coerce.number().int().min(1).max(MAX_MCTS_BUDGET).optional(),
  seed: z.coerce.number().int().min(0).optional(),
  maxTurns: z.coerce.number().int().min(1).optional(),
  help: z.boolean().default(false),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

export const USAGE = [
  'Usage: santorini [--p1 human|heuristic|mcts|random] [--p2 human|heuristic|mcts|random]',
  '                 [--depth N] [--budget N] [--seed N] [--maxTurns N] [--help]',
].join('\n');

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

/**
 * Parse `--key value` and `--key=value` flags. A flag with no value is
 * read as `true`. Positional arguments are ignored.
 *
 * @param argv - Arguments after the script name (process.argv.slice(2))
 * @throws CliArgumentError on unknown flags or invalid values
 */
export function parseCliArgs(argv: ReadonlyArray<string>): CliArgs {
  const raw: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg || !arg.startsWith('--')) {
      continue;
    }
    const eqIndex = arg.indexOf('=');
    if (eqIndex !== -1) {
      raw[arg.slice(2, eqIndex)] = arg.slice(eqIndex + 1);
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      raw[arg.slice(2)] = next;
      i += 1;
    } else {
      raw[arg.slice(2)] = true;
    }
  }

  const result = CliArgsSchema.strict().safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? `--${issue.path.join('.')}` : 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new CliArgumentError(detail);
  }
  return result.data;
}
