/**
 * Application Configuration
 *
 * Parses environment variables with the schema in `env.ts` and assembles
 * the frozen config object the terminal host and arena read.
 *
 * Usage:
 *   import { loadConfig } from './config';
 *   const config = loadConfig();
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  HeuristicProfileSchema,
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  TreePolicySchema,
  getEffectiveNodeEnv,
  parseEnv,
} from './env';

export * from './env';

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isTest: z.boolean(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  ai: z.object({
    searchDepth: z.number().int().min(1),
    heuristicProfile: HeuristicProfileSchema,
    mctsBudget: z.number().int().min(1),
    mctsPolicy: TreePolicySchema,
    thinkTimeMs: z.number().int().min(0),
  }),
  rngSeed: z.number().int().optional(),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Thrown when the environment does not satisfy the schema. `issues` holds
 * one entry per offending variable.
 */
export class ConfigurationError extends Error {
  readonly issues: ReadonlyArray<{ path: string; message: string }>;

  constructor(issues: ReadonlyArray<{ path: string; message: string }>) {
    super(
      `Invalid environment configuration: ${issues
        .map((issue) => `${issue.path || 'root'}: ${issue.message}`)
        .join('; ')}`
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

let dotenvLoaded = false;

/**
 * Load .env into process.env once. Skipped in test mode so a developer's
 * .env never overrides the values tests set.
 */
export function loadDotenv(): void {
  if (dotenvLoaded || process.env.NODE_ENV === 'test') {
    return;
  }
  dotenv.config();
  dotenvLoaded = true;
}

/**
 * Validate `env` and return a frozen AppConfig.
 *
 * @throws ConfigurationError when any variable fails validation
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = parseEnv(env);
  if (!result.success || !result.data) {
    throw new ConfigurationError(result.errors ?? []);
  }

  const raw = result.data;
  const nodeEnv = getEffectiveNodeEnv(raw);

  const preliminaryConfig = {
    nodeEnv,
    isTest: nodeEnv === 'test',
    logging: {
      level: raw.LOG_LEVEL,
      format: raw.LOG_FORMAT,
      file: raw.LOG_FILE,
    },
    ai: {
      searchDepth: raw.AI_SEARCH_DEPTH,
      heuristicProfile: raw.AI_HEURISTIC_PROFILE,
      mctsBudget: raw.AI_MCTS_BUDGET,
      mctsPolicy: raw.AI_MCTS_POLICY,
      thinkTimeMs: raw.AI_THINK_TIME_MS,
    },
    rngSeed: raw.RNG_SEED,
  };

  return Object.freeze(ConfigSchema.parse(preliminaryConfig));
}
