/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for every environment variable the
 * terminal host reads. `config/index.ts` turns the parsed values into the
 * typed, frozen AppConfig.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import { HEURISTIC_PROFILE_IDS } from '../../shared/engine/heuristicEvaluation';
import { TREE_POLICY_IDS } from '../../shared/engine/mctsSearch';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const HeuristicProfileSchema = z.enum(HEURISTIC_PROFILE_IDS);

export const TreePolicySchema = z.enum(TREE_POLICY_IDS);

/** Deepest search the CLI allows; depth 4 already takes seconds per move. */
export const MAX_AI_SEARCH_DEPTH = 4;

/** Largest MCTS budget the CLI allows; each step plays out a whole level of children. */
export const MAX_MCTS_BUDGET = 10_000;

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level written by the logger */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional path for an additional JSON log file */
  LOG_FILE: z.string().min(1).optional(),

  // ===================================================================
  // AI
  // ===================================================================

  /** Search depth in full turns for the heuristic AI */
  AI_SEARCH_DEPTH: z.coerce.number().int().min(1).max(MAX_AI_SEARCH_DEPTH).default(2),

  /** Weight profile used by the heuristic AI */
  AI_HEURISTIC_PROFILE: HeuristicProfileSchema.default('balanced'),

  /** Selection steps per move for the Monte-Carlo AI */
  AI_MCTS_BUDGET: z.coerce.number().int().min(1).max(MAX_MCTS_BUDGET).default(100),

  /** Tree policy for the Monte-Carlo AI */
  AI_MCTS_POLICY: TreePolicySchema.default('uct'),

  /** Minimum delay before an AI move is submitted, so humans can follow */
  AI_THINK_TIME_MS: z.coerce.number().int().min(0).default(0),

  /** Seed for every random choice in a game; random when unset */
  RNG_SEED: z.coerce.number().int().min(0).optional(),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables. Empty strings are treated as
 * unset so a blank line in .env falls back to the default.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }

  const result = EnvSchema.safeParse(cleaned);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
