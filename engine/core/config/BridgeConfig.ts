/**
 * CellBridge - Configuration
 *
 * Defaults are merged with caller overrides and frozen. Environment
 * variables are read only through loadBridgeConfig().
 */

import { z } from 'zod';
import { InvalidArgumentsError } from '../errors/index.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface BridgeConfig {
  /** pino level for the bridge logger */
  logLevel: LogLevel;
  /**
   * Default for Range expansion: when true, a formula cell that computes
   * to blank counts as empty.
   */
  strictExpansion: boolean;
}

export const DEFAULT_BRIDGE_CONFIG: Readonly<BridgeConfig> = Object.freeze({
  logLevel: 'warn',
  strictExpansion: false,
});

const BridgeConfigSchema = z
  .object({
    logLevel: z.enum(LOG_LEVELS),
    strictExpansion: z.boolean(),
  })
  .partial()
  .strict();

const EnvSchema = z.object({
  CELLBRIDGE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  CELLBRIDGE_STRICT_EXPANSION: z.enum(['true', 'false', '1', '0']).optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Merge overrides onto the defaults. Unknown keys and ill-typed values
 * raise InvalidArgumentsError.
 */
export function resolveBridgeConfig(config: Partial<BridgeConfig> = {}): Readonly<BridgeConfig> {
  const parsed = BridgeConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new InvalidArgumentsError(`Invalid bridge configuration: ${describeIssues(parsed.error)}`);
  }
  return Object.freeze({ ...DEFAULT_BRIDGE_CONFIG, ...parsed.data });
}

/**
 * Read CELLBRIDGE_LOG_LEVEL and CELLBRIDGE_STRICT_EXPANSION, falling back
 * to the defaults for unset variables.
 */
export function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): Readonly<BridgeConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidArgumentsError(`Invalid environment: ${describeIssues(parsed.error)}`);
  }

  const overrides: Partial<BridgeConfig> = {};
  const { CELLBRIDGE_LOG_LEVEL: logLevel, CELLBRIDGE_STRICT_EXPANSION: strict } = parsed.data;
  if (logLevel !== undefined) {
    overrides.logLevel = logLevel;
  }
  if (strict !== undefined) {
    overrides.strictExpansion = strict === 'true' || strict === '1';
  }
  return resolveBridgeConfig(overrides);
}
