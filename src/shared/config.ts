// Harness configuration comes from the environment: the project base directory
// and the log level, plus the fixed build-plan location and build tool. Binary
// overrides are looked up per call by variable name (see lookupEnv).
// Empty values are treated as unset.
import path from 'path';
import { z } from 'zod';
import { HarnessError, HarnessErrorCode } from './errors.js';

export const CLI_ENV_VAR = 'CARDANO_CLI';
export const NODE_ENV_VAR = 'CARDANO_NODE';
export const CHAIRMAN_ENV_VAR = 'CARDANO_NODE_CHAIRMAN';
export const PROJECT_BASE_ENV_VAR = 'CARDANO_NODE_SRC';

export const CLI_PACKAGE = 'cardano-cli';
export const NODE_PACKAGE = 'cardano-node';
export const CHAIRMAN_PACKAGE = 'cardano-node-chairman';

export const DEFAULT_PROJECT_BASE = '..';
/** Written by `cabal build` one level above the test package's working directory. */
export const DEFAULT_PLAN_PATH = path.join('..', 'dist-newstyle', 'cache', 'plan.json');
export const DEFAULT_BUILD_TOOL = 'cabal';

const optionalPath = z
  .string()
  .optional()
  .transform(value => (value === undefined || value === '' ? undefined : value));

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  [PROJECT_BASE_ENV_VAR]: optionalPath,
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface HarnessConfig {
  logLevel: LogLevel;
  projectBase: string;
  planPath: string;
  buildTool: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, 'Invalid harness environment', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  const vars = parsed.data;
  return {
    logLevel: vars.LOG_LEVEL,
    projectBase: vars[PROJECT_BASE_ENV_VAR] ?? DEFAULT_PROJECT_BASE,
    planPath: DEFAULT_PLAN_PATH,
    buildTool: DEFAULT_BUILD_TOOL,
  };
}

// Returns undefined for unset and empty variables alike.
export function lookupEnv(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}
