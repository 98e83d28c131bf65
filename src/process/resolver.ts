// Decides which executable to run for a logical package. Nix-style environments
// export the binary path in an environment variable; a plain cabal checkout is
// resolved through the build plan instead.
import {
  CHAIRMAN_ENV_VAR,
  CHAIRMAN_PACKAGE,
  CLI_ENV_VAR,
  CLI_PACKAGE,
  NODE_ENV_VAR,
  NODE_PACKAGE,
  loadConfig,
  lookupEnv,
} from '../shared/config.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { findExecutable, readBuildPlan } from './plan.js';
import { proc, type BinarySource, type ProcessSpec, type ResolvedBinary } from './types.js';

const log = logger.child({ module: 'resolver' });

export interface ResolveOptions {
  env?: NodeJS.ProcessEnv;
  planPath?: string;
  /** Applied to the returned ProcessSpec (cwd, env, stdio). */
  spec?: Omit<ProcessSpec, 'cmdspec'>;
}

export function selectBinarySource(
  packageName: string,
  envVarName: string,
  env: NodeJS.ProcessEnv = process.env
): BinarySource {
  const path = lookupEnv(envVarName, env);
  return path !== undefined
    ? { kind: 'env-override', path }
    : { kind: 'plan-lookup', packageName };
}

export async function resolveBinary(
  packageName: string,
  envVarName: string,
  args: readonly string[],
  options: ResolveOptions = {}
): Promise<ResolvedBinary> {
  const source = selectBinarySource(packageName, envVarName, options.env);
  switch (source.kind) {
    case 'env-override':
      log.debug({ packageName, envVarName, executable: source.path }, 'Using binary from environment');
      return { executable: source.path, args };
    case 'plan-lookup':
      return resolveFromPlan(source.packageName, args, options.planPath ?? loadConfig(options.env).planPath);
  }
}

async function resolveFromPlan(
  packageName: string,
  args: readonly string[],
  planPath: string
): Promise<ResolvedBinary> {
  const plan = await readBuildPlan(planPath);
  const component = findExecutable(plan, packageName);
  if (!component) {
    throw new HarnessError(HarnessErrorCode.COMPONENT_NOT_FOUND, `Cannot find exe:${packageName} in plan`, {
      planPath,
    });
  }
  const binFile = component['bin-file'];
  if (binFile === undefined) {
    throw new HarnessError(
      HarnessErrorCode.MISSING_BIN_FILE,
      `missing bin-file in: ${JSON.stringify(component)}`,
      { planPath }
    );
  }
  log.debug({ packageName, planPath, executable: binFile }, 'Using binary from build plan');
  return { executable: binFile, args };
}

export async function procFlex(
  packageName: string,
  envVarName: string,
  args: readonly string[],
  options: ResolveOptions = {}
): Promise<ProcessSpec> {
  const binary = await resolveBinary(packageName, envVarName, args, options);
  return proc(binary.executable, binary.args, options.spec);
}

export function procCli(args: readonly string[], options?: ResolveOptions): Promise<ProcessSpec> {
  return procFlex(CLI_PACKAGE, CLI_ENV_VAR, args, options);
}

export function procNode(args: readonly string[], options?: ResolveOptions): Promise<ProcessSpec> {
  return procFlex(NODE_PACKAGE, NODE_ENV_VAR, args, options);
}

export function procChairman(args: readonly string[], options?: ResolveOptions): Promise<ProcessSpec> {
  return procFlex(CHAIRMAN_PACKAGE, CHAIRMAN_ENV_VAR, args, options);
}

export function getProjectBase(env: NodeJS.ProcessEnv = process.env): string {
  return loadConfig(env).projectBase;
}
