// Run-to-completion execution for short commands whose output a test inspects.
// Unlike procFlex this never reads the build plan: without the environment
// override the command goes through `cabal exec`, which finds the binary itself.
import execa from 'execa';
import type { ExecaReturnValue } from 'execa';
import type { IntegrationContext } from '../integration.js';
import { CLI_ENV_VAR, CLI_PACKAGE, loadConfig, lookupEnv } from '../shared/config.js';
import { HarnessError, HarnessErrorCode, errorMessage } from '../shared/errors.js';
import { argQuote } from './arg-quote.js';
import { exitCodeOf } from './handle.js';
import type { ResolvedBinary } from './types.js';

export interface FlexExecOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  buildTool?: string;
}

/**
 * Runs `packageName` with `args` and returns its stdout exactly as written.
 *
 * When `envVarName` is set the binary it names is run directly; otherwise the
 * package is run through `<buildTool> exec --`. A non-zero exit fails the
 * test with the command, both output streams and the exit code.
 */
export async function execFlex(
  ctx: IntegrationContext,
  packageName: string,
  envVarName: string,
  args: readonly string[],
  options: FlexExecOptions = {}
): Promise<string> {
  const envBin = lookupEnv(envVarName, options.env);
  const actual: ResolvedBinary =
    envBin !== undefined
      ? { executable: envBin, args }
      : { executable: options.buildTool ?? loadConfig(options.env).buildTool, args: ['exec', '--', packageName, ...args] };

  ctx.annotate(`Command: ${actual.executable} ${actual.args.join(' ')}`);

  let result: ExecaReturnValue;
  try {
    result = await execa(actual.executable, actual.args, {
      cwd: options.cwd,
      input: '',
      reject: false,
      stripFinalNewline: false,
    });
  } catch (err) {
    // `reject: false` does not cover errors thrown while spawning (e.g. a NUL in an argument).
    throw new HarnessError(HarnessErrorCode.SPAWN_FAILED, `Command failed to spawn: ${actual.executable}`, {
      cause: errorMessage(err),
    });
  }

  // With `reject: false` a spawn error comes back as a result with neither an
  // exit code nor a signal.
  if (typeof result.exitCode !== 'number' && !result.signal) {
    throw new HarnessError(HarnessErrorCode.SPAWN_FAILED, `Command failed to spawn: ${actual.executable}`, {
      cause: 'message' in result ? String(result.message) : undefined,
    });
  }

  const exitCode = exitCodeOf(result);
  if (exitCode !== 0) {
    const report = [
      'Process exited with non-zero exit-code',
      '━━━━ command ━━━━',
      `${packageName} ${args.map(argQuote).join(' ')}`,
      '━━━━ stdout ━━━━',
      result.stdout,
      '━━━━ stderr ━━━━',
      result.stderr,
      '━━━━ exit code ━━━━',
      String(exitCode),
    ];
    ctx.failMessage(report.map(line => `${line}\n`).join(''), execFlex);
  }
  return result.stdout;
}

/** Runs cardano-cli, returning its stdout. */
export function execCli(
  ctx: IntegrationContext,
  args: readonly string[],
  options?: FlexExecOptions
): Promise<string> {
  return execFlex(ctx, CLI_PACKAGE, CLI_ENV_VAR, args, options);
}
