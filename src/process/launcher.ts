// Spawns child processes for a test and ties each one to the test's scope.
// The cleanup registered here closes the child's pipes and, if it is still
// running when the scope is released, stops it: SIGTERM first, SIGKILL if it
// ignores that.
import { once } from 'events';
import execa from 'execa';
import type { ExecaChildProcess, Options } from 'execa';
import type { IntegrationContext } from '../integration.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { ProcessHandle, exitCodeOf } from './handle.js';
import { commandLine, type LaunchedProcess, type ProcessSpec } from './types.js';

const log = logger.child({ module: 'launcher' });

const TERM_GRACE_MS = 5000;
const KILL_GRACE_MS = 2000;

function spawnChild(spec: ProcessSpec): ExecaChildProcess {
  const options: Options = {
    cwd: spec.cwd,
    env: spec.env,
    stdin: spec.stdin ?? 'pipe',
    stdout: spec.stdout ?? 'pipe',
    stderr: spec.stderr ?? 'pipe',
    // Output belongs to the caller through the returned streams.
    buffer: false,
    reject: false,
    stripFinalNewline: false,
  };
  const { cmdspec } = spec;
  return cmdspec.kind === 'raw'
    ? execa(cmdspec.executable, cmdspec.args, options)
    : execa(cmdspec.command, { ...options, shell: true });
}

/**
 * Starts the process described by `spec`. Resolves once the OS has created the
 * child; a spawn failure (missing executable, bad cwd, invalid argument)
 * rejects with the original error and registers nothing.
 */
export async function createProcess(ctx: IntegrationContext, spec: ProcessSpec): Promise<LaunchedProcess> {
  ctx.annotate(`CWD: ${spec.cwd ?? process.cwd()}`);
  ctx.annotate(`Command line: ${commandLine(spec.cmdspec)}`);

  const child = spawnChild(spec);
  // execa only starts observing the child once its promise is consumed, so this
  // has to happen before anything is awaited. With `reject: false` the promise
  // resolves for every exit; it rejects only when spawning throws synchronously,
  // in which case no 'spawn' or 'error' event ever arrives.
  const exited = child.then(result => exitCodeOf(result));
  const started = await Promise.race([
    once(child, 'spawn').then(() => true),
    exited.then(() => false),
  ]);
  if (!started || child.pid === undefined) {
    throw new HarnessError(HarnessErrorCode.SPAWN_FAILED, `Process did not start: ${commandLine(spec.cmdspec)}`);
  }

  const handle = new ProcessHandle(child, child.pid, exited);
  const { stdin, stdout, stderr } = child;
  const releaseKey = ctx.scope.register(async () => {
    stdin?.destroy();
    stdout?.destroy();
    stderr?.destroy();
    await stopProcess(handle);
  }, `pid ${handle.pid}`);

  log.debug({ pid: handle.pid, integration: ctx.name }, 'Process started');
  return { stdin, stdout, stderr, process: handle, releaseKey };
}

async function stopProcess(handle: ProcessHandle): Promise<void> {
  if (!handle.isRunning()) return;

  handle.terminate('SIGTERM');
  if (await handle.waitForExit(TERM_GRACE_MS)) return;

  log.warn({ pid: handle.pid }, 'Process ignored SIGTERM, sending SIGKILL');
  handle.terminate('SIGKILL');
  if (!(await handle.waitForExit(KILL_GRACE_MS))) {
    log.warn({ pid: handle.pid }, 'Process did not exit after SIGKILL');
  }
}
