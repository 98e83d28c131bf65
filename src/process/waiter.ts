import type { IntegrationContext } from '../integration.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import type { ProcessHandle } from './handle.js';
import type { WaitOutcome } from './types.js';

/**
 * Waits for `handle` to exit and resolves with its exit code. If `signal`
 * aborts first the wait is abandoned and resolves `undefined`; the process
 * itself is left running.
 */
export async function waitForProcess(
  handle: ProcessHandle,
  signal?: AbortSignal
): Promise<number | undefined> {
  if (!signal) return handle.exited;
  if (signal.aborted) return undefined;

  let onAbort = (): void => undefined;
  const abandoned = new Promise<undefined>(resolve => {
    onAbort = () => resolve(undefined);
    signal.addEventListener('abort', onAbort, { once: true });
  });
  try {
    return await Promise.race([handle.exited, abandoned]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

const TIMED_OUT = Symbol('timed-out');

// setTimeout treats anything above 2^31-1 ms as 1 ms.
const MAX_TIMER_MS = 2 ** 31 - 1;

/** Calls `onElapsed` after `ms`, chaining timers for delays past the timer limit. */
function startDeadline(ms: number, onElapsed: () => void): () => void {
  let timer: NodeJS.Timeout | undefined;
  const arm = (remaining: number): void => {
    const step = Math.min(remaining, MAX_TIMER_MS);
    timer = setTimeout(() => (remaining > step ? arm(remaining - step) : onElapsed()), step);
  };
  arm(ms);
  return () => clearTimeout(timer);
}

/**
 * Waits at most `seconds` for `handle` to exit. Timing out and cancellation
 * are outcomes, not errors: the caller decides whether to retry, fail or
 * carry on. Neither kills the process.
 */
export async function waitSecondsForProcess(
  ctx: IntegrationContext,
  seconds: number,
  handle: ProcessHandle,
  signal?: AbortSignal
): Promise<WaitOutcome> {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new HarnessError(HarnessErrorCode.INVALID_ARGUMENT, `Invalid wait duration: ${seconds}`);
  }

  // Cancels whichever of the two waits loses the race.
  const loser = new AbortController();
  const forwardAbort = () => loser.abort();
  signal?.addEventListener('abort', forwardAbort, { once: true });
  if (signal?.aborted) loser.abort();

  let cancelDeadline = (): void => undefined;
  const deadline = new Promise<typeof TIMED_OUT>(resolve => {
    cancelDeadline = startDeadline(seconds * 1000, () => resolve(TIMED_OUT));
  });

  let result: number | undefined | typeof TIMED_OUT;
  try {
    result = await Promise.race([deadline, waitForProcess(handle, loser.signal)]);
  } finally {
    cancelDeadline();
    signal?.removeEventListener('abort', forwardAbort);
    loser.abort();
  }

  if (result === TIMED_OUT) {
    ctx.annotate('Timed out waiting for process to exit');
    return { kind: 'timed-out' };
  }
  if (result === undefined) {
    ctx.annotate('No exit code for process');
    return { kind: 'cancelled' };
  }
  ctx.annotate(`Process exited ${result}`);
  return { kind: 'exited', exitCode: result };
}
