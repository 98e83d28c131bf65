import os from 'os';
import type { ExecaChildProcess } from 'execa';

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

interface ChildResult {
  exitCode?: number | null;
  signal?: string | null;
}

// Shell convention: a child killed by a signal reports 128 + the signal number.
export function exitCodeOf(result: ChildResult): number {
  if (typeof result.exitCode === 'number') return result.exitCode;
  const signalNumber = result.signal ? SIGNAL_NUMBERS.get(result.signal) : undefined;
  return signalNumber !== undefined ? 128 + signalNumber : 1;
}

/** A running (or finished) child process started by `createProcess`. */
export class ProcessHandle {
  readonly pid: number;
  /** Settles once with the exit code; never rejects. */
  readonly exited: Promise<number>;
  private readonly child: ExecaChildProcess;

  constructor(child: ExecaChildProcess, pid: number, exited: Promise<number>) {
    this.child = child;
    this.pid = pid;
    this.exited = exited;
  }

  isRunning(): boolean {
    return this.child.exitCode === null && this.child.signalCode === null;
  }

  terminate(signal: NodeJS.Signals = 'SIGTERM'): void {
    if (this.isRunning()) this.child.kill(signal);
  }

  /** Resolves true if the process exits within `timeoutMs`. */
  async waitForExit(timeoutMs: number): Promise<boolean> {
    if (!this.isRunning()) return true;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.exited.then(() => true), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
