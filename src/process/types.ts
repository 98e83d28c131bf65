import type { Readable, Writable } from 'stream';
import type { ProcessHandle } from './handle.js';
import type { ReleaseKey } from './scope.js';

export type CommandSpec =
  | { readonly kind: 'raw'; readonly executable: string; readonly args: readonly string[] }
  | { readonly kind: 'shell'; readonly command: string };

export type StdioMode = 'pipe' | 'inherit' | 'ignore';

/** Everything needed to start a child process. */
export interface ProcessSpec {
  readonly cmdspec: CommandSpec;
  readonly cwd?: string;
  readonly env?: Record<string, string>;
  readonly stdin?: StdioMode;   // default 'pipe'
  readonly stdout?: StdioMode;  // default 'pipe'
  readonly stderr?: StdioMode;  // default 'pipe'
}

export interface ResolvedBinary {
  readonly executable: string;
  readonly args: readonly string[];
}

export type BinarySource =
  | { readonly kind: 'env-override'; readonly path: string }
  | { readonly kind: 'plan-lookup'; readonly packageName: string };

export interface LaunchedProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly process: ProcessHandle;
  readonly releaseKey: ReleaseKey;
}

export type WaitOutcome =
  | { readonly kind: 'timed-out' }
  | { readonly kind: 'cancelled' }
  | { readonly kind: 'exited'; readonly exitCode: number };

export function proc(
  executable: string,
  args: readonly string[],
  overrides: Omit<ProcessSpec, 'cmdspec'> = {}
): ProcessSpec {
  return { ...overrides, cmdspec: { kind: 'raw', executable, args } };
}

export function shell(command: string, overrides: Omit<ProcessSpec, 'cmdspec'> = {}): ProcessSpec {
  return { ...overrides, cmdspec: { kind: 'shell', command } };
}

export function commandLine(cmdspec: CommandSpec): string {
  return cmdspec.kind === 'raw'
    ? `${cmdspec.executable} ${cmdspec.args.join(' ')}`
    : cmdspec.command;
}
