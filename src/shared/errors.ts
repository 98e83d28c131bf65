export enum HarnessErrorCode {
  PLAN_UNREADABLE = 'PLAN_UNREADABLE',
  PLAN_DECODE_FAILED = 'PLAN_DECODE_FAILED',
  COMPONENT_NOT_FOUND = 'COMPONENT_NOT_FOUND',
  MISSING_BIN_FILE = 'MISSING_BIN_FILE',
  SPAWN_FAILED = 'SPAWN_FAILED',
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  CLEANUP_FAILED = 'CLEANUP_FAILED',
  SCOPE_CLOSED = 'SCOPE_CLOSED',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: HarnessErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HarnessError';
    this.code = code;
    this.context = context;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
