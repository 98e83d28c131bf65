// Per-test integration context: the sink for diagnostic annotations, the way a
// test fails with a full report, and the scope that owns every process the test
// launches.
import { HarnessError, HarnessErrorCode } from './shared/errors.js';
import { logger, type Logger } from './shared/logger.js';
import { ResourceScope, withResourceScope } from './process/scope.js';

export class IntegrationContext {
  readonly name: string;
  readonly scope: ResourceScope;
  private readonly log: Logger;
  private readonly notes: string[] = [];

  constructor(name: string, scope: ResourceScope = new ResourceScope()) {
    this.name = name;
    this.scope = scope;
    this.log = logger.child({ integration: name });
  }

  get annotations(): readonly string[] {
    return this.notes;
  }

  annotate(message: string): void {
    this.notes.push(message);
    this.log.debug({ annotation: message });
  }

  /**
   * Fails the running test with `message`. The thrown error carries every
   * annotation recorded so far; when `caller` is given the stack trace starts
   * at the frame that called it rather than inside the harness.
   */
  failMessage(message: string, caller?: (...args: never[]) => unknown): never {
    this.log.error({ annotations: this.notes }, message);
    const err = new HarnessError(HarnessErrorCode.EXECUTION_FAILED, message, {
      integration: this.name,
      annotations: [...this.notes],
    });
    if (caller) Error.captureStackTrace(err, caller);
    throw err;
  }
}

/**
 * Runs `fn` with a fresh context and closes its scope afterwards, so every
 * process launched through the context is cleaned up however `fn` exits.
 */
export async function runIntegration<T>(
  name: string,
  fn: (ctx: IntegrationContext) => Promise<T>
): Promise<T> {
  return withResourceScope(scope => fn(new IntegrationContext(name, scope)));
}
