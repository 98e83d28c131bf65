// Scoped cleanup registry. Every spawned process registers its cleanup here and
// the owning scope guarantees each action runs exactly once: either when the key
// is released early or when the scope closes, whichever comes first.
import { HarnessError, HarnessErrorCode, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const log = logger.child({ module: 'scope' });

export type CleanupAction = () => void | Promise<void>;

export interface ReleaseKey {
  readonly id: number;
  readonly label: string;
}

interface Registration {
  key: ReleaseKey;
  action: CleanupAction;
}

export class ResourceScope {
  private readonly pending = new Map<number, Registration>();
  private nextId = 1;
  private closed = false;

  register(action: CleanupAction, label = 'resource'): ReleaseKey {
    if (this.closed) {
      throw new HarnessError(HarnessErrorCode.SCOPE_CLOSED, `Cannot register ${label}: scope is closed`);
    }
    const key: ReleaseKey = { id: this.nextId++, label };
    this.pending.set(key.id, { key, action });
    return key;
  }

  isRegistered(key: ReleaseKey): boolean {
    return this.pending.has(key.id);
  }

  get size(): number {
    return this.pending.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // No-op for keys that were already released or closed over.
  async release(key: ReleaseKey): Promise<void> {
    const registration = this.pending.get(key.id);
    if (!registration) return;
    this.pending.delete(key.id);
    await registration.action();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    // Most recently registered first.
    const registrations = [...this.pending.values()].reverse();
    this.pending.clear();

    const failures: string[] = [];
    for (const { key, action } of registrations) {
      try {
        await action();
      } catch (err) {
        log.warn({ key, error: errorMessage(err) }, 'Cleanup action failed');
        failures.push(`${key.label}#${key.id}: ${errorMessage(err)}`);
      }
    }

    if (failures.length > 0) {
      throw new HarnessError(
        HarnessErrorCode.CLEANUP_FAILED,
        `${failures.length} cleanup action(s) failed`,
        { failures }
      );
    }
  }
}

export async function withResourceScope<T>(fn: (scope: ResourceScope) => Promise<T>): Promise<T> {
  const scope = new ResourceScope();
  let result: T;
  try {
    result = await fn(scope);
  } catch (err) {
    try {
      await scope.close();
    } catch (closeErr) {
      // The body's failure is the one worth surfacing.
      log.warn({ error: errorMessage(closeErr) }, 'Scope cleanup failed after an earlier error');
    }
    throw err;
  }
  await scope.close();
  return result;
}
