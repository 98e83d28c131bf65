import { IntegrationContext, runIntegration } from '../../src/integration.js';
import { HarnessError, HarnessErrorCode } from '../../src/shared/errors.js';

describe('IntegrationContext', () => {
  it('records annotations in order', () => {
    const ctx = new IntegrationContext('ordering');
    ctx.annotate('CWD: /tmp');
    ctx.annotate('Command line: cardano-node run');
    expect(ctx.annotations).toEqual(['CWD: /tmp', 'Command line: cardano-node run']);
  });

  it('fails with the annotations attached', () => {
    const ctx = new IntegrationContext('failing');
    ctx.annotate('Command: cardano-cli query tip');

    let caught: unknown;
    try {
      ctx.failMessage('Process exited with non-zero exit-code\n');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(HarnessError);
    expect(caught).toHaveProperty('code', HarnessErrorCode.EXECUTION_FAILED);
    expect(caught).toHaveProperty('message', 'Process exited with non-zero exit-code\n');
    expect(caught).toHaveProperty('context', {
      integration: 'failing',
      annotations: ['Command: cardano-cli query tip'],
    });
  });

  it('starts the stack trace at the caller when given one', () => {
    const ctx = new IntegrationContext('call-site');
    function checkTip(): never {
      return ctx.failMessage('tip mismatch', checkTip);
    }

    let stack = '';
    try {
      checkTip();
    } catch (err) {
      stack = err instanceof Error ? err.stack ?? '' : '';
    }

    expect(stack).toContain('tip mismatch');
    expect(stack).not.toContain('checkTip');
    expect(stack).not.toContain('failMessage');
  });
});

describe('runIntegration', () => {
  it('returns the body result and closes the scope', async () => {
    const cleanup = jest.fn();
    const result = await runIntegration('happy', async ctx => {
      ctx.scope.register(cleanup);
      return 42;
    });
    expect(result).toBe(42);
    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('closes the scope when the body fails', async () => {
    const cleanup = jest.fn();
    await expect(
      runIntegration('sad', async ctx => {
        ctx.scope.register(cleanup);
        ctx.failMessage('node never became ready');
      })
    ).rejects.toThrow('node never became ready');
    expect(cleanup).toHaveBeenCalledTimes(1);
  });
});
