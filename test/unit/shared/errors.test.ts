import { HarnessError, HarnessErrorCode, errorMessage } from '../../../src/shared/errors.js';

describe('HarnessError', () => {
  it('creates error with code and message', () => {
    const err = new HarnessError(HarnessErrorCode.COMPONENT_NOT_FOUND, 'Cannot find exe:foo in plan');
    expect(err.code).toBe(HarnessErrorCode.COMPONENT_NOT_FOUND);
    expect(err.message).toBe('Cannot find exe:foo in plan');
    expect(err.name).toBe('HarnessError');
    expect(err instanceof Error).toBe(true);
  });

  it('includes optional context', () => {
    const err = new HarnessError(HarnessErrorCode.SPAWN_FAILED, 'Command failed to spawn: foo', { cause: 'ENOENT' });
    expect(err.context).toEqual({ cause: 'ENOENT' });
  });
});

describe('errorMessage', () => {
  it('uses the message of Error instances', () => {
    expect(errorMessage(new Error('broken pipe'))).toBe('broken pipe');
  });

  it('stringifies anything else', () => {
    expect(errorMessage(42)).toBe('42');
  });
});
