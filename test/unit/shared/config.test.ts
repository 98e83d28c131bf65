import path from 'path';
import { HarnessError, HarnessErrorCode } from '../../../src/shared/errors.js';
import { loadConfig, lookupEnv } from '../../../src/shared/config.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'info',
      projectBase: '..',
      planPath: path.join('..', 'dist-newstyle', 'cache', 'plan.json'),
      buildTool: 'cabal',
    });
  });

  it('reads the project base and log level', () => {
    const config = loadConfig({ CARDANO_NODE_SRC: '/src/cardano-node', LOG_LEVEL: 'debug' });
    expect(config.projectBase).toBe('/src/cardano-node');
    expect(config.logLevel).toBe('debug');
  });

  it('treats an empty project base as unset', () => {
    expect(loadConfig({ CARDANO_NODE_SRC: '' }).projectBase).toBe('..');
  });

  it('rejects an unknown log level', () => {
    let caught: unknown;
    try {
      loadConfig({ LOG_LEVEL: 'verbose' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(HarnessError);
    expect(caught).toHaveProperty('code', HarnessErrorCode.INVALID_CONFIG);
  });
});

describe('lookupEnv', () => {
  it('returns set values', () => {
    expect(lookupEnv('CARDANO_NODE', { CARDANO_NODE: '/bin/node' })).toBe('/bin/node');
  });

  it('returns undefined for missing and empty values', () => {
    expect(lookupEnv('CARDANO_NODE', {})).toBeUndefined();
    expect(lookupEnv('CARDANO_NODE', { CARDANO_NODE: '' })).toBeUndefined();
  });
});
