import pino from 'pino';
import { loadConfig } from './config.js';

export const logger = pino({
  name: 'chairman-harness',
  level: loadConfig().logLevel,
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 2 } }
      : undefined,
});

export type { Logger } from 'pino';
