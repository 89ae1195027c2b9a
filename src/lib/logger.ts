import pino from 'pino';

/** Shared logger. `LOG_LEVEL` selects the level; tests run it silent. */
export const logger = pino({
  name: 'sm83',
  level: process.env['LOG_LEVEL'] ?? 'info',
});
