/**
 * Pino logger shared by the route handlers, the scan cache and the CLI.
 * The gog account and sheet id never reach the log output.
 */

import pino, { type Logger } from 'pino';

const SECRET_KEYS = ['gogAccount', 'GOG_ACCOUNT', 'sheetId', 'authorization', 'password', 'secret', 'token'];

const redactPaths = [...SECRET_KEYS, ...SECRET_KEYS.map((key) => `*.${key}`)];

// LOG_PRETTY=0 forces JSON lines outside production, e.g. when piping the CLI
function usePrettyTransport(): boolean {
  if (process.env.LOG_PRETTY === '0') return false;
  const nodeEnv = process.env.NODE_ENV;
  return nodeEnv !== 'production' && nodeEnv !== 'test';
}

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport: usePrettyTransport()
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'SYS:HH:MM:ss',
        },
      }
    : undefined,
});

export function createChildLogger(module: string, bindings: pino.Bindings = {}): Logger {
  return logger.child({ module, ...bindings });
}
