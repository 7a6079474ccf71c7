import pino, { type LevelWithSilent, type Logger } from 'pino';
import { isTestEnv } from '../util/env.js';

type Data = Record<string, unknown>;

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  // stdout carries results (tables or JSON), so structured logs go to stderr
  const stream = pino.destination({ dest: 2, sync: true });
  return pino({
    base: undefined,
    level: isTestEnv() ? 'silent' : level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.epochTime,
  }, stream);
}

let logger = createLogger();

export function setLogLevel(level: LevelWithSilent) {
  if (!isTestEnv()) logger.level = level;
}

function info(msg: string, scope?: string, data?: Data) {
  logger.info({ scope, ...data }, msg);
}
function warn(msg: string, scope?: string, data?: Data) {
  logger.warn({ scope, ...data }, msg);
}
function error(msg: string, scope?: string, data?: Data) {
  logger.error({ scope, ...data }, msg);
}
function debug(msg: string, scope?: string, data?: Data) {
  logger.debug({ scope, ...data }, msg);
}

export type ScopedLog = {
  info: (msg: string, data?: Data) => void;
  warn: (msg: string, data?: Data) => void;
  error: (msg: string, data?: Data) => void;
  debug: (msg: string, data?: Data) => void;
};

function withScope(scope: string): ScopedLog {
  return {
    info: (msg, data) => info(msg, scope, data),
    warn: (msg, data) => warn(msg, scope, data),
    error: (msg, data) => error(msg, scope, data),
    debug: (msg, data) => debug(msg, scope, data),
  };
}

/** Swap the underlying pino instance, e.g. for a test that inspects log output. */
export function useLogger(next: Logger) {
  logger = next;
}

export const log = { info, warn, error, debug, withScope };
export default log;
