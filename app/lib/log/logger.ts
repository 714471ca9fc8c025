import pino from 'pino';
import type { Logger as PinoLogger, LoggerOptions } from 'pino';

// Lightweight logger wrapper around pino with a safe fallback to console.
// Configure via env:
// - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' (default: 'info')
// - LOG_PRETTY: 'false' to emit raw JSON lines instead of pino-pretty output
// - USE_PINO: 'false' to force console fallback

export type LogFields = Record<string, unknown>;

export type Logger = {
  info: (obj: LogFields, msg?: string) => void;
  warn: (obj: LogFields, msg?: string) => void;
  error: (obj: LogFields, msg?: string) => void;
  debug: (obj: LogFields, msg?: string) => void;
  child: (bindings: LogFields) => Logger;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

function getLevelOrder(level: LogLevel): number {
  switch (level) {
    case 'debug': return 10;
    case 'info': return 20;
    case 'warn': return 30;
    case 'error': return 40;
  }
}

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

function should(method: LogLevel): boolean {
  return getLevelOrder(method) >= getLevelOrder(currentLevel);
}

function createConsoleWrapper(bindings: LogFields = {}): Logger {
  const prefix = Object.keys(bindings).length > 0
    ? `[${Object.entries(bindings).map(([k, v]) => `${k}=${String(v)}`).join(' ')}]`
    : '';
  return {
    info: (obj, msg) => { if (should('info')) console.log(prefix, msg || '', obj); },
    warn: (obj, msg) => { if (should('warn')) console.warn(prefix, msg || '', obj); },
    error: (obj, msg) => { if (should('error')) console.error(prefix, msg || '', obj); },
    debug: (obj, msg) => { if (should('debug')) console.debug(prefix, msg || '', obj); },
    child: (more) => createConsoleWrapper({ ...bindings, ...more }),
  };
}

function wrapPino(base: PinoLogger, bindings: LogFields = {}): Logger {
  // A throwing transport falls back to console output
  const fallback = createConsoleWrapper(bindings);
  return {
    info: (obj, msg) => { try { base.info(obj, msg); } catch { fallback.info(obj, msg); } },
    warn: (obj, msg) => { try { base.warn(obj, msg); } catch { fallback.warn(obj, msg); } },
    error: (obj, msg) => { try { base.error(obj, msg); } catch { fallback.error(obj, msg); } },
    debug: (obj, msg) => { try { base.debug(obj, msg); } catch { fallback.debug(obj, msg); } },
    child: (more) => {
      try {
        return wrapPino(base.child(more), { ...bindings, ...more });
      } catch {
        return createConsoleWrapper({ ...bindings, ...more });
      }
    },
  };
}

let pinoBase: PinoLogger | null = null;

function createLogger(): Logger {
  const usePino = process.env.USE_PINO !== 'false';
  const isProduction = process.env.NODE_ENV === 'production';
  const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
  const pretty = process.env.LOG_PRETTY !== 'false' && !isProduction;

  if (!usePino) {
    return createConsoleWrapper();
  }

  try {
    const options: LoggerOptions = { level: isTest && !envLevel ? 'silent' : currentLevel };
    if (pretty && !isTest) {
      options.transport = {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard' },
      };
    }
    pinoBase = pino(options);
    return wrapPino(pinoBase);
  } catch {
    return createConsoleWrapper();
  }
}

const baseLogger: Logger = createLogger();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  if (pinoBase) {
    pinoBase.level = level;
  }
}

export function getLogger(bindings?: LogFields): Logger {
  if (bindings && Object.keys(bindings).length > 0) {
    return baseLogger.child(bindings);
  }
  return baseLogger;
}
