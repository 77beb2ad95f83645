import os from 'node:os';
import { Writable } from 'node:stream';

import { destination, type DestinationStream, type Logger as PinoLogger, type LoggerOptions, pino } from 'pino';

import { type LoggerEnvConfig, type LogLevel, validateLoggerEnv } from './env.schema.js';

export type Logger = PinoLogger;

export interface LoggerOverrides {
  consoleEnabled?: boolean | undefined;
  destination?: DestinationStream | undefined;
  level?: LogLevel | undefined;
}

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;
let overrides: LoggerOverrides = {};
let env: LoggerEnvConfig | undefined;

function loggerEnv(): LoggerEnvConfig {
  if (!env) {
    env = validateLoggerEnv(process.env);
  }
  return env;
}

function isTestEnvironment(config: LoggerEnvConfig): boolean {
  return config.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function createNoopStream(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
}

function createRootLogger(): Logger {
  const config = loggerEnv();
  const level = overrides.level ?? config.LOGGER_LOG_LEVEL;

  const options: LoggerOptions = {
    base: {
      environment: config.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: config.LOGGER_SERVICE_NAME,
    },
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (overrides.destination) {
    return pino(options, overrides.destination);
  }

  // Worker-thread transports are never started under test
  const consoleEnabled = overrides.consoleEnabled ?? config.LOGGER_CONSOLE_ENABLED;
  if (isTestEnvironment(config) || !consoleEnabled) {
    return pino(options, createNoopStream());
  }

  if (config.NODE_ENV === 'development') {
    return pino({
      ...options,
      transport: {
        options: { destination: 2, ignore: 'pid,hostname,service,environment' },
        target: 'pino-pretty',
      },
    });
  }

  // Production: plain JSON on stdout for log processors
  return pino(options, destination(1));
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({ category });
  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns a category logger that follows later `configureLogger` calls.
 *
 * Modules create their loggers at import time, so the returned object resolves
 * the underlying pino child on every property access.
 */
export function getLogger(category: string): Logger {
  const target: Logger = Object.create(null);
  return new Proxy(target, {
    get: (_target, prop) => {
      const current = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(current, prop);
      return typeof value === 'function' ? value.bind(current) : value;
    },
  });
}

/**
 * Replace runtime logger settings (CLI `--json` mode, tests capturing output).
 * Cached category loggers are rebuilt on next use.
 */
export function configureLogger(next: LoggerOverrides): void {
  overrides = { ...overrides, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

export function resetLogger(): void {
  overrides = {};
  env = undefined;
  rootLogger = undefined;
  loggerCache.clear();
}
