import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

export type Logger = pino.Logger;

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

interface TransportMode {
  console: boolean;
  file: boolean;
}

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

let env: LoggerEnvConfig | undefined;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

// Mutable so the CLI can silence console output in --json mode
let transportMode: TransportMode | undefined;

function getEnv(): LoggerEnvConfig {
  if (!env) {
    env = validateLoggerEnv(process.env);
  }
  return env;
}

function getTransportMode(): TransportMode {
  if (!transportMode) {
    const config = getEnv();
    transportMode = { console: config.LOGGER_CONSOLE_ENABLED, file: config.LOGGER_FILE_LOG_ENABLED };
  }
  return transportMode;
}

function isTestEnvironment(config: LoggerEnvConfig): boolean {
  return config.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): Logger {
  const config = getEnv();
  const mode = getTransportMode();
  const isTestEnv = isTestEnvironment(config);

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: config.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: config.LOGGER_SERVICE_NAME,
    },
    level: config.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Tests get a noop stream: no worker threads, no output
  if (isTestEnv) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(pinoConfig, noopStream);
  }

  const transportTargets: TransportTarget[] = [];

  if (mode.console) {
    if (config.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
          messageFormat: '{categoryLabel} | {msg}',
        },
        target: 'pino-pretty',
      });
    } else {
      // Plain JSON on stderr keeps stdout free for --json command output
      transportTargets.push({
        level: 'trace',
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (mode.file) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: path.join(config.LOGGER_FILE_LOG_DIRNAME, config.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (transportTargets.length === 0) {
    return pino({ ...pinoConfig, enabled: false });
  }

  return pino({ ...pinoConfig, transport: { targets: transportTargets } });
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 22),
  });

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with transport reconfiguration.
 *
 * Modules create their loggers at top level, before the CLI has parsed its flags,
 * so the returned Proxy resolves the underlying pino child on every property access.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Update transport mode at runtime. Resets cached loggers so new configuration applies immediately.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...getTransportMode(), ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

/**
 * Flush pending log lines before exit
 */
export function flushLoggers(): void {
  rootLogger?.flush();
}
