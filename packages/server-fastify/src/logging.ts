import type { JsonifibleObject, Log, LogLevel } from '@oauth-bridge/core';
import type { FastifyServerOptions } from 'fastify';

const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
];

/**
 * creates fastify logger configuration that bridges to a custom log function
 * when no log function is provided, logging is disabled
 * @param log optional custom logging function
 * @returns fastify logger configuration object
 * @example
 * ```typescript
 * const server = fastify({
 *   logger: createLoggerConfig((level, message, meta) => {
 *     console.log(`[${level}] ${message}`, meta);
 *   }),
 * });
 * ```
 */
export function createLoggerConfig(log?: Log): FastifyServerOptions['logger'] {
  if (!log) {
    return false;
  }

  return {
    level: 'trace',
    messageKey: 'message',
    errorKey: 'error',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    // bridge fastify's pino logger to the Log function
    stream: {
      write: (line: string) => forwardLogLine(log, line),
    },
  };
}

/**
 * parses one pino line and hands it to the log function
 * @param log destination log function
 * @param line serialized pino record
 */
export function forwardLogLine(log: Log, line: string): void {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    // not produced by pino's json serializer
    log('info', line.trim());

    return;
  }

  if (typeof parsed !== 'object' || parsed === null) {
    log('info', line.trim());

    return;
  }

  // NOTE: the record came from JSON.parse, so its values are json values
  const { level, message, ...meta } = parsed as JsonifibleObject;

  const logLevel = LOG_LEVELS.find((candidate) => candidate === level) ?? 'info';
  const text = typeof message === 'string' ? message : '';

  if (Object.keys(meta).length > 0) {
    log(logLevel, text, meta);
  } else {
    log(logLevel, text);
  }
}
