// Structured logging for access mutations
//
// Every gateway log line carries an AccessLogContext naming the operation, the
// actor and the object it touched, so a line can be traced back to its audit
// entry.

import type { AccessOperationType, Id, ObjectType } from '@custody/protocol';

export type AccessLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

/**
 * Fields attached to every log line written during one gateway action.
 */
export type AccessLogContext = {
  operation: AccessOperationType;
  actorId: Id;
  objectType: ObjectType;
  objectId?: Id;
  subjectId?: Id;
};

type Level = keyof AccessLogger;

/**
 * Render the context as `operation actor -> objectType:objectId (subject)`.
 */
export function describeAccess(context: AccessLogContext): string {
  const object = `${context.objectType}:${context.objectId ?? '?'}`;
  const subject = context.subjectId ? ` (${context.subjectId})` : '';
  return `${context.operation} ${context.actorId} -> ${object}${subject}`;
}

function isAccessLogContext(data: Record<string, unknown>): data is AccessLogContext {
  return (
    typeof data.operation === 'string' &&
    typeof data.actorId === 'string' &&
    typeof data.objectType === 'string'
  );
}

function write(level: Level, message: string, data?: Record<string, unknown>): void {
  const prefix = `[${level.toUpperCase()}]`;
  const line = data && isAccessLogContext(data) ? `${message}: ${describeAccess(data)}` : message;
  console[level](`${prefix} ${line}`, data ?? '');
}

export const consoleLogger: AccessLogger = {
  debug: (message, data) => write('debug', message, data),
  info: (message, data) => write('info', message, data),
  warn: (message, data) => write('warn', message, data),
  error: (message, data) => write('error', message, data),
};

/**
 * A logger that merges `context` into the data of every line.
 * Fields passed at the call site win over the context.
 */
export function withAccessContext(logger: AccessLogger, context: AccessLogContext): AccessLogger {
  const merge = (data?: Record<string, unknown>) => ({ ...context, ...data });
  return {
    debug: (message, data) => logger.debug(message, merge(data)),
    info: (message, data) => logger.info(message, merge(data)),
    warn: (message, data) => logger.warn(message, merge(data)),
    error: (message, data) => logger.error(message, merge(data)),
  };
}

export type LogEntry = {
  level: Level;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export function createCapturingLogger(): AccessLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: Level) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
