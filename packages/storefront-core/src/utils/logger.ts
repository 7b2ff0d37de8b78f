/**
 * Structured Logger
 *
 * JSON lines in production, readable lines everywhere else. Domain helpers
 * keep the message text and context keys consistent across modules.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function minLevel(): LogLevel {
  const configured = process.env.STOREFRONT_LOG_LEVEL;
  if (configured === 'debug' || configured === 'info' || configured === 'warn' || configured === 'error') {
    return configured;
  }
  if (process.env.NODE_ENV === 'test') return 'error';
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel()];
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const parts = [
    `[${entry.timestamp}]`,
    `[${entry.level.toUpperCase()}]`,
    entry.message,
  ];

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  if (entry.error) {
    parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    if (entry.error.stack) {
      parts.push(`\n  Stack: ${entry.error.stack}`);
    }
  }

  return parts.join(' ');
}

function log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  };

  if (error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  const formatted = formatEntry(entry);

  switch (level) {
    case 'debug':
    case 'info':
      console.log(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    case 'error':
      console.error(formatted);
      break;
  }
}

export const logger = {
  debug: (message: string, context?: LogContext) => log('debug', message, context),
  info: (message: string, context?: LogContext) => log('info', message, context),
  warn: (message: string, context?: LogContext) => log('warn', message, context),
  error: (message: string, context?: LogContext, error?: Error) =>
    log('error', message, context, error),

  order: {
    created: (orderId: string, buyerId: string, productId: string, amount: string) =>
      log('info', 'Order created', { orderId, buyerId, productId, amount }),

    statusChanged: (
      orderId: string,
      fromStatus: string,
      toStatus: string,
      actorType: string,
      actorId: string
    ) =>
      log('info', 'Order status changed', {
        orderId,
        fromStatus,
        toStatus,
        actorType,
        actorId,
      }),

    cancelled: (orderId: string, reason: string) =>
      log('info', 'Order cancelled', { orderId, reason }),
  },

  decision: {
    committed: (orderId: string, ownerId: string, verdict: string) =>
      log('info', 'Owner decision committed', { orderId, ownerId, verdict }),

    superseded: (orderId: string, ownerId: string, decidedBy: string | null, currentStatus: string) =>
      log('warn', 'Owner decision superseded', { orderId, ownerId, decidedBy, currentStatus }),
  },

  broadcast: {
    started: (jobId: string, recipients: number, concurrency: number) =>
      log('info', 'Broadcast started', { jobId, recipients, concurrency }),

    recipient: (jobId: string, userId: string, status: string, attempts: number) =>
      log('debug', 'Broadcast recipient outcome', { jobId, userId, status, attempts }),

    completed: (jobId: string, summary: Record<string, unknown>) =>
      log('info', 'Broadcast completed', { jobId, ...summary }),

    cancelled: (jobId: string, ownerId: string) =>
      log('warn', 'Broadcast cancelled', { jobId, ownerId }),
  },

  fulfillment: {
    delivered: (orderId: string, buyerId: string, attempts: number) =>
      log('info', 'Artifact delivered', { orderId, buyerId, attempts }),

    attemptFailed: (orderId: string, attempt: number, error: string) =>
      log('warn', 'Artifact delivery attempt failed', { orderId, attempt, error }),

    exhausted: (orderId: string, attempts: number, error: string) =>
      log('error', 'Artifact delivery exhausted, awaiting manual fulfillment', {
        orderId,
        attempts,
        error,
      }),
  },
};

export type Logger = typeof logger;
