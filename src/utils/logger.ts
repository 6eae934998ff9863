/**
 * Structured logging for the assessment server.
 * Request IDs and the active tool/session travel with each call via AsyncLocalStorage.
 *
 * Every level is written to stderr: stdout belongs to the MCP stdio transport.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Structured log context that can be passed to any log method
 */
export interface LogContext {
  [key: string]: unknown;
}

interface RequestContext {
  requestId: string;
  toolName?: string | undefined;
  sessionId?: string | undefined;
  startTime: number;
}

const requestStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Format: req-{8 chars of base64url}
 */
function generateRequestId(): string {
  return `req-${randomBytes(6).toString('base64url')}`;
}

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
    };
  }
  return { errorValue: String(error) };
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * LOG_LEVEL is read on every call so tests and operators can change it at runtime.
 */
function isEnabled(level: LogLevel): boolean {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  const threshold: LogLevel = isLogLevel(configured) ? configured : 'info';
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function formatMessage(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const reqContext = requestStorage.getStore();

  const fullContext: LogContext = {};

  if (reqContext) {
    fullContext.requestId = reqContext.requestId;
    if (reqContext.toolName) fullContext.tool = reqContext.toolName;
    if (reqContext.sessionId) fullContext.sessionId = reqContext.sessionId;
  }

  if (context) {
    Object.assign(fullContext, context);
  }

  const contextStr = Object.keys(fullContext).length > 0
    ? ` ${JSON.stringify(fullContext)}`
    : '';

  return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

function write(level: LogLevel, message: string, error: unknown, context?: LogContext): void {
  if (!isEnabled(level)) {
    return;
  }
  const fullContext = error !== undefined ? { ...context, ...formatError(error) } : context;
  console.error(formatMessage(level, message, fullContext));
}

function getElapsedMs(): number | undefined {
  const reqContext = requestStorage.getStore();
  return reqContext ? Date.now() - reqContext.startTime : undefined;
}

/**
 * Logger with support for structured context and request ID tracking
 */
export const logger = {
  debug(message: string, error?: unknown, context?: LogContext): void {
    write('debug', message, error, context);
  },

  info(message: string, context?: LogContext): void {
    write('info', message, undefined, context);
  },

  warn(message: string, error?: unknown, context?: LogContext): void {
    write('warn', message, error, context);
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    write('error', message, error, context);
  },

  /**
   * Run a function within a request context.
   * All logs within the callback include the request ID, tool and session.
   *
   * @example
   * ```typescript
   * const result = await logger.withRequestContext(
   *   { toolName: 'assessment_answer', sessionId: 'session-123' },
   *   async () => {
   *     logger.info('Recording answers'); // includes requestId, tool, sessionId
   *     return await recordAnswers();
   *   }
   * );
   * ```
   */
  async withRequestContext<T>(
    options: {
      requestId?: string | undefined;
      toolName?: string | undefined;
      sessionId?: string | undefined;
    },
    fn: () => Promise<T>
  ): Promise<T> {
    const context: RequestContext = {
      requestId: options.requestId ?? generateRequestId(),
      toolName: options.toolName,
      sessionId: options.sessionId,
      startTime: Date.now(),
    };

    return requestStorage.run(context, fn);
  },

  getRequestId(): string | undefined {
    return requestStorage.getStore()?.requestId;
  },

  getElapsedMs,

  /**
   * Update the current request context (e.g. to add sessionId after a session is created)
   */
  updateContext(updates: Partial<Omit<RequestContext, 'requestId' | 'startTime'>>): void {
    const current = requestStorage.getStore();
    if (current) {
      if (updates.toolName !== undefined) current.toolName = updates.toolName;
      if (updates.sessionId !== undefined) current.sessionId = updates.sessionId;
    }
  },
};

export type Logger = typeof logger;
