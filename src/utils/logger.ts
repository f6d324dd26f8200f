/**
 * Structured logging for the planner.
 *
 * Every line goes to stderr: stdout belongs to the MCP stdio transport.
 * Line format: `[ISO timestamp] [LEVEL] message {json context}`.
 *
 * Request-scoped fields (request id, tool, user, goal, plan path, stage)
 * ride along via AsyncLocalStorage.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Structured log context that can be passed to any log method
 */
export interface LogContext {
  [key: string]: unknown;
}

/** Fields a caller may attach to the current request */
export interface RequestFields {
  toolName?: string | undefined;
  userId?: string | undefined;
  goalId?: string | undefined;
  /** Generation path chosen for the plan */
  path?: string | undefined;
}

interface RequestContext extends RequestFields {
  requestId: string;
  startTime: number;
  stage?: string | undefined;
}

const requestStorage = new AsyncLocalStorage<RequestContext>();

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const envLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

/** Format: req-{8 chars of base64url} */
function generateRequestId(): string {
  return `req-${randomBytes(6).toString('base64url')}`;
}

function formatError(error: unknown): LogContext {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
    };
  }
  return { errorValue: String(error) };
}

function requestFields(request: RequestContext | undefined): LogContext {
  if (!request) return {};
  return {
    requestId: request.requestId,
    ...(request.toolName ? { tool: request.toolName } : {}),
    ...(request.userId ? { userId: request.userId } : {}),
    ...(request.goalId ? { goalId: request.goalId } : {}),
    ...(request.path ? { path: request.path } : {}),
    ...(request.stage ? { stage: request.stage } : {}),
  };
}

function formatMessage(level: LogLevel, message: string, context?: LogContext): string {
  const fields = { ...requestFields(requestStorage.getStore()), ...context };
  const contextStr = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
  return `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

function write(level: LogLevel, message: string, error: unknown, context: LogContext | undefined): void {
  if (!isEnabled(level)) return;
  const fullContext = error !== undefined ? { ...context, ...formatError(error) } : context;
  console.error(formatMessage(level, message, fullContext));
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

function getElapsedMs(): number | undefined {
  const request = requestStorage.getStore();
  return request ? Date.now() - request.startTime : undefined;
}

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
   * Lowest level that is written. Starts from LOG_LEVEL (default info); the
   * server applies the resolved config on startup.
   */
  setLevel(level: LogLevel): void {
    threshold = level;
  },

  getLevel(): LogLevel {
    return threshold;
  },

  isEnabled,

  /**
   * Run `fn` inside a fresh request context. Every line logged inside carries
   * the request id and the given fields.
   */
  async withRequestContext<T>(
    options: RequestFields & { requestId?: string | undefined },
    fn: () => Promise<T>
  ): Promise<T> {
    const context: RequestContext = {
      requestId: options.requestId ?? generateRequestId(),
      toolName: options.toolName,
      userId: options.userId,
      goalId: options.goalId,
      path: options.path,
      startTime: Date.now(),
    };
    return requestStorage.run(context, fn);
  },

  getRequestId(): string | undefined {
    return requestStorage.getStore()?.requestId;
  },

  getElapsedMs,

  /**
   * Attach fields to the current request, e.g. the plan path once coverage
   * has picked it. No-op outside a request.
   */
  updateContext(updates: RequestFields): void {
    const current = requestStorage.getStore();
    if (!current) return;
    if (updates.toolName !== undefined) current.toolName = updates.toolName;
    if (updates.userId !== undefined) current.userId = updates.userId;
    if (updates.goalId !== undefined) current.goalId = updates.goalId;
    if (updates.path !== undefined) current.path = updates.path;
  },

  /**
   * Run one pipeline stage. Lines logged inside carry `stage`; on completion a
   * debug line reports the duration plus whatever `summarize` returns. A stage
   * that throws is logged at warn and the error is rethrown.
   */
  async stage<T>(stage: string, fn: () => T | Promise<T>, summarize?: (result: T) => LogContext): Promise<T> {
    const parent = requestStorage.getStore();
    const context: RequestContext = parent
      ? { ...parent, stage }
      : { requestId: generateRequestId(), startTime: Date.now(), stage };
    const started = Date.now();

    return requestStorage.run(context, async () => {
      try {
        const result = await fn();
        write('debug', 'Stage finished', undefined, {
          durationMs: Date.now() - started,
          ...summarize?.(result),
        });
        return result;
      } catch (error) {
        write('warn', 'Stage failed', error, { durationMs: Date.now() - started });
        throw error;
      }
    });
  },
};
