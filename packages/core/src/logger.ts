/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * classbridge logger
 *
 * - error / warn: always written
 * - info / debug: written when CLASSBRIDGE_DEBUG=true
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component name (e.g., 'Orchestrator', 'Registry', 'QuickJS') */
  component: string;
  /** Operation being performed (e.g., 'bind', 'finalize') */
  operation?: string;
  /** Bound class the message is about */
  className?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
}

function isDebugEnabled(): boolean {
  if (typeof process !== 'undefined' && process.env) {
    return process.env.CLASSBRIDGE_DEBUG === 'true';
  }
  return false;
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.className) {
    prefix += ` (${ctx.className})`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string): Logger {
  return {
    error(message, error, ctx) {
      const prefix = formatContext({ component, ...ctx });
      const extra = ctx?.data !== undefined ? [ctx.data] : [];
      if (error !== undefined) {
        console.error(`${prefix} ${message}:`, formatError(error), ...extra);
      } else {
        console.error(`${prefix} ${message}`, ...extra);
      }
    },

    warn(message, ctx) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    info(message, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    debug(message, data, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },
  };
}
