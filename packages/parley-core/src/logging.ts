// Logging middleware for requesters.
//
// Logs each send with timing information. Enabled through the DEBUG
// environment variable, using the same pattern syntax as npm's debug package.

import { SendError } from "./errors.ts";
import type { RequesterMiddleware, SendContext, OutgoingRequest, SendOutcome } from "./middleware.ts";
import { RejectionError } from "./middleware.ts";

const START_TIME = Symbol("logging:start-time");

export interface LoggingOptions {
  /**
   * Namespace for DEBUG matching. Defaults to "parley:send".
   * Supports patterns like "parley:*" or "*".
   */
  namespace?: string;

  /**
   * Name shown in log lines, e.g. the service behind the channel.
   * Defaults to "send".
   */
  label?: string;

  /**
   * Log request values. Defaults to true.
   */
  logRequests?: boolean;

  /**
   * Log reply values. Defaults to true.
   */
  logReplies?: boolean;

  /**
   * Minimum duration (ms) to log. Faster sends are skipped on the reply side.
   * Defaults to 0 (log all sends).
   */
  minDuration?: number;
}

/**
 * Check if a namespace is enabled by the DEBUG environment variable.
 * Supports wildcards (*) and exclusions (-prefix).
 */
function isEnabled(namespace: string): boolean {
  const debug = process.env.DEBUG;
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a middleware that logs every send with its duration and outcome.
 *
 * ```sh
 * DEBUG='parley:*' node app.js
 * ```
 *
 * Logs structured objects alongside a short message:
 * - Request: `→ label` with `{ type: "request", label, request? }`
 * - Reply: `← label: ✓ 1.23ms` or `← label: ✗ 1.23ms` with
 *   `{ type: "reply", label, duration, ok, reply? | error? }`
 *
 * @example
 * ```typescript
 * const requester = bounded<string, number>(8)[0].with(loggingMiddleware({ label: "lengths" }));
 * ```
 */
export function loggingMiddleware<Q, R>(options: LoggingOptions = {}): RequesterMiddleware<Q, R> {
  const namespace = options.namespace ?? "parley:send";
  const label = options.label ?? "send";
  const logRequests = options.logRequests ?? true;
  const logReplies = options.logReplies ?? true;
  const minDuration = options.minDuration ?? 0;

  return {
    pre(ctx: SendContext, outgoing: OutgoingRequest<Q>): void {
      ctx.extensions.set(START_TIME, performance.now());

      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = { type: "request", label };
      if (logRequests) {
        logObj.request = outgoing.request;
      }

      console.log(`→ ${label}`, logObj);
    },

    post(ctx: SendContext, _outgoing: OutgoingRequest<Q>, outcome: SendOutcome<R>): void {
      const startTime = ctx.extensions.get<number>(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;

      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = {
        type: "reply",
        label,
        duration: `${duration.toFixed(2)}ms`,
        ok: outcome.ok,
      };

      if (outcome.ok) {
        if (logReplies) {
          logObj.reply = outcome.value;
        }
        console.log(`← ${label}: ✓ ${duration.toFixed(2)}ms`, logObj);
        return;
      }

      logObj.error = describeError(outcome.error);
      console.log(`← ${label}: ✗ ${duration.toFixed(2)}ms`, logObj);
    },
  };
}

function describeError(error: unknown): unknown {
  if (error instanceof SendError) {
    return { name: error.name, kind: error.kind };
  }
  if (error instanceof RejectionError) {
    return { name: error.name, code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return error;
}
