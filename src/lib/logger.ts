/**
 * Vetting Bot — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * WHY: Centralizes structured logging to keep other modules clean.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";
import { isRecord } from "./typeGuards.js";

/**
 * Redaction patterns for secrets that end up inside log strings.
 *
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * Webhook pattern: the last path segment of a Discord webhook URL is its secret.
 * Query pattern: Trello and Google pass key/token in the query string.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const webhookRe = /(\/api\/webhooks\/\d+\/)[A-Za-z0-9_-]+/g;
const queryRe = /([?&](?:key|token)=)[^&\s]+/gi;
const mentionRe = /@(everyone|here)/gi;

let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any user-controlled or external data.
 * Truncates at 300 chars.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(webhookRe, "$1[redacted]");
  sanitized = sanitized.replace(queryRe, "$1[redacted]");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

/**
 * Log level defaults to "info" but can be overridden via LOG_LEVEL.
 * Pretty printing: test runs always, TTY dev when LOG_PRETTY=true.
 * Production writes newline-delimited JSON.
 */
const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

function serializeError(e: unknown) {
  if (e instanceof Error) {
    const code = isRecord(e) ? e.code : undefined;
    return { name: e.name, code, message: e.message, stack: e.stack };
  }
  return { message: String(e) };
}

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : {}),
  base: undefined,
  // discord.js errors carry circular refs (client, manager). Keep the useful fields only.
  serializers: {
    err: serializeError,
  },
  /**
   * Error-level logs carrying an Error go to Sentry automatically, so call sites
   * only ever use logger.error().
   */
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate = firstArg instanceof Error ? firstArg : isRecord(firstArg) ? firstArg.err : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import avoids the logger ↔ sentry import cycle.
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", String(importErr));
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});

export type Logger = typeof logger;
