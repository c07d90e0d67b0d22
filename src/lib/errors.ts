/**
 * Vetting Bot — src/lib/errors.ts
 * WHAT: Discriminated union error types for precise error handling
 * WHY: Upstream fetchers, Discord calls and config loading fail in different ways and
 *      each failure kind has its own user message and reporting rule.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - shouldReportToSentry(err) → boolean (filter noise)
 *  - userFriendlyMessage(err) → short ephemeral text
 * USAGE:
 *  import { classifyError } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 10013) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { isRecord } from "./typeGuards.js";

// ===== Error Type Definitions =====

/**
 * Base error interface. `kind` is the discriminator.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/** Target entity does not exist upstream (unknown username, 404, private inventory). */
export interface NotFoundError extends AppError {
  kind: "not_found";
  resource: string;
}

/** Upstream answered with a non-2xx status or a payload we could not decode. */
export interface ServiceError extends AppError {
  kind: "service_error";
  service: string;
  status?: number;
}

/** Upstream did not answer within the per-request bound. */
export interface TimeoutError extends AppError {
  kind: "timeout";
  service: string;
  timeoutMs?: number;
}

/** The permission gate rejected the actor. Never logged. */
export interface PermissionDeniedError extends AppError {
  kind: "permission_denied";
  operation: string;
}

/** Malformed caller input, e.g. a non-numeric Discord id. */
export interface ValidationError extends AppError {
  kind: "validation";
  field: string;
  value?: unknown;
}

/**
 * Discord API errors.
 * Codes that matter here:
 * - 10013: Unknown User
 * - 10062: Unknown Interaction (3s window expired)
 * - 40060: Already acknowledged
 * - 50007: Cannot send messages to this user (DMs closed)
 * - 50013: Missing Permissions
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
}

/** Node.js system-level network errors. */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

/** Configuration file or environment problems. */
export interface ConfigError extends AppError {
  kind: "config";
  key: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | NotFoundError
  | ServiceError
  | TimeoutError
  | PermissionDeniedError
  | ValidationError
  | DiscordApiError
  | NetworkError
  | ConfigError
  | UnknownError;

export type ErrorKind = ClassifiedError["kind"];

/**
 * Thrown by the config loader. Carries the offending key so the startup log
 * points straight at the broken line of config.yaml.
 */
export class ConfigLoadError extends Error {
  readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigLoadError";
    this.key = key;
  }
}

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

// ===== Error Classification =====

/**
 * Classify any caught error into the discriminated union.
 * Ordered from most specific to least: config, timeouts, Discord, network.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;
  if (!isRecord(err) && !(err instanceof Error)) {
    return { kind: "unknown", message: String(err) };
  }

  const fields: Record<string, unknown> = isRecord(err) ? err : {};
  const message = typeof fields.message === "string" ? fields.message : String(err);
  const name = cause?.name ?? (typeof fields.name === "string" ? fields.name : undefined);
  const code = fields.code;

  if (err instanceof ConfigLoadError) {
    return { kind: "config", key: err.key, message, cause };
  }

  // AbortSignal.timeout() rejects fetch with a DOMException named TimeoutError
  if (name === "TimeoutError") {
    return { kind: "timeout", service: "http", message, cause };
  }

  if (name === "DiscordAPIError" || (typeof code === "number" && code >= 10000)) {
    const status = typeof fields.status === "number" ? fields.status : undefined;
    return {
      kind: "discord_api",
      code: typeof code === "number" ? code : 0,
      httpStatus: status,
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    const host = typeof fields.hostname === "string" ? fields.hostname : undefined;
    return { kind: "network", code, host, message, cause };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Sentry should mean "something is broken", not "Roblox had a bad minute" or
 * "someone typed letters into an id field".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10013, // Unknown user
        10062, // Unknown interaction (expired)
        40060, // Already acknowledged
        50007, // DMs closed
        50013, // Missing permissions
      ];
      return !ignoredCodes.includes(err.code);
    }

    case "network":
    case "timeout":
    case "not_found":
    case "validation":
    case "permission_denied":
      return false;

    default:
      return true;
  }
}

export function isUnknownUser(err: ClassifiedError): boolean {
  return (
    err.kind === "discord_api" && (err.code === 10013 || err.httpStatus === 404)
  );
}

export function isInteractionExpired(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 10062;
}

export function isAlreadyAcknowledged(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 40060;
}

export function isDmBlocked(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 50007;
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "discord_api":
      return { ...base, discordCode: err.code, httpStatus: err.httpStatus };

    case "network":
      return { ...base, networkCode: err.code, host: err.host };

    case "service_error":
      return { ...base, service: err.service, status: err.status };

    case "timeout":
      return { ...base, service: err.service, timeoutMs: err.timeoutMs };

    case "config":
      return { ...base, configKey: err.key };

    default:
      return base;
  }
}

/**
 * Get a user-friendly error message for display
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "not_found":
      return `❌ ${err.message}`;

    case "validation":
      return `⚠️ Invalid ${err.field}: ${err.message}`;

    case "permission_denied":
      return "❌ You don't have permission to use this command.";

    case "discord_api":
      if (err.code === 10062) {
        return "This interaction has expired. Please try the command again.";
      }
      if (err.code === 50013) {
        return "I don't have permission to do that.";
      }
      return "⚠️ An error has occurred, please try again.";

    case "config":
      return `Configuration error: ${err.key} is not set correctly.`;

    default:
      return "⚠️ An error has occurred, please try again.";
  }
}
