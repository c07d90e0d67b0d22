/**
 * Vetting Bot — src/lib/http.ts
 * WHAT: Timeout-bounded JSON requests decoded through a zod schema.
 * WHY: Every upstream fetcher degrades the same way: a typed result on success,
 *      a classified failure otherwise, never an exception.
 * FLOWS: fetch(url, AbortSignal.timeout) → status check → res.json() → schema.safeParse
 *        A body that is not decoded is cancelled before returning.
 * DOCS:
 *  - fetch: https://nodejs.org/api/globals.html#fetch
 *  - AbortSignal.timeout: https://nodejs.org/api/globals.html#static-method-abortsignaltimeoutdelay
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { z } from "zod";
import { classifyError } from "./errors.js";
import { logger } from "./logger.js";

export type FetchFailureKind = "not_found" | "service_error" | "timeout";

export type FetchFailure = {
  kind: FetchFailureKind;
  /** HTTP status when the upstream answered at all */
  status?: number;
  message: string;
};

export type FetchResult<T> = { ok: true; data: T } | { ok: false; failure: FetchFailure };

export type RequestOptions = {
  method?: "GET" | "POST";
  /** Serialized as JSON with a matching Content-Type */
  body?: unknown;
  timeoutMs: number;
};

/**
 * Perform one request and decode the JSON body.
 * 404 is reported as not_found so callers can tell "no such user" from "Roblox is down".
 */
export async function requestJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  options: RequestOptions
): Promise<FetchResult<z.output<S>>> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? "GET",
      headers:
        options.body !== undefined
          ? { "Content-Type": "application/json", Accept: "application/json" }
          : { Accept: "application/json" },
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    return { ok: false, failure: failureFromThrown(err, options.timeoutMs) };
  }

  if (response.status === 404) {
    await releaseBody(response);
    return { ok: false, failure: { kind: "not_found", status: 404, message: "HTTP 404" } };
  }
  if (!response.ok) {
    await releaseBody(response);
    return {
      ok: false,
      failure: { kind: "service_error", status: response.status, message: `HTTP ${response.status}` },
    };
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    // The timeout signal also covers the body stream
    const failure = failureFromThrown(err, options.timeoutMs);
    if (failure.kind === "timeout") return { ok: false, failure };
    return {
      ok: false,
      failure: { kind: "service_error", status: response.status, message: "Invalid JSON body" },
    };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid";
    return {
      ok: false,
      failure: { kind: "service_error", status: response.status, message: `Malformed payload (${where})` },
    };
  }

  return { ok: true, data: parsed.data };
}

function failureFromThrown(err: unknown, timeoutMs: number): FetchFailure {
  const classified = classifyError(err);
  if (classified.kind === "timeout") {
    return { kind: "timeout", message: `Timed out after ${timeoutMs}ms` };
  }
  return { kind: "service_error", message: classified.message };
}

/**
 * POST for webhooks. Resolves to response.ok; rejects on network failure or timeout.
 */
export async function postJson(url: string, body: unknown, timeoutMs: number): Promise<boolean> {
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(timeoutMs),
  });
  await releaseBody(response);
  return response.ok;
}

/** Cancels an unread body so the connection goes back to the pool. */
async function releaseBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (err) {
    logger.debug({ err, status: response.status }, "[http] body cancel failed");
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
