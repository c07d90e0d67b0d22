/**
 * Vetting Bot — src/lib/reqctx.ts
 * WHAT: Async-local request context carrying a trace id through one interaction.
 * WHY: Fetchers deep inside a vetting run log with the same traceId as the command
 *      that started it, without threading the id through every call.
 * FLOWS: runWithCtx({ cmd, userId, guildId }, fn) → ctx() anywhere below
 * DOCS:
 *  - AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export type InteractionKind = "slash" | "button" | "event" | "scheduler";

export type ReqContext = {
  traceId: string;
  cmd?: string;
  kind?: InteractionKind;
  userId?: string;
  guildId?: string | null;
};

const storage = new AsyncLocalStorage<ReqContext>();

const BASE62 = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";

/**
 * 11-char base62 id. Uniqueness is all that matters; the modulo bias is irrelevant here.
 */
export function newTraceId(): string {
  const bytes = randomBytes(11);
  let out = "";
  for (const byte of bytes) {
    out += BASE62[byte % BASE62.length];
  }
  return out;
}

/**
 * Binds a context for fn and everything it awaits. Nested calls inherit the parent's
 * fields unless they override them.
 *
 * discord.js event callbacks do not inherit a context; wrap each handler.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  const parent = storage.getStore();
  const next: ReqContext = {
    ...parent,
    ...meta,
    traceId: meta.traceId ?? parent?.traceId ?? newTraceId(),
  };
  return storage.run(next, fn);
}

/** Current context, or an empty object outside of one. */
export function ctx(): Partial<ReqContext> {
  return storage.getStore() ?? {};
}
