/**
 * Vetting Bot — tests/lib/http.test.ts
 * WHAT: Unit tests for the timeout-bounded JSON client.
 * HOW: Global fetch is stubbed; nothing leaves the process.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { postJson, requestJson } from "../../src/lib/http.js";

const schema = z.object({ id: z.number() });

/** A streamed body whose cancel() is observable. */
function trackedBody(text: string) {
  const cancel = vi.fn();
  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      controller.enqueue(new TextEncoder().encode(text));
    },
    cancel,
  });
  return { stream, cancel };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("requestJson", () => {
  it("decodes a valid payload", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ id: 7, extra: true })));

    const result = await requestJson("https://api.test/x", schema, { timeoutMs: 1000 });

    expect(result).toEqual({ ok: true, data: { id: 7 } });
  });

  it("sends a JSON body on POST", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ id: 1 }));
    vi.stubGlobal("fetch", fetchMock);

    await requestJson("https://api.test/x", schema, { method: "POST", body: { a: 1 }, timeoutMs: 1000 });

    const [, init] = fetchMock.mock.calls[0] ?? [];
    expect(init).toMatchObject({
      method: "POST",
      body: '{"a":1}',
      headers: { "Content-Type": "application/json", Accept: "application/json" },
    });
  });

  it("maps 404 to not_found", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({}, 404)));

    const result = await requestJson("https://api.test/x", schema, { timeoutMs: 1000 });

    expect(result).toEqual({ ok: false, failure: { kind: "not_found", status: 404, message: "HTTP 404" } });
  });

  it("maps 500 to service_error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({}, 500)));

    const result = await requestJson("https://api.test/x", schema, { timeoutMs: 1000 });

    expect(result).toEqual({ ok: false, failure: { kind: "service_error", status: 500, message: "HTTP 500" } });
  });

  it("maps a schema mismatch to service_error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ id: "seven" })));

    const result = await requestJson("https://api.test/x", schema, { timeoutMs: 1000 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe("service_error");
      expect(result.failure.message).toBe("Malformed payload (id: Expected number, received string)");
    }
  });

  it("maps an aborted request to timeout", async () => {
    const abort = new DOMException("The operation was aborted due to timeout", "TimeoutError");
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(abort));

    const result = await requestJson("https://api.test/x", schema, { timeoutMs: 250 });

    expect(result).toEqual({ ok: false, failure: { kind: "timeout", message: "Timed out after 250ms" } });
  });

  it("maps a network failure to service_error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    const result = await requestJson("https://api.test/x", schema, { timeoutMs: 1000 });

    expect(result).toEqual({ ok: false, failure: { kind: "service_error", message: "fetch failed" } });
  });
});

describe("response body release", () => {
  it("cancels the body of a failed status", async () => {
    const { stream, cancel } = trackedBody("upstream down");
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(stream, { status: 503 })));

    const result = await requestJson("https://api.test/x", schema, { timeoutMs: 1000 });

    expect(result).toEqual({ ok: false, failure: { kind: "service_error", status: 503, message: "HTTP 503" } });
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("cancels the body of a 404", async () => {
    const { stream, cancel } = trackedBody("missing");
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(stream, { status: 404 })));

    const result = await requestJson("https://api.test/x", schema, { timeoutMs: 1000 });

    expect(result).toMatchObject({ ok: false, failure: { kind: "not_found" } });
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("cancels the webhook answer in postJson", async () => {
    const { stream, cancel } = trackedBody('{"id":"1"}');
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(stream, { status: 200 })));

    await expect(postJson("https://hook.test", { content: "hi" }, 1000)).resolves.toBe(true);
    expect(cancel).toHaveBeenCalledTimes(1);
  });
});

describe("postJson", () => {
  it("resolves to response.ok", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(null, { status: 204 })));
    await expect(postJson("https://hook.test", { content: "hi" }, 1000)).resolves.toBe(true);
  });

  it("resolves false on a rejected status", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("no", { status: 400 })));
    await expect(postJson("https://hook.test", { content: "hi" }, 1000)).resolves.toBe(false);
  });
});
