/**
 * Vetting Bot — tests/lib/sentry.test.ts
 * WHAT: Unit tests for the Sentry wrapper.
 * WHY: Tests never run with Sentry enabled, so every helper must be a no-op.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

const sdk = vi.hoisted(() => ({
  init: vi.fn(),
  captureException: vi.fn(),
  addBreadcrumb: vi.fn(),
  setTag: vi.fn(),
  setContext: vi.fn(),
  close: vi.fn(),
}));

vi.mock("@sentry/node", () => sdk);

import {
  addBreadcrumb,
  captureException,
  flushSentry,
  hasValidDsn,
  initializeSentry,
  isSentryEnabled,
  setTag,
} from "../../src/lib/sentry.js";

describe("hasValidDsn", () => {
  it("accepts key@host/project URLs", () => {
    expect(hasValidDsn("https://test-key@errors.example.test/42")).toBe(true);
  });

  it("rejects missing parts", () => {
    expect(hasValidDsn(undefined)).toBe(false);
    expect(hasValidDsn("")).toBe(false);
    expect(hasValidDsn("https://errors.example.test/42")).toBe(false);
    expect(hasValidDsn("https://test-key@errors.example.test/")).toBe(false);
    expect(hasValidDsn("not a url")).toBe(false);
  });
});

describe("under Vitest", () => {
  it("never initializes", () => {
    initializeSentry("1.0.0");
    expect(sdk.init).not.toHaveBeenCalled();
    expect(isSentryEnabled()).toBe(false);
  });

  it("makes every helper a no-op", async () => {
    expect(captureException(new Error("x"))).toBeNull();
    addBreadcrumb({ message: "m" });
    setTag("cmd", "check");
    expect(await flushSentry()).toBe(true);

    expect(sdk.captureException).not.toHaveBeenCalled();
    expect(sdk.addBreadcrumb).not.toHaveBeenCalled();
    expect(sdk.setTag).not.toHaveBeenCalled();
    expect(sdk.close).not.toHaveBeenCalled();
  });
});
