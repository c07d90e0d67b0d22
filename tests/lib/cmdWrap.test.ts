/**
 * WHAT: Proves wrapCommand emits step logs and answers thrown errors with a traced reply.
 * HOW: Uses hoisted vitest mocks for logger/sentry and a fake ChatInputCommandInteraction.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi, beforeEach } from "vitest";
import { MessageFlags, type ChatInputCommandInteraction } from "discord.js";

// vi.hoisted() runs before the ES module imports below, so the mocks take effect.
const loggerMock = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: loggerMock,
}));

const sentryMock = vi.hoisted(() => ({
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  setContext: vi.fn(),
  setTag: vi.fn(),
}));

vi.mock("../../src/lib/sentry.js", () => sentryMock);

vi.mock("../../src/lib/reqctx.js", () => ({
  ctx: vi.fn(() => ({})),
  newTraceId: vi.fn(() => "trace-fixed"),
  runWithCtx: vi.fn((_meta: unknown, fn: () => unknown) => fn()),
}));

import {
  ensureDeferred,
  interactionNotifier,
  replyOrEdit,
  wrapCommand,
} from "../../src/lib/cmdWrap.js";

type FakeState = { deferred: boolean; replied: boolean };

function createInteraction(state: Partial<FakeState> = {}) {
  const interaction = {
    commandName: "check",
    user: { id: "user-1", username: "tester" },
    guildId: "guild-1",
    channelId: "chan-1",
    deferred: state.deferred ?? false,
    replied: state.replied ?? false,
    reply: vi.fn().mockResolvedValue(undefined),
    followUp: vi.fn().mockResolvedValue(undefined),
    editReply: vi.fn().mockResolvedValue(undefined),
    deferReply: vi.fn().mockResolvedValue(undefined),
  };
  return interaction;
}

function asInteraction(fake: ReturnType<typeof createInteraction>): ChatInputCommandInteraction {
  return fake as unknown as ChatInputCommandInteraction;
}

function discordError(code: number) {
  const err = new Error(`code ${code}`);
  err.name = "DiscordAPIError";
  return Object.assign(err, { code });
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe("wrapCommand", () => {
  it("logs start, step, and completion on success", async () => {
    const fake = createInteraction();
    let phase = "";
    const handler = wrapCommand("check", async (ctx) => {
      ctx.step("pipeline");
      phase = ctx.currentPhase();
    });

    await handler(asInteraction(fake));

    expect(phase).toBe("pipeline");
    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_start", traceId: "trace-fixed", cmd: "check", kind: "slash" }),
      "command start"
    );
    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_step", phase: "pipeline" })
    );
    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_ok", cmd: "check" }),
      "command ok"
    );
    expect(fake.reply).not.toHaveBeenCalled();
  });

  it("logs the failing phase and replies with the trace id", async () => {
    const fake = createInteraction();
    const handler = wrapCommand("check", async (ctx) => {
      ctx.step("publish");
      throw new Error("boom");
    });

    await expect(handler(asInteraction(fake))).resolves.toBeUndefined();

    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({
        evt: "cmd_error",
        cmd: "check",
        phase: "publish",
        traceId: "trace-fixed",
        errorKind: "unknown",
        errorMessage: "boom",
      }),
      "command error: boom"
    );
    expect(sentryMock.captureException).toHaveBeenCalledTimes(1);
    expect(fake.reply).toHaveBeenCalledWith({
      content: "⚠️ An error has occurred, please try again.\n-# trace trace-fixed",
      flags: MessageFlags.Ephemeral,
    });
  });

  it("does not send expected Discord errors to Sentry", async () => {
    const fake = createInteraction();
    const handler = wrapCommand("check", async () => {
      throw discordError(50013);
    });

    await handler(asInteraction(fake));

    expect(sentryMock.captureException).not.toHaveBeenCalled();
  });
});

describe("ensureDeferred", () => {
  it("defers ephemerally once", async () => {
    const fake = createInteraction();
    await ensureDeferred(asInteraction(fake));
    expect(fake.deferReply).toHaveBeenCalledWith({ flags: MessageFlags.Ephemeral });
  });

  it("does nothing when already deferred", async () => {
    const fake = createInteraction({ deferred: true });
    await ensureDeferred(asInteraction(fake));
    expect(fake.deferReply).not.toHaveBeenCalled();
  });

  it("swallows an expired interaction", async () => {
    const fake = createInteraction();
    fake.deferReply.mockRejectedValue(discordError(10062));
    await expect(ensureDeferred(asInteraction(fake))).resolves.toBeUndefined();
  });

  it("rethrows anything else", async () => {
    const fake = createInteraction();
    fake.deferReply.mockRejectedValue(new Error("network"));
    await expect(ensureDeferred(asInteraction(fake))).rejects.toThrow("network");
  });
});

describe("replyOrEdit", () => {
  it("edits the deferred reply without flags", async () => {
    const fake = createInteraction({ deferred: true });
    await replyOrEdit(asInteraction(fake), { content: "done" });
    expect(fake.editReply).toHaveBeenCalledWith({ content: "done" });
  });

  it("follows up after a reply", async () => {
    const fake = createInteraction({ replied: true });
    await replyOrEdit(asInteraction(fake), { content: "more" });
    expect(fake.followUp).toHaveBeenCalledWith({ content: "more", flags: MessageFlags.Ephemeral });
  });

  it("replies ephemerally on a fresh interaction", async () => {
    const fake = createInteraction();
    await replyOrEdit(asInteraction(fake), { content: "hi" });
    expect(fake.reply).toHaveBeenCalledWith({ content: "hi", flags: MessageFlags.Ephemeral });
  });

  it("swallows already-acknowledged errors", async () => {
    const fake = createInteraction();
    fake.reply.mockRejectedValue(discordError(40060));
    await expect(replyOrEdit(asInteraction(fake), { content: "hi" })).resolves.toBeUndefined();
  });
});

describe("interactionNotifier", () => {
  it("notifies through replyOrEdit", async () => {
    const fake = createInteraction({ deferred: true });
    await interactionNotifier(asInteraction(fake)).notify("❌ not found");
    expect(fake.editReply).toHaveBeenCalledWith({ content: "❌ not found" });
  });
});
