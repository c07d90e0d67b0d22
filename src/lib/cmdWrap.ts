/**
 * Vetting Bot — src/lib/cmdWrap.ts
 * WHAT: Helpers that standardize the interaction lifecycle: tracing, step logging, safe defers/replies.
 * WHY: Discord has a strict 3-second window for first responses; wrapping every handler
 *      keeps acknowledgement and failure handling in one place.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → ephemeral error reply on failure
 *  - ensureDeferred(): deferReply if not already replied/deferred (ephemeral)
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - Interaction response rules: https://discord.com/developers/docs/interactions/receiving-and-responding
 *  - InteractionReplyOptions: https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  type InteractionReplyOptions,
  type ChatInputCommandInteraction,
  type ButtonInteraction,
} from "discord.js";
import { logger } from "./logger.js";
import { addBreadcrumb, captureException, setContext, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId, runWithCtx } from "./reqctx.js";
import {
  classifyError,
  errorContext,
  isAlreadyAcknowledged,
  isInteractionExpired,
  shouldReportToSentry,
  userFriendlyMessage,
} from "./errors.js";
import type { ActorNotifier } from "./reporter.js";

/** Label for where we are in a handler: "it failed in fetch_profile" beats a bare stack. */
type Phase = string;

export type InstrumentedInteraction = ChatInputCommandInteraction | ButtonInteraction;

export type CommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction> = {
  interaction: I;
  /** Mark the current execution phase (e.g., "gate", "pipeline", "publish") */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  readonly traceId: string;
};

export type CommandExecutor<I extends InstrumentedInteraction = ChatInputCommandInteraction> = (
  ctx: CommandContext<I>
) => Promise<void>;

function inferKind(interaction: InstrumentedInteraction): "slash" | "button" {
  return "commandName" in interaction ? "slash" : "button";
}

export function wrapCommand<I extends InstrumentedInteraction>(
  name: string,
  fn: CommandExecutor<I>
) {
  /**
   * wrapCommand
   * WHAT: Decorates a handler with tracing, step logging, and error replies.
   * RETURNS: An interaction handler compatible with discord.js.
   * THROWS: Never to caller; failures are logged, reported and answered ephemerally.
   */
  return async (interaction: I): Promise<void> => {
    const traceId = reqCtx().traceId ?? newTraceId();
    const kind = inferKind(interaction);
    const startedAt = Date.now();
    let phase: Phase = "enter";

    const commandCtx: CommandContext<I> = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.info({ evt: "cmd_step", traceId, cmd: name, phase });
        addBreadcrumb({ category: "cmd", message: name, data: { phase, traceId }, level: "info" });
        setTag("phase", phase);
      },
      currentPhase: () => phase,
      traceId,
    };

    await runWithCtx(
      { traceId, cmd: name, kind, userId: interaction.user.id, guildId: interaction.guildId },
      async () => {
        logger.info(
          {
            evt: "cmd_start",
            traceId,
            cmd: name,
            kind,
            userId: interaction.user.id,
            guildId: interaction.guildId ?? "dm",
          },
          "command start"
        );
        setTag("cmd", name);
        setTag("traceId", traceId);
        setContext("discord", {
          userId: interaction.user.id,
          guildId: interaction.guildId ?? "dm",
          channelId: interaction.channelId ?? null,
        });

        try {
          await fn(commandCtx);
          logger.info({ evt: "cmd_ok", traceId, cmd: name, ms: Date.now() - startedAt }, "command ok");
        } catch (error) {
          const classified = classifyError(error);
          logger.error(
            { evt: "cmd_error", traceId, cmd: name, kind, phase, ...errorContext(classified), err: error },
            `command error: ${classified.message}`
          );
          if (shouldReportToSentry(classified)) {
            captureException(error, { cmd: name, phase, traceId, errorKind: classified.kind });
          }

          try {
            await replyOrEdit(interaction, {
              content: `${userFriendlyMessage(classified)}\n-# trace ${traceId}`,
            });
          } catch (replyErr) {
            logger.error({ err: replyErr, traceId, evt: "cmd_error_reply_fail" }, "Failed to send error reply");
          }
        }
      }
    );
  };
}

export async function ensureDeferred(interaction: InstrumentedInteraction): Promise<void> {
  /**
   * ensureDeferred
   * WHAT: First-time acknowledgement with an ephemeral deferReply.
   * THROWS: Re-throws everything except 10062 (expired), which is logged and swallowed.
   */
  if (interaction.deferred || interaction.replied) return;
  try {
    await interaction.deferReply({ flags: MessageFlags.Ephemeral });
  } catch (err) {
    const classified = classifyError(err);
    if (isInteractionExpired(classified)) {
      logger.warn({ evt: "cmd_defer_fail", traceId: reqCtx().traceId, err }, "defer failed (interaction expired)");
      return;
    }
    throw err;
  }
}

/**
 * Reply with the right API for the interaction's state. Ephemeral unless the payload
 * says otherwise; public output is always explicit.
 */
export async function replyOrEdit(
  interaction: InstrumentedInteraction,
  payload: InteractionReplyOptions
): Promise<void> {
  const withFlags = { ...payload, flags: payload.flags ?? MessageFlags.Ephemeral };
  try {
    if (interaction.deferred) {
      const { flags: _flags, ...editPayload } = withFlags;
      await interaction.editReply(editPayload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const classified = classifyError(err);
    const logPayload = { evt: "cmd_reply_fail", traceId: reqCtx().traceId, err };
    if (isInteractionExpired(classified)) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (isAlreadyAcknowledged(classified)) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    throw err;
  }
}

/**
 * Adapts an interaction to the reporter's actor notifier: diagnostics end up as the
 * invoker's ephemeral reply.
 */
export function interactionNotifier(interaction: InstrumentedInteraction): ActorNotifier {
  return {
    notify: (content: string) => replyOrEdit(interaction, { content }),
  };
}
