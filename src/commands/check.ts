/**
 * Vetting Bot — src/commands/check.ts
 * WHAT: /check roblox_username discord_id, the filter check.
 * WHY: Staff vet a candidate's Roblox and Discord accounts in one step; the verdict
 *      goes to the guild's result channel, the invoker only sees progress.
 * FLOWS:
 *  - gate → defer → vetCandidate (pipeline → render → publish) → "✅ Check completed"
 * DOCS:
 *  - CommandInteraction: https://discord.js.org/#/docs/discord.js/main/class/CommandInteraction
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, interactionNotifier, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { fetchSendableChannel } from "../lib/channels.js";
import { logger } from "../lib/logger.js";
import { requirePermission } from "../lib/permissions.js";
import { createIdentity, robloxTiming, vetCandidate } from "../features/filterCheck/index.js";
import type { BotModule, BotServices } from "./registry.js";

export const data = new SlashCommandBuilder()
  .setName("check")
  .setDescription("Check a user's Roblox & Discord account information.")
  .addStringOption((option) =>
    option.setName("roblox_username").setDescription("The Roblox username to check.").setRequired(true)
  )
  .addStringOption((option) =>
    option.setName("discord_id").setDescription("The Discord user ID to check.").setRequired(true)
  );

export async function execute(ctx: CommandContext, services: BotServices): Promise<void> {
  const { interaction } = ctx;
  const config = services.config.current;

  ctx.step("gate");
  const allowed = await requirePermission(
    interaction,
    "filter_check",
    config.policy,
    "❌ You don't have permission to use filter check."
  );
  if (!allowed) return;

  ctx.step("defer");
  await ensureDeferred(interaction);
  await replyOrEdit(interaction, { content: "⏳ Processing the check..." });

  const identity = createIdentity(
    interaction.options.getString("roblox_username", true),
    interaction.options.getString("discord_id", true)
  );

  ctx.step("pipeline");
  const { outcome, published } = await vetCandidate(
    {
      identity,
      guildId: interaction.guildId,
      requesterMention: interaction.user.toString(),
      resolveChannel: (channelId) => fetchSendableChannel(services.client, channelId),
    },
    {
      settings: config.settings,
      trello: { apiKey: services.env.TRELLO_API_KEY, token: services.env.TRELLO_TOKEN },
      users: { fetchUser: (id) => services.client.users.fetch(id) },
      reporter: services.reporter(),
      actor: interactionNotifier(interaction),
      robloxTiming: robloxTiming(config),
    }
  );

  logger.info(
    {
      evt: "filter_check_done",
      traceId: ctx.traceId,
      status: outcome.status,
      verdict: outcome.status === "verdict" ? outcome.verdict.kind : null,
      denial:
        outcome.status === "verdict" && outcome.verdict.kind === "denied" ? outcome.verdict.code : null,
      trail: outcome.trail,
    },
    "[check] filter check finished"
  );

  if (published) {
    await replyOrEdit(interaction, { content: "✅ Check completed and logged." });
  }
}

export function createFilterCheckModule(services: BotServices): BotModule {
  return {
    name: "filter_check",
    commands: [{ data, execute: (ctx) => execute(ctx, services) }],
  };
}
