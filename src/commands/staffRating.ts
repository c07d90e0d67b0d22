/**
 * Vetting Bot — src/commands/staffRating.ts
 * WHAT: /post_rating and /preview_rating, plus the weekly automatic post.
 * WHY: The rating poll is rebuilt from the roster spreadsheet each time it is posted.
 * FLOWS:
 *  - /post_rating: gate(staff_rating) → server configured? → defer → build lines → post → ✅
 *  - /preview_rating: gate → defer → build lines → chunked ephemeral follow-ups
 *  - scheduler: every auto_post server, 2s apart
 * DOCS:
 *  - GuildMemberManager.fetch: https://discord.js.org/#/docs/discord.js/main/class/GuildMemberManager?scrollTo=fetch
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { MessageFlags, SlashCommandBuilder, type Guild } from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { fetchSendableChannel } from "../lib/channels.js";
import { STAFF_RATING_SCHEDULER_DISABLED } from "../lib/env.js";
import { sleep } from "../lib/http.js";
import { logger } from "../lib/logger.js";
import { requirePermission } from "../lib/permissions.js";
import {
  SheetsClient,
  buildPreview,
  buildRatingLines,
  chunkMessage,
  postRating,
  ratingChannelFor,
  type RatingLine,
  type RosterMember,
} from "../features/staffRating/index.js";
import { startStaffRatingScheduler, stopStaffRatingScheduler } from "../scheduler/staffRatingScheduler.js";
import type { BotModule, BotServices } from "./registry.js";

const NOT_CONFIGURED = "❌ This server is not configured for staff ratings. Please contact the bot owner.";
const BETWEEN_SERVERS_MS = 2000;

export const postRatingData = new SlashCommandBuilder()
  .setName("post_rating")
  .setDescription("Post the staff rating poll to this server's rating channel.");

export const previewRatingData = new SlashCommandBuilder()
  .setName("preview_rating")
  .setDescription("Preview the staff rating poll without posting it.");

async function rosterOf(guild: Guild): Promise<RosterMember[]> {
  const members = await guild.members.fetch();
  return members.map((member) => ({ id: member.id, displayName: member.displayName }));
}

async function ratingLinesFor(services: BotServices, guild: Guild | null): Promise<RatingLine[]> {
  const settings = services.config.current.settings.staff_rating;
  const sheets = new SheetsClient(settings.spreadsheet_id, services.env.GOOGLE_SHEETS_API_KEY);
  const members = guild ? await rosterOf(guild) : [];
  return buildRatingLines(settings.positions, (sheet, cell) => sheets.readCell(sheet, cell), members);
}

/**
 * Posts the full poll to the guild's rating channel. Returns false when the
 * channel cannot be resolved.
 */
export async function postRatingToGuild(services: BotServices, guild: Guild, channelId: string): Promise<boolean> {
  const channel = await fetchSendableChannel(services.client, channelId);
  if (!channel) return false;

  const settings = services.config.current.settings.staff_rating;
  const lines = await ratingLinesFor(services, guild);
  await postRating(channel, lines, { intro: settings.intro, reactions: settings.reactions });
  logger.info(
    { evt: "staff_rating_posted", guildId: guild.id, channelId, lines: lines.length },
    "[staffRating] rating posted"
  );
  return true;
}

export async function executePostRating(ctx: CommandContext, services: BotServices): Promise<void> {
  const { interaction } = ctx;
  const config = services.config.current;

  ctx.step("gate");
  if (!(await requirePermission(interaction, "staff_rating", config.policy))) return;

  const channelId = ratingChannelFor(config.settings.staff_rating.servers, interaction.guildId);
  if (!channelId || !interaction.guild) {
    await replyOrEdit(interaction, { content: NOT_CONFIGURED });
    return;
  }

  ctx.step("defer");
  await ensureDeferred(interaction);

  ctx.step("post");
  const posted = await postRatingToGuild(services, interaction.guild, channelId);
  await replyOrEdit(interaction, {
    content: posted ? "✅ Staff rating posted successfully!" : `❌ Could not find channel with ID ${channelId}`,
  });
}

export async function executePreviewRating(ctx: CommandContext, services: BotServices): Promise<void> {
  const { interaction } = ctx;
  const config = services.config.current;

  ctx.step("gate");
  if (!(await requirePermission(interaction, "staff_rating", config.policy))) return;

  ctx.step("defer");
  await ensureDeferred(interaction);

  ctx.step("build");
  const lines = await ratingLinesFor(services, interaction.guild);
  const chunks = chunkMessage(buildPreview(lines));

  ctx.step("reply");
  for (const chunk of chunks) {
    await interaction.followUp({ content: chunk, flags: MessageFlags.Ephemeral });
  }
}

/** Weekly run: every server with auto_post, one after another. */
export async function autoPostRatings(services: BotServices): Promise<void> {
  const servers = services.config.current.settings.staff_rating.servers;
  const targets = Object.entries(servers).filter(([, server]) => server.auto_post);

  for (const [index, [guildId, server]] of targets.entries()) {
    if (index > 0) await sleep(BETWEEN_SERVERS_MS);
    try {
      const guild = await services.client.guilds.fetch(guildId);
      const posted = await postRatingToGuild(services, guild, server.rating_channel_id);
      if (!posted) {
        logger.warn(
          { guildId, channelId: server.rating_channel_id },
          "[staffRating] auto-post skipped, rating channel unavailable"
        );
      }
    } catch (err) {
      logger.error({ err, guildId }, "[staffRating] auto-post failed for server");
    }
  }
}

export function createStaffRatingModule(services: BotServices): BotModule {
  return {
    name: "staff_rating",
    commands: [
      { data: postRatingData, execute: (ctx) => executePostRating(ctx, services) },
      { data: previewRatingData, execute: (ctx) => executePreviewRating(ctx, services) },
    ],
    start: () =>
      startStaffRatingScheduler({
        run: () => autoPostRatings(services),
        disabled: STAFF_RATING_SCHEDULER_DISABLED,
      }),
    dispose: () => stopStaffRatingScheduler(),
  };
}
