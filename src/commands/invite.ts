/**
 * Vetting Bot — src/commands/invite.ts
 * WHAT: /sendinvitepanel, /resetinvite, the invite_button handler and the
 *       member-leave cleanup.
 * WHY: Invite admins post the panel once; candidates click it to get their invite.
 * FLOWS:
 *  - /sendinvitepanel: gate(invite_admin) → public panel message
 *  - invite_button: requestInvite() → ephemeral outcome
 *  - /resetinvite user: gate(invite_admin) → resetInvite()
 *  - guildMemberRemove: forgetDepartedMember()
 * DOCS:
 *  - Buttons: https://discordjs.guide/message-components/buttons.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { MessageFlags, SlashCommandBuilder, type ButtonInteraction } from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { requirePermission } from "../lib/permissions.js";
import { memberRoleIds } from "../lib/typeGuards.js";
import { userTag } from "../features/filterCheck/discordUser.js";
import {
  INVITE_BUTTON_ID,
  INVITE_REPLIES,
  buildInvitePanel,
  createInviteAuditLog,
  forgetDepartedMember,
  requestInvite,
  resetInvite,
  type InviteFactory,
} from "../features/invite/index.js";
import type { BotSettings } from "../lib/config.js";
import type { BotModule, BotServices } from "./registry.js";

const NOT_AUTHORIZED = "❌ You are not authorized.";

export const sendInvitePanelData = new SlashCommandBuilder()
  .setName("sendinvitepanel")
  .setDescription("Send the permanent invite panel.");

export const resetInviteData = new SlashCommandBuilder()
  .setName("resetinvite")
  .setDescription("Reset a user's invite eligibility.")
  .addUserOption((option) =>
    option.setName("user").setDescription("The user whose invite is reset").setRequired(true)
  );

/**
 * Invite factory for the configured target channel, or null when the target is
 * incomplete.
 */
export function targetInviteFactory(
  services: BotServices,
  target: BotSettings["invite"]["target"]
): InviteFactory | null {
  const { guild_id: guildId, channel_id: channelId } = target;
  if (!guildId || !channelId) return null;

  return async ({ maxAgeSeconds }) => {
    const guild = await services.client.guilds.fetch(guildId);
    const channel = await guild.channels.fetch(channelId);
    if (!channel || !("createInvite" in channel)) {
      throw new Error(`Invite target channel ${channelId} cannot hold invites`);
    }
    const invite = await channel.createInvite({
      maxUses: 1,
      maxAge: maxAgeSeconds,
      unique: true,
      reason: "One-time invite from the invite panel",
    });
    return invite.url;
  };
}

export async function executeSendInvitePanel(ctx: CommandContext, services: BotServices): Promise<void> {
  const { interaction } = ctx;
  const config = services.config.current;

  ctx.step("gate");
  if (!(await requirePermission(interaction, "invite_admin", config.policy, NOT_AUTHORIZED))) return;

  ctx.step("send_panel");
  await interaction.reply(buildInvitePanel(config.settings.invite));
}

export async function executeResetInvite(ctx: CommandContext, services: BotServices): Promise<void> {
  const { interaction } = ctx;
  const config = services.config.current;

  ctx.step("gate");
  if (!(await requirePermission(interaction, "invite_admin", config.policy, NOT_AUTHORIZED))) return;

  ctx.step("reset");
  const user = interaction.options.getUser("user", true);
  const content = await resetInvite({ id: user.id, tag: userTag(user) }, userTag(interaction.user), {
    store: services.inviteStore,
    audit: createInviteAuditLog(config.settings.invite.log_webhook_url),
  });
  // Public reply, so the reset is visible to the other admins.
  await interaction.reply({ content });
}

export async function executeInviteButton(
  ctx: CommandContext<ButtonInteraction>,
  services: BotServices
): Promise<void> {
  const { interaction } = ctx;
  const config = services.config.current;
  const settings = config.settings.invite;

  ctx.step("defer");
  await ensureDeferred(interaction);

  ctx.step("request");
  const outcome = await requestInvite(
    {
      id: interaction.user.id,
      tag: userTag(interaction.user),
      roleIds: memberRoleIds(interaction.member),
      guildId: interaction.guildId,
      sendDm: (content) => interaction.user.send(content),
    },
    {
      settings,
      policy: config.policy,
      store: services.inviteStore,
      createInvite: targetInviteFactory(services, settings.target),
      audit: createInviteAuditLog(settings.log_webhook_url),
    }
  );

  logger.info(
    { evt: "invite_request", traceId: ctx.traceId, userId: interaction.user.id, outcome: outcome.kind },
    "[invite] invite requested"
  );
  await replyOrEdit(interaction, { content: INVITE_REPLIES[outcome.kind], flags: MessageFlags.Ephemeral });
}

export function createInviteModule(services: BotServices): BotModule {
  return {
    name: "invite",
    commands: [
      { data: sendInvitePanelData, execute: (ctx) => executeSendInvitePanel(ctx, services) },
      { data: resetInviteData, execute: (ctx) => executeResetInvite(ctx, services) },
    ],
    buttons: [{ customId: INVITE_BUTTON_ID, execute: (ctx) => executeInviteButton(ctx, services) }],
    onMemberRemove: async (member) => {
      const settings = services.config.current.settings.invite;
      await forgetDepartedMember(member, {
        store: services.inviteStore,
        settings,
        audit: createInviteAuditLog(settings.log_webhook_url),
      });
    },
  };
}
