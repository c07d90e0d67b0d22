// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * Vetting Bot — src/features/invite/index.ts
 * WHAT: One-time invite panel: button → checks → single-use invite by DM → tracked.
 * WHY: Candidates who passed vetting get exactly one invite to the target server.
 * FLOWS:
 *  - requestInvite(): gate → claim (already invited?) → create invite → DM → audit log
 *    (the claim is released when no invite gets delivered)
 *  - resetInvite(): remove from the tracked set → audit log
 *  - forgetDepartedMember(): member left a control server → remove → audit log
 * DOCS:
 *  - GuildChannel#createInvite: https://discord.js.org/#/docs/discord.js/main/class/GuildChannel?scrollTo=createInvite
 */

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
} from "discord.js";
import type { BotSettings } from "../../lib/config.js";
import { classifyError, isDmBlocked } from "../../lib/errors.js";
import { postJson } from "../../lib/http.js";
import { logger } from "../../lib/logger.js";
import { authorize, isOwner, type PermissionPolicy } from "../../lib/permissions.js";
import type { InviteStore } from "./store.js";

export { InviteStore } from "./store.js";

export const INVITE_BUTTON_ID = "invite_button";

const AUDIT_WEBHOOK_TIMEOUT_MS = 10_000;

type InviteSettings = BotSettings["invite"];

// ============================================================================
// Panel
// ============================================================================

export function buildInvitePanel(settings: InviteSettings) {
  const embed = new EmbedBuilder()
    .setTitle(settings.panel_title)
    .setDescription(settings.panel_description)
    .setColor(0xffffff);

  const row = new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(INVITE_BUTTON_ID)
      .setLabel("Get Invite")
      .setStyle(ButtonStyle.Primary)
  );

  return { embeds: [embed], components: [row] };
}

export function formatInviteDm(template: string, inviteUrl: string): string {
  return template.split("{invite}").join(inviteUrl);
}

// ============================================================================
// Audit log
// ============================================================================

export type InviteAuditLog = {
  /** Never rejects. */
  log(message: string): Promise<void>;
};

export function createInviteAuditLog(webhookUrl: string): InviteAuditLog {
  return {
    async log(message) {
      logger.info({ evt: "invite_audit" }, message);
      if (!webhookUrl) return;
      try {
        const ok = await postJson(webhookUrl, { content: message }, AUDIT_WEBHOOK_TIMEOUT_MS);
        if (!ok) logger.warn({ evt: "invite_audit_rejected" }, "[invite] log webhook rejected the message");
      } catch (err) {
        logger.warn({ evt: "invite_audit_fail", err }, "[invite] log webhook failed");
      }
    },
  };
}

// ============================================================================
// Request flow
// ============================================================================

export type InviteRequester = {
  id: string;
  tag: string;
  roleIds: readonly string[];
  guildId: string | null;
  sendDm(content: string): Promise<unknown>;
};

/** Creates a single-use invite to the target channel and returns its URL. */
export type InviteFactory = (options: { maxAgeSeconds: number }) => Promise<string>;

export type InviteDeps = {
  settings: InviteSettings;
  policy: PermissionPolicy;
  store: InviteStore;
  /** null when invite.target is not configured */
  createInvite: InviteFactory | null;
  audit: InviteAuditLog;
};

export type InviteOutcome =
  | { kind: "wrong_server" }
  | { kind: "missing_role" }
  | { kind: "already_invited" }
  | { kind: "not_configured" }
  | { kind: "dm_blocked" }
  | { kind: "invited"; url: string };

export const INVITE_REPLIES: Readonly<Record<InviteOutcome["kind"], string>> = {
  wrong_server: "❌ This button can only be used in approved servers.",
  missing_role: "❌ You do not have the required role to request an invite.",
  already_invited: "❌ You already received an invite.",
  not_configured: "⚠️ The invite target is not configured. Please contact a bot owner.",
  dm_blocked: "⚠️ I could not DM you. Please enable DMs.",
  invited: "📩 Check your DMs! I've sent your invite.",
};

function serverAllowed(policy: PermissionPolicy, guildId: string | null): boolean {
  const servers = policy.operations.invite_request.allowedServerIds;
  return servers.size === 0 || (guildId !== null && servers.has(guildId));
}

/**
 * Owners skip the one-invite limit and are never tracked. A user whose DMs are
 * closed is not tracked either, so they can retry after opening them.
 */
export async function requestInvite(
  requester: InviteRequester,
  deps: InviteDeps
): Promise<InviteOutcome> {
  const { policy, store, settings } = deps;

  const allowed = authorize(
    {
      actorId: requester.id,
      actorRoleIds: requester.roleIds,
      guildId: requester.guildId,
      operation: "invite_request",
    },
    policy
  );
  if (!allowed) {
    return serverAllowed(policy, requester.guildId) ? { kind: "missing_role" } : { kind: "wrong_server" };
  }

  const owner = isOwner(requester.id, policy);
  // Check and track in one step: concurrent clicks get one invite
  if (!owner && !(await store.claim(requester.id))) {
    return { kind: "already_invited" };
  }
  const release = async (): Promise<void> => {
    if (!owner) await store.remove(requester.id);
  };

  if (!deps.createInvite) {
    await release();
    logger.warn({ evt: "invite_not_configured" }, "[invite] invite.target is not configured");
    return { kind: "not_configured" };
  }

  let url: string;
  try {
    url = await deps.createInvite({ maxAgeSeconds: settings.max_age_seconds });
    await requester.sendDm(formatInviteDm(settings.dm_message, url));
  } catch (err) {
    await release();
    if (isDmBlocked(classifyError(err))) {
      logger.info({ evt: "invite_dm_blocked", userId: requester.id }, "[invite] DMs closed");
      return { kind: "dm_blocked" };
    }
    throw err;
  }

  await deps.audit.log(`🎟️ **${requester.tag}** (ID: ${requester.id}) requested an invite.`);

  return { kind: "invited", url };
}

export async function resetInvite(
  target: { id: string; tag: string },
  actorTag: string,
  deps: Pick<InviteDeps, "store" | "audit">
): Promise<string> {
  const removed = await deps.store.remove(target.id);
  if (!removed) return "ℹ️ That user was not restricted.";

  await deps.audit.log(`🔄 Eligibility reset for ${target.tag} by ${actorTag}.`);
  return `✅ Reset invite eligibility for **${target.tag}**.`;
}

/**
 * Leaving any control server gives the member their invite back.
 */
export async function forgetDepartedMember(
  member: { id: string; tag: string; guildId: string },
  deps: Pick<InviteDeps, "store" | "audit" | "settings">
): Promise<boolean> {
  const controls = deps.settings.control_servers;
  if (controls.length > 0 && !controls.includes(member.guildId)) return false;

  const removed = await deps.store.remove(member.id);
  if (removed) {
    await deps.audit.log(
      `🚪 **${member.tag}** (ID: ${member.id}) left a control server, removed from invite list.`
    );
  }
  return removed;
}
