/**
 * Vetting Bot — src/lib/permissions.ts
 * WHAT: Permission gate for privileged commands (server allow-list + role allow-list).
 * WHY: Every module guards its commands with the same owner/test-server bypass rules.
 * FLOWS:
 *  - authorize(): pure decision over a PermissionPolicy
 *  - requirePermission(): interaction adapter → ephemeral denial on false
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MessageFlags, type ChatInputCommandInteraction, type ButtonInteraction } from "discord.js";
import { memberRoleIds } from "./typeGuards.js";

export type OperationName =
  | "filter_check"
  | "bot_management"
  | "invite_admin"
  | "invite_request"
  | "staff_rating";

export type OperationPolicy = {
  /** Empty = every server */
  allowedServerIds: ReadonlySet<string>;
  /** Empty = everyone */
  allowedRoleIds: ReadonlySet<string>;
};

export type PermissionPolicy = {
  ownerIds: ReadonlySet<string>;
  testServerIds: ReadonlySet<string>;
  operations: Readonly<Record<OperationName, OperationPolicy>>;
};

export type AuthorizeInput = {
  actorId: string;
  actorRoleIds: Iterable<string>;
  /** null for interactions outside a guild */
  guildId: string | null;
  operation: OperationName;
};

/**
 * Owners and test servers bypass everything. Otherwise the server check and the
 * role check must both pass, where an empty list passes its check.
 */
export function authorize(input: AuthorizeInput, policy: PermissionPolicy): boolean {
  const { actorId, actorRoleIds, guildId, operation } = input;

  if (policy.ownerIds.has(actorId)) return true;
  if (guildId !== null && policy.testServerIds.has(guildId)) return true;

  const op = policy.operations[operation];

  const serverOk =
    op.allowedServerIds.size === 0 || (guildId !== null && op.allowedServerIds.has(guildId));
  if (!serverOk) return false;

  if (op.allowedRoleIds.size === 0) return true;
  for (const roleId of actorRoleIds) {
    if (op.allowedRoleIds.has(roleId)) return true;
  }
  return false;
}

export function isOwner(userId: string, policy: PermissionPolicy): boolean {
  return policy.ownerIds.has(userId);
}

type GatedInteraction = ChatInputCommandInteraction | ButtonInteraction;

/**
 * Interaction-side gate. Replies with an ephemeral denial and returns false when the
 * actor is not authorized. Denials are user-visible only; nothing is logged.
 */
export async function requirePermission(
  interaction: GatedInteraction,
  operation: OperationName,
  policy: PermissionPolicy,
  denial = "❌ You don't have permission to use this command."
): Promise<boolean> {
  const allowed = authorize(
    {
      actorId: interaction.user.id,
      actorRoleIds: memberRoleIds(interaction.member),
      guildId: interaction.guildId,
      operation,
    },
    policy
  );
  if (allowed) return true;

  await interaction.reply({ content: denial, flags: MessageFlags.Ephemeral });
  return false;
}
