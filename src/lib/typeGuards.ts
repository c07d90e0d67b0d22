/**
 * Vetting Bot — src/lib/typeGuards.ts
 * WHAT: Type guards for Discord.js member types and untyped payloads.
 * WHY: Discord provides GuildMember (cached) or APIInteractionGuildMember (uncached);
 *      thrown values and JSON arrive as unknown. Narrow instead of casting.
 * DOCS:
 *  - GuildMember: https://discord.js.org/#/docs/discord.js/main/class/GuildMember
 *  - APIInteractionGuildMember: https://discord-api-types.dev/api/discord-api-types-v10/interface/APIInteractionGuildMember
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { GuildMember, APIInteractionGuildMember } from "discord.js";

/**
 * Type guard to check if interaction member is a full GuildMember.
 * APIInteractionGuildMember has string permissions and a plain roles array.
 */
export function isGuildMember(
  member: GuildMember | APIInteractionGuildMember | null | undefined
): member is GuildMember {
  if (!member) return false;
  return typeof member.permissions !== "string" && !Array.isArray(member.roles);
}

/**
 * Role ids of an interaction member, cached or not.
 * Works on the raw API shape too, so permission checks never need a member fetch.
 */
export function memberRoleIds(
  member: GuildMember | APIInteractionGuildMember | null | undefined
): string[] {
  if (!member) return [];
  if (isGuildMember(member)) return [...member.roles.cache.keys()];
  return [...member.roles];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
