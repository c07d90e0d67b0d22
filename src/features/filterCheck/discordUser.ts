/**
 * Vetting Bot — src/features/filterCheck/discordUser.ts
 * WHAT: Discord user lookup for the candidate's Discord id.
 * WHY: Account age is the first vetting gate; the tag and avatar go into the report.
 * DOCS:
 *  - UserManager.fetch: https://discord.js.org/#/docs/discord.js/main/class/UserManager?scrollTo=fetch
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { classifyError, isUnknownUser } from "../../lib/errors.js";
import type { ActorNotifier, DiagnosticReporter } from "../../lib/reporter.js";
import { accountAgeDays } from "./roblox.js";
import type { DiscordUserInfo } from "./types.js";

/** The slice of discord.js User the lookup reads. */
export type DiscordUserLike = {
  id: string;
  username: string;
  discriminator: string;
  bot: boolean;
  createdAt: Date;
  avatarURL(): string | null;
};

/** Usually `{ fetchUser: (id) => client.users.fetch(id) }` */
export type DiscordUserLookup = {
  fetchUser(id: string): Promise<DiscordUserLike>;
};

export type DiscordUserFetchOptions = {
  reporter: DiagnosticReporter;
  actor?: ActorNotifier;
  now?: () => Date;
};

/** Migrated accounts carry discriminator "0" and have no #suffix. */
export function userTag(user: Pick<DiscordUserLike, "username" | "discriminator">): string {
  return user.discriminator === "0" ? user.username : `${user.username}#${user.discriminator}`;
}

export async function fetchDiscordUser(
  lookup: DiscordUserLookup,
  id: string,
  options: DiscordUserFetchOptions
): Promise<DiscordUserInfo | null> {
  let user: DiscordUserLike;
  try {
    user = await lookup.fetchUser(id);
  } catch (err) {
    const classified = classifyError(err);
    if (isUnknownUser(classified)) {
      await options.reporter.report(
        {
          severity: "error",
          kind: "not_found",
          message: `Discord user with ID ${id} not found.`,
          userMessage: `❌ Discord user with ID **${id}** was not found.`,
        },
        options.actor
      );
    } else {
      await options.reporter.report(
        {
          severity: "error",
          kind: "service_error",
          message: `HTTP error fetching Discord user ${id}: ${classified.message}`,
        },
        options.actor
      );
    }
    return null;
  }

  const now = options.now?.() ?? new Date();
  return {
    id: user.id,
    tag: userTag(user),
    accountAgeDays: accountAgeDays(user.createdAt, now),
    createdAt: user.createdAt,
    bot: user.bot,
    avatarUrl: user.avatarURL(),
  };
}
