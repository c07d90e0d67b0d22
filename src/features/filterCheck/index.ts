/**
 * Vetting Bot — src/features/filterCheck/index.ts
 * WHAT: Wires the fetchers to the pipeline from one config snapshot.
 * FLOWS: vetCandidate(identity) → runFilterCheck → render → publish
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { BotConfig, BotSettings } from "../../lib/config.js";
import type { ActorNotifier, DiagnosticReporter } from "../../lib/reporter.js";
import { fetchDiscordUser, type DiscordUserLookup } from "./discordUser.js";
import { runFilterCheck, type CheckSettings, type CheckSources } from "./pipeline.js";
import { publishVerdict, type ChannelResolver } from "./publish.js";
import { renderVerdict } from "./render.js";
import { BADGE_PAGE_DELAY_MS, REQUEST_TIMEOUT_MS, RobloxClient } from "./roblox.js";
import { TrelloBlacklist } from "./trello.js";
import type { CheckOutcome, IdentityPair } from "./types.js";

export { createIdentity } from "./types.js";
export type { CheckOutcome, IdentityPair, Verdict } from "./types.js";

export const INVALID_ID_NOTICE = "⚠️ Invalid Discord ID provided.";

export type TrelloCredentials = {
  apiKey: string | undefined;
  token: string | undefined;
};

export type FilterCheckDeps = {
  settings: BotSettings;
  trello: TrelloCredentials;
  users: DiscordUserLookup;
  reporter: DiagnosticReporter;
  /** The operator who ran the check */
  actor?: ActorNotifier;
  now?: () => Date;
  robloxTiming?: RobloxTiming;
};

export type RobloxTiming = {
  timeoutMs: number;
  pageDelayMs: number;
};

/** Optional tuning keys; absent or mistyped values keep the client defaults. */
export function robloxTiming(config: BotConfig): RobloxTiming {
  return {
    timeoutMs: config.get("filter_check.roblox.request_timeout_ms", REQUEST_TIMEOUT_MS),
    pageDelayMs: config.get("filter_check.roblox.badge_page_delay_ms", BADGE_PAGE_DELAY_MS),
  };
}

export function checkSettings(settings: BotSettings): CheckSettings {
  const { thresholds, trello } = settings.filter_check;
  return {
    minDiscordAgeDays: thresholds.min_discord_age_days,
    minBadgeCount: thresholds.min_badge_count,
    denyBlacklistCategories: trello.deny_blacklist_categories,
  };
}

export function createCheckSources(deps: FilterCheckDeps): CheckSources {
  const { settings, reporter, actor, now, robloxTiming: timing } = deps;
  const { roblox, trello } = settings.filter_check;

  const robloxClient = new RobloxClient({
    reporter,
    actor,
    now,
    timeoutMs: timing?.timeoutMs,
    pageDelayMs: timing?.pageDelayMs,
    groupIds: {
      mainGroup: roblox.main_group,
      mainDivisions: roblox.main_divisions,
      subDivisions: roblox.sub_divisions,
    },
  });
  const blacklist = new TrelloBlacklist({
    boardId: trello.board_id,
    apiKey: deps.trello.apiKey,
    token: deps.trello.token,
    majorCategories: trello.major_blacklist_categories,
    skipCategories: trello.skip_categories,
    reporter,
    now,
  });

  return {
    fetchDiscordUser: (id) => fetchDiscordUser(deps.users, id, { reporter, actor, now }),
    fetchProfile: (username) => robloxClient.fetchProfile(username),
    checkBlacklist: (identifiers) => blacklist.check(identifiers),
    fetchGroups: (userId) => robloxClient.fetchGroups(userId),
    fetchBadges: (userId) => robloxClient.fetchBadges(userId),
  };
}

export type VetRequest = {
  identity: IdentityPair;
  guildId: string | null;
  requesterMention: string;
  resolveChannel: ChannelResolver;
};

export type VetResult = {
  outcome: CheckOutcome;
  /** The verdict reached the result channel */
  published: boolean;
};

/**
 * Full run: pipeline, then render and publish from the pipeline's render hook.
 * An invalid_id denial is answered to the actor only and never published.
 */
export async function vetCandidate(
  request: VetRequest,
  deps: FilterCheckDeps,
  sources: CheckSources = createCheckSources(deps)
): Promise<VetResult> {
  const { reporter, actor, settings } = deps;
  let published = false;

  const outcome = await runFilterCheck(request.identity, sources, checkSettings(settings), {
    render: async (verdict) => {
      if (verdict.kind === "denied" && verdict.code === "invalid_id") {
        await reporter.report(
          {
            severity: "error",
            kind: "validation",
            message: "Invalid Discord ID provided.",
            userMessage: INVALID_ID_NOTICE,
          },
          actor
        );
        return;
      }

      const rendered = await renderVerdict(verdict, request.requesterMention, { reporter });
      published = await publishVerdict(
        {
          resolveChannel: request.resolveChannel,
          resultChannels: settings.filter_check.result_channels,
          reporter,
          actor,
        },
        request.guildId,
        rendered
      );
    },
  });

  return { outcome, published };
}
