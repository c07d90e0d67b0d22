/**
 * Vetting Bot — src/features/filterCheck/pipeline.ts
 * WHAT: The filter check as a linear state walk with short-circuit verdicts.
 * WHY: Each check gates the next fetch, so a denied candidate costs as few upstream
 *      calls as possible and the trail shows exactly how far a run got.
 * FLOWS:
 *  Start → ParsedIdentity → FetchedExternalProfile → AgeChecked → FetchedProfileA
 *    → BlacklistChecked → MajorBlacklistChecked → MinorBlacklistChecked
 *    → GroupsFetched → BadgeThresholdChecked → (Rendered) → Done
 *
 * A fetcher returning null aborts the run. The fetcher has already reported why, so an
 * abort carries no verdict and nothing is published.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { buildBadgeSeries } from "./badgeGrowth.js";
import { badgePages } from "./roblox.js";
import type {
  Approved,
  BadgeListing,
  BlacklistFindings,
  CheckOutcome,
  DenialCode,
  Denied,
  DiscordUserInfo,
  GroupAffiliations,
  IdentityPair,
  PipelineState,
  ProfileCore,
  Verdict,
} from "./types.js";

/** Upstream reads, in the order the pipeline calls them. */
export interface CheckSources {
  fetchDiscordUser(discordId: string): Promise<DiscordUserInfo | null>;
  fetchProfile(robloxUsername: string): Promise<ProfileCore | null>;
  checkBlacklist(identifiers: readonly string[]): Promise<BlacklistFindings | null>;
  fetchGroups(userId: number): Promise<GroupAffiliations>;
  fetchBadges(userId: number): Promise<BadgeListing>;
}

export type CheckSettings = {
  minDiscordAgeDays: number;
  minBadgeCount: number;
  /** Minor categories whose name contains one of these (any case) deny */
  denyBlacklistCategories: readonly string[];
};

export type CheckHooks = {
  /** Runs once a verdict exists; the trail records Rendered after it resolves. */
  render?: (verdict: Verdict) => Promise<void>;
};

const SNOWFLAKE = /^\d+$/;

/** Copies the fetcher-owned entries so the verdict shares nothing mutable with them. */
function frozenList<T extends object>(items: readonly T[]): readonly Readonly<T>[] {
  return Object.freeze(items.map((item) => Object.freeze({ ...item })));
}

function deny(code: DenialCode, reason: string, subject: string): Denied {
  return Object.freeze({ kind: "denied", code, reason, subject });
}

/** Minor findings that name a deny keyword. */
export function denyingCategories(minor: readonly string[], keywords: readonly string[]): string[] {
  const lowered = keywords.map((k) => k.toLowerCase());
  return minor.filter((category) => {
    const name = category.toLowerCase();
    return lowered.some((keyword) => name.includes(keyword));
  });
}

export async function runFilterCheck(
  identity: IdentityPair,
  sources: CheckSources,
  settings: CheckSettings,
  hooks: CheckHooks = {}
): Promise<CheckOutcome> {
  const trail: PipelineState[] = [];
  const enter = (state: PipelineState) => {
    trail.push(state);
  };

  const finish = async (verdict: Verdict): Promise<CheckOutcome> => {
    if (hooks.render) {
      await hooks.render(verdict);
      enter("Rendered");
    }
    enter("Done");
    return { status: "verdict", verdict, trail };
  };
  const abort = (state: PipelineState): CheckOutcome => ({ status: "aborted", state, trail });

  enter("Start");

  if (!SNOWFLAKE.test(identity.discordId)) {
    return finish(deny("invalid_id", "INVALID DISCORD ID", identity.discordId));
  }
  enter("ParsedIdentity");

  const discordUser = await sources.fetchDiscordUser(identity.discordId);
  if (!discordUser) return abort("FetchedExternalProfile");
  enter("FetchedExternalProfile");

  if (discordUser.accountAgeDays < settings.minDiscordAgeDays) {
    return finish(deny("account_too_young", "DISCORD ACCOUNT TOO YOUNG", discordUser.tag));
  }
  enter("AgeChecked");

  const profile = await sources.fetchProfile(identity.robloxUsername);
  if (!profile) return abort("FetchedProfileA");
  enter("FetchedProfileA");

  // Board unreadable: proceed as if clean
  const findings = (await sources.checkBlacklist([profile.username, identity.discordId])) ?? {
    major: [],
    minor: [],
  };
  enter("BlacklistChecked");

  if (findings.major.length > 0) {
    return finish(
      deny("major_blacklist", `MAJOR BLACKLIST DETECTED: ${findings.major.join(", ")}`, profile.username)
    );
  }
  enter("MajorBlacklistChecked");

  const denying = denyingCategories(findings.minor, settings.denyBlacklistCategories);
  if (denying.length > 0) {
    return finish(deny("blacklist", `BLACKLIST DETECTED: ${denying.join(", ")}`, profile.username));
  }
  enter("MinorBlacklistChecked");

  const groups = await sources.fetchGroups(profile.userId);
  const listing = await sources.fetchBadges(profile.userId);
  enter("GroupsFetched");

  if (listing.count < settings.minBadgeCount) {
    return finish(
      deny(
        "insufficient_badges",
        `NOT ENOUGH BADGES DETECTED (${listing.count}/${settings.minBadgeCount})`,
        profile.username
      )
    );
  }
  enter("BadgeThresholdChecked");

  const series = buildBadgeSeries(listing.badges, profile.createdAt);
  const approved: Approved = Object.freeze({
    kind: "approved",
    profile: Object.freeze({ ...profile, badgeCount: listing.count, badgePages: badgePages(listing.count) }),
    discordUser: Object.freeze({ ...discordUser }),
    groups: Object.freeze({
      mainGroup: groups.mainGroup ? Object.freeze({ ...groups.mainGroup }) : null,
      mainDivisions: frozenList(groups.mainDivisions),
      subDivisions: frozenList(groups.subDivisions),
      intelligence: frozenList(groups.intelligence),
    }),
    blacklists: Object.freeze({
      major: Object.freeze([...findings.major]),
      minor: Object.freeze([...findings.minor]),
    }),
    badges: frozenList(listing.badges),
    badgeSeries: series ? frozenList(series) : null,
  });
  return finish(approved);
}
