/**
 * Vetting Bot — src/features/filterCheck/types.ts
 * WHAT: Shapes shared by the filter-check fetchers, pipeline and publisher.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** The two identities under vetting. discordId is the raw operator input. */
export type IdentityPair = Readonly<{
  robloxUsername: string;
  discordId: string;
}>;

export function createIdentity(robloxUsername: string, discordId: string): IdentityPair {
  return Object.freeze({ robloxUsername: robloxUsername.trim(), discordId: discordId.trim() });
}

/** Profile fields available before badge pagination runs. */
export type ProfileCore = {
  userId: number;
  username: string;
  accountAgeDays: number;
  createdAt: Date;
  followers: number;
  following: number;
  friends: number;
};

export type ProfileRecord = ProfileCore & {
  badgeCount: number;
  /** Pages of 30 on the public profile badge view */
  badgePages: number;
};

export type Badge = {
  name: string;
  createdAt: Date;
};

export type BadgeListing = {
  /** Badges that carried a creation timestamp */
  badges: Badge[];
  /** Every item seen across all pages, timestamped or not */
  count: number;
};

export type GroupAffiliation = {
  groupName: string;
  roleName: string;
};

export type GroupAffiliations = {
  mainGroup: GroupAffiliation | null;
  mainDivisions: GroupAffiliation[];
  subDivisions: GroupAffiliation[];
  intelligence: GroupAffiliation[];
};

export function emptyAffiliations(): GroupAffiliations {
  return { mainGroup: null, mainDivisions: [], subDivisions: [], intelligence: [] };
}

export type BlacklistFindings = {
  /** List names from the configured major categories, deduplicated, board order */
  major: string[];
  minor: string[];
};

export type DiscordUserInfo = {
  id: string;
  tag: string;
  accountAgeDays: number;
  createdAt: Date;
  bot: boolean;
  avatarUrl: string | null;
};

/** A step of the cumulative badge chart: at `date`, `count` badges had been earned. */
export type BadgeSeriesPoint = {
  date: Date;
  count: number;
};

export type DenialCode =
  | "invalid_id"
  | "account_too_young"
  | "major_blacklist"
  | "blacklist"
  | "insufficient_badges";

export type Denied = Readonly<{
  kind: "denied";
  code: DenialCode;
  reason: string;
  /** Name shown in the published line: Discord tag or Roblox username */
  subject: string;
}>;

/** Affiliations as carried by a verdict: copied and frozen at every level. */
export type FrozenAffiliations = Readonly<{
  mainGroup: Readonly<GroupAffiliation> | null;
  mainDivisions: readonly Readonly<GroupAffiliation>[];
  subDivisions: readonly Readonly<GroupAffiliation>[];
  intelligence: readonly Readonly<GroupAffiliation>[];
}>;

export type Approved = Readonly<{
  kind: "approved";
  profile: Readonly<ProfileRecord>;
  discordUser: Readonly<DiscordUserInfo>;
  groups: FrozenAffiliations;
  blacklists: Readonly<{ major: readonly string[]; minor: readonly string[] }>;
  badges: readonly Readonly<Badge>[];
  badgeSeries: readonly Readonly<BadgeSeriesPoint>[] | null;
}>;

export type Verdict = Approved | Denied;

export type PipelineState =
  | "Start"
  | "ParsedIdentity"
  | "FetchedExternalProfile"
  | "AgeChecked"
  | "FetchedProfileA"
  | "BlacklistChecked"
  | "MajorBlacklistChecked"
  | "MinorBlacklistChecked"
  | "GroupsFetched"
  | "BadgeThresholdChecked"
  | "Rendered"
  | "Done";

export type CheckOutcome =
  | { status: "verdict"; verdict: Verdict; trail: PipelineState[] }
  | { status: "aborted"; state: PipelineState; trail: PipelineState[] };
