/**
 * Vetting Bot — src/features/filterCheck/render.ts
 * WHAT: Verdict → message text (yaml code blocks) plus the optional badge chart PNG.
 * WHY: Staff read results in a log channel; yaml highlighting keeps the keys readable.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { DiagnosticReporter } from "../../lib/reporter.js";
import { renderBadgeChart } from "./badgeGrowth.js";
import type { Approved, Denied, GroupAffiliation, Verdict } from "./types.js";

export type RenderedVerdict = {
  textBlock: string;
  chartArtifact: Buffer | null;
};

export type RenderOptions = {
  /** Chart failures are reported here; the text still goes out */
  reporter?: DiagnosticReporter;
};

function affiliation(entry: GroupAffiliation | null): string {
  return entry ? `${entry.groupName} (${entry.roleName})` : "None";
}

function affiliations(entries: readonly GroupAffiliation[]): string {
  return entries.length > 0 ? entries.map(affiliation).join(", ") : "None";
}

function listOrClear(names: readonly string[]): string {
  return names.length > 0 ? names.join(", ") : "Clear";
}

export function deniedText(verdict: Denied): string {
  return "```yaml\n" + `${verdict.subject} is ❌ DENIED ❌ [${verdict.reason}]\n` + "```";
}

export function approvedText(verdict: Approved, requesterMention: string): string {
  const { profile, discordUser, groups, blacklists } = verdict;
  const roblox = [
    "-------------ROBLOX INFO-------------",
    `Roblox Username: ${profile.username}`,
    `Roblox ID: ${profile.userId}`,
    `Roblox Account Age: ${profile.accountAgeDays} days old`,
    `Total Badges: ${profile.badgePages} pages, ${profile.badgeCount} badges`,
    `Followers: ${profile.followers}, Followings: ${profile.following}, Friends: ${profile.friends}`,
    `Major Blacklists: ${listOrClear(blacklists.major)}`,
    `Blacklists: ${listOrClear(blacklists.minor)}`,
    `Main Group: ${affiliation(groups.mainGroup)}`,
    `Main Divisions: ${affiliations(groups.mainDivisions)}`,
    `Sub Divisions: ${affiliations(groups.subDivisions)}`,
    `Intelligence Groups: ${affiliations(groups.intelligence)}`,
  ];
  const discord = [
    "-------------DISCORD INFO-------------",
    `Account Age: ${discordUser.accountAgeDays} days old`,
    `User_ID: ${discordUser.id}`,
    `Username: ${discordUser.tag}`,
    `Bot account: ${discordUser.bot}`,
    `Avatar URL: ${discordUser.avatarUrl ?? "None"}`,
  ];

  return [
    "```yaml",
    ...roblox,
    "```",
    "```yaml",
    ...discord,
    "```",
    requesterMention,
  ].join("\n");
}

export async function renderVerdict(
  verdict: Verdict,
  requesterMention: string,
  options: RenderOptions = {}
): Promise<RenderedVerdict> {
  if (verdict.kind === "denied") {
    return { textBlock: deniedText(verdict), chartArtifact: null };
  }

  const textBlock = approvedText(verdict, requesterMention);
  const { badgeSeries, profile } = verdict;
  if (!badgeSeries) {
    await options.reporter?.report({
      severity: "warning",
      kind: "not_found",
      message: `No valid badges to chart for ${profile.username} (${profile.userId}).`,
    });
    return { textBlock, chartArtifact: null };
  }

  try {
    const chartArtifact = await renderBadgeChart(badgeSeries, profile.username, profile.userId);
    return { textBlock, chartArtifact };
  } catch (err) {
    await options.reporter?.report({
      severity: "error",
      kind: "unknown",
      message: `Error generating badge graph for ${profile.username} (${profile.userId}): ${String(err)}`,
    });
    return { textBlock, chartArtifact: null };
  }
}
