/**
 * Vetting Bot — tests/features/filterCheck/render.test.ts
 * WHAT: Exact text of the published verdicts and the chart fallbacks.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";
import { approvedText, deniedText, renderVerdict } from "../../../src/features/filterCheck/render.js";
import type { Approved, Denied } from "../../../src/features/filterCheck/types.js";
import { DISCORD_USER, PROFILE } from "./fixtures.js";

const chart = vi.hoisted(() => ({ fail: false }));

vi.mock("../../../src/features/filterCheck/badgeGrowth.js", () => ({
  renderBadgeChart: vi.fn(async () => {
    if (chart.fail) throw new Error("no fonts");
    return Buffer.from("png");
  }),
}));

const DENIED: Denied = {
  kind: "denied",
  code: "insufficient_badges",
  reason: "NOT ENOUGH BADGES DETECTED (12/480)",
  subject: "Alpha",
};

function approved(overrides: Partial<Approved> = {}): Approved {
  return {
    kind: "approved",
    profile: { ...PROFILE, badgeCount: 500, badgePages: 17 },
    discordUser: DISCORD_USER,
    groups: {
      mainGroup: { groupName: "Main", roleName: "Private" },
      mainDivisions: [],
      subDivisions: [
        { groupName: "Sub B", roleName: "Member" },
        { groupName: "Sub C", roleName: "Officer" },
      ],
      intelligence: [],
    },
    blacklists: { major: [], minor: ["Watchlist"] },
    badges: [],
    badgeSeries: [
      { date: PROFILE.createdAt, count: 0 },
      { date: new Date("2022-03-01T00:00:00Z"), count: 1 },
    ],
    ...overrides,
  };
}

beforeEach(() => {
  chart.fail = false;
});

describe("deniedText", () => {
  it("wraps the denial line in a yaml block", () => {
    expect(deniedText(DENIED)).toBe(
      "```yaml\nAlpha is ❌ DENIED ❌ [NOT ENOUGH BADGES DETECTED (12/480)]\n```"
    );
  });
});

describe("approvedText", () => {
  it("renders both info blocks followed by the requester mention", () => {
    expect(approvedText(approved(), "<@999>").split("\n")).toEqual([
      "```yaml",
      "-------------ROBLOX INFO-------------",
      "Roblox Username: Alpha",
      "Roblox ID: 42",
      "Roblox Account Age: 400 days old",
      "Total Badges: 17 pages, 500 badges",
      "Followers: 10, Followings: 5, Friends: 3",
      "Major Blacklists: Clear",
      "Blacklists: Watchlist",
      "Main Group: Main (Private)",
      "Main Divisions: None",
      "Sub Divisions: Sub B (Member), Sub C (Officer)",
      "Intelligence Groups: None",
      "```",
      "```yaml",
      "-------------DISCORD INFO-------------",
      "Account Age: 200 days old",
      "User_ID: 111",
      "Username: candidate",
      "Bot account: false",
      "Avatar URL: None",
      "```",
      "<@999>",
    ]);
  });

  it("shows None for a candidate outside the main group", () => {
    const verdict = approved({
      groups: { mainGroup: null, mainDivisions: [], subDivisions: [], intelligence: [] },
    });
    expect(approvedText(verdict, "<@1>")).toContain("\nMain Group: None\n");
  });
});

describe("renderVerdict", () => {
  it("never charts a denial", async () => {
    const rendered = await renderVerdict(DENIED, "<@999>");
    expect(rendered).toEqual({ textBlock: deniedText(DENIED), chartArtifact: null });
  });

  it("attaches the chart for an approval", async () => {
    const rendered = await renderVerdict(approved(), "<@999>");
    expect(rendered.chartArtifact).toEqual(Buffer.from("png"));
  });

  it("warns and skips the chart when there is no series", async () => {
    const reporter = { report: vi.fn().mockResolvedValue(undefined) };

    const rendered = await renderVerdict(approved({ badgeSeries: null }), "<@999>", { reporter });

    expect(rendered.chartArtifact).toBeNull();
    expect(reporter.report).toHaveBeenCalledWith({
      severity: "warning",
      kind: "not_found",
      message: "No valid badges to chart for Alpha (42).",
    });
  });

  it("keeps the text when the chart fails to render", async () => {
    chart.fail = true;
    const reporter = { report: vi.fn().mockResolvedValue(undefined) };

    const rendered = await renderVerdict(approved(), "<@999>", { reporter });

    expect(rendered.textBlock).toBe(approvedText(approved(), "<@999>"));
    expect(rendered.chartArtifact).toBeNull();
    expect(reporter.report).toHaveBeenCalledWith({
      severity: "error",
      kind: "unknown",
      message: "Error generating badge graph for Alpha (42): Error: no fonts",
    });
  });
});
