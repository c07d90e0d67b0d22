/**
 * Vetting Bot — tests/features/staffRating/staffRating.test.ts
 * WHAT: Roster matching, rating lines, the posting order and the preview text.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import {
  buildPreview,
  buildRatingLines,
  chunkMessage,
  findMemberByUsername,
  postRating,
  ratingChannelFor,
  type RatingLine,
  type RosterMember,
} from "../../../src/features/staffRating/index.js";
import type { CellReader } from "../../../src/features/staffRating/sheets.js";

const ROSTER: RosterMember[] = [
  { id: "1", displayName: "[CPT] | AlphaWolf | EST" },
  { id: "2", displayName: "[LT] | bravo | GMT" },
];

const LINES: RatingLine[] = [
  { kind: "header", text: "**Leads**" },
  { kind: "position", title: "Commander", holder: "alphawolf", member: { id: "1", displayName: "x" } },
  { kind: "position", title: "Deputy", holder: "N/A", member: null },
];

describe("findMemberByUsername", () => {
  it("matches a case-insensitive substring of the display name", () => {
    expect(findMemberByUsername(ROSTER, "BRAVO")).toEqual(ROSTER[1]);
  });

  it("returns the first match", () => {
    expect(findMemberByUsername(ROSTER, "|")).toEqual(ROSTER[0]);
  });

  it("never matches an empty cell", () => {
    expect(findMemberByUsername(ROSTER, "N/A")).toBeNull();
    expect(findMemberByUsername(ROSTER, "")).toBeNull();
  });
});

describe("buildRatingLines", () => {
  it("reads each position's cell and keeps headers in order", async () => {
    const readCell = vi.fn<CellReader>(async (_sheet, cell) => (cell === "E14:F14" ? "AlphaWolf" : "Nobody"));

    const lines = await buildRatingLines(
      [
        { header: "**Leads**" },
        { sheet: "Roster", cell: "E14:F14", title: "Commander" },
        { sheet: "Roster", cell: "E15", title: "Deputy" },
      ],
      readCell,
      ROSTER
    );

    expect(lines).toEqual([
      { kind: "header", text: "**Leads**" },
      { kind: "position", title: "Commander", holder: "AlphaWolf", member: ROSTER[0] },
      { kind: "position", title: "Deputy", holder: "Nobody", member: null },
    ]);
    expect(readCell).toHaveBeenCalledWith("Roster", "E14:F14");
  });
});

describe("postRating", () => {
  it("posts intro, headers and positions, reacting to positions only", async () => {
    const sent: string[] = [];
    const reactions: string[] = [];
    const channel = {
      send: vi.fn(async (content: string) => {
        sent.push(content);
        return { react: vi.fn(async (emoji: string) => reactions.push(`${content}:${emoji}`)) };
      }),
    };

    await postRating(channel, LINES, {
      intro: "Rate your staff",
      reactions: ["🟩", "🟥"],
      delays: { afterMessageMs: 0, afterReactionMs: 0 },
    });

    expect(sent).toEqual(["Rate your staff", "**Leads**", "Commander - <@1>", "Deputy - N/A"]);
    expect(reactions).toEqual([
      "Commander - <@1>:🟩",
      "Commander - <@1>:🟥",
      "Deputy - N/A:🟩",
      "Deputy - N/A:🟥",
    ]);
  });

  it("skips a blank intro", async () => {
    const channel = { send: vi.fn(async () => ({ react: vi.fn(async () => undefined) })) };

    await postRating(channel, [{ kind: "header", text: "H" }], {
      intro: "  ",
      reactions: [],
      delays: { afterMessageMs: 0, afterReactionMs: 0 },
    });

    expect(channel.send).toHaveBeenCalledTimes(1);
  });
});

describe("buildPreview", () => {
  it("marks matched holders", () => {
    expect(buildPreview(LINES)).toBe(
      "**Staff Rating Preview:**\n\n\n**Leads**\nCommander - <@1> ✓\nDeputy - N/A\n"
    );
  });
});

describe("chunkMessage", () => {
  it("returns short text whole", () => {
    expect(chunkMessage("short")).toEqual(["short"]);
  });

  it("splits on line boundaries and cuts overlong lines", () => {
    expect(chunkMessage("aaaa\nbbbb\ncccccccccccc", 10, 8)).toEqual(["aaaa\n", "bbbb\n", "cccccccc", "cccc"]);
  });
});

describe("ratingChannelFor", () => {
  const servers = { "10": { rating_channel_id: "20", auto_post: false } };

  it("looks up the guild's rating channel", () => {
    expect(ratingChannelFor(servers, "10")).toBe("20");
  });

  it("returns null for unknown guilds and DMs", () => {
    expect(ratingChannelFor(servers, "11")).toBeNull();
    expect(ratingChannelFor(servers, null)).toBeNull();
  });
});
