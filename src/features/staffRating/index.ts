// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * Vetting Bot — src/features/staffRating/index.ts
 * WHAT: Staff rating poll built from spreadsheet cells: one message per position,
 *       reactions as the vote.
 * WHY: The roster changes weekly; the poll mirrors whoever currently holds each post.
 * FLOWS:
 *  - buildRatingLines(): positions → readCell → match holder to a guild member
 *  - postRating(): intro → headers and positions → reactions, spaced out for rate limits
 *  - buildPreview() + chunkMessage(): the same lines as one ephemeral text
 */

import { sleep } from "../../lib/http.js";
import type { RatingPosition } from "../../lib/config.js";
import { EMPTY_CELL, type CellReader } from "./sheets.js";

export { SheetsClient, EMPTY_CELL, type CellReader } from "./sheets.js";

export const DISCORD_MESSAGE_LIMIT = 2000;
const PREVIEW_CHUNK_SIZE = 1900;

export type RosterMember = {
  id: string;
  displayName: string;
};

export type RatingLine =
  | { kind: "header"; text: string }
  | { kind: "position"; title: string; holder: string; member: RosterMember | null };

export type RatingChannel = {
  send(content: string): Promise<{ react(emoji: string): Promise<unknown> }>;
};

export type PostDelays = {
  afterMessageMs: number;
  afterReactionMs: number;
};

const DEFAULT_DELAYS: PostDelays = { afterMessageMs: 100, afterReactionMs: 300 };

/**
 * Display names look like "[RANK] | username | timezone", so the holder's username is
 * matched as a case-insensitive substring. First match wins.
 */
export function findMemberByUsername(
  members: Iterable<RosterMember>,
  username: string
): RosterMember | null {
  if (!username || username === EMPTY_CELL) return null;
  const needle = username.toLowerCase();
  for (const member of members) {
    if (member.displayName.toLowerCase().includes(needle)) return member;
  }
  return null;
}

export async function buildRatingLines(
  positions: readonly RatingPosition[],
  readCell: CellReader,
  members: readonly RosterMember[]
): Promise<RatingLine[]> {
  const lines: RatingLine[] = [];
  for (const position of positions) {
    if ("header" in position) {
      lines.push({ kind: "header", text: position.header });
      continue;
    }
    const holder = await readCell(position.sheet, position.cell);
    lines.push({
      kind: "position",
      title: position.title,
      holder,
      member: findMemberByUsername(members, holder),
    });
  }
  return lines;
}

function positionText(line: Extract<RatingLine, { kind: "position" }>): string {
  return `${line.title} - ${line.member ? `<@${line.member.id}>` : line.holder}`;
}

export async function postRating(
  channel: RatingChannel,
  lines: readonly RatingLine[],
  options: { intro: string; reactions: readonly string[]; delays?: PostDelays }
): Promise<void> {
  const delays = options.delays ?? DEFAULT_DELAYS;

  if (options.intro.trim()) {
    await channel.send(options.intro);
    await sleep(delays.afterMessageMs);
  }

  for (const line of lines) {
    if (line.kind === "header") {
      await channel.send(line.text);
      await sleep(delays.afterMessageMs);
      continue;
    }

    const message = await channel.send(positionText(line));
    for (const emoji of options.reactions) {
      await message.react(emoji);
      await sleep(delays.afterReactionMs);
    }
    await sleep(delays.afterMessageMs);
  }
}

export function buildPreview(lines: readonly RatingLine[]): string {
  let text = "**Staff Rating Preview:**\n\n";
  for (const line of lines) {
    if (line.kind === "header") {
      text += `\n${line.text}\n`;
    } else {
      text += `${positionText(line)}${line.member ? " ✓" : ""}\n`;
    }
  }
  return text;
}

/**
 * Splits on line boundaries into pieces of at most `size` characters. Text within the
 * message limit is returned whole; a single overlong line is cut hard.
 */
export function chunkMessage(
  text: string,
  limit = DISCORD_MESSAGE_LIMIT,
  size = PREVIEW_CHUNK_SIZE
): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let current = "";
  for (const line of text.split(/(?<=\n)/)) {
    if (current.length + line.length <= size) {
      current += line;
      continue;
    }
    if (current) chunks.push(current);
    current = "";
    let rest = line;
    while (rest.length > size) {
      chunks.push(rest.slice(0, size));
      rest = rest.slice(size);
    }
    current = rest;
  }
  if (current) chunks.push(current);
  return chunks;
}

/** Rating channel configured for a guild, if any. */
export function ratingChannelFor(
  servers: Readonly<Record<string, { rating_channel_id: string; auto_post: boolean }>>,
  guildId: string | null
): string | null {
  if (guildId === null) return null;
  return servers[guildId]?.rating_channel_id ?? null;
}
