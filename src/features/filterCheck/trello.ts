/**
 * Vetting Bot — src/features/filterCheck/trello.ts
 * WHAT: Blacklist lookup against a Trello board whose lists are blacklist categories.
 * WHY: Staff maintain the blacklist as cards; a card title naming the candidate's
 *      Roblox username or Discord id puts the candidate in that list's category.
 * FLOWS: GET board lists with open cards → skip categories → drop expired cards → bucket list names
 * DOCS:
 *  - Trello boards/{id}/lists: https://developer.atlassian.com/cloud/trello/rest/api-group-boards/#api-boards-id-lists-get
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { requestJson } from "../../lib/http.js";
import type { DiagnosticReporter } from "../../lib/reporter.js";
import type { BlacklistFindings } from "./types.js";

const TRELLO_TIMEOUT_MS = 10_000;

const boardListsSchema = z.array(
  z.object({
    name: z.string(),
    cards: z
      .array(z.object({ name: z.string(), due: z.string().nullish() }))
      .default([]),
  })
);

export type BoardLists = z.output<typeof boardListsSchema>;

export type TrelloBlacklistOptions = {
  boardId: string;
  apiKey: string | undefined;
  token: string | undefined;
  majorCategories: readonly string[];
  skipCategories: readonly string[];
  reporter: DiagnosticReporter;
  now?: () => Date;
  timeoutMs?: number;
};

export class TrelloBlacklist {
  constructor(private readonly options: TrelloBlacklistOptions) {}

  /**
   * Findings for any of the identifiers, or null when the board could not be read.
   */
  async check(identifiers: readonly string[]): Promise<BlacklistFindings | null> {
    const { boardId, apiKey, token, reporter } = this.options;
    if (!boardId || !apiKey || !token) {
      await reporter.report({
        severity: "warning",
        kind: "config",
        message: "Trello blacklist is not configured (board id, TRELLO_API_KEY or TRELLO_TOKEN missing)",
      });
      return null;
    }

    // Credentials go in the query string; never log this URL.
    const url =
      `https://api.trello.com/1/boards/${encodeURIComponent(boardId)}/lists` +
      `?cards=open&card_fields=name,due&fields=name` +
      `&key=${encodeURIComponent(apiKey)}&token=${encodeURIComponent(token)}`;

    const result = await requestJson(url, boardListsSchema, {
      timeoutMs: this.options.timeoutMs ?? TRELLO_TIMEOUT_MS,
    });
    if (!result.ok) {
      await reporter.report({
        severity: "warning",
        kind: result.failure.kind,
        message: `Failed to fetch Trello board: ${result.failure.message}`,
      });
      return null;
    }

    const now = this.options.now?.() ?? new Date();
    return collectFindings(result.data, identifiers, this.options, now);
  }
}

/**
 * A list name is recorded at most once, in board order. Cards whose due date has
 * passed are expired entries and never match.
 */
export function collectFindings(
  lists: BoardLists,
  identifiers: readonly string[],
  categories: Pick<TrelloBlacklistOptions, "majorCategories" | "skipCategories">,
  now: Date
): BlacklistFindings {
  const findings: BlacklistFindings = { major: [], minor: [] };
  const needles = identifiers.filter((id) => id.length > 0).map((id) => id.toLowerCase());

  for (const list of lists) {
    if (categories.skipCategories.includes(list.name)) continue;

    const matched = list.cards.some((card) => {
      if (card.due) {
        const due = new Date(card.due);
        if (!Number.isNaN(due.getTime()) && due < now) return false;
      }
      const title = card.name.toLowerCase();
      return needles.some((needle) => title.includes(needle));
    });
    if (!matched) continue;

    const bucket = categories.majorCategories.includes(list.name) ? findings.major : findings.minor;
    if (!bucket.includes(list.name)) bucket.push(list.name);
  }

  return findings;
}
