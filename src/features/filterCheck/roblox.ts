/**
 * Roblox public API client for the filter check.
 *
 * Every method degrades to a sentinel (null, 0, empty listing) and hands the failure to
 * the diagnostic reporter. Nothing here throws.
 *
 * Endpoints are unauthenticated and rate limited per IP, which is why badge pages are
 * spaced out and every request has a 1 s bound.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { requestJson, sleep, type FetchFailure } from "../../lib/http.js";
import { containsNormalized } from "../../lib/normalize.js";
import type { ActorNotifier, DiagnosticReporter } from "../../lib/reporter.js";
import {
  emptyAffiliations,
  type Badge,
  type BadgeListing,
  type GroupAffiliation,
  type GroupAffiliations,
  type ProfileCore,
} from "./types.js";

export const REQUEST_TIMEOUT_MS = 1_000;
export const BADGE_PAGE_DELAY_MS = 100;
const BADGE_PAGE_SIZE = 100;
/** Badge page size of the public profile page */
const PROFILE_BADGES_PER_PAGE = 30;
const DAY_MS = 86_400_000;

const isoDate = z.string().datetime({ offset: true });

const usernameLookupSchema = z.object({
  data: z.array(z.object({ id: z.number().int().positive(), name: z.string() })),
});

const userSchema = z.object({
  name: z.string().min(1),
  created: isoDate,
});

const inventorySchema = z.object({
  canView: z.boolean().default(false),
});

const countSchema = z.object({
  count: z.number().int().min(0),
});

const badgePageSchema = z.object({
  data: z
    .array(z.object({ name: z.string(), created: isoDate.optional() }))
    .default([]),
  nextPageCursor: z.string().nullish(),
});

const groupRolesSchema = z.object({
  data: z.array(
    z.object({
      group: z.object({ id: z.number().int(), name: z.string() }),
      role: z.object({ name: z.string() }),
    })
  ),
});

export type SocialEndpoint = "followers" | "followings" | "friends";

export type GroupIds = {
  mainGroup: number | null;
  mainDivisions: readonly number[];
  subDivisions: readonly number[];
};

export type RobloxClientOptions = {
  reporter: DiagnosticReporter;
  groupIds: GroupIds;
  /** The operator running the check; profile failures are echoed to them */
  actor?: ActorNotifier;
  now?: () => Date;
  timeoutMs?: number;
  pageDelayMs?: number;
};

export function accountAgeDays(createdAt: Date, now: Date): number {
  return Math.floor((now.getTime() - createdAt.getTime()) / DAY_MS);
}

export function badgePages(badgeCount: number): number {
  return Math.ceil(badgeCount / PROFILE_BADGES_PER_PAGE);
}

export class RobloxClient {
  private readonly reporter: DiagnosticReporter;
  private readonly groupIds: GroupIds;
  private readonly actor: ActorNotifier | undefined;
  private readonly now: () => Date;
  private readonly timeoutMs: number;
  private readonly pageDelayMs: number;

  constructor(options: RobloxClientOptions) {
    this.reporter = options.reporter;
    this.groupIds = options.groupIds;
    this.actor = options.actor;
    this.now = options.now ?? (() => new Date());
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.pageDelayMs = options.pageDelayMs ?? BADGE_PAGE_DELAY_MS;
  }

  /**
   * Exact-match username → id. An empty result is not_found, which is told apart
   * from the service being down.
   */
  async lookupUserId(username: string): Promise<number | null> {
    const result = await requestJson(
      "https://users.roblox.com/v1/usernames/users",
      usernameLookupSchema,
      {
        method: "POST",
        body: { usernames: [username], excludeBannedUsers: false },
        timeoutMs: this.timeoutMs,
      }
    );

    if (!result.ok) {
      await this.failed(result.failure, `Failed to fetch user ID for Roblox username ${username}`, username);
      return null;
    }

    const match = result.data.data[0];
    if (!match) {
      await this.reporter.report(
        {
          severity: "error",
          kind: "not_found",
          message: `Roblox user **${username}** not found.`,
          userMessage: `❌ Roblox user **${username}** not found.`,
        },
        this.actor
      );
      return null;
    }
    return match.id;
  }

  /**
   * Identity, age, inventory visibility and social counts. A private inventory makes
   * the whole profile unavailable. Social counts fail individually to 0.
   */
  async fetchProfile(username: string): Promise<ProfileCore | null> {
    const userId = await this.lookupUserId(username);
    if (userId === null) return null;

    const user = await requestJson(`https://users.roblox.com/v1/users/${userId}`, userSchema, {
      timeoutMs: this.timeoutMs,
    });
    if (!user.ok) {
      if (user.failure.kind === "not_found") {
        await this.reporter.report(
          {
            severity: "error",
            kind: "not_found",
            message: `Roblox user with ID ${userId} not found. (404)`,
            userMessage: `❌ Roblox user with ID **${userId}** was not found.`,
          },
          this.actor
        );
      } else {
        await this.failed(user.failure, `Failed to fetch user info for Roblox ID ${userId}`, `${username} (${userId})`);
      }
      return null;
    }

    const name = user.data.name;
    const createdAt = new Date(user.data.created);

    const inventory = await requestJson(
      `https://inventory.roblox.com/v1/users/${userId}/can-view-inventory`,
      inventorySchema,
      { timeoutMs: this.timeoutMs }
    );
    if (!inventory.ok) {
      await this.failed(
        inventory.failure,
        `Failed to fetch inventory visibility for Roblox ID ${userId}`,
        `${name} (${userId})`
      );
      return null;
    }
    if (!inventory.data.canView) {
      const text = `Roblox user **${name} (${userId})** has their inventory set to private.`;
      await this.reporter.report(
        { severity: "error", kind: "not_found", message: text, userMessage: `❌ ${text}` },
        this.actor
      );
      return null;
    }

    const followers = await this.fetchSocialCount(userId, "followers");
    const following = await this.fetchSocialCount(userId, "followings");
    const friends = await this.fetchSocialCount(userId, "friends");

    return {
      userId,
      username: name,
      accountAgeDays: accountAgeDays(createdAt, this.now()),
      createdAt,
      followers,
      following,
      friends,
    };
  }

  async fetchSocialCount(userId: number, endpoint: SocialEndpoint): Promise<number> {
    const result = await requestJson(
      `https://friends.roblox.com/v1/users/${userId}/${endpoint}/count`,
      countSchema,
      { timeoutMs: this.timeoutMs }
    );
    if (result.ok) return result.data.count;

    await this.reporter.report(
      {
        severity: "error",
        kind: result.failure.kind,
        message: `Error fetching ${endpoint} for user ${userId}: ${result.failure.message}`,
      },
      this.actor
    );
    return 0;
  }

  /**
   * Walks the cursor until the upstream stops returning one. A failed page ends the
   * walk and keeps what was collected so far.
   */
  async fetchBadges(userId: number): Promise<BadgeListing> {
    const badges: Badge[] = [];
    let count = 0;
    let cursor: string | null = null;

    for (;;) {
      const url: string =
        `https://badges.roblox.com/v1/users/${userId}/badges?limit=${BADGE_PAGE_SIZE}` +
        (cursor ? `&cursor=${encodeURIComponent(cursor)}` : "");
      const page = await requestJson(url, badgePageSchema, { timeoutMs: this.timeoutMs });

      if (!page.ok) {
        await this.reporter.report({
          severity: "error",
          kind: page.failure.kind,
          message: `Failed to fetch badges for user ${userId}: ${page.failure.message}`,
        });
        break;
      }

      count += page.data.data.length;
      for (const item of page.data.data) {
        if (item.created) {
          badges.push({ name: item.name, createdAt: new Date(item.created) });
        }
      }

      cursor = page.data.nextPageCursor ?? null;
      if (!cursor) break;
      await sleep(this.pageDelayMs);
    }

    return { badges, count };
  }

  /**
   * One listing call, partitioned by configured ids. The three id buckets are not
   * exclusive. Failure yields the empty affiliations, never a partial result.
   */
  async fetchGroups(userId: number): Promise<GroupAffiliations> {
    const result = await requestJson(
      `https://groups.roblox.com/v1/users/${userId}/groups/roles`,
      groupRolesSchema,
      { timeoutMs: this.timeoutMs }
    );
    if (!result.ok) {
      await this.reporter.report({
        severity: "warning",
        kind: result.failure.kind,
        message: `Failed to fetch groups for user ${userId}: ${result.failure.message}`,
      });
      return emptyAffiliations();
    }

    return partitionGroups(result.data.data, this.groupIds);
  }

  private async failed(failure: FetchFailure, context: string, subject: string): Promise<void> {
    const message =
      failure.kind === "timeout"
        ? `Timeout fetching data for Roblox user **${subject}**`
        : `${context}: ${failure.message}`;
    await this.reporter.report({ severity: "error", kind: failure.kind, message }, this.actor);
  }
}

type GroupRole = {
  group: { id: number; name: string };
  role: { name: string };
};

export function partitionGroups(memberships: readonly GroupRole[], ids: GroupIds): GroupAffiliations {
  const result = emptyAffiliations();

  for (const { group, role } of memberships) {
    const entry: GroupAffiliation = { groupName: group.name, roleName: role.name };

    if (ids.mainDivisions.includes(group.id)) result.mainDivisions.push(entry);
    if (ids.subDivisions.includes(group.id)) result.subDivisions.push(entry);
    if (group.id === ids.mainGroup) result.mainGroup = entry;

    if (containsNormalized(group.name, "intelligence") || containsNormalized(role.name, "intelligence")) {
      result.intelligence.push(entry);
    }
  }

  return result;
}
