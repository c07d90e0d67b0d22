/**
 * Vetting Bot — tests/features/filterCheck/roblox.test.ts
 * WHAT: Roblox client against a routed fetch stub.
 * WHY: Every failure must degrade to a sentinel with exactly one diagnostic.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import {
  RobloxClient,
  accountAgeDays,
  badgePages,
  partitionGroups,
  type GroupIds,
} from "../../../src/features/filterCheck/roblox.js";
import { json, requestedUrls, stubFetch, timeout } from "../../utils/fetchStub.js";

const GROUP_IDS: GroupIds = { mainGroup: 100, mainDivisions: [200, 201], subDivisions: [300] };

function setup() {
  const reporter = { report: vi.fn().mockResolvedValue(undefined) };
  const actor = { notify: vi.fn().mockResolvedValue(undefined) };
  const client = new RobloxClient({
    reporter,
    actor,
    groupIds: GROUP_IDS,
    now: () => new Date("2020-01-31T00:00:00Z"),
    pageDelayMs: 0,
  });
  return { reporter, actor, client };
}

const lookupOk = () => json({ data: [{ id: 42, name: "Alpha" }] });
const userOk = () => json({ name: "Alpha", created: "2020-01-01T00:00:00Z" });

describe("accountAgeDays / badgePages", () => {
  it("floors whole days", () => {
    expect(accountAgeDays(new Date("2020-01-01T00:00:00Z"), new Date("2020-01-03T23:59:00Z"))).toBe(2);
  });

  it("counts 30 badges per profile page", () => {
    expect(badgePages(0)).toBe(0);
    expect(badgePages(30)).toBe(1);
    expect(badgePages(31)).toBe(2);
  });
});

describe("RobloxClient.lookupUserId", () => {
  it("posts the exact-match lookup body", async () => {
    const fetchMock = stubFetch({ "/v1/usernames/users": lookupOk });
    const { client } = setup();

    await expect(client.lookupUserId("Alpha")).resolves.toBe(42);

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"usernames":["Alpha"],"excludeBannedUsers":false}');
  });

  it("reports an unknown username to the actor", async () => {
    stubFetch({ "/v1/usernames/users": () => json({ data: [] }) });
    const { client, reporter, actor } = setup();

    await expect(client.lookupUserId("Ghost")).resolves.toBeNull();

    expect(reporter.report).toHaveBeenCalledWith(
      {
        severity: "error",
        kind: "not_found",
        message: "Roblox user **Ghost** not found.",
        userMessage: "❌ Roblox user **Ghost** not found.",
      },
      actor
    );
  });

  it("reports a timeout with the subject", async () => {
    stubFetch({ "/v1/usernames/users": timeout });
    const { client, reporter, actor } = setup();

    await expect(client.lookupUserId("Alpha")).resolves.toBeNull();

    expect(reporter.report).toHaveBeenCalledWith(
      { severity: "error", kind: "timeout", message: "Timeout fetching data for Roblox user **Alpha**" },
      actor
    );
  });
});

describe("RobloxClient.fetchProfile", () => {
  it("assembles the profile", async () => {
    stubFetch({
      "/v1/usernames/users": lookupOk,
      "/v1/users/42/can-view-inventory": () => json({ canView: true }),
      "/v1/users/42/followers/count": () => json({ count: 10 }),
      "/v1/users/42/followings/count": () => json({ count: 5 }),
      "/v1/users/42/friends/count": () => json({ count: 3 }),
      "/v1/users/42": userOk,
    });
    const { client, reporter } = setup();

    const profile = await client.fetchProfile("alpha");

    expect(profile).toEqual({
      userId: 42,
      username: "Alpha",
      accountAgeDays: 30,
      createdAt: new Date("2020-01-01T00:00:00Z"),
      followers: 10,
      following: 5,
      friends: 3,
    });
    expect(reporter.report).not.toHaveBeenCalled();
  });

  it("reports a private inventory exactly once", async () => {
    const fetchMock = stubFetch({
      "/v1/usernames/users": lookupOk,
      "/v1/users/42/can-view-inventory": () => json({ canView: false }),
      "/v1/users/42": userOk,
    });
    const { client, reporter, actor } = setup();

    await expect(client.fetchProfile("Alpha")).resolves.toBeNull();

    expect(reporter.report).toHaveBeenCalledTimes(1);
    expect(reporter.report).toHaveBeenCalledWith(
      {
        severity: "error",
        kind: "not_found",
        message: "Roblox user **Alpha (42)** has their inventory set to private.",
        userMessage: "❌ Roblox user **Alpha (42)** has their inventory set to private.",
      },
      actor
    );
    expect(requestedUrls(fetchMock).some((url) => url.includes("/count"))).toBe(false);
  });

  it("reports a missing user id as not found", async () => {
    stubFetch({
      "/v1/usernames/users": lookupOk,
      "/v1/users/42": () => json({}, 404),
    });
    const { client, reporter, actor } = setup();

    await expect(client.fetchProfile("Alpha")).resolves.toBeNull();

    expect(reporter.report).toHaveBeenCalledWith(
      expect.objectContaining({ kind: "not_found", userMessage: "❌ Roblox user with ID **42** was not found." }),
      actor
    );
  });

  it("falls back to 0 for a failed social count", async () => {
    stubFetch({
      "/v1/usernames/users": lookupOk,
      "/v1/users/42/can-view-inventory": () => json({ canView: true }),
      "/v1/users/42/followers/count": () => json({}, 503),
      "/v1/users/42/followings/count": () => json({ count: 5 }),
      "/v1/users/42/friends/count": () => json({ count: 3 }),
      "/v1/users/42": userOk,
    });
    const { client, reporter, actor } = setup();

    const profile = await client.fetchProfile("Alpha");

    expect(profile?.followers).toBe(0);
    expect(profile?.following).toBe(5);
    expect(reporter.report).toHaveBeenCalledWith(
      { severity: "error", kind: "service_error", message: "Error fetching followers for user 42: HTTP 503" },
      actor
    );
  });
});

describe("RobloxClient.fetchBadges", () => {
  it("follows the cursor and keeps only dated badges", async () => {
    const fetchMock = stubFetch({
      "cursor=c2": () =>
        json({ data: [{ name: "Third", created: "2021-03-01T00:00:00Z" }], nextPageCursor: null }),
      "/v1/users/42/badges": () =>
        json({
          data: [{ name: "First", created: "2021-01-01T00:00:00Z" }, { name: "Undated" }],
          nextPageCursor: "c2",
        }),
    });
    const { client } = setup();

    const listing = await client.fetchBadges(42);

    expect(listing.count).toBe(3);
    expect(listing.badges.map((b) => b.name)).toEqual(["First", "Third"]);
    expect(requestedUrls(fetchMock)).toEqual([
      "https://badges.roblox.com/v1/users/42/badges?limit=100",
      "https://badges.roblox.com/v1/users/42/badges?limit=100&cursor=c2",
    ]);
  });

  it("keeps collected pages when a later page fails", async () => {
    stubFetch({
      "cursor=c2": () => json({}, 500),
      "/v1/users/42/badges": () =>
        json({ data: [{ name: "First", created: "2021-01-01T00:00:00Z" }], nextPageCursor: "c2" }),
    });
    const { client, reporter } = setup();

    const listing = await client.fetchBadges(42);

    expect(listing.count).toBe(1);
    expect(reporter.report).toHaveBeenCalledWith({
      severity: "error",
      kind: "service_error",
      message: "Failed to fetch badges for user 42: HTTP 500",
    });
  });
});

describe("RobloxClient.fetchGroups", () => {
  it("returns empty affiliations on failure", async () => {
    stubFetch({ "/groups/roles": () => json({}, 500) });
    const { client, reporter } = setup();

    const groups = await client.fetchGroups(42);

    expect(groups).toEqual({ mainGroup: null, mainDivisions: [], subDivisions: [], intelligence: [] });
    expect(reporter.report).toHaveBeenCalledWith(
      expect.objectContaining({ severity: "warning", kind: "service_error" })
    );
  });
});

describe("partitionGroups", () => {
  const membership = (id: number, name: string, role = "Member") => ({ group: { id, name }, role: { name: role } });

  it("sorts memberships into the configured buckets", () => {
    const groups = partitionGroups(
      [membership(100, "Main", "Private"), membership(200, "Div A"), membership(300, "Sub B"), membership(999, "Other")],
      GROUP_IDS
    );

    expect(groups.mainGroup).toEqual({ groupName: "Main", roleName: "Private" });
    expect(groups.mainDivisions).toEqual([{ groupName: "Div A", roleName: "Member" }]);
    expect(groups.subDivisions).toEqual([{ groupName: "Sub B", roleName: "Member" }]);
    expect(groups.intelligence).toEqual([]);
  });

  it("flags intelligence by group or role name through lookalikes", () => {
    const groups = partitionGroups(
      [membership(1, "\u0406ntell\u0456gence Corps"), membership(2, "Army", "INTELLIGENCE Officer")],
      GROUP_IDS
    );

    expect(groups.intelligence).toEqual([
      { groupName: "\u0406ntell\u0456gence Corps", roleName: "Member" },
      { groupName: "Army", roleName: "INTELLIGENCE Officer" },
    ]);
  });
});
