/**
 * Vetting Bot — tests/features/filterCheck/fixtures.ts
 * WHAT: Candidate fixtures and fake check sources shared by the filter-check tests.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { vi } from "vitest";
import type { CheckSources } from "../../../src/features/filterCheck/pipeline.js";
import {
  emptyAffiliations,
  type DiscordUserInfo,
  type ProfileCore,
} from "../../../src/features/filterCheck/types.js";

export const DISCORD_USER: DiscordUserInfo = {
  id: "111",
  tag: "candidate",
  accountAgeDays: 200,
  createdAt: new Date("2023-06-01T00:00:00Z"),
  bot: false,
  avatarUrl: null,
};

export const PROFILE: ProfileCore = {
  userId: 42,
  username: "Alpha",
  accountAgeDays: 400,
  createdAt: new Date("2022-01-01T00:00:00Z"),
  followers: 10,
  following: 5,
  friends: 3,
};

export function fakeSources() {
  return {
    fetchDiscordUser: vi.fn<CheckSources["fetchDiscordUser"]>().mockResolvedValue(DISCORD_USER),
    fetchProfile: vi.fn<CheckSources["fetchProfile"]>().mockResolvedValue(PROFILE),
    checkBlacklist: vi.fn<CheckSources["checkBlacklist"]>().mockResolvedValue({ major: [], minor: [] }),
    fetchGroups: vi.fn<CheckSources["fetchGroups"]>().mockResolvedValue(emptyAffiliations()),
    fetchBadges: vi.fn<CheckSources["fetchBadges"]>().mockResolvedValue({ badges: [], count: 500 }),
  };
}
