/**
 * Vetting Bot — src/lib/config.ts
 * WHAT: config.yaml loader: parse → validate with typed defaults → derive the permission policy.
 * WHY: Role ids, server ids, thresholds and board categories change far more often than code.
 * FLOWS:
 *  - parseConfig(text) → BotConfig (immutable snapshot)
 *  - ConfigStore.reload() → swaps the whole snapshot, or keeps the old one and throws
 *  - BotConfig.get("a.b.c", fallback) → dotted-path lookup on the raw document
 * DOCS:
 *  - yaml: https://eemeli.org/yaml/#parse-options
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { readFileSync } from "node:fs";
import YAML from "yaml";
import { z } from "zod";
import { ConfigLoadError } from "./errors.js";
import { isRecord } from "./typeGuards.js";
import type { OperationPolicy, PermissionPolicy } from "./permissions.js";

// GOTCHA: Discord snowflakes are 64-bit. YAML integers are parsed as bigint
// (intAsBigInt) so 1309981030790463529 does not come back as ...463500.
const snowflake = z
  .union([z.string().regex(/^\d+$/, "expected a numeric id"), z.bigint()])
  .transform((v) => v.toString());

const idList = z.array(snowflake).default([]);

const count = z
  .union([z.number(), z.bigint()])
  .transform((v) => Number(v))
  .pipe(z.number().int().min(0));

const robloxId = z
  .union([z.number(), z.bigint()])
  .transform((v) => Number(v))
  .pipe(z.number().int().positive());

const snowflakeKeyed = <T extends z.ZodTypeAny>(value: T) =>
  z.record(z.string().regex(/^\d+$/, "expected a numeric guild id"), value);

const ratingPosition = z.union([
  z.object({ header: z.string().min(1) }),
  z.object({ sheet: z.string().min(1), cell: z.string().min(1), title: z.string().min(1) }),
]);

export const DEFAULT_INVITE_DM = [
  "# **Congratulations, you passed!** 🎉",
  "### You must now do the following:",
  "• Join the [Discord Server]({invite}) **(one-time use only)**",
  "• Wait patiently to be accepted and roled.",
].join("\n");

const configSchema = z.object({
  general: z
    .object({
      bot_owners: idList,
      test_servers: idList,
      error_webhook_url: z.string().default(""),
    })
    .default({}),

  filter_check: z
    .object({
      allowed_servers: idList,
      allowed_roles: idList,
      result_channels: snowflakeKeyed(snowflake).default({}),
      roblox: z
        .object({
          main_group: robloxId.nullable().default(null),
          main_divisions: z.array(robloxId).default([]),
          sub_divisions: z.array(robloxId).default([]),
        })
        .default({}),
      trello: z
        .object({
          board_id: z.string().default(""),
          major_blacklist_categories: z.array(z.string()).default([]),
          deny_blacklist_categories: z.array(z.string()).default([]),
          skip_categories: z.array(z.string()).default([]),
        })
        .default({}),
      thresholds: z
        .object({
          min_discord_age_days: count.default(90),
          min_badge_count: count.default(480),
        })
        .default({}),
    })
    .default({}),

  bot_management: z
    .object({
      allowed_servers: idList,
      allowed_roles: idList,
    })
    .default({}),

  invite: z
    .object({
      target: z
        .object({
          guild_id: snowflake.nullish(),
          channel_id: snowflake.nullish(),
        })
        .default({}),
      control_servers: idList,
      required_role_id: snowflake.nullish(),
      admin_roles: idList,
      log_webhook_url: z.string().default(""),
      data_file: z.string().default("invited_users.json"),
      max_age_seconds: count.default(3600),
      dm_message: z.string().default(DEFAULT_INVITE_DM),
      panel_title: z.string().default("Request Invite"),
      panel_description: z
        .string()
        .default(
          "**Click the button to receive the following:**\n" +
            "• A **one-time use** invite link\n" +
            "• Information on what you are **required** to do next."
        ),
    })
    .default({}),

  staff_rating: z
    .object({
      spreadsheet_id: z.string().default(""),
      servers: snowflakeKeyed(
        z.object({
          rating_channel_id: snowflake,
          auto_post: z.boolean().default(false),
        })
      ).default({}),
      admin_roles: idList,
      reactions: z.array(z.string().min(1)).default(["🟩", "🟨", "🟥"]),
      intro: z.string().default(""),
      positions: z.array(ratingPosition).default([]),
    })
    .default({}),
});

export type BotSettings = z.output<typeof configSchema>;
export type RatingPosition = z.output<typeof ratingPosition>;

/**
 * Immutable snapshot of one config document.
 */
export class BotConfig {
  readonly settings: Readonly<BotSettings>;
  readonly policy: PermissionPolicy;
  private readonly raw: unknown;

  constructor(raw: unknown, settings: BotSettings) {
    this.raw = raw;
    this.settings = settings;
    this.policy = derivePolicy(settings);
  }

  /**
   * Dotted-path lookup on the raw document with a typed fallback.
   * A missing key, a null, or a value of the wrong type yields the fallback.
   */
  get(path: string, fallback: number): number;
  get(path: string, fallback: string): string;
  get(path: string, fallback: boolean): boolean;
  get(path: string): unknown;
  get(path: string, fallback?: number | string | boolean): unknown {
    let value: unknown = this.raw;
    for (const key of path.split(".")) {
      if (!isRecord(value)) return fallback;
      value = value[key];
      if (value === undefined || value === null) return fallback;
    }
    if (fallback === undefined) return value;
    if (typeof fallback === "number" && typeof value === "bigint") return Number(value);
    if (typeof fallback === "string" && typeof value === "bigint") return value.toString();
    return typeof value === typeof fallback ? value : fallback;
  }
}

function toSet(ids: readonly string[]): ReadonlySet<string> {
  return new Set(ids);
}

function op(servers: readonly string[], roles: readonly string[]): OperationPolicy {
  return { allowedServerIds: toSet(servers), allowedRoleIds: toSet(roles) };
}

export function derivePolicy(settings: BotSettings): PermissionPolicy {
  const { general, filter_check, bot_management, invite, staff_rating } = settings;
  return {
    ownerIds: toSet(general.bot_owners),
    testServerIds: toSet(general.test_servers),
    operations: {
      filter_check: op(filter_check.allowed_servers, filter_check.allowed_roles),
      bot_management: op(bot_management.allowed_servers, bot_management.allowed_roles),
      invite_admin: op(invite.control_servers, invite.admin_roles),
      invite_request: op(
        invite.control_servers,
        invite.required_role_id ? [invite.required_role_id] : []
      ),
      staff_rating: op([], staff_rating.admin_roles),
    },
  };
}

/**
 * Parse and validate a YAML document. An empty document is valid and yields all defaults.
 */
export function parseConfig(text: string, source = "config.yaml"): BotConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(text, { intAsBigInt: true }) ?? {};
  } catch (err) {
    throw new ConfigLoadError(source, `${source} is not valid YAML: ${String(err)}`, { cause: err });
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? issue.path.join(".") : source;
    const issues = parsed.error.issues
      .map((i) => `- ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigLoadError(key, `${source} failed validation:\n${issues}`);
  }

  return new BotConfig(raw, parsed.data);
}

export function loadConfigFile(filePath: string): BotConfig {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigLoadError(
      filePath,
      `Configuration file '${filePath}' not found. Create it from config.example.yaml`,
      { cause: err }
    );
  }
  return parseConfig(text, filePath);
}

/**
 * Holds the live snapshot. Components read `store.current` per invocation, so a reload
 * takes effect on the next command without restarting anything.
 */
export class ConfigStore {
  private snapshot: BotConfig;

  constructor(
    private readonly filePath: string,
    private readonly load: (filePath: string) => BotConfig = loadConfigFile
  ) {
    this.snapshot = this.load(filePath);
  }

  get current(): BotConfig {
    return this.snapshot;
  }

  /**
   * Replace the snapshot wholesale. Throws ConfigLoadError and keeps the previous
   * snapshot when the new file does not validate.
   */
  reload(): BotConfig {
    const next = this.load(this.filePath);
    this.snapshot = next;
    return next;
  }
}
