/**
 * Vetting Bot — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 * DOCS:
 *  - dotenv: https://github.com/motdotla/dotenv
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: false in tests so a test can set process.env before importing this module.
// GOTCHA: the bot looks for .env in the working directory. Run it from the project root.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw environment extraction. Every variable gets trimmed to handle
 * stray whitespace in .env files.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  CLIENT_ID: process.env.CLIENT_ID?.trim(),
  GUILD_ID: process.env.GUILD_ID?.trim(),
  NODE_ENV: process.env.NODE_ENV?.trim(),
  CONFIG_PATH: process.env.CONFIG_PATH?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim(),

  // Blacklist board (optional - /check degrades to "no findings" without it)
  TRELLO_API_KEY: process.env.TRELLO_API_KEY?.trim(),
  TRELLO_TOKEN: process.env.TRELLO_TOKEN?.trim(),

  // Staff rating spreadsheet (optional)
  GOOGLE_SHEETS_API_KEY: process.env.GOOGLE_SHEETS_API_KEY?.trim(),
};

const schema = z.object({
  // Core Discord credentials - bot won't start without these
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  GUILD_ID: z.string().optional(), // Only used by the deploy script for guild-scoped commands
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  CONFIG_PATH: z.string().default("config.yaml"),
  LOG_LEVEL: z.string().optional(),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  TRELLO_API_KEY: z.string().optional(),
  TRELLO_TOKEN: z.string().optional(),
  GOOGLE_SHEETS_API_KEY: z.string().optional(),
});

/**
 * safeParse collects every issue at once so a broken .env is fixed in one pass.
 */
const parsed = schema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env = parsed.data;
export type Env = typeof env;

const truthyPattern = /^(1|true|yes|on)$/i;

// Weekly staff rating auto-post. Tests and one-off scripts switch it off.
export const STAFF_RATING_SCHEDULER_DISABLED = truthyPattern.test(
  process.env.STAFF_RATING_SCHEDULER_DISABLED ?? ""
);
