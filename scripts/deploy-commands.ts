/**
 * Vetting Bot — scripts/deploy-commands.ts
 * WHAT: CLI helper to bulk overwrite the bot's slash commands.
 * WHY: Discord only learns about commands through this registration; the bot never
 *      registers them itself.
 * FLOWS: buildCommands() → REST PUT (guild when GUILD_ID is set, global otherwise) → verify names
 * USAGE:
 *  - npm run build && npm run deploy:cmds
 * DOCS:
 *  - REST client / Routes: https://discord.js.org/#/docs/rest/main/class/REST
 *  - Bulk overwrite commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-global-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { z } from "zod";
import { env } from "../src/lib/env.js";
import { logger } from "../src/lib/logger.js";
import { buildCommands } from "../src/commands/buildCommands.js";

const registeredSchema = z.array(z.object({ name: z.string() }));

async function main(): Promise<void> {
  const rest = new REST({ version: "10" }).setToken(env.DISCORD_TOKEN);
  const commands = buildCommands();
  // Guild commands update instantly; global ones can take up to an hour.
  const route = env.GUILD_ID
    ? Routes.applicationGuildCommands(env.CLIENT_ID, env.GUILD_ID)
    : Routes.applicationCommands(env.CLIENT_ID);
  const scope = env.GUILD_ID ? `guild ${env.GUILD_ID}` : "global";

  logger.info({ scope, count: commands.length }, "[deploy] registering commands");
  const registered = registeredSchema.parse(await rest.put(route, { body: commands }));

  const names = new Set(registered.map((c) => c.name));
  const missing = commands.filter((c) => !names.has(c.name)).map((c) => c.name);
  if (missing.length > 0) {
    logger.error({ scope, missing }, "[deploy] Discord did not return every command");
    process.exit(1);
  }

  logger.info({ scope, commands: [...names] }, "[deploy] commands registered");
}

main().catch((err: unknown) => {
  logger.error({ err }, "[deploy] registration failed");
  process.exit(1);
});
