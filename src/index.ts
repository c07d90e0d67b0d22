/**
 * Vetting Bot — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, loads the feature modules
 *       and routes interactions to them.
 * WHY: Startup and the hot routing path in one place.
 * FLOWS:
 *  - Boot: env → Sentry → config.yaml → invite store → registry.loadAll() → login
 *  - Interaction: slash → registry.commandHandler; button → registry.buttonHandler
 *  - guildMemberRemove → registry.memberRemoved
 *  - SIGINT/SIGTERM: dispose modules → flush Sentry → destroy client
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { Client, Events, GatewayIntentBits, MessageFlags, Partials } from "discord.js";
import { env } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { captureException, flushSentry, initializeSentry } from "./lib/sentry.js";
import { ConfigStore } from "./lib/config.js";
import { ConfigLoadError } from "./lib/errors.js";
import { createReporter } from "./lib/reporter.js";
import { InviteStore } from "./features/invite/store.js";
import { userTag } from "./features/filterCheck/discordUser.js";
import { CommandRegistry, type BotServices, type ModuleFactory } from "./commands/registry.js";
import { createFilterCheckModule } from "./commands/check.js";
import { createInviteModule } from "./commands/invite.js";
import { createStaffRatingModule } from "./commands/staffRating.js";
import { BOT_MANAGEMENT_MODULE, createBotManagementModule } from "./commands/modules.js";

const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;
const UNAVAILABLE = "❌ This command is currently unavailable.";

initializeSentry(process.env.npm_package_version ?? "dev");

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  captureException(error, { context: "uncaughtException", origin });
  // Sentry needs a moment to flush before exit.
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

let config: ConfigStore;
try {
  config = new ConfigStore(env.CONFIG_PATH);
} catch (err) {
  if (err instanceof ConfigLoadError) {
    logger.fatal({ key: err.key }, `[boot] ${err.message}`);
    process.exit(1);
  }
  throw err;
}

export const client = new Client({
  intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers],
  partials: [Partials.GuildMember],
});

const services: BotServices = {
  client,
  config,
  env,
  reporter: () => createReporter({ logger, webhookUrl: config.current.settings.general.error_webhook_url }),
  inviteStore: new InviteStore(() => config.current.settings.invite.data_file),
};

const catalog = new Map<string, ModuleFactory>([
  ["filter_check", createFilterCheckModule],
  ["invite", createInviteModule],
  ["staff_rating", createStaffRatingModule],
  [BOT_MANAGEMENT_MODULE, (s) => createBotManagementModule(s, () => registry)],
]);

const registry: CommandRegistry = new CommandRegistry(catalog, services, { protectedModules: [BOT_MANAGEMENT_MODULE] });

client.once(Events.ClientReady, (ready) => {
  logger.info(
    { evt: "ready", tag: ready.user.tag, guilds: ready.guilds.cache.size },
    `[ready] logged in as ${ready.user.tag}`
  );
  registry.loadAll();
});

client.on(Events.InteractionCreate, async (interaction) => {
  if (interaction.isChatInputCommand()) {
    const handler = registry.commandHandler(interaction.commandName);
    if (handler) {
      await handler(interaction);
      return;
    }
    logger.info({ evt: "cmd_unavailable", cmd: interaction.commandName }, "[router] command of an unloaded module");
    await interaction.reply({ content: UNAVAILABLE, flags: MessageFlags.Ephemeral }).catch((err: unknown) => {
      logger.warn({ err, cmd: interaction.commandName }, "[router] unavailable reply failed");
    });
    return;
  }

  if (interaction.isButton()) {
    const handler = registry.buttonHandler(interaction.customId);
    if (handler) {
      await handler(interaction);
      return;
    }
    logger.debug({ customId: interaction.customId }, "[router] no handler for button");
  }
});

client.on(Events.GuildMemberRemove, async (member) => {
  await registry.memberRemoved({
    id: member.id,
    tag: userTag(member.user),
    guildId: member.guild.id,
  });
});

client.on(Events.Error, (err) => {
  logger.error({ err }, "[client] discord.js error");
});

// ===== Graceful Shutdown =====

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "[shutdown] stopping");

  registry.disposeAll();
  await flushSentry();
  await client.destroy();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "[shutdown] shutdown failed");
      process.exit(1);
    });
  });
}

await client.login(env.DISCORD_TOKEN);
