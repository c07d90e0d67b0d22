/**
 * Vetting Bot — src/commands/modules.ts
 * WHAT: /module load|unload|reload|list|config, the runtime module manager.
 * WHY: A broken feature can be unloaded, and a config edit applied, without a restart.
 * FLOWS:
 *  - gate(bot_management) → registry operation → ephemeral result line
 *  - /module config: ConfigStore.reload(); a failed reload keeps the old snapshot
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { ConfigLoadError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { requirePermission } from "../lib/permissions.js";
import {
  ModuleAlreadyLoadedError,
  ModuleNotFoundError,
  ModuleNotLoadedError,
  ProtectedModuleError,
  type BotModule,
  type BotServices,
  type CommandRegistry,
} from "./registry.js";

export const BOT_MANAGEMENT_MODULE = "bot_management";

export type ModuleAction = "load" | "unload" | "reload";

const PAST_TENSE: Record<ModuleAction, string> = {
  load: "loaded",
  unload: "unloaded",
  reload: "reloaded",
};

export const data = new SlashCommandBuilder()
  .setName("module")
  .setDescription("Manage bot modules.")
  .addSubcommand((sub) =>
    sub
      .setName("load")
      .setDescription("Load a bot module")
      .addStringOption((o) => o.setName("name").setDescription("The module to load").setRequired(true))
  )
  .addSubcommand((sub) =>
    sub
      .setName("unload")
      .setDescription("Unload a bot module")
      .addStringOption((o) => o.setName("name").setDescription("The module to unload").setRequired(true))
  )
  .addSubcommand((sub) =>
    sub
      .setName("reload")
      .setDescription("Reload a bot module")
      .addStringOption((o) => o.setName("name").setDescription("The module to reload").setRequired(true))
  )
  .addSubcommand((sub) => sub.setName("list").setDescription("List modules and whether they are loaded"))
  .addSubcommand((sub) => sub.setName("config").setDescription("Re-read config.yaml"));

/**
 * Runs one registry action and turns the outcome into the reply line.
 * Unexpected failures (a factory that throws) become "❌ Failed to ...".
 */
export function applyModuleAction(registry: CommandRegistry, action: ModuleAction, name: string): string {
  try {
    if (action === "load") registry.load(name);
    else if (action === "unload") registry.unload(name);
    else registry.reload(name);
    return `✅ Module \`${name}\` ${PAST_TENSE[action]} successfully!`;
  } catch (err) {
    if (err instanceof ModuleAlreadyLoadedError || err instanceof ModuleNotLoadedError) {
      return `⚠️ ${err.message}`;
    }
    if (err instanceof ModuleNotFoundError || err instanceof ProtectedModuleError) {
      return `❌ ${err.message}`;
    }
    logger.error({ err, module: name, action }, "[modules] module action failed");
    return `❌ Failed to ${action} \`${name}\`: ${err instanceof Error ? err.message : String(err)}`;
  }
}

export function describeModules(registry: CommandRegistry): string {
  const lines = registry
    .available()
    .map((name) => `${registry.isLoaded(name) ? "🟢" : "⚪"} \`${name}\``);
  return ["**Modules:**", ...lines].join("\n");
}

export function reloadConfig(services: BotServices): string {
  try {
    services.config.reload();
    logger.info({ evt: "config_reload" }, "[modules] configuration reloaded");
    return "✅ Configuration reloaded.";
  } catch (err) {
    if (err instanceof ConfigLoadError) {
      logger.warn({ err, key: err.key }, "[modules] configuration reload rejected");
      return `❌ Configuration not reloaded, keeping the previous one: ${err.message}`;
    }
    throw err;
  }
}

export async function execute(
  ctx: CommandContext,
  services: BotServices,
  registry: () => CommandRegistry
): Promise<void> {
  const { interaction } = ctx;

  ctx.step("gate");
  const allowed = await requirePermission(
    interaction,
    "bot_management",
    services.config.current.policy,
    "❌ You don't have permission to use bot management commands."
  );
  if (!allowed) return;

  const subcommand = interaction.options.getSubcommand();
  ctx.step(subcommand);

  let content: string;
  if (subcommand === "list") {
    content = describeModules(registry());
  } else if (subcommand === "config") {
    content = reloadConfig(services);
  } else if (subcommand === "load" || subcommand === "unload" || subcommand === "reload") {
    content = applyModuleAction(registry(), subcommand, interaction.options.getString("name", true));
  } else {
    content = "❌ Unknown subcommand.";
  }

  await replyOrEdit(interaction, { content });
}

/**
 * The registry is passed lazily: it is built from a catalog that contains this
 * module's own factory.
 */
export function createBotManagementModule(
  services: BotServices,
  registry: () => CommandRegistry
): BotModule {
  return {
    name: BOT_MANAGEMENT_MODULE,
    commands: [{ data, execute: (ctx) => execute(ctx, services, registry) }],
  };
}
