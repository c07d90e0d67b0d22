/**
 * Vetting Bot — src/commands/registry.ts
 * WHAT: Runtime module registry: module name → slash commands, buttons and event hooks.
 * WHY: Operators load, unload and reload feature modules without restarting the bot.
 * FLOWS:
 *  - load(name): factory(services) → wrap handlers → route table
 *  - unload(name): dispose() → drop routes. Discord keeps the slash commands; invoking
 *    one of an unloaded module gets an "unavailable" reply.
 *  - reload(name): unload + load, picking up the current config snapshot
 * DOCS:
 *  - Slash command deployment best practices: https://discordjs.guide/interactions/deploying-commands.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type {
  ButtonInteraction,
  ChatInputCommandInteraction,
  Client,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import type { ConfigStore } from "../lib/config.js";
import type { Env } from "../lib/env.js";
import type { DiagnosticReporter } from "../lib/reporter.js";
import { wrapCommand, type CommandExecutor } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import type { InviteStore } from "../features/invite/store.js";

/** Everything a module factory may depend on. */
export type BotServices = {
  client: Client;
  config: ConfigStore;
  env: Pick<Env, "TRELLO_API_KEY" | "TRELLO_TOKEN" | "GOOGLE_SHEETS_API_KEY">;
  /** Built per call so a config reload picks up a new webhook URL */
  reporter: () => DiagnosticReporter;
  inviteStore: InviteStore;
};

export type SlashCommand = {
  data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  execute: CommandExecutor<ChatInputCommandInteraction>;
};

export type ButtonRoute = {
  customId: string;
  execute: CommandExecutor<ButtonInteraction>;
};

export type MemberLeft = { id: string; tag: string; guildId: string };

export type BotModule = {
  name: string;
  commands: SlashCommand[];
  buttons?: ButtonRoute[];
  onMemberRemove?: (member: MemberLeft) => Promise<void>;
  /** Runs after the module is loaded; factories themselves stay side-effect free */
  start?: () => void;
  /** Stop timers and listeners the module started */
  dispose?: () => void;
};

export type ModuleFactory = (services: BotServices) => BotModule;

export class ModuleNotFoundError extends Error {
  constructor(readonly moduleName: string) {
    super(`Module \`${moduleName}\` not found.`);
    this.name = "ModuleNotFoundError";
  }
}

export class ModuleAlreadyLoadedError extends Error {
  constructor(readonly moduleName: string) {
    super(`Module \`${moduleName}\` is already loaded.`);
    this.name = "ModuleAlreadyLoadedError";
  }
}

export class ModuleNotLoadedError extends Error {
  constructor(readonly moduleName: string) {
    super(`Module \`${moduleName}\` is not loaded.`);
    this.name = "ModuleNotLoadedError";
  }
}

export class ProtectedModuleError extends Error {
  constructor(readonly moduleName: string) {
    super(`Module \`${moduleName}\` manages the other modules and cannot be unloaded.`);
    this.name = "ProtectedModuleError";
  }
}

type ChatHandler = (interaction: ChatInputCommandInteraction) => Promise<void>;
type ButtonHandler = (interaction: ButtonInteraction) => Promise<void>;

type LoadedModule = {
  module: BotModule;
  commands: Map<string, ChatHandler>;
  buttons: Map<string, ButtonHandler>;
};

export type RegistryOptions = {
  /** Modules that can be reloaded but never unloaded */
  protectedModules?: readonly string[];
};

export class CommandRegistry {
  private readonly loaded = new Map<string, LoadedModule>();
  private readonly protectedModules: ReadonlySet<string>;

  constructor(
    private readonly catalog: ReadonlyMap<string, ModuleFactory>,
    private readonly services: BotServices,
    options: RegistryOptions = {}
  ) {
    this.protectedModules = new Set(options.protectedModules ?? []);
  }

  available(): string[] {
    return [...this.catalog.keys()];
  }

  loadedNames(): string[] {
    return [...this.loaded.keys()];
  }

  isLoaded(name: string): boolean {
    return this.loaded.has(name);
  }

  load(name: string): BotModule {
    const factory = this.catalog.get(name);
    if (!factory) throw new ModuleNotFoundError(name);
    if (this.loaded.has(name)) throw new ModuleAlreadyLoadedError(name);

    const module = factory(this.services);
    const commands = new Map<string, ChatHandler>();
    for (const command of module.commands) {
      commands.set(command.data.name, wrapCommand(command.data.name, command.execute));
    }
    const buttons = new Map<string, ButtonHandler>();
    for (const button of module.buttons ?? []) {
      buttons.set(button.customId, wrapCommand(`button:${button.customId}`, button.execute));
    }

    this.loaded.set(name, { module, commands, buttons });
    module.start?.();
    logger.info({ evt: "module_load", module: name, commands: [...commands.keys()] }, `[modules] ${name} loaded`);
    return module;
  }

  unload(name: string): void {
    if (!this.catalog.has(name)) throw new ModuleNotFoundError(name);
    if (this.protectedModules.has(name)) throw new ProtectedModuleError(name);
    this.drop(name);
  }

  /** Protected modules may be reloaded. */
  reload(name: string): BotModule {
    if (!this.catalog.has(name)) throw new ModuleNotFoundError(name);
    this.drop(name);
    return this.load(name);
  }

  loadAll(): void {
    for (const name of this.catalog.keys()) {
      if (!this.loaded.has(name)) this.load(name);
    }
  }

  commandHandler(commandName: string): ChatHandler | undefined {
    for (const entry of this.loaded.values()) {
      const handler = entry.commands.get(commandName);
      if (handler) return handler;
    }
    return undefined;
  }

  buttonHandler(customId: string): ButtonHandler | undefined {
    for (const entry of this.loaded.values()) {
      const handler = entry.buttons.get(customId);
      if (handler) return handler;
    }
    return undefined;
  }

  async memberRemoved(member: MemberLeft): Promise<void> {
    for (const { module } of this.loaded.values()) {
      if (!module.onMemberRemove) continue;
      try {
        await module.onMemberRemove(member);
      } catch (err) {
        logger.error({ err, module: module.name, userId: member.id }, "[modules] member remove hook failed");
      }
    }
  }

  disposeAll(): void {
    for (const name of [...this.loaded.keys()]) {
      this.drop(name);
    }
  }

  private drop(name: string): void {
    const entry = this.loaded.get(name);
    if (!entry) throw new ModuleNotLoadedError(name);
    entry.module.dispose?.();
    this.loaded.delete(name);
    logger.info({ evt: "module_unload", module: name }, `[modules] ${name} unloaded`);
  }
}
