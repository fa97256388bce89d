/**
 * @module: Bot
 * @risk: critical
 * @scope: core
 *
 * @description
 * Assembles the command framework (registry, hooks, dispatcher, component router) from an explicit
 * list of commands and binds it to a discord.js client.
 */

import { Client, GatewayIntentBits, Partials } from 'discord.js';
import type { ClientEvents } from 'discord.js';
import { logger } from '../utils/logger.js';
import type { Event } from '../events/Event.js';
import { ClientReady } from '../events/ClientReady.js';
import { InteractionCreate } from '../events/InteractionCreate.js';
import { MessageCreate } from '../events/MessageCreate.js';
import { AdmissionGuard } from '../framework/AdmissionGuard.js';
import { buildCatalog } from '../framework/catalog.js';
import { CommandRegistryBuilder } from '../framework/CommandRegistry.js';
import type { CommandRegistry } from '../framework/CommandRegistry.js';
import { ComponentRouter } from '../framework/ComponentRouter.js';
import { Dispatcher } from '../framework/Dispatcher.js';
import type { UnknownCommandError } from '../framework/errors.js';
import type { CommandDescriptor } from '../commands/BaseCommand.js';
import { createBlacklistCommand } from '../commands/blacklist.js';
import { createHelpCommand, createHelpPageHandler, HELP_PAGE_CUSTOM_ID_PREFIX } from '../commands/help.js';
import { createInfoCommand } from '../commands/info.js';
import { createMacroCommand } from '../commands/macro.js';
import { createPrefixCommand } from '../commands/prefix.js';
import { createBlacklistHook } from '../hooks/blacklist.js';
import { createMacroRecordingHook } from '../hooks/macroRecording.js';
import { createSelfPermissionsHook } from '../hooks/selfPermissions.js';
import { InMemoryGuildSettingsStore } from '../state/GuildSettingsStore.js';
import type { GuildSettingsStore } from '../state/GuildSettingsStore.js';
import { InMemoryMacroStore, MacroRecorder } from '../state/MacroRecorder.js';
import type { MacroStore } from '../state/MacroRecorder.js';

export interface FrameworkOptions {
  clientId: string;
  defaultPrefix: string;
  caseInsensitive: boolean;
  admissionDebounceMs: number;
  settings?: GuildSettingsStore;
  macroStore?: MacroStore;
  /** Registered after the built-in commands */
  extraCommands?: readonly CommandDescriptor[];
}

export interface CommandFramework {
  registry: CommandRegistry;
  dispatcher: Dispatcher;
  router: ComponentRouter;
  settings: GuildSettingsStore;
  recorder: MacroRecorder;
}

/**
 * Builds the registry with the built-in commands and global hooks, in their fixed order:
 * self-permissions, blacklist, macro recording.
 */
export function createCommandFramework(options: FrameworkOptions): CommandFramework {
  const settings = options.settings ?? new InMemoryGuildSettingsStore();
  const macroStore = options.macroStore ?? new InMemoryMacroStore();
  const recorder = new MacroRecorder();
  const getRegistry = (): CommandRegistry => registry;

  const builder = new CommandRegistryBuilder({
    clientId: options.clientId,
    defaultPrefix: options.defaultPrefix,
    caseInsensitive: options.caseInsensitive
  })
    .addCommand(createHelpCommand(getRegistry))
    .addCommand(createInfoCommand(getRegistry))
    .addCommand(createPrefixCommand(settings, options.defaultPrefix))
    .addCommand(createBlacklistCommand(settings))
    .addCommand(createMacroCommand({
      recorder,
      store: macroStore,
      replay: (invoke, replayed) => dispatcher.runFromOptions(invoke, replayed)
    }));

  for (const command of options.extraCommands ?? []) {
    builder.addCommand(command);
  }

  builder
    .addHook(createSelfPermissionsHook())
    .addHook(createBlacklistHook(settings))
    .addHook(createMacroRecordingHook(recorder));

  const registry = builder.build();
  const dispatcher = new Dispatcher(registry, new AdmissionGuard({ debounceMs: options.admissionDebounceMs }));
  const router = new ComponentRouter().register(HELP_PAGE_CUSTOM_ID_PREFIX, createHelpPageHandler(getRegistry));

  return { registry, dispatcher, router, settings, recorder };
}

export interface BotOptions extends FrameworkOptions {
  token: string;
  ignoreBots: boolean;
  dmEnabled: boolean;
  debugGuildId?: string;
  abort?: (error: UnknownCommandError) => void;
}

export class Bot extends Client {
  public readonly framework: CommandFramework;

  constructor(private readonly botOptions: BotOptions) {
    super({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.DirectMessages
      ],
      // DM channels are not cached until a message arrives in them
      partials: [Partials.Channel]
    });

    this.framework = createCommandFramework(botOptions);
    this.registerEvents();
  }

  private registerEvents(): void {
    const { dispatcher, router, settings, registry } = this.framework;
    this.registerEvent(new ClientReady({
      token: this.botOptions.token,
      clientId: this.botOptions.clientId,
      catalog: buildCatalog(registry.commands),
      debugGuildId: this.botOptions.debugGuildId
    }));
    this.registerEvent(new MessageCreate({
      dispatcher,
      settings,
      ignoreBots: this.botOptions.ignoreBots,
      dmEnabled: this.botOptions.dmEnabled
    }));
    this.registerEvent(new InteractionCreate({ dispatcher, router, abort: this.botOptions.abort }));
  }

  public registerEvent<K extends keyof ClientEvents>(event: Event<K>): void {
    event.register(this);
  }

  public async start(): Promise<void> {
    try {
      logger.info('Logging in to Discord...');
      await this.login(this.botOptions.token);
      logger.info('Bot is connected to Discord');
    } catch (error) {
      logger.error('Failed to start bot:', error);
      throw error;
    }
  }
}
