/**
 * @description: Lists commands one help group per page, with Previous/Next buttons.
 * @scope: commands
 * @module: HelpCommand
 * @risk: low - Presentation only.
 */

import { ActionRowBuilder, ButtonBuilder, ButtonStyle, EmbedBuilder } from 'discord.js';
import type { MessageActionRowComponentBuilder } from 'discord.js';
import { defineCommand, primaryName } from './BaseCommand.js';
import type { CommandDescriptor } from './BaseCommand.js';
import type { CommandRegistry } from '../framework/CommandRegistry.js';
import type { ComponentHandler } from '../framework/ComponentRouter.js';
import type { GenericResponse } from '../framework/response.js';

export const HELP_PAGE_CUSTOM_ID_PREFIX = 'help:page:';

const HELP_COLOR = 0x5865f2;
const MAX_FIELD_VALUE_LENGTH = 1024;

function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? `${value.slice(0, maxLength - 3)}...` : value;
}

function describeCommand(command: CommandDescriptor, prefix: string): string {
  const lines = [command.description];
  if (command.names.length > 1) {
    lines.push(`Aliases: ${command.names.slice(1).map((alias) => `\`${prefix}${alias}\``).join(', ')}`);
  }
  if (command.examples.length > 0) {
    lines.push(`Examples: ${command.examples.map((example) => `\`${prefix}${example}\``).join(', ')}`);
  }
  return truncate(lines.join('\n'), MAX_FIELD_VALUE_LENGTH);
}

/**
 * One page per help group, in registration order. Out-of-range pages are clamped.
 */
export function buildHelpPage(registry: CommandRegistry, requestedPage: number): GenericResponse {
  const groups = [...registry.groups()];
  if (groups.length === 0) {
    return { content: 'No commands are registered.' };
  }

  const page = Math.min(Math.max(requestedPage, 0), groups.length - 1);
  const [group, commands] = groups[page];
  const prefix = registry.defaultPrefix;

  const embed = new EmbedBuilder()
    .setTitle(`${group} commands`)
    .setColor(HELP_COLOR)
    .addFields(commands.map((command) => ({
      name: `/${primaryName(command)}`,
      value: describeCommand(command, prefix)
    })))
    .setFooter({ text: `Page ${page + 1}/${groups.length}` });

  const row = new ActionRowBuilder<MessageActionRowComponentBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(`${HELP_PAGE_CUSTOM_ID_PREFIX}${page - 1}`)
      .setLabel('Previous')
      .setStyle(ButtonStyle.Secondary)
      .setDisabled(page === 0),
    new ButtonBuilder()
      .setCustomId(`${HELP_PAGE_CUSTOM_ID_PREFIX}${page + 1}`)
      .setLabel('Next')
      .setStyle(ButtonStyle.Secondary)
      .setDisabled(page === groups.length - 1)
  );

  return { embeds: [embed], components: [row] };
}

export function buildCommandHelp(command: CommandDescriptor, prefix: string): GenericResponse {
  const embed = new EmbedBuilder()
    .setTitle(`/${primaryName(command)}`)
    .setColor(HELP_COLOR)
    .setDescription(describeCommand(command, prefix))
    .setFooter({ text: command.group });
  return { embeds: [embed] };
}

/**
 * @param getRegistry - Resolved lazily: help is itself part of the registry it describes
 */
export function createHelpCommand(getRegistry: () => CommandRegistry): CommandDescriptor {
  return defineCommand({
    names: ['help', 'commands'],
    description: 'Lists commands, or explains one of them',
    examples: ['help', 'help prefix'],
    group: 'General',
    args: [
      { name: 'command', description: 'Command to explain', kind: 'string', required: false }
    ],
    canBlacklist: false,
    execute: async (invoke, options) => {
      const registry = getRegistry();
      const query = (options.getString('command') ?? options.args ?? '').trim();

      if (query.length === 0) {
        await invoke.respond(buildHelpPage(registry, 0));
        return;
      }

      const command = registry.get(query.replace(/^\//, ''));
      if (command) {
        await invoke.respond(buildCommandHelp(command, registry.defaultPrefix));
        return;
      }

      const page = Number.parseInt(query, 10);
      if (Number.isInteger(page) && String(page) === query) {
        await invoke.respond(buildHelpPage(registry, page - 1));
        return;
      }

      await invoke.respond({ content: `There is no command called \`${query}\`.`, ephemeral: true });
    }
  });
}

/**
 * Component handler for the Previous/Next buttons; edits the help message in place.
 */
export function createHelpPageHandler(getRegistry: () => CommandRegistry): ComponentHandler {
  return async (invoke, customId) => {
    const page = Number.parseInt(customId.slice(HELP_PAGE_CUSTOM_ID_PREFIX.length), 10);
    await invoke.respond(buildHelpPage(getRegistry(), Number.isNaN(page) ? 0 : page));
  };
}
