/**
 * @module: MacroCommand
 * @risk: moderate
 * @scope: commands
 *
 * @description
 * Records a short sequence of commands under a name and replays it on demand.
 * While a recording is open, the macro-recording hook captures the user's other commands
 * in that guild instead of running them.
 */

import { PermissionFlagsBits } from 'discord.js';
import { logger, describeError } from '../utils/logger.js';
import { defineCommand } from './BaseCommand.js';
import type { CommandDescriptor } from './BaseCommand.js';
import { CommandOptions } from '../framework/CommandOptions.js';
import type { CommandInvoke } from '../framework/CommandInvoke.js';
import type { ReplayOutcome } from '../framework/Dispatcher.js';
import type { ArgSpec } from '../framework/types.js';
import { MACRO_COMMAND_NAME, describeRecordedCommand } from '../state/MacroRecorder.js';
import type { MacroRecorder, MacroStore } from '../state/MacroRecorder.js';

const macroLogger = logger.child({ module: 'macroCommand' });

export type MacroAction = 'record' | 'finish' | 'list' | 'run' | 'delete';

const MACRO_ACTIONS: readonly MacroAction[] = ['record', 'finish', 'list', 'run', 'delete'];

/** Runs a stored invocation against the current handle, through the command's own hooks */
export type MacroReplay = (invoke: CommandInvoke, options: CommandOptions) => Promise<ReplayOutcome>;

export interface MacroCommandDependencies {
  recorder: MacroRecorder;
  store: MacroStore;
  replay: MacroReplay;
}

function isMacroAction(value: string): value is MacroAction {
  return MACRO_ACTIONS.some((action) => action === value);
}

/**
 * Macros can be removed by whoever recorded them or by a member who can manage the server.
 */
export function canManageMacro(invoke: CommandInvoke, authorId: string): boolean {
  return invoke.authorId === authorId || (invoke.memberPermissions?.has(PermissionFlagsBits.ManageGuild) ?? false);
}

const nameArg: ArgSpec = { name: 'name', description: 'Macro name', kind: 'string', required: true };

/**
 * Reads the action and macro name from either trigger shape.
 * Text form: `macro <action> [name]`.
 */
export function resolveMacroRequest(options: CommandOptions): { action: MacroAction; name: string } | null {
  if (options.subcommand !== null) {
    return isMacroAction(options.subcommand)
      ? { action: options.subcommand, name: options.getString('name')?.trim() ?? '' }
      : null;
  }

  const [action = '', ...rest] = (options.args ?? '').trim().split(/\s+/);
  const normalized = action.toLowerCase();
  return isMacroAction(normalized) ? { action: normalized, name: rest.join(' ') } : null;
}

export function createMacroCommand({ recorder, store, replay }: MacroCommandDependencies): CommandDescriptor {
  const usage = `Usage: \`${MACRO_COMMAND_NAME} ${MACRO_ACTIONS.join('|')} [name]\``;

  return defineCommand({
    names: [MACRO_COMMAND_NAME],
    description: 'Records and replays sequences of commands',
    examples: ['macro record morning', 'macro finish', 'macro run morning'],
    group: 'Macros',
    args: [
      { name: 'record', description: 'Start recording a macro', kind: 'subcommand', required: false, options: [nameArg] },
      { name: 'finish', description: 'Save the macro being recorded', kind: 'subcommand', required: false },
      { name: 'list', description: 'List the macros of this server', kind: 'subcommand', required: false },
      { name: 'run', description: 'Run a saved macro', kind: 'subcommand', required: false, options: [nameArg] },
      { name: 'delete', description: 'Delete a saved macro', kind: 'subcommand', required: false, options: [nameArg] }
    ],
    supportsDm: false,
    execute: async (invoke, options) => {
      const guildId = invoke.guildId;
      const request = resolveMacroRequest(options);
      if (guildId === null || request === null) {
        await invoke.respond({ content: usage, ephemeral: true });
        return;
      }

      const { action, name } = request;
      const userId = invoke.authorId;
      if ((action === 'record' || action === 'run' || action === 'delete') && name.length === 0) {
        await invoke.respond({ content: usage, ephemeral: true });
        return;
      }

      switch (action) {
        case 'record': {
          if (!recorder.start(guildId, userId, name)) {
            await invoke.respond({ content: 'You are already recording a macro. Finish it first.', ephemeral: true });
            return;
          }
          await invoke.respond({
            content: `Recording macro "${name}". Run up to ${recorder.maxCommands} commands, then \`/${MACRO_COMMAND_NAME} finish\`.`,
            ephemeral: true
          });
          return;
        }

        case 'finish': {
          const recording = recorder.finish(guildId, userId);
          if (!recording) {
            await invoke.respond({ content: 'You are not recording a macro.', ephemeral: true });
            return;
          }
          if (recording.commands.length === 0) {
            await invoke.respond({ content: `Macro "${recording.name}" was empty and has been discarded.`, ephemeral: true });
            return;
          }
          await store.save(guildId, { name: recording.name, authorId: userId, commands: recording.commands });
          await invoke.respond({
            content: `Saved macro "${recording.name}" with ${recording.commands.length} command(s).`
          });
          return;
        }

        case 'list': {
          const macros = await store.list(guildId);
          await invoke.respond({
            content: macros.length === 0
              ? 'No macros are saved in this server.'
              : macros
                .map((macro) => `**${macro.name}**: ${macro.commands.map(describeRecordedCommand).join(', ')}`)
                .join('\n')
          });
          return;
        }

        case 'run': {
          const macro = await store.get(guildId, name);
          if (!macro) {
            await invoke.respond({ content: `There is no macro called "${name}".`, ephemeral: true });
            return;
          }

          await invoke.respond({ content: `Running macro "${macro.name}" (${macro.commands.length} command(s)).` });
          for (const stored of macro.commands) {
            let outcome: ReplayOutcome;
            try {
              outcome = await replay(invoke, CommandOptions.fromJSON(stored));
            } catch (error) {
              macroLogger.error(`Macro "${macro.name}" failed at ${describeRecordedCommand(stored)}: ${describeError(error)}`);
              outcome = 'halted';
            }
            if (outcome === 'halted') {
              await invoke.respond({ content: `Macro stopped at \`${describeRecordedCommand(stored)}\`.` });
              return;
            }
          }
          return;
        }

        case 'delete': {
          const macro = await store.get(guildId, name);
          if (!macro) {
            await invoke.respond({ content: `There is no macro called "${name}".`, ephemeral: true });
            return;
          }
          if (!canManageMacro(invoke, macro.authorId)) {
            await invoke.respond({
              content: `Only the author of macro "${macro.name}" or a server manager can delete it.`,
              ephemeral: true
            });
            return;
          }
          await store.delete(guildId, macro.name);
          await invoke.respond({ content: `Deleted macro "${macro.name}".` });
          return;
        }
      }
    }
  });
}
