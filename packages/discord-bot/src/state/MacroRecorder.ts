/**
 * @module: MacroRecorder
 * @risk: moderate
 * @scope: state
 *
 * @description
 * Tracks in-progress macro recordings per (guild, user) and stores finished macros.
 * A recording captures normalized invocations, never raw triggers, so a macro recorded
 * with text commands replays the same way as one recorded with slash commands.
 */

import type { CommandOptions, SerializedCommandOptions } from '../framework/CommandOptions.js';
import { formatOptionValue } from '../framework/types.js';

export const MAX_MACRO_COMMANDS = 5;

/** Invocations of this command are never recorded, so a recording can be finished */
export const MACRO_COMMAND_NAME = 'macro';

export interface MacroRecording {
  readonly name: string;
  readonly commands: SerializedCommandOptions[];
}

export type AppendResult =
  | { status: 'recorded'; count: number }
  | { status: 'full' }
  | { status: 'idle' };

/**
 * One-line rendering of a recorded invocation, e.g. `/remind in:5m` or `/help 2`.
 */
export function describeRecordedCommand(command: SerializedCommandOptions): string {
  const parts = [`/${command.command}`];
  if (command.subcommandGroup) {
    parts.push(command.subcommandGroup);
  }
  if (command.subcommand) {
    parts.push(command.subcommand);
  }
  for (const [name, value] of Object.entries(command.options)) {
    parts.push(`${name}:${formatOptionValue(value)}`);
  }
  if (command.args) {
    parts.push(command.args);
  }
  return parts.join(' ');
}

function recordingKey(guildId: string, userId: string): string {
  return `${guildId}:${userId}`;
}

/**
 * @class MacroRecorder
 */
export class MacroRecorder {
  private readonly recordings = new Map<string, MacroRecording>();

  constructor(public readonly maxCommands: number = MAX_MACRO_COMMANDS) {}

  /**
   * @returns false when the user is already recording in this guild
   */
  start(guildId: string, userId: string, name: string): boolean {
    const key = recordingKey(guildId, userId);
    if (this.recordings.has(key)) {
      return false;
    }
    this.recordings.set(key, { name, commands: [] });
    return true;
  }

  isRecording(guildId: string, userId: string): boolean {
    return this.recordings.has(recordingKey(guildId, userId));
  }

  append(guildId: string, userId: string, options: CommandOptions): AppendResult {
    const recording = this.recordings.get(recordingKey(guildId, userId));
    if (!recording) {
      return { status: 'idle' };
    }
    if (recording.commands.length >= this.maxCommands) {
      return { status: 'full' };
    }
    recording.commands.push(options.toJSON());
    return { status: 'recorded', count: recording.commands.length };
  }

  /**
   * Ends the recording and hands it back; null when none was in progress.
   */
  finish(guildId: string, userId: string): MacroRecording | null {
    const key = recordingKey(guildId, userId);
    const recording = this.recordings.get(key) ?? null;
    this.recordings.delete(key);
    return recording;
  }
}

export interface SavedMacro {
  readonly name: string;
  readonly authorId: string;
  readonly commands: readonly SerializedCommandOptions[];
}

/**
 * Storage contract for finished macros, scoped per guild. Names are case-insensitive.
 */
export interface MacroStore {
  get(guildId: string, name: string): Promise<SavedMacro | null>;
  save(guildId: string, macro: SavedMacro): Promise<void>;
  list(guildId: string): Promise<SavedMacro[]>;
  /** @returns false when no macro had that name */
  delete(guildId: string, name: string): Promise<boolean>;
}

/**
 * @class InMemoryMacroStore
 */
export class InMemoryMacroStore implements MacroStore {
  private readonly macros = new Map<string, Map<string, SavedMacro>>();

  async get(guildId: string, name: string): Promise<SavedMacro | null> {
    return this.macros.get(guildId)?.get(name.toLowerCase()) ?? null;
  }

  async save(guildId: string, macro: SavedMacro): Promise<void> {
    let guildMacros = this.macros.get(guildId);
    if (!guildMacros) {
      guildMacros = new Map();
      this.macros.set(guildId, guildMacros);
    }
    guildMacros.set(macro.name.toLowerCase(), macro);
  }

  async list(guildId: string): Promise<SavedMacro[]> {
    return [...(this.macros.get(guildId)?.values() ?? [])];
  }

  async delete(guildId: string, name: string): Promise<boolean> {
    return this.macros.get(guildId)?.delete(name.toLowerCase()) ?? false;
  }
}
