/**
 * @description: Global hook capturing invocations into an in-progress macro instead of running them.
 * @scope: hooks
 * @module: MacroRecordingHook
 * @risk: moderate - While recording, every command the user sends in the guild is swallowed.
 */

import { createHook } from '../framework/hooks.js';
import type { Hook } from '../framework/hooks.js';
import { MACRO_COMMAND_NAME } from '../state/MacroRecorder.js';
import type { MacroRecorder } from '../state/MacroRecorder.js';

export function createMacroRecordingHook(recorder: MacroRecorder): Hook {
  return createHook('macro-recording', async (invoke, options) => {
    const guildId = invoke.guildId;
    if (guildId === null || options.command === MACRO_COMMAND_NAME) {
      return 'continue';
    }

    const result = recorder.append(guildId, invoke.authorId, options);
    switch (result.status) {
      case 'idle':
        return 'continue';
      case 'full':
        await invoke.respond({
          content: `This macro already holds ${recorder.maxCommands} commands. Use /${MACRO_COMMAND_NAME} finish to save it.`,
          ephemeral: true
        });
        return 'halt';
      case 'recorded':
        await invoke.respond({
          content: `Recorded /${options.command} (${result.count}/${recorder.maxCommands}).`,
          ephemeral: true
        });
        return 'halt';
    }
  });
}
