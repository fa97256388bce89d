/**
 * @description: Global hook halting commands in guild channels where the bot cannot answer properly.
 * @scope: hooks
 * @module: SelfPermissionsHook
 * @risk: moderate - A wrong permission set makes every guild command silently halt.
 */

import { PermissionFlagsBits } from 'discord.js';
import { logger } from '../utils/logger.js';
import { createHook } from '../framework/hooks.js';
import type { Hook } from '../framework/hooks.js';

const hookLogger = logger.child({ module: 'selfPermissionsHook' });

export const REQUIRED_SELF_PERMISSIONS = [
  PermissionFlagsBits.ViewChannel,
  PermissionFlagsBits.SendMessages,
  PermissionFlagsBits.EmbedLinks
] as const;

export function createSelfPermissionsHook(): Hook {
  return createHook('self-permissions', async (invoke, options) => {
    if (invoke.guildId === null) {
      return 'continue';
    }

    const permissions = invoke.appPermissions;
    if (!permissions) {
      return 'continue';
    }

    const missing = permissions.missing([...REQUIRED_SELF_PERMISSIONS]);
    if (missing.length === 0) {
      return 'continue';
    }

    hookLogger.debug(`Missing ${missing.join(', ')} in channel ${invoke.channelId} for /${options.command}`);

    // A text trigger can only be answered in the same channel, which needs these permissions.
    if (invoke.kind !== 'text') {
      await invoke.respond({
        content: `I am missing permissions in this channel: ${missing.join(', ')}`,
        ephemeral: true
      });
    }
    return 'halt';
  });
}
