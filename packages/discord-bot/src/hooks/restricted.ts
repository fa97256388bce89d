/**
 * @description: Per-command hook limiting a command to members who can manage the server.
 * @scope: hooks
 * @module: RestrictedHook
 * @risk: moderate - Guards the commands that change guild settings.
 */

import { PermissionFlagsBits } from 'discord.js';
import { createHook } from '../framework/hooks.js';

export const restrictedHook = createHook('restricted', async (invoke) => {
  const permissions = invoke.memberPermissions;
  if (permissions?.has(PermissionFlagsBits.ManageGuild)) {
    return 'continue';
  }

  await invoke.respond({
    content: 'You need the Manage Server permission to use this command.',
    ephemeral: true
  });
  return 'halt';
});
