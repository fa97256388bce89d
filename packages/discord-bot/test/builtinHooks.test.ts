/**
 * @description: Covers the built-in hooks: self-permissions, restricted and channel blacklist.
 * @scope: test
 * @module: BuiltinHooksTests
 * @risk: low - Tests only.
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { MessageFlags, PermissionFlagsBits, PermissionsBitField } from 'discord.js';

import { defineCommand } from '../src/commands/BaseCommand.js';
import { CommandInvoke } from '../src/framework/CommandInvoke.js';
import { CommandOptions } from '../src/framework/CommandOptions.js';
import { createBlacklistHook } from '../src/hooks/blacklist.js';
import { restrictedHook } from '../src/hooks/restricted.js';
import { createSelfPermissionsHook } from '../src/hooks/selfPermissions.js';
import { InMemoryGuildSettingsStore } from '../src/state/GuildSettingsStore.js';
import { CHANNEL_ID, GUILD_ID, createFakeMessage, createFakeSlashInteraction } from './fakes.js';

const command = defineCommand({ names: ['ping'], description: 'Pong', execute: async () => {} });
const exempt = defineCommand({ names: ['blacklist'], description: 'Toggle', canBlacklist: false, execute: async () => {} });
const options = CommandOptions.fromText('ping', '');

const fullBotPermissions = new PermissionsBitField([
    PermissionFlagsBits.ViewChannel,
    PermissionFlagsBits.SendMessages,
    PermissionFlagsBits.EmbedLinks
]);

test('self-permissions continues when the bot has what it needs', async () => {
    const hook = createSelfPermissionsHook();
    const { message, recorder } = createFakeMessage({ content: '$ping', appPermissions: fullBotPermissions });

    assert.equal(await hook.run(CommandInvoke.text(message), options, command), 'continue');
    assert.deepEqual(recorder.methods(), []);
});

test('self-permissions halts text triggers silently when the bot cannot send', async () => {
    const hook = createSelfPermissionsHook();
    const { message, recorder } = createFakeMessage({
        content: '$ping',
        appPermissions: new PermissionsBitField([PermissionFlagsBits.ViewChannel])
    });

    assert.equal(await hook.run(CommandInvoke.text(message), options, command), 'halt');
    assert.deepEqual(recorder.methods(), []);
});

test('self-permissions tells slash users which permissions are missing', async () => {
    const hook = createSelfPermissionsHook();
    const { interaction, recorder } = createFakeSlashInteraction({
        commandName: 'ping',
        appPermissions: new PermissionsBitField([PermissionFlagsBits.ViewChannel, PermissionFlagsBits.SendMessages])
    });

    assert.equal(await hook.run(CommandInvoke.slash(interaction), options, command), 'halt');
    assert.equal(recorder.contentAt(0), 'I am missing permissions in this channel: EmbedLinks');
    assert.equal(recorder.payloadAt(0)?.flags, MessageFlags.Ephemeral);
});

test('self-permissions ignores direct messages', async () => {
    const hook = createSelfPermissionsHook();
    const { message } = createFakeMessage({ content: 'ping', guildId: null });

    assert.equal(await hook.run(CommandInvoke.text(message), options, command), 'continue');
});

test('restricted halts members without Manage Server', async () => {
    const { message, recorder } = createFakeMessage({
        content: '$ping',
        memberPermissions: new PermissionsBitField([PermissionFlagsBits.SendMessages])
    });

    assert.equal(await restrictedHook.run(CommandInvoke.text(message), options, command), 'halt');
    assert.equal(recorder.contentAt(0), 'You need the Manage Server permission to use this command.');
});

test('restricted lets server managers through', async () => {
    const { interaction, recorder } = createFakeSlashInteraction({
        commandName: 'ping',
        memberPermissions: new PermissionsBitField([PermissionFlagsBits.ManageGuild])
    });

    assert.equal(await restrictedHook.run(CommandInvoke.slash(interaction), options, command), 'continue');
    assert.deepEqual(recorder.methods(), []);
});

test('blacklist halts blacklistable commands in blacklisted channels', async () => {
    const settings = new InMemoryGuildSettingsStore();
    await settings.setChannelBlacklisted(GUILD_ID, CHANNEL_ID, true);
    const hook = createBlacklistHook(settings);

    const slash = createFakeSlashInteraction({ commandName: 'ping' });
    assert.equal(await hook.run(CommandInvoke.slash(slash.interaction), options, command), 'halt');
    assert.equal(slash.recorder.contentAt(0), 'Commands are disabled in this channel.');

    const text = createFakeMessage({ content: '$ping' });
    assert.equal(await hook.run(CommandInvoke.text(text.message), options, command), 'halt');
    assert.deepEqual(text.recorder.methods(), []);
});

test('blacklist lets exempt commands and other channels through', async () => {
    const settings = new InMemoryGuildSettingsStore();
    await settings.setChannelBlacklisted(GUILD_ID, CHANNEL_ID, true);
    const hook = createBlacklistHook(settings);

    const here = createFakeMessage({ content: '$blacklist' });
    assert.equal(await hook.run(CommandInvoke.text(here.message), options, exempt), 'continue');

    const elsewhere = createFakeMessage({ content: '$ping', channelId: '400000000000000099' });
    assert.equal(await hook.run(CommandInvoke.text(elsewhere.message), options, command), 'continue');
});
