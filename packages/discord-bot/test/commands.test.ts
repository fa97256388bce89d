/**
 * @description: Covers the built-in help, info, prefix and blacklist commands through the dispatcher.
 * @scope: test
 * @module: BuiltinCommandTests
 * @risk: low - Tests only.
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { EmbedBuilder, PermissionFlagsBits, PermissionsBitField } from 'discord.js';

import { createCommandFramework } from '../src/bot/index.js';
import { parseChannelReference } from '../src/commands/blacklist.js';
import { formatUptime } from '../src/commands/info.js';
import { validatePrefix } from '../src/commands/prefix.js';
import { BOT_ID, CHANNEL_ID, GUILD_ID, createFakeMessage } from './fakes.js';
import type { CallRecorder, FakeMessageOptions } from './fakes.js';

const manager = new PermissionsBitField([PermissionFlagsBits.ManageGuild]);

const createFramework = () => {
    const framework = createCommandFramework({
        clientId: BOT_ID,
        defaultPrefix: '$',
        caseInsensitive: true,
        admissionDebounceMs: 4000
    });

    const send = async (content: string, extra: Partial<FakeMessageOptions> = {}, guildPrefix?: string | null) => {
        const { message, recorder } = createFakeMessage({ content, memberPermissions: manager, ...extra });
        const outcome = await framework.dispatcher.dispatchMessage(message, guildPrefix);
        return { outcome, recorder };
    };

    return { framework, send };
};

const firstEmbed = (recorder: CallRecorder): EmbedBuilder | undefined => {
    const embeds = recorder.payloadAt(0)?.embeds;
    const embed: unknown = Array.isArray(embeds) ? embeds[0] : undefined;
    return embed instanceof EmbedBuilder ? embed : undefined;
};

test('help explains a single command by name or alias', async () => {
    const { send } = createFramework();

    const byName = await send('$help prefix');
    assert.equal(firstEmbed(byName.recorder)?.data.title, '/prefix');
    assert.equal(firstEmbed(byName.recorder)?.data.footer?.text, 'Settings');

    const byAlias = await send('$commands about');
    assert.equal(firstEmbed(byAlias.recorder)?.data.title, '/info');
});

test('help pages through groups by number and rejects unknown names', async () => {
    const { send } = createFramework();

    const page = await send('$help 2');
    assert.equal(firstEmbed(page.recorder)?.data.title, 'Settings commands');

    const missing = await send('$help nothing');
    assert.equal(missing.recorder.contentAt(0), 'There is no command called `nothing`.');
});

test('info reports servers, commands and uptime', async () => {
    const { send } = createFramework();
    const { recorder } = await send('$info');

    assert.deepEqual(firstEmbed(recorder)?.data.fields, [
        { name: 'Servers', value: '3', inline: true },
        { name: 'Commands', value: '5', inline: true },
        { name: 'Uptime', value: '1 minute 30 seconds', inline: true }
    ]);
    assert.equal(formatUptime(0), 'just started');
    assert.equal(formatUptime(null), 'offline');
});

test('prefix shows, changes and resets the guild prefix', async () => {
    const { framework, send } = createFramework();

    assert.equal((await send('$prefix')).recorder.contentAt(0), 'The prefix in this server is `$`.');
    assert.equal((await send('$prefix !')).recorder.contentAt(0), 'The prefix in this server is now `!`.');
    assert.equal(await framework.settings.getPrefix(GUILD_ID), '!');

    const viaCustom = await send('!prefix', {}, '!');
    assert.equal(viaCustom.outcome, 'executed');
    assert.equal(viaCustom.recorder.contentAt(0), 'The prefix in this server is `!`.');

    await send('$prefix $');
    assert.equal(await framework.settings.getPrefix(GUILD_ID), null);
});

test('prefix rejects long or spaced prefixes and non-managers', async () => {
    const { send } = createFramework();

    assert.equal((await send('$prefix toolong')).recorder.contentAt(0), 'A prefix can be at most 5 characters long.');
    assert.equal((await send('$prefix a b')).recorder.contentAt(0), 'A prefix cannot contain whitespace.');

    const denied = await send('$prefix !', { memberPermissions: null });
    assert.equal(denied.outcome, 'halted');
    assert.equal(denied.recorder.contentAt(0), 'You need the Manage Server permission to use this command.');

    assert.equal((await send('prefix', { guildId: null })).outcome, 'unmatched');
    assert.equal(validatePrefix('>>'), null);
});

test('blacklist toggles a channel and stays usable inside it', async () => {
    const { framework, send } = createFramework();

    const disabled = await send('$blacklist');
    assert.equal(disabled.recorder.contentAt(0), `Commands are now disabled in <#${CHANNEL_ID}>.`);
    assert.equal(await framework.settings.isChannelBlacklisted(GUILD_ID, CHANNEL_ID), true);

    const blocked = await send('$help');
    assert.equal(blocked.outcome, 'halted');
    assert.deepEqual(blocked.recorder.methods(), []);

    const enabled = await send('$blacklist');
    assert.equal(enabled.recorder.contentAt(0), `Commands are enabled again in <#${CHANNEL_ID}>.`);
});

test('blacklist accepts another channel by mention and rejects anything else', async () => {
    const { framework, send } = createFramework();

    await send('$blacklist <#555000000000000555>');
    assert.deepEqual(await framework.settings.listBlacklistedChannels(GUILD_ID), ['555000000000000555']);

    const invalid = await send('$blacklist general');
    assert.equal(invalid.recorder.contentAt(0), 'Name a channel of this server, e.g. `#general`.');

    assert.equal(parseChannelReference('<#123>'), '123');
    assert.equal(parseChannelReference('123'), '123');
    assert.equal(parseChannelReference('#general'), null);
});
