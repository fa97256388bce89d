/**
 * @description: Covers custom-id routing for message components and the help pager built on it.
 * @scope: test
 * @module: ComponentRouterTests
 * @risk: low - Tests only.
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { ButtonBuilder } from 'discord.js';

import { defineCommand } from '../src/commands/BaseCommand.js';
import { buildHelpPage, createHelpPageHandler } from '../src/commands/help.js';
import { CommandRegistryBuilder } from '../src/framework/CommandRegistry.js';
import { ComponentRouter } from '../src/framework/ComponentRouter.js';
import type { GenericResponse } from '../src/framework/response.js';
import { BOT_ID, createFakeComponentInteraction } from './fakes.js';

const noop = async () => {};

const createRegistry = () => new CommandRegistryBuilder({ clientId: BOT_ID, defaultPrefix: '$' })
    .addCommand(defineCommand({ names: ['ping', 'p'], description: 'Pong', group: 'General', execute: noop }))
    .addCommand(defineCommand({ names: ['prefix'], description: 'Prefix', group: 'Settings', execute: noop }))
    .build();

const footerOf = (response: GenericResponse) => response.embeds?.[0]?.data.footer?.text;

const buttonStates = (response: GenericResponse) =>
    (response.components?.[0]?.components ?? []).map((component) =>
        component instanceof ButtonBuilder ? component.data.disabled : undefined
    );

test('the handler with the longest matching prefix wins', async () => {
    const seen: string[] = [];
    const router = new ComponentRouter()
        .register('help:', async (_invoke, customId) => { seen.push(`short ${customId}`); })
        .register('help:page:', async (invoke, customId) => {
            seen.push(`long ${customId} ${invoke.kind}`);
        });
    const { interaction } = createFakeComponentInteraction({ customId: 'help:page:2' });

    assert.equal(await router.route(interaction), true);
    assert.deepEqual(seen, ['long help:page:2 component']);
});

test('unclaimed custom ids are reported as unrouted', async () => {
    const router = new ComponentRouter().register('help:page:', noop);
    const { interaction, recorder } = createFakeComponentInteraction({ customId: 'other:1' });

    assert.equal(await router.route(interaction), false);
    assert.deepEqual(recorder.methods(), []);
});

test('a prefix can only be registered once', () => {
    const router = new ComponentRouter().register('help:page:', noop);
    assert.throws(() => router.register('help:page:', noop), /already registered/);
});

test('help pages follow help groups and disable buttons at the edges', () => {
    const registry = createRegistry();

    const first = buildHelpPage(registry, 0);
    assert.equal(first.embeds?.[0]?.data.title, 'General commands');
    assert.equal(footerOf(first), 'Page 1/2');
    assert.deepEqual(buttonStates(first), [true, false]);
    assert.equal(first.embeds?.[0]?.data.fields?.[0]?.value, 'Pong\nAliases: `$p`');

    const last = buildHelpPage(registry, 7);
    assert.equal(last.embeds?.[0]?.data.title, 'Settings commands');
    assert.deepEqual(buttonStates(last), [false, true]);
});

test('the help pager updates the message in place', async () => {
    const registry = createRegistry();
    const { interaction, recorder } = createFakeComponentInteraction({ customId: 'help:page:1' });
    const router = new ComponentRouter().register('help:page:', createHelpPageHandler(() => registry));

    await router.route(interaction);

    assert.deepEqual(recorder.methods(), ['update']);
    const embeds = recorder.payloadAt(0)?.embeds;
    assert.ok(Array.isArray(embeds));
    assert.equal(embeds.length, 1);
});
