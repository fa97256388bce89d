/**
 * @description: In-process stand-ins for the discord.js objects the framework touches.
 * @scope: test
 * @module: TestFakes
 * @risk: low - Test support only.
 */

import type {
    ChatInputCommandInteraction,
    CommandInteractionOption,
    Interaction,
    Message,
    MessageComponentInteraction,
    PermissionsBitField
} from 'discord.js';

export const BOT_ID = '100000000000000001';
export const USER_ID = '200000000000000002';
export const GUILD_ID = '300000000000000003';
export const CHANNEL_ID = '400000000000000004';

/** The parts of the client that commands read */
export const createFakeClient = () => ({
    user: {
        id: BOT_ID,
        tag: 'chime#0001',
        username: 'chime',
        displayAvatarURL: () => 'https://cdn.example.test/avatar.png'
    },
    guilds: { cache: { size: 3 } },
    uptime: 90_000
});

export interface RecordedCall {
    method: string;
    payload: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Records successful platform calls in order. A method name added to `failing`
 * makes its next call reject without being recorded.
 */
export class CallRecorder {
    readonly calls: RecordedCall[] = [];
    readonly failing = new Set<string>();

    fn<R>(method: string, result: () => R): (payload?: unknown) => Promise<R> {
        return async (payload?: unknown) => {
            if (this.failing.delete(method)) {
                throw new Error(`${method} failed`);
            }
            this.calls.push({ method, payload });
            return result();
        };
    }

    methods(): string[] {
        return this.calls.map((call) => call.method);
    }

    contentAt(index: number): string | undefined {
        const payload = this.calls[index]?.payload;
        return isRecord(payload) && typeof payload.content === 'string' ? payload.content : undefined;
    }

    payloadAt(index: number): Record<string, unknown> | undefined {
        const payload = this.calls[index]?.payload;
        return isRecord(payload) ? payload : undefined;
    }
}

export interface FakeMessageOptions {
    content: string;
    authorId?: string;
    bot?: boolean;
    /** null for a direct message */
    guildId?: string | null;
    channelId?: string;
    memberPermissions?: PermissionsBitField | null;
    appPermissions?: PermissionsBitField | null;
    sendable?: boolean;
}

export function createFakeMessage(options: FakeMessageOptions, recorder = new CallRecorder()) {
    const guildId = options.guildId === undefined ? GUILD_ID : options.guildId;
    const placeholder = { edit: recorder.fn('placeholder.edit', () => ({})) };
    const message = {
        id: 'message-1',
        content: options.content,
        author: { id: options.authorId ?? USER_ID, bot: options.bot ?? false },
        guildId,
        channelId: options.channelId ?? CHANNEL_ID,
        guild: null,
        member: options.memberPermissions ? { permissions: options.memberPermissions } : null,
        client: createFakeClient(),
        inGuild: () => guildId !== null,
        channel: {
            isSendable: () => options.sendable ?? true,
            send: recorder.fn('channel.send', () => ({})),
            permissionsFor: () => options.appPermissions ?? null
        },
        reply: recorder.fn('reply', () => placeholder)
    };

    return { message: message as unknown as Message, recorder };
}

interface FakeInteractionOptions {
    userId?: string;
    guildId?: string | null;
    channelId?: string;
    memberPermissions?: PermissionsBitField | null;
    appPermissions?: PermissionsBitField | null;
}

function interactionBase(options: FakeInteractionOptions) {
    return {
        user: { id: options.userId ?? USER_ID },
        guildId: options.guildId === undefined ? GUILD_ID : options.guildId,
        channelId: options.channelId ?? CHANNEL_ID,
        guild: null,
        memberPermissions: options.memberPermissions ?? null,
        appPermissions: options.appPermissions ?? null,
        client: createFakeClient()
    };
}

export interface FakeSlashOptions extends FakeInteractionOptions {
    commandName: string;
    data?: CommandInteractionOption[];
}

export function createFakeSlashInteraction(options: FakeSlashOptions, recorder = new CallRecorder()) {
    const interaction = {
        ...interactionBase(options),
        commandName: options.commandName,
        options: { data: options.data ?? [] },
        isChatInputCommand: () => true,
        isMessageComponent: () => false,
        deferReply: recorder.fn('deferReply', () => ({})),
        reply: recorder.fn('reply', () => ({})),
        editReply: recorder.fn('editReply', () => ({})),
        followUp: recorder.fn('followUp', () => ({}))
    };

    return {
        interaction: interaction as unknown as ChatInputCommandInteraction,
        asInteraction: interaction as unknown as Interaction,
        recorder
    };
}

export interface FakeComponentOptions extends FakeInteractionOptions {
    customId: string;
}

export function createFakeComponentInteraction(options: FakeComponentOptions, recorder = new CallRecorder()) {
    const interaction = {
        ...interactionBase(options),
        customId: options.customId,
        isChatInputCommand: () => false,
        isMessageComponent: () => true,
        deferUpdate: recorder.fn('deferUpdate', () => ({})),
        update: recorder.fn('update', () => ({})),
        editReply: recorder.fn('editReply', () => ({})),
        followUp: recorder.fn('followUp', () => ({}))
    };

    return {
        interaction: interaction as unknown as MessageComponentInteraction,
        asInteraction: interaction as unknown as Interaction,
        recorder
    };
}

/**
 * Resolves once released; lets a test hold a command body open across other dispatches.
 */
export function createGate() {
    let release: () => void = () => undefined;
    const opened = new Promise<void>((resolve) => {
        release = resolve;
    });
    return { opened, release: () => release() };
}
