/**
 * @module: CommandInvoke
 * @risk: high
 * @scope: core
 *
 * @description
 * Invocation handle wrapping exactly one inbound trigger (slash command, message component or
 * text message). Exposes who/where accessors and a forward-only response state machine so command
 * bodies and hooks can call `defer` and `respond` freely without double-acknowledging Discord.
 *
 * @impact
 * Risk: A wrong transition produces "interaction already acknowledged" failures or silent
 * non-responses. State only moves after the platform call resolves, so a failed call can be retried.
 */

import type {
  ChatInputCommandInteraction,
  Client,
  Guild,
  Message,
  MessageComponentInteraction,
  PermissionsBitField,
  User
} from 'discord.js';
import {
  toEditReplyOptions,
  toMessageCreateOptions,
  toMessageEditOptions,
  toMessageReplyOptions,
  toReplyOptions,
  toUpdateOptions
} from './response.js';
import type { GenericResponse } from './response.js';

/**
 * The trigger a handle wraps. Call sites that differ per variant switch on `kind`.
 */
export type InvokeModel =
  | { readonly kind: 'slash'; readonly interaction: ChatInputCommandInteraction }
  | { readonly kind: 'component'; readonly interaction: MessageComponentInteraction }
  | { readonly kind: 'text'; readonly message: Message };

export type InvokeKind = InvokeModel['kind'];

/**
 * fresh → deferred → responded, or fresh → responded. Never backwards.
 */
export type ResponseState = 'fresh' | 'deferred' | 'responded';

/** Placeholder sent when a text trigger is deferred */
export const TEXT_DEFER_PLACEHOLDER = 'Working on it...';

/**
 * One inbound trigger plus its response state.
 * @class CommandInvoke
 */
export class CommandInvoke {
  private responseState: ResponseState = 'fresh';
  /** The message a deferred text trigger will edit */
  private placeholder: Message | null = null;

  private constructor(public readonly model: InvokeModel) {}

  static slash(interaction: ChatInputCommandInteraction): CommandInvoke {
    return new CommandInvoke({ kind: 'slash', interaction });
  }

  static component(interaction: MessageComponentInteraction): CommandInvoke {
    return new CommandInvoke({ kind: 'component', interaction });
  }

  static text(message: Message): CommandInvoke {
    return new CommandInvoke({ kind: 'text', message });
  }

  get kind(): InvokeKind {
    return this.model.kind;
  }

  get state(): ResponseState {
    return this.responseState;
  }

  get client(): Client<true> {
    const model = this.model;
    return model.kind === 'text' ? model.message.client : model.interaction.client;
  }

  get user(): User {
    const model = this.model;
    return model.kind === 'text' ? model.message.author : model.interaction.user;
  }

  get authorId(): string {
    return this.user.id;
  }

  get channelId(): string | null {
    const model = this.model;
    return model.kind === 'text' ? model.message.channelId : model.interaction.channelId;
  }

  get guildId(): string | null {
    const model = this.model;
    return model.kind === 'text' ? model.message.guildId : model.interaction.guildId;
  }

  /**
   * The guild from the client cache, when the trigger came from a cached guild.
   */
  get guild(): Guild | null {
    const model = this.model;
    return model.kind === 'text' ? model.message.guild : model.interaction.guild;
  }

  /**
   * Permissions of the invoking member in the trigger's channel; null outside guilds.
   */
  get memberPermissions(): Readonly<PermissionsBitField> | null {
    const model = this.model;
    if (model.kind === 'text') {
      return model.message.member?.permissions ?? null;
    }
    return model.interaction.memberPermissions ?? null;
  }

  /**
   * The bot's own permissions in the trigger's channel; null outside guilds.
   */
  get appPermissions(): Readonly<PermissionsBitField> | null {
    const model = this.model;
    if (model.kind === 'text') {
      const message = model.message;
      return message.inGuild() ? message.channel.permissionsFor(message.client.user) : null;
    }
    return model.interaction.appPermissions ?? null;
  }

  /**
   * Acknowledges the trigger with a placeholder. No-op once deferred or responded.
   */
  async defer(): Promise<void> {
    if (this.responseState !== 'fresh') {
      return;
    }

    const model = this.model;
    switch (model.kind) {
      case 'slash':
        await model.interaction.deferReply();
        break;
      case 'component':
        await model.interaction.deferUpdate();
        break;
      case 'text':
        this.placeholder = await model.message.reply({
          content: TEXT_DEFER_PLACEHOLDER,
          allowedMentions: { repliedUser: false }
        });
        break;
    }

    this.responseState = 'deferred';
  }

  /**
   * Sends a response. Safe to call any number of times:
   * the first call answers (or edits the deferred placeholder), later calls follow up.
   */
  async respond(response: GenericResponse): Promise<void> {
    switch (this.responseState) {
      case 'fresh':
        await this.createInitialResponse(response);
        break;
      case 'deferred':
        await this.editInitialResponse(response);
        break;
      case 'responded':
        await this.createFollowup(response);
        break;
    }

    this.responseState = 'responded';
  }

  private async createInitialResponse(response: GenericResponse): Promise<void> {
    const model = this.model;
    switch (model.kind) {
      case 'slash':
        await model.interaction.reply(toReplyOptions(response));
        return;
      case 'component':
        await model.interaction.update(toUpdateOptions(response));
        return;
      case 'text':
        await model.message.reply(toMessageReplyOptions(response));
        return;
    }
  }

  private async editInitialResponse(response: GenericResponse): Promise<void> {
    const model = this.model;
    switch (model.kind) {
      case 'slash':
      case 'component':
        await model.interaction.editReply(toEditReplyOptions(response));
        return;
      case 'text':
        if (!this.placeholder) {
          throw new Error('Deferred text invocation has no placeholder to edit');
        }
        await this.placeholder.edit(toMessageEditOptions(response));
        return;
    }
  }

  private async createFollowup(response: GenericResponse): Promise<void> {
    const model = this.model;
    switch (model.kind) {
      case 'slash':
      case 'component':
        await model.interaction.followUp(toReplyOptions(response));
        return;
      case 'text': {
        const channel = model.message.channel;
        if (!channel.isSendable()) {
          throw new Error('Channel is not sendable');
        }
        await channel.send(toMessageCreateOptions(response));
        return;
      }
    }
  }
}
