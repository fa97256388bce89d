/**
 * @file response.ts
 * @description Platform-neutral response payload and its mapping onto each discord.js call shape.
 */

import { MessageFlags } from 'discord.js';
import type {
  ActionRowBuilder,
  EmbedBuilder,
  InteractionEditReplyOptions,
  InteractionReplyOptions,
  InteractionUpdateOptions,
  MessageActionRowComponentBuilder,
  MessageCreateOptions,
  MessageEditOptions,
  MessageReplyOptions
} from 'discord.js';

/**
 * What a command body wants to say, independent of how the trigger must be answered.
 */
export interface GenericResponse {
  content?: string;
  embeds?: EmbedBuilder[];
  components?: ActionRowBuilder<MessageActionRowComponentBuilder>[];
  /** Only honoured where the platform call supports it (interaction replies and follow-ups) */
  ephemeral?: boolean;
}

export function toReplyOptions(response: GenericResponse): InteractionReplyOptions {
  return {
    content: response.content,
    embeds: response.embeds,
    components: response.components,
    ...(response.ephemeral ? { flags: MessageFlags.Ephemeral } : {})
  };
}

export function toEditReplyOptions(response: GenericResponse): InteractionEditReplyOptions {
  return {
    content: response.content,
    embeds: response.embeds,
    components: response.components
  };
}

export function toUpdateOptions(response: GenericResponse): InteractionUpdateOptions {
  return {
    content: response.content,
    embeds: response.embeds,
    components: response.components
  };
}

export function toMessageCreateOptions(response: GenericResponse): MessageCreateOptions {
  return {
    content: response.content,
    embeds: response.embeds,
    components: response.components
  };
}

export function toMessageReplyOptions(response: GenericResponse): MessageReplyOptions {
  return {
    content: response.content,
    embeds: response.embeds,
    components: response.components,
    allowedMentions: { repliedUser: false }
  };
}

export function toMessageEditOptions(response: GenericResponse): MessageEditOptions {
  return {
    content: response.content,
    embeds: response.embeds,
    components: response.components
  };
}
