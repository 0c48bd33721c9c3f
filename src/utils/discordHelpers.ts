/**
 * @file src/utils/discordHelpers.ts
 * @description Maps the parts of a Discord message the backup cares about onto a platform-neutral
 *   ChatEvent: guild messages become group chats keyed by guild ID, direct messages become private
 *   chats keyed by the user on the other side of the bot.
 */

import { ChatEvent } from "../types/index.js";

/**
 * Plain fields read off a discord.js Message.
 */
export interface MessageFields {
  authorId: string;
  authorName: string;
  /** Member display name in the guild, when there is one. */
  displayName?: string | null;
  guildId: string | null;
  /** User on the other end of a DM channel. */
  dmRecipientId?: string | null;
  content: string;
}

/**
 * Build the event the backup plugin consumes.
 * @param fromBot - True when the bot itself sent the message.
 * @returns null when no conversation key can be worked out.
 */
export function toChatEvent(fields: MessageFields, fromBot: boolean): ChatEvent | null {
  const text = fields.content.trim();

  if (fields.guildId) {
    return {
      chatId: fields.guildId,
      kind: "group",
      text,
      senderId: fields.authorId,
      senderName: fields.displayName || fields.authorName,
    };
  }

  const chatId = fromBot ? fields.dmRecipientId : fields.authorId;
  if (!chatId) return null;
  return {
    chatId,
    kind: "private",
    text,
    senderId: fields.authorId,
    senderName: fields.displayName || fields.authorName,
  };
}
