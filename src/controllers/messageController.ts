/**
 * @file src/controllers/messageController.ts
 * @description Feeds every Discord message the bot sees into the backup plugin: messages from people
 *   as user records, the bot's own messages as assistant records. Other bots are ignored.
 */

import { ChannelType } from "discord.js";
import { BackupPlugin } from "../services/backupService.js";
import { toChatEvent } from "../utils/discordHelpers.js";
import logger from "../utils/logger.js";

/**
 * The parts of a discord.js `Message` the backup reads.
 */
export interface BackupMessage {
  id: string;
  author: { id: string; username: string; bot: boolean };
  member: { displayName: string } | null;
  guildId: string | null;
  /** `recipientId` is only set on DM channels. */
  channel: { type: ChannelType; recipientId?: string | null };
  content: string;
}

/**
 * @param plugin  The backup plugin receiving the events.
 * @param client  The Discord client, used to recognise the bot's own messages.
 * @returns       A function to handle 'messageCreate' events.
 */
export function handleNewMessage(
  plugin: Pick<BackupPlugin, "onMessage" | "onBotResponse">,
  client: { user: { id: string } | null }
): (message: BackupMessage) => Promise<void> {
  logger.debug("[messageController] Initialising message handler");
  return async (message: BackupMessage): Promise<void> => {
    const fromBot = message.author.id === client.user?.id;
    if (message.author.bot && !fromBot) {
      logger.debug(`[messageController] Ignored message ${message.id} from another bot`);
      return;
    }

    const event = toChatEvent(
      {
        authorId: message.author.id,
        authorName: message.author.username,
        displayName: message.member?.displayName,
        guildId: message.guildId,
        dmRecipientId:
          message.channel.type === ChannelType.DM ? message.channel.recipientId : null,
        content: message.content,
      },
      fromBot
    );
    if (!event) {
      logger.debug(`[messageController] No conversation key for message ${message.id}`);
      return;
    }

    if (fromBot) {
      await plugin.onBotResponse(event);
    } else {
      await plugin.onMessage(event);
    }
  };
}
