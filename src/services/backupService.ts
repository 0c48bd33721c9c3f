/**
 * @file src/services/backupService.ts
 * @description The backup plugin: turns host-bot message events into records for the writer
 *   and owns the optional web viewer's lifecycle.
 *
 *   Never throws into the host; every failure ends in a log line.
 */

import { BackupConfig } from "../config/index.js";
import { ChatLogWriter } from "../store/chatLogWriter.js";
import { ChatEvent, ChatRole, OutgoingRecord, RecordResult } from "../types/index.js";
import { toError } from "../utils/errors.js";
import logger from "../utils/logger.js";

/**
 * Anything the plugin can start and stop alongside itself (the web viewer).
 */
export interface BackupViewer {
  start(): Promise<boolean>;
  stop(): Promise<void>;
}

export interface BackupPluginOptions {
  config: BackupConfig;
  writer: ChatLogWriter;
  viewer?: BackupViewer;
}

export class BackupPlugin {
  private readonly config: BackupConfig;
  private readonly writer: ChatLogWriter;
  private readonly viewer?: BackupViewer;
  private viewerRunning = false;

  constructor(options: BackupPluginOptions) {
    this.config = options.config;
    this.writer = options.writer;
    this.viewer = options.viewer;
  }

  /**
   * Start the web viewer when `enable_webui` is on.
   */
  async start(): Promise<void> {
    logger.info(`📦 Chat history backup loaded, data directory: ${this.writer.dir}`);
    if (!this.config.enableWebui || !this.viewer) return;
    try {
      this.viewerRunning = await this.viewer.start();
    } catch (err) {
      logger.error("❌ Web viewer failed to start:", err);
    }
  }

  /** Back up a message a user sent. */
  onMessage(event: ChatEvent): Promise<RecordResult | null> {
    return this.save(event, "user");
  }

  /** Back up a reply the bot sent. Sender metadata is never stored for the bot. */
  onBotResponse(event: ChatEvent): Promise<RecordResult | null> {
    return this.save({ chatId: event.chatId, kind: event.kind, text: event.text }, "assistant");
  }

  /**
   * Stop the web viewer and wait for pending writes.
   */
  async terminate(): Promise<void> {
    if (this.viewer && this.viewerRunning) {
      try {
        await this.viewer.stop();
      } catch (err) {
        logger.error("❌ Web viewer failed to stop:", err);
      }
      this.viewerRunning = false;
    }
    await this.writer.flush();
    logger.info("📦 Chat history backup unloaded");
  }

  /**
   * @returns The writer's result, or null when the event carries nothing to back up.
   */
  private async save(event: ChatEvent, role: ChatRole): Promise<RecordResult | null> {
    const content = event.text.trim();
    const chatId = event.chatId.trim();
    if (!content || !chatId) {
      logger.debug(`[backupService] Ignored ${role} event without text or chat id`);
      return null;
    }

    const message: OutgoingRecord = { role, content };
    if (event.senderId) message.sender_id = event.senderId;
    if (event.senderName) message.sender_name = event.senderName;

    try {
      return await this.writer.record(chatId, event.kind, message);
    } catch (err) {
      const error = toError(err);
      logger.error(`❌ Failed to handle ${role} message for chat ${chatId}:`, error);
      return { ok: false, reason: "io", error };
    }
  }
}
