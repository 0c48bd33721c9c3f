/**
 * @file src/store/chatLogReader.ts
 * @description Read-only access to the backup directory for the web viewer: lists the backed-up
 *   conversations, pages through one file's records newest-first, and totals the directory.
 *
 * @remarks
 *   Files may be appended to while they are read; only complete lines are counted or parsed and
 *   lines that do not decode to a record are skipped.
 */

import fs from "fs/promises";
import { join } from "path";
import {
  BackupStats,
  ChatLogSummary,
  ChatPage,
  MessageRecord,
} from "../types/index.js";
import {
  CHAT_FILE_EXTENSION,
  completeLines,
  isSafeChatFileName,
  parseChatFileName,
  parseRecordLine,
} from "../utils/chatFiles.js";
import { hasErrorCode } from "../utils/errors.js";
import logger from "../utils/logger.js";

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 500;
const PREVIEW_LENGTH = 50;

export interface PageOptions {
  page?: number;
  size?: number;
}

function positiveInt(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isInteger(value) && value >= 1 ? value : fallback;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export class ChatLogReader {
  constructor(readonly dir: string) {}

  /** `.jsonl` file names in the backup directory; empty if it does not exist yet. */
  private async listFiles(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.dir, { withFileTypes: true });
      return entries
        .filter((e) => e.isFile() && e.name.endsWith(CHAT_FILE_EXTENSION))
        .map((e) => e.name)
        .sort();
    } catch (err) {
      if (hasErrorCode(err, "ENOENT")) return [];
      throw err;
    }
  }

  private async readLines(filename: string): Promise<string[]> {
    return completeLines(await fs.readFile(join(this.dir, filename), "utf8"));
  }

  /**
   * Summaries of every backup file, most recently active first.
   */
  async listChats(): Promise<ChatLogSummary[]> {
    const files = await this.listFiles();
    logger.debug(`[chatLogReader] Listing ${files.length} backup file(s)`);

    const chats: ChatLogSummary[] = [];
    for (const filename of files) {
      const parsed = parseChatFileName(filename);
      let lines: string[] = [];
      let sizeBytes = 0;
      try {
        sizeBytes = (await fs.stat(join(this.dir, filename))).size;
        lines = await this.readLines(filename);
      } catch (err) {
        logger.warn(`[chatLogReader] Could not read ${filename}:`, err);
      }

      const last = lines.length > 0 ? parseRecordLine(lines[lines.length - 1]) : null;
      chats.push({
        filename,
        chat_id: parsed?.chatId ?? filename.slice(0, -CHAT_FILE_EXTENSION.length),
        type: parsed?.kind ?? "unknown",
        rotated_at: parsed?.rotatedAt ?? null,
        message_count: lines.length,
        size_kb: round(sizeBytes / 1024, 1),
        last_message: last ? last.content.slice(0, PREVIEW_LENGTH) : "",
        last_time: last?.timestamp ?? "",
      });
    }

    chats.sort((a, b) =>
      a.last_time === b.last_time ? a.filename.localeCompare(b.filename) : a.last_time < b.last_time ? 1 : -1
    );
    return chats;
  }

  /**
   * One page of a backup file, newest record first. Page 1 holds the newest `size` records.
   * @returns null when the name is unsafe or no such file exists.
   */
  async readChat(filename: string, options: PageOptions = {}): Promise<ChatPage | null> {
    if (!isSafeChatFileName(filename)) {
      logger.debug(`[chatLogReader] Refused unsafe file name ${JSON.stringify(filename)}`);
      return null;
    }
    const page = positiveInt(options.page, 1);
    const pageSize = Math.min(positiveInt(options.size, DEFAULT_PAGE_SIZE), MAX_PAGE_SIZE);

    let lines: string[];
    try {
      lines = await this.readLines(filename);
    } catch (err) {
      if (hasErrorCode(err, "ENOENT") || hasErrorCode(err, "EISDIR")) return null;
      throw err;
    }

    const total = lines.length;
    const start = Math.max(0, total - page * pageSize);
    const end = Math.max(0, total - (page - 1) * pageSize);
    const messages: MessageRecord[] = [];
    for (const line of lines.slice(start, end)) {
      const record = parseRecordLine(line);
      if (record) messages.push(record);
    }
    messages.reverse();

    return { messages, total, page, page_size: pageSize };
  }

  /**
   * Totals across the whole backup directory.
   */
  async stats(): Promise<BackupStats> {
    const stats: BackupStats = {
      total_chats: 0,
      total_messages: 0,
      total_size_mb: 0,
      private_chats: 0,
      group_chats: 0,
    };
    let totalBytes = 0;

    for (const filename of await this.listFiles()) {
      stats.total_chats += 1;
      const kind = parseChatFileName(filename)?.kind;
      if (kind === "private") stats.private_chats += 1;
      if (kind === "group") stats.group_chats += 1;
      try {
        totalBytes += (await fs.stat(join(this.dir, filename))).size;
        stats.total_messages += (await this.readLines(filename)).length;
      } catch (err) {
        logger.warn(`[chatLogReader] Could not read ${filename}:`, err);
      }
    }

    stats.total_size_mb = round(totalBytes / (1024 * 1024), 2);
    return stats;
  }
}
