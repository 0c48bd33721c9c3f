/**
 * @file src/store/chatLogWriter.ts
 * @description Appends chat messages to per-conversation JSON Lines files and rotates a file
 *   by renaming it with a timestamp suffix once it reaches the configured size.
 *
 * @remarks
 *   Writes for the same conversation are chained on a per-file promise so lines never interleave
 *   and a rotation never races an append. A failed write is logged once and reported through the
 *   returned result; it never throws into the caller and is not retried. A failed rotation leaves
 *   the oversized file in place and is retried after the next successful append.
 */

import fs from "fs/promises";
import { DateTime } from "luxon";
import { join } from "path";
import { BackupConfig } from "../config/index.js";
import { ChatKind, MessageRecord, OutgoingRecord, RecordResult } from "../types/index.js";
import {
  currentFileName,
  isChatKind,
  isChatRole,
  rotatedFileName,
  toRecordLine,
} from "../utils/chatFiles.js";
import { hasErrorCode, toError } from "../utils/errors.js";
import logger from "../utils/logger.js";

const BYTES_PER_MB = 1024 * 1024;
const MAX_ROTATION_ATTEMPTS = 1000;

export const RECORD_TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSZZ";
export const ROTATION_STAMP_FORMAT = "yyyyMMdd_HHmmss";

export interface ChatLogWriterOptions {
  /** Directory holding the backup files; created on first write. */
  dir: string;
  config: BackupConfig;
  /** Clock used for record timestamps and rotation suffixes. */
  now?: () => DateTime;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return false;
    throw err;
  }
}

export class ChatLogWriter {
  readonly dir: string;
  private readonly config: BackupConfig;
  private readonly now: () => DateTime;
  private readonly maxBytes: number;
  private readonly queues = new Map<string, Promise<void>>();

  constructor(options: ChatLogWriterOptions) {
    this.dir = options.dir;
    this.config = options.config;
    this.now = options.now ?? (() => DateTime.now());
    this.maxBytes = options.config.maxFileSizeMb * BYTES_PER_MB;
    logger.debug(
      `[chatLogWriter] Writing to ${this.dir}, rotating at ${this.maxBytes} bytes`
    );
  }

  /**
   * Whether messages of this conversation pass the channel toggles and group lists.
   * Whitelist and blacklist only ever apply to groups.
   */
  isAllowed(chatId: string, kind: ChatKind): boolean {
    if (kind === "private") return this.config.enablePrivate;
    if (!this.config.enableGroup) return false;
    const id = chatId.trim();
    const { groupWhitelist, groupBlacklist } = this.config;
    if (groupWhitelist.length > 0 && !groupWhitelist.includes(id)) return false;
    return !groupBlacklist.includes(id);
  }

  /**
   * Back up one message.
   * @param chatId - Group ID for group chats, the other party's user ID for private chats.
   * @returns Where the record went, or why it was not written.
   */
  async record(chatId: string, kind: ChatKind, message: OutgoingRecord): Promise<RecordResult> {
    if (
      chatId.trim() === "" ||
      !isChatKind(kind) ||
      !isChatRole(message.role) ||
      typeof message.content !== "string" ||
      message.content.trim() === ""
    ) {
      logger.debug(`[chatLogWriter] Rejected invalid message for chat=${chatId} kind=${kind}`);
      return { ok: false, reason: "invalid" };
    }

    if (!this.isAllowed(chatId, kind)) {
      logger.debug(`[chatLogWriter] Skipped filtered chat=${chatId} kind=${kind}`);
      return { ok: false, reason: "filtered" };
    }

    const name = currentFileName(chatId, kind);
    return this.enqueue(name, () => this.append(chatId, kind, name, message));
  }

  /**
   * Resolves once every write queued so far has settled.
   */
  async flush(): Promise<void> {
    await Promise.all(this.queues.values());
  }

  private enqueue(name: string, task: () => Promise<RecordResult>): Promise<RecordResult> {
    const previous = this.queues.get(name) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(name, settled);
    void settled.then(() => {
      if (this.queues.get(name) === settled) this.queues.delete(name);
    });
    return run;
  }

  private buildRecord(message: OutgoingRecord): MessageRecord {
    const record: MessageRecord = {
      timestamp: this.now().toFormat(RECORD_TIMESTAMP_FORMAT),
      role: message.role,
      content: message.content,
    };
    if (this.config.saveSystemInfo) {
      if (message.sender_id) record.sender_id = message.sender_id;
      if (message.sender_name) record.sender_name = message.sender_name;
    }
    return record;
  }

  private async append(
    chatId: string,
    kind: ChatKind,
    name: string,
    message: OutgoingRecord
  ): Promise<RecordResult> {
    const filePath = join(this.dir, name);

    try {
      const line = toRecordLine(this.buildRecord(message));
      await fs.mkdir(this.dir, { recursive: true });
      await fs.appendFile(filePath, line, "utf8");
      logger.debug(`[chatLogWriter] Appended ${line.length} chars to ${name}`);
    } catch (err) {
      const error = toError(err);
      logger.error(`❌ Failed to back up message to ${name}:`, error);
      return { ok: false, reason: "io", error };
    }

    let rotatedTo: string | undefined;
    try {
      const { size } = await fs.stat(filePath);
      if (size >= this.maxBytes) {
        rotatedTo = await this.rotate(chatId, kind, filePath);
      }
    } catch (err) {
      logger.error(`❌ Failed to rotate ${name}; retrying on next write:`, err);
    }

    return rotatedTo ? { ok: true, file: name, rotatedTo } : { ok: true, file: name };
  }

  /**
   * Rename the full file to its timestamped name and start an empty current file.
   * @returns The rotated file name.
   */
  private async rotate(chatId: string, kind: ChatKind, filePath: string): Promise<string> {
    const stamp = this.now().toFormat(ROTATION_STAMP_FORMAT);
    for (let attempt = 0; attempt < MAX_ROTATION_ATTEMPTS; attempt++) {
      const target = rotatedFileName(chatId, kind, stamp, attempt);
      const targetPath = join(this.dir, target);
      if (await pathExists(targetPath)) continue;

      await fs.rename(filePath, targetPath);
      await fs.writeFile(filePath, "", { flag: "a" });
      logger.info(`📁 Backup file rotated: ${target}`);
      return target;
    }
    throw new Error(`No free rotation name for ${filePath} at ${stamp}`);
  }
}
