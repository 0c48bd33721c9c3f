/**
 * @file src/utils/chatFiles.ts
 * @description Naming and line codec for the per-conversation backup files.
 *
 *   current: `{chatId}_{private|group}.jsonl`
 *   rotated: `{chatId}_{private|group}_{YYYYMMDD_HHMMSS}[_{n}].jsonl`
 *
 *   Reads only ever consume complete, newline-terminated lines so a file that is being
 *   appended to can be read safely.
 */

import { ChatFileName, ChatKind, ChatRole, MessageRecord } from "../types/index.js";

export const CHAT_FILE_EXTENSION = ".jsonl";

const CHAT_FILE_PATTERN =
  /^(?<chatId>.+)_(?<kind>private|group)(?:_(?<stamp>\d{8}_\d{6})(?:_\d+)?)?\.jsonl$/;

export function isChatKind(value: unknown): value is ChatKind {
  return value === "private" || value === "group";
}

export function isChatRole(value: unknown): value is ChatRole {
  return value === "user" || value === "assistant";
}

/**
 * Make a conversation key safe for use inside a file name.
 * Anything outside `[A-Za-z0-9_-]` becomes "-".
 */
export function sanitizeChatId(chatId: string): string {
  return chatId.trim().replace(/[^A-Za-z0-9_-]/g, "-");
}

/** Name of the file currently being appended to. */
export function currentFileName(chatId: string, kind: ChatKind): string {
  return `${sanitizeChatId(chatId)}_${kind}${CHAT_FILE_EXTENSION}`;
}

/**
 * Name a full file is renamed to.
 * @param stamp - `YYYYMMDD_HHMMSS` time of the rotation.
 * @param attempt - Collision counter; 0 for the plain name.
 */
export function rotatedFileName(
  chatId: string,
  kind: ChatKind,
  stamp: string,
  attempt = 0
): string {
  const counter = attempt > 0 ? `_${attempt}` : "";
  return `${sanitizeChatId(chatId)}_${kind}_${stamp}${counter}${CHAT_FILE_EXTENSION}`;
}

/**
 * Split a backup file name into its parts; null if it is not one of ours.
 */
export function parseChatFileName(filename: string): ChatFileName | null {
  const groups = CHAT_FILE_PATTERN.exec(filename)?.groups;
  if (!groups || !isChatKind(groups.kind)) return null;
  return groups.stamp
    ? { chatId: groups.chatId, kind: groups.kind, rotatedAt: groups.stamp }
    : { chatId: groups.chatId, kind: groups.kind };
}

/**
 * True for a bare `.jsonl` file name with no directory part, i.e. something that can only
 * resolve to a file directly inside the backup directory.
 */
export function isSafeChatFileName(filename: string): boolean {
  return (
    filename.endsWith(CHAT_FILE_EXTENSION) &&
    filename.length > CHAT_FILE_EXTENSION.length &&
    !filename.startsWith(".") &&
    !/[\\/\0]/.test(filename)
  );
}

/** Serialise a record as one JSON Lines entry, newline included. */
export function toRecordLine(record: MessageRecord): string {
  return `${JSON.stringify(record)}\n`;
}

/**
 * Complete lines of a JSON Lines file. A trailing fragment with no newline (a write in progress)
 * and blank lines are dropped.
 */
export function completeLines(raw: string): string[] {
  const end = raw.lastIndexOf("\n");
  if (end === -1) return [];
  return raw
    .slice(0, end)
    .split("\n")
    .filter((line) => line.trim() !== "");
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Parse one line back into a record; null if it is not valid JSON or lacks a required field.
 */
export function parseRecordLine(line: string): MessageRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) return null;

  const timestamp = "timestamp" in parsed ? parsed.timestamp : undefined;
  const role = "role" in parsed ? parsed.role : undefined;
  const content = "content" in parsed ? parsed.content : undefined;
  if (typeof timestamp !== "string" || !isChatRole(role) || typeof content !== "string") {
    return null;
  }

  const record: MessageRecord = { timestamp, role, content };
  const senderId = optionalString("sender_id" in parsed ? parsed.sender_id : undefined);
  const senderName = optionalString("sender_name" in parsed ? parsed.sender_name : undefined);
  if (senderId) record.sender_id = senderId;
  if (senderName) record.sender_name = senderName;
  return record;
}
