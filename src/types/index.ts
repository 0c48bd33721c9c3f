/**
 * @file src/types/index.ts
 * @description Central TypeScript type definitions for backed-up chat messages, write results,
 *   and the read models served to the web viewer.
 */

/**
 * Kind of conversation a message belongs to; also the middle part of the backup file name.
 */
export type ChatKind = "private" | "group";

/**
 * Role of a chat message within a conversation.
 */
export type ChatRole = "user" | "assistant";

/**
 * One line of a backup file. Field names are the on-disk JSON keys.
 */
export interface MessageRecord {
  /** Local ISO-8601 time the record was written, with offset. */
  timestamp: string;
  role: ChatRole;
  content: string;
  /** Platform user ID of the sender; only kept when `save_system_info` is on. */
  sender_id?: string;
  /** Display name of the sender; only kept when `save_system_info` is on. */
  sender_name?: string;
}

/**
 * Message handed to the writer; the writer stamps the time.
 */
export type OutgoingRecord = Omit<MessageRecord, "timestamp">;

/**
 * Platform-neutral view of a chat message as seen by the backup plugin.
 */
export interface ChatEvent {
  /** Group ID for group chats, the other party's user ID for private chats. */
  chatId: string;
  kind: ChatKind;
  text: string;
  senderId?: string;
  senderName?: string;
}

/**
 * Why a record was not written.
 * - `invalid`: empty key or content, or an unknown kind or role
 * - `filtered`: rejected by the channel toggles or group lists
 * - `io`: the filesystem refused the append
 */
export type RecordFailureReason = "invalid" | "filtered" | "io";

export type RecordResult =
  | {
      ok: true;
      /** File name the record was appended to. */
      file: string;
      /** Name the file was rotated to, when this append crossed the size threshold. */
      rotatedTo?: string;
    }
  | {
      ok: false;
      reason: RecordFailureReason;
      error?: Error;
    };

/**
 * Parsed form of a backup file name.
 */
export interface ChatFileName {
  chatId: string;
  kind: ChatKind;
  /** `YYYYMMDD_HHMMSS` suffix of a rotated file; absent for the current file. */
  rotatedAt?: string;
}

/** Row of `/api/chats`. */
export interface ChatLogSummary {
  filename: string;
  chat_id: string;
  type: ChatKind | "unknown";
  rotated_at: string | null;
  message_count: number;
  size_kb: number;
  last_message: string;
  last_time: string;
}

/** Body of `/api/chat/:filename`. */
export interface ChatPage {
  messages: MessageRecord[];
  total: number;
  page: number;
  page_size: number;
}

/** Body of `/api/stats`. */
export interface BackupStats {
  total_chats: number;
  total_messages: number;
  total_size_mb: number;
  private_chats: number;
  group_chats: number;
}
