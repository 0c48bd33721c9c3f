/**
 * @file src/config/paths.ts
 * @description Centralised definitions of all filesystem paths used by the backup bot.
 *
 *   Provides a single source of truth for the backup data directory, the plugin config file,
 *   the web viewer's static assets and the log directories.
 */
import { join } from "path";

/**
 * Base directory under which all persisted bot data lives.
 */
export const DATA_DIR = join(process.cwd(), "data");

/**
 * Default directory holding the per-conversation `.jsonl` backups.
 * Overridable through `BACKUP_DATA_DIR`.
 */
export const BACKUP_DIR = join(DATA_DIR, "plugin_data", "chat-history-backup");

/**
 * Default JSON file with the plugin options (channel toggles, group lists, rotation size, web UI).
 * Overridable through `BACKUP_CONFIG_FILE`.
 */
export const BACKUP_CONFIG_FILE = join(DATA_DIR, "backupConfig.json");

/**
 * Static assets served by the web viewer.
 */
export const PUBLIC_DIR = join(process.cwd(), "public");

/** ─── Logging directories ─────────────────────────────────────────────────── */

/**
 * Root directory for all Winston log files (combined and others).
 */
export const LOGS_DIR = join(process.cwd(), "logs");

/**
 * Sub-directory under LOGS_DIR for error-level logs with daily rotation.
 */
export const LOGS_ERROR_DIR = join(LOGS_DIR, "error");
