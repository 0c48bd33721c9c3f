/**
 * @file src/config/index.ts
 * @description Defines, validates and loads the backup plugin options from a single JSON file:
 *   • which chat kinds are backed up and which groups are allowed or denied
 *   • whether sender metadata is stored
 *   • the size at which a backup file is rotated
 *   • the optional web viewer's address
 *
 *   Every option is checked on its own; a bad value is replaced by its default and reported,
 *   so a broken config never stops the bot from starting.
 */
import fs from "fs/promises";
import { hasErrorCode } from "../utils/errors.js";
import logger from "../utils/logger.js";

// Resolved plugin options, passed explicitly to the writer, plugin and web server.
export interface BackupConfig {
  // Back up direct messages.
  enablePrivate: boolean;
  // Back up group (guild) messages.
  enableGroup: boolean;
  // When non-empty, only these groups are backed up.
  groupWhitelist: readonly string[];
  // Groups never backed up.
  groupBlacklist: readonly string[];
  // Store sender_id / sender_name with each record.
  saveSystemInfo: boolean;
  // Rotate a backup file once it reaches this many MiB.
  maxFileSizeMb: number;
  // Serve the web viewer.
  enableWebui: boolean;
  webuiHost: string;
  webuiPort: number;
}

export interface ResolvedBackupConfig {
  config: BackupConfig;
  // Human-readable problems found while resolving, one per rejected option.
  warnings: string[];
}

export const defaultBackupConfig: BackupConfig = Object.freeze({
  enablePrivate: true,
  enableGroup: true,
  groupWhitelist: Object.freeze([]),
  groupBlacklist: Object.freeze([]),
  saveSystemInfo: true,
  maxFileSizeMb: 50,
  enableWebui: false,
  webuiHost: "0.0.0.0",
  webuiPort: 8866,
});

// On-disk key for each option.
const KEYS = {
  enablePrivate: "enable_private",
  enableGroup: "enable_group",
  groupWhitelist: "group_whitelist",
  groupBlacklist: "group_blacklist",
  saveSystemInfo: "save_system_info",
  maxFileSizeMb: "max_file_size_mb",
  enableWebui: "enable_webui",
  webuiHost: "webui_host",
  webuiPort: "webui_port",
} as const satisfies Record<keyof BackupConfig, string>;

const KNOWN_KEYS = new Set<string>(Object.values(KEYS));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resolve raw (parsed JSON) options into a complete config.
 * Missing options take their default silently; invalid ones take their default with a warning.
 */
export function resolveBackupConfig(raw: unknown): ResolvedBackupConfig {
  const warnings: string[] = [];
  if (raw === undefined || raw === null) {
    return { config: defaultBackupConfig, warnings };
  }
  if (!isRecord(raw)) {
    warnings.push("config root must be a JSON object; using defaults");
    return { config: defaultBackupConfig, warnings };
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      warnings.push(`unknown option "${key}" ignored`);
    }
  }

  const bool = (field: keyof typeof KEYS, fallback: boolean): boolean => {
    const value = raw[KEYS[field]];
    if (value === undefined) return fallback;
    if (typeof value === "boolean") return value;
    warnings.push(`${KEYS[field]} must be true or false; using ${fallback}`);
    return fallback;
  };

  const idList = (field: "groupWhitelist" | "groupBlacklist"): readonly string[] => {
    const value = raw[KEYS[field]];
    if (value === undefined) return defaultBackupConfig[field];
    if (!Array.isArray(value)) {
      warnings.push(`${KEYS[field]} must be a list of group ids; using []`);
      return defaultBackupConfig[field];
    }
    const ids: string[] = [];
    for (const item of value) {
      if (typeof item === "string" && item.trim() !== "") {
        ids.push(item.trim());
      } else if (typeof item === "number" && Number.isSafeInteger(item)) {
        ids.push(String(item));
      } else {
        warnings.push(`${KEYS[field]} entry ${JSON.stringify(item)} is not a group id; skipped`);
      }
    }
    return Object.freeze(ids);
  };

  const maxFileSizeMb = ((): number => {
    const value = raw[KEYS.maxFileSizeMb];
    if (value === undefined) return defaultBackupConfig.maxFileSizeMb;
    if (typeof value === "number" && Number.isFinite(value) && value > 0) return value;
    warnings.push(
      `${KEYS.maxFileSizeMb} must be a positive number; using ${defaultBackupConfig.maxFileSizeMb}`
    );
    return defaultBackupConfig.maxFileSizeMb;
  })();

  const webuiHost = ((): string => {
    const value = raw[KEYS.webuiHost];
    if (value === undefined) return defaultBackupConfig.webuiHost;
    if (typeof value === "string" && value.trim() !== "") return value.trim();
    warnings.push(`${KEYS.webuiHost} must be a non-empty string; using ${defaultBackupConfig.webuiHost}`);
    return defaultBackupConfig.webuiHost;
  })();

  const webuiPort = ((): number => {
    const value = raw[KEYS.webuiPort];
    if (value === undefined) return defaultBackupConfig.webuiPort;
    if (typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 65535) {
      return value;
    }
    warnings.push(
      `${KEYS.webuiPort} must be an integer between 1 and 65535; using ${defaultBackupConfig.webuiPort}`
    );
    return defaultBackupConfig.webuiPort;
  })();

  const config: BackupConfig = Object.freeze({
    enablePrivate: bool("enablePrivate", defaultBackupConfig.enablePrivate),
    enableGroup: bool("enableGroup", defaultBackupConfig.enableGroup),
    groupWhitelist: idList("groupWhitelist"),
    groupBlacklist: idList("groupBlacklist"),
    saveSystemInfo: bool("saveSystemInfo", defaultBackupConfig.saveSystemInfo),
    maxFileSizeMb,
    enableWebui: bool("enableWebui", defaultBackupConfig.enableWebui),
    webuiHost,
    webuiPort,
  });

  return { config, warnings };
}

/**
 * Load the plugin options from disk.
 * Falls back to defaults if the file is missing or malformed; reports every problem once.
 */
export async function loadBackupConfig(file: string): Promise<BackupConfig> {
  logger.debug(`[config] Loading backup configuration from ${file}`);
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(file, "utf-8"));
  } catch (err: unknown) {
    if (hasErrorCode(err, "ENOENT")) {
      logger.warn(`[config] No config file at ${file}; using defaults`);
    } else {
      logger.error(`[config] Failed to read ${file}; using defaults:`, err);
    }
    return defaultBackupConfig;
  }

  const { config, warnings } = resolveBackupConfig(raw);
  for (const warning of warnings) {
    logger.warn(`[config] ${warning}`);
  }
  logger.info("✅ Loaded backup configuration");
  logger.debug(`[config] Resolved config: ${JSON.stringify(config)}`);
  return config;
}
