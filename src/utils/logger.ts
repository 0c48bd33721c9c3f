/**
 * @file src/utils/logger.ts
 * @description Configures and exports a Winston logger with console and file transports,
 *   including daily rotation for combined logs and error-specific logs, and provides a static "latest.log" symlink.
 * @remarks
 *   Uses timestamped formatting and error stack inclusion. File transports can be switched off
 *   with `LOG_FILES=false` (the test configuration does so).
 */

import fs from "fs";
import { TransformableInfo } from "logform";
import path from "path";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import { LOGS_DIR, LOGS_ERROR_DIR } from "../config/paths.js";
import { getFlag, getOptional, initialiseEnv } from "./env.js";

initialiseEnv();
const { combine, timestamp, printf, colorize, errors } = winston.format;

const level = getOptional("LOG_LEVEL", "info");
const writeFiles = getFlag("LOG_FILES", true);

/**
 * Custom log format: includes timestamp, uppercase level and message or error stack.
 */
const logFormat = printf((info: TransformableInfo) => {
  const body = typeof info.stack === "string" ? info.stack : String(info.message);
  return `[${String(info.timestamp)}] [${info.level.toUpperCase()}]: ${body}`;
});

/**
 * Shared format pipeline: attaches timestamps, includes error stacks, and applies custom printf.
 */
const commonFormat = combine(
  timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  errors({ stack: true }),
  logFormat
);

/**
 * Console transport with colourised output for readability.
 */
const consoleTransport = new winston.transports.Console({
  format: combine(colorize({ all: true }), commonFormat),
});

/**
 * Daily rotating file transport for error-level logs.
 * Retains 14 days and writes a symlink 'latest.log' to the most recent file.
 */
function createErrorRotateTransport(): DailyRotateFile {
  return new DailyRotateFile({
    level: "error",
    dirname: LOGS_ERROR_DIR,
    filename: "error-%DATE%.log",
    datePattern: "YYYY-MM-DD",
    zippedArchive: true,
    maxFiles: "14d",
    symlinkName: path.join(LOGS_ERROR_DIR, "latest.log"),
  });
}

/**
 * Daily rotating file transport for combined logs at configured level.
 * Retains 30 days and writes a symlink 'latest.log' at logsDir.
 */
function createCombinedRotateTransport(): DailyRotateFile {
  return new DailyRotateFile({
    level,
    dirname: LOGS_DIR,
    filename: "combined-%DATE%.log",
    datePattern: "YYYY-MM-DD",
    zippedArchive: true,
    maxFiles: "30d",
    symlinkName: path.join(LOGS_DIR, "latest.log"),
  });
}

if (writeFiles) {
  fs.mkdirSync(LOGS_ERROR_DIR, { recursive: true });
}

const transports = writeFiles
  ? [consoleTransport, createErrorRotateTransport(), createCombinedRotateTransport()]
  : [consoleTransport];

/**
 * Singleton Winston logger instance used across the application.
 */
const logger = winston.createLogger({
  level,
  format: commonFormat,
  transports,
});

export default logger;
