import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { DateTime } from "luxon";
import { tmpdir } from "os";
import { join } from "path";
import { BackupConfig, defaultBackupConfig } from "../config/index.js";
import { ChatLogWriter, RECORD_TIMESTAMP_FORMAT } from "../store/chatLogWriter.js";
import { parseRecordLine } from "../utils/chatFiles.js";
import logger from "../utils/logger.js";
import { BackupPlugin, BackupViewer } from "./backupService.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "chat-backup-plugin-"));
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

const now = (): DateTime => DateTime.fromISO("2026-03-01T12:00:00.000");
const stamp = now().toFormat(RECORD_TIMESTAMP_FORMAT);

function makePlugin(
  overrides: Partial<BackupConfig> = {},
  viewer?: BackupViewer
): BackupPlugin {
  const config: BackupConfig = { ...defaultBackupConfig, ...overrides };
  const writer = new ChatLogWriter({ dir, config, now });
  return new BackupPlugin({ config, writer, viewer });
}

function fakeViewer(started = true) {
  return {
    start: vi.fn(async () => started),
    stop: vi.fn(async () => undefined),
  };
}

function readContents(filename: string): unknown[] {
  return readFileSync(join(dir, filename), "utf-8")
    .split("\n")
    .filter((line) => line !== "")
    .map(parseRecordLine);
}

// ── Messages ─────────────────────────────────────────────────────────────────

describe("BackupPlugin messages", () => {
  test("backs up user messages with sender details", async () => {
    const plugin = makePlugin();

    const result = await plugin.onMessage({
      chatId: "7",
      kind: "private",
      text: "  hello  ",
      senderId: "7",
      senderName: "Ann",
    });

    expect(result).toEqual({ ok: true, file: "7_private.jsonl" });
    expect(readContents("7_private.jsonl")).toEqual([
      {
        timestamp: stamp,
        role: "user",
        content: "hello",
        sender_id: "7",
        sender_name: "Ann",
      },
    ]);
  });

  test("backs up bot replies without sender details", async () => {
    const plugin = makePlugin();

    await plugin.onBotResponse({
      chatId: "55",
      kind: "group",
      text: "reply",
      senderId: "999",
      senderName: "Bot",
    });

    expect(readContents("55_group.jsonl")).toEqual([
      { timestamp: stamp, role: "assistant", content: "reply" },
    ]);
  });

  test("ignores events without text or chat id", async () => {
    const plugin = makePlugin();

    expect(await plugin.onMessage({ chatId: "7", kind: "private", text: "   " })).toBeNull();
    expect(await plugin.onMessage({ chatId: " ", kind: "private", text: "hi" })).toBeNull();
    expect(existsSync(join(dir, "7_private.jsonl"))).toBe(false);
  });

  test("passes filtering through from the writer", async () => {
    const plugin = makePlugin({ groupBlacklist: ["55"] });

    const result = await plugin.onMessage({ chatId: "55", kind: "group", text: "hi" });

    expect(result).toEqual({ ok: false, reason: "filtered" });
    expect(existsSync(join(dir, "55_group.jsonl"))).toBe(false);
  });
});

// ── Viewer lifecycle ─────────────────────────────────────────────────────────

describe("BackupPlugin lifecycle", () => {
  test("leaves the viewer alone when the web UI is disabled", async () => {
    const viewer = fakeViewer();
    const plugin = makePlugin({ enableWebui: false }, viewer);

    await plugin.start();
    await plugin.terminate();

    expect(viewer.start).not.toHaveBeenCalled();
    expect(viewer.stop).not.toHaveBeenCalled();
  });

  test("starts and stops the viewer when the web UI is enabled", async () => {
    const viewer = fakeViewer();
    const plugin = makePlugin({ enableWebui: true }, viewer);

    await plugin.start();
    await plugin.terminate();
    await plugin.terminate();

    expect(viewer.start).toHaveBeenCalledTimes(1);
    expect(viewer.stop).toHaveBeenCalledTimes(1);
  });

  test("does not stop a viewer that failed to listen", async () => {
    const viewer = fakeViewer(false);
    const plugin = makePlugin({ enableWebui: true }, viewer);

    await plugin.start();
    await plugin.terminate();

    expect(viewer.stop).not.toHaveBeenCalled();
  });

  test("logs a viewer that throws on start", async () => {
    const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => logger);
    const viewer = fakeViewer();
    viewer.start.mockRejectedValueOnce(new Error("boom"));
    const plugin = makePlugin({ enableWebui: true }, viewer);

    await expect(plugin.start()).resolves.toBeUndefined();

    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  test("waits for pending writes on terminate", async () => {
    const plugin = makePlugin();

    const pending = plugin.onMessage({ chatId: "7", kind: "private", text: "last words" });
    await plugin.terminate();

    expect(readContents("7_private.jsonl")).toHaveLength(1);
    await pending;
  });
});
