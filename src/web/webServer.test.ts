import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { runInNewContext } from "vm";
import { PUBLIC_DIR } from "../config/paths.js";
import { ChatLogReader } from "../store/chatLogReader.js";
import { MessageRecord } from "../types/index.js";
import { toRecordLine } from "../utils/chatFiles.js";
import logger from "../utils/logger.js";
import { WebServer } from "./webServer.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

let root: string;
let dataDir: string;
let publicDir: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "chat-backup-web-"));
  dataDir = join(root, "data");
  publicDir = join(root, "public");
  mkdirSync(dataDir);
  mkdirSync(publicDir);
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(root, { recursive: true, force: true });
});

function makeServer(dir = dataDir): WebServer {
  return new WebServer({ reader: new ChatLogReader(dir), host: "127.0.0.1", port: 0, publicDir });
}

function writeChat(filename: string, contents: string[]): void {
  const lines = contents.map(
    (content, i): MessageRecord => ({
      timestamp: `2026-03-01T10:0${i}:00.000+00:00`,
      role: "user",
      content,
    })
  );
  writeFileSync(join(dataDir, filename), lines.map(toRecordLine).join(""));
}

// ── Routes ───────────────────────────────────────────────────────────────────

describe("WebServer routes", () => {
  test("serves the viewer page", async () => {
    writeFileSync(join(publicDir, "index.html"), "<h1>viewer</h1>");

    const res = await makeServer().app.request("/");

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("text/html");
    expect(await res.text()).toBe("<h1>viewer</h1>");
  });

  test("falls back to plain text without a viewer page", async () => {
    const res = await makeServer().app.request("/");

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("Chat history backup viewer");
  });

  test("reports health", async () => {
    const res = await makeServer().app.request("/health");
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({ status: "ok", timestamp: expect.any(String) });
  });

  test("lists chats", async () => {
    writeChat("7_private.jsonl", ["a", "b"]);

    const res = await makeServer().app.request("/api/chats");
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual([
      expect.objectContaining({
        filename: "7_private.jsonl",
        chat_id: "7",
        type: "private",
        message_count: 2,
        last_message: "b",
      }),
    ]);
  });

  test("pages one chat through the query string", async () => {
    writeChat("7_private.jsonl", ["m1", "m2", "m3"]);

    const res = await makeServer().app.request("/api/chat/7_private.jsonl?page=2&size=1");
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({
      messages: [{ timestamp: "2026-03-01T10:01:00.000+00:00", role: "user", content: "m2" }],
      total: 3,
      page: 2,
      page_size: 1,
    });
  });

  test("answers 404 for unknown or unsafe names", async () => {
    const app = makeServer().app;

    const missing = await app.request("/api/chat/missing_private.jsonl");
    const escaping = await app.request("/api/chat/..%2Fsecret.jsonl");

    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Chat not found" });
    expect(escaping.status).toBe(404);
  });

  test("totals the backup directory", async () => {
    writeChat("7_private.jsonl", ["a"]);
    writeChat("9_group.jsonl", ["b", "c"]);

    const res = await makeServer().app.request("/api/stats");
    const body: unknown = await res.json();

    expect(body).toEqual(
      expect.objectContaining({ total_chats: 2, total_messages: 3, private_chats: 1, group_chats: 1 })
    );
  });

  test("answers 500 when the backup directory cannot be read", async () => {
    const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => logger);
    const notADir = join(root, "file");
    writeFileSync(notADir, "");

    const res = await makeServer(notADir).app.request("/api/chats");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: expect.any(String) });
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});

// ── Lifecycle ────────────────────────────────────────────────────────────────

describe("WebServer lifecycle", () => {
  test("stop is a no-op before start", async () => {
    await expect(makeServer().stop()).resolves.toBeUndefined();
  });
});

// ── Viewer page ──────────────────────────────────────────────────────────────

describe("viewer page", () => {
  test("escapes quotes so file names cannot leave their attribute", () => {
    const html = readFileSync(join(PUBLIC_DIR, "index.html"), "utf-8");
    const source = /function escapeHtml\(text\) \{[\s\S]*?\n {4}\}/.exec(html)?.[0];
    expect(source).toBeDefined();

    const escaped: unknown = runInNewContext(`${source}; escapeHtml(input);`, {
      input: `a"b'<c>&.jsonl`,
    });

    expect(escaped).toBe("a&quot;b&#39;&lt;c&gt;&amp;.jsonl");
  });
});
