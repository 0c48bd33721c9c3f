/**
 * @file src/web/webServer.ts
 * @description Read-only web viewer for the chat backups.
 *
 * Provides:
 * - `/` the viewer page from `public/index.html`
 * - `/api/chats` every backup file with its message count and latest message
 * - `/api/chat/:filename` one file's records, newest first, paged by `page` and `size`
 * - `/api/stats` totals across the backup directory
 * - `/health`
 */

import { serve } from "@hono/node-server";
import fs from "fs/promises";
import { Hono } from "hono";
import { logger as requestLogger } from "hono/logger";
import type { Server } from "net";
import { join } from "path";
import { PUBLIC_DIR } from "../config/paths.js";
import { ChatLogReader } from "../store/chatLogReader.js";
import { hasErrorCode, toError } from "../utils/errors.js";
import logger from "../utils/logger.js";

export interface WebServerOptions {
  reader: ChatLogReader;
  host: string;
  port: number;
  /** Directory holding `index.html`; defaults to the project's `public/`. */
  publicDir?: string;
}

export class WebServer {
  readonly app: Hono;
  private readonly reader: ChatLogReader;
  private readonly host: string;
  private readonly port: number;
  private readonly publicDir: string;
  private server: Server | null = null;

  constructor(options: WebServerOptions) {
    this.reader = options.reader;
    this.host = options.host;
    this.port = options.port;
    this.publicDir = options.publicDir ?? PUBLIC_DIR;
    this.app = new Hono();

    // Middleware
    this.app.use("*", requestLogger((line) => logger.debug(`[webServer] ${line}`)));

    // Routes
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/", async (c) => {
      try {
        const html = await fs.readFile(join(this.publicDir, "index.html"), "utf-8");
        return c.html(html);
      } catch (err) {
        if (!hasErrorCode(err, "ENOENT")) {
          logger.error("[webServer] Failed to read viewer page:", err);
        }
        return c.text("Chat history backup viewer", 200);
      }
    });

    this.app.get("/health", (c) => {
      return c.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    this.app.get("/api/chats", async (c) => {
      try {
        return c.json(await this.reader.listChats());
      } catch (err) {
        logger.error("[webServer] Failed to list chats:", err);
        return c.json({ error: toError(err).message }, 500);
      }
    });

    this.app.get("/api/chat/:filename", async (c) => {
      const filename = c.req.param("filename");
      const page = Number(c.req.query("page"));
      const size = Number(c.req.query("size"));
      try {
        const result = await this.reader.readChat(filename, { page, size });
        if (!result) {
          return c.json({ error: "Chat not found" }, 404);
        }
        return c.json(result);
      } catch (err) {
        logger.error(`[webServer] Failed to read ${filename}:`, err);
        return c.json({ error: toError(err).message }, 500);
      }
    });

    this.app.get("/api/stats", async (c) => {
      try {
        return c.json(await this.reader.stats());
      } catch (err) {
        logger.error("[webServer] Failed to compute stats:", err);
        return c.json({ error: toError(err).message }, 500);
      }
    });
  }

  /**
   * Start listening.
   * @returns True once listening; false if the port could not be bound.
   */
  start(): Promise<boolean> {
    if (this.server) return Promise.resolve(true);

    return new Promise<boolean>((resolve) => {
      const server: Server = serve(
        { fetch: this.app.fetch, hostname: this.host, port: this.port },
        (info) => {
          this.server = server;
          logger.info(`📊 Chat history web UI started: http://${this.host}:${info.port}`);
          resolve(true);
        }
      );
      server.once("error", (err) => {
        logger.error("❌ Web UI failed to start:", err);
        resolve(false);
      });
    });
  }

  /**
   * Stop listening; a no-op when not started.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    logger.info("📊 Chat history web UI stopped");
  }
}
