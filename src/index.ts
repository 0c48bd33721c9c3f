/**
 * @file src/index.ts
 * @description Entry point: loads configuration, builds the backup writer and plugin, optionally
 *   starts the web viewer, and connects the Discord client whose messages are backed up.
 * @remarks
 *   Handles graceful shutdown on SIGINT/SIGTERM so pending writes finish and the viewer port is released.
 */

import { Client, Events, GatewayIntentBits, Partials } from "discord.js";
import { loadBackupConfig } from "./config/index.js";
import { BACKUP_CONFIG_FILE, BACKUP_DIR } from "./config/paths.js";
import { handleNewMessage } from "./controllers/messageController.js";
import { BackupPlugin } from "./services/backupService.js";
import { ChatLogReader } from "./store/chatLogReader.js";
import { ChatLogWriter } from "./store/chatLogWriter.js";
import { getOptional, getRequired, initialiseEnv } from "./utils/env.js";
import logger from "./utils/logger.js";
import { WebServer } from "./web/webServer.js";

void (async () => {
  // 1️⃣ Initialise environment variables
  initialiseEnv();

  // 2️⃣ Load plugin options
  const config = await loadBackupConfig(getOptional("BACKUP_CONFIG_FILE", BACKUP_CONFIG_FILE));
  const dataDir = getOptional("BACKUP_DATA_DIR", BACKUP_DIR);

  // 3️⃣ Build the writer, the optional viewer and the plugin
  const writer = new ChatLogWriter({ dir: dataDir, config });
  const viewer = config.enableWebui
    ? new WebServer({
        reader: new ChatLogReader(dataDir),
        host: config.webuiHost,
        port: config.webuiPort,
      })
    : undefined;
  const plugin = new BackupPlugin({ config, writer, viewer });
  await plugin.start();

  // 4️⃣ Initialise Discord client
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.DirectMessages,
    ],
    partials: [Partials.Channel],
  });
  const messageHandler = handleNewMessage(plugin, client);

  // 5️⃣ Set up event listeners
  client.once(Events.ClientReady, (ready) => {
    logger.info(`🤖 Logged in as ${ready.user.tag}`);
  });

  client.on(Events.MessageCreate, async (message) => {
    try {
      await messageHandler(message);
    } catch (err) {
      logger.error("🛑 Error in message handler:", err);
    }
  });

  // 6️⃣ Handle unhandled rejections & graceful shutdown
  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled promise rejection:", reason);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`🛑 Shutting down (${signal})...`);
    await plugin.terminate();
    await client.destroy();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  // 7️⃣ Start the bot
  client
    .login(getRequired("BOT_TOKEN"))
    .then(() => logger.info("🚀 Login successful."))
    .catch((err: unknown) => logger.error("❌ Login failed:", err));
})();
