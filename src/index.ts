// src/index.ts

import * as dotenv from "dotenv";
dotenv.config();

import { Client, Events, GatewayIntentBits } from "discord.js";
import { loadConfig } from "./config/env";
import { DatabaseConfigService } from "./config/configService";
import { SqliteStorageService } from "./storage/service";
import { ThreadOwnershipJanitor } from "./storage/retention";
import { DiscordMessageSource } from "./recovery/discordSource";
import { RecoveredMessage, recoverRecentActivity } from "./recovery/recovery";
import { RunningTask, shutdown } from "./shutdown";
import { formatDuration } from "./utils/duration";
import { logger } from "./utils/logger";

async function start() {
  const config = loadConfig();
  logger.configure({ level: config.logLevel, file: config.logFile });

  logger.info("🚀 Starting knowledge bot storage...");

  // ─── Step 1: Storage ─────────────────────────────────────────
  const storage = new SqliteStorageService(config.database);
  await storage.initialize({ signal: AbortSignal.timeout(60_000) });

  // ─── Step 2: Runtime configuration ──────────────────────────
  const configService = new DatabaseConfigService(storage);
  await configService.initialize();
  if (config.configReloadIntervalMs > 0) {
    configService.startAutoReload(config.configReloadIntervalMs);
  }

  // ─── Step 3: Thread ownership retention ─────────────────────
  const janitor = new ThreadOwnershipJanitor(
    storage.threadOwnerships,
    config.threadOwnershipMaxAgeMs,
  );
  janitor.start();

  // ─── Step 4: Catch up on missed messages ────────────────────
  let discord: Client | null = null;
  let recovery: RunningTask | null = null;

  if (config.discordToken) {
    discord = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
    });
    const client = discord;

    client.once(Events.ClientReady, (ready) => {
      logger.success(`Discord logged in as ${ready.user.tag}`);
      logger.info(
        `🔁 Recovery window: ${formatDuration(config.recoveryWindowMs)}`,
      );

      const controller = new AbortController();
      const done = recoverRecentActivity({
        checkpoints: storage.checkpoints,
        source: new DiscordMessageSource(client),
        windowMs: config.recoveryWindowMs,
        handle: async (message: RecoveredMessage) => {
          // Live message handling is owned by the bot; storage only replays.
          logger.debug(
            `Recovered message ${message.id} from ${message.authorId} in ${message.context.threadId ?? message.context.channelId}`,
          );
        },
        signal: controller.signal,
      }).then(
        () => undefined,
        (error) => {
          if (controller.signal.aborted) {
            logger.info("Message recovery stopped for shutdown");
            return;
          }
          logger.error("Message recovery failed", error);
        },
      );
      recovery = { controller, done };
    });

    await client.login(config.discordToken);
  } else {
    logger.warn("DISCORD_BOT_TOKEN not set, skipping message recovery");
  }

  logger.success("✅ Storage online");

  // ─── Shutdown Handler ────────────────────────────────────────
  const onSignal = () => {
    shutdown({ recovery, janitor, configService, discord, storage })
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error("Shutdown failed:", err);
        process.exit(1);
      });
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

start().catch((err) => {
  logger.error("Fatal error:", err);
  process.exit(1);
});
