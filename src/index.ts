import "dotenv/config";
import { Telegraf } from "telegraf";

import { loadConfig } from "./config.js";
import { ConversationService, type Outbound } from "./conversation.js";
import { registerHandlers, TelegramOutbound } from "./bot.js";
import { HttpListingsClient } from "./listings/client.js";
import { MockListingsClient } from "./listings/mock.js";
import type { ListingsClient } from "./listings/types.js";
import { KeyedLock } from "./lock.js";
import { logger } from "./logger.js";
import { LookupStore } from "./lookups.js";
import { createHttpServer } from "./server.js";
import { SilenceMonitor } from "./silence.js";
import { FileConfigSource } from "./sources/file.js";
import { HttpConfigSource } from "./sources/http.js";
import type { ConfigSource } from "./sources/types.js";
import { MemoryConversationStore, MemorySessionStore } from "./store/memory.js";
import { createSql, NeonConversationStore, NeonSessionStore } from "./store/neon.js";
import type { ConversationStore, SessionStore } from "./store/types.js";

async function main() {
  const config = loadConfig();

  let source: ConfigSource;
  if (config.CONFIG_SOURCE === "http") {
    if (!config.CONFIG_BASE_URL) {
      throw new Error("CONFIG_BASE_URL is required when CONFIG_SOURCE=http");
    }
    source = new HttpConfigSource({ baseUrl: config.CONFIG_BASE_URL, ttlMs: config.CONFIG_CACHE_TTL_SEC * 1000 });
  } else {
    source = new FileConfigSource(config.CONFIG_DIR);
  }
  const lookups = new LookupStore(source, logger.child({ component: "lookups" }));
  const loaded = await lookups.reload();
  if (!loaded.ok) {
    logger.warn({ err_message: loaded.error }, "starting with empty lookup tables");
  }

  let store: ConversationStore;
  let sessions: SessionStore;
  if (config.DATABASE_URL) {
    const sql = createSql(config.DATABASE_URL);
    store = new NeonConversationStore(sql);
    sessions = new NeonSessionStore(sql);
  } else {
    logger.warn("DATABASE_URL is not set, conversations are kept in memory");
    store = new MemoryConversationStore();
    sessions = new MemorySessionStore();
  }

  const listingsLogger = logger.child({ component: "listings" });
  const listings: ListingsClient =
    config.LISTINGS_PROVIDER === "mock"
      ? new MockListingsClient(config.LISTINGS_FIXTURE, config.LISTINGS_MEDIA_BASE, listingsLogger)
      : new HttpListingsClient({
          url: config.LISTINGS_API_URL,
          apiKey: config.LISTINGS_API_KEY,
          timeoutMs: config.LISTINGS_TIMEOUT_MS,
          mediaBase: config.LISTINGS_MEDIA_BASE,
          logger: listingsLogger
        });

  if (!config.TELEGRAM_BOT_TOKEN) {
    throw new Error("TELEGRAM_BOT_TOKEN is required");
  }
  const bot = new Telegraf(config.TELEGRAM_BOT_TOKEN);
  const outbound: Outbound = new TelegramOutbound(bot.telegram, lookups, logger.child({ component: "bot" }));
  const locks = new KeyedLock();

  const service = new ConversationService({
    store,
    sessions,
    listings,
    lookups,
    outbound,
    locks,
    logger,
    pageSize: config.LISTINGS_LIMIT
  });
  registerHandlers(bot, { service, lookups, logger: logger.child({ component: "bot" }) });

  const monitor = new SilenceMonitor({
    sessions,
    store,
    outbound,
    lookups,
    locks,
    logger,
    thresholdMs: config.SILENCE_THRESHOLD_SEC * 1000,
    intervalMs: config.SILENCE_CHECK_INTERVAL_SEC * 1000
  });

  const webhookMode = Boolean(config.TELEGRAM_WEBHOOK_URL);
  const app = createHttpServer(logger, {
    lookups,
    adminApiKey: config.ADMIN_API_KEY,
    bot: webhookMode ? bot : undefined,
    webhookPath: config.TELEGRAM_WEBHOOK_PATH
  });

  await app.listen({ port: config.PORT, host: config.HOST });
  logger.info({ host: config.HOST, port: config.PORT }, "realtor-intake-bot started");

  if (config.TELEGRAM_WEBHOOK_URL) {
    const url = `${config.TELEGRAM_WEBHOOK_URL.replace(/\/+$/, "")}${config.TELEGRAM_WEBHOOK_PATH}`;
    await bot.telegram.setWebhook(url);
    logger.info({ url }, "[BOT] webhook set");
  } else {
    bot.launch().catch((err: unknown) => {
      logger.error({ err }, "[BOT] polling stopped with an error");
      process.exit(1);
    });
    logger.info("[BOT] long polling started");
  }

  monitor.start();

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    monitor.stop();
    if (!webhookMode) {
      bot.stop(signal);
    }
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "failed to close http server");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.error({ err: error }, "failed to start realtor-intake-bot");
  process.exit(1);
});
