import { resolve } from "node:path";
import { createLogger } from "./logger";
import {
  loadConfig,
  requireEnv,
  resolveCronExpression,
  scheduledHours,
} from "./config";
import type { AppConfig } from "./config";
import { parseCommand } from "./cli";
import type { Command } from "./cli";
import { createDatabase } from "./db";
import { createCore, createPublishDeps } from "./app";
import { createFeedSource } from "./pipeline/poller";
import { runPublishCycle } from "./pipeline/publisher";
import { clearPublishedState } from "./pipeline/maintenance";
import { createTelegramChannel, createTelegramClient } from "./chat/telegram";
import { createReactionListener } from "./chat/reaction-listener";
import { handleReaction } from "./reactions/handler";
import { createPublishScheduler } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";
import type { Stoppable } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/rss-relay.db";

async function main(): Promise<void> {
  const logger = createLogger();

  let command: Command;
  let config: AppConfig;
  try {
    command = parseCommand(process.argv.slice(2));
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  const { db, close: closeDb } = createDatabase(resolve(DATABASE_URL));
  const core = createCore(db, config, logger);

  if (command.kind === "clear") {
    clearPublishedState(core, logger);
    closeDb();
    return;
  }

  let token: string;
  try {
    token = requireEnv("TELEGRAM_BOT_TOKEN");
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    closeDb();
    process.exit(1);
  }

  logger.info(
    { feed: config.feed.url, chatId: config.telegram.chatId },
    "starting rss relay",
  );

  const call = createTelegramClient({
    token,
    apiBaseUrl: config.telegram.apiBaseUrl,
    requestTimeoutMs: config.telegram.requestTimeoutMs,
    proxyUrl: config.telegram.proxyUrl,
  });
  const channel = createTelegramChannel(call, config.telegram.chatId);
  const source = createFeedSource(config.feed.title, config.feed.url, logger);
  const publishDeps = createPublishDeps(core, config, source, channel);

  const cronExpression = resolveCronExpression(config.schedule);
  if (!config.schedule.cron) {
    for (const hour of scheduledHours(config.schedule)) {
      logger.info({ at: `${String(hour).padStart(2, "0")}:00` }, "bot will run");
    }
  }

  const scheduler = createPublishScheduler(
    { cronExpression, timezone: config.schedule.timezone },
    () => runPublishCycle(publishDeps, logger),
    logger,
  );
  logger.info({ schedule: cronExpression }, "publish scheduler started");

  const services: Array<Stoppable> = [
    { name: "scheduler", stop: scheduler.stop },
  ];

  if (config.publish.reactions) {
    const listener = createReactionListener({
      call,
      onReaction: (event) =>
        handleReaction(event, {
          registry: core.registry,
          reactions: core.reactions,
          channel,
          openButtonLabel: config.telegram.openButtonLabel,
          logger,
        }),
      logger,
      pollTimeoutSeconds: config.telegram.pollTimeoutSeconds,
    });
    listener.start();
    services.push({ name: "reaction-listener", stop: listener.stop });
  } else {
    logger.info("reaction tracking disabled");
  }

  registerShutdownHandlers({ services, closeDb, logger });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
