import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig, loadSecrets, resolveConfigPath } from "./config";
import type { AppConfig, Secrets } from "./config";
import { createLlmClient } from "./llm/client";
import { createSourceClient } from "./telegram/source-client";
import { createBotApiClient } from "./telegram/bot-api";
import { createDigestSender, createJsonFileStore, runDigestCycle } from "./digest";
import { createDigestRunner, createDigestScheduler } from "./scheduler";
import { createCommandHandler } from "./bot/commands";
import { startCommandPolling } from "./bot/polling";
import { registerShutdownHandlers } from "./lifecycle";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("chat-digest starting");

  let config: AppConfig;
  let secrets: Secrets;
  try {
    config = loadConfig(resolveConfigPath(process.env));
    secrets = loadSecrets(process.env);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    {
      provider: config.llm.provider,
      model: config.llm.model,
      channelCount: config.channels.length,
      mode: config.digest.mode,
    },
    "config loaded",
  );

  const llm = createLlmClient(config.llm);
  const source = createSourceClient(
    { apiId: secrets.apiId, apiHash: secrets.apiHash, session: secrets.session },
    logger,
  );
  const bot = createBotApiClient(secrets.botToken);
  const store = createJsonFileStore(resolve(config.storage.path));

  const sender = createDigestSender({
    client: bot,
    store,
    authorizedRecipientId: config.digest.recipientId,
    maxMessageLength: config.delivery.maxMessageLength,
    pacingMs: config.delivery.pacingMs,
    logger,
  });

  const runner = createDigestRunner(
    (options) => runDigestCycle({ config, source, llm, sender, logger }, options),
    logger,
  );

  const scheduler = createDigestScheduler(config, runner, logger);
  logger.info(
    {
      time: config.schedule.time,
      timezone: config.schedule.timezone,
      nextRunAt: scheduler.nextRunAt()?.toISOString() ?? null,
    },
    "digest scheduler started",
  );

  const handler = createCommandHandler({
    config,
    client: bot,
    runner,
    nextRunAt: scheduler.nextRunAt,
    logger,
  });
  const polling = startCommandPolling(bot, handler, logger);

  registerShutdownHandlers({
    components: [
      { name: "scheduler", stop: scheduler.stop },
      { name: "command-polling", stop: polling.stop },
    ],
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
