// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { BotApiClient, BotUpdate } from "../telegram/bot-api";
import type { DigestRunner, RunnerResult } from "../scheduler";

export type CommandName = "digest" | "status" | "help" | "start";

export type CommandHandlerDeps = {
  readonly config: AppConfig;
  readonly client: Pick<BotApiClient, "sendMessage">;
  readonly runner: DigestRunner;
  readonly nextRunAt: () => Date | null;
  readonly logger: Logger;
};

export type CommandHandler = {
  readonly handleUpdate: (update: BotUpdate) => Promise<void>;
};

export const APOLOGY_TEXT =
  "❌ Sorry, something went wrong while generating the digest. Please try again later.";

/**
 * Extracts the command from a message text. Accepts `/cmd` and
 * `/cmd@botname`; anything else is not a command.
 */
export function parseCommand(text: string): CommandName | null {
  const match = /^\/([a-z]+)(?:@\w+)?(?:\s|$)/i.exec(text.trim());
  const name = match?.[1]?.toLowerCase();
  switch (name) {
    case "digest":
    case "status":
    case "help":
    case "start":
      return name;
    default:
      return null;
  }
}

export function helpText(config: AppConfig): string {
  return [
    "📰 Channel digest bot",
    "",
    `Every day at ${config.schedule.time} (${config.schedule.timezone}) you get a summary of the last ${config.digest.lookbackHours} hours from ${config.channels.length} channel(s).`,
    "",
    "Commands:",
    "/digest - generate a digest now",
    "/status - show the current settings",
    "/help - show this message",
  ].join("\n");
}

export function statusText(
  config: AppConfig,
  nextRunAt: Date | null,
  running: boolean,
): string {
  const next =
    nextRunAt === null
      ? "⏰ Scheduler is not running"
      : `⏰ Next digest: ${new Intl.DateTimeFormat(config.digest.locale, {
          dateStyle: "medium",
          timeStyle: "short",
          timeZone: config.schedule.timezone,
        }).format(nextRunAt)} (${config.schedule.timezone})`;

  const lines = [
    "📊 Digest status",
    `🤖 Model: ${config.llm.provider}/${config.llm.model}`,
    `📺 Channels: ${config.channels.length}`,
    next,
  ];
  if (running) lines.push("🔄 A digest is being generated right now");
  return lines.join("\n");
}

function describeResult(result: RunnerResult): string {
  switch (result.status) {
    case "delivered":
      return `✅ Digest delivered: ${result.channelCount} channel(s), ${result.messageCount} message(s).`;
    case "partial":
      return `⚠️ Digest partly delivered. Missing: ${result.failedChannels.join(", ")}.`;
    case "failed":
      return "❌ The digest could not be delivered. Details are in the service logs.";
    case "empty":
      return "📭 No new messages in the configured channels for this period.";
    case "busy":
      return "⏳ A digest is already being generated, please wait for it.";
    case "refused":
      return "⛔ Delivery was refused.";
  }
}

/**
 * Creates the handler for bot commands. Only the configured recipient gets a
 * response; everyone else is ignored without a reply.
 */
export function createCommandHandler(deps: CommandHandlerDeps): CommandHandler {
  const { config, client, runner, logger } = deps;

  async function reply(chatId: number, text: string): Promise<void> {
    try {
      await client.sendMessage(chatId, text, { markup: false });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ recipientId: chatId, error: message }, "command reply failed");
    }
  }

  async function runManualDigest(chatId: number, userId: number): Promise<void> {
    await reply(
      chatId,
      `⏳ Generating a digest for the last ${config.digest.lookbackHours} hours. This can take a minute or two.`,
    );
    try {
      const result = await runner.run("manual", { recipientId: userId });
      // a delivered digest speaks for itself
      if (result.status !== "delivered") {
        await reply(chatId, describeResult(result));
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ recipientId: userId, error: message }, "manual digest failed");
      await reply(chatId, APOLOGY_TEXT);
    }
  }

  return {
    async handleUpdate(update) {
      const message = update.message;
      if (message?.text === undefined || message.from === undefined) return;

      const command = parseCommand(message.text);
      if (command === null) return;

      const userId = message.from.id;
      if (userId !== config.digest.recipientId) {
        logger.warn({ userId, command }, "ignoring command from unauthorized user");
        return;
      }

      logger.info({ command }, "command received");
      switch (command) {
        case "digest":
          await runManualDigest(message.chat.id, userId);
          return;
        case "status":
          await reply(message.chat.id, statusText(config, deps.nextRunAt(), runner.isRunning()));
          return;
        case "help":
        case "start":
          await reply(message.chat.id, helpText(config));
          return;
      }
    },
  };
}
