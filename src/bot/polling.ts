// pattern: Imperative Shell
import type { Logger } from "pino";
import type { BotApiClient, BotUpdate } from "../telegram/bot-api";
import type { CommandHandler } from "./commands";

export type PollingOptions = {
  readonly timeoutSeconds?: number;
  readonly retryDelayMs?: number;
};

export type CommandPolling = {
  readonly stop: () => Promise<void>;
};

function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Long-polls the Bot API for commands until stopped. Updates are handled one
 * at a time; a failing handler is logged and the offset still advances.
 */
export function startCommandPolling(
  client: Pick<BotApiClient, "getUpdates">,
  handler: CommandHandler,
  logger: Logger,
  options: PollingOptions = {},
): CommandPolling {
  const timeoutSeconds = options.timeoutSeconds ?? 30;
  const retryDelayMs = options.retryDelayMs ?? 5000;
  const controller = new AbortController();
  let offset = 0;

  async function loop(): Promise<void> {
    while (!controller.signal.aborted) {
      let updates: ReadonlyArray<BotUpdate>;
      try {
        updates = await client.getUpdates(offset, timeoutSeconds, controller.signal);
      } catch (err) {
        if (controller.signal.aborted) return;
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ error: message, retryDelayMs }, "update polling failed, backing off");
        await abortableDelay(retryDelayMs, controller.signal);
        continue;
      }

      for (const update of updates) {
        offset = update.update_id + 1;
        try {
          await handler.handleUpdate(update);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error({ updateId: update.update_id, error: message }, "update handling failed");
        }
      }
    }
  }

  logger.info("command polling started");
  const done = loop().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, "command polling stopped unexpectedly");
  });

  return {
    async stop() {
      controller.abort();
      await done;
      logger.info("command polling stopped");
    },
  };
}
