// pattern: Imperative Shell
import type { Logger } from "pino";
import { isDeliveryError } from "../telegram/errors";
import type { BotApiClient } from "../telegram/bot-api";
import type { ChannelBlock } from "./renderer";
import { splitMessage } from "./split";
import type { DeliveryStore } from "./store";

export type DeliveryClient = Pick<BotApiClient, "sendMessage" | "deleteMessage">;

/**
 * Discriminated union result of a batch delivery. `sentMessageIds` lists
 * every message that reached the recipient, failed blocks included.
 */
export type DeliveryOutcome =
  | { readonly status: "delivered"; readonly sentMessageIds: ReadonlyArray<number> }
  | {
      readonly status: "partial" | "failed";
      readonly sentMessageIds: ReadonlyArray<number>;
      readonly failedChannels: ReadonlyArray<string>;
    }
  | { readonly status: "refused" };

export type CleanupOutcome =
  | { readonly status: "cleaned" | "failed"; readonly deleted: number; readonly failed: number }
  | { readonly status: "refused" };

export type SendChannelOptions = {
  /** Trailing message sent after the blocks when at least one succeeded. */
  readonly summaryMessage?: string | null;
  readonly recipientId?: number;
};

export type DigestSenderDeps = {
  readonly client: DeliveryClient;
  readonly store: DeliveryStore;
  readonly authorizedRecipientId: number;
  readonly maxMessageLength: number;
  readonly pacingMs: number;
  readonly logger: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
};

export type DigestSender = {
  readonly sendChannelMessages: (
    blocks: ReadonlyArray<ChannelBlock>,
    options?: SendChannelOptions,
  ) => Promise<DeliveryOutcome>;
  readonly sendDigest: (text: string, recipientId?: number) => Promise<DeliveryOutcome>;
  readonly sendText: (text: string, recipientId?: number) => Promise<boolean>;
  readonly cleanupPrevious: (recipientId?: number) => Promise<CleanupOutcome>;
};

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Creates the delivery side of the digest. Only the configured recipient is
 * ever contacted: any other id is refused before a transport call is made.
 */
export function createDigestSender(deps: DigestSenderDeps): DigestSender {
  const { client, store, logger } = deps;
  const sleep = deps.sleep ?? defaultSleep;

  function isAuthorized(recipientId: number, operation: string): boolean {
    if (recipientId === deps.authorizedRecipientId) return true;
    logger.warn({ recipientId, operation }, "refusing delivery to unauthorized recipient");
    return false;
  }

  async function sendWithFallback(chatId: number, text: string): Promise<number> {
    try {
      return await client.sendMessage(chatId, text, { markup: true });
    } catch (err) {
      if (!isDeliveryError(err, "markup_parse")) throw err;
      logger.warn(
        { recipientId: chatId, error: err.message },
        "markup rejected, resending as plain text",
      );
      return client.sendMessage(chatId, text, { markup: false });
    }
  }

  /** Sends every fragment of `text`, recording ids as they are delivered. */
  async function sendBlock(chatId: number, text: string, sent: Array<number>): Promise<void> {
    for (const fragment of splitMessage(text, deps.maxMessageLength)) {
      sent.push(await sendWithFallback(chatId, fragment));
    }
  }

  function rememberBatch(recipientId: number, sent: ReadonlyArray<number>): void {
    if (sent.length === 0) return;
    try {
      store.save(String(recipientId), sent);
    } catch (err) {
      logger.error(
        { recipientId, messageCount: sent.length, error: errorMessage(err) },
        "failed to record delivered message ids",
      );
    }
  }

  async function deliverBlocks(
    blocks: ReadonlyArray<ChannelBlock>,
    recipientId: number,
    summaryMessage: string | null,
  ): Promise<DeliveryOutcome> {
    const sent: Array<number> = [];
    const failedChannels: Array<string> = [];

    for (const [index, block] of blocks.entries()) {
      try {
        await sendBlock(recipientId, block.text, sent);
        logger.info({ recipientId, channel: block.channelName }, "channel block delivered");
      } catch (err) {
        failedChannels.push(block.channelName);
        logger.error(
          { recipientId, channel: block.channelName, error: errorMessage(err) },
          "channel block delivery failed",
        );
      }
      if (index < blocks.length - 1 && deps.pacingMs > 0) {
        await sleep(deps.pacingMs);
      }
    }

    const succeeded = blocks.length - failedChannels.length;
    if (summaryMessage !== null && succeeded > 0) {
      try {
        await sendBlock(recipientId, summaryMessage, sent);
      } catch (err) {
        logger.error({ recipientId, error: errorMessage(err) }, "statistics message delivery failed");
      }
    }

    rememberBatch(recipientId, sent);

    logger.info(
      { recipientId, blockCount: blocks.length, failedCount: failedChannels.length, messageCount: sent.length },
      "delivery finished",
    );

    if (failedChannels.length === 0) {
      return { status: "delivered", sentMessageIds: sent };
    }
    return {
      status: succeeded > 0 ? "partial" : "failed",
      sentMessageIds: sent,
      failedChannels,
    };
  }

  return {
    async sendChannelMessages(blocks, options = {}) {
      const recipientId = options.recipientId ?? deps.authorizedRecipientId;
      if (!isAuthorized(recipientId, "sendChannelMessages")) return { status: "refused" };
      return deliverBlocks(blocks, recipientId, options.summaryMessage ?? null);
    },

    async sendDigest(text, recipientId = deps.authorizedRecipientId) {
      if (!isAuthorized(recipientId, "sendDigest")) return { status: "refused" };
      return deliverBlocks([{ channelName: "digest", text }], recipientId, null);
    },

    async sendText(text, recipientId = deps.authorizedRecipientId) {
      if (!isAuthorized(recipientId, "sendText")) return false;
      try {
        await sendWithFallback(recipientId, text);
        return true;
      } catch (err) {
        logger.error({ recipientId, error: errorMessage(err) }, "notice delivery failed");
        return false;
      }
    },

    async cleanupPrevious(recipientId = deps.authorizedRecipientId) {
      if (!isAuthorized(recipientId, "cleanupPrevious")) return { status: "refused" };

      const key = String(recipientId);
      const messageIds = store.get(key);
      if (messageIds.length === 0) {
        logger.debug({ recipientId }, "no previous digest to clean up");
        return { status: "cleaned", deleted: 0, failed: 0 };
      }

      let deleted = 0;
      let failed = 0;
      for (const messageId of messageIds) {
        try {
          await client.deleteMessage(recipientId, messageId);
          deleted += 1;
        } catch (err) {
          if (isDeliveryError(err, "not_found")) {
            deleted += 1;
            continue;
          }
          failed += 1;
          logger.warn({ recipientId, messageId, error: errorMessage(err) }, "failed to delete message");
        }
      }

      store.clear(key);
      logger.info({ recipientId, deleted, failed }, "previous digest cleaned up");
      return { status: deleted > 0 ? "cleaned" : "failed", deleted, failed };
    },
  };
}
