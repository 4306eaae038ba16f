// pattern: Imperative Shell
import { Api, TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions";
import { FloodWaitError, RPCError } from "telegram/errors";
import bigInt from "big-integer";
import type { Logger } from "pino";
import { classifyMedia } from "../pipeline/collector";
import type {
  MediaKind,
  SourceChannel,
  SourceClient,
  SourceMessage,
} from "../pipeline/types";
import {
  ChannelInaccessibleError,
  EntityNotFoundError,
  RateLimitError,
} from "./errors";

export type SourceCredentials = {
  readonly apiId: number;
  readonly apiHash: string;
  readonly session: string;
};

const INACCESSIBLE_ERRORS = new Set([
  "CHANNEL_PRIVATE",
  "CHANNEL_INVALID",
  "CHAT_FORBIDDEN",
  "CHANNEL_PUBLIC_GROUP_NA",
]);

const NOT_FOUND_PATTERN =
  /cannot find any entity|could not find the input entity|no user has .* as username|USERNAME_NOT_OCCUPIED|USERNAME_INVALID/i;

/**
 * Converts library errors into the collector's typed signals. Anything not
 * recognised is returned unchanged.
 */
export function translateSourceError(channelId: string, err: unknown): unknown {
  if (err instanceof FloodWaitError) {
    return new RateLimitError(err.seconds);
  }
  if (err instanceof RPCError && INACCESSIBLE_ERRORS.has(err.errorMessage)) {
    return new ChannelInaccessibleError(channelId, err.errorMessage);
  }
  if (err instanceof Error && NOT_FOUND_PATTERN.test(err.message)) {
    return new EntityNotFoundError(channelId, err.message);
  }
  return err;
}

function mediaKindOf(media: Api.TypeMessageMedia | undefined): MediaKind | null {
  if (media === undefined) return null;

  let mimeType: string | null = null;
  let isVoice = false;
  if (media instanceof Api.MessageMediaDocument && media.document instanceof Api.Document) {
    mimeType = media.document.mimeType;
    isVoice = media.document.attributes.some(
      (attr) => attr instanceof Api.DocumentAttributeAudio && attr.voice === true,
    );
  }
  return classifyMedia(media.className, mimeType, isVoice);
}

function senderNameOf(sender: unknown): string {
  if (sender instanceof Api.User) {
    const fullName = [sender.firstName, sender.lastName]
      .filter((part): part is string => typeof part === "string" && part.length > 0)
      .join(" ");
    if (fullName) return fullName;
    if (sender.username) return `@${sender.username}`;
  }
  if ((sender instanceof Api.Channel || sender instanceof Api.Chat) && sender.title) {
    return sender.title;
  }
  return "Unknown";
}

/** Numeric ids need a big integer; anything else is passed as a username. */
function toEntityTarget(channelId: string): string | bigInt.BigInteger {
  return /^-?\d+$/.test(channelId) ? bigInt(channelId) : channelId;
}

function toSourceMessage(message: Api.Message): SourceMessage {
  return {
    id: message.id,
    date: new Date(message.date * 1000),
    text: message.message ?? "",
    mediaKind: mediaKindOf(message.media),
    resolveSenderName: async () => senderNameOf(await message.getSender()),
  };
}

/**
 * Creates the MTProto user-session client used to read channels. A fresh
 * library client is built on every `connect()` and destroyed on
 * `disconnect()`, so each run owns its own connection.
 *
 * Flood waits are never slept through by the library; they surface as
 * `RateLimitError` and the collector decides how to wait.
 */
export function createSourceClient(
  credentials: SourceCredentials,
  logger: Logger,
): SourceClient {
  let client: TelegramClient | null = null;

  function requireClient(): TelegramClient {
    if (client === null) {
      throw new Error("source client is not connected");
    }
    return client;
  }

  return {
    async connect() {
      const next = new TelegramClient(
        new StringSession(credentials.session),
        credentials.apiId,
        credentials.apiHash,
        { connectionRetries: 5, floodSleepThreshold: 0 },
      );
      await next.connect();
      if (!(await next.checkAuthorization())) {
        await next.destroy();
        throw new Error(
          "source session is not authorized, run `npm run create-session` to create one",
        );
      }
      client = next;
      logger.debug("source session connected");
    },

    async disconnect() {
      const current = client;
      client = null;
      if (current !== null) {
        await current.destroy();
        logger.debug("source session closed");
      }
    },

    async listDialogs() {
      const dialogs = await requireClient().getDialogs({});
      return dialogs.length;
    },

    async resolveChannel(channelId: string): Promise<SourceChannel> {
      const tg = requireClient();
      const { entity, peer } = await tg
        .getEntity(toEntityTarget(channelId))
        .then(async (resolved) => ({
          entity: resolved,
          peer: await tg.getInputEntity(resolved),
        }))
        .catch((err: unknown) => {
          throw translateSourceError(channelId, err);
        });

      const username =
        "username" in entity && typeof entity.username === "string"
          ? entity.username
          : null;

      return {
        id: entity.id.toString(),
        username,
        async *iterMessages({ limit, offsetDate }) {
          try {
            for await (const message of tg.iterMessages(peer, {
              limit,
              offsetDate: Math.floor(offsetDate.getTime() / 1000),
            })) {
              yield toSourceMessage(message);
            }
          } catch (err) {
            throw translateSourceError(channelId, err);
          }
        },
      };
    },
  };
}
