// pattern: Imperative Shell
import type { Logger } from "pino";
import type { ChannelConfig } from "../config";
import {
  ChannelInaccessibleError,
  EntityNotFoundError,
  RateLimitError,
} from "../telegram/errors";
import type {
  CollectedMessage,
  MediaKind,
  MessagesByChannel,
  SourceChannel,
  SourceClient,
  SourceMessage,
} from "./types";

export type CollectOptions = {
  readonly hours: number;
  readonly maxMessagesPerChannel: number;
  readonly now?: Date;
  readonly sleep?: (ms: number) => Promise<void>;
};

const UNKNOWN_SENDER = "Unknown";

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Maps a transport media class name (and the document MIME type, when there
 * is one) to the label shown in place of a missing text body.
 */
export function classifyMedia(
  className: string,
  mimeType: string | null,
  isVoice = false,
): MediaKind {
  if (isVoice) return "Voice message";
  if (className.includes("Photo")) return "Photo";
  if (className.includes("Document") || className.includes("Video")) {
    if (mimeType === null) {
      return className.includes("Video") ? "Video" : "Document";
    }
    if (mimeType.startsWith("video/")) return "Video";
    if (mimeType.startsWith("audio/")) return "Audio";
    return "Document";
  }
  if (className.includes("Voice") || className.includes("Audio")) {
    return "Voice message";
  }
  if (className.includes("Poll")) return "Poll";
  if (
    className.includes("Geo") ||
    className.includes("Venue") ||
    className.includes("Location")
  ) {
    return "Location";
  }
  return "Media";
}

/**
 * Public channels link by username; private ones through the internal
 * `t.me/c/` form, which drops the `-100` supergroup prefix.
 */
export function buildPermalink(
  channel: Pick<SourceChannel, "id" | "username">,
  messageId: number,
): string {
  if (channel.username) {
    return `https://t.me/${channel.username}/${messageId}`;
  }
  const internalId = channel.id.replace(/^-100/, "").replace(/^-/, "");
  return `https://t.me/c/${internalId}/${messageId}`;
}

async function senderNameOf(
  message: SourceMessage,
  channel: ChannelConfig,
  logger: Logger,
): Promise<string> {
  try {
    return await message.resolveSenderName();
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    logger.debug(
      { channel: channel.name, messageId: message.id, error },
      "sender lookup failed, using placeholder",
    );
    return UNKNOWN_SENDER;
  }
}

async function fetchChannel(
  client: SourceClient,
  channel: ChannelConfig,
  since: Date,
  options: CollectOptions & { readonly now: Date },
  logger: Logger,
): Promise<Array<CollectedMessage>> {
  const source = await client.resolveChannel(channel.id);
  const collected: Array<CollectedMessage> = [];

  for await (const message of source.iterMessages({
    limit: options.maxMessagesPerChannel,
    offsetDate: options.now,
  })) {
    if (message.date < since) break;

    const body =
      message.text.trim().length > 0
        ? message.text
        : message.mediaKind !== null
          ? `[${message.mediaKind}]`
          : null;
    if (body === null) continue;

    collected.push({
      text: body,
      senderName: await senderNameOf(message, channel, logger),
      timestamp: message.date,
      permalink: buildPermalink(source, message.id),
      channelName: channel.name,
      hasMedia: message.mediaKind !== null,
      mediaKind: message.mediaKind,
    });
  }

  // the transport streams newest first
  return collected.reverse();
}

function logChannelFailure(
  channel: ChannelConfig,
  err: unknown,
  logger: Logger,
): void {
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof ChannelInaccessibleError) {
    logger.warn(
      { channel: channel.name, error: message },
      "channel is private or not accessible, skipping",
    );
  } else if (err instanceof EntityNotFoundError) {
    logger.error(
      { channel: channel.name, channelId: channel.id, error: message },
      "channel not found, check the id or join the channel with the source account",
    );
  } else {
    logger.error(
      { channel: channel.name, error: message },
      "failed to collect channel messages",
    );
  }
}

async function collectChannel(
  client: SourceClient,
  channel: ChannelConfig,
  since: Date,
  options: CollectOptions & { readonly now: Date },
  logger: Logger,
): Promise<ReadonlyArray<CollectedMessage>> {
  try {
    return await fetchChannel(client, channel, since, options, logger);
  } catch (err) {
    if (!(err instanceof RateLimitError)) {
      logChannelFailure(channel, err, logger);
      return [];
    }

    logger.warn(
      { channel: channel.name, seconds: err.seconds },
      "rate limited, waiting before a single retry",
    );
    await (options.sleep ?? defaultSleep)(err.seconds * 1000);

    try {
      return await fetchChannel(client, channel, since, options, logger);
    } catch (retryErr) {
      logChannelFailure(channel, retryErr, logger);
      return [];
    }
  }
}

/**
 * Collects the messages posted in the last `hours` to every configured
 * channel, one channel at a time. A failing channel yields an empty list and
 * never aborts the run; only a failure to connect propagates.
 *
 * The result keeps configuration order and lists each channel's messages
 * oldest first.
 */
export async function collectMessages(
  client: SourceClient,
  channels: ReadonlyArray<ChannelConfig>,
  options: CollectOptions,
  logger: Logger,
): Promise<MessagesByChannel> {
  const now = options.now ?? new Date();
  const since = new Date(now.getTime() - options.hours * 60 * 60 * 1000);

  await client.connect();
  try {
    try {
      const dialogCount = await client.listDialogs();
      logger.debug({ dialogCount }, "dialog cache warmed");
    } catch (err) {
      logger.warn(
        { error: err instanceof Error ? err.message : String(err) },
        "failed to warm dialog cache, continuing",
      );
    }

    const result = new Map<string, ReadonlyArray<CollectedMessage>>();
    for (const channel of channels) {
      const messages = await collectChannel(
        client,
        channel,
        since,
        { ...options, now },
        logger,
      );
      logger.info(
        { channel: channel.name, messageCount: messages.length },
        "channel collected",
      );
      result.set(channel.name, messages);
    }

    const totalMessages = [...result.values()].reduce(
      (sum, messages) => sum + messages.length,
      0,
    );
    logger.info(
      { channelCount: channels.length, totalMessages, hours: options.hours },
      "message collection complete",
    );
    return result;
  } finally {
    try {
      await client.disconnect();
    } catch (err) {
      logger.warn(
        { error: err instanceof Error ? err.message : String(err) },
        "failed to disconnect source session",
      );
    }
  }
}

export function countMessages(messagesByChannel: MessagesByChannel): number {
  let total = 0;
  for (const messages of messagesByChannel.values()) total += messages.length;
  return total;
}
