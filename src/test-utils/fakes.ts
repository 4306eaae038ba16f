import { vi } from "vitest";
import pino from "pino";
import { appConfigSchema } from "../config/schema";
import type { AppConfig } from "../config";
import type { LlmClient } from "../llm/client";
import type {
  CollectedMessage,
  MediaKind,
  SourceClient,
  SourceMessage,
} from "../pipeline/types";
import { DeliveryError } from "../telegram/errors";
import type { DeliveryClient } from "../digest/sender";

export const TEST_RECIPIENT_ID = 424242;

export function createTestLogger(): pino.Logger {
  return pino({ level: "silent" });
}

/**
 * Builds a valid configuration with two channels. Overrides are applied to
 * the raw document before validation, so defaults still fill in.
 */
export function createTestConfig(
  overrides: {
    readonly digest?: Record<string, unknown>;
    readonly delivery?: Record<string, unknown>;
    readonly channels?: ReadonlyArray<{ id: string; name: string }>;
  } = {},
): AppConfig {
  return appConfigSchema.parse({
    llm: { provider: "openai", model: "test-model" },
    channels: overrides.channels ?? [
      { id: "@tech_channel", name: "Tech News" },
      { id: "-1001234567", name: "Private Group" },
    ],
    schedule: { time: "08:00", timezone: "UTC" },
    digest: { recipientId: TEST_RECIPIENT_ID, ...overrides.digest },
    delivery: { pacingMs: 0, ...overrides.delivery },
    storage: { path: "./data/test-store.json" },
  });
}

export function createTestLlmClient(): LlmClient {
  return {
    model: "test-model",
    modelId: "test-model",
    temperature: 0.7,
    maxOutputTokens: 1000,
    timeoutMs: 30_000,
  };
}

export function createTestMessage(
  overrides: Partial<CollectedMessage> = {},
): CollectedMessage {
  return {
    text: "Hello world",
    senderName: "Alice",
    timestamp: new Date("2025-03-10T09:15:00Z"),
    permalink: "https://t.me/tech_channel/1",
    channelName: "Tech News",
    hasMedia: false,
    mediaKind: null,
    ...overrides,
  };
}

export type FakeSourceMessage = {
  readonly id: number;
  readonly date: Date;
  readonly text?: string;
  readonly mediaKind?: MediaKind | null;
  readonly sender?: string;
  /** Makes the sender lookup reject with this error. */
  readonly senderError?: Error;
};

export type FakeChannel = {
  readonly username?: string | null;
  /** Newest first, as the real transport streams them. */
  readonly messages?: ReadonlyArray<FakeSourceMessage>;
  /** Errors thrown by successive resolve attempts, in order. */
  readonly failures?: ReadonlyArray<Error>;
};

/**
 * In-process source transport keyed by channel id. Calls are recorded on
 * the returned spies.
 */
export function createFakeSourceClient(channels: Record<string, FakeChannel>) {
  const attempts = new Map<string, number>();

  const client = {
    connect: vi.fn(async () => {}),
    disconnect: vi.fn(async () => {}),
    listDialogs: vi.fn(async () => Object.keys(channels).length),
    resolveChannel: vi.fn(async (channelId: string) => {
      const channel = channels[channelId];
      const attempt = attempts.get(channelId) ?? 0;
      attempts.set(channelId, attempt + 1);

      const failure = channel?.failures?.[attempt];
      if (failure) throw failure;
      if (!channel) throw new Error(`unknown channel ${channelId}`);

      const messages: ReadonlyArray<SourceMessage> = (channel.messages ?? []).map(
        (message) => ({
          id: message.id,
          date: message.date,
          text: message.text ?? "",
          mediaKind: message.mediaKind ?? null,
          resolveSenderName: async () => {
            if (message.senderError) throw message.senderError;
            return message.sender ?? "Alice";
          },
        }),
      );

      return {
        id: channelId,
        username: channel.username ?? null,
        async *iterMessages(options: { limit: number; offsetDate: Date }) {
          yield* messages.slice(0, options.limit);
        },
      };
    }),
  } satisfies SourceClient;

  return client;
}

export type FakeDeliveryOptions = {
  /** Fails sendMessage calls (1-based call number) with the given error. */
  readonly sendFailures?: Record<number, DeliveryError>;
  /** Fails deleteMessage for the given message ids. */
  readonly deleteFailures?: Record<number, DeliveryError>;
};

/**
 * Records every delivery call in order. Message ids count up from 100.
 */
export function createFakeDeliveryClient(options: FakeDeliveryOptions = {}) {
  let sendCount = 0;
  let nextId = 100;

  const client = {
    sendMessage: vi.fn(
      async (_chatId: number, _text: string, _options: { markup: boolean }) => {
        sendCount += 1;
        const failure = options.sendFailures?.[sendCount];
        if (failure) throw failure;
        nextId += 1;
        return nextId;
      },
    ),
    deleteMessage: vi.fn(async (_chatId: number, messageId: number) => {
      const failure = options.deleteFailures?.[messageId];
      if (failure) throw failure;
    }),
  } satisfies DeliveryClient;

  return client;
}

export function markupError(): DeliveryError {
  return new DeliveryError(
    "markup_parse",
    "Bad Request: can't parse entities: can't find end of the entity",
    400,
  );
}

export function transportError(): DeliveryError {
  return new DeliveryError("transport", "Bad Gateway", 502);
}

export function notFoundError(): DeliveryError {
  return new DeliveryError("not_found", "Bad Request: message to delete not found", 400);
}
