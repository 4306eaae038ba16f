// pattern: Imperative Shell
import { z } from "zod";
import { DeliveryError } from "./errors";
import type { DeliveryErrorKind } from "./errors";

const DEFAULT_BASE_URL = "https://api.telegram.org";
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const apiResponseSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), result: z.unknown() }),
  z.object({
    ok: z.literal(false),
    error_code: z.number().int(),
    description: z.string().default(""),
  }),
]);

const sentMessageSchema = z.object({ message_id: z.number().int() });

const updateSchema = z.object({
  update_id: z.number().int(),
  message: z
    .object({
      message_id: z.number().int(),
      from: z.object({ id: z.number().int() }).optional(),
      chat: z.object({ id: z.number().int() }),
      text: z.string().optional(),
    })
    .optional(),
});

export type BotUpdate = z.infer<typeof updateSchema>;

export type SendMessageOptions = {
  /** Send with Markdown parse mode; plain text otherwise. */
  readonly markup: boolean;
};

export type BotApiClient = {
  readonly sendMessage: (
    chatId: number,
    text: string,
    options: SendMessageOptions,
  ) => Promise<number>;
  readonly deleteMessage: (chatId: number, messageId: number) => Promise<void>;
  readonly getUpdates: (
    offset: number,
    timeoutSeconds: number,
    signal?: AbortSignal,
  ) => Promise<ReadonlyArray<BotUpdate>>;
};

export type BotApiOptions = {
  readonly baseUrl?: string;
  readonly requestTimeoutMs?: number;
};

/**
 * The Bot API has no structured code for markup failures or already-deleted
 * messages; its description text is the only signal.
 */
export function classifyBotApiError(description: string): DeliveryErrorKind {
  const text = description.toLowerCase();
  if (text.includes("can't parse entities")) return "markup_parse";
  if (text.includes("message to delete not found")) return "not_found";
  return "transport";
}

/**
 * Creates a Telegram Bot API client over `fetch`. Every failed call rejects
 * with a `DeliveryError`, except an aborted `getUpdates`, which rejects with
 * the abort reason.
 */
export function createBotApiClient(
  token: string,
  options: BotApiOptions = {},
): BotApiClient {
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  async function call(
    method: string,
    params: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<unknown> {
    let body: unknown;
    try {
      const response = await fetch(`${baseUrl}/bot${token}/${method}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(params),
        signal,
      });
      body = await response.json();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new DeliveryError("transport", `${method} request failed: ${message}`);
    }

    const parsed = apiResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DeliveryError("transport", `${method} returned an unexpected response`);
    }
    if (!parsed.data.ok) {
      const { description, error_code: code } = parsed.data;
      throw new DeliveryError(classifyBotApiError(description), description, code);
    }
    return parsed.data.result;
  }

  return {
    async sendMessage(chatId, text, { markup }) {
      const result = await call(
        "sendMessage",
        {
          chat_id: chatId,
          text,
          ...(markup ? { parse_mode: "Markdown" } : {}),
        },
        AbortSignal.timeout(requestTimeoutMs),
      );
      const sent = sentMessageSchema.safeParse(result);
      if (!sent.success) {
        throw new DeliveryError("transport", "sendMessage returned no message id");
      }
      return sent.data.message_id;
    },

    async deleteMessage(chatId, messageId) {
      await call(
        "deleteMessage",
        { chat_id: chatId, message_id: messageId },
        AbortSignal.timeout(requestTimeoutMs),
      );
    },

    async getUpdates(offset, timeoutSeconds, signal) {
      const timeout = AbortSignal.timeout(requestTimeoutMs + timeoutSeconds * 1000);
      let result: unknown;
      try {
        result = await call(
          "getUpdates",
          { offset, timeout: timeoutSeconds, allowed_updates: ["message"] },
          signal ? AbortSignal.any([signal, timeout]) : timeout,
        );
      } catch (err) {
        if (signal?.aborted) throw signal.reason;
        throw err;
      }
      const updates = z.array(updateSchema).safeParse(result);
      if (!updates.success) {
        throw new DeliveryError("transport", "getUpdates returned malformed updates");
      }
      return updates.data;
    },
  };
}
