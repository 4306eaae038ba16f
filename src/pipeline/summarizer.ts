// pattern: Imperative Shell
import { generateText } from "ai";
import type { Logger } from "pino";
import type { LlmClient } from "../llm/client";
import type {
  ChannelSummaries,
  CollectedMessage,
  MessagesByChannel,
} from "./types";

export const SUMMARY_ERROR_PREFIX = "Error processing channel";
export const MAX_PROMPT_MESSAGE_LENGTH = 500;

export type SummarizeOptions = {
  readonly language: string;
};

export function isSummaryError(summary: string): boolean {
  return summary.startsWith(SUMMARY_ERROR_PREFIX);
}

export function buildSystemPrompt(language: string): string {
  return `You write concise, well-structured digests of chat channels. Always answer in ${language}.`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Renders one numbered line per message: `N. [HH:MM] Sender: text (link)`.
 * Times are UTC; bodies are cut at {@link MAX_PROMPT_MESSAGE_LENGTH}.
 */
export function formatMessagesForPrompt(
  messages: ReadonlyArray<CollectedMessage>,
): string {
  return messages
    .map((message, index) => {
      const time = message.timestamp.toISOString().slice(11, 16);
      const body = truncate(
        message.text.replace(/\s*\n\s*/g, " "),
        MAX_PROMPT_MESSAGE_LENGTH,
      );
      return `${index + 1}. [${time}] ${message.senderName}: ${body} (${message.permalink})`;
    })
    .join("\n");
}

export function buildChannelPrompt(
  channelName: string,
  messages: ReadonlyArray<CollectedMessage>,
  language: string,
): string {
  return `Analyze the following messages from the channel "${channelName}" and write a short digest in ${language}.

Focus on:
- 📰 important news and announcements
- 💬 key discussions
- ✅ decisions and conclusions
- 🔗 useful resources and links

Format:
- 3 to 7 bullet points, one or two sentences each
- start every point with an emoji matching its category
- when a point rests on one especially important message, link it inline as [source](link)
- no heading, no introduction

Messages (${messages.length} total):
---
${formatMessagesForPrompt(messages)}
---

Respond ONLY in ${language}.`;
}

async function summarizeChannel(
  channelName: string,
  messages: ReadonlyArray<CollectedMessage>,
  llm: LlmClient,
  options: SummarizeOptions,
): Promise<string> {
  const { text } = await generateText({
    model: llm.model,
    system: buildSystemPrompt(options.language),
    prompt: buildChannelPrompt(channelName, messages, options.language),
    temperature: llm.temperature,
    maxOutputTokens: llm.maxOutputTokens,
    maxRetries: 0,
    abortSignal: AbortSignal.timeout(llm.timeoutMs),
  });
  return text.trim();
}

/**
 * Produces one synopsis per channel that has messages, in input order.
 * A failed model call becomes a marker string recognised by
 * {@link isSummaryError}; it never aborts the other channels.
 */
export async function summarizeChannels(
  messagesByChannel: MessagesByChannel,
  llm: LlmClient,
  options: SummarizeOptions,
  logger: Logger,
): Promise<ChannelSummaries> {
  const summaries = new Map<string, string>();

  for (const [channelName, messages] of messagesByChannel) {
    if (messages.length === 0) continue;

    try {
      const summary = await summarizeChannel(channelName, messages, llm, options);
      summaries.set(channelName, summary);
      logger.info(
        { channel: channelName, messageCount: messages.length, length: summary.length },
        "channel summarized",
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { channel: channelName, model: llm.modelId, error: message },
        "channel summarization failed",
      );
      summaries.set(channelName, `${SUMMARY_ERROR_PREFIX}: ${message}`);
    }
  }

  return summaries;
}
