// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { LlmClient } from "../llm/client";
import { collectMessages, countMessages } from "../pipeline/collector";
import { isSummaryError, summarizeChannels } from "../pipeline/summarizer";
import type { SourceClient } from "../pipeline/types";
import {
  renderChannelMessages,
  renderCombinedDigest,
  renderStatistics,
} from "./renderer";
import type { RenderSettings } from "./renderer";
import type { DeliveryOutcome, DigestSender } from "./sender";

export type DigestRunDeps = {
  readonly config: AppConfig;
  readonly source: SourceClient;
  readonly llm: LlmClient;
  readonly sender: DigestSender;
  readonly logger: Logger;
  readonly now?: () => Date;
  readonly sleep?: (ms: number) => Promise<void>;
};

export type DigestRunOptions = {
  readonly hours?: number;
  readonly recipientId?: number;
};

export type DigestRunResult =
  | {
      readonly status: "delivered";
      readonly channelCount: number;
      readonly messageCount: number;
    }
  | {
      readonly status: "partial";
      readonly channelCount: number;
      readonly messageCount: number;
      readonly failedChannels: ReadonlyArray<string>;
    }
  | { readonly status: "failed"; readonly failedChannels: ReadonlyArray<string> }
  | { readonly status: "empty" }
  | { readonly status: "refused" };

function renderSettingsFor(config: AppConfig): RenderSettings {
  return {
    useIcons: config.digest.useIcons,
    includeStatistics: config.digest.includeStatistics,
    locale: config.digest.locale,
    timezone: config.schedule.timezone,
  };
}

function toRunResult(
  outcome: DeliveryOutcome,
  channelCount: number,
  messageCount: number,
  summaryFailures: ReadonlyArray<string>,
): DigestRunResult {
  switch (outcome.status) {
    case "refused":
      return { status: "refused" };
    case "failed":
      return {
        status: "failed",
        failedChannels: [...summaryFailures, ...outcome.failedChannels],
      };
    case "partial":
      return {
        status: "partial",
        channelCount: channelCount - outcome.failedChannels.length,
        messageCount,
        failedChannels: [...summaryFailures, ...outcome.failedChannels],
      };
    case "delivered":
      return summaryFailures.length > 0
        ? { status: "partial", channelCount, messageCount, failedChannels: summaryFailures }
        : { status: "delivered", channelCount, messageCount };
  }
}

/**
 * Runs one digest cycle: collect, summarize, render, retract the previous
 * batch when enabled, deliver.
 *
 * - Zero collected messages ends the run as `empty` with no delivery.
 * - When no synopsis survives, the run is `failed` and the delivery transport
 *   is never contacted.
 * - A channel whose synopsis failed makes an otherwise delivered run `partial`.
 */
export async function runDigestCycle(
  deps: DigestRunDeps,
  options: DigestRunOptions = {},
): Promise<DigestRunResult> {
  const { config, logger } = deps;
  const hours = options.hours ?? config.digest.lookbackHours;
  const recipientId = options.recipientId ?? config.digest.recipientId;
  const now = deps.now?.() ?? new Date();

  if (recipientId !== config.digest.recipientId) {
    logger.warn({ recipientId }, "digest requested for unauthorized recipient");
    return { status: "refused" };
  }

  logger.info(
    { hours, channelCount: config.channels.length, mode: config.digest.mode },
    "digest cycle starting",
  );

  const messagesByChannel = await collectMessages(
    deps.source,
    config.channels,
    {
      hours,
      maxMessagesPerChannel: config.digest.maxMessagesPerChannel,
      now,
      ...(deps.sleep ? { sleep: deps.sleep } : {}),
    },
    logger,
  );

  const messageCount = countMessages(messagesByChannel);
  if (messageCount === 0) {
    logger.info({ hours }, "no messages in the window, nothing to deliver");
    return { status: "empty" };
  }

  const summaries = await summarizeChannels(
    messagesByChannel,
    deps.llm,
    { language: config.digest.outputLanguage },
    logger,
  );
  const summaryFailures = [...summaries]
    .filter(([, summary]) => isSummaryError(summary))
    .map(([channelName]) => channelName);

  const settings = renderSettingsFor(config);
  const window = { hours, now };
  const blocks = renderChannelMessages(summaries, messagesByChannel, settings);
  if (blocks.length === 0) {
    logger.error(
      { failedChannels: summaryFailures },
      "no channel produced a deliverable summary",
    );
    return { status: "failed", failedChannels: summaryFailures };
  }

  if (config.digest.autoCleanup) {
    const cleanup = await deps.sender.cleanupPrevious(recipientId);
    if (cleanup.status === "failed") {
      logger.warn({ failed: cleanup.failed }, "previous digest could not be retracted");
    }
  }

  let outcome: DeliveryOutcome;
  if (config.digest.mode === "combined") {
    const digest = renderCombinedDigest(summaries, messagesByChannel, window, settings);
    // blocks were non-empty, so the combined rendering has sections too
    outcome = digest === null
      ? { status: "failed", sentMessageIds: [], failedChannels: [] }
      : await deps.sender.sendDigest(digest, recipientId);
  } else {
    outcome = await deps.sender.sendChannelMessages(blocks, {
      recipientId,
      summaryMessage: settings.includeStatistics
        ? renderStatistics(messagesByChannel, window, settings)
        : null,
    });
  }

  const result = toRunResult(outcome, blocks.length, messageCount, summaryFailures);
  logger.info({ status: result.status, messageCount }, "digest cycle finished");
  return result;
}
