// pattern: Functional Core
import { isSummaryError } from "../pipeline/summarizer";
import type { ChannelSummaries, MessagesByChannel } from "../pipeline/types";

export type RenderSettings = {
  readonly useIcons: boolean;
  readonly includeStatistics: boolean;
  readonly locale: string;
  readonly timezone: string;
};

export type DigestWindow = {
  readonly hours: number;
  readonly now: Date;
};

/** One deliverable block per channel, in channel order. */
export type ChannelBlock = {
  readonly channelName: string;
  readonly text: string;
};

type IconRule = {
  readonly icon: string;
  /** Matched anywhere in the lower-cased channel name. */
  readonly fragments: ReadonlyArray<string>;
  /** Matched only as whole words. */
  readonly words?: ReadonlyArray<string>;
};

const ICON_RULES: ReadonlyArray<IconRule> = [
  { icon: "💻", fragments: ["tech", "dev", "code", "programming", "программ", "разработ"] },
  { icon: "💰", fragments: ["crypto", "bitcoin", "finance", "invest", "крипт", "финанс"] },
  { icon: "📰", fragments: ["news", "новост"] },
  { icon: "💼", fragments: ["business", "startup", "бизнес", "стартап"] },
  { icon: "🔬", fragments: ["science", "research", "наук"] },
  { icon: "🤖", fragments: ["artificial", "machine learning", "нейро"], words: ["ai", "ml", "llm", "ии"] },
  { icon: "🎨", fragments: ["design", "дизайн"], words: ["ui", "ux"] },
  { icon: "📈", fragments: ["marketing", "маркетинг"], words: ["smm"] },
];

const FALLBACK_ICON = "📺";
const PLAIN_MARKER = "•";

export function pickChannelIcon(channelName: string, useIcons: boolean): string {
  if (!useIcons) return PLAIN_MARKER;

  const name = channelName.toLowerCase();
  const words = new Set(name.split(/[^\p{L}\p{N}]+/u));
  const rule = ICON_RULES.find(
    (candidate) =>
      candidate.fragments.some((fragment) => name.includes(fragment)) ||
      (candidate.words ?? []).some((word) => words.has(word)),
  );
  return rule?.icon ?? FALLBACK_ICON;
}

/** Escapes the characters legacy Markdown treats as entity delimiters. */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, "\\$1");
}

function isDeliverable(summary: string): boolean {
  return summary.trim().length > 0 && !isSummaryError(summary);
}

/**
 * Bold heading for a channel. Legacy Markdown ignores escapes inside an
 * entity, so a name carrying a delimiter is written escaped and unbolded.
 */
function channelHeading(icon: string, channelName: string): string {
  return /[_*`[]/.test(channelName)
    ? `${icon} ${escapeMarkdown(channelName)}`
    : `*${icon} ${channelName}*`;
}

function channelSection(
  channelName: string,
  summary: string,
  settings: RenderSettings,
): string {
  const icon = pickChannelIcon(channelName, settings.useIcons);
  return `${channelHeading(icon, channelName)}\n\n${summary.trim()}`;
}

function plural(count: number, noun: string, locale: string): string {
  const formatted = new Intl.NumberFormat(locale).format(count);
  return `${formatted} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * Renders one block per channel whose synopsis is deliverable and whose
 * message list is non-empty. Failure markers and empty synopses are left out.
 */
export function renderChannelMessages(
  summaries: ChannelSummaries,
  messagesByChannel: MessagesByChannel,
  settings: RenderSettings,
): Array<ChannelBlock> {
  const blocks: Array<ChannelBlock> = [];
  for (const [channelName, summary] of summaries) {
    const messages = messagesByChannel.get(channelName) ?? [];
    if (messages.length === 0 || !isDeliverable(summary)) continue;
    blocks.push({ channelName, text: channelSection(channelName, summary, settings) });
  }
  return blocks;
}

/**
 * Active channel count, total messages and the covered window, shown in the
 * recipient's locale and zone.
 */
export function renderStatistics(
  messagesByChannel: MessagesByChannel,
  window: DigestWindow,
  settings: RenderSettings,
): string {
  let activeChannels = 0;
  let totalMessages = 0;
  for (const messages of messagesByChannel.values()) {
    if (messages.length > 0) activeChannels += 1;
    totalMessages += messages.length;
  }

  const formatter = new Intl.DateTimeFormat(settings.locale, {
    day: "2-digit",
    month: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
    timeZone: settings.timezone,
  });
  const from = new Date(window.now.getTime() - window.hours * 60 * 60 * 1000);
  const heading = settings.useIcons ? "📈 *Statistics*" : "*Statistics*";

  return [
    heading,
    `${plural(activeChannels, "active channel", settings.locale)}, ${plural(totalMessages, "message", settings.locale)} processed`,
    `Period: ${formatter.format(from)} – ${formatter.format(window.now)} (${settings.timezone})`,
  ].join("\n");
}

/**
 * Renders every deliverable section as one document with a dated header and,
 * when enabled, a statistics footer. Returns null when no section survives.
 */
export function renderCombinedDigest(
  summaries: ChannelSummaries,
  messagesByChannel: MessagesByChannel,
  window: DigestWindow,
  settings: RenderSettings,
): string | null {
  const sections = renderChannelMessages(summaries, messagesByChannel, settings);
  if (sections.length === 0) return null;

  const date = new Intl.DateTimeFormat(settings.locale, {
    day: "numeric",
    month: "long",
    year: "numeric",
    timeZone: settings.timezone,
  }).format(window.now);
  const icon = settings.useIcons ? "📊 " : "";
  const header = `*${icon}Daily digest, ${date}*\n_Last ${plural(window.hours, "hour", settings.locale)}_`;

  const parts = [header, ...sections.map((section) => section.text)];
  if (settings.includeStatistics) {
    parts.push(renderStatistics(messagesByChannel, window, settings));
  }
  return parts.join("\n\n");
}
