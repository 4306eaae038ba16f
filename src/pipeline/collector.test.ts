import { describe, it, expect, vi } from "vitest";
import {
  buildPermalink,
  classifyMedia,
  collectMessages,
  countMessages,
} from "./collector";
import {
  ChannelInaccessibleError,
  EntityNotFoundError,
  RateLimitError,
} from "../telegram/errors";
import { createFakeSourceClient, createTestLogger } from "../test-utils/fakes";

const now = new Date("2025-03-10T12:00:00Z");
const hoursAgo = (hours: number) => new Date(now.getTime() - hours * 60 * 60 * 1000);

const channels = [
  { id: "@tech_channel", name: "Tech News" },
  { id: "-1001234567", name: "Private Group" },
];

describe("classifyMedia", () => {
  it("should label media by class name and MIME type", () => {
    expect(classifyMedia("MessageMediaPhoto", null)).toBe("Photo");
    expect(classifyMedia("MessageMediaDocument", "video/mp4")).toBe("Video");
    expect(classifyMedia("MessageMediaDocument", "audio/mpeg")).toBe("Audio");
    expect(classifyMedia("MessageMediaDocument", "audio/ogg", true)).toBe("Voice message");
    expect(classifyMedia("MessageMediaDocument", "application/pdf")).toBe("Document");
    expect(classifyMedia("MessageMediaPoll", null)).toBe("Poll");
    expect(classifyMedia("MessageMediaGeoLive", null)).toBe("Location");
    expect(classifyMedia("MessageMediaVenue", null)).toBe("Location");
    expect(classifyMedia("MessageMediaWebPage", null)).toBe("Media");
  });
});

describe("buildPermalink", () => {
  it("should link public channels by username", () => {
    expect(buildPermalink({ id: "1234567", username: "tech_channel" }, 42)).toBe(
      "https://t.me/tech_channel/42",
    );
  });

  it("should use the internal form without the supergroup prefix otherwise", () => {
    expect(buildPermalink({ id: "-1001234567", username: null }, 42)).toBe(
      "https://t.me/c/1234567/42",
    );
  });
});

describe("collectMessages", () => {
  const options = { hours: 24, maxMessagesPerChannel: 500, now };

  it("should return messages in the window, oldest first, in channel order", async () => {
    const client = createFakeSourceClient({
      "@tech_channel": {
        username: "tech_channel",
        messages: [
          { id: 3, date: hoursAgo(1), text: "third", sender: "Carol" },
          { id: 2, date: hoursAgo(5), text: "second", sender: "Bob" },
          { id: 1, date: hoursAgo(30), text: "too old" },
        ],
      },
      "-1001234567": {
        messages: [{ id: 9, date: hoursAgo(2), text: "private hello" }],
      },
    });

    const result = await collectMessages(client, channels, options, createTestLogger());

    expect([...result.keys()]).toEqual(["Tech News", "Private Group"]);
    expect(result.get("Tech News")).toEqual([
      {
        text: "second",
        senderName: "Bob",
        timestamp: hoursAgo(5),
        permalink: "https://t.me/tech_channel/2",
        channelName: "Tech News",
        hasMedia: false,
        mediaKind: null,
      },
      {
        text: "third",
        senderName: "Carol",
        timestamp: hoursAgo(1),
        permalink: "https://t.me/tech_channel/3",
        channelName: "Tech News",
        hasMedia: false,
        mediaKind: null,
      },
    ]);
    expect(result.get("Private Group")?.map((m) => m.permalink)).toEqual([
      "https://t.me/c/1234567/9",
    ]);
    expect(countMessages(result)).toBe(3);
  });

  it("should substitute a media label for messages without text", async () => {
    const client = createFakeSourceClient({
      "@tech_channel": {
        messages: [
          { id: 2, date: hoursAgo(1), mediaKind: "Photo" },
          { id: 1, date: hoursAgo(2), text: "   " },
        ],
      },
      "-1001234567": {},
    });

    const result = await collectMessages(client, channels, options, createTestLogger());

    expect(result.get("Tech News")).toEqual([
      expect.objectContaining({ text: "[Photo]", hasMedia: true, mediaKind: "Photo" }),
    ]);
  });

  it("should keep a channel's messages when one sender lookup fails", async () => {
    const client = createFakeSourceClient({
      "@tech_channel": {
        messages: [
          { id: 2, date: hoursAgo(1), text: "newer", sender: "Bob" },
          { id: 1, date: hoursAgo(2), text: "older", senderError: new Error("USER_ID_INVALID") },
        ],
      },
      "-1001234567": {},
    });

    const result = await collectMessages(client, channels, options, createTestLogger());

    expect(result.get("Tech News")?.map((message) => [message.text, message.senderName])).toEqual([
      ["older", "Unknown"],
      ["newer", "Bob"],
    ]);
  });

  it("should pass the per-channel ceiling and the window end to the transport", async () => {
    const client = createFakeSourceClient({
      "@tech_channel": {
        messages: [
          { id: 3, date: hoursAgo(1), text: "c" },
          { id: 2, date: hoursAgo(2), text: "b" },
          { id: 1, date: hoursAgo(3), text: "a" },
        ],
      },
      "-1001234567": {},
    });

    const result = await collectMessages(
      client,
      channels,
      { ...options, maxMessagesPerChannel: 2 },
      createTestLogger(),
    );

    expect(result.get("Tech News")?.map((m) => m.text)).toEqual(["b", "c"]);
  });

  it("should retry a rate-limited channel once after the requested wait", async () => {
    const client = createFakeSourceClient({
      "@tech_channel": {
        failures: [new RateLimitError(7)],
        messages: [{ id: 1, date: hoursAgo(1), text: "after wait" }],
      },
      "-1001234567": {},
    });
    const sleep = vi.fn(async (_ms: number) => {});

    const result = await collectMessages(
      client,
      channels,
      { ...options, sleep },
      createTestLogger(),
    );

    expect(sleep).toHaveBeenCalledWith(7000);
    expect(client.resolveChannel).toHaveBeenCalledTimes(3);
    expect(result.get("Tech News")?.map((m) => m.text)).toEqual(["after wait"]);
  });

  it("should give up on a channel that is rate limited twice", async () => {
    const client = createFakeSourceClient({
      "@tech_channel": { failures: [new RateLimitError(1), new RateLimitError(1)] },
      "-1001234567": { messages: [{ id: 1, date: hoursAgo(1), text: "still here" }] },
    });

    const result = await collectMessages(
      client,
      channels,
      { ...options, sleep: async () => {} },
      createTestLogger(),
    );

    expect(result.get("Tech News")).toEqual([]);
    expect(result.get("Private Group")).toHaveLength(1);
  });

  it("should isolate inaccessible and unknown channels", async () => {
    const client = createFakeSourceClient({
      "@tech_channel": {
        failures: [new ChannelInaccessibleError("@tech_channel", "CHANNEL_PRIVATE")],
      },
      "-1001234567": {
        failures: [new EntityNotFoundError("-1001234567", "Cannot find any entity")],
      },
      "@third": { messages: [{ id: 1, date: hoursAgo(1), text: "ok" }] },
    });

    const result = await collectMessages(
      client,
      [...channels, { id: "@third", name: "Third" }],
      options,
      createTestLogger(),
    );

    expect(result.get("Tech News")).toEqual([]);
    expect(result.get("Private Group")).toEqual([]);
    expect(result.get("Third")).toHaveLength(1);
  });

  it("should continue when warming the dialog cache fails", async () => {
    const client = createFakeSourceClient({
      "@tech_channel": { messages: [{ id: 1, date: hoursAgo(1), text: "hi" }] },
      "-1001234567": {},
    });
    client.listDialogs.mockRejectedValueOnce(new Error("dialogs unavailable"));

    const result = await collectMessages(client, channels, options, createTestLogger());

    expect(countMessages(result)).toBe(1);
  });

  it("should disconnect even when collection throws", async () => {
    const client = createFakeSourceClient({});
    const logger = createTestLogger();
    vi.spyOn(logger, "info").mockImplementation(() => {
      throw new Error("logger broke");
    });

    await expect(collectMessages(client, channels, options, logger)).rejects.toThrow(
      "logger broke",
    );
    expect(client.disconnect).toHaveBeenCalledTimes(1);
  });

  it("should propagate a connection failure without touching channels", async () => {
    const client = createFakeSourceClient({});
    client.connect.mockRejectedValueOnce(new Error("session expired"));

    await expect(
      collectMessages(client, channels, options, createTestLogger()),
    ).rejects.toThrow("session expired");
    expect(client.resolveChannel).not.toHaveBeenCalled();
  });
});
