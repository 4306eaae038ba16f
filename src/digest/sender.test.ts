import { describe, it, expect, vi } from "vitest";
import { createDigestSender } from "./sender";
import type { DigestSenderDeps } from "./sender";
import { createMemoryStore } from "./store";
import {
  TEST_RECIPIENT_ID,
  createFakeDeliveryClient,
  createTestLogger,
  markupError,
  notFoundError,
  transportError,
} from "../test-utils/fakes";
import type { FakeDeliveryOptions } from "../test-utils/fakes";

function setup(options: FakeDeliveryOptions = {}, overrides: Partial<DigestSenderDeps> = {}) {
  const client = createFakeDeliveryClient(options);
  const store = createMemoryStore();
  const sleep = vi.fn(async (_ms: number) => {});
  const sender = createDigestSender({
    client,
    store,
    authorizedRecipientId: TEST_RECIPIENT_ID,
    maxMessageLength: 4000,
    pacingMs: 500,
    logger: createTestLogger(),
    sleep,
    ...overrides,
  });
  return { client, store, sleep, sender };
}

const techBlock = { channelName: "Tech News", text: "*💻 Tech News*\n\n- one" };
const groupBlock = { channelName: "Private Group", text: "*📺 Private Group*\n\n- two" };
const blocks = [techBlock, groupBlock];

describe("sendChannelMessages", () => {
  it("should deliver each block in order, then the statistics message", async () => {
    const { client, store, sender } = setup();

    const outcome = await sender.sendChannelMessages(blocks, { summaryMessage: "stats" });

    expect(outcome).toEqual({ status: "delivered", sentMessageIds: [101, 102, 103] });
    expect(client.sendMessage.mock.calls.map((call) => call[1])).toEqual([
      techBlock.text,
      groupBlock.text,
      "stats",
    ]);
    expect(client.sendMessage.mock.calls.every((call) => call[2].markup)).toBe(true);
    expect(store.get(String(TEST_RECIPIENT_ID))).toEqual([101, 102, 103]);
  });

  it("should pause between channel blocks only", async () => {
    const { sleep, sender } = setup();

    await sender.sendChannelMessages(blocks, { summaryMessage: "stats" });

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it("should refuse any other recipient without a transport call", async () => {
    const { client, store, sender } = setup();

    const outcome = await sender.sendChannelMessages(blocks, { recipientId: 999 });

    expect(outcome).toEqual({ status: "refused" });
    expect(client.sendMessage).not.toHaveBeenCalled();
    expect(store.get("999")).toEqual([]);
  });

  it("should split a long block and retry a rejected fragment once as plain text", async () => {
    const { client, store, sender } = setup({ sendFailures: { 2: markupError() } });
    const text = "A".repeat(5000);

    const outcome = await sender.sendChannelMessages([{ channelName: "Tech News", text }]);

    expect(outcome).toEqual({ status: "delivered", sentMessageIds: [101, 102] });
    expect(client.sendMessage.mock.calls).toEqual([
      [TEST_RECIPIENT_ID, "A".repeat(4000), { markup: true }],
      [TEST_RECIPIENT_ID, "A".repeat(1000), { markup: true }],
      [TEST_RECIPIENT_ID, "A".repeat(1000), { markup: false }],
    ]);
    expect(store.get(String(TEST_RECIPIENT_ID))).toEqual([101, 102]);
  });

  it("should not retry a plain-text resend that also fails", async () => {
    const { client, sender } = setup({
      sendFailures: { 1: markupError(), 2: markupError() },
    });

    const outcome = await sender.sendChannelMessages([techBlock]);

    expect(outcome).toEqual({
      status: "failed",
      sentMessageIds: [],
      failedChannels: ["Tech News"],
    });
    expect(client.sendMessage).toHaveBeenCalledTimes(2);
  });

  it("should report partial delivery and keep the ids that went out", async () => {
    const { client, store, sender } = setup({ sendFailures: { 2: transportError() } });

    const outcome = await sender.sendChannelMessages(blocks, { summaryMessage: "stats" });

    expect(outcome).toEqual({
      status: "partial",
      sentMessageIds: [101, 102],
      failedChannels: ["Private Group"],
    });
    expect(client.sendMessage).toHaveBeenCalledTimes(3);
    expect(store.get(String(TEST_RECIPIENT_ID))).toEqual([101, 102]);
  });

  it("should skip the statistics message and the record when nothing was delivered", async () => {
    const { client, store, sender } = setup({
      sendFailures: { 1: transportError(), 2: transportError() },
    });

    const outcome = await sender.sendChannelMessages(blocks, { summaryMessage: "stats" });

    expect(outcome).toEqual({
      status: "failed",
      sentMessageIds: [],
      failedChannels: ["Tech News", "Private Group"],
    });
    expect(client.sendMessage).toHaveBeenCalledTimes(2);
    expect(store.get(String(TEST_RECIPIENT_ID))).toEqual([]);
  });

  it("should not count a failed statistics message against the channels", async () => {
    const { sender } = setup({ sendFailures: { 3: transportError() } });

    const outcome = await sender.sendChannelMessages(blocks, { summaryMessage: "stats" });

    expect(outcome).toEqual({ status: "delivered", sentMessageIds: [101, 102] });
  });
});

describe("sendDigest", () => {
  it("should deliver the combined text as one tracked batch", async () => {
    const { client, store, sender } = setup();

    const outcome = await sender.sendDigest("digest body");

    expect(outcome).toEqual({ status: "delivered", sentMessageIds: [101] });
    expect(client.sendMessage).toHaveBeenCalledWith(TEST_RECIPIENT_ID, "digest body", { markup: true });
    expect(store.get(String(TEST_RECIPIENT_ID))).toEqual([101]);
  });

  it("should refuse other recipients", async () => {
    const { client, sender } = setup();

    expect(await sender.sendDigest("digest body", 1)).toEqual({ status: "refused" });
    expect(client.sendMessage).not.toHaveBeenCalled();
  });
});

describe("sendText", () => {
  it("should send a notice without recording it", async () => {
    const { store, sender } = setup();

    expect(await sender.sendText("hello")).toBe(true);
    expect(store.get(String(TEST_RECIPIENT_ID))).toEqual([]);
  });

  it("should return false on transport failure", async () => {
    const { sender } = setup({ sendFailures: { 1: transportError() } });

    expect(await sender.sendText("hello")).toBe(false);
  });

  it("should return false for other recipients without a transport call", async () => {
    const { client, sender } = setup();

    expect(await sender.sendText("hello", 1)).toBe(false);
    expect(client.sendMessage).not.toHaveBeenCalled();
  });
});

describe("cleanupPrevious", () => {
  it("should treat an already-deleted message as removed and clear the record", async () => {
    const { client, store, sender } = setup({ deleteFailures: { 11: notFoundError() } });
    store.save(String(TEST_RECIPIENT_ID), [10, 11, 12]);

    const outcome = await sender.cleanupPrevious();

    expect(outcome).toEqual({ status: "cleaned", deleted: 3, failed: 0 });
    expect(client.deleteMessage.mock.calls).toEqual([
      [TEST_RECIPIENT_ID, 10],
      [TEST_RECIPIENT_ID, 11],
      [TEST_RECIPIENT_ID, 12],
    ]);
    expect(store.get(String(TEST_RECIPIENT_ID))).toEqual([]);
  });

  it("should succeed when at least one deletion worked", async () => {
    const { store, sender } = setup({ deleteFailures: { 10: transportError() } });
    store.save(String(TEST_RECIPIENT_ID), [10, 11]);

    expect(await sender.cleanupPrevious()).toEqual({ status: "cleaned", deleted: 1, failed: 1 });
    expect(store.get(String(TEST_RECIPIENT_ID))).toEqual([]);
  });

  it("should fail but still clear the record when every deletion failed", async () => {
    const { store, sender } = setup({
      deleteFailures: { 10: transportError(), 11: transportError() },
    });
    store.save(String(TEST_RECIPIENT_ID), [10, 11]);

    expect(await sender.cleanupPrevious()).toEqual({ status: "failed", deleted: 0, failed: 2 });
    expect(store.get(String(TEST_RECIPIENT_ID))).toEqual([]);
  });

  it("should succeed trivially when nothing is recorded", async () => {
    const { client, sender } = setup();

    expect(await sender.cleanupPrevious()).toEqual({ status: "cleaned", deleted: 0, failed: 0 });
    expect(client.deleteMessage).not.toHaveBeenCalled();
  });

  it("should refuse other recipients", async () => {
    const { client, store, sender } = setup();
    store.save("999", [1]);

    expect(await sender.cleanupPrevious(999)).toEqual({ status: "refused" });
    expect(client.deleteMessage).not.toHaveBeenCalled();
    expect(store.get("999")).toEqual([1]);
  });
});
