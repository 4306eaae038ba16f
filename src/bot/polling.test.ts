import { describe, it, expect, vi } from "vitest";
import { startCommandPolling } from "./polling";
import type { BotUpdate } from "../telegram/bot-api";
import { createTestLogger } from "../test-utils/fakes";

function message(updateId: number, text: string): BotUpdate {
  return {
    update_id: updateId,
    message: { message_id: updateId, from: { id: 1 }, chat: { id: 1 }, text },
  };
}

/**
 * Serves the given batches in order, then waits until the poll is aborted,
 * the way a long poll with no new updates does.
 */
function scriptedUpdates(batches: ReadonlyArray<ReadonlyArray<BotUpdate> | Error>) {
  let call = 0;
  return vi.fn(
    async (_offset: number, _timeout: number, signal?: AbortSignal): Promise<ReadonlyArray<BotUpdate>> => {
      const batch = batches[call];
      call += 1;
      if (batch instanceof Error) throw batch;
      if (batch) return batch;
      return new Promise((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    },
  );
}

async function waitFor(condition: () => boolean): Promise<void> {
  for (let i = 0; i < 100 && !condition(); i += 1) {
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
}

describe("startCommandPolling", () => {
  it("should handle updates in order and advance the offset", async () => {
    const getUpdates = scriptedUpdates([[message(5, "/help"), message(6, "/status")], [message(7, "/digest")]]);
    const handleUpdate = vi.fn(async (_update: BotUpdate) => {});

    const polling = startCommandPolling({ getUpdates }, { handleUpdate }, createTestLogger(), {
      timeoutSeconds: 10,
    });
    await waitFor(() => getUpdates.mock.calls.length >= 3);
    await polling.stop();

    expect(handleUpdate.mock.calls.map((call) => call[0].update_id)).toEqual([5, 6, 7]);
    expect(getUpdates.mock.calls.map((call) => [call[0], call[1]])).toEqual([
      [0, 10],
      [7, 10],
      [8, 10],
    ]);
  });

  it("should keep going when a handler throws", async () => {
    const getUpdates = scriptedUpdates([[message(1, "/digest"), message(2, "/help")]]);
    const handleUpdate = vi
      .fn(async (_update: BotUpdate) => {})
      .mockRejectedValueOnce(new Error("handler broke"));

    const polling = startCommandPolling({ getUpdates }, { handleUpdate }, createTestLogger());
    await waitFor(() => getUpdates.mock.calls.length >= 2);
    await polling.stop();

    expect(handleUpdate).toHaveBeenCalledTimes(2);
    expect(getUpdates.mock.calls[1]?.[0]).toBe(3);
  });

  it("should back off and retry after a transport error", async () => {
    const getUpdates = scriptedUpdates([new Error("Bad Gateway"), [message(1, "/help")]]);
    const handleUpdate = vi.fn(async (_update: BotUpdate) => {});

    const polling = startCommandPolling({ getUpdates }, { handleUpdate }, createTestLogger(), {
      retryDelayMs: 1,
    });
    await waitFor(() => handleUpdate.mock.calls.length >= 1);
    await polling.stop();

    expect(handleUpdate).toHaveBeenCalledTimes(1);
    expect(getUpdates.mock.calls[1]?.[0]).toBe(0);
  });

  it("should not accumulate abort listeners across back-offs", async () => {
    const added = vi.spyOn(EventTarget.prototype, "addEventListener");
    const removed = vi.spyOn(EventTarget.prototype, "removeEventListener");
    const abortCalls = (calls: ReadonlyArray<ReadonlyArray<unknown>>) =>
      calls.filter((call) => call[0] === "abort").length;
    const getUpdates = scriptedUpdates([
      new Error("Bad Gateway"),
      new Error("Bad Gateway"),
      new Error("Bad Gateway"),
      new Error("Bad Gateway"),
      new Error("Bad Gateway"),
    ]);

    const polling = startCommandPolling(
      { getUpdates },
      { handleUpdate: vi.fn(async () => {}) },
      createTestLogger(),
      { retryDelayMs: 1 },
    );
    await waitFor(() => getUpdates.mock.calls.length >= 6);

    // only the pending long poll still listens
    expect(abortCalls(added.mock.calls) - abortCalls(removed.mock.calls)).toBe(1);
    await polling.stop();
  });

  it("should stop a pending long poll", async () => {
    const getUpdates = scriptedUpdates([]);

    const polling = startCommandPolling(
      { getUpdates },
      { handleUpdate: vi.fn(async () => {}) },
      createTestLogger(),
    );
    await waitFor(() => getUpdates.mock.calls.length >= 1);

    await expect(polling.stop()).resolves.toBeUndefined();
    expect(getUpdates).toHaveBeenCalledTimes(1);
  });
});
