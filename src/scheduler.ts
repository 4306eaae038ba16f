import cron from "node-cron";
import type { Logger } from "pino";
import { toDailyCron } from "./config";
import type { AppConfig } from "./config";
import type { DigestRunOptions, DigestRunResult } from "./digest/orchestrator";

export type DigestTrigger = "scheduled" | "manual";

export type RunnerResult = DigestRunResult | { readonly status: "busy" };

export type DigestRunner = {
  readonly run: (
    trigger: DigestTrigger,
    options?: DigestRunOptions,
  ) => Promise<RunnerResult>;
  readonly isRunning: () => boolean;
};

export type DigestScheduler = {
  readonly stop: () => void;
  readonly nextRunAt: () => Date | null;
};

type ScheduledTask = ReturnType<typeof cron.schedule>;

/**
 * Wraps a digest cycle so at most one runs at a time. A trigger that arrives
 * while a cycle is in flight gets `{ status: "busy" }` at once. Errors from
 * the cycle propagate to the caller.
 */
export function createDigestRunner(
  runCycle: (options: DigestRunOptions) => Promise<DigestRunResult>,
  logger: Logger,
): DigestRunner {
  let running = false;

  return {
    isRunning: () => running,

    async run(trigger, options = {}) {
      if (running) {
        logger.warn({ trigger }, "digest run already in progress, skipping");
        return { status: "busy" };
      }

      running = true;
      const startedAt = Date.now();
      logger.info({ trigger }, "digest run starting");
      try {
        const result = await runCycle(options);
        logger.info(
          { trigger, status: result.status, durationMs: Date.now() - startedAt },
          "digest run finished",
        );
        return result;
      } finally {
        running = false;
      }
    },
  };
}

/**
 * Creates and starts the daily digest trigger at the configured wall-clock
 * time and zone.
 *
 * @returns A DigestScheduler with stop() and the next planned run time
 */
export function createDigestScheduler(
  config: AppConfig,
  runner: DigestRunner,
  logger: Logger,
): DigestScheduler {
  const task: ScheduledTask = cron.schedule(
    toDailyCron(config.schedule.time),
    async () => {
      try {
        const result = await runner.run("scheduled");
        if (result.status !== "delivered" && result.status !== "empty") {
          logger.warn({ status: result.status }, "scheduled digest was not fully delivered");
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ error: message }, "scheduled digest failed unexpectedly");
      }
    },
    { timezone: config.schedule.timezone, name: "daily-digest" },
  );

  return {
    stop: () => {
      task.stop();
    },
    nextRunAt: () => task.getNextRun(),
  };
}
