// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * A running component that can be stopped on shutdown.
 */
export type Stoppable = {
  readonly name: string;
  readonly stop: () => void | Promise<void>;
};

export type ShutdownDeps = {
  readonly components: ReadonlyArray<Stoppable>;
  readonly logger: Logger;
};

/**
 * Stops every component in order, isolating failures so each one gets its
 * turn. Repeated calls after the first are no-ops.
 */
export function createShutdown(deps: ShutdownDeps): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const component of deps.components) {
      try {
        await component.stop();
        deps.logger.info({ component: component.name }, "component stopped");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error(
          { component: component.name, error: message },
          "error stopping component",
        );
      }
    }

    deps.logger.info("shutdown complete");
  };
}

/**
 * Builds the signal handler: runs the shutdown sequence, then exits with
 * code 0 whether or not every component stopped cleanly.
 */
export function createSignalHandler(
  deps: ShutdownDeps,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => void {
  const shutdown = createShutdown(deps);

  return (signal: string) => {
    shutdown(signal)
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "shutdown failed");
      })
      .finally(() => exit(0));
  };
}

export function registerShutdownHandlers(deps: ShutdownDeps): void {
  const onSignal = createSignalHandler(deps);

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}
