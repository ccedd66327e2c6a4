// pattern: Imperative Shell
import type { Logger } from "pino";
import { errorMessage } from "./errors";

/**
 * Represents an object with a stop method for graceful shutdown.
 */
export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  // Aborted on shutdown; runs watch its signal and cancel their download.
  readonly runs: AbortController;
  // Resolves once the run in progress, if any, has settled.
  readonly inFlight: () => Promise<void>;
  readonly closeHistory: () => void;
  readonly logger: Logger;
};

/**
 * Registers SIGTERM and SIGINT handlers for a graceful shutdown:
 *
 * 1. stop the schedulers so no new run starts
 * 2. abort the run in progress, which removes its partial download
 * 3. wait for that run to settle, then close the history database
 * 4. exit
 *
 * Repeated signals are ignored once shutdown has begun; each step runs even
 * if an earlier one failed.
 *
 * @returns The shutdown routine the handlers call.
 */
export function registerShutdownHandlers(
  deps: ShutdownDeps,
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        scheduler.stop();
      } catch (err) {
        deps.logger.error({ error: errorMessage(err) }, "error stopping scheduler");
      }
    }

    deps.runs.abort(new Error(`received ${signal}`));
    try {
      await deps.inFlight();
      deps.logger.info("in-flight run settled");
    } catch (err) {
      deps.logger.error({ error: errorMessage(err) }, "error waiting for in-flight run");
    }

    try {
      deps.closeHistory();
      deps.logger.info("history database closed");
    } catch (err) {
      deps.logger.error({ error: errorMessage(err) }, "error closing history database");
    }

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  const handle = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      deps.logger.fatal({ error: errorMessage(err) }, "shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => handle("SIGTERM"));
  process.on("SIGINT", () => handle("SIGINT"));

  return shutdown;
}
