// pattern: Imperative Shell
import { resolve } from "node:path";
import { Command, InvalidArgumentError } from "commander";
import type { Logger } from "pino";
import {
  DEFAULT_CONFIG_FILE,
  DEFAULT_HISTORY_FILE,
  expandHome,
  loadConfig,
} from "./config";
import type { AppConfig } from "./config";
import { openHistoryStore } from "./db";
import type { HistoryStore } from "./db";
import { errorMessage } from "./errors";
import { registerShutdownHandlers } from "./lifecycle";
import { createLogger } from "./logger";
import { createNotifiers } from "./notify";
import { createSpinnerProgress } from "./progress";
import { runOnce } from "./runner";
import type { RunDeps } from "./runner";
import { createRunScheduler } from "./scheduler";
import type { RunScheduler } from "./scheduler";

export const VERSION = "1.0.0";

export type GlobalOptions = {
  readonly verbose?: boolean;
  readonly config?: string;
  readonly history?: string;
};

export function resolveConfigPath(options: GlobalOptions): string {
  return resolve(
    expandHome(
      options.config ?? process.env["PODFETCH_CONFIG"] ?? DEFAULT_CONFIG_FILE,
    ),
  );
}

export function resolveHistoryPath(
  options: GlobalOptions,
  config: AppConfig,
): string {
  const path =
    options.history ??
    process.env["PODFETCH_HISTORY"] ??
    config.history ??
    DEFAULT_HISTORY_FILE;
  return resolve(expandHome(path));
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

type Session = {
  readonly logger: Logger;
  readonly config: AppConfig;
  readonly history: HistoryStore;
};

/**
 * Loads configuration and opens the history store. Both failures are fatal:
 * without the history the run cannot tell new items from old ones.
 */
function openSession(options: GlobalOptions): Session {
  const logger = createLogger({ level: options.verbose ? "debug" : undefined });

  const configPath = resolveConfigPath(options);
  let config: AppConfig;
  try {
    logger.debug({ configPath }, "reading config file");
    config = loadConfig(configPath);
  } catch (err) {
    logger.fatal({ error: errorMessage(err) }, "configuration error");
    process.exit(1);
  }

  const historyPath = resolveHistoryPath(options, config);
  let history: HistoryStore;
  try {
    logger.debug({ historyPath }, "initialising feed history");
    history = openHistoryStore(historyPath);
  } catch (err) {
    logger.fatal({ historyPath, error: errorMessage(err) }, "unable to initialise feed history");
    process.exit(1);
  }

  return { logger, config, history };
}

function runDeps(session: Session): RunDeps {
  return {
    config: session.config,
    history: session.history,
    notifiers: createNotifiers(session.config.notifiers, session.logger),
    logger: session.logger,
    progress: createSpinnerProgress(),
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("podfetch")
    .description("Download new enclosures from RSS and Atom feeds")
    .version(VERSION)
    .option("-v, --verbose", "log debug output")
    .option("-c, --config <path>", `config file (default: ${DEFAULT_CONFIG_FILE})`)
    .option("-H, --history <path>", `history database (default: ${DEFAULT_HISTORY_FILE})`);

  program
    .command("run", { isDefault: true })
    .description("check every feed once and download new items")
    .action(async (_options: unknown, command: Command) => {
      const session = openSession(command.optsWithGlobals<GlobalOptions>());
      const { logger, history } = session;
      const runs = new AbortController();

      logger.info("start");
      const pending = runOnce({ ...runDeps(session), signal: runs.signal });
      registerShutdownHandlers({
        schedulers: [],
        runs,
        inFlight: () => pending.then(() => undefined),
        closeHistory: () => history.close(),
        logger,
      });

      try {
        const summary = await pending;
        logger.info(
          { downloaded: summary.downloaded, failed: summary.failed },
          "end",
        );
      } finally {
        history.close();
      }
    });

  program
    .command("watch")
    .description("run on a cron schedule until interrupted")
    .option("-s, --schedule <cron>", "cron expression (default: config `schedule`)")
    .action(async (options: { schedule?: string }, command: Command) => {
      const session = openSession(command.optsWithGlobals<GlobalOptions>());
      const { logger, config, history } = session;

      const schedule = options.schedule ?? config.schedule;
      if (!schedule) {
        logger.fatal("no schedule given on the command line or in the config file");
        history.close();
        process.exit(1);
      }

      const runs = new AbortController();
      const deps: RunDeps = { ...runDeps(session), signal: runs.signal };

      let scheduler: RunScheduler;
      try {
        scheduler = createRunScheduler(schedule, () => runOnce(deps), logger);
      } catch (err) {
        logger.fatal({ schedule, error: errorMessage(err) }, "invalid schedule");
        history.close();
        process.exit(1);
      }
      logger.info({ schedule }, "run scheduler started");

      registerShutdownHandlers({
        schedulers: [scheduler],
        runs,
        inFlight: () => scheduler.idle(),
        closeHistory: () => history.close(),
        logger,
      });

      await scheduler.trigger();
    });

  program
    .command("history")
    .description("list recent downloads, newest first")
    .option("-f, --feed <name>", "only show one feed")
    .option("-n, --limit <count>", "number of rows", parsePositiveInt, 20)
    .action((options: { feed?: string; limit: number }, command: Command) => {
      const { history } = openSession(command.optsWithGlobals<GlobalOptions>());
      try {
        const rows = history.list({ feed: options.feed, limit: options.limit });
        for (const row of rows) {
          process.stdout.write(
            `${row.date.toISOString()}  ${row.feed}  ${row.title}\n`,
          );
        }
      } finally {
        history.close();
      }
    });

  return program;
}
