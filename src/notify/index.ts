import type { Logger } from "pino";
import { ConfigError, errorMessage } from "../errors";
import { formatIssues } from "../config/feeds";
import {
  mailgunConfigSchema,
  pushbulletConfigSchema,
} from "../config/schema";
import type { DownloadEvent } from "../pipeline";
import { createMailgunNotifier } from "./mailgun";
import { createPushbulletNotifier } from "./pushbullet";
import type { Notifier } from "./types";

export function createNotifier(
  name: string,
  raw: unknown,
  logger: Logger,
): Notifier {
  switch (name) {
    case "pushbullet": {
      const result = pushbulletConfigSchema.safeParse(raw);
      if (!result.success) {
        throw new ConfigError(
          `invalid configuration for notifier "pushbullet":\n${formatIssues(result.error)}`,
          name,
        );
      }
      return createPushbulletNotifier(result.data, logger);
    }
    case "mailgun": {
      const result = mailgunConfigSchema.safeParse(raw);
      if (!result.success) {
        throw new ConfigError(
          `invalid configuration for notifier "mailgun":\n${formatIssues(result.error)}`,
          name,
        );
      }
      return createMailgunNotifier(result.data, logger);
    }
    default:
      throw new ConfigError(`unknown notifier "${name}"`, name);
  }
}

/**
 * Builds every configured notifier. A notifier with bad configuration is
 * logged and left out; it never stops the others from loading.
 */
export function createNotifiers(
  configs: Readonly<Record<string, unknown>>,
  logger: Logger,
): ReadonlyArray<Notifier> {
  const notifiers: Array<Notifier> = [];

  for (const [name, raw] of Object.entries(configs)) {
    try {
      notifiers.push(createNotifier(name, raw, logger));
      logger.debug({ notifier: name }, "notifier added");
    } catch (err) {
      logger.error({ notifier: name, error: errorMessage(err) }, "unable to load notifier");
    }
  }

  return notifiers;
}

/**
 * Sends one download event to every notifier in turn.
 */
export async function notifyAll(
  notifiers: ReadonlyArray<Notifier>,
  event: DownloadEvent,
  logger: Logger,
): Promise<void> {
  for (const notifier of notifiers) {
    try {
      await notifier.notify(event.feedName, event.title);
    } catch (err) {
      logger.warn(
        { notifier: notifier.name, feedName: event.feedName, error: errorMessage(err) },
        "notifier threw unexpectedly",
      );
    }
  }
}

export type { Notifier, NotifyResult } from "./types";
