// pattern: Imperative Shell
import type { Logger } from "pino";
import type { PushbulletConfig } from "../config/schema";
import { notificationSubject } from "./types";
import type { Notifier, NotifyResult } from "./types";

export const PUSHBULLET_PUSHES_URL = "https://api.pushbullet.com/v2/pushes";

/**
 * Creates a notifier that sends a Pushbullet "note" push per download,
 * optionally targeted at a single device.
 */
export function createPushbulletNotifier(
  config: PushbulletConfig,
  logger: Logger,
  timeoutMs = 15000,
): Notifier {
  return {
    name: "pushbullet",
    async notify(feedName: string, title: string): Promise<NotifyResult> {
      const payload: Record<string, string> = {
        type: "note",
        title: notificationSubject(feedName),
        body: title,
      };
      if (config.device) {
        payload["device_iden"] = config.device;
      }

      try {
        const response = await fetch(PUSHBULLET_PUSHES_URL, {
          method: "POST",
          signal: AbortSignal.timeout(timeoutMs),
          headers: {
            "Access-Token": config.token,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(payload),
        });

        if (!response.ok) {
          const error = `HTTP ${response.status}: ${response.statusText}`;
          logger.warn({ feedName, error }, "pushbullet notification failed");
          return { success: false, error };
        }

        logger.debug({ feedName, title }, "pushbullet notification sent");
        return { success: true };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ feedName, error: message }, "pushbullet notification failed");
        return { success: false, error: message };
      }
    },
  };
}
