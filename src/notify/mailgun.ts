// pattern: Imperative Shell
import Mailgun from "mailgun.js";
import FormData from "form-data";
import type { Logger } from "pino";
import type { MailgunConfig } from "../config/schema";
import { notificationSubject } from "./types";
import type { Notifier, NotifyResult } from "./types";

/**
 * Creates a notifier that emails the configured recipient through Mailgun.
 *
 * @param config - API key, sending domain and recipient address
 * @param logger - Logger for delivery results
 * @returns A Notifier bound to the Mailgun credentials. Send errors are
 *          logged and returned in the result.
 */
export function createMailgunNotifier(
  config: MailgunConfig,
  logger: Logger,
): Notifier {
  const mailgun = new Mailgun(FormData);
  const mg = mailgun.client({ username: "api", key: config.apiKey });

  return {
    name: "mailgun",
    async notify(feedName: string, title: string): Promise<NotifyResult> {
      try {
        const result = await mg.messages.create(config.domain, {
          from: `podfetch <noreply@${config.domain}>`,
          to: [config.recipient],
          subject: notificationSubject(feedName),
          text: title,
        });

        logger.debug(
          { messageId: result.id, recipient: config.recipient },
          "mailgun notification sent",
        );
        return { success: true };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn(
          { recipient: config.recipient, error: message },
          "mailgun notification failed",
        );
        return { success: false, error: message };
      }
    },
  };
}
