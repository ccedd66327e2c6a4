/**
 * Discriminated union result type for a single notification attempt.
 */
export type NotifyResult =
  | { readonly success: true }
  | { readonly success: false; readonly error: string };

/**
 * Something that announces a finished download. Never throws; failures are
 * returned in the result.
 */
export type Notifier = {
  readonly name: string;
  readonly notify: (feedName: string, title: string) => Promise<NotifyResult>;
};

export function notificationSubject(feedName: string): string {
  return `New item from ${feedName}`;
}
