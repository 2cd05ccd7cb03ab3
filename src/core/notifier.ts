import { formatError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Events handed to collaborators outside this package:
 * - plugins:reinitialize: the active source changed, drop state derived from the old one
 * - assets:rescan:        a relocation changed what is on disk
 */
export type NotifyEvent = 'plugins:reinitialize' | 'assets:rescan';

export interface Notifier {
  notify(event: NotifyEvent): void;
}

export const noopNotifier: Notifier = {
  notify: () => {},
};

/** Keeps every event it receives, in order. */
export class RecordingNotifier implements Notifier {
  readonly events: NotifyEvent[] = [];

  notify(event: NotifyEvent): void {
    this.events.push(event);
  }
}

/** Notifier for the CLI, which has no plugin host: the event is only logged. */
export class LoggingNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  notify(event: NotifyEvent): void {
    this.logger.verbose(`notify: ${event}`);
  }
}

/** Fire-and-forget delivery. A failing collaborator is logged, never rethrown. */
export function deliver(notifier: Notifier, event: NotifyEvent, logger: Logger): void {
  try {
    notifier.notify(event);
  } catch (err) {
    logger.warn(`Notification "${event}" failed: ${formatError(err)}`);
  }
}
