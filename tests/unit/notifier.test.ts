import { describe, it, expect } from 'vitest';
import { LoggingNotifier, RecordingNotifier, deliver, type Notifier } from '../../src/core/notifier.js';
import type { Logger } from '../../src/utils/logger.js';

function recordingLogger(): Logger & { warnings: string[]; verboseLines: string[] } {
  const warnings: string[] = [];
  const verboseLines: string[] = [];
  return {
    warnings,
    verboseLines,
    info: () => {},
    success: () => {},
    warn: (message) => warnings.push(message),
    error: () => {},
    verbose: (message) => verboseLines.push(message),
  };
}

describe('deliver', () => {
  it('hands the event to the notifier', () => {
    const notifier = new RecordingNotifier();
    deliver(notifier, 'assets:rescan', recordingLogger());
    expect(notifier.events).toEqual(['assets:rescan']);
  });

  it('logs a throwing notifier as a warning instead of rethrowing', () => {
    const logger = recordingLogger();
    const failing: Notifier = {
      notify: () => {
        throw new Error('plugin host crashed');
      },
    };

    expect(() => deliver(failing, 'plugins:reinitialize', logger)).not.toThrow();
    expect(logger.warnings).toEqual(['Notification "plugins:reinitialize" failed: plugin host crashed']);
  });
});

describe('LoggingNotifier', () => {
  it('writes each event as a verbose line', () => {
    const logger = recordingLogger();
    new LoggingNotifier(logger).notify('assets:rescan');
    expect(logger.verboseLines).toEqual(['notify: assets:rescan']);
  });
});
