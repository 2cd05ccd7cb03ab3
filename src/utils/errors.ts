export type ErrorCode = 'CONFIG_PARSE' | 'CONFIG_INVALID' | 'SOURCE_REQUEST';

/** Base class for errors the CLI knows how to report. */
export class SourcegateError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SourcegateError';
  }
}

/** The persisted config file exists but could not be parsed or validated. */
export class ConfigParseError extends SourcegateError {
  constructor(
    public readonly filePath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to parse ${filePath}: ${detail}`, 'CONFIG_PARSE', options);
    this.name = 'ConfigParseError';
  }
}

/** A setter was asked to break a Configuration invariant. */
export class ConfigurationError extends SourcegateError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigurationError';
  }
}

/** A remote package source answered with a non-success status. */
export class SourceRequestError extends SourcegateError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    statusText: string,
  ) {
    super(`Request to ${url} failed: ${status} ${statusText}`.trim(), 'SOURCE_REQUEST');
    this.name = 'SourceRequestError';
  }
}

/** Flatten any thrown value into a single printable line. */
export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
