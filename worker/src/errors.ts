/**
 * Error types raised while decoding and evaluating Push Port messages
 */

/** The message body is not gzip-compressed XML we can read. */
export class MalformedPayloadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedPayloadError";
  }
}

/** A non-empty time-of-day string matched neither `HH:MM` nor `HH:MM:SS`. */
export class TimeFormatError extends Error {
  readonly value: string;

  constructor(value: string, options?: { cause?: unknown }) {
    super(`Invalid time of day: "${value}"`, options);
    this.name = "TimeFormatError";
    this.value = value;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
