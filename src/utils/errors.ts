/**
 * Error classes for the notifier
 *
 * - ConfigurationError: missing inputs, bad state file, invalid environment
 * - SourceFetchError: the library API could not be read (fatal for the run)
 * - ChatDeliveryError: a Slack call failed; rateLimited marks it retryable
 * - EmailTransportError: the SMTP session failed
 */

export class ConfigurationError extends Error {
  public readonly code = 'CONFIGURATION';

  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class SourceFetchError extends Error {
  public readonly code = 'SOURCE_FETCH';

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SourceFetchError';
    Object.setPrototypeOf(this, SourceFetchError.prototype);
  }
}

export class ChatDeliveryError extends Error {
  public readonly code = 'CHAT_DELIVERY';

  constructor(
    public readonly slackError: string,
    public readonly rateLimited: boolean,
    options?: { cause?: unknown }
  ) {
    super(`Slack call failed: ${slackError}`, options);
    this.name = 'ChatDeliveryError';
    Object.setPrototypeOf(this, ChatDeliveryError.prototype);
  }
}

export class EmailTransportError extends Error {
  public readonly code = 'EMAIL_TRANSPORT';

  constructor(
    public readonly recipient: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : 'unknown error';
    super(`Email delivery to ${recipient} failed: ${reason}`, options);
    this.name = 'EmailTransportError';
    Object.setPrototypeOf(this, EmailTransportError.prototype);
  }
}

/**
 * Normalise anything thrown into an Error for logging
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function isRateLimited(error: unknown): boolean {
  return error instanceof ChatDeliveryError && error.rateLimited;
}
