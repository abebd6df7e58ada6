/**
 * Delivery Dispatcher
 *
 * Sends one collection's header and rendered messages to its Slack channel
 * and, when recipients are configured, as one email per recipient.
 * A failed message is counted, never thrown; only an SMTP transport
 * failure under the "abort" policy escapes.
 */

import type { ChatClient } from '../adapters/slack';
import type { MailTransport } from '../adapters/smtp';
import type { EmailFailurePolicy } from '../config/environment';
import type { RenderedMessage } from '../types/library';
import { EmailTransportError, isRateLimited, toError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { executeWithPolicy, sleep, type RetryAttempt } from '../utils/retry';
import { renderEmail } from './messageFormatter';

export interface DeliveryBatch {
  collectionId: string;
  channel: string;
  header: RenderedMessage;
  messages: RenderedMessage[];
}

export interface DeliveryCounts {
  succeeded: number;
  failed: number;
}

export interface DeliveryReport {
  chat: DeliveryCounts;
  email: DeliveryCounts;
}

export interface Dispatcher {
  deliver(batch: DeliveryBatch): Promise<DeliveryReport>;
}

export interface DispatcherOptions {
  chat?: ChatClient;
  mail?: MailTransport;
  emailRecipients?: string[];
  emailFailurePolicy?: EmailFailurePolicy;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  postDelayMs: number;
  logger?: Logger;
  onRetry?: (info: RetryAttempt) => void;
}

function emptyReport(): DeliveryReport {
  return { chat: { succeeded: 0, failed: 0 }, email: { succeeded: 0, failed: 0 } };
}

export class LiveDispatcher implements Dispatcher {
  private readonly logger: Logger;

  constructor(private readonly options: DispatcherOptions) {
    this.logger = options.logger ?? new Logger('error');
  }

  async deliver(batch: DeliveryBatch): Promise<DeliveryReport> {
    const report = emptyReport();

    if (this.options.chat && batch.channel) {
      report.chat = await this.deliverToChannel(this.options.chat, batch);
    } else if (this.options.chat) {
      this.logger.warn(`No channel configured for collection ${batch.collectionId}; skipping Slack`);
    }

    const recipients = this.options.emailRecipients ?? [];
    if (this.options.mail && recipients.length > 0 && batch.messages.length > 0) {
      report.email = await this.deliverByEmail(this.options.mail, recipients, batch);
    }

    return report;
  }

  private withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return executeWithPolicy(fn, {
      maxAttempts: this.options.retryMaxAttempts,
      baseDelayMs: this.options.retryBaseDelayMs,
      isRetryable: isRateLimited,
      onRetry: info => {
        this.logger.warn(`Rate limited on ${label}; retry ${info.attempt} in ${info.delayMs}ms`);
        this.options.onRetry?.(info);
      }
    });
  }

  private async deliverToChannel(chat: ChatClient, batch: DeliveryBatch): Promise<DeliveryCounts> {
    const counts: DeliveryCounts = { succeeded: 0, failed: 0 };
    const { channel } = batch;

    try {
      await this.withRetry(`join ${channel}`, () => chat.joinChannel(channel));
      this.logger.info(`Joined channel ${channel}`);
    } catch (error) {
      // Private channels cannot be joined; the bot may already have been invited
      this.logger.warn(`Could not join channel ${channel}, posting anyway`, toError(error).message);
    }

    try {
      await this.withRetry(`header to ${channel}`, () => chat.postMessage(channel, batch.header.chatText));
    } catch (error) {
      this.logger.error(`Failed to post header to ${channel}`, toError(error));
    }

    for (const message of batch.messages) {
      await sleep(this.options.postDelayMs);
      try {
        await this.withRetry(`message to ${channel}`, () => chat.postMessage(channel, message.chatText));
        counts.succeeded++;
        this.logger.info(`Posted publication to ${channel}`);
      } catch (error) {
        counts.failed++;
        this.logger.error(`Failed to post publication to ${channel}`, toError(error));
      }
    }

    return counts;
  }

  private async deliverByEmail(
    mail: MailTransport,
    recipients: string[],
    batch: DeliveryBatch
  ): Promise<DeliveryCounts> {
    const counts: DeliveryCounts = { succeeded: 0, failed: 0 };
    const email = renderEmail(batch.collectionId, batch.header, batch.messages);

    for (const recipient of recipients) {
      try {
        const result = await mail.send({ to: recipient, ...email });
        if (result.rejected.length > 0) {
          counts.failed++;
          this.logger.error(`Email to ${recipient} was rejected by the server`);
        } else {
          counts.succeeded++;
          this.logger.info(`Sent email digest to ${recipient}`);
        }
      } catch (error) {
        const failure = new EmailTransportError(recipient, { cause: error });
        if ((this.options.emailFailurePolicy ?? 'abort') === 'abort') {
          throw failure;
        }
        counts.failed++;
        this.logger.error(failure.message, toError(error));
      }
    }

    return counts;
  }
}

/**
 * Logs what would be delivered and reports every message as sent
 */
export class DryRunDispatcher implements Dispatcher {
  private readonly logger: Logger;

  constructor(logger?: Logger, private readonly emailRecipients: string[] = []) {
    this.logger = logger ?? new Logger('error');
  }

  async deliver(batch: DeliveryBatch): Promise<DeliveryReport> {
    const report = emptyReport();

    this.logger.info(`Dry run - header for ${batch.channel || '(no channel)'}:\n${batch.header.chatText}`);
    for (const message of batch.messages) {
      this.logger.info(`Dry run - formatted publication:\n${message.chatText}`);
      report.chat.succeeded++;
    }

    if (this.emailRecipients.length > 0 && batch.messages.length > 0) {
      const email = renderEmail(batch.collectionId, batch.header, batch.messages);
      for (const recipient of this.emailRecipients) {
        this.logger.info(`Dry run - email "${email.subject}" to ${recipient}`);
        report.email.succeeded++;
      }
    }

    return report;
  }
}
