/**
 * Slack Web API adapter
 * Channel join, message posting and member listing. The client's built-in
 * retries are disabled so rate limits surface to the dispatcher's policy.
 */

import { ErrorCode, WebClient, LogLevel as SlackLogLevel, type UsersListResponse } from '@slack/web-api';
import type { DirectoryEntry } from '../types/library';
import { ChatDeliveryError } from '../utils/errors';

export interface ChatClient {
  joinChannel(channel: string): Promise<void>;
  postMessage(channel: string, text: string): Promise<void>;
}

const RATE_LIMIT_CODES = new Set(['ratelimited', 'rate_limited']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function platformErrorName(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'data' in error &&
    typeof error.data === 'object' &&
    error.data !== null &&
    'error' in error.data &&
    typeof error.data.error === 'string'
  ) {
    return error.data.error;
  }
  return undefined;
}

/**
 * Map anything the Slack client throws onto a ChatDeliveryError
 */
export function toChatDeliveryError(error: unknown): ChatDeliveryError {
  if (error instanceof ChatDeliveryError) return error;

  const code = errorCode(error);
  if (code === ErrorCode.RateLimitedError) {
    return new ChatDeliveryError('ratelimited', true, { cause: error });
  }
  if (code === ErrorCode.PlatformError) {
    const name = platformErrorName(error) ?? 'unknown_error';
    return new ChatDeliveryError(name, RATE_LIMIT_CODES.has(name), { cause: error });
  }
  if (code === ErrorCode.HTTPError && typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === 429) {
    return new ChatDeliveryError('ratelimited', true, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ChatDeliveryError(code ? `${code}: ${message}` : message, false, { cause: error });
}

export class SlackChatClient implements ChatClient {
  private readonly client: WebClient;

  constructor(token: string, client?: WebClient) {
    this.client =
      client ??
      new WebClient(token, {
        rejectRateLimitedCalls: true,
        retryConfig: { retries: 0 },
        logLevel: SlackLogLevel.ERROR
      });
  }

  /**
   * Join a public channel; already being a member counts as success
   */
  async joinChannel(channel: string): Promise<void> {
    try {
      await this.client.conversations.join({ channel });
    } catch (error) {
      const mapped = toChatDeliveryError(error);
      if (mapped.slackError === 'already_in_channel') {
        return;
      }
      throw mapped;
    }
  }

  async postMessage(channel: string, text: string): Promise<void> {
    try {
      const response = await this.client.chat.postMessage({ channel, text });
      if (!response.ok) {
        throw new ChatDeliveryError(response.error ?? 'not_ok', RATE_LIMIT_CODES.has(response.error ?? ''));
      }
    } catch (error) {
      throw toChatDeliveryError(error);
    }
  }

  /**
   * Active workspace members that have a normalised display name
   */
  async listMembers(): Promise<DirectoryEntry[]> {
    const entries: DirectoryEntry[] = [];
    let cursor: string | undefined;

    do {
      let response: UsersListResponse;
      try {
        response = await this.client.users.list({ cursor, limit: 200 });
      } catch (error) {
        throw toChatDeliveryError(error);
      }
      for (const member of response.members ?? []) {
        const displayName = member.profile?.display_name_normalized;
        if (!member.deleted && member.id && displayName) {
          entries.push({ displayName, destinationId: member.id });
        }
      }
      cursor = response.response_metadata?.next_cursor || undefined;
    } while (cursor);

    return entries;
  }
}
