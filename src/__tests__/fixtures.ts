/**
 * Shared builders and in-process fakes for notifier tests
 */

import type { BibliographicSource } from '../adapters/zotero';
import type { ChatClient } from '../adapters/slack';
import type { MailMessage, MailSendResult, MailTransport } from '../adapters/smtp';
import type { Publication, PublicationNote } from '../types/library';

export function makePublication(overrides: Partial<Publication> = {}): Publication {
  return {
    id: 'ITEM0001',
    title: 'Learning Sparse Codes',
    authors: [{ givenName: 'Ada', familyName: 'Lovelace' }],
    itemType: 'journalArticle',
    journalAbbreviation: 'J. Test. Res.',
    date: '2024-03-01',
    createdBy: 'alice',
    dateAdded: '2024-05-01T10:00:00Z',
    dateModified: '2024-05-01T10:00:00Z',
    ...overrides
  };
}

export function makeNote(overrides: Partial<PublicationNote> = {}): PublicationNote {
  return {
    id: 'NOTE0001',
    parentId: 'ITEM0001',
    bodyHtml: '<p>Worth a read</p>',
    dateAdded: '2024-05-01T10:00:00Z',
    dateModified: '2024-05-01T10:00:00Z',
    ...overrides
  };
}

export class FakeSource implements BibliographicSource {
  readonly noteRequests: string[] = [];

  constructor(
    private readonly itemsByCollection: Record<string, Publication[]>,
    private readonly notesByItem: Record<string, PublicationNote[]> = {}
  ) {}

  async listTopItems(collectionId: string): Promise<Publication[]> {
    return this.itemsByCollection[collectionId] ?? [];
  }

  async listNotes(itemId: string): Promise<PublicationNote[]> {
    this.noteRequests.push(itemId);
    return this.notesByItem[itemId] ?? [];
  }
}

type PostBehaviour = (channel: string, text: string, call: number) => void;

export class FakeChatClient implements ChatClient {
  readonly joined: string[] = [];
  readonly posted: { channel: string; text: string }[] = [];
  postCalls = 0;

  constructor(
    private readonly onPost: PostBehaviour = () => undefined,
    private readonly onJoin: (channel: string) => void = () => undefined
  ) {}

  async joinChannel(channel: string): Promise<void> {
    this.onJoin(channel);
    this.joined.push(channel);
  }

  async postMessage(channel: string, text: string): Promise<void> {
    this.postCalls++;
    this.onPost(channel, text, this.postCalls);
    this.posted.push({ channel, text });
  }
}

export class FakeMailTransport implements MailTransport {
  readonly sent: MailMessage[] = [];
  closed = false;

  constructor(private readonly onSend: (message: MailMessage) => MailSendResult = message => ({
    accepted: [message.to],
    rejected: []
  })) {}

  async send(message: MailMessage): Promise<MailSendResult> {
    const result = this.onSend(message);
    this.sent.push(message);
    return result;
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * JSON response as returned by fetch, with optional headers
 */
export function jsonResponse(data: unknown, init: { status?: number; headers?: Record<string, string> } = {}): Response {
  return new Response(JSON.stringify(data), {
    status: init.status ?? 200,
    headers: { 'Content-Type': 'application/json', ...init.headers }
  });
}
