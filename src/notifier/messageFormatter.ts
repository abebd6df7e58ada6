/**
 * Message Formatter
 *
 * Pure rendering of a ChangeSet into Slack mrkdwn, plain text and HTML.
 * Only the Slack rendering substitutes @mentions.
 */

import * as cheerio from 'cheerio';
import type { UnmatchedMentionStyle } from '../config/environment';
import type { Author, ChangeSet, Publication, PublicationNote, RenderedMessage } from '../types/library';
import { formatElapsed } from '../utils/dates';
import { substituteMentions, type MentionResolver } from './mentionResolver';

export const NOTE_CHAR_LIMIT = 3000;
export const NO_NOTE = 'No note';
export const AUTHOR_DISPLAY_LIMIT = 8;
export const AUTHOR_EDGE_COUNT = 4;
export const AUTHOR_ELLIPSIS = '...';
export const NO_CHANGES_PHRASE = 'No new publications detected since last post';

export interface FormatOptions {
  resolver: MentionResolver;
  unmatchedMentions?: UnmatchedMentionStyle;
}

export interface RenderedEmail {
  subject: string;
  text: string;
  html: string;
}

export function escapeSlack(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function htmlToText(html: string): string {
  return cheerio.load(html, null, false).root().text();
}

/**
 * Note bodies as plain text: joined by newlines, cut to NOTE_CHAR_LIMIT
 * code points, non-breaking spaces flattened, trailing newlines dropped.
 */
export function renderNotes(notes: PublicationNote[]): string {
  const joined = notes.map(note => htmlToText(note.bodyHtml)).join('\n');
  const combined = Array.from(joined)
    .slice(0, NOTE_CHAR_LIMIT)
    .join('')
    .replace(/&nbsp;/g, ' ')
    .replace(/\u00a0/g, ' ');

  if (!combined.trim()) {
    return NO_NOTE;
  }
  return combined.replace(/\n+$/, '');
}

function authorName(author: Author): string {
  return 'displayName' in author ? author.displayName : `${author.givenName} ${author.familyName}`;
}

export function renderAuthors(authors: Author[]): string {
  const names = authors.map(authorName);
  if (names.length > AUTHOR_DISPLAY_LIMIT) {
    return [...names.slice(0, AUTHOR_EDGE_COUNT), AUTHOR_ELLIPSIS, ...names.slice(-AUTHOR_EDGE_COUNT)].join(', ');
  }
  return names.join(', ');
}

export function renderVenue(publication: Publication): string {
  const itemType = publication.itemType.toLowerCase();
  if (itemType === 'journalarticle') {
    return publication.journalAbbreviation || 'Unknown';
  }
  if (itemType === 'preprint') {
    return 'Preprint';
  }
  return publication.publicationTitle || 'Unknown';
}

/**
 * Explicit URL first, then a DOI link, else none
 */
export function resolveLink(publication: Publication): string | undefined {
  if (publication.url) return publication.url;
  if (publication.doi) return `https://doi.org/${publication.doi}`;
  return undefined;
}

function triggerLabel(change: ChangeSet): string {
  return change.triggerReason === 'NoteDate' ? 'New note on' : 'New publication';
}

function renderChat(change: ChangeSet, notes: string, options: FormatOptions): string {
  const { publication } = change;
  const link = resolveLink(publication);
  const title = escapeSlack(publication.title);
  const titleMarkup = link ? `*<${link}|${title}>*` : `*${title}*`;
  const icon = change.triggerReason === 'NoteDate' ? ':memo:' : ':book:';

  const lines = [`${icon} ${triggerLabel(change)}: ${titleMarkup}`];
  const authors = renderAuthors(publication.authors);
  if (authors) {
    lines.push(escapeSlack(authors));
  }
  lines.push(
    `_${escapeSlack(renderVenue(publication))}_ (${escapeSlack(publication.date ?? 'Date missing')}) | added by: ${escapeSlack(publication.createdBy ?? 'Unknown')}`
  );
  lines.push(`>${substituteMentions(escapeSlack(notes), options.resolver, options.unmatchedMentions)}`.replace(/\n/g, '\n>'));
  if (publication.alternateLink) {
    lines.push(`<${publication.alternateLink}|View in Zotero>`);
  }
  return lines.join('\n');
}

function renderPlain(change: ChangeSet, notes: string): string {
  const { publication } = change;
  const link = resolveLink(publication);
  const lines = [`${triggerLabel(change)}: ${publication.title}`];
  const authors = renderAuthors(publication.authors);
  if (authors) {
    lines.push(authors);
  }
  lines.push(`${renderVenue(publication)} (${publication.date ?? 'Date missing'})`);
  if (link) {
    lines.push(`Link: ${link}`);
  }
  lines.push(`Added by: ${publication.createdBy ?? 'Unknown'}`);
  lines.push(`Notes: ${notes}`);
  if (publication.alternateLink) {
    lines.push(`View in Zotero: ${publication.alternateLink}`);
  }
  return lines.join('\n');
}

function renderHtml(change: ChangeSet, notes: string): string {
  const { publication } = change;
  const link = resolveLink(publication);
  const title = escapeHtml(publication.title);
  const titleMarkup = link ? `<a href="${escapeHtml(link)}">${title}</a>` : title;

  const blocks = [`<div><strong>${escapeHtml(triggerLabel(change))}: ${titleMarkup}</strong></div>`];
  const authors = renderAuthors(publication.authors);
  if (authors) {
    blocks.push(`<div>${escapeHtml(authors)}</div>`);
  }
  blocks.push(
    `<div><em>${escapeHtml(renderVenue(publication))}</em> (${escapeHtml(publication.date ?? 'Date missing')})</div>`,
    `<div>Added by: ${escapeHtml(publication.createdBy ?? 'Unknown')}</div>`,
    `<div>Notes: ${escapeHtml(notes).replace(/\n/g, '<br>')}</div>`
  );
  if (publication.alternateLink) {
    blocks.push(`<div><a href="${escapeHtml(publication.alternateLink)}">View in Zotero</a></div>`);
  }
  return `<div class="publication">\n${blocks.join('\n')}\n</div>`;
}

export function formatChange(change: ChangeSet, options: FormatOptions): RenderedMessage {
  const notes = renderNotes(change.notes);
  return {
    chatText: renderChat(change, notes, options),
    plainText: renderPlain(change, notes),
    htmlFragment: renderHtml(change, notes)
  };
}

export function countPhrase(count: number): string {
  if (count === 0) return NO_CHANGES_PHRASE;
  return count === 1 ? '1 new publication' : `${count} new publications`;
}

function utcClock(date: Date): string {
  return date.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, '');
}

/**
 * Run header: current UTC time, time since the previous watermark, change count
 */
export function renderHeader(input: { now: Date; previousWatermark: Date; changeCount: number }): RenderedMessage {
  const clock = utcClock(input.now);
  const elapsed = formatElapsed(input.previousWatermark, input.now);
  const phrase = countPhrase(input.changeCount);

  return {
    chatText: `:newspaper: *${clock} UTC* (${elapsed} since last post): ${phrase}`,
    plainText: `${clock} UTC (${elapsed} since last post): ${phrase}`,
    htmlFragment: `<div><strong>${clock} UTC</strong> (${elapsed} since last post): ${escapeHtml(phrase)}</div>`
  };
}

/**
 * One aggregated email for a collection's batch
 */
export function renderEmail(collectionId: string, header: RenderedMessage, messages: RenderedMessage[]): RenderedEmail {
  const subject = `[${collectionId}] ${countPhrase(messages.length)}`;
  const text = [header.plainText, ...messages.map(message => message.plainText)].join('\n\n---\n\n');
  const html = [
    '<html><body>',
    header.htmlFragment,
    ...messages.map(message => `<hr>\n${message.htmlFragment}`),
    '</body></html>'
  ].join('\n');
  return { subject, text, html };
}
