// Directory of chat identities used for @mention substitution
// Loaded from a published spreadsheet (CSV over HTTP) or from Slack's member list
import { parse } from 'csv-parse/sync';
import type { DirectoryEntry } from '../types/library';
import { ConfigurationError, SourceFetchError } from '../utils/errors';
import type { SlackChatClient } from './slack';

export interface DirectorySource {
  load(): Promise<DirectoryEntry[]>;
}

const DISPLAY_NAME_COLUMN = 'display name';
const ID_COLUMN = 'id';

/**
 * Parse directory CSV text with "display name" and "id" columns
 * (header matching ignores case and surrounding whitespace)
 */
export function parseDirectoryCsv(csvText: string): DirectoryEntry[] {
  const rows: string[][] = parse(csvText, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  });

  if (rows.length === 0) {
    throw new ConfigurationError('Directory sheet is empty');
  }

  const header = rows[0].map(column => column.trim().toLowerCase());
  const nameIndex = header.indexOf(DISPLAY_NAME_COLUMN);
  const idIndex = header.indexOf(ID_COLUMN);
  const missing = [
    nameIndex < 0 ? DISPLAY_NAME_COLUMN : undefined,
    idIndex < 0 ? ID_COLUMN : undefined
  ].filter((column): column is string => column !== undefined);

  if (missing.length > 0) {
    throw new ConfigurationError('Directory sheet is missing required columns', missing);
  }

  const entries: DirectoryEntry[] = [];
  for (const row of rows.slice(1)) {
    const displayName = (row[nameIndex] ?? '').trim();
    const destinationId = (row[idIndex] ?? '').trim();
    if (displayName && destinationId) {
      entries.push({ displayName, destinationId });
    }
  }
  return entries;
}

export class CsvDirectorySource implements DirectorySource {
  constructor(private readonly url: string) {}

  async load(): Promise<DirectoryEntry[]> {
    let response: Response;
    try {
      response = await fetch(this.url, { headers: { Accept: 'text/csv' } });
    } catch (error) {
      throw new SourceFetchError(`Directory request to ${this.url} failed`, undefined, { cause: error });
    }

    if (!response.ok) {
      throw new SourceFetchError(`HTTP ${response.status}: ${response.statusText} for directory sheet`, response.status);
    }

    return parseDirectoryCsv(await response.text());
  }
}

export class SlackDirectorySource implements DirectorySource {
  constructor(private readonly slack: Pick<SlackChatClient, 'listMembers'>) {}

  load(): Promise<DirectoryEntry[]> {
    return this.slack.listMembers();
  }
}

export class StaticDirectorySource implements DirectorySource {
  constructor(private readonly entries: DirectoryEntry[]) {}

  async load(): Promise<DirectoryEntry[]> {
    return this.entries;
  }
}
