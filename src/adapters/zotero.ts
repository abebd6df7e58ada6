// Zotero Web API v3 adapter
// Lists top-level items of a collection and the child items of an item
import { z } from 'zod';
import type { Author, Publication, PublicationNote } from '../types/library';
import { SourceFetchError } from '../utils/errors';

const ZOTERO_API_BASE = 'https://api.zotero.org';

export interface BibliographicSource {
  listTopItems(collectionId: string): Promise<Publication[]>;
  listNotes(itemId: string): Promise<PublicationNote[]>;
}

export interface ZoteroSourceOptions {
  apiKey: string;
  libraryId: string;
  libraryType: 'group' | 'user';
  pageSize?: number;
  baseUrl?: string;
}

const creatorSchema = z
  .object({
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    name: z.string().optional()
  })
  .passthrough();

const itemSchema = z
  .object({
    key: z.string(),
    links: z
      .object({
        alternate: z.object({ href: z.string() }).partial().optional()
      })
      .partial()
      .optional(),
    meta: z
      .object({
        createdByUser: z.object({ username: z.string() }).partial().optional()
      })
      .partial()
      .optional(),
    data: z
      .object({
        key: z.string().optional(),
        itemType: z.string().default(''),
        title: z.string().optional(),
        creators: z.array(creatorSchema).optional(),
        date: z.string().optional(),
        url: z.string().optional(),
        DOI: z.string().optional(),
        journalAbbreviation: z.string().optional(),
        publicationTitle: z.string().optional(),
        parentItem: z.union([z.string(), z.literal(false)]).optional(),
        note: z.string().optional(),
        contentType: z.string().optional(),
        filename: z.string().optional(),
        dateAdded: z.string().optional(),
        dateModified: z.string().optional()
      })
      .passthrough()
  })
  .passthrough();

const itemListSchema = z.array(itemSchema);

export type ZoteroItem = z.infer<typeof itemSchema>;

export interface ZoteroChild {
  id: string;
  itemType: string;
  title?: string;
  contentType?: string;
  filename?: string;
  dateAdded?: string;
  dateModified?: string;
}

function emptyToUndefined(value?: string): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function normalizeAuthors(creators: ZoteroItem['data']['creators']): Author[] {
  const authors: Author[] = [];
  for (const creator of creators ?? []) {
    if (creator.firstName && creator.lastName) {
      authors.push({ givenName: creator.firstName, familyName: creator.lastName });
    } else if (creator.name) {
      authors.push({ displayName: creator.name });
    } else if (creator.lastName) {
      authors.push({ displayName: creator.lastName });
    }
  }
  return authors;
}

export function toPublication(item: ZoteroItem): Publication {
  const { data } = item;
  return {
    id: item.key,
    title: data.title?.trim() || 'Title missing',
    authors: normalizeAuthors(data.creators),
    itemType: data.itemType,
    journalAbbreviation: emptyToUndefined(data.journalAbbreviation),
    publicationTitle: emptyToUndefined(data.publicationTitle),
    date: emptyToUndefined(data.date),
    url: emptyToUndefined(data.url),
    doi: emptyToUndefined(data.DOI),
    createdBy: emptyToUndefined(item.meta?.createdByUser?.username),
    alternateLink: emptyToUndefined(item.links?.alternate?.href),
    dateAdded: emptyToUndefined(data.dateAdded),
    dateModified: emptyToUndefined(data.dateModified)
  };
}

export function toNote(item: ZoteroItem, parentId: string): PublicationNote {
  return {
    id: item.key,
    parentId: item.data.parentItem || parentId,
    bodyHtml: item.data.note ?? '',
    dateAdded: emptyToUndefined(item.data.dateAdded),
    dateModified: emptyToUndefined(item.data.dateModified)
  };
}

/**
 * Extract the rel="next" target from a Link header, if any
 */
export function parseNextLink(linkHeader: string | null): string | undefined {
  if (!linkHeader) return undefined;
  for (const part of linkHeader.split(',')) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?next"?/);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

export class ZoteroSource implements BibliographicSource {
  private readonly libraryPrefix: string;
  private readonly pageSize: number;
  private readonly baseUrl: string;

  constructor(private readonly options: ZoteroSourceOptions) {
    this.baseUrl = options.baseUrl ?? ZOTERO_API_BASE;
    this.libraryPrefix = `/${options.libraryType === 'group' ? 'groups' : 'users'}/${encodeURIComponent(options.libraryId)}`;
    this.pageSize = options.pageSize ?? 100;
  }

  /**
   * Top-level items of a collection, newest addition first, across all pages
   */
  async listTopItems(collectionId: string): Promise<Publication[]> {
    const path = `${this.libraryPrefix}/collections/${encodeURIComponent(collectionId)}/items/top`;
    const items = await this.fetchAllPages(path, {
      sort: 'dateAdded',
      direction: 'desc',
      limit: String(this.pageSize)
    });
    return items.map(toPublication);
  }

  /**
   * Child notes of an item; attachments are dropped
   */
  async listNotes(itemId: string): Promise<PublicationNote[]> {
    const children = await this.fetchChildren(itemId);
    return children.filter(child => child.data.itemType === 'note').map(child => toNote(child, itemId));
  }

  /**
   * Newest items of a collection or of the whole library, single page
   */
  async listItems(options: { collectionId?: string; limit: number }): Promise<Publication[]> {
    const path = options.collectionId
      ? `${this.libraryPrefix}/collections/${encodeURIComponent(options.collectionId)}/items/top`
      : `${this.libraryPrefix}/items/top`;
    const { items } = await this.fetchPage(
      this.buildUrl(path, { sort: 'dateAdded', direction: 'desc', limit: String(options.limit) })
    );
    return items.map(toPublication);
  }

  /**
   * All child items (notes and attachments) with their type
   */
  async listChildren(itemId: string): Promise<ZoteroChild[]> {
    const children = await this.fetchChildren(itemId);
    return children.map(child => ({
      id: child.key,
      itemType: child.data.itemType,
      title: child.data.title,
      contentType: child.data.contentType,
      filename: child.data.filename,
      dateAdded: child.data.dateAdded,
      dateModified: child.data.dateModified
    }));
  }

  private fetchChildren(itemId: string): Promise<ZoteroItem[]> {
    return this.fetchAllPages(`${this.libraryPrefix}/items/${encodeURIComponent(itemId)}/children`, {});
  }

  private buildUrl(path: string, query: Record<string, string>): string {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async fetchAllPages(path: string, query: Record<string, string>): Promise<ZoteroItem[]> {
    const all: ZoteroItem[] = [];
    let next: string | undefined = this.buildUrl(path, query);

    while (next) {
      const page: { items: ZoteroItem[]; next?: string } = await this.fetchPage(next);
      all.push(...page.items);
      next = page.items.length > 0 ? page.next : undefined;
    }

    return all;
  }

  private async fetchPage(url: string): Promise<{ items: ZoteroItem[]; next?: string }> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'Zotero-API-Key': this.options.apiKey,
          'Zotero-API-Version': '3',
          Accept: 'application/json'
        }
      });
    } catch (error) {
      throw new SourceFetchError(`Request to ${url} failed`, undefined, { cause: error });
    }

    if (!response.ok) {
      throw new SourceFetchError(`HTTP ${response.status}: ${response.statusText} for ${url}`, response.status);
    }

    const parsed = itemListSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SourceFetchError(`Unexpected response shape from ${url}: ${parsed.error.message}`, response.status);
    }

    return { items: parsed.data, next: parseNextLink(response.headers.get('link')) };
  }
}
