/**
 * Change Detector
 *
 * Decides which publications of a collection changed since the watermark.
 * A publication qualifies through its own dates (RecordDate) or, failing
 * that, through any child note edited after the watermark (NoteDate).
 * Source errors propagate; bad dates on a single publication or note only
 * exclude that publication.
 */

import type { BibliographicSource } from '../adapters/zotero';
import type { ChangeSet, Publication, PublicationNote } from '../types/library';
import { formatTimestamp, maxDate, parseTimestamp } from '../utils/dates';
import { Logger } from '../utils/logger';
import { sleep } from '../utils/retry';

export interface DetectOptions {
  noteFetchDelayMs?: number;
  logger?: Logger;
}

class UnparsableDateError extends Error {
  constructor(public readonly field: string, public readonly value: string) {
    super(`Unparsable ${field} '${value}'`);
    this.name = 'UnparsableDateError';
  }
}

/**
 * Latest of dateModified and dateAdded. Returns undefined when neither is set.
 */
function latestOwnDate(entity: { dateAdded?: string; dateModified?: string }): Date | undefined {
  const dates: Date[] = [];
  for (const [field, value] of [
    ['dateModified', entity.dateModified],
    ['dateAdded', entity.dateAdded]
  ] as const) {
    if (value === undefined) continue;
    const parsed = parseTimestamp(value);
    if (!parsed) {
      throw new UnparsableDateError(field, value);
    }
    dates.push(parsed);
  }
  return maxDate(dates);
}

/**
 * Pure classification of one publication against the watermark
 */
export function classifyChange(
  publication: Publication,
  notes: PublicationNote[],
  watermark: Date
): ChangeSet | null {
  const ownDate = latestOwnDate(publication);
  if (!ownDate) {
    throw new UnparsableDateError('dateModified/dateAdded', 'missing');
  }

  const noteDates: Date[] = [];
  for (const note of notes) {
    const noteDate = latestOwnDate(note);
    if (noteDate && noteDate.getTime() > watermark.getTime()) {
      noteDates.push(noteDate);
    }
  }
  const latestNote = maxDate(noteDates);

  if (ownDate.getTime() > watermark.getTime()) {
    return {
      publication,
      notes,
      triggerReason: 'RecordDate',
      triggeringDate: latestNote && latestNote.getTime() > ownDate.getTime() ? latestNote : ownDate
    };
  }

  if (latestNote) {
    return {
      publication,
      notes,
      triggerReason: 'NoteDate',
      triggeringDate: latestNote
    };
  }

  return null;
}

export async function detectChanges(
  source: BibliographicSource,
  collectionId: string,
  watermark: Date,
  options: DetectOptions = {}
): Promise<ChangeSet[]> {
  const logger = options.logger ?? new Logger('error');
  const publications = await source.listTopItems(collectionId);
  logger.debug(`Fetched ${publications.length} top-level items from collection ${collectionId}`);

  const changes: ChangeSet[] = [];
  for (const publication of publications) {
    const notes = await source.listNotes(publication.id);
    await sleep(options.noteFetchDelayMs ?? 0);

    try {
      const change = classifyChange(publication, notes, watermark);
      if (change) {
        logger.debug(
          `Changed: ${publication.id} (${change.triggerReason} at ${formatTimestamp(change.triggeringDate)})`
        );
        changes.push(change);
      }
    } catch (error) {
      if (error instanceof UnparsableDateError) {
        logger.error(`Skipping item ${publication.id} "${publication.title}": ${error.message}`);
        continue;
      }
      throw error;
    }
  }

  logger.info(
    `Detected ${changes.length} changed items in collection ${collectionId} since ${formatTimestamp(watermark)}`
  );
  return changes;
}
