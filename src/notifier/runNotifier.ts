/**
 * Notifier pipeline driver
 *
 * For every state row, in file order:
 * 1. Detects publications changed since the row's watermark
 * 2. Renders each change for Slack, plain text and HTML
 * 3. Delivers the header and batch through the dispatcher
 * 4. Advances the watermark to the newest date among attempted changes
 *
 * The state file is written once after the last row, and never on a dry run.
 * Detection errors abort the run before anything is written.
 */

import type { BibliographicSource } from '../adapters/zotero';
import type { UnmatchedMentionStyle } from '../config/environment';
import type { WatermarkRow } from '../types/library';
import { formatTimestamp, maxDate } from '../utils/dates';
import { Logger } from '../utils/logger';
import { detectChanges } from './changeDetector';
import type { Dispatcher } from './deliveryDispatcher';
import { formatChange, renderHeader } from './messageFormatter';
import type { MentionResolver } from './mentionResolver';
import type { WatermarkStore } from './watermarkStore';

export interface NotifierStats {
  rowsProcessed: number;
  changedItems: number;
  posted: number;
  failures: number;
  emailsSent: number;
  emailFailures: number;
  startTime: number;
  endTime?: number;
}

export interface NotifierResult {
  success: boolean;
  dryRun: boolean;
  stateUpdated: boolean;
  stats: NotifierStats;
  rows: WatermarkRow[];
  duration: number;
}

export interface NotifierDependencies {
  store: Pick<WatermarkStore, 'load' | 'save'>;
  source: BibliographicSource;
  dispatcher: Dispatcher;
  resolver: MentionResolver;
  logger?: Logger;
  dryRun?: boolean;
  unmatchedMentions?: UnmatchedMentionStyle;
  noteFetchDelayMs?: number;
  now?: () => Date;
}

/**
 * New watermark for a row: the newest triggering date if it is later than
 * the stored one, otherwise the stored value unchanged.
 * Stored watermarks have second precision, so a fractional second rounds up.
 */
export function advanceWatermark(row: WatermarkRow, triggeringDates: Date[]): WatermarkRow {
  const latest = maxDate(triggeringDates);
  if (!latest || latest.getTime() <= row.lastProcessedAt.getTime()) {
    return row;
  }
  const advanced = new Date(Math.ceil(latest.getTime() / 1000) * 1000);
  return { ...row, lastProcessed: formatTimestamp(advanced), lastProcessedAt: advanced };
}

export async function runNotifier(deps: NotifierDependencies): Promise<NotifierResult> {
  const logger = deps.logger ?? new Logger('error');
  const now = deps.now ?? (() => new Date());
  const dryRun = deps.dryRun ?? false;

  const stats: NotifierStats = {
    rowsProcessed: 0,
    changedItems: 0,
    posted: 0,
    failures: 0,
    emailsSent: 0,
    emailFailures: 0,
    startTime: Date.now()
  };

  const rows = await deps.store.load();
  logger.info(`Loaded ${rows.length} collections from state file`);

  const updatedRows: WatermarkRow[] = [];
  for (const row of rows) {
    const rowLogger = logger.child(row.collectionId);
    rowLogger.info(`Processing collection for channel '${row.channel}' since ${row.lastProcessed}`);

    const changes = await detectChanges(deps.source, row.collectionId, row.lastProcessedAt, {
      logger: rowLogger,
      noteFetchDelayMs: deps.noteFetchDelayMs
    });
    stats.changedItems += changes.length;

    const messages = changes.map(change =>
      formatChange(change, { resolver: deps.resolver, unmatchedMentions: deps.unmatchedMentions })
    );
    const header = renderHeader({
      now: now(),
      previousWatermark: row.lastProcessedAt,
      changeCount: changes.length
    });

    const report = await deps.dispatcher.deliver({
      collectionId: row.collectionId,
      channel: row.channel,
      header,
      messages
    });
    stats.posted += report.chat.succeeded;
    stats.failures += report.chat.failed;
    stats.emailsSent += report.email.succeeded;
    stats.emailFailures += report.email.failed;

    // Advanced for every attempted change, delivered or not
    const updated = advanceWatermark(row, changes.map(change => change.triggeringDate));
    if (updated.lastProcessed !== row.lastProcessed) {
      rowLogger.info(`Watermark advanced from ${row.lastProcessed} to ${updated.lastProcessed}`);
    }
    updatedRows.push(updated);
    stats.rowsProcessed++;
  }

  logger.info(`Total publications posted: ${stats.posted}, Failures: ${stats.failures}`);

  let stateUpdated = false;
  if (dryRun) {
    logger.info('Dry run enabled; state file not updated');
  } else {
    await deps.store.save(updatedRows);
    stateUpdated = true;
    logger.info('State file updated successfully');
  }

  stats.endTime = Date.now();
  return {
    success: true,
    dryRun,
    stateUpdated,
    stats,
    rows: updatedRows,
    duration: stats.endTime - stats.startTime
  };
}
