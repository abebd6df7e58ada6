/**
 * Watermark Store
 *
 * Reads and writes the CSV state file mapping each collection to its last
 * processed timestamp and Slack channel. Columns other than the three
 * required ones are carried through untouched, in their original order.
 */

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { WatermarkRow } from '../types/library';
import { parseTimestamp } from '../utils/dates';
import { ConfigurationError } from '../utils/errors';

export const STATE_COLUMNS = {
  collectionId: 'subcollectionID',
  lastProcessed: 'lastDate',
  channel: 'channel'
} as const;

interface StateTable {
  header: string[];
  rows: string[][];
}

export class WatermarkStore {
  private table: StateTable | null = null;

  constructor(private readonly filePath: string) {}

  /**
   * Load and validate every row. Any missing column or unparsable
   * lastDate is a configuration error; nothing has been processed yet.
   */
  async load(): Promise<WatermarkRow[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to read state file '${this.filePath}'`, [reason]);
    }

    const records: string[][] = parse(content, { bom: true, skip_empty_lines: true });
    if (records.length === 0) {
      throw new ConfigurationError(`State file '${this.filePath}' is empty`);
    }

    const [header, ...rows] = records;
    const missing = Object.values(STATE_COLUMNS).filter(column => !header.includes(column));
    if (missing.length > 0) {
      throw new ConfigurationError('State file is missing required columns', missing);
    }

    const idIndex = header.indexOf(STATE_COLUMNS.collectionId);
    const dateIndex = header.indexOf(STATE_COLUMNS.lastProcessed);
    const channelIndex = header.indexOf(STATE_COLUMNS.channel);

    const watermarks = rows.map((row, index): WatermarkRow => {
      const lastProcessed = (row[dateIndex] ?? '').trim();
      const lastProcessedAt = parseTimestamp(lastProcessed);
      if (!lastProcessedAt) {
        throw new ConfigurationError(
          `Invalid ISO date for ${STATE_COLUMNS.lastProcessed} on state row ${index + 1}: '${lastProcessed}'`
        );
      }
      return {
        collectionId: (row[idIndex] ?? '').trim(),
        lastProcessed,
        lastProcessedAt,
        channel: (row[channelIndex] ?? '').trim()
      };
    });

    this.table = { header, rows };
    return watermarks;
  }

  /**
   * Rewrite the whole file once. The new content goes to a temporary file
   * beside the target and is renamed over it.
   */
  async save(watermarks: WatermarkRow[]): Promise<void> {
    if (!this.table) {
      throw new Error('WatermarkStore.save() called before load()');
    }
    if (watermarks.length !== this.table.rows.length) {
      throw new Error(`Expected ${this.table.rows.length} state rows, got ${watermarks.length}`);
    }

    const { header, rows } = this.table;
    const dateIndex = header.indexOf(STATE_COLUMNS.lastProcessed);
    const updatedRows = rows.map((row, index) => {
      const copy = [...row];
      copy[dateIndex] = watermarks[index].lastProcessed;
      return copy;
    });

    const output = stringify([header, ...updatedRows]);
    const tempPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${process.pid}.tmp`
    );

    await fs.promises.writeFile(tempPath, output, 'utf8');
    try {
      await fs.promises.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }

    this.table = { header, rows: updatedRows };
  }
}
