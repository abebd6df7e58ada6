#!/usr/bin/env tsx

/**
 * Read-only inspection of a Zotero library
 * Lists the newest items of a collection (or of the whole library) with
 * their dates, creators and child counts, or looks up an exact title.
 */

import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.join(process.cwd(), '.env.local') });
dotenv.config({ path: path.join(process.cwd(), '.env') });

import { Command } from 'commander';
import { ZoteroSource } from '../../src/adapters/zotero';
import { loadEnvironmentConfig } from '../../src/config/environment';
import { renderAuthors } from '../../src/notifier/messageFormatter';

interface InspectOptions {
  collection?: string;
  limit: string;
  title?: string;
}

async function inspectCollection() {
  const program = new Command()
    .name('inspect-collection')
    .description('List recent library items and their notes and attachments')
    .option('-c, --collection <key>', 'collection key (defaults to the whole library)')
    .option('-l, --limit <count>', 'number of items to list', '10')
    .option('-t, --title <title>', 'only show items with exactly this title')
    .parse(process.argv);
  const options = program.opts<InspectOptions>();

  const limit = Number.parseInt(options.limit, 10);
  if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
    console.error('--limit must be an integer between 1 and 100');
    process.exit(1);
  }

  // Slack and email settings are irrelevant here
  const config = loadEnvironmentConfig(process.env, { dryRun: true });
  const source = new ZoteroSource({
    apiKey: config.zotero.apiKey,
    libraryId: config.zotero.libraryId,
    libraryType: config.zotero.libraryType
  });

  const scope = options.collection ? `collection ${options.collection}` : 'library';
  console.log(`Inspecting ${scope} (${config.zotero.libraryType} ${config.zotero.libraryId})\n`);

  const items = await source.listItems({ collectionId: options.collection, limit });
  const selected = options.title ? items.filter(item => item.title === options.title) : items;

  if (selected.length === 0) {
    console.log(options.title ? `No item titled "${options.title}" among the ${items.length} newest` : 'No items found');
    return;
  }

  for (const item of selected) {
    const children = await source.listChildren(item.id);
    const notes = children.filter(child => child.itemType === 'note').length;
    const attachments = children.filter(child => child.itemType === 'attachment').length;

    console.log(`${item.id}  ${item.title}`);
    console.log(`   type: ${item.itemType}`);
    console.log(`   authors: ${renderAuthors(item.authors) || '(none)'}`);
    console.log(`   added: ${item.dateAdded ?? '-'}  modified: ${item.dateModified ?? '-'}`);
    console.log(`   added by: ${item.createdBy ?? 'Unknown'}`);
    console.log(`   children: ${notes} notes, ${attachments} attachments`);
    for (const child of children.filter(entry => entry.itemType === 'attachment')) {
      console.log(`     - ${child.title ?? child.filename ?? child.id} (${child.contentType ?? 'unknown type'})`);
    }
    console.log();
  }
}

inspectCollection().catch(error => {
  console.error('Inspection failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
