import fs from 'fs';
import os from 'os';
import path from 'path';
import { FakeChatClient, FakeSource, makeNote, makePublication } from '../../__tests__/fixtures';
import { ChatDeliveryError, SourceFetchError } from '../../utils/errors';
import { DryRunDispatcher, LiveDispatcher } from '../deliveryDispatcher';
import { TableMentionResolver } from '../mentionResolver';
import { advanceWatermark, runNotifier } from '../runNotifier';
import { WatermarkStore } from '../watermarkStore';

const resolver = new TableMentionResolver([]);
const now = () => new Date('2024-05-04T12:00:00Z');

describe('runNotifier', () => {
  let tempDir: string;
  let statePath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'notifier-run-'));
    statePath = path.join(tempDir, 'state.csv');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeState(lines: string[]) {
    fs.writeFileSync(statePath, ['subcollectionID,lastDate,channel', ...lines, ''].join('\n'));
  }

  function liveDispatcher(chat: FakeChatClient) {
    return new LiveDispatcher({ chat, retryMaxAttempts: 3, retryBaseDelayMs: 1, postDelayMs: 0 });
  }

  it('posts only the header when nothing changed and keeps the watermark text', async () => {
    writeState(['COLL1,2024-05-01T12:00:00+00:00,C111']);
    const chat = new FakeChatClient();

    const result = await runNotifier({
      store: new WatermarkStore(statePath),
      source: new FakeSource({ COLL1: [makePublication({ dateAdded: '2024-04-01T00:00:00Z', dateModified: '2024-04-01T00:00:00Z' })] }),
      dispatcher: liveDispatcher(chat),
      resolver,
      now
    });

    expect(chat.posted).toHaveLength(1);
    expect(chat.posted[0].text).toContain('No new publications detected since last post');
    expect(chat.posted[0].text).toContain('(72h0m0s since last post)');
    expect(result.rows[0].lastProcessed).toBe('2024-05-01T12:00:00+00:00');
    expect(result.stats).toMatchObject({ rowsProcessed: 1, changedItems: 0, posted: 0, failures: 0 });
    expect(fs.readFileSync(statePath, 'utf8')).toBe('subcollectionID,lastDate,channel\nCOLL1,2024-05-01T12:00:00+00:00,C111\n');
  });

  it('advances each row to its newest triggering date', async () => {
    writeState(['COLL1,2024-05-01T12:00:00Z,C111', 'COLL2,2024-05-01T12:00:00Z,C222']);
    const source = new FakeSource(
      {
        COLL1: [
          makePublication({ id: 'NEW', dateAdded: '2024-05-02T09:00:00Z', dateModified: '2024-05-02T09:00:00Z' }),
          makePublication({ id: 'OLD', dateAdded: '2024-04-01T00:00:00Z', dateModified: '2024-04-01T00:00:00Z' })
        ],
        COLL2: []
      },
      { OLD: [makeNote({ parentId: 'OLD', dateModified: '2024-05-03T07:30:00Z' })] }
    );
    const chat = new FakeChatClient();

    const result = await runNotifier({
      store: new WatermarkStore(statePath),
      source,
      dispatcher: liveDispatcher(chat),
      resolver,
      now
    });

    expect(result.stats).toMatchObject({ rowsProcessed: 2, changedItems: 2, posted: 2, failures: 0 });
    expect(result.stateUpdated).toBe(true);
    expect(chat.posted.map(post => post.channel)).toEqual(['C111', 'C111', 'C111', 'C222']);
    expect(fs.readFileSync(statePath, 'utf8')).toBe(
      'subcollectionID,lastDate,channel\nCOLL1,2024-05-03T07:30:00Z,C111\nCOLL2,2024-05-01T12:00:00Z,C222\n'
    );
  });

  it('advances the watermark past publications that failed to post', async () => {
    writeState(['COLL1,2024-05-01T12:00:00Z,C111']);
    const chat = new FakeChatClient((_channel, text) => {
      if (text.startsWith(':book:')) throw new ChatDeliveryError('msg_too_long', false);
    });

    const result = await runNotifier({
      store: new WatermarkStore(statePath),
      source: new FakeSource({
        COLL1: [makePublication({ dateAdded: '2024-05-02T09:00:00Z', dateModified: '2024-05-02T09:00:00Z' })]
      }),
      dispatcher: liveDispatcher(chat),
      resolver,
      now
    });

    expect(result.stats).toMatchObject({ posted: 0, failures: 1 });
    expect(result.rows[0].lastProcessed).toBe('2024-05-02T09:00:00Z');
  });

  it('leaves the state file byte-identical on a dry run', async () => {
    writeState(['COLL1,2024-05-01T12:00:00Z,C111']);
    const before = fs.readFileSync(statePath);

    const result = await runNotifier({
      store: new WatermarkStore(statePath),
      source: new FakeSource({
        COLL1: [makePublication({ dateAdded: '2024-05-02T09:00:00Z', dateModified: '2024-05-02T09:00:00Z' })]
      }),
      dispatcher: new DryRunDispatcher(),
      resolver,
      dryRun: true,
      now
    });

    expect(result.dryRun).toBe(true);
    expect(result.stateUpdated).toBe(false);
    expect(result.stats.posted).toBe(1);
    expect(result.rows[0].lastProcessed).toBe('2024-05-02T09:00:00Z');
    expect(fs.readFileSync(statePath).equals(before)).toBe(true);
  });

  it('aborts without writing state when a collection cannot be read', async () => {
    writeState(['COLL1,2024-05-01T12:00:00Z,C111', 'COLL2,2024-05-01T12:00:00Z,C222']);
    const before = fs.readFileSync(statePath, 'utf8');
    const source = new FakeSource({
      COLL1: [makePublication({ dateAdded: '2024-05-02T09:00:00Z', dateModified: '2024-05-02T09:00:00Z' })]
    });
    const listTopItems = source.listTopItems.bind(source);
    jest.spyOn(source, 'listTopItems').mockImplementation(async collectionId => {
      if (collectionId === 'COLL2') throw new SourceFetchError('HTTP 500: Internal Server Error', 500);
      return listTopItems(collectionId);
    });

    await expect(
      runNotifier({
        store: new WatermarkStore(statePath),
        source,
        dispatcher: liveDispatcher(new FakeChatClient()),
        resolver,
        now
      })
    ).rejects.toBeInstanceOf(SourceFetchError);
    expect(fs.readFileSync(statePath, 'utf8')).toBe(before);
  });
});

describe('advanceWatermark', () => {
  const row = {
    collectionId: 'COLL',
    lastProcessed: '2024-05-01T12:00:00+00:00',
    lastProcessedAt: new Date('2024-05-01T12:00:00Z'),
    channel: 'C1'
  };

  it('never moves backwards', () => {
    expect(advanceWatermark(row, [new Date('2024-04-01T00:00:00Z')])).toBe(row);
    expect(advanceWatermark(row, [])).toBe(row);
  });

  it('moves to the latest date in canonical form', () => {
    const updated = advanceWatermark(row, [new Date('2024-05-03T08:00:00Z'), new Date('2024-05-02T00:00:00Z')]);
    expect(updated.lastProcessed).toBe('2024-05-03T08:00:00Z');
    expect(updated.lastProcessedAt.toISOString()).toBe('2024-05-03T08:00:00.000Z');
    expect(updated.channel).toBe('C1');
  });

  it('rounds a fractional second up so the item is not reported again', () => {
    const itemDate = new Date('2024-05-03T08:00:00.250Z');

    const updated = advanceWatermark(row, [itemDate]);

    expect(updated.lastProcessed).toBe('2024-05-03T08:00:01Z');
    expect(updated.lastProcessedAt.getTime()).toBeGreaterThan(itemDate.getTime());
  });
});
