import { describe, it, expect, vi, afterEach } from 'vitest';
import { NiconicoProvider } from '../src/providers/niconico/NiconicoProvider.js';
import { FetchError, NdgrError } from '../src/providers/niconico/errors.js';
import type { Scheduler } from '../src/providers/niconico/Scheduler.js';
import type {
  BroadcastMetadata,
  Comment,
  ConnectionState,
  Emotion,
  Gift,
  Notification,
} from '../src/interfaces/types.js';
import { createSilentLogger } from '../src/logger.js';
import { mockFetch, requestedUrls, type Route } from './helpers/fetchMock.js';
import { watchPage } from './helpers/watchPage.js';
import {
  concat,
  createBackwardEntry,
  createChunkedMessage,
  createComment,
  createFullCommentMessage,
  createGiftNicoliveMessage,
  createNextEntry,
  createPackedSegment,
  createSegmentEntry,
  createSimpleNotificationV2NicoliveMessage,
  encodeLengthDelimited,
} from './helpers/protobufTestData.js';

afterEach(() => {
  vi.restoreAllMocks();
});

const VIEW_URI = 'https://example.com/view';
const BACK_1 = 'https://example.com/back/1';
const NOW_MS = 1_700_000_000_000;

/** 待機は中断されるまで終わらない（ライブループを止めておく） */
const holdingScheduler: Scheduler = {
  now: () => NOW_MS,
  sleep: (_ms, signal) =>
    new Promise<void>((resolve) => {
      if (!signal || signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener('abort', () => resolve(), { once: true });
    }),
};

function liveRoutes(): Map<string, Uint8Array> {
  return new Map([
    [
      `${VIEW_URI}?at=now`,
      concat(
        createBackwardEntry({ segmentUri: BACK_1 }),
        createSegmentEntry('https://example.com/seg/1'),
        createNextEntry(1_700_000_016),
      ),
    ],
    [
      'https://example.com/seg/1',
      concat(
        createFullCommentMessage({ id: 'live-1', at: NOW_MS, no: 3, content: 'live' }),
        encodeLengthDelimited(
          createChunkedMessage(createGiftNicoliveMessage({ itemId: 'flower', itemName: '花束', point: 100 }), {
            id: 'g-live',
            at: NOW_MS,
          }),
        ),
        encodeLengthDelimited(createChunkedMessage(createSimpleNotificationV2NicoliveMessage(2, 'わこつ'), { id: 'e-1', at: NOW_MS })),
        encodeLengthDelimited(
          createChunkedMessage(createSimpleNotificationV2NicoliveMessage(5, 'ランクイン'), { id: 'n-1', at: NOW_MS }),
        ),
      ),
    ],
    [
      BACK_1,
      createPackedSegment({
        messages: [
          createComment({ id: 'old-2', at: NOW_MS - 1000, no: 2, content: 'older-2' }),
          createChunkedMessage(createGiftNicoliveMessage({ itemId: 'old-gift' }), { id: 'g-old', at: NOW_MS - 1500 }),
          createComment({ id: 'old-1', at: NOW_MS - 2000, no: 1, content: 'older-1' }),
        ],
      }),
    ],
  ]);
}

function collectEvents(provider: NiconicoProvider) {
  const comments: Comment[] = [];
  const gifts: Gift[] = [];
  const emotions: Emotion[] = [];
  const notifications: Notification[] = [];
  const states: ConnectionState[] = [];
  const errors: Error[] = [];
  provider.on('comment', (c) => comments.push(c));
  provider.on('gift', (g) => gifts.push(g));
  provider.on('emotion', (e) => emotions.push(e));
  provider.on('notification', (n) => notifications.push(n));
  provider.on('stateChange', (s) => states.push(s));
  provider.on('error', (e) => errors.push(e));
  return { comments, gifts, emotions, notifications, states, errors };
}

function waitForEnd(provider: NiconicoProvider): Promise<void> {
  return new Promise((resolve) => provider.once('end', resolve));
}

describe('NiconicoProvider', () => {
  it('ライブのコメント・イベントとバックログを流す', async () => {
    const spy = mockFetch(liveRoutes());
    const provider = new NiconicoProvider({
      viewUri: VIEW_URI,
      scheduler: holdingScheduler,
      logger: createSilentLogger(),
    });
    const events = collectEvents(provider);

    await provider.connect();
    await vi.waitFor(() => {
      expect(events.comments).toHaveLength(3);
      expect(events.notifications).toHaveLength(1);
    });

    const ended = waitForEnd(provider);
    provider.disconnect();
    await ended;

    expect(events.comments.filter((c) => !c.isHistory).map((c) => c.content)).toEqual(['live']);
    expect(events.comments.filter((c) => c.isHistory).map((c) => c.content)).toEqual(['older-1', 'older-2']);
    expect(events.gifts).toEqual([
      {
        itemId: 'flower',
        itemName: '花束',
        userId: undefined,
        userName: '',
        point: 100,
        message: '',
        timestamp: new Date(NOW_MS),
        platform: 'niconico',
        raw: { itemId: 'flower', itemName: '花束', advertiserName: '', point: 100, message: '' },
      },
    ]);
    expect(events.emotions.map((e) => e.id)).toEqual(['わこつ']);
    expect(events.notifications.map((n) => [n.type, n.message])).toEqual([['ranking_in', 'ランクイン']]);
    expect(events.states).toEqual(['connecting', 'connected', 'disconnected']);
    expect(events.errors).toEqual([]);
    expect(requestedUrls(spy)).toContain(BACK_1);
  });

  it('backlogEvents に含めたイベントはバックログからも流す', async () => {
    mockFetch(liveRoutes());
    const provider = new NiconicoProvider({
      viewUri: VIEW_URI,
      backlogEvents: ['chat', 'gift'],
      scheduler: holdingScheduler,
      logger: createSilentLogger(),
    });
    const events = collectEvents(provider);

    await provider.connect();
    await vi.waitFor(() => expect(events.comments).toHaveLength(3));

    const ended = waitForEnd(provider);
    provider.disconnect();
    await ended;

    const historyGifts = events.gifts.filter((g) => g.isHistory);
    expect(historyGifts.map((g) => g.itemId)).toEqual(['old-gift']);
  });

  it('fetchBacklog: false なら過去コメントを取得しない', async () => {
    const spy = mockFetch(liveRoutes());
    const provider = new NiconicoProvider({
      viewUri: VIEW_URI,
      fetchBacklog: false,
      scheduler: holdingScheduler,
      logger: createSilentLogger(),
    });
    const events = collectEvents(provider);

    await provider.connect();
    await vi.waitFor(() => expect(events.notifications).toHaveLength(1));

    const ended = waitForEnd(provider);
    provider.disconnect();
    await ended;

    expect(events.comments.map((c) => c.content)).toEqual(['live']);
    expect(requestedUrls(spy)).not.toContain(BACK_1);
  });

  it('liveId から View API を解決し、metadata を通知する', async () => {
    const spy = mockFetch(
      new Map<string, Route>([
        [
          'https://example.com/watch/lv123',
          watchPage({
            program: { title: 'テスト番組', status: 'ON_AIR' },
            temporaryMeasure: { ndgrProgramCommentViewUri: 'https://example.com/api/view/lv123' },
          }),
        ],
        ['https://example.com/api/view/lv123', JSON.stringify({ view: 'https://example.com/view?v=1' })],
        ['https://example.com/view?v=1&at=now', createNextEntry(1_700_000_016)],
      ]),
    );
    const provider = new NiconicoProvider({
      liveId: 'lv123',
      watchPageBaseUrl: 'https://example.com/watch/',
      scheduler: holdingScheduler,
      logger: createSilentLogger(),
    });
    const metadata: BroadcastMetadata[] = [];
    provider.on('metadata', (m) => metadata.push(m));

    await provider.connect();
    await vi.waitFor(() => expect(requestedUrls(spy)).toContain('https://example.com/view?v=1&at=now'));

    const ended = waitForEnd(provider);
    provider.disconnect();
    await ended;

    expect(metadata).toHaveLength(1);
    expect(metadata[0].title).toBe('テスト番組');
    expect(metadata[0].status).toBe('ON_AIR');
  });

  it('解決に失敗すると connect() が reject し、状態は error になる', async () => {
    mockFetch(new Map([['https://example.com/watch/lv404', 404]]));
    const provider = new NiconicoProvider({
      liveId: 'lv404',
      watchPageBaseUrl: 'https://example.com/watch/',
      logger: createSilentLogger(),
    });
    const states: ConnectionState[] = [];
    provider.on('stateChange', (s) => states.push(s));

    await expect(provider.connect()).rejects.toBeInstanceOf(FetchError);
    expect(states).toEqual(['connecting', 'error']);
  });

  it('liveId も viewUri も無ければ NdgrError', async () => {
    const provider = new NiconicoProvider({ logger: createSilentLogger() });
    await expect(provider.connect()).rejects.toBeInstanceOf(NdgrError);
  });

  it('disconnect は何度呼んでもよい', () => {
    const provider = new NiconicoProvider({ viewUri: VIEW_URI, logger: createSilentLogger() });
    const states: ConnectionState[] = [];
    provider.on('stateChange', (s) => states.push(s));

    provider.disconnect();
    provider.disconnect();

    expect(states).toEqual([]);
  });
});
