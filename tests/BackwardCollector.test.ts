import { describe, it, expect, vi, afterEach } from 'vitest';
import { BackwardCollector, downloadKakolog } from '../src/providers/niconico/BackwardCollector.js';
import type { RawMessage } from '../src/providers/niconico/ProtobufParser.js';
import { isAbortError } from '../src/providers/niconico/errors.js';
import { createSilentLogger } from '../src/logger.js';
import { FakeScheduler } from './helpers/FakeScheduler.js';
import { mockFetch, requestedUrls, streamResponse, type Route } from './helpers/fetchMock.js';
import {
  concat,
  createBackwardEntry,
  createChunkedMessage,
  createComment,
  createGiftNicoliveMessage,
  createNextEntry,
  createPackedSegment,
  createSegmentEntry,
} from './helpers/protobufTestData.js';

afterEach(() => {
  vi.restoreAllMocks();
});

const VIEW_URI = 'https://example.com/view';
const BACK_1 = 'https://example.com/back/1';
const BACK_2 = 'https://example.com/back/2';

/** 新→旧の2セグメントのチェーン */
function twoSegmentChain(): Map<string, Uint8Array> {
  return new Map([
    [
      BACK_1,
      createPackedSegment({
        messages: [
          createComment({ id: 'c3', at: 3000, no: 3, content: 'three' }),
          createComment({ id: 'c4', at: 4000, no: 4, content: 'four' }),
        ],
        nextUri: BACK_2,
      }),
    ],
    [
      BACK_2,
      createPackedSegment({
        messages: [
          createComment({ id: 'c1', at: 1000, no: 1, content: 'one' }),
          createComment({ id: 'c2', at: 2000, no: 2, content: 'two' }),
        ],
      }),
    ],
  ]);
}

async function collect(source: AsyncIterable<RawMessage>): Promise<string[]> {
  const ids: string[] = [];
  for await (const raw of source) ids.push(raw.id);
  return ids;
}

describe('BackwardCollector', () => {
  it('next が無くなるまでチェーンを辿る', async () => {
    const spy = mockFetch(twoSegmentChain());
    const scheduler = new FakeScheduler();
    const collector = new BackwardCollector({ scheduler, logger: createSilentLogger() });

    expect(await collect(collector.collectFrom(BACK_1))).toEqual(['c3', 'c4', 'c1', 'c2']);
    expect(requestedUrls(spy)).toEqual([BACK_1, BACK_2]);
    // リクエスト間隔はセグメント間のみ
    expect(scheduler.sleeps).toEqual([1000]);
    expect(collector.checkpoint).toBeUndefined();
  });

  it('循環するチェーンは2周目で止まる', async () => {
    const spy = mockFetch(
      new Map([
        [BACK_1, createPackedSegment({ messages: [createComment({ id: 'a', content: 'A' })], nextUri: BACK_2 })],
        [BACK_2, createPackedSegment({ messages: [createComment({ id: 'b', content: 'B' })], nextUri: BACK_1 })],
      ]),
    );
    const collector = new BackwardCollector({ scheduler: new FakeScheduler(), logger: createSilentLogger() });

    expect(await collect(collector.collectFrom(BACK_1))).toEqual(['a', 'b']);
    expect(requestedUrls(spy)).toEqual([BACK_1, BACK_2]);
  });

  it('maxDepth で打ち切り、checkpoint から再開できる', async () => {
    mockFetch(twoSegmentChain());
    const scheduler = new FakeScheduler();
    const first = new BackwardCollector({ scheduler, maxDepth: 1, logger: createSilentLogger() });

    expect(await collect(first.collectFrom(BACK_1))).toEqual(['c3', 'c4']);
    expect(first.checkpoint).toBe(BACK_2);
    expect(scheduler.sleeps).toEqual([]);

    const resumed = new BackwardCollector({ scheduler, logger: createSilentLogger() });
    expect(await collect(resumed.collectFrom(BACK_2))).toEqual(['c1', 'c2']);
  });

  it('snapshot チェーンを辿る', async () => {
    const spy = mockFetch(
      new Map([
        [
          BACK_1,
          createPackedSegment({
            messages: [createComment({ id: 'a', content: 'A' })],
            nextUri: BACK_2,
            snapshotUri: 'https://example.com/snap/2',
          }),
        ],
        ['https://example.com/snap/2', createPackedSegment({ messages: [createComment({ id: 's', content: 'S' })] })],
      ]),
    );
    const collector = new BackwardCollector({
      follow: 'snapshot',
      scheduler: new FakeScheduler(),
      logger: createSilentLogger(),
    });

    expect(await collect(collector.collectFrom(BACK_1))).toEqual(['a', 's']);
    expect(requestedUrls(spy)).toEqual([BACK_1, 'https://example.com/snap/2']);
  });

  it('一時的な失敗はリトライする', async () => {
    const chain = twoSegmentChain();
    const back2 = chain.get(BACK_2) ?? new Uint8Array(0);
    let failures = 1;
    const spy = mockFetch(
      new Map<string, Route>([
        [BACK_1, chain.get(BACK_1) ?? new Uint8Array(0)],
        [
          BACK_2,
          () => {
            if (failures-- > 0) return new Response(null, { status: 503 });
            return streamResponse([back2]);
          },
        ],
      ]),
    );
    const scheduler = new FakeScheduler();
    const collector = new BackwardCollector({ scheduler, logger: createSilentLogger() });

    expect(await collect(collector.collectFrom(BACK_1))).toEqual(['c3', 'c4', 'c1', 'c2']);
    expect(requestedUrls(spy)).toEqual([BACK_1, BACK_2, BACK_2]);
    expect(scheduler.sleeps).toEqual([1000, 1000]);
  });

  it('中断されると AbortError で止まる', async () => {
    mockFetch(twoSegmentChain());
    const controller = new AbortController();
    const scheduler = new FakeScheduler();
    scheduler.onSleep = () => controller.abort();
    const collector = new BackwardCollector({ scheduler, logger: createSilentLogger() });

    const ids: string[] = [];
    const run = async () => {
      for await (const raw of collector.collectFrom(BACK_1, { signal: controller.signal })) ids.push(raw.id);
    };

    const error = await run().catch((e: unknown) => e);
    expect(isAbortError(error)).toBe(true);
    expect(ids).toEqual(['c3', 'c4']);
  });

  it('collect() は View API から BackwardSegment を探す', async () => {
    const routes = twoSegmentChain();
    routes.set(`${VIEW_URI}?at=now`, concat(createSegmentEntry('https://example.com/seg/1'), createNextEntry(100)));
    routes.set(
      `${VIEW_URI}?at=100`,
      concat(createBackwardEntry({ segmentUri: BACK_1 }), createSegmentEntry('https://example.com/seg/2')),
    );
    const spy = mockFetch(routes);
    const scheduler = new FakeScheduler();
    const collector = new BackwardCollector({ scheduler, logger: createSilentLogger() });

    expect(await collect(collector.collect(VIEW_URI))).toEqual(['c3', 'c4', 'c1', 'c2']);
    expect(requestedUrls(spy)).toEqual([`${VIEW_URI}?at=now`, `${VIEW_URI}?at=100`, BACK_1, BACK_2]);
    expect(scheduler.sleeps).toEqual([1000]);
  });

  it('ReadyForNext の後に来る BackwardSegment も見つける', async () => {
    const routes = twoSegmentChain();
    routes.set(`${VIEW_URI}?at=now`, concat(createNextEntry(100), createBackwardEntry({ segmentUri: BACK_1 })));
    const spy = mockFetch(routes);
    const collector = new BackwardCollector({ scheduler: new FakeScheduler(), logger: createSilentLogger() });

    expect(await collect(collector.collect(VIEW_URI))).toEqual(['c3', 'c4', 'c1', 'c2']);
    expect(requestedUrls(spy)).toEqual([`${VIEW_URI}?at=now`, BACK_1, BACK_2]);
  });

  it('BackwardSegment が無ければ何も返さない', async () => {
    mockFetch(new Map([[`${VIEW_URI}?at=now`, createSegmentEntry('https://example.com/seg/1')]]));
    const collector = new BackwardCollector({ scheduler: new FakeScheduler(), logger: createSilentLogger() });

    expect(await collect(collector.collect(VIEW_URI))).toEqual([]);
  });
});

describe('downloadKakolog', () => {
  it('コメントをタイムスタンプ昇順で返し、それ以外は onEvent に渡す', async () => {
    const routes = twoSegmentChain();
    routes.set(
      BACK_2,
      createPackedSegment({
        messages: [
          createComment({ id: 'c1', at: 1000, no: 1, content: 'one' }),
          createChunkedMessage(createGiftNicoliveMessage({ itemId: 'flower' }), { id: 'g1', at: 1500 }),
          createComment({ id: 'c2', at: 2000, no: 2, content: 'two' }),
          // チェーン内の重複
          createComment({ id: 'c3', at: 3000, no: 3, content: 'three' }),
        ],
      }),
    );
    routes.set(`${VIEW_URI}?at=now`, createBackwardEntry({ segmentUri: BACK_1 }));
    mockFetch(routes);

    const events: RawMessage[] = [];
    const comments = await downloadKakolog(VIEW_URI, {
      scheduler: new FakeScheduler(),
      logger: createSilentLogger(),
      onEvent: (e) => events.push(e),
    });

    expect(comments.map((c) => c.content)).toEqual(['one', 'two', 'three', 'four']);
    expect(comments.map((c) => c.no)).toEqual([1, 2, 3, 4]);
    expect(comments.every((c) => c.isHistory === true)).toBe(true);
    expect(events.map((e) => e.id)).toEqual(['g1']);
  });

  it('リトライ待ちで中断されたら AbortError で終わる', async () => {
    const routes = new Map<string, Route>([
      [`${VIEW_URI}?at=now`, createBackwardEntry({ segmentUri: BACK_1 })],
      [BACK_1, twoSegmentChain().get(BACK_1) ?? new Uint8Array(0)],
      [BACK_2, 503],
    ]);
    const spy = mockFetch(routes);
    const controller = new AbortController();
    const scheduler = new FakeScheduler();
    // 1回目はリクエスト間隔、2回目がリトライ待ち
    scheduler.onSleep = () => {
      if (scheduler.sleeps.length >= 2) controller.abort();
    };

    const error = await downloadKakolog(VIEW_URI, {
      scheduler,
      logger: createSilentLogger(),
      signal: controller.signal,
    }).catch((e: unknown) => e);

    expect(isAbortError(error)).toBe(true);
    expect(requestedUrls(spy)).toEqual([`${VIEW_URI}?at=now`, BACK_1, BACK_2]);
  });
});
