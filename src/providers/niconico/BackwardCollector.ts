import type { Comment } from '../../interfaces/types.js';
import { createLogger, type Logger } from '../../logger.js';
import { EntryWalker, withAt } from './EntryWalker.js';
import type { HttpStreamOptions } from './HttpStream.js';
import { MessageAssembler, type EventObserver } from './MessageAssembler.js';
import type { RawMessage } from './ProtobufParser.js';
import { withRetry, type RetryParams } from './Retry.js';
import { realScheduler, type Scheduler } from './Scheduler.js';
import { SegmentFetcher, type SegmentLayout } from './SegmentFetcher.js';

/** リクエスト間の待機時間 (ms) — 短時間に連続で叩くと 403 が返る */
const REQUEST_INTERVAL_MS = 1000;

/** BackwardSegment を探すために View API を辿る最大回数 */
const MAX_ENTRY_WALKS = 5;

export interface BackwardCollectorOptions extends HttpStreamOptions, Partial<RetryParams> {
  /** 辿るチェーン: segment（全メッセージ）か snapshot（状態のみ） */
  follow?: 'segment' | 'snapshot';
  /** ボディ形式（デフォルト: packed-raw） */
  layout?: SegmentLayout;
  requestIntervalMs?: number;
  /** 取得するセグメント数の上限（デフォルト: 無制限） */
  maxDepth?: number;
  maxEntryWalks?: number;
  scheduler?: Scheduler;
}

type PointerSearch =
  | { kind: 'found'; pointer?: string }
  | { kind: 'next'; at: number }
  | { kind: 'end' };

export interface CollectOptions {
  signal?: AbortSignal;
}

/**
 * 過去コメント (BackwardSegment) のチェーンを next が無くなるまで辿る。
 * セグメントごとにメッセージを返すため、全体を待たずに逐次処理できる。
 * 返る順序はチェーンの順（通常は新→旧）で、時系列順は timestamp で決める。
 */
export class BackwardCollector {
  private readonly follow: 'segment' | 'snapshot';
  private readonly layout: SegmentLayout;
  private readonly requestIntervalMs: number;
  private readonly maxDepth: number;
  private readonly maxEntryWalks: number;
  private readonly retry: Partial<RetryParams>;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly walker: EntryWalker;
  private readonly fetcher: SegmentFetcher;
  private cursor?: string;

  constructor(options: BackwardCollectorOptions = {}) {
    this.follow = options.follow ?? 'segment';
    this.layout = options.layout ?? 'packed-raw';
    this.requestIntervalMs = options.requestIntervalMs ?? REQUEST_INTERVAL_MS;
    this.maxDepth = options.maxDepth ?? Infinity;
    this.maxEntryWalks = options.maxEntryWalks ?? MAX_ENTRY_WALKS;
    this.retry = {
      maxAttempts: options.maxAttempts,
      retryBaseMs: options.retryBaseMs,
      retryMultiplier: options.retryMultiplier,
      maxRetryMs: options.maxRetryMs,
    };
    this.scheduler = options.scheduler ?? realScheduler;
    this.logger = options.logger ?? createLogger('backward');

    const http: HttpStreamOptions = {
      cookies: options.cookies,
      userAgent: options.userAgent,
      connectTimeoutMs: options.connectTimeoutMs,
      inactivityTimeoutMs: options.inactivityTimeoutMs,
      logger: this.logger,
    };
    this.walker = new EntryWalker(http);
    this.fetcher = new SegmentFetcher(http);
  }

  /** 次に取得するURI。チェーンを辿り終えたら undefined */
  get checkpoint(): string | undefined {
    return this.cursor;
  }

  /** View API から BackwardSegment のURIを探す。見つからなければ undefined */
  async findBackwardPointer(entryUri: string, signal?: AbortSignal): Promise<string | undefined> {
    let at: number | 'now' = 'now';

    for (let walk = 0; walk < this.maxEntryWalks; walk++) {
      const requestAt: number | 'now' = at;
      const found: PointerSearch = await withRetry<PointerSearch>(
        async () => {
          let nextAt: number | undefined;
          for await (const entry of this.walker.open(withAt(entryUri, requestAt), signal)) {
            if (entry.kind === 'backward') {
              const pointer = this.follow === 'snapshot' ? entry.snapshotUri : entry.segmentUri;
              return { kind: 'found', pointer };
            }
            if (entry.kind === 'next') nextAt = entry.at;
          }
          return nextAt === undefined ? { kind: 'end' } : { kind: 'next', at: nextAt };
        },
        { ...this.retry, signal, scheduler: this.scheduler, logger: this.logger },
      );

      if (found.kind === 'found') return found.pointer;
      if (found.kind === 'end') break;
      at = found.at;
    }

    this.logger.warn({ uri: entryUri }, 'no backward segment found');
    return undefined;
  }

  /** エントリポイントから過去コメントを全件取得する */
  async *collect(entryUri: string, options: CollectOptions = {}): AsyncGenerator<RawMessage> {
    const pointer = await this.findBackwardPointer(entryUri, options.signal);
    if (!pointer) return;
    yield* this.collectFrom(pointer, options);
  }

  /** 既知のURI（BackwardSegment または checkpoint）からチェーンを辿る */
  async *collectFrom(segmentUri: string, options: CollectOptions = {}): AsyncGenerator<RawMessage> {
    const { signal } = options;
    const visited = new Set<string>();
    let uri: string | undefined = segmentUri;
    let depth = 0;

    this.cursor = uri;
    while (uri && depth < this.maxDepth) {
      signal?.throwIfAborted();
      if (visited.has(uri)) {
        this.logger.warn({ uri }, 'backward chain loops; stopping');
        break;
      }
      visited.add(uri);

      const current: string = uri;
      const payload = await withRetry(
        () => this.fetcher.fetchPayload(current, { layout: this.layout, signal }),
        { ...this.retry, signal, scheduler: this.scheduler, logger: this.logger },
      );
      this.logger.debug({ uri: current, count: payload.messages.length }, 'backward segment');

      uri = this.follow === 'snapshot' ? payload.snapshot : payload.next;
      this.cursor = uri;
      depth++;

      yield* payload.messages;

      if (uri && depth < this.maxDepth) {
        await this.scheduler.sleep(this.requestIntervalMs, signal);
      }
    }

    signal?.throwIfAborted();
  }
}

export interface DownloadOptions extends BackwardCollectorOptions, CollectOptions {
  /** コメント以外のメッセージ */
  onEvent?: EventObserver;
}

/**
 * 過去ログ（kakolog）をダウンロードし、タイムスタンプ昇順のコメント列を返す。
 */
export async function downloadKakolog(entryUri: string, options: DownloadOptions = {}): Promise<Comment[]> {
  const collector = new BackwardCollector(options);
  const assembler = new MessageAssembler(true);

  for await (const raw of collector.collect(entryUri, { signal: options.signal })) {
    assembler.buffer(raw, options.onEvent);
  }
  return assembler.flush();
}
