import { EventEmitter } from 'events';
import type { Comment } from '../../interfaces/types.js';
import { createLogger, type Logger } from '../../logger.js';
import { EntryWalker, withAt } from './EntryWalker.js';
import type { UnknownEntryKindError } from './errors.js';
import type { HttpStreamOptions } from './HttpStream.js';
import { MessageAssembler } from './MessageAssembler.js';
import type { EntryRecord, RawMessage } from './ProtobufParser.js';
import { withRetry, type RetryParams } from './Retry.js';
import { realScheduler, type Scheduler } from './Scheduler.js';
import { SegmentFetcher, type SegmentLayout } from './SegmentFetcher.js';

/** ポーリング状態 */
export type LiveState = 'awaiting-entry' | 'fetching-segment' | 'emitting' | 'waiting' | 'stopped';

/** 最小ポーリング間隔 (1秒) */
const MIN_POLL_INTERVAL_MS = 1000;

/** 取得済みセグメントURIを覚えておく件数 */
const KNOWN_SEGMENT_LIMIT = 256;

export interface LivePollerOptions extends HttpStreamOptions, Partial<RetryParams> {
  /** View API の URI */
  entryUri: string;
  /** 前回の ReadyForNext.at (epoch 秒)。指定するとそこから再開する */
  resumeAt?: number;
  minPollIntervalMs?: number;
  /** セグメントボディの形式（デフォルト: chunked） */
  segmentLayout?: SegmentLayout;
  /** 重複排除を共有する場合に渡す */
  assembler?: MessageAssembler;
  scheduler?: Scheduler;
}

export interface ReconnectInfo {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface LivePoller {
  on(event: 'comment', listener: (comment: Comment) => void): this;
  on(event: 'message' | 'state' | 'signal', listener: (raw: RawMessage) => void): this;
  on(event: 'backward', listener: (entry: Extract<EntryRecord, { kind: 'backward' }>) => void): this;
  on(event: 'stateChange', listener: (state: LiveState) => void): this;
  on(event: 'reconnecting', listener: (info: ReconnectInfo) => void): this;
  on(event: 'unknownEntry', listener: (error: UnknownEntryKindError) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: 'end', listener: () => void): this;
}

/**
 * リアルタイムコメントのポーリングループ。
 *
 * awaiting-entry → fetching-segment → emitting → waiting → awaiting-entry …
 * 外部からの中断かリトライ枯渇でのみ stopped になる。
 */
export class LivePoller extends EventEmitter {
  private readonly entryUri: string;
  private readonly minPollIntervalMs: number;
  private readonly segmentLayout: SegmentLayout;
  private readonly retry: Partial<RetryParams>;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly walker: EntryWalker;
  private readonly fetcher: SegmentFetcher;
  private readonly assembler: MessageAssembler;
  private readonly knownSegments = new Set<string>();
  private resumeAt?: number;
  private state: LiveState = 'stopped';
  private controller: AbortController | null = null;

  constructor(options: LivePollerOptions) {
    super();
    this.entryUri = options.entryUri;
    this.resumeAt = options.resumeAt;
    this.minPollIntervalMs = options.minPollIntervalMs ?? MIN_POLL_INTERVAL_MS;
    this.segmentLayout = options.segmentLayout ?? 'chunked';
    this.retry = {
      maxAttempts: options.maxAttempts,
      retryBaseMs: options.retryBaseMs,
      retryMultiplier: options.retryMultiplier,
      maxRetryMs: options.maxRetryMs,
    };
    this.scheduler = options.scheduler ?? realScheduler;
    this.logger = options.logger ?? createLogger('live');
    this.assembler = options.assembler ?? new MessageAssembler();

    const http: HttpStreamOptions = {
      cookies: options.cookies,
      userAgent: options.userAgent,
      connectTimeoutMs: options.connectTimeoutMs,
      inactivityTimeoutMs: options.inactivityTimeoutMs,
      logger: this.logger,
    };
    this.walker = new EntryWalker({
      ...http,
      onUnknownEntry: (error) => this.emit('unknownEntry', error),
    });
    this.fetcher = new SegmentFetcher(http);
  }

  /** 再開用の位置。直近の ReadyForNext.at */
  get checkpoint(): { at?: number } {
    return { at: this.resumeAt };
  }

  get currentState(): LiveState {
    return this.state;
  }

  /**
   * ループを実行する。中断で resolve し、リトライ枯渇時は StreamUnavailableError で reject する。
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.controller) {
      throw new Error('LivePoller is already running');
    }
    const controller = new AbortController();
    this.controller = controller;
    const stop = signal ? AbortSignal.any([controller.signal, signal]) : controller.signal;

    let at: number | 'now' = this.resumeAt ?? 'now';
    try {
      while (!stop.aborted) {
        this.setState('awaiting-entry');
        const requestAt = at;
        const nextAt = await withRetry(() => this.walkEntries(requestAt, stop), {
          ...this.retry,
          signal: stop,
          scheduler: this.scheduler,
          logger: this.logger,
          onRetry: (attempt, delayMs, error) => this.emit('reconnecting', { attempt, delayMs, error }),
        });
        if (stop.aborted) break;

        this.setState('waiting');
        let waitMs = this.minPollIntervalMs;
        if (nextAt !== undefined) {
          this.resumeAt = nextAt;
          at = nextAt;
          waitMs = Math.max(nextAt * 1000 - this.scheduler.now(), this.minPollIntervalMs);
        } else {
          // ReadyForNext なしで終わった場合は現在時刻で取り直す
          at = 'now';
        }
        this.logger.debug({ at, waitMs }, 'waiting for next entry');
        await this.scheduler.sleep(waitMs, stop);
      }
    } catch (error) {
      if (!stop.aborted) throw error;
    } finally {
      this.controller = null;
      this.setState('stopped');
    }
  }

  /** バックグラウンドで run() し、失敗は error イベントで通知する */
  start(): void {
    this.run()
      .then(() => this.emit('end'))
      .catch((error: Error) => {
        this.emit('error', error);
        this.emit('end');
      });
  }

  stop(): void {
    this.controller?.abort();
  }

  private setState(state: LiveState): void {
    if (this.state !== state) {
      this.logger.debug({ from: this.state, to: state }, 'state');
      this.state = state;
      this.emit('stateChange', state);
    }
  }

  /** エントリをストリームが閉じるまで読み、最後の ReadyForNext の時刻を返す */
  private async walkEntries(at: number | 'now', signal: AbortSignal): Promise<number | undefined> {
    let nextAt: number | undefined;
    for await (const entry of this.walker.open(withAt(this.entryUri, at), signal)) {
      if (signal.aborted) return undefined;

      switch (entry.kind) {
        case 'segment':
        case 'previous':
          await this.consumeSegment(entry.uri, signal);
          this.setState('awaiting-entry');
          break;
        case 'backward':
          // ライブでは使わない（BackwardCollector 用）
          this.logger.debug({ uri: entry.segmentUri }, 'backward entry ignored');
          this.emit('backward', entry);
          break;
        case 'next':
          nextAt = entry.at;
          break;
        default: {
          const unreachable: never = entry;
          throw new Error(`Unhandled entry: ${JSON.stringify(unreachable)}`);
        }
      }
    }
    return nextAt;
  }

  /** セグメントを next が無くなるまで取得し、メッセージを流す */
  private async consumeSegment(uri: string, signal: AbortSignal): Promise<void> {
    if (!uri || this.knownSegments.has(uri)) return;
    this.setState('fetching-segment');

    const visited = new Set<string>();
    let current: string | undefined = uri;
    while (current && !visited.has(current)) {
      visited.add(current);
      let next: string | undefined;

      for await (const item of this.fetcher.fetch(current, { layout: this.segmentLayout, signal })) {
        if (signal.aborted) return;
        if (item.kind === 'end') {
          next = item.next;
          break;
        }
        this.setState('emitting');
        this.deliver(item.message);
      }
      current = next;
    }

    this.remember(uri);
  }

  private deliver(raw: RawMessage): void {
    const comment = this.assembler.assemble(raw, (event) => {
      this.emit(event.payload.case, event);
    });
    if (comment) this.emit('comment', comment);
  }

  private remember(uri: string): void {
    this.knownSegments.add(uri);
    if (this.knownSegments.size > KNOWN_SEGMENT_LIMIT) {
      const oldest = this.knownSegments.values().next();
      if (!oldest.done) this.knownSegments.delete(oldest.value);
    }
  }
}
