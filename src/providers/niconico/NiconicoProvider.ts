import { EventEmitter } from 'events';
import type { ICommentProvider } from '../../interfaces/ICommentProvider.js';
import type { ConnectionState, Gift, Emotion, Notification } from '../../interfaces/types.js';
import { createLogger, type Logger } from '../../logger.js';
import { BackwardCollector } from './BackwardCollector.js';
import { resolveEntryPoint } from './EntryPointResolver.js';
import { NdgrError, isAbortError } from './errors.js';
import { LivePoller } from './LivePoller.js';
import { MessageAssembler } from './MessageAssembler.js';
import type { NicoEmotion, NicoGift, NicoNotification, RawMessage } from './ProtobufParser.js';
import type { RetryParams } from './Retry.js';
import type { Scheduler } from './Scheduler.js';

/** バックログで取得するイベント種別 */
export type BacklogEventType = 'chat' | 'gift' | 'emotion' | 'notification';

/** バックログで辿るセグメント数の上限 */
const BACKLOG_MAX_DEPTH = 50;

export interface NiconicoProviderOptions extends Partial<RetryParams> {
  /** 放送ID (lv…)。viewUri を渡さない場合は必須 */
  liveId?: string;
  /** View API の URI。渡すと視聴ページの取得を省く */
  viewUri?: string;
  cookies?: string;
  userAgent?: string;
  /** 過去コメント（バックログ）を取得するか（デフォルト: true） */
  fetchBacklog?: boolean;
  /** バックログで取得するイベント種別（デフォルト: ['chat'] — チャットのみ） */
  backlogEvents?: BacklogEventType[];
  backlogMaxDepth?: number;
  watchPageBaseUrl?: string;
  logger?: Logger;
  scheduler?: Scheduler;
}

/**
 * ニコニコ生放送コメントプロバイダー。
 * ICommentProvider を実装し、NDGR のメッセージサーバーからコメントを取得する。
 */
export class NiconicoProvider extends EventEmitter implements ICommentProvider {
  private readonly options: NiconicoProviderOptions;
  private readonly fetchBacklog: boolean;
  private readonly backlogEvents: Set<BacklogEventType>;
  private readonly logger: Logger;
  private readonly assembler = new MessageAssembler();
  private poller: LivePoller | null = null;
  private backlog: AbortController | null = null;
  private backlogStarted = false;
  private state: ConnectionState = 'disconnected';

  constructor(options: NiconicoProviderOptions) {
    super();
    this.options = options;
    this.fetchBacklog = options.fetchBacklog ?? true;
    this.backlogEvents = new Set(options.backlogEvents ?? ['chat']);
    this.logger = options.logger ?? createLogger('niconico');
  }

  async connect(): Promise<void> {
    if (this.poller) return;
    this.setState('connecting');

    let entryUri: string;
    try {
      entryUri = await this.resolveViewUri();
    } catch (error) {
      this.setState('error');
      throw error;
    }

    this.assembler.reset();
    this.backlogStarted = false;
    this.poller = this.createPoller(entryUri);
    this.poller.start();
    this.setState('connected');
  }

  disconnect(): void {
    const poller = this.poller;
    this.poller = null;
    poller?.stop();
    this.backlog?.abort();
    this.backlog = null;
    this.setState('disconnected');
  }

  private setState(state: ConnectionState): void {
    if (this.state !== state) {
      this.state = state;
      this.emit('stateChange', state);
    }
  }

  private async resolveViewUri(): Promise<string> {
    const { viewUri, liveId } = this.options;
    if (viewUri) return viewUri;
    if (!liveId) {
      throw new NdgrError('Either liveId or viewUri is required');
    }

    const resolved = await resolveEntryPoint(liveId, {
      cookies: this.options.cookies,
      userAgent: this.options.userAgent,
      watchPageBaseUrl: this.options.watchPageBaseUrl,
    });
    this.emit('metadata', resolved.metadata);
    return resolved.viewUri;
  }

  private createPoller(entryUri: string): LivePoller {
    const poller = new LivePoller({
      entryUri,
      cookies: this.options.cookies,
      userAgent: this.options.userAgent,
      maxAttempts: this.options.maxAttempts,
      retryBaseMs: this.options.retryBaseMs,
      retryMultiplier: this.options.retryMultiplier,
      maxRetryMs: this.options.maxRetryMs,
      assembler: this.assembler,
      scheduler: this.options.scheduler,
      logger: this.logger,
    });

    poller.on('comment', (comment) => this.emit('comment', comment));
    poller.on('message', (raw) => this.emitEvent(raw, false));

    poller.on('backward', (entry) => {
      if (this.fetchBacklog && entry.segmentUri && !this.backlogStarted) {
        this.backlogStarted = true;
        this.collectBacklog(entry.segmentUri).catch((error: Error) => this.emit('error', error));
      }
    });

    poller.on('reconnecting', ({ attempt, delayMs }) => {
      this.logger.info({ attempt, delayMs }, 'reconnecting');
      if (this.poller === poller) this.setState('connecting');
    });

    poller.on('stateChange', (state) => {
      if (this.poller === poller && (state === 'emitting' || state === 'waiting')) {
        this.setState('connected');
      }
    });

    poller.on('error', (error) => {
      this.setState('error');
      this.emit('error', error);
    });

    poller.on('end', () => {
      if (this.poller === poller) {
        this.poller = null;
        this.backlog?.abort();
        this.backlog = null;
        if (this.state !== 'error') this.setState('disconnected');
      }
      this.emit('end');
    });

    return poller;
  }

  /** 過去コメントを取得し、タイムスタンプ昇順で流す */
  private async collectBacklog(segmentUri: string): Promise<void> {
    const controller = new AbortController();
    this.backlog = controller;
    const collector = new BackwardCollector({
      cookies: this.options.cookies,
      userAgent: this.options.userAgent,
      maxAttempts: this.options.maxAttempts,
      retryBaseMs: this.options.retryBaseMs,
      retryMultiplier: this.options.retryMultiplier,
      maxRetryMs: this.options.maxRetryMs,
      maxDepth: this.options.backlogMaxDepth ?? BACKLOG_MAX_DEPTH,
      scheduler: this.options.scheduler,
      logger: this.logger,
    });

    const includeChat = this.backlogEvents.has('chat');
    try {
      for await (const raw of collector.collectFrom(segmentUri, { signal: controller.signal })) {
        if (raw.payload.case !== 'message') continue;
        if (raw.payload.value.type === 'chat') {
          if (includeChat) this.assembler.buffer(raw);
        } else {
          this.assembler.buffer(raw, (event) => this.emitEvent(event, true));
        }
      }
    } catch (error) {
      if (controller.signal.aborted || isAbortError(error)) return;
      throw error;
    } finally {
      if (this.backlog === controller) this.backlog = null;
    }

    for (const comment of this.assembler.flush()) {
      this.emit('comment', { ...comment, isHistory: true });
    }
  }

  /** コメント以外の NicoliveMessage を対応するイベントに変換する */
  private emitEvent(raw: RawMessage, isHistory: boolean): void {
    if (raw.payload.case !== 'message') return;
    const timestamp = new Date(raw.timestamp);
    const message = raw.payload.value;

    switch (message.type) {
      case 'gift':
        if (!isHistory || this.backlogEvents.has('gift')) {
          this.emit('gift', this.mapGift(message.gift, timestamp, isHistory));
        }
        break;
      case 'emotion':
        if (!isHistory || this.backlogEvents.has('emotion')) {
          this.emit('emotion', this.mapEmotion(message.emotion, timestamp, isHistory));
        }
        break;
      case 'notification':
        if (!isHistory || this.backlogEvents.has('notification')) {
          this.emit('notification', this.mapNotification(message.notification, timestamp, isHistory));
        }
        break;
      default:
        break;
    }
  }

  private mapGift(nicoGift: NicoGift, timestamp: Date, isHistory: boolean): Gift {
    const gift: Gift = {
      itemId: nicoGift.itemId,
      itemName: nicoGift.itemName,
      userId: nicoGift.advertiserUserId ? String(nicoGift.advertiserUserId) : undefined,
      userName: nicoGift.advertiserName,
      point: nicoGift.point,
      message: nicoGift.message,
      timestamp,
      platform: 'niconico',
      raw: nicoGift,
    };
    if (isHistory) gift.isHistory = true;
    return gift;
  }

  private mapEmotion(nicoEmotion: NicoEmotion, timestamp: Date, isHistory: boolean): Emotion {
    const emotion: Emotion = {
      id: nicoEmotion.content,
      timestamp,
      platform: 'niconico',
      raw: nicoEmotion,
    };
    if (isHistory) emotion.isHistory = true;
    return emotion;
  }

  private mapNotification(nicoNotif: NicoNotification, timestamp: Date, isHistory: boolean): Notification {
    const notification: Notification = {
      type: nicoNotif.type,
      message: nicoNotif.message,
      timestamp,
      platform: 'niconico',
      raw: nicoNotif,
    };
    if (isHistory) notification.isHistory = true;
    return notification;
  }
}
