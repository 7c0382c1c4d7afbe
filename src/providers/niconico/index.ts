export { NiconicoProvider } from './NiconicoProvider.js';
export type { NiconicoProviderOptions, BacklogEventType } from './NiconicoProvider.js';
export { LivePoller } from './LivePoller.js';
export type { LivePollerOptions, LiveState, ReconnectInfo } from './LivePoller.js';
export { BackwardCollector, downloadKakolog } from './BackwardCollector.js';
export type { BackwardCollectorOptions, CollectOptions, DownloadOptions } from './BackwardCollector.js';
export { MessageAssembler, toComment } from './MessageAssembler.js';
export type { EventObserver } from './MessageAssembler.js';
export { FrameDecoder, decodeFrames, extractMessages, readLengthDelimitedMessage } from './FrameDecoder.js';
export { SegmentFetcher } from './SegmentFetcher.js';
export type { SegmentItem, SegmentLayout } from './SegmentFetcher.js';
export { EntryWalker, withAt } from './EntryWalker.js';
export { resolveEntryPoint, parseEmbeddedData } from './EntryPointResolver.js';
export type { ResolveOptions, ResolvedEntryPoint } from './EntryPointResolver.js';
export { DEFAULT_RETRY, getNextRetryMs, withRetry } from './Retry.js';
export type { RetryOptions, RetryParams } from './Retry.js';
export { realScheduler } from './Scheduler.js';
export type { Scheduler } from './Scheduler.js';
export {
  NdgrError,
  FramingError,
  TruncatedStreamError,
  FetchError,
  UnknownEntryKindError,
  StreamUnavailableError,
} from './errors.js';
export type {
  EntryRecord,
  RawMessage,
  RawPayload,
  SegmentPayload,
  NicoChat,
  NicoGift,
  NicoEmotion,
  NicoModifier,
  NicoMessage,
  NicoNotification,
  NicoNotificationType,
} from './ProtobufParser.js';
