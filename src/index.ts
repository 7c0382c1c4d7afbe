// 共通インターフェース
export type { ICommentProvider } from './interfaces/ICommentProvider.js';
export type {
  BroadcastMetadata,
  Comment,
  CommentAttributes,
  CommentOrigin,
  ConnectionState,
  Gift,
  Emotion,
  Notification,
} from './interfaces/types.js';
export { createLogger, createSilentLogger } from './logger.js';
export type { Logger } from './logger.js';

// ニコニコプロバイダー
export * from './providers/niconico/index.js';
