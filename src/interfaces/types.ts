/** コメントの表示属性（コマンド） */
export interface CommentAttributes {
  /** 表示位置 (naka / shita / ue) */
  position?: string;
  /** 文字サイズ (medium / small / big) */
  size?: string;
  /** 名前付き色、または RGB */
  color?: string | { r: number; g: number; b: number };
  /** フォント (defont / mincho / gothic) */
  font?: string;
  /** 不透明度 (normal / translucent) */
  opacity?: string;
  /** プレミアム会員か */
  premium?: boolean;
}

/** コメントの発生元 */
export interface CommentOrigin {
  /** 番組ID（数値部分） */
  liveId?: number;
}

/** プラットフォーム共通のコメント型 */
export interface Comment {
  /** コメントID（プラットフォーム固有、重複排除キー） */
  id: string;
  /** コメント本文 */
  content: string;
  /** ユーザーID（匿名の場合はundefined） */
  userId?: string;
  /** ユーザー名（匿名の場合はundefined） */
  userName?: string;
  /** 投稿日時 */
  timestamp: Date;
  /** コメント番号（未設定なら0） */
  no: number;
  /** 番組開始からの相対時刻 (1/100 秒) */
  vpos: number;
  attributes: CommentAttributes;
  origin: CommentOrigin;
  /** プラットフォーム名 */
  platform: string;
  /** プラットフォーム固有の生データ */
  raw: unknown;
  /** 過去コメント（バックログ）かどうか */
  isHistory?: boolean;
}

/** ギフト（投げ銭） */
export interface Gift {
  itemId: string;
  itemName: string;
  userId?: string;
  userName?: string;
  point: number;
  message: string;
  timestamp: Date;
  platform: string;
  raw: unknown;
  isHistory?: boolean;
}

/** エモーション（スタンプ等） */
export interface Emotion {
  id: string;
  timestamp: Date;
  platform: string;
  raw: unknown;
  isHistory?: boolean;
}

/** 通知 (SimpleNotificationV2 の EMOTION 以外) */
export interface Notification {
  /** 通知タイプ */
  type: string;
  /** メッセージ本文 */
  message: string;
  timestamp: Date;
  platform: string;
  raw: unknown;
  isHistory?: boolean;
}

/** 接続状態 */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/** 放送メタデータ（接続成功時に一度だけ発火） */
export interface BroadcastMetadata {
  /** 番組タイトル */
  title?: string;
  /** 番組ステータス ('ON_AIR' | 'ENDED' | etc.) */
  status?: string;
  /** 番組説明（HTML含む） */
  description?: string;
  /** 番組開始時刻 */
  beginTime?: Date;
  /** 番組終了時刻（予定含む） */
  endTime?: Date;
  /** vpos の基準時刻 */
  vposBaseTime?: Date;
}
