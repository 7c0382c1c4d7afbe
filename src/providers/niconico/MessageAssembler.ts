import type { Comment } from '../../interfaces/types.js';
import type { NicoChat, RawMessage } from './ProtobufParser.js';

/** コメント以外のメッセージ（ギフト・通知・状態・シグナル）の受け取り口 */
export type EventObserver = (raw: RawMessage) => void;

function chatOf(raw: RawMessage): NicoChat | undefined {
  if (raw.payload.case === 'message' && raw.payload.value.type === 'chat') {
    return raw.payload.value.chat;
  }
  return undefined;
}

/**
 * 重複排除のキー。通常は meta.id。
 * meta の無いメッセージは時刻と内容から作る（状態・シグナルは null = 判定しない）。
 */
function dedupKey(raw: RawMessage): string | null {
  if (raw.id !== '') return raw.id;
  if (raw.payload.case !== 'message') return null;
  return `\u0000${raw.timestamp}:${JSON.stringify(raw.payload.value)}`;
}

/** RawMessage → Comment。コメント以外は undefined */
export function toComment(raw: RawMessage, isHistory?: boolean): Comment | undefined {
  const chat = chatOf(raw);
  if (!chat) return undefined;

  const comment: Comment = {
    id: raw.id,
    content: chat.content,
    userId: chat.hashedUserId || (chat.rawUserId ? String(chat.rawUserId) : undefined),
    userName: chat.name?.startsWith('a:') ? undefined : chat.name,
    timestamp: new Date(raw.timestamp),
    no: chat.no,
    vpos: chat.vpos,
    attributes: {
      position: chat.modifier.position,
      size: chat.modifier.size,
      color: chat.modifier.color,
      font: chat.modifier.font,
      opacity: chat.modifier.opacity,
      premium: chat.accountStatus === 'premium',
    },
    origin: { ...raw.origin },
    platform: 'niconico',
    raw: chat,
  };
  if (isHistory) comment.isHistory = true;
  return comment;
}

/**
 * RawMessage の重複排除と Comment への変換。
 * 既出IDは1セッション（ライブ1回 / ダウンロード1回）の間だけ保持する。
 *
 * assemble() は受信順に返し、buffer() + flush() はタイムスタンプ昇順にまとめて返す。
 */
export class MessageAssembler {
  private readonly seenComments = new Set<string>();
  private readonly seenEvents = new Set<string>();
  private buffered: Comment[] = [];

  constructor(private readonly isHistory = false) {}

  /** 既出コメント数 */
  get size(): number {
    return this.seenComments.size;
  }

  /**
   * コメントなら変換して返す。既出IDは黙って捨てる。
   * コメント以外は observer に渡し、undefined を返す。
   */
  assemble(raw: RawMessage, observer?: EventObserver): Comment | undefined {
    const key = dedupKey(raw);
    if (!chatOf(raw)) {
      if (this.markSeen(this.seenEvents, key)) observer?.(raw);
      return undefined;
    }
    if (!this.markSeen(this.seenComments, key)) return undefined;
    return toComment(raw, this.isHistory);
  }

  /** バッチモード: 変換結果を flush() まで溜める */
  buffer(raw: RawMessage, observer?: EventObserver): void {
    const comment = this.assemble(raw, observer);
    if (comment) this.buffered.push(comment);
  }

  /** 溜めたコメントをタイムスタンプ昇順（同時刻は到着順）で返す */
  flush(): Comment[] {
    const sorted = this.buffered.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    this.buffered = [];
    return sorted;
  }

  reset(): void {
    this.seenComments.clear();
    this.seenEvents.clear();
    this.buffered = [];
  }

  private markSeen(seen: Set<string>, key: string | null): boolean {
    if (key === null) return true;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  }
}
