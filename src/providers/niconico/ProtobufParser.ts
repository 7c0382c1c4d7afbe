import protobuf from 'protobufjs/minimal.js';
import { UnknownEntryKindError } from './errors.js';
const { Reader } = protobuf;

type ProtoReader = InstanceType<typeof Reader>;

/**
 * Proto定義 (dwango.nicolive.chat.service.edge):
 *   ChunkedEntry { oneof entry: segment=1(MessageSegment), backward=2(BackwardSegment), previous=3(MessageSegment), next=4(ReadyForNext) }
 *   MessageSegment { from=1(Timestamp), until=2(Timestamp), uri=3(string) }
 *   BackwardSegment { until=1(Timestamp), segment=2(PackedSegment.Next), snapshot=3(PackedSegment.StateSnapshot) }
 *   ReadyForNext { at=1(int64) }
 *   PackedSegment { messages=1(repeated ChunkedMessage), next=2(Next{uri=1}), snapshot=3(StateSnapshot{uri=1}) }
 *   ChunkedMessage { meta=1(Meta), oneof payload: message=2(NicoliveMessage), state=4(NicoliveState), signal=5(Signal) }
 *   ChunkedMessage.Meta { id=1(string), at=2(Timestamp), origin=3(NicoliveOrigin) }
 *   NicoliveOrigin { oneof origin: chat=1(Chat{ live_id=1(int64) }) }
 *   NicoliveMessage { oneof data: chat=1, simple_notification=7, gift=8, overflowed_chat=20, simple_notification_v2=23, ... }
 *   Chat { content=1, name=2, vpos=3, account_status=4, raw_user_id=5, hashed_user_id=6, modifier=7, no=8 }
 *   Chat.Modifier { position=1, size=2, named_color=3, full_color=4(FullColor{r=1,g=2,b=3}), font=5, opacity=6 }
 *   Gift { item_id=1, advertiser_user_id=2, advertiser_name=3, point=4, message=5, item_name=6, contribution_rank=7 }
 *   SimpleNotification { emotion=3(string) }
 *   SimpleNotificationV2 { type=1(NotificationType), message=2(string), show_in_telop=3, show_in_list=4 }
 *   Signal { Flushed=0 }
 *   google.protobuf.Timestamp { seconds=1(int64), nanos=2(int32) }
 */

// ── エントリ ──

/** 現在／直前のセグメント */
export interface SegmentWindow {
  /** 開始時刻 (epoch ms) */
  from?: number;
  /** 終了時刻 (epoch ms)。完了の保証ではなく上限 */
  until?: number;
  uri: string;
}

/** ChunkedEntry の解析結果。oneof のうち有効なケースのみを持つ */
export type EntryRecord =
  | ({ kind: 'segment' } & SegmentWindow)
  | ({ kind: 'previous' } & SegmentWindow)
  | { kind: 'backward'; until?: number; segmentUri?: string; snapshotUri?: string }
  | { kind: 'next'; at: number };

// ── メッセージ ──

/** コメントの表示位置 */
export type NicoPosition = 'naka' | 'shita' | 'ue';
/** コメントの表示サイズ */
export type NicoSize = 'medium' | 'small' | 'big';
/** コメントのフォント */
export type NicoFont = 'defont' | 'mincho' | 'gothic';
/** コメントの不透明度 */
export type NicoOpacity = 'normal' | 'translucent';
/** アカウント種別 */
export type NicoAccountStatus = 'standard' | 'premium';

/** RGB 指定色 */
export interface NicoFullColor {
  r: number;
  g: number;
  b: number;
}

/** Chat.Modifier（コマンド） */
export interface NicoModifier {
  position: NicoPosition;
  size: NicoSize;
  /** 名前付き色。full_color がある場合はそちらが優先される */
  color: string | NicoFullColor;
  font: NicoFont;
  opacity: NicoOpacity;
}

/** ニコニコ固有のChat生データ */
export interface NicoChat {
  no: number;
  vpos: number;
  content: string;
  name?: string;
  accountStatus: NicoAccountStatus;
  rawUserId?: number;
  hashedUserId?: string;
  modifier: NicoModifier;
}

/** ニコニコ固有のGift生データ */
export interface NicoGift {
  itemId: string;
  advertiserUserId?: number;
  advertiserName: string;
  point: number;
  message: string;
  itemName: string;
  contributionRank?: number;
}

/** ニコニコ固有のエモーション */
export interface NicoEmotion {
  content: string;
}

/** SimpleNotificationV2 の通知タイプ (EMOTION 以外) */
export type NicoNotificationType =
  | 'unknown'
  | 'ichiba'
  | 'cruise'
  | 'program_extended'
  | 'ranking_in'
  | 'visited'
  | 'supporter_registered'
  | 'user_level_up'
  | 'user_follow';

/** ニコニコ固有の通知 (SimpleNotificationV2 type!=EMOTION) */
export interface NicoNotification {
  type: NicoNotificationType;
  message: string;
}

/** NicoliveMessage の oneof */
export type NicoMessage =
  | { type: 'chat'; chat: NicoChat; overflowed: boolean }
  | { type: 'gift'; gift: NicoGift }
  | { type: 'emotion'; emotion: NicoEmotion }
  | { type: 'notification'; notification: NicoNotification }
  | { type: 'unsupported'; field: number };

/** NicoliveState。放送制御の内容は解釈せずバイト列のまま保持する */
export interface NicoState {
  bytes: Uint8Array;
}

/** メッセージの発生元 */
export interface NicoOrigin {
  liveId?: number;
}

/** ChunkedMessage.payload の oneof */
export type RawPayload =
  | { case: 'message'; value: NicoMessage }
  | { case: 'state'; value: NicoState }
  | { case: 'signal'; value: 'flushed' };

/** ChunkedMessage の解析結果 */
export interface RawMessage {
  /** 重複排除キー */
  id: string;
  /** 投稿時刻 (epoch ms) */
  timestamp: number;
  origin: NicoOrigin;
  payload: RawPayload;
}

/** PackedSegment の解析結果 */
export interface SegmentPayload {
  messages: RawMessage[];
  /** 同じセグメントの続き（過去方向のチェーン） */
  next?: string;
  snapshot?: string;
}

// ── 共通 ──

function readInt64(reader: ProtoReader): number {
  const v: number | { low: number; high: number } = reader.int64();
  return typeof v === 'number' ? v : v.high * 0x1_0000_0000 + (v.low >>> 0);
}

/** google.protobuf.Timestamp → epoch ms */
function parseTimestamp(data: Uint8Array): number {
  const reader = new Reader(data);
  let seconds = 0;
  let nanos = 0;

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;
    if (field === 1 && wireType === 0) {
      seconds = readInt64(reader);
    } else if (field === 2 && wireType === 0) {
      nanos = reader.int32();
    } else {
      reader.skipType(wireType);
    }
  }

  return seconds * 1000 + Math.floor(nanos / 1_000_000);
}

/**
 * URI サブメッセージ: { uri=1(string) }
 * PackedSegment.Next / PackedSegment.StateSnapshot で共通。
 */
function parseUriField(data: Uint8Array): string | undefined {
  const reader = new Reader(data);
  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;
    if (field === 1 && wireType === 2) {
      return reader.string();
    }
    reader.skipType(wireType);
  }
  return undefined;
}

// ── ChunkedEntry ──

/**
 * ChunkedEntryをパースする。
 * View API（エントリポイント）から返るデータ。
 * 既知のケースが一つもなければ UnknownEntryKindError。
 */
export function parseChunkedEntry(data: Uint8Array): EntryRecord {
  const reader = new Reader(data);
  const unknownFields: number[] = [];
  let entry: EntryRecord | undefined;

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;

    if (wireType !== 2 || field < 1 || field > 4) {
      unknownFields.push(field);
      reader.skipType(wireType);
      continue;
    }

    const subData = reader.bytes();
    // oneof は後勝ち
    switch (field) {
      case 1:
        entry = { kind: 'segment', ...parseMessageSegment(subData) };
        break;
      case 2:
        entry = { kind: 'backward', ...parseBackwardSegment(subData) };
        break;
      case 3:
        entry = { kind: 'previous', ...parseMessageSegment(subData) };
        break;
      case 4:
        entry = { kind: 'next', at: parseReadyForNext(subData) };
        break;
    }
  }

  if (!entry) {
    throw new UnknownEntryKindError(unknownFields);
  }
  return entry;
}

/**
 * MessageSegment: from=1(Timestamp), until=2(Timestamp), uri=3(string)
 */
function parseMessageSegment(data: Uint8Array): SegmentWindow {
  const reader = new Reader(data);
  const result: SegmentWindow = { uri: '' };

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;

    if (wireType !== 2) {
      reader.skipType(wireType);
      continue;
    }

    switch (field) {
      case 1:
        result.from = parseTimestamp(reader.bytes());
        break;
      case 2:
        result.until = parseTimestamp(reader.bytes());
        break;
      case 3:
        result.uri = reader.string();
        break;
      default:
        reader.skipType(wireType);
        break;
    }
  }

  return result;
}

/**
 * BackwardSegment: until=1(Timestamp), segment=2(PackedSegment.Next), snapshot=3(StateSnapshot)
 */
function parseBackwardSegment(data: Uint8Array): {
  until?: number;
  segmentUri?: string;
  snapshotUri?: string;
} {
  const reader = new Reader(data);
  const result: { until?: number; segmentUri?: string; snapshotUri?: string } = {};

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;

    if (wireType !== 2) {
      reader.skipType(wireType);
      continue;
    }

    switch (field) {
      case 1:
        result.until = parseTimestamp(reader.bytes());
        break;
      case 2:
        result.segmentUri = parseUriField(reader.bytes());
        break;
      case 3:
        result.snapshotUri = parseUriField(reader.bytes());
        break;
      default:
        reader.skipType(wireType);
        break;
    }
  }

  return result;
}

/**
 * ReadyForNext: at=1(int64) — epoch 秒
 */
function parseReadyForNext(data: Uint8Array): number {
  const reader = new Reader(data);
  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;
    if (field === 1 && wireType === 0) {
      return readInt64(reader);
    }
    reader.skipType(wireType);
  }
  return 0;
}

// ── PackedSegment / ChunkedMessage ──

/**
 * PackedSegmentをパースする。
 * payload を持たない ChunkedMessage は messages に含めない。
 */
export function parsePackedSegment(data: Uint8Array): SegmentPayload {
  const reader = new Reader(data);
  const result: SegmentPayload = { messages: [] };

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;

    if (wireType !== 2) {
      reader.skipType(wireType);
      continue;
    }

    const subData = reader.bytes();
    switch (field) {
      case 1: {
        const message = parseChunkedMessage(subData);
        if (message) result.messages.push(message);
        break;
      }
      case 2:
        result.next = parseUriField(subData);
        break;
      case 3:
        result.snapshot = parseUriField(subData);
        break;
    }
  }

  return result;
}

/**
 * ChunkedMessageをパースする。
 * payload が空（meta のみ）の場合は null。
 */
export function parseChunkedMessage(data: Uint8Array): RawMessage | null {
  const reader = new Reader(data);
  let id = '';
  let timestamp = 0;
  let origin: NicoOrigin = {};
  let payload: RawPayload | undefined;

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;

    if (field === 1 && wireType === 2) {
      ({ id, timestamp, origin } = parseMeta(reader.bytes()));
    } else if (field === 2 && wireType === 2) {
      payload = { case: 'message', value: parseNicoliveMessage(reader.bytes()) };
    } else if (field === 4 && wireType === 2) {
      payload = { case: 'state', value: { bytes: reader.bytes() } };
    } else if (field === 5 && wireType === 0) {
      // Signal は Flushed=0 のみ定義されている
      reader.int32();
      payload = { case: 'signal', value: 'flushed' };
    } else {
      reader.skipType(wireType);
    }
  }

  if (!payload) return null;
  return { id, timestamp, origin, payload };
}

/**
 * Meta: id=1(string), at=2(Timestamp), origin=3(NicoliveOrigin)
 */
function parseMeta(data: Uint8Array): { id: string; timestamp: number; origin: NicoOrigin } {
  const reader = new Reader(data);
  const meta: { id: string; timestamp: number; origin: NicoOrigin } = { id: '', timestamp: 0, origin: {} };

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;

    if (field === 1 && wireType === 2) {
      meta.id = reader.string();
    } else if (field === 2 && wireType === 2) {
      meta.timestamp = parseTimestamp(reader.bytes());
    } else if (field === 3 && wireType === 2) {
      meta.origin = parseOrigin(reader.bytes());
    } else {
      reader.skipType(wireType);
    }
  }

  return meta;
}

/**
 * NicoliveOrigin: chat=1 { live_id=1(int64) }
 */
function parseOrigin(data: Uint8Array): NicoOrigin {
  const reader = new Reader(data);
  const origin: NicoOrigin = {};

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;

    if (field === 1 && wireType === 2) {
      const chat = new Reader(reader.bytes());
      while (chat.pos < chat.len) {
        const chatTag = chat.uint32();
        if (chatTag >>> 3 === 1 && (chatTag & 7) === 0) {
          origin.liveId = readInt64(chat);
        } else {
          chat.skipType(chatTag & 7);
        }
      }
    } else {
      reader.skipType(wireType);
    }
  }

  return origin;
}

/**
 * NicoliveMessage: oneof data
 *   chat=1, simple_notification=7, gift=8, overflowed_chat=20, simple_notification_v2=23
 */
function parseNicoliveMessage(data: Uint8Array): NicoMessage {
  const reader = new Reader(data);
  let message: NicoMessage = { type: 'unsupported', field: 0 };

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;

    if (wireType !== 2) {
      reader.skipType(wireType);
      continue;
    }

    const subData = reader.bytes();
    switch (field) {
      case 1:
        message = { type: 'chat', chat: parseChat(subData), overflowed: false };
        break;
      case 20:
        message = { type: 'chat', chat: parseChat(subData), overflowed: true };
        break;
      case 7:
        message = { type: 'emotion', emotion: parseSimpleNotification(subData) };
        break;
      case 8:
        message = { type: 'gift', gift: parseGift(subData) };
        break;
      case 23:
        message = parseSimpleNotificationV2(subData);
        break;
      default:
        message = { type: 'unsupported', field };
        break;
    }
  }

  return message;
}

const POSITIONS: NicoPosition[] = ['naka', 'shita', 'ue'];
const SIZES: NicoSize[] = ['medium', 'small', 'big'];
const FONTS: NicoFont[] = ['defont', 'mincho', 'gothic'];
const OPACITIES: NicoOpacity[] = ['normal', 'translucent'];
const NAMED_COLORS = [
  'white', 'red', 'pink', 'orange', 'yellow', 'green', 'cyan', 'blue', 'purple', 'black',
  'white2', 'red2', 'pink2', 'orange2', 'yellow2', 'green2', 'cyan2', 'blue2', 'purple2', 'black2',
];

function pick<T>(values: readonly T[], index: number): T {
  return values[index] ?? values[0];
}

/**
 * Chatメッセージをパースする。
 *
 * field 1: content (string)
 * field 2: name (string, optional)
 * field 3: vpos (int32)
 * field 4: account_status (enum)
 * field 5: raw_user_id (int64, optional)
 * field 6: hashed_user_id (string, optional)
 * field 7: modifier (Modifier)
 * field 8: no (int32)
 */
function parseChat(data: Uint8Array): NicoChat {
  const reader = new Reader(data);
  const chat: NicoChat = {
    no: 0,
    vpos: 0,
    content: '',
    accountStatus: 'standard',
    modifier: parseModifier(new Uint8Array(0)),
  };

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;
    const key = `${field}:${wireType}`;

    switch (key) {
      case '1:2':
        chat.content = reader.string();
        break;
      case '2:2':
        chat.name = reader.string();
        break;
      case '3:0':
        chat.vpos = reader.int32();
        break;
      case '4:0':
        chat.accountStatus = reader.int32() === 1 ? 'premium' : 'standard';
        break;
      case '5:0':
        chat.rawUserId = readInt64(reader);
        break;
      case '6:2':
        chat.hashedUserId = reader.string();
        break;
      case '7:2':
        chat.modifier = parseModifier(reader.bytes());
        break;
      case '8:0':
        chat.no = reader.int32();
        break;
      default:
        reader.skipType(wireType);
        break;
    }
  }

  return chat;
}

/**
 * Modifier: position=1, size=2, named_color=3, full_color=4, font=5, opacity=6
 */
function parseModifier(data: Uint8Array): NicoModifier {
  const reader = new Reader(data);
  const modifier: NicoModifier = {
    position: 'naka',
    size: 'medium',
    color: 'white',
    font: 'defont',
    opacity: 'normal',
  };
  let fullColor: NicoFullColor | undefined;

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;

    if (field === 4 && wireType === 2) {
      fullColor = parseFullColor(reader.bytes());
      continue;
    }
    if (wireType !== 0) {
      reader.skipType(wireType);
      continue;
    }

    const value = reader.int32();
    switch (field) {
      case 1:
        modifier.position = pick(POSITIONS, value);
        break;
      case 2:
        modifier.size = pick(SIZES, value);
        break;
      case 3:
        modifier.color = pick(NAMED_COLORS, value);
        break;
      case 5:
        modifier.font = pick(FONTS, value);
        break;
      case 6:
        modifier.opacity = pick(OPACITIES, value);
        break;
    }
  }

  if (fullColor) modifier.color = fullColor;
  return modifier;
}

/** FullColor: r=1, g=2, b=3 */
function parseFullColor(data: Uint8Array): NicoFullColor {
  const reader = new Reader(data);
  const color: NicoFullColor = { r: 0, g: 0, b: 0 };

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;
    if (wireType !== 0) {
      reader.skipType(wireType);
      continue;
    }
    const value = reader.int32();
    if (field === 1) color.r = value;
    else if (field === 2) color.g = value;
    else if (field === 3) color.b = value;
  }

  return color;
}

/**
 * SimpleNotification: oneof emotion=3(string)
 */
function parseSimpleNotification(data: Uint8Array): NicoEmotion {
  const reader = new Reader(data);

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    if (tag >>> 3 === 3 && (tag & 7) === 2) {
      return { content: reader.string() };
    }
    reader.skipType(tag & 7);
  }

  return { content: '' };
}

/** NotificationType enum → NicoNotificationType (2 = EMOTION は emotion として扱う) */
const NOTIFICATION_TYPES: Record<number, NicoNotificationType> = {
  0: 'unknown',
  1: 'ichiba',
  3: 'cruise',
  4: 'program_extended',
  5: 'ranking_in',
  6: 'visited',
  7: 'supporter_registered',
  8: 'user_level_up',
  9: 'user_follow',
};

/**
 * SimpleNotificationV2: type=1(NotificationType), message=2(string)
 */
function parseSimpleNotificationV2(data: Uint8Array): NicoMessage {
  const reader = new Reader(data);
  let type = 0;
  let message = '';

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const field = tag >>> 3;
    const wireType = tag & 7;
    if (field === 1 && wireType === 0) {
      type = reader.int32();
    } else if (field === 2 && wireType === 2) {
      message = reader.string();
    } else {
      reader.skipType(wireType);
    }
  }

  if (type === 2) {
    return { type: 'emotion', emotion: { content: message } };
  }
  return {
    type: 'notification',
    notification: { type: NOTIFICATION_TYPES[type] ?? 'unknown', message },
  };
}

/**
 * Gift: item_id=1, advertiser_user_id=2, advertiser_name=3, point=4, message=5, item_name=6, contribution_rank=7
 */
function parseGift(data: Uint8Array): NicoGift {
  const reader = new Reader(data);
  const gift: NicoGift = {
    itemId: '',
    advertiserName: '',
    point: 0,
    message: '',
    itemName: '',
  };

  while (reader.pos < reader.len) {
    const tag = reader.uint32();
    const key = `${tag >>> 3}:${tag & 7}`;

    switch (key) {
      case '1:2':
        gift.itemId = reader.string();
        break;
      case '2:0':
        gift.advertiserUserId = readInt64(reader);
        break;
      case '3:2':
        gift.advertiserName = reader.string();
        break;
      case '4:0':
        gift.point = readInt64(reader);
        break;
      case '5:2':
        gift.message = reader.string();
        break;
      case '6:2':
        gift.itemName = reader.string();
        break;
      case '7:0':
        gift.contributionRank = reader.int32();
        break;
      default:
        reader.skipType(tag & 7);
        break;
    }
  }

  return gift;
}
