import protobuf from 'protobufjs/minimal.js';
import { FramingError, TruncatedStreamError } from './errors.js';
const { Reader } = protobuf;

/** メッセージサイズ上限 (16 MB) — これを超える長さプレフィックスは破損とみなす */
export const MAX_MESSAGE_SIZE = 16 * 1024 * 1024;

/** uint32 varint の最大バイト数 */
const MAX_VARINT_BYTES = 5;

/**
 * Length-Delimitedバッファから1メッセージを読み取る。
 * データ不足の場合はnullを返す。
 */
export function readLengthDelimitedMessage(
  buffer: Uint8Array,
): { message: Uint8Array; bytesRead: number } | null {
  if (buffer.length === 0) return null;

  // varint の終端バイト（MSB=0）が揃っているか先に確認する
  let terminated = false;
  for (let i = 0; i < Math.min(buffer.length, MAX_VARINT_BYTES); i++) {
    if ((buffer[i] & 0x80) === 0) {
      terminated = true;
      break;
    }
  }
  if (!terminated) {
    if (buffer.length >= MAX_VARINT_BYTES) {
      throw new FramingError('Length prefix is not a valid uint32 varint');
    }
    return null;
  }

  const reader = new Reader(buffer);
  const messageLength = reader.uint32();
  const headerSize = reader.pos;

  if (messageLength > MAX_MESSAGE_SIZE) {
    throw new FramingError(`Message size ${messageLength} exceeds limit ${MAX_MESSAGE_SIZE}`);
  }

  if (buffer.length < headerSize + messageLength) return null;

  const message = buffer.slice(headerSize, headerSize + messageLength);
  return { message, bytesRead: headerSize + messageLength };
}

/**
 * バッファからすべてのLength-Delimitedメッセージを抽出する。
 * 残りのバッファも返す。
 */
export function extractMessages(
  buffer: Uint8Array,
): { messages: Uint8Array[]; remaining: Uint8Array } {
  const messages: Uint8Array[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    const result = readLengthDelimitedMessage(buffer.subarray(offset));
    if (!result) break;
    messages.push(result.message);
    offset += result.bytesRead;
  }

  return { messages, remaining: buffer.slice(offset) };
}

/**
 * 任意の境界で分割されたチャンクを受け取り、完全なレコードだけを返すデコーダー。
 * 1ストリームにつき1インスタンスを使う。
 */
export class FrameDecoder {
  private buffer = new Uint8Array(0);

  /** 未処理のバイト数 */
  get pending(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array): Uint8Array[] {
    const combined = new Uint8Array(this.buffer.length + chunk.length);
    combined.set(this.buffer, 0);
    combined.set(chunk, this.buffer.length);

    try {
      const { messages, remaining } = extractMessages(combined);
      this.buffer = remaining;
      return messages;
    } catch (error) {
      this.buffer = new Uint8Array(0);
      throw error;
    }
  }

  /** ストリーム終端。途中のレコードが残っていれば TruncatedStreamError */
  finish(): void {
    const pending = this.buffer.length;
    this.buffer = new Uint8Array(0);
    if (pending > 0) {
      throw new TruncatedStreamError(pending);
    }
  }

  reset(): void {
    this.buffer = new Uint8Array(0);
  }
}

/** バイト列の非同期シーケンスをレコード単位に分解する */
export async function* decodeFrames(
  source: AsyncIterable<Uint8Array>,
): AsyncGenerator<Uint8Array> {
  const decoder = new FrameDecoder();
  for await (const chunk of source) {
    yield* decoder.push(chunk);
  }
  decoder.finish();
}
