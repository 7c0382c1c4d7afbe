import { createLogger, type Logger } from '../../logger.js';
import { decodeFrames } from './FrameDecoder.js';
import { openByteStream, readWholeBody, type HttpStreamOptions } from './HttpStream.js';
import {
  parseChunkedMessage,
  parsePackedSegment,
  type RawMessage,
  type SegmentPayload,
} from './ProtobufParser.js';

/**
 * セグメントボディの形式。
 * - chunked: Length-Delimited な ChunkedMessage の列（Segment API）
 * - packed: Length-Delimited な PackedSegment の列
 * - packed-raw: 区切りなしの PackedSegment 1件（Backward API）
 */
export type SegmentLayout = 'chunked' | 'packed' | 'packed-raw';

/** fetch() が返す要素。最後に必ず end が1件来る */
export type SegmentItem =
  | { kind: 'message'; message: RawMessage }
  | { kind: 'end'; next?: string; snapshot?: string };

export interface SegmentFetchOptions {
  layout?: SegmentLayout;
  signal?: AbortSignal;
}

/**
 * セグメントサーバーからメッセージを取得する。
 * 1回の fetch() につき HTTP 接続は1本。
 */
export class SegmentFetcher {
  private readonly logger: Logger;

  constructor(private readonly options: HttpStreamOptions = {}) {
    this.logger = options.logger ?? createLogger('segment');
  }

  async *fetch(uri: string, options: SegmentFetchOptions = {}): AsyncGenerator<SegmentItem> {
    const layout = options.layout ?? 'chunked';
    const http = { ...this.options, logger: this.logger };

    if (layout === 'packed-raw') {
      const payload = parsePackedSegment(await readWholeBody(uri, http, options.signal));
      for (const message of payload.messages) {
        yield { kind: 'message', message };
      }
      yield { kind: 'end', next: payload.next, snapshot: payload.snapshot };
      return;
    }

    // PackedSegment が複数レコードに分かれている場合、ポインタは最後に現れた値が正
    let next: string | undefined;
    let snapshot: string | undefined;

    for await (const frame of decodeFrames(openByteStream(uri, http, options.signal))) {
      if (layout === 'chunked') {
        const message = this.parse(uri, () => parseChunkedMessage(frame));
        if (message) yield { kind: 'message', message };
        continue;
      }

      const payload = this.parse(uri, () => parsePackedSegment(frame));
      if (!payload) continue;
      for (const message of payload.messages) {
        yield { kind: 'message', message };
      }
      next = payload.next ?? next;
      snapshot = payload.snapshot ?? snapshot;
    }

    yield { kind: 'end', next, snapshot };
  }

  /** 1回分の取得結果をまとめて返す */
  async fetchPayload(uri: string, options: SegmentFetchOptions = {}): Promise<SegmentPayload> {
    const payload: SegmentPayload = { messages: [] };
    for await (const item of this.fetch(uri, options)) {
      if (item.kind === 'message') {
        payload.messages.push(item.message);
      } else {
        payload.next = item.next;
        payload.snapshot = item.snapshot;
      }
    }
    return payload;
  }

  private parse<T>(uri: string, parse: () => T): T | null {
    try {
      return parse();
    } catch (error) {
      // malformed protobuf — skip
      this.logger.warn({ uri, err: error }, 'skipping malformed record');
      return null;
    }
  }
}
