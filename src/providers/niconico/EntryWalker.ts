import { createLogger, type Logger } from '../../logger.js';
import { UnknownEntryKindError } from './errors.js';
import { decodeFrames } from './FrameDecoder.js';
import { openByteStream, type HttpStreamOptions } from './HttpStream.js';
import { parseChunkedEntry, type EntryRecord } from './ProtobufParser.js';

export interface EntryWalkerOptions extends HttpStreamOptions {
  /** 未知の ChunkedEntry を受信したとき（レコードは読み飛ばされる） */
  onUnknownEntry?: (error: UnknownEntryKindError) => void;
}

/** View API の URI に at パラメータを付ける */
export function withAt(viewUri: string, at: number | 'now'): string {
  const separator = viewUri.includes('?') ? '&' : '?';
  return `${viewUri}${separator}at=${at}`;
}

/**
 * メッセージサーバー (View API) のエントリストリーム。
 * ChunkedEntry を受信順にそのまま返すだけで、スケジューリングは行わない。
 */
export class EntryWalker {
  private readonly logger: Logger;

  constructor(private readonly options: EntryWalkerOptions = {}) {
    this.logger = options.logger ?? createLogger('entry');
  }

  async *open(entryUri: string, signal?: AbortSignal): AsyncGenerator<EntryRecord> {
    const http = { ...this.options, logger: this.logger };

    for await (const frame of decodeFrames(openByteStream(entryUri, http, signal))) {
      let entry: EntryRecord;
      try {
        entry = parseChunkedEntry(frame);
      } catch (error) {
        if (error instanceof UnknownEntryKindError) {
          this.logger.warn({ uri: entryUri, fields: error.fieldNumbers }, 'skipping unknown entry');
          this.options.onUnknownEntry?.(error);
        } else {
          this.logger.warn({ uri: entryUri, err: error }, 'skipping malformed entry');
        }
        continue;
      }
      yield entry;
    }
  }
}
