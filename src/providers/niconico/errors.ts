/**
 * NDGR クライアントのエラー型。
 *
 * FramingError / TruncatedStreamError / FetchError は一時的な障害として
 * 呼び出し側でリトライされる。リトライが尽きると StreamUnavailableError になる。
 */
export class NdgrError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 長さプレフィックスが壊れている（上限超過・不正な varint） */
export class FramingError extends NdgrError {}

/** レコードの途中でストリームが閉じられた */
export class TruncatedStreamError extends NdgrError {
  readonly pendingBytes: number;

  constructor(pendingBytes: number) {
    super(`Stream ended with ${pendingBytes} bytes of an incomplete record`);
    this.pendingBytes = pendingBytes;
  }
}

/** HTTP ステータス異常または通信エラー */
export class FetchError extends NdgrError {
  readonly uri: string;
  readonly status?: number;

  constructor(uri: string, detail: { status?: number; cause?: unknown }) {
    const reason =
      detail.status !== undefined
        ? `server returned ${detail.status}`
        : `request failed: ${describe(detail.cause)}`;
    super(`${uri}: ${reason}`, { cause: detail.cause });
    this.uri = uri;
    this.status = detail.status;
  }
}

/** ChunkedEntry にどの既知フィールドも含まれていない */
export class UnknownEntryKindError extends NdgrError {
  readonly fieldNumbers: number[];

  constructor(fieldNumbers: number[]) {
    super(
      fieldNumbers.length > 0
        ? `Unknown ChunkedEntry kind (fields: ${fieldNumbers.join(', ')})`
        : 'Empty ChunkedEntry',
    );
    this.fieldNumbers = fieldNumbers;
  }
}

/** リトライ上限に達し、ストリームを継続できない */
export class StreamUnavailableError extends NdgrError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Stream unavailable after ${attempts} attempts: ${describe(cause)}`, { cause });
    this.attempts = attempts;
  }
}

/** リトライ対象のエラーか */
export function isRetryable(error: unknown): boolean {
  return (
    error instanceof FetchError ||
    error instanceof FramingError ||
    error instanceof TruncatedStreamError
  );
}

/** AbortController による中断か */
export function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'AbortError'
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
