import type { Logger } from '../../logger.js';
import { FetchError } from './errors.js';

/** HTTP接続タイムアウト (30秒) */
export const CONNECT_TIMEOUT_MS = 30_000;

/** ストリーミング無通信タイムアウト (60秒) */
export const INACTIVITY_TIMEOUT_MS = 60_000;

/** 非ストリーミングのレスポンスサイズ上限 (16 MB) */
export const MAX_RESPONSE_SIZE = 16 * 1024 * 1024;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

export interface HttpStreamOptions {
  cookies?: string;
  userAgent?: string;
  connectTimeoutMs?: number;
  inactivityTimeoutMs?: number;
  logger?: Logger;
}

/**
 * URI に GET し、レスポンスボディをチャンク単位で返す。
 *
 * - 接続フェーズのタイムアウトはヘッダ受信でクリアする
 * - ボディ受信中は無通信タイムアウトを監視する
 * - 非2xx・通信エラー・タイムアウトは FetchError
 * - 外部 signal による中断は AbortError をそのまま投げる
 */
export async function* openByteStream(
  uri: string,
  options: HttpStreamOptions = {},
  signal?: AbortSignal,
): AsyncGenerator<Uint8Array> {
  signal?.throwIfAborted();

  const controller = new AbortController();
  const combined = signal ? AbortSignal.any([controller.signal, signal]) : controller.signal;
  let timeoutReason: string | null = null;

  const timeout = (reason: string, ms: number) =>
    setTimeout(() => {
      timeoutReason = reason;
      controller.abort();
    }, ms);

  const headers: Record<string, string> = {
    'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
  };
  if (options.cookies) headers['Cookie'] = options.cookies;

  options.logger?.debug({ uri }, 'GET');

  let timer = timeout('connect timeout', options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS);
  let response: Response;
  try {
    response = await fetch(uri, { headers, signal: combined });
  } catch (error) {
    clearTimeout(timer);
    signal?.throwIfAborted();
    throw new FetchError(uri, { cause: timeoutReason ? new Error(timeoutReason) : error });
  }
  clearTimeout(timer);

  if (!response.ok) {
    await response.body?.cancel();
    throw new FetchError(uri, { status: response.status });
  }
  if (!response.body) return;

  const reader = response.body.getReader();
  const inactivityMs = options.inactivityTimeoutMs ?? INACTIVITY_TIMEOUT_MS;
  // 中断時は読み取り待ちを即座に終わらせる
  const onAbort = () => {
    reader.cancel().catch((error: unknown) => {
      options.logger?.debug({ uri, err: error }, 'cancel after abort failed');
    });
  };
  combined.addEventListener('abort', onAbort, { once: true });

  let finished = false;
  timer = timeout('inactivity timeout', inactivityMs);
  try {
    while (true) {
      let result: ReadableStreamReadResult<Uint8Array>;
      try {
        result = await reader.read();
      } catch (error) {
        signal?.throwIfAborted();
        throw new FetchError(uri, { cause: timeoutReason ? new Error(timeoutReason) : error });
      }
      if (combined.aborted) {
        signal?.throwIfAborted();
        throw new FetchError(uri, { cause: new Error(timeoutReason ?? 'aborted') });
      }
      if (result.done) {
        finished = true;
        return;
      }

      clearTimeout(timer);
      yield result.value;
      timer = timeout('inactivity timeout', inactivityMs);
    }
  } finally {
    clearTimeout(timer);
    combined.removeEventListener('abort', onAbort);
    if (!finished && !combined.aborted) {
      // 呼び出し側が途中で抜けた場合は接続を閉じる
      await reader.cancel().catch((error: unknown) => {
        options.logger?.debug({ uri, err: error }, 'cancel failed');
      });
    }
  }
}

/** ボディ全体を一括で読み取る（Length-Delimited でないレスポンス用） */
export async function readWholeBody(
  uri: string,
  options: HttpStreamOptions = {},
  signal?: AbortSignal,
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let size = 0;

  for await (const chunk of openByteStream(uri, options, signal)) {
    size += chunk.length;
    if (size > MAX_RESPONSE_SIZE) {
      throw new FetchError(uri, {
        cause: new Error(`Response size exceeds limit ${MAX_RESPONSE_SIZE}`),
      });
    }
    chunks.push(chunk);
  }

  const body = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.length;
  }
  return body;
}
