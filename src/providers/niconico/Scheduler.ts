/**
 * 時刻と待機の抽象。LivePoller / BackwardCollector / withRetry が使う。
 * テストでは仮想時計を差し込む。
 */
export interface Scheduler {
  /** 現在時刻 (epoch ms) */
  now(): number;
  /** ms 待機する。signal が中断されたら例外を投げずに即座に resolve する */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const realScheduler: Scheduler = {
  now: () => Date.now(),
  sleep: delay,
};
