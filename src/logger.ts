import pino from 'pino';

export type Logger = pino.Logger;

/**
 * ライブラリ共通のロガーを生成する。
 * レベルは環境変数 LOG_LEVEL で上書きできる（デフォルト: warn）。
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: process.env.LOG_LEVEL ?? 'warn' });
}

/** 出力しないロガー（テストや埋め込み用途） */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
