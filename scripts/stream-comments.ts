/**
 * ライブ放送のコメントを標準出力に流す。
 * Usage: npx tsx scripts/stream-comments.ts <viewUri|liveId>
 *
 * ログインが必要な放送は NICONICO_COOKIES に Cookie ヘッダの値を入れる。
 */

import { NiconicoProvider } from '../src/index.js';
import type { Comment } from '../src/index.js';

const target = process.argv[2];
if (!target) {
  console.error('Usage: npx tsx scripts/stream-comments.ts <viewUri|liveId>');
  process.exit(1);
}

const provider = new NiconicoProvider({
  ...(target.startsWith('http') ? { viewUri: target } : { liveId: target }),
  cookies: process.env.NICONICO_COOKIES,
});

provider.on('metadata', (metadata) => {
  console.log(`📺 ${metadata.title ?? '(タイトル不明)'} [${metadata.status ?? '-'}]`);
});

provider.on('comment', (comment: Comment) => {
  const mark = comment.isHistory ? '📜' : '💬';
  console.log(`${mark} #${comment.no} [${comment.userId ?? '匿名'}] ${comment.content}`);
});

provider.on('gift', (gift) => {
  console.log(`🎁 ${gift.userName ?? ''} ${gift.itemName} (${gift.point}pt)`);
});

provider.on('notification', (notification) => {
  console.log(`📢 [${notification.type}] ${notification.message}`);
});

provider.on('stateChange', (state) => {
  console.log(`[状態] ${state}`);
});

provider.on('error', (err: Error) => {
  console.error(`[エラー] ${err.message}`);
});

process.on('SIGINT', () => {
  console.log('\n終了中...');
  provider.disconnect();
  process.exit(0);
});

provider.connect().catch((err: Error) => {
  console.error('接続失敗:', err.message);
  process.exit(1);
});
