/**
 * 過去ログをダウンロードし、時系列順の JSON Lines で書き出す。
 * Usage: npx tsx scripts/download-kakolog.ts <viewUri|liveId> [out.jsonl]
 *
 * 出力先を省略すると標準出力に書く。
 */

import { writeFile } from 'node:fs/promises';
import { downloadKakolog, resolveEntryPoint } from '../src/index.js';
import type { Comment } from '../src/index.js';

const [target, outPath] = process.argv.slice(2);
if (!target) {
  console.error('Usage: npx tsx scripts/download-kakolog.ts <viewUri|liveId> [out.jsonl]');
  process.exit(1);
}

const cookies = process.env.NICONICO_COOKIES;

function toLine(comment: Comment): string {
  return JSON.stringify({
    id: comment.id,
    no: comment.no,
    vpos: comment.vpos,
    timestamp: comment.timestamp.toISOString(),
    userId: comment.userId,
    userName: comment.userName,
    content: comment.content,
    attributes: comment.attributes,
  });
}

async function main(target: string, outPath?: string): Promise<void> {
  let viewUri = target;
  if (!target.startsWith('http')) {
    const resolved = await resolveEntryPoint(target, { cookies });
    console.error(`📺 ${resolved.metadata.title ?? target}`);
    viewUri = resolved.viewUri;
  }

  let events = 0;
  const comments = await downloadKakolog(viewUri, {
    cookies,
    onEvent: () => {
      events++;
    },
  });
  console.error(`コメント ${comments.length} 件（その他 ${events} 件）`);

  const body = comments.map(toLine).join('\n') + (comments.length > 0 ? '\n' : '');
  if (outPath) {
    await writeFile(outPath, body, 'utf8');
    console.error(`→ ${outPath}`);
  } else {
    process.stdout.write(body);
  }
}

main(target, outPath).catch((err: Error) => {
  console.error('取得失敗:', err.message);
  process.exit(1);
});
