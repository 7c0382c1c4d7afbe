import { z } from 'zod';
import type { BroadcastMetadata } from '../../interfaces/types.js';
import { NdgrError, FetchError } from './errors.js';
import { DEFAULT_USER_AGENT } from './HttpStream.js';

export const WATCH_PAGE_BASE_URL = 'https://live.nicovideo.jp/watch/';

/** 視聴ページの embedded-data のうち使う部分 */
const EmbeddedDataSchema = z.object({
  program: z
    .object({
      title: z.string().optional(),
      description: z.string().optional(),
      status: z.string().optional(),
      beginTime: z.number().optional(),
      endTime: z.number().optional(),
      vposBaseTime: z.number().optional(),
    })
    .optional(),
  temporaryMeasure: z.object({
    ndgrProgramCommentViewUri: z.string({ required_error: 'Missing ndgrProgramCommentViewUri' }).url(),
  }),
});

/** ndgrProgramCommentViewUri のレスポンス */
const ViewApiResponseSchema = z.object({
  view: z.string({ required_error: 'Missing view URI' }).url(),
});

export interface ResolveOptions {
  cookies?: string;
  userAgent?: string;
  watchPageBaseUrl?: string;
  signal?: AbortSignal;
}

export interface ResolvedEntryPoint {
  /** View API の URI（at パラメータなし） */
  viewUri: string;
  metadata: BroadcastMetadata;
}

/**
 * 放送IDから View API の URI を解決する。
 * 視聴ページの embedded-data → ndgrProgramCommentViewUri → { view } の順に辿る。
 */
export async function resolveEntryPoint(
  liveId: string,
  options: ResolveOptions = {},
): Promise<ResolvedEntryPoint> {
  const headers: Record<string, string> = {
    'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'ja,en-US;q=0.9,en;q=0.8',
  };
  if (options.cookies) headers['Cookie'] = options.cookies;
  const signal = options.signal
    ? AbortSignal.any([options.signal, AbortSignal.timeout(30_000)])
    : AbortSignal.timeout(30_000);

  const pageUrl = `${options.watchPageBaseUrl ?? WATCH_PAGE_BASE_URL}${liveId}`;
  const page = await fetch(pageUrl, { headers, signal });
  if (!page.ok) {
    throw new FetchError(pageUrl, { status: page.status });
  }

  const embedded = parseEmbeddedData(await page.text());
  const program = embedded.program;

  const viewApiUrl = embedded.temporaryMeasure.ndgrProgramCommentViewUri;
  const response = await fetch(viewApiUrl, {
    headers: { ...headers, Accept: 'application/json' },
    signal,
  });
  if (!response.ok) {
    throw new FetchError(viewApiUrl, { status: response.status });
  }
  const view = ViewApiResponseSchema.safeParse(await response.json());
  if (!view.success) {
    throw new NdgrError(`Unexpected view API response: ${view.error.issues[0]?.message}`);
  }

  return {
    viewUri: view.data.view,
    metadata: {
      title: program?.title,
      status: program?.status,
      description: program?.description,
      beginTime: toDate(program?.beginTime),
      endTime: toDate(program?.endTime),
      vposBaseTime: toDate(program?.vposBaseTime),
    },
  };
}

/** 視聴ページのHTMLから embedded-data を取り出す */
export function parseEmbeddedData(html: string): z.infer<typeof EmbeddedDataSchema> {
  const match = html.match(/id="embedded-data"\s+data-props="([^"]+)"/);
  if (!match) {
    throw new NdgrError('Could not find embedded data in the page');
  }

  const propsJson = match[1]
    .replace(/&quot;/g, '"')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');

  let props: unknown;
  try {
    props = JSON.parse(propsJson);
  } catch (error) {
    throw new NdgrError('Embedded data is not valid JSON', { cause: error });
  }

  const parsed = EmbeddedDataSchema.safeParse(props);
  if (!parsed.success) {
    throw new NdgrError(`Comment server not found in broadcast data: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}

function toDate(unixSeconds: number | undefined): Date | undefined {
  return unixSeconds === undefined ? undefined : new Date(unixSeconds * 1000);
}
