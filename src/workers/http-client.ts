import { request } from 'undici';

export interface HttpResult {
  body: Buffer;
  status: number;
  contentType: string | null;
}

export interface HttpOptions {
  timeoutMs: number;
  accept?: string;
}

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'EmojiStickerScraper/0.1 (+batch asset archiver)',
  'Accept-Language': 'en-US,en;q=0.5',
};

export async function fetchHttp(url: string, options: HttpOptions): Promise<HttpResult> {
  const { statusCode, headers, body } = await request(url, {
    method: 'GET',
    headers: { ...DEFAULT_HEADERS, Accept: options.accept ?? '*/*' },
    maxRedirections: 3,
    headersTimeout: options.timeoutMs,
    bodyTimeout: options.timeoutMs,
    // caps the whole exchange; the two above only bound idle gaps
    signal: AbortSignal.timeout(options.timeoutMs),
  });

  const data = Buffer.from(await body.arrayBuffer());
  const contentType = headers['content-type'];

  return {
    body: data,
    status: statusCode,
    contentType: Array.isArray(contentType) ? (contentType[0] ?? null) : (contentType ?? null),
  };
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}
