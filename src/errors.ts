/**
 * Error kinds raised by the scraper.
 *
 * FetchError and SchemaError stop one server, DownloadError stops one asset,
 * WriteError is fatal to the run only when the output root cannot be created.
 */

export abstract class ScraperError extends Error {
  readonly serverId: string;

  constructor(serverId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.serverId = serverId;
  }
}

/** Metadata endpoint unreachable or answered with a non-2xx status. */
export class FetchError extends ScraperError {
  readonly url: string;
  readonly status: number | null;

  constructor(serverId: string, url: string, status: number | null, detail: string, options?: { cause?: unknown }) {
    super(serverId, `Metadata fetch failed for ${serverId} (${url}): ${detail}`, options);
    this.url = url;
    this.status = status;
  }
}

/** Metadata body is not valid JSON or not a JSON object. */
export class SchemaError extends ScraperError {}

/** A single asset could not be fetched. */
export class DownloadError extends ScraperError {
  readonly url: string;
  readonly status: number | null;

  constructor(serverId: string, url: string, status: number | null, detail: string, options?: { cause?: unknown }) {
    super(serverId, detail, options);
    this.url = url;
    this.status = status;
  }
}

/** Local filesystem failure. */
export class WriteError extends ScraperError {
  readonly path: string;

  constructor(serverId: string, path: string, detail: string, options?: { cause?: unknown }) {
    super(serverId, `Cannot write ${path}: ${detail}`, options);
    this.path = path;
  }
}

const TIMEOUT_CODES = new Set([
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'ETIMEDOUT',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Raised when a request's AbortSignal.timeout fires. */
const TIMEOUT_NAMES = new Set(['TimeoutError', 'AbortError']);

function errorName(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string') {
    return err.name;
  }
  return undefined;
}

export function isTimeout(err: unknown): boolean {
  const code = errorCode(err);
  if (code !== undefined && (TIMEOUT_CODES.has(code) || code === 'UND_ERR_ABORTED')) return true;
  const name = errorName(err);
  return name !== undefined && TIMEOUT_NAMES.has(name);
}

/** One-line reason for any thrown value. */
export function describeError(err: unknown, timeoutMs?: number): string {
  if (isTimeout(err)) {
    return timeoutMs !== undefined ? `timeout after ${timeoutMs}ms` : 'timeout';
  }
  if (err instanceof Error) {
    const code = errorCode(err);
    return code && !err.message.includes(code) ? `${code}: ${err.message}` : err.message;
  }
  return String(err);
}
