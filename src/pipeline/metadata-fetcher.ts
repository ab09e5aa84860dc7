import fs from 'node:fs/promises';
import path from 'node:path';
import type { MetadataResponse, ServerTarget } from '../types/server.js';
import { FetchError, WriteError, describeError } from '../errors.js';
import { fetchHttp, isSuccess, type HttpResult } from '../workers/http-client.js';
import { parseMetadataDocument } from './enumerator.js';
import { serverDir, type ScrapeContext } from './context.js';

export const RESPONSE_FILE = 'response.json';

export function metadataUrl(target: ServerTarget): string {
  const base = target.baseUrl.replace(/\/+$/, '');
  const suffix = target.metadataPath.startsWith('/') ? target.metadataPath : `/${target.metadataPath}`;
  return `${base}${suffix}`;
}

/**
 * Fetch a server's metadata, save the raw body as response.json and return
 * the parsed document. The body is written before parsing so a malformed
 * response can still be inspected.
 */
export async function fetchMetadata(target: ServerTarget, ctx: ScrapeContext): Promise<MetadataResponse> {
  const url = metadataUrl(target);
  const log = ctx.logger.child({ server: target.id, url });

  const startMs = Date.now();
  let result: HttpResult;
  try {
    result = await fetchHttp(url, { timeoutMs: ctx.timeoutMs, accept: 'application/json' });
  } catch (err) {
    throw new FetchError(target.id, url, null, describeError(err, ctx.timeoutMs), { cause: err });
  }
  const durationMs = Date.now() - startMs;

  if (!isSuccess(result.status)) {
    throw new FetchError(target.id, url, result.status, `HTTP ${result.status}`);
  }

  const dir = serverDir(ctx, target.id);
  const outputPath = path.join(dir, RESPONSE_FILE);
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(outputPath, result.body);
  } catch (err) {
    throw new WriteError(target.id, outputPath, describeError(err), { cause: err });
  }
  log.info({ durationMs, sizeBytes: result.body.length, path: outputPath }, 'Metadata saved');

  return {
    serverId: target.id,
    url,
    httpStatus: result.status,
    sizeBytes: result.body.length,
    durationMs,
    fetchedAt: new Date().toISOString(),
    path: outputPath,
    document: parseMetadataDocument(target.id, result.body.toString('utf-8')),
  };
}
