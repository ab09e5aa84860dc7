import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import type { AssetDescriptor, AssetFailure, AssetOutcome } from '../types/asset.js';
import { DownloadError, WriteError, describeError } from '../errors.js';
import { fetchHttp, isSuccess, type HttpResult } from '../workers/http-client.js';
import { createTaskRunner } from '../workers/task-runner.js';
import { extensionFromContentType } from '../utils/file-name.js';
import { kindDir, type ScrapeContext } from './context.js';

const FALLBACK_EXTENSION = 'bin';

export interface DownloadSummary {
  downloaded: number;
  skipped: number;
  failed: AssetFailure[];
  outcomes: AssetOutcome[];
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Locate an already-downloaded copy. Only regular files count; with no
 * known extension any `<fileName>.<ext>` file in the directory does.
 */
async function findExisting(dir: string, fileName: string, extension: string | null): Promise<string | null> {
  if (extension) {
    const target = path.join(dir, `${fileName}.${extension}`);
    return (await fileExists(target)) ? target : null;
  }
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    return null;
  }
  const prefix = `${fileName}.`.toLowerCase();
  const match = entries.find((entry) => {
    const lower = entry.name.toLowerCase();
    return entry.isFile() && lower.startsWith(prefix) && !lower.slice(prefix.length).includes('.');
  });
  return match ? path.join(dir, match.name) : null;
}

async function fetchAssetBody(asset: AssetDescriptor, timeoutMs: number): Promise<{ body: Buffer; contentType: string | null }> {
  let result: HttpResult;
  try {
    result = await fetchHttp(asset.url, { timeoutMs, accept: 'image/*,application/json;q=0.9,*/*;q=0.8' });
  } catch (err) {
    throw new DownloadError(asset.serverId, asset.url, null, describeError(err, timeoutMs), { cause: err });
  }
  if (!isSuccess(result.status)) {
    throw new DownloadError(asset.serverId, asset.url, result.status, `HTTP ${result.status}`);
  }
  if (result.body.length === 0) {
    throw new DownloadError(asset.serverId, asset.url, result.status, 'empty response body');
  }
  return { body: result.body, contentType: result.contentType };
}

/** Write to a temp file beside the target, then rename into place. */
export async function writeAtomic(serverId: string, target: string, data: Buffer): Promise<void> {
  const dir = path.dirname(target);
  const tmp = path.join(dir, `.${path.basename(target)}.${crypto.randomBytes(6).toString('hex')}.part`);
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tmp, data);
    await fs.rename(tmp, target);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw new WriteError(serverId, target, describeError(err), { cause: err });
  }
}

/**
 * Pending → Skipped | Downloaded | Failed for a single asset. Never throws:
 * download and per-file write errors become a Failed outcome.
 */
export async function downloadAsset(asset: AssetDescriptor, ctx: ScrapeContext): Promise<AssetOutcome> {
  const log = ctx.logger.child({ server: asset.serverId, kind: asset.kind, asset: asset.fileName });
  const dir = kindDir(ctx, asset.serverId, asset.kind);

  const existing = await findExisting(dir, asset.fileName, asset.extension);
  if (existing) {
    log.debug({ path: existing }, 'Already present, skipping');
    return { status: 'skipped', asset, path: existing };
  }

  let attempts = 0;
  let lastError: unknown;
  while (attempts < ctx.maxAttempts) {
    attempts++;
    try {
      const { body, contentType } = await fetchAssetBody(asset, ctx.timeoutMs);
      const extension = asset.extension ?? extensionFromContentType(contentType) ?? FALLBACK_EXTENSION;
      const target = path.join(dir, `${asset.fileName}.${extension}`);
      await writeAtomic(asset.serverId, target, body);
      log.debug({ path: target, sizeBytes: body.length, attempts }, 'Downloaded');
      return { status: 'downloaded', asset, path: target, sizeBytes: body.length, attempts };
    } catch (err) {
      lastError = err;
      // a local write failure won't be fixed by fetching again
      if (err instanceof WriteError) break;
      log.debug({ attempt: attempts, err: describeError(err) }, 'Attempt failed');
    }
  }

  const reason = describeError(lastError, ctx.timeoutMs);
  log.warn({ url: asset.url, attempts, reason }, 'Download failed');
  return { status: 'failed', asset, reason, attempts };
}

/**
 * Download every descriptor through the task runner and fold the outcomes
 * into counts plus a failure list. Two descriptors resolving to the same
 * target are never written concurrently; the later one fails.
 */
export async function downloadAssets(assets: Iterable<AssetDescriptor>, ctx: ScrapeContext): Promise<DownloadSummary> {
  const runner = createTaskRunner<AssetOutcome>(ctx.concurrency);
  const claimed = new Set<string>();
  const submitted: AssetDescriptor[] = [];

  for (const asset of assets) {
    submitted.push(asset);
    const key = `${asset.kind}/${asset.fileName.toLowerCase()}`;
    if (claimed.has(key)) {
      runner.submit(async () => ({ status: 'failed', asset, reason: 'duplicate target', attempts: 0 }));
      continue;
    }
    claimed.add(key);
    runner.submit(() => downloadAsset(asset, ctx));
  }

  const summary: DownloadSummary = { downloaded: 0, skipped: 0, failed: [], outcomes: [] };
  const results = await runner.drain();
  for (const [index, result] of results.entries()) {
    const asset = submitted[index];
    if (!asset) continue;
    const outcome: AssetOutcome =
      result.status === 'fulfilled'
        ? result.value
        : { status: 'failed', asset, reason: describeError(result.reason, ctx.timeoutMs), attempts: 0 };
    summary.outcomes.push(outcome);
    if (outcome.status === 'downloaded') summary.downloaded++;
    else if (outcome.status === 'skipped') summary.skipped++;
    else {
      const { kind, name, url } = outcome.asset;
      summary.failed.push({ kind, name, url, reason: outcome.reason });
    }
  }
  return summary;
}
