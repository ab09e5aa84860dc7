import fs from 'node:fs/promises';
import path from 'node:path';
import type { ServerTarget } from '../types/server.js';
import type { RunReport, ServerReport } from '../types/report.js';
import { ASSET_KINDS } from '../types/asset.js';
import { FetchError, SchemaError, WriteError, describeError } from '../errors.js';
import { getSchema } from '../schemas/index.js';
import { fetchMetadata } from './metadata-fetcher.js';
import { enumerateAssets } from './enumerator.js';
import { downloadAssets } from './downloader.js';
import { kindDir, type ScrapeContext } from './context.js';

function emptyReport(serverId: string): ServerReport {
  return { serverId, metadataFetched: false, error: null, downloaded: 0, skipped: 0, failed: [] };
}

/**
 * Fetcher → Enumerator → Downloader for one server. Metadata and schema
 * failures end this server's run and are reported, not thrown.
 */
export async function scrapeServer(target: ServerTarget, ctx: ScrapeContext): Promise<ServerReport> {
  const log = ctx.logger.child({ server: target.id });
  const report = emptyReport(target.id);

  try {
    const metadata = await fetchMetadata(target, ctx);
    report.metadataFetched = true;

    for (const kind of ASSET_KINDS) {
      const dir = kindDir(ctx, target.id, kind);
      try {
        await fs.mkdir(dir, { recursive: true });
      } catch (err) {
        throw new WriteError(target.id, dir, describeError(err), { cause: err });
      }
    }

    const assets = enumerateAssets(target.id, metadata.document, getSchema(target.schema));
    const result = await downloadAssets(assets, ctx);
    report.downloaded = result.downloaded;
    report.skipped = result.skipped;
    report.failed = result.failed;
  } catch (err) {
    if (!(err instanceof FetchError || err instanceof SchemaError || err instanceof WriteError)) throw err;
    // a SchemaError means the body arrived and was saved, it just can't be read
    if (err instanceof SchemaError) report.metadataFetched = true;
    report.error = err.message;
    log.error({ err: err.message, kind: err.name }, 'Server aborted');
    return report;
  }

  log.info(
    { downloaded: report.downloaded, skipped: report.skipped, failed: report.failed.length },
    'Server done',
  );
  return report;
}

/**
 * Process every target in order. Only an unusable output root stops the
 * whole run.
 */
export async function runAll(targets: readonly ServerTarget[], ctx: ScrapeContext): Promise<RunReport> {
  const startedAt = new Date().toISOString();
  const root = path.resolve(ctx.outputDir);
  try {
    await fs.mkdir(root, { recursive: true });
  } catch (err) {
    throw new WriteError('*', root, describeError(err), { cause: err });
  }

  const servers: ServerReport[] = [];
  for (const target of targets) {
    servers.push(await scrapeServer(target, ctx));
  }

  return { startedAt, finishedAt: new Date().toISOString(), servers };
}
