import path from 'node:path';
import type { Logger } from '../utils/logger.js';
import type { AssetKind } from '../types/asset.js';

/** Settings threaded through every pipeline stage. */
export interface ScrapeContext {
  /** Root of the output tree; each server gets `<outputDir>/<serverId>/` */
  outputDir: string;
  timeoutMs: number;
  concurrency: number;
  maxAttempts: number;
  logger: Logger;
}

export function serverDir(ctx: ScrapeContext, serverId: string): string {
  return path.resolve(ctx.outputDir, serverId);
}

export function kindDir(ctx: ScrapeContext, serverId: string, kind: AssetKind): string {
  return path.join(serverDir(ctx, serverId), `${kind}s`);
}
