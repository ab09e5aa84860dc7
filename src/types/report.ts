import type { AssetFailure } from './asset.js';

export interface ServerReport {
  serverId: string;
  metadataFetched: boolean;
  /** Server-scoped error that stopped processing, if any */
  error: string | null;
  downloaded: number;
  skipped: number;
  failed: AssetFailure[];
}

export interface RunReport {
  startedAt: string;
  finishedAt: string;
  servers: ServerReport[];
}
