export type AssetKind = 'emoji' | 'sticker';

export const ASSET_KINDS: readonly AssetKind[] = ['emoji', 'sticker'];

/** One emoji or sticker pending download. */
export interface AssetDescriptor {
  serverId: string;
  kind: AssetKind;
  /** Display name as found in the metadata response */
  name: string;
  /** Sanitized, per-kind unique base name (no extension) */
  fileName: string;
  url: string;
  /** Inferred from the URL suffix, null when the URL has none */
  extension: string | null;
}

export type AssetOutcome =
  | { status: 'skipped'; asset: AssetDescriptor; path: string }
  | { status: 'downloaded'; asset: AssetDescriptor; path: string; sizeBytes: number; attempts: number }
  | { status: 'failed'; asset: AssetDescriptor; reason: string; attempts: number };

export interface AssetFailure {
  kind: AssetKind;
  name: string;
  url: string;
  reason: string;
}
