import type { AssetKind } from './asset.js';
import type { JsonObject, SchemaId } from './server.js';

/** How one asset list is read out of a metadata document. */
export interface AssetFieldMapping {
  /** Dotted path to the entry array, e.g. 'guild.emojis' */
  listPath: string;
  /** Entry field holding the display name */
  nameField: string;
  /** Reads or builds the asset URL; null when the entry has none */
  resolveUrl(entry: JsonObject): string | null;
}

export interface MetadataSchema {
  readonly id: SchemaId;
  readonly name: string;
  readonly fields: Record<AssetKind, AssetFieldMapping>;
}
