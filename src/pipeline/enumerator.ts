import type { AssetDescriptor, AssetKind } from '../types/asset.js';
import { ASSET_KINDS } from '../types/asset.js';
import type { AssetFieldMapping, MetadataSchema } from '../types/schema.js';
import type { JsonObject } from '../types/server.js';
import { SchemaError } from '../errors.js';
import { getPath, isJsonObject, stringField } from '../schemas/fields.js';
import { FileNameAllocator, extensionFromUrl, sanitizeFileName } from '../utils/file-name.js';

/**
 * Parse a raw metadata body. Anything other than a JSON object at the top
 * level is a SchemaError.
 */
export function parseMetadataDocument(serverId: string, raw: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new SchemaError(serverId, `Metadata for ${serverId} is not valid JSON`, { cause: err });
  }
  if (!isJsonObject(parsed)) {
    const found = Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed;
    throw new SchemaError(serverId, `Metadata for ${serverId} must be a JSON object, got ${found}`);
  }
  return parsed;
}

function* enumerateKind(
  serverId: string,
  document: JsonObject,
  kind: AssetKind,
  mapping: AssetFieldMapping,
): Generator<AssetDescriptor> {
  const list = getPath(document, mapping.listPath);
  if (!Array.isArray(list)) return;

  const names = new FileNameAllocator();
  for (const entry of list) {
    if (!isJsonObject(entry)) continue;

    const name = stringField(entry, mapping.nameField);
    const url = mapping.resolveUrl(entry);
    if (!name || !url) continue;

    yield {
      serverId,
      kind,
      name,
      fileName: names.allocate(sanitizeFileName(name)),
      url,
      extension: extensionFromUrl(url),
    };
  }
}

/**
 * Lazily derive asset descriptors from a metadata document. The returned
 * iterable can be walked any number of times; each walk starts over.
 * Emojis come first, then stickers, each in document order.
 */
export function enumerateAssets(
  serverId: string,
  document: unknown,
  schema: MetadataSchema,
): Iterable<AssetDescriptor> {
  if (!isJsonObject(document)) {
    throw new SchemaError(serverId, `Metadata for ${serverId} must be a JSON object`);
  }
  const doc = document;
  return {
    *[Symbol.iterator]() {
      for (const kind of ASSET_KINDS) {
        yield* enumerateKind(serverId, doc, kind, schema.fields[kind]);
      }
    },
  };
}
