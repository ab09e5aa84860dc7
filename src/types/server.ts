export type SchemaId = 'generic' | 'discord';

/** One configured source to scrape. */
export interface ServerTarget {
  /** Output directory name under the output root */
  readonly id: string;
  readonly baseUrl: string;
  /** Path of the metadata endpoint, appended to baseUrl */
  readonly metadataPath: string;
  readonly schema: SchemaId;
}

export interface MetadataResponse {
  serverId: string;
  url: string;
  httpStatus: number;
  sizeBytes: number;
  durationMs: number;
  fetchedAt: string;
  /** Absolute path to the saved response.json */
  path: string;
  document: JsonObject;
}

export type JsonObject = { [key: string]: unknown };
