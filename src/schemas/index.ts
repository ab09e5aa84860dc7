import type { MetadataSchema } from '../types/schema.js';
import type { SchemaId } from '../types/server.js';
import { genericSchema } from './generic.js';
import { discordSchema } from './discord.js';

const schemas: Map<string, MetadataSchema> = new Map();

function register(schema: MetadataSchema): void {
  schemas.set(schema.id, schema);
}

register(genericSchema);
register(discordSchema);

export const SCHEMA_IDS = ['generic', 'discord'] as const satisfies readonly SchemaId[];

export function getSchema(id: string): MetadataSchema {
  const schema = schemas.get(id);
  if (!schema) throw new Error(`Unknown metadata schema: ${id}`);
  return schema;
}

export function getAllSchemas(): MetadataSchema[] {
  return Array.from(schemas.values());
}
