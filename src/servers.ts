import fs from 'node:fs';
import { z } from 'zod';
import type { ServerTarget } from './types/server.js';
import { SCHEMA_IDS } from './schemas/index.js';

const serverSchema = z.object({
  id: z
    .string()
    .regex(/^[A-Za-z0-9._-]+$/, 'must be a single path segment')
    .refine((id) => id !== '.' && id !== '..', 'must not be . or ..'),
  baseUrl: z.string().url(),
  metadataPath: z.string().min(1),
  schema: z.enum(SCHEMA_IDS).default('generic'),
});

const serverListSchema = z.array(serverSchema).superRefine((servers, ctx) => {
  const seen = new Set<string>();
  servers.forEach((server, index) => {
    if (seen.has(server.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `duplicate server id: ${server.id}` });
    }
    seen.add(server.id);
  });
});

export function parseServerList(input: unknown): ServerTarget[] {
  return serverListSchema.parse(input).map((server) => Object.freeze({ ...server }));
}

export function loadServerList(filePath: string): ServerTarget[] {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return parseServerList(JSON.parse(raw));
}

/** Keep only the requested ids, in the order given. Unknown ids are an error. */
export function selectServers(servers: readonly ServerTarget[], ids: readonly string[]): ServerTarget[] {
  if (ids.length === 0) return [...servers];
  return ids.map((id) => {
    const server = servers.find((s) => s.id === id);
    if (!server) throw new Error(`Unknown server: ${id}`);
    return server;
  });
}
