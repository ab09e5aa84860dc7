import type { JsonObject } from '../types/server.js';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Walk a dotted path ('a.b.c') through nested objects. */
export function getPath(document: JsonObject, dotted: string): unknown {
  let current: unknown = document;
  for (const key of dotted.split('.')) {
    if (!isJsonObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function stringField(entry: JsonObject, field: string): string | null {
  const value = entry[field];
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/** Snowflake-style ids arrive as strings, sometimes as numbers. */
export function idField(entry: JsonObject, field: string): string | null {
  const value = entry[field];
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return String(value);
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return value.trim();
  return null;
}

export function urlField(field: string): (entry: JsonObject) => string | null {
  return (entry) => {
    const value = stringField(entry, field);
    if (!value) return null;
    return /^https?:\/\//i.test(value) ? value : null;
  };
}
