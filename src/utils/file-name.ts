import path from 'node:path';

const MAX_NAME_LENGTH = 100;

const KNOWN_EXTENSIONS = new Set(['png', 'gif', 'webp', 'jpg', 'jpeg', 'avif', 'svg', 'apng', 'json']);

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/apng': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/jpeg': 'jpg',
  'image/avif': 'avif',
  'image/svg+xml': 'svg',
  'application/json': 'json',
};

/**
 * Turn a display name into something safe to use as a single path segment.
 * Reserved characters become `_`, leading/trailing dots and spaces are dropped.
 */
export function sanitizeFileName(name: string): string {
  const cleaned = name
    .replace(/[/\\:*?"<>|\u0000-\u001f\u007f]/g, '_')
    .trim()
    .replace(/^[.\s]+|[.\s]+$/g, '')
    .slice(0, MAX_NAME_LENGTH)
    .trim();
  return cleaned || 'unnamed';
}

/** Lower-case extension from the URL path, if it is one we recognise. */
export function extensionFromUrl(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0] ?? '';
  }
  const ext = path.posix.extname(pathname).slice(1).toLowerCase();
  return KNOWN_EXTENSIONS.has(ext) ? ext : null;
}

export function extensionFromContentType(contentType: string | null): string | null {
  if (!contentType) return null;
  const mime = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return CONTENT_TYPE_EXTENSIONS[mime] ?? null;
}

/**
 * Hands out per-kind unique names. Comparison is case-insensitive so results
 * are stable on case-insensitive filesystems; later duplicates get `-2`, `-3`...
 */
export class FileNameAllocator {
  private readonly taken = new Set<string>();

  allocate(base: string): string {
    let candidate = base;
    for (let n = 2; this.taken.has(candidate.toLowerCase()); n++) {
      candidate = `${base}-${n}`;
    }
    this.taken.add(candidate.toLowerCase());
    return candidate;
  }
}
