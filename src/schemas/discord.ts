import type { MetadataSchema } from '../types/schema.js';
import type { JsonObject } from '../types/server.js';
import { idField } from './fields.js';

const EMOJI_CDN = 'https://cdn.discordapp.com/emojis';
const STICKER_CDN = 'https://media.discordapp.net/stickers';
/** Lottie stickers are not on the media CDN */
const LOTTIE_HOST = 'https://discord.com/stickers';

/** Discord sticker format_type → file extension (1 PNG, 2 APNG, 3 LOTTIE, 4 GIF) */
const STICKER_FORMATS: Record<number, string> = {
  1: 'png',
  2: 'png',
  3: 'json',
  4: 'gif',
};

export function discordEmojiUrl(entry: JsonObject): string | null {
  const id = idField(entry, 'id');
  if (!id) return null;
  const ext = entry['animated'] === true ? 'gif' : 'png';
  return `${EMOJI_CDN}/${id}.${ext}`;
}

export function discordStickerUrl(entry: JsonObject): string | null {
  const id = idField(entry, 'id');
  if (!id) return null;
  const format = entry['format_type'];
  const ext = (typeof format === 'number' ? STICKER_FORMATS[format] : undefined) ?? 'png';
  return ext === 'json' ? `${LOTTIE_HOST}/${id}.json` : `${STICKER_CDN}/${id}.${ext}`;
}

/**
 * Discord guild object, as served by the nelly.tools guild lookup follow-up
 * endpoint. Assets carry only ids; URLs are built against the Discord CDN.
 */
export const discordSchema: MetadataSchema = {
  id: 'discord',
  name: 'Discord guild (nelly.tools lookup)',
  fields: {
    emoji: { listPath: 'emojis', nameField: 'name', resolveUrl: discordEmojiUrl },
    sticker: { listPath: 'stickers', nameField: 'name', resolveUrl: discordStickerUrl },
  },
};
