import type { MetadataSchema } from '../types/schema.js';
import { urlField } from './fields.js';

/** `{ "emojis": [{ name, url }], "stickers": [{ name, url }] }` */
export const genericSchema: MetadataSchema = {
  id: 'generic',
  name: 'Generic name/url lists',
  fields: {
    emoji: { listPath: 'emojis', nameField: 'name', resolveUrl: urlField('url') },
    sticker: { listPath: 'stickers', nameField: 'name', resolveUrl: urlField('url') },
  },
};
