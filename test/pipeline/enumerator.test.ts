import { describe, it, expect } from 'vitest';
import { enumerateAssets, parseMetadataDocument } from '../../src/pipeline/enumerator.js';
import { getSchema } from '../../src/schemas/index.js';
import { SchemaError } from '../../src/errors.js';
import { loadFixture, loadJsonFixture } from '../helpers/fixture-loader.js';

const generic = getSchema('generic');
const discord = getSchema('discord');

describe('parseMetadataDocument', () => {
  it('should parse a JSON object', () => {
    const doc = parseMetadataDocument('archlinux', loadFixture('metadata', 'generic-archlinux.json'));
    expect(doc).toEqual({ emojis: [{ name: 'smile', url: 'http://x/s.png' }], stickers: [] });
  });

  it('should reject invalid JSON', () => {
    expect(() => parseMetadataDocument('s', '{"emojis": [')).toThrow(SchemaError);
  });

  it('should reject non-object top levels', () => {
    expect(() => parseMetadataDocument('s', '[1, 2]')).toThrow('Metadata for s must be a JSON object, got array');
    expect(() => parseMetadataDocument('s', 'null')).toThrow('got null');
    expect(() => parseMetadataDocument('s', '"text"')).toThrow('got string');
  });
});

describe('enumerateAssets', () => {
  it('should enumerate the emoji from the archlinux example', () => {
    const assets = [...enumerateAssets('archlinux', loadJsonFixture('metadata', 'generic-archlinux.json'), generic)];
    expect(assets).toEqual([
      {
        serverId: 'archlinux',
        kind: 'emoji',
        name: 'smile',
        fileName: 'smile',
        url: 'http://x/s.png',
        extension: 'png',
      },
    ]);
  });

  it('should yield only emojis when the sticker section is missing', () => {
    const doc = {
      emojis: [
        { name: 'a', url: 'https://cdn.example.test/a.png' },
        { name: 'b', url: 'https://cdn.example.test/b.gif' },
      ],
    };
    const assets = [...enumerateAssets('s', doc, generic)];
    expect(assets.map((a) => `${a.kind}:${a.name}`)).toEqual(['emoji:a', 'emoji:b']);
  });

  it('should yield only stickers when the emoji section is missing', () => {
    const doc = { stickers: [{ name: 'hi', url: 'https://cdn.example.test/hi.png' }] };
    const assets = [...enumerateAssets('s', doc, generic)];
    expect(assets.map((a) => `${a.kind}:${a.name}`)).toEqual(['sticker:hi']);
  });

  it('should skip malformed entries and sections', () => {
    const assets = [...enumerateAssets('s', loadJsonFixture('metadata', 'generic-messy.json'), generic)];
    expect(assets.map((a) => ({ name: a.name, fileName: a.fileName, extension: a.extension }))).toEqual([
      { name: 'wave', fileName: 'wave', extension: 'gif' },
      { name: 'Wave', fileName: 'Wave-2', extension: 'webp' },
      { name: 'a/b:c', fileName: 'a_b_c', extension: null },
    ]);
  });

  it('should disambiguate names within a kind but not across kinds', () => {
    const doc = {
      emojis: [
        { name: 'smile', url: 'https://cdn.example.test/1.png' },
        { name: 'smile', url: 'https://cdn.example.test/2.png' },
      ],
      stickers: [{ name: 'smile', url: 'https://cdn.example.test/3.png' }],
    };
    const assets = [...enumerateAssets('s', doc, generic)];
    expect(assets.map((a) => `${a.kind}:${a.fileName}`)).toEqual(['emoji:smile', 'emoji:smile-2', 'sticker:smile']);
  });

  it('should be restartable with identical results', () => {
    const assets = enumerateAssets('g', loadJsonFixture('metadata', 'discord-guild.json'), discord);
    const first = [...assets];
    const second = [...assets];
    expect(second).toEqual(first);
    expect(first.length).toBe(5);
  });

  it('should build CDN URLs for a discord guild', () => {
    const assets = [...enumerateAssets('g', loadJsonFixture('metadata', 'discord-guild.json'), discord)];
    expect(assets.map((a) => [a.kind, a.fileName, a.url])).toEqual([
      ['emoji', 'party', 'https://cdn.discordapp.com/emojis/200000000000000001.gif'],
      ['emoji', 'thumbsup', 'https://cdn.discordapp.com/emojis/200000000000000002.png'],
      ['sticker', 'hello', 'https://media.discordapp.net/stickers/300000000000000001.png'],
      ['sticker', 'dance', 'https://discord.com/stickers/300000000000000002.json'],
      ['sticker', 'party', 'https://media.discordapp.net/stickers/300000000000000003.gif'],
    ]);
  });

  it('should throw SchemaError for a non-object document', () => {
    expect(() => enumerateAssets('s', [], generic)).toThrow(SchemaError);
  });
});
