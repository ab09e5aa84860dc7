import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runAll, scrapeServer } from '../../src/pipeline/scraper.js';
import { WriteError } from '../../src/errors.js';
import type { ServerTarget } from '../../src/types/server.js';
import { startAssetServer, type AssetServer } from '../helpers/asset-server.js';
import { makeContext, makeTempDir, removeTempDir } from '../helpers/context.js';

const SMILE = Buffer.from('smile-png-bytes');

describe('scraper', () => {
  let server: AssetServer;
  let outputDir: string;

  beforeEach(async () => {
    server = await startAssetServer();
    outputDir = await makeTempDir();
  });

  afterEach(async () => {
    await server.close();
    await removeTempDir(outputDir);
  });

  function target(id: string, metadataPath: string): ServerTarget {
    return { id, baseUrl: server.url, metadataPath, schema: 'generic' };
  }

  function archlinuxMetadata(): string {
    return `{"emojis":[{"name":"smile","url":"${server.url}/s.png"}],"stickers":[]}`;
  }

  describe('scrapeServer', () => {
    it('should lay out response.json, emojis/ and stickers/', async () => {
      const metadata = archlinuxMetadata();
      server.route('/archlinux.json', { body: metadata, contentType: 'application/json' });
      server.route('/s.png', { body: SMILE, contentType: 'image/png' });

      const report = await scrapeServer(target('archlinux', '/archlinux.json'), makeContext(outputDir));

      expect(report).toEqual({
        serverId: 'archlinux',
        metadataFetched: true,
        error: null,
        downloaded: 1,
        skipped: 0,
        failed: [],
      });
      const root = path.join(outputDir, 'archlinux');
      expect(await fs.readFile(path.join(root, 'response.json'), 'utf-8')).toBe(metadata);
      expect(await fs.readFile(path.join(root, 'emojis', 'smile.png'))).toEqual(SMILE);
      expect(await fs.readdir(path.join(root, 'stickers'))).toEqual([]);
    });

    it('should skip every asset on a second run', async () => {
      server.route('/archlinux.json', { body: archlinuxMetadata() });
      server.route('/s.png', { body: SMILE });
      const ctx = makeContext(outputDir);

      await scrapeServer(target('archlinux', '/archlinux.json'), ctx);
      const second = await scrapeServer(target('archlinux', '/archlinux.json'), ctx);

      expect(second).toMatchObject({ metadataFetched: true, downloaded: 0, skipped: 1, failed: [] });
      expect(server.hits('/s.png')).toBe(1);
      expect(server.hits('/archlinux.json')).toBe(2);
    });

    it('should report a metadata 500 without downloading anything', async () => {
      server.route('/broken.json', { status: 500, body: 'oops' });

      const report = await scrapeServer(target('broken', '/broken.json'), makeContext(outputDir));

      expect(report.metadataFetched).toBe(false);
      expect(report.downloaded).toBe(0);
      expect(report.error).toBe(`Metadata fetch failed for broken (${server.url}/broken.json): HTTP 500`);
    });

    it('should report a non-object document as a schema failure', async () => {
      server.route('/list.json', { body: '["smile"]' });

      const report = await scrapeServer(target('list', '/list.json'), makeContext(outputDir));

      expect(report.metadataFetched).toBe(true);
      expect(report.downloaded).toBe(0);
      expect(report.error).toBe('Metadata for list must be a JSON object, got array');
    });

    it('should count a saved but unparseable body as fetched with a schema error', async () => {
      server.route('/html.json', { body: '<html>maintenance</html>' });

      const report = await scrapeServer(target('html', '/html.json'), makeContext(outputDir));

      expect(report.metadataFetched).toBe(true);
      expect(report.error).toBe('Metadata for html is not valid JSON');
      expect(await fs.readFile(path.join(outputDir, 'html', 'response.json'), 'utf-8')).toBe('<html>maintenance</html>');
    });

    it('should record failed assets for manual retry', async () => {
      server.route(
        '/mixed.json',
        {
          body: JSON.stringify({
            emojis: [{ name: 'ok', url: `${server.url}/ok.png` }],
            stickers: [{ name: 'gone', url: `${server.url}/gone.png` }],
          }),
        },
      );
      server.route('/ok.png', { body: SMILE });

      const report = await scrapeServer(target('mixed', '/mixed.json'), makeContext(outputDir, { maxAttempts: 1 }));

      expect(report.downloaded).toBe(1);
      expect(report.failed).toEqual([
        { kind: 'sticker', name: 'gone', url: `${server.url}/gone.png`, reason: 'HTTP 404' },
      ]);
    });
  });

  describe('runAll', () => {
    it('should keep going after a failed server', async () => {
      server.route('/broken.json', { status: 500 });
      server.route('/archlinux.json', { body: archlinuxMetadata() });
      server.route('/s.png', { body: SMILE });

      const report = await runAll(
        [target('broken', '/broken.json'), target('archlinux', '/archlinux.json')],
        makeContext(outputDir),
      );

      expect(report.servers.map((s) => [s.serverId, s.metadataFetched, s.downloaded])).toEqual([
        ['broken', false, 0],
        ['archlinux', true, 1],
      ]);
      expect(server.hits('/archlinux.json')).toBe(1);
    });

    it('should fail the run when the output root cannot be created', async () => {
      const blocker = path.join(outputDir, 'blocker');
      await fs.writeFile(blocker, 'not a directory');

      await expect(
        runAll([target('archlinux', '/archlinux.json')], makeContext(path.join(blocker, 'out'))),
      ).rejects.toBeInstanceOf(WriteError);
    });
  });
});
