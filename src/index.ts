/**
 * Scrape every configured server once and print a summary.
 * Usage: npx tsx src/index.ts [serverId ...]
 */
import { config } from './config.js';
import { logger } from './utils/logger.js';
import { loadServerList, selectServers } from './servers.js';
import { runAll } from './pipeline/scraper.js';
import { formatSummary, hasServerFailures } from './report/summary.js';

async function main(): Promise<void> {
  const servers = selectServers(loadServerList(config.SERVERS_FILE), process.argv.slice(2));
  logger.info({ servers: servers.map((s) => s.id), outputDir: config.OUTPUT_DIR }, 'Starting scrape');

  const report = await runAll(servers, {
    outputDir: config.OUTPUT_DIR,
    timeoutMs: config.HTTP_TIMEOUT_MS,
    concurrency: config.DOWNLOAD_CONCURRENCY,
    maxAttempts: config.DOWNLOAD_MAX_ATTEMPTS,
    logger,
  });

  console.log(`\n${formatSummary(report)}`);
  process.exitCode = hasServerFailures(report) ? 1 : 0;
}

main().catch((err) => {
  logger.fatal(err, 'Scrape failed');
  process.exitCode = 1;
});
