import type { RunReport, ServerReport } from '../types/report.js';

function serverLines(server: ServerReport): string[] {
  const lines = [
    `${server.serverId}: metadata=${server.metadataFetched ? 'yes' : 'no'} downloaded=${server.downloaded} skipped=${server.skipped} failed=${server.failed.length}`,
  ];
  if (server.error) lines.push(`  error: ${server.error}`);
  for (const f of server.failed) {
    lines.push(`  ✗ ${f.kind}/${f.name} <${f.url}>: ${f.reason}`);
  }
  return lines;
}

/** Human-readable per-server summary with a totals line at the end. */
export function formatSummary(report: RunReport): string {
  const lines = report.servers.flatMap(serverLines);
  const totals = report.servers.reduce(
    (acc, s) => ({
      downloaded: acc.downloaded + s.downloaded,
      skipped: acc.skipped + s.skipped,
      failed: acc.failed + s.failed.length,
      serversFailed: acc.serversFailed + (s.error ? 1 : 0),
    }),
    { downloaded: 0, skipped: 0, failed: 0, serversFailed: 0 },
  );
  lines.push(
    `Total: servers=${report.servers.length} serversFailed=${totals.serversFailed} downloaded=${totals.downloaded} skipped=${totals.skipped} failed=${totals.failed}`,
  );
  return lines.join('\n');
}

export function hasServerFailures(report: RunReport): boolean {
  return report.servers.some((s) => s.error !== null);
}
