/**
 * Human-readable run summary
 */
import type { SyncCounts, SyncReport, ZoneSyncResult } from '../types/index.js';

export function formatCounts(counts: SyncCounts): string {
  const parts = [
    `${counts.created} created`,
    `${counts.updated} updated`,
    `${counts.deleted} deleted`,
    `${counts.unchanged} unchanged`,
  ];
  if (counts.skipped > 0) parts.push(`${counts.skipped} skipped`);
  if (counts.failed > 0) parts.push(`${counts.failed} failed`);
  return parts.join(', ');
}

function formatZoneLine(result: ZoneSyncResult): string {
  let line = `Zone ${result.zone}: ${formatCounts(result)}`;
  if (result.zoneCreated) line += ' [zone created]';
  if (result.zoneUpdated) line += ' [SOA updated]';
  return line;
}

export function formatReport(report: SyncReport): string {
  const lines = report.zones.map(formatZoneLine);

  for (const result of report.zones) {
    for (const failure of result.errors) {
      lines.push(`  failed to ${failure.action} ${failure.name} ${failure.type}: ${failure.error}`);
    }
  }

  const zoneCount = report.zones.length + report.failedZones.length;
  lines.push(`Total (${zoneCount} ${zoneCount === 1 ? 'zone' : 'zones'}): ${formatCounts(report.totals)}`);

  for (const failure of report.failedZones) {
    lines.push(`Zone ${failure.zone} failed: ${failure.error}`);
  }

  return lines.join('\n') + '\n';
}
