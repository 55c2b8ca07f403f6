import { writeFile } from 'fs/promises';
import type { OptimizedLink } from './types';

export function formatLatency(ms: number): string {
  return `${ms.toFixed(2)}ms`;
}

export function formatReportLine(entry: OptimizedLink): string {
  return `${entry.link} (Latency: ${formatLatency(entry.latencyMs)})`;
}

export function formatSummary(count: number, path: string): string {
  return `Generated ${count} optimized node links in ${path}`;
}

/**
 * Write one report line per link, each newline-terminated. No links writes an empty file.
 */
export async function writeReport(path: string, links: readonly OptimizedLink[]): Promise<string[]> {
  const lines = links.map(formatReportLine);
  await writeFile(path, lines.map((l) => `${l}\n`).join(''), 'utf8');
  return lines;
}
