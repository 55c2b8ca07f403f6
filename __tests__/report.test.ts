import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatLatency, formatReportLine, formatSummary, writeReport } from '../lib/report';

describe('report formatting', () => {
  test('formats latency with two decimals', () => {
    expect(formatLatency(12.5)).toBe('12.50ms');
    expect(formatLatency(3)).toBe('3.00ms');
  });

  test('formats a report line and the summary', () => {
    const line = formatReportLine({ address: '198.51.100.7', latencyMs: 7.25, link: 'vless://test-uuid@198.51.100.7:443' });
    expect(line).toBe('vless://test-uuid@198.51.100.7:443 (Latency: 7.25ms)');
    expect(formatSummary(3, 'optimized_nodes.txt')).toBe('Generated 3 optimized node links in optimized_nodes.txt');
  });
});

describe('writeReport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'node-optimizer-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('writes one newline-terminated line per link', async () => {
    const path = join(dir, 'out.txt');
    const lines = await writeReport(path, [
      { address: '198.51.100.7', latencyMs: 7.25, link: 'ss://198.51.100.7:8388' },
      { address: '198.51.100.8', latencyMs: 12.5, link: 'ss://198.51.100.8:8388' },
    ]);

    expect(lines).toEqual(['ss://198.51.100.7:8388 (Latency: 7.25ms)', 'ss://198.51.100.8:8388 (Latency: 12.50ms)']);
    expect(await readFile(path, 'utf8')).toBe(
      'ss://198.51.100.7:8388 (Latency: 7.25ms)\nss://198.51.100.8:8388 (Latency: 12.50ms)\n',
    );
  });

  test('writes an empty file when nothing was reachable', async () => {
    const path = join(dir, 'empty.txt');
    await expect(writeReport(path, [])).resolves.toEqual([]);
    expect(await readFile(path, 'utf8')).toBe('');
  });
});
