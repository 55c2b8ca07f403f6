import { Command, InvalidArgumentError } from 'commander';
import { readFile } from 'fs/promises';
import { parseCandidateList } from '../lib/candidates';
import { CONFIG } from '../lib/config';
import { ConfigurationError } from '../lib/errors';
import logger from '../lib/logger';
import type { Connector } from '../lib/net/probe';
import { MAX_TIMEOUT_MS } from '../lib/net/timeout';
import { parseNodeLink } from '../lib/nodeLink';
import { optimizeNodeLink } from '../lib/optimizer';
import { formatSummary, writeReport } from '../lib/report';

export interface ProgramDeps {
  connect?: Connector;
  stdout?: (line: string) => void;
}

interface OptimizeCommandOptions {
  output: string;
  top?: number;
  concurrency?: number;
  strict?: boolean;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function parseTimeout(value: string): number {
  const n = parsePositiveInt(value);
  if (n > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Expected at most ${MAX_TIMEOUT_MS} milliseconds.`);
  }
  return n;
}

async function readCandidateFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError('UNREADABLE_LIST', `unable to read address list ${path}`, { cause: err });
  }
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const print = deps.stdout ?? ((line: string) => console.log(line));
  const program = new Command();

  program
    .name('node-optimizer')
    .description('Rank candidate IPs by TCP connect latency and rewrite a node link for the fastest ones')
    .argument('<node_link>', 'node link, e.g. vless://id@host:443?security=tls#name')
    .argument('<ip_list_file>', 'file with one candidate IP address per line')
    .argument('[timeout_ms]', 'per-address connect timeout in milliseconds', parseTimeout, CONFIG.PROBE.TIMEOUT_MS)
    .option('-o, --output <file>', 'file to write the ranked links to', CONFIG.OUTPUT_FILE)
    .option('-n, --top <count>', `number of links to keep (default: ${CONFIG.TOP_N})`, parsePositiveInt)
    .option('-c, --concurrency <count>', `parallel probes (default: ${CONFIG.PROBE.CONCURRENCY})`, parsePositiveInt)
    .option('--strict', 'fail when the address list contains lines that are not IP addresses')
    .action(async (nodeLink: string, ipListFile: string, timeoutMs: number, opts: OptimizeCommandOptions) => {
      const node = parseNodeLink(nodeLink);
      const { addresses, rejected } = parseCandidateList(await readCandidateFile(ipListFile));

      for (const r of rejected) {
        logger.warn({ file: ipListFile, line: r.line, text: r.text }, 'skipping line that is not an IP address');
      }
      if (opts.strict && rejected.length > 0) {
        throw new ConfigurationError('REJECTED_LINES', `${rejected.length} line(s) in ${ipListFile} are not IP addresses`);
      }

      const result = await optimizeNodeLink(node, addresses, {
        timeoutMs,
        top: opts.top,
        concurrency: opts.concurrency,
        connect: deps.connect,
      });

      const lines = await writeReport(opts.output, result.links);
      for (const line of lines) print(line);
      print(formatSummary(lines.length, opts.output));
    });

  return program;
}

export default createProgram;
