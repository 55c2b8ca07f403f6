import { isIP, Socket } from 'net';
import { performance } from 'perf_hooks';
import pLimit from 'p-limit';
import { CONFIG } from '../config';
import { ConfigurationError } from '../errors';
import logger from '../logger';
import { recordProbe } from '../metrics';
import type { ProbeOutcome } from '../types';
import { MAX_TIMEOUT_MS, withTimeout } from './timeout';

/**
 * Establishes a transport connection to `address:port`. Resolves once connected, rejects on
 * failure, and must release its resources when `signal` aborts.
 */
export type Connector = (address: string, port: number, signal: AbortSignal) => Promise<void>;

export interface ProbeOptions {
  timeoutMs?: number;
  concurrency?: number;
  connect?: Connector;
}

/**
 * Open a TCP connection and close it right away. Only connection establishment is measured.
 */
export const tcpConnect: Connector = (address, port, signal) =>
  new Promise<void>((resolve, reject) => {
    const socket = new Socket();
    const settle = (err?: Error) => {
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
      if (err) reject(err);
      else resolve();
    };
    const onAbort = () => settle(new Error(`connect to ${address}:${port} aborted`));

    signal.addEventListener('abort', onAbort, { once: true });
    socket.once('connect', () => settle());
    socket.once('error', (err) => settle(err));
    socket.connect({ host: address, port });
  });

/**
 * Probe a single candidate. Returns `null` on any failure, including connects that
 * took longer than `timeoutMs`; failures are logged at debug level and never thrown.
 */
export async function probeAddress(
  address: string,
  port: number,
  timeoutMs: number,
  connect: Connector = tcpConnect,
): Promise<ProbeOutcome | null> {
  const controller = new AbortController();
  const started = performance.now();
  try {
    await withTimeout(connect(address, port, controller.signal), timeoutMs, () => controller.abort());
  } catch (err) {
    logger.debug({ err, address, port }, 'probe failed');
    recordProbe('failed');
    return null;
  }

  const latencyMs = performance.now() - started;
  if (latencyMs > timeoutMs) {
    logger.debug({ address, port, latencyMs, timeoutMs }, 'probe connected after deadline');
    recordProbe('failed');
    return null;
  }

  recordProbe('reachable', latencyMs);
  return { address, latencyMs };
}

/**
 * Order outcomes by ascending latency. Equal latencies keep no guaranteed order.
 */
export function rankOutcomes(outcomes: readonly ProbeOutcome[]): ProbeOutcome[] {
  return [...outcomes].sort((a, b) => a.latencyMs - b.latencyMs);
}

function validateProbeConfig(port: number, timeoutMs: number, concurrency: number) {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError('INVALID_PORT', `port must be an integer between 1 and 65535, got ${port}`);
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigurationError(
      'INVALID_TIMEOUT',
      `timeout must be between 1 and ${MAX_TIMEOUT_MS} milliseconds, got ${timeoutMs}`,
    );
  }
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError('INVALID_CONCURRENCY', `concurrency must be a positive integer, got ${concurrency}`);
  }
}

/**
 * Probe every candidate against `port` through a bounded worker pool and return the
 * reachable ones ranked by connect latency.
 *
 * Every candidate gets exactly one attempt; the batch always runs to completion.
 * Unreachable candidates are simply absent from the result. Only invalid configuration
 * (port, timeout, concurrency, non-IP candidates) is thrown, before anything is dispatched.
 */
export async function probeCandidates(
  addresses: Iterable<string>,
  port: number,
  opts?: ProbeOptions,
): Promise<ProbeOutcome[]> {
  const timeoutMs = opts?.timeoutMs ?? CONFIG.PROBE.TIMEOUT_MS;
  const concurrency = opts?.concurrency ?? CONFIG.PROBE.CONCURRENCY;
  const connect = opts?.connect ?? tcpConnect;
  validateProbeConfig(port, timeoutMs, concurrency);

  const candidates = Array.from(new Set(addresses));
  for (const address of candidates) {
    if (isIP(address) === 0) {
      throw new ConfigurationError('INVALID_ADDRESS', `candidate is not an IP address: ${address}`);
    }
  }

  logger.info({ candidates: candidates.length, port, timeoutMs, concurrency }, 'probing candidates');
  const started = performance.now();

  const limit = pLimit(concurrency);
  const outcomes: ProbeOutcome[] = [];
  await Promise.all(
    candidates.map((address) =>
      limit(async () => {
        const outcome = await probeAddress(address, port, timeoutMs, connect);
        if (outcome) outcomes.push(outcome);
      }),
    ),
  );

  const ranked = rankOutcomes(outcomes);
  logger.info(
    { candidates: candidates.length, reachable: ranked.length, elapsedMs: Math.round(performance.now() - started) },
    'probing finished',
  );
  return ranked;
}

export default probeCandidates;
