/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `node_optimizer_probes_total{result}` (Counter): probe attempts by result (`reachable` | `failed`)
 * - `node_optimizer_probe_latency_seconds` (Histogram): connect latency of reachable candidates
 * - `node_optimizer_requests_total` (Counter)
 * - `node_optimizer_rate_limited_total` (Counter)
 *
 * `GET /api/metrics` serves `register.metrics()` for scraping.
 */

import { Counter, Histogram, register } from 'prom-client';

export type ProbeResult = 'reachable' | 'failed';

export const probesTotal = new Counter({
  name: 'node_optimizer_probes_total',
  help: 'Total number of TCP probe attempts by result',
  labelNames: ['result'] as const,
});

export const probeLatency = new Histogram({
  name: 'node_optimizer_probe_latency_seconds',
  help: 'Histogram of TCP connect latency for reachable candidates in seconds',
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
});

export const requestsTotal = new Counter({
  name: 'node_optimizer_requests_total',
  help: 'Total number of optimize API requests',
});

export const rateLimitedTotal = new Counter({
  name: 'node_optimizer_rate_limited_total',
  help: 'Total number of optimize API requests that were rate limited',
});

/**
 * Record a single probe attempt. Latency is only observed for reachable candidates.
 */
export function recordProbe(result: ProbeResult, latencyMs?: number): void {
  probesTotal.inc({ result });
  if (result === 'reachable' && typeof latencyMs === 'number' && isFinite(latencyMs) && latencyMs >= 0) {
    probeLatency.observe(latencyMs / 1000);
  }
}

export function incRequests(count = 1): void {
  requestsTotal.inc(count);
}

export function incRateLimited(count = 1): void {
  rateLimitedTotal.inc(count);
}

export { register };
const metrics = { register, recordProbe, incRequests, incRateLimited };
export default metrics;
