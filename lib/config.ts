// Centralized runtime configuration for probing, output and the HTTP API.
// Values are read from env with sane defaults and can be overridden in tests.

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export const CONFIG = {
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  PROBE: {
    TIMEOUT_MS: envInt('PROBE_TIMEOUT_MS', 3000),
    CONCURRENCY: envInt('PROBE_CONCURRENCY', 256),
  },

  TOP_N: envInt('TOP_N', 10),
  OUTPUT_FILE: process.env.OUTPUT_FILE || 'optimized_nodes.txt',

  API: {
    MAX_ADDRESSES: envInt('API_MAX_ADDRESSES', 4096),
    MAX_TIMEOUT_MS: envInt('API_MAX_TIMEOUT_MS', 10_000),
    RATE_LIMIT: envInt('API_RATE_LIMIT', 30),
    RATE_WINDOW_MS: envInt('API_RATE_WINDOW_MS', 60_000),
  },
} as const;

export default CONFIG;
