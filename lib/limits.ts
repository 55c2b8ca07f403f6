/**
 * Rate limiting for the optimize API.
 *
 * With a reachable Redis (`getRedisClient()`), a fixed-window counter is kept per
 * `bucket:clientKey` with `INCR` + `EXPIRE`. Without one, an in-process token bucket
 * is used instead; it is local to the Node process.
 */

import { CONFIG } from './config';
import logger from './logger';
import { incRateLimited, incRequests } from './metrics';
import { getRedisClient } from './redisAdapter';

type Bucket = {
  tokens: number;
  lastRefill: number; // epoch ms
};

const buckets = new Map<string, Bucket>();

const BUCKET_CLEANUP_INTERVAL_MS = 60_000;
let cleanupTimer: ReturnType<typeof setInterval> | null = null;

function ensureCleanupTimer(windowMs: number) {
  if (cleanupTimer) return;
  cleanupTimer = setInterval(() => {
    const now = Date.now();
    for (const [k, b] of buckets) {
      if (now - b.lastRefill > windowMs * 2) buckets.delete(k);
    }
  }, BUCKET_CLEANUP_INTERVAL_MS);
  cleanupTimer.unref();
}

function consumeToken(bucketKey: string, limit: number, windowMs: number): boolean {
  ensureCleanupTimer(windowMs);
  const now = Date.now();
  const b = buckets.get(bucketKey) ?? { tokens: limit, lastRefill: now };

  const refill = Math.max(0, now - b.lastRefill) * (limit / windowMs);
  b.tokens = Math.min(limit, b.tokens + refill);
  b.lastRefill = now;

  const allowed = b.tokens >= 1;
  if (allowed) b.tokens -= 1;
  buckets.set(bucketKey, b);
  return allowed;
}

async function consumeRedis(bucketKey: string, limit: number, windowMs: number): Promise<boolean | null> {
  const redis = await getRedisClient();
  if (!redis) return null;

  const redisKey = `rl:${bucketKey}:${Math.floor(Date.now() / windowMs)}`;
  try {
    const count = await redis.incr(redisKey);
    if (count === 1) {
      await redis.expire(redisKey, Math.ceil(windowMs / 1000) + 1);
    }
    return count <= limit;
  } catch (err) {
    logger.warn({ err, bucketKey }, 'Redis rate limit check failed, using local limiter');
    return null;
  }
}

/**
 * Returns `true` when the request is allowed and `false` when it is rate limited.
 *
 * @param clientKey caller identity, usually the client IP
 * @param bucket logical limit name, e.g. 'optimize-api'
 */
export async function rateLimit(
  clientKey: string,
  bucket: string,
  limit: number = CONFIG.API.RATE_LIMIT,
  windowMs: number = CONFIG.API.RATE_WINDOW_MS,
): Promise<boolean> {
  incRequests();

  const bucketKey = `${bucket}:${clientKey}`;
  const allowed = (await consumeRedis(bucketKey, limit, windowMs)) ?? consumeToken(bucketKey, limit, windowMs);
  if (!allowed) incRateLimited();
  return allowed;
}

export default rateLimit;
