import { randomUUID } from 'crypto';
import { NextRequest, NextResponse } from 'next/server';
import { parseCandidateList } from '../../../lib/candidates';
import { CONFIG } from '../../../lib/config';
import { ConfigurationError } from '../../../lib/errors';
import { rateLimit } from '../../../lib/limits';
import logger from '../../../lib/logger';
import { parseNodeLink } from '../../../lib/nodeLink';
import { optimizeNodeLink } from '../../../lib/optimizer';
import type { NodeLink, OptimizedLink } from '../../../lib/types';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

interface OptimizeRequest {
  node: NodeLink;
  addresses: string[];
  timeoutMs: number;
  top: number;
}

interface OptimizeResponse {
  links: OptimizedLink[];
  probed: number;
  reachable: number;
  count: number;
}

type Parsed = { ok: true; value: OptimizeRequest } | { ok: false; error: string };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function readAddresses(raw: unknown): string | null {
  if (typeof raw === 'string') return raw;
  if (Array.isArray(raw) && raw.every((a): a is string => typeof a === 'string')) return raw.join('\n');
  return null;
}

function isPositiveInt(v: unknown, max: number): v is number {
  return typeof v === 'number' && Number.isInteger(v) && v >= 1 && v <= max;
}

function parseBody(body: unknown): Parsed {
  if (!isRecord(body)) return { ok: false, error: 'Request body must be a JSON object' };

  const { link, addresses, timeoutMs = CONFIG.PROBE.TIMEOUT_MS, top = CONFIG.TOP_N } = body;
  if (!link || typeof link !== 'string') return { ok: false, error: 'A node link is required' };

  let node: NodeLink;
  try {
    node = parseNodeLink(link);
  } catch (err) {
    return { ok: false, error: err instanceof ConfigurationError ? err.message : 'Invalid node link' };
  }

  const text = readAddresses(addresses);
  if (text === null) return { ok: false, error: 'addresses must be a string or an array of strings' };
  const list = parseCandidateList(text).addresses;
  if (list.length === 0) return { ok: false, error: 'No valid IP addresses provided' };
  if (list.length > CONFIG.API.MAX_ADDRESSES) {
    return { ok: false, error: `At most ${CONFIG.API.MAX_ADDRESSES} addresses are allowed` };
  }

  if (!isPositiveInt(timeoutMs, CONFIG.API.MAX_TIMEOUT_MS)) {
    return { ok: false, error: `timeoutMs must be an integer between 1 and ${CONFIG.API.MAX_TIMEOUT_MS}` };
  }
  if (!isPositiveInt(top, CONFIG.API.MAX_ADDRESSES)) {
    return { ok: false, error: 'top must be a positive integer' };
  }

  return { ok: true, value: { node, addresses: list, timeoutMs, top } };
}

export async function POST(request: NextRequest) {
  const requestId = randomUUID();

  const clientIp = request.headers.get('x-forwarded-for')?.split(',')[0]?.trim() || 'unknown';
  if (!(await rateLimit(clientIp, 'optimize-api'))) {
    return NextResponse.json({ error: 'Too many requests' }, { status: 429 });
  }

  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: 'Request body must be valid JSON' }, { status: 400 });
  }

  const parsed = parseBody(body);
  if (!parsed.ok) {
    return NextResponse.json({ error: parsed.error }, { status: 400 });
  }

  const { node, addresses, timeoutMs, top } = parsed.value;
  try {
    logger.info({ requestId, addresses: addresses.length, port: node.port, timeoutMs }, 'optimize request started');
    const result = await optimizeNodeLink(node, addresses, { timeoutMs, top });

    const response: OptimizeResponse = {
      links: result.links,
      probed: result.probed,
      reachable: result.reachable,
      count: result.links.length,
    };
    logger.info({ requestId, reachable: result.reachable, count: response.count }, 'optimize request finished');
    return NextResponse.json(response);
  } catch (error) {
    logger.error({ requestId, error }, 'optimize request failed');
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}
