jest.mock('next/server', () => ({
  NextResponse: {
    json: (body: unknown, init?: { status?: number }) => ({ body, status: init?.status || 200 }),
  },
}));

jest.mock('../lib/redisAdapter', () => ({
  getRedisClient: jest.fn().mockResolvedValue(null),
}));

jest.mock('../lib/net/probe', () => ({
  probeCandidates: jest.fn(),
}));

import type { NextRequest } from 'next/server';
import { POST } from '../app/api/optimize/route';
import { probeCandidates } from '../lib/net/probe';

const mockProbe = probeCandidates as jest.MockedFunction<typeof probeCandidates>;

interface MockResponse {
  status: number;
  body: Record<string, unknown>;
}

function makeRequest(body: () => Promise<unknown>, clientIp: string | null = null): NextRequest {
  const headers = { get: (name: string) => (name === 'x-forwarded-for' ? clientIp : null) };
  return { json: body, headers } as unknown as NextRequest;
}

async function post(body: unknown, clientIp?: string): Promise<MockResponse> {
  const res = await POST(makeRequest(async () => body, clientIp));
  return res as unknown as MockResponse;
}

const LINK = 'vless://test-uuid@edge.example.org:443?security=tls#edge';

describe('app/api/optimize/route', () => {
  beforeEach(() => mockProbe.mockReset());

  test('returns ranked, rewritten links', async () => {
    mockProbe.mockResolvedValueOnce([
      { address: '104.16.1.1', latencyMs: 12 },
      { address: '104.16.1.2', latencyMs: 30 },
    ]);

    const res = await post({ link: LINK, addresses: '104.16.1.1\n104.16.1.2\nbogus' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      links: [
        { address: '104.16.1.1', latencyMs: 12, link: 'vless://test-uuid@104.16.1.1:443?security=tls#edge' },
        { address: '104.16.1.2', latencyMs: 30, link: 'vless://test-uuid@104.16.1.2:443?security=tls#edge' },
      ],
      probed: 2,
      reachable: 2,
      count: 2,
    });
    expect(mockProbe).toHaveBeenCalledWith(['104.16.1.1', '104.16.1.2'], 443, {
      timeoutMs: 3000,
      concurrency: undefined,
      connect: undefined,
    });
  });

  test('accepts an address array and truncates to top', async () => {
    mockProbe.mockResolvedValueOnce([
      { address: '104.16.1.3', latencyMs: 4 },
      { address: '104.16.1.1', latencyMs: 9 },
    ]);

    const res = await post({ link: LINK, addresses: ['104.16.1.1', '104.16.1.3'], timeoutMs: 800, top: 1 });

    expect(res.status).toBe(200);
    expect(res.body.count).toBe(1);
    expect(res.body.reachable).toBe(2);
    expect(mockProbe).toHaveBeenCalledWith(['104.16.1.1', '104.16.1.3'], 443, expect.objectContaining({ timeoutMs: 800 }));
  });

  test('an empty ranking is still a success', async () => {
    mockProbe.mockResolvedValueOnce([]);
    const res = await post({ link: LINK, addresses: '104.16.1.1' });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ links: [], probed: 1, reachable: 0, count: 0 });
  });

  test.each([
    ['missing link', { addresses: '104.16.1.1' }],
    ['unparseable link', { link: 'vless://test-uuid@edge.example.org', addresses: '104.16.1.1' }],
    ['no valid addresses', { link: LINK, addresses: 'bogus\n' }],
    ['wrong addresses type', { link: LINK, addresses: 42 }],
    ['zero timeout', { link: LINK, addresses: '104.16.1.1', timeoutMs: 0 }],
    ['timeout above the limit', { link: LINK, addresses: '104.16.1.1', timeoutMs: 60_000 }],
    ['fractional top', { link: LINK, addresses: '104.16.1.1', top: 1.5 }],
    ['non-object body', ['104.16.1.1']],
  ])('returns 400 for %s', async (_name, body) => {
    const res = await post(body);
    expect(res.status).toBe(400);
    expect(res.body).toHaveProperty('error');
    expect(mockProbe).not.toHaveBeenCalled();
  });

  test('returns 400 for invalid JSON', async () => {
    const res = (await POST(
      makeRequest(async () => {
        throw new SyntaxError('Unexpected token');
      }),
    )) as unknown as MockResponse;
    expect(res.status).toBe(400);
  });

  test('returns 500 when probing fails unexpectedly', async () => {
    mockProbe.mockRejectedValueOnce(new Error('boom'));
    const res = await post({ link: LINK, addresses: '104.16.1.1' });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'Internal server error' });
  });

  test('returns 429 once a client exceeds the rate limit', async () => {
    const clientIp = '203.0.113.50';
    for (let i = 0; i < 30; i++) {
      const res = await post({}, clientIp);
      expect(res.status).toBe(400);
    }
    const limited = await post({}, clientIp);
    expect(limited.status).toBe(429);
  });
});
