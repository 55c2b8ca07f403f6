import { createServer } from 'net';
import type { Connector } from '../lib/net/probe';

export interface LoopbackServer {
  port: number;
  close: () => Promise<void>;
}

/** TCP server on 127.0.0.1 that accepts and immediately drops connections. */
export function startLoopbackServer(): Promise<LoopbackServer> {
  const server = createServer((socket) => socket.destroy());
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('loopback server has no TCP address'));
        return;
      }
      resolve({
        port: address.port,
        close: () => new Promise<void>((res, rej) => server.close((err) => (err ? rej(err) : res()))),
      });
    });
  });
}

/** A loopback port with nothing listening on it, so connects are refused. */
export async function closedLoopbackPort(): Promise<number> {
  const server = await startLoopbackServer();
  await server.close();
  return server.port;
}

/**
 * Connector that "connects" after a fixed delay per address, rejects addresses without a
 * delay, and honours aborts. `null` means the connect never completes on its own.
 */
export function delayedConnector(delays: Record<string, number | null>): Connector {
  return (address, _port, signal) =>
    new Promise<void>((resolve, reject) => {
      const delay = delays[address];
      if (delay === undefined) {
        reject(new Error(`connect ECONNREFUSED ${address}`));
        return;
      }
      const timer = delay === null ? undefined : setTimeout(resolve, delay);
      signal.addEventListener('abort', () => {
        clearTimeout(timer);
        reject(new Error('aborted'));
      });
    });
}
