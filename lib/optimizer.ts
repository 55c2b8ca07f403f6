import { CONFIG } from './config';
import { ConfigurationError } from './errors';
import { probeCandidates, type Connector } from './net/probe';
import { formatNodeLink } from './nodeLink';
import type { NodeLink, OptimizeResult } from './types';

export interface OptimizeOptions {
  timeoutMs?: number;
  concurrency?: number;
  top?: number;
  connect?: Connector;
}

/**
 * Probe `addresses` against the link's port and rewrite the fastest `top` of them
 * into node links. Zero reachable candidates is a valid, empty result.
 */
export async function optimizeNodeLink(
  node: NodeLink,
  addresses: readonly string[],
  opts?: OptimizeOptions,
): Promise<OptimizeResult> {
  const top = opts?.top ?? CONFIG.TOP_N;
  if (!Number.isInteger(top) || top < 1) {
    throw new ConfigurationError('INVALID_TOP', `top must be a positive integer, got ${top}`);
  }

  const outcomes = await probeCandidates(addresses, node.port, {
    timeoutMs: opts?.timeoutMs,
    concurrency: opts?.concurrency,
    connect: opts?.connect,
  });

  const links = outcomes.slice(0, top).map((o) => ({
    address: o.address,
    latencyMs: o.latencyMs,
    link: formatNodeLink(node, o.address),
  }));

  return {
    node,
    probed: new Set(addresses).size,
    reachable: outcomes.length,
    links,
  };
}

export default optimizeNodeLink;
