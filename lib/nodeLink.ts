import { isIPv6 } from 'net';
import { NodeLinkError } from './errors';
import type { NodeLink } from './types';

/**
 * Query parameters of a parsed link. The backing map is unreachable and the instance is
 * frozen, so parameters cannot change after parsing.
 */
class LinkParams implements ReadonlyMap<string, string> {
  readonly #map: Map<string, string>;

  constructor(entries: Iterable<readonly [string, string]>) {
    this.#map = new Map(entries);
    Object.freeze(this);
  }

  get size() {
    return this.#map.size;
  }

  get(key: string) {
    return this.#map.get(key);
  }

  has(key: string) {
    return this.#map.has(key);
  }

  forEach(callback: (value: string, key: string, map: ReadonlyMap<string, string>) => void, thisArg?: unknown) {
    for (const [key, value] of this.#map) callback.call(thisArg, value, key, this);
  }

  entries() {
    return this.#map.entries();
  }

  keys() {
    return this.#map.keys();
  }

  values() {
    return this.#map.values();
  }

  [Symbol.iterator]() {
    return this.#map[Symbol.iterator]();
  }
}

function stripBrackets(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

/**
 * Parse a node link (`scheme://credential@host:port?key=value&...#label`) into a frozen `NodeLink`.
 *
 * The port must be written explicitly: WHATWG URL drops a scheme's default port
 * (`https://host:443`), which therefore counts as missing.
 */
export function parseNodeLink(text: string): NodeLink {
  const input = typeof text === 'string' ? text.trim() : '';
  if (!input) throw new NodeLinkError('node link is empty');

  let url: URL;
  try {
    url = new URL(input);
  } catch (err) {
    throw new NodeLinkError('node link is not a valid URL', { cause: err });
  }

  const scheme = url.protocol.replace(/:$/, '');
  if (!scheme) throw new NodeLinkError('node link has no scheme');

  const host = stripBrackets(url.hostname);
  if (!host) throw new NodeLinkError('node link has no host');

  if (!url.port) throw new NodeLinkError('node link has no port');
  const port = Number(url.port);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new NodeLinkError(`node link port is out of range: ${url.port}`);
  }

  // repeated keys keep their last value
  const params = new LinkParams(url.searchParams);

  const credential = url.password ? `${url.username}:${url.password}` : url.username;

  return Object.freeze({
    scheme,
    credential,
    host,
    port,
    params,
    label: url.hash.replace(/^#/, ''),
  });
}

/**
 * Render `node` with its host replaced by `host`. Parameters are form-encoded in insertion
 * order and the label is appended verbatim, so parsing the result yields `node` with the new host.
 */
export function formatNodeLink(node: NodeLink, host: string): string {
  const hostPart = isIPv6(host) ? `[${host}]` : host;
  const auth = node.credential ? `${node.credential}@` : '';
  let link = `${node.scheme}://${auth}${hostPart}:${node.port}`;

  const query = new URLSearchParams(Array.from(node.params)).toString();
  if (query) link += `?${query}`;
  if (node.label) link += `#${node.label}`;
  return link;
}

const nodeLinks = { parseNodeLink, formatNodeLink };
export default nodeLinks;
