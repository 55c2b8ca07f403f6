import { isIP } from 'net';

export interface RejectedLine {
  line: number; // 1-based
  text: string;
}

export interface CandidateList {
  addresses: string[];
  rejected: RejectedLine[];
}

/**
 * Canonical form of an IP literal, or `null` when it is not one. IPv6 goes through the same
 * serializer `URL` applies to bracketed hosts, so rewritten links parse back to the same text.
 * Zone-scoped addresses (`fe80::1%eth0`) cannot appear in a URL host and are refused.
 */
export function canonicalAddress(text: string): string | null {
  if (text.includes('%')) return null;
  const family = isIP(text);
  if (family === 4) return text;
  if (family !== 6) return null;
  try {
    return new URL(`http://[${text}]`).hostname.slice(1, -1);
  } catch {
    return null;
  }
}

/**
 * Extract candidate IP addresses from a text list, one per line.
 * Blank lines and `#` comments are skipped; anything else that is not an IPv4/IPv6
 * literal is dropped and reported in `rejected`. Addresses are canonicalized, and
 * duplicates keep their first position.
 */
export function parseCandidateList(text: string): CandidateList {
  const seen = new Set<string>();
  const addresses: string[] = [];
  const rejected: RejectedLine[] = [];

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const address = canonicalAddress(trimmed);
    if (address === null) {
      rejected.push({ line: i + 1, text: trimmed });
      continue;
    }
    if (!seen.has(address)) {
      seen.add(address);
      addresses.push(address);
    }
  }

  return { addresses, rejected };
}

export default parseCandidateList;
