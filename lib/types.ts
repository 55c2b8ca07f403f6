/** Endpoint template parsed from a node link such as `vless://id@host:443?sni=x#label`. */
export interface NodeLink {
  readonly scheme: string;
  readonly credential: string; // URL userinfo (`user` or `user:password`), kept percent-encoded
  readonly host: string; // IPv6 without brackets
  readonly port: number;
  readonly params: ReadonlyMap<string, string>;
  readonly label: string; // raw fragment, '' when absent
}

export interface ProbeOutcome {
  address: string;
  latencyMs: number;
}

export interface OptimizedLink {
  address: string;
  latencyMs: number;
  link: string;
}

export interface OptimizeResult {
  node: NodeLink;
  probed: number; // unique candidates dispatched
  reachable: number; // candidates that connected in time
  links: OptimizedLink[];
}
