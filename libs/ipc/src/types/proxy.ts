/**
 * Request and decision types shared by the proxy engine and its collaborators
 */

/**
 * `connect` requests open an opaque tunnel; everything else is forwarded as HTTP.
 */
export type RequestKind = 'http' | 'connect';

export interface HttpHeader {
  name: string;
  value: string;
}

/**
 * A fully parsed and classified client request head.
 */
export interface ParsedRequest {
  kind: RequestKind;

  /** Upper-cased request method */
  method: string;

  /** Request target exactly as received */
  target: string;

  /** Origin-form target used when forwarding (empty for CONNECT) */
  path: string;

  /** Protocol version from the request line, e.g. `HTTP/1.1` */
  version: string;

  /** Destination host, lower-cased, IPv6 literals without brackets */
  host: string;

  /** Destination port */
  port: number;

  /** Header fields in arrival order */
  headers: HttpHeader[];

  /** Lower-cased header name to value; the first Host wins, repeats of other fields are comma-joined */
  headerMap: Record<string, string>;

  /** Header block as received, request line included, without the terminating empty line */
  rawHeader: string;

  /** Size in bytes of the header block including the terminating empty line */
  headerBytes: number;
}

export interface AllowedDecision {
  verdict: 'allowed';
}

export interface BlockedDecision {
  verdict: 'blocked';
  /** The blocklist pattern that matched */
  pattern: string;
}

export interface RateLimitedDecision {
  verdict: 'rate_limited';
  limit: number;
  windowMs: number;
  /** Requests counted in the current window, the rejected one included */
  count: number;
  retryAfterMs: number;
}

/**
 * Outcome of access control for one request. Produced once, never mutated.
 */
export type AccessDecision = AllowedDecision | BlockedDecision | RateLimitedDecision;
