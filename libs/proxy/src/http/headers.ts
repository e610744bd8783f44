/**
 * Header rewriting for forwarded requests
 *
 * Pure functions over the parsed header list; nothing here touches sockets.
 */

import { DEFAULT_HTTP_PORT } from '@portcullis/ipc';
import type { HttpHeader, ParsedRequest } from '@portcullis/ipc';
import { isAbsoluteForm } from './request-parser.js';

/**
 * Headers that only concern the client-to-proxy hop.
 */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'connection',
  'proxy-connection',
  'proxy-authorization',
  'keep-alive',
  'te',
  'upgrade',
]);

/**
 * Format a Host header value, omitting the default port.
 */
export function formatHostHeader(host: string, port: number): string {
  const name = host.includes(':') ? `[${host}]` : host;
  return port === DEFAULT_HTTP_PORT ? name : `${name}:${port}`;
}

/**
 * Produce the header list sent upstream:
 * - drops hop-by-hop headers, and any header the client named in `Connection`
 * - adds `Host` when the client sent none
 * - rewrites `Host` to the URI's authority when `target.absolute` is set
 * - appends `Connection: close`, one request per upstream connection
 */
export function rewriteRequestHeaders(
  headers: readonly HttpHeader[],
  target: Pick<ParsedRequest, 'host' | 'port'> & { absolute?: boolean },
): HttpHeader[] {
  const connectionTokens = new Set<string>();
  for (const header of headers) {
    const name = header.name.toLowerCase();
    if (name === 'connection' || name === 'proxy-connection') {
      for (const token of header.value.split(',')) {
        const trimmed = token.trim().toLowerCase();
        if (trimmed) connectionTokens.add(trimmed);
      }
    }
  }

  const hostValue = formatHostHeader(target.host, target.port);
  let hostSeen = false;
  const result: HttpHeader[] = [];
  for (const header of headers) {
    const name = header.name.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(name) || connectionTokens.has(name)) continue;
    if (name === 'host') {
      if (target.absolute) {
        // One Host, naming the URI's authority.
        if (hostSeen) continue;
        result.push({ name: header.name, value: hostValue });
        hostSeen = true;
        continue;
      }
      hostSeen = true;
    }
    result.push(header);
  }

  if (!hostSeen) {
    result.unshift({ name: 'Host', value: hostValue });
  }

  result.push({ name: 'Connection', value: 'close' });
  return result;
}

/**
 * Serialise the request line and headers, origin-form target, terminated by an empty line.
 */
export function serializeRequestHead(
  request: Pick<ParsedRequest, 'method' | 'path' | 'version'>,
  headers: readonly HttpHeader[],
): string {
  const lines = [`${request.method} ${request.path} ${request.version}`];
  for (const header of headers) {
    lines.push(`${header.name}: ${header.value}`);
  }
  return `${lines.join('\r\n')}\r\n\r\n`;
}

/**
 * Build the upstream request head for a parsed plain-HTTP request.
 */
export function buildUpstreamRequestHead(request: ParsedRequest): string {
  return serializeRequestHead(
    request,
    rewriteRequestHeaders(request.headers, {
      host: request.host,
      port: request.port,
      absolute: isAbsoluteForm(request.target),
    }),
  );
}
