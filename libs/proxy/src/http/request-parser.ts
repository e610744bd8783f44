/**
 * Request Parser
 *
 * Reads the request line and header block from a freshly accepted client
 * socket and classifies the request as a CONNECT tunnel or plain HTTP.
 */

import type * as net from 'node:net';
import { DEFAULT_HTTP_PORT, DEFAULT_HTTPS_PORT } from '@portcullis/ipc';
import type { HttpHeader, ParsedRequest } from '@portcullis/ipc';
import {
  ClientClosedError,
  HeaderTimeoutError,
  IncompleteRequestError,
  MalformedRequestError,
} from '../errors.js';

export interface ReadHeadOptions {
  timeoutMs: number;
  maxHeaderBytes: number;
}

export interface RequestHead {
  /** Header block including the terminating empty line */
  head: Buffer;
  /** Bytes received after the header block (request body or tunnel payload) */
  rest: Buffer;
}

const TOKEN_RE = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const VERSION_RE = /^HTTP\/\d\.\d$/;
const HOST_RE = /^[a-z0-9._~%!$&'()*+,;=-]+$/i;
const IPV6_RE = /^[0-9a-f:.]+$/i;
const ABSOLUTE_URI_RE = /^([a-z][a-z0-9+.-]*):\/\/([^/?#]*)(.*)$/i;

/** True when the request target names its own scheme and authority. */
export function isAbsoluteForm(target: string): boolean {
  return ABSOLUTE_URI_RE.test(target);
}

const CRLF_CRLF = Buffer.from('\r\n\r\n');
const LF_LF = Buffer.from('\n\n');

/**
 * Locate the end of the header block. Returns the index just past the empty line, or -1.
 */
export function findHeadEnd(buffer: Buffer, from = 0): number {
  const crlf = buffer.indexOf(CRLF_CRLF, from);
  const lf = buffer.indexOf(LF_LF, from);
  if (crlf === -1 && lf === -1) return -1;
  if (crlf === -1) return lf + LF_LF.length;
  if (lf === -1 || crlf < lf) return crlf + CRLF_CRLF.length;
  return lf + LF_LF.length;
}

/**
 * Consume bytes from `socket` until a complete header block has arrived.
 *
 * Rejects with IncompleteRequestError if the client closes first, with
 * HeaderTimeoutError when the header read window elapses, and with
 * MalformedRequestError when the block outgrows `maxHeaderBytes`. On success
 * the socket is left paused so no later bytes are lost.
 */
export function readRequestHead(socket: net.Socket, options: ReadHeadOptions): Promise<RequestHead> {
  return new Promise((resolve, reject) => {
    let buffered: Buffer = Buffer.alloc(0);
    let settled = false;

    const timer = setTimeout(() => {
      finish(() => reject(new HeaderTimeoutError(options.timeoutMs)));
    }, options.timeoutMs);

    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.pause();
      socket.off('data', onData);
      socket.off('end', onEnd);
      socket.off('close', onClose);
      socket.off('error', onError);
      settle();
    };

    const onData = (chunk: Buffer) => {
      const searchFrom = Math.max(0, buffered.length - 3);
      buffered = buffered.length === 0 ? chunk : Buffer.concat([buffered, chunk]);

      const end = findHeadEnd(buffered, searchFrom);
      if (end !== -1 && end <= options.maxHeaderBytes) {
        finish(() => resolve({ head: buffered.subarray(0, end), rest: buffered.subarray(end) }));
        return;
      }

      if (end !== -1 || buffered.length > options.maxHeaderBytes) {
        finish(() =>
          reject(new MalformedRequestError(`Header block exceeds ${options.maxHeaderBytes} bytes`)),
        );
      }
    };

    const onEnd = () => finish(() => reject(new IncompleteRequestError()));
    const onClose = () => finish(() => reject(new IncompleteRequestError()));
    const onError = (error: Error) =>
      finish(() => reject(new ClientClosedError(`Client socket error: ${error.message}`, { cause: error })));

    socket.on('data', onData);
    socket.once('end', onEnd);
    socket.once('close', onClose);
    socket.once('error', onError);
    socket.resume();
  });
}

/**
 * Split `host[:port]` or `[v6]:port`. Returns null when the authority is unusable.
 */
export function parseAuthority(
  authority: string,
  defaultPort: number,
): { host: string; port: number } | null {
  let host: string;
  let portText: string | undefined;

  if (authority.startsWith('[')) {
    const close = authority.indexOf(']');
    if (close === -1) return null;
    host = authority.slice(1, close);
    const after = authority.slice(close + 1);
    if (after !== '' && !after.startsWith(':')) return null;
    portText = after ? after.slice(1) : undefined;
    if (!IPV6_RE.test(host)) return null;
  } else {
    const colon = authority.lastIndexOf(':');
    if (colon !== -1 && authority.indexOf(':') !== colon) return null;
    host = colon === -1 ? authority : authority.slice(0, colon);
    portText = colon === -1 ? undefined : authority.slice(colon + 1);
    if (!HOST_RE.test(host)) return null;
  }

  let port = defaultPort;
  if (portText !== undefined) {
    if (!/^\d{1,5}$/.test(portText)) return null;
    port = Number(portText);
    if (port < 1 || port > 65535) return null;
  }

  host = host.toLowerCase();
  if (host.endsWith('.')) host = host.slice(0, -1);
  if (!host) return null;

  return { host, port };
}

function parseHeaderLines(lines: string[]): { headers: HttpHeader[]; headerMap: Record<string, string> } {
  const headers: HttpHeader[] = [];
  const headerMap: Record<string, string> = {};

  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon <= 0) {
      throw new MalformedRequestError(`Unparsable header line: ${JSON.stringify(line)}`);
    }
    const name = line.slice(0, colon);
    if (!TOKEN_RE.test(name)) {
      throw new MalformedRequestError(`Invalid header name: ${JSON.stringify(name)}`);
    }
    const value = line.slice(colon + 1).trim();
    headers.push({ name, value });

    const key = name.toLowerCase();
    if (!(key in headerMap)) {
      headerMap[key] = value;
    } else if (key !== 'host') {
      headerMap[key] = `${headerMap[key]}, ${value}`;
    }
  }

  return { headers, headerMap };
}

/**
 * Parse a complete header block into a classified request.
 *
 * @throws MalformedRequestError for a bad request line, header line or target
 */
export function parseRequestHead(head: Buffer): ParsedRequest {
  const text = head.toString('latin1');
  const rawHeader = text.replace(/(\r?\n){2}$/, '');
  const lines = rawHeader.split(/\r?\n/);

  const requestLine = lines[0] ?? '';
  const parts = requestLine.split(' ');
  if (parts.length !== 3) {
    throw new MalformedRequestError(`Malformed request line: ${JSON.stringify(requestLine)}`);
  }

  const [rawMethod, target, version] = parts;
  if (!TOKEN_RE.test(rawMethod) || !target || !VERSION_RE.test(version)) {
    throw new MalformedRequestError(`Malformed request line: ${JSON.stringify(requestLine)}`);
  }
  const method = rawMethod.toUpperCase();

  const headerLines = lines.slice(1);
  if (headerLines.some((line) => line.startsWith(' ') || line.startsWith('\t'))) {
    throw new MalformedRequestError('Folded header lines are not supported');
  }
  const { headers, headerMap } = parseHeaderLines(headerLines);

  const base = { method, target, version, headers, headerMap, rawHeader, headerBytes: head.length };

  if (method === 'CONNECT') {
    const authority = parseAuthority(target, DEFAULT_HTTPS_PORT);
    if (!authority) {
      throw new MalformedRequestError(`Invalid CONNECT target: ${JSON.stringify(target)}`);
    }
    return { ...base, kind: 'connect', path: '', ...authority };
  }

  const absolute = ABSOLUTE_URI_RE.exec(target);
  if (absolute) {
    const scheme = absolute[1].toLowerCase();
    if (scheme !== 'http' && scheme !== 'https') {
      throw new MalformedRequestError(`Unsupported scheme: ${scheme}`);
    }
    const rawAuthority = absolute[2];
    const hostPart = rawAuthority.slice(rawAuthority.lastIndexOf('@') + 1);
    const authority = parseAuthority(hostPart, scheme === 'https' ? DEFAULT_HTTPS_PORT : DEFAULT_HTTP_PORT);
    if (!authority) {
      throw new MalformedRequestError(`Invalid request target: ${JSON.stringify(target)}`);
    }
    const rest = absolute[3];
    const path = rest === '' ? '/' : rest.startsWith('/') ? rest : `/${rest}`;
    return { ...base, kind: 'http', path, ...authority };
  }

  if (!target.startsWith('/') && target !== '*') {
    throw new MalformedRequestError(`Invalid request target: ${JSON.stringify(target)}`);
  }

  const hostHeader = headerMap['host'];
  if (!hostHeader) {
    throw new MalformedRequestError('Request has neither an absolute URI nor a Host header');
  }
  const authority = parseAuthority(hostHeader, DEFAULT_HTTP_PORT);
  if (!authority) {
    throw new MalformedRequestError(`Invalid Host header: ${JSON.stringify(hostHeader)}`);
  }
  return { ...base, kind: 'http', path: target, ...authority };
}

/**
 * Read and parse one request from a client socket.
 */
export async function readRequest(
  socket: net.Socket,
  options: ReadHeadOptions,
): Promise<{ request: ParsedRequest; rest: Buffer }> {
  const { head, rest } = await readRequestHead(socket, options);
  return { request: parseRequestHead(head), rest };
}
