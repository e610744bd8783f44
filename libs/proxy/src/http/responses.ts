/**
 * Proxy-generated responses (errors, tunnel establishment)
 */

export const STATUS_TEXT: Readonly<Record<number, string>> = {
  200: 'OK',
  400: 'Bad Request',
  403: 'Forbidden',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  504: 'Gateway Timeout',
};

export const CONNECTION_ESTABLISHED_LINE = 'HTTP/1.1 200 Connection Established';

export function statusLine(status: number): string {
  return `HTTP/1.1 ${status} ${STATUS_TEXT[status] ?? 'Unknown'}`;
}

export function connectionEstablishedResponse(): Buffer {
  return Buffer.from(`${CONNECTION_ESTABLISHED_LINE}\r\n\r\n`, 'latin1');
}

/**
 * Build a small plain-text response that closes the connection.
 */
export function buildStatusResponse(
  status: number,
  options: { body?: string; headers?: Record<string, string> } = {},
): Buffer {
  const body = options.body ?? `${STATUS_TEXT[status] ?? 'Error'}\n`;
  const lines = [
    statusLine(status),
    'Content-Type: text/plain; charset=utf-8',
    `Content-Length: ${Buffer.byteLength(body)}`,
    'Connection: close',
  ];
  for (const [name, value] of Object.entries(options.headers ?? {})) {
    lines.push(`${name}: ${value}`);
  }
  return Buffer.from(`${lines.join('\r\n')}\r\n\r\n${body}`, 'utf-8');
}

/**
 * Extract the status line and code from the start of an upstream response.
 * Returns null until the first line is complete.
 */
export function parseStatusLine(data: Buffer): { line: string; status: number } | null {
  const eol = data.indexOf('\n');
  if (eol === -1) return null;
  const line = data.subarray(0, eol).toString('latin1').replace(/\r$/, '');
  const match = /^HTTP\/\d\.\d (\d{3})/.exec(line);
  return { line, status: match ? Number(match[1]) : 0 };
}
