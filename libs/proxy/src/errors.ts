/**
 * Proxy error taxonomy
 *
 * Every failure a session can hit maps to one of these. Each carries a stable
 * `code` for metrics and logs, and the HTTP status the client is sent.
 */

export type ProxyErrorCode =
  | 'MALFORMED_REQUEST'
  | 'INCOMPLETE_REQUEST'
  | 'TIMEOUT'
  | 'DNS_FAILURE'
  | 'CONNECT_TIMEOUT'
  | 'CONNECTION_REFUSED'
  | 'UPSTREAM_CLOSED'
  | 'UPSTREAM_TIMEOUT'
  | 'CLIENT_CLOSED';

export abstract class ProxyError extends Error {
  abstract readonly code: ProxyErrorCode;
  /** Status sent to the client when nothing has been written yet; 0 means send nothing */
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

// ---- Parse-level ----

export class MalformedRequestError extends ProxyError {
  readonly code = 'MALFORMED_REQUEST';
  readonly status = 400;
}

export class IncompleteRequestError extends ProxyError {
  readonly code = 'INCOMPLETE_REQUEST';
  readonly status = 400;

  constructor(message = 'Client closed the connection before the header block ended') {
    super(message);
  }
}

export class HeaderTimeoutError extends ProxyError {
  readonly code = 'TIMEOUT';
  readonly status = 400;

  constructor(public readonly timeoutMs: number) {
    super(`No complete header block within ${timeoutMs}ms`);
  }
}

// ---- Upstream-level ----

export abstract class UpstreamConnectError extends ProxyError {
  readonly status = 502;

  constructor(
    message: string,
    public readonly host: string,
    public readonly port: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class DnsFailureError extends UpstreamConnectError {
  readonly code = 'DNS_FAILURE';

  constructor(host: string, port: number, options?: { cause?: unknown }) {
    super(`Could not resolve ${host}`, host, port, options);
  }
}

export class ConnectTimeoutError extends UpstreamConnectError {
  readonly code = 'CONNECT_TIMEOUT';

  constructor(host: string, port: number, public readonly timeoutMs: number) {
    super(`Connecting to ${host}:${port} timed out after ${timeoutMs}ms`, host, port);
  }
}

/**
 * Refused connections, and any other socket-level connect failure (the errno is kept).
 */
export class ConnectionRefusedError extends UpstreamConnectError {
  readonly code = 'CONNECTION_REFUSED';

  constructor(
    host: string,
    port: number,
    public readonly errno?: string,
    options?: { cause?: unknown },
  ) {
    super(
      errno && errno !== 'ECONNREFUSED'
        ? `Connection to ${host}:${port} failed (${errno})`
        : `Connection to ${host}:${port} refused`,
      host,
      port,
      options,
    );
  }
}

export class UpstreamClosedError extends ProxyError {
  readonly code = 'UPSTREAM_CLOSED';
  readonly status = 502;

  constructor(message = 'Upstream closed before a complete response was relayed', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UpstreamTimeoutError extends ProxyError {
  readonly code = 'UPSTREAM_TIMEOUT';
  readonly status = 504;

  constructor(public readonly timeoutMs: number) {
    super(`Upstream idle for ${timeoutMs}ms`);
  }
}

// ---- Client-level ----

export class ClientClosedError extends ProxyError {
  readonly code = 'CLIENT_CLOSED';
  readonly status = 0;

  constructor(message = 'Client closed the connection', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isProxyError(error: unknown): error is ProxyError {
  return error instanceof ProxyError;
}

// ---- Configuration ----

export class ConfigValidationError extends Error {
  public readonly code = 'CONFIG_INVALID';

  constructor(message: string, public readonly issues: unknown[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}
