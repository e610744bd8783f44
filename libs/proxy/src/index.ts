/**
 * @portcullis/proxy
 *
 * Forward HTTP/HTTPS proxy engine: request parsing, blocklist and per-client
 * rate limiting, upstream connection, HTTP forwarding and CONNECT tunnelling.
 */

export { ProxyServer, DEFAULT_DRAIN_TIMEOUT_MS } from './server.js';
export { SessionHandler } from './session/session-handler.js';
export { ClientSession } from './session/client-session.js';

export * from './errors.js';
export * from './config.js';
export { Logger, createSilentLogger, type LoggerOptions } from './logger.js';

export * from './policies/access-policy.js';
export * from './policies/rate-limiter.js';

export * from './http/request-parser.js';
export * from './http/headers.js';
export * from './http/responses.js';

export * from './upstream/connector.js';
export * from './relay/pump.js';
export * from './relay/tunnel-relay.js';
export * from './relay/http-forwarder.js';
export * from './utils/socket.js';

export { LoggingSink } from './sinks/logging-sink.js';
export { FanoutSink } from './sinks/fanout-sink.js';

export * from './types.js';
