/**
 * Proxy Errors
 *
 * Error taxonomy for connection handling. Every error here is local to a
 * single client connection and never stops the listener.
 *
 * @module proxy/errors
 */

export type ProxyErrorCode = 'PARSE_ERROR' | 'CONNECTION_ERROR';

/**
 * Base class for errors raised while handling a proxied connection
 */
export class ProxyError extends Error {
  readonly code: ProxyErrorCode;

  constructor(code: ProxyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProxyError';
    this.code = code;
  }
}

/**
 * Malformed request line (no target token)
 */
export class ParseError extends ProxyError {
  constructor(message: string) {
    super('PARSE_ERROR', message);
    this.name = 'ParseError';
  }
}

/**
 * Outbound connect or send to an origin server failed
 */
export class ConnectionError extends ProxyError {
  readonly host: string;
  readonly port: number;

  constructor(host: string, port: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('CONNECTION_ERROR', `Connection to ${host}:${port} failed: ${reason}`, { cause });
    this.name = 'ConnectionError';
    this.host = host;
    this.port = port;
  }
}

/** Socket error messages that are routine when peers hang up */
const EXPECTED_SOCKET_ERRORS = ['ECONNRESET', 'EPIPE', 'write after end'];

/**
 * Check whether a socket error is routine peer behaviour and not worth logging
 */
export function isExpectedSocketError(err: Error): boolean {
  return EXPECTED_SOCKET_ERRORS.some(fragment => err.message.includes(fragment));
}
