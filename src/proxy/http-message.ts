/**
 * HTTP Message Utilities
 *
 * Stateless helpers that read request lines, status lines and headers out of
 * raw HTTP/1.1 messages that have already been received. Nothing here does
 * any I/O.
 *
 * @module proxy/http-message
 */

import { ParseError } from './errors.js';

// =============================================================================
// Fixed Responses
// =============================================================================

/** Sent to the client once a CONNECT tunnel (or a blocked CONNECT) is accepted */
export const CONNECTION_ESTABLISHED = Buffer.from('HTTP/1.1 200 Connection Established\r\n\r\n', 'latin1');

/** Body of the blocked-target response */
export const FORBIDDEN_BODY =
  '<html><head><title>403 Forbidden</title></head><body><h1>403 Forbidden</h1>' +
  '<p>This page has been blocked by the proxy server.</p></body></html>';

/** Full response for a target on the block list */
export const FORBIDDEN_RESPONSE = Buffer.from(
  'HTTP/1.1 403 Forbidden\r\n' +
  'Content-Type: text/html\r\n\r\n' +
  FORBIDDEN_BODY,
  'latin1'
);

/** Sent when the origin server cannot be reached */
export const BAD_GATEWAY_RESPONSE = Buffer.from(
  'HTTP/1.1 502 Bad Gateway\r\n' +
  'Content-Type: text/plain\r\n' +
  'Content-Length: 11\r\n' +
  'Connection: close\r\n' +
  '\r\n' +
  'Bad Gateway',
  'latin1'
);

const CRLF = '\r\n';

/** Fallback when a request carries no Host header */
export const DEFAULT_HOST = 'localhost';

// =============================================================================
// Internal Helpers
// =============================================================================

function splitTokens(line: string): string[] {
  const trimmed = line.trim();
  return trimmed === '' ? [] : trimmed.split(/\s+/);
}

/**
 * Header lines of a message, stopping at the blank line that ends the head
 */
function headerLines(text: string): string[] {
  const lines = text.split(CRLF);
  const end = lines.indexOf('');
  return (end === -1 ? lines : lines.slice(0, end)).slice(1);
}

function findHeader(text: string, name: string): string | undefined {
  const prefix = `${name.toLowerCase()}:`;
  for (const line of headerLines(text)) {
    if (line.toLowerCase().startsWith(prefix)) {
      return line.slice(prefix.length).trim();
    }
  }
  return undefined;
}

// =============================================================================
// Request Parsing
// =============================================================================

/**
 * Request-line target, e.g. `http://example.com/` or `example.com:443`
 *
 * @throws ParseError when the request line has no second token
 */
export function extractTarget(requestText: string): string {
  const [requestLine = ''] = requestText.split(CRLF, 1);
  const tokens = splitTokens(requestLine);
  if (tokens.length < 2) {
    throw new ParseError(`Malformed request line: "${requestLine.slice(0, 80)}"`);
  }
  return tokens[1];
}

/**
 * Request method, or an empty string when the request line is blank
 */
export function extractMethod(requestText: string): string {
  const [requestLine = ''] = requestText.split(CRLF, 1);
  return splitTokens(requestLine)[0] ?? '';
}

/**
 * Host header value without any `:port` suffix.
 * Falls back to `localhost` when the header is missing.
 */
export function extractHost(requestText: string): string {
  const value = findHeader(requestText, 'Host');
  if (value === undefined) {
    return DEFAULT_HOST;
  }
  const colonIdx = value.indexOf(':');
  return colonIdx === -1 ? value : value.slice(0, colonIdx).trim();
}

/**
 * Everything after the blank line that ends the request head
 */
export function extractBody(requestText: string): string {
  const headEnd = requestText.indexOf(CRLF + CRLF);
  return headEnd === -1 ? '' : requestText.slice(headEnd + 4);
}

/**
 * Declared body length, or undefined when the header is missing or not a
 * non-negative integer
 */
export function extractContentLength(requestText: string): number | undefined {
  const value = findHeader(requestText, 'Content-Length');
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

// =============================================================================
// Response Parsing
// =============================================================================

/**
 * Status code token of the status line, e.g. `304`.
 * Empty when the response is empty or the status line is truncated.
 */
export function extractStatusCode(response: Buffer): Buffer {
  const lineEnd = response.indexOf(CRLF);
  const statusLine = (lineEnd === -1 ? response : response.subarray(0, lineEnd)).toString('latin1');
  const code = splitTokens(statusLine)[1];
  return code === undefined ? Buffer.alloc(0) : Buffer.from(code, 'latin1');
}

/**
 * HTTP-date in IMF-fixdate form: `Mon, 01 Jan 2024 00:00:00 GMT`
 */
export function formatHttpDate(date: Date): string {
  return date.toUTCString();
}

/**
 * Last-Modified header value of a response.
 *
 * A response without the header is treated as modified at `now`, so the
 * value can always be replayed in a later If-Modified-Since.
 */
export function extractLastModified(response: Buffer, now: Date = new Date()): Buffer {
  const value = findHeader(response.toString('latin1'), 'Last-Modified');
  return Buffer.from(value ?? formatHttpDate(now), 'latin1');
}

/**
 * Conditional GET used to revalidate a cached target. The target is
 * encoded as UTF-8, the way it was decoded off the request line.
 */
export function buildConditionalRequest(target: string, host: string, lastModified: Buffer): Buffer {
  return Buffer.from(
    `GET ${target} HTTP/1.1${CRLF}` +
    `Host: ${host}${CRLF}` +
    `If-Modified-Since: ${lastModified.toString('latin1')}${CRLF}${CRLF}`,
    'utf-8'
  );
}
