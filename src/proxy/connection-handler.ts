/**
 * Connection Handler
 *
 * Serves exactly one request per client connection:
 *
 *   RECEIVE → PARSE → CLASSIFY → RESPOND → CLOSE
 *
 * Classification order is block list, control API, cache revalidation,
 * CONNECT tunnel, and finally a plain forward that fills the cache. Any
 * failure stays inside this connection: the client socket is closed and
 * the listener keeps running.
 *
 * @module proxy/connection-handler
 */

import type { Socket } from 'node:net';
import type { CacheStore } from '../cache/index.js';
import type { Logger } from '../logger/index.js';
import type { ProxyMetrics } from '../metrics/index.js';
import type { BlockList } from './block-list.js';
import {
  MAX_CONTROL_BODY_BYTES,
  buildRawApiResponse,
  handleControlRequest,
  isControlEndpoint,
} from './control-api.js';
import { ConnectionError, ParseError } from './errors.js';
import type { ForwardFn } from './forwarding-client.js';
import {
  BAD_GATEWAY_RESPONSE,
  CONNECTION_ESTABLISHED,
  FORBIDDEN_RESPONSE,
  extractBody,
  extractContentLength,
  extractHost,
  extractLastModified,
  extractMethod,
  extractStatusCode,
  extractTarget,
} from './http-message.js';
import { closeSocket, readBody, readOnce, writeAll } from './socket-io.js';
import { openTunnel, relay } from './tunnel.js';

// =============================================================================
// Types
// =============================================================================

export interface HandlerOptions {
  bufferSize: number;
  httpPort: number;
  httpsPort: number;
  controlApiEnabled: boolean;
}

/**
 * Everything a handler shares with the rest of the server
 */
export interface ProxyContext {
  cache: CacheStore;
  blockList: BlockList;
  metrics: ProxyMetrics;
  logger: Logger;
  forward: ForwardFn;
  options: HandlerOptions;
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

/**
 * A request that parsed far enough to be classified
 */
export interface ParsedRequest {
  method: string;
  target: string;
  host: string;
  raw: Buffer;
}

/**
 * How a connection was served; drives the CLOSE-state log line
 */
export type Outcome =
  | { kind: 'control'; statusCode: number }
  | { kind: 'blocked' }
  | { kind: 'cache-hit'; timeSaved: number }
  | { kind: 'fetched'; bytes: number }
  | { kind: 'tunnel'; bytesFromClient: number; bytesFromOrigin: number };

// =============================================================================
// Helpers
// =============================================================================

const defaultClock = (): number => performance.now();

/**
 * `address:port` of the remote end, for log lines
 */
export function describePeer(socket: Socket): string {
  const address = socket.remoteAddress ?? 'unknown';
  return socket.remotePort === undefined ? address : `${address}:${socket.remotePort}`;
}

function formatMs(ms: number): string {
  return `${ms.toFixed(2)}ms`;
}

/**
 * Parse the first bounded read of a connection
 *
 * @throws ParseError when the request line has no target
 */
export function parseRequest(raw: Buffer): ParsedRequest {
  // UTF-8 so targets compare equal to block-list entries typed as text
  const text = raw.toString('utf-8');
  return {
    method: extractMethod(text),
    target: extractTarget(text),
    host: extractHost(text),
    raw,
  };
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Fetch the target in full, send it to the client and replace the cache entry
 */
async function fetchAndCache(
  clientSocket: Socket,
  request: ParsedRequest,
  context: ProxyContext,
  startTime: number
): Promise<Outcome> {
  const { cache, forward, logger, metrics, options } = context;
  const clock = context.now ?? defaultClock;

  logger.info(`📤 Fetching ${request.target} from ${request.host}:${options.httpPort}`);
  metrics.recordCacheMiss();

  const response = await forward(request.raw, request.host, {
    port: options.httpPort,
    fullRead: true,
    bufferSize: options.bufferSize,
  });
  logger.info(
    `📥 Response ${extractStatusCode(response).toString('latin1') || '(none)'} for ${request.target} (${response.length} bytes)`
  );

  await writeAll(clientSocket, response);

  if (response.length > 0) {
    const fetchLatency = clock() - startTime;
    cache.put(request.target, response, extractLastModified(response), fetchLatency);
  }

  return { kind: 'fetched', bytes: response.length };
}

async function serveBlocked(clientSocket: Socket, request: ParsedRequest, context: ProxyContext): Promise<Outcome> {
  context.logger.info(`🚫 Blocked: ${request.target}`);
  context.metrics.recordBlocked();

  // A CONNECT client waits for the tunnel acknowledgement before it reads a response
  if (request.method === 'CONNECT') {
    await writeAll(clientSocket, CONNECTION_ESTABLISHED);
  }
  await writeAll(clientSocket, FORBIDDEN_RESPONSE);
  return { kind: 'blocked' };
}

async function serveCached(
  clientSocket: Socket,
  request: ParsedRequest,
  context: ProxyContext,
  startTime: number
): Promise<Outcome> {
  const { cache, logger, metrics } = context;
  const clock = context.now ?? defaultClock;

  logger.debug(`🔁 Revalidating ${request.target}`);
  metrics.recordRevalidation();

  const result = await cache.revalidate(request.target, request.host);
  if (result.status === 'fresh') {
    logger.info(`♻️ Cached copy of ${request.target} is stale`);
    return fetchAndCache(clientSocket, request, context, startTime);
  }

  await writeAll(clientSocket, result.entry.rawResponse);

  const timeSaved = cache.timeSaved(result.entry, clock() - startTime);
  metrics.recordCacheHit(timeSaved);
  logger.info(`💾 Cache hit: ${request.target} (304 Not Modified)`);
  logger.info(`💰 Saved ${formatMs(timeSaved)} by caching!`, { target: request.target, timeSaved });

  return { kind: 'cache-hit', timeSaved };
}

async function serveTunnel(clientSocket: Socket, request: ParsedRequest, context: ProxyContext): Promise<Outcome> {
  const { logger, metrics, options } = context;

  logger.info(`🔒 CONNECT tunnel: ${request.host}:${options.httpsPort}`);
  metrics.recordTunnel();

  const originSocket = await openTunnel(clientSocket, request.host, options.httpsPort);
  const stats = await relay(clientSocket, originSocket);

  if (stats.error) {
    logger.debug(`Tunnel to ${request.host} ended by socket error: ${stats.error.message}`);
  }
  logger.info(
    `🔌 Tunnel closed: ${request.host} (${stats.bytesFromClient} bytes up, ${stats.bytesFromOrigin} bytes down)`
  );

  return { kind: 'tunnel', bytesFromClient: stats.bytesFromClient, bytesFromOrigin: stats.bytesFromOrigin };
}

async function serveControl(clientSocket: Socket, request: ParsedRequest, context: ProxyContext): Promise<Outcome> {
  // latin1 maps bytes to chars one to one, so the slice converts back losslessly
  const head = request.raw.toString('latin1');
  const initial = Buffer.from(extractBody(head), 'latin1');
  const declared = extractContentLength(head);
  const length = Math.min(declared ?? initial.length, MAX_CONTROL_BODY_BYTES);
  const body = (await readBody(clientSocket, initial, length)).toString('utf-8');

  const result = handleControlRequest(request.target, request.method, body, context);
  context.logger.info(`🔧 Control API: ${request.method} ${request.target} → ${result.statusCode}`);
  await writeAll(clientSocket, buildRawApiResponse(result));
  return { kind: 'control', statusCode: result.statusCode };
}

/**
 * Pick and run the serving strategy for a parsed request
 */
export function classify(
  clientSocket: Socket,
  request: ParsedRequest,
  context: ProxyContext,
  startTime: number
): Promise<Outcome> {
  const { blockList, cache, options } = context;

  if (blockList.has(request.target)) {
    return serveBlocked(clientSocket, request, context);
  }
  if (options.controlApiEnabled && isControlEndpoint(request.target)) {
    return serveControl(clientSocket, request, context);
  }
  if (cache.has(request.target)) {
    return serveCached(clientSocket, request, context, startTime);
  }
  if (request.method === 'CONNECT') {
    return serveTunnel(clientSocket, request, context);
  }
  return fetchAndCache(clientSocket, request, context, startTime);
}

// =============================================================================
// Connection Handler
// =============================================================================

/**
 * Serve one client connection and close it.
 *
 * Never rejects: parse and connection failures are logged, counted and
 * end with the client socket closed.
 */
export async function handleConnection(clientSocket: Socket, context: ProxyContext): Promise<void> {
  const { logger, metrics, options } = context;
  const clock = context.now ?? defaultClock;
  const startTime = clock();
  const peer = describePeer(clientSocket);

  try {
    // RECEIVE
    const raw = await readOnce(clientSocket, options.bufferSize);
    if (raw.length === 0) {
      return;
    }
    logger.debug(`📨 Client request from ${peer}:\n${raw.toString('latin1')}`);

    // PARSE
    const request = parseRequest(raw);
    metrics.recordRequest();
    logger.info(`📨 ${request.method} ${request.target} from ${peer}`);

    // CLASSIFY + RESPOND
    const outcome = await classify(clientSocket, request, context, startTime);

    if (outcome.kind === 'fetched' || outcome.kind === 'cache-hit') {
      logger.info(`⏱️ ${request.target} served in ${formatMs(clock() - startTime)}`);
    }
  } catch (err) {
    if (err instanceof ParseError) {
      logger.warn(`⚠️ Malformed request from ${peer}: ${err.message}`);
      return;
    }

    metrics.recordError();

    if (err instanceof ConnectionError) {
      logger.error(`❌ ${err.message}`);
      try {
        await writeAll(clientSocket, BAD_GATEWAY_RESPONSE);
      } catch (writeErr) {
        const reason = writeErr instanceof Error ? writeErr.message : String(writeErr);
        logger.debug(`Could not send 502 to ${peer}: ${reason}`);
      }
      return;
    }

    const message = err instanceof Error ? err.message : String(err);
    logger.error(`❌ Connection error for ${peer}: ${message}`);
  } finally {
    // CLOSE
    await closeSocket(clientSocket);
  }
}
