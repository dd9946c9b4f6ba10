/**
 * Tollgate Control API
 *
 * Handles /__tollgate__/* requests sent straight to the proxy (origin-form
 * targets) so a control surface can manage it over HTTP:
 * - /__tollgate__/blocked - list, add and remove blocked targets
 * - /__tollgate__/cache   - cache stats, clear the cache
 * - /__tollgate__/metrics - JSON metrics
 */

import { z } from 'zod';
import type { CacheStore } from '../cache/index.js';
import { formatDuration, type ProxyMetrics } from '../metrics/index.js';
import type { BlockList } from './block-list.js';

/** Base path for all control API endpoints */
export const CONTROL_API_BASE = '/__tollgate__';

/** Largest request body the control API reads */
export const MAX_CONTROL_BODY_BYTES = 64 * 1024;

/** API endpoint paths */
export const ENDPOINTS = {
  blocked: `${CONTROL_API_BASE}/blocked`,
  cache: `${CONTROL_API_BASE}/cache`,
  metrics: `${CONTROL_API_BASE}/metrics`,
} as const;

/**
 * API response result
 */
export interface ApiResult {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * State the control API reads and mutates
 */
export interface ControlApiContext {
  blockList: BlockList;
  cache: CacheStore;
  metrics: ProxyMetrics;
}

/** Standard CORS headers */
const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
};

const STATUS_MESSAGES: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  204: 'No Content',
  400: 'Bad Request',
  404: 'Not Found',
  405: 'Method Not Allowed',
  409: 'Conflict',
};

const blockedUrlBodySchema = z.object({
  url: z.string().trim().min(1),
});

function json(statusCode: number, payload: unknown, extraHeaders: Record<string, string> = {}): ApiResult {
  return {
    statusCode,
    headers: {
      ...CORS_HEADERS,
      'Content-Type': 'application/json',
      'Cache-Control': 'no-store',
      ...extraHeaders,
    },
    body: JSON.stringify(payload),
  };
}

function methodNotAllowed(allow: string): ApiResult {
  return json(405, { error: 'Method not allowed' }, { Allow: allow });
}

/**
 * Parse and validate the `{ "url": "..." }` body used by block-list mutations
 */
function parseUrlBody(body: string): { url: string } | { error: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return { error: 'Request body must be JSON' };
  }
  const result = blockedUrlBodySchema.safeParse(parsed);
  if (!result.success) {
    return { error: 'Request body must be {"url": "<target>"}' };
  }
  return { url: result.data.url };
}

/**
 * Check if a request-line target addresses the control API
 */
export function isControlEndpoint(target: string): boolean {
  return target === CONTROL_API_BASE || target.startsWith(`${CONTROL_API_BASE}/`);
}

function handleBlockedRequest(method: string, body: string, context: ControlApiContext): ApiResult {
  const { blockList } = context;

  if (method === 'GET') {
    return json(200, { blocked: blockList.list() });
  }

  if (method !== 'POST' && method !== 'DELETE') {
    return methodNotAllowed('GET, POST, DELETE');
  }

  const parsed = parseUrlBody(body);
  if ('error' in parsed) {
    return json(400, { error: parsed.error });
  }

  if (method === 'POST') {
    if (!blockList.add(parsed.url)) {
      return json(409, { error: `Already blocked: ${parsed.url}` });
    }
    return json(201, { added: parsed.url, blocked: blockList.list() });
  }

  if (!blockList.remove(parsed.url)) {
    return json(404, { error: `Not blocked: ${parsed.url}` });
  }
  return json(200, { removed: parsed.url, blocked: blockList.list() });
}

function handleCacheRequest(method: string, context: ControlApiContext): ApiResult {
  const { cache } = context;

  if (method === 'GET') {
    return json(200, { ...cache.getStats(), targets: cache.targets() });
  }

  if (method === 'DELETE') {
    const cleared = cache.getStats().entries;
    cache.clear();
    return json(200, { cleared });
  }

  return methodNotAllowed('GET, DELETE');
}

/**
 * Handle a control API request
 * @param target - Request-line target (may carry a query string)
 * @param method - HTTP method
 * @param body - Request body
 */
export function handleControlRequest(
  target: string,
  method: string,
  body: string,
  context: ControlApiContext
): ApiResult {
  // Handle CORS preflight for all endpoints
  if (method === 'OPTIONS') {
    return {
      statusCode: 204,
      headers: { ...CORS_HEADERS },
      body: '',
    };
  }

  const [path] = target.split('?', 1);
  const normalized = path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;

  switch (normalized) {
    case ENDPOINTS.blocked:
      return handleBlockedRequest(method, body, context);

    case ENDPOINTS.cache:
      return handleCacheRequest(method, context);

    case ENDPOINTS.metrics: {
      if (method !== 'GET') {
        return methodNotAllowed('GET');
      }
      const snapshot = context.metrics.snapshot();
      return json(200, { ...snapshot, uptimeHuman: formatDuration(snapshot.uptime) });
    }

    default:
      return json(404, {
        error: `Unknown endpoint: ${normalized}`,
        endpoints: ENDPOINTS,
      });
  }
}

/**
 * Serialize an API result as a raw HTTP/1.1 response
 */
export function buildRawApiResponse(result: ApiResult): Buffer {
  const statusMessage = STATUS_MESSAGES[result.statusCode] || 'OK';
  let response = `HTTP/1.1 ${result.statusCode} ${statusMessage}\r\n`;

  for (const [key, value] of Object.entries(result.headers)) {
    response += `${key}: ${value}\r\n`;
  }

  response += `Content-Length: ${Buffer.byteLength(result.body)}\r\n`;
  response += 'Connection: close\r\n';
  response += '\r\n';
  response += result.body;

  return Buffer.from(response, 'utf-8');
}
