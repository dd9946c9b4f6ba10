/**
 * Proxy Module
 *
 * Main entry point for the proxy functionality: the listener, the
 * per-connection handler and the pieces they are built from.
 *
 * @module proxy
 *
 * @example
 * ```typescript
 * import { createProxyServer } from './proxy/index.js';
 *
 * const proxy = createProxyServer({ port: 4000 });
 * await proxy.start();
 * proxy.addBlocked('http://example.com/ads');
 * ```
 */

// =============================================================================
// Listener
// =============================================================================

export {
  createProxyServer,
  type ProxyServer,
  type ProxyServerOptions,
  type ProxyServerDependencies,
} from './server.js';

export { ConnectionLimiter, type LimiterStats } from './connection-limiter.js';

// =============================================================================
// Connection Handling
// =============================================================================

export {
  handleConnection,
  classify,
  parseRequest,
  describePeer,
  type ProxyContext,
  type HandlerOptions,
  type ParsedRequest,
  type Outcome,
} from './connection-handler.js';

export { BlockList } from './block-list.js';

// =============================================================================
// Origin Access
// =============================================================================

export {
  HTTP_PORT,
  forwardRequest,
  openConnection,
  type ForwardFn,
  type ForwardOptions,
} from './forwarding-client.js';

export { HTTPS_PORT, openTunnel, relay, type RelayStats } from './tunnel.js';

// =============================================================================
// Control API
// =============================================================================

export {
  CONTROL_API_BASE,
  ENDPOINTS,
  MAX_CONTROL_BODY_BYTES,
  isControlEndpoint,
  handleControlRequest,
  buildRawApiResponse,
  type ApiResult,
  type ControlApiContext,
} from './control-api.js';

// =============================================================================
// HTTP Message Utilities
// =============================================================================

export {
  CONNECTION_ESTABLISHED,
  FORBIDDEN_BODY,
  FORBIDDEN_RESPONSE,
  BAD_GATEWAY_RESPONSE,
  DEFAULT_HOST,
  extractTarget,
  extractMethod,
  extractHost,
  extractBody,
  extractContentLength,
  extractStatusCode,
  extractLastModified,
  formatHttpDate,
  buildConditionalRequest,
} from './http-message.js';

export { DEFAULT_BUFFER_SIZE, readOnce, readToEnd, readBody, writeAll, closeSocket } from './socket-io.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ProxyError,
  ParseError,
  ConnectionError,
  isExpectedSocketError,
  type ProxyErrorCode,
} from './errors.js';
