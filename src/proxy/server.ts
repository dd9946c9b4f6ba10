/**
 * Proxy Listener
 *
 * Binds the listening socket and spawns one connection handler per accepted
 * client. Owns the per-server state every handler shares: the cache store,
 * the block list and the metrics.
 *
 * @module proxy/server
 */

import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';
import { CacheStore } from '../cache/index.js';
import { resolveConfig, type ProxyConfig } from '../config/index.js';
import {
  createLogger,
  consoleSink,
  messageSink,
  type Logger,
  type LogSink,
} from '../logger/index.js';
import { ProxyMetrics, formatDuration } from '../metrics/index.js';
import { BlockList } from './block-list.js';
import { handleConnection, describePeer, type ProxyContext } from './connection-handler.js';
import { ConnectionLimiter } from './connection-limiter.js';
import { isExpectedSocketError } from './errors.js';
import { forwardRequest, type ForwardFn } from './forwarding-client.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Collaborators that can be swapped without touching configuration
 */
export interface ProxyServerDependencies {
  /** Structured log sink; takes precedence over `onLog` */
  sink?: LogSink;
  /** Plain message callback, e.g. a UI log pane */
  onLog?: (message: string) => void;
  /** Fully built logger; takes precedence over `sink` and `onLog` */
  logger?: Logger;
  /** Transport for origin requests */
  forward?: ForwardFn;
}

export type ProxyServerOptions = Partial<ProxyConfig> & ProxyServerDependencies;

export interface ProxyServer {
  readonly config: ProxyConfig;
  readonly cache: CacheStore;
  readonly blockList: BlockList;
  readonly metrics: ProxyMetrics;
  readonly logger: Logger;
  /** Bind and begin accepting connections */
  start(): Promise<AddressInfo>;
  /** Stop accepting and drop every open client connection */
  stop(): Promise<void>;
  /** Bound address, or null when not listening */
  address(): AddressInfo | null;
  addBlocked(url: string): boolean;
  removeBlocked(url: string): boolean;
  isBlocked(url: string): boolean;
  getBlockedUrls(): string[];
}

// =============================================================================
// Factory
// =============================================================================

function buildLogger(deps: ProxyServerDependencies, config: ProxyConfig): Logger {
  if (deps.logger) {
    return deps.logger;
  }
  const sink = deps.sink ?? (deps.onLog ? messageSink(deps.onLog) : consoleSink);
  return createLogger({ sink, level: config.logLevel });
}

/**
 * Create a proxy server. Nothing is bound until `start()` is called.
 */
export function createProxyServer(options: ProxyServerOptions = {}): ProxyServer {
  const { sink, onLog, logger: providedLogger, forward: providedForward, ...overrides } = options;
  const config = resolveConfig(overrides);
  const logger = buildLogger({ sink, onLog, logger: providedLogger }, config);
  const forward = providedForward ?? forwardRequest;

  const cache = new CacheStore({
    forward,
    httpPort: config.httpPort,
    bufferSize: config.bufferSize,
  });
  const blockList = new BlockList(config.blockedUrls);
  const metrics = new ProxyMetrics();
  const limiter = new ConnectionLimiter(config.maxConnections);

  const context: ProxyContext = {
    cache,
    blockList,
    metrics,
    logger,
    forward,
    options: {
      bufferSize: config.bufferSize,
      httpPort: config.httpPort,
      httpsPort: config.httpsPort,
      controlApiEnabled: config.controlApiEnabled,
    },
  };

  const sockets = new Set<Socket>();
  let server: Server | null = null;

  async function onConnection(socket: Socket): Promise<void> {
    const peer = describePeer(socket);
    sockets.add(socket);

    socket.on('error', (err) => {
      if (!isExpectedSocketError(err)) {
        logger.warn(`❌ Client socket error (${peer}): ${err.message}`);
      }
    });
    socket.once('close', () => {
      sockets.delete(socket);
    });

    logger.info(`✅ Accepted connection: ${peer}`);

    if (!limiter.unbounded) {
      const { active, maxConcurrent } = limiter.getStats();
      if (active >= maxConcurrent) {
        logger.debug(`⏳ Connection ${peer} queued (${active}/${maxConcurrent} active)`);
      }
    }

    await limiter.acquire();
    metrics.updateConnections(1);
    try {
      await handleConnection(socket, context);
    } finally {
      metrics.updateConnections(-1);
      limiter.release();
      logger.info(`👋 Closed connection: ${peer}`);
    }
  }

  return {
    config,
    cache,
    blockList,
    metrics,
    logger,

    start(): Promise<AddressInfo> {
      if (server) {
        return Promise.reject(new Error('Proxy server is already running'));
      }

      const listener = createServer((socket) => {
        onConnection(socket).catch((err: unknown) => {
          const message = err instanceof Error ? err.message : String(err);
          logger.error(`❌ Unhandled connection failure: ${message}`);
        });
      });
      server = listener;

      return new Promise((resolve, reject) => {
        const onStartError = (err: Error): void => {
          server = null;
          reject(err);
        };

        listener.once('error', onStartError);
        listener.listen({ host: config.bindAddress, port: config.port, backlog: config.backlog }, () => {
          listener.off('error', onStartError);
          listener.on('error', (err) => {
            logger.error(`❌ Proxy server error: ${err.message}`);
          });

          const address = listener.address();
          if (address === null || typeof address === 'string') {
            reject(new Error('Proxy server is not bound to a TCP address'));
            return;
          }

          metrics.reset();
          logger.info(`🚀 Proxy server started: (${address.address}, ${address.port})`);
          logger.info(`📋 Backlog set to ${config.backlog}!`);
          if (!limiter.unbounded) {
            logger.info(`🚦 Concurrent connections capped at ${config.maxConnections}`);
          }
          resolve(address);
        });
      });
    },

    stop(): Promise<void> {
      const listener = server;
      if (!listener) {
        return Promise.resolve();
      }
      server = null;

      return new Promise((resolve) => {
        listener.close(() => {
          logger.info(`🛑 Proxy server stopped after ${formatDuration(metrics.snapshot().uptime)}`);
          resolve();
        });
        for (const socket of sockets) {
          socket.destroy();
        }
        sockets.clear();
      });
    },

    address(): AddressInfo | null {
      const address = server?.address();
      return address && typeof address !== 'string' ? address : null;
    },

    addBlocked(url: string): boolean {
      const added = blockList.add(url);
      if (added) {
        logger.info(`➕ Added blocked URL: ${url.trim()}`);
      }
      return added;
    },

    removeBlocked(url: string): boolean {
      const removed = blockList.remove(url);
      if (removed) {
        logger.info(`➖ Removed blocked URL: ${url.trim()}`);
      }
      return removed;
    },

    isBlocked(url: string): boolean {
      return blockList.has(url);
    },

    getBlockedUrls(): string[] {
      return blockList.list();
    },
  };
}
