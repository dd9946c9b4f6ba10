/**
 * Tollgate - Caching Forward Proxy
 *
 * A forward HTTP/HTTPS proxy that blocks configured targets, caches HTTP
 * responses with If-Modified-Since revalidation and tunnels CONNECT traffic
 * without decrypting it.
 */

import type { AddressInfo } from 'node:net';
import type { CacheStats } from './cache/index.js';
import { getConfig, type ProxyConfig } from './config/index.js';
import type { MetricsSnapshot } from './metrics/index.js';
import { createProxyServer, type ProxyServer, type ProxyServerOptions } from './proxy/index.js';

export interface TollgateServer {
  start(): Promise<AddressInfo>;
  stop(): Promise<void>;
  getConfig(): ProxyConfig;
  addBlocked(url: string): boolean;
  removeBlocked(url: string): boolean;
  getBlockedUrls(): string[];
  clearCache(): void;
  getCacheStats(): CacheStats;
  getMetrics(): MetricsSnapshot;
  /** Underlying listener, for callers that need the cache or block list directly */
  readonly proxy: ProxyServer;
}

/**
 * Create the proxy facade a control surface drives.
 *
 * @example
 * ```typescript
 * const server = createTollgate({ port: 4000, onLog: (line) => pane.append(line) });
 * await server.start();
 * server.addBlocked('http://example.com/');
 * ```
 */
export function createTollgate(options: ProxyServerOptions = {}): TollgateServer {
  const proxy = createProxyServer(options);

  return {
    proxy,

    start(): Promise<AddressInfo> {
      return proxy.start();
    },

    stop(): Promise<void> {
      return proxy.stop();
    },

    getConfig(): ProxyConfig {
      return proxy.config;
    },

    addBlocked(url: string): boolean {
      return proxy.addBlocked(url);
    },

    removeBlocked(url: string): boolean {
      return proxy.removeBlocked(url);
    },

    getBlockedUrls(): string[] {
      return proxy.getBlockedUrls();
    },

    clearCache(): void {
      proxy.cache.clear();
    },

    getCacheStats(): CacheStats {
      return proxy.cache.getStats();
    },

    getMetrics(): MetricsSnapshot {
      return proxy.metrics.snapshot();
    },
  };
}

/**
 * Start a proxy on `host:port`, reporting every log line to `onLog`
 */
export async function start(
  host: string = getConfig().bindAddress,
  port: number = getConfig().port,
  onLog?: (message: string) => void
): Promise<TollgateServer> {
  const server = createTollgate({ bindAddress: host, port, onLog });
  await server.start();
  return server;
}

export { getConfig, updateConfig, resetConfig, type ProxyConfig } from './config/index.js';
export { CacheStore, type CacheEntry, type CacheStats, type RevalidationResult } from './cache/index.js';
export { ProxyMetrics, type MetricsSnapshot } from './metrics/index.js';
export { createLogger, messageSink, consoleSink, type LogRecord, type LogSink } from './logger/index.js';
export * from './proxy/index.js';
