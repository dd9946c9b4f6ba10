/**
 * Metrics Collection Module
 * Tracks proxy statistics for monitoring and debugging
 */

export interface RequestMetrics {
  total: number;
  blocked: number;
  cacheHits: number;
  cacheMisses: number;
  revalidations: number;
  tunnels: number;
}

export interface MetricsSnapshot {
  startTime: number;
  uptime: number;
  requests: RequestMetrics;
  cacheHitRate: number;
  /** Sum of time saved by cache hits (ms, may be negative) */
  timeSaved: number;
  errors: number;
  activeConnections: number;
  peakConnections: number;
}

export class ProxyMetrics {
  private startTime = Date.now();
  private requests: RequestMetrics = {
    total: 0,
    blocked: 0,
    cacheHits: 0,
    cacheMisses: 0,
    revalidations: 0,
    tunnels: 0,
  };
  private timeSaved = 0;
  private errors = 0;
  private activeConnections = 0;
  private peakConnections = 0;

  /**
   * Record a new request
   */
  recordRequest(): void {
    this.requests.total++;
  }

  /**
   * Record a request refused by the block list
   */
  recordBlocked(): void {
    this.requests.blocked++;
  }

  /**
   * Record a conditional GET sent for a cached target
   */
  recordRevalidation(): void {
    this.requests.revalidations++;
  }

  /**
   * Record a cache hit and the time it saved
   */
  recordCacheHit(timeSaved: number): void {
    this.requests.cacheHits++;
    this.timeSaved += timeSaved;
  }

  /**
   * Record a full fetch from the origin
   */
  recordCacheMiss(): void {
    this.requests.cacheMisses++;
  }

  recordTunnel(): void {
    this.requests.tunnels++;
  }

  recordError(): void {
    this.errors++;
  }

  /**
   * Update active connection count
   */
  updateConnections(delta: number): void {
    this.activeConnections += delta;
    if (this.activeConnections > this.peakConnections) {
      this.peakConnections = this.activeConnections;
    }
    if (this.activeConnections < 0) {
      this.activeConnections = 0;
    }
  }

  snapshot(): MetricsSnapshot {
    const cacheable = this.requests.cacheHits + this.requests.cacheMisses;
    const cacheHitRate = cacheable > 0
      ? (this.requests.cacheHits / cacheable) * 100
      : 0;

    return {
      startTime: this.startTime,
      uptime: Date.now() - this.startTime,
      requests: { ...this.requests },
      cacheHitRate,
      timeSaved: this.timeSaved,
      errors: this.errors,
      activeConnections: this.activeConnections,
      peakConnections: this.peakConnections,
    };
  }

  /**
   * Reset metrics (useful for testing)
   */
  reset(): void {
    this.startTime = Date.now();
    this.requests = {
      total: 0,
      blocked: 0,
      cacheHits: 0,
      cacheMisses: 0,
      revalidations: 0,
      tunnels: 0,
    };
    this.timeSaved = 0;
    this.errors = 0;
    this.activeConnections = 0;
    this.peakConnections = 0;
  }
}

/**
 * Format duration to human-readable string
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h ${minutes % 60}m`;
  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
