/**
 * Tollgate Configuration
 * Central configuration for the proxy server
 */

import { z } from 'zod';

const portSchema = z.number().int().min(0).max(65535);

export const proxyConfigSchema = z.object({
  // Server settings
  bindAddress: z.string().min(1),
  port: portSchema,
  backlog: z.number().int().positive(),

  // Size of a single bounded socket read
  bufferSize: z.number().int().positive(),

  // Origin ports. Request-line and Host ports are never used.
  httpPort: portSchema,
  httpsPort: portSchema,

  // 0 = one handler per connection, no cap
  maxConnections: z.number().int().min(0),

  // Targets refused with 403 from startup
  blockedUrls: z.array(z.string()),

  // Serve /__tollgate__/* control endpoints
  controlApiEnabled: z.boolean(),

  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

export type ProxyConfig = z.infer<typeof proxyConfigSchema>;

export const defaultConfig: ProxyConfig = {
  bindAddress: '127.0.0.1',
  port: 4000,
  backlog: 10,

  bufferSize: 8192,

  httpPort: 80,
  httpsPort: 443,

  maxConnections: 0,

  blockedUrls: [],

  controlApiEnabled: true,

  logLevel: 'info',
};

// Current active configuration (mutable for runtime changes)
let currentConfig: ProxyConfig = { ...defaultConfig };

export function getConfig(): ProxyConfig {
  return currentConfig;
}

export function updateConfig(partial: Partial<ProxyConfig>): void {
  currentConfig = parseConfig({ ...currentConfig, ...partial });
}

export function resetConfig(): void {
  currentConfig = { ...defaultConfig };
}

/**
 * Validate a full configuration object
 *
 * @throws Error listing every invalid field
 */
export function parseConfig(input: unknown): ProxyConfig {
  const result = proxyConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid proxy configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Merge overrides onto the active configuration without changing it
 */
export function resolveConfig(overrides: Partial<ProxyConfig> = {}): ProxyConfig {
  return parseConfig({ ...currentConfig, ...overrides });
}
