#!/usr/bin/env node
/**
 * Tollgate command line entry point
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { defaultConfig } from './config/index.js';
import { createTollgate, type TollgateServer } from './index.js';

function parseArgs() {
  return yargs(hideBin(process.argv))
    .scriptName('tollgate')
    .usage('$0 [options]')
    .options({
      host: {
        alias: 'H',
        type: 'string',
        description: 'Address the proxy binds to',
        default: defaultConfig.bindAddress,
      },
      port: {
        alias: 'p',
        type: 'number',
        description: 'Port the proxy listens on',
        default: defaultConfig.port,
      },
      block: {
        alias: 'b',
        type: 'string',
        array: true,
        description: 'Request target to refuse with 403 (repeatable)',
      },
      'max-connections': {
        type: 'number',
        description: 'Cap on concurrently served connections (0 = no cap)',
        default: defaultConfig.maxConnections,
      },
      'http-port': {
        type: 'number',
        description: 'Origin port for plain HTTP requests',
        default: defaultConfig.httpPort,
      },
      'https-port': {
        type: 'number',
        description: 'Origin port for CONNECT tunnels',
        default: defaultConfig.httpsPort,
      },
      'control-api': {
        type: 'boolean',
        description: 'Serve the /__tollgate__ control endpoints (--no-control-api to disable)',
        default: defaultConfig.controlApiEnabled,
      },
      verbose: {
        alias: 'v',
        type: 'boolean',
        description: 'Log raw requests and debug details',
        default: false,
      },
      quiet: {
        alias: 'q',
        type: 'boolean',
        description: 'Only log warnings and errors',
        default: false,
      },
    })
    .strict()
    .help()
    .parseSync();
}

function printBanner(server: TollgateServer): void {
  const config = server.getConfig();
  console.log(`
🚧 Tollgate - caching forward proxy
────────────────────────────────────────────────────────────────
   Proxy:        http://${config.bindAddress}:${config.port}
   Blocked:      ${config.blockedUrls.length} target(s)
   Control API:  ${config.controlApiEnabled ? `http://${config.bindAddress}:${config.port}/__tollgate__/` : 'disabled'}
────────────────────────────────────────────────────────────────
`);
}

async function main(): Promise<void> {
  const argv = parseArgs();

  const server = createTollgate({
    bindAddress: argv.host,
    port: argv.port,
    blockedUrls: argv.block ?? [],
    maxConnections: argv.maxConnections,
    httpPort: argv.httpPort,
    httpsPort: argv.httpsPort,
    controlApiEnabled: argv.controlApi,
    logLevel: argv.quiet ? 'warn' : argv.verbose ? 'debug' : 'info',
  });

  printBanner(server);
  await server.start();

  // Handle graceful shutdown
  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('❌ Error while stopping proxy:', err);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`❌ Failed to start proxy: ${message}`);
  process.exit(1);
});
