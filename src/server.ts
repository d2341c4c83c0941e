#!/usr/bin/env node

import 'dotenv/config';
import { getConfig, log } from './config.js';
import { createExecutors, loadInstanceRegistry, type InstanceRegistry } from './instances.js';
import { createKernel } from './kernel.js';
import { startStdioServer } from './transports/index.js';

/**
 * Node's fetch has no per-request TLS switch; an instance that disables
 * verification disables it for the whole process.
 */
function applyTlsPolicy(registry: InstanceRegistry): void {
  const insecure = [...registry.instances.values()].filter(i => !i.verifySsl).map(i => i.name);
  if (insecure.length > 0) {
    process.env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
    log(`WARNING: TLS certificate verification disabled (instances: ${insecure.join(', ')})`);
  }
}

async function main() {
  const config = getConfig();

  log('Starting AWX tools MCP server');
  log(`Environment: ${config.env}`);
  log(`Exposure: ${config.exposure}`);

  const registry = loadInstanceRegistry(config);
  applyTlsPolicy(registry);

  const kernel = createKernel({
    instances: createExecutors(registry),
    defaultInstance: registry.defaultInstance,
    exposure: config.exposure,
    allowedGroups: config.allowedGroups,
  });

  const server = await startStdioServer(kernel);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log(`${signal} received, shutting down`);
    try {
      await server.close();
    } catch (err) {
      log(`Error during shutdown: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      process.exit(0);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
