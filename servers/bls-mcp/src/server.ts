#!/usr/bin/env node

import { startServer } from '@labor-mcp/core';

import { BlsClient } from './providers/bls.js';
import { createBlsServer } from './mcp.js';

async function main(): Promise<void> {
  const client = new BlsClient();

  // TRANSPORT=http and PORT=8010 for container deployment
  const listener = await startServer(() => createBlsServer(client), { serverName: 'bls-mcp' });

  process.on('SIGINT', () => {
    if (!listener) process.exit(0);
    listener.close((error) => {
      if (error) console.error('[bls-mcp] close failed', error);
      process.exit(0);
    });
  });
}

main().catch((error: unknown) => {
  console.error('[bls-mcp] fatal', error);
  process.exit(1);
});
