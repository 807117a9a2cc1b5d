#!/usr/bin/env node

import dotenv from 'dotenv';
import { ConfigError } from './errors.js';
import { startServer } from './main.js';
import { CdiscLibraryServer } from './server.js';

dotenv.config();

function registerShutdown(server: CdiscLibraryServer): void {
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      server
        .close()
        .then(() => process.exit(0))
        .catch((error) => {
          console.error('Shutdown failed:', error);
          process.exit(1);
        });
    });
  }
}

startServer()
  .then(registerShutdown)
  .catch((error) => {
    if (error instanceof ConfigError) {
      console.error('[config]', JSON.stringify({ error: error.toToolError() }));
    } else {
      console.error('Fatal error starting CDISC Library MCP server:', error);
    }
    process.exit(1);
  });
