import { AxiosAdapter } from 'axios';
import { CdiscClient } from './client.js';
import { loadConfig } from './config.js';
import { CdiscLibraryServer } from './server.js';

export interface StartOptions {
  env?: Record<string, string | undefined>;
  adapter?: AxiosAdapter;
}

/**
 * Resolves configuration, wires the client and starts the configured transport.
 * A ConfigError is thrown before anything is constructed or bound.
 */
export async function startServer(options: StartOptions = {}): Promise<CdiscLibraryServer> {
  const config = loadConfig(options.env ?? process.env);
  const client = new CdiscClient(config, { adapter: options.adapter });
  const server = new CdiscLibraryServer(config, client);
  await server.run();
  return server;
}
