/**
 * CDISC Library MCP Server
 *
 * Exposes the CDISC Library REST API (SDTM, SEND, CDASH, ADaM, QRS and Controlled
 * Terminology metadata) as MCP tools. Each tool maps to one documented endpoint.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError } from '@modelcontextprotocol/sdk/types.js';
import { IncomingMessage, Server as HttpServer, ServerResponse, createServer } from 'node:http';
import { CdiscClient } from './client.js';
import { AppConfig } from './config.js';
import { executeTool, listTools } from './tools/handlers.js';

export const SERVER_NAME = 'cdisc-library-server';
export const SERVER_VERSION = '0.1.0';
export const MCP_PATH = '/mcp';

export type ServerSettings = Pick<AppConfig, 'maxResponseChars' | 'transport' | 'port' | 'host'>;

export class CdiscLibraryServer {
  private active?: Server;
  private httpServer?: HttpServer;

  constructor(
    private readonly settings: ServerSettings,
    private readonly client: CdiscClient
  ) {}

  /** Builds an MCP server with the full tool catalog registered */
  createMcpServer(): Server {
    const server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: listTools(),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      try {
        return await executeTool(this.client, request.params.name, request.params.arguments, {
          maxResponseChars: this.settings.maxResponseChars,
          signal: extra.signal,
        });
      } catch (error) {
        if (error instanceof McpError) {
          throw error;
        }
        const errorMessage = error instanceof Error ? error.message : String(error);
        throw new McpError(ErrorCode.InternalError, errorMessage);
      }
    });

    server.onerror = (error) => console.error('[MCP Error]', error);
    return server;
  }

  async run(): Promise<void> {
    if (this.settings.transport === 'http') {
      await this.runHttp();
    } else {
      await this.runStdio();
    }
  }

  async runStdio(): Promise<void> {
    const server = this.createMcpServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
    this.active = server;
    console.error('CDISC Library MCP server running on stdio');
  }

  /**
   * Streamable HTTP in stateless mode: every POST gets its own server and
   * transport, torn down when the response closes.
   */
  async runHttp(): Promise<HttpServer> {
    const httpServer = createServer((req, res) => {
      this.handleHttpRequest(req, res).catch((error) => {
        console.error('[http] request failed:', error);
        if (!res.headersSent) {
          sendJson(res, 500, jsonRpcError(-32603, 'Internal server error'));
        }
      });
    });

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(this.settings.port, this.settings.host, () => {
        httpServer.off('error', reject);
        resolve();
      });
    });

    this.httpServer = httpServer;
    console.error(`CDISC Library MCP server listening at http://${this.settings.host}:${this.settings.port}${MCP_PATH}`);
    return httpServer;
  }

  async handleHttpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    if (url.pathname === '/health' && req.method === 'GET') {
      sendJson(res, 200, { status: 'ok' });
      return;
    }
    if (url.pathname !== MCP_PATH) {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }
    if (req.method !== 'POST') {
      res.setHeader('Allow', 'POST');
      sendJson(res, 405, jsonRpcError(-32000, 'Method not allowed'));
      return;
    }

    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    let body: unknown;
    try {
      body = JSON.parse(Buffer.concat(chunks).toString('utf8'));
    } catch {
      sendJson(res, 400, jsonRpcError(-32700, 'Parse error: Invalid JSON'));
      return;
    }

    const server = this.createMcpServer();
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
      transport.close().catch((error) => console.error('[http] transport close failed:', error));
      server.close().catch((error) => console.error('[http] server close failed:', error));
    });
    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  async close(): Promise<void> {
    if (this.active) {
      await this.active.close();
      this.active = undefined;
    }
    const httpServer = this.httpServer;
    if (httpServer) {
      this.httpServer = undefined;
      await new Promise<void>((resolve, reject) =>
        httpServer.close((error) => (error ? reject(error) : resolve()))
      );
    }
  }
}

function jsonRpcError(code: number, message: string) {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(payload));
}
