/**
 * Dual transport support for MCP servers.
 * Supports both stdio (local agents) and Streamable HTTP (remote/containers).
 *
 * Usage:
 *   import { startServer } from '@labor-mcp/core';
 *   const createServer = () => {
 *     const server = new McpServer({ name: 'bls-mcp', version: '0.1.0' });
 *     // ... register tools ...
 *     return server;
 *   };
 *   await startServer(createServer);
 *
 * Environment variables:
 *   TRANSPORT: 'stdio' (default) or 'http'
 *   PORT: HTTP port (default: 8010)
 *   HOST: HTTP host (default: '0.0.0.0')
 */

import type { Server } from 'http';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Express, Request, Response } from 'express';

export type TransportKind = 'stdio' | 'http';

/** Builds a fully registered server. HTTP mode calls it once per request. */
export type ServerFactory = () => McpServer;

export interface TransportConfig {
  /** Default: process.env.TRANSPORT || 'stdio' */
  transport?: TransportKind;
  /** Default: process.env.PORT || 8010 */
  port?: number;
  /** Default: process.env.HOST || '0.0.0.0' */
  host?: string;
  /** Server name for logging */
  serverName?: string;
}

const DEFAULT_PORT = 8010;

export function transportFromEnv(value: string | undefined): TransportKind {
  if (value === undefined || value === '' || value === 'stdio') return 'stdio';
  if (value === 'http') return 'http';
  throw new Error(`Unsupported TRANSPORT "${value}", expected "stdio" or "http"`);
}

export function portFromEnv(value: string | undefined): number {
  if (!value) return DEFAULT_PORT;
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT "${value}"`);
  }
  return port;
}

/**
 * Start an MCP server with the configured transport.
 *
 * For stdio: one server on StdioServerTransport, logs go to stderr only.
 * For HTTP: Express app with a stateless Streamable HTTP transport at /mcp.
 * Resolves to the listening HTTP server, or undefined for stdio.
 */
export async function startServer(
  createServer: ServerFactory,
  config: TransportConfig = {}
): Promise<Server | undefined> {
  const transport = config.transport ?? transportFromEnv(process.env.TRANSPORT);
  const serverName = config.serverName ?? 'mcp-server';

  if (transport === 'http') {
    return startHttpServer(createServer, config, serverName);
  }
  await startStdioServer(createServer(), serverName);
  return undefined;
}

async function startStdioServer(server: McpServer, serverName: string): Promise<void> {
  const { StdioServerTransport } = await import('@modelcontextprotocol/sdk/server/stdio.js');
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${serverName} running on stdio`);
}

/**
 * Express app serving /health and a stateless /mcp endpoint.
 *
 * A server instance accepts only one transport at a time, so every request
 * gets its own server and transport, closed when the response ends.
 */
export async function createHttpApp(createServer: ServerFactory, serverName: string): Promise<Express> {
  const { StreamableHTTPServerTransport } = await import('@modelcontextprotocol/sdk/server/streamableHttp.js');
  const express = (await import('express')).default;

  const app = express();
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      server: serverName,
      transport: 'http',
      timestamp: new Date().toISOString()
    });
  });

  app.post('/mcp', async (req: Request, res: Response) => {
    const server = createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true
    });

    res.on('close', () => {
      server.close().catch((error: unknown) => {
        console.error(`[${serverName}] failed to close server`, error);
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error(`[${serverName}] request failed`, error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null
        });
      }
    }
  });

  return app;
}

async function startHttpServer(
  createServer: ServerFactory,
  config: TransportConfig,
  serverName: string
): Promise<Server> {
  const port = config.port ?? portFromEnv(process.env.PORT);
  const host = config.host ?? process.env.HOST ?? '0.0.0.0';
  const app = await createHttpApp(createServer, serverName);

  return new Promise<Server>((resolve) => {
    const listener = app.listen(port, host, () => {
      console.error(`${serverName} running on http://${host}:${port}`);
      console.error(`  MCP endpoint: http://${host}:${port}/mcp`);
      console.error(`  Health check: http://${host}:${port}/health`);
      resolve(listener);
    });
  });
}
