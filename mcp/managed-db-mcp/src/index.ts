#!/usr/bin/env node
/**
 * Managed DB MCP Server
 *
 * Exposes the Managed DB API (projects, tables, migrations, keys, backups)
 * as MCP tools. Each tool call becomes exactly one HTTP request to
 * MANAGED_DB_API_URL.
 *
 * Transports:
 * - stdio (default): for agent runtimes that spawn the server
 * - http: JSON tool routes plus a stateless /mcp endpoint
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Command } from 'commander';
import { z } from 'zod';
import { ManagedDbClient } from './client/api-client.js';
import { loadConfig, parsePort } from './config.js';
import { createHttpApp, createMcpServer, startHttpServer } from './server.js';
import { tools } from './tools/index.js';

const TransportSchema = z.enum(['stdio', 'http']);

const config = loadConfig();

// Parse CLI arguments
const program = new Command()
  .name('managed-db-mcp')
  .option('--transport <stdio|http>', 'transport type', 'stdio')
  .option('--port <number>', 'port for HTTP transport', String(config.port))
  .parse(process.argv);

const cliOptions = program.opts<{ transport: string; port: string }>();

const transportType = TransportSchema.safeParse(cliOptions.transport);
if (!transportType.success) {
  console.error(`Invalid --transport value: '${cliOptions.transport}'. Must be one of: stdio, http.`);
  process.exit(1);
}

const port = parsePort(cliOptions.port);
if (port === undefined) {
  console.error(`Invalid --port value: '${cliOptions.port}'. Must be a whole number from 1 to 65535.`);
  process.exit(1);
}

const TRANSPORT_TYPE = transportType.data;
const PORT = port;

const client = new ManagedDbClient({ baseUrl: config.apiUrl, timeoutMs: config.timeoutMs });

function onShutdown(close: () => Promise<void>): void {
  const shutdown = (signal: string) => {
    console.error(`Received ${signal}, shutting down`);
    close()
      .then(() => process.exit(0))
      .catch(err => {
        console.error('Error during shutdown:', err);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function startStdioServer(): Promise<void> {
  const server = createMcpServer(client);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  onShutdown(() => server.close());

  console.error(`Managed DB MCP Server started (stdio), API: ${config.apiUrl}`);
}

async function startHttp(): Promise<void> {
  const app = createHttpApp(client);

  const httpServer = await startHttpServer(app, PORT);
  console.error(`Managed DB MCP Server running on http://localhost:${PORT}/mcp, API: ${config.apiUrl}`);
  onShutdown(
    () => new Promise<void>((resolve, reject) => {
      httpServer.close(err => (err ? reject(err) : resolve()));
    })
  );
}

async function main(): Promise<void> {
  if (TRANSPORT_TYPE === 'http') {
    await startHttp();
  } else {
    await startStdioServer();
  }
  console.error(`Available tools: ${tools.map(t => t.name).join(', ')}`);
}

main().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
