/**
 * MCP and HTTP surfaces for the Managed DB tools.
 *
 * - createMcpServer: MCP server (tools/list, tools/call), used over stdio or /mcp
 * - createHttpApp: express app with plain JSON routes plus the /mcp endpoint
 * - startHttpServer: bind an app to a port, surfacing listen errors
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import type { Server as HttpServer } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ManagedDbClient } from './client/api-client.js';
import { executeTool, getTool, listToolDescriptors, type ToolResult } from './tools/index.js';

export const SERVER_NAME = 'managed-db-mcp';
export const SERVER_VERSION = '1.0.0';

// Request schemas
const CallRequestSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});

export function toCallToolResult(result: ToolResult): CallToolResult {
  return {
    content: [{ type: 'text', text: result.text }],
    isError: !result.success,
  };
}

export function createMcpServer(client: ManagedDbClient): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: listToolDescriptors() };
  });

  server.setRequestHandler(CallToolRequestSchema, async request => {
    const { name, arguments: args } = request.params;
    const result = await executeTool(client, name, args ?? {});
    return toCallToolResult(result);
  });

  return server;
}

export function createHttpApp(client: ManagedDbClient): Express {
  const app = express();
  app.use(express.json());

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', server: SERVER_NAME, version: SERVER_VERSION });
  });

  // List tools
  app.get('/tools', (_req: Request, res: Response) => {
    res.json({ tools: listToolDescriptors() });
  });

  // Execute tool
  app.post('/tools/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = req.params;
      if (!getTool(name)) {
        res.status(404).json({ success: false, error: `Tool not found: ${name}` });
        return;
      }

      const result = await executeTool(client, name, req.body ?? {});
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  // Generic tool call endpoint (MCP style)
  app.post('/call', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = CallRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ success: false, error: 'Expected { name, arguments }' });
        return;
      }

      const { name, arguments: args } = parsed.data;
      if (!getTool(name)) {
        res.status(404).json({ success: false, error: `Tool not found: ${name}` });
        return;
      }

      const result = await executeTool(client, name, args);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  // Stateless MCP over Streamable HTTP: one server per request
  app.post('/mcp', async (req: Request, res: Response) => {
    try {
      const server = createMcpServer(client);
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on('close', () => {
        transport.close().catch(err => console.error('Error closing MCP transport:', err));
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  });

  // Stateless mode has no SSE stream or session to end
  app.all('/mcp', (_req: Request, res: Response) => {
    res.status(405).set('Allow', 'POST').json({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  });

  // Catch-all 404
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Error:', err);
    res.status(500).json({
      success: false,
      error: err.message || 'Internal server error',
    });
  });

  return app;
}

/**
 * Listen on `port`. Resolves once bound; rejects with the listen error
 * (EADDRINUSE, EACCES) instead of letting it escape as an uncaught event.
 */
export function startHttpServer(app: Express, port: number, host?: string): Promise<HttpServer> {
  return new Promise<HttpServer>((resolve, reject) => {
    const httpServer = host === undefined ? app.listen(port) : app.listen(port, host);
    httpServer.once('error', reject);
    httpServer.once('listening', () => {
      httpServer.off('error', reject);
      resolve(httpServer);
    });
  });
}
