/**
 * HTTP front end for the MCP server
 * Stateless streamable HTTP: every POST gets its own server and transport.
 */

import express, { Express, Request, Response } from 'express';
import { Server } from 'http';
import { AddressInfo } from 'net';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Logger } from '../types/logger';

export interface HttpAppOptions {
  endpoint: string;
  /** Builds a fresh MCP server for one request */
  createMcpServer: () => McpServer;
  logger: Logger;
}

function jsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id: null,
  });
}

/**
 * Build the express app serving the MCP endpoint
 */
export function createHttpApp(options: HttpAppOptions): Express {
  const { endpoint, createMcpServer, logger } = options;
  const app = express();

  app.post(endpoint, express.json({ limit: '10mb' }), async (req: Request, res: Response) => {
    const server = createMcpServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on('close', () => {
      transport.close().catch((error: unknown) => {
        logger.warn(`Failed to close MCP transport: ${String(error)}`);
      });
      server.close().catch((error: unknown) => {
        logger.warn(`Failed to close MCP server: ${String(error)}`);
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error(`MCP POST ${endpoint} failed: ${error instanceof Error ? error.message : String(error)}`);
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, 'Internal server error');
      }
    }
  });

  // No sessions, so there is no SSE stream to open and nothing to delete
  const methodNotAllowed = (_req: Request, res: Response): void => {
    jsonRpcError(res, 405, -32000, 'Method not allowed.');
  };
  app.get(endpoint, methodNotAllowed);
  app.delete(endpoint, methodNotAllowed);

  return app;
}

/**
 * Listen on the given port, resolving once the socket is bound
 */
export function startHttpServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    const onError = (error: Error): void => {
      reject(error);
    };
    server.once('error', onError);
    server.once('listening', () => {
      server.off('error', onError);
      resolve(server);
    });
  });
}

/**
 * Port the server is actually bound to
 */
export function getListeningPort(server: Server): number | undefined {
  const address: string | AddressInfo | null = server.address();
  return address !== null && typeof address === 'object' ? address.port : undefined;
}

/**
 * Stop accepting connections and wait for open ones to finish.
 * Keep-alive connections are dropped as soon as they go idle.
 */
export function closeHttpServer(server: Server, idleSweepMs: number = 100): Promise<void> {
  return new Promise((resolve, reject) => {
    const sweep = setInterval(() => server.closeIdleConnections(), idleSweepMs);
    server.close((error) => {
      clearInterval(sweep);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
    server.closeIdleConnections();
  });
}
