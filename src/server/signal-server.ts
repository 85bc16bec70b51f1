import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { EventAnalysisPipeline } from '../analysis/pipeline.js';
import type { RuntimeConfig } from '../config/loader.js';
import type { Logger } from '../logging/logger.js';
import { CLASSIFY_TOOL, HEALTH_TOOL, SignalToolHandlers, classifyInputShape } from './tool-handlers.js';

export interface SignalServerDeps {
  pipeline: EventAnalysisPipeline;
  logger: Logger;
  config: RuntimeConfig;
}

/** Transport label reported by `health_check`. */
export type TransportLabel = 'stdio' | 'http-streamable' | 'in-memory';

/**
 * Build an MCP server exposing the analysis pipeline as tools.
 * The server is not connected to any transport yet.
 */
export function createSignalServer(deps: SignalServerDeps, transport: TransportLabel): McpServer {
  const { config } = deps;
  const handlers = new SignalToolHandlers(deps.pipeline, deps.logger, config.serverName, transport);
  const server = new McpServer({ name: config.serverName, version: config.serverVersion });

  server.registerTool(
    CLASSIFY_TOOL,
    {
      title: 'Classify failure event',
      description:
        'Analyze a failure event: recalculate its severity from the message, classify it ' +
        'into an operational category and recommend a response.',
      inputSchema: classifyInputShape,
    },
    (args) => handlers.classifyFailureEvent(args),
  );

  server.registerTool(
    HEALTH_TOOL,
    {
      title: 'Health check',
      description: 'Server health and status verification.',
      inputSchema: {},
    },
    () => handlers.healthCheck(),
  );

  return server;
}

/**
 * Serve over stdin/stdout. Resolves once the transport is connected.
 */
export async function serveStdio(deps: SignalServerDeps): Promise<McpServer> {
  const server = createSignalServer(deps, 'stdio');
  await server.connect(new StdioServerTransport());
  deps.logger.event({ type: 'server-started', serverName: deps.config.serverName, transport: 'stdio' });
  return server;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  if (res.headersSent) {
    res.end();
    return;
  }
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Stateless streamable HTTP: every request gets a fresh server and transport,
 * both closed when the response closes.
 */
async function handleHttpRequest(
  deps: SignalServerDeps,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  const { pathname } = new URL(req.url ?? '/', 'http://localhost');
  if (pathname !== deps.config.http.path) {
    sendJson(res, 404, { error: `Not found: ${pathname}` });
    return;
  }

  const server = createSignalServer(deps, 'http-streamable');
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
    enableJsonResponse: true,
  });

  res.on('close', () => {
    Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
      deps.logger.debug(`HTTP session close error: ${String(err)}`);
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}

/**
 * Listen for MCP requests over streamable HTTP at `config.http`.
 * Resolves with the listening node:http server.
 */
export async function serveHttp(deps: SignalServerDeps): Promise<Server> {
  const { host, port, path } = deps.config.http;

  const httpServer = createServer((req, res) => {
    handleHttpRequest(deps, req, res).catch((err: unknown) => {
      const msg = err instanceof Error ? err.message : String(err);
      deps.logger.error(`HTTP request failed: ${msg}`);
      sendJson(res, 500, { jsonrpc: '2.0', error: { code: -32603, message: 'Internal server error' }, id: null });
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  deps.logger.event({
    type: 'server-started',
    serverName: deps.config.serverName,
    transport: 'http-streamable',
    address: `http://${host}:${port}${path}`,
  });
  return httpServer;
}
