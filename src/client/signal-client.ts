import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { CATEGORIES, SEVERITY_LEVELS, type AnalysisResult } from '../analysis/types.js';
import { InfrastructureError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { CLASSIFY_TOOL, HEALTH_TOOL, type HealthStatus } from '../server/tool-handlers.js';

export const DEFAULT_SERVER_URL = 'http://127.0.0.1:8000/mcp';

/** Where a running signal server can be reached. */
export type ServerTarget =
  | { kind: 'http'; url: URL }
  | { kind: 'stdio'; command: string; args: string[] };

/**
 * `http(s)://...` targets a streamable HTTP server. `stdio` spawns
 * `<selfCommand> serve --transport stdio`.
 */
export function parseServerTarget(
  target: string,
  selfCommand: { command: string; args: string[] } = { command: process.execPath, args: process.argv.slice(1, 2) },
): ServerTarget {
  if (target === 'stdio') {
    return { kind: 'stdio', command: selfCommand.command, args: [...selfCommand.args, 'serve', '--transport', 'stdio'] };
  }
  if (/^https?:\/\//.test(target)) {
    return { kind: 'http', url: new URL(target) };
  }
  throw new Error(`Unsupported server target "${target}": expected an http(s) URL or "stdio"`);
}

export function createClientTransport(target: ServerTarget): Transport {
  if (target.kind === 'http') {
    return new StreamableHTTPClientTransport(target.url);
  }
  return new StdioClientTransport({ command: target.command, args: target.args, stderr: 'inherit' });
}

const processedSchema = z.object({
  event_id: z.string(),
  original_severity: z.string(),
  calculated_severity: z.enum(SEVERITY_LEVELS),
  classification: z.enum(CATEGORIES),
  recommendation: z.string(),
  human_readable: z.string(),
  status: z.literal('processed'),
});

const rejectedSchema = z.object({
  event_id: z.string().nullable(),
  original_severity: z.string().nullable(),
  status: z.literal('rejected'),
  field: z.string(),
  reason: z.string(),
});

const analysisResultSchema = z.discriminatedUnion('status', [processedSchema, rejectedSchema]);

const toolFailureSchema = z.object({
  error: z.string(),
  stage: z.string(),
});

const healthSchema = z.object({
  status: z.literal('ok'),
  service: z.string(),
  transport: z.string(),
  message: z.string(),
});

export interface ToolSummary {
  name: string;
  description: string;
}

/**
 * MCP client for a running signal server. Results are validated against the
 * wire shapes before they are handed back.
 */
export class SignalClient {
  private client: Client | null = null;

  constructor(private readonly logger: Logger) {}

  async connect(transport: Transport): Promise<void> {
    if (this.client) return;
    const client = new Client({ name: 'signal-client', version: '0.1.0' });
    await client.connect(transport);
    this.client = client;

    const health = await this.healthCheck();
    this.logger.info(`Connected to ${health.service} (${health.transport})`);
  }

  async disconnect(): Promise<void> {
    if (!this.client) return;
    try {
      await this.client.close();
    } catch (err) {
      this.logger.debug(`MCP client close error: ${String(err)}`);
    }
    this.client = null;
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error('MCP client not connected, call connect() first');
    }
    return this.client;
  }

  async listTools(): Promise<ToolSummary[]> {
    const { tools } = await this.requireClient().listTools();
    return tools.map((tool) => ({ name: tool.name, description: tool.description ?? '' }));
  }

  private async callTool(name: string, args: Record<string, unknown>): Promise<{ body: unknown; isError: boolean }> {
    this.logger.debug(`MCP tool call: ${name}`);
    const result = CallToolResultSchema.parse(await this.requireClient().callTool({ name, arguments: args }));
    const text = result.content.find((block) => block.type === 'text');
    if (!text || text.type !== 'text') {
      throw new InfrastructureError(`MCP tool ${name} returned no text content`, 'client');
    }
    let body: unknown;
    try {
      body = JSON.parse(text.text);
    } catch (err) {
      throw new InfrastructureError(`MCP tool ${name} returned invalid JSON`, 'client', { cause: err });
    }
    return { body, isError: result.isError === true };
  }

  async healthCheck(): Promise<HealthStatus> {
    const { body } = await this.callTool(HEALTH_TOOL, {});
    return healthSchema.parse(body);
  }

  /**
   * Submit one payload. Rejections come back as results; a server-side
   * fault is raised as an InfrastructureError carrying the remote stage.
   */
  async classify(payload: Record<string, unknown>): Promise<AnalysisResult> {
    const { body, isError } = await this.callTool(CLASSIFY_TOOL, payload);
    if (isError) {
      const failure = toolFailureSchema.safeParse(body);
      const message = failure.success ? failure.data.error : JSON.stringify(body);
      throw new InfrastructureError(`${CLASSIFY_TOOL} failed: ${message}`, failure.success ? failure.data.stage : 'client');
    }
    return analysisResultSchema.parse(body);
  }
}
