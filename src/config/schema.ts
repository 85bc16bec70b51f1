import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const TransportSchema = z.enum(['stdio', 'http']);

export type Transport = z.infer<typeof TransportSchema>;

const HttpConfigSchema = z
  .object({
    /** Interface the streamable HTTP transport binds to. */
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(1).max(65535).default(8000),
    /** Request path the MCP endpoint answers on; everything else is 404. */
    path: z.string().startsWith('/').default('/mcp'),
  })
  .default({});

const LoggingConfigSchema = z
  .object({
    level: LogLevelSchema.default('info'),
    /** Mirror log lines to stderr. */
    console: z.boolean().default(true),
    /** Directory for JSON-lines log files. Omit to disable file logging. */
    logDir: z.string().optional(),
  })
  .default({});

export const SignalConfigSchema = z.object({
  /** Name the MCP server announces to clients. */
  serverName: z.string().min(1).default('signal-server'),
  serverVersion: z.string().min(1).default('0.1.0'),
  transport: TransportSchema.default('stdio'),
  http: HttpConfigSchema,
  logging: LoggingConfigSchema,
  /**
   * Alternative keyword table. It may change keywords, not the order in
   * which severities and categories are evaluated.
   */
  keywordsFile: z.string().optional(),
});

export type SignalConfig = z.infer<typeof SignalConfigSchema>;
