import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { EventAnalysisPipeline } from '../analysis/pipeline.js';
import { failureEventSchema } from '../analysis/event-model.js';
import type { AnalysisResult } from '../analysis/types.js';
import {
  DEFAULT_SERVER_URL,
  SignalClient,
  createClientTransport,
  parseServerTarget,
  type ServerTarget,
} from '../client/signal-client.js';
import { applyOverrides, loadConfig, type RuntimeConfig } from '../config/loader.js';
import { LogLevelSchema, TransportSchema } from '../config/schema.js';
import { createLogger } from '../logging/logger.js';
import { serveHttp, serveStdio } from '../server/signal-server.js';
import { EventGenerator, loadScenarioCatalog } from '../simulation/event-generator.js';
import { readJSON } from '../util/fs.js';
import { withCommandHandler } from './command-error-handler.js';
import { renderResult, renderTally } from './result-renderer.js';

export const EXAMPLE_EVENT = {
  event_id: 'sig_001_example',
  timestamp: '2025-06-08T10:30:00Z',
  service: 'api-gateway',
  severity: 'critical',
  message: 'Service timeout - unable to process requests',
  details: { error_code: 'TIMEOUT', affected_users: 25 },
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

function parseDelay(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('must be a non-negative integer');
  }
  return parsed;
}

function parseTarget(value: string): ServerTarget {
  try {
    return parseServerTarget(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Tool arguments for a payload; non-objects travel as legacy `event_data` so the server rejects them. */
function toToolArgs(payload: unknown): Record<string, unknown> {
  return isRecord(payload) ? payload : { event_data: JSON.stringify(payload) };
}

async function readPayloads(file: string): Promise<unknown[]> {
  const input = await readJSON(file);
  return Array.isArray(input) ? input : [input];
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function printResults(results: readonly AnalysisResult[], json: boolean): void {
  if (json) {
    console.log(JSON.stringify(results.length === 1 ? results[0] : results, null, 2));
    return;
  }
  for (const result of results) {
    console.log(renderResult(result));
    console.log('');
  }
  console.log(chalk.dim(renderTally(results)));
}

export interface ProgramOptions {
  /** Opens the client transport for `--server` targets. */
  connectTransport?: (target: ServerTarget) => Transport;
}

interface ServeOptions {
  config?: string;
  transport?: string;
  host?: string;
  port?: number;
  logLevel?: string;
}

/**
 * Build the `signal` command line program.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const connectTransport = options.connectTransport ?? createClientTransport;
  const program = new Command();

  const withClient = async <T>(
    config: RuntimeConfig,
    target: ServerTarget,
    fn: (client: SignalClient) => Promise<T>,
  ): Promise<T> => {
    const client = new SignalClient(createLogger(config.logging, 'client'));
    await client.connect(connectTransport(target));
    try {
      return await fn(client);
    } finally {
      await client.disconnect();
    }
  };

  program
    .name('signal')
    .description('Failure event analysis: severity recalculation, classification and recommendations')
    .version('0.1.0');

  // ─── serve ────────────────────────────────────────────
  program
    .command('serve')
    .description('Run the MCP server exposing classify_failure_event and health_check')
    .option('-c, --config <path>', 'Path to signal.config.json')
    .addOption(new Option('-t, --transport <transport>', 'Transport to serve on').choices(TransportSchema.options))
    .option('--host <host>', 'Override: HTTP bind address')
    .option('-p, --port <port>', 'Override: HTTP port', parsePositiveInt)
    .addOption(new Option('--log-level <level>', 'Override: minimum log level').choices(LogLevelSchema.options))
    .action(
      withCommandHandler(async (opts: ServeOptions) => {
        const transport = TransportSchema.optional().parse(opts.transport);
        const logLevel = LogLevelSchema.optional().parse(opts.logLevel);
        let config = await loadConfig(opts.config);
        config = applyOverrides(config, { transport, host: opts.host, port: opts.port, logLevel });

        const logger = createLogger(config.logging, 'server');
        const pipeline = await EventAnalysisPipeline.create(config.keywordsFile);
        const deps = { pipeline, logger, config };

        if (config.transport === 'http') {
          const httpServer = await serveHttp(deps);
          const shutdown = (signal: string) => {
            logger.event({ type: 'server-stopped', transport: 'http-streamable', signal });
            httpServer.close(() => process.exit(0));
          };
          process.once('SIGINT', () => shutdown('SIGINT'));
          process.once('SIGTERM', () => shutdown('SIGTERM'));
        } else {
          const server = await serveStdio(deps);
          const shutdown = (signal: string) => {
            logger.event({ type: 'server-stopped', transport: 'stdio', signal });
            server.close().then(
              () => process.exit(0),
              () => process.exit(1),
            );
          };
          process.once('SIGINT', () => shutdown('SIGINT'));
          process.once('SIGTERM', () => shutdown('SIGTERM'));
        }
      }),
    );

  // ─── analyze ──────────────────────────────────────────
  program
    .command('analyze <file>')
    .description('Analyze the failure event (or array of events) in a JSON file')
    .option('-c, --config <path>', 'Path to signal.config.json')
    .option('--json', 'Print raw analysis results as JSON')
    .action(
      withCommandHandler(async (file: string, opts: { config?: string; json?: boolean }) => {
        const config = await loadConfig(opts.config);
        const pipeline = await EventAnalysisPipeline.create(config.keywordsFile);
        const payloads = await readPayloads(file);

        const results = payloads.map((payload) => pipeline.process(payload));
        printResults(results, opts.json ?? false);

        if (results.some((r) => r.status === 'rejected')) {
          process.exitCode = 1;
        }
      }),
    );

  // ─── simulate ─────────────────────────────────────────
  program
    .command('simulate')
    .description('Generate realistic failure events and analyze them locally or on a running server')
    .option('-c, --config <path>', 'Path to signal.config.json')
    .option('-n, --count <n>', 'Number of events to generate', parsePositiveInt, 5)
    .option('--scenarios <path>', 'Alternative scenario catalog')
    .option('-s, --server <target>', 'Send events to a running server (http(s) URL or "stdio")', parseTarget)
    .option('--delay <ms>', 'Pause between events sent to a server', parseDelay, 0)
    .option('--json', 'Print generated events with their results as JSON')
    .action(
      withCommandHandler(
        async (opts: {
          config?: string;
          count: number;
          scenarios?: string;
          server?: ServerTarget;
          delay: number;
          json?: boolean;
        }) => {
          const config = await loadConfig(opts.config);
          const generator = new EventGenerator(await loadScenarioCatalog(opts.scenarios));
          const events = generator.generateBatch(opts.count);

          let results: AnalysisResult[];
          if (opts.server) {
            results = await withClient(config, opts.server, async (client) => {
              const sent: AnalysisResult[] = [];
              for (const [i, event] of events.entries()) {
                if (i > 0 && opts.delay > 0) await sleep(opts.delay);
                sent.push(await client.classify(event));
              }
              return sent;
            });
          } else {
            const pipeline = await EventAnalysisPipeline.create(config.keywordsFile);
            results = events.map((event) => pipeline.process(event));
          }

          if (opts.json) {
            const pairs = events.map((event, i) => ({ event, result: results[i] }));
            console.log(JSON.stringify(pairs, null, 2));
            return;
          }
          printResults(results, false);
        },
      ),
    );

  // ─── client ───────────────────────────────────────────
  program
    .command('client [file]')
    .description('Talk to a running server: health check, tool listing, or classify the events in a file')
    .option('-c, --config <path>', 'Path to signal.config.json')
    .option('-s, --server <target>', `Server to connect to (http(s) URL or "stdio", default ${DEFAULT_SERVER_URL})`, parseTarget)
    .option('--list-tools', 'List the tools the server exposes')
    .option('--json', 'Print raw responses as JSON')
    .action(
      withCommandHandler(
        async (
          file: string | undefined,
          opts: { config?: string; server?: ServerTarget; listTools?: boolean; json?: boolean },
        ) => {
          const config = await loadConfig(opts.config);
          const target = opts.server ?? parseServerTarget(DEFAULT_SERVER_URL);
          const json = opts.json ?? false;

          await withClient(config, target, async (client) => {
            if (opts.listTools) {
              const tools = await client.listTools();
              if (json) {
                console.log(JSON.stringify(tools, null, 2));
              } else {
                for (const tool of tools) console.log(`${chalk.bold(tool.name)}  ${tool.description}`);
              }
            }

            if (file !== undefined) {
              const results: AnalysisResult[] = [];
              for (const payload of await readPayloads(file)) {
                results.push(await client.classify(toToolArgs(payload)));
              }
              printResults(results, json);
              if (results.some((r) => r.status === 'rejected')) {
                process.exitCode = 1;
              }
            } else if (!opts.listTools) {
              const health = await client.healthCheck();
              console.log(
                json
                  ? JSON.stringify(health, null, 2)
                  : `${chalk.green('✓')} ${health.service}: ${health.message} (${health.transport})`,
              );
            }
          });
        },
      ),
    );

  // ─── schema ───────────────────────────────────────────
  program
    .command('schema')
    .description('Print the failure event JSON Schema and an example payload')
    .action(() => {
      console.log(JSON.stringify(zodToJsonSchema(failureEventSchema, 'FailureEvent'), null, 2));
      console.log('');
      console.log(chalk.bold('Example:'));
      console.log(JSON.stringify(EXAMPLE_EVENT, null, 2));
    });

  return program;
}
