export * from './analysis/index.js';
export { ValidationError, InfrastructureError, KeywordTableError } from './errors.js';
export { loadConfig, applyOverrides, ConfigLoadError, DEFAULT_CONFIG_FILE } from './config/loader.js';
export type { RuntimeConfig } from './config/loader.js';
export { SignalConfigSchema } from './config/schema.js';
export type { SignalConfig, Transport } from './config/schema.js';
export { Logger, createLogger } from './logging/logger.js';
export type { LogLevel, LogEntry, SignalEvent } from './logging/events.js';
export { createSignalServer, serveStdio, serveHttp } from './server/signal-server.js';
export type { SignalServerDeps, TransportLabel } from './server/signal-server.js';
export { SignalToolHandlers, CLASSIFY_TOOL, HEALTH_TOOL, resolveEventPayload } from './server/tool-handlers.js';
export type { HealthStatus } from './server/tool-handlers.js';
export {
  SignalClient,
  parseServerTarget,
  createClientTransport,
  DEFAULT_SERVER_URL,
} from './client/signal-client.js';
export type { ServerTarget, ToolSummary } from './client/signal-client.js';
export { EventGenerator, loadScenarioCatalog, DEFAULT_SCENARIOS_FILE } from './simulation/event-generator.js';
export type { GeneratedEvent, ScenarioCatalog, FailureScenario } from './simulation/event-generator.js';
