import { resolve, isAbsolute } from 'node:path';
import type { ZodError } from 'zod';
import { SignalConfigSchema, type SignalConfig, type Transport } from './schema.js';
import type { LogLevel } from '../logging/events.js';
import { exists, readJSON } from '../util/fs.js';

export const DEFAULT_CONFIG_FILE = 'signal.config.json';

/** Config as consumed at runtime: paths are absolute and the object is frozen. */
export type RuntimeConfig = Readonly<SignalConfig>;

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

function formatIssues(error: ZodError): string {
  return error.issues.map((i) => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
}

function resolvePath(path: string): string {
  return isAbsolute(path) ? path : resolve(process.cwd(), path);
}

/**
 * Load, parse, and validate a signal.config.json file.
 *
 * With no explicit path, `signal.config.json` in the working directory is used
 * when present and built-in defaults otherwise. An explicit path must exist.
 */
export async function loadConfig(configPath?: string): Promise<RuntimeConfig> {
  let absPath: string | null = null;
  if (configPath !== undefined) {
    absPath = resolvePath(configPath);
    if (!(await exists(absPath))) {
      throw new ConfigLoadError(`Config file not found: ${absPath}`);
    }
  } else {
    const fallback = resolvePath(DEFAULT_CONFIG_FILE);
    if (await exists(fallback)) absPath = fallback;
  }

  let raw: unknown = {};
  if (absPath !== null) {
    try {
      raw = await readJSON(absPath);
    } catch (err) {
      throw new ConfigLoadError(`Failed to parse config file: ${absPath}`, err);
    }
  }

  const result = SignalConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigLoadError(`Invalid config:\n${formatIssues(result.error)}`, result.error);
  }

  const config = result.data;
  const frozen: SignalConfig = {
    ...config,
    logging: {
      ...config.logging,
      ...(config.logging.logDir ? { logDir: resolvePath(config.logging.logDir) } : {}),
    },
    ...(config.keywordsFile ? { keywordsFile: resolvePath(config.keywordsFile) } : {}),
  };

  return Object.freeze(frozen);
}

/**
 * Apply CLI overrides to a loaded config.
 */
export function applyOverrides(
  config: RuntimeConfig,
  overrides: {
    transport?: Transport;
    host?: string;
    port?: number;
    logLevel?: LogLevel;
  },
): RuntimeConfig {
  const merged: SignalConfig = { ...config };

  if (overrides.transport != null) {
    merged.transport = overrides.transport;
  }

  if (overrides.host != null) {
    merged.http = { ...merged.http, host: overrides.host };
  }

  if (overrides.port != null) {
    merged.http = { ...merged.http, port: overrides.port };
  }

  if (overrides.logLevel != null) {
    merged.logging = { ...merged.logging, level: overrides.logLevel };
  }

  const result = SignalConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigLoadError(`Invalid overrides:\n${formatIssues(result.error)}`, result.error);
  }
  return Object.freeze(result.data);
}
