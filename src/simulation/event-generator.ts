import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { InfrastructureError } from '../errors.js';
import { CATEGORY_PRIORITY, SEVERITY_LEVELS } from '../analysis/types.js';

export const DEFAULT_SCENARIOS_FILE = fileURLToPath(new URL('../../data/scenarios.json', import.meta.url));

const scenarioSchema = z.object({
  id: z.string().min(1),
  failureType: z.enum(CATEGORY_PRIORITY),
  baseSeverity: z.enum(SEVERITY_LEVELS),
  servicePools: z.array(z.string().min(1)).min(1),
  weight: z.number().positive(),
  messageTemplates: z.array(z.string().min(1)).min(1),
});

export const scenarioCatalogSchema = z
  .object({
    servicePools: z.record(z.string(), z.array(z.string().min(1)).min(1)),
    scenarios: z.array(scenarioSchema).min(1),
  })
  .superRefine((catalog, ctx) => {
    catalog.scenarios.forEach((scenario, i) => {
      for (const pool of scenario.servicePools) {
        if (!(pool in catalog.servicePools)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['scenarios', i, 'servicePools'],
            message: `unknown service pool "${pool}"`,
          });
        }
      }
    });
  });

export type FailureScenario = z.infer<typeof scenarioSchema>;
export type ScenarioCatalog = z.infer<typeof scenarioCatalogSchema>;

/** Raw payload shaped like what a reporting service would send. */
export type GeneratedEvent = {
  event_id: string;
  timestamp: string;
  service: string;
  severity: string;
  message: string;
  details: Record<string, unknown>;
};

export async function loadScenarioCatalog(filePath: string = DEFAULT_SCENARIOS_FILE): Promise<ScenarioCatalog> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (err) {
    throw new InfrastructureError(`Failed to read scenario catalog: ${filePath}`, 'simulation', { cause: err });
  }
  const result = scenarioCatalogSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new InfrastructureError(`Invalid scenario catalog ${filePath}:\n${issues}`, 'simulation', {
      cause: result.error,
    });
  }
  return result.data;
}

export interface EventGeneratorOptions {
  /** Uniform source in [0, 1). Defaults to Math.random. */
  random?: () => number;
  now?: () => Date;
}

/**
 * Produces plausible failure events from a scenario catalog for demos and
 * load checks. Scenario choice is weighted; `{placeholder}` tokens in message
 * templates are filled with values drawn from `random`.
 */
export class EventGenerator {
  private readonly random: () => number;
  private readonly now: () => Date;
  private counter = 0;

  constructor(
    private readonly catalog: ScenarioCatalog,
    opts: EventGeneratorOptions = {},
  ) {
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? (() => new Date());
  }

  private int(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  private pick<T>(items: readonly T[]): T {
    return items[Math.min(items.length - 1, Math.floor(this.random() * items.length))];
  }

  private pickScenario(): FailureScenario {
    const total = this.catalog.scenarios.reduce((sum, s) => sum + s.weight, 0);
    const target = this.random() * total;
    let cumulative = 0;
    for (const scenario of this.catalog.scenarios) {
      cumulative += scenario.weight;
      if (target < cumulative) return scenario;
    }
    return this.catalog.scenarios[this.catalog.scenarios.length - 1];
  }

  private placeholder(name: string): string {
    switch (name) {
      case 'count':
        return String(this.int(3, 500));
      case 'max':
        return String(this.int(20, 100));
      case 'ms':
        return String(this.int(500, 30_000));
      case 'percent':
        return String(this.int(15, 99));
      case 'gb':
        return String(this.int(2, 32));
      case 'status':
        return String(this.pick([500, 502, 503, 504]));
      case 'table':
        return this.pick(['users', 'orders', 'sessions', 'products']);
      case 'upstream':
        return this.pick(['payment-api', 'user-service', 'auth-gateway']);
      case 'ip':
        return `192.168.${this.int(1, 255)}.${this.int(1, 255)}`;
      default:
        throw new InfrastructureError(`Unknown message placeholder {${name}}`, 'simulation');
    }
  }

  fillTemplate(template: string): string {
    return template.replace(/\{(\w+)\}/g, (_match, name: string) => this.placeholder(name));
  }

  generate(): GeneratedEvent {
    const scenario = this.pickScenario();
    const pool = this.pick(scenario.servicePools);
    const service = this.pick(this.catalog.servicePools[pool] ?? []);
    const message = this.fillTemplate(this.pick(scenario.messageTemplates));

    this.counter += 1;
    return {
      event_id: `sim_${String(this.counter).padStart(4, '0')}`,
      timestamp: this.now().toISOString(),
      service,
      severity: scenario.baseSeverity,
      message,
      details: {
        scenario: scenario.id,
        failure_type: scenario.failureType,
        correlation_id: `req_${this.int(100_000, 999_999)}`,
        affected_users: this.int(10, 5_000),
      },
    };
  }

  generateBatch(count: number): GeneratedEvent[] {
    return Array.from({ length: count }, () => this.generate());
  }
}
