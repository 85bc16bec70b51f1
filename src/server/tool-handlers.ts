import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { EventAnalysisPipeline } from '../analysis/pipeline.js';
import { rejectedResult } from '../analysis/pipeline.js';
import type { AnalysisResult } from '../analysis/types.js';
import { InfrastructureError, ValidationError } from '../errors.js';
import type { Logger } from '../logging/logger.js';

export const CLASSIFY_TOOL = 'classify_failure_event';
export const HEALTH_TOOL = 'health_check';

/**
 * Every field is optional at the protocol level: missing or empty fields are
 * the event model's to reject, as a `rejected` result rather than an RPC error.
 */
export const classifyInputShape = {
  event_id: z.string().optional().describe('Caller-assigned event identifier'),
  timestamp: z.string().optional().describe('ISO-8601 time the failure was observed'),
  service: z.string().optional().describe('Reporting service or component'),
  severity: z.string().optional().describe('Severity asserted by the caller'),
  message: z.string().optional().describe('Free-text failure description'),
  details: z.record(z.string(), z.unknown()).nullable().optional().describe('Arbitrary context'),
  event_data: z
    .string()
    .optional()
    .describe('Legacy form: the whole event encoded as a JSON string'),
};

export interface HealthStatus {
  status: 'ok';
  service: string;
  transport: string;
  message: string;
}

/**
 * Unwrap the legacy `event_data` JSON string when present; otherwise the
 * arguments are the event.
 */
export function resolveEventPayload(args: Record<string, unknown>): unknown {
  const { event_data: eventData, ...rest } = args;
  if (eventData === undefined) return rest;
  if (typeof eventData !== 'string') {
    return new ValidationError('event_data', 'must be a JSON string', eventData);
  }
  try {
    return JSON.parse(eventData);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return new ValidationError('event_data', `must be valid JSON (${msg})`, eventData);
  }
}

function textResult(body: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(body, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

/**
 * Tool implementations shared by both transports.
 */
export class SignalToolHandlers {
  constructor(
    private readonly pipeline: EventAnalysisPipeline,
    private readonly logger: Logger,
    private readonly serverName: string,
    private readonly transport: string,
  ) {}

  /** Run one payload through the pipeline and log the outcome. */
  analyze(args: Record<string, unknown>): AnalysisResult {
    const payload = resolveEventPayload(args);
    const result =
      payload instanceof ValidationError ? rejectedResult(args, payload) : this.pipeline.process(payload);

    if (result.status === 'processed') {
      this.logger.event({
        type: 'event-processed',
        eventId: result.event_id,
        calculatedSeverity: result.calculated_severity,
        classification: result.classification,
      });
    } else {
      this.logger.event(
        { type: 'event-rejected', eventId: result.event_id, field: result.field, reason: result.reason },
        'warn',
      );
    }
    return result;
  }

  classifyFailureEvent(args: Record<string, unknown>): CallToolResult {
    try {
      return textResult(this.analyze(args));
    } catch (err) {
      if (!(err instanceof InfrastructureError)) throw err;
      this.logger.event(
        { type: 'tool-failed', tool: CLASSIFY_TOOL, stage: err.stage, error: err.message },
        'error',
      );
      return textResult(
        {
          error: err.message,
          stage: err.stage,
          status: 'failed',
          event_id: typeof args.event_id === 'string' ? args.event_id : null,
        },
        true,
      );
    }
  }

  health(): HealthStatus {
    return {
      status: 'ok',
      service: this.serverName,
      transport: this.transport,
      message: 'Signal server operational',
    };
  }

  healthCheck(): CallToolResult {
    return textResult(this.health());
  }
}
