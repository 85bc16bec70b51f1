import { InfrastructureError, ValidationError } from '../errors.js';
import { EventClassifier, type ClassificationStage } from './classifier.js';
import { validateFailureEvent } from './event-model.js';
import { loadKeywordTables, type KeywordTables } from './keyword-tables.js';
import { recommend } from './recommendation-engine.js';
import { SeverityAnalyzer, type SeverityStage } from './severity-analyzer.js';
import { formatSummary } from './summary-formatter.js';
import type { AnalysisResult, ProcessedResult, RejectedResult } from './types.js';

export type PipelineStage = 'severity' | 'classification' | 'recommendation' | 'summary';

export interface PipelineDeps {
  severity: SeverityStage;
  classifier: ClassificationStage;
}

function stringField(payload: unknown, key: string): string | null {
  if (payload === null || typeof payload !== 'object') return null;
  const value: unknown = Reflect.get(payload, key);
  return typeof value === 'string' ? value : null;
}

export function rejectedResult(payload: unknown, error: ValidationError): RejectedResult {
  const eventId = stringField(payload, 'event_id')?.trim();
  const result: RejectedResult = {
    event_id: eventId ? eventId : null,
    original_severity: stringField(payload, 'severity'),
    status: 'rejected',
    field: error.field,
    reason: error.message,
  };
  return Object.freeze(result);
}

/**
 * Validation -> severity -> classification -> recommendation -> summary.
 *
 * Holds only read-only stage objects, so one instance may serve any number of
 * concurrent calls. Bad input yields a `rejected` result; a fault inside a
 * stage is rethrown as an InfrastructureError naming that stage.
 */
export class EventAnalysisPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  static fromTables(tables: KeywordTables): EventAnalysisPipeline {
    return new EventAnalysisPipeline({
      severity: new SeverityAnalyzer(tables),
      classifier: new EventClassifier(tables),
    });
  }

  static async create(keywordsFile?: string): Promise<EventAnalysisPipeline> {
    return EventAnalysisPipeline.fromTables(await loadKeywordTables(keywordsFile));
  }

  process(payload: unknown): AnalysisResult {
    const validated = validateFailureEvent(payload);
    if (validated instanceof ValidationError) {
      return rejectedResult(payload, validated);
    }
    const event = validated;

    const severity = this.runStage('severity', () => this.deps.severity.calculateSeverity(event));
    const classification = this.runStage('classification', () => this.deps.classifier.classify(event));
    const recommendation = this.runStage('recommendation', () => recommend(severity, classification));
    const humanReadable = this.runStage('summary', () =>
      formatSummary(event, severity, classification, recommendation),
    );

    const result: ProcessedResult = {
      event_id: event.eventId,
      original_severity: event.severity,
      calculated_severity: severity,
      classification,
      recommendation,
      human_readable: humanReadable,
      status: 'processed',
    };
    return Object.freeze(result);
  }

  private runStage<T>(stage: PipelineStage, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new InfrastructureError(`${stage} stage failed: ${msg}`, stage, { cause: err });
    }
  }
}
