/**
 * Type definitions for the event analysis pipeline.
 */

export const SEVERITY_LEVELS = ['critical', 'high', 'medium', 'low', 'info'] as const;

export type SeverityLevel = (typeof SEVERITY_LEVELS)[number];

/** Levels that carry keyword sets, in the order they are tested. */
export const SEVERITY_PRIORITY = ['critical', 'high', 'medium', 'low'] as const;

export type KeywordSeverity = (typeof SEVERITY_PRIORITY)[number];

export const CATEGORIES = [
  'security',
  'database',
  'network',
  'resource',
  'service_failure',
  'unknown',
] as const;

export type Category = (typeof CATEGORIES)[number];

/** Categories that carry keyword sets, in the order they are tested. */
export const CATEGORY_PRIORITY = [
  'security',
  'database',
  'network',
  'resource',
  'service_failure',
] as const;

export type KeywordCategory = (typeof CATEGORY_PRIORITY)[number];

export interface FailureEvent {
  readonly eventId: string;
  /** ISO-8601 as supplied by the caller; display only. */
  readonly timestamp: string;
  readonly service: string;
  /** Caller-asserted severity, kept verbatim and never used for the verdict. */
  readonly severity: string;
  readonly message: string;
  readonly details: Readonly<Record<string, unknown>>;
}

export interface ProcessedResult {
  readonly event_id: string;
  readonly original_severity: string;
  readonly calculated_severity: SeverityLevel;
  readonly classification: Category;
  readonly recommendation: string;
  readonly human_readable: string;
  readonly status: 'processed';
}

export interface RejectedResult {
  readonly event_id: string | null;
  readonly original_severity: string | null;
  readonly status: 'rejected';
  readonly field: string;
  readonly reason: string;
}

export type AnalysisResult = ProcessedResult | RejectedResult;

export type AnalysisStatus = AnalysisResult['status'];
