export { EventAnalysisPipeline, rejectedResult } from './pipeline.js';
export type { PipelineDeps, PipelineStage } from './pipeline.js';
export { validateFailureEvent, failureEventSchema } from './event-model.js';
export type { FailureEventPayload } from './event-model.js';
export {
  KeywordMatcher,
  loadKeywordTables,
  parseKeywordTables,
  normalizeText,
  DEFAULT_KEYWORDS_FILE,
} from './keyword-tables.js';
export type { KeywordTables, KeywordRule, KeywordMatch } from './keyword-tables.js';
export { SeverityAnalyzer } from './severity-analyzer.js';
export type { SeverityStage } from './severity-analyzer.js';
export { EventClassifier } from './classifier.js';
export type { ClassificationStage } from './classifier.js';
export { recommend, BASE_RECOMMENDATIONS, CATEGORY_QUALIFIERS } from './recommendation-engine.js';
export { formatSummary, formatCategory, formatTimestamp } from './summary-formatter.js';
export { SEVERITY_LEVELS, CATEGORIES, SEVERITY_PRIORITY, CATEGORY_PRIORITY } from './types.js';
export type {
  SeverityLevel,
  Category,
  FailureEvent,
  AnalysisResult,
  ProcessedResult,
  RejectedResult,
  AnalysisStatus,
} from './types.js';
