import { KeywordMatcher, type KeywordMatch, type KeywordTables } from './keyword-tables.js';
import type { FailureEvent, KeywordSeverity, SeverityLevel } from './types.js';

export interface SeverityStage {
  calculateSeverity(event: FailureEvent): SeverityLevel;
}

/**
 * Derives severity from the event message alone. The caller-asserted
 * severity is deliberately not consulted.
 */
export class SeverityAnalyzer implements SeverityStage {
  private readonly matcher: KeywordMatcher<KeywordSeverity>;

  constructor(tables: KeywordTables) {
    this.matcher = new KeywordMatcher(tables.severity);
  }

  /**
   * Levels are tested critical -> high -> medium -> low and the first level
   * with a keyword hit wins; no hit at all means `info`.
   */
  calculateSeverity(event: FailureEvent): SeverityLevel {
    return this.explain(event)?.label ?? 'info';
  }

  explain(event: FailureEvent): KeywordMatch<KeywordSeverity> | null {
    return this.matcher.firstMatch(event.message);
  }
}
