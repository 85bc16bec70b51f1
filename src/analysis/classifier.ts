import { KeywordMatcher, type KeywordMatch, type KeywordTables } from './keyword-tables.js';
import type { Category, FailureEvent, KeywordCategory } from './types.js';

export interface ClassificationStage {
  classify(event: FailureEvent): Category;
}

/**
 * Assigns one operational category. Categories are tried in priority order
 * (security, database, network, resource, service_failure) against the
 * message; the service name is only consulted when the message matches
 * nothing.
 */
export class EventClassifier implements ClassificationStage {
  private readonly matcher: KeywordMatcher<KeywordCategory>;

  constructor(tables: KeywordTables) {
    this.matcher = new KeywordMatcher(tables.categories);
  }

  classify(event: FailureEvent): Category {
    return this.explain(event)?.label ?? 'unknown';
  }

  explain(event: FailureEvent): KeywordMatch<KeywordCategory> | null {
    return this.matcher.firstMatch(event.message) ?? this.matcher.firstMatch(event.service);
  }
}
