import { describe, it, expect, beforeAll } from 'vitest';
import { EventClassifier } from '../../src/analysis/classifier.js';
import { loadKeywordTables } from '../../src/analysis/keyword-tables.js';
import { makeEvent } from '../helpers/analysis-fixtures.js';

describe('EventClassifier', () => {
  let classifier: EventClassifier;

  beforeAll(async () => {
    classifier = new EventClassifier(await loadKeywordTables());
  });

  const cases: Array<[string, string]> = [
    ['PostgreSQL connection pool exhausted', 'database'],
    ['DNS lookup timeout, retrying', 'network'],
    ['Disk usage at 97%', 'resource'],
    ['Endpoint /checkout returning HTTP 503', 'service_failure'],
  ];

  it.each(cases)('classifies "%s" as %s', (message, expected) => {
    expect(classifier.classify(makeEvent({ message, service: 'worker' }))).toBe(expected);
  });

  it('puts security ahead of every other category', () => {
    const event = makeEvent({ message: 'Unauthorized query against postgres replica', service: 'worker' });
    expect(classifier.classify(event)).toBe('security');
  });

  it('prefers a message match over the service name', () => {
    expect(classifier.classify(makeEvent({ service: 'auth-svc' }))).toBe('database');
    expect(classifier.explain(makeEvent({ service: 'auth-svc' }))).toEqual({
      label: 'database',
      keyword: 'postgresql',
    });
  });

  it('falls back to the service name when the message matches nothing', () => {
    const event = makeEvent({ message: 'Nightly job finished with warnings', service: 'billing-db' });
    expect(classifier.classify(event)).toBe('database');
  });

  it('returns unknown when neither message nor service match', () => {
    const event = makeEvent({ message: 'Nightly backup completed', service: 'cron' });
    expect(classifier.classify(event)).toBe('unknown');
    expect(classifier.explain(event)).toBeNull();
  });
});
