import { describe, it, expect, beforeAll } from 'vitest';
import { loadKeywordTables } from '../../src/analysis/keyword-tables.js';
import { SeverityAnalyzer } from '../../src/analysis/severity-analyzer.js';
import { makeEvent } from '../helpers/analysis-fixtures.js';

describe('SeverityAnalyzer', () => {
  let analyzer: SeverityAnalyzer;

  beforeAll(async () => {
    analyzer = new SeverityAnalyzer(await loadKeywordTables());
  });

  const cases: Array<[string, string]> = [
    ['PostgreSQL connection pool exhausted', 'critical'],
    ['Primary database down', 'critical'],
    ['DNS lookup timeout, retrying', 'high'],
    ['Request latency elevated', 'medium'],
    ['API v1 deprecated', 'low'],
    ['Nightly backup completed', 'info'],
  ];

  it.each(cases)('rates "%s" as %s', (message, expected) => {
    expect(analyzer.calculateSeverity(makeEvent({ message }))).toBe(expected);
  });

  it('lets the highest level win when several match', () => {
    expect(analyzer.calculateSeverity(makeEvent({ message: 'Disk corrupt warning' }))).toBe('critical');
  });

  it('ignores the caller-asserted severity', () => {
    const message = 'DNS lookup timeout, retrying';
    const asLow = analyzer.calculateSeverity(makeEvent({ message, severity: 'low' }));
    const asCritical = analyzer.calculateSeverity(makeEvent({ message, severity: 'critical' }));
    expect(asLow).toBe('high');
    expect(asCritical).toBe('high');
  });

  it('does not fire on partial words', () => {
    expect(analyzer.calculateSeverity(makeEvent({ message: 'downstream cache warmed' }))).toBe('info');
  });

  it('explains which keyword decided the level', () => {
    expect(analyzer.explain(makeEvent({ message: 'Primary database down' }))).toEqual({
      label: 'critical',
      keyword: 'down',
    });
    expect(analyzer.explain(makeEvent({ message: 'Nightly backup completed' }))).toBeNull();
  });
});
