import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import type { ProcessedResult, RejectedResult } from '../../src/analysis/types.js';
import { renderResult, renderTally } from '../../src/cli/result-renderer.js';

function processed(overrides: Partial<ProcessedResult> = {}): ProcessedResult {
  return {
    event_id: 'sig_001',
    original_severity: 'critical',
    calculated_severity: 'critical',
    classification: 'database',
    recommendation: 'Escalate.',
    human_readable: '🚨 Signal Alert: sig_001',
    status: 'processed',
    ...overrides,
  };
}

const rejected: RejectedResult = {
  event_id: 'sig_003',
  original_severity: 'high',
  status: 'rejected',
  field: 'message',
  reason: 'message: must not be empty',
};

describe('renderResult', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('shows a severity badge, the category and the summary', () => {
    expect(renderResult(processed())).toBe(' CRITICAL  database\n🚨 Signal Alert: sig_001');
  });

  it('shows the rejection reason', () => {
    expect(renderResult(rejected)).toBe('✗ Rejected sig_003: message: must not be empty');
  });

  it('marks rejections without an event id', () => {
    const anonymous: RejectedResult = { ...rejected, event_id: null, field: 'event_id', reason: 'event_id: is required' };
    expect(renderResult(anonymous)).toBe('✗ Rejected (no event_id): event_id: is required');
  });
});

describe('renderTally', () => {
  it('counts outcomes and severities in severity order', () => {
    const results = [
      processed({ calculated_severity: 'high' }),
      processed(),
      processed({ calculated_severity: 'high' }),
      rejected,
    ];
    expect(renderTally(results)).toBe('3 processed, 1 rejected | critical: 1, high: 2');
  });

  it('omits the severity breakdown when nothing was processed', () => {
    expect(renderTally([])).toBe('0 processed, 0 rejected');
    expect(renderTally([rejected])).toBe('0 processed, 1 rejected');
  });
});
