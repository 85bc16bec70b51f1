import chalk, { type ChalkInstance } from 'chalk';
import type { AnalysisResult, SeverityLevel } from '../analysis/types.js';
import { SEVERITY_LEVELS } from '../analysis/types.js';

const SEVERITY_STYLE: Record<SeverityLevel, ChalkInstance> = {
  critical: chalk.bgRed.white.bold,
  high: chalk.red.bold,
  medium: chalk.yellow,
  low: chalk.cyan,
  info: chalk.gray,
};

/**
 * Render one result for terminal display.
 */
export function renderResult(result: AnalysisResult): string {
  if (result.status === 'rejected') {
    const id = result.event_id ?? '(no event_id)';
    return chalk.red(`✗ Rejected ${id}: ${result.reason}`);
  }

  const severity = result.calculated_severity;
  const badge = SEVERITY_STYLE[severity](` ${severity.toUpperCase()} `);
  return `${badge} ${chalk.bold(result.classification)}\n${result.human_readable}`;
}

/**
 * One-line summary of a batch, e.g. `3 processed, 1 rejected | critical: 1, high: 2`.
 */
export function renderTally(results: readonly AnalysisResult[]): string {
  const counts = new Map<SeverityLevel, number>();
  let rejected = 0;
  for (const result of results) {
    if (result.status === 'rejected') {
      rejected += 1;
      continue;
    }
    counts.set(result.calculated_severity, (counts.get(result.calculated_severity) ?? 0) + 1);
  }

  const processed = results.length - rejected;
  const bySeverity = SEVERITY_LEVELS.filter((level) => counts.has(level))
    .map((level) => `${level}: ${counts.get(level)}`)
    .join(', ');
  const head = `${processed} processed, ${rejected} rejected`;
  return bySeverity ? `${head} | ${bySeverity}` : head;
}
