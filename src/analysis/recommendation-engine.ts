import type { Category, SeverityLevel } from './types.js';

export const BASE_RECOMMENDATIONS: Record<SeverityLevel, string> = {
  critical: 'Immediate attention required - escalate to on-call engineer',
  high: 'Prioritize investigation within the hour',
  medium: 'Schedule investigation during business hours',
  low: 'Log for trend analysis - no immediate action needed',
  info: 'Log for trend analysis - no immediate action needed',
};

interface CategoryQualifier {
  /** Used for critical and high severities. */
  urgent: string;
  routine: string;
}

export const CATEGORY_QUALIFIERS: Record<Category, CategoryQualifier | null> = {
  security: {
    urgent: 'Rotate affected credentials and invoke the incident response process',
    routine: 'Review access logs for suspicious activity',
  },
  database: {
    urgent: 'Check connection pool saturation and database failover status',
    routine: 'Review slow query and lock metrics',
  },
  network: {
    urgent: 'Verify DNS resolution and upstream reachability',
    routine: 'Watch latency and retry rates for the affected routes',
  },
  resource: {
    urgent: 'Free or scale the exhausted resource',
    routine: 'Review capacity trends and quotas',
  },
  service_failure: {
    urgent: 'Check recent deployments and consider a rollback',
    routine: 'Review service error rates and health checks',
  },
  unknown: null,
};

/**
 * Map a verdict to an operational response. Defined for every pair.
 */
export function recommend(severity: SeverityLevel, category: Category): string {
  const qualifier = CATEGORY_QUALIFIERS[category];
  const urgent = severity === 'critical' || severity === 'high';
  const parts = [BASE_RECOMMENDATIONS[severity]];
  if (qualifier) {
    parts.push(urgent ? qualifier.urgent : qualifier.routine);
  }
  return parts.map((part) => `${part}.`).join(' ');
}
