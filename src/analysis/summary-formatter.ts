import { isValid, parseISO } from 'date-fns';
import type { Category, FailureEvent, SeverityLevel } from './types.js';

const SEVERITY_ICON: Record<SeverityLevel, string> = {
  critical: '🚨',
  high: '🔴',
  medium: '🟠',
  low: '🟡',
  info: '🔵',
};

/** `service_failure` -> `Service Failure` */
export function formatCategory(category: Category): string {
  return category
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/** ISO-8601 input renders as UTC; anything else is shown as given. */
export function formatTimestamp(timestamp: string): string {
  const parsed = parseISO(timestamp);
  return isValid(parsed) ? parsed.toISOString() : timestamp;
}

function formatDetailValue(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // BigInt and circular values do not serialize.
    return String(value);
  }
}

export function formatSummary(
  event: FailureEvent,
  severity: SeverityLevel,
  category: Category,
  recommendation: string,
): string {
  const lines = [
    `${SEVERITY_ICON[severity]} Signal Alert: ${event.eventId}`,
    `Service: ${event.service}`,
    `Severity: ${severity.toUpperCase()} (reported: ${event.severity})`,
    `Type: ${formatCategory(category)}`,
    `Message: ${event.message}`,
    `Action: ${recommendation}`,
    `Time: ${formatTimestamp(event.timestamp)}`,
  ];

  const details = Object.entries(event.details);
  if (details.length > 0) {
    lines.push(`Details: ${details.map(([key, value]) => `${key}=${formatDetailValue(value)}`).join(', ')}`);
  }

  return lines.join('\n');
}
