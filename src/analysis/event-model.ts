import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { FailureEvent } from './types.js';

const stringParams = { required_error: 'is required', invalid_type_error: 'must be a string' };

const requiredText = () => z.string(stringParams).trim().min(1, 'must not be empty');

/**
 * Wire shape of a failure event. Field order is the order problems are
 * reported in: only the first issue surfaces on the rejection.
 */
export const failureEventSchema = z.object(
  {
    event_id: requiredText().describe('Caller-assigned opaque event identifier'),
    timestamp: requiredText().describe('ISO-8601 time the failure was observed'),
    service: requiredText().describe('Name of the reporting service or component'),
    severity: z
      .string(stringParams)
      .describe('Severity asserted by the caller (critical, high, medium, low, info)'),
    message: requiredText().describe('Free-text description of the failure'),
    details: z
      .record(z.string(), z.unknown(), { invalid_type_error: 'must be an object' })
      .nullish()
      .describe('Arbitrary key/value context'),
  },
  { required_error: 'is required', invalid_type_error: 'must be an object' },
);

export type FailureEventPayload = z.input<typeof failureEventSchema>;

function receivedValue(payload: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = payload;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Parse an already-decoded payload into a FailureEvent.
 * Returns the ValidationError for the first offending field instead of throwing.
 */
export function validateFailureEvent(payload: unknown): FailureEvent | ValidationError {
  const result = failureEventSchema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path ?? [];
    const field = path.length > 0 ? path.join('.') : 'payload';
    return new ValidationError(field, issue?.message ?? 'is invalid', receivedValue(payload, path));
  }

  const data = result.data;
  const event: FailureEvent = {
    eventId: data.event_id,
    timestamp: data.timestamp,
    service: data.service,
    severity: data.severity,
    message: data.message,
    details: Object.freeze({ ...(data.details ?? {}) }),
  };
  return Object.freeze(event);
}
