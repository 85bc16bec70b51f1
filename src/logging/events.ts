/**
 * Typed event definitions for structured logging.
 */

import type { Category, SeverityLevel } from '../analysis/types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: string;
  eventId?: string;
  service?: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogContext {
  eventId?: string;
  service?: string;
  data?: Record<string, unknown>;
}

// ── Analysis events ──

export type EventProcessedEvent = {
  type: 'event-processed';
  eventId: string;
  calculatedSeverity: SeverityLevel;
  classification: Category;
};

export type EventRejectedEvent = {
  type: 'event-rejected';
  eventId: string | null;
  field: string;
  reason: string;
};

export type ToolFailedEvent = {
  type: 'tool-failed';
  tool: string;
  stage: string;
  error: string;
};

// ── Server events ──

export type ServerStartedEvent = {
  type: 'server-started';
  serverName: string;
  transport: string;
  address?: string;
};

export type ServerStoppedEvent = {
  type: 'server-stopped';
  transport: string;
  signal?: string;
};

export type SignalEvent =
  | EventProcessedEvent
  | EventRejectedEvent
  | ToolFailedEvent
  | ServerStartedEvent
  | ServerStoppedEvent;
