import { describe, it, expect, beforeAll, vi } from 'vitest';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { loadKeywordTables, type KeywordTables } from '../../src/analysis/keyword-tables.js';
import { EventAnalysisPipeline } from '../../src/analysis/pipeline.js';
import { ValidationError } from '../../src/errors.js';
import { SignalToolHandlers, resolveEventPayload } from '../../src/server/tool-handlers.js';
import { SIG_001, SIG_002, silentLogger } from '../helpers/analysis-fixtures.js';

function parseBody(result: CallToolResult): unknown {
  const block = result.content[0];
  if (block?.type !== 'text') throw new Error('expected a text block');
  return JSON.parse(block.text);
}

describe('resolveEventPayload', () => {
  it('returns the arguments themselves in the structured form', () => {
    expect(resolveEventPayload({ ...SIG_001 })).toEqual(SIG_001);
  });

  it('drops an absent event_data key', () => {
    expect(resolveEventPayload({ event_id: 'sig_1', event_data: undefined })).toEqual({ event_id: 'sig_1' });
  });

  it('decodes the legacy JSON string form', () => {
    expect(resolveEventPayload({ event_data: JSON.stringify(SIG_002) })).toEqual(SIG_002);
  });

  it('rejects event_data that is not valid JSON', () => {
    const result = resolveEventPayload({ event_data: '{oops' });
    expect(result).toBeInstanceOf(ValidationError);
    if (result instanceof ValidationError) {
      expect(result.field).toBe('event_data');
      expect(result.message).toMatch(/^event_data: must be valid JSON \(/);
    }
  });

  it('rejects event_data that is not a string', () => {
    const result = resolveEventPayload({ event_data: { event_id: 'x' } });
    expect(result).toBeInstanceOf(ValidationError);
    if (result instanceof ValidationError) {
      expect(result.message).toBe('event_data: must be a JSON string');
    }
  });
});

describe('SignalToolHandlers', () => {
  let tables: KeywordTables;
  let handlers: SignalToolHandlers;

  beforeAll(async () => {
    tables = await loadKeywordTables();
    handlers = new SignalToolHandlers(EventAnalysisPipeline.fromTables(tables), silentLogger(), 'signal-server', 'stdio');
  });

  it('analyzes a structured event', () => {
    expect(handlers.analyze({ ...SIG_001 })).toMatchObject({
      event_id: 'sig_001',
      calculated_severity: 'critical',
      classification: 'database',
      status: 'processed',
    });
  });

  it('gives the legacy form the same verdict', () => {
    const legacy = handlers.analyze({ event_data: JSON.stringify(SIG_001) });
    expect(legacy).toEqual(handlers.analyze({ ...SIG_001 }));
  });

  it('reports undecodable legacy payloads as rejected results', () => {
    expect(handlers.analyze({ event_data: 'not json' })).toMatchObject({
      event_id: null,
      status: 'rejected',
      field: 'event_data',
    });
  });

  it('logs processed and rejected outcomes', () => {
    const logger = silentLogger();
    const event = vi.spyOn(logger, 'event');
    const local = new SignalToolHandlers(EventAnalysisPipeline.fromTables(tables), logger, 'signal-server', 'stdio');

    local.analyze({ ...SIG_002 });
    local.analyze({ ...SIG_002, message: '' });

    expect(event).toHaveBeenNthCalledWith(1, {
      type: 'event-processed',
      eventId: 'sig_002',
      calculatedSeverity: 'high',
      classification: 'network',
    });
    expect(event).toHaveBeenNthCalledWith(
      2,
      { type: 'event-rejected', eventId: 'sig_002', field: 'message', reason: 'message: must not be empty' },
      'warn',
    );
  });

  it('wraps the result as a JSON text block', () => {
    const result = handlers.classifyFailureEvent({ ...SIG_002 });
    expect(result.isError).toBeUndefined();
    expect(parseBody(result)).toMatchObject({ calculated_severity: 'high', classification: 'network' });
  });

  it('returns rejections as ordinary tool results', () => {
    const result = handlers.classifyFailureEvent({ event_id: 'sig_004' });
    expect(result.isError).toBeUndefined();
    expect(parseBody(result)).toEqual({
      event_id: 'sig_004',
      original_severity: null,
      status: 'rejected',
      field: 'timestamp',
      reason: 'timestamp: is required',
    });
  });

  it('turns a stage fault into an error result', () => {
    const logger = silentLogger();
    const event = vi.spyOn(logger, 'event');
    const broken = new EventAnalysisPipeline({
      severity: { calculateSeverity: () => 'high' },
      classifier: {
        classify: () => {
          throw new Error('tables gone');
        },
      },
    });
    const local = new SignalToolHandlers(broken, logger, 'signal-server', 'stdio');

    const result = local.classifyFailureEvent({ ...SIG_001 });
    expect(result.isError).toBe(true);
    expect(parseBody(result)).toEqual({
      error: 'classification stage failed: tables gone',
      stage: 'classification',
      status: 'failed',
      event_id: 'sig_001',
    });
    expect(event).toHaveBeenCalledWith(
      {
        type: 'tool-failed',
        tool: 'classify_failure_event',
        stage: 'classification',
        error: 'classification stage failed: tables gone',
      },
      'error',
    );
  });

  it('reports health', () => {
    expect(handlers.health()).toEqual({
      status: 'ok',
      service: 'signal-server',
      transport: 'stdio',
      message: 'Signal server operational',
    });
    expect(parseBody(handlers.healthCheck())).toEqual(handlers.health());
  });
});
