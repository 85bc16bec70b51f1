import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { appendFile, mkdir } from 'node:fs/promises';
import { Logger, createLogger } from '../src/logging/logger.js';

vi.mock('node:fs/promises', () => ({
  mkdir: vi.fn().mockResolvedValue(undefined),
  appendFile: vi.fn().mockResolvedValue(undefined),
}));

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('Logger', () => {
  let consoleError: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.mocked(appendFile).mockReset().mockResolvedValue(undefined);
    vi.mocked(mkdir).mockClear();
    consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    consoleError.mockRestore();
  });

  describe('console output', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-02T03:04:05.678Z'));
    });

    it('writes a single stderr line with event context', () => {
      const logger = new Logger({ source: 'test', logDir: null });
      logger.info('hello', { eventId: 'sig_1', service: 'api' });
      expect(consoleError).toHaveBeenCalledWith('03:04:05.678 INFO  [test] [sig_1 api] hello');
    });

    it('omits the context block when there is none', () => {
      const logger = new Logger({ source: 'server', logDir: null });
      logger.error('boom');
      expect(consoleError).toHaveBeenCalledWith('03:04:05.678 ERROR [server] boom');
    });

    it('drops entries below the configured level', () => {
      const logger = new Logger({ source: 'test', logDir: null, level: 'warn' });
      logger.debug('noise');
      logger.info('noise');
      logger.warn('kept');
      expect(consoleError).toHaveBeenCalledTimes(1);
      expect(consoleError).toHaveBeenCalledWith('03:04:05.678 WARN  [test] kept');
    });

    it('stays quiet when console output is off', () => {
      const logger = new Logger({ source: 'test', logDir: null, console: false });
      logger.error('hidden');
      expect(consoleError).not.toHaveBeenCalled();
    });

    it('logs structured events under their type', () => {
      const logger = new Logger({ source: 'test', logDir: null });
      logger.event(
        { type: 'event-rejected', eventId: null, field: 'message', reason: 'message: must not be empty' },
        'warn',
      );
      expect(consoleError).toHaveBeenCalledWith('03:04:05.678 WARN  [test] event-rejected');
    });

    it('puts the event id of a structured event into the context block', () => {
      const logger = new Logger({ source: 'server', logDir: null });
      logger.event({
        type: 'event-processed',
        eventId: 'sig_001',
        calculatedSeverity: 'critical',
        classification: 'database',
      });
      expect(consoleError).toHaveBeenCalledWith('03:04:05.678 INFO  [server] [sig_001] event-processed');
    });

    it('creates children under a new source with the same level', () => {
      const child = new Logger({ source: 'server', logDir: null, level: 'debug' }).child('pipeline');
      child.debug('stage done');
      expect(child.level).toBe('debug');
      expect(consoleError).toHaveBeenCalledWith('03:04:05.678 DEBUG [pipeline] stage done');
    });
  });

  describe('file output', () => {
    it('appends JSON lines to <logDir>/<source>.log', async () => {
      const logger = new Logger({ source: 'server', logDir: '/tmp/logs', console: false });
      logger.event({
        type: 'event-processed',
        eventId: 'sig_001',
        calculatedSeverity: 'critical',
        classification: 'database',
      });
      await vi.waitFor(() => expect(appendFile).toHaveBeenCalledTimes(1));

      expect(mkdir).toHaveBeenCalledWith('/tmp/logs', { recursive: true });
      const [file, line] = vi.mocked(appendFile).mock.calls[0];
      expect(file).toBe('/tmp/logs/server.log');
      expect(typeof line).toBe('string');
      const entry: unknown = JSON.parse(String(line));
      expect(entry).toMatchObject({
        level: 'info',
        source: 'server',
        message: 'event-processed',
        eventId: 'sig_001',
        data: { type: 'event-processed', eventId: 'sig_001', calculatedSeverity: 'critical' },
      });
    });

    it('writes no file without a logDir', async () => {
      const logger = new Logger({ source: 'server', logDir: null, console: false });
      logger.info('hello');
      await flush();
      expect(appendFile).not.toHaveBeenCalled();
    });

    it('reports an unwritable log file only once', async () => {
      vi.mocked(appendFile).mockRejectedValue(new Error('EACCES'));
      const logger = new Logger({ source: 'server', logDir: '/tmp/logs', console: false });
      logger.info('one');
      logger.info('two');
      await vi.waitFor(() => expect(appendFile).toHaveBeenCalledTimes(2));
      await flush();

      expect(consoleError).toHaveBeenCalledTimes(1);
      expect(consoleError).toHaveBeenCalledWith('Log file /tmp/logs/server.log is not writable: EACCES');
    });
  });
});

describe('createLogger', () => {
  it('maps the logging config section', () => {
    const logger = createLogger({ level: 'warn', console: false }, 'server');
    expect(logger.level).toBe('warn');
  });
});
