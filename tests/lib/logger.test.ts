import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import {
  StructuredLogger,
  configureLoggers,
  createRequestContext,
  formatDuration,
  isLogLevel,
  loggers,
} from '../../src/lib/logger.js';
import { FetchError } from '../../src/lib/errors.js';

describe('StructuredLogger', () => {
  let logger: StructuredLogger;
  let consoleSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;

  beforeEach(() => {
    logger = new StructuredLogger('TestComponent');
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log info messages as JSON lines', () => {
    logger.info('Test message', { requestId: 'req-123', url: '/tide/x.ics' });

    expect(consoleSpy).toHaveBeenCalledOnce();
    const parsed = JSON.parse(String(consoleSpy.mock.calls[0][0]));
    expect(parsed.level).toBe('info');
    expect(parsed.message).toBe('Test message');
    expect(parsed.component).toBe('TestComponent');
    expect(parsed.context).toEqual({ requestId: 'req-123', url: '/tide/x.ics' });
  });

  it('should route warn and error to matching console methods', () => {
    logger.warn('careful');
    logger.error('failed', new FetchError('upstream down', 503));

    expect(consoleWarnSpy).toHaveBeenCalledOnce();
    expect(consoleErrorSpy).toHaveBeenCalledOnce();
    const parsed = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
    expect(parsed.error.name).toBe('FetchError');
    expect(parsed.error.code).toBe('FETCH_FAILED');
    expect(parsed.error.message).toBe('upstream down');
  });

  it('should filter below the minimum level', () => {
    logger.setMinLevel('warn');
    logger.info('hidden');
    logger.warn('shown');

    expect(consoleSpy).not.toHaveBeenCalled();
    expect(consoleWarnSpy).toHaveBeenCalledOnce();
    expect(logger.getMinLevel()).toBe('warn');
  });

  it('should write everything to stderr in CLI mode', () => {
    const cliLogger = new StructuredLogger('CLI', { stderr: true });
    cliLogger.info('to stderr');

    expect(consoleSpy).not.toHaveBeenCalled();
    expect(consoleErrorSpy).toHaveBeenCalledOnce();
  });

  it('should omit stacks when disabled', () => {
    const quiet = new StructuredLogger('Quiet', { includeStack: false });
    quiet.error('failed', new Error('boom'));

    const parsed = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
    expect(parsed.error.stack).toBeUndefined();
  });

  describe('trackAsync', () => {
    it('should log completion with duration', async () => {
      const result = await logger.trackAsync('load', async () => 42, { station: 'x' });

      expect(result).toBe(42);
      const parsed = JSON.parse(String(consoleSpy.mock.calls[0][0]));
      expect(parsed.message).toBe('load 完成');
      expect(parsed.context.station).toBe('x');
      expect(typeof parsed.context.duration).toBe('number');
    });

    it('should log and rethrow failures', async () => {
      await expect(
        logger.trackAsync('load', async () => {
          throw new Error('nope');
        })
      ).rejects.toThrow('nope');

      const parsed = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
      expect(parsed.message).toBe('load 失敗');
    });
  });
});

describe('configureLoggers', () => {
  afterEach(() => {
    configureLoggers({ minLevel: 'info', stderr: false });
    loggers.cache.setMinLevel('warn');
    loggers.config.setMinLevel('warn');
  });

  it('should apply the level to every component', () => {
    configureLoggers({ minLevel: 'error' });
    for (const logger of Object.values(loggers)) {
      expect(logger.getMinLevel()).toBe('error');
    }
  });
});

describe('helpers', () => {
  it('should create a request context with a UUID', () => {
    const context = createRequestContext('GET', '/health');
    expect(context.method).toBe('GET');
    expect(context.url).toBe('/health');
    expect(context.requestId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should format durations', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1500)).toBe('1.50s');
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
