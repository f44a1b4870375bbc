/**
 * Tests for Logger utility
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  Logger,
  OperationLogger,
  createLogger,
  loggers,
  getLoggerProvider,
  setLoggerProvider,
  resetLoggerProvider,
  generateRunId,
  withRunContext,
  getRunContext,
  type LoggerProvider,
} from '../../src/lib/logger.js';

describe('Logger', () => {
  let originalEnv: NodeJS.ProcessEnv;
  let consoleSpy: {
    log: MockInstance<typeof console.log>;
    error: MockInstance<typeof console.error>;
  };

  beforeEach(() => {
    originalEnv = { ...process.env };
    consoleSpy = {
      log: vi.spyOn(console, 'log').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should create logger with default config', () => {
      const log = new Logger();
      const config = log.getConfig();

      expect(config.context).toBe('app');
      expect(config.timestamps).toBe(true);
    });

    it('should create logger with custom context', () => {
      const log = new Logger({ context: 'my-module' });
      expect(log.getConfig().context).toBe('my-module');
    });

    it('should create logger with custom level', () => {
      const log = new Logger({ level: 'error' });
      expect(log.getConfig().level).toBe('error');
    });

    it('should create logger with custom format', () => {
      const log = new Logger({ format: 'json' });
      expect(log.getConfig().format).toBe('json');
    });

    it('should respect LOG_LEVEL environment variable', () => {
      process.env['LOG_LEVEL'] = 'debug';
      const log = new Logger();
      expect(log.getConfig().level).toBe('debug');
    });

    it('should respect LOG_FORMAT environment variable', () => {
      process.env['LOG_FORMAT'] = 'json';
      const log = new Logger();
      expect(log.getConfig().format).toBe('json');
    });

    it('should default to debug in development', () => {
      delete process.env['LOG_LEVEL'];
      process.env['NODE_ENV'] = 'development';
      const log = new Logger();
      expect(log.getConfig().level).toBe('debug');
    });

    it('should default to info in production', () => {
      delete process.env['LOG_LEVEL'];
      process.env['NODE_ENV'] = 'production';
      const log = new Logger();
      expect(log.getConfig().level).toBe('info');
    });

    it('should default to json format in production', () => {
      delete process.env['LOG_FORMAT'];
      process.env['NODE_ENV'] = 'production';
      const log = new Logger();
      expect(log.getConfig().format).toBe('json');
    });
  });

  describe('log levels', () => {
    it('should log debug messages when level is debug', () => {
      const log = new Logger({ level: 'debug', format: 'json' });
      log.debug('test message');

      expect(consoleSpy.log).toHaveBeenCalled();
      const output = JSON.parse(consoleSpy.log.mock.calls[0][0]);
      expect(output.level).toBe('debug');
      expect(output.message).toBe('test message');
    });

    it('should log info messages when level is info', () => {
      const log = new Logger({ level: 'info', format: 'json' });
      log.info('test message');

      expect(consoleSpy.log).toHaveBeenCalled();
      const output = JSON.parse(consoleSpy.log.mock.calls[0][0]);
      expect(output.level).toBe('info');
    });

    it('should log warn messages to stderr', () => {
      const log = new Logger({ level: 'warn', format: 'json' });
      log.warn('warning message');

      expect(consoleSpy.error).toHaveBeenCalled();
      const output = JSON.parse(consoleSpy.error.mock.calls[0][0]);
      expect(output.level).toBe('warn');
    });

    it('should log error messages to stderr', () => {
      const log = new Logger({ level: 'error', format: 'json' });
      log.error('error message');

      expect(consoleSpy.error).toHaveBeenCalled();
      const output = JSON.parse(consoleSpy.error.mock.calls[0][0]);
      expect(output.level).toBe('error');
    });

    it('should not log debug when level is info', () => {
      const log = new Logger({ level: 'info' });
      log.debug('should not appear');

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.error).not.toHaveBeenCalled();
    });

    it('should not log info when level is warn', () => {
      const log = new Logger({ level: 'warn' });
      log.info('should not appear');

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.error).not.toHaveBeenCalled();
    });

    it('should not log warn when level is error', () => {
      const log = new Logger({ level: 'error' });
      log.warn('should not appear');

      expect(consoleSpy.error).not.toHaveBeenCalled();
    });
  });

  describe('log output', () => {
    it('should include timestamp in JSON format', () => {
      const log = new Logger({ level: 'info', format: 'json' });
      const before = new Date().toISOString();
      log.info('test');
      const after = new Date().toISOString();

      const output = JSON.parse(consoleSpy.log.mock.calls[0][0]);
      expect(output.timestamp).toBeDefined();
      expect(output.timestamp >= before).toBe(true);
      expect(output.timestamp <= after).toBe(true);
    });

    it('should include context in output', () => {
      const log = new Logger({ level: 'info', format: 'json', context: 'test-context' });
      log.info('test');

      const output = JSON.parse(consoleSpy.log.mock.calls[0][0]);
      expect(output.context).toBe('test-context');
    });

    it('should include data in output', () => {
      const log = new Logger({ level: 'info', format: 'json' });
      log.info('test', { key: 'value', count: 42 });

      const output = JSON.parse(consoleSpy.log.mock.calls[0][0]);
      expect(output.data).toEqual({ key: 'value', count: 42 });
    });

    it('should include operation in output', () => {
      const log = new Logger({ level: 'info', format: 'json' });
      log.info('test', undefined, 'myOperation');

      const output = JSON.parse(consoleSpy.log.mock.calls[0][0]);
      expect(output.operation).toBe('myOperation');
    });

    it('should handle Error objects in data', () => {
      const log = new Logger({ level: 'info', format: 'json' });
      const error = new Error('test error');
      log.info('test', { error });

      const output = JSON.parse(consoleSpy.log.mock.calls[0][0]);
      expect(output.data.error).toBe('test error');
      expect(output.stack).toBeDefined();
    });
  });

  describe('text format', () => {
    it('should output human-readable text format', () => {
      const log = new Logger({ level: 'info', format: 'text', timestamps: false });
      log.info('test message');

      expect(consoleSpy.log).toHaveBeenCalled();
      const output = consoleSpy.log.mock.calls[0][0];
      expect(output).toContain('INFO');
      expect(output).toContain('test message');
    });

    it('should include data in text format', () => {
      const log = new Logger({ level: 'info', format: 'text', timestamps: false });
      log.info('test', { key: 'value' });

      const output = consoleSpy.log.mock.calls[0][0];
      expect(output).toContain('key=');
      expect(output).toContain('"value"');
    });
  });

  describe('child logger', () => {
    it('should create child logger with extended context', () => {
      const parent = new Logger({ context: 'parent' });
      const child = parent.child('child');

      expect(child.getConfig().context).toBe('parent:child');
    });

    it('should inherit parent configuration', () => {
      const parent = new Logger({ level: 'warn', format: 'json' });
      const child = parent.child('child');

      expect(child.getConfig().level).toBe('warn');
      expect(child.getConfig().format).toBe('json');
    });
  });

  describe('withOperation', () => {
    it('should create OperationLogger', () => {
      const log = new Logger({ level: 'info', format: 'json' });
      const opLog = log.withOperation('myOp');

      expect(opLog).toBeInstanceOf(OperationLogger);
    });

    it('should include operation name in all log calls', () => {
      const log = new Logger({ level: 'info', format: 'json' });
      const opLog = log.withOperation('myOp');

      opLog.info('test');
      const output = JSON.parse(consoleSpy.log.mock.calls[0][0]);
      expect(output.operation).toBe('myOp');
    });
  });

  describe('errorWithStack', () => {
    it('should log error with additional context', () => {
      const log = new Logger({ level: 'error', format: 'json' });
      const error = new Error('test error');
      error.name = 'TestError';

      log.errorWithStack('Error occurred', error, { context: 'test' });

      const output = JSON.parse(consoleSpy.error.mock.calls[0][0]);
      expect(output.level).toBe('error');
      expect(output.message).toBe('Error occurred');
      expect(output.data.error).toBe('test error');
      expect(output.data.errorName).toBe('TestError');
      expect(output.data.context).toBe('test');
    });

    it('should include stack trace in output', () => {
      const log = new Logger({ level: 'error', format: 'json' });
      const error = new Error('test error');

      log.errorWithStack('Error occurred', error);

      const output = JSON.parse(consoleSpy.error.mock.calls[0][0]);
      expect(output.stack).toBeDefined();
      expect(output.stack).toContain('Error: test error');
    });
  });
});

describe('OperationLogger', () => {
  let consoleSpy: {
    log: MockInstance<typeof console.log>;
    error: MockInstance<typeof console.error>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: vi.spyOn(console, 'log').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log with operation name', () => {
    const parent = new Logger({ level: 'debug', format: 'json' });
    const opLog = new OperationLogger(parent, 'testOp');

    opLog.debug('debug msg');
    opLog.info('info msg');
    opLog.warn('warn msg');
    opLog.error('error msg');

    expect(consoleSpy.log).toHaveBeenCalledTimes(2); // debug + info
    expect(consoleSpy.error).toHaveBeenCalledTimes(2); // warn + error

    const debugOutput = JSON.parse(consoleSpy.log.mock.calls[0][0]);
    expect(debugOutput.operation).toBe('testOp');

    const warnOutput = JSON.parse(consoleSpy.error.mock.calls[0][0]);
    expect(warnOutput.operation).toBe('testOp');
  });
});

describe('withFields', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should add default fields to every entry', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = new Logger({ level: 'info', format: 'json' }).withFields({ bucket: '2025-12-17T16' });

    log.info('test', { rows: 3 });

    const output = JSON.parse(spy.mock.calls[0][0]);
    expect(output.data).toEqual({ bucket: '2025-12-17T16', rows: 3 });
  });
});

describe('createLogger', () => {
  it('should create a logger with given context', () => {
    const log = createLogger('my-context');
    expect(log.getConfig().context).toBe('my-context');
  });

  it('should default the service name to pageviews', () => {
    delete process.env['SERVICE_NAME'];
    expect(new Logger().getConfig().service).toBe('pageviews');
  });
});

describe('loggers (pre-configured)', () => {
  it('should have a logger per pipeline stage', () => {
    expect(loggers.fetch.getConfig().context).toBe('fetch');
    expect(loggers.extract.getConfig().context).toBe('extract');
    expect(loggers.filter.getConfig().context).toBe('filter');
    expect(loggers.store.getConfig().context).toBe('store');
    expect(loggers.report.getConfig().context).toBe('report');
    expect(loggers.run.getConfig().context).toBe('run');
    expect(loggers.cli.getConfig().context).toBe('cli');
  });
});

describe('Dependency Injection', () => {
  afterEach(() => {
    // Reset to default provider after each test
    resetLoggerProvider();
    vi.restoreAllMocks();
  });

  it('should return the previous provider from setLoggerProvider', () => {
    const originalProvider = getLoggerProvider();

    const customProvider: LoggerProvider = {
      createLogger: (ctx) => new Logger({ context: `custom:${ctx}` }),
    };

    const previous = setLoggerProvider(customProvider);
    expect(previous).toBe(originalProvider);
    expect(createLogger('test').getConfig().context).toBe('custom:test');

    setLoggerProvider(previous);
    expect(createLogger('test').getConfig().context).toBe('test');
  });

  it('should reset to default provider', () => {
    setLoggerProvider({ createLogger: (ctx) => new Logger({ context: `custom:${ctx}` }) });
    expect(createLogger('test').getConfig().context).toBe('custom:test');

    resetLoggerProvider();
    expect(createLogger('test').getConfig().context).toBe('test');
  });

  it('should resolve module loggers through the current provider', () => {
    setLoggerProvider({ createLogger: (ctx) => new Logger({ context: `injected:${ctx}` }) });

    expect(loggers.filter.getConfig().context).toBe('injected:filter');
    expect(loggers.store.getConfig().context).toBe('injected:store');
  });

  it('should allow capturing logs in tests', () => {
    const capturedLogs: Array<{ level: string; message: string; context: string }> = [];

    class CapturingLogger extends Logger {
      private readonly ctx: string;

      constructor(context: string) {
        super({ context, level: 'debug' });
        this.ctx = context;
      }

      override info(message: string): void {
        capturedLogs.push({ level: 'info', message, context: this.ctx });
      }

      override error(message: string): void {
        capturedLogs.push({ level: 'error', message, context: this.ctx });
      }
    }

    setLoggerProvider({ createLogger: (ctx) => new CapturingLogger(ctx) });

    createLogger('module-a').info('message from A');
    createLogger('module-b').error('error from B');

    expect(capturedLogs).toEqual([
      { level: 'info', message: 'message from A', context: 'module-a' },
      { level: 'error', message: 'error from B', context: 'module-b' },
    ]);
  });
});

describe('Run Context', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('generateRunId', () => {
    it('should generate unique string IDs', () => {
      const id1 = generateRunId();
      const id2 = generateRunId();

      expect(typeof id1).toBe('string');
      expect(id1.length).toBeGreaterThan(0);
      expect(id1).not.toBe(id2);
    });
  });

  describe('withRunContext', () => {
    it('should provide context within callback', async () => {
      const context = await withRunContext({ runId: 'run-123' }, async () => getRunContext());
      expect(context?.runId).toBe('run-123');
    });

    it('should have no context outside callback', async () => {
      await withRunContext({ runId: 'run-123' }, async () => undefined);
      expect(getRunContext()).toBeUndefined();
    });

    it('should keep context across awaits', async () => {
      const runId = await withRunContext({ runId: 'run-456' }, async () => {
        await new Promise((resolve) => setTimeout(resolve, 1));
        return getRunContext()?.runId;
      });
      expect(runId).toBe('run-456');
    });

    it('should add run id and fields to log entries', async () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const log = new Logger({ level: 'info', format: 'json' });

      await withRunContext({ runId: 'run-789', fields: { bucket: '2025-12-17T16' } }, async () => {
        log.info('inside run', { rows: 2 });
      });

      const output = JSON.parse(spy.mock.calls[0][0]);
      expect(output.runId).toBe('run-789');
      expect(output.data).toEqual({ bucket: '2025-12-17T16', rows: 2 });
    });
  });
});
