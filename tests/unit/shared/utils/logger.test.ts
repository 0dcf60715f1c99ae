import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { setupLogger, setLogLevel } from '@shared/utils/logger';

describe('Logger Configuration', () => {
  let capturedLogs: string[] = [];
  let originalEnv: string | undefined;

  beforeEach(() => {
    capturedLogs = [];
    originalEnv = process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL;
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      capturedLogs.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.LOG_LEVEL = originalEnv;
    } else {
      delete process.env.LOG_LEVEL;
    }
  });

  it('should create a logger with default name and level', () => {
    const logger = setupLogger();

    expect(logger.level).toBe('info');
  });

  it('should write JSON lines to stderr with an upper-case level', () => {
    const stdoutSpy = vi.spyOn(process.stdout, 'write');
    const logger = setupLogger('custom-module');

    logger.warn({ resource: 'r-1' }, 'test message');

    expect(capturedLogs).toHaveLength(1);
    const entry: unknown = JSON.parse(capturedLogs[0].trim());
    expect(entry).toMatchObject({ name: 'custom-module', level: 'WARN', resource: 'r-1', msg: 'test message' });
    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it('should respect explicit log level parameter', () => {
    expect(setupLogger('test', 'debug').level).toBe('debug');
  });

  it('should read log level from LOG_LEVEL environment variable', () => {
    process.env.LOG_LEVEL = 'DEBUG';

    expect(setupLogger('env-test').level).toBe('debug');
  });

  it('should fall back to info for an unknown level', () => {
    expect(setupLogger('test', 'verbose').level).toBe('info');
  });

  describe('setLogLevel', () => {
    afterEach(() => {
      setLogLevel('info');
    });

    it('should change the level of loggers created earlier', () => {
      const first = setupLogger('first');
      const second = setupLogger('second', 'error');

      expect(setLogLevel('WARN')).toBe(true);

      expect(first.level).toBe('warn');
      expect(second.level).toBe('warn');
    });

    it('should reject an unknown level and leave loggers untouched', () => {
      const logger = setupLogger('unchanged', 'error');

      expect(setLogLevel('loud')).toBe(false);
      expect(logger.level).toBe('error');
    });
  });
});
