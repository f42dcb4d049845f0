import { ConfigValidationError, loadConfig } from '../../../src/config';
import { EnvSchema, getEffectiveNodeEnv, parseEnv } from '../../../src/config/env';

describe('config', () => {
  describe('parseEnv', () => {
    it('applies defaults to an empty environment', () => {
      const result = parseEnv({});
      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        NODE_ENV: 'development',
        LOG_LEVEL: 'info',
        LOG_FORMAT: 'pretty',
        GOMOKU_DEFAULT_BOARD_SIZE: 7,
        GOMOKU_AUDIT_INDEX: false,
      });
    });

    it('coerces board size and flags', () => {
      const result = parseEnv({
        GOMOKU_DEFAULT_BOARD_SIZE: '15',
        GOMOKU_AUDIT_INDEX: 'TRUE',
        LOG_LEVEL: 'debug',
        LOG_FORMAT: 'json',
        LOG_FILE: 'logs/engine.log',
      });
      expect(result.success).toBe(true);
      expect(result.data?.GOMOKU_DEFAULT_BOARD_SIZE).toBe(15);
      expect(result.data?.GOMOKU_AUDIT_INDEX).toBe(true);
      expect(result.data?.LOG_LEVEL).toBe('debug');
      expect(result.data?.LOG_FILE).toBe('logs/engine.log');
    });

    it('treats anything but 1/true/yes as a disabled flag', () => {
      expect(EnvSchema.parse({ GOMOKU_AUDIT_INDEX: '0' }).GOMOKU_AUDIT_INDEX).toBe(false);
      expect(EnvSchema.parse({ GOMOKU_AUDIT_INDEX: 'off' }).GOMOKU_AUDIT_INDEX).toBe(false);
      expect(EnvSchema.parse({ GOMOKU_AUDIT_INDEX: 'yes' }).GOMOKU_AUDIT_INDEX).toBe(true);
      expect(EnvSchema.parse({ GOMOKU_AUDIT_INDEX: ' 1 ' }).GOMOKU_AUDIT_INDEX).toBe(true);
    });

    it('reports each invalid variable with its path', () => {
      const result = parseEnv({ GOMOKU_DEFAULT_BOARD_SIZE: '40', LOG_LEVEL: 'loud' });
      expect(result.success).toBe(false);
      expect(result.data).toBeUndefined();
      expect(result.errors?.map((e) => e.path).sort()).toEqual([
        'GOMOKU_DEFAULT_BOARD_SIZE',
        'LOG_LEVEL',
      ]);
    });

    it('rejects a board size below the minimum', () => {
      expect(parseEnv({ GOMOKU_DEFAULT_BOARD_SIZE: '1' }).success).toBe(false);
      expect(parseEnv({ GOMOKU_DEFAULT_BOARD_SIZE: 'nine' }).success).toBe(false);
    });
  });

  describe('loadConfig', () => {
    it('builds a frozen config', () => {
      const config = loadConfig({ GOMOKU_DEFAULT_BOARD_SIZE: '11', LOG_FILE: '  ' });
      expect(config.board).toEqual({ defaultSize: 11, auditIndex: false });
      expect(config.logging).toEqual({ level: 'info', format: 'pretty', file: undefined });
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.board)).toBe(true);
    });

    it('treats the Jest runtime as the test environment', () => {
      const config = loadConfig({ NODE_ENV: 'production' });
      expect(config.nodeEnv).toBe('test');
      expect(config.isTest).toBe(true);
      expect(config.isProduction).toBe(false);
      expect(getEffectiveNodeEnv({ NODE_ENV: 'development' })).toBe('test');
    });

    it('throws with every problem listed', () => {
      expect(() => loadConfig({ LOG_FORMAT: 'xml' })).toThrow(ConfigValidationError);
      try {
        loadConfig({ LOG_FORMAT: 'xml', NODE_ENV: 'staging' });
        throw new Error('expected loadConfig to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        const problems = (error as ConfigValidationError).problems;
        expect(problems).toHaveLength(2);
        expect(problems.some((p) => p.startsWith('LOG_FORMAT: '))).toBe(true);
        expect(problems.some((p) => p.startsWith('NODE_ENV: '))).toBe(true);
      }
    });
  });

  describe('.env loading', () => {
    const originalNodeEnv = process.env.NODE_ENV;

    afterEach(() => {
      process.env.NODE_ENV = originalNodeEnv;
      jest.resetModules();
    });

    function importConfigWithDotenvSpy(): jest.Mock {
      const dotenvConfig = jest.fn();
      jest.isolateModules(() => {
        jest.doMock('dotenv', () => ({ __esModule: true, default: { config: dotenvConfig } }));
        require('../../../src/config');
      });
      return dotenvConfig;
    }

    it('does not read .env in the test environment', () => {
      process.env.NODE_ENV = 'test';
      expect(importConfigWithDotenvSpy()).not.toHaveBeenCalled();
    });

    it('reads .env outside the test environment', () => {
      process.env.NODE_ENV = 'development';
      expect(importConfigWithDotenvSpy()).toHaveBeenCalledTimes(1);
    });
  });
});
