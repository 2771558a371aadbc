/**
 * Tests for configuration resolution
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DEFAULT_APP_LOG_FILE_NAME,
  formatConfigForDisplay,
  parseHttpPort,
  resolveConfig,
} from './resolve-config';

const BASE_ENV = { LLamaCliPath: '/opt/llama/llama-cli' };

function captureConfigError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseHttpPort', () => {
  it('should accept bare, colon-prefixed and host:port forms', () => {
    expect(parseHttpPort('8080')).toBe(8080);
    expect(parseHttpPort(':8080')).toBe(8080);
    expect(parseHttpPort('0.0.0.0:9000')).toBe(9000);
  });

  it('should reject non-numeric and out-of-range ports', () => {
    expect(parseHttpPort('http')).toBeUndefined();
    expect(parseHttpPort(':0')).toBeUndefined();
    expect(parseHttpPort('65536')).toBeUndefined();
    expect(parseHttpPort('')).toBeUndefined();
  });
});

describe('resolveConfig', () => {
  it('should apply defaults for unset app settings', () => {
    const config = resolveConfig(BASE_ENV);
    expect(config.app).toEqual({
      llamaCliPath: '/opt/llama/llama-cli',
      modelPath: '',
      promptCachePath: '',
      appLogPath: '',
      appLogFileName: DEFAULT_APP_LOG_FILE_NAME,
      httpPort: 8080,
      endpoint: '/mcp-completion',
      timeoutSeconds: 300,
    });
  });

  it('should read app settings from the environment', () => {
    const config = resolveConfig({
      ...BASE_ENV,
      HttpPort: ':9191',
      EndPoint: '/llm',
      TimeOutSeconds: '45',
      AppLogPath: '/var/log/llm',
      AppLogFileName: 'server.log',
    });
    expect(config.app.httpPort).toBe(9191);
    expect(config.app.endpoint).toBe('/llm');
    expect(config.app.timeoutSeconds).toBe(45);
    expect(config.app.appLogPath).toBe('/var/log/llm');
    expect(config.app.appLogFileName).toBe('server.log');
  });

  it('should let CLI overrides win over the environment', () => {
    const config = resolveConfig({ ...BASE_ENV, HttpPort: ':9191', EndPoint: '/llm' }, { httpPort: 7000, endpoint: '/cli' });
    expect(config.app.httpPort).toBe(7000);
    expect(config.app.endpoint).toBe('/cli');
  });

  it('should fall back to the default timeout when it does not parse', () => {
    expect(resolveConfig({ ...BASE_ENV, TimeOutSeconds: 'soon' }).app.timeoutSeconds).toBe(300);
  });

  it('should treat empty values as unset', () => {
    expect(resolveConfig({ ...BASE_ENV, HttpPort: '', EndPoint: '' }).app.endpoint).toBe('/mcp-completion');
  });

  it('should require LLamaCliPath', () => {
    const error = captureConfigError(() => resolveConfig({ LLamaCliPath: '' }));
    expect(error.issues).toEqual(['LLamaCliPath: LLamaCliPath is required']);
  });

  it('should report every invalid setting', () => {
    const error = captureConfigError(() => resolveConfig({ ...BASE_ENV, HttpPort: 'eighty', EndPoint: 'mcp' }));
    expect(error.issues).toEqual([
      'HttpPort: HttpPort "eighty" is not a valid port',
      'EndPoint: EndPoint must start with "/"',
    ]);
    expect(error.message).toBe(
      'Invalid configuration:\n  HttpPort: HttpPort "eighty" is not a valid port\n  EndPoint: EndPoint must start with "/"'
    );
  });

  it('should include the llama-cli options', () => {
    const config = resolveConfig({ ...BASE_ENV, ThreadsCmd: '--threads', ThreadsVal: '6' });
    expect(config.llama.threads).toEqual({ flag: '--threads', value: '6' });
  });

  it('should return a frozen configuration', () => {
    const config = resolveConfig(BASE_ENV);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.app)).toBe(true);
    expect(Object.isFrozen(config.llama.model)).toBe(true);
  });
});

describe('formatConfigForDisplay', () => {
  it('should summarise the listening address and timeout', () => {
    const config = resolveConfig({ ...BASE_ENV, TimeOutSeconds: '0', ModelFullPathVal: '/models/a.gguf' });
    expect(formatConfigForDisplay(config)).toBe(
      'llama-cli: /opt/llama/llama-cli, listen: :8080/mcp-completion, timeout: 300s, model: /models/a.gguf'
    );
  });
});
