/**
 * Tests for CLI Argument Parser
 */

import { describe, it, expect } from 'vitest';
import { parseArgs } from './arg-parser';
import { DEFAULT_ARGS } from './types';

const argv = (...args: string[]): string[] => ['node', 'llama-completion-mcp', ...args];

describe('parseArgs', () => {
  describe('basic functionality', () => {
    it('should return defaults with no arguments', () => {
      expect(parseArgs(argv())).toEqual({ success: true, args: DEFAULT_ARGS });
    });

    it('should set help flag with --help', () => {
      expect(parseArgs(argv('--help'))).toEqual({ success: true, args: { ...DEFAULT_ARGS, help: true } });
    });

    it('should set help flag with -h', () => {
      expect(parseArgs(argv('-h'))).toEqual({ success: true, args: { ...DEFAULT_ARGS, help: true } });
    });

    it('should set version flag with --version', () => {
      expect(parseArgs(argv('--version'))).toEqual({ success: true, args: { ...DEFAULT_ARGS, version: true } });
    });

    it('should set version flag with -v', () => {
      expect(parseArgs(argv('-v'))).toEqual({ success: true, args: { ...DEFAULT_ARGS, version: true } });
    });
  });

  describe('value options', () => {
    it('should parse --config with space', () => {
      expect(parseArgs(argv('--config', './cfg/local.env'))).toEqual({
        success: true,
        args: { ...DEFAULT_ARGS, configPath: './cfg/local.env' },
      });
    });

    it('should parse --config with equals', () => {
      expect(parseArgs(argv('--config=./cfg/local.env'))).toEqual({
        success: true,
        args: { ...DEFAULT_ARGS, configPath: './cfg/local.env' },
      });
    });

    it('should keep everything after the first equals sign', () => {
      expect(parseArgs(argv('--config=a=b.env'))).toEqual({
        success: true,
        args: { ...DEFAULT_ARGS, configPath: 'a=b.env' },
      });
    });

    it('should parse --port', () => {
      expect(parseArgs(argv('--port', '9090'))).toEqual({ success: true, args: { ...DEFAULT_ARGS, port: 9090 } });
    });

    it('should accept --port in :port form', () => {
      expect(parseArgs(argv('--port=:9191'))).toEqual({ success: true, args: { ...DEFAULT_ARGS, port: 9191 } });
    });

    it('should reject a non-numeric --port', () => {
      expect(parseArgs(argv('--port', 'http'))).toEqual({
        success: false,
        error: 'Error: --port must be an integer between 1 and 65535',
      });
    });

    it('should reject an out-of-range --port', () => {
      expect(parseArgs(argv('--port', '70000'))).toEqual({
        success: false,
        error: 'Error: --port must be an integer between 1 and 65535',
      });
    });

    it('should parse --endpoint', () => {
      expect(parseArgs(argv('--endpoint', '/mcp'))).toEqual({
        success: true,
        args: { ...DEFAULT_ARGS, endpoint: '/mcp' },
      });
    });

    it('should reject an --endpoint without a leading slash', () => {
      expect(parseArgs(argv('--endpoint', 'mcp'))).toEqual({
        success: false,
        error: 'Error: --endpoint must start with "/"',
      });
    });
  });

  describe('boolean flags', () => {
    it('should parse --debug', () => {
      expect(parseArgs(argv('--debug'))).toEqual({ success: true, args: { ...DEFAULT_ARGS, debug: true } });
    });

    it('should parse --json', () => {
      expect(parseArgs(argv('--json'))).toEqual({ success: true, args: { ...DEFAULT_ARGS, jsonOutput: true } });
    });
  });

  describe('error handling', () => {
    it('should reject unknown options', () => {
      expect(parseArgs(argv('--verbose'))).toEqual({ success: false, error: 'Error: Unknown option: --verbose' });
    });

    it('should reject positional arguments', () => {
      expect(parseArgs(argv('hello'))).toEqual({ success: false, error: 'Error: Unexpected argument: hello' });
    });

    it('should require value for --config', () => {
      expect(parseArgs(argv('--config'))).toEqual({ success: false, error: 'Error: --config requires a value' });
    });

    it('should require value for --port=', () => {
      expect(parseArgs(argv('--port='))).toEqual({ success: false, error: 'Error: --port= requires a value' });
    });

    it('should handle missing value when followed by another flag', () => {
      expect(parseArgs(argv('--endpoint', '--debug'))).toEqual({
        success: false,
        error: 'Error: --endpoint requires a value',
      });
    });
  });

  describe('complex scenarios', () => {
    it('should parse multiple options together', () => {
      expect(parseArgs(argv('--config', 'x.env', '--port', '8181', '--endpoint=/c', '--debug', '--json'))).toEqual({
        success: true,
        args: {
          ...DEFAULT_ARGS,
          configPath: 'x.env',
          port: 8181,
          endpoint: '/c',
          debug: true,
          jsonOutput: true,
        },
      });
    });
  });
});
