/**
 * Tests for environment value helpers
 */

import { describe, it, expect } from 'vitest';
import { getEnvBool, getEnvInt, getEnvString } from './env-values';

describe('getEnvString', () => {
  it('should return the value or an empty string', () => {
    expect(getEnvString({ A: 'x' }, 'A')).toBe('x');
    expect(getEnvString({}, 'A')).toBe('');
  });
});

describe('getEnvBool', () => {
  it.each(['1', 't', 'T', 'TRUE', 'true', 'True'])('should read %s as true', (value) => {
    expect(getEnvBool({ FLAG: value }, 'FLAG')).toBe(true);
  });

  it.each(['0', 'f', 'F', 'FALSE', 'false', 'False'])('should read %s as false', (value) => {
    expect(getEnvBool({ FLAG: value }, 'FLAG', true)).toBe(false);
  });

  it('should use the fallback for unset, empty and unrecognised values', () => {
    expect(getEnvBool({}, 'FLAG')).toBe(false);
    expect(getEnvBool({ FLAG: '' }, 'FLAG', true)).toBe(true);
    expect(getEnvBool({ FLAG: 'yes' }, 'FLAG')).toBe(false);
    expect(getEnvBool({ FLAG: 'tRuE' }, 'FLAG')).toBe(false);
  });
});

describe('getEnvInt', () => {
  it('should parse integers', () => {
    expect(getEnvInt({ N: '120' }, 'N', 300)).toBe(120);
    expect(getEnvInt({ N: '-5' }, 'N', 300)).toBe(-5);
  });

  it('should use the fallback for anything else', () => {
    expect(getEnvInt({}, 'N', 300)).toBe(300);
    expect(getEnvInt({ N: '12s' }, 'N', 300)).toBe(300);
    expect(getEnvInt({ N: '1.5' }, 'N', 300)).toBe(300);
    expect(getEnvInt({ N: '99999999999999999999' }, 'N', 300)).toBe(300);
  });
});
