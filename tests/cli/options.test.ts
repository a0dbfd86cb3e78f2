import { describe, it, expect, afterEach } from 'vitest';
import { ConfigError } from '@ledger/types';
import {
  envBool,
  generateEnvTemplate,
  parseAmountFormat,
  parseMinMatch,
  parseThreshold,
} from '../../apps/cli/src/options.js';

describe('CLI option parsing', () => {
  it('should default and validate --threshold', () => {
    expect(parseThreshold(undefined)).toBe(0.6);
    expect(parseThreshold('0.75')).toBe(0.75);
    expect(parseThreshold('1')).toBe(1);
    expect(() => parseThreshold('0')).toThrow(ConfigError);
    expect(() => parseThreshold('high')).toThrow('--threshold must be a number in (0, 1], got "high"');
  });

  it('should default and validate --min-match', () => {
    expect(parseMinMatch(undefined)).toBe(4);
    expect(parseMinMatch('3')).toBe(3);
    expect(() => parseMinMatch('2.5')).toThrow('--min-match must be a positive integer, got "2.5"');
    expect(() => parseMinMatch('0')).toThrow(ConfigError);
  });

  it('should accept only known amount formats', () => {
    expect(parseAmountFormat(undefined)).toBe('decimal');
    expect(parseAmountFormat('brl')).toBe('brl');
    expect(() => parseAmountFormat('usd')).toThrow('--amount-format must be one of decimal, brl, got "usd"');
  });
});

describe('envBool', () => {
  const key = 'LEDGER_TEST_FLAG';

  afterEach(() => {
    delete process.env[key];
  });

  it('should read true and 1 as true', () => {
    process.env[key] = 'true';
    expect(envBool(key, false)).toBe(true);
    process.env[key] = '1';
    expect(envBool(key, false)).toBe(true);
    process.env[key] = 'no';
    expect(envBool(key, true)).toBe(false);
  });

  it('should fall back to the default when unset or empty', () => {
    expect(envBool(key, true)).toBe(true);
    process.env[key] = '';
    expect(envBool(key, false)).toBe(false);
  });
});

describe('generateEnvTemplate', () => {
  it('should list the Sheets settings with matching defaults', () => {
    const lines = generateEnvTemplate().split('\n');
    expect(lines[0]).toBe('# Statement ledger environment variables');
    expect(lines).toContain('SPREADSHEET_ID=');
    expect(lines).toContain('GOOGLE_SHEETS_CREDENTIALS=./credentials.json');
    expect(lines).toContain('# LEDGER_THRESHOLD=0.6');
    expect(lines).toContain('# LEDGER_MIN_MATCH=4');
  });
});
