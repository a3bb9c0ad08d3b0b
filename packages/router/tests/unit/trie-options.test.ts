import { Logger } from '@waymark/logger';
import { describe, expect, it } from 'vitest';

import { RouterConfigError } from '../../src/errors/errors';
import { normalizeTrieOptions, readTrieOptionsFromEnv } from '../../src/options/trie-options';

describe('normalizeTrieOptions', () => {
  it('should fill in defaults', () => {
    const options = normalizeTrieOptions();

    expect(options.separator).toBe('/');
    expect(options.caseSensitive).toBe(true);
    expect(options.duplicateParamPolicy).toBe('warn');
    expect(options.logger).toBeInstanceOf(Logger);
    expect(options.logger.context).toBe('PathTrie');
  });

  it('should keep explicit values and the given logger', () => {
    const logger = new Logger('Custom');
    const options = normalizeTrieOptions({
      separator: '.',
      caseSensitive: false,
      duplicateParamPolicy: 'error',
      logger,
    });

    expect(options).toEqual({ separator: '.', caseSensitive: false, duplicateParamPolicy: 'error', logger });
    expect(options.logger).toBe(logger);
  });

  it('should reject a multi-character separator', () => {
    expect(() => normalizeTrieOptions({ separator: '::' })).toThrow(RouterConfigError);

    try {
      normalizeTrieOptions({ separator: '::' });
    } catch (error) {
      expect(error).toBeInstanceOf(RouterConfigError);
      if (error instanceof RouterConfigError) {
        expect(error.issues).toEqual(['separator: must be exactly one character']);
        expect(error.message).toBe('Invalid router options: separator: must be exactly one character');
      }
    }
  });
});

describe('readTrieOptionsFromEnv', () => {
  it('should leave unset variables undefined', () => {
    expect(readTrieOptionsFromEnv({})).toEqual({
      separator: undefined,
      caseSensitive: undefined,
      duplicateParamPolicy: undefined,
    });
  });

  it('should read every supported variable', () => {
    expect(
      readTrieOptionsFromEnv({
        WAYMARK_ROUTER_SEPARATOR: ':',
        WAYMARK_ROUTER_CASE_SENSITIVE: '0',
        WAYMARK_ROUTER_DUPLICATE_PARAMS: 'silent',
        UNRELATED: 'ignored',
      }),
    ).toEqual({ separator: ':', caseSensitive: false, duplicateParamPolicy: 'silent' });
  });

  it('should accept true and 1 as case-sensitive', () => {
    expect(readTrieOptionsFromEnv({ WAYMARK_ROUTER_CASE_SENSITIVE: 'true' }).caseSensitive).toBe(true);
    expect(readTrieOptionsFromEnv({ WAYMARK_ROUTER_CASE_SENSITIVE: '1' }).caseSensitive).toBe(true);
  });

  it('should name the offending variable in the error', () => {
    try {
      readTrieOptionsFromEnv({ WAYMARK_ROUTER_DUPLICATE_PARAMS: 'loud' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RouterConfigError);
      if (error instanceof RouterConfigError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]?.startsWith('WAYMARK_ROUTER_DUPLICATE_PARAMS: ')).toBe(true);
      }
    }
  });
});
