import { Logger } from '@waymark/logger';
import { z } from 'zod';

import { DEFAULT_SEPARATOR, LOGGER_CONTEXT } from '../constants';
import { RouterConfigError } from '../errors/errors';
import type { NormalizedPathTrieOptions, PathTrieOptions } from '../types';

const DUPLICATE_PARAM_POLICIES = ['error', 'warn', 'silent'] as const;

const separatorSchema = z.string().refine(value => [...value].length === 1, {
  message: 'must be exactly one character',
});

const trieOptionsSchema = z.object({
  separator: separatorSchema.default(DEFAULT_SEPARATOR),
  caseSensitive: z.boolean().default(true),
  duplicateParamPolicy: z.enum(DUPLICATE_PARAM_POLICIES).default('warn'),
  logger: z.instanceof(Logger).optional(),
});

const envSchema = z
  .object({
    WAYMARK_ROUTER_SEPARATOR: separatorSchema.optional(),
    WAYMARK_ROUTER_CASE_SENSITIVE: z
      .enum(['true', 'false', '1', '0'])
      .transform(value => value === 'true' || value === '1')
      .optional(),
    WAYMARK_ROUTER_DUPLICATE_PARAMS: z.enum(DUPLICATE_PARAM_POLICIES).optional(),
  })
  .transform(raw => ({
    separator: raw.WAYMARK_ROUTER_SEPARATOR,
    caseSensitive: raw.WAYMARK_ROUTER_CASE_SENSITIVE,
    duplicateParamPolicy: raw.WAYMARK_ROUTER_DUPLICATE_PARAMS,
  }));

/**
 * Validates user options and fills in defaults. A missing logger becomes a
 * `Logger` scoped to the `PathTrie` context.
 */
export function normalizeTrieOptions(input: PathTrieOptions = {}): NormalizedPathTrieOptions {
  const result = trieOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new RouterConfigError(formatIssues(result.error));
  }

  return {
    separator: result.data.separator,
    caseSensitive: result.data.caseSensitive,
    duplicateParamPolicy: result.data.duplicateParamPolicy,
    logger: result.data.logger ?? new Logger(LOGGER_CONTEXT),
  };
}

/**
 * Reads router options from `WAYMARK_ROUTER_*` variables. Unset variables
 * stay undefined so explicit options can be spread over the result.
 */
export function readTrieOptionsFromEnv(source: Record<string, string | undefined> = process.env): PathTrieOptions {
  const result = envSchema.safeParse({
    WAYMARK_ROUTER_SEPARATOR: source.WAYMARK_ROUTER_SEPARATOR,
    WAYMARK_ROUTER_CASE_SENSITIVE: source.WAYMARK_ROUTER_CASE_SENSITIVE,
    WAYMARK_ROUTER_DUPLICATE_PARAMS: source.WAYMARK_ROUTER_DUPLICATE_PARAMS,
  });
  if (!result.success) {
    throw new RouterConfigError(formatIssues(result.error));
  }

  return result.data;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}
