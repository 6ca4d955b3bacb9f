import { ConfigError, type SearchOptions } from '@wordhop/core';

export type OutputFormat = 'text' | 'json';
export type SortOrder = 'length' | 'none';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  maxDepth?: string | number;
  maxLength?: string | number;
  out?: string;
  sort?: string;
  progress?: boolean;
  printMetrics?: boolean;
  pairs?: string;
  log?: string;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

function parseIntegerFlag(flag: string, value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const num = typeof value === 'number' ? value : Number(String(value).trim());
  if (!Number.isInteger(num)) {
    throw new ConfigError({
      message: `Invalid ${flag} value "${String(value)}". Expected an integer.`,
      context: { setting: flag, value },
    });
  }
  return num;
}

/**
 * Map search flags onto SearchOptions. Range checks happen in
 * resolveSearchOptions, which knows the endpoint lengths.
 */
export function parseSearchOptions(
  options: Pick<CliOptions, 'maxDepth' | 'maxLength'>
): Pick<SearchOptions, 'maxDepth' | 'maxLength'> {
  const searchOptions: Pick<SearchOptions, 'maxDepth' | 'maxLength'> = {};

  const maxDepth = parseIntegerFlag('--max-depth', options.maxDepth);
  if (maxDepth !== undefined) searchOptions.maxDepth = maxDepth;

  const maxLength = parseIntegerFlag('--max-length', options.maxLength);
  if (maxLength !== undefined) searchOptions.maxLength = maxLength;

  return searchOptions;
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'text';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'text' || raw === 'json') {
    return raw;
  }
  throw new ConfigError({
    message: `Invalid --out value "${String(value)}". Supported formats are "text" and "json".`,
    context: { setting: '--out', value },
  });
}

export function resolveSortOrder(value: unknown): SortOrder {
  if (value === undefined || value === null || value === '') {
    return 'length';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'length' || raw === 'none') {
    return raw;
  }
  throw new ConfigError({
    message: `Invalid --sort value "${String(value)}". Expected "length" or "none".`,
    context: { setting: '--sort', value },
  });
}
