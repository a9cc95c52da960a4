import { ConfigError } from '../utils/errors.js';

export interface CliOptions {
  repo?: string;
  pulls?: string;
  token?: string;
  outputDir: string;
}

/**
 * Names of the required flags that were not given (or given empty)
 */
export function findMissingOptions(options: CliOptions): string[] {
  const missing: string[] = [];

  if (!options.repo) missing.push('--repo');
  if (!options.pulls) missing.push('--pulls');
  if (!options.token) missing.push('--token');

  return missing;
}

const PULL_NUMBER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a comma-separated list of pull request numbers.
 * Every entry must be a plain decimal integer; whitespace is not trimmed.
 */
export function parsePullRequestNumbers(list: string): number[] {
  return list.split(',').map((entry) => {
    if (!PULL_NUMBER_PATTERN.test(entry)) {
      throw new ConfigError(`Invalid pull request number: ${entry}`);
    }
    const value = parseInt(entry, 10);
    if (!Number.isSafeInteger(value)) {
      throw new ConfigError(`Invalid pull request number: ${entry}`);
    }
    return value;
  });
}

export interface ResolvedOptions {
  repo: string;
  pulls: number[];
  token: string;
  outputDir: string;
}

/**
 * Check the required flags and parse the PR list
 */
export function resolveOptions(options: CliOptions): ResolvedOptions {
  const missing = findMissingOptions(options);
  if (missing.length > 0 || !options.repo || !options.pulls || !options.token) {
    throw new ConfigError(`Missing required flags: ${missing.join(', ')}`);
  }

  return {
    repo: options.repo,
    pulls: parsePullRequestNumbers(options.pulls),
    token: options.token,
    outputDir: options.outputDir,
  };
}
