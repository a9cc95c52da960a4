import { describe, it, expect } from 'vitest';
import { findMissingOptions, parsePullRequestNumbers, resolveOptions } from '../../src/config/options.js';
import { ConfigError } from '../../src/utils/errors.js';

describe('findMissingOptions', () => {
  it('returns nothing when every required flag is set', () => {
    expect(
      findMissingOptions({ repo: 'acme/widgets', pulls: '1,2', token: 'test-token', outputDir: '.' })
    ).toEqual([]);
  });

  it('lists every missing flag', () => {
    expect(findMissingOptions({ outputDir: '.' })).toEqual(['--repo', '--pulls', '--token']);
  });

  it('treats empty strings as missing', () => {
    expect(findMissingOptions({ repo: '', pulls: '7', token: '', outputDir: '.' })).toEqual([
      '--repo',
      '--token',
    ]);
  });
});

describe('parsePullRequestNumbers', () => {
  it('parses a single number', () => {
    expect(parsePullRequestNumbers('42')).toEqual([42]);
  });

  it('parses a comma-separated list in order', () => {
    expect(parsePullRequestNumbers('3,1,2')).toEqual([3, 1, 2]);
  });

  it('accepts a leading sign and leading zeros', () => {
    expect(parsePullRequestNumbers('+7,007')).toEqual([7, 7]);
  });

  it('rejects a non-numeric entry', () => {
    expect(() => parsePullRequestNumbers('1,abc')).toThrow('Invalid pull request number: abc');
  });

  it('rejects entries with whitespace', () => {
    expect(() => parsePullRequestNumbers('1, 2')).toThrow('Invalid pull request number:  2');
  });

  it('rejects an empty entry', () => {
    expect(() => parsePullRequestNumbers('1,,2')).toThrow(ConfigError);
  });

  it('rejects numbers beyond the safe integer range', () => {
    expect(() => parsePullRequestNumbers('9007199254740993')).toThrow(
      'Invalid pull request number: 9007199254740993'
    );
    expect(() => parsePullRequestNumbers('1,99999999999999999999')).toThrow(
      'Invalid pull request number: 99999999999999999999'
    );
  });

  it('accepts the largest safe integer', () => {
    expect(parsePullRequestNumbers('9007199254740991')).toEqual([9007199254740991]);
  });

  it('rejects decimals', () => {
    expect(() => parsePullRequestNumbers('1.5')).toThrow('Invalid pull request number: 1.5');
  });
});

describe('resolveOptions', () => {
  it('parses the PR list and keeps the other flags', () => {
    expect(
      resolveOptions({ repo: 'acme/widgets', pulls: '4,2', token: 'test-token', outputDir: 'out' })
    ).toEqual({ repo: 'acme/widgets', pulls: [4, 2], token: 'test-token', outputDir: 'out' });
  });

  it('names the missing flags', () => {
    expect(() => resolveOptions({ pulls: '1', outputDir: '.' })).toThrow(
      'Missing required flags: --repo, --token'
    );
  });

  it('throws a ConfigError for an invalid PR list before anything runs', () => {
    expect(() =>
      resolveOptions({ repo: 'acme/widgets', pulls: '1,x', token: 'test-token', outputDir: '.' })
    ).toThrow(ConfigError);
  });
});
