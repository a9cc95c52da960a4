export const DEFAULTS = {
  outputDir: '.',
  perPage: 100,
  maxChangedFiles: 3000,
} as const;

export const GITHUB_API_BASE = 'https://api.github.com';
export const GITHUB_ACCEPT = 'application/vnd.github+json';
export const GITHUB_API_VERSION = '2022-11-28';
export const USER_AGENT = 'pr-files/0.1.0';

export const BUCKET_SUFFIXES = ['all', 'chg', 'del'] as const;
export type BucketSuffix = (typeof BUCKET_SUFFIXES)[number];
