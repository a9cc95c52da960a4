import { DEFAULTS } from '../config/defaults.js';
import { buildBucket } from '../github/parser.js';
import { logger } from '../utils/logger.js';
import type { GitHubClient } from '../github/client.js';
import type { FileBucket } from '../github/types.js';
import type { OutputWriter } from '../output/writer.js';

export interface ProcessorOptions {
  /** Full repository name, `owner/name` */
  repo: string;
  /** PRs reporting more changed files than this are skipped */
  maxChangedFiles?: number;
}

export class PullRequestProcessor {
  private repo: string;
  private maxChangedFiles: number;

  constructor(
    private github: GitHubClient,
    private writer: OutputWriter,
    options: ProcessorOptions
  ) {
    this.repo = options.repo;
    this.maxChangedFiles = options.maxChangedFiles ?? DEFAULTS.maxChangedFiles;
  }

  /**
   * Fetch, classify and write the files of one PR.
   * Never rejects: a PR that cannot be processed resolves to null
   * and leaves no files behind.
   */
  async process(prNumber: number): Promise<FileBucket | null> {
    logger.info(`Processing pull request ${prNumber}`);
    const pr = { repo: this.repo, number: prNumber };

    let count: number;
    try {
      count = await this.github.getChangedFilesCount(pr);
    } catch (error) {
      logger.error(`Failed to process PR ${prNumber}: ${errorMessage(error)}`);
      return null;
    }

    if (count > this.maxChangedFiles) {
      logger.error(
        `Failed to process PR ${prNumber}: ${count} changed files exceeds the limit of ${this.maxChangedFiles}`
      );
      return null;
    }

    let bucket: FileBucket;
    try {
      bucket = buildBucket(await this.github.listFiles(pr));
    } catch (error) {
      logger.error(`Failed to get files in PR ${prNumber}: ${errorMessage(error)}`);
      return null;
    }

    this.writer.writePullRequestBucket(prNumber, bucket);
    logger.info(`Files in pull request ${prNumber} saved to ${this.writer.getOutputDir()}`);

    return bucket;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
