import { logger, setLogLevel } from './utils/logger.js';
import type { LogLevel } from './utils/logger.js';
import { ConfigError } from './utils/errors.js';
import { DEFAULTS } from './config/defaults.js';
import { createGitHubClient } from './github/client.js';
import type { GitHubClient } from './github/client.js';
import { OutputWriter } from './output/writer.js';
import { PullRequestProcessor } from './pulls/processor.js';
import { mergeBuckets } from './pulls/aggregate.js';
import type { AggregateBucket, FileBucket } from './github/types.js';

export interface PullRequestFilesConfig {
  /** Full repository name, `owner/name` */
  repo: string;
  /** Pull request numbers to process */
  pulls: number[];
  /** GitHub API token */
  token: string;
  /** Directory for output files */
  outputDir?: string;
  /** PRs with more changed files than this are skipped */
  maxChangedFiles?: number;
  /** Log level */
  logLevel?: LogLevel;
}

export interface RunResult {
  aggregate: AggregateBucket;
  /** PRs whose files were fetched, in completion order */
  processed: number[];
  /** PRs skipped because of an error or the change limit */
  skipped: number[];
  /** Paths of the aggregate files */
  outputFiles: string[];
}

export class PullRequestFiles {
  private config: Required<Pick<PullRequestFilesConfig, 'outputDir' | 'maxChangedFiles'>> &
    PullRequestFilesConfig;

  private github: GitHubClient;
  private writer: OutputWriter;
  private processor: PullRequestProcessor;

  constructor(config: PullRequestFilesConfig) {
    if (!config.repo) {
      throw new ConfigError('repo is required');
    }
    if (config.pulls.length === 0) {
      throw new ConfigError('at least one pull request is required');
    }
    if (!config.token) {
      throw new ConfigError('token is required');
    }

    this.config = {
      ...config,
      outputDir: config.outputDir ?? DEFAULTS.outputDir,
      maxChangedFiles: config.maxChangedFiles ?? DEFAULTS.maxChangedFiles,
    };

    if (config.logLevel) {
      setLogLevel(config.logLevel);
    }

    this.github = createGitHubClient(config.token);
    this.writer = new OutputWriter(this.config.outputDir);
    this.processor = new PullRequestProcessor(this.github, this.writer, {
      repo: this.config.repo,
      maxChangedFiles: this.config.maxChangedFiles,
    });
  }

  /**
   * Process every PR concurrently, then write the aggregate files.
   * Throws only for the output directory and the aggregate writes;
   * individual PR failures are logged and skipped.
   */
  async run(): Promise<RunResult> {
    this.writer.ensureOutputDir();
    logger.debug(`Repository: ${this.config.repo}, Pull Requests: ${this.config.pulls.join(', ')}`);

    // Results land in the order processors finish
    const results: Array<{ prNumber: number; bucket: FileBucket | null }> = [];

    await Promise.all(
      this.config.pulls.map((prNumber) =>
        this.processor.process(prNumber).then((bucket) => {
          results.push({ prNumber, bucket });
        })
      )
    );

    const aggregate = mergeBuckets(results.map((result) => result.bucket));
    const outputFiles = this.writer.writeAggregate(aggregate);
    logger.info('All files saved to all_all.txt, all_chg.txt, and all_del.txt');

    return {
      aggregate,
      processed: results.filter((result) => result.bucket !== null).map((result) => result.prNumber),
      skipped: results.filter((result) => result.bucket === null).map((result) => result.prNumber),
      outputFiles,
    };
  }

  getOutputWriter(): OutputWriter {
    return this.writer;
  }
}

// Re-export types
export type {
  PRIdentifier,
  PullRequestFile,
  FileClassification,
  FileStatusMap,
  FileBucket,
  AggregateBucket,
} from './github/types.js';
export type { BucketSuffix } from './config/defaults.js';
export type { LogLevel } from './utils/logger.js';

// Re-export utilities
export { logger, setLogLevel } from './utils/logger.js';
export { GitHubClient, createGitHubClient } from './github/client.js';
export { classifyStatus, partitionFiles, buildBucket } from './github/parser.js';
export { OutputWriter, writeFileList } from './output/writer.js';
export { PullRequestProcessor } from './pulls/processor.js';
export { mergeBuckets, appendBucket, createAggregateBucket } from './pulls/aggregate.js';
export { parsePullRequestNumbers, findMissingOptions } from './config/options.js';
export { PrFilesError, GitHubError, ConfigError, OutputError } from './utils/errors.js';
