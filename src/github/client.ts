import {
  DEFAULTS,
  GITHUB_ACCEPT,
  GITHUB_API_BASE,
  GITHUB_API_VERSION,
  USER_AGENT,
} from '../config/defaults.js';
import { GitHubError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { classifyStatus } from './parser.js';
import type { FileStatusMap, PRIdentifier, PullRequestFile } from './types.js';

function isPullRequestFile(value: unknown): value is PullRequestFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    'filename' in value &&
    'status' in value &&
    typeof value.filename === 'string' &&
    typeof value.status === 'string'
  );
}

export class GitHubClient {
  private token: string;

  constructor(token: string) {
    this.token = token;
  }

  /**
   * Build headers for GitHub API requests
   */
  private getHeaders(): Record<string, string> {
    return {
      Accept: GITHUB_ACCEPT,
      Authorization: `Bearer ${this.token}`,
      'User-Agent': USER_AGENT,
      'X-GitHub-Api-Version': GITHUB_API_VERSION,
    };
  }

  /**
   * Perform a single GET and return the raw body.
   * Anything other than 200 is an error; nothing is retried.
   */
  private async request(endpoint: string): Promise<string> {
    const url = `${GITHUB_API_BASE}${endpoint}`;

    let response: Response;
    try {
      response = await fetch(url, { headers: this.getHeaders() });
    } catch (error) {
      throw new GitHubError(
        `GitHub API request failed: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    if (response.status !== 200) {
      throw new GitHubError(
        `Unexpected response status: ${response.status} ${response.statusText}`.trimEnd(),
        response.status
      );
    }

    return response.text();
  }

  private async requestJson(endpoint: string): Promise<unknown> {
    const body = await this.request(endpoint);

    try {
      const data: unknown = JSON.parse(body);
      return data;
    } catch (error) {
      throw new GitHubError(
        `Failed to decode response: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  /**
   * Read `changed_files` from the PR metadata.
   * A missing or non-numeric field counts as zero.
   */
  async getChangedFilesCount(pr: PRIdentifier): Promise<number> {
    const data = await this.requestJson(`/repos/${pr.repo}/pulls/${pr.number}`);

    if (
      typeof data === 'object' &&
      data !== null &&
      'changed_files' in data &&
      typeof data.changed_files === 'number' &&
      Number.isFinite(data.changed_files)
    ) {
      return Math.trunc(data.changed_files);
    }

    logger.warn(`No changed files in pull request ${pr.number}`);
    return 0;
  }

  /**
   * List every changed or deleted file in a PR.
   * Pages are fetched until one comes back empty.
   */
  async listFiles(pr: PRIdentifier): Promise<FileStatusMap> {
    const files: FileStatusMap = new Map();
    let page = 1;

    while (true) {
      const data = await this.requestJson(
        `/repos/${pr.repo}/pulls/${pr.number}/files?page=${page}&per_page=${DEFAULTS.perPage}`
      );

      if (!Array.isArray(data)) {
        throw new GitHubError(`Failed to decode response: expected an array on page ${page}`);
      }

      if (data.length === 0) {
        break;
      }

      for (const entry of data) {
        if (!isPullRequestFile(entry)) {
          logger.debug(`Skipping malformed file entry in PR ${pr.number}`);
          continue;
        }

        const classification = classifyStatus(entry.status);
        if (classification) {
          files.set(entry.filename, classification);
        }
        logger.debug(`File in PR ${pr.number}: ${entry.filename} (Status: ${entry.status})`);
      }

      page++;
    }

    return files;
  }
}

export function createGitHubClient(token: string): GitHubClient {
  return new GitHubClient(token);
}
