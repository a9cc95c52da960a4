import * as fs from 'node:fs';
import * as path from 'node:path';
import { BUCKET_SUFFIXES, DEFAULTS } from '../config/defaults.js';
import type { BucketSuffix } from '../config/defaults.js';
import { OutputError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { AggregateBucket, FileBucket } from '../github/types.js';

export class OutputWriter {
  private outputDir: string;

  constructor(outputDir?: string) {
    this.outputDir = outputDir ?? DEFAULTS.outputDir;
  }

  getOutputDir(): string {
    return this.outputDir;
  }

  /**
   * Create the output directory (and parents) if missing
   */
  ensureOutputDir(): void {
    if (this.outputDir === '') {
      throw new OutputError('Failed to create output directory: path is empty', this.outputDir);
    }

    try {
      fs.mkdirSync(this.outputDir, { recursive: true });
    } catch (error) {
      throw new OutputError(
        `Failed to create output directory: ${error instanceof Error ? error.message : String(error)}`,
        this.outputDir
      );
    }
  }

  getPullRequestFilePath(prNumber: number, suffix: BucketSuffix): string {
    return path.join(this.outputDir, `${prNumber}_${suffix}.txt`);
  }

  getAggregateFilePath(suffix: BucketSuffix): string {
    return path.join(this.outputDir, `all_${suffix}.txt`);
  }

  /**
   * Write one file per bucket entry. A failed write is logged and skipped.
   * Returns the paths that were written.
   */
  writePullRequestBucket(prNumber: number, bucket: FileBucket): string[] {
    const written: string[] = [];

    for (const suffix of BUCKET_SUFFIXES) {
      const files = bucket[suffix];
      if (!files) continue;

      const filePath = this.getPullRequestFilePath(prNumber, suffix);
      try {
        writeFileList(filePath, files);
        written.push(filePath);
      } catch (error) {
        logger.error(
          `Failed to write file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    return written;
  }

  /**
   * Write `all_all.txt`, `all_chg.txt` and `all_del.txt`, empty or not
   */
  writeAggregate(bucket: AggregateBucket): string[] {
    return BUCKET_SUFFIXES.map((suffix) => {
      const filePath = this.getAggregateFilePath(suffix);
      try {
        writeFileList(filePath, bucket[suffix]);
      } catch (error) {
        throw new OutputError(
          `Failed to create all_${suffix}.txt: ${error instanceof Error ? error.message : String(error)}`,
          filePath
        );
      }
      return filePath;
    });
  }
}

/**
 * One path per line, no trailing newline
 */
export function writeFileList(filePath: string, files: string[]): void {
  fs.writeFileSync(filePath, files.join('\n'), 'utf-8');
}
