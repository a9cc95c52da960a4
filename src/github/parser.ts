import type { FileBucket, FileClassification, FileStatusMap } from './types.js';

/**
 * Map an upstream file status to a classification.
 * Statuses other than added, modified and deleted are not tracked.
 */
export function classifyStatus(status: string): FileClassification | null {
  switch (status) {
    case 'modified':
    case 'added':
      return 'changed';
    case 'deleted':
      return 'deleted';
    default:
      return null;
  }
}

export interface PartitionedFiles {
  changed: string[];
  deleted: string[];
  all: string[];
}

/**
 * Split a file map into changed, deleted and all, keeping map order
 */
export function partitionFiles(files: FileStatusMap): PartitionedFiles {
  const changed: string[] = [];
  const deleted: string[] = [];
  const all: string[] = [];

  for (const [file, classification] of files) {
    if (classification === 'changed') {
      changed.push(file);
    } else {
      deleted.push(file);
    }
    all.push(file);
  }

  return { changed, deleted, all };
}

/**
 * Build the per-PR bucket. `chg` and `del` are only present when non-empty.
 */
export function buildBucket(files: FileStatusMap): FileBucket {
  const { changed, deleted, all } = partitionFiles(files);
  const bucket: FileBucket = { all };

  if (changed.length > 0) {
    bucket.chg = changed;
  }
  if (deleted.length > 0) {
    bucket.del = deleted;
  }

  return bucket;
}
