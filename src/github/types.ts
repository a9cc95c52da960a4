export interface PRIdentifier {
  /** Full repository name, `owner/name` */
  repo: string;
  number: number;
}

/** Entry of the `pulls/{n}/files` listing, reduced to what is read */
export interface PullRequestFile {
  filename: string;
  status: string;
}

export type FileClassification = 'changed' | 'deleted';

/** File path to classification, in first-seen order */
export type FileStatusMap = Map<string, FileClassification>;

export interface FileBucket {
  all: string[];
  chg?: string[];
  del?: string[];
}

export interface AggregateBucket {
  all: string[];
  chg: string[];
  del: string[];
}
