export class PrFilesError extends Error {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
    this.name = 'PrFilesError';
  }
}

export class GitHubError extends PrFilesError {
  constructor(
    message: string,
    public statusCode?: number
  ) {
    super(message, 'GITHUB_ERROR');
    this.name = 'GitHubError';
  }
}

export class ConfigError extends PrFilesError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class OutputError extends PrFilesError {
  constructor(
    message: string,
    public filePath: string
  ) {
    super(message, 'OUTPUT_ERROR');
    this.name = 'OutputError';
  }
}
