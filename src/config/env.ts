export interface EnvConfig {
  githubToken?: string;
}

export function loadEnvConfig(): EnvConfig {
  const githubToken = process.env.GITHUB_TOKEN;

  return {
    githubToken: githubToken ? githubToken : undefined,
  };
}
