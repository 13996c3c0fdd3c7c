import { getParameter } from '@cloud-starter/aws-ssm-util';

export const DEFAULT_OUTPUT_DIR = '.github/metrics';
export const DEFAULT_README_PATH = 'README.md';

export interface MetricsConfig {
  owner: string;
  repo: string;
  token: string;
  outputDir: string;
  readmePath: string;
  /** Base URL of the REST API, for GitHub Enterprise Server. */
  apiUrl?: string;
}

type ParameterReader = (name: string) => Promise<string>;

export function parseRepository(value: string | undefined): { owner: string; repo: string } {
  if (!value) {
    throw new Error('GITHUB_REPOSITORY environment variable required');
  }
  const separator = value.indexOf('/');
  const owner = value.slice(0, separator);
  const repo = value.slice(separator + 1);
  if (separator < 0 || !owner || !repo) {
    throw new Error(`Invalid GITHUB_REPOSITORY format '${value}', expected 'owner/repo'`);
  }
  return { owner, repo };
}

async function resolveToken(env: NodeJS.ProcessEnv, readParameter: ParameterReader): Promise<string> {
  if (env.GITHUB_TOKEN) {
    return env.GITHUB_TOKEN;
  }
  if (env.GITHUB_TOKEN_PARAMETER_NAME) {
    return readParameter(env.GITHUB_TOKEN_PARAMETER_NAME);
  }
  throw new Error('GITHUB_TOKEN or GITHUB_TOKEN_PARAMETER_NAME environment variable required');
}

export async function loadMetricsConfig(
  env: NodeJS.ProcessEnv = process.env,
  readParameter: ParameterReader = (name) => getParameter(name),
): Promise<MetricsConfig> {
  const { owner, repo } = parseRepository(env.GITHUB_REPOSITORY);
  return {
    owner,
    repo,
    token: await resolveToken(env, readParameter),
    outputDir: env.METRICS_OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
    readmePath: env.METRICS_README_PATH || DEFAULT_README_PATH,
    apiUrl: env.GITHUB_API_URL || undefined,
  };
}
