import { createChildLogger } from '@cloud-starter/aws-powertools-util';
import { throttling } from '@octokit/plugin-throttling';
import { Octokit } from '@octokit/rest';

import type { GraphqlClient, PullRequestPageVariables } from './pull-requests';

const logger = createChildLogger('gh-client');

interface ThrottledRequest {
  method: string;
  url: string;
}

export function createOctokitClient(token: string, apiUrl = ''): Octokit {
  const CustomOctokit = Octokit.plugin(throttling);

  return new CustomOctokit({
    auth: token,
    ...(apiUrl ? { baseUrl: apiUrl } : {}),
    userAgent: process.env.USER_AGENT || 'cloud-starter-metrics',
    throttle: {
      onRateLimit: (retryAfter: number, options: ThrottledRequest) => {
        logger.warn(
          `GitHub rate limit: Request quota exhausted for request ${options.method} ${options.url}. Retry after ${retryAfter}s.`,
        );
      },
      onSecondaryRateLimit: (_retryAfter: number, options: ThrottledRequest) => {
        logger.warn(`GitHub rate limit: SecondaryRateLimit detected for request ${options.method} ${options.url}`);
      },
    },
  });
}

export function createGraphqlClient(octokit: Octokit): GraphqlClient {
  return {
    query: <T>(document: string, variables: PullRequestPageVariables) => octokit.graphql<T>(document, variables),
  };
}
