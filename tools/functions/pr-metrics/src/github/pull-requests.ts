import { createChildLogger } from '@cloud-starter/aws-powertools-util';

const logger = createChildLogger('pull-requests');

export const PAGE_SIZE = 100;
export const MAX_PULL_REQUESTS = 200;

export const MERGED_PULL_REQUESTS_QUERY = `
  query ($owner: String!, $repo: String!, $limit: Int!, $cursor: String) {
    repository(owner: $owner, name: $repo) {
      pullRequests(states: MERGED, first: $limit, after: $cursor, orderBy: { field: CREATED_AT, direction: DESC }) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          number
          title
          createdAt
          mergedAt
          author {
            login
          }
        }
      }
    }
  }
`;

export type PullRequestPageVariables = {
  owner: string;
  repo: string;
  limit: number;
  cursor: string | null;
};

export interface PullRequest {
  number: number;
  title: string;
  createdAt: string | null;
  mergedAt: string | null;
  author: { login: string } | null;
}

export interface MergedPullRequestsResponse {
  repository: {
    pullRequests: {
      pageInfo: { hasNextPage: boolean; endCursor: string | null };
      nodes: PullRequest[];
    };
  };
}

export interface GraphqlClient {
  query<T>(document: string, variables: PullRequestPageVariables): Promise<T>;
}

/**
 * Most recently created merged pull requests, newest first. Stops paging once `MAX_PULL_REQUESTS`
 * have been collected.
 */
export async function fetchMergedPullRequests(client: GraphqlClient, owner: string, repo: string): Promise<PullRequest[]> {
  const pullRequests: PullRequest[] = [];
  let cursor: string | null = null;

  for (;;) {
    const response: MergedPullRequestsResponse = await client.query<MergedPullRequestsResponse>(
      MERGED_PULL_REQUESTS_QUERY,
      { owner, repo, limit: PAGE_SIZE, cursor },
    );
    const page = response.repository.pullRequests;
    pullRequests.push(...page.nodes);
    logger.debug(`Fetched ${page.nodes.length} merged pull requests`, { total: pullRequests.length });

    if (!page.pageInfo.hasNextPage || pullRequests.length >= MAX_PULL_REQUESTS) {
      break;
    }
    cursor = page.pageInfo.endCursor;
  }

  return pullRequests;
}
