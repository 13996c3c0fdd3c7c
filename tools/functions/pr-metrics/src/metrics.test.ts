import { promises as fs } from 'fs';
import moment from 'moment';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import type { MergedPullRequestsResponse } from './github/pull-requests';
import { CHART_FILE, DATA_FILE, generateMetrics, TABLE_FILE, type GraphqlClient } from './metrics';

const response: MergedPullRequestsResponse = {
  repository: {
    pullRequests: {
      pageInfo: { hasNextPage: false, endCursor: null },
      nodes: [
        { number: 4, title: 'Open', createdAt: '2026-01-08T09:00:00Z', mergedAt: null, author: null },
        { number: 3, title: 'Docs', createdAt: '2026-01-08T00:00:00Z', mergedAt: '2026-01-08T03:00:00Z', author: { login: 'bob' } },
        { number: 2, title: 'Fix', createdAt: '2026-01-07T00:00:00Z', mergedAt: '2026-01-07T06:00:00Z', author: { login: 'alice' } },
        { number: 1, title: 'Feature', createdAt: '2026-01-07T10:00:00Z', mergedAt: '2026-01-07T12:00:00Z', author: null },
      ],
    },
  },
};

describe('generateMetrics', () => {
  let dir: string;
  let client: GraphqlClient;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'metrics-'));
    client = { query: vi.fn().mockResolvedValue(response) };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function run(readmePath = path.join(dir, 'README.md')) {
    return generateMetrics({
      client,
      owner: 'octo-org',
      repo: 'tools',
      outputDir: path.join(dir, 'metrics'),
      readmePath,
      now: () => moment.utc('2026-01-08T14:05:00Z'),
    });
  }

  it('writes the data snapshot, chart and table', async () => {
    const result = await run();

    expect(result).toMatchObject({ totalPrs: 4, days: 2, readmeUpdated: false });
    const snapshot: unknown = JSON.parse(await fs.readFile(path.join(dir, 'metrics', DATA_FILE), 'utf-8'));
    expect(snapshot).toEqual({
      generatedAt: '2026-01-08T14:05:00.000Z',
      totalPrs: 4,
      dailyStats: [
        { day: '2026-01-07', prCount: 2, p50Hours: 4, p90Hours: 5.6, medianHours: 4, meanHours: 4 },
        { day: '2026-01-08', prCount: 1, p50Hours: 3, p90Hours: 3, medianHours: 3, meanHours: 3 },
      ],
    });
    await expect(fs.readFile(path.join(dir, 'metrics', TABLE_FILE), 'utf-8')).resolves.toBe(
      [
        '| Day | PRs | P50 | P90 |',
        '|-----|-----|-----|-----|',
        '| 2026-01-08 | 1 | 3.0h | 3.0h |',
        '| 2026-01-07 | 2 | 4.0h | 5.6h |',
        '',
      ].join('\n'),
    );
    const chart = await fs.readFile(path.join(dir, 'metrics', CHART_FILE), 'utf-8');
    expect(chart.startsWith('<svg width="900" height="420"')).toBe(true);
  });

  it('updates the README metrics section', async () => {
    const readme = path.join(dir, 'README.md');
    await fs.writeFile(readme, '# Tools\n\n**Recent Metrics**\n\n(pending)\n\n## Usage\n');

    const result = await run(readme);

    expect(result.readmeUpdated).toBe(true);
    const content = await fs.readFile(readme, 'utf-8');
    expect(content).toBe(
      [
        '# Tools',
        '',
        '**Recent Metrics**',
        '',
        '| Day | PRs | P50 | P90 |',
        '|-----|-----|-----|-----|',
        '| 2026-01-08 | 1 | 3.0h | 3.0h |',
        '| 2026-01-07 | 2 | 4.0h | 5.6h |',
        '',
        '*Last updated: 2026-01-08 14:05 UTC*',
        '',
        '## Usage',
        '',
      ].join('\n'),
    );
  });

  it('aborts on query errors without writing outputs', async () => {
    client = { query: vi.fn().mockRejectedValue(new Error('Bad credentials')) };

    await expect(run()).rejects.toThrow('Bad credentials');
    await expect(fs.access(path.join(dir, 'metrics'))).rejects.toThrow();
  });
});
