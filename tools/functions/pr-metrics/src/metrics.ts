import { createChildLogger } from '@cloud-starter/aws-powertools-util';
import { promises as fs } from 'fs';
import moment, { type Moment } from 'moment';
import path from 'path';

import { fetchMergedPullRequests, type GraphqlClient } from './github/pull-requests';
import { updateReadme } from './readme';
import { renderLeadTimeChart } from './render/chart';
import { renderLeadTimeTable } from './render/table';
import { aggregateDailyStats, calculateLeadTimes, type DailyStat } from './stats';

export * from './config';
export { createGraphqlClient, createOctokitClient } from './github/client';
export type { GraphqlClient } from './github/pull-requests';

const logger = createChildLogger('metrics');

export const DATA_FILE = 'pr_lead_time_data.json';
export const CHART_FILE = 'pr_lead_time_chart.svg';
export const TABLE_FILE = 'pr_lead_time_table.md';

export interface MetricsSnapshot {
  generatedAt: string;
  dailyStats: DailyStat[];
  totalPrs: number;
}

export interface GenerateMetricsOptions {
  client: GraphqlClient;
  owner: string;
  repo: string;
  outputDir: string;
  readmePath: string;
  now?: () => Moment;
}

export interface MetricsResult {
  totalPrs: number;
  days: number;
  dataPath: string;
  chartPath: string;
  tablePath: string;
  readmeUpdated: boolean;
}

export async function generateMetrics(options: GenerateMetricsOptions): Promise<MetricsResult> {
  const now = (options.now ?? (() => moment.utc()))();

  const pullRequests = await fetchMergedPullRequests(options.client, options.owner, options.repo);
  logger.info(`Found ${pullRequests.length} merged PRs`);

  const dailyStats = aggregateDailyStats(calculateLeadTimes(pullRequests));
  logger.info(`Calculated stats for ${dailyStats.length} days`);

  const dataPath = path.join(options.outputDir, DATA_FILE);
  const chartPath = path.join(options.outputDir, CHART_FILE);
  const tablePath = path.join(options.outputDir, TABLE_FILE);

  const snapshot: MetricsSnapshot = {
    generatedAt: now.toISOString(),
    dailyStats,
    totalPrs: pullRequests.length,
  };

  await fs.mkdir(options.outputDir, { recursive: true });
  await fs.writeFile(dataPath, `${JSON.stringify(snapshot, null, 2)}\n`);
  await fs.writeFile(chartPath, renderLeadTimeChart(dailyStats));
  await fs.writeFile(tablePath, renderLeadTimeTable(dailyStats));
  const readmeUpdated = await updateReadme(options.readmePath, dailyStats, now);

  return {
    totalPrs: pullRequests.length,
    days: dailyStats.length,
    dataPath,
    chartPath,
    tablePath,
    readmeUpdated,
  };
}
