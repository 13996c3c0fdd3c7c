import { addPersistentContextToChildLogger, logger, setContext } from '@cloud-starter/aws-powertools-util';
import { randomUUID } from 'crypto';

import { createGraphqlClient, createOctokitClient } from './github/client';
import { loadMetricsConfig } from './config';
import { generateMetrics } from './metrics';

async function main(): Promise<void> {
  setContext({ command: 'pr-metrics', invocationId: randomUUID() }, 'pr-metrics');

  const config = await loadMetricsConfig();
  addPersistentContextToChildLogger({ repository: `${config.owner}/${config.repo}` });
  console.log(`Fetching PR data for ${config.owner}/${config.repo}...`);

  const result = await generateMetrics({
    client: createGraphqlClient(createOctokitClient(config.token, config.apiUrl)),
    owner: config.owner,
    repo: config.repo,
    outputDir: config.outputDir,
    readmePath: config.readmePath,
  });

  console.log(`Found ${result.totalPrs} merged PRs, stats for ${result.days} days`);
  console.log('Generated outputs:');
  console.log(`  - Chart: ${result.chartPath}`);
  console.log(`  - Table: ${result.tablePath}`);
  console.log(`  - Data: ${result.dataPath}`);
  console.log(`  - README: ${result.readmeUpdated ? 'updated' : 'unchanged'}`);
}

try {
  await main();
} catch (error) {
  logger.error('Failed to generate PR metrics', { error });
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}
