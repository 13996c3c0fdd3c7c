import { createChildLogger } from '@cloud-starter/aws-powertools-util';
import { promises as fs } from 'fs';
import type { Moment } from 'moment';

import { leadTimeTableLines } from './render/table';
import type { DailyStat } from './stats';

const logger = createChildLogger('readme');

export const METRICS_MARKER = '**Recent Metrics**';
export const EMPTY_STATE_NOTE = '*Table will be populated when PRs are merged*';

// Everything after the marker up to a horizontal rule, the next `#` or `##` heading or the end of the file.
const METRICS_SECTION = /(\*\*Recent Metrics\*\*\n\n)[\s\S]*?(\n\n---|\n\n#{1,2} |$)/g;

export function renderMetricsSection(dailyStats: DailyStat[], now: Moment): string {
  const table = leadTimeTableLines(dailyStats).join('\n');
  if (dailyStats.length === 0) {
    return `${table}\n\n${EMPTY_STATE_NOTE}`;
  }
  return `${table}\n\n*Last updated: ${now.clone().utc().format('YYYY-MM-DD HH:mm')} UTC*`;
}

/** Replaces the metrics section; content outside it is returned unchanged. */
export function replaceMetricsSection(content: string, section: string): string {
  return content.replace(METRICS_SECTION, (_match, head: string, tail: string) => `${head}${section}${tail}`);
}

/**
 * Rewrites the metrics section of the README at `readmePath`. Resolves `false` when the file is
 * missing or already up to date.
 */
export async function updateReadme(readmePath: string, dailyStats: DailyStat[], now: Moment): Promise<boolean> {
  let content: string;
  try {
    content = await fs.readFile(readmePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.warn(`README not found at ${readmePath}`);
      return false;
    }
    throw error;
  }

  const updated = replaceMetricsSection(content, renderMetricsSection(dailyStats, now));
  if (updated === content) {
    logger.info('No changes needed for README metrics table');
    return false;
  }
  await fs.writeFile(readmePath, updated);
  logger.info('Updated README metrics table');
  return true;
}
