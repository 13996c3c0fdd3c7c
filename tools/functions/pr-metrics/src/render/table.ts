import moment from 'moment';

import type { DailyStat } from '../stats';

export const TABLE_DAYS = 7;

const HEADER = ['| Day | PRs | P50 | P90 |', '|-----|-----|-----|-----|'];
const EMPTY_ROW = '| No data | - | - | - |';

function formatHours(hours: number): string {
  return `${hours.toFixed(1)}h`;
}

/** Table lines for the most recent days, newest first. */
export function leadTimeTableLines(dailyStats: DailyStat[]): string[] {
  if (dailyStats.length === 0) {
    return [...HEADER, EMPTY_ROW];
  }
  const rows = dailyStats
    .slice(-TABLE_DAYS)
    .reverse()
    .map(
      (stat) =>
        `| ${moment.utc(stat.day).format('YYYY-MM-DD')} | ${stat.prCount} | ${formatHours(stat.p50Hours)} | ${formatHours(stat.p90Hours)} |`,
    );
  return [...HEADER, ...rows];
}

export function renderLeadTimeTable(dailyStats: DailyStat[]): string {
  return `${leadTimeTableLines(dailyStats).join('\n')}\n`;
}
