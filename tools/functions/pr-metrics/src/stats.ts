import moment from 'moment';

import type { PullRequest } from './github/pull-requests';

export const ROLLING_WINDOW = 7;

export interface LeadTime {
  /** UTC calendar day of the merge, `YYYY-MM-DD`. */
  day: string;
  hours: number;
}

export interface DailyStat {
  day: string;
  prCount: number;
  p50Hours: number;
  p90Hours: number;
  medianHours: number;
  meanHours: number;
}

export function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Linear interpolation between the closest ranks. `sorted` must be ascending and non-empty.
 */
export function percentile(sorted: number[], p: number): number {
  const index = ((sorted.length - 1) * p) / 100;
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (index - lower);
}

export function median(values: number[]): number {
  return percentile(
    [...values].sort((a, b) => a - b),
    50,
  );
}

export function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Hours from creation to merge; pull requests missing either timestamp are skipped. */
export function calculateLeadTimes(pullRequests: PullRequest[]): LeadTime[] {
  return pullRequests.flatMap((pr) => {
    if (!pr.createdAt || !pr.mergedAt) {
      return [];
    }
    const merged = moment.utc(pr.mergedAt);
    return [{ day: merged.format('YYYY-MM-DD'), hours: merged.diff(moment.utc(pr.createdAt), 'hours', true) }];
  });
}

export function aggregateDailyStats(leadTimes: LeadTime[]): DailyStat[] {
  const byDay = new Map<string, number[]>();
  for (const { day, hours } of leadTimes) {
    byDay.set(day, [...(byDay.get(day) ?? []), hours]);
  }

  return [...byDay.keys()].sort().map((day) => {
    const hours = byDay.get(day) ?? [];
    const sorted = [...hours].sort((a, b) => a - b);
    return {
      day,
      prCount: hours.length,
      p50Hours: roundToTenth(percentile(sorted, 50)),
      p90Hours: roundToTenth(percentile(sorted, 90)),
      medianHours: roundToTenth(median(hours)),
      meanHours: roundToTenth(mean(hours)),
    };
  });
}

/** Median over the trailing `window` values; the first entries use the shorter window available. */
export function rollingMedian(values: number[], window = ROLLING_WINDOW): number[] {
  return values.map((_, idx) => roundToTenth(median(values.slice(Math.max(0, idx - window + 1), idx + 1))));
}
