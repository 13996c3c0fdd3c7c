import { GROUP_TAG } from '../config';
import type { DownResult, InstanceSummary, UpResult } from '../instances/types';
import { renderTable } from './table';

const NONE = '-';

export const UP_HEADERS = ['INSTANCE ID', 'PUBLIC IP', 'STATE', 'GROUP'];
export const STATUS_HEADERS = ['INSTANCE ID', 'STATE', 'PUBLIC IP', 'UPTIME', 'HEALTH', 'GROUP'];
export const DOWN_HEADERS = ['INSTANCE ID', 'RESULT'];

export function renderJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function formatUptime(minutes: number | null): string {
  if (minutes === null) {
    return NONE;
  }
  if (minutes < 60) {
    return `${minutes}m`;
  }
  return `${Math.floor(minutes / 60)}h${String(minutes % 60).padStart(2, '0')}m`;
}

/**
 * `instances` are the live summaries of the launched group; a preview has none. Launched ids
 * missing from `instances` are still listed, in state `unknown`.
 */
export function renderUpTable(result: UpResult, instances: InstanceSummary[]): string {
  if (!result.applied) {
    const table = renderTable(UP_HEADERS, [['(dry-run)', NONE, 'pending', result.group]]);
    return `${table}\n\nDry-run: would launch ${result.count} instance(s) of type ${result.type} in ${result.region}.`;
  }

  const rows = instances.map((instance) => [
    instance.id,
    instance.publicIp ?? NONE,
    instance.state,
    instance.tags[GROUP_TAG] ?? NONE,
  ]);
  const listed = new Set(instances.map((instance) => instance.id));
  for (const id of result.ids.filter((launched) => !listed.has(launched))) {
    rows.push([id, NONE, 'unknown', result.group]);
  }
  return renderTable(UP_HEADERS, rows);
}

export function renderStatusTable(instances: InstanceSummary[]): string {
  const rows = instances.map((instance) => [
    instance.id,
    instance.state,
    instance.publicIp ?? NONE,
    formatUptime(instance.uptimeMinutes),
    instance.health,
    instance.tags[GROUP_TAG] ?? NONE,
  ]);
  return renderTable(STATUS_HEADERS, rows);
}

export function renderDownTable(result: DownResult): string {
  const table = renderTable(
    DOWN_HEADERS,
    result.terminated.map((id) => [id, 'terminating']),
  );
  if (!result.applied) {
    return `${table}\n\nDry-run: no instances were terminated.`;
  }
  if (result.terminated.length === 0) {
    return `${table}\n\nNothing to terminate.`;
  }
  return table;
}
