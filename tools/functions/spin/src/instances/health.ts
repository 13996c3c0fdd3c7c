export type Health = 'OK' | 'INITIALIZING' | 'IMPAIRED' | 'UNKNOWN';

const SETTLING_SUB_STATUSES = ['initializing', 'insufficient-data'];
const TRANSITIONAL_STATES = ['pending', 'stopping', 'stopped', 'terminated'];

function isAvailable(subStatus: string | undefined): subStatus is string {
  return subStatus !== undefined && subStatus !== 'not-applicable';
}

/**
 * Combines the system and instance status checks of one instance into a single health value.
 * `state` is the instance state name; the sub-statuses are absent when the health query returned
 * nothing for the instance.
 */
export function classifyHealth(state: string, systemStatus?: string, instanceStatus?: string): Health {
  if (!isAvailable(systemStatus) && !isAvailable(instanceStatus)) {
    return TRANSITIONAL_STATES.includes(state) ? 'INITIALIZING' : 'UNKNOWN';
  }
  if (systemStatus === 'ok' && instanceStatus === 'ok') {
    return 'OK';
  }
  if ([systemStatus, instanceStatus].some((status) => status !== undefined && SETTLING_SUB_STATUSES.includes(status))) {
    return 'INITIALIZING';
  }
  return 'IMPAIRED';
}
