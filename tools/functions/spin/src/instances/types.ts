import type { Health } from './health';

export interface UpRequest {
  count: number;
  instanceType?: string;
  group?: string;
  apply: boolean;
}

export interface UpPreview {
  applied: false;
  group: string;
  count: number;
  type: string;
  region: string;
}

export interface UpApplied {
  applied: true;
  group: string;
  ids: string[];
  count: number;
  type: string;
  region: string;
  /** Present when the launch succeeded but the instances were not confirmed running. */
  warning?: string;
}

export type UpResult = UpPreview | UpApplied;

export interface DownRequest {
  group?: string;
  apply: boolean;
}

export interface DownResult {
  applied: boolean;
  terminated: string[];
}

export interface InstanceSummary {
  id: string;
  state: string;
  publicIp: string | null;
  uptimeMinutes: number | null;
  health: Health;
  tags: Record<string, string>;
}
