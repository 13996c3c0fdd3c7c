import { describe, it, expect, vi, beforeEach } from 'vitest';

import { createFakeClock, type FakeClock } from '../__tests__/fake-ec2';
import type { ComputeGateway, RemoteGateways, RemoteInstance } from '../aws/gateway';
import { loadSettings, Settings, withApply } from '../config';
import { PermissionError, PolicyViolationError, RemoteCallError } from '../errors';
import { InstanceLifecycleManager } from './lifecycle';

const AMI_ID = 'ami-0123456789abcdef0';

const owner = { Project: 'cloud-starter', ManagedBy: 'spin', Owner: 'alice' };

function instance(id: string, state: string, group = 'grp00001', extra: Partial<RemoteInstance> = {}): RemoteInstance {
  return { id, state, tags: { ...owner, SpinGroup: group }, ...extra };
}

function remoteError(name: string): Error {
  return Object.assign(new Error(name), { name });
}

function createCompute() {
  return {
    launchInstances: vi.fn<ComputeGateway['launchInstances']>(async () => ['i-1', 'i-2']),
    describeInstances: vi.fn<ComputeGateway['describeInstances']>(async () => [
      instance('i-1', 'running'),
      instance('i-2', 'running'),
    ]),
    describeInstanceHealth: vi.fn<ComputeGateway['describeInstanceHealth']>(async () => []),
    terminateInstances: vi.fn<ComputeGateway['terminateInstances']>(async (ids) => ids),
  } satisfies ComputeGateway;
}

function createGateways(compute: ComputeGateway) {
  return {
    compute: vi.fn<RemoteGateways['compute']>(async () => compute),
    parameterStore: async () => ({ getParameter: async () => AMI_ID }),
  } satisfies RemoteGateways;
}

describe('InstanceLifecycleManager', () => {
  let compute: ReturnType<typeof createCompute>;
  let gateways: ReturnType<typeof createGateways>;
  let clock: FakeClock;
  let manager: InstanceLifecycleManager;
  let live: Settings;

  beforeEach(() => {
    compute = createCompute();
    gateways = createGateways(compute);
    clock = createFakeClock();
    manager = new InstanceLifecycleManager(gateways, { clock, wait: { intervalMs: 5_000, timeoutMs: 90_000 } });
    live = withApply(loadSettings({ SPIN_OWNER: 'alice', SPIN_LIVE: '1' }));
  });

  describe('up', () => {
    it('previews without touching the remote side', async () => {
      const settings = loadSettings({ SPIN_OWNER: 'alice' });

      const result = await manager.up(settings, { count: 3, apply: true });

      expect(result).toMatchObject({ applied: false, count: 3, type: 't3.micro', region: 'eu-north-1' });
      expect(result.group).toMatch(/^[a-z0-9]{8}$/);
      expect(gateways.compute).not.toHaveBeenCalled();
    });

    it('previews when live but not applied', async () => {
      const result = await manager.up(live, { count: 1, group: 'demo', instanceType: 't3.small', apply: false });

      expect(result).toEqual({ applied: false, group: 'demo', count: 1, type: 't3.small', region: 'eu-north-1' });
      expect(gateways.compute).not.toHaveBeenCalled();
    });

    it('launches the group with the resolved image and waits until running', async () => {
      const result = await manager.up(live, { count: 2, group: 'grp00001', apply: true });

      expect(result).toEqual({
        applied: true,
        group: 'grp00001',
        ids: ['i-1', 'i-2'],
        count: 2,
        type: 't3.micro',
        region: 'eu-north-1',
      });
      expect(compute.launchInstances).toHaveBeenCalledWith({
        imageId: AMI_ID,
        instanceType: 't3.micro',
        count: 2,
        tags: { ...owner, SpinGroup: 'grp00001' },
      });
      expect(compute.describeInstances).toHaveBeenCalledWith({ ids: ['i-1', 'i-2'] });
    });

    it('polls until every instance is running', async () => {
      compute.describeInstances
        .mockResolvedValueOnce([instance('i-1', 'pending'), instance('i-2', 'pending')])
        .mockResolvedValueOnce([instance('i-1', 'running'), instance('i-2', 'pending')]);

      const result = await manager.up(live, { count: 2, group: 'grp00001', apply: true });

      expect(result).not.toHaveProperty('warning');
      expect(compute.describeInstances).toHaveBeenCalledTimes(3);
      expect(clock.now() - createFakeClock().now()).toBe(10_000);
    });

    it('treats a terminated instance as settled', async () => {
      compute.describeInstances.mockResolvedValueOnce([instance('i-1', 'running'), instance('i-2', 'terminated')]);

      const result = await manager.up(live, { count: 2, group: 'grp00001', apply: true });

      expect(result).not.toHaveProperty('warning');
      expect(compute.describeInstances).toHaveBeenCalledTimes(1);
    });

    it('returns the ids with a warning when the instances never reach running', async () => {
      compute.describeInstances.mockResolvedValue([instance('i-1', 'pending'), instance('i-2', 'pending')]);

      const result = await manager.up(live, { count: 2, group: 'grp00001', apply: true });

      expect(result).toMatchObject({
        applied: true,
        ids: ['i-1', 'i-2'],
        warning: 'Timed out after 90s waiting for instances to reach running state.',
      });
      // one query at t=0 and one after each of the 18 intervals
      expect(compute.describeInstances).toHaveBeenCalledTimes(19);
    });

    it('turns a failing poll into a warning', async () => {
      compute.describeInstances.mockRejectedValueOnce(remoteError('RequestLimitExceeded'));

      const result = await manager.up(live, { count: 2, group: 'grp00001', apply: true });

      expect(result).toMatchObject({
        applied: true,
        ids: ['i-1', 'i-2'],
        warning: 'Could not confirm instances are running: Failed to describe instances (code=RequestLimitExceeded).',
      });
    });

    it('translates launch failures', async () => {
      compute.launchInstances.mockRejectedValueOnce(remoteError('UnauthorizedOperation'));

      await expect(manager.up(live, { count: 1, apply: true })).rejects.toBeInstanceOf(PermissionError);
    });
  });

  describe('status', () => {
    it('returns nothing in dry-run or without the live interlock', async () => {
      await expect(manager.status(loadSettings({ SPIN_OWNER: 'alice', SPIN_LIVE: '1' }))).resolves.toEqual([]);
      await expect(manager.status(loadSettings({ SPIN_OWNER: 'alice', SPIN_DRY_RUN: '0' }))).resolves.toEqual([]);
      expect(gateways.compute).not.toHaveBeenCalled();
    });

    it('summarises the owner instances with health and uptime', async () => {
      compute.describeInstances.mockResolvedValueOnce([
        instance('i-1', 'running', 'grp00001', {
          publicIp: '198.51.100.1',
          launchTime: new Date(clock.now() - 90 * 60_000),
        }),
        instance('i-2', 'pending'),
        { id: 'i-3', state: 'running', tags: { Owner: 'alice' } },
      ]);
      compute.describeInstanceHealth.mockResolvedValueOnce([
        { id: 'i-1', systemStatus: 'ok', instanceStatus: 'ok' },
        { id: 'i-2', systemStatus: 'not-applicable', instanceStatus: 'not-applicable' },
      ]);

      const summaries = await manager.status(live);

      expect(compute.describeInstances).toHaveBeenCalledWith({ tags: owner });
      expect(compute.describeInstanceHealth).toHaveBeenCalledWith(['i-1', 'i-2']);
      expect(summaries).toEqual([
        {
          id: 'i-1',
          state: 'running',
          publicIp: '198.51.100.1',
          uptimeMinutes: 90,
          health: 'OK',
          tags: { ...owner, SpinGroup: 'grp00001' },
        },
        {
          id: 'i-2',
          state: 'pending',
          publicIp: null,
          uptimeMinutes: null,
          health: 'INITIALIZING',
          tags: { ...owner, SpinGroup: 'grp00001' },
        },
      ]);
    });

    it('narrows to a group', async () => {
      await manager.status(live, 'grp00002');

      expect(compute.describeInstances).toHaveBeenCalledWith({ tags: { ...owner, SpinGroup: 'grp00002' } });
    });

    it('degrades health to UNKNOWN when the health query fails', async () => {
      compute.describeInstanceHealth.mockRejectedValueOnce(remoteError('InternalError'));

      const summaries = await manager.status(live);

      expect(summaries.map((s) => s.health)).toEqual(['UNKNOWN', 'UNKNOWN']);
    });

    it('translates listing failures', async () => {
      compute.describeInstances.mockRejectedValueOnce(remoteError('InternalError'));

      await expect(manager.status(live)).rejects.toBeInstanceOf(RemoteCallError);
    });
  });

  describe('down', () => {
    it('refuses a global down before any remote call', async () => {
      await expect(manager.down(live, { apply: true })).rejects.toBeInstanceOf(PolicyViolationError);
      await expect(manager.down(live, { apply: true })).rejects.toThrow(
        'Refusing to down without --group; set SPIN_ALLOW_GLOBAL_DOWN=1 to override (dangerous).',
      );
      expect(gateways.compute).not.toHaveBeenCalled();
    });

    it('previews without apply', async () => {
      await expect(manager.down(live, { group: 'grp00001', apply: false })).resolves.toEqual({
        applied: false,
        terminated: [],
      });
      expect(gateways.compute).not.toHaveBeenCalled();
    });

    it('terminates the group in one call', async () => {
      const result = await manager.down(live, { group: 'grp00001', apply: true });

      expect(result).toEqual({ applied: true, terminated: ['i-1', 'i-2'] });
      expect(compute.terminateInstances).toHaveBeenCalledTimes(1);
      expect(compute.terminateInstances).toHaveBeenCalledWith(['i-1', 'i-2']);
    });

    it('skips instances that are already going away', async () => {
      compute.describeInstances.mockResolvedValueOnce([
        instance('i-1', 'shutting-down'),
        instance('i-2', 'terminated'),
      ]);

      await expect(manager.down(live, { group: 'grp00001', apply: true })).resolves.toEqual({
        applied: true,
        terminated: [],
      });
      expect(compute.terminateInstances).not.toHaveBeenCalled();
    });

    it('terminates everything the owner has with the global override', async () => {
      const settings = withApply(loadSettings({ SPIN_OWNER: 'alice', SPIN_LIVE: '1', SPIN_ALLOW_GLOBAL_DOWN: '1' }));

      await expect(manager.down(settings, { apply: true })).resolves.toEqual({ applied: true, terminated: ['i-1', 'i-2'] });
      expect(compute.describeInstances).toHaveBeenCalledWith({ tags: owner });
    });
  });
});
