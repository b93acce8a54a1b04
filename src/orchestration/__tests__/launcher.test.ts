import { describe, it, expect, beforeEach } from 'vitest';
import { Launcher } from '../launcher';
import { AllocationInterruptedError } from '../errors';
import { TagHelper } from '../../provisioning/tags';
import { FakeResourceClient, fastSettings, providerError, workerTemplate } from './fake-resource-client';

describe('Launcher', () => {
  let client: FakeResourceClient;
  const tagHelper = new TagHelper('allocator:id', { Environment: 'test' });

  beforeEach(() => {
    client = new FakeResourceClient();
  });

  describe('tag-on-create', () => {
    it('should put every tag in the launch request', async () => {
      const launcher = new Launcher(client, tagHelper, fastSettings);

      const [record] = await launcher.launch(workerTemplate, ['vm-1']);

      expect(client.launches).toEqual([
        {
          virtualInstanceId: 'vm-1',
          tags: {
            Environment: 'test',
            Team: 'data',
            Name: 'worker-vm-1',
            'instance-allocator:template': 'worker',
            'allocator:id': 'vm-1'
          }
        }
      ]);
      expect(client.tagCalls).toEqual([]);
      expect(record).toMatchObject({
        virtualInstanceId: 'vm-1',
        providerResourceId: 'i-1',
        lifecycle: 'pending',
        providerState: 'pending',
        launched: true
      });
    });

    it('should isolate a failed launch from its siblings', async () => {
      client.launchFailures.set('vm-2', providerError('InsufficientInstanceCapacity', 'no capacity'));
      const launcher = new Launcher(client, tagHelper, fastSettings);

      const records = await launcher.launch(workerTemplate, ['vm-1', 'vm-2', 'vm-3']);

      expect(records.map(record => [record.virtualInstanceId, record.lifecycle, record.providerResourceId])).toEqual([
        ['vm-1', 'pending', 'i-1'],
        ['vm-2', 'failed', undefined],
        ['vm-3', 'pending', 'i-2']
      ]);
      expect(records[1].error).toBe('launch failed: InsufficientInstanceCapacity: no capacity');
    });

    it('should pass one request ID to every launch of a call', async () => {
      const launcher = new Launcher(client, tagHelper, fastSettings);

      await launcher.launch(workerTemplate, ['vm-1', 'vm-2'], { requestId: 'allocation-1' });
      await launcher.launch(workerTemplate, ['vm-3']);

      expect(client.requestIds.slice(0, 2)).toEqual(['allocation-1', 'allocation-1']);
      expect(client.requestIds[2]).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should not call the provider for an empty list', async () => {
      const launcher = new Launcher(client, tagHelper, fastSettings);

      expect(await launcher.launch(workerTemplate, [])).toEqual([]);
      expect(client.launches).toEqual([]);
    });

    it('should refuse to start once aborted', async () => {
      const launcher = new Launcher(client, tagHelper, fastSettings);
      const controller = new AbortController();
      controller.abort();

      await expect(launcher.launch(workerTemplate, ['vm-1'], { signal: controller.signal })).rejects.toBeInstanceOf(
        AllocationInterruptedError
      );
      expect(client.launches).toEqual([]);
    });
  });

  describe('tag-after-create', () => {
    const settings = { ...fastSettings, taggingStrategy: 'tag-after-create' as const };

    it('should launch untagged and tag afterwards', async () => {
      const launcher = new Launcher(client, tagHelper, settings);

      const [record] = await launcher.launch(workerTemplate, ['vm-1']);

      expect(client.launches[0].tags).toEqual({});
      expect(client.tagCalls).toHaveLength(1);
      expect(client.tagCalls[0].id).toBe('i-1');
      expect(client.tagCalls[0].tags['allocator:id']).toBe('vm-1');
      expect(client.resources[0].tags['allocator:id']).toBe('vm-1');
      expect(record.lifecycle).toBe('pending');
    });

    it('should retry tagging until the resource is visible', async () => {
      client.tagFailuresRemaining = 2;
      const launcher = new Launcher(client, tagHelper, settings);

      const [record] = await launcher.launch(workerTemplate, ['vm-1']);

      expect(client.tagCalls).toHaveLength(3);
      expect(record.lifecycle).toBe('pending');
      expect(client.terminations).toEqual([]);
    });

    it('should terminate the resource and fail the record when tagging never succeeds', async () => {
      client.tagFailuresRemaining = Number.POSITIVE_INFINITY;
      const launcher = new Launcher(client, tagHelper, { ...settings, waitUntilFindableMs: 0 });

      const [record] = await launcher.launch(workerTemplate, ['vm-1']);

      expect(client.tagCalls).toHaveLength(1);
      expect(client.terminations).toEqual([['i-1']]);
      expect(record.lifecycle).toBe('failed');
      expect(record.providerResourceId).toBe('i-1');
      expect(record.error).toBe("tagging failed: InvalidInstanceID.NotFound: The instance ID 'i-1' does not exist");
    });

    it('should keep terminating an untagged resource the provider does not know yet', async () => {
      client.tagFailuresRemaining = Number.POSITIVE_INFINITY;
      client.terminateUnknownRemaining = 2;
      const clock = { time: 0 };
      const launcher = new Launcher(client, tagHelper, { ...settings, waitUntilFindableMs: 10 }, { now: () => clock.time });
      client.onTag = () => {
        clock.time += 10;
      };

      const [record] = await launcher.launch(workerTemplate, ['vm-1']);

      expect(client.terminations).toEqual([['i-1'], ['i-1'], ['i-1']]);
      expect(client.resources[0].state).toBe('shutting-down');
      expect(record.lifecycle).toBe('failed');
    });

    it('should terminate the untagged resource and stop when aborted while tagging', async () => {
      const controller = new AbortController();
      client.tagFailuresRemaining = Number.POSITIVE_INFINITY;
      client.onTag = () => controller.abort();
      const launcher = new Launcher(client, tagHelper, settings);

      await expect(launcher.launch(workerTemplate, ['vm-1'], { signal: controller.signal })).rejects.toBeInstanceOf(
        AllocationInterruptedError
      );
      expect(client.tagCalls).toHaveLength(1);
      expect(client.terminations).toEqual([['i-1']]);
    });

    it('should still fail the record when the cleanup termination fails', async () => {
      client.tagFailuresRemaining = Number.POSITIVE_INFINITY;
      client.terminateError = providerError('UnauthorizedOperation', 'denied');
      const launcher = new Launcher(client, tagHelper, { ...settings, waitUntilFindableMs: 0 });

      const [record] = await launcher.launch(workerTemplate, ['vm-1']);

      expect(client.terminations).toEqual([['i-1']]);
      expect(record.lifecycle).toBe('failed');
    });
  });
});
