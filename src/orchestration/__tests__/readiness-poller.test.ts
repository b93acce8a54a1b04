import { describe, it, expect, beforeEach } from 'vitest';
import { ReadinessPoller } from '../readiness-poller';
import { createRecord, recordFromResource } from '../types';
import { ResourceRecord } from '../../types';
import { FakeResourceClient, providerError, workerTemplate } from './fake-resource-client';

describe('ReadinessPoller', () => {
  let client: FakeResourceClient;

  async function launchRecord(virtualInstanceId: string): Promise<ResourceRecord> {
    const resource = await client.launch(workerTemplate, virtualInstanceId, {});
    return recordFromResource(client, virtualInstanceId, resource, true);
  }

  beforeEach(() => {
    client = new FakeResourceClient();
  });

  it('should describe all pending resources in one batched call per cycle', async () => {
    client.plans.set('b', [{ state: 'pending' }, { state: 'running', address: '10.0.0.7' }]);
    const records = [await launchRecord('a'), await launchRecord('b')];
    const poller = new ReadinessPoller(client, { pollIntervalMs: 0, waitUntilReadyMs: 1000 });

    await poller.waitUntilReady(records);

    expect(client.describeByIdCalls).toEqual([['i-1', 'i-2'], ['i-2']]);
    expect(records.map(record => record.lifecycle)).toEqual(['ready', 'ready']);
    expect(records[1].address).toBe('10.0.0.7');
    expect(records[1].status).toBe('running');
  });

  it('should mark a resource that terminates as gone and stop polling it', async () => {
    client.plans.set('a', [{ state: 'shutting-down' }]);
    const records = [await launchRecord('a')];
    const poller = new ReadinessPoller(client, { pollIntervalMs: 0, waitUntilReadyMs: 1000 });

    await poller.waitUntilReady(records);

    expect(client.describeByIdCalls).toHaveLength(1);
    expect(records[0].lifecycle).toBe('gone');
    expect(records[0].status).toBe('deleting');
    expect(records[0].error).toBe('resource entered shutting-down before becoming ready');
  });

  it('should time out resources that are running without an address', async () => {
    client.plans.set('a', [{ state: 'running' }]);
    const records = [await launchRecord('a')];
    const poller = new ReadinessPoller(client, { pollIntervalMs: 0, waitUntilReadyMs: 0 });

    await poller.waitUntilReady(records);

    expect(records[0].lifecycle).toBe('timed-out');
    expect(records[0].error).toBe('no network address after 0ms, last state running');
  });

  it('should keep a resource pending while describe calls cannot see it yet', async () => {
    const records = [await launchRecord('a')];
    client.describeByIdError = providerError('InvalidInstanceID.NotFound', 'not yet');
    const poller = new ReadinessPoller(client, { pollIntervalMs: 0, waitUntilReadyMs: 0 });

    await poller.waitUntilReady(records);

    expect(records[0].lifecycle).toBe('timed-out');
    expect(records[0].error).toBe('no network address after 0ms, last state pending');
  });

  it('should carry the last describe error into the timeout reason', async () => {
    const records = [await launchRecord('a')];
    client.describeByIdError = providerError('RequestLimitExceeded', 'slow down');
    const poller = new ReadinessPoller(client, { pollIntervalMs: 0, waitUntilReadyMs: 0 });

    await poller.waitUntilReady(records);

    expect(records[0].error).toBe(
      'no network address after 0ms, last state pending (last error: RequestLimitExceeded: slow down (transient))'
    );
  });

  it('should still report ready when extended attributes cannot be read', async () => {
    client.attributeError = providerError('UnauthorizedOperation', 'denied');
    const records = [await launchRecord('a')];
    const poller = new ReadinessPoller(client, { pollIntervalMs: 0, waitUntilReadyMs: 1000 });

    await poller.waitUntilReady(records);

    expect(records[0].lifecycle).toBe('ready');
    expect(records[0].attributes).toEqual({});
  });

  it('should ignore records that are already settled or were never launched', async () => {
    const failed = createRecord('x');
    failed.lifecycle = 'failed';
    const poller = new ReadinessPoller(client, { pollIntervalMs: 0, waitUntilReadyMs: 1000 });

    await poller.waitUntilReady([failed, createRecord('y')]);

    expect(client.describeByIdCalls).toEqual([]);
    expect(failed.lifecycle).toBe('failed');
  });
});
