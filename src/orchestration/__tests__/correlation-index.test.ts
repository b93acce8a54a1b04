import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CorrelationIndex } from '../correlation-index';
import { TagHelper } from '../../provisioning/tags';
import { Logger } from '../../utils/logger';
import { FakeResourceClient } from './fake-resource-client';

describe('CorrelationIndex', () => {
  let client: FakeResourceClient;
  let logger: Logger;
  let index: CorrelationIndex;

  beforeEach(() => {
    client = new FakeResourceClient();
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    index = new CorrelationIndex(client, new TagHelper(), logger);
  });

  it('should resolve IDs to live resources in a single describe', async () => {
    client.seed('a', 'running', '10.1.0.1');
    client.seed('b', 'stopped');

    const found = await index.lookup(['a', 'b', 'c']);

    expect(client.describeByTagCalls).toBe(1);
    expect([...found.keys()]).toEqual(['a', 'b']);
    expect(found.get('b')?.state).toBe('stopped');
  });

  it('should skip terminal resources', async () => {
    client.seed('a', 'terminated');
    client.seed('b', 'shutting-down');

    const found = await index.lookup(['a', 'b']);

    expect(found.size).toBe(0);
  });

  it('should prefer the live resource over a terminated one', async () => {
    client.seed('a', 'terminated');
    const live = client.seed('a', 'running', '10.1.0.1');

    const found = await index.lookup(['a']);

    expect(found.get('a')?.providerResourceId).toBe(live);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should keep the first of two live resources and log the conflict', async () => {
    const first = client.seed('a', 'running', '10.1.0.1');
    client.seed('a', 'pending');

    const found = await index.lookup(['a']);

    expect(found.get('a')?.providerResourceId).toBe(first);
    expect(logger.error).toHaveBeenCalledWith(
      'Two live resources carry virtual instance ID a: i-1 and i-2. Keeping i-1'
    );
  });

  it('should not call the provider for an empty list', async () => {
    const found = await index.lookup([]);

    expect(found.size).toBe(0);
    expect(client.describeByTagCalls).toBe(0);
  });
});
