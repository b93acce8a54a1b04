import { describeProviderError, isNotFoundError } from '../provisioning/errors';
import { ProviderResource, ResourceClient } from '../provisioning/types';
import { AllocationSettings, ResourceRecord } from '../types';
import { Logger, silentLogger } from '../utils/logger';
import { sleep, throwIfInterrupted } from './concurrency';
import { isInterruption } from './errors';
import { applySnapshot, finish } from './types';

export type PollerSettings = Pick<AllocationSettings, 'pollIntervalMs' | 'waitUntilReadyMs'>;

export interface ReadinessPollerOptions {
  logger?: Logger;
  now?: () => number;
}

/**
 * Fills a record's auxiliary attributes. Failures leave them empty: the data
 * is for display only and never decides readiness.
 */
export async function fillExtendedAttributes(client: ResourceClient, record: ResourceRecord, logger: Logger): Promise<void> {
  if (!client.describeExtendedAttributes || !record.providerResourceId) {
    return;
  }
  try {
    record.attributes = await client.describeExtendedAttributes(record.providerResourceId);
  } catch (error) {
    if (isInterruption(error)) {
      throw error;
    }
    logger.warn(`Could not fill extended attributes for ${record.providerResourceId}: ${describeProviderError(error)}`);
  }
}

/**
 * Polls pending records until each one is ready (running with an address)
 * or gone (terminal), or the overall wait runs out. Records are updated in
 * place.
 */
export class ReadinessPoller {
  private logger: Logger;
  private now: () => number;

  constructor(
    private readonly client: ResourceClient,
    private readonly settings: PollerSettings,
    options: ReadinessPollerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  async waitUntilReady(records: ResourceRecord[], signal?: AbortSignal): Promise<void> {
    const pending = new Map<string, ResourceRecord>();
    for (const record of records) {
      if (record.lifecycle === 'pending' && record.providerResourceId) {
        pending.set(record.providerResourceId, record);
      }
    }

    const deadline = this.now() + this.settings.waitUntilReadyMs;

    while (pending.size > 0) {
      throwIfInterrupted(signal);
      this.logger.info(`>> Waiting for ${pending.size} resource(s) to get a network address`);

      await this.pollOnce(pending);

      if (pending.size === 0) {
        break;
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        break;
      }

      this.logger.debug(`Waiting ${this.settings.pollIntervalMs}ms until next check, ${pending.size} resource(s) still pending`);
      await sleep(Math.min(this.settings.pollIntervalMs, remaining), signal);
    }

    for (const record of pending.values()) {
      const lastError = record.error ? ` (last error: ${record.error})` : '';
      finish(
        record,
        'timed-out',
        `no network address after ${this.settings.waitUntilReadyMs}ms, last state ${record.providerState ?? 'unknown'}${lastError}`
      );
      this.logger.warn(`<< ${record.providerResourceId} for ${record.virtualInstanceId} timed out waiting for readiness`);
    }
  }

  private async pollOnce(pending: Map<string, ResourceRecord>): Promise<void> {
    let resources: ProviderResource[];
    try {
      resources = await this.client.describeById([...pending.keys()]);
    } catch (error) {
      if (isInterruption(error)) {
        throw error;
      }
      // Freshly launched resources may not be visible to describe calls yet.
      if (!isNotFoundError(error)) {
        const reason = describeProviderError(error);
        this.logger.warn(`Describe failed, will retry: ${reason}`);
        for (const record of pending.values()) {
          record.error = reason;
        }
      }
      return;
    }

    const becameReady: ResourceRecord[] = [];

    for (const resource of resources) {
      const record = pending.get(resource.providerResourceId);
      if (!record) {
        continue;
      }
      applySnapshot(this.client, record, resource);

      if (this.client.isTerminal(resource.state)) {
        this.logger.info(`<< Resource ${resource.providerResourceId} has terminated unexpectedly (${resource.state})`);
        finish(record, 'gone', `resource entered ${resource.state} before becoming ready`);
        pending.delete(resource.providerResourceId);
      } else if (this.client.isReady(resource)) {
        this.logger.info(`<< Resource ${resource.providerResourceId} got address ${resource.address}`);
        record.lifecycle = 'ready';
        delete record.error;
        pending.delete(resource.providerResourceId);
        becameReady.push(record);
      }
    }

    await Promise.all(becameReady.map(record => fillExtendedAttributes(this.client, record, this.logger)));
  }
}
