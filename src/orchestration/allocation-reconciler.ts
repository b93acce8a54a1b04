import { v4 as uuidv4 } from 'uuid';
import { ResourceNamingService } from '../config/naming';
import { describeProviderError } from '../provisioning/errors';
import { TagHelper } from '../provisioning/tags';
import { ResourceClient } from '../provisioning/types';
import {
  AllocationRequest,
  AllocationResult,
  AllocationSettings,
  InstanceStatus,
  InstanceTemplate,
  RecordFailure,
  ResourceRecord,
  VirtualInstanceId
} from '../types';
import { Logger, silentLogger } from '../utils/logger';
import { throwIfInterrupted } from './concurrency';
import { CorrelationIndex } from './correlation-index';
import { AllocationError, AllocationOutcome, isInterruption } from './errors';
import { Launcher } from './launcher';
import { ReadinessPoller, fillExtendedAttributes } from './readiness-poller';
import { OperationOptions, recordFromResource, toFailure } from './types';

export interface AllocationReconcilerOptions {
  settings: AllocationSettings;
  tagHelper?: TagHelper;
  naming?: ResourceNamingService;
  logger?: Logger;
  now?: () => number;
}

/**
 * Allocates groups of resources keyed by virtual instance ID.
 *
 * The provider is the only source of truth: every call starts from a tag
 * lookup, which is what keeps a retried allocate from launching a second
 * resource for an ID that already has a live one.
 */
export class AllocationReconciler {
  readonly tagHelper: TagHelper;

  private index: CorrelationIndex;
  private launcher: Launcher;
  private poller: ReadinessPoller;
  private settings: AllocationSettings;
  private logger: Logger;

  constructor(private readonly client: ResourceClient, options: AllocationReconcilerOptions) {
    this.settings = options.settings;
    this.logger = options.logger ?? silentLogger;
    this.tagHelper = options.tagHelper ?? new TagHelper();

    this.index = new CorrelationIndex(client, this.tagHelper, this.logger);
    this.launcher = new Launcher(client, this.tagHelper, this.settings, {
      naming: options.naming,
      logger: this.logger,
      now: options.now
    });
    this.poller = new ReadinessPoller(client, this.settings, { logger: this.logger, now: options.now });
  }

  /**
   * Finds or launches one resource per virtual instance ID and waits for
   * each to become ready.
   *
   * @throws AllocationError when fewer than `minCount` resources became ready
   * @throws AllocationInterruptedError when `signal` aborts
   */
  async allocate(request: AllocationRequest, options: OperationOptions = {}): Promise<AllocationResult> {
    const { template, virtualInstanceIds, minCount } = request;
    const { signal } = options;
    this.validateRequest(request);

    const allocationId = uuidv4();
    this.logger.info(`>> Requesting ${virtualInstanceIds.length} instances for ${template.name} (allocation ${allocationId})`);

    // Step 1: partition into already-correlated and needs-launch
    const existing = await this.index.lookup(virtualInstanceIds, signal);
    if (existing.size > 0) {
      this.logger.info(`Resources for the following virtual instance IDs were already allocated: ${[...existing.keys()].join(', ')}`);
    }
    const needsLaunch = virtualInstanceIds.filter(id => !existing.has(id));

    // Step 2: launch the rest and merge into one working set
    const launched = await this.launcher.launch(template, needsLaunch, { signal, requestId: allocationId });
    const launchedById = new Map(launched.map(record => [record.virtualInstanceId, record]));

    const records: ResourceRecord[] = virtualInstanceIds.map(id => {
      const resource = existing.get(id);
      if (resource) {
        return recordFromResource(this.client, id, resource, false);
      }
      const record = launchedById.get(id);
      if (!record) {
        throw new Error(`Launcher returned no record for ${id}`);
      }
      return record;
    });

    // Step 3: wait for readiness
    await this.poller.waitUntilReady(records, signal);

    // Step 4: assemble
    const ready = new Map<VirtualInstanceId, ResourceRecord>();
    const failures: RecordFailure[] = [];
    for (const record of records) {
      if (record.lifecycle === 'ready') {
        ready.set(record.virtualInstanceId, record);
      } else {
        const failure = toFailure(record);
        if (failure) {
          failures.push(failure);
        }
      }
    }

    // Step 5: enforce the minimum
    if (ready.size < minCount) {
      this.logger.error(`Unsuccessful allocation ${allocationId}: ${ready.size} ready, ${minCount} required`);
      if (this.settings.terminateOnFailure) {
        await this.cleanUpLaunched(records, signal);
      }
      throw new AllocationError(allocationId, minCount, records.map(toOutcome), failures);
    }

    if (failures.length > 0) {
      this.logger.warn(
        `Allocation ${allocationId} succeeded with ${ready.size} of ${virtualInstanceIds.length} ready; ` +
          `not ready: ${failures.map(failure => `${failure.virtualInstanceId} (${failure.lifecycle})`).join(', ')}`
      );
    } else {
      this.logger.info(`<< Allocation ${allocationId} complete: ${ready.size} ready`);
    }

    return { allocationId, ready, failures, records };
  }

  /**
   * Current records for the given IDs, from the correlation tag alone. Never
   * launches, tags or terminates. IDs without a live resource are omitted.
   */
  async find(template: InstanceTemplate, virtualInstanceIds: VirtualInstanceId[], options: OperationOptions = {}): Promise<ResourceRecord[]> {
    this.requireMatchingKind(template);
    this.logger.debug(`Finding instances ${virtualInstanceIds.join(', ')}`);

    const found = await this.index.lookup(virtualInstanceIds, options.signal);
    const records: ResourceRecord[] = [];
    for (const id of virtualInstanceIds) {
      const resource = found.get(id);
      if (!resource) {
        continue;
      }
      const record = recordFromResource(this.client, id, resource, false);
      record.lifecycle = this.client.isReady(resource) ? 'ready' : 'pending';
      records.push(record);
    }

    await Promise.all(records.map(record => fillExtendedAttributes(this.client, record, this.logger)));

    this.logger.debug(`Found ${records.length} instances for ${virtualInstanceIds.length} instance IDs`);
    return records;
  }

  /**
   * Abstract status per requested ID. IDs with no resource report `unknown`.
   * When an ID matches several resources, a live one is preferred.
   */
  async getInstanceState(
    template: InstanceTemplate,
    virtualInstanceIds: VirtualInstanceId[],
    options: OperationOptions = {}
  ): Promise<Map<VirtualInstanceId, InstanceStatus>> {
    this.requireMatchingKind(template);
    const statuses = new Map<VirtualInstanceId, InstanceStatus>();
    if (virtualInstanceIds.length === 0) {
      return statuses;
    }

    throwIfInterrupted(options.signal);
    const states = await this.client.describeStatesByTag(this.tagHelper.correlationKey, [...new Set(virtualInstanceIds)]);

    const chosen = new Map<VirtualInstanceId, string>();
    for (const entry of states) {
      const id = this.tagHelper.getVirtualInstanceId(entry.tags);
      if (id === undefined) {
        continue;
      }
      const current = chosen.get(id);
      if (current === undefined || (this.client.isTerminal(current) && !this.client.isTerminal(entry.state))) {
        chosen.set(id, entry.state);
      }
    }

    for (const id of virtualInstanceIds) {
      statuses.set(id, this.client.toInstanceStatus(chosen.get(id)));
    }
    return statuses;
  }

  /**
   * Terminates the resources correlated with the given IDs. IDs with no live
   * resource are already deleted and need nothing.
   */
  async delete(template: InstanceTemplate, virtualInstanceIds: VirtualInstanceId[], options: OperationOptions = {}): Promise<void> {
    this.requireMatchingKind(template);
    const found = await this.index.lookup(virtualInstanceIds, options.signal);

    const unknown = virtualInstanceIds.filter(id => !found.has(id));
    if (unknown.length > 0) {
      this.logger.info(`No live resources for ${unknown.join(', ')}, nothing to terminate`);
    }

    const providerResourceIds = [...found.values()].map(resource => resource.providerResourceId);
    if (providerResourceIds.length === 0) {
      return;
    }

    throwIfInterrupted(options.signal);
    const alreadyGone = await this.client.terminate(providerResourceIds);
    if (alreadyGone.length > 0) {
      this.logger.info(`Already gone: ${alreadyGone.join(', ')}`);
    }
  }

  private validateRequest(request: AllocationRequest): void {
    const { template, virtualInstanceIds, minCount } = request;
    this.requireMatchingKind(template);

    if (new Set(virtualInstanceIds).size !== virtualInstanceIds.length) {
      throw new TypeError('Virtual instance IDs must be unique within an allocation');
    }
    if (!Number.isInteger(minCount) || minCount < 0 || minCount > virtualInstanceIds.length) {
      throw new RangeError(`minCount must be an integer between 0 and ${virtualInstanceIds.length}, got ${minCount}`);
    }

    for (const id of virtualInstanceIds) {
      this.tagHelper.validateVirtualInstanceId(id);
    }
    this.tagHelper.validateTags(this.tagHelper.getUserDefinedTags(template));
  }

  private requireMatchingKind(template: InstanceTemplate): void {
    if (template.kind !== this.client.kind) {
      throw new TypeError(`Template ${template.name} is for ${template.kind}, but this allocator manages ${this.client.kind}`);
    }
  }

  /**
   * Terminates what this call launched. Found resources belong to earlier
   * calls and are left alone; `failed` records were already terminated by the
   * launcher or never got a resource.
   */
  private async cleanUpLaunched(records: ResourceRecord[], signal?: AbortSignal): Promise<void> {
    const providerResourceIds = records
      .filter(record => record.launched && record.lifecycle !== 'gone' && record.lifecycle !== 'failed')
      .map(record => record.providerResourceId)
      .filter((id): id is string => id !== undefined);

    if (providerResourceIds.length === 0) {
      return;
    }

    this.logger.error(`Terminating ${providerResourceIds.length} resource(s) launched by the failed allocation`);
    try {
      throwIfInterrupted(signal);
      await this.client.terminate(providerResourceIds);
    } catch (error) {
      if (isInterruption(error)) {
        throw error;
      }
      this.logger.error(`Error while trying to delete resources after failed allocation: ${describeProviderError(error)}`);
    }
  }
}

function toOutcome(record: ResourceRecord): AllocationOutcome {
  const lifecycle = record.lifecycle === 'pending' ? 'timed-out' : record.lifecycle;
  return {
    virtualInstanceId: record.virtualInstanceId,
    providerResourceId: record.providerResourceId,
    lifecycle,
    reason: record.error
  };
}
