import { v4 as uuidv4 } from 'uuid';
import { ResourceNamingService } from '../config/naming';
import { describeProviderError, isCapacityError } from '../provisioning/errors';
import { TagHelper } from '../provisioning/tags';
import { LaunchRequestOptions, ResourceClient } from '../provisioning/types';
import { AllocationSettings, InstanceTemplate, ResourceRecord, VirtualInstanceId } from '../types';
import { Logger, silentLogger } from '../utils/logger';
import { retryUntil, settleEach, throwIfInterrupted } from './concurrency';
import { isInterruption } from './errors';
import { OperationOptions, createRecord, finish, recordFromResource } from './types';

export type LauncherSettings = Pick<AllocationSettings, 'taggingStrategy' | 'waitUntilFindableMs' | 'tagRetryIntervalMs'>;

export interface LaunchOptions extends OperationOptions {
  /** Passed to every launch request; a fresh one is generated when absent. */
  requestId?: string;
}

class NotVisibleError extends Error {
  constructor(providerResourceId: string) {
    super(`Resource ${providerResourceId} is not visible yet`);
    this.name = 'NotVisibleError';
  }
}

export interface LauncherOptions {
  naming?: ResourceNamingService;
  logger?: Logger;
  now?: () => number;
}

/**
 * Requests one provider resource per virtual instance ID. Launches run
 * concurrently; a failed launch marks its own record `failed` and never
 * rejects the batch.
 */
export class Launcher {
  private naming: ResourceNamingService;
  private logger: Logger;
  private now: () => number;

  constructor(
    private readonly client: ResourceClient,
    private readonly tagHelper: TagHelper,
    private readonly settings: LauncherSettings,
    options: LauncherOptions = {}
  ) {
    this.naming = options.naming ?? new ResourceNamingService();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * @returns one record per requested ID, in request order, either `pending`
   * with a provider resource ID or `failed`
   */
  async launch(template: InstanceTemplate, virtualInstanceIds: VirtualInstanceId[], options: LaunchOptions = {}): Promise<ResourceRecord[]> {
    if (virtualInstanceIds.length === 0) {
      return [];
    }

    const { signal } = options;
    throwIfInterrupted(signal);
    const request: LaunchRequestOptions = { requestId: options.requestId ?? uuidv4() };
    this.logger.info(`>> Submitting ${virtualInstanceIds.length} launch requests (${this.settings.taggingStrategy})`);

    const outcomes = await settleEach(virtualInstanceIds, virtualInstanceId =>
      this.launchOne(template, virtualInstanceId, request, signal)
    );

    return outcomes.map((outcome, index) => {
      const virtualInstanceId = virtualInstanceIds[index];
      if (outcome.ok) {
        return outcome.value;
      }

      const reason = describeProviderError(outcome.error);
      if (isCapacityError(outcome.error)) {
        this.logger.warn(`Hit capacity limits requesting ${virtualInstanceId}. Attempting to proceed. ${reason}`);
      } else {
        this.logger.error(`Error while requesting ${virtualInstanceId}. Attempting to proceed. ${reason}`);
      }
      return finish(createRecord(virtualInstanceId), 'failed', `launch failed: ${reason}`);
    });
  }

  private async launchOne(
    template: InstanceTemplate,
    virtualInstanceId: VirtualInstanceId,
    request: LaunchRequestOptions,
    signal?: AbortSignal
  ): Promise<ResourceRecord> {
    const instanceName = this.naming.generateInstanceName(template, virtualInstanceId);
    const tags = this.tagHelper.getInstanceTags(template, virtualInstanceId, instanceName);

    if (this.settings.taggingStrategy === 'tag-on-create') {
      const resource = await this.client.launch(template, virtualInstanceId, tags, request);
      this.logger.info(`<< Launched ${resource.providerResourceId} for ${virtualInstanceId}`);
      return recordFromResource(this.client, virtualInstanceId, resource, true);
    }

    const resource = await this.client.launch(template, virtualInstanceId, {}, request);
    const record = recordFromResource(this.client, virtualInstanceId, resource, true);
    this.logger.info(`<< Launched ${resource.providerResourceId} for ${virtualInstanceId}, tagging`);

    try {
      await retryUntil(() => this.client.tag(resource.providerResourceId, tags), {
        deadline: this.now() + this.settings.waitUntilFindableMs,
        intervalMs: this.settings.tagRetryIntervalMs,
        signal,
        now: this.now,
        onRetry: (error, attempt) =>
          this.logger.debug(`Tagging ${resource.providerResourceId} failed (attempt ${attempt}): ${describeProviderError(error)}`)
      });
    } catch (error) {
      // untagged resources cannot be found by a later lookup
      if (isInterruption(error)) {
        await this.abandonUntagged(resource.providerResourceId);
        throw error;
      }
      await this.terminateUntagged(resource.providerResourceId, signal);
      return finish(record, 'failed', `tagging failed: ${describeProviderError(error)}`);
    }

    return record;
  }

  /**
   * A resource that was never visible to tagging may not be visible to
   * terminate either, so unknown IDs are retried like tagging was.
   */
  private async terminateUntagged(providerResourceId: string, signal?: AbortSignal): Promise<void> {
    this.logger.warn(`<< Resource ${providerResourceId} could not be tagged. Terminating it`);
    try {
      await retryUntil(
        async () => {
          const unknown = await this.client.terminate([providerResourceId]);
          if (unknown.length > 0) {
            throw new NotVisibleError(providerResourceId);
          }
        },
        {
          deadline: this.now() + this.settings.waitUntilFindableMs,
          intervalMs: this.settings.tagRetryIntervalMs,
          signal,
          now: this.now,
          retryIf: error => error instanceof NotVisibleError
        }
      );
    } catch (error) {
      if (isInterruption(error)) {
        throw error;
      }
      this.logger.error(`Failed to terminate untagged resource ${providerResourceId}: ${describeProviderError(error)}`);
    }
  }

  /**
   * One termination attempt for an interrupted launch, which cannot wait.
   */
  private async abandonUntagged(providerResourceId: string): Promise<void> {
    this.logger.warn(`Interrupted before ${providerResourceId} was tagged. Terminating it`);
    try {
      await this.client.terminate([providerResourceId]);
    } catch (error) {
      this.logger.error(`Failed to terminate untagged resource ${providerResourceId}: ${describeProviderError(error)}`);
    }
  }
}
