import { TagHelper } from '../provisioning/tags';
import { ProviderResource, ResourceClient } from '../provisioning/types';
import { VirtualInstanceId } from '../types';
import { Logger, silentLogger } from '../utils/logger';
import { throwIfInterrupted } from './concurrency';

/**
 * Resolves virtual instance IDs to live provider resources through the
 * correlation tag. Recomputed from the provider on every call; nothing is
 * cached, so a lookup always reflects what the provider reports now.
 */
export class CorrelationIndex {
  constructor(
    private readonly client: ResourceClient,
    private readonly tagHelper: TagHelper,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Returns the live resource for each correlated ID. IDs without one, or
   * whose only resources are terminal, are absent from the map.
   */
  async lookup(virtualInstanceIds: VirtualInstanceId[], signal?: AbortSignal): Promise<Map<VirtualInstanceId, ProviderResource>> {
    const found = new Map<VirtualInstanceId, ProviderResource>();
    if (virtualInstanceIds.length === 0) {
      return found;
    }

    throwIfInterrupted(signal);
    const requested = new Set(virtualInstanceIds);
    const resources = await this.client.describeByTag(this.tagHelper.correlationKey, [...requested]);

    for (const resource of resources) {
      const virtualInstanceId = this.tagHelper.getVirtualInstanceId(resource.tags);
      if (virtualInstanceId === undefined || !requested.has(virtualInstanceId)) {
        this.logger.warn(`Resource ${resource.providerResourceId} is not managed by this allocator. Skipping`);
        continue;
      }

      if (this.client.isTerminal(resource.state)) {
        this.logger.debug(`Ignoring ${resource.state} resource ${resource.providerResourceId} for ${virtualInstanceId}`);
        continue;
      }

      const current = found.get(virtualInstanceId);
      if (current) {
        this.logger.error(
          `Two live resources carry virtual instance ID ${virtualInstanceId}: ` +
            `${current.providerResourceId} and ${resource.providerResourceId}. Keeping ${current.providerResourceId}`
        );
        continue;
      }
      found.set(virtualInstanceId, resource);
    }

    this.logger.debug(`Found ${found.size} live resources for ${requested.size} virtual instance IDs`);
    return found;
  }
}
