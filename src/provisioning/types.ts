// Provisioning-specific types
import { InstanceStatus, InstanceTemplate, ProviderResourceId, ResourceKind, VirtualInstanceId } from '../types';

export type TagMap = Record<string, string>;

/**
 * Snapshot of one provider resource as returned by a describe call.
 */
export interface ProviderResource {
  providerResourceId: ProviderResourceId;
  /** Raw provider state name, lower-case (`running`, `available`, ...). */
  state: string;
  address?: string;
  tags: TagMap;
  raw: unknown;
}

export interface LaunchRequestOptions {
  /**
   * Identifies the allocation the launch belongs to. Providers with request
   * idempotency derive their token from it, so a later allocation for the
   * same virtual instance ID is a new request.
   */
  requestId?: string;
}

export interface ProviderResourceState {
  providerResourceId: ProviderResourceId;
  state: string;
  tags: TagMap;
}

/**
 * The remote calls the allocation engine needs from a provider.
 * Implementations own transport-level retries; a rejected promise means the
 * call failed after those retries.
 */
export interface ResourceClient {
  readonly kind: ResourceKind;

  /** Requests one resource. Resolves once the provider has accepted the request. */
  launch(
    template: InstanceTemplate,
    virtualInstanceId: VirtualInstanceId,
    tags: TagMap,
    options?: LaunchRequestOptions
  ): Promise<ProviderResource>;

  describeByTag(tagKey: string, values: string[]): Promise<ProviderResource[]>;

  describeById(providerResourceIds: ProviderResourceId[]): Promise<ProviderResource[]>;

  /** Light-weight state lookup used for status reporting. */
  describeStatesByTag(tagKey: string, values: string[]): Promise<ProviderResourceState[]>;

  tag(providerResourceId: ProviderResourceId, tags: TagMap): Promise<void>;

  /**
   * Attempts every ID. Resolves with the IDs the provider does not know (gone
   * already, or not visible yet); rejects with a TerminationError listing the
   * ones it refused.
   */
  terminate(providerResourceIds: ProviderResourceId[]): Promise<ProviderResourceId[]>;

  /** Auxiliary display attributes. Callers treat failures as missing data. */
  describeExtendedAttributes?(providerResourceId: ProviderResourceId): Promise<TagMap>;

  /** Terminal-dead states: a resource in one of these never becomes usable again. */
  isTerminal(state: string): boolean;

  /** Running and reachable. */
  isReady(resource: ProviderResource): boolean;

  toInstanceStatus(state: string | undefined): InstanceStatus;
}
