// Orchestration-specific types
import { ProviderResource, ResourceClient } from '../provisioning/types';
import { RecordFailure, ResourceRecord, TerminalLifecycle, VirtualInstanceId } from '../types';

export interface OperationOptions {
  signal?: AbortSignal;
}

export function createRecord(virtualInstanceId: VirtualInstanceId): ResourceRecord {
  return {
    virtualInstanceId,
    lifecycle: 'pending',
    status: 'unknown',
    attributes: {},
    launched: false
  };
}

/**
 * Copies a describe snapshot onto a record without changing its lifecycle.
 */
export function applySnapshot(client: ResourceClient, record: ResourceRecord, resource: ProviderResource): ResourceRecord {
  record.providerResourceId = resource.providerResourceId;
  record.providerState = resource.state;
  record.status = client.toInstanceStatus(resource.state);
  record.address = resource.address;
  record.raw = resource.raw;
  return record;
}

export function recordFromResource(
  client: ResourceClient,
  virtualInstanceId: VirtualInstanceId,
  resource: ProviderResource,
  launched: boolean
): ResourceRecord {
  const record = applySnapshot(client, createRecord(virtualInstanceId), resource);
  record.launched = launched;
  return record;
}

export function finish(record: ResourceRecord, lifecycle: TerminalLifecycle, reason?: string): ResourceRecord {
  record.lifecycle = lifecycle;
  if (reason !== undefined) {
    record.error = reason;
  }
  return record;
}

export function toFailure(record: ResourceRecord): RecordFailure | undefined {
  if (record.lifecycle === 'ready' || record.lifecycle === 'pending') {
    return undefined;
  }
  return {
    virtualInstanceId: record.virtualInstanceId,
    providerResourceId: record.providerResourceId,
    lifecycle: record.lifecycle,
    reason: record.error ?? record.lifecycle
  };
}
