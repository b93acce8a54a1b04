import { InstanceStatus } from '../types';

/**
 * EC2 instance state names, as reported in `Instance.State.Name`.
 */
const EC2_STATUS_MAP: Readonly<Record<string, InstanceStatus>> = {
  pending: 'pending',
  running: 'running',
  'shutting-down': 'deleting',
  terminated: 'deleted',
  stopping: 'stopping',
  stopped: 'stopped'
};

/**
 * RDS `DBInstanceStatus` values.
 */
const RDS_STATUS_MAP: Readonly<Record<string, InstanceStatus>> = {
  available: 'running',
  'backing-up': 'pending',
  'configuring-enhanced-monitoring': 'pending',
  'configuring-iam-database-auth': 'pending',
  'configuring-log-exports': 'pending',
  creating: 'pending',
  maintenance: 'pending',
  modifying: 'pending',
  rebooting: 'pending',
  renaming: 'pending',
  'resetting-master-credentials': 'pending',
  starting: 'pending',
  'storage-optimization': 'pending',
  upgrading: 'pending',
  stopping: 'stopping',
  stopped: 'stopped',
  deleting: 'deleting',
  deleted: 'deleted',
  failed: 'failed',
  'inaccessible-encryption-credentials': 'failed',
  'incompatible-network': 'failed',
  'incompatible-option-group': 'failed',
  'incompatible-parameters': 'failed',
  'incompatible-restore': 'failed',
  'restore-error': 'failed',
  'storage-full': 'failed'
};

export const EC2_TERMINAL_STATES: ReadonlySet<string> = new Set(['shutting-down', 'terminated']);

export const RDS_TERMINAL_STATES: ReadonlySet<string> = new Set([
  'deleting',
  'deleted',
  'failed',
  'incompatible-restore',
  'restore-error'
]);

function lookup(map: Readonly<Record<string, InstanceStatus>>, state: string | undefined): InstanceStatus {
  if (!state) {
    return 'unknown';
  }
  const key = state.toLowerCase();
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : 'unknown';
}

export function fromEc2State(state: string | undefined): InstanceStatus {
  return lookup(EC2_STATUS_MAP, state);
}

export function fromRdsStatus(status: string | undefined): InstanceStatus {
  return lookup(RDS_STATUS_MAP, status);
}

export const EC2_STATES: readonly string[] = Object.keys(EC2_STATUS_MAP);
export const RDS_STATUSES: readonly string[] = Object.keys(RDS_STATUS_MAP);
