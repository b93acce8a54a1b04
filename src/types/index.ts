// Core type definitions for the instance allocator

/** Caller-assigned identifier, stable across retries. Never generated here. */
export type VirtualInstanceId = string;

/** Provider-assigned identifier (EC2 instance id, RDS DB instance identifier). */
export type ProviderResourceId = string;

export type ResourceKind = 'ec2' | 'rds';

/**
 * Provider-neutral status reported by getInstanceState.
 */
export type InstanceStatus =
  | 'pending'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'deleting'
  | 'deleted'
  | 'failed'
  | 'unknown';

export const INSTANCE_STATUSES: readonly InstanceStatus[] = [
  'pending',
  'running',
  'stopping',
  'stopped',
  'deleting',
  'deleted',
  'failed',
  'unknown'
];

/**
 * Where a record stands inside one allocation call.
 * `gone` means the resource reached a terminal provider state, `failed` that a
 * launch or tag call failed, `timed-out` that readiness was never observed.
 */
export type RecordLifecycle = 'pending' | 'ready' | 'gone' | 'failed' | 'timed-out';

export type TerminalLifecycle = Exclude<RecordLifecycle, 'pending'>;

export interface ResourceRecord {
  virtualInstanceId: VirtualInstanceId;
  providerResourceId?: ProviderResourceId;
  lifecycle: RecordLifecycle;
  status: InstanceStatus;
  /** Raw provider state name, e.g. `running` or `available`. */
  providerState?: string;
  /** Private network address (EC2) or endpoint address (RDS). */
  address?: string;
  /** Auxiliary display data, filled best-effort. */
  attributes: Record<string, string>;
  /** Whether this call launched the resource, as opposed to finding it. */
  launched: boolean;
  /** Provider metadata snapshot from the latest describe. */
  raw?: unknown;
  error?: string;
}

export type EbsVolumeType = 'gp2' | 'gp3' | 'io1' | 'io2' | 'st1' | 'sc1' | 'standard';

export interface Ec2InstanceTemplate {
  kind: 'ec2';
  name: string;
  image: string;
  type: string;
  subnetId?: string;
  securityGroupIds: string[];
  keyName?: string;
  iamProfileName?: string;
  availabilityZone?: string;
  placementGroup?: string;
  tenancy: 'default' | 'dedicated' | 'host';
  userData?: string;
  rootVolumeSizeGB: number;
  rootVolumeType: EbsVolumeType;
  /** Extra EBS data volumes attached at launch, deleted with the instance. */
  ebsVolumeCount: number;
  ebsVolumeSizeGiB: number;
  ebsVolumeType: EbsVolumeType;
  ebsIops?: number;
  enableEbsEncryption: boolean;
  ebsKmsKeyId?: string;
  ebsOptimized: boolean;
  associatePublicIpAddress: boolean;
  instanceNamePrefix: string;
  tags: Record<string, string>;
}

export interface RdsInstanceTemplate {
  kind: 'rds';
  name: string;
  engine: string;
  engineVersion?: string;
  instanceClass: string;
  allocatedStorage: number;
  storageType?: 'gp2' | 'gp3' | 'io1' | 'standard';
  masterUsername: string;
  masterUserPassword: string;
  dbName?: string;
  dbSubnetGroupName?: string;
  vpcSecurityGroupIds: string[];
  availabilityZone?: string;
  multiAz: boolean;
  storageEncrypted: boolean;
  port?: number;
  backupRetentionPeriod: number;
  publiclyAccessible: boolean;
  instanceNamePrefix: string;
  tags: Record<string, string>;
}

export type InstanceTemplate = Ec2InstanceTemplate | RdsInstanceTemplate;

export interface AllocationRequest {
  template: InstanceTemplate;
  virtualInstanceIds: VirtualInstanceId[];
  /** Smallest number of ready resources for the call to succeed. */
  minCount: number;
}

export interface RecordFailure {
  virtualInstanceId: VirtualInstanceId;
  providerResourceId?: ProviderResourceId;
  lifecycle: TerminalLifecycle;
  reason: string;
}

export interface AllocationResult {
  allocationId: string;
  ready: Map<VirtualInstanceId, ResourceRecord>;
  /** Every per-resource failure seen, reported even when the call succeeds. */
  failures: RecordFailure[];
  records: ResourceRecord[];
}

export type TaggingStrategy = 'tag-on-create' | 'tag-after-create';

export interface AllocationSettings {
  taggingStrategy: TaggingStrategy;
  pollIntervalMs: number;
  waitUntilReadyMs: number;
  waitUntilFindableMs: number;
  tagRetryIntervalMs: number;
  terminateOnFailure: boolean;
}

export interface AWSConfig {
  region: string;
  profile?: string;
  endpoint?: string;
  maxAttempts: number;
}

export interface TagSettings {
  correlationKey: string;
  common: Record<string, string>;
}

export interface AllocatorConfig {
  aws: AWSConfig;
  allocation: AllocationSettings;
  tags: TagSettings;
  templates: Record<string, InstanceTemplate>;
}
