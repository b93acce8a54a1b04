import {
  RDSClient,
  CreateDBInstanceCommand,
  DescribeDBInstancesCommand,
  AddTagsToResourceCommand,
  DeleteDBInstanceCommand,
  type CreateDBInstanceCommandInput,
  type DBInstance,
  type Filter
} from '@aws-sdk/client-rds';
import { ResourceNamingService } from '../config/naming';
import { AWSConfig, InstanceStatus, InstanceTemplate, RdsInstanceTemplate, VirtualInstanceId } from '../types';
import { chunk } from '../utils/chunk';
import { Logger, silentLogger } from '../utils/logger';
import { createSdkClientConfig } from './client-config';
import { TerminationError, TerminationFailure, describeProviderError, isNotFoundError } from './errors';
import { RDS_TERMINAL_STATES, fromRdsStatus } from './instance-state';
import { fromTagList, toTagList } from './tags';
import { ProviderResource, ProviderResourceState, ResourceClient, TagMap } from './types';

const MAX_FILTER_VALUES = 100;

export interface RdsResourceClientOptions {
  logger?: Logger;
  naming?: ResourceNamingService;
}

/**
 * RDS has no server-side tag filter for DescribeDBInstances, so tag lookups
 * page through the region's DB instances and match `TagList` locally. That is
 * still one logical describe per lookup, however many pages it takes.
 */
export class RdsResourceClient implements ResourceClient {
  readonly kind = 'rds' as const;

  private client: RDSClient;
  private logger: Logger;
  private naming: ResourceNamingService;

  constructor(aws: AWSConfig, options: RdsResourceClientOptions = {}) {
    this.client = new RDSClient(createSdkClientConfig(aws));
    this.logger = options.logger ?? silentLogger;
    this.naming = options.naming ?? new ResourceNamingService();
  }

  /** The identifier comes from the virtual instance ID, so RDS needs no request token. */
  async launch(template: InstanceTemplate, virtualInstanceId: VirtualInstanceId, tags: TagMap): Promise<ProviderResource> {
    const rdsTemplate = this.requireRdsTemplate(template);
    const request = this.buildCreateRequest(rdsTemplate, virtualInstanceId, tags);

    this.logger.debug(`>> Create DB instance ${request.DBInstanceIdentifier} (${rdsTemplate.engine}, ${rdsTemplate.instanceClass})`);
    const result = await this.client.send(new CreateDBInstanceCommand(request));

    const dbInstance = result.DBInstance;
    if (!dbInstance?.DBInstanceIdentifier) {
      throw new Error(`CreateDBInstance for ${virtualInstanceId} returned no DB instance`);
    }
    return this.toProviderResource(dbInstance);
  }

  async describeByTag(tagKey: string, values: string[]): Promise<ProviderResource[]> {
    if (values.length === 0) {
      return [];
    }
    const wanted = new Set(values);
    const dbInstances = await this.describeDbInstances([]);
    return dbInstances
      .map(dbInstance => this.toProviderResource(dbInstance))
      .filter(resource => {
        const value = resource.tags[tagKey];
        return value !== undefined && wanted.has(value);
      });
  }

  async describeById(identifiers: string[]): Promise<ProviderResource[]> {
    const resources: ProviderResource[] = [];
    for (const idChunk of chunk(identifiers, MAX_FILTER_VALUES)) {
      const dbInstances = await this.describeDbInstances([{ Name: 'db-instance-id', Values: idChunk }]);
      resources.push(...dbInstances.map(dbInstance => this.toProviderResource(dbInstance)));
    }
    return resources;
  }

  async describeStatesByTag(tagKey: string, values: string[]): Promise<ProviderResourceState[]> {
    const resources = await this.describeByTag(tagKey, values);
    return resources.map(({ providerResourceId, state, tags }) => ({ providerResourceId, state, tags }));
  }

  async tag(identifier: string, tags: TagMap): Promise<void> {
    const [dbInstance] = await this.describeDbInstances([{ Name: 'db-instance-id', Values: [identifier] }]);
    if (!dbInstance?.DBInstanceArn) {
      throw new Error(`DB instance ${identifier} is not visible yet`);
    }

    this.logger.debug(`>> Tagging DB instance ${identifier}`);
    await this.client.send(new AddTagsToResourceCommand({
      ResourceName: dbInstance.DBInstanceArn,
      Tags: toTagList(tags)
    }));
  }

  async terminate(identifiers: string[]): Promise<string[]> {
    const outcomes = await Promise.allSettled(identifiers.map(identifier => this.deleteDbInstance(identifier)));

    const unknown: string[] = [];
    const failures: TerminationFailure[] = [];
    outcomes.forEach((outcome, index) => {
      const identifier = identifiers[index];
      if (outcome.status === 'rejected') {
        failures.push({ providerResourceId: identifier, reason: describeProviderError(outcome.reason) });
      } else if (!outcome.value) {
        unknown.push(identifier);
      }
    });

    if (failures.length > 0) {
      throw new TerminationError(failures);
    }
    return unknown;
  }

  isTerminal(state: string): boolean {
    return RDS_TERMINAL_STATES.has(state.toLowerCase());
  }

  isReady(resource: ProviderResource): boolean {
    return resource.state === 'available' && Boolean(resource.address);
  }

  toInstanceStatus(state: string | undefined): InstanceStatus {
    return fromRdsStatus(state);
  }

  /**
   * @returns false when RDS does not know the identifier
   */
  private async deleteDbInstance(identifier: string): Promise<boolean> {
    this.logger.info(`>> Terminating ${identifier}`);
    try {
      const result = await this.client.send(new DeleteDBInstanceCommand({
        DBInstanceIdentifier: identifier,
        SkipFinalSnapshot: true,
        DeleteAutomatedBackups: true
      }));
      this.logger.info(`<< Result ${identifier}: ${result.DBInstance?.DBInstanceStatus ?? 'unknown'}`);
      return true;
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
      this.logger.warn(`DB instance ${identifier} already gone`);
      return false;
    }
  }

  private async describeDbInstances(filters: Filter[]): Promise<DBInstance[]> {
    const dbInstances: DBInstance[] = [];
    let marker: string | undefined;

    do {
      const result = await this.client.send(new DescribeDBInstancesCommand({
        Filters: filters.length > 0 ? filters : undefined,
        Marker: marker
      }));
      dbInstances.push(...(result.DBInstances ?? []));
      marker = result.Marker;
    } while (marker);

    return dbInstances;
  }

  private buildCreateRequest(
    template: RdsInstanceTemplate,
    virtualInstanceId: VirtualInstanceId,
    tags: TagMap
  ): CreateDBInstanceCommandInput {
    const tagList = toTagList(tags);

    return {
      DBInstanceIdentifier: this.naming.generateDbInstanceIdentifier(template, virtualInstanceId),
      DBInstanceClass: template.instanceClass,
      Engine: template.engine,
      EngineVersion: template.engineVersion,
      AllocatedStorage: template.allocatedStorage,
      StorageType: template.storageType,
      MasterUsername: template.masterUsername,
      MasterUserPassword: template.masterUserPassword,
      DBName: template.dbName,
      DBSubnetGroupName: template.dbSubnetGroupName,
      VpcSecurityGroupIds: template.vpcSecurityGroupIds.length > 0 ? template.vpcSecurityGroupIds : undefined,
      AvailabilityZone: template.multiAz ? undefined : template.availabilityZone,
      MultiAZ: template.multiAz,
      StorageEncrypted: template.storageEncrypted,
      Port: template.port,
      BackupRetentionPeriod: template.backupRetentionPeriod,
      PubliclyAccessible: template.publiclyAccessible,
      Tags: tagList.length > 0 ? tagList : undefined
    };
  }

  private toProviderResource(dbInstance: DBInstance): ProviderResource {
    return {
      providerResourceId: dbInstance.DBInstanceIdentifier ?? '',
      state: (dbInstance.DBInstanceStatus ?? 'unknown').toLowerCase(),
      address: dbInstance.Endpoint?.Address,
      tags: fromTagList(dbInstance.TagList),
      raw: dbInstance
    };
  }

  private requireRdsTemplate(template: InstanceTemplate): RdsInstanceTemplate {
    if (template.kind !== 'rds') {
      throw new TypeError(`RDS client cannot launch a ${template.kind} template (${template.name})`);
    }
    return template;
  }
}
