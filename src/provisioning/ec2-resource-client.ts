import {
  EC2Client,
  RunInstancesCommand,
  DescribeImagesCommand,
  DescribeInstancesCommand,
  DescribeInstanceAttributeCommand,
  CreateTagsCommand,
  TerminateInstancesCommand,
  _InstanceType,
  type BlockDeviceMapping,
  type EbsBlockDevice,
  type Image,
  type Instance,
  type RunInstancesCommandInput,
  type Filter
} from '@aws-sdk/client-ec2';
import { v4 as uuidv4 } from 'uuid';
import { ResourceNamingService } from '../config/naming';
import { AWSConfig, Ec2InstanceTemplate, InstanceStatus, InstanceTemplate, VirtualInstanceId } from '../types';
import { chunk } from '../utils/chunk';
import { Logger, silentLogger } from '../utils/logger';
import { createSdkClientConfig } from './client-config';
import { TerminationError, TerminationFailure, describeProviderError, isNotFoundError } from './errors';
import { EC2_TERMINAL_STATES, fromEc2State } from './instance-state';
import { fromTagList, toTagList } from './tags';
import { LaunchRequestOptions, ProviderResource, ProviderResourceState, ResourceClient, TagMap } from './types';

/** EC2 caps the number of values in one describe filter. */
const MAX_TAG_FILTER_VALUES = 200;
const MAX_INSTANCE_IDS_PER_REQUEST = 200;

// 'a' is left to the root volume; letters wrap from z back to b
const DATA_VOLUME_DEVICE_PREFIX = '/dev/sd';
const DATA_VOLUME_DEVICE_LETTERS = 'fghijklmnopqrstuvwxyzbcde';

const KNOWN_INSTANCE_TYPES: ReadonlySet<string> = new Set<string>(Object.values(_InstanceType));

function isInstanceType(value: string): value is _InstanceType {
  return KNOWN_INSTANCE_TYPES.has(value);
}

/**
 * Device names for `count` data volumes, skipping the ones the image maps.
 */
export function dataVolumeDeviceNames(count: number, taken: ReadonlySet<string>): string[] {
  const free = [...DATA_VOLUME_DEVICE_LETTERS]
    .map(letter => `${DATA_VOLUME_DEVICE_PREFIX}${letter}`)
    .filter(name => !taken.has(name));
  if (free.length < count) {
    throw new RangeError(`Only ${free.length} device names are free for ${count} EBS volumes`);
  }
  return free.slice(0, count);
}

export interface Ec2ResourceClientOptions {
  logger?: Logger;
  naming?: ResourceNamingService;
}

export class Ec2ResourceClient implements ResourceClient {
  readonly kind = 'ec2' as const;

  private client: EC2Client;
  private logger: Logger;
  private naming: ResourceNamingService;
  private images = new Map<string, Promise<Image>>();

  constructor(aws: AWSConfig, options: Ec2ResourceClientOptions = {}) {
    this.client = new EC2Client(createSdkClientConfig(aws));
    this.logger = options.logger ?? silentLogger;
    this.naming = options.naming ?? new ResourceNamingService();
  }

  async launch(
    template: InstanceTemplate,
    virtualInstanceId: VirtualInstanceId,
    tags: TagMap,
    options: LaunchRequestOptions = {}
  ): Promise<ProviderResource> {
    const ec2Template = this.requireEc2Template(template);
    const instanceType = this.requireInstanceType(ec2Template.type);
    const image = await this.getImage(ec2Template.image);
    const request = this.buildRunInstancesRequest(ec2Template, instanceType, image, tags);
    // SDK retries resend this input unchanged; a later allocation gets a new token
    request.ClientToken = this.naming.generateClientToken(virtualInstanceId, options.requestId ?? uuidv4());

    this.logger.debug(`>> Run instance request type: ${ec2Template.type}, image: ${ec2Template.image}`);
    const result = await this.client.send(new RunInstancesCommand(request));

    const instance = result.Instances?.[0];
    if (!instance?.InstanceId) {
      throw new Error(`RunInstances for ${virtualInstanceId} returned no instance`);
    }
    this.logger.debug(`<< Reservation ${result.ReservationId ?? 'unknown'} with instance ${instance.InstanceId}`);

    return this.toProviderResource(instance);
  }

  async describeByTag(tagKey: string, values: string[]): Promise<ProviderResource[]> {
    const resources: ProviderResource[] = [];
    for (const valueChunk of chunk(values, MAX_TAG_FILTER_VALUES)) {
      const instances = await this.describeInstances([{ Name: `tag:${tagKey}`, Values: valueChunk }]);
      resources.push(...instances.map(instance => this.toProviderResource(instance)));
    }
    return resources;
  }

  async describeById(instanceIds: string[]): Promise<ProviderResource[]> {
    const resources: ProviderResource[] = [];
    for (const idChunk of chunk(instanceIds, MAX_INSTANCE_IDS_PER_REQUEST)) {
      const instances = await this.describeInstances([{ Name: 'instance-id', Values: idChunk }]);
      resources.push(...instances.map(instance => this.toProviderResource(instance)));
    }
    return resources;
  }

  async describeStatesByTag(tagKey: string, values: string[]): Promise<ProviderResourceState[]> {
    const states: ProviderResourceState[] = [];
    for (const valueChunk of chunk(values, MAX_TAG_FILTER_VALUES)) {
      const instances = await this.describeInstances([{ Name: `tag:${tagKey}`, Values: valueChunk }]);
      for (const instance of instances) {
        if (instance.InstanceId) {
          states.push({
            providerResourceId: instance.InstanceId,
            state: instance.State?.Name ?? 'unknown',
            tags: fromTagList(instance.Tags)
          });
        }
      }
    }
    return states;
  }

  async tag(instanceId: string, tags: TagMap): Promise<void> {
    this.logger.debug(`>> Tagging instance ${instanceId}`);
    await this.client.send(new CreateTagsCommand({
      Resources: [instanceId],
      Tags: toTagList(tags)
    }));
  }

  async terminate(instanceIds: string[]): Promise<string[]> {
    const unknown: string[] = [];
    const failures: TerminationFailure[] = [];

    for (const idChunk of chunk(instanceIds, MAX_INSTANCE_IDS_PER_REQUEST)) {
      await this.terminateChunk(idChunk, unknown, failures);
    }

    if (failures.length > 0) {
      throw new TerminationError(failures);
    }
    return unknown;
  }

  async describeExtendedAttributes(instanceId: string): Promise<TagMap> {
    const result = await this.client.send(new DescribeInstanceAttributeCommand({
      InstanceId: instanceId,
      Attribute: 'sriovNetSupport'
    }));
    const sriovNetSupport = result.SriovNetSupport?.Value;
    return sriovNetSupport ? { sriovNetSupport } : {};
  }

  isTerminal(state: string): boolean {
    return EC2_TERMINAL_STATES.has(state.toLowerCase());
  }

  isReady(resource: ProviderResource): boolean {
    return resource.state === 'running' && Boolean(resource.address);
  }

  toInstanceStatus(state: string | undefined): InstanceStatus {
    return fromEc2State(state);
  }

  private async terminateChunk(idChunk: string[], unknown: string[], failures: TerminationFailure[]): Promise<void> {
    this.logger.info(`>> Terminating ${idChunk.join(', ')}`);
    try {
      const result = await this.client.send(new TerminateInstancesCommand({ InstanceIds: idChunk }));
      const summary = (result.TerminatingInstances ?? [])
        .map(change => `${change.InstanceId}: ${change.PreviousState?.Name} -> ${change.CurrentState?.Name}`);
      this.logger.info(`<< Result ${summary.join(', ')}`);
    } catch (error) {
      if (isNotFoundError(error) && idChunk.length > 1) {
        // EC2 rejects the whole request for one unknown ID; find out which one
        for (const instanceId of idChunk) {
          await this.terminateChunk([instanceId], unknown, failures);
        }
        return;
      }
      if (isNotFoundError(error)) {
        this.logger.warn(`Instance ${idChunk[0]} is unknown to EC2`);
        unknown.push(idChunk[0]);
        return;
      }
      const reason = describeProviderError(error);
      failures.push(...idChunk.map(providerResourceId => ({ providerResourceId, reason })));
    }
  }

  private getImage(imageId: string): Promise<Image> {
    let image = this.images.get(imageId);
    if (!image) {
      image = this.describeImage(imageId);
      this.images.set(imageId, image);
    }
    return image;
  }

  private async describeImage(imageId: string): Promise<Image> {
    try {
      this.logger.debug(`>> Describing image ${imageId}`);
      const result = await this.client.send(new DescribeImagesCommand({ ImageIds: [imageId] }));
      const image = result.Images?.[0];
      if (!image) {
        throw new Error(`Image ${imageId} not found`);
      }
      this.logger.debug(`<< Image ${imageId} root device ${image.RootDeviceName ?? 'unknown'}`);
      return image;
    } catch (error) {
      this.images.delete(imageId);
      throw error;
    }
  }

  private async describeInstances(filters: Filter[]): Promise<Instance[]> {
    const instances: Instance[] = [];
    let nextToken: string | undefined;

    do {
      const result = await this.client.send(new DescribeInstancesCommand({
        Filters: filters,
        NextToken: nextToken
      }));
      for (const reservation of result.Reservations ?? []) {
        instances.push(...(reservation.Instances ?? []));
      }
      nextToken = result.NextToken;
    } while (nextToken);

    return instances;
  }

  private buildRunInstancesRequest(
    template: Ec2InstanceTemplate,
    instanceType: _InstanceType,
    image: Image,
    tags: TagMap
  ): RunInstancesCommandInput {
    const request: RunInstancesCommandInput = {
      ImageId: template.image,
      InstanceType: instanceType,
      MinCount: 1,
      MaxCount: 1,
      EbsOptimized: template.ebsOptimized,
      NetworkInterfaces: [{
        DeviceIndex: 0,
        SubnetId: template.subnetId,
        Groups: template.securityGroupIds.length > 0 ? template.securityGroupIds : undefined,
        AssociatePublicIpAddress: template.associatePublicIpAddress,
        DeleteOnTermination: true
      }],
      BlockDeviceMappings: this.buildBlockDeviceMappings(template, image),
      Placement: {
        AvailabilityZone: template.availabilityZone,
        GroupName: template.placementGroup,
        Tenancy: template.tenancy
      }
    };

    if (template.iamProfileName) {
      request.IamInstanceProfile = { Name: template.iamProfileName };
    }
    if (template.keyName) {
      request.KeyName = template.keyName;
    }
    if (template.userData) {
      request.UserData = Buffer.from(template.userData, 'utf8').toString('base64');
    }

    const tagList = toTagList(tags);
    if (tagList.length > 0) {
      request.TagSpecifications = [
        { ResourceType: 'instance', Tags: tagList },
        { ResourceType: 'volume', Tags: tagList }
      ];
    }

    return request;
  }

  /**
   * Resizes the image's own root device and appends the template's data
   * volumes on device names the image does not use.
   */
  private buildBlockDeviceMappings(template: Ec2InstanceTemplate, image: Image): BlockDeviceMapping[] {
    if (image.RootDeviceType !== 'ebs') {
      throw new Error(`The root device for image ${template.image} must be "ebs", found: ${image.RootDeviceType ?? 'none'}`);
    }
    const imageMappings = image.BlockDeviceMappings ?? [];
    const rootDeviceName = image.RootDeviceName;
    if (!rootDeviceName || !imageMappings.some(mapping => mapping.DeviceName === rootDeviceName)) {
      throw new Error(`Could not determine root device for image ${template.image}`);
    }

    const mappings: BlockDeviceMapping[] = [{
      DeviceName: rootDeviceName,
      Ebs: {
        VolumeSize: template.rootVolumeSizeGB,
        VolumeType: template.rootVolumeType,
        DeleteOnTermination: true
      }
    }];

    const taken = new Set(imageMappings.map(mapping => mapping.DeviceName ?? ''));
    for (const deviceName of dataVolumeDeviceNames(template.ebsVolumeCount, taken)) {
      const ebs: EbsBlockDevice = {
        VolumeSize: template.ebsVolumeSizeGiB,
        VolumeType: template.ebsVolumeType,
        Encrypted: template.enableEbsEncryption,
        DeleteOnTermination: true
      };
      if (template.ebsIops !== undefined) {
        ebs.Iops = template.ebsIops;
      }
      if (template.ebsKmsKeyId) {
        ebs.KmsKeyId = template.ebsKmsKeyId;
      }
      mappings.push({ DeviceName: deviceName, Ebs: ebs });
    }

    this.logger.debug(`>> Block device mappings: ${mappings.map(mapping => mapping.DeviceName).join(', ')}`);
    return mappings;
  }

  private toProviderResource(instance: Instance): ProviderResource {
    return {
      providerResourceId: instance.InstanceId ?? '',
      state: instance.State?.Name ?? 'unknown',
      address: instance.PrivateIpAddress,
      tags: fromTagList(instance.Tags),
      raw: instance
    };
  }

  private requireInstanceType(type: string): _InstanceType {
    if (!isInstanceType(type)) {
      throw new Error(`Unsupported EC2 instance type: ${type}`);
    }
    return type;
  }

  private requireEc2Template(template: InstanceTemplate): Ec2InstanceTemplate {
    if (template.kind !== 'ec2') {
      throw new TypeError(`EC2 client cannot launch a ${template.kind} template (${template.name})`);
    }
    return template;
  }
}
