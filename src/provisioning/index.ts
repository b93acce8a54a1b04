import { ResourceNamingService } from '../config/naming';
import { AWSConfig, ResourceKind } from '../types';
import { Logger } from '../utils/logger';
import { Ec2ResourceClient } from './ec2-resource-client';
import { RdsResourceClient } from './rds-resource-client';
import { ResourceClient } from './types';

export interface ResourceClientOptions {
  logger?: Logger;
  naming?: ResourceNamingService;
}

export function createResourceClient(kind: ResourceKind, aws: AWSConfig, options: ResourceClientOptions = {}): ResourceClient {
  switch (kind) {
    case 'ec2':
      return new Ec2ResourceClient(aws, options);
    case 'rds':
      return new RdsResourceClient(aws, options);
  }
}

export { Ec2ResourceClient } from './ec2-resource-client';
export { RdsResourceClient } from './rds-resource-client';
export * from './errors';
export * from './instance-state';
export * from './tags';
export * from './types';
