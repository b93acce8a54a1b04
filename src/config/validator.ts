import Joi from 'joi';
import { AllocatorConfig } from '../types';
import { ConfigValidationResult } from './types';

const tagMapSchema = Joi.object()
  .pattern(Joi.string().min(1).max(128), Joi.string().allow('').max(256))
  .default({})
  .messages({
    'object.pattern.match': 'Tags must be key-value pairs of strings'
  });

// Joi schema for AWSConfig
const awsConfigSchema = Joi.object({
  region: Joi.string()
    .pattern(/^[a-z0-9-]+$/)
    .default('us-east-1')
    .messages({
      'string.pattern.base': 'AWS region must be a valid region identifier'
    }),
  profile: Joi.string()
    .optional()
    .messages({
      'string.base': 'AWS profile must be a string'
    }),
  endpoint: Joi.string()
    .uri()
    .optional()
    .messages({
      'string.uri': 'AWS endpoint must be a URL'
    }),
  maxAttempts: Joi.number()
    .integer()
    .min(1)
    .max(10)
    .default(3)
    .messages({
      'number.min': 'maxAttempts must be at least 1',
      'number.max': 'maxAttempts must be no more than 10'
    })
}).default();

// Joi schema for AllocationSettings
const allocationSettingsSchema = Joi.object({
  taggingStrategy: Joi.string()
    .valid('tag-on-create', 'tag-after-create')
    .default('tag-on-create')
    .messages({
      'any.only': 'Tagging strategy must be one of: tag-on-create, tag-after-create'
    }),
  pollIntervalMs: Joi.number()
    .integer()
    .min(0)
    .default(5000)
    .messages({
      'number.min': 'Poll interval must not be negative'
    }),
  waitUntilReadyMs: Joi.number()
    .integer()
    .min(0)
    .default(30 * 60 * 1000),
  waitUntilFindableMs: Joi.number()
    .integer()
    .min(0)
    .default(10 * 60 * 1000),
  tagRetryIntervalMs: Joi.number()
    .integer()
    .min(0)
    .default(1000),
  terminateOnFailure: Joi.boolean()
    .default(true)
    .messages({
      'boolean.base': 'terminateOnFailure must be a boolean value'
    })
}).default();

// Joi schema for TagSettings
const tagSettingsSchema = Joi.object({
  correlationKey: Joi.string()
    .min(1)
    .max(128)
    .pattern(/^(?!aws:)/i)
    .default('instance-allocator:virtual-id')
    .messages({
      'string.pattern.base': 'Correlation key must not use the reserved "aws:" prefix'
    }),
  common: tagMapSchema
}).default();

const namePrefixSchema = Joi.string()
  .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
  .max(40)
  .messages({
    'string.pattern.base': 'Instance name prefix must start with a letter and contain only alphanumeric characters and hyphens'
  });

const ec2TemplateSchema = Joi.object({
  kind: Joi.string().valid('ec2').required(),
  name: Joi.string().required(),
  image: Joi.string()
    .pattern(/^ami-[a-z0-9]+$/)
    .required()
    .messages({
      'string.pattern.base': 'Image must be an AMI ID (e.g., ami-0abc1234)',
      'any.required': 'Image is required for EC2 templates'
    }),
  type: Joi.string().default('t3.medium'),
  subnetId: Joi.string().optional(),
  securityGroupIds: Joi.array().items(Joi.string()).default([]),
  keyName: Joi.string().optional(),
  iamProfileName: Joi.string().optional(),
  availabilityZone: Joi.string().optional(),
  placementGroup: Joi.string().optional(),
  tenancy: Joi.string()
    .valid('default', 'dedicated', 'host')
    .default('default')
    .messages({
      'any.only': 'Tenancy must be one of: default, dedicated, host'
    }),
  userData: Joi.string().optional(),
  rootVolumeSizeGB: Joi.number()
    .integer()
    .min(1)
    .max(16384)
    .default(50)
    .messages({
      'number.min': 'Root volume size must be at least 1 GB',
      'number.max': 'Root volume size must be no more than 16384 GB'
    }),
  rootVolumeType: Joi.string()
    .valid('gp2', 'gp3', 'io1', 'io2', 'st1', 'sc1', 'standard')
    .default('gp3'),
  ebsVolumeCount: Joi.number()
    .integer()
    .min(0)
    .max(24)
    .default(0)
    .messages({
      'number.max': 'No more than 24 EBS data volumes can be attached'
    }),
  ebsVolumeSizeGiB: Joi.number()
    .integer()
    .min(1)
    .max(16384)
    .default(500),
  ebsVolumeType: Joi.string()
    .valid('gp2', 'gp3', 'io1', 'io2', 'st1', 'sc1', 'standard')
    .default('st1'),
  ebsIops: Joi.number().integer().positive().optional(),
  enableEbsEncryption: Joi.boolean().default(false),
  ebsKmsKeyId: Joi.string().optional(),
  ebsOptimized: Joi.boolean().default(false),
  associatePublicIpAddress: Joi.boolean().default(false),
  instanceNamePrefix: namePrefixSchema.default('instance'),
  tags: tagMapSchema
}).when(
  Joi.object({
    ebsVolumeCount: Joi.number().greater(0).required(),
    ebsVolumeType: Joi.valid('io1', 'io2').required()
  }).unknown(),
  {
    then: Joi.object({
      ebsIops: Joi.required().messages({
        'any.required': 'EBS IOPS must be set for io1 and io2 data volumes'
      })
    })
  }
);

const rdsTemplateSchema = Joi.object({
  kind: Joi.string().valid('rds').required(),
  name: Joi.string().required(),
  engine: Joi.string()
    .valid('mysql', 'mariadb', 'postgres', 'oracle-ee', 'oracle-se2', 'sqlserver-ee', 'sqlserver-se', 'sqlserver-ex', 'sqlserver-web')
    .required()
    .messages({
      'any.only': 'Engine must be a supported RDS engine'
    }),
  engineVersion: Joi.string().optional(),
  instanceClass: Joi.string()
    .pattern(/^db\.[a-z0-9]+\.[a-z0-9]+$/)
    .default('db.t3.medium')
    .messages({
      'string.pattern.base': 'Instance class must look like db.<family>.<size>'
    }),
  allocatedStorage: Joi.number()
    .integer()
    .min(20)
    .max(65536)
    .default(20)
    .messages({
      'number.min': 'Allocated storage must be at least 20 GB'
    }),
  storageType: Joi.string().valid('gp2', 'gp3', 'io1', 'standard').optional(),
  masterUsername: Joi.string()
    .pattern(/^[a-zA-Z][a-zA-Z0-9_]*$/)
    .max(63)
    .invalid('rdsadmin')
    .when('engine', { is: 'postgres', then: Joi.invalid('admin', 'postgres') })
    .required()
    .messages({
      'any.invalid': 'Master username is reserved by the database engine'
    }),
  masterUserPassword: Joi.string()
    .min(8)
    .max(128)
    .pattern(/^[^/"@\s]+$/)
    .required()
    .messages({
      'string.min': 'Master user password must be at least 8 characters long',
      'string.pattern.base': 'Master user password must not contain /, ", @ or spaces'
    }),
  dbName: Joi.string().optional(),
  dbSubnetGroupName: Joi.string().optional(),
  vpcSecurityGroupIds: Joi.array().items(Joi.string()).default([]),
  availabilityZone: Joi.string().optional(),
  multiAz: Joi.boolean().default(false),
  storageEncrypted: Joi.boolean().default(true),
  port: Joi.number().integer().min(1150).max(65535).optional(),
  backupRetentionPeriod: Joi.number().integer().min(0).max(35).default(7),
  publiclyAccessible: Joi.boolean().default(false),
  instanceNamePrefix: namePrefixSchema.default('db'),
  tags: tagMapSchema
});

const unknownKindSchema = Joi.object({
  kind: Joi.string()
    .valid('ec2', 'rds')
    .required()
    .messages({
      'any.only': 'Template kind must be one of: ec2, rds',
      'any.required': 'Template kind is required'
    })
}).unknown(true);

const instanceTemplateSchema = Joi.alternatives().conditional(Joi.object({ kind: Joi.valid('ec2') }).unknown(), {
  then: ec2TemplateSchema,
  otherwise: Joi.alternatives().conditional(Joi.object({ kind: Joi.valid('rds') }).unknown(), {
    then: rdsTemplateSchema,
    otherwise: unknownKindSchema
  })
});

// Main AllocatorConfig schema
const allocatorConfigSchema = Joi.object<AllocatorConfig>({
  aws: awsConfigSchema,
  allocation: allocationSettingsSchema,
  tags: tagSettingsSchema,
  templates: Joi.object()
    .pattern(Joi.string(), instanceTemplateSchema)
    .default({})
}).unknown(false);

const validationOptions: Joi.ValidationOptions = {
  abortEarly: false,
  allowUnknown: false,
  stripUnknown: false
};

/**
 * Validates an allocator configuration object against the schema
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = allocatorConfigSchema.validate(config ?? {}, validationOptions);

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates an allocator configuration and applies defaults
 * @throws Error listing every validation problem
 */
export function validateAndNormalizeConfig(config: unknown): AllocatorConfig {
  const { error, value } = allocatorConfigSchema.validate(config ?? {}, validationOptions);

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return value;
}

/**
 * Gets the Joi schema for allocator configuration (useful for testing)
 */
export function getConfigSchema(): Joi.ObjectSchema<AllocatorConfig> {
  return allocatorConfigSchema;
}
