import { describe, it, expect, beforeEach } from 'vitest';
import { ResourceNamingService, createNamingService } from '../naming';
import { RdsInstanceTemplate } from '../../types';

const template: RdsInstanceTemplate = {
  kind: 'rds',
  name: 'metastore',
  engine: 'postgres',
  instanceClass: 'db.t3.medium',
  allocatedStorage: 20,
  masterUsername: 'dbadmin',
  masterUserPassword: 'test-secret',
  vpcSecurityGroupIds: [],
  multiAz: false,
  storageEncrypted: true,
  backupRetentionPeriod: 7,
  publiclyAccessible: false,
  instanceNamePrefix: 'metastore',
  tags: {}
};

describe('Resource Naming Service', () => {
  let namingService: ResourceNamingService;

  beforeEach(() => {
    namingService = new ResourceNamingService();
  });

  describe('generateInstanceName', () => {
    it('should join the prefix and the virtual instance ID', () => {
      expect(namingService.generateInstanceName(template, 'db-1')).toBe('metastore-db-1');
    });

    it('should use the bare ID without a prefix', () => {
      expect(namingService.generateInstanceName({ ...template, instanceNamePrefix: '' }, 'db-1')).toBe('db-1');
    });
  });

  describe('generateDbInstanceIdentifier', () => {
    it('should produce a lower-case identifier from prefix and ID', () => {
      expect(namingService.generateDbInstanceIdentifier(template, 'db-1')).toBe('metastore-db-1');
    });

    it('should sanitize invalid characters and mark the change with a hash of the ID', () => {
      expect(namingService.generateDbInstanceIdentifier({ ...template, instanceNamePrefix: 'Meta' }, 'Node_01.A')).toBe(
        'meta-node-01-a-u7wlm7'
      );
    });

    it('should keep IDs apart that only differ in characters RDS does not accept', () => {
      const identifiers = ['vm-1', 'vm_1', 'vm.1', 'VM-1'].map(id => namingService.generateDbInstanceIdentifier(template, id));

      expect(identifiers).toEqual(['metastore-vm-1', 'metastore-vm-1-25nl5', 'metastore-vm-1-25mey', 'metastore-vm-1-1kj2z']);
    });

    it('should handle names that start with numbers', () => {
      expect(namingService.generateDbInstanceIdentifier({ ...template, instanceNamePrefix: '' }, '123')).toBe('db-123-11ki');
      expect(namingService.generateDbInstanceIdentifier({ ...template, instanceNamePrefix: '' }, 'db-123')).toBe('db-123');
    });

    it('should keep the hash when truncating a sanitized name', () => {
      const identifier = namingService.generateDbInstanceIdentifier(template, `${'x'.repeat(80)}_`);

      expect(identifier.length).toBeLessThanOrEqual(63);
      expect(identifier).toMatch(/^metastore-x+-[a-z0-9]+$/);
      expect(identifier).not.toBe(namingService.generateDbInstanceIdentifier(template, `${'x'.repeat(80)}.`));
    });

    it('should truncate long names and add hash for uniqueness', () => {
      const first = namingService.generateDbInstanceIdentifier(template, 'x'.repeat(80));
      const second = namingService.generateDbInstanceIdentifier(template, 'x'.repeat(81));

      expect(first.length).toBeLessThanOrEqual(63);
      expect(first).toMatch(/^metastore-x+-[a-z0-9]+$/);
      expect(first).not.toBe(second);
      expect(namingService.generateDbInstanceIdentifier(template, 'x'.repeat(80))).toBe(first);
    });
  });

  describe('generateClientToken', () => {
    it('should be stable for the same ID and request ID', () => {
      const token = namingService.generateClientToken('vm-1', 'allocation-1');

      expect(token).toMatch(/^[0-9a-f]{32}$/);
      expect(namingService.generateClientToken('vm-1', 'allocation-1')).toBe(token);
      expect(namingService.generateClientToken('vm-1', 'allocation-2')).not.toBe(token);
      expect(namingService.generateClientToken('vm-2', 'allocation-1')).not.toBe(token);
    });
  });

  describe('sanitizeName', () => {
    it('should handle special characters and consecutive hyphens', () => {
      expect(namingService.sanitizeName('--a__b--')).toBe('a-b');
    });

    it('should fall back to a default for empty names', () => {
      expect(namingService.sanitizeName('')).toBe('db');
      expect(namingService.sanitizeName('***')).toBe('db');
    });
  });

  describe('createNamingService', () => {
    it('should create a new ResourceNamingService instance', () => {
      expect(createNamingService()).toBeInstanceOf(ResourceNamingService);
    });
  });
});
