import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RdsResourceClient } from '../rds-resource-client';
import { TerminationError } from '../errors';
import { RdsInstanceTemplate } from '../../types';

const { send } = vi.hoisted(() => ({ send: vi.fn() }));

vi.mock('@aws-sdk/client-rds', () => ({
  RDSClient: vi.fn(function () {
    return { send };
  }),
  CreateDBInstanceCommand: vi.fn(function (input: unknown) {
    return { command: 'CreateDBInstance', input };
  }),
  DescribeDBInstancesCommand: vi.fn(function (input: unknown) {
    return { command: 'DescribeDBInstances', input };
  }),
  AddTagsToResourceCommand: vi.fn(function (input: unknown) {
    return { command: 'AddTagsToResource', input };
  }),
  DeleteDBInstanceCommand: vi.fn(function (input: unknown) {
    return { command: 'DeleteDBInstance', input };
  })
}));

const template: RdsInstanceTemplate = {
  kind: 'rds',
  name: 'metastore',
  engine: 'postgres',
  engineVersion: '15.4',
  instanceClass: 'db.t3.medium',
  allocatedStorage: 20,
  storageType: 'gp3',
  masterUsername: 'dbadmin',
  masterUserPassword: 'test-secret',
  dbName: 'metastore',
  dbSubnetGroupName: 'private',
  vpcSecurityGroupIds: ['sg-1'],
  availabilityZone: 'us-east-1a',
  multiAz: false,
  storageEncrypted: true,
  backupRetentionPeriod: 7,
  publiclyAccessible: false,
  instanceNamePrefix: 'metastore',
  tags: {}
};

function dbInstance(identifier: string, status: string, tags: Record<string, string>, address?: string) {
  return {
    DBInstanceIdentifier: identifier,
    DBInstanceArn: `arn:aws:rds:us-east-1:000000000000:db:${identifier}`,
    DBInstanceStatus: status,
    Endpoint: address ? { Address: address, Port: 5432 } : undefined,
    TagList: Object.entries(tags).map(([Key, Value]) => ({ Key, Value }))
  };
}

describe('RdsResourceClient', () => {
  let client: RdsResourceClient;

  beforeEach(() => {
    send.mockReset();
    client = new RdsResourceClient({ region: 'us-east-1', maxAttempts: 3 });
  });

  describe('launch', () => {
    it('should create a DB instance with a deterministic identifier and tags', async () => {
      send.mockResolvedValueOnce({ DBInstance: dbInstance('metastore-db-1', 'creating', {}) });

      const resource = await client.launch(template, 'db-1', { 'allocator:id': 'db-1' });

      const { command, input } = send.mock.calls[0][0];
      expect(command).toBe('CreateDBInstance');
      expect(input).toMatchObject({
        DBInstanceIdentifier: 'metastore-db-1',
        DBInstanceClass: 'db.t3.medium',
        Engine: 'postgres',
        EngineVersion: '15.4',
        AllocatedStorage: 20,
        StorageType: 'gp3',
        MasterUsername: 'dbadmin',
        MasterUserPassword: 'test-secret',
        DBName: 'metastore',
        DBSubnetGroupName: 'private',
        VpcSecurityGroupIds: ['sg-1'],
        AvailabilityZone: 'us-east-1a',
        MultiAZ: false,
        StorageEncrypted: true,
        BackupRetentionPeriod: 7,
        PubliclyAccessible: false,
        Tags: [{ Key: 'allocator:id', Value: 'db-1' }]
      });
      expect(resource.providerResourceId).toBe('metastore-db-1');
      expect(resource.state).toBe('creating');
    });

    it('should leave the availability zone to RDS for Multi-AZ instances', async () => {
      send.mockResolvedValueOnce({ DBInstance: dbInstance('metastore-db-1', 'creating', {}) });

      await client.launch({ ...template, multiAz: true }, 'db-1', {});

      const { input } = send.mock.calls[0][0];
      expect(input.AvailabilityZone).toBeUndefined();
      expect(input.MultiAZ).toBe(true);
      expect(input.Tags).toBeUndefined();
    });
  });

  describe('describeByTag', () => {
    it('should page through DB instances and match tags locally', async () => {
      send
        .mockResolvedValueOnce({
          DBInstances: [
            dbInstance('metastore-a', 'available', { 'allocator:id': 'a' }, 'a.example.internal'),
            dbInstance('unrelated', 'available', { Team: 'web' })
          ],
          Marker: 'next'
        })
        .mockResolvedValueOnce({
          DBInstances: [dbInstance('metastore-c', 'Creating', { 'allocator:id': 'c' })]
        });

      const resources = await client.describeByTag('allocator:id', ['a', 'c']);

      expect(send).toHaveBeenCalledTimes(2);
      expect(send.mock.calls[0][0].input).toEqual({ Filters: undefined, Marker: undefined });
      expect(send.mock.calls[1][0].input.Marker).toBe('next');
      expect(resources.map(resource => [resource.providerResourceId, resource.state, resource.address])).toEqual([
        ['metastore-a', 'available', 'a.example.internal'],
        ['metastore-c', 'creating', undefined]
      ]);
    });

    it('should not call RDS for an empty list', async () => {
      expect(await client.describeByTag('allocator:id', [])).toEqual([]);
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe('describeById', () => {
    it('should filter by DB instance identifier', async () => {
      send.mockResolvedValueOnce({ DBInstances: [] });

      await client.describeById(['metastore-a']);

      expect(send.mock.calls[0][0].input.Filters).toEqual([{ Name: 'db-instance-id', Values: ['metastore-a'] }]);
    });
  });

  describe('tag', () => {
    it('should look up the ARN and tag it', async () => {
      send
        .mockResolvedValueOnce({ DBInstances: [dbInstance('metastore-a', 'creating', {})] })
        .mockResolvedValueOnce({});

      await client.tag('metastore-a', { 'allocator:id': 'a' });

      expect(send.mock.calls[1][0]).toEqual({
        command: 'AddTagsToResource',
        input: {
          ResourceName: 'arn:aws:rds:us-east-1:000000000000:db:metastore-a',
          Tags: [{ Key: 'allocator:id', Value: 'a' }]
        }
      });
    });

    it('should fail while the DB instance is not visible', async () => {
      send.mockResolvedValueOnce({ DBInstances: [] });

      await expect(client.tag('metastore-a', { 'allocator:id': 'a' })).rejects.toThrow('DB instance metastore-a is not visible yet');
      expect(send).toHaveBeenCalledTimes(1);
    });
  });

  describe('terminate', () => {
    it('should delete each DB instance without a final snapshot', async () => {
      send.mockResolvedValue({ DBInstance: { DBInstanceStatus: 'deleting' } });

      await client.terminate(['metastore-a', 'metastore-b']);

      expect(send.mock.calls.map(call => call[0].input)).toEqual([
        { DBInstanceIdentifier: 'metastore-a', SkipFinalSnapshot: true, DeleteAutomatedBackups: true },
        { DBInstanceIdentifier: 'metastore-b', SkipFinalSnapshot: true, DeleteAutomatedBackups: true }
      ]);
    });

    it('should treat a DB instance that no longer exists as deleted', async () => {
      const missing = new Error('DBInstance metastore-a not found');
      missing.name = 'DBInstanceNotFoundFault';
      send.mockRejectedValueOnce(missing);

      await expect(client.terminate(['metastore-a'])).resolves.toEqual(['metastore-a']);
    });

    it('should attempt every DB instance before reporting the ones that failed', async () => {
      const busy = new Error('DB instance metastore-a is not in available state');
      busy.name = 'InvalidDBInstanceStateFault';
      send.mockRejectedValueOnce(busy).mockResolvedValueOnce({ DBInstance: { DBInstanceStatus: 'deleting' } });

      const result = client.terminate(['metastore-a', 'metastore-b']);

      await expect(result).rejects.toBeInstanceOf(TerminationError);
      await expect(result).rejects.toMatchObject({
        failures: [
          { providerResourceId: 'metastore-a', reason: 'InvalidDBInstanceStateFault: DB instance metastore-a is not in available state' }
        ]
      });
      expect(send.mock.calls.map(call => call[0].input.DBInstanceIdentifier)).toEqual(['metastore-a', 'metastore-b']);
    });
  });

  describe('state helpers', () => {
    it('should only call an available instance with an endpoint ready', () => {
      const base = { providerResourceId: 'metastore-a', tags: {}, raw: {} };

      expect(client.isReady({ ...base, state: 'available', address: 'a.example.internal' })).toBe(true);
      expect(client.isReady({ ...base, state: 'available' })).toBe(false);
      expect(client.isReady({ ...base, state: 'backing-up', address: 'a.example.internal' })).toBe(false);
    });

    it('should map RDS statuses to abstract statuses', () => {
      expect(client.toInstanceStatus('available')).toBe('running');
      expect(client.toInstanceStatus('storage-full')).toBe('failed');
      expect(client.isTerminal('restore-error')).toBe(true);
      expect(client.isTerminal('storage-full')).toBe(false);
    });
  });
});
