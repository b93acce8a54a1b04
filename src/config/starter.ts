/**
 * The configuration `instance-allocator init` writes. The database password
 * is read from `DB_PASSWORD` when the file is loaded.
 */
export function renderStarterConfig(generatedAt: Date): string {
  return `# Instance allocator configuration
# Generated on ${generatedAt.toISOString()}

aws:
  region: \${AWS_REGION:-us-east-1}
  # profile: default  # Uncomment to use a specific AWS profile
  maxAttempts: 3

allocation:
  taggingStrategy: tag-on-create  # or tag-after-create
  pollIntervalMs: 5000
  waitUntilReadyMs: 1800000
  waitUntilFindableMs: 600000
  tagRetryIntervalMs: 1000
  terminateOnFailure: true

tags:
  correlationKey: instance-allocator:virtual-id
  common:
    Environment: production
    # Add your custom tags here

templates:
  worker:
    kind: ec2
    image: ami-0123456789abcdef0
    type: t3.medium
    # subnetId: subnet-0123456789abcdef0
    securityGroupIds: []
    rootVolumeSizeGB: 50
    # ebsVolumeCount: 2  # Extra data volumes, deleted with the instance
    # ebsVolumeType: st1
    instanceNamePrefix: worker

  metastore:
    kind: rds
    engine: postgres
    instanceClass: db.t3.medium
    allocatedStorage: 20
    masterUsername: dbadmin
    masterUserPassword: \${DB_PASSWORD}
    instanceNamePrefix: metastore
`;
}
