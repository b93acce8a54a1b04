import { fromIni } from '@aws-sdk/credential-providers';
import { AWSConfig } from '../types';

export interface SdkClientConfig {
  region: string;
  maxAttempts: number;
  endpoint?: string;
  credentials?: ReturnType<typeof fromIni>;
}

/**
 * Shared SDK client settings. Throttling and transient errors are retried by
 * the SDK itself, up to `maxAttempts`.
 */
export function createSdkClientConfig(aws: AWSConfig): SdkClientConfig {
  return {
    region: aws.region,
    maxAttempts: aws.maxAttempts,
    endpoint: aws.endpoint,
    credentials: aws.profile ? fromIni({ profile: aws.profile }) : undefined
  };
}
