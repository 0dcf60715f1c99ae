/**
 * Shared AWS SDK client configuration.
 *
 * Every command builds its clients once from these options and passes them
 * down; no module holds a client of its own.
 */

import { fromIni } from '@aws-sdk/credential-provider-ini';

export interface AwsConnectionOptions {
  /**
   * Named profile from the shared config/credentials files (SSO profiles included).
   */
  profile?: string;
  region?: string;
}

export interface AwsClientConfig {
  region?: string;
  credentials?: ReturnType<typeof fromIni>;
}

/**
 * Builds the constructor options shared by every service client.
 *
 * Without a profile the SDK's default credential chain is used.
 *
 * @example
 * const s3 = new S3Client(awsClientConfig({ profile: 'analytics', region: 'eu-west-1' }));
 */
export function awsClientConfig(options: AwsConnectionOptions): AwsClientConfig {
  const config: AwsClientConfig = {};
  if (options.region) {
    config.region = options.region;
  }
  if (options.profile) {
    config.credentials = fromIni({ profile: options.profile });
  }
  return config;
}

