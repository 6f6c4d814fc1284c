import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { fromIni, fromEnv } from '@aws-sdk/credential-providers';
import type { Config } from '../types/index.js';

interface ClientOptions {
  profile?: string;
  region?: string;
}

function resolveOptions(config: Pick<Config, 'awsProfile' | 'awsRegion'>, overrides?: ClientOptions) {
  const region = overrides?.region ?? process.env.AWS_REGION ?? config.awsRegion;

  // Prefer env vars if set, fall back to INI profile
  const hasEnvCreds = process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY;
  const credentials = hasEnvCreds
    ? fromEnv()
    : fromIni({ profile: overrides?.profile ?? config.awsProfile });

  return { region, credentials };
}

export function createDynamoDBClient(
  config: Pick<Config, 'awsProfile' | 'awsRegion'>,
  overrides?: ClientOptions,
): DynamoDBClient {
  return new DynamoDBClient(resolveOptions(config, overrides));
}
