/**
 * AWS Clients
 *
 * S3 (archive), Kinesis (stream) and SQS (warehouse queue). Credentials
 * fall back to the default provider chain when not configured explicitly.
 * SDK-level retries are disabled: the dispatcher owns the retry budget.
 */

import { KinesisClient } from '@aws-sdk/client-kinesis';
import { S3Client } from '@aws-sdk/client-s3';
import { SQSClient } from '@aws-sdk/client-sqs';
import type { AppConfig } from './env';

export interface AwsClients {
  s3: S3Client;
  kinesis: KinesisClient;
  sqs: SQSClient;
}

export function createAwsClients(config: AppConfig['aws']): AwsClients {
  const shared = {
    region: config.region,
    maxAttempts: 1,
    ...(config.credentials && { credentials: config.credentials }),
  };

  return {
    s3: new S3Client(shared),
    kinesis: new KinesisClient(shared),
    sqs: new SQSClient(shared),
  };
}

export function destroyAwsClients(clients: AwsClients): void {
  clients.s3.destroy();
  clients.kinesis.destroy();
  clients.sqs.destroy();
}
