/**
 * Setup Verification Script
 *
 * Checks that configuration parses and every backing service the pipeline
 * writes to is reachable: both Supabase tables, Redis, the S3 bucket, the
 * Kinesis stream and (when enabled) the warehouse queue.
 *
 * Run against a configured .env before the first deploy.
 */

import dotenv from 'dotenv';
import { HeadBucketCommand } from '@aws-sdk/client-s3';
import { DescribeStreamSummaryCommand } from '@aws-sdk/client-kinesis';
import { GetQueueAttributesCommand } from '@aws-sdk/client-sqs';
import { createAwsClients, destroyAwsClients } from '../config/aws';
import { loadConfig } from '../config/env';
import { createRedisClient, disconnectRedis } from '../config/redis';
import { createSupabaseClient } from '../config/supabase';
import { createRepositories } from '../repositories';
import { errorMessage } from '../models/errors/api-error';

export interface SetupCheck {
  name: string;
  /** Remediation hint printed when the check fails */
  hint: string;
  run: () => Promise<void>;
}

export interface SetupCheckResult {
  name: string;
  ok: boolean;
  error?: string;
  hint?: string;
}

/** Runs every check in order; a failing check never stops the others. */
export async function runSetupChecks(checks: readonly SetupCheck[]): Promise<SetupCheckResult[]> {
  const results: SetupCheckResult[] = [];
  for (const check of checks) {
    try {
      await check.run();
      results.push({ name: check.name, ok: true });
    } catch (error) {
      results.push({ name: check.name, ok: false, error: errorMessage(error), hint: check.hint });
    }
  }
  return results;
}

export function formatSetupReport(results: readonly SetupCheckResult[]): string {
  const lines = results.map((r) =>
    r.ok ? `✅ ${r.name}` : `❌ ${r.name}: ${r.error ?? 'failed'}\n   → ${r.hint ?? ''}`
  );
  const failed = results.filter((r) => !r.ok).length;
  lines.push('');
  lines.push(failed === 0 ? 'All checks passed.' : `${failed} of ${results.length} checks failed.`);
  return lines.join('\n');
}

async function verifySetup(): Promise<boolean> {
  dotenv.config();
  const config = loadConfig();

  const repositories = createRepositories(createSupabaseClient(config.supabase));
  const redis = createRedisClient(config.redis);
  const aws = createAwsClients(config.aws);

  const checks: SetupCheck[] = [
    {
      name: 'webhook_log table',
      hint: 'Apply backend/migrations/001_webhook_ingestion.sql in the Supabase SQL editor',
      run: () => repositories.webhookLog.ping(),
    },
    {
      name: 'delivery_ledger table',
      hint: 'Apply backend/migrations/001_webhook_ingestion.sql in the Supabase SQL editor',
      run: () => repositories.deliveryLedger.ping(),
    },
    {
      name: 'Redis',
      hint: 'Check REDIS_URL and that the server is running',
      run: async () => {
        await redis.connect();
        await redis.ping();
      },
    },
    {
      name: `S3 bucket ${config.aws.bucket}`,
      hint: 'Check S3_BUCKET, AWS_REGION and credentials',
      run: async () => {
        await aws.s3.send(new HeadBucketCommand({ Bucket: config.aws.bucket }));
      },
    },
    {
      name: `Kinesis stream ${config.aws.streamName}`,
      hint: 'Check KINESIS_STREAM_NAME, AWS_REGION and credentials',
      run: async () => {
        await aws.kinesis.send(new DescribeStreamSummaryCommand({ StreamName: config.aws.streamName }));
      },
    },
  ];

  const queueUrl = config.aws.warehouseQueueUrl;
  if (config.sinks.warehouse && queueUrl) {
    checks.push({
      name: 'Warehouse queue',
      hint: 'Check WAREHOUSE_QUEUE_URL and credentials',
      run: async () => {
        await aws.sqs.send(new GetQueueAttributesCommand({ QueueUrl: queueUrl, AttributeNames: ['QueueArn'] }));
      },
    });
  }

  try {
    const results = await runSetupChecks(checks);
    console.log(formatSetupReport(results));
    return results.every((r) => r.ok);
  } finally {
    await disconnectRedis(redis);
    destroyAwsClients(aws);
  }
}

if (require.main === module) {
  verifySetup()
    .then((ok) => process.exit(ok ? 0 : 1))
    .catch((error: unknown) => {
      console.error('\nError:', errorMessage(error));
      process.exit(1);
    });
}
