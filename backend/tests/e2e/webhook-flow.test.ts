/**
 * E2E Tests: Webhook ingestion flow
 *
 * Full HTTP round trips through the Express app, with in-memory stores
 * behind the repositories and jest.fn clients behind the real sinks.
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../src/app';
import { loadConfig } from '../../src/config/env';
import { DeliveryLedger } from '../../src/services/delivery-ledger.service';
import { DurabilityLog } from '../../src/services/durability-log.service';
import { IngestionService } from '../../src/services/ingestion.service';
import { SinkDispatcher } from '../../src/services/sink-dispatcher.service';
import { buildSinks } from '../../src/sinks';
import type { LocationHashClient, ObjectStoreClient, QueueClient, RecordStreamClient } from '../../src/sinks';
import { InMemoryDeliveryLedgerStore, InMemoryWebhookLogStore } from '../helpers/in-memory-stores';
import { body, hexKey, locationPayload } from '../helpers/fixtures';

const WEBHOOK = '/webhook-endpoint';

function testConfig(overrides: Record<string, string> = {}) {
  return loadConfig({
    NODE_ENV: 'test',
    SUPABASE_URL: 'http://localhost:54321',
    SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
    SINK_MAX_ATTEMPTS: '2',
    SINK_BACKOFF_BASE_MS: '0',
    SINK_BACKOFF_CAP_MS: '0',
    ...overrides,
  });
}

describe('Webhook ingestion E2E', () => {
  let app: Express;
  let logStore: InMemoryWebhookLogStore;
  let ledgerStore: InMemoryDeliveryLedgerStore;
  let dispatcher: SinkDispatcher;
  let hSet: jest.Mock<LocationHashClient['hSet']>;
  let s3Send: jest.Mock<ObjectStoreClient['send']>;
  let kinesisSend: jest.Mock<RecordStreamClient['send']>;
  let redisPing: jest.Mock<() => Promise<void>>;

  function build(overrides: Record<string, string> = {}): void {
    const config = testConfig(overrides);

    logStore = new InMemoryWebhookLogStore();
    ledgerStore = new InMemoryDeliveryLedgerStore();
    hSet = jest.fn<LocationHashClient['hSet']>().mockResolvedValue(1);
    s3Send = jest.fn<ObjectStoreClient['send']>().mockResolvedValue({ $metadata: {} });
    kinesisSend = jest
      .fn<RecordStreamClient['send']>()
      .mockResolvedValue({ ShardId: 'shardId-000000000000', SequenceNumber: '1', $metadata: {} });
    redisPing = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);

    const { sinks, archive } = buildSinks(
      config.sinks,
      {
        redis: { hSet },
        s3: { send: s3Send },
        kinesis: { send: kinesisSend },
        sqs: { send: jest.fn<QueueClient['send']>() },
      },
      config.aws
    );

    const log = new DurabilityLog(logStore, { maxAttempts: 1 });
    const ledger = new DeliveryLedger(ledgerStore);
    dispatcher = new SinkDispatcher(sinks, ledger, config.retry);
    const ingestion = new IngestionService({
      log,
      dispatcher,
      rejectedArchive: config.archiveRejectedPayloads ? archive : null,
    });

    app = createApp({
      config,
      ingestion,
      log,
      ledger,
      health: {
        database: () => log.ping(),
        redis: redisPing,
        dispatch: () => ({ sinks: dispatcher.sinkNames, inFlight: dispatcher.pending }),
      },
    });
  }

  beforeEach(() => build());

  describe('POST /webhook-endpoint', () => {
    it('acknowledges a location update and delivers it to the lookup store', async () => {
      const response = await request(app).post(WEBHOOK).send(locationPayload()).expect(202);

      expect(response.body).toEqual({
        success: true,
        data: {
          idempotencyKey: expect.stringMatching(/^[0-9a-f]{64}$/),
          duplicate: false,
          receivedAt: expect.any(String),
        },
      });

      await dispatcher.drain();

      expect(hSet).toHaveBeenCalledTimes(1);
      expect(hSet.mock.calls[0][0]).toBe('location:12345');
      expect(hSet.mock.calls[0][1]).toBe('2024-05-01T10:00:00.000Z');
      expect(s3Send).toHaveBeenCalledTimes(1);
      expect(kinesisSend).not.toHaveBeenCalled();
    });

    it('publishes geofence events to the stream', async () => {
      await request(app)
        .post(WEBHOOK)
        .send(locationPayload({ event_type: 'geofence_enter' }))
        .expect(202);
      await dispatcher.drain();

      expect(kinesisSend).toHaveBeenCalledTimes(1);
      expect(kinesisSend.mock.calls[0][0].input.PartitionKey).toBe('12345');
    });

    it('rejects an out-of-range latitude with the reason and field', async () => {
      const response = await request(app)
        .post(WEBHOOK)
        .send(locationPayload({ latitude: 200 }))
        .expect(400);

      expect(response.body).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'location.latitude must be between -90 and 90, got 200',
          reason: 'OutOfRange',
          field: 'location.latitude',
        },
      });
      expect(logStore.insertCalls).toBe(0);

      await dispatcher.drain();
      expect(s3Send).not.toHaveBeenCalled();
      expect(hSet).not.toHaveBeenCalled();
    });

    it('rejects malformed JSON', async () => {
      const response = await request(app)
        .post(WEBHOOK)
        .set('Content-Type', 'application/json')
        .send('{"location":')
        .expect(400);

      expect(response.body.error.reason).toBe('MalformedJson');
      expect(response.body.error.field).toBeNull();
    });

    it('rejects an empty body', async () => {
      const response = await request(app).post(WEBHOOK).expect(400);

      expect(response.body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Request body is empty',
        reason: 'MalformedJson',
        field: null,
      });
    });

    it('accepts bodies regardless of content type', async () => {
      await request(app)
        .post(WEBHOOK)
        .set('Content-Type', 'text/plain')
        .send(body(locationPayload()).toString('utf8'))
        .expect(202);
    });

    it('acknowledges a redelivery as a duplicate without a second fan-out', async () => {
      const first = await request(app).post(WEBHOOK).send(locationPayload()).expect(202);
      await dispatcher.drain();
      const second = await request(app).post(WEBHOOK).send(locationPayload()).expect(202);
      await dispatcher.drain();

      expect(second.body.data.idempotencyKey).toBe(first.body.data.idempotencyKey);
      expect(second.body.data.duplicate).toBe(true);
      expect(logStore.entries.size).toBe(1);
      expect(hSet).toHaveBeenCalledTimes(1);
      expect(s3Send).toHaveBeenCalledTimes(1);
    });

    it('uses the sender id for the key when present', async () => {
      const a = await request(app)
        .post(WEBHOOK)
        .send({ id: 'evt-1', ...locationPayload() })
        .expect(202);
      const b = await request(app)
        .post(WEBHOOK)
        .send({ id: 'evt-1', ...locationPayload({ latitude: 1 }) })
        .expect(202);

      expect(b.body.data.idempotencyKey).toBe(a.body.data.idempotencyKey);
      expect(b.body.data.duplicate).toBe(true);
    });

    it('returns 500 when the durability log cannot persist', async () => {
      logStore.insertFailures.push(new Error('permission denied for table webhook_log'));

      const response = await request(app).post(WEBHOOK).send(locationPayload()).expect(500);

      expect(response.body.error.code).toBe('DURABILITY_ERROR');
      expect(response.body.error.message).toBe(
        'Durability log append failed: permission denied for table webhook_log'
      );
    });

    it('acknowledges even when every sink fails', async () => {
      hSet.mockRejectedValue(new Error('ECONNREFUSED'));
      s3Send.mockRejectedValue(new Error('Access Denied'));

      const response = await request(app).post(WEBHOOK).send(locationPayload()).expect(202);
      await dispatcher.drain();

      const key: string = response.body.data.idempotencyKey;
      expect(ledgerStore.rows.get(`${key}:lookup`)?.status).toEqual({
        state: 'failed',
        reason: 'Redis HSET failed: ECONNREFUSED',
      });
      expect(ledgerStore.rows.get(`${key}:archive`)?.attempts).toBe(2);
    });

    it('answers 413 for bodies over the limit', async () => {
      const response = await request(app)
        .post(WEBHOOK)
        .set('Content-Type', 'application/json')
        .send(Buffer.alloc(1024 * 1024 + 1, 'a'))
        .expect(413);

      expect(response.body.error.code).toBe('PAYLOAD_TOO_LARGE');
    });
  });

  describe('rejected payload archive', () => {
    it('writes the rejected body to the archive when enabled', async () => {
      build({ ARCHIVE_REJECTED_PAYLOADS: 'true' });

      await request(app)
        .post(WEBHOOK)
        .send(locationPayload({ latitude: 200 }))
        .expect(400);
      await new Promise((resolve) => setImmediate(resolve));

      expect(s3Send).toHaveBeenCalledTimes(1);
      expect(s3Send.mock.calls[0][0].input.Key).toMatch(/^rejected\/[0-9a-f]{64}\.json$/);
    });
  });

  describe('GET /api/v1/events/:idempotencyKey', () => {
    it('returns the stored raw body and record', async () => {
      const payload = locationPayload();
      const ack = await request(app).post(WEBHOOK).send(payload).expect(202);
      const key: string = ack.body.data.idempotencyKey;

      const response = await request(app).get(`/api/v1/events/${key}`).expect(200);

      expect(response.body.data).toMatchObject({
        idempotencyKey: key,
        receivedAt: ack.body.data.receivedAt,
        appendedAt: '2024-05-01T10:00:01.000Z',
        rawBody: {
          encoding: 'base64',
          size: body(payload).length,
          data: body(payload).toString('base64'),
        },
        record: {
          location: {
            user_id: '12345',
            latitude: 37.7749,
            longitude: -122.4194,
            event_timestamp: '2024-05-01T10:00:00.000Z',
            event_type: 'location_update',
          },
          trip: null,
          user: null,
        },
      });
    });

    it('returns 404 for an unknown key', async () => {
      const response = await request(app).get(`/api/v1/events/${hexKey('f')}`).expect(404);

      expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: 'Event not found' });
    });

    it('rejects a malformed key', async () => {
      const response = await request(app).get('/api/v1/events/not-a-key').expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.message).toBe('Request validation failed');
    });
  });

  describe('GET /api/v1/deliveries', () => {
    it('lists the delivery status of every applicable sink', async () => {
      const ack = await request(app).post(WEBHOOK).send(locationPayload()).expect(202);
      await dispatcher.drain();
      const key: string = ack.body.data.idempotencyKey;

      const response = await request(app).get(`/api/v1/deliveries/${key}`).expect(200);

      expect(response.body.data.idempotencyKey).toBe(key);
      expect(
        response.body.data.deliveries.map((d: { sink: string; state: string; attempts: number }) => [
          d.sink,
          d.state,
          d.attempts,
        ])
      ).toEqual([
        ['archive', 'delivered', 1],
        ['lookup', 'delivered', 1],
      ]);
    });

    it('lists failed deliveries filtered by sink', async () => {
      kinesisSend.mockRejectedValue(new Error('ProvisionedThroughputExceededException'));

      const ack = await request(app)
        .post(WEBHOOK)
        .send(locationPayload({ event_type: 'geofence_exit' }))
        .expect(202);
      await dispatcher.drain();

      const response = await request(app).get('/api/v1/deliveries/failed?sink=stream').expect(200);

      expect(response.body.data.entries).toEqual([
        {
          idempotencyKey: ack.body.data.idempotencyKey,
          sink: 'stream',
          state: 'failed',
          reason: 'Kinesis PutRecord failed: ProvisionedThroughputExceededException',
          attempts: 2,
          updatedAt: expect.any(String),
        },
      ]);
      expect(response.body.data.pagination).toEqual({ total: 1, limit: 50, offset: 0, hasMore: false });
    });

    it('rejects an unknown sink filter', async () => {
      await request(app).get('/api/v1/deliveries/failed?sink=email').expect(400);
    });
  });

  describe('GET /health', () => {
    it('reports healthy when storage and redis answer', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body.data).toMatchObject({
        status: 'healthy',
        version: 'v1',
        services: { database: { status: 'up' }, redis: { status: 'up' } },
        dispatch: { sinks: ['lookup', 'archive', 'stream'], inFlight: 0 },
      });
    });

    it('reports degraded with 200 when redis is down', async () => {
      redisPing.mockRejectedValue(new Error('The client is closed'));

      const response = await request(app).get('/health').expect(200);

      expect(response.body.data.status).toBe('degraded');
      expect(response.body.data.services.redis).toEqual({ status: 'down', error: 'The client is closed' });
    });
  });

  it('returns 404 for unknown routes', async () => {
    const response = await request(app).get('/nope').expect(404);

    expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route not found', path: '/nope' });
  });
});
