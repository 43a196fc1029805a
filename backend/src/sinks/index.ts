/**
 * Sink Registry
 *
 * The set of sinks is fixed at start-up from configuration; the dispatcher
 * iterates whatever this returns.
 */

import type { SinkToggles } from '../config/env';
import { ArchiveSink } from './archive.sink';
import type { ObjectStoreClient } from './archive.sink';
import { LookupStoreSink } from './lookup-store.sink';
import type { LocationHashClient } from './lookup-store.sink';
import { StreamSink } from './stream.sink';
import type { RecordStreamClient } from './stream.sink';
import { WarehouseSink } from './warehouse.sink';
import type { QueueClient } from './warehouse.sink';
import type { Sink } from './sink';

export type { Sink, SinkDelivery } from './sink';
export { ArchiveSink, archiveKey, rejectedArchiveKey } from './archive.sink';
export type { ObjectStoreClient } from './archive.sink';
export { LookupStoreSink, lookupKey } from './lookup-store.sink';
export type { LocationHashClient } from './lookup-store.sink';
export { StreamSink, streamPayload } from './stream.sink';
export type { RecordStreamClient } from './stream.sink';
export { WarehouseSink, warehouseEnvelope, WAREHOUSE_ENVELOPE_SCHEMA } from './warehouse.sink';
export type { QueueClient } from './warehouse.sink';

export interface SinkClients {
  redis: LocationHashClient;
  s3: ObjectStoreClient;
  kinesis: RecordStreamClient;
  sqs: QueueClient;
}

export interface SinkTargets {
  bucket: string;
  streamName: string;
  warehouseQueueUrl: string | undefined;
}

export interface SinkSet {
  sinks: readonly Sink[];
  /** Present whenever archiving is enabled; also used for rejected payloads. */
  archive: ArchiveSink | null;
}

export function buildSinks(toggles: SinkToggles, clients: SinkClients, targets: SinkTargets): SinkSet {
  const sinks: Sink[] = [];
  let archive: ArchiveSink | null = null;

  if (toggles.lookup) {
    sinks.push(new LookupStoreSink(clients.redis));
  }
  if (toggles.archive) {
    archive = new ArchiveSink(clients.s3, targets.bucket);
    sinks.push(archive);
  }
  if (toggles.stream) {
    sinks.push(new StreamSink(clients.kinesis, targets.streamName));
  }
  if (toggles.warehouse && targets.warehouseQueueUrl) {
    sinks.push(new WarehouseSink(clients.sqs, targets.warehouseQueueUrl));
  }

  return { sinks: Object.freeze(sinks), archive };
}
