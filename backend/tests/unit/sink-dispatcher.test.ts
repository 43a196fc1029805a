/**
 * Unit Tests: Sink Dispatcher
 *
 * Fake sinks record every attempt; the in-memory ledger store records
 * every status write.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { DeliveryLedger } from '../../src/services/delivery-ledger.service';
import { SinkDispatcher } from '../../src/services/sink-dispatcher.service';
import { FakeSink } from '../helpers/fake-sinks';
import { FAST_LEDGER, FAST_RETRY, handle, record } from '../helpers/fixtures';
import { InMemoryDeliveryLedgerStore } from '../helpers/in-memory-stores';

const geofenceOnly = (r: ReturnType<typeof record>) =>
  r.location.event_type === 'geofence_enter' || r.location.event_type === 'geofence_exit';

describe('SinkDispatcher', () => {
  let store: InMemoryDeliveryLedgerStore;
  let ledger: DeliveryLedger;

  beforeEach(() => {
    store = new InMemoryDeliveryLedgerStore();
    ledger = new DeliveryLedger(store, FAST_LEDGER);
  });

  it('delivers to every accepting sink and records delivered', async () => {
    const lookup = new FakeSink('lookup', { nativeDedup: true });
    const archive = new FakeSink('archive', { nativeDedup: true });
    const dispatcher = new SinkDispatcher([lookup, archive], ledger, FAST_RETRY);

    const result = await dispatcher.dispatch(handle('k1'));

    expect(result).toEqual(
      new Map([
        ['lookup', { state: 'delivered' }],
        ['archive', { state: 'delivered' }],
      ])
    );
    expect(lookup.delivered[0]?.idempotencyKey).toBe('k1');
    await expect(ledger.statusOf('k1', 'archive')).resolves.toMatchObject({
      status: { state: 'delivered' },
      attempts: 1,
    });
  });

  it('records pending before the delivery outcome', async () => {
    const dispatcher = new SinkDispatcher([new FakeSink('lookup')], ledger, FAST_RETRY);

    await dispatcher.dispatch(handle('k1'));

    expect(store.writes.map((w) => w.status.state)).toEqual(['pending', 'delivered']);
  });

  it('leaves sinks that do not accept the record out of the result', async () => {
    const lookup = new FakeSink('lookup');
    const stream = new FakeSink('stream', { accepts: geofenceOnly });
    const dispatcher = new SinkDispatcher([lookup, stream], ledger, FAST_RETRY);

    const result = await dispatcher.dispatch(handle('k1'));

    expect([...result.keys()]).toEqual(['lookup']);
    expect(stream.calls).toHaveLength(0);
    await expect(ledger.statusOf('k1', 'stream')).resolves.toBeNull();
  });

  it('publishes geofence events to the stream sink', async () => {
    const stream = new FakeSink('stream', { accepts: geofenceOnly });
    const dispatcher = new SinkDispatcher([stream], ledger, FAST_RETRY);

    const result = await dispatcher.dispatch(handle('k1', record({ event_type: 'geofence_enter' })));

    expect(result.get('stream')).toEqual({ state: 'delivered' });
    expect(stream.delivered).toHaveLength(1);
  });

  it('isolates a failing sink from the others', async () => {
    const lookup = new FakeSink('lookup');
    const archive = new FakeSink('archive', { alwaysFail: new Error('AccessDenied') });
    const dispatcher = new SinkDispatcher([lookup, archive], ledger, FAST_RETRY);

    const result = await dispatcher.dispatch(handle('k1'));

    expect(result.get('lookup')).toEqual({ state: 'delivered' });
    expect(result.get('archive')).toEqual({ state: 'failed', reason: 'AccessDenied' });
    expect(lookup.delivered).toHaveLength(1);
  });

  it('makes exactly maxAttempts attempts before failing', async () => {
    const archive = new FakeSink('archive', { alwaysFail: new Error('AccessDenied') });
    const dispatcher = new SinkDispatcher([archive], ledger, FAST_RETRY);

    await dispatcher.dispatch(handle('k1'));

    expect(archive.calls).toHaveLength(5);
    await expect(ledger.statusOf('k1', 'archive')).resolves.toMatchObject({
      status: { state: 'failed', reason: 'AccessDenied' },
      attempts: 5,
    });
  });

  it('recovers after transient failures', async () => {
    const lookup = new FakeSink('lookup', {
      failures: [new Error('ECONNRESET'), new Error('ECONNRESET')],
    });
    const dispatcher = new SinkDispatcher([lookup], ledger, FAST_RETRY);

    const result = await dispatcher.dispatch(handle('k1'));

    expect(result.get('lookup')).toEqual({ state: 'delivered' });
    expect(lookup.calls).toHaveLength(3);
    await expect(ledger.statusOf('k1', 'lookup')).resolves.toMatchObject({ attempts: 3 });
  });

  it('counts a timed-out attempt as a failure', async () => {
    const lookup = new FakeSink('lookup', { hang: true });
    const dispatcher = new SinkDispatcher([lookup], ledger, { ...FAST_RETRY, maxAttempts: 2, timeoutMs: 20 });

    const result = await dispatcher.dispatch(handle('k1'));

    expect(result.get('lookup')).toEqual({ state: 'failed', reason: 'lookup sink timeout after 20ms' });
    expect(lookup.calls).toHaveLength(2);
  });

  it('skips sinks the ledger already marks delivered', async () => {
    const stream = new FakeSink('stream');
    await ledger.markDelivered('k1', 'stream', 1);
    const dispatcher = new SinkDispatcher([stream], ledger, FAST_RETRY);

    const result = await dispatcher.dispatch(handle('k1'));

    expect(result.get('stream')).toEqual({ state: 'delivered' });
    expect(stream.calls).toHaveLength(0);
  });

  it('does not re-publish to a non-deduplicating sink on a second dispatch', async () => {
    const stream = new FakeSink('stream');
    const dispatcher = new SinkDispatcher([stream], ledger, FAST_RETRY);

    await dispatcher.dispatch(handle('k1'));
    await dispatcher.dispatch(handle('k1'));

    expect(stream.calls).toHaveLength(1);
  });

  it('retries only the failed sink on a second dispatch', async () => {
    const lookup = new FakeSink('lookup');
    const archive = new FakeSink('archive', {
      failures: Array.from({ length: 5 }, () => new Error('SlowDown')),
    });
    const dispatcher = new SinkDispatcher([lookup, archive], ledger, FAST_RETRY);

    const first = await dispatcher.dispatch(handle('k1'));
    const second = await dispatcher.dispatch(handle('k1'));

    expect(first.get('archive')).toEqual({ state: 'failed', reason: 'SlowDown' });
    expect(second.get('archive')).toEqual({ state: 'delivered' });
    expect(lookup.calls).toHaveLength(1);
    expect(archive.calls).toHaveLength(6);
  });

  it('shares one run between concurrent dispatches of the same key', async () => {
    const lookup = new FakeSink('lookup');
    const dispatcher = new SinkDispatcher([lookup], ledger, FAST_RETRY);

    const first = dispatcher.dispatch(handle('k1'));
    const second = dispatcher.dispatch(handle('k1'));

    expect(second).toBe(first);
    await first;
    expect(lookup.calls).toHaveLength(1);
    expect(dispatcher.pending).toBe(0);
  });

  it('refuses a non-deduplicating sink when the ledger cannot be read', async () => {
    store.getError = new Error('connection refused');
    const stream = new FakeSink('stream', { nativeDedup: false });
    const lookup = new FakeSink('lookup', { nativeDedup: true });
    const dispatcher = new SinkDispatcher([stream, lookup], ledger, FAST_RETRY);

    const result = await dispatcher.dispatch(handle('k1'));

    expect(result.get('stream')).toEqual({ state: 'failed', reason: 'ledger unavailable: connection refused' });
    expect(result.get('lookup')).toEqual({ state: 'delivered' });
    expect(stream.calls).toHaveLength(0);
  });

  it('still resolves when ledger writes fail', async () => {
    store.upsertError = new Error('connection refused');
    const lookup = new FakeSink('lookup');
    const dispatcher = new SinkDispatcher([lookup], ledger, FAST_RETRY);

    await expect(dispatcher.dispatch(handle('k1'))).resolves.toEqual(new Map([['lookup', { state: 'delivered' }]]));
  });

  it('joins a run in flight even when a different sink subset is asked for', async () => {
    const lookup = new FakeSink('lookup');
    const archive = new FakeSink('archive');
    const dispatcher = new SinkDispatcher([lookup, archive], ledger, FAST_RETRY);

    const first = dispatcher.dispatch(handle('k1'), [lookup]);
    const joined = dispatcher.dispatch(handle('k1'), [archive]);

    expect(joined).toBe(first);
    await expect(joined).resolves.toEqual(new Map([['lookup', { state: 'delivered' }]]));
    expect(archive.calls).toHaveLength(0);

    await dispatcher.dispatch(handle('k1'), [archive]);
    expect(archive.delivered).toHaveLength(1);
  });

  it('keeps the delivered mark through a transient ledger error so the stream is not published twice', async () => {
    store.failWhen = (entry) => entry.status.state === 'delivered';
    store.upsertFailures.push(new Error('fetch failed: ETIMEDOUT'));
    const stream = new FakeSink('stream', { nativeDedup: false });
    const dispatcher = new SinkDispatcher([stream], ledger, FAST_RETRY);

    await dispatcher.dispatch(handle('k1'));
    expect(store.rows.get('k1:stream')?.status).toEqual({ state: 'delivered' });

    await dispatcher.dispatch(handle('k1'));
    expect(stream.calls).toHaveLength(1);
  });

  it('honours an explicit sink subset', async () => {
    const lookup = new FakeSink('lookup');
    const archive = new FakeSink('archive');
    const dispatcher = new SinkDispatcher([lookup, archive], ledger, FAST_RETRY);

    const result = await dispatcher.dispatch(handle('k1'), [archive]);

    expect([...result.keys()]).toEqual(['archive']);
    expect(lookup.calls).toHaveLength(0);
  });

  it('drain() waits for in-flight dispatches', async () => {
    const lookup = new FakeSink('lookup', { failures: [new Error('ETIMEDOUT')] });
    const dispatcher = new SinkDispatcher([lookup], ledger, FAST_RETRY);

    const run = dispatcher.dispatch(handle('k1'));
    expect(dispatcher.pending).toBe(1);

    await dispatcher.drain();

    expect(dispatcher.pending).toBe(0);
    expect(lookup.delivered).toHaveLength(1);
    await run;
  });

  it('exposes the registered sink names', () => {
    const dispatcher = new SinkDispatcher([new FakeSink('lookup'), new FakeSink('stream')], ledger, FAST_RETRY);
    expect(dispatcher.sinkNames).toEqual(['lookup', 'stream']);
  });
});
