import type { NormalizedRecord, SinkName } from '@trailhook/shared';
import type { Sink, SinkDelivery } from '../../src/sinks';

export interface FakeSinkOptions {
  nativeDedup?: boolean;
  accepts?: (record: NormalizedRecord) => boolean;
  /** Errors thrown by successive deliver calls; once exhausted, calls succeed */
  failures?: Error[];
  /** Fail every call */
  alwaysFail?: Error;
  /** Never settle unless aborted */
  hang?: boolean;
}

/** Sink that records every delivery attempt. */
export class FakeSink implements Sink {
  readonly nativeDedup: boolean;
  readonly calls: SinkDelivery[] = [];
  readonly delivered: SinkDelivery[] = [];
  private readonly failures: Error[];

  constructor(
    readonly name: SinkName,
    private readonly options: FakeSinkOptions = {}
  ) {
    this.nativeDedup = options.nativeDedup ?? false;
    this.failures = [...(options.failures ?? [])];
  }

  accepts(record: NormalizedRecord): boolean {
    return this.options.accepts ? this.options.accepts(record) : true;
  }

  async deliver(delivery: SinkDelivery, signal: AbortSignal): Promise<void> {
    this.calls.push(delivery);

    if (this.options.hang) {
      await new Promise<void>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    }

    if (this.options.alwaysFail) throw this.options.alwaysFail;

    const failure = this.failures.shift();
    if (failure) throw failure;

    this.delivered.push(delivery);
  }
}
