// Sink contract: a destination for canonical and spread records

import { Consumer } from '../dispatcher/dispatcher';
import { DispatchRecord } from '../canonicalizer/canonical-event';

export interface Sink {
  readonly name: string;
  /** Rejects when the record was not accepted; the dispatcher logs and counts it. */
  write(record: DispatchRecord): Promise<void>;
  close(): Promise<void>;
}

/** Wrap a sink as a dispatcher consumer. Sinks take spread events too. */
export function sinkConsumer(sink: Sink): Consumer {
  return {
    name: sink.name,
    acceptsSpreads: true,
    handle: (record) => sink.write(record),
    close: () => sink.close(),
  };
}
