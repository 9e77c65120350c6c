/**
 * Fan-out dispatcher
 *
 * Every consumer (sinks, analytics) gets its own bounded queue and worker, so
 * a slow consumer only ever backs up its own queue.
 *
 * Backpressure per consumer:
 * - block:       the record waits for room until blockTimeoutMs after it was
 *                published, then that consumer's delivery fails (counted)
 * - drop-oldest: the oldest queued record is evicted and counted
 *
 * Unless a consumer fixes its policy, auxiliary kinds go drop-oldest (and only
 * auxiliary records are evicted for them) while everything else blocks.
 *
 * publish() never waits on a consumer. A record that finds its lane full joins
 * that lane's backlog, which hands records to the queue in publish order, so
 * a blocked consumer holds back only its own lane. The deadline is set at
 * publish time, which bounds a backlog to what arrives within blockTimeoutMs.
 */

import logger from '../shared/logger';
import { AsyncQueue } from '../shared/async-queue';
import { DispatcherSettings } from '../shared/config';
import { SinkError, describeError } from '../shared/errors';
import { dispatcherDropped, dispatcherTimeouts, sinkErrors } from '../shared/metrics';
import { sleep, withTimeout } from '../shared/timing';
import { AUXILIARY_KINDS } from '../shared/types';
import { CanonicalEvent, DispatchRecord, SpreadEvent, isSpreadEvent } from '../canonicalizer/canonical-event';

export type BackpressurePolicy = 'block' | 'drop-oldest';

export interface Consumer {
  readonly name: string;
  /** Fixed policy for every record; by default it is chosen per record kind */
  readonly policy?: BackpressurePolicy;
  /** Whether analytics spread events are delivered to this consumer */
  readonly acceptsSpreads: boolean;
  handle(record: DispatchRecord): Promise<void>;
  close?(): Promise<void>;
}

export interface ConsumerStats {
  delivered: number;
  failed: number;
  dropped: number;
  timedOut: number;
  queued: number;
}

interface Lane {
  consumer: Consumer;
  queue: AsyncQueue<DispatchRecord>;
  stats: ConsumerStats;
  worker: Promise<void>;
  /** Records waiting for room, chained in publish order */
  backlog: Promise<void>;
  pending: number;
}

export function isAuxiliary(record: DispatchRecord): boolean {
  return !isSpreadEvent(record) && AUXILIARY_KINDS.includes(record.kind);
}

export function policyFor(consumer: Consumer, record: DispatchRecord): BackpressurePolicy {
  return consumer.policy ?? (isAuxiliary(record) ? 'drop-oldest' : 'block');
}

export class Dispatcher {
  private readonly lanes: Lane[] = [];
  private stopped = false;

  constructor(
    consumers: readonly Consumer[],
    private readonly settings: DispatcherSettings
  ) {
    for (const consumer of consumers) {
      this.register(consumer);
    }
  }

  register(consumer: Consumer): void {
    if (this.stopped) {
      throw new Error('dispatcher is stopped');
    }
    if (this.lanes.some((lane) => lane.consumer.name === consumer.name)) {
      throw new Error(`duplicate consumer name ${consumer.name}`);
    }

    const queue = new AsyncQueue<DispatchRecord>(this.settings.queueCapacity);
    const stats: ConsumerStats = { delivered: 0, failed: 0, dropped: 0, timedOut: 0, queued: 0 };
    const lane: Lane = { consumer, queue, stats, worker: Promise.resolve(), backlog: Promise.resolve(), pending: 0 };
    lane.worker = this.work(lane);
    this.lanes.push(lane);
  }

  /** Hand a canonical event to every consumer's lane. */
  async publish(event: CanonicalEvent): Promise<void> {
    const deadline = Date.now() + this.settings.blockTimeoutMs;
    for (const lane of this.lanes) {
      this.deliver(lane, event, deadline);
    }
  }

  /** Hand a spread event to the consumers that take them. */
  async publishSpread(event: SpreadEvent): Promise<void> {
    const deadline = Date.now() + this.settings.blockTimeoutMs;
    for (const lane of this.lanes) {
      if (lane.consumer.acceptsSpreads) this.deliver(lane, event, deadline);
    }
  }

  /**
   * Stop accepting records, drain what is queued, then close consumers.
   * A lane still draining after drainTimeoutMs has its queued records dropped.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    await Promise.all(this.lanes.map((lane) => lane.backlog));
    for (const lane of this.lanes) {
      lane.queue.close();
    }
    await Promise.all(this.lanes.map((lane) => this.drain(lane)));

    for (const { consumer } of this.lanes) {
      if (!consumer.close) continue;
      try {
        await withTimeout(consumer.close(), this.settings.drainTimeoutMs, () => new Error('close timed out'));
      } catch (error) {
        logger.error(`[Dispatcher] Closing ${consumer.name} failed: ${describeError(error)}`);
      }
    }
    logger.info('[Dispatcher] Stopped');
  }

  getStats(): Record<string, ConsumerStats> {
    const stats: Record<string, ConsumerStats> = {};
    for (const lane of this.lanes) {
      stats[lane.consumer.name] = { ...lane.stats, queued: lane.queue.size + lane.pending };
    }
    return stats;
  }

  private deliver(lane: Lane, record: DispatchRecord, deadline: number): void {
    if (this.stopped) return;
    if (lane.pending === 0 && this.tryDeliver(lane, record)) return;

    lane.pending++;
    lane.backlog = lane.backlog
      .then(() => this.deliverWaiting(lane, record, deadline))
      .catch((error: unknown) => {
        logger.error(`[Dispatcher] ${lane.consumer.name} delivery failed: ${describeError(error)}`);
      })
      .finally(() => {
        lane.pending--;
      });
  }

  /** Deliver without waiting; false when a blocking record found the queue full. */
  private tryDeliver(lane: Lane, record: DispatchRecord): boolean {
    if (policyFor(lane.consumer, record) === 'drop-oldest') {
      this.pushDropOldest(lane, record);
      return true;
    }
    return lane.queue.push(record);
  }

  private async deliverWaiting(lane: Lane, record: DispatchRecord, deadline: number): Promise<void> {
    const { consumer, queue, stats } = lane;

    if (policyFor(consumer, record) === 'drop-oldest') {
      this.pushDropOldest(lane, record);
      return;
    }

    const outcome = await queue.offer(record, Math.max(0, deadline - Date.now()));
    if (outcome === 'timeout') {
      stats.timedOut++;
      dispatcherTimeouts.inc({ consumer: consumer.name });
      logger.warn(
        `[Dispatcher] ${consumer.name} queue full for ${this.settings.blockTimeoutMs}ms; ${record.kind} not delivered`
      );
    }
  }

  private pushDropOldest(lane: Lane, record: DispatchRecord): void {
    const { consumer, queue, stats } = lane;
    const evictable = consumer.policy === 'drop-oldest' ? undefined : isAuxiliary;
    const outcome = queue.pushDropOldest(record, evictable);
    if (outcome.dropped !== undefined) {
      stats.dropped++;
      dispatcherDropped.inc({ consumer: consumer.name });
      logger.debug(`[Dispatcher] ${consumer.name} queue full; dropped oldest ${outcome.dropped.kind}`);
    }
  }

  private async drain(lane: Lane): Promise<void> {
    const timer = new AbortController();
    const finished = lane.worker.then(() => true);
    const drained = await Promise.race([finished, sleep(this.settings.drainTimeoutMs, timer.signal).then(() => false)]);
    timer.abort();
    if (drained) return;

    const abandoned = lane.queue.clear();
    lane.stats.dropped += abandoned;
    dispatcherDropped.inc({ consumer: lane.consumer.name }, abandoned);
    logger.warn(
      `[Dispatcher] ${lane.consumer.name} still draining after ${this.settings.drainTimeoutMs}ms; dropped ${abandoned} queued record(s)`
    );
  }

  private async work(lane: Lane): Promise<void> {
    const { consumer, queue, stats } = lane;

    for await (const record of queue) {
      try {
        await consumer.handle(record);
        stats.delivered++;
      } catch (error) {
        stats.failed++;
        sinkErrors.inc({ consumer: consumer.name });
        const failure =
          error instanceof SinkError
            ? error
            : new SinkError(consumer.name, `write failed: ${describeError(error)}`, { cause: error });
        logger.error(`[Dispatcher] ${consumer.name} rejected ${record.kind}: ${failure.message}`);
      }
    }
  }
}
