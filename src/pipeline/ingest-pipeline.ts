/**
 * Ingest pipeline
 *
 * agents --(supervisor)--> bounded ingest channel --> canonicalize + validate
 *   --> dispatcher --> sinks
 *                  \-> analytics --(spread subscription)--> dispatcher --> sinks
 *
 * One loop owns canonicalization and publishing, which gives every consumer
 * the agents' emission order. Rejected events are kept in a bounded
 * dead-letter buffer for inspection.
 */

import logger from '../shared/logger';
import { AsyncQueue } from '../shared/async-queue';
import { IngestorConfig } from '../shared/config';
import { NormalizationFailure, describeError } from '../shared/errors';
import { normalizationErrors, validationRejects } from '../shared/metrics';
import { EventKind, RawEvent, Venue } from '../shared/types';
import { CanonicalEvent, SpreadEvent } from '../canonicalizer/canonical-event';
import { Canonicalizer, EventValidator } from '../canonicalizer/canonicalizer';
import { QuoteTables } from '../canonicalizer/symbols';
import { ConsumerStats, Consumer, Dispatcher } from '../dispatcher/dispatcher';
import { SpreadDetector } from '../analytics/spread-detector';
import { Agent } from '../market-ingester/agent';
import { AgentStatus, Supervisor } from '../market-ingester/supervisor';
import { Sink, sinkConsumer } from '../sinks/sink';

export interface DeadLetter {
  stage: 'normalization' | 'validation';
  reason: NormalizationFailure | 'rejected';
  message: string;
  venue: Venue;
  kind: EventKind;
  receivedAt: number;
  event?: CanonicalEvent;
}

export interface IngestPipelineOptions {
  config: IngestorConfig;
  agents: readonly Agent[];
  sinks: readonly Sink[];
  quotes?: QuoteTables;
  validator?: EventValidator;
  deadLetterCapacity?: number;
  now?: () => number;
}

export interface PipelineStatus {
  agents: AgentStatus[];
  consumers: Record<string, ConsumerStats>;
  ingestQueued: number;
  deadLetters: number;
}

const DEFAULT_DEAD_LETTER_CAPACITY = 1_000;

export class IngestPipeline {
  readonly supervisor: Supervisor;
  readonly dispatcher: Dispatcher;
  readonly canonicalizer: Canonicalizer;
  readonly detector: SpreadDetector | null;

  private readonly channel: AsyncQueue<RawEvent>;
  private readonly deadLetters: DeadLetter[] = [];
  private readonly deadLetterCapacity: number;
  private processing: Promise<void> | null = null;
  private forwardingSpreads: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: IngestPipelineOptions) {
    const { config } = options;
    this.deadLetterCapacity = options.deadLetterCapacity ?? DEFAULT_DEAD_LETTER_CAPACITY;
    this.channel = new AsyncQueue<RawEvent>(config.ingestQueueCapacity);

    this.canonicalizer = new Canonicalizer({
      features: config.features,
      quotes: options.quotes,
      validator: options.validator,
    });

    const consumers: Consumer[] = options.sinks.map(sinkConsumer);
    if (config.analytics.enabled) {
      const detector = new SpreadDetector({
        threshold: config.analytics.spreadThreshold,
        stalenessWindowMs: config.analytics.stalenessWindowMs,
        debounceMs: config.analytics.debounceMs,
        now: options.now,
      });
      consumers.push({
        name: 'analytics',
        acceptsSpreads: false,
        handle: async (record) => {
          if (record.kind === 'trade') detector.onTrade(record);
        },
      });
      this.detector = detector;
    } else {
      this.detector = null;
    }

    this.dispatcher = new Dispatcher(consumers, config.dispatcher);
    this.supervisor = new Supervisor(options.agents, {
      settings: config.supervisor,
      forward: (event, signal) => this.forward(event, signal),
      now: options.now,
    });
  }

  start(): void {
    if (this.processing) return;
    logger.info('[IngestPipeline] Starting');
    this.processing = this.processLoop();
    if (this.detector) {
      this.forwardingSpreads = this.forwardSpreads(this.detector.subscribe());
    }
    this.supervisor.start();
  }

  /**
   * Inject a raw event from an external collaborator (fetchers, chain
   * clients). Waits while the ingest channel is full; false once stopped.
   */
  async ingest(event: RawEvent): Promise<boolean> {
    return (await this.channel.offer(event)) === 'accepted';
  }

  /** Stop agents, drain the pipeline, then close sinks. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  getStatus(): PipelineStatus {
    return {
      agents: this.supervisor.getStatus(),
      consumers: this.dispatcher.getStats(),
      ingestQueued: this.channel.size,
      deadLetters: this.deadLetters.length,
    };
  }

  getDeadLetters(): readonly DeadLetter[] {
    return [...this.deadLetters];
  }

  /** Canonicalize, validate and publish one raw event. */
  async process(raw: RawEvent): Promise<void> {
    const result = this.canonicalizer.canonicalize(raw);
    if (!result.ok) {
      const { error } = result;
      normalizationErrors.inc({ agent: raw.venue, reason: error.reason });
      logger.debug(`[IngestPipeline] Dropped ${raw.venue} ${raw.kind}: ${error.message}`);
      this.deadLetter({
        stage: 'normalization',
        reason: error.reason,
        message: error.message,
        venue: raw.venue,
        kind: raw.kind,
        receivedAt: raw.receivedAt,
      });
      return;
    }

    const verdict = this.canonicalizer.validate(result.event);
    if (!verdict.valid) {
      validationRejects.inc({ agent: raw.venue, kind: raw.kind });
      logger.warn(`[IngestPipeline] Validator rejected ${raw.venue} ${raw.kind}: ${verdict.reason}`);
      this.deadLetter({
        stage: 'validation',
        reason: 'rejected',
        message: verdict.reason,
        venue: raw.venue,
        kind: raw.kind,
        receivedAt: raw.receivedAt,
        event: result.event,
      });
      return;
    }

    await this.dispatcher.publish(result.event);
  }

  private async forward(event: RawEvent, signal: AbortSignal): Promise<void> {
    await this.channel.offer(event, Number.POSITIVE_INFINITY, signal);
  }

  private async processLoop(): Promise<void> {
    for await (const raw of this.channel) {
      try {
        await this.process(raw);
      } catch (error) {
        logger.error(`[IngestPipeline] Processing ${raw.venue} ${raw.kind} failed: ${describeError(error)}`);
      }
    }
  }

  private async forwardSpreads(spreads: AsyncIterable<SpreadEvent>): Promise<void> {
    for await (const spread of spreads) {
      await this.dispatcher.publishSpread(spread);
    }
  }

  private deadLetter(entry: DeadLetter): void {
    this.deadLetters.push(entry);
    if (this.deadLetters.length > this.deadLetterCapacity) {
      this.deadLetters.shift();
    }
  }

  private async shutdown(): Promise<void> {
    logger.info('[IngestPipeline] Stopping');
    await this.supervisor.stop();

    this.channel.close();
    await this.processing;

    this.detector?.close();
    await this.forwardingSpreads;

    await this.dispatcher.stop();
    logger.info('[IngestPipeline] Stopped');
  }
}
